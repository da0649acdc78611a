/**
 * Stats endpoint.
 * GET /api/v1/stats - Corpus statistics
 */

import { pipeline } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import { json, toSolutionResponse } from './http.js';

export function createStatsHandlers(container: Container) {
  const getStats: Handler = pipeline(container.logging, container.errorHandler)(async () => {
    const { topSolution, ...stats } = container.solutionService.statistics();

    return json({
      ...stats,
      topSolution: topSolution
        ? toSolutionResponse(topSolution, container.solutionService.isFavorite(topSolution.id))
        : null,
    });
  });

  return { getStats };
}
