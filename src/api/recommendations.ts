/**
 * Recommendation and interaction endpoints.
 * POST /api/v1/recommendations          - Ranked recommendations over the corpus
 * GET  /api/v1/solutions/:id/similar    - Most similar solutions
 * GET  /api/v1/trending                 - Solutions with the most recent activity
 * GET  /api/v1/preferences              - Current preference vector
 * POST /api/v1/interactions             - Record a view, apply, favorite or rating
 */

import { pipeline } from '../middleware/index.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type { BehaviorAction } from '../types/models.js';
import { SOLUTION_CATEGORIES, TECH_STACKS } from '../types/models.js';
import { NotFoundError, ValidationError } from '../errors.js';
import {
  json,
  optionalEnum,
  optionalNumber,
  optionalStringArray,
  pathParam,
  queryLimit,
  readBody,
  requiredString,
  toSolutionResponse,
} from './http.js';

const BEHAVIOR_ACTIONS: readonly BehaviorAction[] = ['view', 'apply', 'favorite', 'rate'];

const recommendSchema: BodySchema = {
  targetCategory: { type: 'string', required: false, enum: SOLUTION_CATEGORIES },
  preferredTech: { type: 'string', required: false, enum: TECH_STACKS },
  keywords: { type: 'array', required: false, items: 'string', maxLength: 20 },
  limit: { type: 'number', required: false, integer: true, min: 1, max: 100 },
  personalized: { type: 'boolean', required: false },
};

const interactionSchema: BodySchema = {
  solutionId: { type: 'string', required: true, maxLength: 100 },
  action: { type: 'string', required: true, enum: BEHAVIOR_ACTIONS },
  rating: { type: 'number', required: false, min: 0, max: 5 },
};

export function createRecommendationHandlers(container: Container) {
  const { solutionService, recommendationEngine, interactionService } = container;

  const recommend: Handler = pipeline(
    container.logging,
    container.errorHandler,
    validateBody(recommendSchema)
  )(async (req) => {
    const body = await readBody(req);
    const limit = optionalNumber(body, 'limit') ?? 10;
    const candidates = solutionService.list();

    const results =
      body.personalized === true
        ? recommendationEngine.getPersonalizedRecommendations(candidates, limit)
        : recommendationEngine.recommend(
            candidates,
            {
              targetCategory: optionalEnum(body, 'targetCategory', SOLUTION_CATEGORIES),
              preferredTech: optionalEnum(body, 'preferredTech', TECH_STACKS),
              keywords: optionalStringArray(body, 'keywords'),
            },
            limit
          );

    return json({ data: results });
  });

  const similar: Handler = pipeline(container.logging, container.errorHandler)(async (req) => {
    const id = pathParam(req, 'solutions');
    const target = solutionService.get(id);
    if (!target) throw new NotFoundError(`Solution "${id}" not found`);

    const results = recommendationEngine.getSimilarSolutions(target, solutionService.list(), queryLimit(req, 5));
    return json({
      data: results.map(({ solution, similarity }) => ({
        solution: toSolutionResponse(solution, solutionService.isFavorite(solution.id)),
        similarity,
      })),
    });
  });

  const trending: Handler = pipeline(container.logging, container.errorHandler)(async (req) => {
    const windowDays = queryLimit(req, 7, 'windowDays');
    const results = recommendationEngine.getTrendingSolutions(solutionService.list(), windowDays, queryLimit(req, 10));
    return json({
      data: results.map((solution) => toSolutionResponse(solution, solutionService.isFavorite(solution.id))),
    });
  });

  const preferences: Handler = pipeline(container.logging, container.errorHandler)(async () => {
    return json(recommendationEngine.getStatistics());
  });

  const interact: Handler = pipeline(
    container.logging,
    container.errorHandler,
    validateBody(interactionSchema)
  )(async (req) => {
    const body = await readBody(req);
    const action = optionalEnum(body, 'action', BEHAVIOR_ACTIONS);
    if (!action) throw new ValidationError(`action must be one of: ${BEHAVIOR_ACTIONS.join(', ')}`);

    await interactionService.record({
      solutionId: requiredString(body, 'solutionId'),
      action,
      rating: optionalNumber(body, 'rating'),
    });

    return new Response(null, { status: 204 });
  });

  return { recommend, similar, trending, preferences, interact };
}
