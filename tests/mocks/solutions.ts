/**
 * Test fixtures for solutions with fixed scores.
 */

import type { DimensionScores, Solution } from '../../src/types/models.js';
import { createSolution, type CreateSolutionInput } from '../../src/domain/solution.js';
import { createMetrics, determineQualityTier } from '../../src/domain/metrics.js';

/** Every dimension at `score`, so the overall score is `score` too. */
export function uniformScores(score: number): DimensionScores {
  return {
    qualityScore: score,
    performanceScore: score,
    creativityScore: score,
    usabilityScore: score,
    compatibilityScore: score,
  };
}

export interface TestSolutionInput extends CreateSolutionInput {
  score?: number;
  usageCount?: number;
  favoriteCount?: number;
  userRating?: number;
  ratingCount?: number;
}

export function makeSolution(input: TestSolutionInput = {}): Solution {
  const { score = 60, usageCount, favoriteCount, userRating, ratingCount, ...rest } = input;
  const metrics = createMetrics(uniformScores(score));

  const solution = createSolution({
    metrics,
    qualityTier: determineQualityTier(metrics.overallScore),
    ...rest,
  });

  solution.usageCount = usageCount ?? 0;
  solution.favoriteCount = favoriteCount ?? 0;
  solution.userRating = userRating ?? 0;
  solution.ratingCount = ratingCount ?? 0;
  return solution;
}
