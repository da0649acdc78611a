import type { DimensionScores, QualityTier, SolutionMetrics } from '../types/models.js';

/** Top-level weights of the five dimensions in the overall score. */
export const DIMENSION_WEIGHTS: Readonly<Record<keyof DimensionScores, number>> = {
  qualityScore: 0.3,
  performanceScore: 0.25,
  creativityScore: 0.2,
  usabilityScore: 0.15,
  compatibilityScore: 0.1,
};

export function calculateOverallScore(scores: DimensionScores): number {
  return (
    scores.qualityScore * DIMENSION_WEIGHTS.qualityScore +
    scores.performanceScore * DIMENSION_WEIGHTS.performanceScore +
    scores.creativityScore * DIMENSION_WEIGHTS.creativityScore +
    scores.usabilityScore * DIMENSION_WEIGHTS.usabilityScore +
    scores.compatibilityScore * DIMENSION_WEIGHTS.compatibilityScore
  );
}

export function createMetrics(scores: DimensionScores): SolutionMetrics {
  return Object.freeze({
    qualityScore: scores.qualityScore,
    performanceScore: scores.performanceScore,
    creativityScore: scores.creativityScore,
    usabilityScore: scores.usabilityScore,
    compatibilityScore: scores.compatibilityScore,
    overallScore: calculateOverallScore(scores),
  });
}

export const EMPTY_METRICS: SolutionMetrics = createMetrics({
  qualityScore: 0,
  performanceScore: 0,
  creativityScore: 0,
  usabilityScore: 0,
  compatibilityScore: 0,
});

export function determineQualityTier(overallScore: number): QualityTier {
  if (overallScore >= 85) return 'excellent';
  if (overallScore >= 70) return 'good';
  if (overallScore >= 50) return 'average';
  return 'poor';
}

export function clampScore(value: number, min = 0, max = 100): number {
  return Math.max(min, Math.min(max, value));
}
