/**
 * Quality evaluation service.
 * Scores a solution's code along five dimensions and derives the overall
 * score and quality tier. Deterministic: no randomness, no hidden state.
 */

import type { DimensionScores, QualityTier, Solution, SolutionCode, SolutionMetrics } from '../types/models.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import { DEFAULT_DIMENSION_RULES, type DimensionRules, type Heuristic } from '../domain/heuristics.js';
import { clampScore, createMetrics, determineQualityTier } from '../domain/metrics.js';
import { ok, err, type Result } from '../types/common.js';

/** Score a dimension falls back to when one of its heuristics fails. */
export const NEUTRAL_DIMENSION_SCORE = 0;

export interface QualityEvaluatorOptions {
  rules?: DimensionRules;
}

export class QualityEvaluator {
  private readonly rules: DimensionRules;

  constructor(
    private readonly logProvider: ILogProvider,
    options?: QualityEvaluatorOptions
  ) {
    this.rules = options?.rules ?? DEFAULT_DIMENSION_RULES;
  }

  evaluate(solution: SolutionCode & Pick<Solution, 'id'>): SolutionMetrics {
    const scores: DimensionScores = {
      qualityScore: this.scoreDimension(solution, 'qualityScore'),
      performanceScore: this.scoreDimension(solution, 'performanceScore'),
      creativityScore: this.scoreDimension(solution, 'creativityScore'),
      usabilityScore: this.scoreDimension(solution, 'usabilityScore'),
      compatibilityScore: this.scoreDimension(solution, 'compatibilityScore'),
    };

    return createMetrics(scores);
  }

  determineQualityTier(metrics: SolutionMetrics): QualityTier {
    return determineQualityTier(metrics.overallScore);
  }

  // ── Private ──

  private scoreDimension(
    solution: SolutionCode & Pick<Solution, 'id'>,
    dimension: keyof DimensionScores
  ): number {
    const result = this.weightedSum(solution, this.rules[dimension]);

    if (!result.ok) {
      this.logProvider.warn('Heuristic analysis failed; using neutral score', {
        solutionId: solution.id,
        dimension,
        heuristic: result.error.heuristic,
        reason: result.error.reason,
      });
      return NEUTRAL_DIMENSION_SCORE;
    }

    return clampScore(result.value);
  }

  private weightedSum(
    code: SolutionCode,
    heuristics: readonly Heuristic[]
  ): Result<number, { heuristic: string; reason: string }> {
    let total = 0;

    for (const heuristic of heuristics) {
      const result = heuristic.analyze(code);
      if (!result.ok) {
        return err({ heuristic: heuristic.name, reason: result.error });
      }
      total += clampScore(result.value) * heuristic.weight;
    }

    return ok(total);
  }
}
