/**
 * Pairwise solution similarity in [0, 1].
 * Every feature is computed symmetrically, so similarity(a, b) === similarity(b, a).
 */

import type { Solution } from '../types/models.js';
import { extractAnimationDuration, extractStyleFeatures, jaccard } from '../domain/style-features.js';

export const SIMILARITY_WEIGHTS = {
  category: 0.3,
  techStack: 0.25,
  score: 0.2,
  style: 0.15,
  duration: 0.1,
} as const;

const PARTIAL_TECH_STACK_CREDIT = 0.3;
const NEUTRAL_DURATION_SIMILARITY = 0.5;

export type ComparableSolution = Pick<Solution, 'category' | 'techStack' | 'metrics' | 'cssCode'>;

export class SimilarityCalculator {
  similarity(a: ComparableSolution, b: ComparableSolution): number {
    const category = a.category === b.category ? 1 : 0;
    const techStack = a.techStack === b.techStack ? 1 : PARTIAL_TECH_STACK_CREDIT;
    const score = 1 - Math.abs(a.metrics.overallScore - b.metrics.overallScore) / 100;
    const style = jaccard(extractStyleFeatures(a.cssCode), extractStyleFeatures(b.cssCode));
    const duration = durationSimilarity(a.cssCode, b.cssCode);

    return (
      category * SIMILARITY_WEIGHTS.category +
      techStack * SIMILARITY_WEIGHTS.techStack +
      score * SIMILARITY_WEIGHTS.score +
      style * SIMILARITY_WEIGHTS.style +
      duration * SIMILARITY_WEIGHTS.duration
    );
  }
}

function durationSimilarity(cssA: string, cssB: string): number {
  const a = extractAnimationDuration(cssA);
  const b = extractAnimationDuration(cssB);
  if (a === null || b === null) return NEUTRAL_DURATION_SIMILARITY;

  const longest = Math.max(a, b);
  if (longest === 0) return 1;

  return Math.max(0, 1 - Math.abs(a - b) / longest);
}
