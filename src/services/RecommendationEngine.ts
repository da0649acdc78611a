/**
 * Ranked, explained recommendations over a candidate set.
 *
 * Each candidate's total is a weighted blend of five sub-scores in [0, 1]:
 *   quality     0.30  overall score / 100
 *   preference  0.25  fit with the derived preference vector
 *   popularity  0.20  usage, rating and favorites relative to the candidate set
 *   novelty     0.15  age step function blended with an inverse-log usage term
 *   context     0.10  explicit category / tech stack / keyword matches
 *
 * `recommend` results are cached per (candidate ids, context, limit) for a
 * fixed TTL. A hit returns the stored list even if the candidates changed
 * since; `invalidateCache` forces recomputation.
 */

import { createHash } from 'node:crypto';
import type {
  PreferenceVector,
  RecommendationContext,
  RecommendationResult,
  SimilarSolution,
  Solution,
  TechStack,
} from '../types/models.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { BehaviorTracker } from './BehaviorTracker.js';
import type { PreferenceModel } from './PreferenceModel.js';
import type { SimilarityCalculator } from './SimilarityCalculator.js';
import { MAX_RATING } from '../domain/solution.js';

export const DEFAULT_CACHE_TTL_MS = 60 * 60 * 1000;

const SCORE_WEIGHTS = {
  quality: 0.3,
  preference: 0.25,
  popularity: 0.2,
  novelty: 0.15,
  context: 0.1,
} as const;

const PERSONALIZED_CATEGORY_THRESHOLD = 0.3;
const PROVEN_USAGE_COUNT = 10;
const MS_PER_DAY = 86_400_000;

const TECH_STACK_BLURBS: Record<TechStack, string> = {
  css_animation: 'pure CSS, simple to drop in',
  javascript: 'script-driven, feature rich',
  gsap: 'GSAP timeline, professional polish',
  three_js: '3D scene, striking visuals',
  svg_animation: 'vector animation, scales without loss',
};

export interface RecommendationEngineOptions {
  /** Lifetime of a cached recommendation list. Default: one hour. */
  cacheTtlMs?: number;
}

export interface RecommendationStatistics {
  eventCount: number;
  preferences: PreferenceVector;
  cacheSize: number;
}

interface CacheEntry {
  results: readonly RecommendationResult[];
  cachedAt: number;
}

/** Candidate-set maxima the popularity score normalizes against. */
export interface PopularityBaseline {
  maxUsage: number;
  maxFavorites: number;
  maxRating: number;
}

export class RecommendationEngine {
  private readonly cache = new Map<string, CacheEntry>();
  private readonly cacheTtlMs: number;

  constructor(
    private readonly tracker: BehaviorTracker,
    private readonly preferenceModel: PreferenceModel,
    private readonly similarityCalculator: SimilarityCalculator,
    private readonly logProvider: ILogProvider,
    options?: RecommendationEngineOptions
  ) {
    this.cacheTtlMs = options?.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS;
  }

  recommend(
    candidates: readonly Solution[],
    context: RecommendationContext = {},
    limit = 10
  ): RecommendationResult[] {
    if (candidates.length === 0) return [];

    const key = cacheKey(candidates, context, limit);
    const now = Date.now();

    const cached = this.cache.get(key);
    if (cached && now - cached.cachedAt < this.cacheTtlMs) {
      this.logProvider.debug('Recommendation cache hit', { candidates: candidates.length, limit });
      return cached.results.map((result) => ({ ...result }));
    }

    const preferences = this.preferenceModel.derive(new Date(now));
    const baseline = popularityBaseline(candidates);

    const results = candidates
      .map((solution) => scoreCandidate(solution, preferences, baseline, context, now))
      .sort((a, b) => b.totalScore - a.totalScore)
      .slice(0, limit);

    this.evictExpired(now);
    this.cache.set(key, { results: results.map((result) => ({ ...result })), cachedAt: now });

    this.logProvider.info('Recommendations generated', {
      candidates: candidates.length,
      returned: results.length,
      limit,
    });

    return results;
  }

  /** Most similar candidates to `target`, excluding the target itself. */
  getSimilarSolutions(
    target: Solution,
    candidates: readonly Solution[],
    limit = 5
  ): SimilarSolution[] {
    return candidates
      .filter((candidate) => candidate.id !== target.id)
      .map((solution) => ({
        solution,
        similarity: this.similarityCalculator.similarity(target, solution),
      }))
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, limit);
  }

  /**
   * Solutions ranked by recent activity: usage counts only when the solution
   * was touched inside the window, plus accumulated rating mass and favorites.
   */
  getTrendingSolutions(
    solutions: readonly Solution[],
    windowDays = 7,
    limit = 10
  ): Solution[] {
    const cutoff = Date.now() - windowDays * MS_PER_DAY;

    return solutions
      .map((solution) => {
        const recentUsage = solution.updatedAt.getTime() >= cutoff ? solution.usageCount : 0;
        const trend =
          recentUsage * 0.5 +
          solution.userRating * solution.ratingCount * 0.3 +
          solution.favoriteCount * 0.2;
        return { solution, trend };
      })
      .sort((a, b) => b.trend - a.trend)
      .slice(0, limit)
      .map((entry) => entry.solution);
  }

  /**
   * Recommend from the solutions that clear the user's quality threshold in a
   * category they favor, widening to the full set when too few remain.
   */
  getPersonalizedRecommendations(solutions: readonly Solution[], limit = 10): RecommendationResult[] {
    const preferences = this.preferenceModel.derive();

    const preferred = solutions.filter(
      (solution) =>
        solution.metrics.overallScore >= preferences.qualityThreshold * 100 &&
        preferences.categories[solution.category] > PERSONALIZED_CATEGORY_THRESHOLD
    );

    return this.recommend(preferred.length < limit ? solutions : preferred, {}, limit);
  }

  invalidateCache(): void {
    this.cache.clear();
  }

  getStatistics(): RecommendationStatistics {
    return {
      eventCount: this.tracker.eventCount,
      preferences: this.preferenceModel.derive(),
      cacheSize: this.cache.size,
    };
  }

  private evictExpired(now: number): void {
    for (const [key, entry] of this.cache) {
      if (now - entry.cachedAt >= this.cacheTtlMs) {
        this.cache.delete(key);
      }
    }
  }
}

// ── Scoring ──

function scoreCandidate(
  solution: Solution,
  preferences: PreferenceVector,
  baseline: PopularityBaseline,
  context: RecommendationContext,
  now: number
): RecommendationResult {
  const qualityScore = solution.metrics.overallScore / 100;
  const preferenceScore = preferenceMatch(solution, preferences);
  const popularityScore = popularity(solution, baseline);
  const noveltyScore = novelty(solution, now);
  const similarityScore = contextMatch(solution, context);

  const totalScore =
    qualityScore * SCORE_WEIGHTS.quality +
    preferenceScore * SCORE_WEIGHTS.preference +
    popularityScore * SCORE_WEIGHTS.popularity +
    noveltyScore * SCORE_WEIGHTS.novelty +
    similarityScore * SCORE_WEIGHTS.context;

  return {
    solutionId: solution.id,
    totalScore,
    qualityScore,
    preferenceScore,
    popularityScore,
    noveltyScore,
    similarityScore,
    explanation: explain(solution, qualityScore, preferenceScore, popularityScore, noveltyScore),
  };
}

export function preferenceMatch(solution: Solution, preferences: PreferenceVector): number {
  const overall = solution.metrics.overallScore;
  const thresholdMet = overall >= preferences.qualityThreshold * 100 ? 1 : 0.5;
  const complexityFit = 1 - Math.abs(overall / 100 - preferences.complexityAppetite);

  return (
    preferences.categories[solution.category] * 0.4 +
    preferences.techStacks[solution.techStack] * 0.3 +
    thresholdMet * 0.2 +
    complexityFit * 0.1
  );
}

function popularityBaseline(candidates: readonly Solution[]): PopularityBaseline {
  const rated = candidates.filter((solution) => solution.ratingCount > 0);
  return {
    maxUsage: Math.max(...candidates.map((solution) => solution.usageCount)),
    maxFavorites: Math.max(...candidates.map((solution) => solution.favoriteCount)),
    maxRating: rated.length > 0 ? Math.max(...rated.map((solution) => solution.userRating)) : MAX_RATING,
  };
}

export function popularity(solution: Solution, baseline: PopularityBaseline): number {
  const usage = solution.usageCount / Math.max(1, baseline.maxUsage);
  const favorites = solution.favoriteCount / Math.max(1, baseline.maxFavorites);

  let rating = 0.5;
  if (solution.ratingCount > 0) {
    // Every rated candidate scored 0
    rating = baseline.maxRating > 0 ? solution.userRating / baseline.maxRating : 0;
  }

  return usage * 0.5 + rating * 0.3 + favorites * 0.2;
}

export function novelty(solution: Solution, now: number): number {
  const ageDays = Math.floor((now - solution.createdAt.getTime()) / MS_PER_DAY);

  let timeNovelty: number;
  if (ageDays <= 7) timeNovelty = 1;
  else if (ageDays <= 30) timeNovelty = 0.8;
  else if (ageDays <= 90) timeNovelty = 0.5;
  else timeNovelty = 0.2;

  const usageNovelty = 1 / (1 + Math.log(solution.usageCount + 1));

  return timeNovelty * 0.7 + usageNovelty * 0.3;
}

export function contextMatch(solution: Solution, context: RecommendationContext): number {
  let score = 0.5;

  if (context.targetCategory !== undefined && solution.category === context.targetCategory) {
    score += 0.3;
  }
  if (context.preferredTech !== undefined && solution.techStack === context.preferredTech) {
    score += 0.2;
  }
  if (context.keywords !== undefined) {
    const description = solution.description.toLowerCase();
    const matched = context.keywords.filter((keyword) =>
      description.includes(keyword.toLowerCase())
    ).length;
    score += (matched / Math.max(1, context.keywords.length)) * 0.3;
  }

  return Math.min(1, score);
}

function explain(
  solution: Solution,
  quality: number,
  preference: number,
  popularityScore: number,
  noveltyScore: number
): string {
  const parts: string[] = [];

  if (quality > 0.8) parts.push('high-quality solution');
  else if (quality > 0.6) parts.push('good quality');

  if (preference > 0.7) parts.push('matches your preferences');

  if (popularityScore > 0.7) parts.push('popular choice');
  else if (solution.usageCount > PROVEN_USAGE_COUNT) parts.push('proven in use');

  if (noveltyScore > 0.8) parts.push('fresh idea');

  parts.push(TECH_STACK_BLURBS[solution.techStack]);

  return parts.join('; ');
}

function cacheKey(
  candidates: readonly Solution[],
  context: RecommendationContext,
  limit: number
): string {
  const canonical = JSON.stringify({
    ids: candidates.map((solution) => solution.id).sort(),
    targetCategory: context.targetCategory ?? null,
    preferredTech: context.preferredTech ?? null,
    keywords: context.keywords ?? null,
    limit,
  });
  return createHash('sha256').update(canonical).digest('hex');
}
