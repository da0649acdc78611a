import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  contextMatch,
  DEFAULT_CACHE_TTL_MS,
  novelty,
  popularity,
  preferenceMatch,
  RecommendationEngine,
} from '../../src/services/RecommendationEngine.js';
import { BehaviorTracker } from '../../src/services/BehaviorTracker.js';
import { PreferenceModel } from '../../src/services/PreferenceModel.js';
import { SimilarityCalculator } from '../../src/services/SimilarityCalculator.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { makeSolution } from '../mocks/solutions.js';

const DAY_MS = 86_400_000;

describe('RecommendationEngine', () => {
  let tracker: BehaviorTracker;
  let logProvider: ConsoleLogProvider;
  let engine: RecommendationEngine;

  beforeEach(() => {
    tracker = new BehaviorTracker();
    logProvider = new ConsoleLogProvider();
    engine = new RecommendationEngine(
      tracker,
      new PreferenceModel(tracker),
      new SimilarityCalculator(),
      logProvider
    );
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  // ── sub-scores ──

  describe('popularity', () => {
    const baseline = { maxUsage: 10, maxFavorites: 4, maxRating: 5 };

    it('should weight usage, rating and favorites against the candidate maxima', () => {
      const solution = makeSolution({ usageCount: 5, favoriteCount: 2, userRating: 4, ratingCount: 1 });

      expect(popularity(solution, baseline)).toBeCloseTo(0.59, 10);
    });

    it('should use a neutral rating for unrated solutions', () => {
      expect(popularity(makeSolution(), baseline)).toBeCloseTo(0.15, 10);
    });

    it('should score ratings as 0 when every rated candidate scored 0', () => {
      const solution = makeSolution({ userRating: 0, ratingCount: 3 });

      expect(popularity(solution, { maxUsage: 0, maxFavorites: 0, maxRating: 0 })).toBe(0);
    });
  });

  describe('novelty', () => {
    it('should step down with age and usage', () => {
      const now = Date.UTC(2026, 5, 1);
      const created = (daysAgo: number) => makeSolution({ createdAt: new Date(now - daysAgo * DAY_MS) });

      expect(novelty(created(0), now)).toBeCloseTo(1, 10);
      expect(novelty(created(7.9), now)).toBeCloseTo(1, 10);
      expect(novelty(created(10), now)).toBeCloseTo(0.86, 10);
      expect(novelty(created(60), now)).toBeCloseTo(0.65, 10);
      expect(novelty(created(100), now)).toBeCloseTo(0.44, 10);
    });

    it('should favor rarely used solutions', () => {
      const now = Date.UTC(2026, 5, 1);
      const used = makeSolution({ createdAt: new Date(now), usageCount: 20 });

      expect(novelty(used, now)).toBeCloseTo(0.7 + 0.3 / (1 + Math.log(21)), 10);
    });
  });

  describe('contextMatch', () => {
    const solution = makeSolution({
      category: 'entrance',
      techStack: 'gsap',
      description: 'Staggered fade for hero cards',
    });

    it('should start from a neutral score', () => {
      expect(contextMatch(solution, {})).toBe(0.5);
    });

    it('should add category, tech stack and keyword matches', () => {
      expect(contextMatch(solution, { targetCategory: 'entrance' })).toBeCloseTo(0.8, 10);
      expect(contextMatch(solution, { targetCategory: 'exit', preferredTech: 'gsap' })).toBeCloseTo(0.7, 10);
      expect(contextMatch(solution, { keywords: ['FADE', 'spin'] })).toBeCloseTo(0.65, 10);
    });

    it('should cap at 1', () => {
      expect(
        contextMatch(solution, { targetCategory: 'entrance', preferredTech: 'gsap', keywords: ['hero'] })
      ).toBe(1);
    });
  });

  describe('preferenceMatch', () => {
    it('should combine category and stack shares with quality fit', () => {
      tracker.trackView({ id: 'x', category: 'entrance', techStack: 'gsap' });
      const preferences = new PreferenceModel(tracker).derive();

      const match = preferenceMatch(makeSolution({ category: 'entrance', techStack: 'gsap', score: 80 }), preferences);

      // gsap complexity is 0.7, so the complexity fit is 0.9
      expect(match).toBeCloseTo(0.99, 10);
    });

    it('should give half credit below the quality threshold', () => {
      const preferences = new PreferenceModel(tracker).derive();

      expect(preferenceMatch(makeSolution({ score: 40 }), preferences)).toBeCloseTo(0.16, 10);
    });
  });

  // ── recommend ──

  describe('recommend', () => {
    it('should return nothing for an empty candidate set', () => {
      expect(engine.recommend([])).toEqual([]);
    });

    it('should score and explain a candidate', () => {
      const solution = makeSolution({ id: 'orb', score: 90 });

      const [result] = engine.recommend([solution]);

      expect(result?.solutionId).toBe('orb');
      expect(result?.similarityScore).toBe(0.5);
      expect(result?.qualityScore).toBeCloseTo(0.9, 10);
      expect(result?.popularityScore).toBeCloseTo(0.15, 10);
      expect(result?.noveltyScore).toBeCloseTo(1, 10);
      expect(result?.preferenceScore).toBeCloseTo(0.21, 10);
      expect(result?.totalScore).toBeCloseTo(0.5525, 10);
      expect(result?.explanation).toBe('high-quality solution; fresh idea; pure CSS, simple to drop in');
    });

    it('should rank by total score and honor the limit', () => {
      const candidates = [
        makeSolution({ id: 'low', score: 30 }),
        makeSolution({ id: 'high', score: 95 }),
        makeSolution({ id: 'mid', score: 70 }),
      ];

      const results = engine.recommend(candidates, {}, 2);

      expect(results.map((result) => result.solutionId)).toEqual(['high', 'mid']);
    });

    it('should boost candidates matching the context', () => {
      const candidates = [
        makeSolution({ id: 'plain', score: 70 }),
        makeSolution({ id: 'target', score: 70, category: 'exit', techStack: 'gsap' }),
      ];

      const results = engine.recommend(candidates, { targetCategory: 'exit', preferredTech: 'gsap' });

      expect(results[0]?.solutionId).toBe('target');
    });

    it('should mention popularity when usage dominates', () => {
      const candidates = [
        makeSolution({ id: 'hit', score: 65, usageCount: 40, favoriteCount: 8, userRating: 5, ratingCount: 3 }),
        makeSolution({ id: 'proven', score: 65, usageCount: 12 }),
      ];

      const results = engine.recommend(candidates);
      const byId = new Map(results.map((result) => [result.solutionId, result.explanation]));

      expect(byId.get('hit')).toBe('good quality; popular choice; pure CSS, simple to drop in');
      expect(byId.get('proven')).toBe('good quality; proven in use; pure CSS, simple to drop in');
    });
  });

  describe('cache', () => {
    it('should return identical results within the TTL even if candidates change', () => {
      const a = makeSolution({ id: 'a', score: 70 });
      const b = makeSolution({ id: 'b', score: 70 });

      const first = engine.recommend([a, b]);
      b.usageCount = 500;
      const second = engine.recommend([a, b]);

      expect(second).toEqual(first);
      expect(logProvider.events.at(-1)).toMatchObject({ level: 'debug', message: 'Recommendation cache hit' });
    });

    it('should key the cache on the candidate set, not its order', () => {
      const a = makeSolution({ id: 'a' });
      const b = makeSolution({ id: 'b' });

      engine.recommend([a, b]);
      engine.recommend([b, a]);

      expect(engine.getStatistics().cacheSize).toBe(1);
    });

    it('should hand out copies of cached results', () => {
      const candidates = [makeSolution({ id: 'a' })];

      const first = engine.recommend(candidates);
      if (first[0]) first[0].totalScore = -1;

      expect(engine.recommend(candidates)[0]?.totalScore).toBeGreaterThan(0);
    });

    it('should recompute once the TTL has passed', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2026-06-01T00:00:00.000Z'));

      const a = makeSolution({ id: 'a', score: 70 });
      const b = makeSolution({ id: 'b', score: 70 });
      const first = engine.recommend([a, b]);

      b.usageCount = 500;
      vi.setSystemTime(new Date(Date.now() + DEFAULT_CACHE_TTL_MS));
      const second = engine.recommend([a, b]);

      expect(first.map((result) => result.solutionId)).toEqual(['a', 'b']);
      expect(second[0]?.solutionId).toBe('b');
    });

    it('should honor a custom TTL', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2026-06-01T00:00:00.000Z'));
      const shortLived = new RecommendationEngine(
        tracker,
        new PreferenceModel(tracker),
        new SimilarityCalculator(),
        logProvider,
        { cacheTtlMs: 1000 }
      );

      const b = makeSolution({ id: 'b', score: 70 });
      const candidates = [makeSolution({ id: 'a', score: 70 }), b];
      shortLived.recommend(candidates);

      b.usageCount = 500;
      vi.setSystemTime(new Date(Date.now() + 1000));

      expect(shortLived.recommend(candidates)[0]?.solutionId).toBe('b');
    });

    it('should recompute after invalidation', () => {
      const a = makeSolution({ id: 'a', score: 70 });
      const b = makeSolution({ id: 'b', score: 70 });
      engine.recommend([a, b]);

      b.usageCount = 500;
      engine.invalidateCache();

      expect(engine.recommend([a, b])[0]?.solutionId).toBe('b');
    });
  });

  // ── similar / trending / personalized ──

  describe('getSimilarSolutions', () => {
    it('should rank by similarity and exclude the target', () => {
      const target = makeSolution({ id: 'target', category: 'entrance', score: 80 });
      const candidates = [
        target,
        makeSolution({ id: 'far', category: 'exit', techStack: 'three_js', score: 20 }),
        makeSolution({ id: 'near', category: 'entrance', score: 78 }),
      ];

      const results = engine.getSimilarSolutions(target, candidates);

      expect(results.map((entry) => entry.solution.id)).toEqual(['near', 'far']);
      expect(results[0]?.similarity).toBeGreaterThan(results[1]?.similarity ?? 1);
    });

    it('should honor the limit', () => {
      const target = makeSolution({ id: 'target' });
      const candidates = [makeSolution(), makeSolution(), makeSolution()];

      expect(engine.getSimilarSolutions(target, candidates, 2)).toHaveLength(2);
    });
  });

  describe('getTrendingSolutions', () => {
    it('should count usage only for recently touched solutions', () => {
      const recent = makeSolution({ id: 'recent', usageCount: 10 });
      const stale = makeSolution({ id: 'stale', usageCount: 20, userRating: 4, ratingCount: 2 });
      stale.updatedAt = new Date(Date.now() - 30 * DAY_MS);
      const liked = makeSolution({ id: 'liked', favoriteCount: 5 });

      const results = engine.getTrendingSolutions([liked, stale, recent]);

      expect(results.map((solution) => solution.id)).toEqual(['recent', 'stale', 'liked']);
    });
  });

  describe('getPersonalizedRecommendations', () => {
    const candidates = [
      makeSolution({ id: 'e1', category: 'entrance', score: 80 }),
      makeSolution({ id: 'x', category: 'exit', score: 95 }),
      makeSolution({ id: 'e2', category: 'entrance', score: 75 }),
    ];

    it('should restrict to favored categories above the quality threshold', () => {
      tracker.trackView({ id: 'seen', category: 'entrance', techStack: 'css_animation' });

      const ids = engine.getPersonalizedRecommendations(candidates, 2).map((result) => result.solutionId);

      expect(ids.sort()).toEqual(['e1', 'e2']);
    });

    it('should widen to every candidate when too few qualify', () => {
      tracker.trackView({ id: 'seen', category: 'entrance', techStack: 'css_animation' });

      expect(engine.getPersonalizedRecommendations(candidates, 3)).toHaveLength(3);
    });
  });

  it('should report statistics', () => {
    tracker.trackView({ id: 'a', category: 'effect', techStack: 'css_animation' });
    engine.recommend([makeSolution({ id: 'a' })]);

    const stats = engine.getStatistics();

    expect(stats.eventCount).toBe(1);
    expect(stats.cacheSize).toBe(1);
    expect(stats.preferences.categories.effect).toBe(1);
  });
});
