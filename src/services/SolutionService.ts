/**
 * Solution corpus: storage, lookup, search, ranking, favorites and statistics.
 * The in-memory map is authoritative for the session; every mutation is
 * written through to the persistence repository. Reads hand out copies so the
 * stored solutions only change through this service.
 */

import type { ISolutionRepository } from '../repositories/ISolutionRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type {
  QualityTier,
  SearchFilters,
  Solution,
  SolutionCategory,
  SolutionStatistics,
  TechStack,
} from '../types/models.js';
import type { QualityEvaluator } from './QualityEvaluator.js';
import type { VersionEntry, VersionManager } from './VersionManager.js';
import {
  addUserRating,
  decrementFavorites,
  incrementFavorites,
  incrementUsage,
  snapshotSolution,
} from '../domain/solution.js';
import { emptyCategoryCounts, emptyTechStackCounts, emptyTierCounts } from '../domain/counts.js';
import { ConflictError, NotFoundError } from '../errors.js';

const NAME_MATCH_WEIGHT = 10;
const DESCRIPTION_MATCH_WEIGHT = 5;
const TAG_MATCH_WEIGHT = 3;
const DEFAULT_RANKING_LIMIT = 10;

export interface SolutionChanges {
  name?: string;
  description?: string;
  category?: SolutionCategory;
  techStack?: TechStack;
  htmlCode?: string;
  cssCode?: string;
  jsCode?: string;
  tags?: string[];
}

export class SolutionService {
  /** Insertion-ordered; iteration order is the tie-breaker for every ranking. */
  private readonly solutions = new Map<string, Solution>();
  private favorites: string[] = [];

  constructor(
    private readonly solutionRepo: ISolutionRepository,
    private readonly evaluator: QualityEvaluator,
    private readonly versionManager: VersionManager,
    private readonly logProvider: ILogProvider
  ) {}

  /** Replace the in-memory corpus with what the repository holds. */
  async load(): Promise<void> {
    const { solutions, rejected } = await this.solutionRepo.loadAll();

    for (const record of rejected) {
      this.logProvider.warn('Skipping malformed solution record', {
        source: record.source,
        reason: record.reason,
      });
    }

    this.solutions.clear();
    for (const solution of solutions) {
      this.solutions.set(solution.id, solution);
    }

    const storedFavorites = await this.solutionRepo.loadFavorites();
    this.favorites = [...new Set(storedFavorites)].filter((id) => this.solutions.has(id));

    this.logProvider.info('Solutions loaded', {
      count: this.solutions.size,
      rejected: rejected.length,
      favorites: this.favorites.length,
    });
  }

  async add(solution: Solution, autoEvaluate = true): Promise<string> {
    if (this.solutions.has(solution.id)) {
      throw new ConflictError('DUPLICATE_SOLUTION', `Solution "${solution.id}" already exists`, {
        existingId: solution.id,
      });
    }

    const stored = snapshotSolution(solution);
    if (autoEvaluate) {
      this.evaluateInPlace(stored);
    }

    await this.solutionRepo.save(stored);
    this.solutions.set(stored.id, stored);

    this.logProvider.info('Solution added', {
      solutionId: stored.id,
      name: stored.name,
      overallScore: stored.metrics.overallScore,
    });

    return stored.id;
  }

  get(id: string): Solution | null {
    const solution = this.solutions.get(id);
    return solution ? snapshotSolution(solution) : null;
  }

  list(): Solution[] {
    return this.snapshots([...this.solutions.values()]);
  }

  /** Apply user edits. Code changes trigger re-evaluation. */
  async update(id: string, changes: SolutionChanges): Promise<Solution> {
    const solution = this.require(id);

    const codeChanged =
      (changes.htmlCode !== undefined && changes.htmlCode !== solution.htmlCode) ||
      (changes.cssCode !== undefined && changes.cssCode !== solution.cssCode) ||
      (changes.jsCode !== undefined && changes.jsCode !== solution.jsCode) ||
      (changes.techStack !== undefined && changes.techStack !== solution.techStack);

    const updated: Solution = {
      ...solution,
      name: changes.name ?? solution.name,
      description: changes.description ?? solution.description,
      category: changes.category ?? solution.category,
      techStack: changes.techStack ?? solution.techStack,
      htmlCode: changes.htmlCode ?? solution.htmlCode,
      cssCode: changes.cssCode ?? solution.cssCode,
      jsCode: changes.jsCode ?? solution.jsCode,
      tags: changes.tags ? [...changes.tags] : [...solution.tags],
      childSolutionIds: [...solution.childSolutionIds],
      updatedAt: new Date(),
    };

    if (codeChanged) {
      this.evaluateInPlace(updated);
    }

    await this.solutionRepo.save(updated);
    this.solutions.set(id, updated);

    return snapshotSolution(updated);
  }

  async remove(id: string): Promise<void> {
    this.require(id);

    await this.solutionRepo.delete(id);
    this.solutions.delete(id);

    if (this.favorites.includes(id)) {
      const favorites = this.favorites.filter((favoriteId) => favoriteId !== id);
      await this.solutionRepo.saveFavorites(favorites);
      this.favorites = favorites;
    }

    this.logProvider.info('Solution removed', { solutionId: id });
  }

  // ── Search & ranking ──

  search(query: string, filters: SearchFilters = {}): Solution[] {
    const needle = query.trim().toLowerCase();

    const scored: Array<{ solution: Solution; relevance: number }> = [];
    for (const solution of this.solutions.values()) {
      if (!matchesFilters(solution, filters)) continue;

      const relevance = relevanceScore(solution, needle);
      if (relevance > 0) {
        scored.push({ solution, relevance });
      }
    }

    // Array.prototype.sort is stable, so equal relevance keeps insertion order
    scored.sort((a, b) => b.relevance - a.relevance);
    return this.snapshots(scored.map((entry) => entry.solution));
  }

  getByCategory(category: SolutionCategory): Solution[] {
    return this.snapshots(
      [...this.solutions.values()].filter((solution) => solution.category === category)
    );
  }

  getByQualityTier(tier: QualityTier): Solution[] {
    return this.snapshots(
      [...this.solutions.values()].filter((solution) => solution.qualityTier === tier)
    );
  }

  topRated(limit = DEFAULT_RANKING_LIMIT): Solution[] {
    return this.snapshots(
      [...this.solutions.values()]
        .sort((a, b) => b.userRating - a.userRating)
        .slice(0, limit)
    );
  }

  mostUsed(limit = DEFAULT_RANKING_LIMIT): Solution[] {
    return this.snapshots(
      [...this.solutions.values()]
        .sort((a, b) => b.usageCount - a.usageCount)
        .slice(0, limit)
    );
  }

  // ── Favorites ──

  /** Returns false when the id is unknown or already a favorite. */
  async addToFavorites(id: string): Promise<boolean> {
    const stored = this.solutions.get(id);
    if (!stored || this.favorites.includes(id)) return false;

    const solution = snapshotSolution(stored);
    incrementFavorites(solution);
    const favorites = [...this.favorites, id];

    await this.solutionRepo.save(solution);
    await this.solutionRepo.saveFavorites(favorites);
    this.solutions.set(id, solution);
    this.favorites = favorites;
    return true;
  }

  /** Returns false when the id was not a favorite. */
  async removeFromFavorites(id: string): Promise<boolean> {
    if (!this.favorites.includes(id)) return false;

    const favorites = this.favorites.filter((favoriteId) => favoriteId !== id);
    await this.solutionRepo.saveFavorites(favorites);
    this.favorites = favorites;

    const stored = this.solutions.get(id);
    if (stored) {
      const solution = snapshotSolution(stored);
      decrementFavorites(solution);
      await this.solutionRepo.save(solution);
      this.solutions.set(id, solution);
    }
    return true;
  }

  getFavorites(): Solution[] {
    return this.snapshots(
      this.favorites.flatMap((id) => {
        const solution = this.solutions.get(id);
        return solution ? [solution] : [];
      })
    );
  }

  isFavorite(id: string): boolean {
    return this.favorites.includes(id);
  }

  // ── Counters ──

  async rate(id: string, rating: number): Promise<Solution> {
    return this.commit(id, (solution) => addUserRating(solution, rating));
  }

  async recordUsage(id: string): Promise<Solution> {
    return this.commit(id, incrementUsage);
  }

  // ── Versions ──

  /** Snapshot the stored solution into its lineage. */
  async createVersion(id: string, description = ''): Promise<string> {
    return this.versionManager.createVersion(this.require(id), description);
  }

  getVersionHistory(id: string): VersionEntry[] {
    this.require(id);
    return this.versionManager.getVersionHistory(id);
  }

  /**
   * Restore a historical version as a new solution in the corpus.
   * Returns null when the lineage has no such version.
   */
  async rollback(id: string, version: string): Promise<Solution | null> {
    this.require(id);

    const restored = this.versionManager.rollbackToVersion(id, version);
    if (!restored) return null;

    await this.add(restored, false);
    await this.commit(id, (source) => {
      source.childSolutionIds.push(restored.id);
    });
    return snapshotSolution(restored);
  }

  // ── Statistics ──

  statistics(): SolutionStatistics {
    const all = [...this.solutions.values()];

    const qualityDistribution = emptyTierCounts();
    const categoryDistribution = emptyCategoryCounts();
    const techStackDistribution = emptyTechStackCounts();

    let totalUsage = 0;
    let scoreSum = 0;
    let ratingSum = 0;
    let ratedCount = 0;
    let top: Solution | null = null;

    for (const solution of all) {
      qualityDistribution[solution.qualityTier] += 1;
      categoryDistribution[solution.category] += 1;
      techStackDistribution[solution.techStack] += 1;

      totalUsage += solution.usageCount;
      scoreSum += solution.metrics.overallScore;

      if (solution.ratingCount > 0) {
        ratingSum += solution.userRating;
        ratedCount += 1;
      }

      if (!top || solution.metrics.overallScore > top.metrics.overallScore) {
        top = solution;
      }
    }

    return {
      totalSolutions: all.length,
      totalFavorites: this.favorites.length,
      totalUsage,
      qualityDistribution,
      categoryDistribution,
      techStackDistribution,
      averageQuality: all.length > 0 ? scoreSum / all.length : 0,
      averageRating: ratedCount > 0 ? ratingSum / ratedCount : 0,
      topSolution: top ? snapshotSolution(top) : null,
    };
  }

  // ── Private ──

  private require(id: string): Solution {
    const solution = this.solutions.get(id);
    if (!solution) {
      throw new NotFoundError(`Solution "${id}" not found`);
    }
    return solution;
  }

  /**
   * Apply `change` to a copy of the stored solution, persist the copy and only
   * then replace the stored one.
   */
  private async commit(id: string, change: (solution: Solution) => void): Promise<Solution> {
    const solution = snapshotSolution(this.require(id));
    change(solution);

    await this.solutionRepo.save(solution);
    this.solutions.set(id, solution);
    return snapshotSolution(solution);
  }

  private evaluateInPlace(solution: Solution): void {
    solution.metrics = this.evaluator.evaluate(solution);
    solution.qualityTier = this.evaluator.determineQualityTier(solution.metrics);
  }

  private snapshots(solutions: Solution[]): Solution[] {
    return solutions.map(snapshotSolution);
  }
}

function matchesFilters(solution: Solution, filters: SearchFilters): boolean {
  if (filters.category !== undefined && solution.category !== filters.category) return false;
  if (filters.techStack !== undefined && solution.techStack !== filters.techStack) return false;
  if (filters.minQuality !== undefined && solution.metrics.overallScore < filters.minQuality) return false;
  if (filters.minRating !== undefined && solution.userRating < filters.minRating) return false;
  return true;
}

/** 0 means no match. */
function relevanceScore(solution: Solution, needle: string): number {
  let score = 0;

  if (solution.name.toLowerCase().includes(needle)) score += NAME_MATCH_WEIGHT;
  if (solution.description.toLowerCase().includes(needle)) score += DESCRIPTION_MATCH_WEIGHT;
  for (const tag of solution.tags) {
    if (tag.toLowerCase().includes(needle)) score += TAG_MATCH_WEIGHT;
  }

  return score * (1 + solution.metrics.overallScore / 100);
}
