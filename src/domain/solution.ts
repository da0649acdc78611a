/**
 * Solution entity helpers.
 * Every mutation of a solution's counters goes through these functions so the
 * rating mean and timestamps stay consistent.
 */

import { randomUUID } from 'node:crypto';
import type {
  Solution,
  SolutionCategory,
  SolutionMetrics,
  QualityTier,
  TechStack,
} from '../types/models.js';
import { EMPTY_METRICS } from './metrics.js';
import { ValidationError } from '../errors.js';

export const MIN_RATING = 0;
export const MAX_RATING = 5;

export interface CreateSolutionInput {
  id?: string;
  name?: string;
  description?: string;
  category?: SolutionCategory;
  techStack?: TechStack;
  htmlCode?: string;
  cssCode?: string;
  jsCode?: string;
  tags?: string[];
  author?: string;
  metrics?: SolutionMetrics;
  qualityTier?: QualityTier;
  createdAt?: Date;
}

export function createSolution(input: CreateSolutionInput = {}): Solution {
  const createdAt = input.createdAt ?? new Date();

  return {
    id: input.id ?? randomUUID(),
    name: input.name ?? 'Untitled solution',
    description: input.description ?? '',
    category: input.category ?? 'effect',
    htmlCode: input.htmlCode ?? '',
    cssCode: input.cssCode ?? '',
    jsCode: input.jsCode ?? '',
    techStack: input.techStack ?? 'css_animation',
    metrics: input.metrics ?? EMPTY_METRICS,
    qualityTier: input.qualityTier ?? 'average',
    userRating: 0,
    ratingCount: 0,
    favoriteCount: 0,
    usageCount: 0,
    author: input.author ?? 'AI generated',
    tags: [...(input.tags ?? [])],
    createdAt,
    updatedAt: createdAt,
    version: '1.0.0',
    parentSolutionId: null,
    childSolutionIds: [],
  };
}

export function assertValidRating(rating: number): void {
  if (!Number.isFinite(rating) || rating < MIN_RATING || rating > MAX_RATING) {
    throw new ValidationError(
      `rating must be between ${MIN_RATING} and ${MAX_RATING}`,
      { rating }
    );
  }
}

/** Fold one rating into the running mean. Throws before touching the solution when the rating is out of range. */
export function addUserRating(solution: Solution, rating: number): void {
  assertValidRating(rating);

  const total = solution.userRating * solution.ratingCount;
  solution.ratingCount += 1;
  solution.userRating = (total + rating) / solution.ratingCount;
  solution.updatedAt = new Date();
}

export function incrementUsage(solution: Solution): void {
  solution.usageCount += 1;
  solution.updatedAt = new Date();
}

export function incrementFavorites(solution: Solution): void {
  solution.favoriteCount += 1;
  solution.updatedAt = new Date();
}

export function decrementFavorites(solution: Solution): void {
  solution.favoriteCount = Math.max(0, solution.favoriteCount - 1);
  solution.updatedAt = new Date();
}

/** Deep copy that keeps the identity. */
export function snapshotSolution(solution: Solution): Solution {
  return {
    ...solution,
    tags: [...solution.tags],
    childSolutionIds: [...solution.childSolutionIds],
    createdAt: new Date(solution.createdAt),
    updatedAt: new Date(solution.updatedAt),
  };
}

/** Deep copy under a fresh identity, as used for version branches. */
export function cloneSolution(solution: Solution): Solution {
  const now = new Date();
  return {
    ...snapshotSolution(solution),
    id: randomUUID(),
    childSolutionIds: [],
    createdAt: now,
    updatedAt: now,
  };
}
