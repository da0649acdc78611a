/**
 * Append-only log of user interactions with solutions.
 * Weighted per-category and per-tech-stack counters are derived from the log
 * on request rather than maintained incrementally.
 */

import { z } from 'zod';
import type {
  BehaviorAction,
  BehaviorEvent,
  Solution,
  SolutionCategory,
  TechStack,
} from '../types/models.js';
import { SOLUTION_CATEGORIES, TECH_STACKS } from '../types/models.js';
import { assertValidRating, MAX_RATING } from '../domain/solution.js';
import { emptyCategoryCounts, emptyTechStackCounts } from '../domain/counts.js';
import { ValidationError } from '../errors.js';

/** Fields of a solution captured on each event. */
export type TrackedSolution = Pick<Solution, 'id' | 'category' | 'techStack'>;

const ACTION_WEIGHTS: Record<Exclude<BehaviorAction, 'rate'>, number> = {
  view: 1,
  apply: 3,
  favorite: 2,
};

/** Largest counter increment a single rating can contribute. */
const RATING_WEIGHT_SCALE = 5;

const snapshotSchema = z.object({
  events: z.array(
    z.object({
      action: z.enum(['view', 'apply', 'favorite', 'rate']),
      solution_id: z.string().min(1),
      category: z.enum(SOLUTION_CATEGORIES),
      tech_stack: z.enum(TECH_STACKS),
      rating: z.number().min(0).max(MAX_RATING).nullable().default(null),
      timestamp: z.string().refine((value) => !Number.isNaN(Date.parse(value)), 'invalid timestamp'),
    })
  ),
});

export type BehaviorLogSnapshot = z.input<typeof snapshotSchema>;

export class BehaviorTracker {
  private readonly events: BehaviorEvent[] = [];

  trackView(solution: TrackedSolution): void {
    this.append('view', solution, null);
  }

  trackApply(solution: TrackedSolution): void {
    this.append('apply', solution, null);
  }

  trackFavorite(solution: TrackedSolution): void {
    this.append('favorite', solution, null);
  }

  /** Throws ValidationError for ratings outside [0, 5]; nothing is recorded then. */
  trackRating(solution: TrackedSolution, rating: number): void {
    assertValidRating(rating);
    this.append('rate', solution, rating);
  }

  getEvents(): readonly BehaviorEvent[] {
    return [...this.events];
  }

  get eventCount(): number {
    return this.events.length;
  }

  /** Actions recorded against one solution, oldest first. */
  getInteractions(solutionId: string): BehaviorAction[] {
    return this.events
      .filter((event) => event.solutionId === solutionId)
      .map((event) => event.action);
  }

  categoryCounters(): Record<SolutionCategory, number> {
    const counters = emptyCategoryCounts();
    for (const event of this.events) {
      counters[event.category] += eventWeight(event);
    }
    return counters;
  }

  techStackCounters(): Record<TechStack, number> {
    const counters = emptyTechStackCounts();
    for (const event of this.events) {
      counters[event.techStack] += eventWeight(event);
    }
    return counters;
  }

  exportLog(): BehaviorLogSnapshot {
    return {
      events: this.events.map((event) => ({
        action: event.action,
        solution_id: event.solutionId,
        category: event.category,
        tech_stack: event.techStack,
        rating: event.rating,
        timestamp: event.timestamp.toISOString(),
      })),
    };
  }

  /** Rebuild a tracker from an exported log. Throws ValidationError on malformed input. */
  static fromSnapshot(snapshot: unknown): BehaviorTracker {
    const parsed = snapshotSchema.safeParse(snapshot);
    if (!parsed.success) {
      throw new ValidationError('Invalid behavior log', {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    const tracker = new BehaviorTracker();
    for (const event of parsed.data.events) {
      if (event.action === 'rate' && event.rating === null) {
        throw new ValidationError('Rate events must carry a rating', { solutionId: event.solution_id });
      }
      tracker.events.push(
        Object.freeze({
          action: event.action,
          solutionId: event.solution_id,
          category: event.category,
          techStack: event.tech_stack,
          rating: event.action === 'rate' ? event.rating : null,
          timestamp: new Date(event.timestamp),
        })
      );
    }
    return tracker;
  }

  private append(action: BehaviorAction, solution: TrackedSolution, rating: number | null): void {
    this.events.push(
      Object.freeze({
        action,
        solutionId: solution.id,
        category: solution.category,
        techStack: solution.techStack,
        rating,
        timestamp: new Date(),
      })
    );
  }
}

function eventWeight(event: BehaviorEvent): number {
  if (event.action !== 'rate') return ACTION_WEIGHTS[event.action];
  return Math.round(((event.rating ?? 0) / MAX_RATING) * RATING_WEIGHT_SCALE);
}
