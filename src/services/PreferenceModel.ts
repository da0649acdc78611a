/**
 * Preference vector derived from the behavior log.
 * Nothing is cached: every call recomputes from the tracker's current events.
 */

import type { PreferenceVector, TechStack } from '../types/models.js';
import { SOLUTION_CATEGORIES, TECH_STACKS } from '../types/models.js';
import type { BehaviorTracker } from './BehaviorTracker.js';

export const DEFAULT_QUALITY_THRESHOLD = 0.6;
export const APPLIED_QUALITY_THRESHOLD = 0.7;

/** Relative implementation complexity of each tech stack, 0-1. */
export const TECH_STACK_COMPLEXITY: Readonly<Record<TechStack, number>> = {
  css_animation: 0.3,
  javascript: 0.5,
  gsap: 0.7,
  three_js: 0.9,
  svg_animation: 0.6,
};

const RECENT_WINDOW_DAYS = 7;
const RECENT_SHARE_FOR_NOVELTY = 0.7;
const HIGH_NOVELTY_APPETITE = 0.8;
const LOW_NOVELTY_APPETITE = 0.4;
const MS_PER_DAY = 86_400_000;

export class PreferenceModel {
  constructor(private readonly tracker: BehaviorTracker) {}

  derive(now: Date = new Date()): PreferenceVector {
    const categories = normalize(this.tracker.categoryCounters(), SOLUTION_CATEGORIES);
    const techCounters = this.tracker.techStackCounters();
    const events = this.tracker.getEvents();

    const qualityThreshold = events.some((event) => event.action === 'apply')
      ? APPLIED_QUALITY_THRESHOLD
      : DEFAULT_QUALITY_THRESHOLD;

    let weightedComplexity = 0;
    let techTotal = 0;
    for (const tech of TECH_STACKS) {
      weightedComplexity += techCounters[tech] * TECH_STACK_COMPLEXITY[tech];
      techTotal += techCounters[tech];
    }

    // Whole elapsed days, so an event 7 days and some hours old still counts as recent
    const recent = events.filter(
      (event) => Math.floor((now.getTime() - event.timestamp.getTime()) / MS_PER_DAY) <= RECENT_WINDOW_DAYS
    ).length;

    return {
      categories,
      techStacks: normalize(techCounters, TECH_STACKS),
      qualityThreshold,
      complexityAppetite: weightedComplexity / Math.max(1, techTotal),
      noveltyAppetite:
        recent > events.length * RECENT_SHARE_FOR_NOVELTY ? HIGH_NOVELTY_APPETITE : LOW_NOVELTY_APPETITE,
    };
  }
}

function normalize<K extends string>(counters: Record<K, number>, keys: readonly K[]): Record<K, number> {
  const total = keys.reduce((sum, key) => sum + counters[key], 0);
  const weights = { ...counters };
  for (const key of keys) {
    weights[key] = counters[key] / Math.max(1, total);
  }
  return weights;
}
