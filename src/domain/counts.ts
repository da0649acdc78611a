import type { QualityTier, SolutionCategory, TechStack } from '../types/models.js';

export function emptyCategoryCounts(): Record<SolutionCategory, number> {
  return { entrance: 0, exit: 0, transition: 0, interaction: 0, effect: 0, composite: 0 };
}

export function emptyTechStackCounts(): Record<TechStack, number> {
  return { css_animation: 0, javascript: 0, gsap: 0, three_js: 0, svg_animation: 0 };
}

export function emptyTierCounts(): Record<QualityTier, number> {
  return { excellent: 0, good: 0, average: 0, poor: 0 };
}
