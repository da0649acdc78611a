/**
 * Structural code heuristics behind the five quality dimensions.
 *
 * Each heuristic inspects the markup/style/behavior blobs for syntactic
 * signals and returns a score in [0, 100], or an error when the code it needs
 * cannot be analysed. The weights inside a dimension sum to 1.
 */

import type { DimensionScores, SolutionCode, TechStack } from '../types/models.js';
import { ok, err, type Result } from '../types/common.js';
import { clampScore } from './metrics.js';

export type HeuristicResult = Result<number, string>;

export interface Heuristic {
  name: string;
  weight: number;
  analyze: (code: SolutionCode) => HeuristicResult;
}

export type DimensionRules = Record<keyof DimensionScores, readonly Heuristic[]>;

function countMatches(text: string, needles: readonly string[]): number {
  return needles.filter((needle) => text.includes(needle)).length;
}

function countChar(text: string, ch: string): number {
  let count = 0;
  for (const c of text) {
    if (c === ch) count++;
  }
  return count;
}

// ── Quality ──

export function analyzeCodeStructure({ htmlCode, cssCode }: SolutionCode): HeuristicResult {
  let score = 50;

  if (htmlCode) {
    if (htmlCode.includes('<div') && htmlCode.includes('class=')) score += 10;
    if (htmlCode.includes('id=')) score += 5;
  }

  if (cssCode) {
    const open = countChar(cssCode, '{');
    const close = countChar(cssCode, '}');
    if (open !== close) {
      return err(`unbalanced braces in style code (${open} open, ${close} close)`);
    }

    if (cssCode.includes('@keyframes')) score += 15;
    if (cssCode.includes('transition')) score += 10;
    if (open > 0) score += 5;
  }

  return ok(Math.min(100, score));
}

export function analyzeAnimationSmoothness({ cssCode }: SolutionCode): HeuristicResult {
  const css = cssCode.toLowerCase();
  let score = 60;

  // "ease" also covers ease-in, ease-out and ease-in-out
  if (css.includes('ease') || css.includes('cubic-bezier')) score += 8;
  if (css.includes('transform')) score += 15;
  if (css.includes('will-change')) score += 10;

  return ok(Math.min(100, score));
}

export function analyzeVisualAppeal({ cssCode }: SolutionCode): HeuristicResult {
  const css = cssCode.toLowerCase();
  let score = 50;

  score += 5 * countMatches(css, ['color', 'background', 'gradient', 'shadow']);
  score += 6 * countMatches(css, ['shadow', 'gradient', 'opacity', 'blur', 'scale']);

  return ok(Math.min(100, score));
}

// ── Performance ──

export function analyzeCodeEfficiency({ cssCode }: SolutionCode): HeuristicResult {
  const css = cssCode.toLowerCase();
  let score = 70;

  if (css) {
    // Compositor-friendly properties vs. layout-triggering ones
    score += 5 * countMatches(css, ['transform', 'opacity', 'filter']);
    score -= 3 * countMatches(css, ['left:', 'top:', 'width:', 'height:']);
  }

  return ok(clampScore(score));
}

export function analyzeResourceUsage({ htmlCode, cssCode }: SolutionCode): HeuristicResult {
  let score = 80;
  const size = htmlCode.length + cssCode.length;

  if (size < 1000) score += 10;
  else if (size > 5000) score -= 10;

  if (htmlCode.includes('http://') || htmlCode.includes('https://')) score -= 5;

  return ok(clampScore(score));
}

export function analyzeBrowserSupport({ cssCode }: SolutionCode): HeuristicResult {
  const css = cssCode.toLowerCase();
  let score = 75;

  if (css) {
    score += 3 * countMatches(css, ['grid', 'flexbox', 'calc(']);
    if (css.includes('-webkit-') || css.includes('-moz-')) score += 5;
  }

  return ok(Math.min(100, score));
}

// ── Creativity ──

export function analyzeUniqueness({ cssCode }: SolutionCode): HeuristicResult {
  const css = cssCode.toLowerCase();
  const score = 50 + 10 * countMatches(css, ['clip-path', 'mask', 'filter', 'backdrop-filter']);
  return ok(Math.min(100, score));
}

const INNOVATION_BY_STACK: Record<TechStack, number> = {
  three_js: 70,
  gsap: 65,
  css_animation: 55,
  javascript: 50,
  svg_animation: 50,
};

export function analyzeInnovation({ techStack }: SolutionCode): HeuristicResult {
  return ok(INNOVATION_BY_STACK[techStack]);
}

export function analyzeArtisticValue({ cssCode }: SolutionCode): HeuristicResult {
  const css = cssCode.toLowerCase();
  const score = 50 + 5 * countMatches(css, ['gradient', 'shadow', 'border-radius', 'opacity']);
  return ok(Math.min(100, score));
}

// ── Usability ──

export function analyzeReadability({ htmlCode }: SolutionCode): HeuristicResult {
  return ok(htmlCode.includes('<!--') ? 100 : 70);
}

export function analyzeCodeLength({ htmlCode, cssCode, jsCode }: SolutionCode): HeuristicResult {
  const total = htmlCode.length + cssCode.length + jsCode.length;
  if (total >= 500 && total <= 2000) return ok(100);
  if (total > 3000) return ok(40);
  return ok(70);
}

const SIMPLICITY_BY_STACK: Record<TechStack, number> = {
  css_animation: 100,
  javascript: 70,
  gsap: 70,
  svg_animation: 70,
  three_js: 55,
};

export function analyzeStackSimplicity({ techStack }: SolutionCode): HeuristicResult {
  return ok(SIMPLICITY_BY_STACK[techStack]);
}

// ── Compatibility ──

export function analyzeModernFeatures({ cssCode }: SolutionCode): HeuristicResult {
  const css = cssCode.toLowerCase();
  const used = countMatches(css, ['grid', 'flexbox', 'transform', 'transition', 'animation']);
  return ok(Math.min(100, 80 + 4 * used));
}

export function analyzeVendorPrefixes({ cssCode }: SolutionCode): HeuristicResult {
  const css = cssCode.toLowerCase();
  const prefixes = countMatches(css, ['-webkit-', '-moz-', '-ms-', '-o-']);
  return ok(Math.min(100, 80 + 5 * prefixes));
}

export function analyzeScriptStandards({ jsCode }: SolutionCode): HeuristicResult {
  let score = 80;

  if (jsCode) {
    if (jsCode.includes('const ') || jsCode.includes('let ')) score += 12;
    if (jsCode.includes('querySelector')) score += 8;
  }

  return ok(Math.min(100, score));
}

export const DEFAULT_DIMENSION_RULES: DimensionRules = {
  qualityScore: [
    { name: 'code-structure', weight: 0.3, analyze: analyzeCodeStructure },
    { name: 'animation-smoothness', weight: 0.3, analyze: analyzeAnimationSmoothness },
    { name: 'visual-appeal', weight: 0.4, analyze: analyzeVisualAppeal },
  ],
  performanceScore: [
    { name: 'code-efficiency', weight: 0.4, analyze: analyzeCodeEfficiency },
    { name: 'resource-usage', weight: 0.3, analyze: analyzeResourceUsage },
    { name: 'browser-support', weight: 0.3, analyze: analyzeBrowserSupport },
  ],
  creativityScore: [
    { name: 'uniqueness', weight: 0.5, analyze: analyzeUniqueness },
    { name: 'innovation', weight: 0.3, analyze: analyzeInnovation },
    { name: 'artistic-value', weight: 0.2, analyze: analyzeArtisticValue },
  ],
  usabilityScore: [
    { name: 'readability', weight: 1 / 3, analyze: analyzeReadability },
    { name: 'code-length', weight: 1 / 3, analyze: analyzeCodeLength },
    { name: 'stack-simplicity', weight: 1 / 3, analyze: analyzeStackSimplicity },
  ],
  compatibilityScore: [
    { name: 'modern-features', weight: 0.5, analyze: analyzeModernFeatures },
    { name: 'vendor-prefixes', weight: 0.3, analyze: analyzeVendorPrefixes },
    { name: 'script-standards', weight: 0.2, analyze: analyzeScriptStandards },
  ],
};
