/**
 * Structural features extracted from a solution's style code, used to compare
 * two solutions without rendering them.
 */

const ANIMATION_PROPERTIES = ['transform', 'opacity', 'scale', 'rotate', 'translate'] as const;
const VISUAL_EFFECTS = ['shadow', 'gradient', 'blur', 'brightness'] as const;

/** Most specific easing first: `ease-in-out` also contains `ease-in`. */
const EASINGS = [
  ['ease-in-out', 'easing:ease-in-out'],
  ['ease-in', 'easing:ease-in'],
  ['ease-out', 'easing:ease-out'],
] as const;

const DURATION_PATTERNS: readonly RegExp[] = [
  /animation-duration\s*:\s*(\d+(?:\.\d+)?)(ms|s)\b/,
  /transition-duration\s*:\s*(\d+(?:\.\d+)?)(ms|s)\b/,
  /\banimation\s*:\s*(?:[^;}]*?[\s,])?(\d+(?:\.\d+)?)(ms|s)\b/,
  /\btransition\s*:\s*(?:[^;}]*?[\s,])?(\d+(?:\.\d+)?)(ms|s)\b/,
];

export function extractStyleFeatures(cssCode: string): Set<string> {
  const features = new Set<string>();
  if (!cssCode) return features;

  const css = cssCode.toLowerCase();

  for (const property of ANIMATION_PROPERTIES) {
    if (css.includes(property)) features.add(`uses:${property}`);
  }
  for (const effect of VISUAL_EFFECTS) {
    if (css.includes(effect)) features.add(`has:${effect}`);
  }

  const easing = EASINGS.find(([token]) => css.includes(token));
  if (easing) features.add(easing[1]);

  return features;
}

/** First declared animation or transition duration, in seconds. */
export function extractAnimationDuration(cssCode: string): number | null {
  if (!cssCode) return null;

  const css = cssCode.toLowerCase();
  for (const pattern of DURATION_PATTERNS) {
    const match = pattern.exec(css);
    if (!match) continue;

    const value = Number(match[1]);
    return match[2] === 'ms' ? value / 1000 : value;
  }

  return null;
}

/** |A ∩ B| / |A ∪ B|; 0 when both sets are empty. */
export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  const union = new Set([...a, ...b]);
  if (union.size === 0) return 0;

  let shared = 0;
  for (const feature of a) {
    if (b.has(feature)) shared += 1;
  }
  return shared / union.size;
}
