/**
 * Semantic version helpers for solution lineages ("major.minor.patch").
 */

export const INITIAL_VERSION = '1.0.0';

/** Returned when the previous version cannot be parsed. */
export const FALLBACK_VERSION = '1.0.1';

export interface SemanticVersion {
  major: number;
  minor: number;
  patch: number;
}

export function parseVersion(version: string): SemanticVersion | null {
  const match = /^(\d+)\.(\d+)\.(\d+)$/.exec(version.trim());
  if (!match) return null;

  return {
    major: Number(match[1]),
    minor: Number(match[2]),
    patch: Number(match[3]),
  };
}

export function formatVersion({ major, minor, patch }: SemanticVersion): string {
  return `${major}.${minor}.${patch}`;
}

export function incrementPatch(version: string): string {
  const parsed = parseVersion(version);
  if (!parsed) return FALLBACK_VERSION;
  return formatVersion({ ...parsed, patch: parsed.patch + 1 });
}
