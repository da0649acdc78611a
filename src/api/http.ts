/**
 * Request and response helpers shared by the endpoint modules.
 * Bodies reaching the readers have already passed `validateBody`, so the
 * readers only narrow types; a missing required field is still reported.
 */

import { isRecord } from '../middleware/validate-body.js';
import { ValidationError } from '../errors.js';
import type { Solution } from '../types/models.js';
import type { SolutionResponse, VersionResponse } from '../types/api.js';
import type { VersionEntry } from '../services/VersionManager.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };
const MAX_LIMIT = 100;

export function json(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), { status, headers: JSON_HEADERS });
}

export async function readBody(req: Request): Promise<Record<string, unknown>> {
  const body: unknown = await req.json();
  return isRecord(body) ? body : {};
}

export function optionalString(body: Record<string, unknown>, key: string): string | undefined {
  const value = body[key];
  return typeof value === 'string' ? value : undefined;
}

export function requiredString(body: Record<string, unknown>, key: string): string {
  const value = optionalString(body, key);
  if (value === undefined) {
    throw new ValidationError(`${key} is required`);
  }
  return value;
}

export function optionalNumber(body: Record<string, unknown>, key: string): number | undefined {
  const value = body[key];
  return typeof value === 'number' ? value : undefined;
}

export function optionalStringArray(body: Record<string, unknown>, key: string): string[] | undefined {
  const value = body[key];
  if (!Array.isArray(value)) return undefined;
  return value.filter((item): item is string => typeof item === 'string');
}

export function optionalEnum<T extends string>(
  body: Record<string, unknown>,
  key: string,
  values: readonly T[]
): T | undefined {
  const value = body[key];
  return values.find((candidate) => candidate === value);
}

/** The path segment following `marker`, e.g. the id in `/solutions/:id/...`. */
export function pathParam(req: Request, marker: string): string {
  const parts = new URL(req.url).pathname.split('/').filter(Boolean);
  const index = parts.indexOf(marker);
  const value = index >= 0 ? parts[index + 1] : undefined;
  if (value === undefined) {
    throw new ValidationError(`Missing path parameter after "${marker}"`);
  }
  return decodeURIComponent(value);
}

export function queryLimit(req: Request, fallback: number, name = 'limit'): number {
  const raw = new URL(req.url).searchParams.get(name);
  if (raw === null) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1 || value > MAX_LIMIT) {
    throw new ValidationError(`${name} must be an integer between 1 and ${MAX_LIMIT}`, { [name]: raw });
  }
  return value;
}

export function toSolutionResponse(solution: Solution, isFavorite: boolean): SolutionResponse {
  return {
    id: solution.id,
    name: solution.name,
    description: solution.description,
    category: solution.category,
    techStack: solution.techStack,
    htmlCode: solution.htmlCode,
    cssCode: solution.cssCode,
    jsCode: solution.jsCode,
    metrics: { ...solution.metrics },
    qualityTier: solution.qualityTier,
    userRating: solution.userRating,
    ratingCount: solution.ratingCount,
    favoriteCount: solution.favoriteCount,
    usageCount: solution.usageCount,
    isFavorite,
    author: solution.author,
    tags: [...solution.tags],
    createdAt: solution.createdAt.toISOString(),
    updatedAt: solution.updatedAt.toISOString(),
    version: solution.version,
    parentSolutionId: solution.parentSolutionId,
    childSolutionIds: [...solution.childSolutionIds],
  };
}

export function toVersionResponse(entry: VersionEntry): VersionResponse {
  return {
    version: entry.version,
    description: entry.description,
    createdAt: entry.createdAt.toISOString(),
    solution: toSolutionResponse(entry.solution, false),
  };
}
