/**
 * Conversion between persisted solution records and domain solutions.
 * Incoming records are validated with zod; missing optional fields fall back
 * to the same defaults `createSolution` uses.
 */

import { z } from 'zod';
import type { Solution } from '../types/models.js';
import type { SolutionRecord } from '../types/database.js';
import { QUALITY_TIERS, SOLUTION_CATEGORIES, TECH_STACKS } from '../types/models.js';
import { createMetrics } from '../domain/metrics.js';
import { ok, err, type Result } from '../types/common.js';

const isoTimestamp = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), 'must be an ISO-8601 timestamp');

const dimension = z.number().min(0).max(100).default(0);

const solutionRecordSchema = z.object({
  solution_id: z.string().min(1),
  name: z.string().default('Untitled solution'),
  description: z.string().default(''),
  category: z.enum(SOLUTION_CATEGORIES).default('effect'),
  html_code: z.string().default(''),
  css_code: z.string().default(''),
  js_code: z.string().default(''),
  tech_stack: z.enum(TECH_STACKS).default('css_animation'),
  metrics: z
    .object({
      quality_score: dimension,
      performance_score: dimension,
      creativity_score: dimension,
      usability_score: dimension,
      compatibility_score: dimension,
    })
    .default({}),
  quality_level: z.enum(QUALITY_TIERS).default('average'),
  user_rating: z.number().min(0).max(5).default(0),
  rating_count: z.number().int().min(0).default(0),
  favorite_count: z.number().int().min(0).default(0),
  usage_count: z.number().int().min(0).default(0),
  created_at: isoTimestamp.optional(),
  updated_at: isoTimestamp.optional(),
  author: z.string().default('AI generated'),
  tags: z.array(z.string()).default([]),
  version: z.string().default('1.0.0'),
  parent_solution_id: z.string().nullable().default(null),
  child_solutions: z.array(z.string()).default([]),
});

export function parseSolutionRecord(value: unknown): Result<Solution, string> {
  const parsed = solutionRecordSchema.safeParse(value);
  if (!parsed.success) {
    return err(
      parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ')
    );
  }

  const record = parsed.data;
  const createdAt = record.created_at ? new Date(record.created_at) : new Date();
  const updatedAt = record.updated_at ? new Date(record.updated_at) : createdAt;

  return ok({
    id: record.solution_id,
    name: record.name,
    description: record.description,
    category: record.category,
    htmlCode: record.html_code,
    cssCode: record.css_code,
    jsCode: record.js_code,
    techStack: record.tech_stack,
    // overall_score is never trusted from storage; it is recomputed
    metrics: createMetrics({
      qualityScore: record.metrics.quality_score,
      performanceScore: record.metrics.performance_score,
      creativityScore: record.metrics.creativity_score,
      usabilityScore: record.metrics.usability_score,
      compatibilityScore: record.metrics.compatibility_score,
    }),
    qualityTier: record.quality_level,
    userRating: record.user_rating,
    ratingCount: record.rating_count,
    favoriteCount: record.favorite_count,
    usageCount: record.usage_count,
    author: record.author,
    tags: record.tags,
    createdAt,
    updatedAt,
    version: record.version,
    parentSolutionId: record.parent_solution_id,
    childSolutionIds: record.child_solutions,
  });
}

export function toSolutionRecord(solution: Solution): SolutionRecord {
  return {
    solution_id: solution.id,
    name: solution.name,
    description: solution.description,
    category: solution.category,
    html_code: solution.htmlCode,
    css_code: solution.cssCode,
    js_code: solution.jsCode,
    tech_stack: solution.techStack,
    metrics: {
      quality_score: solution.metrics.qualityScore,
      performance_score: solution.metrics.performanceScore,
      creativity_score: solution.metrics.creativityScore,
      usability_score: solution.metrics.usabilityScore,
      compatibility_score: solution.metrics.compatibilityScore,
      overall_score: solution.metrics.overallScore,
    },
    quality_level: solution.qualityTier,
    user_rating: solution.userRating,
    rating_count: solution.ratingCount,
    favorite_count: solution.favoriteCount,
    usage_count: solution.usageCount,
    created_at: solution.createdAt.toISOString(),
    updated_at: solution.updatedAt.toISOString(),
    author: solution.author,
    tags: [...solution.tags],
    version: solution.version,
    parent_solution_id: solution.parentSolutionId,
    child_solutions: [...solution.childSolutionIds],
  };
}
