/**
 * API types: shapes for request/response payloads.
 * Decoupled from domain models so the API can evolve independently.
 */

import type {
  BehaviorAction,
  QualityTier,
  SolutionCategory,
  TechStack,
} from './models.js';

// ── Requests ──

export interface CreateSolutionRequest {
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
}

export type UpdateSolutionRequest = Omit<CreateSolutionRequest, 'id' | 'author'>;

export interface SearchRequest {
  query: string;
  category?: SolutionCategory;
  techStack?: TechStack;
  minQuality?: number;
  minRating?: number;
}

export interface InteractionRequest {
  solutionId: string;
  action: BehaviorAction;
  rating?: number;
}

// ── Responses ──

export interface MetricsResponse {
  qualityScore: number;
  performanceScore: number;
  creativityScore: number;
  usabilityScore: number;
  compatibilityScore: number;
  overallScore: number;
}

export interface SolutionResponse {
  id: string;
  name: string;
  description: string;
  category: SolutionCategory;
  techStack: TechStack;
  htmlCode: string;
  cssCode: string;
  jsCode: string;
  metrics: MetricsResponse;
  qualityTier: QualityTier;
  userRating: number;
  ratingCount: number;
  favoriteCount: number;
  usageCount: number;
  isFavorite: boolean;
  author: string;
  tags: string[];
  createdAt: string;
  updatedAt: string;
  version: string;
  parentSolutionId: string | null;
  childSolutionIds: string[];
}

export interface VersionResponse {
  version: string;
  description: string;
  createdAt: string;
  solution: SolutionResponse;
}

export interface ListResponse<T> {
  data: T[];
}

export interface ApiErrorResponse {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}
