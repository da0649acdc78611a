/**
 * Domain models: core entities as the engine understands them.
 * Decoupled from both API shapes and persisted record shapes.
 */

// ── Enumerations ──

export const TECH_STACKS = [
  'css_animation',
  'javascript',
  'gsap',
  'three_js',
  'svg_animation',
] as const;

/** Implementation technology of a solution's behavior code. */
export type TechStack = (typeof TECH_STACKS)[number];

export const SOLUTION_CATEGORIES = [
  'entrance',
  'exit',
  'transition',
  'interaction',
  'effect',
  'composite',
] as const;

export type SolutionCategory = (typeof SOLUTION_CATEGORIES)[number];

export const QUALITY_TIERS = ['excellent', 'good', 'average', 'poor'] as const;

export type QualityTier = (typeof QUALITY_TIERS)[number];

// ── Solution ──

export interface DimensionScores {
  qualityScore: number;
  performanceScore: number;
  creativityScore: number;
  usabilityScore: number;
  compatibilityScore: number;
}

/**
 * Five dimension scores in [0, 100] plus the weighted overall score.
 * Only built by `createMetrics`, which keeps `overallScore` in sync.
 */
export interface SolutionMetrics extends Readonly<DimensionScores> {
  readonly overallScore: number;
}

export interface Solution {
  readonly id: string;
  name: string;
  description: string;
  category: SolutionCategory;

  htmlCode: string;
  cssCode: string;
  jsCode: string;
  techStack: TechStack;

  metrics: SolutionMetrics;
  qualityTier: QualityTier;

  /** Running mean of user ratings, 0-5. */
  userRating: number;
  ratingCount: number;
  favoriteCount: number;
  usageCount: number;

  author: string;
  tags: string[];
  createdAt: Date;
  updatedAt: Date;

  version: string;
  parentSolutionId: string | null;
  childSolutionIds: string[];
}

/** The code-bearing slice of a solution that heuristics inspect. */
export type SolutionCode = Pick<Solution, 'htmlCode' | 'cssCode' | 'jsCode' | 'techStack'>;

// ── Behavior ──

export type BehaviorAction = 'view' | 'apply' | 'favorite' | 'rate';

export interface BehaviorEvent {
  readonly action: BehaviorAction;
  readonly solutionId: string;
  readonly category: SolutionCategory;
  readonly techStack: TechStack;
  readonly rating: number | null;
  readonly timestamp: Date;
}

export interface PreferenceVector {
  categories: Record<SolutionCategory, number>;
  techStacks: Record<TechStack, number>;
  /** Minimum overall score (as a fraction of 100) the user tends to accept. */
  qualityThreshold: number;
  complexityAppetite: number;
  noveltyAppetite: number;
}

// ── Recommendation ──

export interface RecommendationContext {
  targetCategory?: SolutionCategory;
  preferredTech?: TechStack;
  keywords?: string[];
}

export interface RecommendationResult {
  solutionId: string;
  totalScore: number;
  qualityScore: number;
  preferenceScore: number;
  popularityScore: number;
  noveltyScore: number;
  similarityScore: number;
  explanation: string;
}

export interface SimilarSolution {
  solution: Solution;
  similarity: number;
}

// ── Search ──

export interface SearchFilters {
  category?: SolutionCategory;
  techStack?: TechStack;
  /** Minimum overall score, 0-100. */
  minQuality?: number;
  /** Minimum user rating, 0-5. */
  minRating?: number;
}

export interface SolutionStatistics {
  totalSolutions: number;
  totalFavorites: number;
  totalUsage: number;
  qualityDistribution: Record<QualityTier, number>;
  categoryDistribution: Record<SolutionCategory, number>;
  techStackDistribution: Record<TechStack, number>;
  averageQuality: number;
  averageRating: number;
  topSolution: Solution | null;
}
