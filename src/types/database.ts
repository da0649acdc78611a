/**
 * Persisted record types: the on-disk and table shape of a solution.
 * Kept separate so storage can evolve independently of domain models.
 * Field names use snake_case to match the stored JSON files and table columns.
 */

export interface SolutionMetricsRecord {
  quality_score: number;
  performance_score: number;
  creativity_score: number;
  usability_score: number;
  compatibility_score: number;
  overall_score: number;
}

export interface SolutionRecord {
  solution_id: string;
  name: string;
  description: string;
  category: string;

  html_code: string;
  css_code: string;
  js_code: string;
  tech_stack: string;

  metrics: SolutionMetricsRecord;
  quality_level: string;

  user_rating: number;
  rating_count: number;
  favorite_count: number;
  usage_count: number;

  created_at: string; // ISO-8601
  updated_at: string; // ISO-8601
  author: string;
  tags: string[];

  version: string;
  parent_solution_id: string | null;
  child_solutions: string[];
}

export interface FavoriteRow {
  solution_id: string;
  position: number;
}

/** A record that could not be turned into a solution during a bulk load. */
export interface RejectedRecord {
  /** File name, row id, or list index identifying the record. */
  source: string;
  reason: string;
}
