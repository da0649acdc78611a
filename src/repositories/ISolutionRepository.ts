/**
 * Solution persistence interface.
 * The service layer keeps the corpus in memory; implementations only load it
 * in bulk on start and write through individual changes.
 */

import type { Solution } from '../types/models.js';
import type { RejectedRecord } from '../types/database.js';

export interface LoadResult {
  solutions: Solution[];
  /** Records that failed validation. Loading continues past them. */
  rejected: RejectedRecord[];
}

export interface ISolutionRepository {
  loadAll(): Promise<LoadResult>;

  /** Insert or replace the record with the solution's id. */
  save(solution: Solution): Promise<void>;

  delete(id: string): Promise<void>;

  /** Favorite solution ids, in the order they were added. */
  loadFavorites(): Promise<string[]>;

  saveFavorites(ids: readonly string[]): Promise<void>;
}
