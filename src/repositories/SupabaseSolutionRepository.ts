/**
 * Supabase implementation of ISolutionRepository.
 * Solutions live in `solutions` (one row per record, metrics as jsonb);
 * favorites in `solution_favorites` ordered by `position`.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { Solution } from '../types/models.js';
import type { FavoriteRow, RejectedRecord } from '../types/database.js';
import type { ISolutionRepository, LoadResult } from './ISolutionRepository.js';
import { parseSolutionRecord, toSolutionRecord } from './solution-record.js';

export class SupabaseSolutionRepository implements ISolutionRepository {
  constructor(private readonly db: SupabaseClient) {}

  async loadAll(): Promise<LoadResult> {
    const { data, error } = await this.db
      .from('solutions')
      .select('*')
      .order('created_at', { ascending: true });

    if (error) throw new Error(`Failed to load solutions: ${error.message}`);

    const solutions: Solution[] = [];
    const rejected: RejectedRecord[] = [];

    (data ?? []).forEach((row: unknown, index: number) => {
      const parsed = parseSolutionRecord(row);
      if (parsed.ok) {
        solutions.push(parsed.value);
      } else {
        rejected.push({ source: rowSource(row, index), reason: parsed.error });
      }
    });

    return { solutions, rejected };
  }

  async save(solution: Solution): Promise<void> {
    const { error } = await this.db
      .from('solutions')
      .upsert(toSolutionRecord(solution), { onConflict: 'solution_id' });

    if (error) throw new Error(`Failed to save solution: ${error.message}`);
  }

  async delete(id: string): Promise<void> {
    const { error } = await this.db
      .from('solutions')
      .delete()
      .eq('solution_id', id);

    if (error) throw new Error(`Failed to delete solution: ${error.message}`);
  }

  async loadFavorites(): Promise<string[]> {
    const { data, error } = await this.db
      .from('solution_favorites')
      .select('solution_id, position')
      .order('position', { ascending: true });

    if (error) throw new Error(`Failed to load favorites: ${error.message}`);

    return (data ?? []).flatMap((row: { solution_id: unknown }) =>
      typeof row.solution_id === 'string' ? [row.solution_id] : []
    );
  }

  async saveFavorites(ids: readonly string[]): Promise<void> {
    // Replace the whole list; positions are rewritten to match the new order
    const { error: clearError } = await this.db
      .from('solution_favorites')
      .delete()
      .gte('position', 0);

    if (clearError) throw new Error(`Failed to clear favorites: ${clearError.message}`);
    if (ids.length === 0) return;

    const rows: FavoriteRow[] = ids.map((solution_id, position) => ({ solution_id, position }));
    const { error } = await this.db.from('solution_favorites').insert(rows);

    if (error) throw new Error(`Failed to save favorites: ${error.message}`);
  }
}

function rowSource(row: unknown, index: number): string {
  if (typeof row === 'object' && row !== null && 'solution_id' in row && typeof row.solution_id === 'string') {
    return row.solution_id;
  }
  return `row ${index}`;
}
