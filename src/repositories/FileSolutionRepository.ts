/**
 * File-backed implementation of ISolutionRepository.
 * One `<id>.json` record per solution plus a `favorites.json` id list,
 * all inside a single directory.
 */

import { mkdir, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Solution } from '../types/models.js';
import type { RejectedRecord } from '../types/database.js';
import type { ISolutionRepository, LoadResult } from './ISolutionRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import { parseSolutionRecord, toSolutionRecord } from './solution-record.js';
import { ValidationError } from '../errors.js';

const FAVORITES_FILE = 'favorites.json';
const SAFE_ID = /^[\w-]+$/;

export class FileSolutionRepository implements ISolutionRepository {
  constructor(
    private readonly directory: string,
    private readonly logProvider: ILogProvider
  ) {}

  async loadAll(): Promise<LoadResult> {
    await mkdir(this.directory, { recursive: true });

    const files = (await readdir(this.directory))
      .filter((file) => file.endsWith('.json') && file !== FAVORITES_FILE)
      .sort();

    const solutions: Solution[] = [];
    const rejected: RejectedRecord[] = [];

    for (const file of files) {
      let raw: string;
      try {
        raw = await readFile(join(this.directory, file), 'utf8');
      } catch (e) {
        rejected.push({ source: file, reason: `unreadable: ${errorMessage(e)}` });
        continue;
      }

      let json: unknown;
      try {
        json = JSON.parse(raw);
      } catch (e) {
        rejected.push({ source: file, reason: `invalid JSON: ${errorMessage(e)}` });
        continue;
      }

      const parsed = parseSolutionRecord(json);
      if (parsed.ok) {
        solutions.push(parsed.value);
      } else {
        rejected.push({ source: file, reason: parsed.error });
      }
    }

    return { solutions, rejected };
  }

  async save(solution: Solution): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    await writeFile(
      this.pathFor(solution.id),
      JSON.stringify(toSolutionRecord(solution), null, 2),
      'utf8'
    );
  }

  async delete(id: string): Promise<void> {
    await rm(this.pathFor(id), { force: true });
  }

  /** A missing, unreadable or malformed favorites file loads as no favorites. */
  async loadFavorites(): Promise<string[]> {
    let json: unknown;
    try {
      json = JSON.parse(await readFile(join(this.directory, FAVORITES_FILE), 'utf8'));
    } catch (e) {
      if (!isMissingFile(e)) {
        this.logProvider.warn('Ignoring unreadable favorites file', { error: errorMessage(e) });
      }
      return [];
    }

    if (!Array.isArray(json)) {
      this.logProvider.warn('Ignoring favorites file without an id array', { file: FAVORITES_FILE });
      return [];
    }
    return json.filter((id): id is string => typeof id === 'string');
  }

  async saveFavorites(ids: readonly string[]): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    await writeFile(join(this.directory, FAVORITES_FILE), JSON.stringify(ids, null, 2), 'utf8');
  }

  private pathFor(id: string): string {
    if (!SAFE_ID.test(id)) {
      throw new ValidationError('Solution id contains unsupported characters', { id });
    }
    return join(this.directory, `${id}.json`);
  }
}

function isMissingFile(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
