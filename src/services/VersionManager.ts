/**
 * Solution version lineages.
 * Each lineage is keyed by the id of the solution it started from and holds
 * an append-only list of cloned snapshots with monotonically increasing
 * patch versions.
 */

import type { Solution } from '../types/models.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import { cloneSolution, snapshotSolution } from '../domain/solution.js';
import { INITIAL_VERSION, incrementPatch } from '../domain/versioning.js';

export interface VersionEntry {
  readonly version: string;
  readonly description: string;
  readonly createdAt: Date;
  readonly solution: Solution;
}

export class VersionManager {
  private readonly lineages = new Map<string, VersionEntry[]>();

  constructor(private readonly logProvider: ILogProvider) {}

  /**
   * Snapshot `solution` as the next version of its lineage.
   * The snapshot is a clone under a new id whose parent is `solution`. It
   * lives only in the lineage, so `solution` is left untouched.
   */
  createVersion(solution: Solution, description = ''): string {
    const history = this.lineages.get(solution.id) ?? [];
    const previous = history.at(-1);
    const version = previous ? incrementPatch(previous.version) : INITIAL_VERSION;

    const clone = cloneSolution(solution);
    clone.version = version;
    clone.parentSolutionId = solution.id;

    history.push({
      version,
      description,
      createdAt: clone.createdAt,
      solution: clone,
    });
    this.lineages.set(solution.id, history);

    this.logProvider.info('Solution version created', {
      solutionId: solution.id,
      version,
      snapshotId: clone.id,
    });

    return version;
  }

  getVersionHistory(solutionId: string): VersionEntry[] {
    const history = this.lineages.get(solutionId) ?? [];
    return history.map((entry) => ({
      ...entry,
      createdAt: new Date(entry.createdAt),
      solution: snapshotSolution(entry.solution),
    }));
  }

  /** Fresh clone of the matching historical entry, or null when the version is unknown. */
  rollbackToVersion(solutionId: string, version: string): Solution | null {
    const entry = this.lineages
      .get(solutionId)
      ?.find((candidate) => candidate.version === version);

    if (!entry) {
      this.logProvider.debug('Rollback target not found', { solutionId, version });
      return null;
    }

    const restored = cloneSolution(entry.solution);
    restored.parentSolutionId = solutionId;
    return restored;
  }
}
