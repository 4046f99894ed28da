/**
 * Migration File Set
 * Ordered pairs with the range queries the migrator plans runs from
 */

import { DiscoveryError, VersionMismatchError } from '../errors';

import type { MigrationFile, MigrationFilePair } from './migration-file';

export class MigrationFileSet implements Iterable<MigrationFilePair> {
  readonly pairs: readonly MigrationFilePair[];

  constructor(pairs: readonly MigrationFilePair[] = []) {
    const sorted = [...pairs].sort((a, b) => a.version - b.version);
    for (let i = 1; i < sorted.length; i++) {
      const previous = sorted[i - 1];
      const current = sorted[i];
      if (previous && current && previous.version === current.version) {
        throw new DiscoveryError(`Duplicate migration version ${current.version}`);
      }
    }
    this.pairs = sorted;
  }

  get size(): number {
    return this.pairs.length;
  }

  /** Highest discovered version, 0 for an empty set */
  get lastVersion(): number {
    return this.pairs.at(-1)?.version ?? 0;
  }

  has(version: number): boolean {
    return this.pairs.some((pair) => pair.version === version);
  }

  /**
   * Up files of every version above `version`, ascending.
   */
  toLastFrom(version: number): MigrationFile[] {
    return this.pairs.filter((pair) => pair.version > version).map((pair) => pair.up);
  }

  /**
   * Down files of every version at or below `version`, descending.
   */
  toFirstFrom(version: number): MigrationFile[] {
    return this.pairs
      .filter((pair) => pair.version <= version)
      .reverse()
      .map((pair) => pair.down);
  }

  /**
   * Walk `relativeN` steps from `version`.
   *
   * - `+2`: up files of the next two versions
   * - `-1`: down file of the current version
   * - `-2`: down files of the current and the previous version
   *
   * Counts beyond what is available are truncated.
   */
  from(version: number, relativeN: number): MigrationFile[] {
    if (version !== 0 && !this.has(version)) {
      throw new VersionMismatchError(version);
    }

    if (relativeN > 0) {
      return this.toLastFrom(version).slice(0, relativeN);
    }
    if (relativeN < 0) {
      return this.toFirstFrom(version).slice(0, -relativeN);
    }
    return [];
  }

  [Symbol.iterator](): Iterator<MigrationFilePair> {
    return this.pairs[Symbol.iterator]();
  }
}
