/**
 * Migration Loader
 * Discovers migration script pairs in a directory and creates new ones
 */

import { MigrationFile, MigrationFilePair } from './migration-file';
import { MigrationFileSet } from './migration-files';
import { VERSION_PAD_WIDTH } from '../constants';
import { DiscoveryError, ValidationError, toError } from '../errors';
import { isWritableFileStore } from '../interfaces/file-store';

import type { FileStore } from '../interfaces/file-store';
import type { Direction } from '../types';

/**
 * Migration filename pattern
 * Format: <version>_<name>.<up|down>.<extension>
 * Example: 0001_create_users_table.up.sql
 */
export function filenamePattern(extension: string): RegExp {
  const escaped = extension.replaceAll(/[$()*+.?[\\\]^{|}]/g, '\\$&');
  return new RegExp(`^(\\d+)_(.+)\\.(up|down)\\.${escaped}$`);
}

/**
 * Zero-pad a version to {@link VERSION_PAD_WIDTH} digits, or to the next
 * multiple of it for longer numbers.
 */
export function formatVersion(version: number): string {
  const digits = String(version);
  const width = Math.ceil(digits.length / VERSION_PAD_WIDTH) * VERSION_PAD_WIDTH;
  return digits.padStart(width, '0');
}

export class MigrationLoader {
  private readonly store: FileStore;
  private readonly directory: string;
  private readonly extension: string;

  constructor(store: FileStore, directory: string, extension: string) {
    this.store = store;
    this.directory = directory;
    this.extension = extension;
  }

  /**
   * Parse every script carrying the backend's extension. Other files are
   * ignored.
   */
  async scanDirectory(): Promise<MigrationFile[]> {
    let names: string[];
    try {
      names = await this.store.readDir(this.directory);
    } catch (error) {
      throw new DiscoveryError(
        `Migration directory not readable: ${this.directory}`,
        undefined,
        toError(error),
      );
    }

    const suffix = `.${this.extension}`;
    return names
      .filter((name) => name.endsWith(suffix))
      .map((name) => this.parseFilename(name));
  }

  /**
   * Scan the directory and group the scripts into version-ordered pairs.
   */
  async discover(): Promise<MigrationFileSet> {
    const files = await this.scanDirectory();
    const halves = new Map<number, Partial<Record<Direction, MigrationFile>>>();

    for (const file of files) {
      const entry = halves.get(file.version) ?? {};
      const existing = entry[file.direction];
      if (existing) {
        throw new DiscoveryError(
          `Duplicate ${file.direction} migration for version ${file.version}: ` +
            `${existing.filename} and ${file.filename}`,
          file.filename,
        );
      }
      entry[file.direction] = file;
      halves.set(file.version, entry);
    }

    const pairs: MigrationFilePair[] = [];
    for (const [version, { up, down }] of halves) {
      if (!up || !down) {
        const present = up ?? down;
        throw new DiscoveryError(
          `Migration version ${version} is missing its ${up ? 'down' : 'up'} file`,
          present?.filename,
        );
      }
      if (up.name !== down.name) {
        throw new DiscoveryError(
          `Migration version ${version} has mismatched names: ${up.filename} and ${down.filename}`,
          up.filename,
        );
      }
      pairs.push(new MigrationFilePair(up, down));
    }

    return new MigrationFileSet(pairs);
  }

  /**
   * Write an empty up/down pair numbered after the highest existing version.
   */
  async create(name: string, existing?: MigrationFileSet): Promise<MigrationFilePair> {
    const store = this.store;
    if (!isWritableFileStore(store)) {
      throw new ValidationError('The configured file store cannot create migrations', 'store');
    }

    const sanitized = name.trim().replaceAll(' ', '_');
    if (!sanitized) {
      throw new ValidationError('Migration name is required', 'name');
    }
    if (/[/\\]/.test(sanitized)) {
      throw new ValidationError(`Invalid migration name: ${name}`, 'name');
    }

    const files = existing ?? (await this.discover());
    const version = files.lastVersion + 1;

    const make = (direction: Direction): MigrationFile =>
      new MigrationFile({
        version,
        name: sanitized,
        direction,
        directory: this.directory,
        filename: MigrationLoader.generateFilename(version, sanitized, direction, this.extension),
        store,
        content: '',
      });

    const pair = new MigrationFilePair(make('up'), make('down'));
    await store.writeFile(pair.up.path, '');
    await store.writeFile(pair.down.path, '');
    return pair;
  }

  static generateFilename(
    version: number,
    name: string,
    direction: Direction,
    extension: string,
  ): string {
    return `${formatVersion(version)}_${name}.${direction}.${extension}`;
  }

  private parseFilename(filename: string): MigrationFile {
    const match = filenamePattern(this.extension).exec(filename);
    if (!match) {
      throw new DiscoveryError(
        `Invalid migration filename ${filename}: expected <version>_<name>.<up|down>.${this.extension}`,
        filename,
      );
    }

    const [, versionText = '', name = '', direction] = match;
    const version = Number.parseInt(versionText, 10);
    if (!Number.isSafeInteger(version) || version < 1) {
      throw new DiscoveryError(`Invalid migration version in ${filename}`, filename);
    }
    if (direction !== 'up' && direction !== 'down') {
      throw new DiscoveryError(`Invalid migration direction in ${filename}`, filename);
    }

    return new MigrationFile({
      version,
      name,
      direction,
      directory: this.directory,
      filename,
      store: this.store,
    });
  }
}

/**
 * Convenience wrapper around {@link MigrationLoader.discover}.
 */
export function discover(
  store: FileStore,
  directory: string,
  extension: string,
): Promise<MigrationFileSet> {
  return new MigrationLoader(store, directory, extension).discover();
}
