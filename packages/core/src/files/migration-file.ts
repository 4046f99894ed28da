/**
 * Migration File Model
 */

import { join } from 'node:path';

import { ContentReadError, toError } from '../errors';

import type { FileStore } from '../interfaces/file-store';
import type { Direction } from '../types';

export interface MigrationFileInit {
  version: number;
  name: string;
  direction: Direction;
  /** Directory holding the file */
  directory: string;
  filename: string;
  store: FileStore;
  /** Known content, e.g. for a freshly created empty file */
  content?: string;
}

/**
 * One half (up or down) of a versioned change. The script text is read
 * through the file store the first time it is needed.
 */
export class MigrationFile {
  readonly version: number;
  readonly name: string;
  readonly direction: Direction;
  readonly directory: string;
  readonly filename: string;
  private readonly store: FileStore;
  private cachedContent?: string;

  constructor(init: MigrationFileInit) {
    this.version = init.version;
    this.name = init.name;
    this.direction = init.direction;
    this.directory = init.directory;
    this.filename = init.filename;
    this.store = init.store;
    this.cachedContent = init.content;
  }

  get path(): string {
    return join(this.directory, this.filename);
  }

  /**
   * Load the script text. Read failures surface as {@link ContentReadError}.
   */
  async readContent(): Promise<string> {
    if (this.cachedContent !== undefined) {
      return this.cachedContent;
    }

    try {
      this.cachedContent = await this.store.readFile(this.path);
    } catch (error) {
      throw new ContentReadError(
        `Failed to read migration ${this.filename}: ${toError(error).message}`,
        this.path,
        toError(error),
      );
    }
    return this.cachedContent;
  }

  toString(): string {
    return this.filename;
  }
}

/**
 * The up and down scripts of one version.
 */
export class MigrationFilePair {
  constructor(
    readonly up: MigrationFile,
    readonly down: MigrationFile,
  ) {}

  get version(): number {
    return this.up.version;
  }

  get name(): string {
    return this.up.name;
  }
}
