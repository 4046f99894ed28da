/**
 * File Stores
 * Where migration scripts are listed, read and created
 */

import { readdir, readFile, writeFile } from 'node:fs/promises';
import { basename, dirname, normalize, sep } from 'node:path';

import type { WritableFileStore } from '../interfaces/file-store';

/**
 * Reads migrations from the local file system.
 */
export class FsFileStore implements WritableFileStore {
  async readDir(directory: string): Promise<string[]> {
    const entries = await readdir(directory, { withFileTypes: true });
    return entries.filter((entry) => entry.isFile()).map((entry) => entry.name);
  }

  async readFile(path: string): Promise<string> {
    return readFile(path, 'utf8');
  }

  /**
   * Create `path`. Refuses to overwrite an existing file.
   */
  async writeFile(path: string, content: string): Promise<void> {
    await writeFile(path, content, { encoding: 'utf8', flag: 'wx' });
  }
}

function normalizeDirectory(directory: string): string {
  const normalized = normalize(directory);
  return normalized.length > 1 && normalized.endsWith(sep) ? normalized.slice(0, -1) : normalized;
}

/**
 * Keeps migrations in memory, keyed by full path. Useful for scripts bundled
 * into the application and for tests.
 *
 * @example
 * ```typescript
 * const store = new AssetFileStore({
 *   'migrations/0001_init.up.sql': 'CREATE TABLE users (id int);',
 *   'migrations/0001_init.down.sql': 'DROP TABLE users;',
 * });
 * ```
 */
export class AssetFileStore implements WritableFileStore {
  private readonly files = new Map<string, string>();
  private readonly directories = new Set<string>();

  constructor(files: Record<string, string> = {}) {
    for (const [path, content] of Object.entries(files)) {
      this.put(path, content);
    }
  }

  async readDir(directory: string): Promise<string[]> {
    const target = normalizeDirectory(directory);
    if (!this.directories.has(target)) {
      throw new Error(`ENOENT: no such directory '${directory}'`);
    }

    const names: string[] = [];
    for (const path of this.files.keys()) {
      if (dirname(path) === target) {
        names.push(basename(path));
      }
    }
    return names.sort();
  }

  async readFile(path: string): Promise<string> {
    const content = this.files.get(normalize(path));
    if (content === undefined) {
      throw new Error(`ENOENT: no such file '${path}'`);
    }
    return content;
  }

  async writeFile(path: string, content: string): Promise<void> {
    if (this.files.has(normalize(path))) {
      throw new Error(`EEXIST: file already exists '${path}'`);
    }
    this.put(path, content);
  }

  /** Register a directory that holds no files yet */
  addDirectory(directory: string): this {
    this.directories.add(normalizeDirectory(directory));
    return this;
  }

  private put(path: string, content: string): void {
    const key = normalize(path);
    this.files.set(key, content);
    this.directories.add(dirname(key));
  }
}
