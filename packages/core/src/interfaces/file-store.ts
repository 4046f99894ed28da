/**
 * Source of migration scripts.
 *
 * Discovery only needs to list a directory and read files; creating new
 * migrations additionally needs {@link WritableFileStore}.
 */
export interface FileStore {
  /** File names (not paths) directly inside `directory` */
  readDir(directory: string): Promise<string[]>;
  readFile(path: string): Promise<string>;
}

export interface WritableFileStore extends FileStore {
  writeFile(path: string, content: string): Promise<void>;
}

export function isWritableFileStore(store: FileStore): store is WritableFileStore {
  return 'writeFile' in store && typeof store.writeFile === 'function';
}
