export { MigrationFile, MigrationFilePair, type MigrationFileInit } from './migration-file';
export { MigrationFileSet } from './migration-files';
export { MigrationLoader, discover, filenamePattern, formatVersion } from './migration-loader';
export { FsFileStore, AssetFileStore } from './file-store';
export { lineColumnFromOffset, linesBeforeAndAfter, type SourcePosition } from './content';
