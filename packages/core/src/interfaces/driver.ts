import type { MigrationFile } from '../files/migration-file';
import type { Pipe } from '../pipe/pipe';

/**
 * Contract every storage backend implements.
 *
 * Drivers own the version ledger. After `migrate` reports success,
 * `version` must reflect that step; after a failure it must still report
 * the pre-step value.
 */
export interface Driver {
  /**
   * Open the connection described by `url`, or adopt `instance` when one is
   * given, and make sure the version ledger exists.
   */
  initialize(url: string, instance?: unknown): Promise<void>;

  /**
   * Release backend resources. A connection supplied as `instance` is left
   * open.
   */
  close(): Promise<void>;

  /** Script suffix this backend reads, without the dot */
  filenameExtension(): string;

  /** Highest applied version for `id`, 0 when none */
  version(id: string): Promise<number>;

  /**
   * Apply one script. Sends `file` on `pipe` first, then any error, and
   * closes `pipe` when done.
   */
  migrate(id: string, file: MigrationFile, pipe: Pipe): Promise<void>;
}

export interface DriverFactory {
  create(): Driver;
  /** Whether an externally supplied connection belongs to this backend */
  accepts?(instance: unknown): boolean;
}
