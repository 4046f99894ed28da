/**
 * Constants
 *
 * Shared defaults for the migrator and the bundled drivers.
 */

/** Default migration identity */
export const DEFAULT_MIGRATION_ID = '';

/** Default ledger table (SQL drivers) */
export const DEFAULT_TABLE_NAME = 'schema_migrations';

/** Minimum width of the zero-padded version in created filenames */
export const VERSION_PAD_WIDTH = 4;

/** Notice forwarded on the first graceful interrupt */
export const INTERRUPT_NOTICE = ' Aborting after this migration ... Hit again to force quit.';

/** Exit code used when a second interrupt forces the process to quit */
export const FORCE_QUIT_EXIT_CODE = 5;

export const CONNECTION_DEFAULTS = {
  /** Default connection timeout (10 seconds) */
  CONNECTION_TIMEOUT: 10_000,
} as const;
