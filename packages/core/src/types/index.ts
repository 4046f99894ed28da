export interface Logger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

export type Direction = 'up' | 'down';

/**
 * How a run reacts to SIGINT.
 *
 * - `graceful`: the running step finishes, the run stops before the next one.
 *   A second interrupt forces the process to quit.
 * - `non-graceful`: no handler is installed, the process default applies.
 */
export type InterruptMode = 'graceful' | 'non-graceful';

/**
 * Outcome of a blocking run.
 */
export interface RunResult {
  errors: Error[];
  /** No error was reported and the run was not interrupted */
  ok: boolean;
  /** A graceful interrupt stopped the run early */
  aborted: boolean;
}
