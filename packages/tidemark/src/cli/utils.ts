/**
 * CLI Utilities
 * Helper functions for CLI commands
 */

import { CloseError, INTERRUPT_NOTICE, Migrator, formatDuration } from '@tidemark/core';
import chalk from 'chalk';

import type { ResolvedConfig } from './config';
import type { PipeEvent } from '@tidemark/core';

/**
 * Create a migrator from resolved configuration
 */
export function createMigrator(config: ResolvedConfig): Migrator {
  return new Migrator({
    url: config.url,
    path: config.path,
    id: config.id,
    interrupts: config.interrupts,
  });
}

/**
 * One progress line: text as-is, errors in red, file markers as
 * `> file` (up) or `< file` (down).
 */
export function formatEvent(event: PipeEvent): string {
  if (typeof event === 'string') {
    return event;
  }
  if (event instanceof Error) {
    return `${chalk.red(`✗ ${event.message}`)}\n`;
  }
  const marker = event.direction === 'up' ? '>' : '<';
  return `${chalk.blue(marker)} ${event.filename}`;
}

/**
 * Print every event until the pipe closes. Resolves `false` when an error
 * or an interrupt notice went by; a failed close is printed but does not
 * fail the run.
 */
export async function writePipe(pipe: AsyncIterable<PipeEvent>): Promise<boolean> {
  let ok = true;
  for await (const event of pipe) {
    if ((event instanceof Error && !(event instanceof CloseError)) || event === INTERRUPT_NOTICE) {
      ok = false;
    }
    console.log(formatEvent(event));
  }
  return ok;
}

/**
 * Print the time elapsed since `startedAt`
 */
export function printTimer(startedAt: number, now: number = Date.now()): void {
  console.log(`\n${formatDuration(now - startedAt)}`);
}

/**
 * Parse a whole number argument, with an optional sign
 */
export function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || !/^[+-]?\d+$/.test(value)) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}

/**
 * Print success message
 */
export function success(message: string): void {
  console.log(`✓ ${message}`);
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.error(`✗ ${message}`);
}

/**
 * Print info message
 */
export function info(message: string): void {
  console.log(`ℹ ${message}`);
}
