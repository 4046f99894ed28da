/**
 * up / down / reset / redo / migrate / goto Commands
 * Stream a run to the console and report its outcome as an exit code
 */

import { newPipe } from '@tidemark/core';

import { error, parseInteger, printTimer, writePipe } from '../utils';

import type { Migrator, Pipe } from '@tidemark/core';

export type RunOperation = (migrator: Migrator, pipe: Pipe) => Promise<void>;

export async function runCommand(migrator: Migrator, operation: RunOperation): Promise<number> {
  const startedAt = Date.now();
  const pipe = newPipe();

  const [ok] = await Promise.all([writePipe(pipe), operation(migrator, pipe)]);

  printTimer(startedAt);
  return ok ? 0 : 1;
}

export function upCommand(migrator: Migrator): Promise<number> {
  return runCommand(migrator, (m, pipe) => m.up(pipe));
}

export function downCommand(migrator: Migrator): Promise<number> {
  return runCommand(migrator, (m, pipe) => m.down(pipe));
}

export function resetCommand(migrator: Migrator): Promise<number> {
  return runCommand(migrator, (m, pipe) => m.reset(pipe));
}

export function redoCommand(migrator: Migrator): Promise<number> {
  return runCommand(migrator, (m, pipe) => m.redo(pipe));
}

export async function migrateCommand(migrator: Migrator, steps?: string): Promise<number> {
  const relativeN = parseInteger(steps);
  if (relativeN === undefined) {
    error('Unable to parse param <n>.');
    return 1;
  }
  return runCommand(migrator, (m, pipe) => m.migrate(pipe, relativeN));
}

export async function gotoCommand(migrator: Migrator, target?: string): Promise<number> {
  const version = parseInteger(target);
  if (version === undefined || version < 0) {
    error('Unable to parse param <v>.');
    return 1;
  }
  return runCommand(migrator, (m, pipe) => m.goto(pipe, version));
}
