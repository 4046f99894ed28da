/**
 * create Command
 * Write a new, empty up/down migration pair
 */

import { existsSync } from 'node:fs';
import { mkdir } from 'node:fs/promises';

import { error, info, success } from '../utils';

import type { Migrator } from '@tidemark/core';

export async function createCommand(migrator: Migrator, name?: string): Promise<number> {
  if (!name) {
    error('Migration name is required');
    console.log('Usage: tidemark create <name>');
    return 1;
  }

  if (!existsSync(migrator.path)) {
    await mkdir(migrator.path, { recursive: true });
    info(`Created migrations directory: ${migrator.path}`);
  }

  const pair = await migrator.create(name);

  success(`Version ${pair.version} migration files created in ${migrator.path}:`);
  console.log(`  ${pair.up.filename}`);
  console.log(`  ${pair.down.filename}`);
  return 0;
}
