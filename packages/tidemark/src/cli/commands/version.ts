/**
 * version Command
 * Print the current migration version
 */

import type { Migrator } from '@tidemark/core';

export async function versionCommand(migrator: Migrator): Promise<number> {
  const version = await migrator.version();
  console.log(String(version));
  return 0;
}
