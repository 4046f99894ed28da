/**
 * tidemark - all drivers in one package
 *
 * Importing this package registers the PostgreSQL, MySQL and Redis drivers,
 * so any of their connection strings can be handed to a {@link Migrator}:
 *
 * ```typescript
 * import { Migrator } from 'tidemark';
 *
 * const migrator = new Migrator({ url: process.env.DATABASE_URL, path: './migrations' });
 * const { ok, errors } = await migrator.upSync();
 * ```
 *
 * Or install the core with a single driver:
 *
 * ```bash
 * npm install @tidemark/core @tidemark/postgresql
 * ```
 */

// Re-export everything from core
export * from '@tidemark/core';

// Re-export the drivers
export { PostgreSQLDriver } from '@tidemark/postgresql';
export type { PostgreSQLDriverOptions } from '@tidemark/postgresql';

export { MySQLDriver } from '@tidemark/mysql';
export type { MySQLDriverOptions } from '@tidemark/mysql';

export { RedisDriver } from '@tidemark/redis';
export type { RedisDriverOptions } from '@tidemark/redis';

export { defineConfig } from './cli/config';
export type { TidemarkConfig } from './cli/config';
