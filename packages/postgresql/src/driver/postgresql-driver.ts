import { Client, Pool } from 'pg';
import {
  BaseDriver,
  CONNECTION_DEFAULTS,
  ConnectionError,
  DEFAULT_TABLE_NAME,
  StepExecutionError,
  toError,
} from '@tidemark/core';

import { formatScriptError, quoteIdentifier } from '../utils/pg-utils';

import type { BaseDriverOptions, MigrationFile } from '@tidemark/core';
import type { ClientBase, PoolConfig, QueryResult, QueryResultRow } from 'pg';

export interface PostgreSQLDriverOptions extends BaseDriverOptions {
  /** Ledger table (default: schema_migrations) */
  tableName?: string;
  /** Milliseconds to wait for a connection (default: 10s) */
  connectionTimeout?: number;
  /** Extra settings for an owned pool */
  pgOptions?: PoolConfig;
}

interface Lease {
  client: ClientBase;
  release(): void;
}

/**
 * Runs `.sql` migrations against PostgreSQL. Each step executes in its own
 * transaction together with its ledger update.
 */
export class PostgreSQLDriver extends BaseDriver {
  readonly name = 'PostgreSQL';

  private pool?: Pool;
  private client?: Client;
  private readonly tableName: string;
  private readonly connectionTimeout: number;
  private readonly pgOptions?: PoolConfig;

  constructor(options: PostgreSQLDriverOptions = {}) {
    super(options);
    this.tableName = options.tableName ?? DEFAULT_TABLE_NAME;
    this.connectionTimeout = options.connectionTimeout ?? CONNECTION_DEFAULTS.CONNECTION_TIMEOUT;
    this.pgOptions = options.pgOptions;
  }

  /** Whether `instance` is a connection this driver can adopt */
  static accepts(instance: unknown): boolean {
    return instance instanceof Pool || instance instanceof Client;
  }

  filenameExtension(): string {
    return 'sql';
  }

  protected async doInitialize(url: string, instance?: unknown): Promise<void> {
    if (instance === undefined) {
      this.pool = new Pool({
        connectionString: url,
        connectionTimeoutMillis: this.connectionTimeout,
        ...this.pgOptions,
      });
      this.pool.on('error', (error) => {
        this.logger?.warn('Unexpected error on idle PostgreSQL client', error);
      });
    } else if (instance instanceof Pool) {
      this.pool = instance;
    } else if (instance instanceof Client) {
      this.client = instance;
    } else {
      throw new ConnectionError('Expected a pg Pool or Client instance');
    }

    await this.query('SELECT 1');
    this.logger?.info('Connected to PostgreSQL database');
  }

  protected async ensureVersionLedger(): Promise<void> {
    await this.query(
      `CREATE TABLE IF NOT EXISTS ${quoteIdentifier(this.tableName)} (
        id text,
        version int not null,
        primary key (id, version)
      )`,
    );
  }

  protected async doClose(): Promise<void> {
    const pool = this.pool;
    this.pool = undefined;
    this.client = undefined;
    if (pool) {
      await pool.end();
      this.logger?.info('Disconnected from PostgreSQL database');
    }
  }

  protected async readVersion(id: string): Promise<number> {
    const result = await this.query<{ version: number }>(
      `SELECT version FROM ${quoteIdentifier(this.tableName)}
       WHERE id = $1
       ORDER BY version DESC
       LIMIT 1`,
      [id],
    );
    return result.rows[0]?.version ?? 0;
  }

  protected async applyMigration(id: string, file: MigrationFile): Promise<void> {
    const table = quoteIdentifier(this.tableName);
    const { client, release } = await this.lease();
    let content: string | undefined;

    try {
      await client.query('BEGIN');
      try {
        if (file.direction === 'up') {
          await client.query(`INSERT INTO ${table} (id, version) VALUES ($1, $2)`, [id, file.version]);
        } else {
          await client.query(`DELETE FROM ${table} WHERE id = $1 AND version = $2`, [id, file.version]);
        }

        content = await file.readContent();
        await client.query(content);
        await client.query('COMMIT');
      } catch (error) {
        await client.query('ROLLBACK').catch((rollbackError: unknown) => {
          this.logger?.warn(`Rollback of ${file.filename} failed`, rollbackError);
        });
        throw this.stepError(toError(error), file, content);
      }
    } finally {
      release();
    }
  }

  private stepError(error: Error, file: MigrationFile, content?: string): Error {
    const message = content === undefined ? undefined : formatScriptError(error, content);
    return message === undefined ? error : new StepExecutionError(message, file, error);
  }

  private async query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>> {
    if (this.pool) {
      return this.pool.query<R>(text, values);
    }
    if (this.client) {
      return this.client.query<R>(text, values);
    }
    throw new ConnectionError('PostgreSQL connection not initialized');
  }

  private async lease(): Promise<Lease> {
    if (this.pool) {
      const client = await this.pool.connect();
      return { client, release: () => client.release() };
    }
    if (this.client) {
      return { client: this.client, release: () => {} };
    }
    throw new ConnectionError('PostgreSQL connection not initialized');
  }
}
