import {
  BaseDriver,
  CONNECTION_DEFAULTS,
  ConnectionError,
  DEFAULT_TABLE_NAME,
  StepExecutionError,
  toError,
} from '@tidemark/core';
import * as mysql from 'mysql2/promise';

import { formatScriptError, isMySQLPool } from '../utils/mysql-utils';

import type { BaseDriverOptions, MigrationFile } from '@tidemark/core';
import type { RowDataPacket } from 'mysql2/promise';

export interface MySQLDriverOptions extends BaseDriverOptions {
  /** Ledger table (default: schema_migrations) */
  tableName?: string;
  /** Milliseconds to wait for a connection (default: 10s) */
  connectionTimeout?: number;
  /** Extra settings for an owned pool */
  mysql2Options?: mysql.PoolOptions;
}

interface VersionRow extends RowDataPacket {
  version: number;
}

/**
 * Runs `.sql` migrations against MySQL.
 *
 * Scripts may hold several statements. MySQL commits DDL implicitly, so a
 * failing script can leave earlier statements of the same file applied; the
 * ledger row is still rolled back.
 *
 * An adopted pool must have been created with `multipleStatements: true`.
 */
export class MySQLDriver extends BaseDriver {
  readonly name = 'MySQL';

  private pool?: mysql.Pool;
  private readonly tableName: string;
  private readonly connectionTimeout: number;
  private readonly mysql2Options?: mysql.PoolOptions;

  constructor(options: MySQLDriverOptions = {}) {
    super(options);
    this.tableName = options.tableName ?? DEFAULT_TABLE_NAME;
    this.connectionTimeout = options.connectionTimeout ?? CONNECTION_DEFAULTS.CONNECTION_TIMEOUT;
    this.mysql2Options = options.mysql2Options;
  }

  static accepts(instance: unknown): boolean {
    return isMySQLPool(instance);
  }

  filenameExtension(): string {
    return 'sql';
  }

  protected async doInitialize(url: string, instance?: unknown): Promise<void> {
    if (instance === undefined) {
      this.pool = mysql.createPool({
        uri: url,
        multipleStatements: true,
        connectTimeout: this.connectionTimeout,
        ...this.mysql2Options,
      });
    } else if (isMySQLPool(instance)) {
      this.pool = instance;
    } else {
      throw new ConnectionError('Expected a mysql2 promise Pool instance');
    }

    const connection = await this.requirePool().getConnection();
    try {
      await connection.ping();
    } finally {
      connection.release();
    }
    this.logger?.info('Connected to MySQL database');
  }

  protected async ensureVersionLedger(): Promise<void> {
    await this.requirePool().query(
      `CREATE TABLE IF NOT EXISTS ${this.table()} (
        id varchar(255) not null,
        version int not null,
        primary key (id, version)
      )`,
    );
  }

  protected async doClose(): Promise<void> {
    const pool = this.pool;
    this.pool = undefined;
    if (pool) {
      await pool.end();
      this.logger?.info('Disconnected from MySQL database');
    }
  }

  protected async readVersion(id: string): Promise<number> {
    const [rows] = await this.requirePool().query<VersionRow[]>(
      `SELECT version FROM ${this.table()} WHERE id = ? ORDER BY version DESC LIMIT 1`,
      [id],
    );
    return rows[0]?.version ?? 0;
  }

  protected async applyMigration(id: string, file: MigrationFile): Promise<void> {
    const table = this.table();
    const connection = await this.requirePool().getConnection();
    let content: string | undefined;

    try {
      await connection.beginTransaction();
      try {
        if (file.direction === 'up') {
          await connection.query(`INSERT INTO ${table} (id, version) VALUES (?, ?)`, [id, file.version]);
        } else {
          await connection.query(`DELETE FROM ${table} WHERE id = ? AND version = ?`, [id, file.version]);
        }

        content = await file.readContent();
        // the server rejects an empty query
        if (content.trim()) {
          await connection.query(content);
        }
        await connection.commit();
      } catch (error) {
        await connection.rollback().catch((rollbackError: unknown) => {
          this.logger?.warn(`Rollback of ${file.filename} failed`, rollbackError);
        });
        const message = content === undefined ? undefined : formatScriptError(toError(error), content);
        throw message === undefined ? error : new StepExecutionError(message, file, toError(error));
      }
    } finally {
      connection.release();
    }
  }

  private table(): string {
    return this.requirePool().escapeId(this.tableName);
  }

  private requirePool(): mysql.Pool {
    if (!this.pool) {
      throw new ConnectionError('MySQL pool not initialized');
    }
    return this.pool;
  }
}
