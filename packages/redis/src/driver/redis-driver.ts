import {
  BaseDriver,
  CONNECTION_DEFAULTS,
  ConnectionError,
  StepExecutionError,
  linesBeforeAndAfter,
  toError,
} from '@tidemark/core';
import Redis from 'ioredis';

import { RedisConnectionManager } from '../connection/redis-connection';
import { ScriptParseError, parseScript } from '../script/script-parser';

import type { RedisCommand } from '../script/script-parser';
import type { BaseDriverOptions, MigrationFile } from '@tidemark/core';
import type { RedisOptions } from 'ioredis';

/** Lines of script shown around a failing command */
const EXCERPT_CONTEXT = 5;

export interface RedisDriverOptions extends BaseDriverOptions {
  /** Prefix of the ledger keys (default: tidemark:) */
  keyPrefix?: string;
  /** Milliseconds to wait for a connection (default: 10s) */
  connectionTimeout?: number;
  /** Extra settings for an owned client */
  redis?: RedisOptions;
}

/**
 * Runs `.redis` scripts, one command per line.
 *
 * The applied versions of each migration id live in the sorted set
 * `<keyPrefix>versions:<id>`. Redis has no rollback: when a command fails,
 * the commands before it stay applied and only the ledger entry is undone.
 */
export class RedisDriver extends BaseDriver {
  readonly name = 'Redis';

  private readonly connection: RedisConnectionManager;
  private readonly keyPrefix: string;

  constructor(options: RedisDriverOptions = {}) {
    super(options);
    this.keyPrefix = options.keyPrefix ?? 'tidemark:';
    this.connection = new RedisConnectionManager({
      connectionTimeout: options.connectionTimeout ?? CONNECTION_DEFAULTS.CONNECTION_TIMEOUT,
      redis: options.redis,
    });
    this.connection.on('error', (error) => {
      this.logger?.warn('Redis connection error', error);
    });
  }

  static accepts(instance: unknown): boolean {
    return instance instanceof Redis;
  }

  filenameExtension(): string {
    return 'redis';
  }

  /** Sorted set holding the applied versions of `id` */
  ledgerKey(id: string): string {
    return `${this.keyPrefix}versions:${id}`;
  }

  protected async doInitialize(url: string, instance?: unknown): Promise<void> {
    if (instance === undefined) {
      await this.connection.connect(url);
    } else if (instance instanceof Redis) {
      this.connection.adopt(instance);
    } else {
      throw new ConnectionError('Expected an ioredis client instance');
    }

    await this.client().ping();
    this.logger?.info('Connected to Redis');
  }

  protected async ensureVersionLedger(): Promise<void> {
    await this.checkLedger(this.ledgerKey(''));
  }

  /** Ledger keys are sorted sets; a missing key is an empty ledger */
  private async checkLedger(key: string): Promise<void> {
    const type = await this.client().type(key);
    if (type !== 'none' && type !== 'zset') {
      throw new ConnectionError(`Ledger key ${key} holds a ${type}, expected a sorted set`);
    }
  }

  protected async doClose(): Promise<void> {
    await this.connection.disconnect();
    this.logger?.info('Disconnected from Redis');
  }

  protected async readVersion(id: string): Promise<number> {
    const key = this.ledgerKey(id);
    await this.checkLedger(key);
    const [latest] = await this.client().zrevrange(key, 0, 0);
    return latest === undefined ? 0 : Number.parseInt(latest, 10);
  }

  protected async applyMigration(id: string, file: MigrationFile): Promise<void> {
    const content = await file.readContent();

    let commands: RedisCommand[];
    try {
      commands = parseScript(content);
    } catch (error) {
      if (error instanceof ScriptParseError) {
        throw new StepExecutionError(formatCommandError(error.message, content, error.line), file, error);
      }
      throw error;
    }

    const client = this.client();
    const key = this.ledgerKey(id);
    const member = String(file.version);
    await this.checkLedger(key);

    if (file.direction === 'up') {
      await client.zadd(key, file.version, member);
    } else {
      await client.zrem(key, member);
    }

    for (const command of commands) {
      try {
        await client.call(command.name, ...command.args);
      } catch (error) {
        await this.revertLedger(key, file).catch((revertError: unknown) => {
          this.logger?.warn(`Failed to revert ledger entry of ${file.filename}`, revertError);
        });
        throw new StepExecutionError(
          formatCommandError(toError(error).message, content, command.line),
          file,
          toError(error),
        );
      }
    }
  }

  private async revertLedger(key: string, file: MigrationFile): Promise<void> {
    if (file.direction === 'up') {
      await this.client().zrem(key, String(file.version));
    } else {
      await this.client().zadd(key, file.version, String(file.version));
    }
  }

  private client(): Redis {
    return this.connection.getClient();
  }
}

function formatCommandError(message: string, content: string, line: number): string {
  const excerpt = linesBeforeAndAfter(content, line, EXCERPT_CONTEXT, EXCERPT_CONTEXT, true);
  return `${message} in line ${line}:\n\n${excerpt}`;
}
