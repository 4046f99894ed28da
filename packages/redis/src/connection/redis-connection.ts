import { ConnectionError, withTimeout } from '@tidemark/core';
import { EventEmitter } from 'eventemitter3';
import Redis from 'ioredis';

import type { RedisOptions } from 'ioredis';

export interface RedisConnectionConfig {
  redis?: RedisOptions;
  connectionTimeout?: number;
}

interface ConnectionEvents {
  error: [error: Error];
}

/** Reconnect attempts before the client gives up */
const MAX_RETRIES = 3;
const RETRY_DELAY = 1000;

/**
 * Owns or adopts the ioredis client the driver talks through.
 */
export class RedisConnectionManager extends EventEmitter<ConnectionEvents> {
  private client?: Redis;
  private owned = false;
  private readonly connectionTimeout: number;
  private readonly redisOptions: RedisOptions;

  constructor(config: RedisConnectionConfig = {}) {
    super();
    this.connectionTimeout = config.connectionTimeout ?? 10_000;
    this.redisOptions = config.redis ?? {};
  }

  async connect(url: string): Promise<void> {
    if (this.client) {
      return;
    }

    const client = new Redis(url, {
      ...this.redisOptions,
      lazyConnect: true,
      enableOfflineQueue: false,
      retryStrategy: (times: number) => {
        if (times > MAX_RETRIES) {
          return null;
        }
        return Math.min(times * RETRY_DELAY, 5000);
      },
    });
    this.client = client;
    this.owned = true;
    this.setupEventHandlers(client);

    try {
      await withTimeout(client.connect(), this.connectionTimeout, 'Redis connection timeout');
    } catch (error) {
      client.disconnect();
      this.client = undefined;
      throw new ConnectionError('Failed to connect to Redis', error instanceof Error ? error : undefined);
    }
  }

  /**
   * Use a client opened elsewhere. It is never closed by this manager.
   */
  adopt(client: Redis): void {
    this.client = client;
    this.owned = false;
  }

  async disconnect(): Promise<void> {
    const client = this.client;
    this.client = undefined;
    if (client && this.owned) {
      await client.quit();
    }
  }

  getClient(): Redis {
    if (!this.client) {
      throw new ConnectionError('Redis client not connected');
    }
    return this.client;
  }

  private setupEventHandlers(client: Redis): void {
    client.on('error', (error: Error) => {
      this.emit('error', error);
    });
  }
}
