import { AssetFileStore, ConnectionError, MigrationFile, StepExecutionError, createDriver, newPipe } from '@tidemark/core';
import Redis from 'ioredis';
import { beforeEach, describe, it, expect, vi } from 'vitest';

import { RedisDriver } from '../driver/redis-driver';
import '../register';

import type { Direction, PipeEvent } from '@tidemark/core';

const mocks = vi.hoisted(() => {
  const sets = new Map<string, Map<string, number>>();
  const client = {
    connect: vi.fn(),
    disconnect: vi.fn(),
    quit: vi.fn(),
    ping: vi.fn(),
    type: vi.fn(),
    call: vi.fn(),
    on: vi.fn(),
    zadd: vi.fn(async (key: string, score: number, member: string) => {
      const set = sets.get(key) ?? new Map<string, number>();
      set.set(member, score);
      sets.set(key, set);
      return 1;
    }),
    zrem: vi.fn(async (key: string, member: string) => (sets.get(key)?.delete(member) ? 1 : 0)),
    zrevrange: vi.fn(async (key: string, start: number, stop: number) =>
      [...(sets.get(key) ?? new Map<string, number>()).entries()]
        .sort((a, b) => b[1] - a[1])
        .slice(start, stop + 1)
        .map(([member]) => member),
    ),
  };
  return { client, sets, constructed: [] as unknown[][] };
});

vi.mock('ioredis', () => {
  class Redis {
    constructor(...args: unknown[]) {
      mocks.constructed.push(args);
      Object.assign(this, mocks.client);
    }
  }
  return { default: Redis, Redis };
});

function migrationFile(content: string, direction: Direction = 'up', version = 1): MigrationFile {
  const filename = `000${version}_seed_flags.${direction}.redis`;
  return new MigrationFile({
    version,
    name: 'seed_flags',
    direction,
    directory: 'migrations',
    filename,
    store: new AssetFileStore({ [`migrations/${filename}`]: content }),
  });
}

async function runStep(driver: RedisDriver, file: MigrationFile, id = ''): Promise<PipeEvent[]> {
  const pipe = newPipe();
  const events: PipeEvent[] = [];
  const reading = (async () => {
    for await (const event of pipe) {
      events.push(event);
    }
  })();
  await driver.migrate(id, file, pipe);
  await reading;
  return events;
}

describe('RedisDriver', () => {
  const { client } = mocks;
  let driver: RedisDriver;

  beforeEach(async () => {
    vi.clearAllMocks();
    mocks.sets.clear();
    mocks.constructed.length = 0;
    client.connect.mockResolvedValue(undefined);
    client.quit.mockResolvedValue('OK');
    client.ping.mockResolvedValue('PONG');
    client.type.mockResolvedValue('none');
    client.call.mockResolvedValue('OK');

    driver = new RedisDriver();
    await driver.initialize('redis://localhost:6379/0');
  });

  describe('initialize', () => {
    it('should connect lazily to the url', () => {
      expect(mocks.constructed).toHaveLength(1);
      expect(mocks.constructed[0]?.[0]).toBe('redis://localhost:6379/0');
      expect(mocks.constructed[0]?.[1]).toMatchObject({ lazyConnect: true, enableOfflineQueue: false });
      expect(client.connect).toHaveBeenCalledTimes(1);
      expect(client.ping).toHaveBeenCalledTimes(1);
      expect(client.type).toHaveBeenCalledWith('tidemark:versions:');
    });

    it('should report unreachable servers', async () => {
      client.connect.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));
      const failing = new RedisDriver();

      const error = await failing.initialize('redis://localhost:6379/0').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConnectionError);
      expect((error as ConnectionError).message).toBe('Failed to connect to Redis');
      expect(client.disconnect).toHaveBeenCalledTimes(1);
    });

    it('should refuse a ledger key of another type', async () => {
      client.type.mockResolvedValueOnce('string');
      const failing = new RedisDriver();

      await expect(failing.initialize('redis://localhost:6379/0')).rejects.toThrow(
        'Ledger key tidemark:versions: holds a string, expected a sorted set',
      );
      expect(client.quit).toHaveBeenCalledTimes(1);
    });
  });

  describe('migrate', () => {
    it('should run each command and record the version', async () => {
      const file = migrationFile('# seed\nSET greeting "hello world"\n\nHSET flags:beta enabled 1\n');

      const events = await runStep(driver, file);

      expect(events).toEqual([file]);
      expect(client.call.mock.calls).toEqual([
        ['SET', 'greeting', 'hello world'],
        ['HSET', 'flags:beta', 'enabled', '1'],
      ]);
      expect(client.zadd).toHaveBeenCalledWith('tidemark:versions:', 1, '1');
      expect(await driver.version('')).toBe(1);
    });

    it('should report the highest applied version', async () => {
      await runStep(driver, migrationFile('SET a 1', 'up', 1));
      await runStep(driver, migrationFile('SET b 2', 'up', 2));
      expect(await driver.version('')).toBe(2);

      await runStep(driver, migrationFile('DEL b', 'down', 2));
      expect(await driver.version('')).toBe(1);
    });

    it('should keep versions per migration id', async () => {
      await runStep(driver, migrationFile('SET a 1'), 'app');

      expect(await driver.version('app')).toBe(1);
      expect(await driver.version('')).toBe(0);
    });

    it('should refuse to read a ledger key of another type for any id', async () => {
      client.type.mockResolvedValueOnce('hash');

      await expect(driver.version('billing')).rejects.toThrow(
        'Failed to read Redis migration version: Ledger key tidemark:versions:billing holds a hash, expected a sorted set',
      );
      expect(client.type).toHaveBeenLastCalledWith('tidemark:versions:billing');
      expect(client.zrevrange).not.toHaveBeenCalled();
    });

    it('should refuse to apply a step to a ledger key of another type', async () => {
      client.type.mockResolvedValueOnce('string');

      const events = await runStep(driver, migrationFile('SET a 1'), 'billing');

      expect(events[1]).toBeInstanceOf(StepExecutionError);
      expect((events[1] as Error).message).toBe(
        'Ledger key tidemark:versions:billing holds a string, expected a sorted set',
      );
      expect(client.zadd).not.toHaveBeenCalled();
      expect(client.call).not.toHaveBeenCalled();
    });

    it('should stop at a failing command and undo the ledger entry', async () => {
      client.call.mockImplementation(async (name: string) => {
        if (name === 'SETT') {
          throw new Error("ERR unknown command 'SETT'");
        }
        return 'OK';
      });

      const events = await runStep(driver, migrationFile('SET a 1\nSETT a 2\nSET b 3'));

      expect(events[1]).toBeInstanceOf(StepExecutionError);
      expect((events[1] as Error).message).toBe(
        "ERR unknown command 'SETT' in line 2:\n\n1: SET a 1\n2: SETT a 2\n3: SET b 3",
      );
      expect(client.call).toHaveBeenCalledTimes(2);
      expect(await driver.version('')).toBe(0);
    });

    it('should restore the ledger entry when a down script fails', async () => {
      await runStep(driver, migrationFile('SET a 1'));
      client.call.mockRejectedValueOnce(new Error('WRONGTYPE Operation against a key holding the wrong kind of value'));

      await runStep(driver, migrationFile('DEL a', 'down'));

      expect(await driver.version('')).toBe(1);
    });

    it('should reject scripts that do not parse before touching the ledger', async () => {
      const events = await runStep(driver, migrationFile('SET a "unterminated'));

      expect((events[1] as Error).message).toBe('Unbalanced quotes in line 1:\n\n1: SET a "unterminated');
      expect(client.zadd).not.toHaveBeenCalled();
      expect(client.call).not.toHaveBeenCalled();
    });
  });

  describe('options', () => {
    it('should build ledger keys from the prefix', () => {
      expect(new RedisDriver({ keyPrefix: 'myapp:' }).ledgerKey('app')).toBe('myapp:versions:app');
    });

    it('should read .redis scripts', () => {
      expect(driver.filenameExtension()).toBe('redis');
    });
  });

  describe('close', () => {
    it('should quit an owned client', async () => {
      await driver.close();
      expect(client.quit).toHaveBeenCalledTimes(1);
    });

    it('should leave an adopted client open', async () => {
      const adopted = new RedisDriver();
      await adopted.initialize('', new Redis());
      await adopted.close();

      expect(client.connect).toHaveBeenCalledTimes(1);
      expect(client.quit).not.toHaveBeenCalled();
    });
  });

  describe('registration', () => {
    it('should accept ioredis clients only', () => {
      expect(RedisDriver.accepts(new Redis())).toBe(true);
      expect(RedisDriver.accepts({ ping: vi.fn() })).toBe(false);
    });

    it('should be created for redis and rediss urls', async () => {
      expect(await createDriver('redis://localhost:6379')).toBeInstanceOf(RedisDriver);
      expect(await createDriver('rediss://localhost:6380')).toBeInstanceOf(RedisDriver);
    });
  });
});
