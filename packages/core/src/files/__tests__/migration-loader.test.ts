import { mkdir, mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { ContentReadError, DiscoveryError, ValidationError } from '../../errors';
import { AssetFileStore, FsFileStore } from '../file-store';
import { MigrationFile } from '../migration-file';
import { MigrationLoader, discover, filenamePattern, formatVersion } from '../migration-loader';

import type { FileStore } from '../../interfaces/file-store';

function assets(names: string[]): AssetFileStore {
  const files: Record<string, string> = {};
  for (const name of names) {
    files[`migrations/${name}`] = `-- ${name}`;
  }
  return new AssetFileStore(files);
}

describe('formatVersion', () => {
  it('should pad to four digits', () => {
    expect(formatVersion(1)).toBe('0001');
    expect(formatVersion(1234)).toBe('1234');
  });

  it('should pad longer versions to the next multiple of four', () => {
    expect(formatVersion(12345)).toBe('00012345');
  });
});

describe('filenamePattern', () => {
  it('should escape the extension', () => {
    const pattern = filenamePattern('sql');
    expect(pattern.test('0001_init.up.sql')).toBe(true);
    expect(pattern.test('0001_init.up.xsql')).toBe(false);
    expect(pattern.test('0001_init.sideways.sql')).toBe(false);
  });
});

describe('MigrationLoader', () => {
  describe('discover', () => {
    it('should pair up and down files in version order', async () => {
      const store = assets([
        '0002_add_index.down.sql',
        '0002_add_index.up.sql',
        '0001_init_users.up.sql',
        '0001_init_users.down.sql',
        'README.md',
      ]);

      const files = await discover(store, 'migrations', 'sql');

      expect([...files].map((pair) => [pair.version, pair.name])).toEqual([
        [1, 'init_users'],
        [2, 'add_index'],
      ]);
      expect(files.toLastFrom(0).map((file) => file.path)).toEqual([
        join('migrations', '0001_init_users.up.sql'),
        join('migrations', '0002_add_index.up.sql'),
      ]);
    });

    it('should load content lazily through the store', async () => {
      const files = await discover(assets(['0001_a.up.sql', '0001_a.down.sql']), 'migrations', 'sql');
      const [up] = files.toLastFrom(0);

      expect(up?.isContentLoaded).toBe(false);
      await expect(up?.readContent()).resolves.toBe('-- 0001_a.up.sql');
      expect(up?.isContentLoaded).toBe(true);
    });

    it('should ignore other backends\' scripts', async () => {
      const files = await discover(
        assets(['0001_a.up.sql', '0001_a.down.sql', '0001_a.up.redis']),
        'migrations',
        'sql',
      );
      expect(files.size).toBe(1);
    });

    it('should reject a version with only one half', async () => {
      await expect(discover(assets(['0001_init.up.sql']), 'migrations', 'sql')).rejects.toThrow(
        'Migration version 1 is missing its down file',
      );
    });

    it('should reject filenames that do not follow the pattern', async () => {
      await expect(discover(assets(['init.up.sql']), 'migrations', 'sql')).rejects.toThrow(
        'Invalid migration filename init.up.sql: expected <version>_<name>.<up|down>.sql',
      );
    });

    it('should reject version 0', async () => {
      const error = await discover(assets(['0000_x.up.sql', '0000_x.down.sql']), 'migrations', 'sql').catch(
        (e: unknown) => e,
      );
      expect(error).toBeInstanceOf(DiscoveryError);
      expect((error as DiscoveryError).message).toBe('Invalid migration version in 0000_x.down.sql');
    });

    it('should reject mismatched names', async () => {
      await expect(discover(assets(['0001_a.up.sql', '0001_b.down.sql']), 'migrations', 'sql')).rejects.toThrow(
        'Migration version 1 has mismatched names: 0001_a.up.sql and 0001_b.down.sql',
      );
    });

    it('should reject duplicate versions in one direction', async () => {
      await expect(
        discover(assets(['1_a.up.sql', '01_a.up.sql', '1_a.down.sql']), 'migrations', 'sql'),
      ).rejects.toThrow('Duplicate up migration for version 1: 01_a.up.sql and 1_a.up.sql');
    });

    it('should reject an unreadable directory', async () => {
      await expect(discover(new AssetFileStore(), 'missing', 'sql')).rejects.toThrow(
        'Migration directory not readable: missing',
      );
    });
  });

  describe('create', () => {
    it('should number new pairs after the last version', async () => {
      const store = new AssetFileStore().addDirectory('migrations');
      const loader = new MigrationLoader(store, 'migrations', 'sql');

      const first = await loader.create('init users');
      const second = await loader.create('add_index');

      expect(first.up.filename).toBe('0001_init_users.up.sql');
      expect(second.down.filename).toBe('0002_add_index.down.sql');
      expect(await store.readDir('migrations')).toEqual([
        '0001_init_users.down.sql',
        '0001_init_users.up.sql',
        '0002_add_index.down.sql',
        '0002_add_index.up.sql',
      ]);
      expect(await store.readFile(join('migrations', '0002_add_index.up.sql'))).toBe('');
    });

    it('should produce pairs that discovery finds again', async () => {
      const store = new AssetFileStore().addDirectory('migrations');
      const loader = new MigrationLoader(store, 'migrations', 'redis');
      for (const name of ['a', 'b', 'c']) {
        await loader.create(name);
      }

      const files = await loader.discover();
      expect([...files].map((pair) => pair.version)).toEqual([1, 2, 3]);
    });

    it('should require a name', async () => {
      const loader = new MigrationLoader(new AssetFileStore().addDirectory('m'), 'm', 'sql');
      await expect(loader.create('   ')).rejects.toThrow('Migration name is required');
    });

    it('should require a writable store', async () => {
      const store: FileStore = {
        readDir: async () => [],
        readFile: async () => '',
      };
      const loader = new MigrationLoader(store, 'm', 'sql');
      await expect(loader.create('init')).rejects.toBeInstanceOf(ValidationError);
    });
  });
});

describe('MigrationFile', () => {
  it('should wrap read failures', async () => {
    const file = new MigrationFile({
      version: 1,
      name: 'x',
      direction: 'up',
      directory: 'migrations',
      filename: '0001_x.up.sql',
      store: new AssetFileStore(),
    });

    const error = await file.readContent().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ContentReadError);
    expect((error as ContentReadError).message).toBe(
      `Failed to read migration 0001_x.up.sql: ENOENT: no such file '${join('migrations', '0001_x.up.sql')}'`,
    );
  });
});

describe('FsFileStore', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'tidemark-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('should discover scripts on disk and skip subdirectories', async () => {
    await writeFile(join(directory, '0001_init.up.sql'), 'CREATE TABLE t (id int);');
    await writeFile(join(directory, '0001_init.down.sql'), 'DROP TABLE t;');
    await mkdir(join(directory, '0002_nested.up.sql'));

    const files = await discover(new FsFileStore(), directory, 'sql');

    expect(files.size).toBe(1);
    await expect(files.toFirstFrom(1)[0]?.readContent()).resolves.toBe('DROP TABLE t;');
  });

  it('should create empty files and refuse to overwrite', async () => {
    const store = new FsFileStore();
    const loader = new MigrationLoader(store, directory, 'sql');

    await loader.create('init');
    expect((await readdir(directory)).sort()).toEqual(['0001_init.down.sql', '0001_init.up.sql']);

    await expect(store.writeFile(join(directory, '0001_init.up.sql'), 'x')).rejects.toThrow('EEXIST');
  });
});
