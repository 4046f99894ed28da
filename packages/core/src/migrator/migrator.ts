/**
 * Migrator
 * Plans and runs migrations against a driver, streaming progress over a pipe
 */

import { DEFAULT_MIGRATION_ID, INTERRUPT_NOTICE } from '../constants';
import { createDriver } from '../driver/driver-registry';
import {
  CloseError,
  ValidationError,
  VersionMismatchError,
  VersionQueryError,
  toError,
} from '../errors';
import { FsFileStore } from '../files/file-store';
import { MigrationLoader } from '../files/migration-loader';
import { closePipe, newPipe, waitAndRedirect, watchInterrupts } from '../pipe';

import type { MigrationFile, MigrationFilePair } from '../files/migration-file';
import type { MigrationFileSet } from '../files/migration-files';
import type { Driver } from '../interfaces/driver';
import type { FileStore } from '../interfaces/file-store';
import type { InterruptSource, InterruptWatcher } from '../pipe';
import type { Pipe } from '../pipe/pipe';
import type { InterruptMode, Logger, RunResult } from '../types';

export interface MigratorOptions {
  /** Directory holding the migration scripts */
  path: string;
  /** Connection string; its scheme selects the driver */
  url?: string;
  /** Already open connection, never closed by the migrator */
  instance?: unknown;
  /** Migration identity, for several independent version tracks in one store */
  id?: string;
  /** Where scripts are read from (default: the file system) */
  store?: FileStore;
  /** Interrupt handling (default: 'graceful') */
  interrupts?: InterruptMode;
  /** SIGINT source for graceful interrupts (default: process) */
  signals?: InterruptSource;
  /** Called on a second interrupt (default: exit with code 5) */
  onForceQuit?: () => void;
  logger?: Logger;
}

interface RunContext {
  driver: Driver;
  files: MigrationFileSet;
  version: number;
}

type Selector = (files: MigrationFileSet, version: number) => MigrationFile[];

/**
 * Applies and reverts versioned migration scripts.
 *
 * Every run method streams events into the given pipe and closes it when it
 * is done; the `*Sync` variants drain the pipe themselves and resolve with
 * the errors once the run is over.
 *
 * @example
 * ```typescript
 * const migrator = new Migrator({ url: 'postgres://localhost/app', path: './migrations' });
 *
 * const { ok, errors } = await migrator.upSync();
 *
 * const pipe = newPipe();
 * const run = migrator.migrate(pipe, -1);
 * for await (const event of pipe) {
 *   console.log(String(event));
 * }
 * await run;
 * ```
 */
export class Migrator {
  readonly id: string;
  readonly url: string;
  readonly path: string;
  private readonly instance?: unknown;
  private readonly store: FileStore;
  private readonly interrupts: InterruptMode;
  private readonly signals?: InterruptSource;
  private readonly onForceQuit?: () => void;
  private readonly logger?: Logger;

  constructor(options: MigratorOptions) {
    this.id = options.id ?? DEFAULT_MIGRATION_ID;
    this.url = options.url ?? '';
    this.path = options.path;
    this.instance = options.instance;
    this.store = options.store ?? new FsFileStore();
    this.interrupts = options.interrupts ?? 'graceful';
    this.signals = options.signals;
    this.onForceQuit = options.onForceQuit;
    this.logger = options.logger;
  }

  /**
   * Apply every migration above the current version.
   */
  async up(pipe: Pipe): Promise<void> {
    await this.guard(pipe, () => this.run(pipe, (files, version) => files.toLastFrom(version)));
  }

  upSync(): Promise<RunResult> {
    return this.collect((pipe) => this.up(pipe));
  }

  /**
   * Revert every applied migration.
   */
  async down(pipe: Pipe): Promise<void> {
    await this.guard(pipe, () => this.run(pipe, (files, version) => files.toFirstFrom(version)));
  }

  downSync(): Promise<RunResult> {
    return this.collect((pipe) => this.down(pipe));
  }

  /**
   * Apply (`+n`) or revert (`-n`) migrations relative to the current version.
   */
  async migrate(pipe: Pipe, relativeN: number): Promise<void> {
    await this.guard(pipe, async () => {
      if (!Number.isSafeInteger(relativeN)) {
        await closePipe(pipe, new ValidationError(`Invalid relative step count: ${relativeN}`, 'relativeN'));
        return;
      }
      await this.run(pipe, (files, version) => files.from(version, relativeN));
    });
  }

  migrateSync(relativeN: number): Promise<RunResult> {
    return this.collect((pipe) => this.migrate(pipe, relativeN));
  }

  /**
   * Revert the most recent migration, then apply it again.
   */
  async redo(pipe: Pipe): Promise<void> {
    await this.guard(pipe, async () => {
      if (await this.forward(pipe, (inner) => this.migrate(inner, -1))) {
        await this.migrate(pipe, +1);
      }
    });
  }

  redoSync(): Promise<RunResult> {
    return this.collect((pipe) => this.redo(pipe));
  }

  /**
   * Revert everything, then apply everything.
   */
  async reset(pipe: Pipe): Promise<void> {
    await this.guard(pipe, async () => {
      if (await this.forward(pipe, (inner) => this.down(inner))) {
        await this.up(pipe);
      }
    });
  }

  resetSync(): Promise<RunResult> {
    return this.collect((pipe) => this.reset(pipe));
  }

  /**
   * Migrate up or down until `target` is the current version. 0 reverts
   * everything.
   */
  async goto(pipe: Pipe, target: number): Promise<void> {
    await this.guard(pipe, async () => {
      if (!Number.isSafeInteger(target) || target < 0) {
        await closePipe(pipe, new ValidationError(`Invalid target version: ${target}`, 'target'));
        return;
      }

      await this.run(pipe, (files, version) => {
        if (target !== 0 && !files.has(target)) {
          throw new ValidationError(`No migration with version ${target}`, 'target');
        }
        if (version !== 0 && !files.has(version)) {
          throw new VersionMismatchError(version);
        }
        return target >= version
          ? files.toLastFrom(version).filter((file) => file.version <= target)
          : files.toFirstFrom(version).filter((file) => file.version > target);
      });
    });
  }

  gotoSync(target: number): Promise<RunResult> {
    return this.collect((pipe) => this.goto(pipe, target));
  }

  /**
   * Current version of this migrator's identity.
   */
  async version(): Promise<number> {
    const driver = await createDriver(this.url, this.instance);
    try {
      return await this.readVersion(driver);
    } finally {
      await driver.close();
    }
  }

  /**
   * Write a new, empty up/down pair numbered after the last migration.
   */
  async create(name: string): Promise<MigrationFilePair> {
    const driver = await createDriver(this.url, this.instance);
    try {
      const pair = await this.loader(driver).create(name);
      this.logger?.info(`Created migration ${pair.up.filename}`, { version: pair.version });
      return pair;
    } finally {
      await driver.close();
    }
  }

  private loader(driver: Driver): MigrationLoader {
    return new MigrationLoader(this.store, this.path, driver.filenameExtension());
  }

  private watchInterrupts(): InterruptWatcher | undefined {
    return watchInterrupts(this.interrupts, {
      source: this.signals,
      onForceQuit: this.onForceQuit,
    });
  }

  private async collect(run: (pipe: Pipe) => Promise<void>): Promise<RunResult> {
    const pipe = newPipe();
    const errors: Error[] = [];
    let aborted = false;

    const drain = async (): Promise<void> => {
      for await (const event of pipe) {
        if (event instanceof Error) {
          errors.push(event);
        } else if (event === INTERRUPT_NOTICE) {
          aborted = true;
        }
      }
    };

    await Promise.all([drain(), run(pipe)]);
    const failed = errors.some((error) => !(error instanceof CloseError));
    return { errors, ok: !failed && !aborted, aborted };
  }

  /**
   * Run `produce` against a fresh inner pipe and forward its events into
   * `pipe`. Closes `pipe` and returns `false` when that phase failed or was
   * interrupted.
   */
  private async forward(pipe: Pipe, produce: (inner: Pipe) => Promise<void>): Promise<boolean> {
    const inner = newPipe();
    // steps inside `produce` watch for interrupts themselves
    const [ok] = await Promise.all([waitAndRedirect(inner, pipe), produce(inner)]);
    if (!ok) {
      await closePipe(pipe);
    }
    return ok;
  }

  /**
   * Last line of defence: whatever escapes a run still ends up on the pipe,
   * and the pipe is closed.
   */
  private async guard(pipe: Pipe, body: () => Promise<void>): Promise<void> {
    try {
      await body();
    } catch (error) {
      this.logger?.error('Migration run failed', error);
      await closePipe(pipe, toError(error));
    }
  }

  private async run(pipe: Pipe, select: Selector): Promise<void> {
    const context = await this.prepare(pipe);
    if (!context) {
      return;
    }
    const { driver, files, version } = context;

    let selected: MigrationFile[];
    try {
      selected = select(files, version);
    } catch (error) {
      await this.closeDriver(driver, pipe);
      await closePipe(pipe, toError(error));
      return;
    }

    this.logger?.debug(`Running ${selected.length} migration(s) from version ${version}`, {
      id: this.id,
    });

    for (const file of selected) {
      const ok = await this.step(driver, file, pipe);
      if (!ok) {
        this.logger?.debug(`Stopped after ${file.filename}`);
        break;
      }
    }

    await this.closeDriver(driver, pipe);
    await closePipe(pipe);
  }

  /**
   * Open the driver, discover the scripts and read the current version. On
   * failure the error is sent, the driver released and the pipe closed.
   */
  private async prepare(pipe: Pipe): Promise<RunContext | undefined> {
    let driver: Driver;
    try {
      driver = await createDriver(this.url, this.instance);
    } catch (error) {
      await closePipe(pipe, toError(error));
      return undefined;
    }

    try {
      const files = await this.loader(driver).discover();
      const version = await this.readVersion(driver);
      return { driver, files, version };
    } catch (error) {
      await pipe.send(toError(error));
      await this.closeDriver(driver, pipe);
      await closePipe(pipe);
      return undefined;
    }
  }

  /**
   * Apply one script. The driver runs as its own task; its events are
   * forwarded until it closes its pipe.
   */
  private async step(driver: Driver, file: MigrationFile, pipe: Pipe): Promise<boolean> {
    const inner = newPipe();
    const late: { error?: Error } = {};

    const task = Promise.resolve()
      .then(() => driver.migrate(this.id, file, inner))
      .catch(async (error: unknown) => {
        if (inner.isClosed) {
          late.error = toError(error);
          return;
        }
        await closePipe(inner, toError(error));
      });

    const [ok] = await Promise.all([waitAndRedirect(inner, pipe, this.watchInterrupts()), task]);

    if (late.error) {
      await pipe.send(late.error);
      return false;
    }
    return ok;
  }

  private async readVersion(driver: Driver): Promise<number> {
    try {
      return await driver.version(this.id);
    } catch (error) {
      if (error instanceof VersionQueryError) {
        throw error;
      }
      throw new VersionQueryError(`Failed to read migration version: ${toError(error).message}`, toError(error));
    }
  }

  private async closeDriver(driver: Driver, pipe: Pipe): Promise<void> {
    try {
      await driver.close();
    } catch (error) {
      const closeError =
        error instanceof CloseError
          ? error
          : new CloseError(`Failed to close driver: ${toError(error).message}`, toError(error));
      this.logger?.warn(closeError.message);
      await pipe.send(closeError);
    }
  }
}
