import { EventEmitter } from 'eventemitter3';

import { CloseError, ConnectionError, StepExecutionError, VersionQueryError, toError } from '../errors';

import type { MigrationFile } from '../files/migration-file';
import type { Driver } from '../interfaces/driver';
import type { Pipe } from '../pipe/pipe';
import type { Logger } from '../types';

export interface BaseDriverOptions {
  logger?: Logger;
}

export interface DriverEvents {
  initialize: [info: { ownsConnection: boolean }];
  close: [];
  migrate: [info: { id: string; file: MigrationFile; duration: number }];
  migrateError: [info: { id: string; file: MigrationFile; error: Error; duration: number }];
}

/**
 * Shared lifecycle of the bundled drivers.
 *
 * Subclasses open or adopt their connection in `doInitialize`, and apply one
 * script in `applyMigration`, throwing when it fails. `applyMigration` is
 * responsible for leaving the ledger at its pre-step value on failure.
 */
export abstract class BaseDriver extends EventEmitter<DriverEvents> implements Driver {
  protected logger?: Logger;
  protected ownsConnection = false;
  private initialized = false;

  abstract readonly name: string;

  constructor(options: BaseDriverOptions = {}) {
    super();
    if (options.logger) {
      this.logger = options.logger;
    }
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  async initialize(url: string, instance?: unknown): Promise<void> {
    try {
      this.ownsConnection = instance === undefined || instance === null;
      await this.doInitialize(url, instance ?? undefined);
      await this.ensureVersionLedger();
    } catch (error) {
      if (this.ownsConnection) {
        await this.doClose().catch((closeError: unknown) => {
          this.logger?.warn(`Failed to release ${this.name} connection`, closeError);
        });
      }
      if (error instanceof ConnectionError) {
        throw error;
      }
      throw new ConnectionError(
        `Failed to initialize ${this.name} driver: ${toError(error).message}`,
        toError(error),
      );
    }

    this.initialized = true;
    this.emit('initialize', { ownsConnection: this.ownsConnection });
    this.logger?.debug(`Initialized ${this.name} driver`, { ownsConnection: this.ownsConnection });
  }

  async close(): Promise<void> {
    if (!this.initialized) {
      return;
    }
    this.initialized = false;

    if (!this.ownsConnection) {
      this.emit('close');
      return;
    }

    try {
      await this.doClose();
    } catch (error) {
      throw new CloseError(`Failed to close ${this.name} driver: ${toError(error).message}`, toError(error));
    }
    this.emit('close');
    this.logger?.debug(`Closed ${this.name} driver`);
  }

  async version(id: string): Promise<number> {
    try {
      return await this.readVersion(id);
    } catch (error) {
      throw new VersionQueryError(
        `Failed to read ${this.name} migration version: ${toError(error).message}`,
        toError(error),
      );
    }
  }

  async migrate(id: string, file: MigrationFile, pipe: Pipe): Promise<void> {
    const startTime = Date.now();

    try {
      await pipe.send(file);

      try {
        await this.applyMigration(id, file, pipe);
      } catch (error) {
        const stepError =
          error instanceof StepExecutionError
            ? error
            : new StepExecutionError(toError(error).message, file, toError(error));
        const duration = Date.now() - startTime;
        this.emit('migrateError', { id, file, error: stepError, duration });
        this.logger?.error(`Migration ${file.filename} failed`, stepError);
        await pipe.send(stepError);
        return;
      }

      const duration = Date.now() - startTime;
      this.emit('migrate', { id, file, duration });
      this.logger?.debug(`Applied ${file.filename} (${duration}ms)`);
    } finally {
      pipe.close();
    }
  }

  abstract filenameExtension(): string;

  protected abstract doInitialize(url: string, instance?: unknown): Promise<void>;
  protected abstract ensureVersionLedger(): Promise<void>;
  protected abstract doClose(): Promise<void>;
  protected abstract readVersion(id: string): Promise<number>;

  /**
   * Record the step in the ledger and run the script. `pipe` may carry extra
   * informational text; the file marker has already been sent.
   */
  protected abstract applyMigration(id: string, file: MigrationFile, pipe: Pipe): Promise<void>;
}
