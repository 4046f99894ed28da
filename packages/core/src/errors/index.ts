import type { MigrationFile } from '../files/migration-file';

export class TidemarkError extends Error {
  constructor(message: string, public code?: string, public override cause?: Error) {
    super(message);
    this.name = 'TidemarkError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * The backend could not be reached, is misconfigured, or no driver is
 * registered for the connection string's scheme.
 */
export class ConnectionError extends TidemarkError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONNECTION_ERROR', cause);
    this.name = 'ConnectionError';
  }
}

/**
 * The migration source set is malformed or incomplete.
 */
export class DiscoveryError extends TidemarkError {
  constructor(message: string, public filename?: string, cause?: Error) {
    super(message, 'DISCOVERY_ERROR', cause);
    this.name = 'DiscoveryError';
  }
}

export class ContentReadError extends TidemarkError {
  constructor(message: string, public path?: string, cause?: Error) {
    super(message, 'CONTENT_READ_ERROR', cause);
    this.name = 'ContentReadError';
  }
}

export class VersionQueryError extends TidemarkError {
  constructor(message: string, cause?: Error) {
    super(message, 'VERSION_QUERY_ERROR', cause);
    this.name = 'VersionQueryError';
  }
}

/**
 * The version reported by the store matches none of the discovered
 * migrations.
 */
export class VersionMismatchError extends TidemarkError {
  constructor(public version: number) {
    super(
      `Current version ${version} does not match any migration file`,
      'VERSION_MISMATCH',
    );
    this.name = 'VersionMismatchError';
  }
}

/**
 * A single migration script failed to apply.
 */
export class StepExecutionError extends TidemarkError {
  constructor(message: string, public file?: MigrationFile, cause?: Error) {
    super(message, 'STEP_EXECUTION_ERROR', cause);
    this.name = 'StepExecutionError';
  }
}

export class CloseError extends TidemarkError {
  constructor(message: string, cause?: Error) {
    super(message, 'CLOSE_ERROR', cause);
    this.name = 'CloseError';
  }
}

export class PipeClosedError extends TidemarkError {
  constructor() {
    super('Send on closed pipe', 'PIPE_CLOSED');
    this.name = 'PipeClosedError';
  }
}

export class ValidationError extends TidemarkError {
  constructor(message: string, public field?: string, cause?: Error) {
    super(message, 'VALIDATION_ERROR', cause);
    this.name = 'ValidationError';
  }
}

export class TimeoutError extends TidemarkError {
  constructor(message: string, public timeout?: number, cause?: Error) {
    super(message, 'TIMEOUT_ERROR', cause);
    this.name = 'TimeoutError';
  }
}

/**
 * Normalize a thrown value into an Error instance.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : String(value));
}
