import { describe, it, expect } from 'vitest';

import {
  CloseError,
  ConnectionError,
  ContentReadError,
  DiscoveryError,
  PipeClosedError,
  StepExecutionError,
  TidemarkError,
  TimeoutError,
  ValidationError,
  VersionMismatchError,
  VersionQueryError,
  toError,
} from '../index';

describe('Error classes', () => {
  describe('TidemarkError', () => {
    it('should create error with message', () => {
      const error = new TidemarkError('Test error');
      expect(error.message).toBe('Test error');
      expect(error.name).toBe('TidemarkError');
    });

    it('should create error with code', () => {
      const error = new TidemarkError('Test error', 'TEST_CODE');
      expect(error.code).toBe('TEST_CODE');
    });

    it('should create error with cause', () => {
      const cause = new Error('Original error');
      const error = new TidemarkError('Test error', 'TEST_CODE', cause);
      expect(error.cause).toBe(cause);
    });

    it('should be an instance of Error', () => {
      expect(new TidemarkError('Test error')).toBeInstanceOf(Error);
    });
  });

  describe('ConnectionError', () => {
    it('should create error with message', () => {
      const error = new ConnectionError('Connection failed');
      expect(error.message).toBe('Connection failed');
      expect(error.name).toBe('ConnectionError');
      expect(error.code).toBe('CONNECTION_ERROR');
    });

    it('should create error with cause', () => {
      const cause = new Error('ECONNREFUSED');
      const error = new ConnectionError('Connection failed', cause);
      expect(error.cause).toBe(cause);
      expect(error).toBeInstanceOf(TidemarkError);
    });
  });

  describe('DiscoveryError', () => {
    it('should keep the offending filename', () => {
      const error = new DiscoveryError('Invalid migration filename', '1_x.sql');
      expect(error.code).toBe('DISCOVERY_ERROR');
      expect(error.filename).toBe('1_x.sql');
    });
  });

  describe('ContentReadError', () => {
    it('should keep the path', () => {
      const error = new ContentReadError('Failed to read', 'migrations/0001_a.up.sql');
      expect(error.name).toBe('ContentReadError');
      expect(error.code).toBe('CONTENT_READ_ERROR');
      expect(error.path).toBe('migrations/0001_a.up.sql');
    });
  });

  describe('VersionQueryError', () => {
    it('should set code', () => {
      expect(new VersionQueryError('Version lookup failed').code).toBe('VERSION_QUERY_ERROR');
    });
  });

  describe('VersionMismatchError', () => {
    it('should format message from the version', () => {
      const error = new VersionMismatchError(7);
      expect(error.message).toBe('Current version 7 does not match any migration file');
      expect(error.version).toBe(7);
      expect(error.code).toBe('VERSION_MISMATCH');
    });
  });

  describe('StepExecutionError', () => {
    it('should set code and name', () => {
      const error = new StepExecutionError('syntax error at or near "CREAT"');
      expect(error.name).toBe('StepExecutionError');
      expect(error.code).toBe('STEP_EXECUTION_ERROR');
      expect(error.file).toBeUndefined();
    });
  });

  describe('CloseError', () => {
    it('should set code', () => {
      expect(new CloseError('Failed to close').code).toBe('CLOSE_ERROR');
    });
  });

  describe('PipeClosedError', () => {
    it('should have a fixed message', () => {
      const error = new PipeClosedError();
      expect(error.message).toBe('Send on closed pipe');
      expect(error.code).toBe('PIPE_CLOSED');
    });
  });

  describe('ValidationError', () => {
    it('should create error with field', () => {
      const error = new ValidationError('Migration name is required', 'name');
      expect(error.name).toBe('ValidationError');
      expect(error.code).toBe('VALIDATION_ERROR');
      expect(error.field).toBe('name');
    });
  });

  describe('TimeoutError', () => {
    it('should create error with timeout', () => {
      const error = new TimeoutError('Operation timed out', 5000);
      expect(error.code).toBe('TIMEOUT_ERROR');
      expect(error.timeout).toBe(5000);
    });
  });

  describe('toError', () => {
    it('should return errors unchanged', () => {
      const error = new Error('boom');
      expect(toError(error)).toBe(error);
    });

    it('should wrap strings', () => {
      expect(toError('boom').message).toBe('boom');
    });

    it('should stringify other values', () => {
      expect(toError(42).message).toBe('42');
    });
  });
});
