export * from './types';
export * from './interfaces';
export * from './errors';
export * from './constants';
export * from './pipe';
export * from './files';

export { BaseDriver, type BaseDriverOptions, type DriverEvents } from './driver/base-driver';
export {
  createDriver,
  getRegisteredSchemes,
  parseScheme,
  registerDriver,
  unregisterDriver,
} from './driver/driver-registry';
export { Migrator, type MigratorOptions } from './migrator/migrator';
export { withTimeout, formatDuration } from './utils/timeout';
