import { ConnectionError, toError } from '../errors';

import type { Driver, DriverFactory } from '../interfaces/driver';

// Registry for driver factories, keyed by connection-string scheme
const driverFactories = new Map<string, DriverFactory>();

/**
 * Register a driver factory for a connection-string scheme
 * (`postgres` for `postgres://...`).
 */
export function registerDriver(scheme: string, factory: DriverFactory): void {
  driverFactories.set(scheme.toLowerCase(), factory);
}

export function unregisterDriver(scheme: string): boolean {
  return driverFactories.delete(scheme.toLowerCase());
}

export function getRegisteredSchemes(): string[] {
  return [...driverFactories.keys()];
}

/**
 * Scheme of a connection string, lower-cased; `undefined` when there is none.
 */
export function parseScheme(url: string): string | undefined {
  const match = /^([a-z][\d+.a-z-]*):\/\//i.exec(url.trim());
  return match?.[1]?.toLowerCase();
}

function resolveFactory(url: string, instance?: unknown): DriverFactory {
  const scheme = parseScheme(url);

  if (scheme) {
    const factory = driverFactories.get(scheme);
    if (!factory) {
      throw new ConnectionError(
        `No driver registered for scheme: ${scheme}. ` +
          `Make sure you've imported the driver package.`,
      );
    }
    return factory;
  }

  if (instance !== undefined && instance !== null) {
    for (const factory of driverFactories.values()) {
      if (factory.accepts?.(instance)) {
        return factory;
      }
    }
    throw new ConnectionError('No registered driver accepts the supplied connection instance');
  }

  throw new ConnectionError(`Invalid connection url: ${url ? url : '(empty)'}`);
}

/**
 * Create and initialize the driver for `url`, or for an already open
 * connection `instance`, which the driver then never closes.
 */
export async function createDriver(url: string, instance?: unknown): Promise<Driver> {
  const driver = resolveFactory(url, instance).create();

  try {
    await driver.initialize(url, instance);
  } catch (error) {
    if (error instanceof ConnectionError) {
      throw error;
    }
    throw new ConnectionError(`Failed to initialize driver: ${toError(error).message}`, toError(error));
  }

  return driver;
}
