/**
 * CLI Configuration
 * Load and validate tidemark.config.{js,mjs,json}
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';

import { DEFAULT_MIGRATION_ID, TidemarkError, ValidationError, toError } from '@tidemark/core';

import type { InterruptMode } from '@tidemark/core';

export interface TidemarkConfig {
  /** Connection string; its scheme selects the driver */
  url?: string;
  /** Directory containing migration files */
  path?: string;
  /** Migration identity */
  id?: string;
  /** SIGINT handling during runs */
  interrupts?: InterruptMode;
}

export interface ResolvedConfig {
  url: string;
  /** Absolute migrations directory */
  path: string;
  id: string;
  interrupts: InterruptMode;
}

export interface ConfigSources {
  /** Values given on the command line */
  flags?: Pick<TidemarkConfig, 'url' | 'path' | 'id'>;
  env?: NodeJS.ProcessEnv;
  file?: TidemarkConfig;
  cwd?: string;
}

export const DEFAULT_MIGRATIONS_PATH = './migrations';

export const URL_ENV_VARIABLE = 'TIDEMARK_URL';

/**
 * Define configuration helper
 */
export function defineConfig(config: TidemarkConfig): TidemarkConfig {
  return config;
}

/**
 * Config file names, in lookup order
 */
export const CONFIG_FILES = ['tidemark.config.js', 'tidemark.config.mjs', 'tidemark.config.json'];

/**
 * Load the configuration file from `cwd`. A missing file yields an empty
 * configuration.
 */
export async function loadConfig(cwd: string = process.cwd()): Promise<TidemarkConfig> {
  const configPath = CONFIG_FILES.map((filename) => resolve(cwd, filename)).find((path) =>
    existsSync(path),
  );

  if (!configPath) {
    return {};
  }

  try {
    const config = configPath.endsWith('.json')
      ? await readJson(configPath)
      : await importDefault(configPath);

    validateConfig(config);
    return config;
  } catch (error) {
    throw new TidemarkError(
      `Failed to load config from ${configPath}: ${toError(error).message}`,
      'CONFIG_ERROR',
      toError(error),
    );
  }
}

async function readJson(path: string): Promise<unknown> {
  const parsed: unknown = JSON.parse(await readFile(path, 'utf8'));
  return parsed;
}

async function importDefault(path: string): Promise<unknown> {
  const module: unknown = await import(pathToFileURL(path).href);
  if (typeof module === 'object' && module !== null && 'default' in module) {
    return module.default;
  }
  return module;
}

/**
 * Validate configuration
 */
export function validateConfig(config: unknown): asserts config is TidemarkConfig {
  if (!config || typeof config !== 'object' || Array.isArray(config)) {
    throw new ValidationError('Configuration must be an object');
  }

  for (const key of ['url', 'path', 'id'] as const) {
    const value: unknown = Reflect.get(config, key);
    if (value !== undefined && typeof value !== 'string') {
      throw new ValidationError(`${key} must be a string`, key);
    }
  }

  const interrupts: unknown = Reflect.get(config, 'interrupts');
  if (interrupts !== undefined && interrupts !== 'graceful' && interrupts !== 'non-graceful') {
    throw new ValidationError('interrupts must be "graceful" or "non-graceful"', 'interrupts');
  }
}

/**
 * Merge the configuration file, `TIDEMARK_URL` and command-line flags, in
 * increasing precedence, and apply defaults.
 */
export function resolveConfig(sources: ConfigSources = {}): ResolvedConfig {
  const { flags = {}, env = process.env, file = {}, cwd = process.cwd() } = sources;

  return {
    url: flags.url ?? env[URL_ENV_VARIABLE] ?? file.url ?? '',
    path: resolve(cwd, flags.path ?? file.path ?? DEFAULT_MIGRATIONS_PATH),
    id: flags.id ?? file.id ?? DEFAULT_MIGRATION_ID,
    interrupts: file.interrupts ?? 'graceful',
  };
}
