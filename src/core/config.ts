import { isAbsolute, join, resolve } from 'path';
import {
  DEFAULT_CACHE_FILE,
  DEFAULT_CACHE_TTL_SECONDS,
  DEFAULT_PACKAGE_PREFIX,
  DEFAULT_QUERY_COMMAND,
  DEFAULT_QUERY_TIMEOUT_MS,
  FILE_PATTERNS
} from '../constants/index.js';
import type { DistroDepsConfig } from '../types/index.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { exists, readJsonOrJsoncFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

/**
 * Project configuration for distro-deps.
 *
 * Looked up as distro-deps.jsonc or distro-deps.json in the working
 * directory (or passed explicitly). Every key is optional; file values win
 * over defaults and CLI flags win over both.
 */

export const DEFAULT_CONFIG: DistroDepsConfig = {
  cacheFile: DEFAULT_CACHE_FILE,
  cacheTtlSeconds: DEFAULT_CACHE_TTL_SECONDS,
  queryTimeoutMs: DEFAULT_QUERY_TIMEOUT_MS,
  packagePrefix: DEFAULT_PACKAGE_PREFIX,
  queryCommand: [...DEFAULT_QUERY_COMMAND],
  firstParty: [],
  exclude: []
};

export interface LoadConfigOptions {
  cwd?: string;
  /** Explicit config file; it must exist */
  configPath?: string;
  overrides?: Partial<DistroDepsConfig>;
}

async function findConfigFile(cwd: string): Promise<string | undefined> {
  for (const fileName of FILE_PATTERNS.CONFIG_FILES) {
    const path = join(cwd, fileName);
    if (await exists(path)) {
      return path;
    }
  }
  return undefined;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function isPositiveNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

/**
 * Validate a parsed config document. Unknown keys are ignored with a debug
 * message; known keys with the wrong type raise ConfigError.
 */
export function validateConfig(raw: unknown, source: string): Partial<DistroDepsConfig> {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError(`Invalid configuration in ${source}: expected an object`);
  }

  const config: Partial<DistroDepsConfig> = {};
  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case 'cacheFile':
      case 'packagePrefix':
        if (typeof value !== 'string' || value.length === 0) {
          throw new ConfigError(`Invalid configuration in ${source}: '${key}' must be a non-empty string`);
        }
        config[key] = value;
        break;
      case 'cacheTtlSeconds':
      case 'queryTimeoutMs':
        if (!isPositiveNumber(value)) {
          throw new ConfigError(`Invalid configuration in ${source}: '${key}' must be a positive number`);
        }
        config[key] = value;
        break;
      case 'queryCommand':
        if (!isStringArray(value) || value.length === 0) {
          throw new ConfigError(`Invalid configuration in ${source}: 'queryCommand' must be a non-empty array of strings`);
        }
        config.queryCommand = value;
        break;
      case 'firstParty':
      case 'exclude':
        if (!isStringArray(value)) {
          throw new ConfigError(`Invalid configuration in ${source}: '${key}' must be an array of strings`);
        }
        config[key] = value;
        break;
      default:
        logger.debug(`Ignoring unknown configuration key '${key}' in ${source}`);
    }
  }
  return config;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<DistroDepsConfig> {
  const cwd = options.cwd ?? process.cwd();
  let fileConfig: Partial<DistroDepsConfig> = {};

  let configPath: string | undefined;
  if (options.configPath) {
    configPath = resolve(cwd, options.configPath);
    if (!(await exists(configPath))) {
      throw new ConfigError(`Configuration file not found: ${options.configPath}`);
    }
  } else {
    configPath = await findConfigFile(cwd);
  }

  if (configPath) {
    logger.debug(`Loading config from: ${configPath}`);
    let raw: unknown;
    try {
      raw = await readJsonOrJsoncFile(configPath);
    } catch (error) {
      throw new ConfigError(`Failed to load configuration: ${errorMessage(error)}`, { configPath });
    }
    fileConfig = validateConfig(raw, configPath);
  } else {
    logger.debug('Config file not found, using defaults');
  }

  const merged: DistroDepsConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    ...definedOnly(options.overrides ?? {})
  };

  return {
    ...merged,
    cacheFile: isAbsolute(merged.cacheFile) ? merged.cacheFile : resolve(cwd, merged.cacheFile)
  };
}

function definedOnly(overrides: Partial<DistroDepsConfig>): Partial<DistroDepsConfig> {
  const result: Partial<DistroDepsConfig> = {};
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(result, { [key]: value });
    }
  }
  return result;
}
