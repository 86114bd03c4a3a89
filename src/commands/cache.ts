import { Command } from 'commander';

import type { CommandResult } from '../types/index.js';
import { withErrorHandling, FileSystemError } from '../utils/errors.js';
import { loadConfig } from '../core/config.js';
import { ExistenceCache } from '../core/cache/existence-cache.js';

export interface CacheOptions {
  cacheFile?: string;
  config?: string;
}

async function openCache(options: CacheOptions): Promise<ExistenceCache> {
  const config = await loadConfig({
    configPath: options.config,
    overrides: { cacheFile: options.cacheFile }
  });
  return ExistenceCache.load(config.cacheFile, { ttlSeconds: config.cacheTtlSeconds });
}

export async function clearCacheCommand(options: CacheOptions): Promise<CommandResult> {
  const cache = await openCache(options);
  if (!(await cache.clear())) {
    throw new FileSystemError(`Could not clear cache: ${cache.filePath}`);
  }
  console.log(`✓ Cache cleared: ${cache.filePath}`);
  return { success: true, data: { path: cache.filePath } };
}

export async function cacheInfoCommand(options: CacheOptions): Promise<CommandResult> {
  const cache = await openCache(options);
  console.log(`Cache file: ${cache.filePath}`);
  console.log(`Entries:    ${cache.size}`);
  return { success: true, data: { path: cache.filePath, entries: cache.size } };
}

export function setupCacheCommand(program: Command): void {
  const cache = program
    .command('cache')
    .description('Manage the repository query cache');

  cache
    .command('clear')
    .description('Remove every cached verdict')
    .option('--cache-file <file>', 'cache file location')
    .option('--config <file>', 'configuration file')
    .action(withErrorHandling(async (options: CacheOptions) => {
      await clearCacheCommand(options);
    }));

  cache
    .command('info')
    .description('Show the cache location and entry count')
    .option('--cache-file <file>', 'cache file location')
    .option('--config <file>', 'configuration file')
    .action(withErrorHandling(async (options: CacheOptions) => {
      await cacheInfoCommand(options);
    }));
}
