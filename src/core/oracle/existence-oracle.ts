import { DEFAULT_PACKAGE_PREFIX, DEFAULT_QUERY_TIMEOUT_MS } from '../../constants/index.js';
import type { ExistenceVerdict } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import type { ExistenceCache } from '../cache/existence-cache.js';
import type { RepoQueryRunner } from './repo-query.js';

export interface ExistenceOracleOptions {
  runner: RepoQueryRunner;
  cache?: ExistenceCache;
  timeoutMs?: number;
  packagePrefix?: string;
}

export const NOT_FOUND_MESSAGE = 'Not found in repositories';

/**
 * Capabilities tried for a crate, in order: the virtual provide first,
 * then the development package name.
 */
export function capabilitiesFor(name: string, packagePrefix: string = DEFAULT_PACKAGE_PREFIX): string[] {
  return [`${packagePrefix}(${name})`, develPackageName(name, packagePrefix)];
}

export function develPackageName(name: string, packagePrefix: string = DEFAULT_PACKAGE_PREFIX): string {
  return `${packagePrefix}-${name}-devel`;
}

/**
 * Answers "is this crate packaged in the distribution?".
 *
 * Lookups go memo -> persistent cache -> repository query. Every verdict,
 * negative ones and timeouts included, is memoised and cached.
 */
export class ExistenceOracle {
  private readonly memo = new Map<string, ExistenceVerdict>();
  private readonly runner: RepoQueryRunner;
  private readonly cache?: ExistenceCache;
  private readonly timeoutMs: number;
  private readonly packagePrefix: string;

  constructor(options: ExistenceOracleOptions) {
    this.runner = options.runner;
    this.cache = options.cache;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_QUERY_TIMEOUT_MS;
    this.packagePrefix = options.packagePrefix ?? DEFAULT_PACKAGE_PREFIX;
  }

  async check(name: string): Promise<ExistenceVerdict> {
    const memoised = this.memo.get(name);
    if (memoised) {
      return memoised;
    }

    const cached = this.cache?.get(name);
    if (cached) {
      logger.debug(`Cache hit for ${name}`);
      this.memo.set(name, cached);
      return cached;
    }

    const verdict = await this.query(name);
    this.memo.set(name, verdict);
    this.cache?.put(name, verdict);
    return verdict;
  }

  private async query(name: string): Promise<ExistenceVerdict> {
    for (const capability of capabilitiesFor(name, this.packagePrefix)) {
      const outcome = await this.runner.query(capability, this.timeoutMs);

      switch (outcome.kind) {
        case 'timeout':
          return {
            exists: false,
            message: `Timeout while querying repositories (${capability} after ${outcome.timeoutMs}ms)`,
            packages: []
          };
        case 'failed':
          return { exists: false, message: `Error: ${outcome.reason}`, packages: [] };
        case 'completed': {
          if (outcome.exitCode !== 0) {
            logger.debug(`Query for ${capability} exited with ${outcome.exitCode}`);
            continue;
          }
          const packages = outcome.stdout
            .split('\n')
            .map(line => line.trim())
            .filter(line => line.length > 0);
          if (packages.length > 0) {
            return { exists: true, message: `✓ ${packages[0]}`, packages };
          }
        }
      }
    }

    return { exists: false, message: NOT_FOUND_MESSAGE, packages: [] };
  }
}
