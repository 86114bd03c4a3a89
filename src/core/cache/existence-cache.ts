import { DEFAULT_CACHE_TTL_SECONDS } from '../../constants/index.js';
import type { CacheDocument, CacheEntry, ExistenceVerdict } from '../../types/index.js';
import { exists, readTextFile, writeJsonFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';

export interface ExistenceCacheOptions {
  /** Entries older than this are treated as absent. Default 24h. */
  ttlSeconds?: number;
  /** Clock in epoch seconds */
  now?: () => number;
}

const systemClock = (): number => Date.now() / 1000;

/**
 * Persistent TTL-bounded store of existence verdicts, keyed by dependency name.
 *
 * Loaded once per run, mutated in memory, written back with `flush()`.
 * A cache is an optimisation: unreadable or malformed state loads as empty
 * and failed writes are reported as warnings.
 */
export class ExistenceCache {
  private entries: Record<string, CacheEntry>;
  private readonly ttlSeconds: number;
  private readonly now: () => number;

  private constructor(
    readonly filePath: string,
    entries: Record<string, CacheEntry>,
    options: ExistenceCacheOptions
  ) {
    this.entries = entries;
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_CACHE_TTL_SECONDS;
    this.now = options.now ?? systemClock;
  }

  static async load(filePath: string, options: ExistenceCacheOptions = {}): Promise<ExistenceCache> {
    return new ExistenceCache(filePath, await readEntries(filePath), options);
  }

  /** Number of stored entries, expired ones included */
  get size(): number {
    return Object.keys(this.entries).length;
  }

  get(name: string): ExistenceVerdict | undefined {
    if (!Object.prototype.hasOwnProperty.call(this.entries, name)) {
      return undefined;
    }

    const entry = this.entries[name];
    if (this.now() - entry.timestamp > this.ttlSeconds) {
      logger.debug(`Cache entry expired for ${name}`, { timestamp: entry.timestamp });
      return undefined;
    }

    return { exists: entry.exists, message: entry.message, packages: [...entry.packages] };
  }

  put(name: string, verdict: ExistenceVerdict): void {
    this.entries[name] = {
      exists: verdict.exists,
      message: verdict.message,
      packages: [...verdict.packages],
      timestamp: this.now()
    };
  }

  /**
   * Persist the whole store. Resolves `false` (after logging a warning)
   * when the file cannot be written.
   */
  async flush(): Promise<boolean> {
    const document: CacheDocument = { entries: this.entries };
    try {
      await writeJsonFile(this.filePath, document);
      logger.debug(`Saved ${this.size} cache entries to ${this.filePath}`);
      return true;
    } catch (error) {
      logger.warn(`Could not save cache: ${this.filePath}`, { error: errorMessage(error) });
      return false;
    }
  }

  async clear(): Promise<boolean> {
    this.entries = {};
    return this.flush();
  }
}

async function readEntries(filePath: string): Promise<Record<string, CacheEntry>> {
  if (!(await exists(filePath))) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(await readTextFile(filePath));
  } catch (error) {
    logger.debug(`Ignoring unreadable cache file at ${filePath}`, { error: errorMessage(error) });
    return {};
  }

  if (!isRecord(parsed) || !isRecord(parsed.entries)) {
    logger.debug(`Ignoring cache file without an entries map: ${filePath}`);
    return {};
  }

  const entries: Record<string, CacheEntry> = {};
  for (const [name, value] of Object.entries(parsed.entries)) {
    if (isCacheEntry(value)) {
      entries[name] = value;
    }
  }
  return entries;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCacheEntry(value: unknown): value is CacheEntry {
  return isRecord(value)
    && typeof value.exists === 'boolean'
    && typeof value.message === 'string'
    && typeof value.timestamp === 'number'
    && Array.isArray(value.packages)
    && value.packages.every((pkg: unknown) => typeof pkg === 'string');
}
