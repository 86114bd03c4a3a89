// Core types for the distro-deps CLI

/** Sentinel version for a direct dependency the lockfile does not resolve. */
export const UNKNOWN_VERSION = 'unknown';

/** Dependency name -> resolved version (or `UNKNOWN_VERSION`). */
export type DependencySet = Record<string, string>;

/** Dependency name -> manifest paths (relative to the source root) that declare it. */
export type DependencySources = Record<string, string[]>;

/**
 * Which dependencies a run audits:
 * - root: direct dependencies of the root Cargo.toml
 * - workspace: direct dependencies of every Cargo.toml under the root
 * - lockfile: every package resolved in Cargo.lock, transitive ones included
 */
export type DependencyScope = 'root' | 'workspace' | 'lockfile';

export interface ExistenceVerdict {
  exists: boolean;
  message: string;
  /** Matched distro packages in the order the repository query returned them. */
  packages: string[];
}

export interface CacheEntry extends ExistenceVerdict {
  /** Epoch seconds at which the verdict was recorded. */
  timestamp: number;
}

export interface CacheDocument {
  entries: Record<string, CacheEntry>;
}

export type OutputFormat = 'text' | 'json';

export interface DistroDepsConfig {
  cacheFile: string;
  cacheTtlSeconds: number;
  queryTimeoutMs: number;
  packagePrefix: string;
  queryCommand: string[];
  firstParty: string[];
  exclude: string[];
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class DistroDepsError extends Error {
  public code: string;
  public details?: unknown;

  constructor(message: string, code: string, details?: unknown) {
    super(message);
    this.name = 'DistroDepsError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  INPUT_NOT_FOUND = 'INPUT_NOT_FOUND',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NO_DEPENDENCIES = 'NO_DEPENDENCIES',
  MALFORMED_DESCRIPTOR = 'MALFORMED_DESCRIPTOR',
  EXTRACTION_FAILED = 'EXTRACTION_FAILED',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
