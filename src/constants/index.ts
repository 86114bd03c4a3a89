/**
 * Shared constants for the distro-deps CLI: file names, descriptor markers,
 * query defaults and process exit codes.
 */

export const FILE_PATTERNS = {
  CARGO_TOML: 'Cargo.toml',
  CARGO_LOCK: 'Cargo.lock',
  CONFIG_FILES: ['distro-deps.jsonc', 'distro-deps.json'],
  ZSTD_EXTENSIONS: ['.zst', '.zstd']
} as const;

export const DEFAULT_CACHE_FILE = '.cache/distro-deps.json';

/** 24 hours */
export const DEFAULT_CACHE_TTL_SECONDS = 24 * 60 * 60;

export const DEFAULT_QUERY_TIMEOUT_MS = 10_000;

export const DEFAULT_PACKAGE_PREFIX = 'rust';

export const DEFAULT_QUERY_COMMAND = ['dnf', 'repoquery', '--quiet', '--whatprovides'] as const;

/**
 * Marker lines delimiting the generated regions of an RPM spec file.
 * Part of the external contract: they must match byte-for-byte.
 */
export const DESCRIPTOR_MARKERS = {
  BUILD_REQUIRES: {
    label: 'build-requirement declarations',
    start: '# Rust dependencies',
    end: '# End rust dependencies'
  },
  BUNDLED: {
    label: 'bundled-dependency declarations',
    start: '# Bundled dependencies',
    end: '# End bundled dependencies'
  }
} as const;

/** Entries shown per partition in the descriptor preview. */
export const PREVIEW_LIMIT = 10;

export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
  INTERRUPTED: 130
} as const;

export const TEMP_DIR_PREFIX = 'distro-deps-';
