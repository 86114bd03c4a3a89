/**
 * Minimal Cargo manifest/lockfile scanning.
 *
 * Only the subset of the TOML grammar needed to recover dependency names,
 * resolved versions and section membership is understood. Tables such as
 * `[dependencies.serde]`, dotted keys and multi-line values are not
 * interpreted.
 */

import { basename, join } from 'path';
import { FILE_PATTERNS } from '../../constants/index.js';
import { exists, readTextFile } from '../../utils/fs.js';
import { createExcludeFilter, walkFiles } from '../../utils/file-walker.js';
import { logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';

export interface DiscoverOptions {
  /** minimatch globs, relative to the root, for manifests to skip */
  exclude?: string[];
}

const DEPENDENCY_LINE = /^([A-Za-z0-9_-]+)\s*=/;
const NAME_LINE = /^name\s*=\s*"([^"]+)"/;
const LOCK_VERSION_LINE = /^version\s*=\s*"([^"]+)"/;
const LOCK_RECORD_START = '[[package]]';
const PACKAGE_SECTION = 'package';

/**
 * Find every Cargo.toml under `root`. The root manifest, when present, comes
 * first; the rest follow in sorted path order.
 */
export async function discoverManifests(root: string, options: DiscoverOptions = {}): Promise<string[]> {
  const rootManifest = join(root, FILE_PATTERNS.CARGO_TOML);
  const filter = createExcludeFilter(root, options.exclude ?? []);

  const nested = new Set<string>();
  for await (const filePath of walkFiles(root, { filter })) {
    if (basename(filePath) === FILE_PATTERNS.CARGO_TOML && filePath !== rootManifest) {
      nested.add(filePath);
    }
  }

  const manifests = [...nested].sort();
  if (await exists(rootManifest)) {
    manifests.unshift(rootManifest);
  }

  logger.debug(`Discovered ${manifests.length} manifest(s) under ${root}`);
  return manifests;
}

/**
 * Extract the names declared in every `[...dependencies...]` section of a
 * manifest. Dev and build dependency sections count as well.
 */
export async function parseDirectDependencies(manifestPath: string): Promise<Set<string>> {
  const dependencies = new Set<string>();

  const content = await readOptionalFile(manifestPath, 'Manifest');
  if (content === undefined) {
    return dependencies;
  }

  let inDependencies = false;
  for (const rawLine of content.split('\n')) {
    const line = rawLine.trim();

    if (line.startsWith('[')) {
      inDependencies = sectionName(line).toLowerCase().includes('dependencies');
      continue;
    }

    if (!inDependencies || line === '' || line.startsWith('#')) {
      continue;
    }

    const match = DEPENDENCY_LINE.exec(line);
    if (match) {
      dependencies.add(match[1]);
    }
  }

  return dependencies;
}

/**
 * The crate name declared in a manifest's `[package]` section, if any.
 * Virtual workspace manifests have none.
 */
export async function parsePackageName(manifestPath: string): Promise<string | undefined> {
  const content = await readOptionalFile(manifestPath, 'Manifest');
  if (content === undefined) {
    return undefined;
  }

  let inPackage = false;
  for (const rawLine of content.split('\n')) {
    const line = rawLine.trim();

    if (line.startsWith('[')) {
      inPackage = sectionName(line).trim() === PACKAGE_SECTION;
      continue;
    }

    if (inPackage) {
      const match = NAME_LINE.exec(line);
      if (match) {
        return match[1].trim();
      }
    }
  }

  return undefined;
}

/**
 * Read every `[[package]]` record of a lockfile into name -> version.
 * A record missing either field is dropped; when a name appears in several
 * records, the last one in file order wins.
 */
export async function parseLockfile(lockfilePath: string): Promise<Record<string, string>> {
  const versions: Record<string, string> = {};

  const content = await readOptionalFile(lockfilePath, 'Lockfile');
  if (content === undefined) {
    return versions;
  }

  let inRecord = false;
  let name: string | undefined;
  let version: string | undefined;

  const closeRecord = () => {
    if (inRecord && name !== undefined && version !== undefined) {
      versions[name] = version;
    }
    name = undefined;
    version = undefined;
  };

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trim();

    if (line.startsWith('[')) {
      closeRecord();
      inRecord = line === LOCK_RECORD_START;
      continue;
    }

    if (!inRecord) {
      continue;
    }

    if (name === undefined) {
      const nameMatch = NAME_LINE.exec(line);
      if (nameMatch) {
        name = nameMatch[1].trim();
        continue;
      }
    }

    if (version === undefined) {
      const versionMatch = LOCK_VERSION_LINE.exec(line);
      if (versionMatch) {
        version = versionMatch[1].trim();
      }
    }
  }
  closeRecord();

  return versions;
}

function sectionName(headerLine: string): string {
  const close = headerLine.lastIndexOf(']');
  return close === -1 ? headerLine.slice(1) : headerLine.slice(1, close);
}

async function readOptionalFile(path: string, kind: string): Promise<string | undefined> {
  if (!(await exists(path))) {
    logger.warn(`${kind} not found: ${path}`);
    return undefined;
  }

  try {
    return await readTextFile(path);
  } catch (error) {
    logger.warn(`${kind} could not be read: ${path}`, { error: errorMessage(error) });
    return undefined;
  }
}
