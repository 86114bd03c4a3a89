import { execFile } from 'child_process';
import { mkdtemp, readdir } from 'fs/promises';
import { tmpdir } from 'os';
import { join, resolve } from 'path';
import { promisify } from 'util';

import { FILE_PATTERNS, TEMP_DIR_PREFIX } from '../../constants/index.js';
import { ExtractionError, InputNotFoundError, errorMessage } from '../../utils/errors.js';
import { isDirectory, isFile, remove } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

const execFileAsync = promisify(execFile);

/** Unpacks a source archive into an existing directory. */
export interface ArchiveExtractor {
  extract(archivePath: string, destination: string): Promise<void>;
}

/**
 * Extracts with the system `tar`. Zstandard archives need `--zstd`; gzip,
 * bzip2 and xz are detected by tar itself.
 */
export class TarArchiveExtractor implements ArchiveExtractor {
  async extract(archivePath: string, destination: string): Promise<void> {
    const isZstd = FILE_PATTERNS.ZSTD_EXTENSIONS.some(ext => archivePath.endsWith(ext));
    const args = [...(isZstd ? ['--zstd'] : []), '-xf', archivePath, '-C', destination];

    try {
      await execFileAsync('tar', args);
    } catch (error) {
      const stderr = hasStderr(error) ? error.stderr.trim() : '';
      throw new ExtractionError(archivePath, stderr || errorMessage(error));
    }
  }
}

function hasStderr(error: unknown): error is { stderr: string } {
  return typeof error === 'object' && error !== null && 'stderr' in error && typeof error.stderr === 'string';
}

export interface SourceTreeOptions {
  archive?: string;
  sourceDir?: string;
  /** Keep the extracted temp directory after release */
  keep?: boolean;
  extractor?: ArchiveExtractor;
  /**
   * Registers the temp directory's cleanup as soon as it exists, so an
   * interrupt during extraction still removes it. Returns an unregister
   * function, called on release.
   */
  registerCleanup?(cleanup: () => Promise<void>): () => void;
}

export interface SourceTree {
  root: string;
  /** Temp directory holding the extraction, when an archive was used */
  tempDir?: string;
  /** Remove the temp directory (no-op for a source directory). Safe to call twice. */
  release(): Promise<void>;
}

/**
 * Resolve the tree to audit: an existing source directory, or a fresh
 * extraction of an archive into a temp directory that `release()` removes.
 */
export async function acquireSourceTree(options: SourceTreeOptions): Promise<SourceTree> {
  if (options.sourceDir) {
    const root = resolve(options.sourceDir);
    if (!(await isDirectory(root))) {
      throw new InputNotFoundError('Source directory', options.sourceDir);
    }
    return { root, release: async () => {} };
  }

  if (!options.archive) {
    throw new InputNotFoundError('Archive or source directory', '(none given)');
  }

  const archive = resolve(options.archive);
  if (!(await isFile(archive))) {
    throw new InputNotFoundError('Archive', options.archive);
  }

  const tempDir = await mkdtemp(join(tmpdir(), TEMP_DIR_PREFIX));
  let released = false;
  let unregister: (() => void) | undefined;
  const release = async (): Promise<void> => {
    if (released) {
      return;
    }
    released = true;
    unregister?.();
    if (options.keep) {
      logger.info(`Keeping extracted sources at ${tempDir}`);
      return;
    }
    await remove(tempDir);
  };

  unregister = options.registerCleanup?.(release);

  try {
    logger.debug(`Extracting ${archive} to ${tempDir}`);
    await (options.extractor ?? new TarArchiveExtractor()).extract(archive, tempDir);
    return { root: await extractedRoot(tempDir), tempDir, release };
  } catch (error) {
    // A failed extraction never leaves the temp directory behind
    released = true;
    unregister?.();
    await remove(tempDir);
    throw error;
  }
}

/** Archives usually wrap the tree in a single `<name>-<version>/` directory. */
async function extractedRoot(tempDir: string): Promise<string> {
  const entries = await readdir(tempDir, { withFileTypes: true });
  if (entries.length === 1 && entries[0].isDirectory()) {
    return join(tempDir, entries[0].name);
  }
  return tempDir;
}
