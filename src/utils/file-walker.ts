/**
 * File Walker Utility
 *
 * Directory traversal used by manifest discovery.
 */

import { promises as fs } from 'fs';
import { join, relative, sep } from 'path';
import { minimatch } from 'minimatch';

/**
 * Filter predicate for file walking
 */
export type FileFilter = (path: string, isDirectory: boolean) => boolean;

/**
 * Options for file walking
 */
export interface WalkOptions {
  /**
   * Filter predicate to include/exclude files and directories
   */
  filter?: FileFilter;
}

/**
 * Async generator that walks a directory tree and yields file paths
 *
 * @example
 * for await (const filePath of walkFiles('/path/to/dir')) {
 *   console.log(filePath);
 * }
 */
export async function* walkFiles(
  dir: string,
  options: WalkOptions = {}
): AsyncGenerator<string> {
  const { filter } = options;

  let entries;
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    // Unreadable directories are skipped
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code === 'EACCES' || code === 'EPERM') {
      return;
    }
    throw error;
  }

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);

    // Symbolic links are not followed
    if (entry.isSymbolicLink()) {
      continue;
    }

    const isDirectory = entry.isDirectory();
    const isFile = entry.isFile();

    if (filter && !filter(fullPath, isDirectory)) {
      continue;
    }

    if (isDirectory) {
      yield* walkFiles(fullPath, options);
    } else if (isFile) {
      yield fullPath;
    }
  }
}

/**
 * Build a filter that rejects any path matching one of the exclude globs.
 * Globs are matched against the path relative to `root`, with `/` separators.
 */
export function createExcludeFilter(root: string, excludePatterns: string[]): FileFilter | undefined {
  if (excludePatterns.length === 0) {
    return undefined;
  }

  return (path: string, isDirectory: boolean) => {
    const relativePath = relative(root, path).split(sep).join('/');
    const candidates = isDirectory ? [relativePath, `${relativePath}/`] : [relativePath];
    return !excludePatterns.some(pattern =>
      candidates.some(candidate => minimatch(candidate, pattern, { dot: true }))
    );
  };
}
