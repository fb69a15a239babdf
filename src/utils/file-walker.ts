/**
 * File Walker Utility
 *
 * Directory traversal used to expand source globs in build descriptions.
 * Entries are visited in sorted order so glob expansion is deterministic.
 */

import { promises as fs } from 'fs';
import { join, relative } from 'path';
import { minimatch } from 'minimatch';
import { isJunk } from 'junk';
import { toPosix } from './paths.js';

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

  /**
   * Maximum depth to traverse (default: unlimited)
   */
  maxDepth?: number;
}

/**
 * Async generator that walks a directory tree and yields file paths.
 * Symbolic links are not followed and OS junk files (.DS_Store, Thumbs.db)
 * are never yielded.
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
  const { filter, maxDepth = Infinity } = options;
  yield* walkFilesInternal(dir, filter, maxDepth, 0);
}

async function* walkFilesInternal(
  dir: string,
  filter: FileFilter | undefined,
  maxDepth: number,
  currentDepth: number
): AsyncGenerator<string> {
  if (currentDepth > maxDepth) {
    return;
  }

  let entries;
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    // Unreadable directories are skipped, anything else propagates
    if (error instanceof Error && 'code' in error && (error.code === 'EACCES' || error.code === 'EPERM')) {
      return;
    }
    throw error;
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    if (entry.isSymbolicLink() || isJunk(entry.name)) {
      continue;
    }

    const fullPath = join(dir, entry.name);
    const isDirectory = entry.isDirectory();

    if (filter && !filter(fullPath, isDirectory)) {
      continue;
    }

    if (isDirectory) {
      yield* walkFilesInternal(fullPath, filter, maxDepth, currentDepth + 1);
    } else if (entry.isFile()) {
      yield fullPath;
    }
  }
}

/**
 * Walk directory with include/exclude minimatch patterns. Yields paths
 * relative to `dir`, with forward slashes.
 */
export async function* walkWithPatterns(
  dir: string,
  includePatterns: string[] = ['**/*'],
  excludePatterns: string[] = []
): AsyncGenerator<string> {
  const filter: FileFilter = (path: string, isDirectory: boolean) => {
    const relativePath = toPosix(relative(dir, path));

    if (isDirectory) {
      // Excluded directories are pruned; everything else is traversed
      return !excludePatterns.some(pattern => minimatch(relativePath, pattern, { dot: true }));
    }

    if (excludePatterns.some(pattern => minimatch(relativePath, pattern, { dot: true }))) {
      return false;
    }

    return includePatterns.some(pattern => minimatch(relativePath, pattern, { dot: true }));
  };

  for await (const path of walkFiles(dir, { filter })) {
    yield toPosix(relative(dir, path));
  }
}

/**
 * Expand one glob pattern below `dir` into sorted, relative file paths.
 */
export async function expandGlob(dir: string, pattern: string, excludePatterns: string[] = []): Promise<string[]> {
  const matches: string[] = [];
  for await (const path of walkWithPatterns(dir, [pattern], excludePatterns)) {
    matches.push(path);
  }
  return matches;
}

export function isGlobPattern(value: string): boolean {
  return /[*?[\]{}]/.test(value);
}
