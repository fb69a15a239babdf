import { isAbsolute, posix, relative, resolve, win32 } from 'path';

/**
 * Path helpers shared by the node registry and the generators.
 *
 * Nodes store canonical paths: relative to the project root when the file is
 * inside it, absolute otherwise, always with forward slashes.
 */

export function toPosix(path: string): string {
  return path.split(win32.sep).join(posix.sep);
}

export function canonicalPath(path: string, rootDir: string): string {
  const posixPath = toPosix(path);
  if (isAbsolute(path) || win32.isAbsolute(path)) {
    const rel = toPosix(relative(rootDir, path));
    if (rel !== '' && !rel.startsWith('..') && !isAbsolute(rel)) {
      return posix.normalize(rel);
    }
    return posix.normalize(posixPath);
  }
  const normalized = posix.normalize(posixPath);
  return normalized === '.' ? '.' : normalized.replace(/\/$/, '');
}

/**
 * Absolute location of a canonical path.
 */
export function absolutePath(canonical: string, rootDir: string): string {
  return resolve(rootDir, canonical);
}

/**
 * Canonical path as seen from the directory the build file is written to.
 */
export function relativeTo(canonical: string, rootDir: string, outputDir: string): string {
  const rel = toPosix(relative(outputDir, absolutePath(canonical, rootDir)));
  return rel === '' ? '.' : rel;
}

/**
 * Replace the extension of the last path segment ("src/a.c" -> "src/a.o").
 */
export function replaceSuffix(path: string, suffix: string): string {
  const ext = posix.extname(path);
  return (ext ? path.slice(0, -ext.length) : path) + suffix;
}

/**
 * Turn a canonical path into something that can live below another
 * directory: parent references and absolute roots become plain segments.
 */
export function flattenForOutput(path: string): string {
  return path
    .replace(/^[A-Za-z]:/, '')
    .split('/')
    .filter(segment => segment !== '' && segment !== '.')
    .map(segment => (segment === '..' ? '__' : segment))
    .join('/');
}
