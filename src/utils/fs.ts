import { promises as fs, constants as fsConstants } from 'fs';
import { dirname, join, basename } from 'path';
import { parse as parseJsonc, printParseErrorCode, type ParseError } from 'jsonc-parser';
import { logger } from './logger.js';
import { FileSystemError } from './errors.js';

/**
 * File system utilities with proper error handling
 */

/**
 * Check if a file or directory exists
 */
export async function exists(path: string): Promise<boolean> {
  try {
    await fs.access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Recursively create directories
 */
export async function ensureDir(path: string): Promise<void> {
  try {
    await fs.mkdir(path, { recursive: true });
    logger.debug(`Directory located or created: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to locate or create directory: ${path}`, { path, error });
  }
}

/**
 * Read a file as text
 */
export async function readTextFile(path: string, encoding: BufferEncoding = 'utf8'): Promise<string> {
  try {
    return await fs.readFile(path, encoding);
  } catch (error) {
    throw new FileSystemError(`Failed to read file: ${path}`, { path, error });
  }
}

/**
 * Read a file as text, or undefined when it does not exist
 */
export async function readTextFileIfExists(path: string): Promise<string | undefined> {
  if (!(await exists(path))) {
    return undefined;
  }
  return readTextFile(path);
}

/**
 * Write text to a file through a sibling temp file and a rename, so readers
 * never observe a half-written file.
 */
export async function writeTextFileAtomic(path: string, content: string): Promise<void> {
  const tempPath = join(dirname(path), `.${basename(path)}.${process.pid}.tmp`);
  try {
    await ensureDir(dirname(path));
    await fs.writeFile(tempPath, content, 'utf8');
    await fs.rename(tempPath, path);
    logger.debug(`Wrote file: ${path}`);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw new FileSystemError(`Failed to write file: ${path}`, { path, error });
  }
}

/**
 * Read a JSON or JSONC file (auto-detect format) and parse it
 * Works with both standard JSON and JSONC (JSON with comments)
 */
export async function readJsonOrJsoncFile(path: string): Promise<unknown> {
  const content = await readTextFile(path);
  return parseJsonOrJsonc(content, path);
}

export function parseJsonOrJsonc(content: string, path: string): unknown {
  const errors: ParseError[] = [];
  const result: unknown = parseJsonc(content, errors, { allowTrailingComma: true });
  if (errors.length > 0 || result === undefined) {
    const first = errors[0];
    const reason = first ? `${printParseErrorCode(first.error)} at offset ${first.offset}` : 'empty document';
    throw new FileSystemError(`Failed to parse JSON/JSONC file: ${path}: ${reason}`, { path });
  }
  return result;
}
