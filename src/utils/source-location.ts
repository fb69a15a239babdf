import { dirname, sep } from 'path';
import { fileURLToPath } from 'url';
import type { SourceLocation } from '../types/index.js';

const LIBRARY_ROOT = dirname(dirname(fileURLToPath(import.meta.url)));

// "    at fn (file:///a/b.ts:10:5)" or "    at /a/b.ts:10:5"
const FRAME_PATTERN = /\(?((?:file:\/\/)?[^\s()]+):(\d+):(\d+)\)?\s*$/;

function isLibraryFrame(file: string): boolean {
  return file.startsWith(LIBRARY_ROOT + sep) || file.startsWith('node:') || file.includes(`${sep}node_modules${sep}`);
}

/**
 * First stack frame outside this library: the line of the build description
 * that declared a node, target or environment.
 */
export function getCallerLocation(): SourceLocation | undefined {
  const stack = new Error().stack;
  if (!stack) {
    return undefined;
  }

  for (const line of stack.split('\n').slice(1)) {
    const match = FRAME_PATTERN.exec(line.trim());
    if (!match) continue;
    const raw = match[1];
    const file = raw.startsWith('file://') ? fileURLToPath(raw) : raw;
    if (isLibraryFrame(file)) continue;
    return { file, line: Number(match[2]), column: Number(match[3]) };
  }

  return undefined;
}
