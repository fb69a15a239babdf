/**
 * Common types and interfaces for buildweave
 */

/**
 * Where something was declared, for file:line style diagnostics.
 */
export interface SourceLocation {
  file: string;
  line?: number;
  column?: number;
  /** Extra context, e.g. `targets[2]` inside a description file */
  detail?: string;
}

export function formatLocation(location: SourceLocation): string {
  let text = location.file;
  if (location.line !== undefined) {
    text += `:${location.line}`;
    if (location.column !== undefined) {
      text += `:${location.column}`;
    }
  }
  if (location.detail) {
    text += ` (${location.detail})`;
  }
  return text;
}

// Project configuration (buildweave.jsonc)

export type DuplicateNamePolicy = 'rename' | 'error';

export interface BuildweaveConfig {
  buildDir?: string;
  toolchain?: string;
  vars?: Record<string, string | string[]>;
  duplicateNames?: DuplicateNamePolicy;
  copyCommand?: string;
}

// Command option / result types

export interface GenerateOptions {
  /** Write compile_commands.json next to build.ninja */
  compileCommands?: boolean;
  /** Write targets.mmd next to build.ninja */
  graph?: boolean;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class BuildweaveError extends Error {
  public code: string;
  public details?: Record<string, unknown>;
  public origin?: SourceLocation;

  constructor(message: string, code: string, details?: Record<string, unknown>, origin?: SourceLocation) {
    super(origin ? `${formatLocation(origin)}: ${message}` : message);
    this.name = 'BuildweaveError';
    this.code = code;
    this.details = details;
    this.origin = origin;
  }
}

export enum ErrorCodes {
  SUBSTITUTION_ERROR = 'SUBSTITUTION_ERROR',
  MISSING_VARIABLE = 'MISSING_VARIABLE',
  CIRCULAR_REFERENCE = 'CIRCULAR_REFERENCE',
  DEPENDENCY_CYCLE = 'DEPENDENCY_CYCLE',
  MISSING_SOURCE = 'MISSING_SOURCE',
  MISSING_TOOL = 'MISSING_TOOL',
  NO_SOURCE_HANDLER = 'NO_SOURCE_HANDLER',
  DUPLICATE_TARGET = 'DUPLICATE_TARGET',
  DUPLICATE_OUTPUT = 'DUPLICATE_OUTPUT',
  TARGET_NOT_RESOLVED = 'TARGET_NOT_RESOLVED',
  NODE_KIND_CONFLICT = 'NODE_KIND_CONFLICT',
  INVALID_DESCRIPTION = 'INVALID_DESCRIPTION',
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
