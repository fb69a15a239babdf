import { BuildweaveError, ErrorCodes, CommandResult, formatLocation, type SourceLocation } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Error classes raised while describing, resolving and generating a build
 */

export class SubstitutionError extends BuildweaveError {
  constructor(message: string, origin?: SourceLocation, code: string = ErrorCodes.SUBSTITUTION_ERROR, details?: Record<string, unknown>) {
    super(message, code, details, origin);
    this.name = 'SubstitutionError';
  }
}

export class MissingVariableError extends SubstitutionError {
  readonly variable: string;

  constructor(variable: string, origin?: SourceLocation) {
    super(`undefined variable: $${variable}`, origin, ErrorCodes.MISSING_VARIABLE, { variable });
    this.name = 'MissingVariableError';
    this.variable = variable;
  }
}

export class CircularReferenceError extends SubstitutionError {
  readonly chain: string[];

  constructor(chain: string[], origin?: SourceLocation) {
    super(`circular variable reference: ${chain.join(' -> ')}`, origin, ErrorCodes.CIRCULAR_REFERENCE, { chain });
    this.name = 'CircularReferenceError';
    this.chain = chain;
  }
}

export class DependencyCycleError extends BuildweaveError {
  readonly cycle: string[];

  constructor(cycle: string[], origin?: SourceLocation) {
    super(`dependency cycle: ${cycle.join(' -> ')}`, ErrorCodes.DEPENDENCY_CYCLE, { cycle }, origin);
    this.name = 'DependencyCycleError';
    this.cycle = cycle;
  }
}

export class MissingSourceError extends BuildweaveError {
  readonly path: string;

  constructor(path: string, origin?: SourceLocation) {
    super(`source file not found: ${path}`, ErrorCodes.MISSING_SOURCE, { path }, origin);
    this.name = 'MissingSourceError';
    this.path = path;
  }
}

/**
 * The toolchain knows how to build a suffix but the environment lacks the tool.
 */
export class MissingToolError extends BuildweaveError {
  readonly tool: string;
  readonly suffix: string;

  constructor(tool: string, suffix: string, origin?: SourceLocation) {
    super(
      `tool '${tool}' required for '${suffix}' sources is not configured in the environment`,
      ErrorCodes.MISSING_TOOL,
      { tool, suffix },
      origin
    );
    this.name = 'MissingToolError';
    this.tool = tool;
    this.suffix = suffix;
  }
}

export class NoSourceHandlerError extends BuildweaveError {
  readonly suffix: string;

  constructor(path: string, suffix: string, toolchain: string | undefined, origin?: SourceLocation) {
    const by = toolchain ? `toolchain '${toolchain}'` : 'an environment without a toolchain';
    super(`no tool handles '${suffix || '(no suffix)'}' sources (${path}) in ${by}`, ErrorCodes.NO_SOURCE_HANDLER, { path, suffix }, origin);
    this.name = 'NoSourceHandlerError';
    this.suffix = suffix;
  }
}

export class DuplicateTargetError extends BuildweaveError {
  constructor(name: string, existing?: SourceLocation, origin?: SourceLocation) {
    const where = existing ? ` (first defined at ${existing.file}${existing.line !== undefined ? `:${existing.line}` : ''})` : '';
    super(`target '${name}' already exists${where}`, ErrorCodes.DUPLICATE_TARGET, { name }, origin);
    this.name = 'DuplicateTargetError';
  }
}

export class DuplicateOutputError extends BuildweaveError {
  constructor(path: string, first: string, second: string, origin?: SourceLocation) {
    super(`output '${path}' is produced by both '${first}' and '${second}'`, ErrorCodes.DUPLICATE_OUTPUT, { path, first, second }, origin);
    this.name = 'DuplicateOutputError';
  }
}

export class TargetNotResolvedError extends BuildweaveError {
  constructor(name: string, property: string) {
    super(`target '${name}' has not been resolved; '${property}' is only available after project.resolve()`, ErrorCodes.TARGET_NOT_RESOLVED, { name, property });
    this.name = 'TargetNotResolvedError';
  }
}

export class NodeKindConflictError extends BuildweaveError {
  constructor(identity: string, existing: string, requested: string) {
    super(`'${identity}' is registered as ${existing}, not ${requested}`, ErrorCodes.NODE_KIND_CONFLICT, { identity, existing, requested });
    this.name = 'NodeKindConflictError';
  }
}

export class InvalidDescriptionError extends BuildweaveError {
  constructor(message: string, origin?: SourceLocation) {
    super(`Invalid build description: ${message}`, ErrorCodes.INVALID_DESCRIPTION, undefined, origin);
    this.name = 'InvalidDescriptionError';
  }
}

export class FileSystemError extends BuildweaveError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ConfigError extends BuildweaveError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

/**
 * Attach a declaration site to an error raised without one, e.g. a missing
 * variable found while expanding a target's command.
 */
export function withOrigin(error: unknown, origin: SourceLocation | undefined): unknown {
  if (origin && error instanceof BuildweaveError && !error.origin) {
    error.origin = origin;
    error.message = `${formatLocation(origin)}: ${error.message}`;
  }
  return error;
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof BuildweaveError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
