import { join } from 'path';
import type { BuildweaveConfig, DuplicateNamePolicy } from '../types/index.js';
import { CONFIG_FILE_NAMES, DEFAULT_BUILD_DIR, DEFAULT_COPY_COMMAND } from '../constants/index.js';
import { exists, readJsonOrJsoncFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';

/**
 * Project configuration (buildweave.jsonc / buildweave.json at the project root).
 * Supports both JSON and JSONC formats; every key is optional.
 */

export interface ResolvedConfig {
  buildDir: string;
  toolchain?: string;
  vars: Record<string, string | string[]>;
  duplicateNames: DuplicateNamePolicy;
  copyCommand: string;
}

// Default configuration values
const DEFAULT_CONFIG: ResolvedConfig = {
  buildDir: DEFAULT_BUILD_DIR,
  vars: {},
  duplicateNames: 'rename',
  copyCommand: DEFAULT_COPY_COMMAND
};

export function resolveConfig(config: BuildweaveConfig = {}): ResolvedConfig {
  return {
    ...DEFAULT_CONFIG,
    ...config,
    vars: { ...DEFAULT_CONFIG.vars, ...(config.vars ?? {}) },
    buildDir: config.buildDir ?? DEFAULT_CONFIG.buildDir,
    duplicateNames: config.duplicateNames ?? DEFAULT_CONFIG.duplicateNames,
    copyCommand: config.copyCommand ?? DEFAULT_CONFIG.copyCommand
  };
}

/**
 * Find the existing config file (supports both .jsonc and .json)
 */
export async function findConfigFile(rootDir: string): Promise<string | undefined> {
  for (const fileName of CONFIG_FILE_NAMES) {
    const path = join(rootDir, fileName);
    if (await exists(path)) {
      return path;
    }
  }
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(raw: Record<string, unknown>, key: string, path: string): string | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || value === '') {
    throw new ConfigError(`${path}: '${key}' must be a non-empty string`, { path, key });
  }
  return value;
}

/**
 * Check the shape of a parsed config document.
 */
export function validateConfig(raw: unknown, path: string): BuildweaveConfig {
  if (!isRecord(raw)) {
    throw new ConfigError(`${path}: configuration must be an object`, { path });
  }

  const config: BuildweaveConfig = {
    buildDir: optionalString(raw, 'buildDir', path),
    toolchain: optionalString(raw, 'toolchain', path),
    copyCommand: optionalString(raw, 'copyCommand', path)
  };

  const duplicateNames = raw.duplicateNames;
  if (duplicateNames !== undefined) {
    if (duplicateNames !== 'rename' && duplicateNames !== 'error') {
      throw new ConfigError(`${path}: 'duplicateNames' must be 'rename' or 'error'`, { path, duplicateNames });
    }
    config.duplicateNames = duplicateNames;
  }

  const vars = raw.vars;
  if (vars !== undefined) {
    if (!isRecord(vars)) {
      throw new ConfigError(`${path}: 'vars' must be an object`, { path });
    }
    config.vars = {};
    for (const [name, value] of Object.entries(vars)) {
      if (typeof value === 'string') {
        config.vars[name] = value;
      } else if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
        config.vars[name] = value;
      } else {
        throw new ConfigError(`${path}: vars.${name} must be a string or a list of strings`, { path, name });
      }
    }
  }

  return config;
}

/**
 * Load the project configuration, or the defaults when there is no file.
 */
export async function loadConfig(rootDir: string): Promise<BuildweaveConfig> {
  const configPath = await findConfigFile(rootDir);
  if (!configPath) {
    logger.debug('Config file not found, using defaults');
    return {};
  }

  logger.debug(`Loading config from: ${configPath}`);
  try {
    return validateConfig(await readJsonOrJsoncFile(configPath), configPath);
  } catch (error) {
    if (error instanceof ConfigError) throw error;
    throw new ConfigError(`Failed to load configuration: ${error instanceof Error ? error.message : String(error)}`, {
      path: configPath
    });
  }
}
