import { Command } from 'commander';
import { resolve } from 'path';
import pc from 'picocolors';
import { findDescriptionFile, loadDescription } from '../core/description/loader.js';
import type { Project } from '../core/project.js';
import { InvalidDescriptionError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { LogLevel } from '../types/index.js';

export interface GlobalOptions {
  cwd?: string;
  verbose?: boolean;
}

/**
 * Options of the root program, reachable from any subcommand.
 */
export function globalOptions(command: Command): GlobalOptions {
  let root = command;
  while (root.parent) root = root.parent;
  const opts = { ...root.opts(), ...command.opts() };
  return {
    cwd: typeof opts.cwd === 'string' ? opts.cwd : undefined,
    verbose: opts.verbose === true
  };
}

/**
 * Load the description named on the command line, or the first description
 * file found in the working directory.
 */
export async function loadProjectFromArgs(description: string | undefined, options: GlobalOptions): Promise<Project> {
  if (options.verbose) logger.setLevel(LogLevel.DEBUG);
  const cwd = resolve(options.cwd ?? process.cwd());
  const file = description ? resolve(cwd, description) : await findDescriptionFile(cwd);
  if (!file) {
    throw new InvalidDescriptionError(`no build description found in ${cwd}`, { file: cwd });
  }
  return loadDescription(file);
}

export function printWarnings(warnings: readonly string[]): void {
  for (const warning of warnings) {
    console.error(`${pc.yellow('warning:')} ${warning}`);
  }
}
