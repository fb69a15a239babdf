#!/usr/bin/env node

import { Command } from 'commander';
import { constants, realpathSync } from 'fs';
import fs from 'fs/promises';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { setupGenerateCommand } from './commands/generate.js';
import { setupGraphCommand } from './commands/graph.js';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';

/**
 * buildweave CLI - main entry point
 *
 * Turns a declarative build description into build.ninja.
 */

const program = new Command();

program
  .name('buildweave')
  .description('Generate Ninja build files from a declarative C/C++ build description')
  .version(getVersion())
  .option('--cwd <dir>', 'directory to look for the build description in')
  .option('-v, --verbose', 'log resolution details');

setupGenerateCommand(program);
setupGraphCommand(program);

program.hook('preAction', async () => {
  const opts = program.opts();
  if (typeof opts.cwd !== 'string') {
    logger.debug(`Working directory: ${process.cwd()}`);
    return;
  }

  const resolvedCwd = path.resolve(process.cwd(), opts.cwd);
  try {
    const stats = await fs.stat(resolvedCwd);
    if (!stats.isDirectory()) {
      throw new Error(`'${opts.cwd}' is not a directory`);
    }
    await fs.access(resolvedCwd, constants.R_OK);
  } catch (err) {
    const errMsg = err instanceof Error ? err.message : String(err);
    logger.error('Invalid --cwd provided', { error: errMsg, cwd: opts.cwd });
    console.error(`Invalid --cwd '${opts.cwd}': ${errMsg}`);
    process.exit(1);
  }
});

process.on('uncaughtException', error => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('An unexpected error occurred. Run with BUILDWEAVE_VERBOSE=1 for details.');
  process.exit(1);
});

process.on('unhandledRejection', reason => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('An unexpected error occurred. Run with BUILDWEAVE_VERBOSE=1 for details.');
  process.exit(1);
});

export async function run(argv: string[] = process.argv): Promise<void> {
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }
  await program.parseAsync(argv);
}

/**
 * True when this module is the entry point, including when it is reached
 * through the symlink npm installs for `bin`.
 */
function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isMainModule()) {
  run().catch(error => {
    logger.error('Fatal error in main execution', { error });
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
}

export { program };
