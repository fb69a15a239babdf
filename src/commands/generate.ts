import { Command } from 'commander';
import { relative, resolve } from 'path';
import pc from 'picocolors';
import { generate } from '../core/generate.js';
import { withErrorHandling } from '../utils/errors.js';
import { globalOptions, loadProjectFromArgs, printWarnings } from './shared.js';

interface GenerateCommandOptions {
  out?: string;
  compileCommands?: boolean;
  graph?: boolean;
}

export function setupGenerateCommand(program: Command): void {
  program
    .command('generate')
    .alias('gen')
    .argument('[description]', 'build description file (default: first buildweave.yml / buildweave.build.json found)')
    .description('Resolve a build description and write build.ninja')
    .option('-o, --out <dir>', 'directory to write build files to (default: the project root)')
    .option('--compile-commands', 'also write compile_commands.json')
    .option('--graph', 'also write the target graph as targets.mmd')
    .action(
      withErrorHandling(async (description: string | undefined, options: GenerateCommandOptions, command: Command) => {
        const global = globalOptions(command);
        const cwd = resolve(global.cwd ?? process.cwd());
        const project = await loadProjectFromArgs(description, global);
        const outputDir = options.out ? resolve(cwd, options.out) : project.rootDir;
        const result = await generate(project, outputDir, {
          compileCommands: options.compileCommands === true,
          graph: options.graph === true
        });

        printWarnings(result.report.warnings);
        for (const file of result.files) {
          console.log(`${pc.green('wrote')} ${relative(cwd, file) || file}`);
        }
        console.log(
          pc.dim(`${result.report.resolvedTargets.length} target(s), ${project.registry.size} node(s) in project '${project.name}'`)
        );
      })
    );
}
