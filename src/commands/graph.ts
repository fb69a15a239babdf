import { Command } from 'commander';
import { renderTargetGraph } from '../core/generators/mermaid.js';
import { withErrorHandling } from '../utils/errors.js';
import { globalOptions, loadProjectFromArgs, printWarnings } from './shared.js';

export function setupGraphCommand(program: Command): void {
  program
    .command('graph')
    .argument('[description]', 'build description file')
    .description('Print the target dependency graph as a Mermaid flowchart')
    .action(
      withErrorHandling(async (description: string | undefined, _options: unknown, command: Command) => {
        const project = await loadProjectFromArgs(description, globalOptions(command));
        printWarnings(project.resolve().warnings);
        process.stdout.write(renderTargetGraph(project));
      })
    );
}
