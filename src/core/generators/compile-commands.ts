import { FILE_PATTERNS } from '../../constants/index.js';
import { bindStepVariables, expandStepCommand, stepBindings } from '../commands.js';
import type { Project } from '../project.js';
import { tokenText, toShellCommand } from '../subst.js';
import { collectBuildSteps, type GeneratedFile, type Generator } from './generator.js';

export interface CompileCommandEntry {
  directory: string;
  file: string;
  arguments: string[];
  command: string;
  output: string;
}

/**
 * Compilation database for editors and language servers. Paths in
 * `arguments` are relative to `directory`, the project root.
 */
export class CompileCommandsGenerator implements Generator {
  readonly name = 'compile-commands';

  entries(project: Project): CompileCommandEntry[] {
    const entries: CompileCommandEntry[] = [];
    for (const step of collectBuildSteps(project)) {
      if (step.action !== 'compile') continue;
      const args = bindStepVariables(expandStepCommand(step), stepBindings(step)).map(tokenText);
      for (const source of step.sources) {
        entries.push({
          directory: project.rootDir,
          file: source.identity,
          arguments: args,
          command: toShellCommand(args),
          output: step.outputs[0]?.identity ?? ''
        });
      }
    }
    return entries;
  }

  render(project: Project): GeneratedFile[] {
    return [
      {
        path: FILE_PATTERNS.COMPILE_COMMANDS,
        content: `${JSON.stringify(this.entries(project), null, 2)}\n`
      }
    ];
  }
}
