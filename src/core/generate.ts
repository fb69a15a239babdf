import { join, resolve } from 'path';
import type { GenerateOptions } from '../types/index.js';
import { readTextFileIfExists, writeTextFileAtomic } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { CompileCommandsGenerator } from './generators/compile-commands.js';
import type { GeneratedFile, Generator } from './generators/generator.js';
import { MermaidGenerator } from './generators/mermaid.js';
import { NinjaGenerator } from './generators/ninja.js';
import type { Project } from './project.js';
import type { ResolutionReport } from './resolver/index.js';

export interface GenerateResult {
  /** Absolute paths of the files written */
  files: string[];
  /** Files left alone because their content was already current */
  unchanged: string[];
  report: ResolutionReport;
}

export function generatorsFor(options: GenerateOptions = {}): Generator[] {
  const generators: Generator[] = [new NinjaGenerator()];
  if (options.compileCommands) generators.push(new CompileCommandsGenerator());
  if (options.graph) generators.push(new MermaidGenerator());
  return generators;
}

/**
 * Resolve the project and write its build files into `outputDir`.
 *
 * Every generator renders before anything is written, so a resolution or
 * rendering error leaves the output directory untouched.
 */
export async function generate(
  project: Project,
  outputDir: string = project.rootDir,
  options: GenerateOptions = {},
  generators: Generator[] = generatorsFor(options)
): Promise<GenerateResult> {
  const outDir = resolve(project.rootDir, outputDir);
  const report = project.resolve();

  const rendered: GeneratedFile[] = [];
  for (const generator of generators) {
    const files = generator.render(project, outDir);
    logger.debug(`Generator '${generator.name}' rendered ${files.length} file(s)`);
    rendered.push(...files);
  }

  const files: string[] = [];
  const unchanged: string[] = [];
  for (const file of rendered) {
    const path = join(outDir, file.path);
    if (file.onlyIfChanged && (await readTextFileIfExists(path)) === file.content) {
      unchanged.push(path);
      continue;
    }
    await writeTextFileAtomic(path, file.content);
    files.push(path);
  }

  logger.info(`Wrote ${files.length} file(s) to ${outDir}`);
  return { files, unchanged, report };
}
