import { posix } from 'path';
import { NINJA } from '../../constants/index.js';
import { relativeTo } from '../../utils/paths.js';
import { AliasNode, ValueNode, type BuildStep, type Node } from '../node.js';
import type { Project } from '../project.js';
import { PathToken, type CommandToken } from '../subst.js';

export interface GeneratedFile {
  /** Path relative to the output directory */
  path: string;
  content: string;
  /** Leave an existing file alone when its content is already identical */
  onlyIfChanged?: boolean;
}

/**
 * Renders a resolved project. Generators never write; `generate()` writes
 * once every generator has rendered successfully.
 */
export interface Generator {
  readonly name: string;
  render(project: Project, outputDir: string): GeneratedFile[];
}

/**
 * Every build step once, in node creation order.
 */
export function collectBuildSteps(project: Project): BuildStep[] {
  const steps: BuildStep[] = [];
  const seen = new Set<BuildStep>();
  for (const node of project.registry.all()) {
    const step = node.producer;
    if (step && !seen.has(step)) {
      seen.add(step);
      steps.push(step);
    }
  }
  return steps;
}

/**
 * File a value node is materialized as, relative to the output directory.
 * Characters outside `[A-Za-z0-9_.-]` are percent-encoded, so distinct names
 * never share a file.
 */
export function valueFilePath(node: ValueNode): string {
  let file = node.name.replace(/[^A-Za-z0-9_.-]/gu, percentEncode);
  if (/^\.*$/.test(file)) file = file.replace(/\./g, percentEncode);
  return posix.join(NINJA.VALUES_DIR, file);
}

function percentEncode(char: string): string {
  return [...Buffer.from(char, 'utf8')].map(byte => `%${byte.toString(16).toUpperCase().padStart(2, '0')}`).join('');
}

/**
 * How a node is named in generated output: a path relative to the output
 * directory, or the alias name.
 */
export function nodePath(node: Node, project: Project, outputDir: string): string {
  if (node instanceof ValueNode) return valueFilePath(node);
  if (node instanceof AliasNode) return node.name;
  return relativeTo(node.identity, project.rootDir, outputDir);
}

/**
 * Rewrite path tokens relative to the output directory; plain tokens are
 * returned as they are.
 */
export function relativizeToken(token: CommandToken, project: Project, outputDir: string): string {
  if (token instanceof PathToken) {
    return `${token.prefix}${relativeTo(token.path, project.rootDir, outputDir)}${token.suffix}`;
  }
  return token;
}

export function sanitizeName(name: string): string {
  return name.replace(/[^A-Za-z0-9_]/g, '_');
}
