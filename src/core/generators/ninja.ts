import { FILE_PATTERNS, NINJA } from '../../constants/index.js';
import { logger } from '../../utils/logger.js';
import { expandStepCommand, expandStepText } from '../commands.js';
import { AliasNode, DirNode, ValueNode, type BuildStep, type Node } from '../node.js';
import { nextFreeName, type Project } from '../project.js';
import { PathToken, quoteForShell, type CommandToken } from '../subst.js';
import { Target } from '../target.js';
import {
  collectBuildSteps,
  nodePath,
  relativizeToken,
  sanitizeName,
  valueFilePath,
  type GeneratedFile,
  type Generator
} from './generator.js';

/**
 * Escape a path for a build or default line.
 */
export function escapeNinjaPath(path: string): string {
  return path.replace(/\$/g, '$$$$').replace(/ /g, '$$ ').replace(/:/g, '$$:');
}

/**
 * Escape a literal for a variable value.
 */
export function escapeNinjaValue(value: string): string {
  return value.replace(/\$/g, '$$$$');
}

const EXECUTOR_VARIABLE = /\$\{?[A-Za-z_][A-Za-z0-9_]*\}?/g;

/**
 * Text of a rule command token. Command templates are shell text, so plain
 * words (`>`, `&&`) pass through; paths and words holding whitespace are
 * quoted. Executor variables stay bare so `$in` can expand to several
 * arguments.
 */
function ruleToken(token: CommandToken, project: Project, outputDir: string): string {
  const text = relativizeToken(token, project, outputDir);
  if (!(token instanceof PathToken) && !/\s/.test(text)) {
    return text;
  }
  const literal = text.replace(EXECUTOR_VARIABLE, '');
  if (literal === '' || quoteForShell(literal) === literal) {
    return text;
  }
  return quoteForShell(text);
}

interface Rule {
  name: string;
  command: string;
  description?: string;
  depfile?: string;
  deps?: string;
}

class NinjaWriter {
  private readonly lines: string[] = [];

  comment(text: string): this {
    this.lines.push(`# ${text}`);
    return this;
  }

  variable(key: string, value: string, indent = 0): this {
    this.lines.push(`${'  '.repeat(indent)}${key} = ${value}`);
    return this;
  }

  rule(rule: Rule): this {
    this.lines.push(`rule ${rule.name}`);
    this.variable('command', rule.command, 1);
    if (rule.description) this.variable('description', rule.description, 1);
    if (rule.depfile) this.variable('depfile', rule.depfile, 1);
    if (rule.deps) this.variable('deps', rule.deps, 1);
    return this.newline();
  }

  build(outputs: string[], rule: string, inputs: string[] = [], implicit: string[] = [], orderOnly: string[] = []): this {
    let line = `build ${outputs.join(' ')}: ${rule}`;
    if (inputs.length > 0) line += ` ${inputs.join(' ')}`;
    if (implicit.length > 0) line += ` | ${implicit.join(' ')}`;
    if (orderOnly.length > 0) line += ` || ${orderOnly.join(' ')}`;
    this.lines.push(line);
    return this;
  }

  defaults(paths: string[]): this {
    this.lines.push(`default ${paths.join(' ')}`);
    return this;
  }

  newline(): this {
    this.lines.push('');
    return this;
  }

  toString(): string {
    return `${this.lines.join('\n').replace(/\n+$/, '')}\n`;
  }
}

/**
 * What a rule stands for: the copy action, one command target, or one
 * tool command in one environment.
 */
function ruleIdentity(step: BuildStep): string {
  switch (step.action) {
    case 'copy':
      return 'copy';
    case 'command':
      return `command\0${step.target ?? step.outputs[0]?.identity ?? ''}`;
    default:
      return ['tool', step.tool, step.commandVar ?? 'cmd', step.environment?.name ?? ''].join('\0');
  }
}

function uniqueNodes(nodes: Iterable<Node>, exclude: readonly Node[] = []): Node[] {
  const result: Node[] = [];
  for (const node of nodes) {
    if (!exclude.includes(node) && !result.includes(node)) result.push(node);
  }
  return result;
}

/**
 * Writes build.ninja. Each environment gets its own rules, named
 * `<tool>_<commandVar>_<environment>`; target-specific flags are per-step
 * variables on the build statements.
 */
export class NinjaGenerator implements Generator {
  readonly name = 'ninja';

  render(project: Project, outputDir: string): GeneratedFile[] {
    const path = (node: Node) => escapeNinjaPath(nodePath(node, project, outputDir));
    const steps = collectBuildSteps(project);

    // Keyed by the unsanitized identity; names that sanitize alike get a suffix
    const rules = new Map<string, Rule>();
    const ruleNames = new Map<string, string>();
    const stepRules = new Map<BuildStep, string>();
    for (const step of steps) {
      const identity = ruleIdentity(step);
      let name = ruleNames.get(identity);
      if (name === undefined) {
        const rule = this.ruleFor(step, project, outputDir);
        name = nextFreeName(rule.name, candidate => rules.has(candidate));
        ruleNames.set(identity, name);
        rules.set(name, { ...rule, name });
      }
      stepRules.set(step, name);
    }

    const writer = new NinjaWriter()
      .comment(`Build file for project '${project.name}'`)
      .comment('Generated by buildweave; changes will be overwritten.')
      .newline()
      .variable('ninja_required_version', NINJA.REQUIRED_VERSION)
      .newline();

    for (const rule of rules.values()) {
      writer.rule(rule);
    }

    for (const step of steps) {
      const implicit = uniqueNodes(
        step.outputs.flatMap(output => [...output.explicitDeps, ...output.implicitDeps]),
        [...step.sources, ...step.outputs]
      );
      const orderOnly = uniqueNodes(step.outputs.flatMap(output => output.orderOnlyDeps), step.outputs);
      writer.build(
        step.outputs.map(path),
        stepRules.get(step) ?? NINJA.PHONY,
        step.sources.map(path),
        implicit.map(path),
        orderOnly.map(path)
      );
      for (const [name, tokens] of step.variables) {
        const value = tokens.map(token => escapeNinjaValue(quoteForShell(relativizeToken(token, project, outputDir))));
        writer.variable(name, value.join(' '), 1);
      }
      writer.newline();
    }

    const nodes = project.registry.all();
    const phonyNames = new Set<string>();
    for (const node of nodes) {
      if ((node instanceof DirNode && node.role === 'target') || node instanceof AliasNode) {
        const name = nodePath(node, project, outputDir);
        phonyNames.add(name);
        writer.build([path(node)], NINJA.PHONY, node.members.map(path));
      }
    }

    for (const target of project.getTargets()) {
      if (!target.isResolved || target.outputNodes.length === 0) continue;
      const outputs = target.outputNodes.map(node => nodePath(node, project, outputDir));
      if (outputs.includes(target.name) || phonyNames.has(target.name)) continue;
      phonyNames.add(target.name);
      writer.build([escapeNinjaPath(target.name)], NINJA.PHONY, outputs.map(escapeNinjaPath));
    }

    const defaults = project.defaults.flatMap(item =>
      item instanceof Target ? (item.isResolved ? item.outputNodes.map(path) : []) : [path(item)]
    );
    if (defaults.length > 0) {
      writer.newline().defaults(defaults);
    }

    logger.debug(`Rendered ${rules.size} rule(s) and ${steps.length} build statement(s)`);

    const files: GeneratedFile[] = [{ path: FILE_PATTERNS.BUILD_NINJA, content: writer.toString() }];
    for (const node of nodes) {
      if (node instanceof ValueNode) {
        files.push({ path: valueFilePath(node), content: node.value, onlyIfChanged: true });
      }
    }
    return files;
  }

  private ruleFor(step: BuildStep, project: Project, outputDir: string): Rule {
    const command = expandStepCommand(step)
      .map(token => ruleToken(token, project, outputDir))
      .join(' ');
    const description = expandStepText(step, step.description);
    const depfile = expandStepText(step, step.depfile);

    let name: string;
    switch (step.action) {
      case 'copy':
        name = NINJA.COPY_RULE;
        break;
      case 'command':
        name = sanitizeName(`command_${step.target ?? step.outputs[0]?.label ?? 'step'}`);
        break;
      default:
        name = sanitizeName(`${step.tool}_${step.commandVar ?? 'cmd'}_${step.environment?.name ?? 'global'}`);
    }

    return { name, command, description, depfile, deps: step.deps };
  }
}
