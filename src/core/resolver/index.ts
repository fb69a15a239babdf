import { posix } from 'path';
import { ConfigError, NoSourceHandlerError, withOrigin } from '../../utils/errors.js';
import { mergeFlags, mergeUnique } from '../../utils/flags.js';
import { logger } from '../../utils/logger.js';
import { expandStepCommand, expandStepText } from '../commands.js';
import { AliasNode, DirNode, FileNode, ValueNode, type BuildStep, type Node } from '../node.js';
import type { Project } from '../project.js';
import { PathToken } from '../subst.js';
import { collectEffectiveRequirements, COMPILED_KINDS, type Target } from '../target.js';
import { assertAcyclic, sortTargets } from './graph.js';
import { InstallFactory } from './install-factory.js';
import { ObjectFactory } from './object-factory.js';
import { OutputFactory } from './output-factory.js';
import { expandSources } from './sources.js';

export interface ResolutionReport {
  /** Targets resolved by this call, in resolution order */
  resolvedTargets: string[];
  /** Warnings raised since the previous report */
  warnings: string[];
}

/**
 * Turns declared targets into nodes with build steps.
 *
 * Phase A walks build targets leaves first, creating object and output
 * nodes. Phase B replays deferred operations (installs, alias members) that
 * need other targets' outputs. The resolver keeps its caches between calls,
 * so resolving again only handles what was declared since.
 */
export class Resolver {
  private readonly objects: ObjectFactory;
  private readonly outputs: OutputFactory;
  private readonly installs: InstallFactory;
  private reportedWarnings = 0;

  constructor(private readonly project: Project) {
    this.objects = new ObjectFactory(project);
    this.outputs = new OutputFactory(project);
    this.installs = new InstallFactory(project);
  }

  resolve(): ResolutionReport {
    const order = sortTargets(this.project.getTargets());
    const resolvedTargets: string[] = [];

    // Phase A
    for (const target of order) {
      if (target.isResolved || target.kind === 'install' || target.kind === 'install_as') continue;
      this.resolveTarget(target);
      resolvedTargets.push(target.name);
    }

    // Phase B
    for (const target of order) {
      if (target.isResolved || (target.kind !== 'install' && target.kind !== 'install_as')) continue;
      this.installs.resolve(target);
      resolvedTargets.push(target.name);
    }
    for (const { alias, targets } of this.project.takePendingAliases()) {
      for (const target of targets) {
        alias.addMembers(...target.outputNodes);
      }
    }

    assertAcyclic(this.project.registry.all());
    this.validateCommands();

    const warnings = this.project.warnings.slice(this.reportedWarnings);
    this.reportedWarnings = this.project.warnings.length;
    logger.info(`Resolved ${resolvedTargets.length} target(s), ${this.project.registry.size} node(s)`);

    return { resolvedTargets, warnings };
  }

  private resolveTarget(target: Target): void {
    if (target.kind === 'interface') {
      target.markResolved({ outputNodes: [], objectNodes: [], languages: [] });
      return;
    }

    if (target.kind === 'command') {
      expandSources(this.project, target.sources, target.origin);
      target.markResolved({ outputNodes: target.command?.outputs ?? [], objectNodes: [], languages: [] });
      return;
    }

    if (!COMPILED_KINDS.has(target.kind)) return;
    this.resolveCompiled(target);
  }

  private resolveCompiled(target: Target): void {
    const env = target.environment;
    if (!env) {
      throw withOrigin(new ConfigError(`target '${target.name}' has no environment`), target.origin);
    }

    const compilable: FileNode[] = [];
    const implicitDeps: Node[] = [];
    const orderOnlyDeps: Node[] = [];
    const headerSuffixes = env.toolchain?.headerSuffixes ?? [];

    for (const node of expandSources(this.project, target.sources, target.origin)) {
      if (node instanceof FileNode) {
        if (!headerSuffixes.includes(posix.extname(node.path))) {
          compilable.push(node);
        } else if (node.producer) {
          // Generated headers must exist before anything including them compiles
          orderOnlyDeps.push(node);
        }
      } else if (node instanceof ValueNode) {
        implicitDeps.push(node);
      } else if (node instanceof DirNode || node instanceof AliasNode) {
        orderOnlyDeps.push(node);
      }
    }

    if (compilable.length === 0) {
      this.project.warn(`${target.kind} '${target.name}' has no compilable sources; nothing will be built`, target.origin);
      target.markResolved({ outputNodes: [], objectNodes: [], languages: [] });
      return;
    }

    const toolchain = env.toolchain;
    if (!toolchain) {
      const first = compilable[0];
      throw new NoSourceHandlerError(first.path, posix.extname(first.path), undefined, target.origin);
    }

    const separated = toolchain.separatedArgFlags;
    const requirements = collectEffectiveRequirements(target, separated);
    const context = {
      target,
      environment: env,
      toolchain,
      includes: requirements.includeDirs.map(
        dir => new PathToken(this.project.registry.canonical(dir), toolchain.prefixes.include)
      ),
      defines: requirements.defines,
      flags: mergeFlags(requirements.compileFlags, toolchain.compileFlagsFor(target.kind), separated),
      implicitDeps,
      orderOnlyDeps
    };

    const objectNodes = mergeUnique<FileNode>([], compilable.map(source => this.objects.objectFor(context, source)));
    const languages = mergeUnique<string>(
      [],
      objectNodes.flatMap(object => (object.producer?.language ? [object.producer.language] : []))
    );

    const outputNodes = this.outputs.create({ target, environment: env, toolchain, objects: objectNodes, languages, requirements });
    target.markResolved({ outputNodes, objectNodes, languages });
    logger.debug(`Resolved ${target.kind} target '${target.name}': ${outputNodes.map(node => node.label).join(', ')}`);
  }

  /**
   * Expand every command once so missing variables and reference cycles
   * surface during resolution, with the declaring target's location.
   */
  private validateCommands(): void {
    const seen = new Set<BuildStep>();
    for (const node of this.project.registry.all()) {
      const step = node.producer;
      if (!step || seen.has(step)) continue;
      seen.add(step);
      expandStepCommand(step);
      expandStepText(step, step.description);
      expandStepText(step, step.depfile);
    }
  }
}
