import { posix } from 'path';
import type { Toolchain } from '../../toolchains/toolchain.js';
import { ConfigError } from '../../utils/errors.js';
import { STEP_VARIABLES } from '../../constants/index.js';
import type { Environment } from '../environment.js';
import type { BuildStep, FileNode, Node } from '../node.js';
import type { Project } from '../project.js';
import type { UsageRequirements } from '../requirements.js';
import { PathToken, type CommandToken } from '../subst.js';
import { linkDependencies, transitiveLanguages, type Target } from '../target.js';

export interface OutputContext {
  target: Target;
  environment: Environment;
  toolchain: Toolchain;
  objects: readonly FileNode[];
  languages: readonly string[];
  requirements: UsageRequirements;
}

/**
 * Creates the library or program file of a compiled target.
 */
export class OutputFactory {
  constructor(private readonly project: Project) {}

  create(context: OutputContext): Node[] {
    switch (context.target.kind) {
      case 'object':
        return [...context.objects];
      case 'static_library':
        return [this.archive(context)];
      case 'shared_library':
      case 'program':
        return [this.link(context)];
      default:
        return [];
    }
  }

  private outputPath(context: OutputContext): string {
    const { target, toolchain } = context;
    return posix.join(this.project.buildDir, target.outputName ?? toolchain.outputName(target.kind, target.name));
  }

  private createStep(
    context: OutputContext,
    tool: string,
    builder: string,
    inputs: Node[],
    variables: Map<string, CommandToken[]>
  ): FileNode {
    const { target, environment } = context;
    const spec = environment.tool(tool).builderSpec(builder);
    if (!spec) {
      throw new ConfigError(`tool '${tool}' has no builder '${builder}'`, { tool, builder });
    }

    const output = this.project.registry.file(this.outputPath(context), target.origin);
    const step: BuildStep = {
      action: spec.action,
      environment,
      tool,
      commandVar: spec.commandVar,
      language: spec.language,
      sources: inputs,
      outputs: [output],
      variables,
      depfile: spec.depfile,
      deps: spec.deps,
      description: spec.description,
      target: target.name,
      origin: target.origin
    };
    output.setProducer(step);
    return output;
  }

  private archive(context: OutputContext): FileNode {
    const { tool, builder } = context.toolchain.archiver();
    return this.createStep(context, tool, builder, [...context.objects], new Map());
  }

  /**
   * Link objects with every linked library, dependents first so that
   * single-pass linkers resolve symbols.
   */
  private link(context: OutputContext): FileNode {
    const { target, toolchain, requirements } = context;
    const dependencies = linkDependencies(target);

    const inputs: Node[] = [...context.objects];
    const orderOnly: Node[] = [];
    for (const dependency of dependencies) {
      switch (dependency.kind) {
        case 'static_library':
        case 'shared_library':
          inputs.push(...dependency.outputNodes);
          break;
        case 'object':
          inputs.push(...dependency.objectNodes);
          break;
        default:
          orderOnly.push(...dependency.outputNodes);
      }
    }

    const prefixes = toolchain.prefixes;
    const variables = new Map<string, CommandToken[]>();
    if (requirements.linkFlags.length > 0) {
      variables.set(STEP_VARIABLES.LDFLAGS, [...requirements.linkFlags]);
    }
    if (requirements.linkDirs.length > 0) {
      variables.set(
        STEP_VARIABLES.LIBDIRS,
        requirements.linkDirs.map(dir => new PathToken(this.project.registry.canonical(dir), prefixes.libDir))
      );
    }
    if (requirements.linkLibs.length > 0) {
      variables.set(STEP_VARIABLES.LIBS, requirements.linkLibs.map(lib => `${prefixes.lib}${lib}`));
    }

    const { tool, builder } = toolchain.linker(target.kind, transitiveLanguages(target, context.languages));
    const output = this.createStep(context, tool, builder, inputs, variables);
    return output.orderAfter(...orderOnly);
  }
}
