import { posix } from 'path';
import type { SourceLocation } from '../types/index.js';
import type { BuilderSpec } from '../toolchains/toolchain.js';
import { ConfigError } from '../utils/errors.js';
import { flattenForOutput, replaceSuffix } from '../utils/paths.js';
import { getCallerLocation } from '../utils/source-location.js';
import type { Environment } from './environment.js';
import { FileNode, type BuildStep, type Node } from './node.js';
import type { CommandToken } from './subst.js';

export interface BuildOptions {
  /** Per-step variables, e.g. `{ extra_flags: ['-O3'] }` */
  vars?: Readonly<Record<string, readonly CommandToken[]>>;
  origin?: SourceLocation;
}

/**
 * A tool's builder, bound to one environment. The binding is plain data, so
 * moving an invocation to another environment is an explicit `rebind`.
 */
export class BuilderInvocation {
  constructor(
    public environment: Environment,
    readonly tool: string,
    readonly builder: string
  ) {}

  rebind(environment: Environment): this {
    this.environment = environment;
    return this;
  }

  get spec(): BuilderSpec {
    const spec = this.environment.tool(this.tool).builderSpec(this.builder);
    if (!spec) {
      throw new ConfigError(`tool '${this.tool}' has no builder '${this.builder}'`, {
        tool: this.tool,
        builder: this.builder
      });
    }
    return spec;
  }

  /**
   * Create produced file nodes. Single-source builders make one output per
   * source; the others make one output from all sources. Without an explicit
   * target, outputs go under the project's build directory.
   */
  build(target: string | undefined, sources: ReadonlyArray<string | Node>, options: BuildOptions = {}): FileNode[] {
    const spec = this.spec;
    const origin = options.origin ?? getCallerLocation();
    const registry = this.environment.project.registry;
    const sourceNodes = sources.map(source => (typeof source === 'string' ? registry.file(source, origin) : source));

    if (spec.singleSource && !(target !== undefined && sourceNodes.length === 1)) {
      return sourceNodes.map(source => this.createOutput(spec, this.defaultOutputPath(spec, source), [source], options, origin));
    }

    const first = sourceNodes[0];
    const outputPath = target ?? (first ? this.defaultOutputPath(spec, first) : undefined);
    if (outputPath === undefined) {
      throw new ConfigError(`builder '${this.tool}.${this.builder}' needs a target name or at least one source`);
    }
    return [this.createOutput(spec, outputPath, sourceNodes, options, origin)];
  }

  /** `<buildDir>/env.<environment>/...`, so clones never collide */
  private defaultOutputPath(spec: BuilderSpec, source: Node): string {
    const relative = flattenForOutput(replaceSuffix(source.label, spec.targetSuffix));
    const dir = posix.dirname(relative);
    const file = `${spec.targetPrefix ?? ''}${posix.basename(relative)}`;
    return posix.join(this.environment.project.buildDir, `env.${this.environment.name}`, dir, file);
  }

  private createOutput(
    spec: BuilderSpec,
    path: string,
    sources: Node[],
    options: BuildOptions,
    origin: SourceLocation | undefined
  ): FileNode {
    const output = this.environment.project.registry.file(path, origin);
    const step: BuildStep = {
      action: spec.action,
      environment: this.environment,
      tool: this.tool,
      commandVar: spec.commandVar,
      language: spec.language,
      sources,
      outputs: [output],
      variables: new Map(Object.entries(options.vars ?? {}).map(([name, tokens]) => [name, [...tokens]])),
      depfile: spec.depfile,
      deps: spec.deps,
      description: spec.description,
      origin
    };
    output.setProducer(step);
    return output;
  }
}
