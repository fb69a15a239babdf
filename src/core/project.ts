import { posix, resolve as resolvePath } from 'path';
import { formatLocation, type BuildweaveConfig, type SourceLocation } from '../types/index.js';
import { DuplicateTargetError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { getCallerLocation } from '../utils/source-location.js';
import { resolveConfig, type ResolvedConfig } from './config.js';
import { Environment, type EnvironmentOptions } from './environment.js';
import { NodeRegistry } from './node-registry.js';
import type { AliasNode, BuildStep, DepsStyle, DirNode, DirRole, FileNode, Node, ValueNode } from './node.js';
import { Resolver, type ResolutionReport } from './resolver/index.js';
import type { CommandToken } from './subst.js';
import { Target, type InstallSource, type SourceRef, type TargetKind } from './target.js';

export interface ProjectOptions {
  /** Directory relative paths are resolved against (default: cwd) */
  rootDir?: string;
  config?: BuildweaveConfig;
}

export interface CommandTargetSpec {
  /** Command template; `$$in` and `$$out` are the step's inputs and outputs */
  command: string | readonly CommandToken[];
  outputs: readonly string[];
  sources?: readonly SourceRef[];
  description?: string;
  depfile?: string;
  deps?: DepsStyle;
}

interface PendingAlias {
  alias: AliasNode;
  targets: Target[];
}

/**
 * `base`, or the first of `base_2`, `base_3`, ... not yet taken.
 */
export function nextFreeName(base: string, taken: (name: string) => boolean): string {
  if (!taken(base)) return base;
  let counter = 2;
  while (taken(`${base}_${counter}`)) counter++;
  return `${base}_${counter}`;
}

/**
 * Everything one build description declares: nodes, environments, targets,
 * aliases and defaults. Projects share no state with each other.
 */
export class Project {
  readonly name: string;
  readonly rootDir: string;
  readonly config: ResolvedConfig;
  readonly registry: NodeRegistry;
  private readonly environments: Environment[] = [];
  private readonly targets = new Map<string, Target>();
  private readonly pendingAliases: PendingAlias[] = [];
  private readonly defaultItems: Array<Target | Node> = [];
  private readonly warningList: string[] = [];
  private readonly resolver: Resolver;

  constructor(name: string, options: ProjectOptions = {}) {
    this.name = name;
    this.rootDir = resolvePath(options.rootDir ?? process.cwd());
    this.config = resolveConfig(options.config);
    this.registry = new NodeRegistry(this.rootDir);
    this.resolver = new Resolver(this);
  }

  /** Canonical build directory */
  get buildDir(): string {
    return this.registry.canonical(this.config.buildDir);
  }

  // Environments

  environment(options: EnvironmentOptions = {}): Environment {
    const origin = options.origin ?? getCallerLocation();
    const env = this.registerEnvironment(
      (name: string) => new Environment(this, name, options.toolchain, origin),
      options.name ?? 'default'
    );
    env.setupToolchain(options.enableTools);
    for (const [key, value] of Object.entries({ ...this.config.vars, ...(options.vars ?? {}) })) {
      env.set(key, value);
    }
    return env;
  }

  /**
   * Give a new environment a unique name and record it. Used for fresh
   * environments and clones alike.
   */
  registerEnvironment(create: (name: string) => Environment, baseName: string): Environment {
    const name = nextFreeName(baseName, candidate => this.environments.some(env => env.name === candidate));
    const env = create(name);
    this.environments.push(env);
    logger.debug(`Registered environment '${name}'`);
    return env;
  }

  getEnvironments(): readonly Environment[] {
    return this.environments;
  }

  getEnvironment(name: string): Environment | undefined {
    return this.environments.find(env => env.name === name);
  }

  // Targets

  staticLibrary(name: string, env: Environment, sources: readonly SourceRef[] = [], origin = getCallerLocation()): Target {
    return this.declareTarget(name, 'static_library', env, origin).addSources(sources);
  }

  sharedLibrary(name: string, env: Environment, sources: readonly SourceRef[] = [], origin = getCallerLocation()): Target {
    return this.declareTarget(name, 'shared_library', env, origin).addSources(sources);
  }

  program(name: string, env: Environment, sources: readonly SourceRef[] = [], origin = getCallerLocation()): Target {
    return this.declareTarget(name, 'program', env, origin).addSources(sources);
  }

  objectLibrary(name: string, env: Environment, sources: readonly SourceRef[] = [], origin = getCallerLocation()): Target {
    return this.declareTarget(name, 'object', env, origin).addSources(sources);
  }

  /**
   * Header-only target: requirements without outputs.
   */
  interfaceLibrary(name: string, origin = getCallerLocation()): Target {
    return this.declareTarget(name, 'interface', undefined, origin);
  }

  /**
   * Custom command. Its outputs exist as produced nodes right away, so other
   * targets can use them as sources regardless of declaration order.
   */
  command(name: string, env: Environment | undefined, spec: CommandTargetSpec, origin = getCallerLocation()): Target {
    const finalName = this.uniqueTargetName(name, origin);
    const outputs = spec.outputs.map(path => this.registry.file(path, origin));
    const sources = (spec.sources ?? []).map(source => (typeof source === 'string' ? this.registry.file(source, origin) : source));
    const step: BuildStep = {
      action: 'command',
      environment: env,
      tool: 'command',
      command: spec.command,
      sources,
      outputs,
      variables: new Map(),
      depfile: spec.depfile,
      deps: spec.deps,
      description: spec.description,
      target: finalName,
      origin
    };
    for (const output of outputs) {
      output.setProducer(step);
    }
    const target = new Target(finalName, 'command', env, {
      origin,
      command: { command: spec.command, outputs, description: spec.description, depfile: spec.depfile, deps: spec.deps }
    });
    this.targets.set(finalName, target);
    return target.addSources(sources);
  }

  /**
   * Copy files and target outputs into `dest`. Target references are looked
   * up after every build target is resolved.
   */
  install(dest: string, sources: readonly InstallSource[], name?: string, origin = getCallerLocation()): Target {
    return this.declareTarget(name ?? `install_${posix.basename(dest)}`, 'install', undefined, origin).addPending({
      kind: 'install',
      sources: [...sources],
      dest
    });
  }

  /**
   * Copy one file or target output to exactly `dest`.
   */
  installAs(dest: string, source: InstallSource, name?: string, origin = getCallerLocation()): Target {
    return this.declareTarget(name ?? `install_${posix.basename(dest)}`, 'install_as', undefined, origin).addPending({
      kind: 'install_as',
      source,
      dest
    });
  }

  private uniqueTargetName(name: string, origin: SourceLocation | undefined): string {
    const existing = this.targets.get(name);
    if (!existing) return name;
    if (this.config.duplicateNames === 'error') {
      throw new DuplicateTargetError(name, existing.origin, origin);
    }
    const renamed = nextFreeName(name, candidate => this.targets.has(candidate));
    this.warn(`target '${name}' already exists; renamed to '${renamed}'`, origin);
    return renamed;
  }

  private declareTarget(name: string, kind: TargetKind, env: Environment | undefined, origin: SourceLocation | undefined): Target {
    const finalName = this.uniqueTargetName(name, origin);
    const target = new Target(finalName, kind, env, { origin });
    this.targets.set(finalName, target);
    logger.debug(`Declared ${kind} target '${finalName}'`);
    return target;
  }

  getTarget(name: string): Target | undefined {
    return this.targets.get(name);
  }

  getTargets(): Target[] {
    return Array.from(this.targets.values());
  }

  // Nodes, aliases and defaults

  file(path: string, origin = getCallerLocation()): FileNode {
    return this.registry.file(path, origin);
  }

  dir(path: string, role: DirRole, members: readonly Node[] = [], origin = getCallerLocation()): DirNode {
    return this.registry.dir(path, role, members, origin);
  }

  value(name: string, value?: string, origin = getCallerLocation()): ValueNode {
    return this.registry.value(name, value, origin);
  }

  /**
   * Named group. Target members contribute their outputs once resolved.
   */
  alias(name: string, members: ReadonlyArray<Node | Target> = [], origin = getCallerLocation()): AliasNode {
    const alias = this.registry.alias(name, origin);
    const targets: Target[] = [];
    for (const member of members) {
      if (member instanceof Target) {
        targets.push(member);
      } else {
        alias.addMembers(member);
      }
    }
    if (targets.length > 0) {
      this.pendingAliases.push({ alias, targets });
    }
    return alias;
  }

  /**
   * Alias expansions queued since the last resolution; the queue is emptied.
   */
  takePendingAliases(): PendingAlias[] {
    return this.pendingAliases.splice(0, this.pendingAliases.length);
  }

  setDefault(...items: Array<Target | Node>): this {
    for (const item of items) {
      if (!this.defaultItems.includes(item)) this.defaultItems.push(item);
    }
    return this;
  }

  get defaults(): ReadonlyArray<Target | Node> {
    return this.defaultItems;
  }

  // Diagnostics

  warn(message: string, origin?: SourceLocation): void {
    const text = origin ? `${formatLocation(origin)}: ${message}` : message;
    this.warningList.push(text);
    logger.warn(text);
  }

  get warnings(): readonly string[] {
    return this.warningList;
  }

  /**
   * Turn declared targets into nodes and build steps. Safe to call again:
   * only targets added since the previous call are resolved.
   */
  resolve(): ResolutionReport {
    return this.resolver.resolve();
  }
}
