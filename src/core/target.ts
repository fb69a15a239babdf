import { posix } from 'path';
import type { SourceLocation } from '../types/index.js';
import { TargetNotResolvedError } from '../utils/errors.js';
import { mergeUnique, type SeparatedArgFlags } from '../utils/flags.js';
import type { Environment } from './environment.js';
import type { DepsStyle, FileNode, Node } from './node.js';
import { UsageRequirements, type UsageRequirementsInit } from './requirements.js';
import type { CommandToken } from './subst.js';

export type TargetKind =
  | 'static_library'
  | 'shared_library'
  | 'program'
  | 'interface'
  | 'object'
  | 'command'
  | 'install'
  | 'install_as';

export const TARGET_KINDS: readonly TargetKind[] = [
  'static_library',
  'shared_library',
  'program',
  'interface',
  'object',
  'command',
  'install',
  'install_as'
];

/** Kinds whose sources are compiled */
export const COMPILED_KINDS: ReadonlySet<TargetKind> = new Set<TargetKind>([
  'static_library',
  'shared_library',
  'program',
  'object'
]);

export type Visibility = 'public' | 'private';

export interface LinkEdge {
  target: Target;
  visibility: Visibility;
}

export type SourceRef = string | Node;
export type InstallSource = string | Node | Target;

/**
 * Work that needs other targets' outputs, replayed after every build target
 * has been resolved.
 */
export type DeferredOperation =
  | { kind: 'install'; sources: readonly InstallSource[]; dest: string }
  | { kind: 'install_as'; source: InstallSource; dest: string };

export interface CommandSpec {
  command: string | readonly CommandToken[];
  outputs: readonly FileNode[];
  description?: string;
  depfile?: string;
  deps?: DepsStyle;
}

export interface ResolvedState {
  status: 'resolved';
  outputNodes: readonly Node[];
  objectNodes: readonly FileNode[];
  languages: readonly string[];
}

export type TargetState = { status: 'unresolved' } | ResolvedState;

export interface TargetOptions {
  origin?: SourceLocation;
  command?: CommandSpec;
}

type RequirementField = keyof UsageRequirementsInit;

/**
 * Declarative description of one build artifact. Before resolution it is
 * configuration only; `outputNodes` and `objectNodes` exist once the
 * resolver has run.
 */
export class Target {
  readonly name: string;
  readonly kind: TargetKind;
  readonly environment?: Environment;
  readonly origin?: SourceLocation;
  readonly command?: CommandSpec;
  readonly sources: SourceRef[] = [];
  readonly linkLibs: LinkEdge[] = [];
  readonly public = new UsageRequirements();
  readonly private = new UsageRequirements();
  readonly pendingSources: DeferredOperation[] = [];
  outputName?: string;
  private state: TargetState = { status: 'unresolved' };

  constructor(name: string, kind: TargetKind, environment: Environment | undefined, options: TargetOptions = {}) {
    this.name = name;
    this.kind = kind;
    this.environment = environment;
    this.origin = options.origin;
    this.command = options.command;
  }

  private get separatedArgFlags(): SeparatedArgFlags {
    return this.environment?.toolchain?.separatedArgFlags ?? [];
  }

  /**
   * Link against another target. Public links pass the dependency's public
   * requirements on to this target's dependents; private links do not.
   */
  link(dependency: Target, visibility: Visibility = 'public'): this {
    if (!this.linkLibs.some(edge => edge.target === dependency)) {
      this.linkLibs.push({ target: dependency, visibility });
    }
    return this;
  }

  addSource(source: SourceRef): this {
    if (!this.sources.includes(source)) {
      this.sources.push(source);
    }
    return this;
  }

  addSources(sources: readonly SourceRef[], base?: string): this {
    for (const source of sources) {
      this.addSource(typeof source === 'string' && base ? posix.join(base, source) : source);
    }
    return this;
  }

  private require(set: UsageRequirements, field: RequirementField, values: readonly string[]): this {
    set.merge(new UsageRequirements({ [field]: values }), this.separatedArgFlags);
    return this;
  }

  publicIncludes(...dirs: string[]): this {
    return this.require(this.public, 'includeDirs', dirs);
  }

  publicDefines(...defines: string[]): this {
    return this.require(this.public, 'defines', defines);
  }

  publicFlags(...flags: string[]): this {
    return this.require(this.public, 'compileFlags', flags);
  }

  publicLinkFlags(...flags: string[]): this {
    return this.require(this.public, 'linkFlags', flags);
  }

  publicLinkDirs(...dirs: string[]): this {
    return this.require(this.public, 'linkDirs', dirs);
  }

  publicLinkLibs(...libs: string[]): this {
    return this.require(this.public, 'linkLibs', libs);
  }

  privateIncludes(...dirs: string[]): this {
    return this.require(this.private, 'includeDirs', dirs);
  }

  privateDefines(...defines: string[]): this {
    return this.require(this.private, 'defines', defines);
  }

  privateFlags(...flags: string[]): this {
    return this.require(this.private, 'compileFlags', flags);
  }

  privateLinkFlags(...flags: string[]): this {
    return this.require(this.private, 'linkFlags', flags);
  }

  privateLinkLibs(...libs: string[]): this {
    return this.require(this.private, 'linkLibs', libs);
  }

  setOutputName(name: string): this {
    this.outputName = name;
    return this;
  }

  addPending(operation: DeferredOperation): this {
    this.pendingSources.push(operation);
    return this;
  }

  get isResolved(): boolean {
    return this.state.status === 'resolved';
  }

  private resolved(property: string): ResolvedState {
    if (this.state.status !== 'resolved') {
      throw new TargetNotResolvedError(this.name, property);
    }
    return this.state;
  }

  get outputNodes(): readonly Node[] {
    return this.resolved('outputNodes').outputNodes;
  }

  get objectNodes(): readonly FileNode[] {
    return this.resolved('objectNodes').objectNodes;
  }

  get languages(): readonly string[] {
    return this.resolved('languages').languages;
  }

  markResolved(state: Omit<ResolvedState, 'status'>): void {
    this.state = { status: 'resolved', ...state };
  }
}

/**
 * Requirements for building `target`'s own sources: its private and public
 * sets, then the public sets of everything it links, following a
 * dependency's own links only where they are public.
 */
export function collectEffectiveRequirements(
  target: Target,
  separatedArgFlags: SeparatedArgFlags = target.environment?.toolchain?.separatedArgFlags ?? []
): UsageRequirements {
  const result = new UsageRequirements().merge(target.private, separatedArgFlags).merge(target.public, separatedArgFlags);
  const seen = new Set<Target>([target]);

  const visit = (dependency: Target): void => {
    if (seen.has(dependency)) return;
    seen.add(dependency);
    result.merge(dependency.public, separatedArgFlags);
    for (const edge of dependency.linkLibs) {
      if (edge.visibility === 'public') visit(edge.target);
    }
  };

  for (const edge of target.linkLibs) {
    visit(edge.target);
  }

  return result;
}

/**
 * Every target `target` links, directly or not and whatever the visibility,
 * with dependents ahead of their dependencies.
 */
export function linkDependencies(target: Target): Target[] {
  const postOrder: Target[] = [];
  const seen = new Set<Target>([target]);

  const visit = (current: Target): void => {
    for (const edge of [...current.linkLibs].reverse()) {
      if (seen.has(edge.target)) continue;
      seen.add(edge.target);
      visit(edge.target);
      postOrder.push(edge.target);
    }
  };

  visit(target);
  return postOrder.reverse();
}

/**
 * Languages of a target and everything it links; picks the link driver.
 * `own` defaults to the resolved target's languages.
 */
export function transitiveLanguages(target: Target, own: readonly string[] = target.languages): string[] {
  return linkDependencies(target).reduce<string[]>(
    (languages, dependency) => mergeUnique(languages, dependency.isResolved ? dependency.languages : []),
    [...own]
  );
}
