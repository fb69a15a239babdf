import type { SourceLocation } from '../types/index.js';
import type { Toolchain } from '../toolchains/toolchain.js';
import { ConfigError } from '../utils/errors.js';
import type { BuilderInvocation } from './builder.js';
import type { Project } from './project.js';
import {
  expand,
  expandToSequence,
  isSequence,
  LayeredNamespace,
  namespaceFrom,
  type CommandToken,
  type Namespace,
  type NamespaceInit,
  type VarValue
} from './subst.js';
import { ToolConfig } from './tool-config.js';

export interface EnvironmentOptions {
  name?: string;
  toolchain?: Toolchain;
  vars?: Readonly<Record<string, VarValue>>;
  /** Only set up these toolchain tools (default: all of them) */
  enableTools?: readonly string[];
  origin?: SourceLocation;
}

export interface EnvironmentOverrides {
  vars?: Readonly<Record<string, VarValue>>;
  /** Tool variables replacing the tool's current values */
  tools?: Readonly<Record<string, Readonly<Record<string, VarValue>>>>;
}

/**
 * A named set of tool namespaces and cross-tool variables. Environments
 * belong to a project and are created through it; every environment,
 * including clones, gets its own build rules.
 */
export class Environment implements Namespace {
  readonly name: string;
  readonly project: Project;
  readonly toolchain?: Toolchain;
  readonly origin?: SourceLocation;
  private readonly vars = new Map<string, VarValue>();
  private readonly tools = new Map<string, ToolConfig>();

  /**
   * Use `project.environment()` instead; it names and registers the result.
   */
  constructor(project: Project, name: string, toolchain?: Toolchain, origin?: SourceLocation) {
    this.project = project;
    this.name = name;
    this.toolchain = toolchain;
    this.origin = origin;
  }

  /**
   * Add the toolchain's tools with their default variables.
   */
  setupToolchain(enableTools?: readonly string[]): void {
    if (!this.toolchain) return;
    for (const definition of this.toolchain.tools) {
      if (enableTools && !enableTools.includes(definition.name)) continue;
      this.addTool(definition.name, definition.defaults).addBuilders(definition.builders);
    }
  }

  get buildDir(): string {
    return this.project.buildDir;
  }

  tool(name: string): ToolConfig {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new ConfigError(`environment '${this.name}' has no tool '${name}'`, { environment: this.name, tool: name });
    }
    return tool;
  }

  hasTool(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * Get or create a tool namespace; defaults only fill missing variables.
   */
  addTool(name: string, defaults: Readonly<Record<string, VarValue>> = {}): ToolConfig {
    let tool = this.tools.get(name);
    if (!tool) {
      tool = new ToolConfig(name, this);
      this.tools.set(name, tool);
    }
    for (const [key, value] of Object.entries(defaults)) {
      if (!tool.has(key)) tool.set(key, value);
    }
    return tool;
  }

  toolNames(): string[] {
    return Array.from(this.tools.keys());
  }

  get(name: string): VarValue | undefined {
    return this.vars.get(name);
  }

  set(name: string, value: VarValue): this {
    this.vars.set(name, isSequence(value) ? [...value] : value);
    return this;
  }

  has(name: string): boolean {
    return this.vars.has(name);
  }

  lookup(name: string): VarValue | undefined {
    const dot = name.indexOf('.');
    if (dot < 0) {
      return this.vars.get(name);
    }
    return this.tools.get(name.slice(0, dot))?.get(name.slice(dot + 1));
  }

  /**
   * Deep copy registered with the project under a unique name. Tool
   * namespaces are copied and rebound, so builders taken from the clone
   * produce steps bound to the clone.
   */
  clone(name?: string): Environment {
    const copy = this.project.registerEnvironment(
      (uniqueName: string) => new Environment(this.project, uniqueName, this.toolchain, this.origin),
      name ?? `${this.name}_clone`
    );
    for (const [key, value] of this.vars) {
      copy.set(key, value);
    }
    for (const [toolName, tool] of this.tools) {
      copy.tools.set(toolName, tool.clone(copy));
    }
    return copy;
  }

  /**
   * Clone, then apply overrides.
   */
  override(overrides: EnvironmentOverrides, name?: string): Environment {
    const copy = this.clone(name);
    for (const [key, value] of Object.entries(overrides.vars ?? {})) {
      copy.set(key, value);
    }
    for (const [toolName, values] of Object.entries(overrides.tools ?? {})) {
      const tool = copy.addTool(toolName);
      for (const [key, value] of Object.entries(values)) {
        tool.set(key, value);
      }
    }
    return copy;
  }

  private namespace(overrides?: NamespaceInit): Namespace {
    return overrides ? new LayeredNamespace([namespaceFrom(overrides), this]) : this;
  }

  subst(template: string, overrides?: NamespaceInit): string {
    return expand(template, this.namespace(overrides));
  }

  substToSequence(template: string | readonly CommandToken[], overrides?: NamespaceInit): CommandToken[] {
    return expandToSequence(template, this.namespace(overrides));
  }

  builder(tool: string, builder: string): BuilderInvocation {
    return this.tool(tool).builder(builder);
  }
}
