import type { BuilderSpec } from '../toolchains/toolchain.js';
import type { Environment } from './environment.js';
import { BuilderInvocation } from './builder.js';
import { isSequence, type VarItem, type VarValue } from './subst.js';

function copyValue(value: VarValue): VarValue {
  return isSequence(value) ? [...value] : value;
}

/**
 * Variables of one tool inside one environment. Known variables have typed
 * accessors; anything else goes through get/set.
 */
export class ToolConfig {
  private readonly vars = new Map<string, VarValue>();
  private readonly builderSpecs = new Map<string, BuilderSpec>();
  private readonly env: Environment;

  constructor(
    readonly name: string,
    environment: Environment,
    defaults: Readonly<Record<string, VarValue>> = {},
    builders: readonly BuilderSpec[] = []
  ) {
    this.env = environment;
    for (const [key, value] of Object.entries(defaults)) {
      this.vars.set(key, copyValue(value));
    }
    this.addBuilders(builders);
  }

  get environment(): Environment {
    return this.env;
  }

  get cmd(): string | undefined {
    const value = this.vars.get('cmd');
    return value === undefined || isSequence(value) ? undefined : String(value);
  }

  set cmd(value: string | undefined) {
    if (value === undefined) {
      this.vars.delete('cmd');
    } else {
      this.vars.set('cmd', value);
    }
  }

  get flags(): VarItem[] {
    const value = this.vars.get('flags');
    if (value === undefined) return [];
    return isSequence(value) ? [...value] : [value];
  }

  set flags(value: readonly VarItem[]) {
    this.vars.set('flags', [...value]);
  }

  get(name: string): VarValue | undefined {
    return this.vars.get(name);
  }

  set(name: string, value: VarValue): this {
    this.vars.set(name, copyValue(value));
    return this;
  }

  /**
   * Append to a list variable; a scalar becomes the first element.
   */
  append(name: string, ...values: VarItem[]): this {
    const current = this.vars.get(name);
    const items = current === undefined ? [] : isSequence(current) ? [...current] : [current];
    this.vars.set(name, [...items, ...values]);
    return this;
  }

  has(name: string): boolean {
    return this.vars.has(name);
  }

  delete(name: string): boolean {
    return this.vars.delete(name);
  }

  keys(): string[] {
    return Array.from(this.vars.keys());
  }

  /** Variables as a read-only view, for namespace lookups */
  entries(): ReadonlyMap<string, VarValue> {
    return this.vars;
  }

  builderSpec(name: string): BuilderSpec | undefined {
    return this.builderSpecs.get(name);
  }

  builderNames(): string[] {
    return Array.from(this.builderSpecs.keys());
  }

  addBuilders(specs: readonly BuilderSpec[]): this {
    for (const spec of specs) {
      this.builderSpecs.set(spec.name, spec);
    }
    return this;
  }

  /**
   * Invocation of one of this tool's builders, bound to the current owner.
   */
  builder(name: string): BuilderInvocation {
    return new BuilderInvocation(this.env, this.name, name);
  }

  /**
   * Copy for another environment. Lists are copied, so appending to the
   * clone never shows up in the original.
   */
  clone(environment: Environment): ToolConfig {
    const copy = new ToolConfig(this.name, environment, {}, Array.from(this.builderSpecs.values()));
    for (const [key, value] of this.vars) {
      copy.vars.set(key, copyValue(value));
    }
    return copy;
  }
}
