import type { SourceLocation } from '../types/index.js';
import type { CommandToken } from './subst.js';
import type { Environment } from './environment.js';
import { DuplicateOutputError } from '../utils/errors.js';

/**
 * Graph vertices. Nodes carry identity and dependency lists only; everything
 * about how they are built lives in the BuildStep attached as `producer`.
 */

export type NodeKind = 'file' | 'dir' | 'value' | 'alias';

/**
 * `target`: a collector, up to date when all members are.
 * `source`: stands for exactly its members, never the directory contents.
 */
export type DirRole = 'target' | 'source';

export type DepsStyle = 'gcc' | 'msvc';

export type StepAction = 'compile' | 'archive' | 'link' | 'copy' | 'command' | 'build';

/**
 * How one or more nodes are produced.
 */
export interface BuildStep {
  action: StepAction;
  /** Absent for environment-less steps such as installs */
  environment?: Environment;
  tool: string;
  /** Tool variable holding the command template */
  commandVar?: string;
  /** Inline command template, used by custom command steps */
  command?: string | readonly CommandToken[];
  language?: string;
  sources: Node[];
  outputs: Node[];
  /** Per-step variables, in emission order */
  variables: Map<string, CommandToken[]>;
  depfile?: string;
  deps?: DepsStyle;
  description?: string;
  /** Name of the target the step was created for */
  target?: string;
  origin?: SourceLocation;
}

function appendUnique(list: Node[], nodes: readonly Node[], self: Node): void {
  for (const node of nodes) {
    if (node !== self && !list.includes(node)) {
      list.push(node);
    }
  }
}

export abstract class Node {
  abstract readonly kind: NodeKind;

  /** Registry key; unique per project */
  readonly identity: string;
  readonly explicitDeps: Node[] = [];
  readonly implicitDeps: Node[] = [];
  readonly orderOnlyDeps: Node[] = [];
  readonly origin?: SourceLocation;
  private producerStep?: BuildStep;

  protected constructor(identity: string, origin?: SourceLocation) {
    this.identity = identity;
    this.origin = origin;
  }

  get producer(): BuildStep | undefined {
    return this.producerStep;
  }

  get label(): string {
    return this.identity;
  }

  dependsOn(...nodes: Node[]): this {
    appendUnique(this.explicitDeps, nodes, this);
    return this;
  }

  addImplicit(...nodes: Node[]): this {
    appendUnique(this.implicitDeps, nodes, this);
    return this;
  }

  orderAfter(...nodes: Node[]): this {
    appendUnique(this.orderOnlyDeps, nodes, this);
    return this;
  }

  /**
   * Attach the step that builds this node. A node has at most one producer;
   * re-attaching the same step is a no-op.
   */
  setProducer(step: BuildStep): void {
    const current = this.producerStep;
    if (current && current !== step) {
      throw new DuplicateOutputError(
        this.label,
        current.target ?? current.tool,
        step.target ?? step.tool,
        step.origin ?? this.origin
      );
    }
    this.producerStep = step;
  }
}

export class FileNode extends Node {
  readonly kind = 'file';

  constructor(readonly path: string, origin?: SourceLocation) {
    super(path, origin);
  }
}

export class DirNode extends Node {
  readonly kind = 'dir';
  readonly members: Node[] = [];

  constructor(readonly path: string, readonly role: DirRole, origin?: SourceLocation) {
    super(path, origin);
  }

  addMembers(...nodes: Node[]): this {
    appendUnique(this.members, nodes, this);
    return this;
  }
}

/**
 * A computed value, materialized by the generator as a file whose content
 * only changes when the value does.
 */
export class ValueNode extends Node {
  readonly kind = 'value';

  constructor(readonly name: string, public value: string, origin?: SourceLocation) {
    super(`value:${name}`, origin);
  }

  override get label(): string {
    return this.name;
  }
}

export class AliasNode extends Node {
  readonly kind = 'alias';
  readonly members: Node[] = [];

  constructor(readonly name: string, origin?: SourceLocation) {
    super(`alias:${name}`, origin);
  }

  override get label(): string {
    return this.name;
  }

  addMembers(...nodes: Node[]): this {
    appendUnique(this.members, nodes, this);
    return this;
  }
}

/**
 * Inputs of a node in the graph: producer sources, then the declared edges.
 */
export function nodeInputs(node: Node): Node[] {
  const inputs: Node[] = [];
  appendUnique(inputs, node.producer?.sources ?? [], node);
  appendUnique(inputs, node.explicitDeps, node);
  appendUnique(inputs, node.implicitDeps, node);
  appendUnique(inputs, node.orderOnlyDeps, node);
  if (node instanceof DirNode || node instanceof AliasNode) {
    appendUnique(inputs, node.members, node);
  }
  return inputs;
}
