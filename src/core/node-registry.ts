import type { SourceLocation } from '../types/index.js';
import { NodeKindConflictError } from '../utils/errors.js';
import { canonicalPath } from '../utils/paths.js';
import { AliasNode, DirNode, FileNode, Node, ValueNode, type DirRole } from './node.js';

function describe(node: Node): string {
  return node instanceof DirNode ? `a ${node.role} directory` : `a ${node.kind} node`;
}

/**
 * Owns every node of one project. The same identity always yields the same
 * instance; nodes are kept in creation order so generators iterate
 * deterministically.
 */
export class NodeRegistry {
  private readonly nodes = new Map<string, Node>();

  constructor(readonly rootDir: string) {}

  canonical(path: string): string {
    return canonicalPath(path, this.rootDir);
  }

  file(path: string, origin?: SourceLocation): FileNode {
    const identity = this.canonical(path);
    const existing = this.nodes.get(identity);
    if (existing) {
      if (existing instanceof FileNode) return existing;
      throw new NodeKindConflictError(identity, describe(existing), 'a file node');
    }
    const node = new FileNode(identity, origin);
    this.nodes.set(identity, node);
    return node;
  }

  dir(path: string, role: DirRole, members: readonly Node[] = [], origin?: SourceLocation): DirNode {
    const identity = this.canonical(path);
    const existing = this.nodes.get(identity);
    if (existing) {
      if (existing instanceof DirNode && existing.role === role) {
        return existing.addMembers(...members);
      }
      throw new NodeKindConflictError(identity, describe(existing), `a ${role} directory`);
    }
    const node = new DirNode(identity, role, origin).addMembers(...members);
    this.nodes.set(identity, node);
    return node;
  }

  /**
   * Get or create a value node. Passing a value updates it.
   */
  value(name: string, value?: string, origin?: SourceLocation): ValueNode {
    const identity = `value:${name}`;
    const existing = this.nodes.get(identity);
    if (existing) {
      if (!(existing instanceof ValueNode)) {
        throw new NodeKindConflictError(identity, describe(existing), 'a value node');
      }
      if (value !== undefined) existing.value = value;
      return existing;
    }
    const node = new ValueNode(name, value ?? '', origin);
    this.nodes.set(identity, node);
    return node;
  }

  alias(name: string, origin?: SourceLocation): AliasNode {
    const identity = `alias:${name}`;
    const existing = this.nodes.get(identity);
    if (existing) {
      if (existing instanceof AliasNode) return existing;
      throw new NodeKindConflictError(identity, describe(existing), 'an alias');
    }
    const node = new AliasNode(name, origin);
    this.nodes.set(identity, node);
    return node;
  }

  get(identity: string): Node | undefined {
    return this.nodes.get(identity);
  }

  /**
   * Existing file or directory node for a path, without creating one.
   */
  lookupPath(path: string): Node | undefined {
    return this.nodes.get(this.canonical(path));
  }

  has(identity: string): boolean {
    return this.nodes.has(identity);
  }

  all(): Node[] {
    return Array.from(this.nodes.values());
  }

  get size(): number {
    return this.nodes.size;
  }
}
