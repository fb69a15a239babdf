import { existsSync } from 'fs';
import { MissingSourceError } from '../../utils/errors.js';
import { absolutePath } from '../../utils/paths.js';
import type { SourceLocation } from '../../types/index.js';
import { DirNode, FileNode, type Node } from '../node.js';
import type { Project } from '../project.js';
import type { SourceRef } from '../target.js';

/**
 * Node for a declared source. A path already registered as a directory
 * yields that directory node.
 */
export function sourceNode(project: Project, source: SourceRef, origin: SourceLocation | undefined): Node {
  if (typeof source !== 'string') {
    return source;
  }
  const existing = project.registry.lookupPath(source);
  return existing instanceof DirNode ? existing : project.registry.file(source, origin);
}

/**
 * A file must either be produced by some step or exist on disk.
 */
export function checkSourceExists(project: Project, node: Node, origin: SourceLocation | undefined): void {
  if (node instanceof FileNode && !node.producer && !existsSync(absolutePath(node.path, project.rootDir))) {
    throw new MissingSourceError(node.path, origin);
  }
}

/**
 * Resolve declared sources to nodes. Source directories stand for their
 * members; every file is checked.
 */
export function expandSources(project: Project, sources: readonly SourceRef[], origin: SourceLocation | undefined): Node[] {
  const result: Node[] = [];

  const add = (node: Node): void => {
    if (node instanceof DirNode && node.role === 'source') {
      node.members.forEach(add);
      return;
    }
    checkSourceExists(project, node, origin);
    if (!result.includes(node)) result.push(node);
  };

  for (const source of sources) {
    add(sourceNode(project, source, origin));
  }

  return result;
}
