import { DependencyCycleError } from '../../utils/errors.js';
import { nodeInputs, type Node } from '../node.js';
import type { Target } from '../target.js';

/**
 * Order targets with leaves first over `linkLibs`. Post-order DFS from each
 * target in declaration order, so unrelated targets keep their declared
 * order. A cycle is fatal and reports the full path.
 */
export function sortTargets(targets: readonly Target[]): Target[] {
  const order: Target[] = [];
  const done = new Set<Target>();
  const path: Target[] = [];

  const visit = (target: Target): void => {
    if (done.has(target)) return;
    const index = path.indexOf(target);
    if (index >= 0) {
      const cycle = [...path.slice(index), target];
      throw new DependencyCycleError(
        cycle.map(member => member.name),
        cycle[0].origin
      );
    }

    path.push(target);
    for (const edge of target.linkLibs) {
      visit(edge.target);
    }
    path.pop();

    done.add(target);
    order.push(target);
  };

  for (const target of targets) {
    visit(target);
  }

  return order;
}

/**
 * Look for a cycle through producer inputs and dependency edges. Returns
 * the node chain, closed on its first node, or undefined.
 */
export function findNodeCycle(nodes: readonly Node[]): Node[] | undefined {
  const done = new Set<Node>();
  const onPath = new Set<Node>();
  const path: Node[] = [];

  // Iterative so that long dependency chains cannot exhaust the call stack
  for (const start of nodes) {
    if (done.has(start)) continue;
    const stack: Array<{ node: Node; inputs: Node[]; next: number }> = [{ node: start, inputs: nodeInputs(start), next: 0 }];
    path.push(start);
    onPath.add(start);

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (frame.next < frame.inputs.length) {
        const input = frame.inputs[frame.next++];
        if (onPath.has(input)) {
          return [...path.slice(path.indexOf(input)), input];
        }
        if (!done.has(input)) {
          stack.push({ node: input, inputs: nodeInputs(input), next: 0 });
          path.push(input);
          onPath.add(input);
        }
      } else {
        stack.pop();
        path.pop();
        onPath.delete(frame.node);
        done.add(frame.node);
      }
    }
  }

  return undefined;
}

/**
 * Throw when the node graph has a cycle.
 */
export function assertAcyclic(nodes: readonly Node[]): void {
  const cycle = findNodeCycle(nodes);
  if (cycle) {
    throw new DependencyCycleError(
      cycle.map(node => node.label),
      cycle[0].origin
    );
  }
}
