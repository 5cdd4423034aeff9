import type { DependencyGraph, DependencyNode, NodeKey } from "./types.js";
import { indent, projectNodes, sortedDependenciesOf } from "./types.js";
import { depthFirst } from "./traversal.js";

/**
 * Walk the reverse edges from target.
 * Returns the keys of every node with a path to target, target included.
 */
export function reachingKeys(graph: DependencyGraph, target: DependencyNode): Set<NodeKey> {
  const reaching = new Set<NodeKey>([target.key]);
  const queue: NodeKey[] = [target.key];

  for (let head = 0; head < queue.length; head++) {
    const revEdges = graph.reverseEdges.get(queue[head]);
    if (!revEdges) continue;

    for (const edge of revEdges) {
      if (!reaching.has(edge.fromKey)) {
        reaching.add(edge.fromKey);
        queue.push(edge.fromKey);
      }
    }
  }

  return reaching;
}

export function canReach(
  graph: DependencyGraph,
  from: DependencyNode,
  target: DependencyNode,
): boolean {
  return reachingKeys(graph, target).has(from.key);
}

/**
 * The subtree under root restricted to branches that lead to the target.
 * Unlike the plain tree, a node already on the path is skipped without a line.
 */
function renderFilteredTree(
  graph: DependencyGraph,
  root: DependencyNode,
  reaching: ReadonlySet<NodeKey>,
): string[] {
  const lines: string[] = [];
  const onPath = new Set<NodeKey>();

  depthFirst(root, {
    enter(node, depth) {
      if (onPath.has(node.key)) return null;
      onPath.add(node.key);
      lines.push(indent(depth) + node.name);
      return sortedDependenciesOf(graph, node).filter((child) => reaching.has(child.key));
    },
    leave(node) {
      onPath.delete(node.key);
    },
  });

  return lines;
}

/**
 * For every project that depends on target (directly or not), print the
 * branches of its tree that lead to target. Projects are taken in name order.
 */
export function renderDependsOn(graph: DependencyGraph, target: DependencyNode): string[] {
  const reaching = reachingKeys(graph, target);
  const lines: string[] = [];
  for (const root of projectNodes(graph)) {
    if (reaching.has(root.key)) {
      lines.push(...renderFilteredTree(graph, root, reaching));
    }
  }
  return lines;
}
