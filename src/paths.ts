import type { DependencyGraph, DependencyNode, NodeKey } from "./types.js";
import { dependenciesOf } from "./types.js";
import { depthFirst } from "./traversal.js";

/**
 * Enumerate every simple path from source to target, in discovery order.
 *
 * Edges are followed in the order they were added during the build, not by
 * name. The number of paths can grow exponentially with the graph.
 */
export function findPaths(
  graph: DependencyGraph,
  source: DependencyNode,
  target: DependencyNode,
): string[][] {
  const results: string[][] = [];
  const onPath = new Set<NodeKey>();
  const stack: string[] = [];

  depthFirst(source, {
    enter(node) {
      if (onPath.has(node.key)) return null;
      onPath.add(node.key);
      stack.push(node.name);

      if (node.key === target.key) {
        results.push([...stack]);
        return [];
      }
      return dependenciesOf(graph, node);
    },
    leave(node) {
      stack.pop();
      onPath.delete(node.key);
    },
  });

  return results;
}

export function renderPaths(paths: string[][], sourceName: string, targetName: string): string[] {
  if (paths.length === 0) {
    return [`No path from '${sourceName}' to '${targetName}' found.`];
  }
  return paths.map((p) => p.join(" -> "));
}
