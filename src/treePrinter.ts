import type { DependencyGraph, DependencyNode, NodeKey } from "./types.js";
import { indent, projectNodes, sortedDependenciesOf } from "./types.js";
import { depthFirst } from "./traversal.js";

/**
 * Render the dependency tree under root, one line per visit.
 *
 * A node is printed before the cycle check, so a node that closes a cycle
 * shows up once more and is then cut off. The on-path set is unwound on the
 * way back up, so a node may appear again in a sibling branch.
 */
export function renderTree(graph: DependencyGraph, root: DependencyNode): string[] {
  const lines: string[] = [];
  const onPath = new Set<NodeKey>();

  depthFirst(root, {
    enter(node, depth) {
      lines.push(indent(depth) + node.name);
      if (onPath.has(node.key)) return null;
      onPath.add(node.key);
      return sortedDependenciesOf(graph, node);
    },
    leave(node) {
      onPath.delete(node.key);
    },
  });

  return lines;
}

/** Render a tree for every project node, in name order. */
export function renderFullTree(graph: DependencyGraph): string[] {
  return projectNodes(graph).flatMap((root) => renderTree(graph, root));
}
