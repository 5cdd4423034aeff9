import type { DependencyGraph, DependencyNode, NodeKey } from "./types.js";
import { compareNames, sortedDependenciesOf } from "./types.js";
import { depthFirst } from "./traversal.js";

export interface DependencyClosure {
  /** Reachable project names, sorted, root excluded */
  projects: string[];
  /** Reachable package names, sorted */
  packages: string[];
}

/** Every node reachable from root through one or more edges, split by kind. */
export function collectClosure(graph: DependencyGraph, root: DependencyNode): DependencyClosure {
  const visited = new Set<NodeKey>([root.key]);
  const projects: string[] = [];
  const packages: string[] = [];

  for (const dep of sortedDependenciesOf(graph, root)) {
    depthFirst(dep, {
      enter(node) {
        if (visited.has(node.key)) return null;
        visited.add(node.key);
        if (node.kind === "project") projects.push(node.name);
        else packages.push(node.name);
        return sortedDependenciesOf(graph, node);
      },
    });
  }

  return {
    projects: projects.sort(compareNames),
    packages: packages.sort(compareNames),
  };
}

export function renderClosure(closure: DependencyClosure): string[] {
  return [
    "Projects:",
    ...closure.projects.map((name) => `  ${name}`),
    "NuGet Packages:",
    ...closure.packages.map((name) => `  ${name}`),
  ];
}
