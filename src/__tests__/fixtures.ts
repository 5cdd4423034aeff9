import { buildGraph } from "../builder.js";
import type { UnitRecord } from "../builder.js";
import { getNode } from "../types.js";
import type { DependencyGraph, DependencyNode } from "../types.js";

export function unit(
  name: string,
  projectReferences: string[] = [],
  packageReferences: string[] = [],
): UnitRecord {
  return { name, projectReferences, packageReferences };
}

/** A→B, A→P1, B→C, C→P2 */
export function sampleGraph(): DependencyGraph {
  return buildGraph([unit("A", ["B"], ["P1"]), unit("B", ["C"]), unit("C", [], ["P2"])]);
}

/** X→Y, Y→X */
export function cycleGraph(): DependencyGraph {
  return buildGraph([unit("X", ["Y"]), unit("Y", ["X"])]);
}

export function nodeOf(graph: DependencyGraph, name: string): DependencyNode {
  const node = getNode(graph, name);
  if (!node) throw new Error(`fixture has no node named ${name}`);
  return node;
}
