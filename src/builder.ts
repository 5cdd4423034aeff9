import type { DependencyGraph } from "./types.js";
import { createEmptyGraph, addNode, addEdge, getNode, makeNodeKey } from "./types.js";

/** Dependencies declared by one build unit (one project file). */
export interface UnitRecord {
  /** Logical name of the unit: its assembly name, else its file stem */
  name: string;
  projectReferences: string[];
  packageReferences: string[];
}

/**
 * Build the dependency graph from unit records.
 *
 * All project nodes are created before any edge so that a reference to a unit
 * appearing later in `records` still resolves. Project references that name no
 * known unit are dropped; package nodes are created on first reference.
 * When two records share a name, the first creates the node and both contribute
 * edges to it.
 */
export function buildGraph(records: readonly UnitRecord[]): DependencyGraph {
  const graph = createEmptyGraph();

  for (const record of records) {
    addNode(graph, { key: makeNodeKey(record.name), name: record.name, kind: "project" });
  }

  for (const record of records) {
    const fromKey = makeNodeKey(record.name);

    for (const ref of record.projectReferences) {
      const target = getNode(graph, ref);
      if (!target) continue;
      addEdge(graph, { fromKey, toKey: target.key });
    }

    for (const id of record.packageReferences) {
      const pkg = addNode(graph, { key: makeNodeKey(id), name: id, kind: "package" });
      addEdge(graph, { fromKey, toKey: pkg.key });
    }
  }

  return graph;
}
