/**
 * NodeKey uniquely identifies a node in the dependency graph.
 * It is the lower-cased identifier; the display name keeps its original casing.
 */
export type NodeKey = string;

export function makeNodeKey(name: string): NodeKey {
  return name.toLowerCase();
}

export type NodeKind = "project" | "package";

export interface DependencyNode {
  key: NodeKey;
  /** Identifier as first seen during the build, used for output */
  name: string;
  kind: NodeKind;
}

export interface DependencyEdge {
  fromKey: NodeKey;
  toKey: NodeKey;
}

/** Read-only view handed to the query components once the build is done. */
export interface DependencyGraph {
  readonly nodes: ReadonlyMap<NodeKey, DependencyNode>;
  readonly forwardEdges: ReadonlyMap<NodeKey, readonly DependencyEdge[]>;
  readonly reverseEdges: ReadonlyMap<NodeKey, readonly DependencyEdge[]>;
  readonly edges: readonly DependencyEdge[];
}

export interface MutableDependencyGraph extends DependencyGraph {
  nodes: Map<NodeKey, DependencyNode>;
  forwardEdges: Map<NodeKey, DependencyEdge[]>;
  reverseEdges: Map<NodeKey, DependencyEdge[]>;
  edges: DependencyEdge[];
}

export function createEmptyGraph(): MutableDependencyGraph {
  return {
    nodes: new Map(),
    forwardEdges: new Map(),
    reverseEdges: new Map(),
    edges: [],
  };
}

/**
 * Insert a node unless one with the same key exists.
 * Returns the node stored under the key (the first one wins).
 */
export function addNode(graph: MutableDependencyGraph, node: DependencyNode): DependencyNode {
  const existing = graph.nodes.get(node.key);
  if (existing) return existing;
  graph.nodes.set(node.key, node);
  return node;
}

export function addEdge(graph: MutableDependencyGraph, edge: DependencyEdge): void {
  graph.edges.push(edge);
  let fwd = graph.forwardEdges.get(edge.fromKey);
  if (!fwd) {
    fwd = [];
    graph.forwardEdges.set(edge.fromKey, fwd);
  }
  fwd.push(edge);

  let rev = graph.reverseEdges.get(edge.toKey);
  if (!rev) {
    rev = [];
    graph.reverseEdges.set(edge.toKey, rev);
  }
  rev.push(edge);
}

/** Case-insensitive lookup by identifier. */
export function getNode(graph: DependencyGraph, name: string): DependencyNode | undefined {
  return graph.nodes.get(makeNodeKey(name));
}

/**
 * Ordinal ignore-case ordering over the same fold as makeNodeKey, so two names
 * compare equal exactly when they share a key. Folded names are compared by
 * UTF-16 code unit, so "A_b" sorts before "AB".
 */
export function compareNames(a: string, b: string): number {
  const ka = makeNodeKey(a);
  const kb = makeNodeKey(b);
  if (ka < kb) return -1;
  if (ka > kb) return 1;
  return 0;
}

/** Outgoing edge targets in the order the edges were added. */
export function dependenciesOf(graph: DependencyGraph, node: DependencyNode): DependencyNode[] {
  const deps: DependencyNode[] = [];
  for (const edge of graph.forwardEdges.get(node.key) ?? []) {
    const dep = graph.nodes.get(edge.toKey);
    if (dep) deps.push(dep);
  }
  return deps;
}

/** Outgoing edge targets sorted by name; duplicate edges keep their relative order. */
export function sortedDependenciesOf(
  graph: DependencyGraph,
  node: DependencyNode,
): DependencyNode[] {
  return dependenciesOf(graph, node).sort((a, b) => compareNames(a.name, b.name));
}

/** Every project node, sorted by name. */
export function projectNodes(graph: DependencyGraph): DependencyNode[] {
  return Array.from(graph.nodes.values())
    .filter((n) => n.kind === "project")
    .sort((a, b) => compareNames(a.name, b.name));
}

export function indent(depth: number): string {
  return "  ".repeat(depth);
}
