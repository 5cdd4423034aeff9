import { describe, it, expect } from "vitest";
import { buildGraph } from "../builder.js";
import { getNode, dependenciesOf } from "../types.js";
import type { DependencyGraph } from "../types.js";
import { unit } from "./fixtures.js";

function depNames(graph: DependencyGraph, name: string): string[] {
  const node = getNode(graph, name);
  if (!node) throw new Error(`missing node ${name}`);
  return dependenciesOf(graph, node).map((n) => n.name);
}

describe("buildGraph", () => {
  it("creates project and package nodes with edges", () => {
    const graph = buildGraph([unit("A", ["B"], ["P1"]), unit("B")]);

    expect(getNode(graph, "A")?.kind).toBe("project");
    expect(getNode(graph, "B")?.kind).toBe("project");
    expect(getNode(graph, "P1")?.kind).toBe("package");
    expect(depNames(graph, "A")).toEqual(["B", "P1"]);
  });

  it("resolves references to units listed later", () => {
    const graph = buildGraph([unit("Web", ["Core"]), unit("Core")]);
    expect(depNames(graph, "Web")).toEqual(["Core"]);
  });

  it("drops references to unknown projects", () => {
    const graph = buildGraph([unit("Web", ["Missing", "Core"]), unit("Core")]);
    expect(depNames(graph, "Web")).toEqual(["Core"]);
    expect(getNode(graph, "Missing")).toBeUndefined();
    expect(graph.edges).toHaveLength(1);
  });

  it("matches references case-insensitively", () => {
    const graph = buildGraph([unit("Web", ["CORE"]), unit("Core")]);
    expect(depNames(graph, "Web")).toEqual(["Core"]);
  });

  it("keeps the first of two units with the same name and merges their edges", () => {
    const graph = buildGraph([
      unit("Shared", [], ["P1"]),
      unit("shared", [], ["P2"]),
    ]);

    const projects = Array.from(graph.nodes.values()).filter((n) => n.kind === "project");
    expect(projects).toHaveLength(1);
    expect(projects[0].name).toBe("Shared");
    expect(depNames(graph, "Shared")).toEqual(["P1", "P2"]);
  });

  it("creates one package node per case-insensitive id", () => {
    const graph = buildGraph([
      unit("A", [], ["Newtonsoft.Json"]),
      unit("B", [], ["newtonsoft.json"]),
    ]);

    const packages = Array.from(graph.nodes.values()).filter((n) => n.kind === "package");
    expect(packages.map((n) => n.name)).toEqual(["Newtonsoft.Json"]);
    expect(depNames(graph, "B")).toEqual(["Newtonsoft.Json"]);
  });

  it("links a package reference to a project of the same name", () => {
    const graph = buildGraph([unit("App", [], ["Lib"]), unit("Lib")]);
    expect(getNode(graph, "Lib")?.kind).toBe("project");
    expect(depNames(graph, "App")).toEqual(["Lib"]);
  });

  it("never gives package nodes outgoing edges", () => {
    const graph = buildGraph([
      unit("A", ["B"], ["P1", "P2"]),
      unit("B", ["A"], ["P2"]),
    ]);

    for (const node of graph.nodes.values()) {
      if (node.kind === "package") {
        expect(graph.forwardEdges.get(node.key)).toBeUndefined();
      }
    }
  });

  it("tolerates cycles and self references", () => {
    const graph = buildGraph([unit("X", ["Y", "X"]), unit("Y", ["X"])]);
    expect(depNames(graph, "X")).toEqual(["Y", "X"]);
    expect(depNames(graph, "Y")).toEqual(["X"]);
  });

  it("is deterministic for the same records", () => {
    const records = [unit("A", ["B", "C"], ["P"]), unit("B", ["C"]), unit("C", [], ["Q"])];
    const first = buildGraph(records);
    const second = buildGraph(records);

    expect(Array.from(second.nodes.entries())).toEqual(Array.from(first.nodes.entries()));
    expect(second.edges).toEqual(first.edges);
  });
});
