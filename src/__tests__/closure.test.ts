import { describe, it, expect } from "vitest";
import { collectClosure, renderClosure } from "../closure.js";
import { buildGraph } from "../builder.js";
import { cycleGraph, nodeOf, sampleGraph, unit } from "./fixtures.js";

describe("collectClosure", () => {
  it("partitions reachable nodes by kind", () => {
    const graph = sampleGraph();
    expect(collectClosure(graph, nodeOf(graph, "A"))).toEqual({
      projects: ["B", "C"],
      packages: ["P1", "P2"],
    });
  });

  it("excludes the root even when a cycle leads back to it", () => {
    const graph = cycleGraph();
    expect(collectClosure(graph, nodeOf(graph, "X"))).toEqual({
      projects: ["Y"],
      packages: [],
    });
  });

  it("lists a shared dependency once", () => {
    const graph = buildGraph([
      unit("App", ["Core", "Data"], ["Serilog"]),
      unit("Core", [], ["Serilog", "Polly"]),
      unit("Data", ["Core"], ["dapper"]),
    ]);
    expect(collectClosure(graph, nodeOf(graph, "App"))).toEqual({
      projects: ["Core", "Data"],
      packages: ["dapper", "Polly", "Serilog"],
    });
  });

  it("is empty for a node without dependencies", () => {
    const graph = sampleGraph();
    expect(collectClosure(graph, nodeOf(graph, "P1"))).toEqual({ projects: [], packages: [] });
  });

  it("walks long chains", () => {
    const depth = 50000;
    const records = Array.from({ length: depth }, (_, i) =>
      unit(`N${i}`, i + 1 < depth ? [`N${i + 1}`] : []),
    );
    const graph = buildGraph(records);
    const closure = collectClosure(graph, nodeOf(graph, "N0"));
    expect(closure.projects).toHaveLength(depth - 1);
    expect(closure.packages).toEqual([]);
  });
});

describe("renderClosure", () => {
  it("prints projects then packages, indented", () => {
    const graph = sampleGraph();
    expect(renderClosure(collectClosure(graph, nodeOf(graph, "A")))).toEqual([
      "Projects:",
      "  B",
      "  C",
      "NuGet Packages:",
      "  P1",
      "  P2",
    ]);
  });

  it("prints both headers when nothing is reachable", () => {
    expect(renderClosure({ projects: [], packages: [] })).toEqual(["Projects:", "NuGet Packages:"]);
  });
});
