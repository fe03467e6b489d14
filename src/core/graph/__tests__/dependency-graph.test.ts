/**
 * Dependency Graph Tests
 */

import { describe, it, expect } from "vitest";
import { ErrorCode, GraphBuildError } from "../../errors.js";
import { buildDependencyGraph } from "../../graph-builder/index.js";
import { DependencyGraph, findStronglyConnectedComponents } from "../index.js";
import { tracesOf } from "../../__tests__/fixtures.js";

// A writes a.csv; B reads a.csv and writes b.csv; C reads both and writes c.csv
function createGraph(): DependencyGraph {
  return buildDependencyGraph(
    tracesOf({
      C: { reads: ["data/a.csv", "data/b.csv"], writes: ["results/c.csv"] },
      A: { reads: ["inputs/seed.csv"], writes: ["data/a.csv"] },
      B: { reads: ["data/a.csv"], writes: ["data/b.csv"] },
    })
  );
}

describe("DependencyGraph", () => {
  describe("lookups", () => {
    it("should list readers and writers of an artifact", () => {
      const graph = createGraph();

      expect(graph.readersOf("data/a.csv")).toEqual(["B", "C"]);
      expect(graph.writersOf("data/a.csv")).toEqual(["A"]);
      expect(graph.writersOf("inputs/seed.csv")).toEqual([]);
      expect(graph.readersOf("missing/x.csv")).toEqual([]);
    });

    it("should split a script's edges into inputs and outputs", () => {
      const graph = createGraph();

      expect(graph.inputsOf("C").map((edge) => edge.artifact)).toEqual(["data/a.csv", "data/b.csv"]);
      expect(graph.outputsOf("C").map((edge) => edge.artifact)).toEqual(["results/c.csv"]);
    });

    it("should find artifacts by name template in any category", () => {
      const graph = createGraph();

      expect(graph.findArtifacts("b.csv")).toEqual([
        { category: "data", nameTemplate: "b.csv", kind: "computed-result" },
      ]);
      expect(graph.hasArtifact("data/b.csv")).toBe(true);
      expect(graph.hasScript("data/b.csv")).toBe(false);
    });
  });

  describe("precedence projection", () => {
    it("should link writers to readers with the artifacts between them", () => {
      expect(createGraph().precedence()).toEqual([
        { from: "A", to: "B", artifacts: ["data/a.csv"] },
        { from: "A", to: "C", artifacts: ["data/a.csv"] },
        { from: "B", to: "C", artifacts: ["data/b.csv"] },
      ]);
    });

    it("should expose successors and predecessors", () => {
      const graph = createGraph();

      expect(graph.successorsOf("A")).toEqual(["B", "C"]);
      expect(graph.predecessorsOf("C")).toEqual(["A", "B"]);
      expect(graph.predecessorsOf("A")).toEqual([]);
    });

    it("should report script cycles with the artifacts that close them", () => {
      const graph = buildDependencyGraph(
        tracesOf({
          A: { reads: ["data/y.csv"], writes: ["data/x.csv"] },
          B: { reads: ["data/x.csv"], writes: ["data/y.csv"] },
          C: { reads: ["data/y.csv"] },
        })
      );

      expect(graph.scriptCycles()).toEqual([["A", "B"]]);
      expect(graph.linkingArtifacts(["A", "B"])).toEqual(["data/x.csv", "data/y.csv"]);
    });
  });

  describe("subgraphs", () => {
    it("should restrict to scripts with their edges and artifacts", () => {
      const sub = createGraph().restrictTo(["A", "B", "Z"]);

      expect(sub.scripts).toEqual(["A", "B"]);
      expect(sub.artifacts.map((a) => a.nameTemplate)).toEqual(["a.csv", "b.csv", "seed.csv"]);
      expect(sub.edges).toHaveLength(4);
    });

    it("should give a script's direct neighbourhood", () => {
      const page = createGraph().neighbourhood("B");

      expect(page.toJSON()).toEqual({
        scripts: ["B"],
        artifacts: [
          { key: "data/a.csv", category: "data", nameTemplate: "a.csv", kind: "computed-result" },
          { key: "data/b.csv", category: "data", nameTemplate: "b.csv", kind: "computed-result" },
        ],
        edges: [
          { script: "B", artifact: "data/a.csv", direction: "read", accessors: ["get_a.csv"] },
          { script: "B", artifact: "data/b.csv", direction: "write", accessors: ["get_b.csv"] },
        ],
      });
    });
  });

  it("should reject edges to unknown nodes", () => {
    expect(
      () =>
        new DependencyGraph({
          scripts: ["A"],
          artifacts: [],
          edges: [{ script: "A", artifact: "data/a.csv", direction: "read", accessors: [] }],
        })
    ).toThrow(GraphBuildError);

    try {
      new DependencyGraph({
        scripts: [],
        artifacts: [],
        edges: [{ script: "A", artifact: "data/a.csv", direction: "read", accessors: [] }],
      });
    } catch (error) {
      expect(error).toBeInstanceOf(GraphBuildError);
      if (error instanceof GraphBuildError) {
        expect(error.code).toBe(ErrorCode.GRAPH_SCRIPT_MISMATCH);
      }
    }
  });
});

describe("findStronglyConnectedComponents", () => {
  it("should put every node in exactly one component", () => {
    const successors: Record<string, string[]> = {
      a: ["b"],
      b: ["c"],
      c: ["a", "d"],
      d: [],
      e: ["e"],
    };

    const components = findStronglyConnectedComponents(
      ["a", "b", "c", "d", "e"],
      (node) => successors[node] ?? []
    );

    expect(components.map((c) => c.join(",")).sort()).toEqual(["a,b,c", "d", "e"]);
  });
});
