/**
 * DOT Renderer and Parser Tests
 */

import { describe, it, expect } from "vitest";
import { ErrorCode, GraphBuildError, UnknownTargetError } from "../../errors.js";
import type { DependencyGraph } from "../../graph/index.js";
import { buildDependencyGraph } from "../../graph-builder/index.js";
import { nodeIds, pageFileName, parseDot, quote, renderDot } from "../index.js";
import { traceRecord, tracesOf } from "../../__tests__/fixtures.js";

// demand reads zone geometry and weather, writes the demand totals; costs reads them
function createGraph(): DependencyGraph {
  return buildDependencyGraph(
    new Map([
      [
        "demand",
        [
          traceRecord("demand", "inputs/building-geometry/zone.shp", "read", 0, { accessor: "get_zone_geometry", kind: "gis" }),
          traceRecord("demand", "databases/weather/weather.epw", "read", 1, { accessor: "get_weather", kind: "weather" }),
          traceRecord("demand", "outputs/data/demand/Total_demand.csv", "write", 2, { accessor: "get_total_demand" }),
        ],
      ],
      [
        "costs",
        [
          traceRecord("costs", "outputs/data/demand/Total_demand.csv", "read", 0, { accessor: "get_total_demand" }),
          traceRecord("costs", "outputs/data/costs/operation_costs.csv", "write", 1, { accessor: "get_costs_operation_file" }),
        ],
      ],
    ])
  );
}

function linesOf(text: string): string[] {
  return text.split("\n");
}

// =============================================================================
// Rendering
// =============================================================================

describe("renderDot", () => {
  it("should open with the header, layout defaults and legend", () => {
    const lines = linesOf(renderDot(createGraph()));

    expect(lines.slice(0, 2)).toEqual(['digraph "workflow" {', '    rankdir="LR";']);
    expect(lines).toContain("    subgraph cluster_legend {");
    expect(lines).toContain('        "legend:inputs" -> "legend:process"[style=invis];');
    expect(lines.at(-2)).toBe("}");
    expect(lines.at(-1)).toBe("");
  });

  it("should render each script as one process node", () => {
    const lines = linesOf(renderDot(createGraph()));

    expect(lines).toContain(
      '    "costs"[style=filled, color=white, fillcolor="#3FC0C2", shape=note, fontsize=20, fontname=arial];'
    );
    expect(lines).toContain(
      '    "demand"[style=filled, color=white, fillcolor="#3FC0C2", shape=note, fontsize=20, fontname=arial];'
    );
  });

  it("should place external artifacts in input clusters and produced ones in output clusters", () => {
    const text = renderDot(createGraph());

    expect(text).toContain(
      [
        "    subgraph cluster_1_in {",
        "        style=filled;",
        '        color="#E1F2F2";',
        "        fontsize=20;",
        "        rank=same;",
        '        label="databases/weather";',
        '        "weather.epw"[tooltip="databases/weather", comment="weather"];',
        "    }",
      ].join("\n")
    );
    expect(text).toContain(
      [
        "    subgraph cluster_4_out {",
        "        style=filled;",
        '        color="#aadcdd";',
        "        fontsize=20;",
        "        rank=same;",
        '        label="outputs/data/demand";',
        '        "Total_demand.csv"[tooltip="outputs/data/demand", comment="computed-result"];',
        "    }",
      ].join("\n")
    );
    expect(text).toContain("    subgraph cluster_2_in {");
    expect(text).toContain("    subgraph cluster_3_out {");
    expect(text).not.toContain("cluster_4_in");
  });

  it("should label edges with their accessors in stable order", () => {
    const edges = linesOf(renderDot(createGraph())).filter(
      (line) => line.includes(" -> ") && !line.includes("style=invis")
    );

    expect(edges).toEqual([
      '    "costs" -> "operation_costs.csv"[label="(get_costs_operation_file)"];',
      '    "Total_demand.csv" -> "costs"[label="(get_total_demand)"];',
      '    "weather.epw" -> "demand"[label="(get_weather)"];',
      '    "zone.shp" -> "demand"[label="(get_zone_geometry)"];',
      '    "demand" -> "Total_demand.csv"[label="(get_total_demand)"];',
    ]);
  });

  it("should render one script's direct inputs and outputs", () => {
    const text = renderDot(createGraph(), { script: "costs" });
    const lines = linesOf(text);

    expect(lines[0]).toBe('digraph "costs" {');
    expect(text).not.toContain('"demand"[');
    expect(text).not.toContain("zone.shp");
    expect(lines).toContain("    subgraph cluster_1_out {");
    expect(lines).toContain("    subgraph cluster_2_in {");
    expect(lines).toContain('        "Total_demand.csv"[tooltip="outputs/data/demand", comment="computed-result"];');
  });

  it("should group by artifact kind on request", () => {
    const lines = linesOf(renderDot(createGraph(), { grouping: "kind" }));

    expect(lines).toContain("    subgraph cluster_1_out {");
    expect(lines).toContain('        label="computed-result";');
    expect(lines).toContain("    subgraph cluster_2_in {");
    expect(lines).toContain('        label="gis";');
    expect(lines).toContain("    subgraph cluster_3_in {");
    expect(lines).toContain('        "zone.shp"[tooltip="inputs/building-geometry", comment="gis"];');
  });

  it("should qualify artifacts whose names collide across categories", () => {
    const graph = buildDependencyGraph(
      tracesOf({ split: { writes: ["east/total.csv", "west/total.csv", "west/other.csv"] } })
    );

    expect(nodeIds(graph)).toEqual(
      new Map([
        ["east/total.csv", "east/total.csv"],
        ["west/other.csv", "other.csv"],
        ["west/total.csv", "west/total.csv"],
      ])
    );
    expect(linesOf(renderDot(graph))).toContain(
      '    "split" -> "east/total.csv"[label="(get_total.csv)"];'
    );
  });

  it("should keep legend nodes apart from a script and artifacts named like them", () => {
    const graph = buildDependencyGraph(
      tracesOf({ process: { reads: ["x/inputs"], writes: ["y/outputs"] } })
    );
    const lines = linesOf(renderDot(graph));

    expect(lines.filter((line) => line.startsWith('    "process"['))).toHaveLength(1);
    expect(lines.filter((line) => line.trim().startsWith('"inputs"['))).toEqual([
      '        "inputs"[tooltip="x", comment="computed-result"];',
    ]);
    expect(lines.filter((line) => line.trim().startsWith('"outputs"['))).toEqual([
      '        "outputs"[tooltip="y", comment="computed-result"];',
    ]);
    expect(parseDot(renderDot(graph)).toJSON()).toEqual(graph.toJSON());
  });

  it("should reject unknown scripts", () => {
    expect(() => renderDot(createGraph(), { script: "demnd" })).toThrow(UnknownTargetError);
  });

  it("should not modify the graph", () => {
    const graph = createGraph();
    const before = JSON.stringify(graph.toJSON());

    renderDot(graph, { script: "demand", grouping: "kind" });

    expect(JSON.stringify(graph.toJSON())).toBe(before);
  });
});

describe("quote", () => {
  it("should escape quotes and backslashes", () => {
    expect(quote('say "hi"')).toBe('"say \\"hi\\""');
    expect(quote("a\\b")).toBe('"a\\\\b"');
  });

  it("should escape line breaks so every node stays on one line", () => {
    expect(quote("a\nb")).toBe('"a\\nb"');
    expect(quote("a\r\nb")).toBe('"a\\r\\nb"');
  });
});

describe("pageFileName", () => {
  it("should keep plain script names", () => {
    expect(pageFileName("radiation-daysim")).toBe("radiation-daysim.gv");
  });

  it("should keep pages inside the output directory", () => {
    expect(pageFileName("../escape")).toBe(".._escape.gv");
    expect(pageFileName("a/b\\c")).toBe("a_b_c.gv");
    expect(pageFileName("..")).toBe("_...gv");
  });
});

// =============================================================================
// Parsing
// =============================================================================

describe("parseDot", () => {
  it("should rebuild the rendered graph", () => {
    const graph = createGraph();

    expect(parseDot(renderDot(graph)).toJSON()).toEqual(graph.toJSON());
  });

  it("should rebuild graphs rendered by kind, with merged labels and qualified ids", () => {
    const graph = buildDependencyGraph(
      new Map([
        [
          "split",
          [
            traceRecord("split", "east/total.csv", "write", 0),
            traceRecord("split", "west/total.csv", "write", 1),
            traceRecord("split", 'data/say "hi".csv', "read", 2, { accessor: "get_greeting" }),
            traceRecord("split", 'data/say "hi".csv', "read", 3, { accessor: "get_hello", kind: "computed-result" }),
          ],
        ],
        ["idle", []],
      ])
    );

    expect(parseDot(renderDot(graph, { grouping: "kind" })).toJSON()).toEqual(graph.toJSON());
  });

  it("should rebuild categories that contain line breaks", () => {
    const graph = buildDependencyGraph(
      new Map([["split", [traceRecord("split", "x\ny/file.csv", "write", 0)]]])
    );
    const text = renderDot(graph);

    expect(linesOf(text)).toContain('        "file.csv"[tooltip="x\\ny", comment="computed-result"];');
    expect(parseDot(text).getArtifact("x\ny/file.csv")).toEqual({
      category: "x\ny",
      nameTemplate: "file.csv",
      kind: "computed-result",
    });
  });

  it("should reject lines the renderer never writes", () => {
    try {
      parseDot('digraph "x" {\nfoo bar\n}');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(GraphBuildError);
      if (error instanceof GraphBuildError) {
        expect(error.code).toBe(ErrorCode.GRAPH_PARSE_FAILED);
        expect(error.message).toBe("Unrecognised line 2: foo bar");
      }
    }
  });

  it("should reject edges between undeclared nodes", () => {
    expect(() => parseDot('digraph "x" {\n    "a" -> "b"[label="(get_a)"];\n}')).toThrow(
      'Edge "a" -> "b" on line 2 does not join a script and an artifact'
    );
  });
});
