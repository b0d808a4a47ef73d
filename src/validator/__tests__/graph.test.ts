import { describe, it, expect } from "vitest";
import { analyzeGraph, hasCycle } from "../graph";

const edge = (sourceNodeId: string, targetNodeId: string) => ({
  sourceNodeId,
  targetNodeId,
});

describe("analyzeGraph", () => {
  it("orders a diamond by declaration order", () => {
    const topology = analyzeGraph(
      ["A", "B", "C", "D"],
      [edge("A", "C"), edge("A", "B"), edge("B", "D"), edge("C", "D")],
    );
    expect(topology.order).toEqual(["A", "C", "B", "D"]);
    expect(topology.entryNodes).toEqual(["A"]);
    expect(topology.exitNodes).toEqual(["D"]);
    expect(hasCycle(topology)).toBe(false);
  });

  it("reports the nodes left on a cycle", () => {
    const topology = analyzeGraph(
      ["A", "B", "C"],
      [edge("A", "B"), edge("B", "C"), edge("C", "B")],
    );
    expect(topology.order).toEqual(["A"]);
    expect(topology.cycleNodes).toEqual(["B", "C"]);
    expect(topology.exitNodes).toEqual([]);
    expect(hasCycle(topology)).toBe(true);
  });

  it("ignores edges to undeclared nodes", () => {
    const topology = analyzeGraph(["A"], [edge("A", "ghost")]);
    expect(topology.order).toEqual(["A"]);
    expect(topology.exitNodes).toEqual(["A"]);
  });
});
