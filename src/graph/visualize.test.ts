/**
 * Tests for graph visualization
 */

import { describe, expect, test } from "vitest";
import { graph } from "./builder.ts";
import { END, type AgentState } from "./types.ts";
import { describeGraph, toMermaid } from "./visualize.ts";

const identity = (state: AgentState) => state;

function supportGraph() {
  return graph()
    .addNode("start", identity)
    .addNode("classify", identity)
    .addNode("respond", identity)
    .addNode("escalate-to-human", identity)
    .addEdge("start", "classify")
    .addConditionalEdge("classify", () => "respond", ["respond", "escalate-to-human"])
    .addEdge("respond", END)
    .setEntryPoint("start")
    .addExitPoint("respond")
    .addExitPoint("escalate-to-human")
    .compile({ name: "support" });
}

describe("describeGraph", () => {
  test("lists nodes, exit points and edges", () => {
    expect(describeGraph(supportGraph())).toEqual({
      name: "support",
      entryPoint: "start",
      exitPoints: ["respond", "escalate-to-human"],
      nodes: ["start", "classify", "respond", "escalate-to-human"],
      edges: [
        { from: "start", to: "classify", conditional: false },
        { from: "respond", to: END, conditional: false },
        { from: "classify", to: "respond", conditional: true },
        { from: "classify", to: "escalate-to-human", conditional: true },
      ],
    });
  });
});

describe("toMermaid", () => {
  test("renders shapes and edges", () => {
    expect(toMermaid(supportGraph())).toBe(
      [
        "graph LR",
        '  start(("start"))',
        '  classify["classify"]',
        '  respond(["respond"])',
        '  escalate_to_human(["escalate-to-human"])',
        '  __end__[["END"]]',
        "  start --> classify",
        "  respond --> __end__",
        "  classify -.->|conditional| respond",
        "  classify -.->|conditional| escalate_to_human",
        "",
      ].join("\n")
    );
  });

  test("notes routers without declared targets", () => {
    const compiled = graph()
      .addNode("loop", identity)
      .addConditionalEdge("loop", () => END)
      .setEntryPoint("loop")
      .compile();

    expect(toMermaid(compiled)).toBe(
      [
        "graph LR",
        '  loop(("loop"))',
        "  %% loop: 1 router(s) without declared targets",
        "",
      ].join("\n")
    );
  });
});
