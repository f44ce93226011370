/**
 * Graph Visualization
 *
 * Renders a compiled graph as a Mermaid flowchart or a plain description.
 * Conditional edges appear only through their declared targets; a router
 * registered without targets is noted as a comment.
 */

import type { CompiledGraph } from "./compiled.ts";
import { END, type AgentState, type NodeName } from "./types.ts";

export interface GraphDescription {
  name: string;
  entryPoint: NodeName;
  exitPoints: NodeName[];
  nodes: NodeName[];
  edges: Array<{ from: NodeName; to: NodeName; conditional: boolean }>;
}

/**
 * Structural summary of a graph, in registration order.
 */
export function describeGraph<TState extends AgentState>(
  graph: CompiledGraph<TState>
): GraphDescription {
  const nodes = graph.getNodeNames();
  const edges: GraphDescription["edges"] = graph
    .getEdges()
    .map((edge) => ({ from: edge.from, to: edge.to, conditional: false }));

  for (const from of nodes) {
    for (const edge of graph.getConditionalEdges(from)) {
      for (const to of edge.targets ?? []) {
        edges.push({ from, to, conditional: true });
      }
    }
  }

  return {
    name: graph.name,
    entryPoint: graph.entryPoint,
    exitPoints: nodes.filter((node) => graph.isExitPoint(node)),
    nodes,
    edges,
  };
}

function mermaidId(name: NodeName): string {
  return name.replace(/[^A-Za-z0-9_]/g, "_");
}

function mermaidLabel(label: string): string {
  return label.replace(/"/g, "&quot;").replace(/\n/g, "<br/>");
}

/**
 * Render a Mermaid `graph LR` flowchart. The entry point is drawn as a
 * circle, exit points as stadiums, and END as a subroutine box.
 */
export function toMermaid<TState extends AgentState>(graph: CompiledGraph<TState>): string {
  const description = describeGraph(graph);
  const lines = ["graph LR"];

  for (const node of description.nodes) {
    const label = `"${mermaidLabel(node)}"`;
    const shape =
      node === description.entryPoint
        ? `((${label}))`
        : description.exitPoints.includes(node)
          ? `([${label}])`
          : `[${label}]`;
    lines.push(`  ${mermaidId(node)}${shape}`);
  }

  if (description.edges.some((edge) => edge.to === END)) {
    lines.push(`  ${END}[["END"]]`);
  }

  for (const edge of description.edges) {
    const arrow = edge.conditional ? "-.->|conditional|" : "-->";
    lines.push(`  ${mermaidId(edge.from)} ${arrow} ${mermaidId(edge.to)}`);
  }

  for (const node of description.nodes) {
    const undeclared = graph.getConditionalEdges(node).filter((edge) => !edge.targets);
    if (undeclared.length > 0) {
      lines.push(`  %% ${mermaidId(node)}: ${undeclared.length} router(s) without declared targets`);
    }
  }

  return `${lines.join("\n")}\n`;
}
