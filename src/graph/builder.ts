/**
 * Graph Builder
 *
 * Assembles nodes, static edges, conditional edges and entry/exit points,
 * then validates and freezes them into a {@link CompiledGraph}.
 *
 * @example
 * ```typescript
 * const workflow = graph()
 *   .addNode("start", start)
 *   .addNode("classify", classify)
 *   .addNode("respond", respond)
 *   .addEdge("start", "classify")
 *   .addConditionalEdge("classify", (s) =>
 *     s.values.intent === "known" ? "respond" : END
 *   )
 *   .setEntryPoint("start")
 *   .addExitPoint("respond")
 *   .compile();
 * ```
 */

import { CompiledGraph, type GraphDefinition } from "./compiled.ts";
import { DuplicateNodeError, GraphValidationError, UnknownNodeError } from "./errors.ts";
import {
  END,
  type AgentState,
  type ConditionalEdge,
  type Edge,
  type EdgeRouter,
  type GraphConfig,
  type NodeHandler,
  type NodeName,
} from "./types.ts";

export class GraphBuilder<TState extends AgentState = AgentState> {
  private nodes: Map<NodeName, NodeHandler<TState>> = new Map();

  private edges: Edge[] = [];

  /** Conditional edges per source node, in registration order */
  private conditionalEdges: Map<NodeName, ConditionalEdge<TState>[]> = new Map();

  private entryPoint: NodeName | null = null;

  private exitPoints: Set<NodeName> = new Set();

  /**
   * Register a node handler under a unique name.
   */
  addNode(name: NodeName, handler: NodeHandler<TState>): this {
    if (name.trim() === "") {
      throw new TypeError("Node name must be a non-empty string");
    }
    if (name === END) {
      throw new TypeError(`"${END}" is reserved and cannot be used as a node name`);
    }
    if (this.nodes.has(name)) {
      throw new DuplicateNodeError(name);
    }
    this.nodes.set(name, handler);
    return this;
  }

  /**
   * Add a static edge. `to` may be {@link END}.
   */
  addEdge(from: NodeName, to: NodeName): this {
    this.requireNode(from, "edge source");
    if (to !== END) {
      this.requireNode(to, "edge target");
    }
    this.edges.push({ from, to });
    return this;
  }

  /**
   * Add a conditional edge leaving `from`. Routers from the same node run in
   * registration order and the first non-null decision wins.
   *
   * @param targets - Optional declared destinations, checked by `compile()`
   */
  addConditionalEdge(
    from: NodeName,
    router: EdgeRouter<TState>,
    targets?: readonly NodeName[]
  ): this {
    this.requireNode(from, "conditional edge source");
    const list = this.conditionalEdges.get(from) ?? [];
    list.push({ from, router, targets: targets ? [...targets] : undefined });
    this.conditionalEdges.set(from, list);
    return this;
  }

  setEntryPoint(name: NodeName): this {
    this.requireNode(name, "entry point");
    this.entryPoint = name;
    return this;
  }

  addExitPoint(name: NodeName): this {
    this.requireNode(name, "exit point");
    this.exitPoints.add(name);
    return this;
  }

  hasNode(name: NodeName): boolean {
    return this.nodes.has(name);
  }

  getNode(name: NodeName): NodeHandler<TState> | undefined {
    return this.nodes.get(name);
  }

  getEdgesFrom(name: NodeName): Edge[] {
    return this.edges.filter((e) => e.from === name);
  }

  /**
   * Validate the structure and freeze it into a compiled graph. Every
   * violation is collected before throwing.
   */
  compile(config: GraphConfig<TState> = {}): CompiledGraph<TState> {
    const violations = this.validate();
    if (violations.length > 0) {
      throw new GraphValidationError(violations);
    }
    if (this.entryPoint === null) {
      throw new GraphValidationError(["Entry point is not set"]);
    }

    const conditional = new Map<NodeName, readonly ConditionalEdge<TState>[]>();
    for (const [from, list] of this.conditionalEdges) {
      conditional.set(from, Object.freeze(list.map((edge) => Object.freeze({ ...edge }))));
    }

    const definition: GraphDefinition<TState> = {
      nodes: new Map(this.nodes),
      edges: Object.freeze(this.edges.map((edge) => Object.freeze({ ...edge }))),
      conditionalEdges: conditional,
      entryPoint: this.entryPoint,
      exitPoints: new Set(this.exitPoints),
    };

    return new CompiledGraph(definition, config);
  }

  private requireNode(name: NodeName, usage: string): void {
    if (!this.nodes.has(name)) {
      throw new UnknownNodeError(name, usage);
    }
  }

  private validate(): string[] {
    const violations: string[] = [];
    const isKnown = (name: NodeName) => name === END || this.nodes.has(name);

    if (this.entryPoint === null) {
      violations.push("Entry point is not set");
    } else if (!this.nodes.has(this.entryPoint)) {
      violations.push(`Entry point "${this.entryPoint}" is not a registered node`);
    }

    for (const exit of this.exitPoints) {
      if (!this.nodes.has(exit)) {
        violations.push(`Exit point "${exit}" is not a registered node`);
      }
    }

    const staticCount = new Map<NodeName, number>();
    for (const edge of this.edges) {
      if (!this.nodes.has(edge.from)) {
        violations.push(`Edge source "${edge.from}" is not a registered node`);
      }
      if (!isKnown(edge.to)) {
        violations.push(`Edge "${edge.from}" -> "${edge.to}" targets an unknown node`);
      }
      staticCount.set(edge.from, (staticCount.get(edge.from) ?? 0) + 1);
    }
    for (const [from, count] of staticCount) {
      if (count > 1) {
        violations.push(`Node "${from}" has ${count} static edges; at most one is allowed`);
      }
    }

    for (const [from, list] of this.conditionalEdges) {
      if (!this.nodes.has(from)) {
        violations.push(`Conditional edge source "${from}" is not a registered node`);
      }
      for (const edge of list) {
        for (const target of edge.targets ?? []) {
          if (!isKnown(target)) {
            violations.push(`Conditional edge from "${from}" declares unknown target "${target}"`);
          }
        }
      }
    }

    if (this.entryPoint !== null && this.nodes.has(this.entryPoint) && !this.canTerminate(this.entryPoint)) {
      violations.push(
        `No path from entry point "${this.entryPoint}" reaches an exit point or ${END}`
      );
    }

    return violations;
  }

  /**
   * Walk static edges and declared conditional targets from `start`. A node
   * can end the run if it is an exit point, has an edge to END, has a
   * conditional edge (whose routers may return END) or has no outgoing edge.
   */
  private canTerminate(start: NodeName): boolean {
    const visited = new Set<NodeName>();
    const queue: NodeName[] = [start];

    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined || visited.has(current)) {
        continue;
      }
      visited.add(current);

      const outgoing = this.getEdgesFrom(current);
      const conditional = this.conditionalEdges.get(current) ?? [];

      if (this.exitPoints.has(current)) return true;
      if (conditional.length > 0) return true;
      if (outgoing.length === 0) return true;

      for (const edge of outgoing) {
        if (edge.to === END) return true;
        if (this.nodes.has(edge.to)) {
          queue.push(edge.to);
        }
      }
    }

    return false;
  }
}

/**
 * Create a new graph builder.
 */
export function graph<TState extends AgentState = AgentState>(): GraphBuilder<TState> {
  return new GraphBuilder<TState>();
}
