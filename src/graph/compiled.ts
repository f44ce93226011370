/**
 * CompiledGraph Execution Engine
 *
 * Runs a validated graph from its entry point (or a checkpoint) until a
 * router returns END, a node with no outgoing route completes, or a limit is
 * hit. It handles:
 * - Sequential node execution, one handler at a time
 * - Conditional routing in registration order, falling back to static edges
 * - Step and wall-clock limits
 * - Cooperative cancellation, between nodes and through the handler signal
 * - Checkpointing after every node, and resumption from a checkpoint
 * - Streaming execution via AsyncGenerator
 *
 * `stream()`, `invoke()` and `execute()` share one run loop, so every mode
 * sees the same event sequence.
 */

import { engineLog } from "../utils/logger.ts";
import { generateId } from "../utils/id.ts";
import {
  CheckpointError,
  GraphCancelledError,
  GraphConfigError,
  MaxStepsExceededError,
  NodeHandlerFailureError,
  NodeNotFoundError,
  TimeoutExceededError,
  toError,
} from "./errors.ts";
import { resolveExecutionOptions } from "./options.ts";
import { findSerializationIssues, isAgentState } from "./state.ts";
import {
  END,
  type AgentState,
  type Checkpoint,
  type CheckpointStore,
  type ConditionalEdge,
  type Edge,
  type ExecutionResult,
  type FailureKind,
  type GraphConfig,
  type GraphEvent,
  type GraphEventType,
  type GraphExecutionOptions,
  type NodeHandler,
  type NodeName,
} from "./types.ts";

/**
 * Frozen graph structure produced by the builder.
 */
export interface GraphDefinition<TState extends AgentState = AgentState> {
  nodes: ReadonlyMap<NodeName, NodeHandler<TState>>;
  edges: readonly Edge[];
  conditionalEdges: ReadonlyMap<NodeName, readonly ConditionalEdge<TState>[]>;
  entryPoint: NodeName;
  exitPoints: ReadonlySet<NodeName>;
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Get current ISO timestamp.
 */
function now(): string {
  return new Date().toISOString();
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "an array";
  return typeof value === "object" ? "an object without the state fields" : typeof value;
}

function classifyFailure(error: unknown): FailureKind | null {
  if (error instanceof MaxStepsExceededError) return "max_steps";
  if (error instanceof TimeoutExceededError) return "timeout";
  if (error instanceof NodeHandlerFailureError) return "handler_failure";
  if (error instanceof CheckpointError) return "checkpoint";
  if (error instanceof NodeNotFoundError) return "node_not_found";
  return null;
}

/**
 * Where a cancelled run stopped: the node that was next or still running.
 */
interface RunInterruption<TState extends AgentState> {
  nodeName: NodeName;
  state: TState;
  step: number;
}

interface EventDetails {
  durationMs?: number;
  target?: NodeName;
  error?: Error;
}

// ============================================================================
// COMPILED GRAPH
// ============================================================================

/**
 * An immutable, executable graph. Safe to run concurrently: each run keeps
 * its own position, step count and state.
 */
export class CompiledGraph<TState extends AgentState = AgentState> {
  readonly name: string;

  private readonly staticEdges: ReadonlyMap<NodeName, NodeName>;

  constructor(
    private readonly definition: GraphDefinition<TState>,
    private readonly config: GraphConfig<TState> = {}
  ) {
    this.name = config.name ?? "graph";
    const staticEdges = new Map<NodeName, NodeName>();
    for (const edge of definition.edges) {
      staticEdges.set(edge.from, edge.to);
    }
    this.staticEdges = staticEdges;
  }

  // --------------------------------------------------------------------------
  // Introspection
  // --------------------------------------------------------------------------

  get entryPoint(): NodeName {
    return this.definition.entryPoint;
  }

  getNodeNames(): NodeName[] {
    return [...this.definition.nodes.keys()];
  }

  getEdges(): readonly Edge[] {
    return this.definition.edges;
  }

  getConditionalEdges(from: NodeName): readonly ConditionalEdge<TState>[] {
    return this.definition.conditionalEdges.get(from) ?? [];
  }

  isExitPoint(name: NodeName): boolean {
    return this.definition.exitPoints.has(name);
  }

  // --------------------------------------------------------------------------
  // Execution
  // --------------------------------------------------------------------------

  /**
   * Run to completion and return the final state.
   *
   * @throws MaxStepsExceededError, TimeoutExceededError, NodeHandlerFailureError,
   *   NodeNotFoundError, CheckpointError, or GraphCancelledError when the
   *   signal is aborted
   */
  async invoke(initialState: TState, options: GraphExecutionOptions = {}): Promise<TState> {
    const events = this.run(initialState, options);
    let finalState: TState | undefined;

    while (true) {
      const next = await events.next();
      if (next.done) {
        if (finalState !== undefined) {
          return finalState;
        }
        const stop = next.value;
        throw new GraphCancelledError(
          stop?.nodeName ?? this.entryPoint,
          stop?.state ?? initialState,
          stop?.step ?? 0
        );
      }
      if (next.value.type === "graph_completed") {
        finalState = next.value.state;
      }
    }
  }

  /**
   * Run to completion and report the outcome instead of throwing run
   * failures. Configuration errors are still thrown.
   */
  async execute(
    initialState: TState,
    options: GraphExecutionOptions = {}
  ): Promise<ExecutionResult<TState>> {
    const events = this.run(initialState, options);
    let state = initialState;
    let stepCount = 0;

    try {
      while (true) {
        const next = await events.next();
        if (next.done) {
          const stop = next.value;
          return stop
            ? { status: "cancelled", state: stop.state, stepCount: stop.step }
            : { status: "completed", state, stepCount };
        }
        state = next.value.state;
        stepCount = next.value.step;
      }
    } catch (error) {
      const failure = classifyFailure(error);
      if (failure === null) {
        throw error;
      }
      return { status: "failed", state, stepCount, failure, error: toError(error) };
    }
  }

  /**
   * Run the graph, yielding an event for every transition. When the signal is
   * aborted the stream ends without a `graph_completed` event.
   */
  async *stream(
    initialState: TState,
    options: GraphExecutionOptions = {}
  ): AsyncGenerator<GraphEvent<TState>, void, undefined> {
    yield* this.run(initialState, options);
  }

  /**
   * The run loop. Returns where the run stopped when it was cancelled, and
   * nothing when it completed.
   */
  private async *run(
    initialState: TState,
    options: GraphExecutionOptions
  ): AsyncGenerator<GraphEvent<TState>, RunInterruption<TState> | undefined, undefined> {
    const resolved = resolveExecutionOptions(options, this.config.defaults);
    const store = this.config.checkpointStore;
    if ((resolved.checkpoint || resolved.checkpointId !== undefined) && !store) {
      throw new GraphConfigError(
        `Graph "${this.name}" has no checkpoint store; pass one to compile() to checkpoint or resume`
      );
    }

    const executionId = resolved.checkpointId ?? generateId("exec");
    const startedAt = Date.now();
    const emit = (
      type: GraphEventType,
      nodeName: NodeName,
      state: TState,
      step: number,
      details: EventDetails = {}
    ): GraphEvent<TState> => ({
      type,
      executionId,
      nodeName,
      state,
      step,
      ...details,
      timestamp: now(),
    });

    let state = initialState;
    let step = 0;
    let current = this.entryPoint;

    if (resolved.checkpointId !== undefined && store) {
      const checkpoint = await this.loadCheckpoint(store, resolved.checkpointId, initialState);
      if (checkpoint) {
        engineLog("Checkpoint", "resume", {
          checkpointId: checkpoint.checkpointId,
          node: checkpoint.node,
          next: checkpoint.next,
          step: checkpoint.step,
        });
        state = checkpoint.state;
        step = checkpoint.step;
        if (checkpoint.next === END) {
          yield emit("graph_completed", checkpoint.node, state, step);
          return undefined;
        }
        current = checkpoint.next;
      }
    }

    // Aborted at the deadline or when the caller's signal fires
    const controller = new AbortController();
    const forwardAbort = () => controller.abort(resolved.signal?.reason);
    resolved.signal?.addEventListener("abort", forwardAbort, { once: true });
    let deadlineReached = false;
    const timer =
      resolved.timeoutMs !== undefined
        ? setTimeout(() => {
            deadlineReached = true;
            controller.abort(new Error("Execution deadline reached"));
          }, resolved.timeoutMs)
        : undefined;
    timer?.unref();

    const elapsed = () => Date.now() - startedAt;
    const deadlinePassed = () =>
      deadlineReached || (resolved.timeoutMs !== undefined && elapsed() > resolved.timeoutMs);

    engineLog("Engine", "run_started", {
      graph: this.name,
      executionId,
      node: current,
      maxSteps: resolved.maxSteps,
      timeoutMs: resolved.timeoutMs,
    });

    try {
      while (true) {
        if (resolved.signal?.aborted) {
          engineLog("Engine", "run_cancelled", { executionId, node: current, step });
          return { nodeName: current, state, step };
        }
        if (step >= resolved.maxSteps) {
          throw new MaxStepsExceededError(resolved.maxSteps, current, state, step);
        }
        if (resolved.timeoutMs !== undefined && deadlinePassed()) {
          throw new TimeoutExceededError(resolved.timeoutMs, elapsed(), current, state, step);
        }

        const handler = this.definition.nodes.get(current);
        if (!handler) {
          const error = new NodeNotFoundError(current);
          yield emit("error", current, state, step, { error });
          throw error;
        }

        yield emit("node_started", current, state, step);
        engineLog("Engine", "node_started", { executionId, node: current, step });

        const nodeStartedAt = Date.now();
        let produced: TState;
        try {
          const result = await handler(state, controller.signal);
          if (!isAgentState(result)) {
            throw new TypeError(`Handler returned ${describeValue(result)} instead of a state`);
          }
          produced = result;
        } catch (error) {
          const durationMs = Date.now() - nodeStartedAt;
          if (resolved.signal?.aborted && !deadlinePassed()) {
            engineLog("Engine", "run_cancelled", { executionId, node: current, step, durationMs });
            return { nodeName: current, state, step };
          }
          const failure =
            resolved.timeoutMs !== undefined && deadlinePassed()
              ? new TimeoutExceededError(resolved.timeoutMs, elapsed(), current, state, step)
              : new NodeHandlerFailureError(current, toError(error), state, step);
          engineLog("Engine", "node_failed", {
            executionId,
            node: current,
            durationMs,
            error: failure.message,
          });
          yield emit("error", current, state, step, { durationMs, error: failure });
          throw failure;
        }

        const durationMs = Date.now() - nodeStartedAt;
        step += 1;
        state = { ...produced, currentNode: current, stepCount: step };
        yield emit("node_completed", current, state, step, { durationMs });
        engineLog("Engine", "node_completed", { executionId, node: current, step, durationMs });

        let target: NodeName;
        try {
          target = await this.route(current, state, controller.signal);
        } catch (error) {
          if (resolved.signal?.aborted && !deadlinePassed()) {
            engineLog("Engine", "run_cancelled", { executionId, node: current, step });
            return { nodeName: current, state, step };
          }
          const failure = new NodeHandlerFailureError(current, toError(error), state, step);
          yield emit("error", current, state, step, { error: failure });
          throw failure;
        }

        if (resolved.checkpoint && store) {
          await this.saveCheckpoint(store, {
            checkpointId: executionId,
            node: current,
            next: target,
            state,
            step,
            createdAt: now(),
          });
        }

        yield emit("edge_traversed", current, state, step, { target });

        if (target === END) {
          engineLog("Engine", "run_completed", { executionId, node: current, step });
          yield emit("graph_completed", current, state, step);
          return undefined;
        }
        current = target;
      }
    } finally {
      clearTimeout(timer);
      resolved.signal?.removeEventListener("abort", forwardAbort);
    }
  }

  /**
   * Conditional routers first, in registration order; the first non-null
   * decision wins. Then the static edge. Otherwise the run ends here.
   */
  private async route(current: NodeName, state: TState, signal: AbortSignal): Promise<NodeName> {
    for (const edge of this.getConditionalEdges(current)) {
      const decision = await edge.router(state, signal);
      if (typeof decision === "string") {
        return decision;
      }
    }

    const staticTarget = this.staticEdges.get(current);
    if (staticTarget !== undefined) {
      return staticTarget;
    }

    if (!this.isExitPoint(current)) {
      engineLog("Engine", "dead_end", { node: current });
    }
    return END;
  }

  private async loadCheckpoint(
    store: CheckpointStore<TState>,
    checkpointId: string,
    initialState: TState
  ): Promise<Checkpoint<TState> | null> {
    try {
      return await store.load(checkpointId);
    } catch (error) {
      throw new CheckpointError(
        `Failed to load checkpoint "${checkpointId}": ${toError(error).message}`,
        this.entryPoint,
        initialState,
        0
      );
    }
  }

  private async saveCheckpoint(
    store: CheckpointStore<TState>,
    checkpoint: Checkpoint<TState>
  ): Promise<void> {
    const issues = findSerializationIssues(checkpoint.state);
    if (issues !== null) {
      throw new CheckpointError(
        `State after "${checkpoint.node}" cannot be checkpointed: ${issues}`,
        checkpoint.node,
        checkpoint.state,
        checkpoint.step
      );
    }

    try {
      await store.save(checkpoint);
    } catch (error) {
      throw new CheckpointError(
        `Failed to save checkpoint "${checkpoint.checkpointId}": ${toError(error).message}`,
        checkpoint.node,
        checkpoint.state,
        checkpoint.step
      );
    }
    engineLog("Checkpoint", "saved", {
      checkpointId: checkpoint.checkpointId,
      node: checkpoint.node,
      next: checkpoint.next,
      step: checkpoint.step,
    });
  }
}

// ============================================================================
// FACTORY FUNCTIONS
// ============================================================================

/**
 * Run a compiled graph to completion.
 */
export function invokeGraph<TState extends AgentState = AgentState>(
  graph: CompiledGraph<TState>,
  initialState: TState,
  options?: GraphExecutionOptions
): Promise<TState> {
  return graph.invoke(initialState, options);
}

/**
 * Run a compiled graph and report the outcome without throwing run failures.
 */
export function executeGraph<TState extends AgentState = AgentState>(
  graph: CompiledGraph<TState>,
  initialState: TState,
  options?: GraphExecutionOptions
): Promise<ExecutionResult<TState>> {
  return graph.execute(initialState, options);
}

/**
 * Stream execution events of a compiled graph.
 */
export async function* streamGraph<TState extends AgentState = AgentState>(
  graph: CompiledGraph<TState>,
  initialState: TState,
  options?: GraphExecutionOptions
): AsyncGenerator<GraphEvent<TState>, void, undefined> {
  yield* graph.stream(initialState, options);
}
