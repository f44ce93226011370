/**
 * Graph Error Types
 *
 * Errors raised while building or running a graph. Run-time failures carry the
 * last successful state and step so callers can inspect how far a run got.
 */

import type { AgentState, NodeName } from "./types.ts";

/**
 * Base class for all graph errors.
 */
export class GraphError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = "GraphError";
  }
}

// ============================================================================
// BUILD-TIME
// ============================================================================

export class DuplicateNodeError extends GraphError {
  constructor(public readonly nodeName: NodeName) {
    super(`Node "${nodeName}" already exists`, "DUPLICATE_NODE");
    this.name = "DuplicateNodeError";
  }
}

/**
 * A node name that the graph does not contain. Raised at lookup time during a
 * run; {@link UnknownNodeError} is the build-time variant.
 */
export class NodeNotFoundError extends GraphError {
  constructor(
    public readonly nodeName: NodeName,
    message = `Node "${nodeName}" not found in graph`,
  ) {
    super(message, "NODE_NOT_FOUND");
    this.name = "NodeNotFoundError";
  }
}

export class UnknownNodeError extends NodeNotFoundError {
  constructor(nodeName: NodeName, usage: string) {
    super(nodeName, `Cannot use unknown node "${nodeName}" as ${usage}`);
    this.name = "UnknownNodeError";
  }
}

/**
 * Structural defects found by `compile()`. Lists every violation.
 */
export class GraphValidationError extends GraphError {
  constructor(public readonly violations: readonly string[]) {
    super(
      `Graph validation failed with ${violations.length} violation(s):\n` +
        violations.map((v) => `  - ${v}`).join("\n"),
      "GRAPH_VALIDATION",
    );
    this.name = "GraphValidationError";
  }
}

/**
 * Invalid execution options or configuration values.
 */
export class GraphConfigError extends GraphError {
  constructor(message: string) {
    super(message, "GRAPH_CONFIG");
    this.name = "GraphConfigError";
  }
}

// ============================================================================
// RUN-TIME
// ============================================================================

/**
 * Base class for failures that end a run.
 */
export class GraphRunError<TState extends AgentState = AgentState> extends GraphError {
  constructor(
    message: string,
    code: string,
    public readonly nodeName: NodeName,
    public readonly state: TState,
    public readonly step: number,
  ) {
    super(message, code);
    this.name = "GraphRunError";
  }
}

export class MaxStepsExceededError<TState extends AgentState = AgentState> extends GraphRunError<TState> {
  constructor(
    public readonly maxSteps: number,
    nodeName: NodeName,
    state: TState,
    step: number,
  ) {
    super(
      `Exceeded maximum steps (${maxSteps}) before running "${nodeName}"`,
      "MAX_STEPS_EXCEEDED",
      nodeName,
      state,
      step,
    );
    this.name = "MaxStepsExceededError";
  }
}

export class TimeoutExceededError<TState extends AgentState = AgentState> extends GraphRunError<TState> {
  constructor(
    public readonly timeoutMs: number,
    public readonly elapsedMs: number,
    nodeName: NodeName,
    state: TState,
    step: number,
  ) {
    super(
      `Execution timed out after ${elapsedMs}ms (limit ${timeoutMs}ms) at "${nodeName}"`,
      "TIMEOUT_EXCEEDED",
      nodeName,
      state,
      step,
    );
    this.name = "TimeoutExceededError";
  }
}

/**
 * A node handler threw or returned something that is not a state.
 * The engine never retries; handlers that want retries do them internally.
 */
export class NodeHandlerFailureError<TState extends AgentState = AgentState> extends GraphRunError<TState> {
  constructor(
    nodeName: NodeName,
    public override readonly cause: Error,
    state: TState,
    step: number,
  ) {
    super(
      `Node "${nodeName}" failed: ${cause.message}`,
      "NODE_HANDLER_FAILURE",
      nodeName,
      state,
      step,
    );
    this.name = "NodeHandlerFailureError";
  }
}

export class GraphCancelledError<TState extends AgentState = AgentState> extends GraphRunError<TState> {
  constructor(nodeName: NodeName, state: TState, step: number) {
    super(`Execution cancelled before "${nodeName}"`, "CANCELLED", nodeName, state, step);
    this.name = "GraphCancelledError";
  }
}

export class CheckpointError<TState extends AgentState = AgentState> extends GraphRunError<TState> {
  constructor(message: string, nodeName: NodeName, state: TState, step: number) {
    super(message, "CHECKPOINT", nodeName, state, step);
    this.name = "CheckpointError";
  }
}

// ============================================================================
// NODE COMBINATORS
// ============================================================================

export class RetriesExhaustedError extends GraphError {
  constructor(
    public readonly attempts: number,
    public override readonly cause: Error,
  ) {
    super(`Gave up after ${attempts} attempt(s): ${cause.message}`, "RETRIES_EXHAUSTED");
    this.name = "RetriesExhaustedError";
  }
}

/**
 * Too many branches of a parallel node failed for it to succeed.
 */
export class ParallelBranchError extends GraphError {
  constructor(
    public readonly failures: readonly Error[],
    public readonly branchCount: number,
  ) {
    super(
      `${failures.length} of ${branchCount} parallel branch(es) failed: ` +
        failures.map((failure) => failure.message).join("; "),
      "PARALLEL_BRANCH_FAILURE",
    );
    this.name = "ParallelBranchError";
  }
}

export class StateValidationError extends GraphError {
  constructor(public readonly errors: readonly string[]) {
    super(`State validation failed: ${errors.join("; ")}`, "STATE_VALIDATION");
    this.name = "StateValidationError";
  }
}

/**
 * Normalize any thrown value into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
