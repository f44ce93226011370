/**
 * Graph Execution Engine Types
 *
 * Core types for the graph-based agent execution engine:
 * - Agent state threaded through nodes
 * - Node handlers and edge routers stored by name
 * - Execution options, events and results
 * - The checkpoint store contract the engine calls out to
 */

// ============================================================================
// NODES AND EDGES
// ============================================================================

/**
 * Unique name of a node in the graph.
 */
export type NodeName = string;

/**
 * Sentinel target that terminates a run successfully.
 */
export const END = "__end__";

/**
 * Routing outcome of a conditional edge: a node name or {@link END}.
 */
export type EdgeDecision = NodeName;

/**
 * A single chat message in the state's history.
 */
export interface Message {
  role: "system" | "user" | "assistant" | "tool";
  content: string;
  /** Tool or participant name, when relevant */
  name?: string;
}

/**
 * Mutable payload threaded through the nodes of one run.
 * Workflows extend it with their own fields or keep them in `values`.
 */
export interface AgentState {
  /** Ordered message history (append by convention) */
  messages: Message[];
  /** Open, workflow-specific values keyed by name */
  values: Record<string, unknown>;
  /** Name of the node that produced this state */
  currentNode?: NodeName;
  /** Number of node executions so far in this run */
  stepCount: number;
}

/**
 * A node handler receives the current state and returns a complete
 * replacement. Fields it does not change must be copied forward.
 */
export type NodeHandler<TState extends AgentState = AgentState> = (
  state: TState,
  signal: AbortSignal
) => TState | Promise<TState>;

/**
 * A conditional edge router. Returning `null` means "no decision here",
 * letting the next registered router (or the static edge) decide.
 */
export type EdgeRouter<TState extends AgentState = AgentState> = (
  state: TState,
  signal: AbortSignal
) => EdgeDecision | null | Promise<EdgeDecision | null>;

/**
 * A static edge between two nodes.
 */
export interface Edge {
  from: NodeName;
  to: NodeName | typeof END;
}

/**
 * A conditional edge. Several may leave the same node; they are
 * evaluated in registration order.
 */
export interface ConditionalEdge<TState extends AgentState = AgentState> {
  from: NodeName;
  router: EdgeRouter<TState>;
  /** Declared destinations, used for validation and visualization */
  targets?: readonly (NodeName | typeof END)[];
}

// ============================================================================
// CHECKPOINTS
// ============================================================================

/**
 * Persisted snapshot of a run's position.
 */
export interface Checkpoint<TState extends AgentState = AgentState> {
  checkpointId: string;
  /** Node that just completed */
  node: NodeName;
  /** Node to run on resume, or END when the run had finished */
  next: NodeName;
  state: TState;
  step: number;
  createdAt: string;
}

/**
 * Storage collaborator for checkpoints. The engine only calls `save`
 * and `load`; the rest is for callers managing stored runs.
 */
export interface CheckpointStore<TState extends AgentState = AgentState> {
  save(checkpoint: Checkpoint<TState>): Promise<void>;
  load(checkpointId: string): Promise<Checkpoint<TState> | null>;
  delete(checkpointId: string): Promise<void>;
  list(): Promise<string[]>;
}

// ============================================================================
// EXECUTION
// ============================================================================

/**
 * Per-invocation configuration.
 */
export interface GraphExecutionOptions {
  /** Maximum node executions before the run fails (default: 100) */
  maxSteps?: number;
  /** Wall-clock budget in milliseconds (default: no limit) */
  timeoutMs?: number;
  /** Save a checkpoint after every successful node */
  checkpoint?: boolean;
  /**
   * Checkpoint to resume from and to save into. When the store holds a
   * checkpoint under this id the run starts from it instead of the entry point.
   */
  checkpointId?: string;
  /** Cooperative cancellation, checked between nodes */
  signal?: AbortSignal;
}

/**
 * Options after defaults have been applied.
 */
export interface ResolvedExecutionOptions {
  maxSteps: number;
  timeoutMs?: number;
  checkpoint: boolean;
  checkpointId?: string;
  signal?: AbortSignal;
}

/**
 * Graph-level configuration given to `compile()`.
 */
export interface GraphConfig<TState extends AgentState = AgentState> {
  /** Name used in logs and visualization */
  name?: string;
  /** Store used when checkpointing is enabled */
  checkpointStore?: CheckpointStore<TState>;
  /** Defaults applied to every invocation of this graph */
  defaults?: GraphExecutionOptions;
}

/**
 * Types of events emitted while a graph runs.
 */
export type GraphEventType =
  | "node_started"
  | "node_completed"
  | "edge_traversed"
  | "error"
  | "graph_completed";

/**
 * Observable unit emitted per transition, in strict execution order.
 */
export interface GraphEvent<TState extends AgentState = AgentState> {
  type: GraphEventType;
  /** Run identifier, also the id checkpoints are saved under */
  executionId: string;
  nodeName: NodeName;
  state: TState;
  /** Step count at the time of the event */
  step: number;
  /** Handler duration, on node_completed and error events */
  durationMs?: number;
  /** Routing target, on edge_traversed events */
  target?: NodeName;
  error?: Error;
  timestamp: string;
}

/**
 * Terminal status of a run.
 */
export type ExecutionStatus = "running" | "completed" | "failed" | "cancelled";

/**
 * Why a failed run failed.
 */
export type FailureKind =
  | "max_steps"
  | "timeout"
  | "handler_failure"
  | "node_not_found"
  | "checkpoint";

/**
 * Outcome of `execute()`, which reports failures instead of throwing them.
 */
export interface ExecutionResult<TState extends AgentState = AgentState> {
  status: Exclude<ExecutionStatus, "running">;
  state: TState;
  stepCount: number;
  failure?: FailureKind;
  error?: Error;
}

// ============================================================================
// DEFAULTS
// ============================================================================

export const DEFAULT_MAX_STEPS = 100;
