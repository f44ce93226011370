/**
 * Node Factories
 *
 * Handler factories that wrap or compose other handlers:
 * - retryNode: re-runs a handler with exponential backoff
 * - loopNode: runs a handler repeatedly while a condition holds
 * - parallelNode: runs branches concurrently and merges their states
 * - subgraphNode: runs another compiled graph as a single node
 * - validationNode: checks the state and records the outcome in `values`
 *
 * Each factory returns a plain {@link NodeHandler}, so the result is added
 * to a graph like any other node and the engine still sees one step.
 */

import type { z } from "zod";

import { engineLog } from "../utils/logger.ts";
import type { CompiledGraph } from "./compiled.ts";
import {
  ParallelBranchError,
  RetriesExhaustedError,
  StateValidationError,
  toError,
} from "./errors.ts";
import { formatValidationIssues, getValue, isAgentState, withValues } from "./state.ts";
import type { AgentState, GraphExecutionOptions, NodeHandler } from "./types.ts";

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Wait for `ms`, rejecting with the signal's reason if it aborts first.
 */
function delay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(toError(signal.reason));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(toError(signal.reason));
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

function throwIfAborted(signal: AbortSignal): void {
  if (signal.aborted) {
    throw toError(signal.reason);
  }
}

async function runChecked<TState extends AgentState>(
  handler: NodeHandler<TState>,
  state: TState,
  signal: AbortSignal
): Promise<TState> {
  const result = await handler(state, signal);
  if (!isAgentState(result)) {
    throw new TypeError("Wrapped handler did not return a state");
  }
  return result;
}

// ============================================================================
// RETRY NODE
// ============================================================================

export interface RetryNodeConfig {
  /** Retries after the first attempt (default: 3) */
  maxRetries?: number;
  /** Delay before the first retry (default: 1000) */
  initialDelayMs?: number;
  /** Factor applied to the delay after every retry (default: 2) */
  backoffMultiplier?: number;
  /** Return false to fail immediately on an error */
  retryOn?: (error: Error) => boolean;
}

/**
 * Wrap a handler so failures are retried with exponential backoff. Errors
 * that `retryOn` rejects are rethrown unchanged; running out of retries
 * throws {@link RetriesExhaustedError} with the last error as its cause.
 *
 * @example
 * ```typescript
 * builder.addNode("fetch", retryNode(fetchDocuments, { maxRetries: 2, initialDelayMs: 250 }));
 * ```
 */
export function retryNode<TState extends AgentState = AgentState>(
  handler: NodeHandler<TState>,
  config: RetryNodeConfig = {}
): NodeHandler<TState> {
  const maxRetries = config.maxRetries ?? 3;
  const initialDelayMs = config.initialDelayMs ?? 1000;
  const backoffMultiplier = config.backoffMultiplier ?? 2;

  if (!Number.isInteger(maxRetries) || maxRetries < 0) {
    throw new RangeError(`maxRetries must be a non-negative integer, got ${maxRetries}`);
  }
  if (initialDelayMs < 0) {
    throw new RangeError(`initialDelayMs must not be negative, got ${initialDelayMs}`);
  }
  if (backoffMultiplier <= 0) {
    throw new RangeError(`backoffMultiplier must be greater than 0, got ${backoffMultiplier}`);
  }

  return async (state, signal) => {
    let delayMs = initialDelayMs;

    for (let attempt = 1; ; attempt++) {
      throwIfAborted(signal);
      try {
        return await runChecked(handler, state, signal);
      } catch (caught) {
        const error = toError(caught);
        if (signal.aborted || (config.retryOn && !config.retryOn(error))) {
          throw error;
        }
        if (attempt > maxRetries) {
          throw new RetriesExhaustedError(attempt, error);
        }
        engineLog("Nodes", "retry_scheduled", { attempt, delayMs, error: error.message });
        await delay(delayMs, signal);
        delayMs *= backoffMultiplier;
      }
    }
  };
}

// ============================================================================
// LOOP NODE
// ============================================================================

export interface LoopNodeConfig<TState extends AgentState = AgentState> {
  /** Checked before every iteration; the loop ends when it returns false */
  while: (state: TState) => boolean;
  /** Stop after this many iterations even if `while` still holds */
  maxIterations?: number;
}

/**
 * Run a handler repeatedly inside one step. Useful when the iterations are
 * an implementation detail that should not show up as separate steps.
 */
export function loopNode<TState extends AgentState = AgentState>(
  handler: NodeHandler<TState>,
  config: LoopNodeConfig<TState>
): NodeHandler<TState> {
  const { maxIterations } = config;
  if (maxIterations !== undefined && (!Number.isInteger(maxIterations) || maxIterations < 1)) {
    throw new RangeError(`maxIterations must be a positive integer, got ${maxIterations}`);
  }

  return async (state, signal) => {
    let current = state;
    let iterations = 0;
    while (config.while(current)) {
      if (maxIterations !== undefined && iterations >= maxIterations) {
        engineLog("Nodes", "loop_limit_reached", { maxIterations });
        break;
      }
      throwIfAborted(signal);
      current = await runChecked(handler, current, signal);
      iterations += 1;
    }
    return current;
  };
}

// ============================================================================
// PARALLEL NODE
// ============================================================================

/**
 * How many branches must succeed:
 * - "all": every branch; the first failure fails the node
 * - "any": the first success
 * - "majority": more than half
 * - "count": `requiredCount` branches
 */
export type ParallelMode = "all" | "any" | "majority" | "count";

export type ParallelMerger<TState extends AgentState = AgentState> = (
  state: TState,
  branchStates: readonly TState[]
) => TState | Promise<TState>;

export interface ParallelNodeConfig<TState extends AgentState = AgentState> {
  /** Default: "all" */
  mode?: ParallelMode;
  /** Required with mode "count" */
  requiredCount?: number;
  /** Combine the successful branch states; defaults to {@link mergeBranchStates} */
  merge?: ParallelMerger<TState>;
}

interface BranchResult<TState> {
  index: number;
  state: TState;
}

function requiredSuccesses(mode: ParallelMode, total: number, requiredCount?: number): number {
  switch (mode) {
    case "all":
      return total;
    case "any":
      return 1;
    case "majority":
      return Math.floor(total / 2) + 1;
    case "count":
      if (
        requiredCount === undefined ||
        !Number.isInteger(requiredCount) ||
        requiredCount < 1 ||
        requiredCount > total
      ) {
        throw new RangeError(`requiredCount must be between 1 and ${total} for mode "count"`);
      }
      return requiredCount;
  }
}

/**
 * Resolve once `required` runs succeed; reject as soon as that is no longer
 * possible.
 */
function settleBranches<TState>(
  runs: readonly (() => Promise<TState>)[],
  required: number
): Promise<BranchResult<TState>[]> {
  return new Promise((resolve, reject) => {
    const succeeded: BranchResult<TState>[] = [];
    const failures: Error[] = [];
    let settled = false;

    runs.forEach((run, index) => {
      void run().then(
        (state) => {
          if (settled) return;
          succeeded.push({ index, state });
          if (succeeded.length >= required) {
            settled = true;
            resolve(succeeded);
          }
        },
        (error: unknown) => {
          if (settled) return;
          failures.push(toError(error));
          if (failures.length > runs.length - required) {
            settled = true;
            reject(new ParallelBranchError(failures, runs.length));
          }
        }
      );
    });
  });
}

/**
 * Default merge: branch values are merged in branch order (later branches
 * win on shared keys) and the messages each branch appended are added in the
 * same order.
 */
export function mergeBranchStates<TState extends AgentState>(
  state: TState,
  branchStates: readonly TState[]
): TState {
  let values = { ...state.values };
  const messages = [...state.messages];
  for (const branch of branchStates) {
    values = { ...values, ...branch.values };
    messages.push(...branch.messages.slice(state.messages.length));
  }
  return { ...state, values, messages };
}

/**
 * Run branches concurrently on copies of the state. Branches still running
 * when the node settles see their signal aborted.
 *
 * @example
 * ```typescript
 * builder.addNode("gather", parallelNode([searchWeb, searchDocs, searchTickets], { mode: "majority" }));
 * ```
 */
export function parallelNode<TState extends AgentState = AgentState>(
  branches: readonly NodeHandler<TState>[],
  config: ParallelNodeConfig<TState> = {}
): NodeHandler<TState> {
  if (branches.length === 0) {
    throw new RangeError("parallelNode requires at least one branch");
  }
  const mode = config.mode ?? "all";
  const required = requiredSuccesses(mode, branches.length, config.requiredCount);
  const merge = config.merge ?? mergeBranchStates;

  return async (state, signal) => {
    const controller = new AbortController();
    const forwardAbort = () => controller.abort(signal.reason);
    signal.addEventListener("abort", forwardAbort, { once: true });

    try {
      const runs = branches.map(
        (branch) => () =>
          runChecked(
            branch,
            { ...state, values: { ...state.values }, messages: [...state.messages] },
            controller.signal
          )
      );
      const results = await settleBranches(runs, required);
      engineLog("Nodes", "parallel_settled", {
        mode,
        succeeded: results.length,
        branches: branches.length,
      });
      const ordered = [...results].sort((a, b) => a.index - b.index).map((result) => result.state);
      return await merge(state, ordered);
    } finally {
      signal.removeEventListener("abort", forwardAbort);
      controller.abort();
    }
  };
}

// ============================================================================
// SUBGRAPH NODE
// ============================================================================

export interface SubgraphNodeConfig<TState extends AgentState, TSubState extends AgentState> {
  /** Build the nested run's initial state */
  input: (state: TState) => TSubState;
  /** Fold the nested run's final state back into the parent state */
  output: (subState: TSubState, state: TState) => TState;
  /** Limits for the nested run; the parent's signal is always passed down */
  options?: Omit<GraphExecutionOptions, "signal">;
}

/**
 * Run another compiled graph to completion as one node of this graph.
 * Failures of the nested run propagate as this node's failure.
 */
export function subgraphNode<TState extends AgentState, TSubState extends AgentState>(
  subgraph: CompiledGraph<TSubState>,
  config: SubgraphNodeConfig<TState, TSubState>
): NodeHandler<TState> {
  return async (state, signal) => {
    engineLog("Nodes", "subgraph_started", { graph: subgraph.name });
    const final = await subgraph.invoke(config.input(state), { ...config.options, signal });
    return config.output(final, state);
  };
}

// ============================================================================
// VALIDATION NODE
// ============================================================================

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export type StateValidator<TState extends AgentState = AgentState> = (
  state: TState
) => ValidationResult | Promise<ValidationResult>;

export interface ValidationNodeConfig {
  /** Key in `values` the result is stored under (default: "validation") */
  resultKey?: string;
  /** Throw {@link StateValidationError} when invalid (default: true) */
  throwOnFailure?: boolean;
}

/**
 * Check the state with a validator function, or with a zod schema applied to
 * `state.values`. The result is stored in `values[resultKey]` so a router can
 * branch on it with {@link validationPassed}.
 */
export function validationNode<TState extends AgentState = AgentState>(
  validator: StateValidator<TState> | z.ZodType,
  config: ValidationNodeConfig = {}
): NodeHandler<TState> {
  const resultKey = config.resultKey ?? "validation";
  const throwOnFailure = config.throwOnFailure ?? true;

  const check = async (state: TState): Promise<ValidationResult> => {
    if (typeof validator === "function") {
      return validator(state);
    }
    const parsed = validator.safeParse(state.values);
    return parsed.success
      ? { valid: true, errors: [] }
      : { valid: false, errors: parsed.error.issues.map((issue) => formatValidationIssues([issue])) };
  };

  return async (state) => {
    const result = await check(state);
    engineLog("Nodes", "validated", { resultKey, valid: result.valid });
    if (!result.valid && throwOnFailure) {
      throw new StateValidationError(result.errors);
    }
    return withValues(state, { [resultKey]: { valid: result.valid, errors: [...result.errors] } });
  };
}

/**
 * Whether the last validation stored under `resultKey` passed.
 */
export function validationPassed(state: AgentState, resultKey = "validation"): boolean {
  const stored = getValue(state, resultKey);
  return (
    typeof stored === "object" && stored !== null && "valid" in stored && stored.valid === true
  );
}
