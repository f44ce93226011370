/**
 * Delegation Node Factories
 *
 * Node handlers that connect a graph to a {@link Supervisor}:
 * - delegateToWorkersNode: submits tasks built from the state and records
 *   their ids in `values.pendingTaskIds`
 * - collectResultsNode: reads results back, moving ids into
 *   `values.completedTaskIds` / `values.failedTaskIds` and storing the
 *   results under `values.taskResults`
 *
 * @example
 * ```typescript
 * graph()
 *   .addNode("delegate", delegateToWorkersNode(supervisor, (state) => [
 *     { taskType: "search", input: state.values.query, requiredCapability: "search" },
 *   ]))
 *   .addNode("collect", collectResultsNode(supervisor, { waitForAll: true }))
 *   .addEdge("delegate", "collect");
 * ```
 */

import { z } from "zod";

import { getValue, withValues } from "../graph/state.ts";
import type { AgentState, NodeHandler } from "../graph/types.ts";
import type { Supervisor } from "./supervisor.ts";
import type { WorkerTaskInput, WorkerTaskResult } from "./types.ts";

const taskIdListSchema = z.array(z.string());

const storedResultSchema = z.record(z.string(), z.record(z.string(), z.unknown()));

export type TaskFactory<TState extends AgentState> = (
  state: TState
) => readonly WorkerTaskInput[] | Promise<readonly WorkerTaskInput[]>;

export interface DelegateNodeOptions {
  /** Route the submitted tasks to workers right away (default: true) */
  assign?: boolean;
}

export interface CollectResultsOptions<TState extends AgentState> {
  /** Keep polling until every pending task has a result (default: false) */
  waitForAll?: boolean;
  /** Give up waiting after this long (default: 30000) */
  maxWaitMs?: number;
  /** Delay between polls (default: 100) */
  pollIntervalMs?: number;
  /** Fold the newly collected results into the state */
  aggregate?: (state: TState, results: readonly WorkerTaskResult[]) => TState | Promise<TState>;
}

function readIds(state: AgentState, key: string): string[] {
  return getValue(state, key, taskIdListSchema) ?? [];
}

/**
 * JSON-compatible view of a result; absent fields are left out.
 */
function toStoredResult(result: WorkerTaskResult): Record<string, unknown> {
  const stored: Record<string, unknown> = {
    success: result.success,
    workerId: result.workerId,
    durationMs: result.durationMs,
    completedAt: result.completedAt,
  };
  if (result.output !== undefined) {
    stored.output = result.output;
  }
  if (result.errorMessage !== undefined) {
    stored.errorMessage = result.errorMessage;
  }
  return stored;
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener("abort", done, { once: true });
  });
}

/**
 * Create a node that submits the tasks built by `createTasks` and appends
 * their ids to `values.pendingTaskIds`. It does not wait for results.
 */
export function delegateToWorkersNode<TState extends AgentState = AgentState>(
  supervisor: Supervisor,
  createTasks: TaskFactory<TState>,
  options: DelegateNodeOptions = {}
): NodeHandler<TState> {
  return async (state) => {
    const tasks = await createTasks(state);
    const taskIds = await supervisor.submitTasks(tasks);
    if (options.assign ?? true) {
      await supervisor.assignPendingTasks();
    }
    return withValues(state, {
      pendingTaskIds: [...readIds(state, "pendingTaskIds"), ...taskIds],
    });
  };
}

/**
 * Create a node that collects results for `values.pendingTaskIds`. Tasks
 * cancelled before producing a result count as failed. Ids without a result
 * stay pending.
 */
export function collectResultsNode<TState extends AgentState = AgentState>(
  supervisor: Supervisor,
  options: CollectResultsOptions<TState> = {}
): NodeHandler<TState> {
  const maxWaitMs = options.maxWaitMs ?? 30_000;
  const pollIntervalMs = options.pollIntervalMs ?? 100;

  return async (state, signal) => {
    const startedAt = Date.now();
    let pending = readIds(state, "pendingTaskIds");
    const completed: string[] = [];
    const failed: string[] = [];
    const collected: WorkerTaskResult[] = [];

    while (true) {
      const stillPending: string[] = [];
      for (const taskId of pending) {
        const result = await supervisor.getResult(taskId);
        if (result) {
          collected.push(result);
          (result.success ? completed : failed).push(taskId);
        } else if ((await supervisor.getTaskStatus(taskId)) === "cancelled") {
          failed.push(taskId);
        } else {
          stillPending.push(taskId);
        }
      }
      pending = stillPending;

      const keepWaiting =
        options.waitForAll === true &&
        pending.length > 0 &&
        !signal.aborted &&
        Date.now() - startedAt < maxWaitMs;
      if (!keepWaiting) {
        break;
      }
      await sleep(pollIntervalMs, signal);
    }

    const taskResults = { ...(getValue(state, "taskResults", storedResultSchema) ?? {}) };
    for (const result of collected) {
      taskResults[result.taskId] = toStoredResult(result);
    }

    const next = withValues(state, {
      pendingTaskIds: pending,
      completedTaskIds: [...readIds(state, "completedTaskIds"), ...completed],
      failedTaskIds: [...readIds(state, "failedTaskIds"), ...failed],
      taskResults,
    });
    return options.aggregate ? options.aggregate(next, collected) : next;
  };
}
