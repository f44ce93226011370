/**
 * Task Store
 *
 * Persists delegated tasks, their status and their results. Every write
 * completes in one synchronous step before the returned promise settles, so
 * interleaved callers never observe a result without its status.
 */

import { formatValidationIssues } from "../graph/state.ts";
import { engineLog } from "../utils/logger.ts";
import { TaskStoreError } from "./errors.ts";
import {
  isTerminalStatus,
  workerTaskResultSchema,
  workerTaskSchema,
  type TaskStatus,
  type WorkerTask,
  type WorkerTaskResult,
} from "./types.ts";

/**
 * Storage contract for delegated tasks. Lookups of unknown ids return null.
 */
export interface TaskStore {
  /** Insert or replace a task. A new task starts `pending`; a replaced one keeps its status. */
  save(task: WorkerTask | null): Promise<void>;
  get(taskId: string): Promise<WorkerTask | null>;
  /** Record a result and move the task to `completed` or `failed`. */
  saveResult(result: WorkerTaskResult | null): Promise<void>;
  getResult(taskId: string): Promise<WorkerTaskResult | null>;
  getStatus(taskId: string): Promise<TaskStatus | null>;
  /** Returns false for unknown ids and for tasks already in a terminal status. */
  updateStatus(taskId: string, status: TaskStatus): Promise<boolean>;
  listByStatus(status: TaskStatus): Promise<WorkerTask[]>;
}

export class InMemoryTaskStore implements TaskStore {
  private tasks: Map<string, WorkerTask> = new Map();

  private statuses: Map<string, TaskStatus> = new Map();

  private results: Map<string, WorkerTaskResult> = new Map();

  async save(task: WorkerTask | null): Promise<void> {
    if (task === null) {
      throw new TaskStoreError("Cannot save a null task");
    }
    const parsed = workerTaskSchema.safeParse(task);
    if (!parsed.success) {
      throw new TaskStoreError(`Invalid task: ${formatValidationIssues(parsed.error.issues)}`);
    }

    const isNew = !this.tasks.has(task.taskId);
    this.tasks.set(task.taskId, { ...task });
    if (isNew) {
      this.statuses.set(task.taskId, "pending");
    }
    engineLog("TaskStore", isNew ? "task_saved" : "task_replaced", { taskId: task.taskId });
  }

  async get(taskId: string): Promise<WorkerTask | null> {
    const task = this.tasks.get(taskId);
    return task ? { ...task } : null;
  }

  async saveResult(result: WorkerTaskResult | null): Promise<void> {
    if (result === null) {
      throw new TaskStoreError("Cannot save a null result");
    }
    const parsed = workerTaskResultSchema.safeParse(result);
    if (!parsed.success) {
      throw new TaskStoreError(`Invalid result: ${formatValidationIssues(parsed.error.issues)}`);
    }

    this.results.set(result.taskId, { ...result });
    // A cancelled task keeps its status; completed and failed may replace each other
    const current = this.statuses.get(result.taskId);
    const status: TaskStatus =
      current === "cancelled" ? current : result.success ? "completed" : "failed";
    this.statuses.set(result.taskId, status);
    engineLog("TaskStore", "result_saved", { taskId: result.taskId, status });
  }

  async getResult(taskId: string): Promise<WorkerTaskResult | null> {
    const result = this.results.get(taskId);
    return result ? { ...result } : null;
  }

  async getStatus(taskId: string): Promise<TaskStatus | null> {
    return this.statuses.get(taskId) ?? null;
  }

  async updateStatus(taskId: string, status: TaskStatus): Promise<boolean> {
    const current = this.statuses.get(taskId);
    if (current === undefined || isTerminalStatus(current)) {
      return false;
    }
    this.statuses.set(taskId, status);
    engineLog("TaskStore", "status_updated", { taskId, from: current, to: status });
    return true;
  }

  async listByStatus(status: TaskStatus): Promise<WorkerTask[]> {
    const matches: WorkerTask[] = [];
    for (const [taskId, task] of this.tasks) {
      if (this.statuses.get(taskId) === status) {
        matches.push({ ...task });
      }
    }
    return matches;
  }

  get size(): number {
    return this.tasks.size;
  }

  clear(): void {
    this.tasks.clear();
    this.statuses.clear();
    this.results.clear();
  }
}
