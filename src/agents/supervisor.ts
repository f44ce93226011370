/**
 * Supervisor
 *
 * Accepts delegated tasks, persists them as `pending`, queues them and hands
 * them to workers. Submission never waits for a worker: results are read
 * back later through the task store.
 *
 * Workers are reached two ways:
 * - push: `assignPendingTasks()` routes every queued task to a worker
 * - pull: `claimNextTask(workerId)` lets a worker take its next task
 *
 * Routing a task: its preferred worker when that worker is online with spare
 * capacity; else the capable workers with spare capacity, chosen
 * capability_based; else every online worker, chosen with the fallback
 * strategy.
 */

import { loadEngineConfig } from "../config/engine.ts";
import { engineLog } from "../utils/logger.ts";
import { generateId } from "../utils/id.ts";
import { TaskStoreError, WorkerNotFoundError } from "./errors.ts";
import { LoadBalancer, hasSpareCapacity, supportsCapability } from "./load-balancer.ts";
import { WorkerRegistry } from "./registry.ts";
import { TaskQueue } from "./task-queue.ts";
import { InMemoryTaskStore, type TaskStore } from "./task-store.ts";
import {
  isTerminalStatus,
  type AgentInfo,
  type LoadBalancingStrategy,
  type TaskStatus,
  type WorkerTask,
  type WorkerTaskInput,
  type WorkerTaskResult,
} from "./types.ts";

export interface SupervisorOptions {
  registry?: WorkerRegistry;
  taskStore?: TaskStore;
  queue?: TaskQueue;
  loadBalancer?: LoadBalancer;
  /** Strategy used when no capable worker has spare capacity (default from config) */
  fallbackStrategy?: LoadBalancingStrategy;
}

export interface TaskAssignment {
  taskId: string;
  workerId: string;
}

export interface SupervisorStatistics {
  totalSubmitted: number;
  /** Tasks waiting in the queue */
  pending: number;
  inProgress: number;
  completed: number;
  failed: number;
  cancelled: number;
  averageDurationMs: number;
  tasksByType: Record<string, number>;
  tasksByWorker: Record<string, number>;
}

export class Supervisor {
  readonly registry: WorkerRegistry;

  readonly taskStore: TaskStore;

  private readonly queue: TaskQueue;

  private readonly loadBalancer: LoadBalancer;

  private readonly fallbackStrategy: LoadBalancingStrategy;

  /** Worker currently holding each in-progress task */
  private assignments: Map<string, string> = new Map();

  private totalSubmitted = 0;

  private completed = 0;

  private failed = 0;

  private cancelled = 0;

  private totalDurationMs = 0;

  private tasksByType: Map<string, number> = new Map();

  private tasksByWorker: Map<string, number> = new Map();

  constructor(options: SupervisorOptions = {}) {
    this.registry = options.registry ?? new WorkerRegistry();
    this.taskStore = options.taskStore ?? new InMemoryTaskStore();
    this.queue = options.queue ?? new TaskQueue();
    this.loadBalancer = options.loadBalancer ?? new LoadBalancer();
    this.fallbackStrategy =
      options.fallbackStrategy ?? loadEngineConfig().loadBalancingStrategy;
  }

  // --------------------------------------------------------------------------
  // Submission
  // --------------------------------------------------------------------------

  async submitTask(input: WorkerTaskInput): Promise<string> {
    const task: WorkerTask = {
      taskId: input.taskId ?? generateId("task"),
      taskType: input.taskType,
      input: input.input,
      requiredCapability: input.requiredCapability,
      priority: input.priority ?? 0,
      preferredWorkerId: input.preferredWorkerId,
      createdAt: new Date().toISOString(),
    };

    await this.taskStore.save(task);
    this.queue.enqueue(task);
    this.totalSubmitted += 1;
    this.tasksByType.set(task.taskType, (this.tasksByType.get(task.taskType) ?? 0) + 1);

    engineLog("Supervisor", "task_submitted", {
      taskId: task.taskId,
      taskType: task.taskType,
      priority: task.priority,
    });
    return task.taskId;
  }

  /**
   * Persist and queue every task, returning their ids in input order.
   */
  async submitTasks(inputs: readonly WorkerTaskInput[]): Promise<string[]> {
    const taskIds: string[] = [];
    for (const input of inputs) {
      taskIds.push(await this.submitTask(input));
    }
    return taskIds;
  }

  // --------------------------------------------------------------------------
  // Assignment
  // --------------------------------------------------------------------------

  /**
   * Route every queued task to a worker and mark it `in_progress`. Tasks stay
   * queued while no worker is online.
   */
  async assignPendingTasks(): Promise<TaskAssignment[]> {
    const assigned: TaskAssignment[] = [];
    const deferred: WorkerTask[] = [];

    for (let task = this.queue.dequeue(); task !== null; task = this.queue.dequeue()) {
      const worker = this.routeTask(task);
      if (!worker) {
        deferred.push(task);
        continue;
      }
      if (await this.startTask(task, worker.workerId)) {
        assigned.push({ taskId: task.taskId, workerId: worker.workerId });
      }
    }

    for (const task of deferred) {
      this.queue.enqueue(task);
    }
    return assigned;
  }

  /**
   * Take the next queued task for a worker, preferring tasks addressed to it.
   * Offline workers and workers at capacity get nothing; unaddressed tasks
   * must match the worker's capabilities.
   */
  async claimNextTask(workerId: string): Promise<WorkerTask | null> {
    const worker = this.registry.get(workerId);
    if (!worker) {
      throw new WorkerNotFoundError(workerId);
    }
    if (worker.status === "offline" || !hasSpareCapacity(worker)) {
      return null;
    }

    const canServe = (task: WorkerTask) =>
      task.requiredCapability === undefined || supportsCapability(worker, task.requiredCapability);
    for (
      let task = this.queue.dequeue(workerId, canServe);
      task !== null;
      task = this.queue.dequeue(workerId, canServe)
    ) {
      if (await this.startTask(task, workerId)) {
        return task;
      }
    }
    return null;
  }

  /**
   * Pick a worker for a task without changing any state.
   */
  routeTask(task: WorkerTask): AgentInfo | null {
    const online = this.registry.list().filter((worker) => worker.status !== "offline");

    if (task.preferredWorkerId !== undefined) {
      const preferred = online.find(
        (worker) => worker.workerId === task.preferredWorkerId && hasSpareCapacity(worker)
      );
      if (preferred) {
        return preferred;
      }
    }

    const capability = task.requiredCapability;
    const capableWithCapacity = online.filter(
      (worker) =>
        hasSpareCapacity(worker) &&
        (capability === undefined || supportsCapability(worker, capability))
    );
    if (capableWithCapacity.length > 0) {
      return this.loadBalancer.selectWorker(capableWithCapacity, task, "capability_based");
    }

    return this.loadBalancer.selectWorker(online, task, this.fallbackStrategy);
  }

  // --------------------------------------------------------------------------
  // Results
  // --------------------------------------------------------------------------

  /**
   * Record a worker's result and release the worker's slot. A result for a
   * cancelled task is stored but not counted, and the task stays cancelled.
   */
  async completeTask(result: WorkerTaskResult | null): Promise<void> {
    if (result === null) {
      throw new TaskStoreError("Cannot complete a task with a null result");
    }

    const previous = await this.taskStore.getStatus(result.taskId);
    await this.taskStore.saveResult(result);
    this.release(result.taskId);

    if (previous === "cancelled") {
      engineLog("Supervisor", "result_after_cancel", {
        taskId: result.taskId,
        workerId: result.workerId,
      });
      return;
    }

    if (result.success) {
      this.completed += 1;
    } else {
      this.failed += 1;
    }
    this.totalDurationMs += result.durationMs;
    this.tasksByWorker.set(result.workerId, (this.tasksByWorker.get(result.workerId) ?? 0) + 1);

    engineLog("Supervisor", "task_completed", {
      taskId: result.taskId,
      workerId: result.workerId,
      success: result.success,
      durationMs: result.durationMs,
    });
  }

  getResult(taskId: string): Promise<WorkerTaskResult | null> {
    return this.taskStore.getResult(taskId);
  }

  getTaskStatus(taskId: string): Promise<TaskStatus | null> {
    return this.taskStore.getStatus(taskId);
  }

  /**
   * Cancel a task that has not finished. Returns false for unknown or
   * already-terminal tasks.
   */
  async cancelTask(taskId: string): Promise<boolean> {
    const cancelled = await this.taskStore.updateStatus(taskId, "cancelled");
    if (!cancelled) {
      return false;
    }
    this.queue.remove(taskId);
    this.release(taskId);
    this.cancelled += 1;
    engineLog("Supervisor", "task_cancelled", { taskId });
    return true;
  }

  getStatistics(): SupervisorStatistics {
    const finished = this.completed + this.failed;
    return {
      totalSubmitted: this.totalSubmitted,
      pending: this.queue.size,
      inProgress: this.assignments.size,
      completed: this.completed,
      failed: this.failed,
      cancelled: this.cancelled,
      averageDurationMs: finished > 0 ? this.totalDurationMs / finished : 0,
      tasksByType: Object.fromEntries(this.tasksByType),
      tasksByWorker: Object.fromEntries(this.tasksByWorker),
    };
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  /**
   * Mark a dequeued task in progress on a worker. Tasks cancelled while
   * queued are dropped.
   */
  private async startTask(task: WorkerTask, workerId: string): Promise<boolean> {
    // Reserve the slot before awaiting so concurrent assigners see it taken
    this.registry.incrementTaskCount(workerId);
    this.assignments.set(task.taskId, workerId);

    const status = await this.taskStore.getStatus(task.taskId);
    const started =
      status !== null &&
      !isTerminalStatus(status) &&
      (await this.taskStore.updateStatus(task.taskId, "in_progress"));
    if (!started) {
      this.release(task.taskId);
      return false;
    }

    engineLog("Supervisor", "task_assigned", { taskId: task.taskId, workerId });
    return true;
  }

  private release(taskId: string): void {
    const workerId = this.assignments.get(taskId);
    if (workerId === undefined) {
      return;
    }
    this.assignments.delete(taskId);
    this.registry.decrementTaskCount(workerId);
  }
}
