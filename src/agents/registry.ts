/**
 * Worker Registry
 *
 * Workers available to the supervisor, keyed by id, with their advertised
 * capabilities and live task counts. Reads return copies; counts are only
 * changed through the registry.
 */

import { formatValidationIssues } from "../graph/state.ts";
import { engineLog } from "../utils/logger.ts";
import { WorkerRegistrationError } from "./errors.ts";
import { supportsCapability } from "./load-balancer.ts";
import {
  workerCapabilitiesSchema,
  type AgentInfo,
  type WorkerCapabilitiesInput,
  type WorkerStatus,
} from "./types.ts";

function now(): string {
  return new Date().toISOString();
}

function copy(worker: AgentInfo): AgentInfo {
  return {
    ...worker,
    capabilities: {
      ...worker.capabilities,
      supportedTools: [...worker.capabilities.supportedTools],
      supportedIntents: [...worker.capabilities.supportedIntents],
    },
  };
}

export class WorkerRegistry {
  private workers: Map<string, AgentInfo> = new Map();

  /**
   * Register a worker, or replace the capabilities of one already registered
   * (its task count is kept).
   */
  register(input: WorkerCapabilitiesInput): AgentInfo {
    const parsed = workerCapabilitiesSchema.safeParse(input);
    if (!parsed.success) {
      throw new WorkerRegistrationError(
        `Invalid worker capabilities: ${formatValidationIssues(parsed.error.issues)}`
      );
    }
    const capabilities = parsed.data;
    const existing = this.workers.get(capabilities.workerId);
    const worker: AgentInfo = {
      workerId: capabilities.workerId,
      capabilities,
      currentTaskCount: existing?.currentTaskCount ?? 0,
      status: existing?.status ?? "available",
      lastHeartbeat: now(),
    };
    this.workers.set(worker.workerId, worker);
    this.refreshStatus(worker);
    engineLog("Supervisor", existing ? "worker_updated" : "worker_registered", {
      workerId: worker.workerId,
      maxConcurrentTasks: capabilities.maxConcurrentTasks,
    });
    return copy(worker);
  }

  unregister(workerId: string): boolean {
    return this.workers.delete(workerId);
  }

  get(workerId: string): AgentInfo | null {
    const worker = this.workers.get(workerId);
    return worker ? copy(worker) : null;
  }

  has(workerId: string): boolean {
    return this.workers.has(workerId);
  }

  /**
   * All workers in registration order.
   */
  list(): AgentInfo[] {
    return [...this.workers.values()].map(copy);
  }

  /**
   * Workers advertising the capability as a tool or intent, ignoring case.
   */
  findByCapability(capability: string): AgentInfo[] {
    return this.list().filter((worker) => supportsCapability(worker, capability));
  }

  incrementTaskCount(workerId: string): boolean {
    const worker = this.workers.get(workerId);
    if (!worker) {
      return false;
    }
    worker.currentTaskCount += 1;
    this.refreshStatus(worker);
    return true;
  }

  /**
   * Decrease the task count, never below zero.
   */
  decrementTaskCount(workerId: string): boolean {
    const worker = this.workers.get(workerId);
    if (!worker) {
      return false;
    }
    worker.currentTaskCount = Math.max(0, worker.currentTaskCount - 1);
    this.refreshStatus(worker);
    return true;
  }

  updateStatus(workerId: string, status: WorkerStatus): boolean {
    const worker = this.workers.get(workerId);
    if (!worker) {
      return false;
    }
    worker.status = status;
    return true;
  }

  heartbeat(workerId: string): boolean {
    const worker = this.workers.get(workerId);
    if (!worker) {
      return false;
    }
    worker.lastHeartbeat = now();
    return true;
  }

  clear(): void {
    this.workers.clear();
  }

  get size(): number {
    return this.workers.size;
  }

  /** Busy at capacity, available below it. Offline is only left explicitly. */
  private refreshStatus(worker: AgentInfo): void {
    if (worker.status === "offline") {
      return;
    }
    worker.status =
      worker.currentTaskCount >= worker.capabilities.maxConcurrentTasks ? "busy" : "available";
  }
}
