/**
 * Load Balancer
 *
 * Picks one worker for a task from a candidate list. Returns `null` only when
 * the list is empty; otherwise some worker is always chosen, even a saturated
 * one, and the caller decides what to do with it.
 *
 * Strategies:
 * - round_robin: a cursor owned by this balancer, advanced once per call
 * - capability_based: workers supporting the task's required capability
 *   (tool or intent), then priority_based among them
 * - priority_based: least loaded by task count / max concurrent tasks
 * - random: uniform over the list
 */

import { engineLog } from "../utils/logger.ts";
import type { AgentInfo, LoadBalancingStrategy, WorkerTask } from "./types.ts";

export interface LoadBalancerOptions {
  /** Source of random numbers in [0, 1) for the random strategy */
  random?: () => number;
}

/**
 * Whether a worker advertises the capability as a tool or an intent.
 * Comparison ignores case.
 */
export function supportsCapability(worker: AgentInfo, capability: string): boolean {
  const wanted = capability.toLowerCase();
  const { supportedTools, supportedIntents } = worker.capabilities;
  return (
    supportedTools.some((tool) => tool.toLowerCase() === wanted) ||
    supportedIntents.some((intent) => intent.toLowerCase() === wanted)
  );
}

export function hasSpareCapacity(worker: AgentInfo): boolean {
  return worker.currentTaskCount < worker.capabilities.maxConcurrentTasks;
}

function loadRatio(worker: AgentInfo): number {
  return worker.currentTaskCount / worker.capabilities.maxConcurrentTasks;
}

export class LoadBalancer {
  private cursor = 0;

  private readonly random: () => number;

  constructor(options: LoadBalancerOptions = {}) {
    this.random = options.random ?? Math.random;
  }

  selectWorker(
    workers: readonly AgentInfo[],
    task: WorkerTask,
    strategy: LoadBalancingStrategy
  ): AgentInfo | null {
    if (workers.length === 0) {
      return null;
    }

    const selected = this.pick(workers, task, strategy);
    engineLog("Balancer", "worker_selected", {
      taskId: task.taskId,
      strategy,
      workerId: selected.workerId,
      candidates: workers.length,
    });
    return selected;
  }

  private pick(
    workers: readonly AgentInfo[],
    task: WorkerTask,
    strategy: LoadBalancingStrategy
  ): AgentInfo {
    switch (strategy) {
      case "round_robin":
        return this.selectRoundRobin(workers);
      case "capability_based":
        return this.selectCapabilityBased(workers, task);
      case "priority_based":
        return this.selectPriorityBased(workers);
      case "random":
        return this.selectRandom(workers);
    }
  }

  /**
   * Rewind the round-robin cursor.
   */
  reset(): void {
    this.cursor = 0;
  }

  private selectRoundRobin(workers: readonly AgentInfo[]): AgentInfo {
    const index = this.cursor % workers.length;
    this.cursor += 1;
    return this.at(workers, index);
  }

  private selectCapabilityBased(workers: readonly AgentInfo[], task: WorkerTask): AgentInfo {
    const capability = task.requiredCapability;
    if (capability) {
      const capable = workers.filter((worker) => supportsCapability(worker, capability));
      if (capable.length > 0) {
        return this.selectPriorityBased(capable);
      }
    }
    return this.selectPriorityBased(workers);
  }

  /**
   * Workers with spare capacity win over saturated ones. Within the chosen
   * set: lowest load ratio, then fewest tasks, then input order.
   */
  private selectPriorityBased(workers: readonly AgentInfo[]): AgentInfo {
    const withCapacity = workers.filter(hasSpareCapacity);
    const pool = withCapacity.length > 0 ? withCapacity : workers;

    let best = this.at(pool, 0);
    for (const worker of pool.slice(1)) {
      const ratio = loadRatio(worker);
      const bestRatio = loadRatio(best);
      if (
        ratio < bestRatio ||
        (ratio === bestRatio && worker.currentTaskCount < best.currentTaskCount)
      ) {
        best = worker;
      }
    }
    return best;
  }

  private selectRandom(workers: readonly AgentInfo[]): AgentInfo {
    const index = Math.min(Math.floor(this.random() * workers.length), workers.length - 1);
    return this.at(workers, index);
  }

  private at(workers: readonly AgentInfo[], index: number): AgentInfo {
    const worker = workers[index];
    if (!worker) {
      throw new RangeError(`No worker at index ${index} of ${workers.length}`);
    }
    return worker;
  }
}
