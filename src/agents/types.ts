/**
 * Delegation Types
 *
 * Tasks handed to worker agents, their results, the workers themselves and
 * the strategies used to pick a worker. Schemas validate data crossing the
 * task store boundary.
 */

import { z } from "zod";

// ============================================================================
// TASK STATUS
// ============================================================================

/**
 * Lifecycle of a delegated task:
 * pending → in_progress → completed | failed | blocked | review | cancelled.
 * `blocked` and `review` are holding states; the others are terminal.
 */
export type TaskStatus =
  | "pending"
  | "in_progress"
  | "completed"
  | "failed"
  | "blocked"
  | "review"
  | "cancelled";

export const TERMINAL_TASK_STATUSES: ReadonlySet<TaskStatus> = new Set<TaskStatus>([
  "completed",
  "failed",
  "cancelled",
]);

export function isTerminalStatus(status: TaskStatus): boolean {
  return TERMINAL_TASK_STATUSES.has(status);
}

// ============================================================================
// TASKS AND RESULTS
// ============================================================================

export const workerTaskSchema = z.object({
  taskId: z.string().min(1),
  taskType: z.string().min(1),
  input: z.unknown(),
  requiredCapability: z.string().min(1).optional(),
  priority: z.number().int(),
  preferredWorkerId: z.string().min(1).optional(),
  createdAt: z.string(),
});

/**
 * A delegated unit of work.
 */
export interface WorkerTask {
  taskId: string;
  taskType: string;
  input: unknown;
  /** Tool or intent name a worker must support */
  requiredCapability?: string;
  /** Higher runs first */
  priority: number;
  preferredWorkerId?: string;
  createdAt: string;
}

/**
 * What callers pass to the supervisor; id, priority and timestamp are filled in.
 */
export interface WorkerTaskInput {
  taskId?: string;
  taskType: string;
  input: unknown;
  requiredCapability?: string;
  priority?: number;
  preferredWorkerId?: string;
}

export const workerTaskResultSchema = z.object({
  taskId: z.string().min(1),
  success: z.boolean(),
  output: z.unknown(),
  errorMessage: z.string().optional(),
  workerId: z.string().min(1),
  durationMs: z.number().nonnegative(),
  completedAt: z.string(),
});

/**
 * Outcome of executing a worker task.
 */
export interface WorkerTaskResult {
  taskId: string;
  success: boolean;
  output?: unknown;
  errorMessage?: string;
  workerId: string;
  durationMs: number;
  completedAt: string;
}

// ============================================================================
// WORKERS
// ============================================================================

export type WorkerStatus = "available" | "busy" | "offline";

export const workerCapabilitiesSchema = z.object({
  workerId: z.string().min(1),
  workerType: z.string().min(1).default("worker"),
  supportedTools: z.array(z.string()).default([]),
  supportedIntents: z.array(z.string()).default([]),
  maxConcurrentTasks: z.number().int().positive(),
});

/**
 * What a worker advertises when it registers.
 */
export type WorkerCapabilities = z.output<typeof workerCapabilitiesSchema>;
export type WorkerCapabilitiesInput = z.input<typeof workerCapabilitiesSchema>;

/**
 * A worker's advertised state as seen by the balancer.
 */
export interface AgentInfo {
  workerId: string;
  capabilities: WorkerCapabilities;
  currentTaskCount: number;
  status: WorkerStatus;
  lastHeartbeat: string;
}

// ============================================================================
// LOAD BALANCING
// ============================================================================

export const LOAD_BALANCING_STRATEGIES = [
  "round_robin",
  "capability_based",
  "priority_based",
  "random",
] as const;

export type LoadBalancingStrategy = (typeof LOAD_BALANCING_STRATEGIES)[number];

export const loadBalancingStrategySchema = z.enum(LOAD_BALANCING_STRATEGIES);
