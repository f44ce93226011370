/**
 * Delegation and worker pool.
 */

export * from "./types.ts";
export { TaskStoreError, WorkerNotFoundError, WorkerRegistrationError } from "./errors.ts";
export {
  LoadBalancer,
  hasSpareCapacity,
  supportsCapability,
  type LoadBalancerOptions,
} from "./load-balancer.ts";
export { InMemoryTaskStore, type TaskStore } from "./task-store.ts";
export { TaskQueue } from "./task-queue.ts";
export { WorkerRegistry } from "./registry.ts";
export {
  Supervisor,
  type SupervisorOptions,
  type SupervisorStatistics,
  type TaskAssignment,
} from "./supervisor.ts";
export {
  collectResultsNode,
  delegateToWorkersNode,
  type CollectResultsOptions,
  type DelegateNodeOptions,
  type TaskFactory,
} from "./nodes.ts";
