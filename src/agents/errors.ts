/**
 * Delegation Error Types
 */

import { GraphError } from "../graph/errors.ts";

/**
 * A null or malformed task or result reached the task store.
 */
export class TaskStoreError extends GraphError {
  constructor(message: string) {
    super(message, "TASK_STORE");
    this.name = "TaskStoreError";
  }
}

/**
 * An operation named a worker the registry does not know.
 */
export class WorkerNotFoundError extends GraphError {
  constructor(public readonly workerId: string) {
    super(`Worker "${workerId}" is not registered`, "WORKER_NOT_FOUND");
    this.name = "WorkerNotFoundError";
  }
}

/**
 * Capabilities given to the registry failed validation.
 */
export class WorkerRegistrationError extends GraphError {
  constructor(message: string) {
    super(message, "WORKER_REGISTRATION");
    this.name = "WorkerRegistrationError";
  }
}
