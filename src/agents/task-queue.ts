/**
 * Task Queue
 *
 * Pending tasks waiting for a worker, ordered by priority (higher first) and
 * by arrival among equal priorities.
 */

import type { WorkerTask } from "./types.ts";

export class TaskQueue {
  private items: WorkerTask[] = [];

  enqueue(task: WorkerTask): void {
    // Insert after the last task of equal or higher priority
    let index = this.items.length;
    while (index > 0) {
      const previous = this.items[index - 1];
      if (previous && previous.priority >= task.priority) {
        break;
      }
      index -= 1;
    }
    this.items.splice(index, 0, task);
  }

  /**
   * Take the next task. With a worker id, a task addressed to that worker is
   * taken first; tasks addressed to other workers are skipped, and so are
   * unaddressed tasks that `accepts` rejects.
   */
  dequeue(workerId?: string, accepts?: (task: WorkerTask) => boolean): WorkerTask | null {
    let index = 0;
    if (workerId !== undefined) {
      const addressed = this.items.findIndex((task) => task.preferredWorkerId === workerId);
      index =
        addressed >= 0
          ? addressed
          : this.items.findIndex(
              (task) => task.preferredWorkerId === undefined && (accepts?.(task) ?? true)
            );
    }
    if (index < 0) {
      return null;
    }
    const [task] = this.items.splice(index, 1);
    return task ?? null;
  }

  peek(): WorkerTask | null {
    return this.items[0] ?? null;
  }

  remove(taskId: string): boolean {
    const index = this.items.findIndex((task) => task.taskId === taskId);
    if (index < 0) {
      return false;
    }
    this.items.splice(index, 1);
    return true;
  }

  toArray(): WorkerTask[] {
    return [...this.items];
  }

  get size(): number {
    return this.items.length;
  }

  clear(): void {
    this.items = [];
  }
}
