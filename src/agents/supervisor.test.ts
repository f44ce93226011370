/**
 * Tests for Supervisor
 */

import { beforeEach, describe, expect, test } from "vitest";
import { TaskStoreError, WorkerNotFoundError } from "./errors.ts";
import { Supervisor } from "./supervisor.ts";
import type { WorkerTaskResult } from "./types.ts";

function result(taskId: string, workerId: string, success = true): WorkerTaskResult {
  return {
    taskId,
    success,
    output: success ? `${taskId} done` : undefined,
    errorMessage: success ? undefined : "failed on purpose",
    workerId,
    durationMs: 10,
    completedAt: "2024-01-01T00:00:00.000Z",
  };
}

describe("Supervisor", () => {
  let supervisor: Supervisor;

  beforeEach(() => {
    supervisor = new Supervisor({ fallbackStrategy: "priority_based" });
  });

  describe("submission", () => {
    test("persists tasks as pending and returns their ids in order", async () => {
      const ids = await supervisor.submitTasks([
        { taskId: "t1", taskType: "search", input: "a" },
        { taskId: "t2", taskType: "search", input: "b", priority: 3 },
      ]);

      expect(ids).toEqual(["t1", "t2"]);
      expect(await supervisor.getTaskStatus("t1")).toBe("pending");
      expect((await supervisor.taskStore.get("t2"))?.priority).toBe(3);
      expect(supervisor.getStatistics().pending).toBe(2);
    });

    test("generates ids when none are given", async () => {
      const id = await supervisor.submitTask({ taskType: "search", input: null });

      expect(id).toMatch(/^task_\d+_\d+_[a-z0-9]+$/);
      expect((await supervisor.taskStore.get(id))?.priority).toBe(0);
    });

    test("rejects tasks the store refuses", async () => {
      await expect(supervisor.submitTask({ taskType: "", input: null })).rejects.toThrow(
        TaskStoreError
      );
    });
  });

  describe("assignPendingTasks", () => {
    test("keeps tasks queued while no worker is online", async () => {
      await supervisor.submitTask({ taskId: "t1", taskType: "search", input: null });

      expect(await supervisor.assignPendingTasks()).toEqual([]);
      expect(await supervisor.getTaskStatus("t1")).toBe("pending");

      supervisor.registry.register({ workerId: "w1", maxConcurrentTasks: 1 });
      expect(await supervisor.assignPendingTasks()).toEqual([{ taskId: "t1", workerId: "w1" }]);
      expect(await supervisor.getTaskStatus("t1")).toBe("in_progress");
      expect(supervisor.registry.get("w1")?.currentTaskCount).toBe(1);
    });

    test("skips offline workers", async () => {
      supervisor.registry.register({ workerId: "w1", maxConcurrentTasks: 4 });
      supervisor.registry.register({ workerId: "w2", maxConcurrentTasks: 4 });
      supervisor.registry.updateStatus("w1", "offline");
      await supervisor.submitTask({ taskId: "t1", taskType: "search", input: null });

      expect(await supervisor.assignPendingTasks()).toEqual([{ taskId: "t1", workerId: "w2" }]);
    });

    test("honours a preferred worker with spare capacity", async () => {
      supervisor.registry.register({ workerId: "w1", maxConcurrentTasks: 2 });
      supervisor.registry.register({ workerId: "w2", maxConcurrentTasks: 2 });
      supervisor.registry.incrementTaskCount("w2");
      await supervisor.submitTask({
        taskId: "t1",
        taskType: "search",
        input: null,
        preferredWorkerId: "w2",
      });

      expect(await supervisor.assignPendingTasks()).toEqual([{ taskId: "t1", workerId: "w2" }]);
    });

    test("assigns higher priority tasks first", async () => {
      supervisor.registry.register({ workerId: "w1", maxConcurrentTasks: 5 });
      await supervisor.submitTask({ taskId: "low", taskType: "x", input: null, priority: 0 });
      await supervisor.submitTask({ taskId: "high", taskType: "x", input: null, priority: 9 });

      const assigned = await supervisor.assignPendingTasks();

      expect(assigned.map((a) => a.taskId)).toEqual(["high", "low"]);
    });
  });

  describe("claimNextTask", () => {
    test("hands the next task to the calling worker", async () => {
      supervisor.registry.register({ workerId: "w1", maxConcurrentTasks: 1 });
      await supervisor.submitTask({ taskId: "t1", taskType: "x", input: null });

      const claimed = await supervisor.claimNextTask("w1");

      expect(claimed?.taskId).toBe("t1");
      expect(await supervisor.getTaskStatus("t1")).toBe("in_progress");
      expect(await supervisor.claimNextTask("w1")).toBeNull();
    });

    test("rejects unknown workers", async () => {
      await expect(supervisor.claimNextTask("ghost")).rejects.toThrow(WorkerNotFoundError);
    });

    test("skips tasks the worker lacks the capability for", async () => {
      supervisor.registry.register({ workerId: "w1", maxConcurrentTasks: 2 });
      await supervisor.submitTask({
        taskId: "search-1",
        taskType: "search",
        input: null,
        requiredCapability: "search",
        priority: 5,
      });
      await supervisor.submitTask({ taskId: "plain", taskType: "x", input: null });

      expect((await supervisor.claimNextTask("w1"))?.taskId).toBe("plain");
      expect(await supervisor.claimNextTask("w1")).toBeNull();
      expect(await supervisor.getTaskStatus("search-1")).toBe("pending");
      expect(supervisor.getStatistics().pending).toBe(1);
    });

    test("gives nothing to a worker at capacity", async () => {
      supervisor.registry.register({
        workerId: "w1",
        maxConcurrentTasks: 1,
        supportedTools: ["search"],
      });
      await supervisor.submitTask({ taskId: "a", taskType: "search", input: null });
      await supervisor.submitTask({ taskId: "b", taskType: "search", input: null });

      expect((await supervisor.claimNextTask("w1"))?.taskId).toBe("a");
      expect(await supervisor.claimNextTask("w1")).toBeNull();
      expect(supervisor.registry.get("w1")?.currentTaskCount).toBe(1);
      expect(await supervisor.getTaskStatus("b")).toBe("pending");
    });

    test("gives nothing to an offline worker", async () => {
      supervisor.registry.register({ workerId: "w1", maxConcurrentTasks: 2 });
      supervisor.registry.updateStatus("w1", "offline");
      await supervisor.submitTask({ taskId: "a", taskType: "x", input: null });

      expect(await supervisor.claimNextTask("w1")).toBeNull();
      expect(await supervisor.getTaskStatus("a")).toBe("pending");
    });
  });

  describe("completion", () => {
    test("stores the result and frees the worker", async () => {
      supervisor.registry.register({ workerId: "w1", maxConcurrentTasks: 1 });
      await supervisor.submitTask({ taskId: "t1", taskType: "x", input: null });
      await supervisor.assignPendingTasks();

      await supervisor.completeTask(result("t1", "w1"));

      expect(await supervisor.getTaskStatus("t1")).toBe("completed");
      expect((await supervisor.getResult("t1"))?.output).toBe("t1 done");
      expect(supervisor.registry.get("w1")?.currentTaskCount).toBe(0);
    });

    test("records failures", async () => {
      await supervisor.submitTask({ taskId: "t1", taskType: "x", input: null });
      await supervisor.completeTask(result("t1", "w1", false));

      expect(await supervisor.getTaskStatus("t1")).toBe("failed");
      expect((await supervisor.getResult("t1"))?.errorMessage).toBe("failed on purpose");
    });

    test("rejects a null result", async () => {
      await expect(supervisor.completeTask(null)).rejects.toThrow(TaskStoreError);
    });
  });

  describe("cancelTask", () => {
    test("cancels queued tasks", async () => {
      supervisor.registry.register({ workerId: "w1", maxConcurrentTasks: 1 });
      await supervisor.submitTask({ taskId: "t1", taskType: "x", input: null });

      expect(await supervisor.cancelTask("t1")).toBe(true);
      expect(await supervisor.getTaskStatus("t1")).toBe("cancelled");
      expect(await supervisor.assignPendingTasks()).toEqual([]);
    });

    test("frees the worker of an in-progress task", async () => {
      supervisor.registry.register({ workerId: "w1", maxConcurrentTasks: 1 });
      await supervisor.submitTask({ taskId: "t1", taskType: "x", input: null });
      await supervisor.assignPendingTasks();

      expect(await supervisor.cancelTask("t1")).toBe(true);
      expect(supervisor.registry.get("w1")?.currentTaskCount).toBe(0);
    });

    test("a late result leaves the task cancelled and uncounted", async () => {
      supervisor.registry.register({ workerId: "w1", maxConcurrentTasks: 1 });
      await supervisor.submitTask({ taskId: "t1", taskType: "x", input: null });
      await supervisor.assignPendingTasks();
      await supervisor.cancelTask("t1");

      await supervisor.completeTask(result("t1", "w1"));

      expect(await supervisor.getTaskStatus("t1")).toBe("cancelled");
      const stats = supervisor.getStatistics();
      expect(stats.cancelled).toBe(1);
      expect(stats.completed).toBe(0);
      expect(stats.inProgress).toBe(0);
      expect(supervisor.registry.get("w1")?.currentTaskCount).toBe(0);
    });

    test("refuses finished and unknown tasks", async () => {
      await supervisor.submitTask({ taskId: "t1", taskType: "x", input: null });
      await supervisor.completeTask(result("t1", "w1"));

      expect(await supervisor.cancelTask("t1")).toBe(false);
      expect(await supervisor.cancelTask("missing")).toBe(false);
    });
  });

  test("getStatistics summarizes the work", async () => {
    supervisor.registry.register({ workerId: "w1", maxConcurrentTasks: 3 });
    await supervisor.submitTasks([
      { taskId: "t1", taskType: "search", input: null },
      { taskId: "t2", taskType: "search", input: null },
      { taskId: "t3", taskType: "summarize", input: null },
    ]);
    await supervisor.assignPendingTasks();
    await supervisor.completeTask({ ...result("t1", "w1"), durationMs: 10 });
    await supervisor.completeTask({ ...result("t2", "w1", false), durationMs: 30 });

    expect(supervisor.getStatistics()).toEqual({
      totalSubmitted: 3,
      pending: 0,
      inProgress: 1,
      completed: 1,
      failed: 1,
      cancelled: 0,
      averageDurationMs: 20,
      tasksByType: { search: 2, summarize: 1 },
      tasksByWorker: { w1: 2 },
    });
  });
});
