/**
 * Tests for the engine diagnostic logger
 */

import { afterEach, describe, expect, test, vi } from "vitest";
import { DEBUG_ENV_VAR, engineLog, isEngineDebug, resetEngineDebugCache } from "./logger.ts";

describe("engineLog", () => {
  afterEach(() => {
    delete process.env[DEBUG_ENV_VAR];
    resetEngineDebugCache();
    vi.restoreAllMocks();
  });

  test("is silent unless debugging is enabled", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});

    engineLog("Engine", "node_started", { node: "a" });

    expect(isEngineDebug()).toBe(false);
    expect(debug).not.toHaveBeenCalled();
  });

  test("writes prefixed lines when enabled", () => {
    process.env[DEBUG_ENV_VAR] = "1";
    resetEngineDebugCache();
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});

    engineLog("Supervisor", "task_assigned", { taskId: "t1", workerId: "w2" });
    engineLog("Checkpoint", "saved");

    expect(debug.mock.calls).toEqual([
      ['[Graph:Supervisor] task_assigned {"taskId":"t1","workerId":"w2"}'],
      ["[Graph:Checkpoint] saved"],
    ]);
  });

  test("caches the flag until reset", () => {
    expect(isEngineDebug()).toBe(false);

    process.env[DEBUG_ENV_VAR] = "1";
    expect(isEngineDebug()).toBe(false);

    resetEngineDebugCache();
    expect(isEngineDebug()).toBe(true);
  });
});
