/**
 * Unit tests for checkpoint stores
 *
 * Tests cover:
 * - MemoryCheckpointStore: latest-wins lookup, history and copy isolation
 * - FileCheckpointStore: JSON files under a directory, validated on load
 */

import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { FileCheckpointStore, MemoryCheckpointStore } from "./checkpointer.ts";
import { agentStateSchema, createAgentState } from "./state.ts";
import { END, type Checkpoint } from "./types.ts";

// ============================================================================
// Test Fixtures
// ============================================================================

function createCheckpoint(checkpointId: string, step: number, next = "review"): Checkpoint {
  return {
    checkpointId,
    node: "draft",
    next,
    state: createAgentState({ values: { step }, stepCount: step, currentNode: "draft" }),
    step,
    createdAt: "2024-01-01T00:00:00.000Z",
  };
}

// ============================================================================
// MemoryCheckpointStore
// ============================================================================

describe("MemoryCheckpointStore", () => {
  let store: MemoryCheckpointStore;

  beforeEach(() => {
    store = new MemoryCheckpointStore();
  });

  test("loads the latest checkpoint for an id", async () => {
    await store.save(createCheckpoint("run-1", 1));
    await store.save(createCheckpoint("run-1", 2));

    const loaded = await store.load("run-1");

    expect(loaded?.step).toBe(2);
    expect(loaded?.state.values).toEqual({ step: 2 });
  });

  test("returns null for an unknown id", async () => {
    expect(await store.load("missing")).toBeNull();
  });

  test("keeps every saved checkpoint in history", async () => {
    await store.save(createCheckpoint("run-1", 1));
    await store.save(createCheckpoint("run-1", 2, END));

    const history = await store.history("run-1");

    expect(history.map((c) => [c.step, c.next])).toEqual([
      [1, "review"],
      [2, END],
    ]);
  });

  test("drops the oldest checkpoints beyond maxHistory", async () => {
    const bounded = new MemoryCheckpointStore({ maxHistory: 2 });
    await bounded.save(createCheckpoint("run-1", 1));
    await bounded.save(createCheckpoint("run-1", 2));
    await bounded.save(createCheckpoint("run-1", 3, END));

    const history = await bounded.history("run-1");

    expect(history.map((c) => c.step)).toEqual([2, 3]);
    expect((await bounded.load("run-1"))?.step).toBe(3);
  });

  test("rejects a maxHistory below one", () => {
    expect(() => new MemoryCheckpointStore({ maxHistory: 0 })).toThrow(
      "maxHistory must be a positive integer, got 0"
    );
  });

  test("isolates stored copies from later mutation", async () => {
    const checkpoint = createCheckpoint("run-1", 1);
    await store.save(checkpoint);
    checkpoint.state.values.step = 99;

    const loaded = await store.load("run-1");
    if (loaded) {
      loaded.state.values.step = 42;
    }

    expect((await store.load("run-1"))?.state.values.step).toBe(1);
  });

  test("lists and deletes ids", async () => {
    await store.save(createCheckpoint("run-1", 1));
    await store.save(createCheckpoint("run-2", 1));

    expect(await store.list()).toEqual(["run-1", "run-2"]);
    expect(store.count).toBe(2);

    await store.delete("run-1");
    expect(await store.list()).toEqual(["run-2"]);

    store.clear();
    expect(store.count).toBe(0);
  });
});

// ============================================================================
// FileCheckpointStore
// ============================================================================

describe("FileCheckpointStore", () => {
  let baseDir: string;
  let store: FileCheckpointStore;

  beforeEach(() => {
    baseDir = join(tmpdir(), `agent-graph-checkpoints-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    store = new FileCheckpointStore(baseDir, agentStateSchema);
  });

  afterEach(async () => {
    await rm(baseDir, { recursive: true, force: true });
  });

  test("round-trips a checkpoint through disk", async () => {
    const checkpoint = createCheckpoint("run-1", 3);
    await store.save(checkpoint);

    expect(await store.load("run-1")).toEqual(checkpoint);
  });

  test("replaces the checkpoint saved under the same id", async () => {
    await store.save(createCheckpoint("run-1", 1));
    await store.save(createCheckpoint("run-1", 2));

    expect((await store.load("run-1"))?.step).toBe(2);
    expect(await store.list()).toEqual(["run-1"]);
  });

  test("returns null and an empty list before anything is saved", async () => {
    expect(await store.load("run-1")).toBeNull();
    expect(await store.list()).toEqual([]);
  });

  test("deletes checkpoints", async () => {
    await store.save(createCheckpoint("run-1", 1));
    await store.delete("run-1");

    expect(await store.load("run-1")).toBeNull();
    await expect(store.delete("run-1")).resolves.toBeUndefined();
  });

  test("rejects files that do not hold a valid state", async () => {
    await mkdir(baseDir, { recursive: true });
    await writeFile(
      join(baseDir, "broken.json"),
      JSON.stringify({
        checkpointId: "broken",
        node: "a",
        next: "b",
        step: 1,
        createdAt: "2024-01-01T00:00:00.000Z",
        state: { messages: "nope", values: {}, stepCount: 1 },
      }),
      "utf-8"
    );

    await expect(store.load("broken")).rejects.toThrow(
      "Checkpoint broken holds an invalid state: messages: Expected array, received string"
    );
  });
});
