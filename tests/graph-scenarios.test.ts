/**
 * End-to-end scenarios for the graph engine
 */

import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  END,
  FileCheckpointStore,
  MaxStepsExceededError,
  MemoryCheckpointStore,
  agentStateSchema,
  appendMessages,
  createAgentState,
  graph,
  withValues,
  type AgentState,
  type CheckpointStore,
} from "../src/index.ts";

describe("support triage graph", () => {
  test("classifies, responds and stops at respond", async () => {
    const executed: string[] = [];
    const compiled = graph()
      .addNode("start", (state) => {
        executed.push("start");
        return appendMessages(state, { role: "user", content: "Where is my order?" });
      })
      .addNode("classify", (state) => {
        executed.push("classify");
        return withValues(state, { intent: "known" });
      })
      .addNode("respond", (state) => {
        executed.push("respond");
        return appendMessages(state, { role: "assistant", content: "It ships today." });
      })
      .addEdge("start", "classify")
      .addConditionalEdge("classify", (state) =>
        state.values.intent === "known" ? "respond" : END
      )
      .setEntryPoint("start")
      .addExitPoint("respond")
      .compile();

    const final = await compiled.invoke(createAgentState());

    expect(executed).toEqual(["start", "classify", "respond"]);
    expect(final.stepCount).toBe(3);
    expect(final.currentNode).toBe("respond");
    expect(final.messages).toHaveLength(2);
  });
});

describe("conditional edge registration order", () => {
  test("the first matching router wins", async () => {
    const compiled = graph()
      .addNode("route", (state) => withValues(state, { urgent: true, vip: true }))
      .addNode("a", (state) => withValues(state, { handledBy: "a" }))
      .addNode("b", (state) => withValues(state, { handledBy: "b" }))
      .addNode("c", (state) => withValues(state, { handledBy: "c" }))
      .addConditionalEdge("route", (state) => (state.values.urgent === true ? "a" : null))
      .addConditionalEdge("route", (state) => (state.values.missing === true ? "b" : null))
      .addConditionalEdge("route", (state) => (state.values.vip === true ? "c" : null))
      .setEntryPoint("route")
      .compile();

    for (let run = 0; run < 5; run++) {
      const final = await compiled.invoke(createAgentState());
      expect(final.values.handledBy).toBe("a");
    }
  });
});

describe("step bound", () => {
  test("an unconditional cycle fails at exactly maxSteps executions", async () => {
    let executions = 0;
    const compiled = graph()
      .addNode("ping", (state) => {
        executions += 1;
        return state;
      })
      .addNode("pong", (state) => {
        executions += 1;
        return state;
      })
      .addEdge("ping", "pong")
      .addConditionalEdge("pong", () => "ping")
      .setEntryPoint("ping")
      .compile();

    const result = await compiled.execute(createAgentState(), { maxSteps: 7 });

    expect(result.status).toBe("failed");
    expect(result.error).toBeInstanceOf(MaxStepsExceededError);
    expect(executions).toBe(7);
  });
});

// ============================================================================
// Checkpoint round-trip
// ============================================================================

function countingGraph(store: CheckpointStore, calls: string[]) {
  return graph()
    .addNode("plan", (state) => {
      calls.push("plan");
      return withValues(state, { count: 0 });
    })
    .addNode("work", (state) => {
      calls.push("work");
      const count = Number(state.values.count) + 1;
      return appendMessages(withValues(state, { count }), {
        role: "assistant",
        content: `pass ${count}`,
      });
    })
    .addNode("finish", (state) => {
      calls.push("finish");
      return withValues(state, { done: true });
    })
    .addEdge("plan", "work")
    .addConditionalEdge("work", (state) => (Number(state.values.count) < 4 ? "work" : "finish"))
    .setEntryPoint("plan")
    .compile({ checkpointStore: store });
}

function comparable(state: AgentState) {
  return {
    messages: state.messages,
    values: state.values,
    currentNode: state.currentNode,
    stepCount: state.stepCount,
  };
}

describe("checkpoint round-trip", () => {
  let baseDir: string;

  beforeEach(() => {
    baseDir = join(tmpdir(), `agent-graph-scenario-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  });

  afterEach(async () => {
    await rm(baseDir, { recursive: true, force: true });
  });

  const stores: Array<[string, () => CheckpointStore]> = [
    ["memory", () => new MemoryCheckpointStore()],
    ["file", () => new FileCheckpointStore(baseDir, agentStateSchema)],
  ];

  for (const [kind, createStore] of stores) {
    test(`resuming an interrupted run reaches the uninterrupted result (${kind} store)`, async () => {
      const reference = await countingGraph(new MemoryCheckpointStore(), []).invoke(
        createAgentState()
      );

      const store = createStore();
      const calls: string[] = [];
      const interrupted = countingGraph(store, calls);
      let traversed = 0;
      for await (const event of interrupted.stream(createAgentState(), {
        checkpoint: true,
        checkpointId: "run-42",
      })) {
        if (event.type === "edge_traversed" && ++traversed === 3) {
          break;
        }
      }
      expect(calls).toEqual(["plan", "work", "work"]);

      const saved = await store.load("run-42");
      expect(saved?.next).toBe("work");
      expect(saved?.step).toBe(3);

      const resumed = await countingGraph(store, calls).invoke(createAgentState(), {
        checkpoint: true,
        checkpointId: "run-42",
      });

      expect(calls).toEqual(["plan", "work", "work", "work", "work", "finish"]);
      expect(comparable(resumed)).toEqual(comparable(reference));
    });
  }

  test("resuming a finished run returns its final state without running nodes", async () => {
    const store = new MemoryCheckpointStore();
    const first = await countingGraph(store, []).invoke(createAgentState(), {
      checkpoint: true,
      checkpointId: "done-run",
    });

    const calls: string[] = [];
    const again = await countingGraph(store, calls).invoke(createAgentState(), {
      checkpointId: "done-run",
    });

    expect(calls).toEqual([]);
    expect(comparable(again)).toEqual(comparable(first));
  });
});

describe("concurrent runs", () => {
  test("two runs share one compiled graph without sharing state", async () => {
    const store = new MemoryCheckpointStore();
    const compiled = graph()
      .addNode("tick", async (state) => {
        await new Promise<void>((resolve) => setTimeout(resolve, 5));
        return withValues(state, { ticks: Number(state.values.ticks ?? 0) + 1 });
      })
      .addConditionalEdge("tick", (state) =>
        Number(state.values.ticks) >= Number(state.values.target) ? END : "tick"
      )
      .setEntryPoint("tick")
      .compile({ checkpointStore: store });

    const [short, long] = await Promise.all([
      compiled.invoke(createAgentState({ values: { target: 2 } }), {
        checkpoint: true,
        checkpointId: "short",
      }),
      compiled.invoke(createAgentState({ values: { target: 4 } }), {
        checkpoint: true,
        checkpointId: "long",
      }),
    ]);

    expect(short.values).toEqual({ target: 2, ticks: 2 });
    expect(short.stepCount).toBe(2);
    expect(long.values).toEqual({ target: 4, ticks: 4 });
    expect(long.stepCount).toBe(4);
    expect((await store.history("short")).map((c) => c.step)).toEqual([1, 2]);
    expect((await store.history("long")).map((c) => c.step)).toEqual([1, 2, 3, 4]);
  });
});
