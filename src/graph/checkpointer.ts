/**
 * Checkpoint Stores
 *
 * Implementations of {@link CheckpointStore} the engine saves into after every
 * node when checkpointing is enabled:
 * - MemoryCheckpointStore: in-memory, for tests and single-process runs
 * - FileCheckpointStore: one JSON file per checkpoint id under a directory
 *
 * Each checkpoint id holds the latest checkpoint of one run; saving again
 * under the same id replaces it.
 */

import { mkdir, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";

import { formatValidationIssues } from "./state.ts";
import type { AgentState, Checkpoint, CheckpointStore } from "./types.ts";

// ============================================================================
// MEMORY STORE
// ============================================================================

export interface MemoryCheckpointStoreOptions {
  /** Checkpoints kept per id; older ones are dropped (default: 100) */
  maxHistory?: number;
}

/**
 * In-memory store. Checkpoints are deep-copied on the way in and out so a
 * later mutation of the live state cannot alter what was saved.
 *
 * Runs stay in memory until deleted; only the per-run history is bounded.
 */
export class MemoryCheckpointStore<TState extends AgentState = AgentState>
  implements CheckpointStore<TState>
{
  private storage: Map<string, Checkpoint<TState>[]> = new Map();
  private readonly maxHistory: number;

  constructor(options: MemoryCheckpointStoreOptions = {}) {
    const maxHistory = options.maxHistory ?? 100;
    if (!Number.isInteger(maxHistory) || maxHistory < 1) {
      throw new RangeError(`maxHistory must be a positive integer, got ${maxHistory}`);
    }
    this.maxHistory = maxHistory;
  }

  async save(checkpoint: Checkpoint<TState>): Promise<void> {
    const history = this.storage.get(checkpoint.checkpointId) ?? [];
    history.push(structuredClone(checkpoint));
    if (history.length > this.maxHistory) {
      history.splice(0, history.length - this.maxHistory);
    }
    this.storage.set(checkpoint.checkpointId, history);
  }

  async load(checkpointId: string): Promise<Checkpoint<TState> | null> {
    const latest = this.storage.get(checkpointId)?.at(-1);
    return latest ? structuredClone(latest) : null;
  }

  /**
   * Every checkpoint saved under an id, oldest first.
   */
  async history(checkpointId: string): Promise<Checkpoint<TState>[]> {
    return (this.storage.get(checkpointId) ?? []).map((checkpoint) => structuredClone(checkpoint));
  }

  async delete(checkpointId: string): Promise<void> {
    this.storage.delete(checkpointId);
  }

  async list(): Promise<string[]> {
    return [...this.storage.keys()];
  }

  clear(): void {
    this.storage.clear();
  }

  get count(): number {
    return this.storage.size;
  }
}

// ============================================================================
// FILE STORE
// ============================================================================

const checkpointFileSchema = z.object({
  checkpointId: z.string(),
  node: z.string(),
  next: z.string(),
  step: z.number().int().nonnegative(),
  createdAt: z.string(),
  state: z.unknown(),
});

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * File-backed store. Loaded states are validated with the schema given to
 * the constructor (`agentStateSchema` for plain agent states).
 *
 * @example
 * ```typescript
 * const store = new FileCheckpointStore("./.checkpoints", agentStateSchema);
 * const compiled = builder.compile({ checkpointStore: store });
 * ```
 */
export class FileCheckpointStore<TState extends AgentState = AgentState>
  implements CheckpointStore<TState>
{
  constructor(
    private readonly baseDir: string,
    private readonly stateSchema: z.ZodType<TState>
  ) {}

  private getCheckpointPath(checkpointId: string): string {
    const safeId = checkpointId.replace(/[^a-zA-Z0-9_-]/g, "_");
    return join(this.baseDir, `${safeId}.json`);
  }

  async save(checkpoint: Checkpoint<TState>): Promise<void> {
    await mkdir(this.baseDir, { recursive: true });
    await writeFile(
      this.getCheckpointPath(checkpoint.checkpointId),
      JSON.stringify(checkpoint, null, 2),
      "utf-8"
    );
  }

  async load(checkpointId: string): Promise<Checkpoint<TState> | null> {
    const filePath = this.getCheckpointPath(checkpointId);

    let content: string;
    try {
      content = await readFile(filePath, "utf-8");
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }

    const envelope = checkpointFileSchema.safeParse(JSON.parse(content));
    if (!envelope.success) {
      throw new Error(
        `Malformed checkpoint file ${filePath}: ${formatValidationIssues(envelope.error.issues)}`
      );
    }
    const state = this.stateSchema.safeParse(envelope.data.state);
    if (!state.success) {
      throw new Error(
        `Checkpoint ${checkpointId} holds an invalid state: ${formatValidationIssues(state.error.issues)}`
      );
    }

    return { ...envelope.data, state: state.data };
  }

  async delete(checkpointId: string): Promise<void> {
    await rm(this.getCheckpointPath(checkpointId), { force: true });
  }

  /**
   * Stored checkpoint ids (as written to disk), sorted.
   */
  async list(): Promise<string[]> {
    try {
      const files = await readdir(this.baseDir);
      return files
        .filter((f) => f.endsWith(".json"))
        .map((f) => f.slice(0, -".json".length))
        .sort();
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }
  }
}
