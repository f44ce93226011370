/**
 * Agent State Helpers
 *
 * Handlers return a complete replacement state. These helpers build the
 * common replacements immutably so handlers can copy the rest forward:
 *
 * ```typescript
 * builder.addNode("classify", (state) =>
 *   withValues(state, { intent: "known" })
 * );
 * ```
 *
 * Values stored in `state.values` must be JSON-compatible when checkpointing
 * is enabled; {@link agentStateSchema} is the check the engine applies.
 */

import { z } from "zod";

import type { AgentState, Message } from "./types.ts";

// ============================================================================
// SCHEMAS
// ============================================================================

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ])
);

export const messageSchema = z.object({
  role: z.enum(["system", "user", "assistant", "tool"]),
  content: z.string(),
  name: z.string().optional(),
});

/**
 * Serializable agent state. Extra top-level fields are passed through
 * untouched; the `values` map must hold JSON-compatible data.
 */
export const agentStateSchema: z.ZodType<AgentState> = z
  .object({
    messages: z.array(messageSchema),
    values: z.record(z.string(), jsonValueSchema),
    currentNode: z.string().optional(),
    stepCount: z.number().int().nonnegative(),
  })
  .passthrough();

/**
 * Render zod issues as `path: message` pairs.
 */
export function formatValidationIssues(
  issues: ReadonlyArray<{ path: ReadonlyArray<PropertyKey>; message: string }>
): string {
  return issues
    .map((issue) => {
      const path =
        issue.path.length > 0 ? issue.path.map((segment) => String(segment)).join(".") : "(root)";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}

// ============================================================================
// CONSTRUCTION
// ============================================================================

/**
 * Create a fresh state for a new run.
 */
export function createAgentState(initial: Partial<AgentState> = {}): AgentState {
  return {
    messages: [...(initial.messages ?? [])],
    values: { ...(initial.values ?? {}) },
    currentNode: initial.currentNode,
    stepCount: initial.stepCount ?? 0,
  };
}

/**
 * Type guard for the structural core of an agent state.
 */
export function isAgentState(value: unknown): value is AgentState {
  return (
    typeof value === "object" &&
    value !== null &&
    "messages" in value &&
    Array.isArray(value.messages) &&
    "values" in value &&
    typeof value.values === "object" &&
    value.values !== null &&
    "stepCount" in value &&
    typeof value.stepCount === "number"
  );
}

// ============================================================================
// REPLACEMENT HELPERS
// ============================================================================

/**
 * Return a copy of the state with messages appended.
 */
export function appendMessages<TState extends AgentState>(
  state: TState,
  ...messages: Message[]
): TState {
  return { ...state, messages: [...state.messages, ...messages] };
}

/**
 * Return a copy of the state with the given values merged into `values`.
 */
export function withValues<TState extends AgentState>(
  state: TState,
  patch: Record<string, unknown>
): TState {
  return { ...state, values: { ...state.values, ...patch } };
}

/**
 * Read a value from the state's value map. With a schema, the value is
 * validated and `undefined` is returned when it does not match.
 */
export function getValue(state: AgentState, key: string): unknown;
export function getValue<T>(state: AgentState, key: string, schema: z.ZodType<T>): T | undefined;
export function getValue<T>(
  state: AgentState,
  key: string,
  schema?: z.ZodType<T>
): unknown {
  const raw = state.values[key];
  if (!schema) {
    return raw;
  }
  const parsed = schema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

/**
 * Describe why a state cannot be checkpointed, or return null if it can.
 */
export function findSerializationIssues(state: AgentState): string | null {
  const parsed = agentStateSchema.safeParse(state);
  return parsed.success ? null : formatValidationIssues(parsed.error.issues);
}
