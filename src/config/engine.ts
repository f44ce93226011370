/**
 * Engine Configuration Module
 *
 * Centralized configuration for graph execution and delegation, read from
 * environment variables with explicit overrides taking precedence.
 */

import { z } from "zod";

import {
  loadBalancingStrategySchema,
  type LoadBalancingStrategy,
} from "../agents/types.ts";
import { GraphConfigError } from "../graph/errors.ts";
import { formatValidationIssues } from "../graph/state.ts";
import { DEFAULT_MAX_STEPS } from "../graph/types.ts";

// ============================================================================
// TYPES
// ============================================================================

export interface EngineConfig {
  /** Maximum node executions per run */
  maxSteps: number;
  /** Wall-clock budget per run in milliseconds (undefined: no limit) */
  timeoutMs?: number;
  /** Whether runs checkpoint after every node by default */
  checkpoint: boolean;
  /** Strategy the supervisor falls back to when no capable worker is free */
  loadBalancingStrategy: LoadBalancingStrategy;
}

export type LoadEngineConfigOptions = Partial<EngineConfig>;

// ============================================================================
// CONSTANTS
// ============================================================================

/**
 * Environment variable names for engine configuration.
 */
export const ENGINE_ENV_VARS = {
  MAX_STEPS: "AGENT_GRAPH_MAX_STEPS",
  TIMEOUT_MS: "AGENT_GRAPH_TIMEOUT_MS",
  /** "true"/"1" enables checkpointing by default */
  CHECKPOINT: "AGENT_GRAPH_CHECKPOINT",
  LB_STRATEGY: "AGENT_GRAPH_LB_STRATEGY",
} as const;

export const ENGINE_DEFAULTS = {
  maxSteps: DEFAULT_MAX_STEPS,
  checkpoint: false,
  loadBalancingStrategy: "priority_based",
} as const satisfies Omit<EngineConfig, "timeoutMs">;

const configSchema = z.object({
  maxSteps: z.coerce.number().int().positive().optional(),
  timeoutMs: z.coerce.number().int().positive().optional(),
  checkpoint: z
    .union([z.boolean(), z.enum(["true", "false", "1", "0"])])
    .transform((v) => v === true || v === "true" || v === "1")
    .optional(),
  loadBalancingStrategy: loadBalancingStrategySchema.optional(),
});

// ============================================================================
// LOADER
// ============================================================================

function readEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value === undefined || value === "" ? undefined : value;
}

function parse(source: string, input: Record<string, unknown>): z.output<typeof configSchema> {
  const parsed = configSchema.safeParse(input);
  if (!parsed.success) {
    throw new GraphConfigError(
      `Invalid engine configuration from ${source}: ${formatValidationIssues(parsed.error.issues)}`
    );
  }
  return parsed.data;
}

/**
 * Load engine configuration. Overrides beat environment variables, which
 * beat the defaults.
 *
 * @example
 * ```typescript
 * // AGENT_GRAPH_MAX_STEPS=25
 * const config = loadEngineConfig({ timeoutMs: 30_000 });
 * // { maxSteps: 25, timeoutMs: 30000, checkpoint: false, loadBalancingStrategy: "priority_based" }
 * ```
 */
export function loadEngineConfig(
  overrides: LoadEngineConfigOptions = {},
  env: NodeJS.ProcessEnv = process.env
): EngineConfig {
  const fromEnv = parse("environment", {
    maxSteps: readEnv(env, ENGINE_ENV_VARS.MAX_STEPS),
    timeoutMs: readEnv(env, ENGINE_ENV_VARS.TIMEOUT_MS),
    checkpoint: readEnv(env, ENGINE_ENV_VARS.CHECKPOINT),
    loadBalancingStrategy: readEnv(env, ENGINE_ENV_VARS.LB_STRATEGY),
  });
  const fromOverrides = parse("overrides", { ...overrides });

  return {
    maxSteps: fromOverrides.maxSteps ?? fromEnv.maxSteps ?? ENGINE_DEFAULTS.maxSteps,
    timeoutMs: fromOverrides.timeoutMs ?? fromEnv.timeoutMs,
    checkpoint: fromOverrides.checkpoint ?? fromEnv.checkpoint ?? ENGINE_DEFAULTS.checkpoint,
    loadBalancingStrategy:
      fromOverrides.loadBalancingStrategy ??
      fromEnv.loadBalancingStrategy ??
      ENGINE_DEFAULTS.loadBalancingStrategy,
  };
}

/**
 * Human-readable summary of a configuration, for logs.
 */
export function describeEngineConfig(config: EngineConfig): string {
  return [
    `Max steps: ${config.maxSteps}`,
    `Timeout: ${config.timeoutMs === undefined ? "none" : `${config.timeoutMs}ms`}`,
    `Checkpointing: ${config.checkpoint ? "enabled" : "disabled"}`,
    `Load balancing: ${config.loadBalancingStrategy}`,
  ].join("\n");
}
