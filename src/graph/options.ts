/**
 * Execution option resolution.
 *
 * Precedence: per-call options, then the graph's compile-time defaults, then
 * the engine configuration (environment), then the built-in defaults.
 */

import { z } from "zod";

import { loadEngineConfig, type EngineConfig } from "../config/engine.ts";
import { GraphConfigError } from "./errors.ts";
import { formatValidationIssues } from "./state.ts";
import type { GraphExecutionOptions, ResolvedExecutionOptions } from "./types.ts";

const executionOptionsSchema = z.object({
  maxSteps: z.number().int().positive().optional(),
  timeoutMs: z.number().positive().optional(),
  checkpoint: z.boolean().optional(),
  checkpointId: z.string().min(1).optional(),
  signal: z.instanceof(AbortSignal).optional(),
});

function validate(source: string, options: GraphExecutionOptions): void {
  const parsed = executionOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new GraphConfigError(
      `Invalid ${source}: ${formatValidationIssues(parsed.error.issues)}`
    );
  }
}

export function resolveExecutionOptions(
  options: GraphExecutionOptions = {},
  defaults: GraphExecutionOptions = {},
  config: EngineConfig = loadEngineConfig()
): ResolvedExecutionOptions {
  validate("execution options", options);
  validate("graph defaults", defaults);

  return {
    maxSteps: options.maxSteps ?? defaults.maxSteps ?? config.maxSteps,
    timeoutMs: options.timeoutMs ?? defaults.timeoutMs ?? config.timeoutMs,
    checkpoint: options.checkpoint ?? defaults.checkpoint ?? config.checkpoint,
    checkpointId: options.checkpointId ?? defaults.checkpointId,
    signal: options.signal ?? defaults.signal,
  };
}
