/**
 * Engine Diagnostic Logger
 *
 * Conditional logger for the engine's chokepoints.
 * Activated by the AGENT_GRAPH_DEBUG=1 environment variable.
 *
 * Logs are prefixed with `[Graph:<stage>]` for easy filtering:
 *   [Graph:Engine] node_failed {"node":"classify"}
 *   [Graph:Supervisor] task_assigned {"taskId":"task_1","workerId":"w2"}
 *
 * Usage:
 * ```typescript
 * import { engineLog } from "../utils/logger.ts";
 *
 * engineLog("Engine", "node_completed", { node: "classify", durationMs: 12 });
 * ```
 */

export type LogStage = "Engine" | "Nodes" | "Checkpoint" | "Supervisor" | "Balancer" | "TaskStore";

export const DEBUG_ENV_VAR = "AGENT_GRAPH_DEBUG";

let _debugEnabled: boolean | null = null;

/**
 * Check if diagnostic logging is enabled. The result is cached after the
 * first check.
 */
export function isEngineDebug(): boolean {
  if (_debugEnabled === null) {
    _debugEnabled = process.env[DEBUG_ENV_VAR] === "1";
  }
  return _debugEnabled;
}

/**
 * Reset the cached debug flag (for testing).
 */
export function resetEngineDebugCache(): void {
  _debugEnabled = null;
}

/**
 * Log a diagnostic message from a specific stage.
 *
 * Only emits output when AGENT_GRAPH_DEBUG=1.
 *
 * @param stage - Stage identifier
 * @param action - Short action descriptor (e.g., "node_started", "task_assigned")
 * @param data - Optional structured data to include in the log
 */
export function engineLog(
  stage: LogStage,
  action: string,
  data?: Record<string, unknown>,
): void {
  if (!isEngineDebug()) return;
  const payload = data ? ` ${JSON.stringify(data)}` : "";
  console.debug(`[Graph:${stage}] ${action}${payload}`);
}
