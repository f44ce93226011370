/**
 * agent-graph
 *
 * Graph-based agent execution engine with a delegation subsystem for
 * handing work to a pool of worker agents.
 */

export * from "./graph/index.ts";
export * from "./agents/index.ts";
export * from "./config/index.ts";
export { engineLog, isEngineDebug, resetEngineDebugCache, type LogStage } from "./utils/logger.ts";
