/**
 * Graph execution engine.
 */

export * from "./types.ts";
export * from "./errors.ts";
export * from "./state.ts";
export { GraphBuilder, graph } from "./builder.ts";
export {
  CompiledGraph,
  executeGraph,
  invokeGraph,
  streamGraph,
  type GraphDefinition,
} from "./compiled.ts";
export { resolveExecutionOptions } from "./options.ts";
export { MemoryCheckpointStore, FileCheckpointStore } from "./checkpointer.ts";
export { describeGraph, toMermaid, type GraphDescription } from "./visualize.ts";
export {
  loopNode,
  mergeBranchStates,
  parallelNode,
  retryNode,
  subgraphNode,
  validationNode,
  validationPassed,
  type LoopNodeConfig,
  type ParallelMerger,
  type ParallelMode,
  type ParallelNodeConfig,
  type RetryNodeConfig,
  type StateValidator,
  type SubgraphNodeConfig,
  type ValidationNodeConfig,
  type ValidationResult,
} from "./nodes.ts";
