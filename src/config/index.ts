/**
 * Configuration Module Exports
 */

export {
  type EngineConfig,
  type LoadEngineConfigOptions,
  ENGINE_ENV_VARS,
  ENGINE_DEFAULTS,
  loadEngineConfig,
  describeEngineConfig,
} from "./engine.ts";
