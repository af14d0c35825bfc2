// src/core/config/index.ts
// Configuration system exports

export {
  type CheckConfig,
  type EvalConfig,
  type StreamConfig,
  type ConfigOverrides,
  type ConfigValidation,
  type LoadConfigOptions,
  DEFAULT_CHECK_CONFIG,
  DEFAULT_EVAL_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  overridesFromEnv,
  overridesFromObject,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  tryLoadConfig,
  validateConfig,
  optionsFromConfig,
} from "./config";
