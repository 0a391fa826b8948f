// src/core/config/index.ts
// Configuration system exports

export {
  type CodecConfig,
  type OutputConfig,
  type TraceConfig,
  type TreeConfig,
  type PartialTreeConfig,
  type ConfigValidation,
  DEFAULT_CODEC_CONFIG,
  DEFAULT_OUTPUT_CONFIG,
  DEFAULT_TRACE_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
