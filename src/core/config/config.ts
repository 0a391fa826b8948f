// src/core/config/config.ts
// Configuration for stores, the codec and tracing

import * as fs from "fs";
import * as path from "path";

// =========================================================================
// Configuration Types
// =========================================================================

export type CodecConfig = {
  /** Spaces per nesting level in pretty JSON */
  indent: number;
  /** Maximum object/array nesting accepted by the decoder */
  maxDepth: number;
};

export type OutputConfig = {
  /** Strip one leading line terminator from the first write into a fresh buffer */
  chompFirstWrite: boolean;
};

export type TraceConfig = {
  /** Write trace events to stderr */
  enabled: boolean;
  /** Prefix for every trace line */
  prefix: string;
};

export type TreeConfig = {
  codec: CodecConfig;
  output: OutputConfig;
  trace: TraceConfig;
};

export type PartialTreeConfig = {
  codec?: Partial<CodecConfig>;
  output?: Partial<OutputConfig>;
  trace?: Partial<TraceConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_CODEC_CONFIG: CodecConfig = {
  indent: 2,
  maxDepth: 512,
};

export const DEFAULT_OUTPUT_CONFIG: OutputConfig = {
  chompFirstWrite: true,
};

export const DEFAULT_TRACE_CONFIG: TraceConfig = {
  enabled: false,
  prefix: "[valtree]",
};

export const DEFAULT_CONFIG: TreeConfig = {
  codec: DEFAULT_CODEC_CONFIG,
  output: DEFAULT_OUTPUT_CONFIG,
  trace: DEFAULT_TRACE_CONFIG,
};

export const DEFAULT_CONFIG_FILES = ["valtree.config.json", ".valtreerc.json"];

// =========================================================================
// Configuration Loading
// =========================================================================

function envInt(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  const n = parseInt(raw, 10);
  return Number.isNaN(n) ? undefined : n;
}

function envBool(name: string): boolean | undefined {
  const raw = process.env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === "") return undefined;
  return raw === "1" || raw === "true" || raw === "yes" || raw === "on";
}

/**
 * Load configuration overrides from environment variables.
 */
export function configFromEnv(prefix = "VALTREE"): PartialTreeConfig {
  const codec: Partial<CodecConfig> = {};
  const output: Partial<OutputConfig> = {};
  const trace: Partial<TraceConfig> = {};

  const indent = envInt(`${prefix}_INDENT`);
  if (indent !== undefined) codec.indent = indent;
  const maxDepth = envInt(`${prefix}_MAX_DEPTH`);
  if (maxDepth !== undefined) codec.maxDepth = maxDepth;

  const chomp = envBool(`${prefix}_CHOMP_FIRST_WRITE`);
  if (chomp !== undefined) output.chompFirstWrite = chomp;

  const enabled = envBool(`${prefix}_TRACE`);
  if (enabled !== undefined) trace.enabled = enabled;
  const tracePrefix = process.env[`${prefix}_TRACE_PREFIX`];
  if (tracePrefix) trace.prefix = tracePrefix;

  return { codec, output, trace };
}

/**
 * Load configuration from a JSON file.
 */
export function configFromFile(filePath: string): PartialTreeConfig {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".json") {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  const data: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  if (!isRecord(data)) {
    throw new Error(`Config file must contain a JSON object: ${filePath}`);
  }
  return configFromObject(data);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pickNumber(data: Record<string, unknown>, ...keys: string[]): number | undefined {
  for (const k of keys) {
    const v = data[k];
    if (typeof v === "number") return v;
  }
  return undefined;
}

function pickBoolean(data: Record<string, unknown>, ...keys: string[]): boolean | undefined {
  for (const k of keys) {
    const v = data[k];
    if (typeof v === "boolean") return v;
  }
  return undefined;
}

function pickString(data: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const k of keys) {
    const v = data[k];
    if (typeof v === "string") return v;
  }
  return undefined;
}

/**
 * Create configuration from a plain object. Accepts camelCase and snake_case keys.
 */
export function configFromObject(data: Record<string, unknown>): PartialTreeConfig {
  const codecData = isRecord(data.codec) ? data.codec : {};
  const outputData = isRecord(data.output) ? data.output : {};
  const traceData = isRecord(data.trace) ? data.trace : {};

  const codec: Partial<CodecConfig> = {};
  const indent = pickNumber(codecData, "indent");
  if (indent !== undefined) codec.indent = indent;
  const maxDepth = pickNumber(codecData, "maxDepth", "max_depth");
  if (maxDepth !== undefined) codec.maxDepth = maxDepth;

  const output: Partial<OutputConfig> = {};
  const chomp = pickBoolean(outputData, "chompFirstWrite", "chomp_first_write");
  if (chomp !== undefined) output.chompFirstWrite = chomp;

  const trace: Partial<TraceConfig> = {};
  const enabled = pickBoolean(traceData, "enabled");
  if (enabled !== undefined) trace.enabled = enabled;
  const prefix = pickString(traceData, "prefix");
  if (prefix !== undefined) trace.prefix = prefix;

  return { codec, output, trace };
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: PartialTreeConfig[]): TreeConfig {
  const result: TreeConfig = {
    codec: { ...DEFAULT_CODEC_CONFIG },
    output: { ...DEFAULT_OUTPUT_CONFIG },
    trace: { ...DEFAULT_TRACE_CONFIG },
  };

  for (const cfg of configs) {
    if (cfg.codec) {
      result.codec = { ...result.codec, ...cfg.codec };
    }
    if (cfg.output) {
      result.output = { ...result.output, ...cfg.output };
    }
    if (cfg.trace) {
      result.trace = { ...result.trace, ...cfg.trace };
    }
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  cwd?: string;
  overrides?: PartialTreeConfig;
}): TreeConfig {
  const layers: PartialTreeConfig[] = [configFromEnv()];

  if (options?.configFile) {
    layers.push(configFromFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    for (const name of DEFAULT_CONFIG_FILES) {
      const p = path.join(cwd, name);
      if (fs.existsSync(p)) {
        layers.push(configFromFile(p));
        break;
      }
    }
  }

  if (options?.overrides) {
    layers.push(options.overrides);
  }

  return mergeConfigs(...layers);
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: TreeConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isInteger(config.codec.indent) || config.codec.indent < 0) {
    errors.push("codec.indent must be a non-negative integer");
  } else if (config.codec.indent > 8) {
    warnings.push(`codec.indent of ${config.codec.indent} spaces is unusually wide`);
  }
  if (!Number.isInteger(config.codec.maxDepth) || config.codec.maxDepth < 1) {
    errors.push("codec.maxDepth must be at least 1");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
