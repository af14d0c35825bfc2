// src/core/config/config.ts
// Configuration for validation mode, step limits and tracing

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { done, validationFailed, type Outcome } from "../../outcome";
import { ConfigError } from "../errors";
import { createTraceLog, type TraceLog } from "../trace";
import { DEFAULT_MAX_STEPS } from "../eval/source";
import type { BuilderOptions, ValidationMode } from "../graph/builder";
import type { InterpretOptions } from "../eval/interpreter";
import type { VMConfig } from "../compiler/types";

// =========================================================================
// Configuration Types
// =========================================================================

export type CheckConfig = {
  /** `eager` typechecks each node as it is built; `deferred` waits for `check` */
  validation: ValidationMode;
};

export type EvalConfig = {
  /** Step limit for both evaluators */
  maxSteps: number;
  /** Write trace lines for checker and evaluator events */
  trace: boolean;
};

export type StreamConfig = {
  check: CheckConfig;
  eval: EvalConfig;
};

export type ConfigOverrides = {
  check?: Partial<CheckConfig>;
  eval?: Partial<EvalConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_CHECK_CONFIG: CheckConfig = {
  validation: "eager",
};

export const DEFAULT_EVAL_CONFIG: EvalConfig = {
  maxSteps: DEFAULT_MAX_STEPS,
  trace: false,
};

export const DEFAULT_CONFIG: StreamConfig = {
  check: DEFAULT_CHECK_CONFIG,
  eval: DEFAULT_EVAL_CONFIG,
};

export const DEFAULT_CONFIG_FILES = ["ordstream.config.json"];

// =========================================================================
// Schemas
// =========================================================================

const validationSchema = z.enum(["eager", "deferred"]);

const overridesSchema = z
  .object({
    check: z.object({ validation: validationSchema }).partial().strict().optional(),
    eval: z
      .object({
        maxSteps: z.number().int().positive(),
        trace: z.boolean(),
      })
      .partial()
      .strict()
      .optional(),
  })
  .strict();

const envSchema = z.object({
  VALIDATION: validationSchema.optional(),
  MAX_STEPS: z.coerce.number().int().positive().optional(),
  TRACE: z
    .enum(["1", "0", "true", "false"])
    .transform((v) => v === "1" || v === "true")
    .optional(),
});

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

function camelCase(key: string): string {
  return key.replace(/_([a-z])/g, (_, c: string) => c.toUpperCase());
}

/** Rewrite snake_case keys to camelCase, recursively. */
function normalizeKeys(data: unknown): unknown {
  if (Array.isArray(data)) return data.map(normalizeKeys);
  if (data === null || typeof data !== "object") return data;
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    out[camelCase(key)] = normalizeKeys(value);
  }
  return out;
}

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Settings from `<prefix>_VALIDATION`, `<prefix>_MAX_STEPS` and
 * `<prefix>_TRACE`. Unset variables contribute nothing.
 */
export function overridesFromEnv(
  prefix = "ORDSTREAM",
  env: NodeJS.ProcessEnv = process.env
): ConfigOverrides {
  const result = envSchema.safeParse({
    VALIDATION: env[`${prefix}_VALIDATION`] || undefined,
    MAX_STEPS: env[`${prefix}_MAX_STEPS`] || undefined,
    TRACE: env[`${prefix}_TRACE`] || undefined,
  });
  if (!result.success) {
    throw new ConfigError(`environment ${prefix}_*: ${describeIssues(result.error)}`);
  }
  const { VALIDATION, MAX_STEPS, TRACE } = result.data;
  const overrides: ConfigOverrides = {};
  if (VALIDATION !== undefined) overrides.check = { validation: VALIDATION };
  if (MAX_STEPS !== undefined || TRACE !== undefined) {
    overrides.eval = {};
    if (MAX_STEPS !== undefined) overrides.eval.maxSteps = MAX_STEPS;
    if (TRACE !== undefined) overrides.eval.trace = TRACE;
  }
  return overrides;
}

/**
 * Load configuration from environment variables.
 */
export function configFromEnv(prefix = "ORDSTREAM", env: NodeJS.ProcessEnv = process.env): StreamConfig {
  return mergeConfigs(overridesFromEnv(prefix, env));
}

/**
 * Validate a plain object (e.g. parsed JSON). Keys may be camelCase or
 * snake_case; unknown keys are rejected.
 */
export function overridesFromObject(data: unknown): ConfigOverrides {
  const result = overridesSchema.safeParse(normalizeKeys(data));
  if (!result.success) {
    throw new ConfigError(describeIssues(result.error));
  }
  return result.data;
}

/**
 * Create configuration from a plain object, with defaults for missing keys.
 */
export function configFromObject(data: unknown): StreamConfig {
  return mergeConfigs(overridesFromObject(data));
}

function readConfigFile(filePath: string): ConfigOverrides {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`file not found: ${filePath}`);
  }
  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".json") {
    throw new ConfigError(`unsupported file format: ${ext || "(none)"}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    throw new ConfigError(`${filePath} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  return overridesFromObject(data);
}

/**
 * Load configuration from a JSON file.
 */
export function configFromFile(filePath: string): StreamConfig {
  return mergeConfigs(readConfigFile(filePath));
}

/**
 * Merge configs with later ones overriding earlier ones, starting from the
 * defaults.
 */
export function mergeConfigs(...configs: ConfigOverrides[]): StreamConfig {
  const result: StreamConfig = {
    check: { ...DEFAULT_CONFIG.check },
    eval: { ...DEFAULT_CONFIG.eval },
  };

  for (const cfg of configs) {
    if (cfg.check) {
      result.check = { ...result.check, ...cfg.check };
    }
    if (cfg.eval) {
      result.eval = { ...result.eval, ...cfg.eval };
    }
  }

  return result;
}

export type LoadConfigOptions = {
  configFile?: string;
  /** Checked against the same schema as a config file */
  overrides?: ConfigOverrides;
  /** Directory searched for a default config file. Default: process.cwd() */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: LoadConfigOptions): StreamConfig {
  const layers: ConfigOverrides[] = [overridesFromEnv("ORDSTREAM", options?.env ?? process.env)];

  if (options?.configFile) {
    layers.push(readConfigFile(options.configFile));
  } else {
    const dir = options?.cwd ?? process.cwd();
    const found = DEFAULT_CONFIG_FILES.map((name) => path.join(dir, name)).find((p) => fs.existsSync(p));
    if (found) layers.push(readConfigFile(found));
  }

  if (options?.overrides) {
    layers.push(overridesFromObject(options.overrides));
  }

  return mergeConfigs(...layers);
}

/**
 * Like `loadConfig`, but a bad setting comes back as a failed Outcome.
 */
export function tryLoadConfig(options?: LoadConfigOptions): Outcome<StreamConfig> {
  try {
    return done(loadConfig(options));
  } catch (e) {
    if (e instanceof ConfigError) return validationFailed(String(e.detail.reason));
    throw e;
  }
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: StreamConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!validationSchema.safeParse(config.check.validation).success) {
    errors.push(`check.validation must be "eager" or "deferred", got ${JSON.stringify(config.check.validation)}`);
  }
  if (!Number.isInteger(config.eval.maxSteps) || config.eval.maxSteps < 1) {
    errors.push("eval.maxSteps must be a positive integer");
  } else if (config.eval.maxSteps < 100) {
    warnings.push("eval.maxSteps is very low, may cause premature termination");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

// =========================================================================
// Wiring
// =========================================================================

/**
 * Options for the builder and both evaluators derived from one config.
 */
export function optionsFromConfig(
  config: StreamConfig,
  sink?: TraceLog
): { trace: TraceLog; builder: BuilderOptions; interpret: InterpretOptions; vm: VMConfig } {
  const trace = createTraceLog(config.eval.trace, sink);
  return {
    trace,
    builder: { validation: config.check.validation, trace },
    interpret: { maxSteps: config.eval.maxSteps, trace },
    vm: { maxSteps: config.eval.maxSteps, trace },
  };
}
