import { z } from "zod";

import { OVERLOAD_POLICIES, type OverloadPolicy } from "../catalog/registry.js";
import { ConfigError, formatValidationIssues } from "../errors.js";
import { LOG_LEVELS, type LogLevel } from "../logger.js";
import { readOptionalBool, readOptionalEnum, readOptionalInt, readOptionalString, type EnvSource } from "./env.js";

const GPU_MODES = ["auto", "off"] as const;

export type GpuMode = (typeof GPU_MODES)[number];

const OverloadPolicySchema = z.enum(["most-specific", "first-declared", "strict"]);

/** Engine settings after validation. */
export const EngineConfigSchema = z
  .object({
    maxInlineDepth: z.number().int().min(1).max(4096).default(64),
    maxConcurrency: z.number().int().min(1).max(256).default(4),
    overloadPolicy: OverloadPolicySchema.default("most-specific"),
    gpu: z.enum(GPU_MODES).default("auto"),
    cancelOnRecompile: z.boolean().default(true),
    logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
    logFile: z.string().min(1).optional(),
  })
  .strict();

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export type EngineConfigOverrides = z.input<typeof EngineConfigSchema>;

/**
 * Reads the `NODEGRAPH_*` variables. Unrecognised values are ignored so a
 * typo in the environment falls back to the default instead of aborting.
 */
export function readEngineEnvironment(env: EnvSource = process.env): EngineConfigOverrides {
  const overrides: EngineConfigOverrides = {};
  const maxInlineDepth = readOptionalInt("NODEGRAPH_MAX_INLINE_DEPTH", { min: 1, max: 4096 }, env);
  if (maxInlineDepth !== undefined) {
    overrides.maxInlineDepth = maxInlineDepth;
  }
  const maxConcurrency = readOptionalInt("NODEGRAPH_MAX_CONCURRENCY", { min: 1, max: 256 }, env);
  if (maxConcurrency !== undefined) {
    overrides.maxConcurrency = maxConcurrency;
  }
  const overloadPolicy = readOptionalEnum<OverloadPolicy>("NODEGRAPH_OVERLOAD_POLICY", OVERLOAD_POLICIES, env);
  if (overloadPolicy !== undefined) {
    overrides.overloadPolicy = overloadPolicy;
  }
  const gpu = readOptionalEnum<GpuMode>("NODEGRAPH_GPU", GPU_MODES, env);
  if (gpu !== undefined) {
    overrides.gpu = gpu;
  }
  const cancelOnRecompile = readOptionalBool("NODEGRAPH_CANCEL_ON_RECOMPILE", env);
  if (cancelOnRecompile !== undefined) {
    overrides.cancelOnRecompile = cancelOnRecompile;
  }
  const logLevel = readOptionalEnum<LogLevel>("NODEGRAPH_LOG_LEVEL", LOG_LEVELS, env);
  if (logLevel !== undefined) {
    overrides.logLevel = logLevel;
  }
  const logFile = readOptionalString("NODEGRAPH_LOG_FILE", env);
  if (logFile !== undefined) {
    overrides.logFile = logFile;
  }
  return overrides;
}

/**
 * Builds the engine configuration: defaults, then environment, then explicit
 * overrides. Invalid overrides raise {@link ConfigError}.
 */
export function loadEngineConfig(overrides: EngineConfigOverrides = {}, env: EnvSource = process.env): EngineConfig {
  const result = EngineConfigSchema.safeParse({ ...readEngineEnvironment(env), ...overrides });
  if (!result.success) {
    throw new ConfigError(formatValidationIssues(result.error.issues));
  }
  return result.data;
}
