export { NodeGraphEngine, type NodeGraphEngineOptions, type NodeGraphEngineStats } from "./engine.js";

export * from "./values/types.js";
export * from "./values/value.js";
export * from "./values/literal.js";
export { fingerprintValue } from "./values/fingerprint.js";

export * from "./catalog/registry.js";
export { STANDARD_OPERATIONS, registerStandardOperations } from "./catalog/std.js";

export * from "./graph/types.js";
export * from "./graph/errors.js";
export { NodeGraph, type ExtractOptions, type NetworkInit, type NodeInit } from "./graph/document.js";
export { validateDocument, assertValidDocument, type GraphValidationResult, type ValidationOptions } from "./graph/validate.js";
export { GraphDescriptorError, GraphDescriptorSchema, loadGraphDocument, parseGraphDocument, type GraphDescriptor } from "./graph/schema.js";

export { compileDocument, DEFAULT_COMPILE_OPTIONS, type CompileOptions } from "./compiler/compiler.js";
export * from "./compiler/protoGraph.js";

export { Executor, type ExecutorOptions, type ExecutorStats } from "./executor/executor.js";
export * from "./executor/errors.js";
export type * from "./executor/types.js";
export type { EvaluationCacheStats } from "./executor/cache.js";
export type { EvaluationPoolStatistics } from "./executor/pool.js";

export { SoftwareGpuDevice, type GpuContext, type SoftwareGpuDeviceOptions } from "./backend/gpu.js";
export { compilePipeline, WORKGROUP_SIZE, type GpuBindings, type GpuPipeline, type PipelineStage } from "./backend/pipeline.js";
export { selectGpuRuns, isGpuEligible } from "./backend/selector.js";
export * from "./backend/errors.js";

export { EngineError, ConfigError, describeEngineError, isEngineError } from "./errors.js";
export { ERROR_CODES, ERROR_CATALOG, type ErrorCode, type EngineFailure } from "./types.js";
export { loadEngineConfig, EngineConfigSchema, type EngineConfig, type EngineConfigOverrides } from "./config/engineConfig.js";
export { StructuredLogger, type LogEntry, type LogLevel, type LoggerOptions } from "./logger.js";
