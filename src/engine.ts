import { SoftwareGpuDevice, type GpuContext } from "./backend/gpu.js";
import { OperationCatalog } from "./catalog/registry.js";
import { registerStandardOperations } from "./catalog/std.js";
import { compileDocument } from "./compiler/compiler.js";
import { fingerprintProtoGraph, type ProtoGraph } from "./compiler/protoGraph.js";
import { loadEngineConfig, type EngineConfig, type EngineConfigOverrides } from "./config/engineConfig.js";
import type { EnvSource } from "./config/env.js";
import { isEngineError } from "./errors.js";
import { Executor, type ExecutorStats } from "./executor/executor.js";
import type { EvaluateOptions, EvaluationOutcome } from "./executor/types.js";
import { NodeGraph } from "./graph/document.js";
import type { ExposedInput } from "./graph/types.js";
import { StructuredLogger } from "./logger.js";

export interface NodeGraphEngineOptions {
  /** Defaults to a catalog holding the standard operations. */
  catalog?: OperationCatalog;
  config?: EngineConfigOverrides;
  /** Environment consulted for `NODEGRAPH_*` settings. */
  env?: EnvSource;
  logger?: StructuredLogger;
  /**
   * GPU context used for fused runs. Defaults to the software device unless
   * the configuration turns the GPU off; `null` forces CPU interpretation.
   */
  gpu?: GpuContext | null;
  /** Exposed inputs of the root network. */
  rootInputs?: ExposedInput[];
}

export interface NodeGraphEngineStats extends ExecutorStats {
  revision: number;
  compiledRevision: number | null;
  executions: Record<string, number>;
}

/**
 * Entry point used by the editor shell: owns the document, recompiles it
 * into a new generation whenever it changed, and evaluates targets against
 * the current generation.
 */
export class NodeGraphEngine {
  readonly config: EngineConfig;
  readonly catalog: OperationCatalog;
  readonly graph: NodeGraph;
  private readonly logger: StructuredLogger;
  private readonly executor: Executor;
  private compiled: ProtoGraph | null = null;

  constructor(options: NodeGraphEngineOptions = {}) {
    this.config = loadEngineConfig(options.config, options.env);
    this.logger =
      options.logger ?? new StructuredLogger({ minLevel: this.config.logLevel, logFile: this.config.logFile ?? null });
    if (options.catalog) {
      this.catalog = options.catalog;
    } else {
      this.catalog = new OperationCatalog();
      registerStandardOperations(this.catalog);
    }
    this.graph = new NodeGraph(this.catalog, { inputs: options.rootInputs ?? [] });
    const gpu = this.config.gpu === "off" ? null : options.gpu === undefined ? new SoftwareGpuDevice() : options.gpu;
    this.executor = new Executor({ logger: this.logger, maxConcurrency: this.config.maxConcurrency, gpu });
  }

  /** Proto graph of the current generation, if one compiled. */
  get protoGraph(): ProtoGraph | null {
    return this.compiled;
  }

  /**
   * Compiles the current document and installs it as a new generation.
   * Structural errors are rethrown and leave the previous generation in place.
   */
  recompile(): ProtoGraph {
    const document = this.graph.snapshot();
    let protoGraph: ProtoGraph;
    try {
      protoGraph = compileDocument(document, this.catalog, {
        maxInlineDepth: this.config.maxInlineDepth,
        overloadPolicy: this.config.overloadPolicy,
        gpu: this.config.gpu !== "off",
      });
    } catch (error) {
      this.logger.warn("graph_compile_failed", {
        revision: document.revision,
        code: isEngineError(error) ? error.code : null,
        message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    if (this.config.cancelOnRecompile) {
      this.executor.cancelActive(`superseded by revision ${document.revision}`);
    }
    const { generation } = this.executor.load(protoGraph);
    this.compiled = protoGraph;
    this.logger.info("graph_compiled", {
      revision: protoGraph.revision,
      generation,
      fingerprint: fingerprintProtoGraph(protoGraph),
      nodes: protoGraph.nodes.length,
      runs: protoGraph.runs.length,
      diagnostics: protoGraph.diagnostics.length,
    });
    return protoGraph;
  }

  /**
   * Evaluates a node addressed by identity path, or the root output when no
   * target is given. Recompiles first when the document changed.
   */
  async evaluate(target?: string, options: EvaluateOptions = {}): Promise<EvaluationOutcome> {
    if (!this.compiled || this.compiled.revision !== this.graph.revision) {
      this.recompile();
    }
    return this.executor.evaluate(target, options);
  }

  /** Number of times the operation at `identity` ran. */
  executionCount(identity: string): number {
    return this.executor.executionCount(identity);
  }

  resetExecutionCounts(): void {
    this.executor.resetExecutionCounts();
  }

  stats(): NodeGraphEngineStats {
    return {
      ...this.executor.stats(),
      revision: this.graph.revision,
      compiledRevision: this.compiled?.revision ?? null,
      executions: this.executor.executionCounts(),
    };
  }
}
