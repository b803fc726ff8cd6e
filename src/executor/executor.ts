import { rasterFromDevice, rasterToDevice, uniformToDevice } from "../backend/boundary.js";
import { BackendUnavailableError, UnsupportedBoundaryTypeError } from "../backend/errors.js";
import type { GpuContext } from "../backend/gpu.js";
import { compilePipeline, type GpuPipeline } from "../backend/pipeline.js";
import type { GpuRun, ProtoGraph, ProtoInput, ProtoNode, ResolvedProtoNode } from "../compiler/protoGraph.js";
import type { StructuredLogger } from "../logger.js";
import { fail, type ErrorCode } from "../types.js";
import { formatType, typesEqual } from "../values/types.js";
import type { Raster, Value } from "../values/value.js";
import { EvaluationCache, type EvaluationCacheStats, type RekeyOutcome } from "./cache.js";
import {
  EvaluationCancelledError,
  MissingInputError,
  NotCompiledError,
  OperationPanicError,
  TargetNotFoundError,
} from "./errors.js";
import { EvaluationPool, type EvaluationPoolStatistics } from "./pool.js";
import { computeStamps } from "./stamps.js";
import type { EvaluateOptions, EvaluationOutcome, EvaluationReport, NodeFailure, NodeResult } from "./types.js";

export interface ExecutorOptions {
  readonly logger: StructuredLogger;
  /** Upper bound on operation invocations running at once. */
  readonly maxConcurrency: number;
  /** Device used for GPU runs; `null` interprets every run on the CPU. */
  readonly gpu: GpuContext | null;
}

export interface ExecutorStats {
  generation: number;
  cache: EvaluationCacheStats;
  pool: EvaluationPoolStatistics;
  gpuDispatches: number;
  inFlight: number;
}

interface InFlight {
  readonly stamp: string;
  readonly promise: Promise<NodeResult>;
}

/** State owned by one loaded proto graph. */
interface Generation {
  readonly id: number;
  readonly graph: ProtoGraph;
  readonly stamps: readonly string[];
  readonly runsByTail: ReadonlyMap<number, GpuRun>;
  readonly pipelines: Map<number, GpuPipeline>;
  readonly inFlight: Map<string, InFlight>;
  controller: AbortController;
}

interface MutableReport {
  executed: string[];
  cacheHits: string[];
  gpuDispatches: number;
}

interface Pass {
  readonly generation: Generation;
  readonly signal: AbortSignal;
  readonly memo: Map<number, Promise<NodeResult>>;
  readonly report: MutableReport;
}

type CollectedInputs = { ok: true; values: Value[] } | { ok: false; failure: NodeFailure };

/** Signal aborted as soon as any of the sources aborts. */
function linkSignals(sources: readonly (AbortSignal | undefined)[]): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const listeners: Array<{ source: AbortSignal; listener: () => void }> = [];
  for (const source of sources) {
    if (!source) {
      continue;
    }
    if (source.aborted) {
      controller.abort(source.reason);
      break;
    }
    const listener = () => controller.abort(source.reason);
    source.addEventListener("abort", listener, { once: true });
    listeners.push({ source, listener });
  }
  return {
    signal: controller.signal,
    dispose: () => {
      for (const { source, listener } of listeners) {
        source.removeEventListener("abort", listener);
      }
    },
  };
}

function throwIfAborted(signal: AbortSignal): void {
  if (signal.aborted) {
    throw new EvaluationCancelledError(signal.reason);
  }
}

/** Normalised failure payload for the requester; see {@link fail}. */
function nodeFailure(error: { code: ErrorCode; message: string; hint: string }, failedNode: string): NodeFailure {
  const payload = fail(error.code, error.message, error.hint);
  return { code: payload.code, message: payload.message, hint: payload.hint ?? error.hint, failedNode };
}

function failureFrom(error: { code: ErrorCode; message: string; hint: string }, failedNode: string): NodeResult {
  return { ok: false, failure: nodeFailure(error, failedNode) };
}

/**
 * Demand-driven evaluator of the current proto graph. A request walks the
 * target's dependencies, answers unchanged nodes from the cache, runs the
 * rest through the bounded pool and commits results only while the pass is
 * still live and its generation is still current.
 */
export class Executor {
  private readonly logger: StructuredLogger;
  private readonly gpu: GpuContext | null;
  private readonly pool: EvaluationPool;
  private readonly cache = new EvaluationCache();
  private readonly executions = new Map<string, number>();
  private current: Generation | null = null;
  private generationCounter = 0;
  private dispatches = 0;

  constructor(options: ExecutorOptions) {
    this.logger = options.logger;
    this.gpu = options.gpu;
    this.pool = new EvaluationPool(options.maxConcurrency);
  }

  /** Currently loaded proto graph, if any. */
  get graph(): ProtoGraph | null {
    return this.current?.graph ?? null;
  }

  get generation(): number {
    return this.current?.id ?? 0;
  }

  /**
   * Installs a freshly compiled proto graph. Cached results are re-keyed by
   * identity so unchanged nodes keep answering from the cache.
   */
  load(graph: ProtoGraph): RekeyOutcome & { generation: number } {
    const id = (this.generationCounter += 1);
    const stamps = computeStamps(graph);
    const outcome = this.cache.rekey(id, new Set(graph.identities.keys()));
    const runsByTail = new Map<number, GpuRun>();
    for (const run of graph.runs) {
      const tail = run.nodes[run.nodes.length - 1];
      if (tail !== undefined) {
        runsByTail.set(tail, run);
      }
    }
    this.current = {
      id,
      graph,
      stamps,
      runsByTail,
      pipelines: new Map(),
      inFlight: new Map(),
      controller: new AbortController(),
    };
    this.logger.info("cache_rekeyed", { generation: id, retained: outcome.retained, evicted: outcome.evicted });
    if (graph.runs.length > 0 && !this.gpu) {
      this.logger.warn("gpu_fallback", { generation: id, runs: graph.runs.length, reason: "no GPU context" });
    }
    return { generation: id, ...outcome };
  }

  /** Aborts every pass running against the current generation. */
  cancelActive(reason: string): void {
    const generation = this.current;
    if (!generation) {
      return;
    }
    generation.controller.abort(reason);
    generation.controller = new AbortController();
  }

  /** Number of times the operation at `identity` ran since construction. */
  executionCount(identity: string): number {
    return this.executions.get(identity) ?? 0;
  }

  executionCounts(): Record<string, number> {
    return Object.fromEntries(Array.from(this.executions).sort(([a], [b]) => a.localeCompare(b)));
  }

  resetExecutionCounts(): void {
    this.executions.clear();
  }

  /** Cached result of a node, without counting a hit. */
  peekCached(identity: string): NodeResult | undefined {
    return this.cache.peek(identity)?.result;
  }

  stats(): ExecutorStats {
    return {
      generation: this.generation,
      cache: this.cache.stats(),
      pool: this.pool.getStatistics(),
      gpuDispatches: this.dispatches,
      inFlight: this.current?.inFlight.size ?? 0,
    };
  }

  /**
   * Evaluates `target` (an identity path) or the root output. Node failures
   * resolve with `ok: false`; cancellation rejects with
   * {@link EvaluationCancelledError}.
   */
  async evaluate(target?: string, options: EvaluateOptions = {}): Promise<EvaluationOutcome> {
    const generation = this.current;
    if (!generation) {
      throw new NotCompiledError();
    }
    const forwarded = target === undefined ? undefined : generation.graph.literals.get(target);
    if (target !== undefined && forwarded) {
      const report: EvaluationReport = { generation: generation.id, target, executed: [], cacheHits: [], gpuDispatches: 0 };
      return { ok: true, value: forwarded, type: forwarded.type, report };
    }
    const index = this.resolveTarget(generation.graph, target);
    const node = generation.graph.nodes[index];
    if (!node) {
      throw new TargetNotFoundError(target ?? null);
    }

    const linked = linkSignals([generation.controller.signal, options.signal]);
    const pass: Pass = {
      generation,
      signal: linked.signal,
      memo: new Map(),
      report: { executed: [], cacheHits: [], gpuDispatches: 0 },
    };
    try {
      const result = await this.evaluateIndex(index, pass);
      throwIfAborted(pass.signal);
      const report: EvaluationReport = {
        generation: generation.id,
        target: node.identity,
        executed: pass.report.executed,
        cacheHits: pass.report.cacheHits,
        gpuDispatches: pass.report.gpuDispatches,
      };
      if (!result.ok) {
        return { ok: false, error: result.failure, report };
      }
      return { ok: true, value: result.value, type: result.value.type, report };
    } catch (error) {
      if (error instanceof EvaluationCancelledError) {
        this.logger.info("evaluation_cancelled", {
          generation: generation.id,
          target: node.identity,
          reason: error.details.reason,
        });
      }
      throw error;
    } finally {
      linked.dispose();
    }
  }

  private resolveTarget(graph: ProtoGraph, target: string | undefined): number {
    if (target === undefined) {
      if (graph.output === undefined) {
        throw new TargetNotFoundError(null);
      }
      return graph.output;
    }
    const index = graph.identities.get(target);
    if (index === undefined) {
      throw new TargetNotFoundError(target);
    }
    return index;
  }

  private evaluateIndex(index: number, pass: Pass): Promise<NodeResult> {
    const memoised = pass.memo.get(index);
    if (memoised) {
      return memoised;
    }
    const promise = this.resolveNode(index, pass);
    pass.memo.set(index, promise);
    return promise;
  }

  private async resolveNode(index: number, pass: Pass): Promise<NodeResult> {
    const { graph, stamps, inFlight } = pass.generation;
    const node = graph.nodes[index];
    const stamp = stamps[index];
    if (!node || stamp === undefined) {
      throw new MissingInputError(`#${index}`, 0);
    }
    if (node.status === "failed") {
      return this.compileFailure(graph, node);
    }

    const cached = this.cache.get(node.identity, stamp);
    if (cached) {
      pass.report.cacheHits.push(node.identity);
      return cached;
    }

    for (;;) {
      throwIfAborted(pass.signal);
      const pending = inFlight.get(node.identity);
      if (pending && pending.stamp === stamp) {
        try {
          return await pending.promise;
        } catch (error) {
          // The owner's pass was cancelled; take over unless this pass was too.
          if (error instanceof EvaluationCancelledError && !pass.signal.aborted) {
            continue;
          }
          throw error;
        }
      }
      const promise = this.compute(node, stamp, pass);
      inFlight.set(node.identity, { stamp, promise });
      try {
        return await promise;
      } finally {
        if (inFlight.get(node.identity)?.promise === promise) {
          inFlight.delete(node.identity);
        }
      }
    }
  }

  private compileFailure(graph: ProtoGraph, node: Extract<ProtoNode, { status: "failed" }>): NodeResult {
    const rootIdentity = node.diagnostic.upstream ?? node.identity;
    const rootIndex = graph.identities.get(rootIdentity);
    const root = rootIndex === undefined ? undefined : graph.nodes[rootIndex];
    const diagnostic = root && root.status === "failed" ? root.diagnostic : node.diagnostic;
    return failureFrom(diagnostic, rootIdentity);
  }

  private async compute(node: ResolvedProtoNode, stamp: string, pass: Pass): Promise<NodeResult> {
    if (node.inputs.length !== node.instance.inputTypes.length) {
      throw new MissingInputError(node.identity, Math.min(node.inputs.length, node.instance.inputTypes.length));
    }
    node.inputs.forEach((input, port) => {
      if (input.kind === "node" && input.index >= node.index) {
        throw new MissingInputError(node.identity, port);
      }
    });

    const run = pass.generation.runsByTail.get(node.index);
    let result: NodeResult | undefined;
    if (run && this.gpu) {
      result = await this.computeRun(run, this.gpu, pass);
    }
    if (!result) {
      result = await this.computeCpu(node, pass);
    }

    throwIfAborted(pass.signal);
    if (pass.generation === this.current) {
      this.cache.set(node.identity, stamp, result);
    }
    return result;
  }

  private async collectInputs(inputs: readonly ProtoInput[], pass: Pass): Promise<CollectedInputs> {
    const results = await Promise.all(
      inputs.map((input): NodeResult | Promise<NodeResult> =>
        input.kind === "value" ? { ok: true, value: input.value } : this.evaluateIndex(input.index, pass),
      ),
    );
    const values: Value[] = [];
    for (const result of results) {
      if (!result.ok) {
        return { ok: false, failure: result.failure };
      }
      values.push(result.value);
    }
    return { ok: true, values };
  }

  private recordExecution(identity: string, pass: Pass): void {
    this.executions.set(identity, this.executionCount(identity) + 1);
    pass.report.executed.push(identity);
  }

  private async computeCpu(node: ResolvedProtoNode, pass: Pass): Promise<NodeResult> {
    const inputs = await this.collectInputs(node.inputs, pass);
    if (!inputs.ok) {
      return inputs;
    }
    throwIfAborted(pass.signal);

    const { instance } = node;
    if (instance.intrinsic === "identity") {
      const forwarded = inputs.values[0];
      if (!forwarded) {
        throw new MissingInputError(node.identity, 0);
      }
      return { ok: true, value: forwarded };
    }
    const implementation = instance.cpu;
    if (!implementation) {
      const error = new BackendUnavailableError(`'${node.operation}' has no CPU implementation`);
      this.logger.warn("gpu_fallback", { identity: node.identity, operation: node.operation, reason: error.details.reason });
      return failureFrom(error, node.identity);
    }

    const outcome = await this.pool.run(async (): Promise<NodeResult> => {
      this.recordExecution(node.identity, pass);
      let value: Value;
      try {
        value = await implementation(inputs.values, { signal: pass.signal, instance, identity: node.identity });
      } catch (error) {
        if (error instanceof EvaluationCancelledError) {
          throw error;
        }
        const message = error instanceof Error ? error.message : String(error);
        return this.panic(node, message, error);
      }
      if (!typesEqual(value.type, node.outputType)) {
        return this.panic(
          node,
          `returned ${formatType(value.type)} where ${formatType(node.outputType)} was declared`,
          undefined,
        );
      }
      return { ok: true, value };
    }, pass.signal);
    return outcome;
  }

  private panic(node: ResolvedProtoNode, message: string, cause: unknown): NodeResult {
    const error = new OperationPanicError(node.identity, node.operation, message, cause);
    this.logger.error("operation_panic", { identity: node.identity, operation: node.operation, message });
    return failureFrom(error, node.identity);
  }

  /**
   * Runs a fused GPU run in one dispatch. Resolves `undefined` when the
   * device turns out to be unavailable so the caller interprets the run on
   * the CPU instead.
   */
  private async computeRun(run: GpuRun, gpu: GpuContext, pass: Pass): Promise<NodeResult | undefined> {
    const { graph, pipelines } = pass.generation;
    const stages: ResolvedProtoNode[] = [];
    for (const index of run.nodes) {
      const stage = graph.nodes[index];
      if (!stage || stage.status !== "resolved") {
        throw new MissingInputError(`#${index}`, 0);
      }
      stages.push(stage);
    }
    const first = stages[0];
    const tail = stages[stages.length - 1];
    const streamed = first?.inputs[0];
    if (!first || !tail || !streamed) {
      throw new MissingInputError(tail?.identity ?? "?", 0);
    }

    // Streamed raster of the first stage, then every stage's scalar uniforms.
    const boundaryInputs: ProtoInput[] = [streamed];
    const boundaryPorts: Array<{ identity: string; port: number }> = [{ identity: first.identity, port: 0 }];
    for (const stage of stages) {
      stage.inputs.slice(1).forEach((input, offset) => {
        boundaryInputs.push(input);
        boundaryPorts.push({ identity: stage.identity, port: offset + 1 });
      });
    }
    const collected = await this.collectInputs(boundaryInputs, pass);
    if (!collected.ok) {
      return collected;
    }
    throwIfAborted(pass.signal);

    const boundary = this.toDevice(collected.values, boundaryPorts);
    if (!boundary.ok) {
      return boundary;
    }
    const { raster, uniforms } = boundary;

    let pipeline = pipelines.get(tail.index);
    if (!pipeline) {
      pipeline = compilePipeline(graph, run);
      pipelines.set(tail.index, pipeline);
    }
    const compiled = pipeline;
    const identities = stages.map((stage) => stage.identity);
    let output: Float32Array;
    try {
      output = await this.pool.run(
        () => gpu.submit(compiled, { input: raster.data, uniforms: Float32Array.from(uniforms) }, pass.signal),
        pass.signal,
      );
    } catch (error) {
      if (error instanceof EvaluationCancelledError) {
        throw error;
      }
      if (error instanceof BackendUnavailableError) {
        this.logger.warn("gpu_fallback", { run: identities, reason: error.details.reason });
        return undefined;
      }
      const message = error instanceof Error ? error.message : String(error);
      return this.panic(tail, message, error);
    }

    let value: Value;
    try {
      value = rasterFromDevice(output, raster);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return this.panic(tail, message, error);
    }
    for (const identity of identities) {
      this.recordExecution(identity, pass);
    }
    pass.report.gpuDispatches += 1;
    this.dispatches += 1;
    this.logger.debug("gpu_dispatch", { pipeline: compiled.key, stages: identities.length, lanes: output.length });
    return { ok: true, value };
  }

  /** Converts the collected run inputs into device buffers. */
  private toDevice(
    values: readonly Value[],
    ports: ReadonlyArray<{ identity: string; port: number }>,
  ): { ok: true; raster: Raster; uniforms: number[] } | { ok: false; failure: NodeFailure } {
    try {
      const [stream, ...scalars] = values;
      const streamPort = ports[0];
      if (!stream || !streamPort) {
        throw new MissingInputError(streamPort?.identity ?? "?", 0);
      }
      const raster = rasterToDevice(stream, streamPort.identity, streamPort.port);
      const uniforms = scalars.map((scalar, offset) => {
        const position = ports[offset + 1] ?? streamPort;
        return uniformToDevice(scalar, position.identity, position.port);
      });
      return { ok: true, raster, uniforms };
    } catch (error) {
      if (error instanceof UnsupportedBoundaryTypeError) {
        this.logger.warn("boundary_conversion_failed", {
          identity: error.details.identity,
          port: error.details.port,
          type: error.details.type,
        });
        return { ok: false, failure: nodeFailure(error, error.details.identity) };
      }
      throw error;
    }
  }
}
