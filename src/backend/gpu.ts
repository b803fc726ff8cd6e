import { EvaluationCancelledError } from "../executor/errors.js";
import { BackendUnavailableError } from "./errors.js";
import type { GpuBindings, GpuPipeline } from "./pipeline.js";

/**
 * Opaque GPU boundary: submit a pipeline with its bindings and await the
 * output buffer. Implementations throw {@link BackendUnavailableError} when
 * the device cannot take the dispatch.
 */
export interface GpuContext {
  readonly label: string;
  submit(pipeline: GpuPipeline, bindings: GpuBindings, signal?: AbortSignal): Promise<Float32Array>;
}

export interface SoftwareGpuDeviceOptions {
  /** When false every submission fails with {@link BackendUnavailableError}. */
  available?: boolean;
}

/**
 * In-process device running pipelines lane by lane with 32-bit float
 * registers, the way a compute shader would. Each dispatch yields to the
 * event loop first so callers observe real asynchrony.
 */
export class SoftwareGpuDevice implements GpuContext {
  readonly label = "software";
  private available: boolean;
  private dispatches = 0;
  private readonly compiled = new Set<string>();

  constructor(options: SoftwareGpuDeviceOptions = {}) {
    this.available = options.available ?? true;
  }

  /** Number of completed dispatches. */
  get dispatchCount(): number {
    return this.dispatches;
  }

  /** Distinct shader sources seen so far. */
  get pipelineCount(): number {
    return this.compiled.size;
  }

  setAvailable(available: boolean): void {
    this.available = available;
  }

  async submit(pipeline: GpuPipeline, bindings: GpuBindings, signal?: AbortSignal): Promise<Float32Array> {
    if (!this.available) {
      throw new BackendUnavailableError("software device disabled");
    }
    if (bindings.uniforms.length < pipeline.uniformCount) {
      throw new RangeError(`pipeline ${pipeline.key} expects ${pipeline.uniformCount} uniforms`);
    }
    await new Promise<void>((resolve) => setImmediate(resolve));
    if (signal?.aborted) {
      throw new EvaluationCancelledError(signal.reason);
    }
    this.compiled.add(pipeline.shader);

    const output = new Float32Array(bindings.input.length);
    const stageUniforms = pipeline.stages.map((stage) =>
      Array.from(bindings.uniforms.subarray(stage.uniformOffset, stage.uniformOffset + stage.uniformCount)),
    );
    for (let lane = 0; lane < bindings.input.length; lane += 1) {
      let x = bindings.input[lane] ?? 0;
      pipeline.stages.forEach((stage, index) => {
        x = Math.fround(stage.kernel.lane(x, stageUniforms[index] ?? []));
      });
      output[lane] = x;
    }
    this.dispatches += 1;
    return output;
  }
}
