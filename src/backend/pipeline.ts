import type { GpuKernel } from "../catalog/registry.js";
import type { GpuRun, ProtoGraph } from "../compiler/protoGraph.js";
import { isGpuEligible } from "./selector.js";

/** One fused kernel inside a pipeline. */
export interface PipelineStage {
  readonly identity: string;
  readonly kernel: GpuKernel;
  /** Offset of the stage's first uniform inside the shared uniform buffer. */
  readonly uniformOffset: number;
  readonly uniformCount: number;
}

/** Compiled form of a GPU run. */
export interface GpuPipeline {
  /** Identity of the run's last node, which owns the pipeline output. */
  readonly key: string;
  readonly stages: readonly PipelineStage[];
  readonly uniformCount: number;
  /** WGSL compute shader applying every stage to each lane. */
  readonly shader: string;
}

/** Buffers bound to a pipeline dispatch. */
export interface GpuBindings {
  readonly input: Float32Array;
  readonly uniforms: Float32Array;
}

export const WORKGROUP_SIZE = 64;

function stageStatement(stage: PipelineStage): string {
  const expression = stage.kernel.expression.replace(/u\[(\d+)\]/g, (_match, index: string) => {
    return `uniforms[${stage.uniformOffset + Number(index)}u]`;
  });
  return `  x = ${expression}; // ${stage.identity}`;
}

function renderShader(stages: readonly PipelineStage[]): string {
  return [
    "@group(0) @binding(0) var<storage, read> input: array<f32>;",
    "@group(0) @binding(1) var<storage, read_write> output: array<f32>;",
    "@group(0) @binding(2) var<storage, read> uniforms: array<f32>;",
    "",
    `@compute @workgroup_size(${WORKGROUP_SIZE})`,
    "fn main(@builtin(global_invocation_id) id: vec3<u32>) {",
    "  let i = id.x;",
    "  if (i >= arrayLength(&input)) {",
    "    return;",
    "  }",
    "  var x: f32 = input[i];",
    ...stages.map(stageStatement),
    "  output[i] = x;",
    "}",
    "",
  ].join("\n");
}

/**
 * Fuses the kernels of a run into a single pipeline. Scalar inputs of every
 * stage (all inputs but the streamed first one) are packed into one uniform
 * buffer in stage order.
 */
export function compilePipeline(graph: ProtoGraph, run: GpuRun): GpuPipeline {
  const stages: PipelineStage[] = [];
  let uniformOffset = 0;
  for (const index of run.nodes) {
    const node = graph.nodes[index];
    if (!node || !isGpuEligible(node) || !node.instance.gpu) {
      throw new RangeError(`node ${index} cannot be part of a GPU run`);
    }
    const uniformCount = Math.max(0, node.inputs.length - 1);
    stages.push({ identity: node.identity, kernel: node.instance.gpu, uniformOffset, uniformCount });
    uniformOffset += uniformCount;
  }
  const last = stages[stages.length - 1];
  if (!last) {
    throw new RangeError("cannot compile an empty GPU run");
  }
  return Object.freeze({ key: last.identity, stages: Object.freeze(stages), uniformCount: uniformOffset, shader: renderShader(stages) });
}
