import type { GpuRun, ProtoNode, ResolvedProtoNode } from "../compiler/protoGraph.js";
import { concrete, typesEqual } from "../values/types.js";

const RASTER_TYPE = concrete("raster");

/**
 * A node can run on the GPU when its instance carries a kernel that maps a
 * raster to a raster. Scalar inputs become uniforms at dispatch time.
 */
export function isGpuEligible(node: ProtoNode): node is ResolvedProtoNode {
  if (node.status !== "resolved" || !node.instance.gpu) {
    return false;
  }
  const streamed = node.instance.inputTypes[0];
  return streamed !== undefined && typesEqual(streamed, RASTER_TYPE) && typesEqual(node.outputType, RASTER_TYPE);
}

/**
 * Groups GPU-eligible nodes into maximal chains. A node extends the chain
 * ending at its first input when that input is consumed by nothing else, so
 * every intermediate raster stays on the device.
 */
export function selectGpuRuns(nodes: readonly ProtoNode[], output: number | undefined): GpuRun[] {
  const uses = new Map<number, number>();
  for (const node of nodes) {
    for (const input of node.inputs) {
      if (input.kind === "node") {
        uses.set(input.index, (uses.get(input.index) ?? 0) + 1);
      }
    }
  }

  const runs: number[][] = [];
  const runByTail = new Map<number, number[]>();
  for (const node of nodes) {
    if (!isGpuEligible(node)) {
      continue;
    }
    const first = node.inputs[0];
    const chain = first?.kind === "node" ? runByTail.get(first.index) : undefined;
    if (first?.kind === "node" && chain && uses.get(first.index) === 1 && first.index !== output) {
      runByTail.delete(first.index);
      chain.push(node.index);
      runByTail.set(node.index, chain);
      continue;
    }
    const fresh = [node.index];
    runs.push(fresh);
    runByTail.set(node.index, fresh);
  }
  return runs.map((indices) => ({ nodes: Object.freeze([...indices]) }));
}
