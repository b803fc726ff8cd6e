import type { ProtoGraph } from "../compiler/protoGraph.js";
import { digestParts, fingerprintValue } from "../values/fingerprint.js";

/**
 * Version stamp of every proto node: a digest of the operation instance and
 * the stamps of its inputs, literals included through their fingerprint. A
 * literal edit therefore changes the stamps of its downstream nodes only.
 */
export function computeStamps(graph: ProtoGraph): string[] {
  const stamps: string[] = [];
  for (const node of graph.nodes) {
    const parts: string[] =
      node.status === "resolved" ? [`op:${node.instance.id}`] : [`failed:${node.diagnostic.code}:${node.operation}`];
    for (const input of node.inputs) {
      parts.push(input.kind === "node" ? `n:${stamps[input.index] ?? "?"}` : `v:${fingerprintValue(input.value)}`);
    }
    stamps.push(digestParts(parts));
  }
  return stamps;
}
