import type { OperationInstance } from "../catalog/registry.js";
import type { ErrorCode } from "../types.js";
import { digestParts, fingerprintValue } from "../values/fingerprint.js";
import type { TypeDescriptor } from "../values/types.js";
import type { Value } from "../values/value.js";

/** Input of a proto node: an earlier proto node or an embedded literal. */
export type ProtoInput = { kind: "node"; index: number } | { kind: "value"; value: Value };

/** Resolution failure attached to a proto node instead of aborting compilation. */
export interface CompileDiagnostic {
  readonly code: ErrorCode;
  readonly identity: string;
  readonly message: string;
  readonly hint: string;
  /** Failed upstream node, for diagnostics propagated downstream. */
  readonly upstream?: string;
  /** Overload signatures considered while resolving. */
  readonly candidates?: readonly string[];
}

interface ProtoNodeBase {
  readonly index: number;
  readonly identity: string;
  readonly origin: { readonly network: string; readonly nodeId: string };
  readonly operation: string;
  readonly inputs: readonly ProtoInput[];
}

export interface ResolvedProtoNode extends ProtoNodeBase {
  readonly status: "resolved";
  readonly instance: OperationInstance;
  readonly outputType: TypeDescriptor;
}

export interface FailedProtoNode extends ProtoNodeBase {
  readonly status: "failed";
  readonly diagnostic: CompileDiagnostic;
}

export type ProtoNode = ResolvedProtoNode | FailedProtoNode;

/** Maximal chain of GPU-eligible nodes fused into one dispatch. */
export interface GpuRun {
  /** Proto node indices in evaluation order; the last one produces the run output. */
  readonly nodes: readonly number[];
}

/**
 * Flat, type-resolved and topologically ordered program. Every node input
 * references a node with a smaller index.
 */
export interface ProtoGraph {
  readonly revision: number;
  readonly nodes: readonly ProtoNode[];
  /**
   * Identity path to proto node index. Network nodes map to the node that
   * produces their output.
   */
  readonly identities: ReadonlyMap<string, number>;
  /** Network nodes whose output forwards a literal rather than a node. */
  readonly literals: ReadonlyMap<string, Value>;
  /** Index of the root output node, when the root output is a node. */
  readonly output: number | undefined;
  readonly runs: readonly GpuRun[];
  readonly diagnostics: readonly CompileDiagnostic[];
}

function describeNode(node: ProtoNode): string {
  const inputs = node.inputs
    .map((input) => (input.kind === "node" ? `#${input.index}` : `=${fingerprintValue(input.value)}`))
    .join(",");
  const resolution = node.status === "resolved" ? node.instance.id : `!${node.diagnostic.code}`;
  return `${node.index}|${node.identity}|${resolution}|${inputs}`;
}

/** Digest of everything that makes two proto graphs structurally equal. */
export function fingerprintProtoGraph(graph: ProtoGraph): string {
  const parts = graph.nodes.map(describeNode);
  parts.push(`out:${graph.output ?? "-"}`);
  const forwarded: string[] = [];
  for (const [identity, index] of graph.identities) {
    if (graph.nodes[index]?.identity !== identity) {
      forwarded.push(`alias:${identity}>${index}`);
    }
  }
  for (const [identity, value] of graph.literals) {
    forwarded.push(`lit:${identity}=${fingerprintValue(value)}`);
  }
  parts.push(...forwarded.sort());
  for (const run of graph.runs) {
    parts.push(`run:${run.nodes.join(",")}`);
  }
  return digestParts(parts);
}

export function protoGraphsEqual(a: ProtoGraph, b: ProtoGraph): boolean {
  return fingerprintProtoGraph(a) === fingerprintProtoGraph(b);
}

/** Consumers of each node, indexed by producer. */
export function consumersOf(graph: ProtoGraph): number[][] {
  const consumers: number[][] = graph.nodes.map(() => []);
  for (const node of graph.nodes) {
    for (const input of node.inputs) {
      if (input.kind === "node") {
        const list = consumers[input.index];
        if (list && !list.includes(node.index)) {
          list.push(node.index);
        }
      }
    }
  }
  return consumers;
}
