import type { ErrorCode } from "../types.js";
import type { TypeDescriptor } from "../values/types.js";
import type { Value } from "../values/value.js";

/** Failure recorded against a node and reported to the requester. */
export interface NodeFailure {
  readonly code: ErrorCode;
  readonly message: string;
  readonly hint: string;
  /** Identity path of the node that failed first. */
  readonly failedNode: string;
}

export type NodeResult = { readonly ok: true; readonly value: Value } | { readonly ok: false; readonly failure: NodeFailure };

/** What one evaluation pass did. */
export interface EvaluationReport {
  readonly generation: number;
  readonly target: string;
  /** Identities whose operation ran during the pass, in completion order. */
  readonly executed: readonly string[];
  /** Identities answered from the cache. */
  readonly cacheHits: readonly string[];
  readonly gpuDispatches: number;
}

export type EvaluationOutcome =
  | { readonly ok: true; readonly value: Value; readonly type: TypeDescriptor; readonly report: EvaluationReport }
  | { readonly ok: false; readonly error: NodeFailure; readonly report: EvaluationReport };

export interface EvaluateOptions {
  /** Aborts the pass; nothing it computes afterwards is committed. */
  signal?: AbortSignal;
}
