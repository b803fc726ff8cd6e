import { EngineError } from "../errors.js";
import { ERROR_CODES, type ErrorCode } from "../types.js";

/** Violation reported by the structural validation pass. */
export interface GraphViolation {
  /** Stable error code identifying the violated rule. */
  code: ErrorCode;
  message: string;
  /** Pointer to the offending location, e.g. `/networks/root/nodes/b/inputs/0`. */
  path: string;
  hint?: string;
  details?: Record<string, unknown>;
}

/**
 * Base class of the structural errors. They are raised at edit or validate
 * time and never reach the executor.
 */
export class GraphStructureError extends EngineError<{ violations: GraphViolation[] }> {
  constructor(code: ErrorCode, message: string, hint: string, violations: GraphViolation[]) {
    super(code, message, hint, { violations });
    this.name = "GraphStructureError";
  }

  get violations(): GraphViolation[] {
    return this.details.violations;
  }
}

export class CycleDetectedError extends GraphStructureError {
  constructor(cycle: readonly string[], violations?: GraphViolation[]) {
    const message = `cycle detected: ${cycle.join(" -> ")}`;
    super(
      ERROR_CODES.GRAPH_CYCLE,
      message,
      "remove one of the edges forming the cycle",
      violations ?? [{ code: ERROR_CODES.GRAPH_CYCLE, message, path: "/", details: { cycle: [...cycle] } }],
    );
    this.name = "CycleDetectedError";
  }
}

export class DanglingReferenceError extends GraphStructureError {
  constructor(message: string, violations?: GraphViolation[]) {
    super(
      ERROR_CODES.GRAPH_DANGLING_REFERENCE,
      message,
      "reference an existing node, port or network",
      violations ?? [{ code: ERROR_CODES.GRAPH_DANGLING_REFERENCE, message, path: "/" }],
    );
    this.name = "DanglingReferenceError";
  }
}

export class TypeIncompatibleError extends GraphStructureError {
  constructor(message: string, violations?: GraphViolation[]) {
    super(
      ERROR_CODES.GRAPH_TYPE_INCOMPATIBLE,
      message,
      "connect ports whose declared types can unify",
      violations ?? [{ code: ERROR_CODES.GRAPH_TYPE_INCOMPATIBLE, message, path: "/" }],
    );
    this.name = "TypeIncompatibleError";
  }
}

export class UnboundedRecursionError extends GraphStructureError {
  constructor(chain: readonly string[], reason: string, violations?: GraphViolation[]) {
    const message = `unbounded network recursion (${reason}): ${chain.join(" -> ")}`;
    super(
      ERROR_CODES.GRAPH_UNBOUNDED_RECURSION,
      message,
      "break the chain of networks embedding each other",
      violations ?? [{ code: ERROR_CODES.GRAPH_UNBOUNDED_RECURSION, message, path: "/", details: { chain: [...chain] } }],
    );
    this.name = "UnboundedRecursionError";
  }
}

/** Raised when an edit cannot be applied to the current document. */
export class GraphEditError extends EngineError<{ network: string; nodeId?: string }> {
  constructor(message: string, network: string, nodeId?: string) {
    super(ERROR_CODES.GRAPH_INVALID_EDIT, message, "check the edit against the current document", {
      network,
      ...(nodeId !== undefined ? { nodeId } : {}),
    });
    this.name = "GraphEditError";
  }
}

/** Builds the error matching the first violation of a failed validation. */
export function structureErrorFor(violations: GraphViolation[]): GraphStructureError {
  const first = violations[0];
  if (!first) {
    return new GraphStructureError(ERROR_CODES.GRAPH_INVALID_INPUT, "graph validation failed", "inspect the document", []);
  }
  switch (first.code) {
    case ERROR_CODES.GRAPH_CYCLE: {
      const cycle = first.details?.cycle;
      return new CycleDetectedError(Array.isArray(cycle) ? cycle.map(String) : [], violations);
    }
    case ERROR_CODES.GRAPH_DANGLING_REFERENCE:
      return new DanglingReferenceError(first.message, violations);
    case ERROR_CODES.GRAPH_TYPE_INCOMPATIBLE:
      return new TypeIncompatibleError(first.message, violations);
    case ERROR_CODES.GRAPH_UNBOUNDED_RECURSION: {
      const chain = first.details?.chain;
      return new UnboundedRecursionError(Array.isArray(chain) ? chain.map(String) : [], "self-reference", violations);
    }
    default:
      return new GraphStructureError(first.code, first.message, first.hint ?? "inspect the document", violations);
  }
}
