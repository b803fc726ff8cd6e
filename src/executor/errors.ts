import { EngineError } from "../errors.js";
import { ERROR_CODES } from "../types.js";

function describeReason(reason: unknown): string | null {
  if (reason === undefined || reason === null) {
    return null;
  }
  if (reason instanceof Error) {
    return reason.message;
  }
  return typeof reason === "string" ? reason : String(reason);
}

/**
 * Raised when an evaluation pass observes its abort signal. Nothing computed
 * by the pass after the abort is committed to the cache.
 */
export class EvaluationCancelledError extends EngineError<{ reason: string | null }> {
  constructor(reason?: unknown) {
    const text = describeReason(reason);
    super(
      ERROR_CODES.EXEC_CANCELLED,
      text ? `evaluation cancelled: ${text}` : "evaluation cancelled",
      "request the target again once the graph settles",
      { reason: text },
    );
    this.name = "EvaluationCancelledError";
  }
}

/**
 * A resolved node lacks one of its inputs. The compiler never produces such
 * graphs, so this is reported as an internal defect rather than a node error.
 */
export class MissingInputError extends EngineError<{ identity: string; port: number }> {
  constructor(identity: string, port: number) {
    super(
      ERROR_CODES.EXEC_MISSING_INPUT,
      `node '${identity}' has no resolved source for input ${port}`,
      "report the graph that produced this proto graph",
      { identity, port },
    );
    this.name = "MissingInputError";
  }
}

/** An operation threw, or returned a value of the wrong type. */
export class OperationPanicError extends EngineError<{ identity: string; operation: string }> {
  constructor(identity: string, operation: string, message: string, cause?: unknown) {
    super(
      ERROR_CODES.EXEC_OPERATION_PANIC,
      `operation '${operation}' failed at '${identity}': ${message}`,
      "inspect the node inputs or the operation implementation",
      { identity, operation },
      cause === undefined ? undefined : { cause },
    );
    this.name = "OperationPanicError";
  }
}

export class TargetNotFoundError extends EngineError<{ target: string | null }> {
  constructor(target: string | null) {
    super(
      ERROR_CODES.EXEC_TARGET_NOT_FOUND,
      target === null ? "the root network has no output node" : `no compiled node has identity '${target}'`,
      "address targets by identity path, e.g. 'outer/inner'",
      { target },
    );
    this.name = "TargetNotFoundError";
  }
}

export class NotCompiledError extends EngineError<Record<string, never>> {
  constructor() {
    super(ERROR_CODES.EXEC_NOT_COMPILED, "no proto graph has been loaded", "call recompile() before evaluating", {});
    this.name = "NotCompiledError";
  }
}
