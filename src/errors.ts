import type { ZodIssue } from "zod";

import { ERROR_CODES, fail, type EngineFailure, type ErrorCode } from "./types.js";

/**
 * Base class of every error raised by the engine. Subclasses pin a stable
 * {@link ErrorCode}, a short remediation hint and structured details so the
 * editor shell can surface the failure next to the offending node.
 */
export class EngineError<Details extends object = Record<string, unknown>> extends Error {
  public readonly code: ErrorCode;
  public readonly hint: string;
  public readonly details: Details;

  constructor(code: ErrorCode, message: string, hint: string, details: Details, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EngineError";
    this.code = code;
    this.hint = hint;
    this.details = details;
  }
}

/** Raised when the engine configuration fails validation. */
export class ConfigError extends EngineError<{ issues: string[] }> {
  constructor(issues: string[]) {
    super(
      ERROR_CODES.CONFIG_INVALID,
      `invalid engine configuration: ${issues.join("; ")}`,
      "check the NODEGRAPH_* environment variables and explicit overrides",
      { issues },
    );
    this.name = "ConfigError";
  }
}

/** Type guard narrowing unknown throwables to {@link EngineError}. */
export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

/**
 * Converts any thrown value into the canonical failure payload. Engine errors
 * keep their stable code and hint; foreign errors collapse to a generic
 * operation panic so nothing reaches the shell without a code.
 */
export function describeEngineError(error: unknown): EngineFailure<ErrorCode> {
  if (isEngineError(error)) {
    return fail(error.code, error.message, error.hint);
  }
  const message = error instanceof Error ? error.message : String(error);
  return fail(ERROR_CODES.EXEC_OPERATION_PANIC, message);
}

/** Renders zod issues as `path: message` strings. */
export function formatValidationIssues(issues: readonly ZodIssue[]): string[] {
  return issues.map((issue) => {
    const path = issue.path.join(".");
    return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
  });
}
