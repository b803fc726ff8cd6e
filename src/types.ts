/**
 * Shared types used across the engine. Grouping these definitions keeps the
 * stable error codes and the failure payload helpers consistent between the
 * graph, compiler, executor and backend modules.
 */

/**
 * Strongly typed catalogue of stable error codes grouped by feature family.
 * Keeping a single source of truth lets the editor shell branch on codes
 * instead of parsing messages.
 */
export const ERROR_CATALOG = {
  GRAPH: {
    CYCLE: "E-GRAPH-CYCLE",
    DANGLING_REFERENCE: "E-GRAPH-DANGLING-REF",
    TYPE_INCOMPATIBLE: "E-GRAPH-TYPE-INCOMPATIBLE",
    UNBOUNDED_RECURSION: "E-GRAPH-UNBOUNDED-RECURSION",
    INVALID_EDIT: "E-GRAPH-INVALID-EDIT",
    INVALID_INPUT: "E-GRAPH-INVALID-INPUT",
  },
  COMPILE: {
    TYPE_RESOLUTION: "E-COMPILE-TYPE-RESOLUTION",
    AMBIGUOUS_OVERLOAD: "E-COMPILE-AMBIGUOUS-OVERLOAD",
    UNKNOWN_OPERATION: "E-COMPILE-UNKNOWN-OPERATION",
    UPSTREAM: "E-COMPILE-UPSTREAM",
  },
  EXEC: {
    OPERATION_PANIC: "E-EXEC-OPERATION-PANIC",
    MISSING_INPUT: "E-EXEC-MISSING-INPUT",
    CANCELLED: "E-EXEC-CANCELLED",
    TARGET_NOT_FOUND: "E-EXEC-TARGET-NOT-FOUND",
    NOT_COMPILED: "E-EXEC-NOT-COMPILED",
  },
  GPU: {
    UNSUPPORTED_BOUNDARY_TYPE: "E-GPU-UNSUPPORTED-BOUNDARY-TYPE",
    BACKEND_UNAVAILABLE: "E-GPU-BACKEND-UNAVAILABLE",
  },
  CATALOG: {
    DUPLICATE_OPERATION: "E-CATALOG-DUPLICATE-OPERATION",
    INVALID_DECLARATION: "E-CATALOG-INVALID-DECLARATION",
  },
  VALUE: {
    TYPE_MISMATCH: "E-VALUE-TYPE-MISMATCH",
    INVALID_LITERAL: "E-VALUE-INVALID-LITERAL",
  },
  CONFIG: {
    INVALID: "E-CONFIG-INVALID",
  },
} as const;

type ErrorCatalog = typeof ERROR_CATALOG;

/** Utility type used to flatten the nested error catalogue. */
type FlattenCatalog<T extends Record<string, Record<string, string>>> = {
  [Family in keyof T & string as `${Family}_${keyof T[Family] & string}`]: T[Family][keyof T[Family] & string];
};

/** Flattened version of {@link ERROR_CATALOG} used for ergonomic lookups. */
type FlatErrorCatalog = FlattenCatalog<ErrorCatalog>;

/**
 * Builds a flattened object whose properties map to their fully qualified error
 * codes (e.g. `GRAPH_CYCLE`). The helper keeps runtime data immutable while
 * preserving the strongly typed relationship with {@link ERROR_CATALOG}.
 */
function flattenCatalog<T extends Record<string, Record<string, string>>>(
  catalog: T,
): FlattenCatalog<T> {
  const flat: Record<string, string> = {};
  for (const familyKey of Object.keys(catalog) as Array<keyof T & string>) {
    const family = catalog[familyKey];
    for (const codeKey of Object.keys(family) as Array<keyof T[typeof familyKey] & string>) {
      flat[`${familyKey}_${codeKey}`] = family[codeKey];
    }
  }
  return Object.freeze(flat) as FlattenCatalog<T>;
}

/** Flat access to all stable error codes (e.g. `ERROR_CODES.EXEC_OPERATION_PANIC`). */
export const ERROR_CODES: FlatErrorCatalog = flattenCatalog(ERROR_CATALOG);

/** Union type representing every stable error code emitted by the engine. */
export type ErrorCode = FlatErrorCatalog[keyof FlatErrorCatalog];

/** Maximum number of UTF-16 code units allowed for error messages and hints. */
export const ERROR_TEXT_MAX_LENGTH = 160;

function collapse(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function clip(text: string): string {
  return text.length <= ERROR_TEXT_MAX_LENGTH ? text : `${text.slice(0, ERROR_TEXT_MAX_LENGTH - 1)}…`;
}

/** Single-line, bounded form of an error message; blank text becomes `fallback`. */
export function normaliseErrorMessage(text: string, fallback = "unexpected error"): string {
  const collapsed = collapse(text);
  return clip(collapsed.length === 0 ? fallback : collapsed);
}

/** Like {@link normaliseErrorMessage}, but a blank hint is dropped. */
export function normaliseErrorHint(hint?: string): string | undefined {
  const collapsed = hint === undefined ? "" : collapse(hint);
  return collapsed.length === 0 ? undefined : clip(collapsed);
}

/**
 * Failure payload shown next to a node in the editor. Compile diagnostics,
 * node failures and {@link describeEngineError} all build theirs with
 * {@link fail}.
 */
export interface EngineFailure<Code extends string = string> {
  ok: false;
  code: Code;
  message: string;
  hint?: string;
}

/** Builds a normalised {@link EngineFailure}. */
export function fail<Code extends string>(
  code: Code,
  message: string,
  hint?: string | null,
): EngineFailure<Code> {
  const failure: EngineFailure<Code> = {
    ok: false,
    code,
    message: normaliseErrorMessage(message),
  };
  const normalisedHint = normaliseErrorHint(hint ?? undefined);
  if (normalisedHint) {
    failure.hint = normalisedHint;
  }
  return failure;
}
