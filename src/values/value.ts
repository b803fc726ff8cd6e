import { EngineError } from "../errors.js";
import { ERROR_CODES } from "../types.js";
import { concrete, formatType, listOf, typesEqual, type TypeDescriptor } from "./types.js";

/**
 * Typed handle pairing a type descriptor with the runtime guard recognising
 * its payloads. Tags are the only way to read a payload back out of a
 * {@link Value}, which keeps downcasts checked without `as` casts at call sites.
 */
export interface ValueTag<T> {
  readonly type: TypeDescriptor;
  readonly guard: (payload: unknown) => payload is T;
}

/** Two dimensional vector payload. */
export interface DVec2 {
  readonly x: number;
  readonly y: number;
}

/** Linear RGBA colour with channels in `[0, 1]`. */
export interface Color {
  readonly r: number;
  readonly g: number;
  readonly b: number;
  readonly a: number;
}

/** Single channel raster stored row-major. */
export interface Raster {
  readonly width: number;
  readonly height: number;
  readonly data: Float32Array;
}

/** Polyline path, optionally closed. */
export interface VectorPath {
  readonly points: readonly DVec2[];
  readonly closed: boolean;
}

/** Error raised when a value is downcast with a tag that does not match. */
export class ValueTypeError extends EngineError<{ expected: string; actual: string }> {
  constructor(expected: TypeDescriptor, actual: TypeDescriptor, reason?: string) {
    super(
      ERROR_CODES.VALUE_TYPE_MISMATCH,
      reason
        ? `expected ${formatType(expected)} but received ${formatType(actual)}: ${reason}`
        : `expected ${formatType(expected)} but received ${formatType(actual)}`,
      "check the type declared by the producing operation",
      { expected: formatType(expected), actual: formatType(actual) },
    );
    this.name = "ValueTypeError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function isDVec2(value: unknown): value is DVec2 {
  return isRecord(value) && isFiniteNumber(value.x) && isFiniteNumber(value.y);
}

function isColor(value: unknown): value is Color {
  return isRecord(value) && isFiniteNumber(value.r) && isFiniteNumber(value.g) && isFiniteNumber(value.b) && isFiniteNumber(value.a);
}

function defineTag<T>(type: TypeDescriptor, guard: (payload: unknown) => payload is T): ValueTag<T> {
  return Object.freeze({ type, guard });
}

export const NONE: ValueTag<null> = defineTag(concrete("()"), (payload): payload is null => payload === null);

export const F64: ValueTag<number> = defineTag(concrete("f64"), (payload): payload is number => typeof payload === "number");

export const U32: ValueTag<number> = defineTag(
  concrete("u32"),
  (payload): payload is number => typeof payload === "number" && Number.isInteger(payload) && payload >= 0 && payload <= 0xffff_ffff,
);

export const U64: ValueTag<bigint> = defineTag(
  concrete("u64"),
  (payload): payload is bigint => typeof payload === "bigint" && payload >= 0n && payload <= 0xffff_ffff_ffff_ffffn,
);

export const BOOL: ValueTag<boolean> = defineTag(concrete("bool"), (payload): payload is boolean => typeof payload === "boolean");

export const STRING: ValueTag<string> = defineTag(concrete("string"), (payload): payload is string => typeof payload === "string");

export const DVEC2: ValueTag<DVec2> = defineTag(concrete("dvec2"), isDVec2);

export const COLOR: ValueTag<Color> = defineTag(concrete("color"), isColor);

export const VEC_F64: ValueTag<readonly number[]> = defineTag(
  listOf(concrete("f64")),
  (payload): payload is readonly number[] => Array.isArray(payload) && payload.every((entry) => typeof entry === "number"),
);

export const RASTER: ValueTag<Raster> = defineTag(
  concrete("raster"),
  (payload): payload is Raster =>
    isRecord(payload) &&
    typeof payload.width === "number" &&
    typeof payload.height === "number" &&
    Number.isInteger(payload.width) &&
    Number.isInteger(payload.height) &&
    payload.data instanceof Float32Array &&
    payload.data.length === payload.width * payload.height,
);

export const VECTOR_PATH: ValueTag<VectorPath> = defineTag(
  concrete("vector_path"),
  (payload): payload is VectorPath =>
    isRecord(payload) && typeof payload.closed === "boolean" && Array.isArray(payload.points) && payload.points.every(isDVec2),
);

/** Tags known to the literal codec, the hasher and the GPU boundary. */
const tagRegistry = new Map<string, ValueTag<unknown>>();

/** Registers a tag so descriptors carrying its type can be looked up. */
export function registerValueTag<T>(tag: ValueTag<T>): void {
  tagRegistry.set(formatType(tag.type), tag);
}

/** Returns the registered tag for a descriptor, if any. */
export function findValueTag(type: TypeDescriptor): ValueTag<unknown> | undefined {
  return tagRegistry.get(formatType(type));
}

for (const tag of [NONE, F64, U32, U64, BOOL, STRING, DVEC2, COLOR, VEC_F64, RASTER, VECTOR_PATH]) {
  registerValueTag<unknown>(tag);
}

/**
 * Freezes plain payload containers so downstream readers cannot mutate a value
 * shared through fan-out. Typed arrays cannot be frozen and are shared as-is.
 */
function freezePayload(payload: unknown): void {
  if (isRecord(payload) && !ArrayBuffer.isView(payload) && !Object.isFrozen(payload)) {
    Object.freeze(payload);
  }
}

export type DowncastResult<T> = { ok: true; value: T } | { ok: false; error: ValueTypeError };

/**
 * Type-erased payload flowing along edges. The same instance is handed to
 * every consumer of a fanned-out output; payloads are never copied.
 */
export class Value {
  private constructor(
    public readonly type: TypeDescriptor,
    private readonly payload: unknown,
  ) {}

  /** Wraps a payload after checking it with the tag's guard. */
  static of<T>(tag: ValueTag<T>, payload: T): Value {
    if (!tag.guard(payload)) {
      throw new ValueTypeError(tag.type, tag.type, "payload rejected by the runtime guard");
    }
    freezePayload(payload);
    return new Value(tag.type, payload);
  }

  static none(): Value {
    return Value.of(NONE, null);
  }

  /** True when the value carries exactly the tag's type. */
  is<T>(tag: ValueTag<T>): boolean {
    return typesEqual(this.type, tag.type);
  }

  /** Returns the payload or throws {@link ValueTypeError} on a tag mismatch. */
  downcast<T>(tag: ValueTag<T>): T {
    const result = this.tryDowncast(tag);
    if (!result.ok) {
      throw result.error;
    }
    return result.value;
  }

  tryDowncast<T>(tag: ValueTag<T>): DowncastResult<T> {
    if (!typesEqual(this.type, tag.type)) {
      return { ok: false, error: new ValueTypeError(tag.type, this.type) };
    }
    const payload = this.payload;
    if (!tag.guard(payload)) {
      return { ok: false, error: new ValueTypeError(tag.type, this.type, "payload rejected by the runtime guard") };
    }
    return { ok: true, value: payload };
  }

  /** Type-erased read used by hashing and diagnostics. */
  get raw(): unknown {
    return this.payload;
  }
}
