import { Buffer } from "node:buffer";
import { createHash } from "node:crypto";

import { formatType } from "./types.js";
import type { Value } from "./value.js";

const FLOAT_VIEW = new DataView(new ArrayBuffer(8));

/** Hex rendering of the IEEE-754 bit pattern, with every NaN collapsed to one. */
function floatBits(value: number): string {
  if (Number.isNaN(value)) {
    return "nan";
  }
  FLOAT_VIEW.setFloat64(0, value);
  return FLOAT_VIEW.getBigUint64(0).toString(16);
}

/**
 * Serialises a payload into a canonical string: object keys are sorted,
 * numbers are written by bit pattern so `0` and `-0` stay distinct, and typed
 * arrays are written byte for byte.
 */
export function canonicalisePayload(payload: unknown): string {
  if (payload === null || payload === undefined) {
    return "n";
  }
  switch (typeof payload) {
    case "number":
      return `f:${floatBits(payload)}`;
    case "bigint":
      return `b:${payload.toString()}`;
    case "boolean":
      return payload ? "t" : "f";
    case "string":
      return `s:${JSON.stringify(payload)}`;
    case "object":
      break;
    default:
      return `?:${String(payload)}`;
  }
  if (ArrayBuffer.isView(payload)) {
    const bytes = Buffer.from(payload.buffer, payload.byteOffset, payload.byteLength);
    return `${payload.constructor.name}:${bytes.toString("hex")}`;
  }
  if (Array.isArray(payload)) {
    return `[${payload.map((entry: unknown) => canonicalisePayload(entry)).join(",")}]`;
  }
  const entries = Object.entries(payload)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, entry]) => `${JSON.stringify(key)}:${canonicalisePayload(entry)}`);
  return `{${entries.join(",")}}`;
}

/** Digests an ordered list of parts into a short stable hex fingerprint. */
export function digestParts(parts: readonly string[]): string {
  const hash = createHash("sha256");
  for (const part of parts) {
    hash.update(part);
    hash.update("\u0000");
  }
  return hash.digest("hex").slice(0, 24);
}

/** Fingerprint of a value, covering both its type and its payload. */
export function fingerprintValue(value: Value): string {
  return digestParts([formatType(value.type), canonicalisePayload(value.raw)]);
}
