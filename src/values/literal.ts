import { EngineError } from "../errors.js";
import { ERROR_CODES } from "../types.js";
import { formatType, typesEqual, type TypeDescriptor } from "./types.js";
import {
  BOOL,
  COLOR,
  DVEC2,
  F64,
  NONE,
  RASTER,
  STRING,
  U32,
  U64,
  VEC_F64,
  VECTOR_PATH,
  Value,
  type Color,
  type DVec2,
} from "./value.js";

/** Raised when a value cannot be rendered as a primitive literal. */
export class LiteralError extends EngineError<{ type: string; text?: string }> {
  constructor(message: string, type: TypeDescriptor, text?: string) {
    super(ERROR_CODES.VALUE_INVALID_LITERAL, message, "use a primitive literal matching the port type", {
      type: formatType(type),
      ...(text !== undefined ? { text } : {}),
    });
    this.name = "LiteralError";
  }
}

const NAMED_COLORS: ReadonlyMap<string, Color> = new Map([
  ["BLACK", { r: 0, g: 0, b: 0, a: 1 }],
  ["WHITE", { r: 1, g: 1, b: 1, a: 1 }],
  ["RED", { r: 1, g: 0, b: 0, a: 1 }],
  ["GREEN", { r: 0, g: 1, b: 0, a: 1 }],
  ["BLUE", { r: 0, g: 0, b: 1, a: 1 }],
  ["YELLOW", { r: 1, g: 1, b: 0, a: 1 }],
  ["CYAN", { r: 0, g: 1, b: 1, a: 1 }],
  ["MAGENTA", { r: 1, g: 0, b: 1, a: 1 }],
  ["TRANSPARENT", { r: 0, g: 0, b: 0, a: 0 }],
]);

const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const UNSIGNED_PATTERN = /^\d+$/;
const HEX_PATTERN = /^[0-9a-fA-F]+$/;

function parseFloatLiteral(text: string): number | undefined {
  const trimmed = text.trim();
  return FLOAT_PATTERN.test(trimmed) ? Number(trimmed) : undefined;
}

function parseDVec2(text: string): DVec2 | undefined {
  const parts = text.split(",");
  if (parts.length < 2) {
    return undefined;
  }
  const x = parseFloatLiteral(parts[0] ?? "");
  const y = parseFloatLiteral(parts[1] ?? "");
  if (x === undefined || y === undefined) {
    return undefined;
  }
  return { x, y };
}

function parseHexColor(hex: string): Color | undefined {
  if (!HEX_PATTERN.test(hex) || (hex.length !== 6 && hex.length !== 8)) {
    return undefined;
  }
  const channel = (offset: number): number => Number.parseInt(hex.slice(offset, offset + 2), 16) / 255;
  return { r: channel(0), g: channel(2), b: channel(4), a: hex.length === 8 ? channel(6) : 1 };
}

/**
 * Parses a colour written either as a quoted hex string (`"#ff0000"`,
 * `"00ff00ff"`) or as a named constant (`Color::RED`).
 */
export function parseColorLiteral(text: string): Color | undefined {
  const input = text.trim();
  if (input.startsWith('"') && input.endsWith('"') && input.length >= 2) {
    const hex = input.slice(1, -1).trim().replace(/^#/, "");
    return parseHexColor(hex);
  }
  const [family, constant] = input.split("::").map((part) => part.trim());
  if (family !== "Color" || constant === undefined) {
    return undefined;
  }
  return NAMED_COLORS.get(constant);
}

/**
 * Parses a literal typed into a port field. Returns `undefined` when the text
 * does not describe a value of the requested type, or when the type has no
 * primitive spelling.
 */
export function parsePrimitiveLiteral(text: string, type: TypeDescriptor): Value | undefined {
  if (type.kind !== "concrete") {
    return undefined;
  }
  switch (type.name) {
    case "()":
      return Value.none();
    case "string":
      return Value.of(STRING, text);
    case "f64": {
      const parsed = parseFloatLiteral(text);
      return parsed === undefined ? undefined : Value.of(F64, parsed);
    }
    case "u32": {
      const trimmed = text.trim();
      if (!UNSIGNED_PATTERN.test(trimmed)) {
        return undefined;
      }
      const parsed = Number(trimmed);
      return U32.guard(parsed) ? Value.of(U32, parsed) : undefined;
    }
    case "u64": {
      const trimmed = text.trim();
      if (!UNSIGNED_PATTERN.test(trimmed)) {
        return undefined;
      }
      const parsed = BigInt(trimmed);
      return U64.guard(parsed) ? Value.of(U64, parsed) : undefined;
    }
    case "bool": {
      const trimmed = text.trim();
      if (trimmed === "true" || trimmed === "false") {
        return Value.of(BOOL, trimmed === "true");
      }
      return undefined;
    }
    case "dvec2": {
      const parsed = parseDVec2(text);
      return parsed ? Value.of(DVEC2, parsed) : undefined;
    }
    case "color": {
      const parsed = parseColorLiteral(text);
      return parsed ? Value.of(COLOR, parsed) : undefined;
    }
    default:
      return undefined;
  }
}

function toHexByte(channel: number): string {
  const clamped = Math.min(1, Math.max(0, channel));
  return Math.round(clamped * 255).toString(16).padStart(2, "0");
}

/**
 * Renders a value with its type suffix (`5_u32`, `2.5_f64`, `"text"`). Only
 * primitive values have such a spelling.
 */
export function formatPrimitiveLiteral(value: Value): string {
  if (value.is(NONE)) {
    return "()";
  }
  if (value.is(STRING)) {
    return `"${value.downcast(STRING)}"`;
  }
  if (value.is(U32)) {
    return `${value.downcast(U32)}_u32`;
  }
  if (value.is(U64)) {
    return `${value.downcast(U64)}_u64`;
  }
  if (value.is(F64)) {
    return `${value.downcast(F64)}_f64`;
  }
  if (value.is(BOOL)) {
    return String(value.downcast(BOOL));
  }
  if (value.is(COLOR)) {
    const color = value.downcast(COLOR);
    return `Color #${toHexByte(color.r)}${toHexByte(color.g)}${toHexByte(color.b)}${toHexByte(color.a)}`;
  }
  throw new LiteralError(`cannot render ${formatType(value.type)} as a primitive literal`, value.type);
}

/** Plain display used by text-producing operations. */
export function displayValue(value: Value): string {
  if (value.is(STRING)) {
    return value.downcast(STRING);
  }
  if (value.is(F64)) {
    return String(value.downcast(F64));
  }
  if (value.is(U32)) {
    return String(value.downcast(U32));
  }
  if (value.is(U64)) {
    return value.downcast(U64).toString();
  }
  if (value.is(BOOL)) {
    return String(value.downcast(BOOL));
  }
  throw new LiteralError(`cannot display ${formatType(value.type)}`, value.type);
}

/**
 * Default literal assigned to a port of the given type when nothing else is
 * known (for instance after its upstream node is removed).
 */
export function defaultValueFor(type: TypeDescriptor): Value | undefined {
  if (typesEqual(type, VEC_F64.type)) {
    return Value.of(VEC_F64, []);
  }
  if (type.kind !== "concrete") {
    return undefined;
  }
  switch (type.name) {
    case "()":
      return Value.none();
    case "f64":
      return Value.of(F64, 0);
    case "u32":
      return Value.of(U32, 0);
    case "u64":
      return Value.of(U64, 0n);
    case "bool":
      return Value.of(BOOL, false);
    case "string":
      return Value.of(STRING, "");
    case "dvec2":
      return Value.of(DVEC2, { x: 0, y: 0 });
    case "color":
      return Value.of(COLOR, { r: 0, g: 0, b: 0, a: 0 });
    case "raster":
      return Value.of(RASTER, { width: 0, height: 0, data: new Float32Array(0) });
    case "vector_path":
      return Value.of(VECTOR_PATH, { points: [], closed: false });
    default:
      return undefined;
  }
}
