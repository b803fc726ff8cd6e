import { displayValue } from "../values/literal.js";
import { concrete, generic, listOf } from "../values/types.js";
import { F64, RASTER, STRING, U32, VEC_F64, Value, type Raster } from "../values/value.js";
import type { OperationCatalog, OperationDeclaration, OverloadDeclaration } from "./registry.js";

const T = generic("T");
const f64 = concrete("f64");
const u32 = concrete("u32");
const string = concrete("string");
const raster = concrete("raster");

function mapRaster(source: Raster, lane: (x: number) => number): Raster {
  const data = new Float32Array(source.data.length);
  for (let index = 0; index < source.data.length; index += 1) {
    data[index] = lane(source.data[index] ?? 0);
  }
  return { width: source.width, height: source.height, data };
}

function readNumber(inputs: readonly Value[], index: number): number {
  const value = inputs[index];
  if (!value) {
    throw new RangeError(`missing input ${index}`);
  }
  return value.is(U32) ? value.downcast(U32) : value.downcast(F64);
}

function readRaster(inputs: readonly Value[], index: number): Raster {
  const value = inputs[index];
  if (!value) {
    throw new RangeError(`missing input ${index}`);
  }
  return value.downcast(RASTER);
}

function readString(inputs: readonly Value[], index: number): string {
  const value = inputs[index];
  if (!value) {
    throw new RangeError(`missing input ${index}`);
  }
  return value.downcast(STRING);
}

/** Wraps an integer result, rejecting overflow instead of wrapping silently. */
function u32Value(result: number): Value {
  if (!U32.guard(result)) {
    throw new RangeError(`u32 overflow: ${result}`);
  }
  return Value.of(U32, result);
}

/** Builds a raster overload whose CPU path and GPU kernel share one lane function. */
function rasterLane(
  uniforms: number,
  expression: string,
  lane: (x: number, uniforms: readonly number[]) => number,
): OverloadDeclaration {
  return {
    inputs: [raster, ...Array.from({ length: uniforms }, () => f64)],
    output: raster,
    cpu: (inputs) => {
      const scalars = Array.from({ length: uniforms }, (_, index) => readNumber(inputs, index + 1));
      return Value.of(RASTER, mapRaster(readRaster(inputs, 0), (x) => lane(x, scalars)));
    },
    gpu: { expression, lane },
  };
}

export const STANDARD_OPERATIONS: readonly OperationDeclaration[] = [
  {
    name: "constant",
    description: "Forwards its literal input.",
    intrinsic: "identity",
    overloads: [{ inputs: [T], output: T }],
  },
  {
    name: "double",
    overloads: [
      { inputs: [f64], output: f64, cpu: (inputs) => Value.of(F64, readNumber(inputs, 0) * 2) },
      { inputs: [u32], output: u32, cpu: (inputs) => u32Value(readNumber(inputs, 0) * 2) },
      rasterLane(0, "x * 2.0", (x) => x * 2),
    ],
  },
  {
    name: "add",
    overloads: [
      { inputs: [f64, f64], output: f64, cpu: (inputs) => Value.of(F64, readNumber(inputs, 0) + readNumber(inputs, 1)) },
      { inputs: [u32, u32], output: u32, cpu: (inputs) => u32Value(readNumber(inputs, 0) + readNumber(inputs, 1)) },
      rasterLane(1, "x + u[0]", (x, u) => x + (u[0] ?? 0)),
    ],
  },
  {
    name: "multiply",
    overloads: [
      { inputs: [f64, f64], output: f64, cpu: (inputs) => Value.of(F64, readNumber(inputs, 0) * readNumber(inputs, 1)) },
      { inputs: [u32, u32], output: u32, cpu: (inputs) => u32Value(readNumber(inputs, 0) * readNumber(inputs, 1)) },
      rasterLane(1, "x * u[0]", (x, u) => x * (u[0] ?? 1)),
    ],
  },
  {
    name: "negate",
    overloads: [
      { inputs: [f64], output: f64, cpu: (inputs) => Value.of(F64, -readNumber(inputs, 0)) },
      rasterLane(0, "-x", (x) => -x),
    ],
  },
  {
    name: "to_string",
    overloads: [{ inputs: [T], output: string, cpu: ([value]) => Value.of(STRING, value ? displayValue(value) : "") }],
  },
  {
    name: "concat",
    overloads: [
      { inputs: [string, string], output: string, cpu: (inputs) => Value.of(STRING, readString(inputs, 0) + readString(inputs, 1)) },
    ],
  },
  {
    name: "length",
    overloads: [
      { inputs: [string], output: u32, cpu: (inputs) => u32Value(readString(inputs, 0).length) },
      {
        inputs: [listOf(f64)],
        output: u32,
        cpu: ([value]) => u32Value(value ? value.downcast(VEC_F64).length : 0),
      },
    ],
  },
  {
    name: "raster_fill",
    overloads: [
      {
        inputs: [u32, u32, f64],
        output: raster,
        cpu: (inputs) => {
          const width = readNumber(inputs, 0);
          const height = readNumber(inputs, 1);
          const data = new Float32Array(width * height).fill(readNumber(inputs, 2));
          return Value.of(RASTER, { width, height, data });
        },
      },
    ],
  },
  { name: "raster_scale", overloads: [rasterLane(1, "x * u[0]", (x, u) => x * (u[0] ?? 1))] },
  { name: "raster_offset", overloads: [rasterLane(1, "x + u[0]", (x, u) => x + (u[0] ?? 0))] },
  { name: "raster_invert", overloads: [rasterLane(0, "1.0 - x", (x) => 1 - x)] },
  {
    name: "raster_clamp",
    overloads: [rasterLane(2, "clamp(x, u[0], u[1])", (x, u) => Math.min(Math.max(x, u[0] ?? 0), u[1] ?? 1))],
  },
  {
    name: "raster_mean",
    overloads: [
      {
        inputs: [raster],
        output: f64,
        cpu: (inputs) => {
          const { data } = readRaster(inputs, 0);
          if (data.length === 0) {
            return Value.of(F64, 0);
          }
          let total = 0;
          for (const sample of data) {
            total += sample;
          }
          return Value.of(F64, total / data.length);
        },
      },
    ],
  },
];

/** Registers the standard operation set on the provided catalog. */
export function registerStandardOperations(catalog: OperationCatalog): OperationCatalog {
  for (const declaration of STANDARD_OPERATIONS) {
    catalog.register(declaration);
  }
  return catalog;
}
