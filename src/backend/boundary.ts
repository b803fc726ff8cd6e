import { formatType } from "../values/types.js";
import { F64, RASTER, U32, Value, type Raster } from "../values/value.js";
import { UnsupportedBoundaryTypeError } from "./errors.js";

/** Raster streamed through a pipeline; its samples are bound as-is. */
export function rasterToDevice(value: Value, identity: string, port: number): Raster {
  const result = value.tryDowncast(RASTER);
  if (!result.ok) {
    throw new UnsupportedBoundaryTypeError(identity, port, formatType(value.type));
  }
  return result.value;
}

/** Scalar uniform; rounded to 32 bits when written into the uniform buffer. */
export function uniformToDevice(value: Value, identity: string, port: number): number {
  if (value.is(F64)) {
    return value.downcast(F64);
  }
  if (value.is(U32)) {
    return value.downcast(U32);
  }
  throw new UnsupportedBoundaryTypeError(identity, port, formatType(value.type));
}

/** Wraps a device output buffer with the dimensions of the streamed raster. */
export function rasterFromDevice(data: Float32Array, shape: Raster): Value {
  if (data.length !== shape.width * shape.height) {
    throw new RangeError(`device returned ${data.length} samples for a ${shape.width}x${shape.height} raster`);
  }
  return Value.of(RASTER, { width: shape.width, height: shape.height, data });
}
