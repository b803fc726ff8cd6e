import { EngineError } from "../errors.js";
import { ERROR_CODES } from "../types.js";

/** A value crossing the CPU/GPU boundary has no device representation. */
export class UnsupportedBoundaryTypeError extends EngineError<{ identity: string; type: string; port: number }> {
  constructor(identity: string, port: number, type: string) {
    super(
      ERROR_CODES.GPU_UNSUPPORTED_BOUNDARY_TYPE,
      `input ${port} of '${identity}' has type ${type}, which has no GPU representation`,
      "feed rasters, f64 or u32 values into GPU kernels",
      { identity, type, port },
    );
    this.name = "UnsupportedBoundaryTypeError";
  }
}

/** No GPU context can run the dispatch; callers fall back to the CPU. */
export class BackendUnavailableError extends EngineError<{ reason: string }> {
  constructor(reason: string) {
    super(
      ERROR_CODES.GPU_BACKEND_UNAVAILABLE,
      `GPU backend unavailable: ${reason}`,
      "provide a GPU context or register a CPU implementation",
      { reason },
    );
    this.name = "BackendUnavailableError";
  }
}
