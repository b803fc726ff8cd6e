import { EngineError } from "../errors.js";
import { ERROR_CODES, type ErrorCode } from "../types.js";
import {
  formatType,
  genericity,
  isConcreteType,
  substitute,
  unify,
  type TypeBindings,
  type TypeDescriptor,
} from "../values/types.js";
import type { Value } from "../values/value.js";

/** Tie-break applied when several overloads accept the same input types. */
export type OverloadPolicy = "most-specific" | "first-declared" | "strict";

export const OVERLOAD_POLICIES: readonly OverloadPolicy[] = ["most-specific", "first-declared", "strict"];

/** Context handed to CPU implementations. */
export interface OperationContext {
  readonly signal: AbortSignal;
  readonly instance: OperationInstance;
  /** Identity path of the node being evaluated. */
  readonly identity: string;
}

export type CpuImplementation = (inputs: readonly Value[], context: OperationContext) => Value | Promise<Value>;

/**
 * Element-wise kernel applied to every lane of a raster. The first input of
 * the operation is the streamed raster, the remaining inputs are scalar
 * uniforms referenced in the expression as `u[0]`, `u[1]`, ...
 */
export interface GpuKernel {
  /** WGSL expression over the lane value `x` and the uniforms. */
  readonly expression: string;
  /** Reference semantics of the expression, used by software devices. */
  readonly lane: (x: number, uniforms: readonly number[]) => number;
}

export interface OverloadDeclaration {
  readonly inputs: readonly TypeDescriptor[];
  readonly output: TypeDescriptor;
  readonly cpu?: CpuImplementation;
  readonly gpu?: GpuKernel;
}

export interface OperationDeclaration {
  readonly name: string;
  readonly description?: string;
  /**
   * `identity` marks operations that only forward their single input. The
   * executor materialises them without counting an execution.
   */
  readonly intrinsic?: "identity";
  readonly overloads: readonly OverloadDeclaration[];
}

/** Concrete, monomorphised instance of an overload. */
export interface OperationInstance {
  readonly id: string;
  readonly operation: string;
  readonly overloadIndex: number;
  readonly inputTypes: readonly TypeDescriptor[];
  readonly outputType: TypeDescriptor;
  readonly bindings: TypeBindings;
  readonly intrinsic?: "identity";
  readonly cpu?: CpuImplementation;
  readonly gpu?: GpuKernel;
}

export type OverloadResolution =
  | { ok: true; instance: OperationInstance }
  | { ok: false; code: ErrorCode; message: string; candidates: string[] };

/** Raised when an operation declaration is rejected at registration time. */
export class CatalogError extends EngineError<{ operation: string }> {
  constructor(code: ErrorCode, operation: string, message: string) {
    super(code, message, "fix the operation declaration before registering it", { operation });
    this.name = "CatalogError";
  }
}

interface Candidate {
  readonly index: number;
  readonly overload: OverloadDeclaration;
  readonly bindings: Map<string, TypeDescriptor>;
  readonly output: TypeDescriptor;
  readonly score: number;
}

function signatureOf(inputs: readonly TypeDescriptor[], output: TypeDescriptor): string {
  return `(${inputs.map(formatType).join(", ")}) -> ${formatType(output)}`;
}

/**
 * Registry of typed operations. The compiler resolves an operation name and
 * the concrete types flowing into a node to a shared {@link OperationInstance};
 * the graph layer reads declared port types for best-effort validation.
 */
export class OperationCatalog {
  private readonly operations = new Map<string, OperationDeclaration>();
  private readonly instances = new Map<string, OperationInstance>();

  register(declaration: OperationDeclaration): this {
    const { name, overloads } = declaration;
    if (name.trim().length === 0) {
      throw new CatalogError(ERROR_CODES.CATALOG_INVALID_DECLARATION, name, "operation name must not be empty");
    }
    if (this.operations.has(name)) {
      throw new CatalogError(ERROR_CODES.CATALOG_DUPLICATE_OPERATION, name, `operation '${name}' is already registered`);
    }
    const first = overloads[0];
    if (!first) {
      throw new CatalogError(ERROR_CODES.CATALOG_INVALID_DECLARATION, name, `operation '${name}' declares no overload`);
    }
    for (const overload of overloads) {
      if (overload.inputs.length !== first.inputs.length) {
        throw new CatalogError(
          ERROR_CODES.CATALOG_INVALID_DECLARATION,
          name,
          `overloads of '${name}' must share the same arity`,
        );
      }
      if (!declaration.intrinsic && !overload.cpu && !overload.gpu) {
        throw new CatalogError(
          ERROR_CODES.CATALOG_INVALID_DECLARATION,
          name,
          `overload ${signatureOf(overload.inputs, overload.output)} of '${name}' has no implementation`,
        );
      }
    }
    if (declaration.intrinsic === "identity" && first.inputs.length !== 1) {
      throw new CatalogError(ERROR_CODES.CATALOG_INVALID_DECLARATION, name, "identity operations take exactly one input");
    }
    this.operations.set(name, declaration);
    return this;
  }

  has(name: string): boolean {
    return this.operations.has(name);
  }

  get(name: string): OperationDeclaration | undefined {
    return this.operations.get(name);
  }

  /** Registered operation names in registration order. */
  list(): string[] {
    return Array.from(this.operations.keys());
  }

  /** Number of input ports of the operation, or undefined when unknown. */
  arity(name: string): number | undefined {
    return this.operations.get(name)?.overloads[0]?.inputs.length;
  }

  /** Declared patterns of one input port across every overload. */
  inputPatterns(name: string, port: number): TypeDescriptor[] {
    const declaration = this.operations.get(name);
    if (!declaration) {
      return [];
    }
    const patterns: TypeDescriptor[] = [];
    for (const overload of declaration.overloads) {
      const pattern = overload.inputs[port];
      if (pattern) {
        patterns.push(pattern);
      }
    }
    return patterns;
  }

  /** Declared output patterns across every overload. */
  outputPatterns(name: string): TypeDescriptor[] {
    return this.operations.get(name)?.overloads.map((overload) => overload.output) ?? [];
  }

  /** Number of distinct monomorphised instances created so far. */
  instanceCount(): number {
    return this.instances.size;
  }

  /**
   * Resolves an operation against concrete input types. Matching overloads are
   * ranked by specificity (number of generic slots in their inputs); the
   * policy decides between equally ranked candidates.
   */
  resolve(name: string, inputTypes: readonly TypeDescriptor[], policy: OverloadPolicy): OverloadResolution {
    const declaration = this.operations.get(name);
    if (!declaration) {
      return {
        ok: false,
        code: ERROR_CODES.COMPILE_UNKNOWN_OPERATION,
        message: `operation '${name}' is not registered`,
        candidates: [],
      };
    }

    const candidates: Candidate[] = [];
    declaration.overloads.forEach((overload, index) => {
      if (overload.inputs.length !== inputTypes.length) {
        return;
      }
      const bindings = new Map<string, TypeDescriptor>();
      for (let port = 0; port < inputTypes.length; port += 1) {
        const pattern = overload.inputs[port];
        const actual = inputTypes[port];
        if (!pattern || !actual || !unify(pattern, actual, bindings)) {
          return;
        }
      }
      const output = substitute(overload.output, bindings);
      if (!isConcreteType(output)) {
        return;
      }
      const score = overload.inputs.reduce((total, pattern) => total + genericity(pattern), 0);
      candidates.push({ index, overload, bindings, output, score });
    });

    const received = inputTypes.map(formatType).join(", ");
    if (candidates.length === 0) {
      return {
        ok: false,
        code: ERROR_CODES.COMPILE_TYPE_RESOLUTION,
        message: `no overload of '${name}' accepts (${received})`,
        candidates: declaration.overloads.map((overload) => signatureOf(overload.inputs, overload.output)),
      };
    }

    const chosen = this.pick(candidates, policy);
    if (!chosen) {
      const best = Math.min(...candidates.map((candidate) => candidate.score));
      const tied = candidates.filter((candidate) => candidate.score === best);
      return {
        ok: false,
        code: ERROR_CODES.COMPILE_AMBIGUOUS_OVERLOAD,
        message: `${tied.length} overloads of '${name}' equally match (${received})`,
        candidates: tied.map((candidate) => signatureOf(candidate.overload.inputs, candidate.overload.output)),
      };
    }
    return { ok: true, instance: this.instantiate(declaration, chosen, inputTypes) };
  }

  private pick(candidates: Candidate[], policy: OverloadPolicy): Candidate | undefined {
    if (policy === "first-declared") {
      return candidates[0];
    }
    let best: Candidate | undefined;
    let tied = false;
    for (const candidate of candidates) {
      if (!best || candidate.score < best.score) {
        best = candidate;
        tied = false;
      } else if (candidate.score === best.score) {
        tied = true;
      }
    }
    if (policy === "strict" && tied) {
      return undefined;
    }
    return best;
  }

  private instantiate(
    declaration: OperationDeclaration,
    candidate: Candidate,
    inputTypes: readonly TypeDescriptor[],
  ): OperationInstance {
    const id = `${declaration.name}#${candidate.index}${signatureOf(inputTypes, candidate.output)}`;
    const existing = this.instances.get(id);
    if (existing) {
      return existing;
    }
    const instance: OperationInstance = Object.freeze({
      id,
      operation: declaration.name,
      overloadIndex: candidate.index,
      inputTypes: Object.freeze([...inputTypes]),
      outputType: candidate.output,
      bindings: candidate.bindings,
      ...(declaration.intrinsic ? { intrinsic: declaration.intrinsic } : {}),
      ...(candidate.overload.cpu ? { cpu: candidate.overload.cpu } : {}),
      ...(candidate.overload.gpu ? { gpu: candidate.overload.gpu } : {}),
    });
    this.instances.set(id, instance);
    return instance;
  }
}
