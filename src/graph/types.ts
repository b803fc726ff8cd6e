import type { TypeDescriptor } from "../values/types.js";
import type { Value } from "../values/value.js";

/** Identifier of the network every document starts from. */
export const ROOT_NETWORK = "root";

/** Calls a catalog operation by name. */
export interface PrimitiveImplementation {
  readonly kind: "primitive";
  readonly operation: string;
}

/** Embeds a library network; the node's inputs bind the network's exposed inputs. */
export interface NetworkImplementation {
  readonly kind: "network";
  readonly ref: string;
}

/** Forwards the exposed input at `index` of the enclosing network. */
export interface ParameterImplementation {
  readonly kind: "parameter";
  readonly index: number;
}

export type NodeImplementation = PrimitiveImplementation | NetworkImplementation | ParameterImplementation;

/** Input port wired to the output of another node of the same network. */
export interface NodeReferenceInput {
  readonly kind: "node";
  readonly nodeId: string;
}

/** Input port holding a literal value. */
export interface LiteralInput {
  readonly kind: "value";
  readonly value: Value;
}

export type NodeInput = NodeReferenceInput | LiteralInput;

export interface DocumentNode {
  readonly id: string;
  readonly implementation: NodeImplementation;
  readonly inputs: readonly NodeInput[];
}

/** Input exposed by a network to the nodes embedding it. */
export interface ExposedInput {
  readonly name: string;
  readonly type: TypeDescriptor;
  readonly default?: Value;
}

export interface NetworkDefinition {
  readonly id: string;
  readonly inputs: readonly ExposedInput[];
  /** Node whose output is the network's output. */
  readonly output?: string;
  readonly nodes: ReadonlyMap<string, DocumentNode>;
}

/** Immutable view of a graph handed to the compiler. */
export interface GraphDocument {
  readonly revision: number;
  readonly root: NetworkDefinition;
  readonly library: ReadonlyMap<string, NetworkDefinition>;
}

/** Edge derived from a wired input port. */
export interface GraphEdge {
  readonly network: string;
  readonly from: string;
  readonly to: string;
  readonly port: number;
}

export function primitive(operation: string): PrimitiveImplementation {
  return { kind: "primitive", operation };
}

export function networkRef(ref: string): NetworkImplementation {
  return { kind: "network", ref };
}

export function parameter(index: number): ParameterImplementation {
  return { kind: "parameter", index };
}

export function nodeRef(nodeId: string): NodeReferenceInput {
  return { kind: "node", nodeId };
}

export function literal(value: Value): LiteralInput {
  return { kind: "value", value };
}
