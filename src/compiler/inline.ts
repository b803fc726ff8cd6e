import { CycleDetectedError, DanglingReferenceError, UnboundedRecursionError } from "../graph/errors.js";
import type { DocumentNode, GraphDocument, NetworkDefinition, NodeInput } from "../graph/types.js";
import { defaultValueFor } from "../values/literal.js";
import { Value } from "../values/value.js";

/** Source of a flattened input: another flat node or an embedded literal. */
export type FlatInput = { kind: "node"; identity: string } | { kind: "value"; value: Value };

/** Primitive call left after every network node has been expanded. */
export interface FlatNode {
  /** Identity path, `outer/inner` for nodes coming from nested networks. */
  readonly identity: string;
  readonly origin: { readonly network: string; readonly nodeId: string };
  readonly operation: string;
  readonly inputs: readonly FlatInput[];
}

export interface FlatGraph {
  readonly nodes: ReadonlyMap<string, FlatNode>;
  /** Identity path of every network node to the source of its output. */
  readonly aliases: ReadonlyMap<string, FlatInput>;
  /** Resolved root output, if the root network designates one. */
  readonly output: FlatInput | undefined;
}

export interface InlineOptions {
  /** Maximum nesting depth before inlining gives up. */
  maxDepth: number;
}

interface Frame {
  readonly network: NetworkDefinition;
  readonly prefix: string;
  readonly bindings: readonly FlatInput[];
  readonly chain: readonly string[];
}

/**
 * Recursively replaces network nodes with their constituent nodes. Parameter
 * nodes disappear: their consumers read the call-site input directly (or the
 * exposed default when the call site leaves the port unbound).
 */
export function inlineDocument(document: GraphDocument, options: InlineOptions): FlatGraph {
  const nodes = new Map<string, FlatNode>();
  const aliases = new Map<string, FlatInput>();

  const expand = (frame: Frame): ((nodeId: string) => FlatInput) => {
    const { network, prefix } = frame;
    const resolved = new Map<string, FlatInput>();
    const resolving = new Set<string>();

    const resolveInput = (input: NodeInput): FlatInput => (input.kind === "value" ? input : resolveOutput(input.nodeId));

    const resolveOutput = (nodeId: string): FlatInput => {
      const cached = resolved.get(nodeId);
      if (cached) {
        return cached;
      }
      const node = network.nodes.get(nodeId);
      if (!node) {
        throw new DanglingReferenceError(`network '${network.id}' references unknown node '${nodeId}'`);
      }
      if (resolving.has(nodeId)) {
        throw new CycleDetectedError([...resolving, nodeId].map((id) => `${prefix}${id}`));
      }
      resolving.add(nodeId);
      const output = resolveNode(node);
      resolving.delete(nodeId);
      resolved.set(nodeId, output);
      return output;
    };

    const resolveNode = (node: DocumentNode): FlatInput => {
      const implementation = node.implementation;
      switch (implementation.kind) {
        case "primitive":
          return { kind: "node", identity: `${prefix}${node.id}` };
        case "parameter": {
          const bound = frame.bindings[implementation.index];
          if (bound) {
            return bound;
          }
          const exposed = network.inputs[implementation.index];
          if (!exposed) {
            throw new DanglingReferenceError(`network '${network.id}' exposes no input ${implementation.index}`);
          }
          return { kind: "value", value: exposed.default ?? defaultValueFor(exposed.type) ?? Value.none() };
        }
        case "network": {
          const chain = [...frame.chain, implementation.ref];
          if (frame.chain.includes(implementation.ref)) {
            throw new UnboundedRecursionError(chain, "self-reference");
          }
          if (chain.length - 1 > options.maxDepth) {
            throw new UnboundedRecursionError(chain, `depth bound ${options.maxDepth} exceeded`);
          }
          const inner = document.library.get(implementation.ref);
          if (!inner) {
            throw new DanglingReferenceError(`node '${prefix}${node.id}' references unknown network '${implementation.ref}'`);
          }
          if (inner.output === undefined) {
            throw new DanglingReferenceError(`network '${inner.id}' has no output node`);
          }
          const bindings = node.inputs.map(resolveInput);
          const child = expand({ network: inner, prefix: `${prefix}${node.id}/`, bindings, chain });
          const output = child(inner.output);
          aliases.set(`${prefix}${node.id}`, output);
          return output;
        }
      }
    };

    const ordered = Array.from(network.nodes.values()).sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    for (const node of ordered) {
      if (node.implementation.kind === "primitive") {
        const identity = `${prefix}${node.id}`;
        nodes.set(identity, {
          identity,
          origin: { network: network.id, nodeId: node.id },
          operation: node.implementation.operation,
          inputs: node.inputs.map(resolveInput),
        });
      } else {
        resolveOutput(node.id);
      }
    }
    return resolveOutput;
  };

  const resolveRoot = expand({ network: document.root, prefix: "", bindings: [], chain: [document.root.id] });
  const output = document.root.output === undefined ? undefined : resolveRoot(document.root.output);
  return { nodes, aliases, output };
}
