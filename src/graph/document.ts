import type { OperationCatalog } from "../catalog/registry.js";
import { defaultValueFor } from "../values/literal.js";
import { generic, type TypeDescriptor } from "../values/types.js";
import { Value } from "../values/value.js";
import { DanglingReferenceError, GraphEditError } from "./errors.js";
import {
  ROOT_NETWORK,
  literal,
  nodeRef,
  parameter,
  networkRef,
  type DocumentNode,
  type ExposedInput,
  type GraphDocument,
  type GraphEdge,
  type NetworkDefinition,
  type NodeImplementation,
  type NodeInput,
} from "./types.js";
import { assertValidDocument, validateDocument, type GraphValidationResult } from "./validate.js";

/** Node description accepted by {@link NodeGraph.addNode}. */
export interface NodeInit {
  id: string;
  implementation: NodeImplementation;
  /** Missing trailing ports are filled with the port defaults. */
  inputs?: NodeInput[];
}

/** Network description accepted by {@link NodeGraph.defineNetwork}. */
export interface NetworkInit {
  id: string;
  inputs?: ExposedInput[];
  output?: string;
  nodes?: NodeInit[];
}

export interface ExtractOptions {
  /** Library identifier of the new network. */
  networkId: string;
  /** Identifier of the node replacing the extracted selection. */
  nodeId: string;
}

interface MutableNetwork {
  readonly id: string;
  inputs: ExposedInput[];
  output: string | undefined;
  readonly nodes: Map<string, DocumentNode>;
}

function freezeNode(id: string, implementation: NodeImplementation, inputs: readonly NodeInput[]): DocumentNode {
  return Object.freeze({ id, implementation, inputs: Object.freeze([...inputs]) });
}

function freezeNetwork(network: MutableNetwork): NetworkDefinition {
  return Object.freeze({
    id: network.id,
    inputs: Object.freeze([...network.inputs]),
    ...(network.output !== undefined ? { output: network.output } : {}),
    nodes: new Map(network.nodes),
  });
}

/**
 * Editable node graph. The document is a root network plus a library of
 * named networks referenced by network nodes. Every successful edit bumps the
 * revision; {@link snapshot} hands an immutable view to the compiler.
 */
export class NodeGraph {
  private readonly networks = new Map<string, MutableNetwork>();
  private revisionCounter = 0;

  constructor(
    private readonly catalog: OperationCatalog,
    options: { inputs?: ExposedInput[] } = {},
  ) {
    this.networks.set(ROOT_NETWORK, { id: ROOT_NETWORK, inputs: [...(options.inputs ?? [])], output: undefined, nodes: new Map() });
  }

  get revision(): number {
    return this.revisionCounter;
  }

  snapshot(): GraphDocument {
    const library = new Map<string, NetworkDefinition>();
    let root: NetworkDefinition | undefined;
    for (const network of this.networks.values()) {
      const frozen = freezeNetwork(network);
      if (network.id === ROOT_NETWORK) {
        root = frozen;
      } else {
        library.set(network.id, frozen);
      }
    }
    return Object.freeze({
      revision: this.revisionCounter,
      root: root ?? freezeNetwork({ id: ROOT_NETWORK, inputs: [], output: undefined, nodes: new Map() }),
      library,
    });
  }

  network(id: string = ROOT_NETWORK): NetworkDefinition | undefined {
    const network = this.networks.get(id);
    return network ? freezeNetwork(network) : undefined;
  }

  node(id: string, networkId: string = ROOT_NETWORK): DocumentNode | undefined {
    return this.networks.get(networkId)?.nodes.get(id);
  }

  addNode(init: NodeInit, networkId: string = ROOT_NETWORK): DocumentNode {
    const network = this.requireNetwork(networkId);
    if (init.id.trim().length === 0) {
      throw new GraphEditError("node identifiers must not be empty", networkId);
    }
    if (network.nodes.has(init.id)) {
      throw new GraphEditError(`node '${init.id}' already exists`, networkId, init.id);
    }
    if (init.implementation.kind === "parameter") {
      const index = init.implementation.index;
      if (!Number.isInteger(index) || index < 0 || index >= network.inputs.length) {
        throw new GraphEditError(`network '${networkId}' exposes no input ${index}`, networkId, init.id);
      }
    }
    if (init.implementation.kind === "network" && init.implementation.ref === networkId) {
      throw new GraphEditError(`network '${networkId}' cannot embed itself`, networkId, init.id);
    }
    const inputs = [...(init.inputs ?? [])];
    const ports = this.portCountOf(init.implementation);
    if (ports !== undefined) {
      if (inputs.length > ports) {
        throw new GraphEditError(`node '${init.id}' declares ${ports} input(s) but received ${inputs.length}`, networkId, init.id);
      }
      for (let port = inputs.length; port < ports; port += 1) {
        inputs.push(literal(this.portDefault(init.implementation, port)));
      }
    }
    const node = freezeNode(init.id, init.implementation, inputs);
    network.nodes.set(node.id, node);
    this.bump();
    return node;
  }

  /** Removes a node. Ports that consumed it fall back to their default literal. */
  removeNode(id: string, networkId: string = ROOT_NETWORK): void {
    const network = this.requireNetwork(networkId);
    if (!network.nodes.delete(id)) {
      throw new DanglingReferenceError(`node '${id}' does not exist in network '${networkId}'`);
    }
    for (const consumer of Array.from(network.nodes.values())) {
      if (!consumer.inputs.some((input) => input.kind === "node" && input.nodeId === id)) {
        continue;
      }
      const inputs = consumer.inputs.map((input, port) =>
        input.kind === "node" && input.nodeId === id ? literal(this.portDefault(consumer.implementation, port)) : input,
      );
      network.nodes.set(consumer.id, freezeNode(consumer.id, consumer.implementation, inputs));
    }
    if (network.output === id) {
      network.output = undefined;
    }
    this.bump();
  }

  /** Wires the output of `sourceId` into input `port` of `targetId`. */
  connect(sourceId: string, targetId: string, port: number, networkId: string = ROOT_NETWORK): void {
    const network = this.requireNetwork(networkId);
    if (!network.nodes.has(sourceId)) {
      throw new DanglingReferenceError(`source node '${sourceId}' does not exist in network '${networkId}'`);
    }
    this.replaceInput(network, targetId, port, nodeRef(sourceId));
  }

  /** Unwires an input port, restoring its default literal. */
  disconnect(targetId: string, port: number, networkId: string = ROOT_NETWORK): void {
    const network = this.requireNetwork(networkId);
    const target = this.requireNode(network, targetId);
    this.replaceInput(network, targetId, port, literal(this.portDefault(target.implementation, port)));
  }

  setLiteral(targetId: string, port: number, value: Value, networkId: string = ROOT_NETWORK): void {
    const network = this.requireNetwork(networkId);
    this.replaceInput(network, targetId, port, literal(value));
  }

  /** Designates the node whose output is the network's output. */
  setOutput(nodeId: string, networkId: string = ROOT_NETWORK): void {
    const network = this.requireNetwork(networkId);
    this.requireNode(network, nodeId);
    network.output = nodeId;
    this.bump();
  }

  /** Adds or replaces a library network. */
  defineNetwork(init: NetworkInit): NetworkDefinition {
    if (init.id === ROOT_NETWORK) {
      throw new GraphEditError("the root network cannot be redefined", init.id);
    }
    if (init.id.trim().length === 0) {
      throw new GraphEditError("network identifiers must not be empty", init.id);
    }
    const previous = this.networks.get(init.id);
    const network: MutableNetwork = { id: init.id, inputs: [...(init.inputs ?? [])], output: undefined, nodes: new Map() };
    this.networks.set(init.id, network);
    try {
      for (const node of init.nodes ?? []) {
        this.addNode(node, init.id);
      }
      if (init.output !== undefined) {
        this.setOutput(init.output, init.id);
      }
    } catch (error) {
      if (previous) {
        this.networks.set(init.id, previous);
      } else {
        this.networks.delete(init.id);
      }
      throw error;
    }
    this.bump();
    return freezeNetwork(network);
  }

  /**
   * Replaces a network node by a copy of the network it references. Copied
   * nodes are named `<nodeId>/<innerId>`, the same identity paths the compiler
   * assigns when it inlines the node, so cached results stay valid.
   */
  inlineNetworkNode(nodeId: string, networkId: string = ROOT_NETWORK): void {
    const network = this.requireNetwork(networkId);
    const node = this.requireNode(network, nodeId);
    if (node.implementation.kind !== "network") {
      throw new GraphEditError(`node '${nodeId}' is not a network node`, networkId, nodeId);
    }
    const definition = this.networks.get(node.implementation.ref);
    if (!definition) {
      throw new DanglingReferenceError(`node '${nodeId}' references unknown network '${node.implementation.ref}'`);
    }
    if (definition.output === undefined) {
      throw new GraphEditError(`network '${definition.id}' has no output`, networkId, nodeId);
    }

    const prefix = `${nodeId}/`;
    const bindings: NodeInput[] = definition.inputs.map(
      (exposed, index) => node.inputs[index] ?? literal(exposed.default ?? defaultValueFor(exposed.type) ?? Value.none()),
    );
    const mapInput = (input: NodeInput): NodeInput => {
      if (input.kind === "value") {
        return input;
      }
      const inner = definition.nodes.get(input.nodeId);
      if (inner?.implementation.kind === "parameter") {
        return bindings[inner.implementation.index] ?? literal(Value.none());
      }
      return nodeRef(`${prefix}${input.nodeId}`);
    };

    const replacement = mapInput(nodeRef(definition.output));
    if (network.output === nodeId && replacement.kind !== "node") {
      throw new GraphEditError(`inlining '${nodeId}' would leave the network output without a node`, networkId, nodeId);
    }
    const copies: DocumentNode[] = [];
    for (const inner of definition.nodes.values()) {
      if (inner.implementation.kind === "parameter") {
        continue;
      }
      const id = `${prefix}${inner.id}`;
      if (network.nodes.has(id)) {
        throw new GraphEditError(`inlining '${nodeId}' would overwrite node '${id}'`, networkId, id);
      }
      copies.push(freezeNode(id, inner.implementation, inner.inputs.map(mapInput)));
    }

    network.nodes.delete(nodeId);
    for (const copy of copies) {
      network.nodes.set(copy.id, copy);
    }
    this.rewireConsumers(network, nodeId, replacement);
    if (network.output === nodeId && replacement.kind === "node") {
      network.output = replacement.nodeId;
    }
    this.bump();
  }

  /**
   * Moves a selection of nodes into a new library network and replaces it by
   * a single network node. Inputs coming from outside the selection become
   * exposed inputs; the selection must have exactly one node consumed from
   * outside it. Identifiers prefixed with `<nodeId>/` lose the prefix, which
   * makes extraction the inverse of {@link inlineNetworkNode}.
   */
  extractSubnetwork(nodeIds: readonly string[], options: ExtractOptions, networkId: string = ROOT_NETWORK): NetworkDefinition {
    const network = this.requireNetwork(networkId);
    const selection = new Set(nodeIds);
    if (selection.size === 0) {
      throw new GraphEditError("cannot extract an empty selection", networkId);
    }
    if (this.networks.has(options.networkId) || options.networkId === ROOT_NETWORK) {
      throw new GraphEditError(`network '${options.networkId}' already exists`, networkId);
    }
    if (network.nodes.has(options.nodeId) && !selection.has(options.nodeId)) {
      throw new GraphEditError(`node '${options.nodeId}' already exists`, networkId, options.nodeId);
    }
    const selected = nodeIds.map((id) => this.requireNode(network, id));
    for (const node of selected) {
      if (node.implementation.kind === "parameter") {
        throw new GraphEditError(`parameter node '${node.id}' cannot be extracted`, networkId, node.id);
      }
    }

    const consumedInside = new Set<string>();
    for (const node of selected) {
      for (const input of node.inputs) {
        if (input.kind === "node" && selection.has(input.nodeId)) {
          consumedInside.add(input.nodeId);
        }
      }
    }
    const sinks = selected.filter((node) => !consumedInside.has(node.id));
    const sink = sinks[0];
    if (!sink || sinks.length !== 1) {
      throw new GraphEditError(`selection must have exactly one output node, found ${sinks.length}`, networkId);
    }
    for (const outside of network.nodes.values()) {
      if (selection.has(outside.id)) {
        continue;
      }
      for (const input of outside.inputs) {
        if (input.kind === "node" && selection.has(input.nodeId) && input.nodeId !== sink.id) {
          throw new GraphEditError(`node '${input.nodeId}' is consumed outside the selection`, networkId, input.nodeId);
        }
      }
    }
    if (network.output !== undefined && selection.has(network.output) && network.output !== sink.id) {
      throw new GraphEditError(`network output '${network.output}' is not the selection output`, networkId);
    }

    const prefix = `${options.nodeId}/`;
    const innerId = (id: string): string => (id.startsWith(prefix) ? id.slice(prefix.length) : id);
    const external: string[] = [];
    for (const node of selected) {
      for (const input of node.inputs) {
        if (input.kind === "node" && !selection.has(input.nodeId) && !external.includes(input.nodeId)) {
          external.push(input.nodeId);
        }
      }
    }
    const parameterId = (index: number): string => `input:${index}`;
    const innerIds = new Set<string>(external.map((_, index) => parameterId(index)));
    for (const node of selected) {
      const id = innerId(node.id);
      if (innerIds.has(id)) {
        throw new GraphEditError(`extracted node identifier '${id}' would collide`, networkId, node.id);
      }
      innerIds.add(id);
    }

    const definition: MutableNetwork = {
      id: options.networkId,
      inputs: external.map((source) => ({ name: source, type: this.outputTypeOf(network, source) })),
      output: innerId(sink.id),
      nodes: new Map(),
    };
    external.forEach((_, index) => {
      definition.nodes.set(parameterId(index), freezeNode(parameterId(index), parameter(index), []));
    });
    for (const node of selected) {
      const inputs = node.inputs.map((input): NodeInput => {
        if (input.kind === "value") {
          return input;
        }
        return selection.has(input.nodeId) ? nodeRef(innerId(input.nodeId)) : nodeRef(parameterId(external.indexOf(input.nodeId)));
      });
      const id = innerId(node.id);
      definition.nodes.set(id, freezeNode(id, node.implementation, inputs));
    }

    for (const id of selection) {
      network.nodes.delete(id);
    }
    network.nodes.set(
      options.nodeId,
      freezeNode(options.nodeId, networkRef(options.networkId), external.map((source) => nodeRef(source))),
    );
    this.rewireConsumers(network, sink.id, nodeRef(options.nodeId));
    if (network.output === sink.id) {
      network.output = options.nodeId;
    }
    this.networks.set(definition.id, definition);
    this.bump();
    return freezeNetwork(definition);
  }

  /** Edges derived from the wired inputs of one network, sorted by target. */
  listEdges(networkId: string = ROOT_NETWORK): GraphEdge[] {
    const network = this.requireNetwork(networkId);
    const edges: GraphEdge[] = [];
    const nodes = Array.from(network.nodes.values()).sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    for (const node of nodes) {
      node.inputs.forEach((input, port) => {
        if (input.kind === "node") {
          edges.push({ network: networkId, from: input.nodeId, to: node.id, port });
        }
      });
    }
    return edges;
  }

  validate(): GraphValidationResult {
    return validateDocument(this.snapshot(), this.catalog);
  }

  assertValid(): void {
    assertValidDocument(this.snapshot(), this.catalog);
  }

  private bump(): void {
    this.revisionCounter += 1;
  }

  private requireNetwork(id: string): MutableNetwork {
    const network = this.networks.get(id);
    if (!network) {
      throw new DanglingReferenceError(`network '${id}' does not exist`);
    }
    return network;
  }

  private requireNode(network: MutableNetwork, id: string): DocumentNode {
    const node = network.nodes.get(id);
    if (!node) {
      throw new DanglingReferenceError(`node '${id}' does not exist in network '${network.id}'`);
    }
    return node;
  }

  private replaceInput(network: MutableNetwork, targetId: string, port: number, input: NodeInput): void {
    const target = this.requireNode(network, targetId);
    const ports = this.portCountOf(target.implementation) ?? target.inputs.length;
    if (!Number.isInteger(port) || port < 0 || port >= ports) {
      throw new DanglingReferenceError(`node '${targetId}' has no input port ${port}`);
    }
    const inputs = [...target.inputs];
    while (inputs.length < port) {
      inputs.push(literal(this.portDefault(target.implementation, inputs.length)));
    }
    inputs[port] = input;
    network.nodes.set(targetId, freezeNode(targetId, target.implementation, inputs));
    this.bump();
  }

  private rewireConsumers(network: MutableNetwork, previousId: string, replacement: NodeInput): void {
    for (const consumer of Array.from(network.nodes.values())) {
      if (!consumer.inputs.some((input) => input.kind === "node" && input.nodeId === previousId)) {
        continue;
      }
      const inputs = consumer.inputs.map((input) =>
        input.kind === "node" && input.nodeId === previousId ? replacement : input,
      );
      network.nodes.set(consumer.id, freezeNode(consumer.id, consumer.implementation, inputs));
    }
  }

  private portCountOf(implementation: NodeImplementation): number | undefined {
    switch (implementation.kind) {
      case "primitive":
        return this.catalog.arity(implementation.operation);
      case "network":
        return this.networks.get(implementation.ref)?.inputs.length;
      case "parameter":
        return 0;
    }
  }

  private portDefault(implementation: NodeImplementation, port: number): Value {
    if (implementation.kind === "network") {
      const exposed = this.networks.get(implementation.ref)?.inputs[port];
      if (!exposed) {
        return Value.none();
      }
      return exposed.default ?? defaultValueFor(exposed.type) ?? Value.none();
    }
    if (implementation.kind === "primitive") {
      for (const pattern of this.catalog.inputPatterns(implementation.operation, port)) {
        const fallback = defaultValueFor(pattern);
        if (fallback) {
          return fallback;
        }
      }
    }
    return Value.none();
  }

  private outputTypeOf(network: MutableNetwork, nodeId: string): TypeDescriptor {
    const implementation = network.nodes.get(nodeId)?.implementation;
    if (implementation?.kind === "primitive") {
      return this.catalog.outputPatterns(implementation.operation)[0] ?? generic("T");
    }
    if (implementation?.kind === "parameter") {
      return network.inputs[implementation.index]?.type ?? generic("T");
    }
    return generic("T");
  }
}
