import type { OperationCatalog } from "../catalog/registry.js";
import { ERROR_CODES } from "../types.js";
import { formatType, typesCompatible, type TypeDescriptor } from "../values/types.js";
import { structureErrorFor, type GraphViolation } from "./errors.js";
import type { DocumentNode, GraphDocument, NetworkDefinition } from "./types.js";

/** Result returned by {@link validateDocument}. */
export type GraphValidationResult = { ok: true } | { ok: false; violations: GraphViolation[] };

function byId(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function sortedNodes(network: NetworkDefinition): DocumentNode[] {
  return Array.from(network.nodes.values()).sort((a, b) => byId(a.id, b.id));
}

function nodePath(network: NetworkDefinition, nodeId: string): string {
  return `/networks/${network.id}/nodes/${nodeId}`;
}

/**
 * Detects data-flow cycles inside one network with a depth-first walk over
 * consumer edges. Nodes and consumers are visited in identifier order so the
 * reported cycles are stable.
 */
export function detectNetworkCycles(network: NetworkDefinition, limit = 20): string[][] {
  const consumers = new Map<string, string[]>();
  for (const node of sortedNodes(network)) {
    for (const input of node.inputs) {
      if (input.kind === "node" && network.nodes.has(input.nodeId)) {
        const list = consumers.get(input.nodeId) ?? [];
        if (!list.includes(node.id)) {
          list.push(node.id);
        }
        consumers.set(input.nodeId, list);
      }
    }
  }

  const visiting = new Set<string>();
  const visited = new Set<string>();
  const stack: string[] = [];
  const cycles: string[][] = [];

  const visit = (nodeId: string): void => {
    visiting.add(nodeId);
    stack.push(nodeId);
    for (const next of consumers.get(nodeId) ?? []) {
      if (cycles.length >= limit) {
        break;
      }
      if (visiting.has(next)) {
        const start = stack.indexOf(next);
        cycles.push(stack.slice(start).concat(next));
        continue;
      }
      if (!visited.has(next)) {
        visit(next);
      }
    }
    visiting.delete(nodeId);
    visited.add(nodeId);
    stack.pop();
  };

  for (const node of sortedNodes(network)) {
    if (cycles.length >= limit) {
      break;
    }
    if (!visited.has(node.id)) {
      visit(node.id);
    }
  }
  return cycles;
}

/**
 * Computes the types a node may produce according to its declaration.
 * Generic patterns are kept; the compatibility check treats them as
 * wildcards.
 */
function declaredOutputs(
  document: GraphDocument,
  catalog: OperationCatalog,
  network: NetworkDefinition,
  node: DocumentNode,
  ancestry: ReadonlySet<string>,
): TypeDescriptor[] {
  const implementation = node.implementation;
  switch (implementation.kind) {
    case "primitive":
      return catalog.outputPatterns(implementation.operation);
    case "parameter": {
      const exposed = network.inputs[implementation.index];
      return exposed ? [exposed.type] : [];
    }
    case "network": {
      const inner = document.library.get(implementation.ref);
      if (!inner || ancestry.has(inner.id) || inner.output === undefined) {
        return [];
      }
      const outputNode = inner.nodes.get(inner.output);
      if (!outputNode) {
        return [];
      }
      return declaredOutputs(document, catalog, inner, outputNode, new Set([...ancestry, inner.id]));
    }
  }
}

function declaredInputs(
  document: GraphDocument,
  catalog: OperationCatalog,
  node: DocumentNode,
  port: number,
): TypeDescriptor[] {
  const implementation = node.implementation;
  switch (implementation.kind) {
    case "primitive":
      return catalog.inputPatterns(implementation.operation, port);
    case "network": {
      const exposed = document.library.get(implementation.ref)?.inputs[port];
      return exposed ? [exposed.type] : [];
    }
    case "parameter":
      return [];
  }
}

/** Number of ports a node accepts, or undefined when it cannot be known. */
export function portCount(document: GraphDocument, catalog: OperationCatalog, node: DocumentNode): number | undefined {
  const implementation = node.implementation;
  switch (implementation.kind) {
    case "primitive":
      return catalog.arity(implementation.operation);
    case "network":
      return document.library.get(implementation.ref)?.inputs.length;
    case "parameter":
      return 0;
  }
}

function anyCompatible(sources: TypeDescriptor[], targets: TypeDescriptor[]): boolean {
  if (sources.length === 0 || targets.length === 0) {
    return true;
  }
  return sources.some((source) => targets.some((target) => typesCompatible(source, target)));
}

function checkReferences(
  document: GraphDocument,
  catalog: OperationCatalog,
  network: NetworkDefinition,
  violations: GraphViolation[],
): void {
  if (network.output !== undefined && !network.nodes.has(network.output)) {
    violations.push({
      code: ERROR_CODES.GRAPH_DANGLING_REFERENCE,
      message: `network '${network.id}' outputs unknown node '${network.output}'`,
      path: `/networks/${network.id}/output`,
    });
  }
  for (const node of sortedNodes(network)) {
    const implementation = node.implementation;
    if (implementation.kind === "network" && !document.library.has(implementation.ref)) {
      violations.push({
        code: ERROR_CODES.GRAPH_DANGLING_REFERENCE,
        message: `node '${node.id}' references unknown network '${implementation.ref}'`,
        path: nodePath(network, node.id),
        details: { ref: implementation.ref },
      });
    }
    if (implementation.kind === "parameter" && !network.inputs[implementation.index]) {
      violations.push({
        code: ERROR_CODES.GRAPH_DANGLING_REFERENCE,
        message: `node '${node.id}' forwards missing exposed input ${implementation.index}`,
        path: nodePath(network, node.id),
      });
    }
    const ports = portCount(document, catalog, node);
    node.inputs.forEach((input, port) => {
      const path = `${nodePath(network, node.id)}/inputs/${port}`;
      if (ports !== undefined && port >= ports) {
        violations.push({
          code: ERROR_CODES.GRAPH_DANGLING_REFERENCE,
          message: `node '${node.id}' has no input port ${port}`,
          path,
        });
        return;
      }
      if (input.kind === "node" && !network.nodes.has(input.nodeId)) {
        violations.push({
          code: ERROR_CODES.GRAPH_DANGLING_REFERENCE,
          message: `input ${port} of '${node.id}' references unknown node '${input.nodeId}'`,
          path,
          details: { source: input.nodeId },
        });
      }
    });
  }
}

function checkTypes(
  document: GraphDocument,
  catalog: OperationCatalog,
  network: NetworkDefinition,
  violations: GraphViolation[],
): void {
  const ancestry = new Set([network.id]);
  for (const node of sortedNodes(network)) {
    node.inputs.forEach((input, port) => {
      const targets = declaredInputs(document, catalog, node, port);
      let sources: TypeDescriptor[];
      if (input.kind === "value") {
        sources = [input.value.type];
      } else {
        const source = network.nodes.get(input.nodeId);
        if (!source) {
          return;
        }
        sources = declaredOutputs(document, catalog, network, source, ancestry);
      }
      if (!anyCompatible(sources, targets)) {
        violations.push({
          code: ERROR_CODES.GRAPH_TYPE_INCOMPATIBLE,
          message: `input ${port} of '${node.id}' expects ${targets.map(formatType).join(" | ")} but receives ${sources
            .map(formatType)
            .join(" | ")}`,
          path: `${nodePath(network, node.id)}/inputs/${port}`,
        });
      }
    });
  }
}

/**
 * Walks the network references reachable from the root. A network reached
 * again while it is still being expanded would inline forever.
 */
function checkRecursion(document: GraphDocument, violations: GraphViolation[]): NetworkDefinition[] {
  const reachable: NetworkDefinition[] = [];
  const seen = new Set<string>();
  const reported = new Set<string>();

  const walk = (network: NetworkDefinition, chain: string[]): void => {
    if (!seen.has(network.id)) {
      seen.add(network.id);
      reachable.push(network);
    }
    for (const node of sortedNodes(network)) {
      if (node.implementation.kind !== "network") {
        continue;
      }
      const ref = node.implementation.ref;
      if (chain.includes(ref)) {
        const cycle = [...chain.slice(chain.indexOf(ref)), ref];
        const key = cycle.join(">");
        if (!reported.has(key)) {
          reported.add(key);
          violations.push({
            code: ERROR_CODES.GRAPH_UNBOUNDED_RECURSION,
            message: `network '${ref}' contains itself through ${cycle.join(" -> ")}`,
            path: nodePath(network, node.id),
            details: { chain: cycle },
          });
        }
        continue;
      }
      const inner = document.library.get(ref);
      if (inner) {
        walk(inner, [...chain, ref]);
      }
    }
  };

  walk(document.root, [document.root.id]);
  return reachable;
}

export interface ValidationOptions {
  /**
   * Whether declared port types are checked. The compiler turns this off and
   * reports type problems per node instead.
   */
  types?: boolean;
}

/**
 * Validates the document. Violations are reported in a fixed order
 * (references, recursion, cycles, types) so the first one is the most
 * fundamental.
 */
export function validateDocument(
  document: GraphDocument,
  catalog: OperationCatalog,
  options: ValidationOptions = {},
): GraphValidationResult {
  const violations: GraphViolation[] = [];
  const recursion: GraphViolation[] = [];
  const reachable = checkRecursion(document, recursion);

  for (const network of reachable) {
    checkReferences(document, catalog, network, violations);
  }
  violations.push(...recursion);
  for (const network of reachable) {
    for (const cycle of detectNetworkCycles(network)) {
      violations.push({
        code: ERROR_CODES.GRAPH_CYCLE,
        message: `network '${network.id}' contains the cycle ${cycle.join(" -> ")}`,
        path: `/networks/${network.id}`,
        details: { cycle, network: network.id },
      });
    }
  }
  if (options.types ?? true) {
    for (const network of reachable) {
      checkTypes(document, catalog, network, violations);
    }
  }

  return violations.length === 0 ? { ok: true } : { ok: false, violations };
}

/** Throws the structural error matching the first violation, if any. */
export function assertValidDocument(
  document: GraphDocument,
  catalog: OperationCatalog,
  options: ValidationOptions = {},
): void {
  const result = validateDocument(document, catalog, options);
  if (!result.ok) {
    throw structureErrorFor(result.violations);
  }
}
