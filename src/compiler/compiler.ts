import { selectGpuRuns } from "../backend/selector.js";
import type { OperationCatalog, OverloadPolicy } from "../catalog/registry.js";
import type { GraphDocument } from "../graph/types.js";
import { assertValidDocument } from "../graph/validate.js";
import { ERROR_CODES, fail, type ErrorCode } from "../types.js";
import type { TypeDescriptor } from "../values/types.js";
import type { Value } from "../values/value.js";
import { inlineDocument } from "./inline.js";
import { topologicalOrder } from "./order.js";
import type {
  CompileDiagnostic,
  FailedProtoNode,
  ProtoGraph,
  ProtoInput,
  ProtoNode,
  ResolvedProtoNode,
} from "./protoGraph.js";

export interface CompileOptions {
  maxInlineDepth: number;
  overloadPolicy: OverloadPolicy;
  /** Whether GPU runs are selected at all. */
  gpu: boolean;
}

export const DEFAULT_COMPILE_OPTIONS: CompileOptions = Object.freeze({
  maxInlineDepth: 64,
  overloadPolicy: "most-specific",
  gpu: true,
});

const RESOLUTION_HINTS: Partial<Record<ErrorCode, string>> = {
  [ERROR_CODES.COMPILE_TYPE_RESOLUTION]: "feed the node inputs matching one of its signatures",
  [ERROR_CODES.COMPILE_AMBIGUOUS_OVERLOAD]: "make one overload more specific or relax the overload policy",
  [ERROR_CODES.COMPILE_UNKNOWN_OPERATION]: "register the operation in the catalog",
};

function diagnosticFor(
  code: ErrorCode,
  identity: string,
  message: string,
  hint: string,
  extra: Pick<CompileDiagnostic, "upstream" | "candidates">,
): CompileDiagnostic {
  const payload = fail(code, message, hint);
  return { code, identity, message: payload.message, hint: payload.hint ?? hint, ...extra };
}

/**
 * Compiles a document into a proto graph: structural validation, inlining,
 * ordering and type resolution. Structural errors are thrown; resolution
 * failures, mismatched port types included, are attached to the failing node
 * and to everything downstream of it, leaving unaffected nodes evaluable. Compilation is deterministic: the same
 * document always yields a structurally equal proto graph.
 */
export function compileDocument(
  document: GraphDocument,
  catalog: OperationCatalog,
  options: Partial<CompileOptions> = {},
): ProtoGraph {
  const settings: CompileOptions = { ...DEFAULT_COMPILE_OPTIONS, ...options };
  assertValidDocument(document, catalog, { types: false });
  const flat = inlineDocument(document, { maxDepth: settings.maxInlineDepth });
  const order = topologicalOrder(flat);

  const indexByIdentity = new Map<string, number>();
  order.forEach((identity, index) => indexByIdentity.set(identity, index));

  const nodes: ProtoNode[] = [];
  const diagnostics: CompileDiagnostic[] = [];
  for (const identity of order) {
    const flatNode = flat.nodes.get(identity);
    if (!flatNode) {
      continue;
    }
    const index = nodes.length;
    const inputs: ProtoInput[] = [];
    const inputTypes: TypeDescriptor[] = [];
    let failedUpstream: FailedProtoNode | undefined;
    for (const input of flatNode.inputs) {
      if (input.kind === "value") {
        inputs.push(input);
        inputTypes.push(input.value.type);
        continue;
      }
      const upstreamIndex = indexByIdentity.get(input.identity);
      const upstream = upstreamIndex === undefined ? undefined : nodes[upstreamIndex];
      if (upstreamIndex === undefined || !upstream) {
        continue;
      }
      inputs.push({ kind: "node", index: upstreamIndex });
      if (upstream.status === "failed") {
        failedUpstream ??= upstream;
      } else {
        inputTypes.push(upstream.outputType);
      }
    }

    const base = { index, identity, origin: flatNode.origin, operation: flatNode.operation, inputs: Object.freeze(inputs) };
    if (failedUpstream) {
      const root = failedUpstream.diagnostic.upstream ?? failedUpstream.identity;
      const diagnostic = diagnosticFor(
        ERROR_CODES.COMPILE_UPSTREAM,
        identity,
        `upstream node '${root}' failed to resolve`,
        "fix the upstream node first",
        { upstream: root },
      );
      diagnostics.push(diagnostic);
      const failed: FailedProtoNode = { ...base, status: "failed", diagnostic };
      nodes.push(Object.freeze(failed));
      continue;
    }

    const resolution = catalog.resolve(flatNode.operation, inputTypes, settings.overloadPolicy);
    if (!resolution.ok) {
      const diagnostic = diagnosticFor(
        resolution.code,
        identity,
        resolution.message,
        RESOLUTION_HINTS[resolution.code] ?? "inspect the node inputs",
        { candidates: resolution.candidates },
      );
      diagnostics.push(diagnostic);
      const failed: FailedProtoNode = { ...base, status: "failed", diagnostic };
      nodes.push(Object.freeze(failed));
      continue;
    }
    const resolved: ResolvedProtoNode = {
      ...base,
      status: "resolved",
      instance: resolution.instance,
      outputType: resolution.instance.outputType,
    };
    nodes.push(Object.freeze(resolved));
  }

  const literals = new Map<string, Value>();
  for (const [identity, source] of flat.aliases) {
    if (source.kind === "value") {
      literals.set(identity, source.value);
      continue;
    }
    const index = indexByIdentity.get(source.identity);
    if (index !== undefined) {
      indexByIdentity.set(identity, index);
    }
  }

  const output = flat.output?.kind === "node" ? indexByIdentity.get(flat.output.identity) : undefined;
  return Object.freeze({
    revision: document.revision,
    nodes: Object.freeze(nodes),
    identities: indexByIdentity,
    literals,
    output,
    runs: settings.gpu ? selectGpuRuns(nodes, output) : [],
    diagnostics: Object.freeze(diagnostics),
  });
}
