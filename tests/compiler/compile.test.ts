/**
 * Compilation of documents into proto graphs: inlining under identity paths,
 * deterministic ordering, and per-node resolution diagnostics.
 */
import { describe, it } from "mocha";
import { expect } from "chai";

import { OperationCatalog } from "../../src/catalog/registry.js";
import { registerStandardOperations } from "../../src/catalog/std.js";
import { compileDocument } from "../../src/compiler/compiler.js";
import { Executor } from "../../src/executor/executor.js";
import { fingerprintProtoGraph, protoGraphsEqual, type ProtoGraph } from "../../src/compiler/protoGraph.js";
import { NodeGraph } from "../../src/graph/document.js";
import { CycleDetectedError, UnboundedRecursionError } from "../../src/graph/errors.js";
import { literal, networkRef, nodeRef, parameter, primitive, type NodeInput } from "../../src/graph/types.js";
import { ERROR_CODES } from "../../src/types.js";
import { concrete, generic } from "../../src/values/types.js";
import { F64, U32, Value } from "../../src/values/value.js";
import { RecordingLogger } from "../helpers/recordingLogger.js";

const catalog = registerStandardOperations(new OperationCatalog());
const f64 = (value: number): NodeInput => literal(Value.of(F64, value));

function nestedGraph(): NodeGraph {
  const graph = new NodeGraph(catalog);
  graph.defineNetwork({
    id: "scale2",
    inputs: [{ name: "x", type: concrete("f64") }],
    output: "m",
    nodes: [
      { id: "in", implementation: parameter(0) },
      { id: "m", implementation: primitive("multiply"), inputs: [nodeRef("in"), f64(2)] },
    ],
  });
  graph.addNode({ id: "A", implementation: primitive("constant"), inputs: [f64(5)] });
  graph.addNode({ id: "N", implementation: networkRef("scale2"), inputs: [nodeRef("A")] });
  graph.addNode({ id: "C", implementation: primitive("negate"), inputs: [nodeRef("N")] });
  graph.setOutput("C");
  return graph;
}

function identities(proto: ProtoGraph): string[] {
  return proto.nodes.map((node) => node.identity);
}

describe("compiler/compile", () => {
  it("inlines nested networks under outer/inner identities", () => {
    const proto = compileDocument(nestedGraph().snapshot(), catalog);

    expect(identities(proto)).to.deep.equal(["A", "N/m", "C"]);
    expect(proto.output).to.equal(2);
    expect(proto.identities.get("N/m")).to.equal(1);
    expect(proto.diagnostics).to.deep.equal([]);

    const scaled = proto.nodes[1];
    expect(scaled?.origin).to.deep.equal({ network: "scale2", nodeId: "m" });
    expect(scaled?.inputs[0]).to.deep.equal({ kind: "node", index: 0 });
    if (scaled?.status === "resolved") {
      expect(scaled.instance.id).to.equal("multiply#0(f64, f64) -> f64");
    } else {
      expect.fail("N/m should resolve");
    }
  });

  it("keeps every input pointing at an earlier node", () => {
    const proto = compileDocument(nestedGraph().snapshot(), catalog);
    for (const node of proto.nodes) {
      for (const input of node.inputs) {
        if (input.kind === "node") {
          expect(input.index).to.be.lessThan(node.index);
        }
      }
    }
  });

  it("gives up past the inlining depth bound", () => {
    const document = nestedGraph().snapshot();
    expect(() => compileDocument(document, catalog, { maxInlineDepth: 0 })).to.throw(
      UnboundedRecursionError,
      "unbounded network recursion (depth bound 0 exceeded): root -> scale2",
    );
    expect(() => compileDocument(document, catalog, { maxInlineDepth: 1 })).to.not.throw();
  });

  it("refuses to compile a cyclic document", () => {
    const graph = new NodeGraph(catalog);
    graph.addNode({ id: "A", implementation: primitive("double"), inputs: [f64(1)] });
    graph.addNode({ id: "B", implementation: primitive("double"), inputs: [nodeRef("A")] });
    graph.connect("B", "A", 0);
    expect(() => compileDocument(graph.snapshot(), catalog)).to.throw(CycleDetectedError);
  });

  it("produces structurally equal proto graphs for equal documents", () => {
    const first = compileDocument(nestedGraph().snapshot(), catalog);
    const second = compileDocument(nestedGraph().snapshot(), catalog);
    expect(protoGraphsEqual(first, second)).to.equal(true);

    const edited = nestedGraph();
    edited.setLiteral("A", 0, Value.of(F64, 6));
    expect(fingerprintProtoGraph(compileDocument(edited.snapshot(), catalog))).to.not.equal(fingerprintProtoGraph(first));
  });

  it("attaches resolution failures to the failing node and its consumers", () => {
    const graph = new NodeGraph(catalog);
    graph.addNode({ id: "A", implementation: primitive("constant"), inputs: [f64(5)] });
    graph.addNode({ id: "B", implementation: primitive("double"), inputs: [nodeRef("A")] });
    graph.addNode({ id: "X", implementation: primitive("blur"), inputs: [f64(1)] });
    graph.addNode({ id: "Y", implementation: primitive("negate"), inputs: [nodeRef("X")] });

    const proto = compileDocument(graph.snapshot(), catalog);
    expect(identities(proto)).to.deep.equal(["A", "B", "X", "Y"]);
    expect(proto.nodes.map((node) => node.status)).to.deep.equal(["resolved", "resolved", "failed", "failed"]);
    expect(proto.diagnostics).to.deep.equal([
      {
        code: ERROR_CODES.COMPILE_UNKNOWN_OPERATION,
        identity: "X",
        message: "operation 'blur' is not registered",
        hint: "register the operation in the catalog",
        candidates: [],
      },
      {
        code: ERROR_CODES.COMPILE_UPSTREAM,
        identity: "Y",
        message: "upstream node 'X' failed to resolve",
        hint: "fix the upstream node first",
        upstream: "X",
      },
    ]);
  });

  it("reports ambiguous overloads under the strict policy", () => {
    const strictCatalog = new OperationCatalog().register({
      name: "pick",
      overloads: [
        { inputs: [concrete("f64"), generic("T")], output: concrete("f64"), cpu: () => Value.of(F64, 1) },
        { inputs: [generic("T"), concrete("f64")], output: concrete("f64"), cpu: () => Value.of(F64, 2) },
      ],
    });
    const graph = new NodeGraph(strictCatalog);
    graph.addNode({ id: "P", implementation: primitive("pick"), inputs: [f64(1), f64(2)] });

    const lenient = compileDocument(graph.snapshot(), strictCatalog, { overloadPolicy: "most-specific" });
    expect(lenient.diagnostics).to.deep.equal([]);
    const strict = compileDocument(graph.snapshot(), strictCatalog, { overloadPolicy: "strict" });
    expect(strict.diagnostics.map((diagnostic) => diagnostic.code)).to.deep.equal([ERROR_CODES.COMPILE_AMBIGUOUS_OVERLOAD]);
  });

  it("marks a node fed the wrong literal types and keeps its siblings evaluable", async () => {
    const graph = new NodeGraph(catalog);
    graph.addNode({ id: "A", implementation: primitive("double"), inputs: [f64(5)] });
    graph.addNode({ id: "X", implementation: primitive("concat"), inputs: [f64(1), f64(2)] });

    const proto = compileDocument(graph.snapshot(), catalog);
    expect(proto.diagnostics).to.deep.equal([
      {
        code: ERROR_CODES.COMPILE_TYPE_RESOLUTION,
        identity: "X",
        message: "no overload of 'concat' accepts (f64, f64)",
        hint: "feed the node inputs matching one of its signatures",
        candidates: ["(string, string) -> string"],
      },
    ]);

    const executor = new Executor({ logger: new RecordingLogger(), maxConcurrency: 1, gpu: null });
    executor.load(proto);
    const sibling = await executor.evaluate("A");
    expect(sibling.ok ? sibling.value.downcast(F64) : sibling.error.message).to.equal(10);
    const failed = await executor.evaluate("X");
    expect(failed.ok ? null : failed.error.code).to.equal(ERROR_CODES.COMPILE_TYPE_RESOLUTION);
  });

  it("reports inputs matching no overload and blames the node for its consumers", () => {
    const graph = new NodeGraph(catalog);
    graph.addNode({ id: "S", implementation: primitive("add"), inputs: [f64(1), literal(Value.of(U32, 2))] });
    graph.addNode({ id: "T", implementation: primitive("negate"), inputs: [nodeRef("S")] });

    const proto = compileDocument(graph.snapshot(), catalog);
    expect(proto.diagnostics.map((diagnostic) => [diagnostic.identity, diagnostic.code, diagnostic.message])).to.deep.equal([
      ["S", ERROR_CODES.COMPILE_TYPE_RESOLUTION, "no overload of 'add' accepts (f64, u32)"],
      ["T", ERROR_CODES.COMPILE_UPSTREAM, "upstream node 'S' failed to resolve"],
    ]);
    expect(proto.diagnostics[1]?.upstream).to.equal("S");
  });

  it("maps network nodes to the node producing their output", () => {
    const proto = compileDocument(nestedGraph().snapshot(), catalog);
    expect(proto.identities.get("N")).to.equal(1);
    expect(proto.literals.size).to.equal(0);
  });

  it("records networks forwarding a literal straight to their output", () => {
    const graph = new NodeGraph(catalog);
    graph.defineNetwork({
      id: "forward",
      inputs: [{ name: "x", type: concrete("f64") }],
      output: "in",
      nodes: [{ id: "in", implementation: parameter(0) }],
    });
    graph.addNode({ id: "P", implementation: networkRef("forward"), inputs: [f64(3)] });

    const proto = compileDocument(graph.snapshot(), catalog);
    expect(proto.nodes).to.have.length(0);
    expect(proto.identities.has("P")).to.equal(false);
    expect(proto.literals.get("P")?.downcast(F64)).to.equal(3);
  });
});
