/**
 * Demand-driven evaluation of compiled proto graphs: incremental reuse of
 * cached results, fan-out sharing, failure isolation, cancellation and the
 * bounded evaluation pool.
 */
import { describe, it } from "mocha";
import { expect } from "chai";

import { OperationCatalog, type CpuImplementation } from "../../src/catalog/registry.js";
import { registerStandardOperations } from "../../src/catalog/std.js";
import { compileDocument } from "../../src/compiler/compiler.js";
import { EvaluationCancelledError, NotCompiledError, TargetNotFoundError } from "../../src/executor/errors.js";
import { Executor } from "../../src/executor/executor.js";
import { NodeGraph } from "../../src/graph/document.js";
import { literal, nodeRef, primitive, type NodeInput } from "../../src/graph/types.js";
import { ERROR_CODES } from "../../src/types.js";
import { concrete } from "../../src/values/types.js";
import { F64, STRING, Value } from "../../src/values/value.js";
import { RecordingLogger } from "../helpers/recordingLogger.js";

const f64Type = concrete("f64");
const f64 = (value: number): NodeInput => literal(Value.of(F64, value));

interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
}

function deferred(): Deferred {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((settle) => {
    resolve = settle;
  });
  return { promise, resolve };
}

function catalogWith(extra: Record<string, CpuImplementation>): OperationCatalog {
  const catalog = registerStandardOperations(new OperationCatalog());
  for (const [name, cpu] of Object.entries(extra)) {
    catalog.register({ name, overloads: [{ inputs: [f64Type], output: f64Type, cpu }] });
  }
  return catalog;
}

function createExecutor(logger = new RecordingLogger(), maxConcurrency = 4): Executor {
  return new Executor({ logger, maxConcurrency, gpu: null });
}

function load(executor: Executor, graph: NodeGraph, catalog: OperationCatalog): void {
  executor.load(compileDocument(graph.snapshot(), catalog, { gpu: false }));
}

async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("expected the promise to reject");
}

function valueOf(outcome: Awaited<ReturnType<Executor["evaluate"]>>): number {
  if (!outcome.ok) {
    throw new Error(`evaluation failed: ${outcome.error.message}`);
  }
  return outcome.value.downcast(F64);
}

describe("executor/evaluate incremental reuse", () => {
  const catalog = registerStandardOperations(new OperationCatalog());

  function buildChain(): NodeGraph {
    const graph = new NodeGraph(catalog);
    graph.addNode({ id: "A", implementation: primitive("constant"), inputs: [f64(5)] });
    graph.addNode({ id: "B", implementation: primitive("double"), inputs: [nodeRef("A")] });
    graph.addNode({ id: "C", implementation: primitive("add"), inputs: [nodeRef("B"), f64(3)] });
    graph.addNode({ id: "D", implementation: primitive("negate"), inputs: [f64(1)] });
    graph.setOutput("C");
    return graph;
  }

  it("re-runs only the nodes downstream of a literal edit", async () => {
    const graph = buildChain();
    const executor = createExecutor();
    load(executor, graph, catalog);

    const first = await executor.evaluate();
    expect(valueOf(first)).to.equal(13);
    expect(first.report.executed).to.deep.equal(["B", "C"]);
    expect((await executor.evaluate("D")).report.executed).to.deep.equal(["D"]);

    graph.setLiteral("A", 0, Value.of(F64, 10));
    load(executor, graph, catalog);
    const second = await executor.evaluate();
    expect(valueOf(second)).to.equal(23);
    expect(second.report.executed).to.deep.equal(["B", "C"]);

    const untouched = await executor.evaluate("D");
    expect(untouched.report.executed).to.deep.equal([]);
    expect(untouched.report.cacheHits).to.deep.equal(["D"]);
    expect(executor.executionCounts()).to.deep.equal({ B: 2, C: 2, D: 1 });
  });

  it("answers an unchanged target straight from the cache", async () => {
    const graph = buildChain();
    const executor = createExecutor();
    load(executor, graph, catalog);

    await executor.evaluate();
    const again = await executor.evaluate();
    expect(valueOf(again)).to.equal(13);
    expect(again.report.executed).to.deep.equal([]);
    expect(again.report.cacheHits).to.deep.equal(["C"]);
    expect(executor.stats().cache).to.include({ hits: 1, misses: 3, size: 3 });
  });

  it("evicts cached results whose identity disappeared", async () => {
    const graph = buildChain();
    const executor = createExecutor();
    load(executor, graph, catalog);
    await executor.evaluate();

    graph.removeNode("C");
    const outcome = executor.load(compileDocument(graph.snapshot(), catalog, { gpu: false }));
    expect(outcome).to.deep.equal({ generation: 2, retained: 2, evicted: 1 });
    expect(executor.peekCached("C")).to.equal(undefined);
    expect(executor.peekCached("B")?.ok).to.equal(true);
  });

  it("reports missing targets and missing proto graphs", async () => {
    const executor = createExecutor();
    expect(await rejectionOf(executor.evaluate())).to.be.instanceOf(NotCompiledError);

    load(executor, buildChain(), catalog);
    const missing = await rejectionOf(executor.evaluate("nope"));
    expect(missing).to.be.instanceOf(TargetNotFoundError);
    expect(missing instanceof Error ? missing.message : "").to.equal("no compiled node has identity 'nope'");
  });
});

describe("executor/evaluate fan-out and failures", () => {
  it("evaluates a shared upstream node once and hands every reader the same value", async () => {
    const seen: Value[] = [];
    const catalog = catalogWith({
      pass: (inputs) => {
        const [input] = inputs;
        if (!input) {
          throw new Error("missing input");
        }
        seen.push(input);
        return input;
      },
    });
    const graph = new NodeGraph(catalog);
    graph.addNode({ id: "S", implementation: primitive("double"), inputs: [f64(4)] });
    graph.addNode({ id: "L", implementation: primitive("pass"), inputs: [nodeRef("S")] });
    graph.addNode({ id: "R", implementation: primitive("pass"), inputs: [nodeRef("S")] });
    graph.addNode({ id: "J", implementation: primitive("add"), inputs: [nodeRef("L"), nodeRef("R")] });
    graph.setOutput("J");

    const executor = createExecutor();
    load(executor, graph, catalog);
    expect(valueOf(await executor.evaluate())).to.equal(16);
    expect(executor.executionCount("S")).to.equal(1);
    expect(seen).to.have.length(2);
    expect(seen[0]).to.equal(seen[1]);
    const cached = executor.peekCached("S");
    expect(cached?.ok ? cached.value : undefined).to.equal(seen[0]);
  });

  it("isolates a throwing operation to its downstream nodes", async () => {
    const logger = new RecordingLogger();
    const catalog = catalogWith({
      explode: () => {
        throw new Error("boom");
      },
    });
    const graph = new NodeGraph(catalog);
    graph.addNode({ id: "P", implementation: primitive("explode"), inputs: [f64(1)] });
    graph.addNode({ id: "Q", implementation: primitive("negate"), inputs: [nodeRef("P")] });
    graph.addNode({ id: "Z", implementation: primitive("double"), inputs: [f64(2)] });

    const executor = createExecutor(logger);
    load(executor, graph, catalog);
    const failed = await executor.evaluate("Q");
    expect(failed.ok).to.equal(false);
    if (!failed.ok) {
      expect(failed.error).to.deep.equal({
        code: ERROR_CODES.EXEC_OPERATION_PANIC,
        message: "operation 'explode' failed at 'P': boom",
        hint: "inspect the node inputs or the operation implementation",
        failedNode: "P",
      });
    }
    expect(failed.report.executed).to.deep.equal(["P"]);
    expect(logger.messages("operation_panic").map((entry) => entry.payload)).to.deep.equal([
      { identity: "P", operation: "explode", message: "boom" },
    ]);

    expect(valueOf(await executor.evaluate("Z"))).to.equal(4);
    const repeated = await executor.evaluate("Q");
    expect(repeated.ok).to.equal(false);
    expect(repeated.report.cacheHits).to.deep.equal(["Q"]);
  });

  it("treats a value of the wrong type as a panic", async () => {
    const catalog = catalogWith({ liar: () => Value.of(STRING, "nope") });
    const graph = new NodeGraph(catalog);
    graph.addNode({ id: "L", implementation: primitive("liar"), inputs: [f64(1)] });

    const executor = createExecutor();
    load(executor, graph, catalog);
    const outcome = await executor.evaluate("L");
    expect(outcome.ok ? "ok" : outcome.error.message).to.equal(
      "operation 'liar' failed at 'L': returned string where f64 was declared",
    );
  });

  it("collapses whitespace in panic messages before reporting them", async () => {
    const catalog = catalogWith({
      garble: () => {
        throw new Error("first line\n    second line");
      },
    });
    const graph = new NodeGraph(catalog);
    graph.addNode({ id: "G", implementation: primitive("garble"), inputs: [f64(1)] });

    const executor = createExecutor();
    load(executor, graph, catalog);
    const outcome = await executor.evaluate("G");
    expect(outcome.ok ? "ok" : outcome.error.message).to.equal("operation 'garble' failed at 'G': first line second line");
  });

  it("surfaces the compile diagnostic of the node that failed to resolve", async () => {
    const catalog = registerStandardOperations(new OperationCatalog());
    const graph = new NodeGraph(catalog);
    graph.addNode({ id: "X", implementation: primitive("blur"), inputs: [f64(1)] });
    graph.addNode({ id: "Y", implementation: primitive("negate"), inputs: [nodeRef("X")] });

    const executor = createExecutor();
    load(executor, graph, catalog);
    const outcome = await executor.evaluate("Y");
    expect(outcome.ok ? undefined : outcome.error).to.deep.equal({
      code: ERROR_CODES.COMPILE_UNKNOWN_OPERATION,
      message: "operation 'blur' is not registered",
      hint: "register the operation in the catalog",
      failedNode: "X",
    });
    expect(outcome.report.executed).to.deep.equal([]);
  });
});

describe("executor/evaluate concurrency", () => {
  function gatedCatalog(gate: Deferred, started: Deferred): OperationCatalog {
    return catalogWith({
      slow: async (inputs) => {
        started.resolve();
        await gate.promise;
        return inputs[0] ?? Value.of(F64, 0);
      },
    });
  }

  function gatedGraph(catalog: OperationCatalog): NodeGraph {
    const graph = new NodeGraph(catalog);
    graph.addNode({ id: "S", implementation: primitive("slow"), inputs: [f64(7)] });
    graph.setOutput("S");
    return graph;
  }

  it("discards results computed after the caller aborted", async () => {
    const gate = deferred();
    const started = deferred();
    const catalog = gatedCatalog(gate, started);
    const logger = new RecordingLogger();
    const executor = createExecutor(logger);
    load(executor, gatedGraph(catalog), catalog);

    const controller = new AbortController();
    const pending = executor.evaluate("S", { signal: controller.signal });
    await started.promise;
    controller.abort("stop");
    gate.resolve();

    const error = await rejectionOf(pending);
    expect(error).to.be.instanceOf(EvaluationCancelledError);
    expect(error instanceof Error ? error.message : "").to.equal("evaluation cancelled: stop");
    expect(executor.peekCached("S")).to.equal(undefined);
    expect(logger.messages("evaluation_cancelled").map((entry) => entry.payload)).to.deep.equal([
      { generation: 1, target: "S", reason: "stop" },
    ]);

    expect(valueOf(await executor.evaluate("S"))).to.equal(7);
    expect(executor.executionCount("S")).to.equal(2);
  });

  it("cancels the passes running against the current generation", async () => {
    const gate = deferred();
    const started = deferred();
    const catalog = gatedCatalog(gate, started);
    const executor = createExecutor();
    load(executor, gatedGraph(catalog), catalog);

    const pending = executor.evaluate("S");
    await started.promise;
    executor.cancelActive("recompiled");
    gate.resolve();

    const error = await rejectionOf(pending);
    expect(error instanceof Error ? error.message : "").to.equal("evaluation cancelled: recompiled");
    expect(valueOf(await executor.evaluate("S"))).to.equal(7);
  });

  it("shares an in-flight computation between concurrent requests", async () => {
    const gate = deferred();
    const started = deferred();
    const catalog = gatedCatalog(gate, started);
    const executor = createExecutor();
    load(executor, gatedGraph(catalog), catalog);

    const first = executor.evaluate("S");
    const second = executor.evaluate("S");
    await started.promise;
    expect(executor.stats().inFlight).to.equal(1);
    gate.resolve();

    const [a, b] = await Promise.all([first, second]);
    expect(valueOf(a)).to.equal(7);
    expect(valueOf(b)).to.equal(7);
    expect(a.report.executed).to.deep.equal(["S"]);
    expect(b.report.executed).to.deep.equal([]);
    expect(executor.executionCount("S")).to.equal(1);
    expect(executor.stats().inFlight).to.equal(0);
  });

  it("never runs more operations at once than the pool allows", async () => {
    let active = 0;
    let observed = 0;
    const catalog = catalogWith({
      tick: async () => {
        active += 1;
        observed = Math.max(observed, active);
        await new Promise<void>((resolve) => setImmediate(resolve));
        active -= 1;
        return Value.of(F64, 1);
      },
    });
    const graph = new NodeGraph(catalog);
    for (const id of ["S1", "S2", "S3", "S4"]) {
      graph.addNode({ id, implementation: primitive("tick"), inputs: [f64(0)] });
    }
    graph.addNode({ id: "T1", implementation: primitive("add"), inputs: [nodeRef("S1"), nodeRef("S2")] });
    graph.addNode({ id: "T2", implementation: primitive("add"), inputs: [nodeRef("S3"), nodeRef("S4")] });
    graph.addNode({ id: "R", implementation: primitive("add"), inputs: [nodeRef("T1"), nodeRef("T2")] });
    graph.setOutput("R");

    const executor = createExecutor(new RecordingLogger(), 2);
    load(executor, graph, catalog);
    expect(valueOf(await executor.evaluate())).to.equal(4);
    expect(observed).to.equal(2);
    expect(executor.stats().pool).to.deep.equal({ maxWorkers: 2, active: 0, queued: 0, peak: 2, executed: 7 });
  });
});
