/**
 * Structured logger: level filtering, payload redaction and the mirrored
 * JSON-lines file with its size-based rotation.
 */
import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import sinon from "sinon";

import { StructuredLogger, parseRedactionDirectives, type LogEntry } from "../../src/logger.js";

function collect(options: ConstructorParameters<typeof StructuredLogger>[0] = {}): { logger: StructuredLogger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = new StructuredLogger({
    stdout: false,
    ...options,
    onEntry(entry) {
      entries.push(entry);
    },
  });
  return { logger, entries };
}

async function readLines(path: string): Promise<Array<{ level: string; message: string; payload?: unknown }>> {
  const raw = await readFile(path, "utf8");
  return raw
    .split("\n")
    .filter((line) => line.length > 0)
    .map((line) => {
      const parsed: { level: string; message: string; payload?: unknown } = JSON.parse(line);
      return { level: parsed.level, message: parsed.message, payload: parsed.payload };
    });
}

describe("logger/levels and redaction", () => {
  it("drops entries below the minimum level", () => {
    const { logger, entries } = collect({ minLevel: "warn" });
    logger.debug("noise");
    logger.info("cache_rekeyed", { generation: 1 });
    logger.warn("gpu_fallback", { reason: "no GPU context" });
    expect(entries.map((entry) => [entry.level, entry.message])).to.deep.equal([["warn", "gpu_fallback"]]);
  });

  it("masks sensitive keys at any depth when redaction is on", () => {
    const { logger, entries } = collect({ redactionEnabled: true, redactKeys: ["Session"] });
    logger.info("request", { headers: { authorization: "test-secret" }, items: [{ session: "test-token" }], note: "kept" });
    expect(entries[0]?.payload).to.deep.equal({
      headers: { authorization: "[REDACTED]" },
      items: [{ session: "[REDACTED]" }],
      note: "kept",
    });
  });

  it("leaves payloads untouched when redaction is off", () => {
    const { logger, entries } = collect({ redactionEnabled: false });
    logger.info("request", { token: "test-token" });
    expect(entries[0]?.payload).to.deep.equal({ token: "test-token" });
  });

  it("writes one JSON line per entry to stdout", () => {
    const write = sinon.stub(process.stdout, "write").returns(true);
    try {
      const logger = new StructuredLogger({ redactionEnabled: false });
      logger.warn("gpu_fallback", { reason: "no GPU context" });
    } finally {
      write.restore();
    }
    expect(write.callCount).to.equal(1);
    const line = String(write.firstCall.args[0]);
    expect(line.endsWith("\n")).to.equal(true);
    const parsed: { level: string; message: string; payload: unknown } = JSON.parse(line);
    expect([parsed.level, parsed.message, parsed.payload]).to.deep.equal(["warn", "gpu_fallback", { reason: "no GPU context" }]);
  });

  it("parses redaction directives", () => {
    expect(parseRedactionDirectives(undefined)).to.deep.equal({ enabled: false, keys: [] });
    expect(parseRedactionDirectives("on, Session")).to.deep.equal({ enabled: true, keys: ["session"] });
    expect(parseRedactionDirectives("extra")).to.deep.equal({ enabled: true, keys: ["extra"] });
    expect(parseRedactionDirectives("off,extra")).to.deep.equal({ enabled: false, keys: ["extra"] });
  });
});

describe("logger/file mirror", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), "nodegraph-logs-"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("appends JSON lines and creates the parent directory", async () => {
    const logFile = join(directory, "nested", "engine.log");
    const { logger } = collect({ logFile, redactionEnabled: false });
    logger.info("graph_compiled", { generation: 1, nodes: 3 });
    logger.debug("gpu_dispatch");
    logger.error("operation_panic", { identity: "P", stamp: 5n });
    await logger.flush();

    expect(await readLines(logFile)).to.deep.equal([
      { level: "info", message: "graph_compiled", payload: { generation: 1, nodes: 3 } },
      { level: "error", message: "operation_panic", payload: { identity: "P", stamp: "5n" } },
    ]);
  });

  it("rotates the file once it would exceed the size limit", async () => {
    const logFile = join(directory, "engine.log");
    const { logger } = collect({ logFile, redactionEnabled: false, maxFileSizeBytes: 1, maxFileCount: 2 });
    logger.info("first");
    logger.info("second");
    await logger.flush();

    expect((await readLines(logFile)).map((line) => line.message)).to.deep.equal(["second"]);
    expect((await readLines(`${logFile}.1`)).map((line) => line.message)).to.deep.equal(["first"]);
  });
});
