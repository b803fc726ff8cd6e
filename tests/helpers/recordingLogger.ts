import { StructuredLogger, type LogLevel } from "../../src/logger.js";

/**
 * Logger capturing entries in memory so tests can assert on the structured
 * events the engine emits without writing to stdout.
 */
export class RecordingLogger extends StructuredLogger {
  /** Entries emitted via `debug`/`info`/`warn`/`error` during the test. */
  public readonly entries: Array<{ level: LogLevel; message: string; payload?: unknown }> = [];

  constructor() {
    // No file, no stdout and no redaction: payloads stay exactly as emitted.
    super({ logFile: null, redactionEnabled: false, stdout: false });
  }

  /** Entries carrying the given message, in emission order. */
  messages(message: string): Array<{ level: LogLevel; message: string; payload?: unknown }> {
    return this.entries.filter((entry) => entry.message === message);
  }

  private record(level: LogLevel, message: string, payload?: unknown): void {
    this.entries.push({ level, message, payload });
  }

  override debug(message: string, payload?: unknown): void {
    this.record("debug", message, payload);
  }

  override info(message: string, payload?: unknown): void {
    this.record("info", message, payload);
  }

  override warn(message: string, payload?: unknown): void {
    this.record("warn", message, payload);
  }

  override error(message: string, payload?: unknown): void {
    this.record("error", message, payload);
  }
}
