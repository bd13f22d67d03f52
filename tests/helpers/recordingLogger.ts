import { getMessageContext } from "../../src/infra/messageContext.js";
import { StructuredLogger, type LogLevel } from "../../src/logger.js";

export interface RecordedEntry {
  level: LogLevel;
  message: string;
  payload?: unknown;
  /** Correlation id of the message being handled when the entry was emitted. */
  correlationId?: string;
}

/**
 * Logger capturing entries in memory instead of writing them to stdout. It
 * subclasses {@link StructuredLogger} so it can be passed wherever the
 * production logger is expected.
 */
export class RecordingLogger extends StructuredLogger {
  public readonly entries: RecordedEntry[] = [];

  constructor() {
    super({ logFile: null, redactionEnabled: false });
  }

  /** Messages logged so far, optionally restricted to one level. */
  messages(level?: LogLevel): string[] {
    return this.entries.filter((entry) => level === undefined || entry.level === level).map((entry) => entry.message);
  }

  find(message: string): RecordedEntry | undefined {
    return this.entries.find((entry) => entry.message === message);
  }

  count(message: string): number {
    return this.entries.filter((entry) => entry.message === message).length;
  }

  private record(level: LogLevel, message: string, payload?: unknown): void {
    const correlationId = getMessageContext()?.correlationId;
    this.entries.push({
      level,
      message,
      ...(payload !== undefined ? { payload } : {}),
      ...(correlationId !== undefined ? { correlationId } : {}),
    });
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
