import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";

import { readOptionalString } from "./config/env.js";
import { getMessageContext, type MessageContext } from "./infra/messageContext.js";

/** Placeholder inserted when a secret is redacted. */
const REDACTION_TOKEN = "[REDACTED]";

const REDACTION_ENABLE_TOKENS = new Set(["on", "true", "yes", "1", "enable", "enabled"]);
const REDACTION_DISABLE_TOKENS = new Set(["off", "false", "no", "0", "disable", "disabled"]);

/** Keys whose values are redacted when redaction is enabled. */
const SENSITIVE_KEYS = new Set([
  "authorization",
  "password",
  "token",
  "access_token",
  "refresh_token",
  "api_key",
  "api-key",
  "x-api-key",
  "credentials",
  "redis_url",
]);

/**
 * Parses `RELAY_LOG_REDACT`. The variable accepts comma-separated directives
 * such as `"on,sk-"` or `"off"`; extra entries are treated as substrings to
 * scrub from messages. Providing patterns without a toggle enables redaction.
 */
export function parseRedactionDirectives(raw: string | undefined): {
  enabled: boolean;
  tokens: Array<string>;
} {
  if (!raw) {
    return { enabled: false, tokens: [] };
  }

  const directives = raw
    .split(",")
    .map((value) => value.trim())
    .filter((value) => value.length > 0);

  let enabled: boolean | undefined;
  const tokens: Array<string> = [];

  for (const directive of directives) {
    const normalised = directive.toLowerCase();
    if (REDACTION_DISABLE_TOKENS.has(normalised)) {
      enabled = false;
      continue;
    }
    if (REDACTION_ENABLE_TOKENS.has(normalised)) {
      enabled = true;
      continue;
    }
    tokens.push(directive);
  }

  return { enabled: enabled ?? tokens.length > 0, tokens: Array.from(new Set(tokens)) };
}

const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024; // 5 MiB
const DEFAULT_MAX_FILE_COUNT = 5;

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
  correlation_id?: string;
  service_id?: string | null;
  envelope_type?: string | null;
}

export interface LoggerOptions {
  readonly logFile?: string | null;
  /** Maximum size in bytes before the active log file is rotated. */
  readonly maxFileSizeBytes?: number;
  /** Number of log files to retain, the active one included. */
  readonly maxFileCount?: number;
  /** Substrings or patterns scrubbed from string payload values. */
  readonly redactSecrets?: Array<string | RegExp>;
  /** Explicit redaction toggle; defaults to `RELAY_LOG_REDACT`. */
  readonly redactionEnabled?: boolean;
  /** Listener invoked with a copy of every emitted entry. */
  readonly onEntry?: (entry: LogEntry) => void;
}

/**
 * Structured logger emitting JSON lines on stdout and optionally mirroring them
 * to a rotating file. File writes are queued so lines keep their order.
 */
export class StructuredLogger {
  private readonly logFile?: string;
  private readonly maxFileSizeBytes: number;
  private readonly maxFileCount: number;
  private readonly redactSecrets: Array<string | RegExp>;
  private writeQueue: Promise<void> = Promise.resolve();
  private logDirectoryReady = false;
  private readonly entryListener?: (entry: LogEntry) => void;
  private readonly redactionEnabled: boolean;

  constructor(options: LoggerOptions = {}) {
    this.logFile = options.logFile ?? undefined;
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFileCount = Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT);
    const directives = parseRedactionDirectives(process.env.RELAY_LOG_REDACT);
    this.redactSecrets = [...new Set<string | RegExp>([...directives.tokens, ...(options.redactSecrets ?? [])])];
    this.entryListener = options.onEntry;
    this.redactionEnabled = options.redactionEnabled ?? directives.enabled;
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  /** Waits for pending file writes; tests use it before reading the mirror. */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    const context = getMessageContext();
    const safePayload = payload !== undefined ? this.redact(payload) : undefined;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.correlationFields(context),
      ...(safePayload !== undefined ? { payload: safePayload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    process.stdout.write(line);
    if (this.entryListener) {
      this.entryListener(structuredClone(entry));
    }
    const logFile = this.logFile;
    if (!logFile) {
      return;
    }
    this.writeQueue = this.writeQueue
      .then(async () => {
        try {
          await this.ensureLogDestination(logFile);
          await this.rotateIfNeeded(logFile, Buffer.byteLength(line, "utf8"));
          await appendFile(logFile, line, "utf8");
        } catch (err) {
          this.reportInternalFailure("log_file_write_failed", err);
          this.logDirectoryReady = false;
        }
      })
      .catch((err: unknown) => {
        this.reportInternalFailure("log_queue_failed", err);
        this.writeQueue = Promise.resolve();
      });
  }

  private correlationFields(context: MessageContext | undefined): Partial<LogEntry> {
    if (!context) {
      return {};
    }
    return {
      correlation_id: context.correlationId,
      ...(context.serviceId !== undefined ? { service_id: context.serviceId } : {}),
      ...(context.envelopeType !== undefined ? { envelope_type: context.envelopeType } : {}),
    };
  }

  private reportInternalFailure(message: string, error: unknown): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: "error",
      message,
      payload: error instanceof Error ? { message: error.message } : { error: String(error) },
    };
    process.stderr.write(`${JSON.stringify(entry)}\n`);
  }

  private async ensureLogDestination(logFile: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(logFile), { recursive: true });
    this.logDirectoryReady = true;
  }

  /** Rotates the active file when appending `pendingBytes` would exceed the limit. */
  private async rotateIfNeeded(logFile: string, pendingBytes: number): Promise<void> {
    let currentSize = 0;
    try {
      currentSize = (await stat(logFile)).size;
    } catch (error) {
      if (isMissingFile(error)) {
        return;
      }
      throw error;
    }

    if (currentSize + pendingBytes <= this.maxFileSizeBytes) {
      return;
    }

    if (this.maxFileCount === 1) {
      await rm(logFile, { force: true });
      return;
    }

    await rm(`${logFile}.${this.maxFileCount - 1}`, { force: true });
    for (let index = this.maxFileCount - 2; index >= 1; index -= 1) {
      await renameIfPresent(`${logFile}.${index}`, `${logFile}.${index + 1}`);
    }
    await renameIfPresent(logFile, `${logFile}.1`);
  }

  private redact(value: unknown): unknown {
    if (!this.redactionEnabled) {
      return value;
    }
    return this.deepRedact(value);
  }

  private deepRedact(value: unknown): unknown {
    if (typeof value === "string") {
      return this.scrub(value);
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.deepRedact(item));
    }
    if (value && typeof value === "object") {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTION_TOKEN : this.deepRedact(entry);
      }
      return result;
    }
    return value;
  }

  private scrub(value: string): string {
    let sanitised = value;
    for (const pattern of this.redactSecrets) {
      if (typeof pattern === "string" && pattern.length > 0) {
        sanitised = sanitised.split(pattern).join(REDACTION_TOKEN);
      } else if (pattern instanceof RegExp) {
        sanitised = sanitised.replace(pattern, REDACTION_TOKEN);
      }
    }
    return sanitised;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function renameIfPresent(source: string, target: string): Promise<void> {
  try {
    await rename(source, target);
  } catch (error) {
    if (!isMissingFile(error)) {
      throw error;
    }
  }
}

/** Builds the process-wide logger from `RELAY_LOG_FILE` and `RELAY_LOG_REDACT`. */
export function createLoggerFromEnv(overrides: LoggerOptions = {}): StructuredLogger {
  return new StructuredLogger({ logFile: readOptionalString("RELAY_LOG_FILE") ?? null, ...overrides });
}

/** Narrow surface the protocol components depend on; tests pass a recorder. */
export type Logger = Pick<StructuredLogger, "debug" | "info" | "warn" | "error">;
