import type { Manifest } from "../content/model.js";
import type { Logger } from "../logger.js";
import {
  createEnvelope,
  type Envelope,
  type ExceptionPayload,
  type LogRecordPayload,
  type ResultPayload,
} from "../protocol/envelope.js";
import type { TransportAdapter } from "../transport/adapter.js";

export type AnalysisLogLevel = LogRecordPayload["level"];

/** Handle given to an analysis while it runs for one question. */
export interface AnalysisContext {
  readonly correlationId: string;
  readonly inputValues: unknown;
  readonly inputManifest: Manifest | null;
  /** Child services the parent allows this analysis to call in turn. */
  readonly childIdentitiesAllowed: readonly string[];
  /** Aborted when the responder shuts down. */
  readonly signal: AbortSignal;
  /** Streams a log record to the parent; resolves once it is published. */
  log(level: AnalysisLogLevel, message: string): Promise<void>;
  /** Streams a monitor update to the parent; resolves once it is published. */
  monitor(data: unknown): Promise<void>;
}

export interface AnalysisResult {
  readonly outputValues?: unknown;
  readonly outputManifest?: Manifest | null;
}

export type AnalysisFunction = (context: AnalysisContext) => Promise<AnalysisResult | void> | AnalysisResult | void;

export type TerminalAnswer =
  | { readonly type: "result"; readonly payload: ResultPayload }
  | { readonly type: "exception"; readonly payload: ExceptionPayload };

function toJsonValue(value: unknown): unknown {
  try {
    const text = JSON.stringify(value);
    return text === undefined ? undefined : JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Builds the `exception` payload for a failure. The kind comes from a string
 * `kind` property when the error carries one, otherwise from its name; the
 * detail keeps the stack and the JSON-representable fields of the error.
 */
export function exceptionPayload(error: unknown): ExceptionPayload {
  if (!(error instanceof Error)) {
    return { kind: "Error", message: String(error), detail: { value: toJsonValue(error) ?? null } };
  }
  const detail: Record<string, unknown> = {};
  if (error.stack) {
    detail.stack = error.stack;
  }
  for (const [key, value] of Object.entries(error)) {
    if (key === "message" || key === "name" || key === "stack" || key === "kind") {
      continue;
    }
    const json = toJsonValue(value);
    if (json !== undefined) {
      detail[key] = json;
    }
  }
  const kindField: unknown = Reflect.get(error, "kind");
  const kind = typeof kindField === "string" && kindField.length > 0 ? kindField : error.name || "Error";
  return { kind, message: error.message, detail };
}

/**
 * Publishes everything a child sends back for one correlation id. Ordering
 * numbers are allocated when a message is submitted and publication happens
 * one message at a time, so the parent receives the numbers in the order the
 * analysis produced them. Stream messages that fail to publish are logged
 * and leave a gap; only the terminal envelope reports its failure.
 */
export class AnswerChannel {
  readonly correlationId: string;
  private readonly transport: TransportAdapter;
  private readonly destination: string;
  private readonly logger: Logger;
  private nextOrdering = 0;
  private tail: Promise<void> = Promise.resolve();
  private closed = false;

  constructor(transport: TransportAdapter, destination: string, correlationId: string, logger: Logger) {
    this.transport = transport;
    this.destination = destination;
    this.correlationId = correlationId;
    this.logger = logger;
  }

  /** Ordering numbers handed out so far. */
  get allocated(): number {
    return this.nextOrdering;
  }

  log(level: AnalysisLogLevel, message: string, timestamp: number): Promise<void> {
    return this.submitStream(() =>
      this.transport.codec
        .fragmentLogRecord({ level, message, timestamp, continuation: false })
        .map((payload) => createEnvelope("log_record", this.header(), payload)),
    );
  }

  monitor(data: unknown): Promise<void> {
    return this.submitStream(() =>
      this.transport.codec
        .fragmentMonitorMessage({ data, continuation: false })
        .map((payload) => createEnvelope("monitor_message", this.header(), payload)),
    );
  }

  heartbeat(timestamp: number): Promise<void> {
    return this.submitStream(() => [createEnvelope("heartbeat", this.header(), { timestamp })]);
  }

  /**
   * Publishes the terminal envelope after every message submitted before it.
   * Rejects when it could not be published; later submissions are ignored.
   */
  async terminal(answer: TerminalAnswer): Promise<void> {
    if (this.closed) {
      throw new Error(`answer channel for '${this.correlationId}' is already closed`);
    }
    this.closed = true;
    const envelope =
      answer.type === "result"
        ? createEnvelope("result", this.header(), answer.payload)
        : createEnvelope("exception", this.header(), answer.payload);
    await this.tail;
    await this.transport.publish(this.destination, envelope);
  }

  private header() {
    const orderingNumber = this.nextOrdering;
    this.nextOrdering += 1;
    return { correlation_id: this.correlationId, ordering_number: orderingNumber, sender_role: "child" as const };
  }

  private submitStream(build: () => Envelope[]): Promise<void> {
    if (this.closed) {
      this.logger.warn("answer_after_terminal_ignored", { correlation_id: this.correlationId });
      return Promise.resolve();
    }
    let envelopes: Envelope[];
    try {
      envelopes = build();
    } catch (error) {
      this.logger.warn("stream_message_rejected", {
        correlation_id: this.correlationId,
        reason: error instanceof Error ? error.message : String(error),
      });
      return Promise.resolve();
    }
    const step = this.tail.then(async () => {
      for (const envelope of envelopes) {
        try {
          await this.transport.publish(this.destination, envelope);
        } catch (error) {
          this.logger.error("stream_publish_failed", {
            correlation_id: this.correlationId,
            ordering_number: envelope.ordering_number,
            reason: error instanceof Error ? error.message : String(error),
          });
        }
      }
    });
    this.tail = step;
    return step;
  }
}
