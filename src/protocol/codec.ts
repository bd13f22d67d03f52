import { Buffer } from "node:buffer";

import { resolveCodecLimits, type CodecLimits } from "../config/protocol.js";
import { MalformedMessageError, PayloadTooLargeError } from "../errors.js";
import {
  EnvelopeSchema,
  SUPPORTED_PROTOCOL_MAJOR,
  describeIssues,
  isStreamEnvelope,
  type Envelope,
  type LogRecordPayload,
  type MonitorMessagePayload,
  type StreamEnvelope,
} from "./envelope.js";

/** Fragments smaller than this cannot carry meaningful content. */
const MIN_FRAGMENT_BUDGET = 16;

function jsonBytes(value: unknown): number {
  return Buffer.byteLength(JSON.stringify(value) ?? "null", "utf8");
}

/**
 * Splits `text` into slices whose JSON-escaped UTF-8 size stays within
 * `budget`. Slices never cut through a code point.
 */
function splitByEncodedSize(text: string, budget: number): string[] {
  const slices: string[] = [];
  let current = "";
  let currentSize = 0;
  for (const char of text) {
    // JSON.stringify adds two quotes around the escaped character.
    const cost = Buffer.byteLength(JSON.stringify(char), "utf8") - 2;
    if (currentSize + cost > budget && current.length > 0) {
      slices.push(current);
      current = "";
      currentSize = 0;
    }
    current += char;
    currentSize += cost;
  }
  if (current.length > 0 || slices.length === 0) {
    slices.push(current);
  }
  return slices;
}

/**
 * Serialises and parses protocol envelopes. The codec enforces the envelope
 * size limit in both directions and the stream payload limit on the sending
 * side, where oversized log and monitor payloads must first go through
 * {@link EnvelopeCodec.fragmentLogRecord} or
 * {@link EnvelopeCodec.fragmentMonitorMessage}.
 */
export class EnvelopeCodec {
  readonly limits: CodecLimits;

  constructor(limits: Partial<CodecLimits> = {}) {
    this.limits = resolveCodecLimits(limits);
  }

  encode(envelope: Envelope): Buffer {
    if (isStreamEnvelope(envelope)) {
      const payloadSize = jsonBytes(envelope.payload);
      if (payloadSize > this.limits.maxStreamPayloadBytes) {
        throw new PayloadTooLargeError(payloadSize, this.limits.maxStreamPayloadBytes, `${envelope.type} payload`);
      }
    }
    const bytes = Buffer.from(JSON.stringify(envelope), "utf8");
    if (bytes.byteLength > this.limits.maxEnvelopeBytes) {
      throw new PayloadTooLargeError(bytes.byteLength, this.limits.maxEnvelopeBytes);
    }
    return bytes;
  }

  decode(bytes: Uint8Array): Envelope {
    if (bytes.byteLength > this.limits.maxEnvelopeBytes) {
      throw new PayloadTooLargeError(bytes.byteLength, this.limits.maxEnvelopeBytes);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(Buffer.from(bytes).toString("utf8"));
    } catch (error) {
      throw new MalformedMessageError("envelope is not valid JSON", {
        reason: error instanceof Error ? error.message : String(error),
      });
    }

    const parsed = EnvelopeSchema.safeParse(raw);
    if (!parsed.success) {
      const type = raw !== null && typeof raw === "object" && "type" in raw ? raw.type : undefined;
      throw new MalformedMessageError(`envelope failed validation (type ${JSON.stringify(type ?? null)})`, {
        issues: describeIssues(parsed.error),
      });
    }

    const major = Number.parseInt(parsed.data.protocol_version.split(".")[0], 10);
    if (major !== SUPPORTED_PROTOCOL_MAJOR) {
      throw new MalformedMessageError(`unsupported protocol version ${parsed.data.protocol_version}`, {
        supported_major: SUPPORTED_PROTOCOL_MAJOR,
      });
    }
    return parsed.data;
  }

  /**
   * Splits a log record whose payload exceeds the stream limit. Every fragment
   * but the last carries `continuation: true`; the sender gives them
   * consecutive ordering numbers.
   */
  fragmentLogRecord(payload: LogRecordPayload): LogRecordPayload[] {
    const whole = { ...payload, continuation: false };
    if (jsonBytes(whole) <= this.limits.maxStreamPayloadBytes) {
      return [whole];
    }
    const budget = this.fragmentBudget({ ...payload, message: "", continuation: false });
    const slices = splitByEncodedSize(payload.message, budget);
    return slices.map((message, index) => ({ ...payload, message, continuation: index < slices.length - 1 }));
  }

  /**
   * Splits a monitor message whose payload exceeds the stream limit. Fragments
   * carry consecutive slices of the JSON text of `data`.
   */
  fragmentMonitorMessage(payload: MonitorMessagePayload): MonitorMessagePayload[] {
    const whole = { data: payload.data, continuation: false };
    if (jsonBytes(whole) <= this.limits.maxStreamPayloadBytes) {
      return [whole];
    }
    const budget = this.fragmentBudget({ data: "", continuation: false });
    const slices = splitByEncodedSize(JSON.stringify(payload.data) ?? "null", budget);
    return slices.map((data, index) => ({ data, continuation: index < slices.length - 1 }));
  }

  /** Room left for content once the fragment's own fields are encoded; `false` is the longer flag. */
  private fragmentBudget(emptyFragment: unknown): number {
    const budget = this.limits.maxStreamPayloadBytes - jsonBytes(emptyFragment);
    if (budget < MIN_FRAGMENT_BUDGET) {
      throw new PayloadTooLargeError(jsonBytes(emptyFragment), this.limits.maxStreamPayloadBytes, "fragment header");
    }
    return budget;
  }
}

/** Log or monitor message as exposed to the caller once reassembled. */
export type StreamMessage =
  | {
      type: "log_record";
      level: LogRecordPayload["level"];
      message: string;
      timestamp: number;
      /** Ordering numbers of the first and last fragment. */
      orderingRange: [number, number];
    }
  | {
      type: "monitor_message";
      data: unknown;
      orderingRange: [number, number];
    };

/**
 * Joins stream fragments delivered in ordering order. A message is released
 * once its final fragment (`continuation: false`) arrives; {@link reset}
 * discards a partial message after a gap.
 */
export class StreamReassembler {
  private pending: StreamEnvelope[] = [];
  private discarded = 0;

  push(envelope: StreamEnvelope): StreamMessage | null {
    const head = this.pending[0];
    if (head && head.type !== envelope.type) {
      this.reset();
    }
    this.pending.push(envelope);
    if (envelope.payload.continuation) {
      return null;
    }
    const fragments = this.pending;
    this.pending = [];
    return assemble(fragments);
  }

  /** Drops the partial message, if any. Returns whether something was discarded. */
  reset(): boolean {
    if (this.pending.length === 0) {
      return false;
    }
    this.pending = [];
    this.discarded += 1;
    return true;
  }

  get discardedMessages(): number {
    return this.discarded;
  }

  get hasPartial(): boolean {
    return this.pending.length > 0;
  }
}

function assemble(fragments: StreamEnvelope[]): StreamMessage {
  const first = fragments[0];
  const last = fragments[fragments.length - 1];
  const orderingRange: [number, number] = [first.ordering_number, last.ordering_number];

  if (first.type === "log_record") {
    let message = "";
    for (const fragment of fragments) {
      if (fragment.type === "log_record") {
        message += fragment.payload.message;
      }
    }
    return {
      type: "log_record",
      level: first.payload.level,
      message,
      timestamp: first.payload.timestamp,
      orderingRange,
    };
  }

  if (fragments.length === 1) {
    return { type: "monitor_message", data: first.payload.data, orderingRange };
  }

  let text = "";
  for (const fragment of fragments) {
    if (fragment.type !== "monitor_message" || typeof fragment.payload.data !== "string") {
      throw new MalformedMessageError("fragmented monitor message carries a non-string slice", {
        ordering_number: fragment.ordering_number,
      });
    }
    text += fragment.payload.data;
  }
  try {
    return { type: "monitor_message", data: JSON.parse(text), orderingRange };
  } catch (error) {
    throw new MalformedMessageError("reassembled monitor message is not valid JSON", {
      reason: error instanceof Error ? error.message : String(error),
      ordering_range: orderingRange,
    });
  }
}

const defaultCodec = new EnvelopeCodec();

/** Encodes with the limits resolved from the environment. */
export function encode(envelope: Envelope): Buffer {
  return defaultCodec.encode(envelope);
}

/** Decodes with the limits resolved from the environment. */
export function decode(bytes: Uint8Array): Envelope {
  return defaultCodec.decode(bytes);
}
