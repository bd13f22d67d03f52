/**
 * Resolution of the protocol knobs shared by the invoker, the responder and
 * the transport adapter. Each value follows the same precedence: explicit
 * option, then the `RELAY_*` environment variable, then the documented
 * default. Values outside the accepted bounds fall through to the next source.
 */
import { readInt, readNumber, readString } from "./env.js";

/** Upper bound accepted for every millisecond setting (one day). */
const MAX_DURATION_MS = 86_400_000;

/** Prefix of every destination name; `RELAY_NAMESPACE`. */
export const DEFAULT_NAMESPACE = "relay.services";
export const DEFAULT_INVOCATION_TIMEOUT_MS = 60_000;
export const DEFAULT_MAX_RETRIES = 2;
export const DEFAULT_RETRY_INITIAL_DELAY_MS = 500;
export const DEFAULT_RETRY_BACKOFF_FACTOR = 2;
export const DEFAULT_RETRY_MAX_DELAY_MS = 10_000;
/** How long a gap in the stream is awaited before it is reported. */
export const DEFAULT_REORDER_TIMEOUT_MS = 2_000;
export const DEFAULT_SWEEP_INTERVAL_MS = 1_000;
/** How long settled invocations and answered questions are remembered. */
export const DEFAULT_RETENTION_MS = 300_000;
// Payloads above this size are split into continuation chunks.
export const DEFAULT_MAX_STREAM_PAYLOAD_BYTES = 64 * 1024;
export const DEFAULT_MAX_ENVELOPE_BYTES = 10_000_000;
export const DEFAULT_PUBLISH_ATTEMPTS = 5;
export const DEFAULT_PUBLISH_INITIAL_DELAY_MS = 100;
export const DEFAULT_PUBLISH_MAX_DELAY_MS = 5_000;
export const DEFAULT_SUBSCRIBE_CONCURRENCY = 8;
export const DEFAULT_FLOW_CREDITS = 64;
export const DEFAULT_MAX_DELIVERY_ATTEMPTS = 5;
export const DEFAULT_ANALYSIS_CONCURRENCY = 2;
/** Zero disables responder heartbeats. */
export const DEFAULT_HEARTBEAT_INTERVAL_MS = 10_000;

/** Exponential backoff curve: `initialDelayMs * backoffFactor^(n-1)`, capped at `maxDelayMs`. */
export interface BackoffPolicy {
  readonly initialDelayMs: number;
  readonly backoffFactor: number;
  readonly maxDelayMs: number;
}

/** Retry policy applied to timed-out invocations. */
export interface RetryPolicy extends BackoffPolicy {
  /** Number of re-sends after the first attempt times out. */
  readonly maxRetries: number;
}

/** Policy bounding the publish attempts performed by the transport adapter. */
export interface PublishRetryPolicy extends BackoffPolicy {
  /** Total attempts, the first one included. */
  readonly attempts: number;
}

/** Parent-side timing: attempt timeout, retries and how long state is kept. */
export interface InvokerSettings {
  readonly timeoutMs: number;
  readonly retry: RetryPolicy;
  readonly reorderTimeoutMs: number;
  readonly sweepIntervalMs: number;
  readonly retentionMs: number;
}

export interface TransportSettings {
  readonly publish: PublishRetryPolicy;
  readonly concurrency: number;
  readonly credits: number;
  readonly maxDeliveryAttempts: number;
}

export interface CodecLimits {
  /** Capped at `maxEnvelopeBytes`. */
  readonly maxStreamPayloadBytes: number;
  readonly maxEnvelopeBytes: number;
}

export interface ResponderSettings {
  /** Analyses run at once; questions beyond it wait unacknowledged. */
  readonly analysisConcurrency: number;
  readonly heartbeatIntervalMs: number;
}

export type InvokerSettingsOverrides = Partial<Omit<InvokerSettings, "retry">> & {
  readonly retry?: Partial<RetryPolicy>;
};

export type TransportSettingsOverrides = Partial<Omit<TransportSettings, "publish">> & {
  readonly publish?: Partial<PublishRetryPolicy>;
};

interface Bounds {
  readonly min: number;
  readonly max: number;
}

/** Keeps explicit values that are finite and within bounds; anything else is ignored. */
function pick(explicit: number | undefined, bounds: Bounds): number | undefined {
  if (explicit === undefined || !Number.isFinite(explicit)) {
    return undefined;
  }
  if (explicit < bounds.min || explicit > bounds.max) {
    return undefined;
  }
  return explicit;
}

function resolveInt(explicit: number | undefined, variable: string, fallback: number, bounds: Bounds): number {
  const chosen = pick(explicit, bounds);
  if (chosen !== undefined) {
    return Math.trunc(chosen);
  }
  return readInt(variable, fallback, bounds);
}

function resolveFactor(explicit: number | undefined, variable: string, fallback: number): number {
  const bounds = { min: 1, max: 100 };
  return pick(explicit, bounds) ?? readNumber(variable, fallback, bounds);
}

/** Explicit namespace when non-blank, else `RELAY_NAMESPACE`, else {@link DEFAULT_NAMESPACE}. */
export function resolveNamespace(explicit?: string): string {
  if (explicit !== undefined && explicit.trim().length > 0) {
    return explicit.trim();
  }
  return readString("RELAY_NAMESPACE", DEFAULT_NAMESPACE);
}

/**
 * Resolves the invoker settings. Nested retry fields resolve one by one, so
 * `{ retry: { maxRetries: 0 } }` keeps the environment's backoff values.
 */
export function resolveInvokerSettings(overrides: InvokerSettingsOverrides = {}): InvokerSettings {
  const retry = overrides.retry ?? {};
  return {
    timeoutMs: resolveInt(overrides.timeoutMs, "RELAY_INVOCATION_TIMEOUT_MS", DEFAULT_INVOCATION_TIMEOUT_MS, {
      min: 1,
      max: MAX_DURATION_MS,
    }),
    retry: {
      maxRetries: resolveInt(retry.maxRetries, "RELAY_MAX_RETRIES", DEFAULT_MAX_RETRIES, { min: 0, max: 100 }),
      initialDelayMs: resolveInt(retry.initialDelayMs, "RELAY_RETRY_INITIAL_DELAY_MS", DEFAULT_RETRY_INITIAL_DELAY_MS, {
        min: 0,
        max: MAX_DURATION_MS,
      }),
      backoffFactor: resolveFactor(retry.backoffFactor, "RELAY_RETRY_BACKOFF_FACTOR", DEFAULT_RETRY_BACKOFF_FACTOR),
      maxDelayMs: resolveInt(retry.maxDelayMs, "RELAY_RETRY_MAX_DELAY_MS", DEFAULT_RETRY_MAX_DELAY_MS, {
        min: 0,
        max: MAX_DURATION_MS,
      }),
    },
    reorderTimeoutMs: resolveInt(overrides.reorderTimeoutMs, "RELAY_REORDER_TIMEOUT_MS", DEFAULT_REORDER_TIMEOUT_MS, {
      min: 0,
      max: MAX_DURATION_MS,
    }),
    sweepIntervalMs: resolveInt(overrides.sweepIntervalMs, "RELAY_SWEEP_INTERVAL_MS", DEFAULT_SWEEP_INTERVAL_MS, {
      min: 1,
      max: MAX_DURATION_MS,
    }),
    retentionMs: resolveInt(overrides.retentionMs, "RELAY_RETENTION_MS", DEFAULT_RETENTION_MS, {
      min: 0,
      max: MAX_DURATION_MS,
    }),
  };
}

export function resolveTransportSettings(overrides: TransportSettingsOverrides = {}): TransportSettings {
  const publish = overrides.publish ?? {};
  return {
    publish: {
      attempts: resolveInt(publish.attempts, "RELAY_PUBLISH_ATTEMPTS", DEFAULT_PUBLISH_ATTEMPTS, { min: 1, max: 100 }),
      initialDelayMs: resolveInt(
        publish.initialDelayMs,
        "RELAY_PUBLISH_INITIAL_DELAY_MS",
        DEFAULT_PUBLISH_INITIAL_DELAY_MS,
        { min: 0, max: MAX_DURATION_MS },
      ),
      backoffFactor: resolveFactor(publish.backoffFactor, "RELAY_PUBLISH_BACKOFF_FACTOR", 2),
      maxDelayMs: resolveInt(publish.maxDelayMs, "RELAY_PUBLISH_MAX_DELAY_MS", DEFAULT_PUBLISH_MAX_DELAY_MS, {
        min: 0,
        max: MAX_DURATION_MS,
      }),
    },
    concurrency: resolveInt(overrides.concurrency, "RELAY_SUBSCRIBE_CONCURRENCY", DEFAULT_SUBSCRIBE_CONCURRENCY, {
      min: 1,
      max: 1_024,
    }),
    credits: resolveInt(overrides.credits, "RELAY_FLOW_CREDITS", DEFAULT_FLOW_CREDITS, { min: 1, max: 65_536 }),
    maxDeliveryAttempts: resolveInt(
      overrides.maxDeliveryAttempts,
      "RELAY_MAX_DELIVERY_ATTEMPTS",
      DEFAULT_MAX_DELIVERY_ATTEMPTS,
      { min: 1, max: 1_000 },
    ),
  };
}

/** Codec size limits; the stream payload limit never exceeds the envelope limit. */
export function resolveCodecLimits(overrides: Partial<CodecLimits> = {}): CodecLimits {
  const maxEnvelopeBytes = resolveInt(overrides.maxEnvelopeBytes, "RELAY_MAX_ENVELOPE_BYTES", DEFAULT_MAX_ENVELOPE_BYTES, {
    min: 1_024,
    max: 1_000_000_000,
  });
  const maxStreamPayloadBytes = Math.min(
    maxEnvelopeBytes,
    resolveInt(overrides.maxStreamPayloadBytes, "RELAY_MAX_STREAM_PAYLOAD_BYTES", DEFAULT_MAX_STREAM_PAYLOAD_BYTES, {
      min: 128,
      max: maxEnvelopeBytes,
    }),
  );
  return { maxStreamPayloadBytes, maxEnvelopeBytes };
}

export function resolveResponderSettings(overrides: Partial<ResponderSettings> = {}): ResponderSettings {
  return {
    analysisConcurrency: resolveInt(
      overrides.analysisConcurrency,
      "RELAY_ANALYSIS_CONCURRENCY",
      DEFAULT_ANALYSIS_CONCURRENCY,
      { min: 1, max: 1_024 },
    ),
    heartbeatIntervalMs: resolveInt(
      overrides.heartbeatIntervalMs,
      "RELAY_HEARTBEAT_INTERVAL_MS",
      DEFAULT_HEARTBEAT_INTERVAL_MS,
      { min: 0, max: MAX_DURATION_MS },
    ),
  };
}
