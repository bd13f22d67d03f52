/**
 * Canonical taxonomy of the errors raised by the relay. Each kind records
 * whether the protocol retries it automatically and the default message used
 * when callers omit one. The kind doubles as the `kind` field of `exception`
 * envelopes, so a failure keeps its name when it crosses the bus.
 */
export const RELAY_ERROR_TAXONOMY = {
  ValidationError: { retryable: false, message: "Document failed schema validation" },
  ChecksumMismatchError: { retryable: false, message: "Checksum does not match content" },
  DuplicateNameError: { retryable: false, message: "Duplicate datafile name" },
  InvalidTagError: { retryable: false, message: "Invalid tag" },
  FileLocationError: { retryable: false, message: "Datafile is not available in storage" },
  DatasetNotFoundError: { retryable: false, message: "Dataset not found in manifest" },
  MalformedMessageError: { retryable: false, message: "Malformed message" },
  PayloadTooLargeError: { retryable: false, message: "Payload exceeds the configured limit" },
  TimeoutError: { retryable: true, message: "Invocation timed out" },
  RemoteAnalysisError: { retryable: false, message: "Remote analysis failed" },
  TransportError: { retryable: true, message: "Transport operation failed" },
  UnknownInvocationError: { retryable: false, message: "Unknown correlation id" },
  CancelledError: { retryable: false, message: "Invocation cancelled" },
  DuplicateCorrelationError: { retryable: false, message: "Correlation id already registered" },
  InvalidFilterError: { retryable: false, message: "Invalid filter" },
} as const;

export type RelayErrorKind = keyof typeof RELAY_ERROR_TAXONOMY;

export interface RelayErrorOptions {
  hint?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

/** JSON projection used by logs and `exception` envelopes. */
export interface RelayErrorSnapshot {
  kind: RelayErrorKind;
  message: string;
  retryable: boolean;
  hint?: string;
  details?: Record<string, unknown>;
}

/**
 * Base class for every typed error of the relay. Subclasses only fix the kind
 * and add the fields that make the failure actionable.
 */
export class RelayError extends Error {
  readonly kind: RelayErrorKind;
  readonly retryable: boolean;
  readonly hint?: string;
  readonly details?: Record<string, unknown>;

  constructor(kind: RelayErrorKind, message?: string, options: RelayErrorOptions = {}) {
    const taxonomy = RELAY_ERROR_TAXONOMY[kind];
    super(message ?? taxonomy.message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = kind;
    this.kind = kind;
    this.retryable = taxonomy.retryable;
    if (options.hint !== undefined) {
      this.hint = options.hint;
    }
    if (options.details !== undefined) {
      this.details = options.details;
    }
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): RelayErrorSnapshot {
    return {
      kind: this.kind,
      message: this.message,
      retryable: this.retryable,
      ...(this.hint !== undefined ? { hint: this.hint } : {}),
      ...(this.details !== undefined ? { details: this.details } : {}),
    };
  }
}

/** Issue reported by a schema validator. */
export interface ValidationIssue {
  path: Array<string | number>;
  message: string;
}

/** A document failed its schema; `issues` lists each path that did not match. */
export class ValidationError extends RelayError {
  readonly strand: string | null;
  readonly issues: ValidationIssue[];

  constructor(message?: string, options: RelayErrorOptions & { strand?: string; issues?: ValidationIssue[] } = {}) {
    const issues = options.issues ?? [];
    super("ValidationError", message, {
      ...options,
      details: { ...(options.details ?? {}), strand: options.strand ?? null, issues },
    });
    this.strand = options.strand ?? null;
    this.issues = issues;
  }
}

export class ChecksumMismatchError extends RelayError {
  readonly uri: string;
  readonly expected: string;
  readonly actual: string;

  constructor(uri: string, expected: string, actual: string) {
    super("ChecksumMismatchError", `checksum mismatch for '${uri}': expected ${expected}, got ${actual}`, {
      hint: "re-upload the file or correct the declared checksum",
      details: { uri, expected, actual },
    });
    this.uri = uri;
    this.expected = expected;
    this.actual = actual;
  }
}

export class DuplicateNameError extends RelayError {
  readonly datasetName: string;
  readonly datafileName: string;

  constructor(datasetName: string, datafileName: string) {
    super("DuplicateNameError", `dataset '${datasetName}' already contains a datafile named '${datafileName}'`, {
      details: { dataset: datasetName, datafile: datafileName },
    });
    this.datasetName = datasetName;
    this.datafileName = datafileName;
  }
}

export class InvalidTagError extends RelayError {
  constructor(tag: unknown, reason: string) {
    super("InvalidTagError", `invalid tag ${JSON.stringify(tag)}: ${reason}`, {
      hint: "tags use lowercase letters, digits, ':' and '-' and start and end with a letter or digit",
      details: { tag: typeof tag === "string" ? tag : String(tag) },
    });
  }
}

export class FileLocationError extends RelayError {
  readonly uris: string[];

  constructor(uris: string[]) {
    super("FileLocationError", `${uris.length} datafile(s) missing from storage: ${uris.join(", ")}`, {
      hint: "upload every datafile before sending the manifest",
      details: { uris },
    });
    this.uris = uris;
  }
}

export class DatasetNotFoundError extends RelayError {
  constructor(key: string, available: string[]) {
    super("DatasetNotFoundError", `manifest has no dataset under key '${key}'`, {
      details: { key, available },
    });
  }
}

export class MalformedMessageError extends RelayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("MalformedMessageError", message, details !== undefined ? { details } : {});
  }
}

export class PayloadTooLargeError extends RelayError {
  readonly size: number;
  readonly limit: number;

  constructor(size: number, limit: number, what = "envelope") {
    super("PayloadTooLargeError", `${what} of ${size} bytes exceeds the ${limit} byte limit`, {
      details: { size, limit },
    });
    this.size = size;
    this.limit = limit;
  }
}

/** Every attempt of a logical call ran out of time; `correlationIds` names each attempt. */
export class TimeoutError extends RelayError {
  readonly attempts: number;
  readonly correlationIds: string[];

  constructor(childId: string, attempts: number, correlationIds: string[]) {
    super("TimeoutError", `child '${childId}' did not answer after ${attempts} attempt(s)`, {
      details: { child_id: childId, attempts, correlation_ids: correlationIds },
    });
    this.attempts = attempts;
    this.correlationIds = correlationIds;
  }
}

/** Structured failure reported by a child inside an `exception` envelope. */
export interface RemoteFailure {
  kind: string;
  message: string;
  detail: Record<string, unknown>;
}

export class RemoteAnalysisError extends RelayError {
  readonly remoteKind: string;
  readonly remoteDetail: Record<string, unknown>;
  readonly correlationId: string;

  constructor(correlationId: string, failure: RemoteFailure) {
    super("RemoteAnalysisError", `${failure.kind}: ${failure.message}`, {
      details: { correlation_id: correlationId, remote_kind: failure.kind, remote_detail: failure.detail },
    });
    this.remoteKind = failure.kind;
    this.remoteDetail = failure.detail;
    this.correlationId = correlationId;
  }
}

/** A publish kept failing after the retry policy was exhausted. */
export class TransportError extends RelayError {
  readonly attempts: number;

  constructor(destination: string, attempts: number, cause: unknown) {
    const rootMessage = cause instanceof Error ? cause.message : String(cause ?? "unknown");
    super("TransportError", `publish to '${destination}' failed after ${attempts} attempt(s): ${rootMessage}`, {
      cause,
      details: { destination, attempts },
    });
    this.attempts = attempts;
  }
}

export class UnknownInvocationError extends RelayError {
  constructor(correlationId: string) {
    super("UnknownInvocationError", `no invocation registered for correlation id '${correlationId}'`, {
      details: { correlation_id: correlationId },
    });
  }
}

export class CancelledError extends RelayError {
  constructor(correlationId: string) {
    super("CancelledError", `invocation '${correlationId}' was cancelled`, {
      details: { correlation_id: correlationId },
    });
  }
}

export class DuplicateCorrelationError extends RelayError {
  readonly correlationId: string;

  constructor(correlationId: string) {
    super("DuplicateCorrelationError", `correlation id '${correlationId}' is already registered`, {
      hint: "mint a fresh correlation id for every attempt",
      details: { correlation_id: correlationId },
    });
    this.correlationId = correlationId;
  }
}

/**
 * Raised when a filter name is not `<attribute>__<action>`, names an attribute
 * the filtered objects lack, or asks for an action the attribute's type does
 * not support.
 */
export class InvalidFilterError extends RelayError {
  readonly filterName: string;

  constructor(filterName: string, reason: string, supported: readonly string[] = []) {
    super("InvalidFilterError", `invalid filter '${filterName}': ${reason}`, {
      ...(supported.length > 0 ? { hint: `supported: ${supported.join(", ")}` } : {}),
      details: { filter: filterName, supported: [...supported] },
    });
    this.filterName = filterName;
  }
}

/** Narrows unknown values to a {@link RelayError} of the given kind. */
export function isRelayError<K extends RelayErrorKind>(
  value: unknown,
  kind?: K,
): value is RelayError & { kind: K } {
  return value instanceof RelayError && (kind === undefined || value.kind === kind);
}
