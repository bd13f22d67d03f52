import { randomUUID } from "node:crypto";

import {
  resolveInvokerSettings,
  resolveNamespace,
  type InvokerSettings,
  type InvokerSettingsOverrides,
  type RetryPolicy,
} from "../config/protocol.js";
import { deserializeManifest, serializeManifest, verifyManifest } from "../content/manifest.js";
import type { Manifest } from "../content/model.js";
import {
  CancelledError,
  RelayError,
  RemoteAnalysisError,
  TimeoutError,
  type RemoteFailure,
} from "../errors.js";
import type { BlobStore } from "../gateways/blobStore.js";
import type { Logger } from "../logger.js";
import type { StreamMessage } from "../protocol/codec.js";
import {
  createEnvelope,
  type Envelope,
  type QuestionPayload,
  type TerminalEnvelope,
} from "../protocol/envelope.js";
import {
  CorrelationRegistry,
  isTerminalState,
  type Invocation,
  type InvocationState,
  type Outcome,
} from "../registry/correlationRegistry.js";
import {
  computeBackoffDelay,
  runtimeClearInterval,
  runtimeClearTimeout,
  runtimeSetInterval,
  runtimeSetTimeout,
  sleep,
  unrefTimer,
  type IntervalHandle,
  type TimeoutHandle,
} from "../runtime/timers.js";
import type { EnvelopeHandlerMeta, SubscriptionHandle, TransportAdapter } from "../transport/adapter.js";
import { answerDestination, assertServiceId, questionDestination } from "../transport/destinations.js";
import { validateStrand, zodSchemaValidator, type SchemaValidator, type ServiceSchema } from "../validation/schemas.js";
import { ReorderBuffer, type ReorderEvent, type SequencedEnvelope } from "./reorderBuffer.js";

/** Identity of a child service and the schema it advertises. */
export interface ChildDescriptor {
  readonly id: string;
  readonly schema?: ServiceSchema;
}

/**
 * Callbacks receiving the child's stream once it is back in order. Messages
 * overtaken by the terminal envelope on the bus arrive after the outcome has
 * settled, up to the reorder timeout.
 */
export interface StreamHandlers {
  onLog?(message: Extract<StreamMessage, { type: "log_record" }>): void;
  onMonitor?(message: Extract<StreamMessage, { type: "monitor_message" }>): void;
  /** Ordering numbers `from..to` were skipped after the reorder timeout. */
  onGap?(from: number, to: number): void;
}

export interface QuestionOptions {
  /** Idle timeout of each attempt; child traffic pushes the deadline. */
  readonly timeoutMs?: number;
  readonly maxRetries?: number;
  readonly childIdentitiesAllowed?: readonly string[];
  readonly handlers?: StreamHandlers;
}

export interface AskResult {
  readonly correlationId: string;
  readonly outputValues: unknown;
  readonly outputManifest: Manifest | null;
}

/** State of one logical call: the original question and its re-sends. */
interface LogicalCall {
  readonly id: string;
  readonly child: ChildDescriptor;
  readonly question: QuestionPayload;
  readonly timeoutMs: number;
  readonly retry: RetryPolicy;
  readonly handlers: StreamHandlers;
  readonly correlationIds: string[];
  readonly settled: Promise<Outcome>;
  readonly notify: (outcome: Outcome) => void;
  outcome: Outcome | null;
  settledAt: number | null;
}

/** Per-invocation state kept in the registry next to the invocation. */
export interface InvocationSession {
  readonly ordering: ReorderBuffer;
  readonly call: LogicalCall;
  reorderTimer: TimeoutHandle | null;
}

export type InvokerRegistry = CorrelationRegistry<InvocationSession>;

export interface InvocationSnapshot {
  readonly correlationId: string;
  readonly logicalCallId: string;
  readonly childId: string;
  readonly attempt: number;
  readonly state: InvocationState;
  readonly deadline: number;
  readonly outcome: Outcome | null;
}

export interface ChildServiceProxyOptions {
  readonly transport: TransportAdapter;
  readonly logger: Logger;
  /** Identity of the calling service; names the answer subscriptions. */
  readonly serviceId: string;
  readonly namespace?: string;
  readonly settings?: InvokerSettingsOverrides;
  readonly registry?: InvokerRegistry;
  readonly validator?: SchemaValidator;
  /** When set, input manifests are checked against storage before sending. */
  readonly blobStore?: BlobStore;
  readonly clock?: () => number;
  readonly idFactory?: () => string;
}

function failureFromError(error: RelayError): RemoteFailure {
  return { kind: error.kind, message: error.message, detail: error.details ?? {} };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Parent side of the protocol. Sends questions to child services, tracks
 * every invocation in the registry and turns the answers, which may arrive
 * late, duplicated or out of order, into one outcome per invocation.
 * Timed-out attempts are re-sent under a fresh correlation id while the
 * logical call follows them.
 */
export class ChildServiceProxy {
  readonly registry: InvokerRegistry;
  readonly settings: InvokerSettings;
  private readonly transport: TransportAdapter;
  private readonly logger: Logger;
  private readonly serviceId: string;
  private readonly namespace: string;
  private readonly validator: SchemaValidator;
  private readonly blobStore: BlobStore | null;
  private readonly clock: () => number;
  private readonly idFactory: () => string;
  /** Answer group unique to this proxy so every parent sees every answer. */
  private readonly answerGroup: string;
  private readonly calls = new Map<string, LogicalCall>();
  private readonly answerSubscriptions = new Map<string, Promise<SubscriptionHandle>>();
  private sweepTimer: IntervalHandle | null = null;
  private started = false;

  constructor(options: ChildServiceProxyOptions) {
    this.transport = options.transport;
    this.logger = options.logger;
    this.serviceId = assertServiceId(options.serviceId);
    this.namespace = resolveNamespace(options.namespace);
    this.settings = resolveInvokerSettings(options.settings);
    this.clock = options.clock ?? (() => Date.now());
    this.registry =
      options.registry ?? new CorrelationRegistry<InvocationSession>({ retentionMs: this.settings.retentionMs, clock: this.clock });
    this.validator = options.validator ?? zodSchemaValidator;
    this.blobStore = options.blobStore ?? null;
    this.idFactory = options.idFactory ?? (() => randomUUID());
    this.answerGroup = `${this.serviceId}.${randomUUID()}`;
  }

  /** Starts the deadline sweeper. Answer subscriptions open on first use. */
  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;
    this.sweepTimer = runtimeSetInterval(() => {
      void this.sweep().catch((error) => {
        this.logger.error("invocation_sweep_failed", { reason: describeError(error) });
      });
    }, this.settings.sweepIntervalMs);
    unrefTimer(this.sweepTimer);
  }

  /**
   * Stops the sweeper, closes the answer subscriptions and releases every
   * waiter with a `CANCELLED` outcome.
   */
  async stop(): Promise<void> {
    if (!this.started) {
      return;
    }
    this.started = false;
    if (this.sweepTimer !== null) {
      runtimeClearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    for (const invocation of this.registry.list()) {
      if (!isTerminalState(invocation.state)) {
        this.finish(invocation, { status: "CANCELLED", correlationId: invocation.correlationId, reason: "invoker stopped" });
      }
      const { session } = invocation;
      if (session.reorderTimer !== null) {
        runtimeClearTimeout(session.reorderTimer);
        session.reorderTimer = null;
      }
    }
    for (const call of this.calls.values()) {
      this.settleCall(call, { status: "CANCELLED", correlationId: call.id, reason: "invoker stopped" });
    }
    const subscriptions = [...this.answerSubscriptions.values()];
    this.answerSubscriptions.clear();
    for (const pending of subscriptions) {
      const handle = await pending;
      await handle.close();
    }
  }

  /**
   * Validates the inputs, registers a `PENDING` invocation and publishes the
   * question. Resolves with the correlation id, which also identifies the
   * logical call, as soon as the question is on the bus.
   */
  async sendQuestion(
    child: ChildDescriptor,
    inputValues: unknown,
    inputManifest: Manifest | null = null,
    options: QuestionOptions = {},
  ): Promise<string> {
    const childId = assertServiceId(child.id);
    const values = validateStrand(this.validator, child.schema, "input_values", inputValues);
    const serialisedManifest = inputManifest ? serializeManifest(inputManifest) : null;
    if (serialisedManifest !== null) {
      validateStrand(this.validator, child.schema, "input_manifest", serialisedManifest);
    }
    if (inputManifest && this.blobStore) {
      await verifyManifest(inputManifest, this.blobStore);
    }

    this.start();
    await this.ensureAnswerSubscription(childId);

    const timeoutMs =
      options.timeoutMs !== undefined && options.timeoutMs > 0 ? options.timeoutMs : this.settings.timeoutMs;
    const maxRetries =
      options.maxRetries !== undefined && options.maxRetries >= 0
        ? Math.trunc(options.maxRetries)
        : this.settings.retry.maxRetries;
    const correlationId = this.idFactory();
    let notify!: (outcome: Outcome) => void;
    const settled = new Promise<Outcome>((resolve) => {
      notify = resolve;
    });
    const call: LogicalCall = {
      id: correlationId,
      child: { id: childId, schema: child.schema },
      question: {
        input_values: values,
        input_manifest: serialisedManifest,
        child_identities_allowed: [...(options.childIdentitiesAllowed ?? [])],
      },
      timeoutMs,
      retry: { ...this.settings.retry, maxRetries },
      handlers: options.handlers ?? {},
      correlationIds: [],
      settled,
      notify,
      outcome: null,
      settledAt: null,
    };
    this.calls.set(call.id, call);

    try {
      await this.sendAttempt(call, correlationId, 1);
    } catch (error) {
      this.calls.delete(call.id);
      this.registry.evict(correlationId);
      throw error;
    }
    return correlationId;
  }

  /** Outcome of one invocation (one attempt). */
  awaitOutcome(correlationId: string): Promise<Outcome> {
    return this.registry.waitFor(correlationId);
  }

  /** Outcome of the logical call started by `sendQuestion`, following its retries. */
  async awaitCall(logicalCallId: string): Promise<Outcome> {
    const call = this.calls.get(logicalCallId);
    if (!call) {
      return this.registry.waitFor(logicalCallId);
    }
    return call.settled;
  }

  poll(correlationId: string): InvocationSnapshot {
    const invocation = this.registry.require(correlationId);
    return {
      correlationId: invocation.correlationId,
      logicalCallId: invocation.logicalCallId,
      childId: invocation.childId,
      attempt: invocation.attempt,
      state: invocation.state,
      deadline: invocation.deadline,
      outcome: invocation.outcome,
    };
  }

  /** Invokes `callback` once the invocation settles. */
  onOutcome(correlationId: string, callback: (outcome: Outcome) => void): void {
    this.registry.require(correlationId);
    void this.registry.waitFor(correlationId).then((outcome) => {
      try {
        callback(outcome);
      } catch (error) {
        this.logger.error("outcome_callback_failed", { correlation_id: correlationId, reason: describeError(error) });
      }
    });
  }

  /**
   * Sends a question and waits for the logical call. Throws
   * {@link RemoteAnalysisError} when the child failed, {@link TimeoutError}
   * once the retries are exhausted and {@link CancelledError} on cancellation.
   */
  async ask(
    child: ChildDescriptor,
    inputValues: unknown,
    inputManifest: Manifest | null = null,
    options: QuestionOptions = {},
  ): Promise<AskResult> {
    const logicalCallId = await this.sendQuestion(child, inputValues, inputManifest, options);
    const outcome = await this.awaitCall(logicalCallId);
    switch (outcome.status) {
      case "COMPLETED":
        return {
          correlationId: outcome.correlationId,
          outputValues: outcome.outputValues,
          outputManifest: outcome.outputManifest,
        };
      case "FAILED":
      case "TIMED_OUT":
        throw outcome.error;
      case "CANCELLED":
        throw new CancelledError(outcome.correlationId);
    }
  }

  /**
   * Local, best-effort cancellation: the child is not told, later envelopes
   * are dropped and waiters receive `CANCELLED`.
   */
  async cancel(correlationId: string): Promise<boolean> {
    const invocation = this.registry.require(correlationId);
    const call = invocation.session.call;
    const outcome: Outcome = { status: "CANCELLED", correlationId, reason: "cancelled by caller" };
    let cancelled = await this.registry.runExclusive(correlationId, () => this.finish(invocation, outcome));

    // The logical call may have moved on to a re-sent attempt.
    const latest = call.correlationIds[call.correlationIds.length - 1];
    const live = latest !== correlationId ? this.registry.get(latest) : undefined;
    if (live) {
      const latestOutcome: Outcome = { status: "CANCELLED", correlationId: latest, reason: "cancelled by caller" };
      cancelled = (await this.registry.runExclusive(latest, () => this.finish(live, latestOutcome))) || cancelled;
    }
    if (call.outcome === null) {
      this.settleCall(call, outcome);
      cancelled = true;
    }
    if (cancelled) {
      this.logger.info("invocation_cancelled", { correlation_id: correlationId, child_id: invocation.childId });
    }
    return cancelled;
  }

  /** Runs one sweeper pass; exposed for callers driving time themselves. */
  async sweep(): Promise<void> {
    const now = this.clock();
    for (const invocation of this.registry.sweepExpired(now)) {
      await this.registry.runExclusive(invocation.correlationId, () => this.expire(invocation, now));
    }
    this.registry.evictResolved(now);
    for (const [id, call] of this.calls) {
      if (call.settledAt !== null && call.settledAt + this.settings.retentionMs <= now) {
        this.calls.delete(id);
      }
    }
  }

  private async ensureAnswerSubscription(childId: string): Promise<void> {
    let pending = this.answerSubscriptions.get(childId);
    if (!pending) {
      pending = this.transport.subscribe(
        answerDestination(this.namespace, childId),
        (envelope, meta) => this.handleAnswer(envelope, meta),
        { group: this.answerGroup, serviceId: this.serviceId },
      );
      this.answerSubscriptions.set(childId, pending);
      pending.catch(() => {
        this.answerSubscriptions.delete(childId);
      });
    }
    await pending;
  }

  private async sendAttempt(call: LogicalCall, correlationId: string, attempt: number): Promise<void> {
    const now = this.clock();
    const session: InvocationSession = {
      ordering: new ReorderBuffer(this.settings.reorderTimeoutMs),
      call,
      reorderTimer: null,
    };
    this.registry.create(correlationId, call.child.id, now + call.timeoutMs, {
      session,
      logicalCallId: call.id,
      attempt,
      retriesRemaining: call.retry.maxRetries - (attempt - 1),
    });
    call.correlationIds.push(correlationId);

    const envelope = createEnvelope(
      "question",
      { correlation_id: correlationId, ordering_number: 0, sender_role: "parent" },
      call.question,
    );
    await this.transport.publish(questionDestination(this.namespace, call.child.id), envelope);
    this.logger.info("question_published", {
      correlation_id: correlationId,
      logical_call_id: call.id,
      child_id: call.child.id,
      attempt,
    });
  }

  private async handleAnswer(envelope: Envelope, meta: EnvelopeHandlerMeta): Promise<void> {
    if (envelope.sender_role !== "child" || envelope.type === "question") {
      this.logger.warn("envelope_misrouted", {
        source: meta.source,
        type: envelope.type,
        sender_role: envelope.sender_role,
      });
      return;
    }
    const invocation = this.registry.get(envelope.correlation_id);
    if (!invocation) {
      // Another parent's answer on the shared channel, or one evicted long ago.
      this.logger.debug("answer_unknown_correlation", { type: envelope.type });
      return;
    }
    await this.registry.runExclusive(invocation.correlationId, () => this.applyAnswer(invocation, envelope));
  }

  private applyAnswer(invocation: Invocation<InvocationSession>, envelope: Envelope): void {
    if (envelope.type === "question") {
      return;
    }
    const now = this.clock();
    const { ordering, call } = invocation.session;
    if (isTerminalState(invocation.state)) {
      // Stream envelopes overtaken by the terminal one still fill their slots.
      if (!ordering.draining || envelope.type === "result" || envelope.type === "exception") {
        this.logger.debug("answer_after_terminal", {
          type: envelope.type,
          ordering_number: envelope.ordering_number,
          state: invocation.state,
        });
        return;
      }
      this.releaseInOrder(invocation, envelope, now);
      return;
    }

    if (invocation.state === "PENDING") {
      this.registry.transition(invocation.correlationId, "RUNNING");
      this.logger.debug("invocation_running", { child_id: invocation.childId });
    }

    if (envelope.type === "result" || envelope.type === "exception") {
      this.deliverEvents(call, ordering.close(envelope.ordering_number, now));
      this.finish(invocation, this.terminalOutcome(invocation, envelope));
      this.scheduleReorderTimer(invocation);
      return;
    }

    this.registry.touch(invocation.correlationId, now + call.timeoutMs);
    this.releaseInOrder(invocation, envelope, now);
  }

  private releaseInOrder(invocation: Invocation<InvocationSession>, envelope: SequencedEnvelope, now: number): void {
    const { ordering, call } = invocation.session;
    const events = ordering.push(envelope, now);
    if (events === null) {
      this.logger.debug("envelope_duplicate", { type: envelope.type, ordering_number: envelope.ordering_number });
      return;
    }
    this.deliverEvents(call, events);
    this.scheduleReorderTimer(invocation);
  }

  private terminalOutcome(invocation: Invocation<InvocationSession>, envelope: TerminalEnvelope): Outcome {
    const correlationId = invocation.correlationId;
    if (envelope.type === "exception") {
      const failure: RemoteFailure = {
        kind: envelope.payload.kind,
        message: envelope.payload.message,
        detail: envelope.payload.detail,
      };
      return { status: "FAILED", correlationId, failure, error: new RemoteAnalysisError(correlationId, failure) };
    }
    try {
      const manifest =
        envelope.payload.output_manifest === null ? null : deserializeManifest(envelope.payload.output_manifest);
      return {
        status: "COMPLETED",
        correlationId,
        outputValues: envelope.payload.output_values,
        outputManifest: manifest,
      };
    } catch (error) {
      if (!(error instanceof RelayError)) {
        throw error;
      }
      return { status: "FAILED", correlationId, failure: failureFromError(error), error };
    }
  }

  /** Resolves the invocation and, unless a retry takes over, its logical call. */
  private finish(invocation: Invocation<InvocationSession>, outcome: Outcome): boolean {
    const session = invocation.session;
    if (!this.registry.resolve(invocation.correlationId, outcome)) {
      return false;
    }
    if (session.reorderTimer !== null) {
      runtimeClearTimeout(session.reorderTimer);
      session.reorderTimer = null;
    }
    const fields = { correlation_id: invocation.correlationId, child_id: invocation.childId, attempt: invocation.attempt };
    switch (outcome.status) {
      case "COMPLETED":
        this.logger.info("invocation_completed", fields);
        break;
      case "FAILED":
        this.logger.warn("invocation_failed", { ...fields, kind: outcome.failure.kind, message: outcome.failure.message });
        break;
      case "TIMED_OUT":
        this.logger.warn("invocation_timed_out", { ...fields, retries_remaining: invocation.retriesRemaining });
        break;
      case "CANCELLED":
        break;
    }
    if (outcome.status !== "TIMED_OUT" || invocation.retriesRemaining <= 0) {
      this.settleCall(session.call, outcome);
    }
    return true;
  }

  private expire(invocation: Invocation<InvocationSession>, now: number): void {
    if (isTerminalState(invocation.state) || invocation.deadline > now) {
      return;
    }
    const { call } = invocation.session;
    const attempts = invocation.attempt;
    const exhausted = invocation.retriesRemaining <= 0;
    const error = exhausted
      ? new TimeoutError(call.child.id, attempts, [...call.correlationIds])
      : new TimeoutError(call.child.id, 1, [invocation.correlationId]);
    this.finish(invocation, { status: "TIMED_OUT", correlationId: invocation.correlationId, error });
    if (!exhausted) {
      void this.retry(call, attempts + 1).catch((retryError) => {
        this.logger.error("invocation_retry_crashed", { logical_call_id: call.id, reason: describeError(retryError) });
      });
    }
  }

  private async retry(call: LogicalCall, attempt: number): Promise<void> {
    const delayMs = computeBackoffDelay(call.retry, attempt - 1);
    this.logger.info("invocation_retry_scheduled", {
      logical_call_id: call.id,
      child_id: call.child.id,
      attempt,
      delay_ms: delayMs,
    });
    await sleep(delayMs);
    if (call.outcome !== null || !this.started) {
      return;
    }
    const correlationId = this.idFactory();
    try {
      await this.sendAttempt(call, correlationId, attempt);
    } catch (error) {
      const relayError =
        error instanceof RelayError ? error : new RelayError("TransportError", describeError(error), { cause: error });
      const outcome: Outcome = {
        status: "FAILED",
        correlationId,
        failure: failureFromError(relayError),
        error: relayError,
      };
      const invocation = this.registry.get(correlationId);
      if (invocation) {
        this.finish(invocation, outcome);
      } else {
        this.settleCall(call, outcome);
      }
    }
  }

  private settleCall(call: LogicalCall, outcome: Outcome): void {
    if (call.outcome !== null) {
      return;
    }
    call.outcome = outcome;
    call.settledAt = this.clock();
    call.notify(outcome);
  }

  private scheduleReorderTimer(invocation: Invocation<InvocationSession>): void {
    const session = invocation.session;
    const deadline = session.ordering.deadline();
    if (session.reorderTimer !== null) {
      runtimeClearTimeout(session.reorderTimer);
      session.reorderTimer = null;
    }
    if (deadline === null) {
      return;
    }
    session.reorderTimer = runtimeSetTimeout(() => {
      session.reorderTimer = null;
      void this.registry
        .runExclusive(invocation.correlationId, () => {
          if (isTerminalState(invocation.state) && !session.ordering.draining) {
            return;
          }
          this.deliverEvents(session.call, session.ordering.expire(this.clock()));
          this.scheduleReorderTimer(invocation);
        })
        .catch((error) => {
          this.logger.error("reorder_timer_failed", { reason: describeError(error) });
        });
    }, Math.max(0, deadline - this.clock()));
    unrefTimer(session.reorderTimer);
  }

  private deliverEvents(call: LogicalCall, events: ReorderEvent[]): void {
    const { handlers } = call;
    for (const event of events) {
      try {
        switch (event.kind) {
          case "message":
            if (event.message.type === "log_record") {
              handlers.onLog?.(event.message);
            } else {
              handlers.onMonitor?.(event.message);
            }
            break;
          case "gap":
            this.logger.warn("stream_gap", { from: event.from, to: event.to });
            handlers.onGap?.(event.from, event.to);
            break;
          case "partial_discarded":
            this.logger.warn("stream_partial_discarded", {});
            break;
          case "invalid":
            this.logger.warn("stream_message_invalid", { ordering_number: event.orderingNumber, reason: event.reason });
            break;
        }
      } catch (error) {
        this.logger.error("stream_handler_failed", { kind: event.kind, reason: describeError(error) });
      }
    }
  }
}
