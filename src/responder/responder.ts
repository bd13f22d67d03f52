import {
  DEFAULT_RETENTION_MS,
  resolveNamespace,
  resolveResponderSettings,
  type ResponderSettings,
} from "../config/protocol.js";
import { deserializeManifest, serializeManifest } from "../content/manifest.js";
import type { Manifest } from "../content/model.js";
import { runWithMessageContext } from "../infra/messageContext.js";
import { WorkerPool } from "../infra/workerPool.js";
import type { Logger } from "../logger.js";
import type { Envelope, QuestionEnvelope } from "../protocol/envelope.js";
import {
  runtimeClearInterval,
  runtimeSetInterval,
  unrefTimer,
  type IntervalHandle,
} from "../runtime/timers.js";
import type {
  DeliveryControl,
  EnvelopeHandlerMeta,
  SubscribeOptions,
  SubscriptionHandle,
  TransportAdapter,
} from "../transport/adapter.js";
import {
  answerDestination,
  assertServiceId,
  deadLetterDestination,
  questionDestination,
} from "../transport/destinations.js";
import { validateStrand, zodSchemaValidator, type SchemaValidator, type ServiceSchema } from "../validation/schemas.js";
import {
  AnswerChannel,
  exceptionPayload,
  type AnalysisContext,
  type AnalysisFunction,
  type TerminalAnswer,
} from "./analysis.js";

export interface ParentServiceResponderOptions {
  readonly transport: TransportAdapter;
  readonly logger: Logger;
  readonly serviceId: string;
  readonly analysis: AnalysisFunction;
  readonly schema?: ServiceSchema;
  readonly namespace?: string;
  readonly validator?: SchemaValidator;
  readonly settings?: Partial<ResponderSettings>;
  /** Intake tuning forwarded to the question subscription. */
  readonly intake?: Omit<SubscribeOptions, "group" | "serviceId">;
  /** How long answered correlation ids are remembered for deduplication. */
  readonly answeredRetentionMs?: number;
  readonly clock?: () => number;
}

export interface ResponderStats {
  readonly running: number;
  readonly answered: number;
  readonly duplicates: number;
}

interface RunningQuestion {
  readonly controller: AbortController;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Child side of the protocol. Takes questions from the service's question
 * destination, runs the analysis on its own pool and answers on the service's
 * answer destination. A question is acknowledged only once its terminal
 * envelope is on the bus, and a correlation id is answered at most once per
 * retention window.
 */
export class ParentServiceResponder {
  readonly settings: ResponderSettings;
  private readonly transport: TransportAdapter;
  private readonly logger: Logger;
  private readonly serviceId: string;
  private readonly namespace: string;
  private readonly analysis: AnalysisFunction;
  private readonly schema: ServiceSchema | undefined;
  private readonly validator: SchemaValidator;
  private readonly intake: Omit<SubscribeOptions, "group" | "serviceId">;
  private readonly answeredRetentionMs: number;
  private readonly clock: () => number;
  private readonly analysisPool: WorkerPool;
  private readonly running = new Map<string, RunningQuestion>();
  /** Correlation id to the time its terminal envelope was published. */
  private readonly answered = new Map<string, number>();
  private subscription: SubscriptionHandle | null = null;
  private duplicates = 0;

  constructor(options: ParentServiceResponderOptions) {
    this.transport = options.transport;
    this.logger = options.logger;
    this.serviceId = assertServiceId(options.serviceId);
    this.namespace = resolveNamespace(options.namespace);
    this.analysis = options.analysis;
    this.schema = options.schema;
    this.validator = options.validator ?? zodSchemaValidator;
    this.settings = resolveResponderSettings(options.settings);
    this.intake = options.intake ?? {};
    this.answeredRetentionMs = Math.max(0, options.answeredRetentionMs ?? DEFAULT_RETENTION_MS);
    this.clock = options.clock ?? (() => Date.now());
    this.analysisPool = new WorkerPool(this.settings.analysisConcurrency);
  }

  get questionSource(): string {
    return questionDestination(this.namespace, this.serviceId);
  }

  get answerDestination(): string {
    return answerDestination(this.namespace, this.serviceId);
  }

  async start(): Promise<void> {
    if (this.subscription) {
      return;
    }
    const source = this.questionSource;
    this.subscription = await this.transport.subscribe(
      source,
      (envelope, meta) => this.handleQuestion(envelope, meta),
      {
        deadLetterDestination: deadLetterDestination(source),
        ...this.intake,
        group: this.serviceId,
        serviceId: this.serviceId,
      },
    );
    this.logger.info("responder_started", { service_id: this.serviceId, source });
  }

  /**
   * Stops taking questions, aborts the running analyses and waits for them to
   * settle. An aborted analysis publishes no terminal envelope and leaves its
   * question unacknowledged, so the bus hands it to another responder.
   */
  async stop(): Promise<void> {
    const subscription = this.subscription;
    this.subscription = null;
    for (const question of this.running.values()) {
      question.controller.abort();
    }
    if (subscription) {
      await subscription.close();
    }
    await this.analysisPool.onIdle();
    this.logger.info("responder_stopped", { service_id: this.serviceId });
  }

  stats(): ResponderStats {
    return { running: this.running.size, answered: this.answered.size, duplicates: this.duplicates };
  }

  private handleQuestion(envelope: Envelope, meta: EnvelopeHandlerMeta): void {
    if (envelope.type !== "question" || envelope.sender_role !== "parent") {
      this.logger.warn("envelope_misrouted", {
        source: meta.source,
        type: envelope.type,
        sender_role: envelope.sender_role,
      });
      return;
    }
    const correlationId = envelope.correlation_id;
    this.pruneAnswered();
    if (this.answered.has(correlationId)) {
      this.duplicates += 1;
      this.logger.info("question_already_answered", { delivery_attempt: meta.deliveryAttempt });
      return;
    }
    if (this.running.has(correlationId)) {
      this.duplicates += 1;
      this.logger.info("question_redelivery_ignored", { delivery_attempt: meta.deliveryAttempt });
      return;
    }

    const control = meta.defer();
    const question: RunningQuestion = { controller: new AbortController() };
    this.running.set(correlationId, question);
    this.logger.info("question_received", { delivery_attempt: meta.deliveryAttempt });

    const context = { correlationId, serviceId: this.serviceId, envelopeType: envelope.type };
    void this.analysisPool
      .run(() => runWithMessageContext(context, () => this.answer(envelope, question, control)))
      .catch((error) => {
        this.running.delete(correlationId);
        this.logger.error("question_processing_crashed", { correlation_id: correlationId, reason: describeError(error) });
        return control.nack(error);
      });
  }

  private async answer(envelope: QuestionEnvelope, question: RunningQuestion, control: DeliveryControl): Promise<void> {
    const correlationId = envelope.correlation_id;
    const channel = new AnswerChannel(this.transport, this.answerDestination, correlationId, this.logger);
    let heartbeat: IntervalHandle | null = null;
    if (this.settings.heartbeatIntervalMs > 0) {
      heartbeat = runtimeSetInterval(() => {
        void channel.heartbeat(this.clock());
      }, this.settings.heartbeatIntervalMs);
      unrefTimer(heartbeat);
    }

    let answer: TerminalAnswer;
    try {
      answer = await this.evaluate(envelope, question, channel);
    } finally {
      if (heartbeat !== null) {
        runtimeClearInterval(heartbeat);
      }
    }

    if (question.controller.signal.aborted) {
      this.running.delete(correlationId);
      this.logger.warn("analysis_abandoned", { type: answer.type, messages: channel.allocated });
      return;
    }

    try {
      await channel.terminal(answer);
    } catch (error) {
      this.running.delete(correlationId);
      this.logger.error("answer_publish_failed", { type: answer.type, reason: describeError(error) });
      await control.nack(error);
      return;
    }
    this.answered.set(correlationId, this.clock());
    this.running.delete(correlationId);
    this.logger.info("question_answered", { type: answer.type, messages: channel.allocated });
    await control.ack();
  }

  /** Validates, runs the analysis and turns whatever happened into a terminal answer. */
  private async evaluate(
    envelope: QuestionEnvelope,
    question: RunningQuestion,
    channel: AnswerChannel,
  ): Promise<TerminalAnswer> {
    const { payload } = envelope;
    try {
      const inputValues = validateStrand(this.validator, this.schema, "input_values", payload.input_values);
      let inputManifest: Manifest | null = null;
      if (payload.input_manifest !== null) {
        validateStrand(this.validator, this.schema, "input_manifest", payload.input_manifest);
        inputManifest = deserializeManifest(payload.input_manifest);
      }

      const context: AnalysisContext = {
        correlationId: envelope.correlation_id,
        inputValues,
        inputManifest,
        childIdentitiesAllowed: payload.child_identities_allowed,
        signal: question.controller.signal,
        log: (level, message) => channel.log(level, message, this.clock()),
        monitor: (data) => channel.monitor(data),
      };
      const result = (await this.analysis(context)) ?? {};

      const outputValues = validateStrand(this.validator, this.schema, "output_values", result.outputValues ?? null);
      const outputManifest = result.outputManifest ? serializeManifest(result.outputManifest) : null;
      if (outputManifest !== null) {
        validateStrand(this.validator, this.schema, "output_manifest", outputManifest);
      }
      return { type: "result", payload: { output_values: outputValues, output_manifest: outputManifest } };
    } catch (error) {
      const failure = exceptionPayload(error);
      this.logger.warn("analysis_failed", { kind: failure.kind, message: failure.message });
      return { type: "exception", payload: failure };
    }
  }

  private pruneAnswered(): void {
    const horizon = this.clock() - this.answeredRetentionMs;
    for (const [correlationId, answeredAt] of this.answered) {
      if (answeredAt > horizon) {
        break;
      }
      this.answered.delete(correlationId);
    }
  }
}
