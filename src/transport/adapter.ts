import { resolveTransportSettings, type TransportSettings, type TransportSettingsOverrides } from "../config/protocol.js";
import { TransportError } from "../errors.js";
import { runWithMessageContext } from "../infra/messageContext.js";
import { WorkerPool } from "../infra/workerPool.js";
import type { Logger } from "../logger.js";
import { EnvelopeCodec } from "../protocol/codec.js";
import type { Envelope } from "../protocol/envelope.js";
import { computeBackoffDelay, sleep } from "../runtime/timers.js";
import type { BusDelivery, BusSubscription, MessageAttributes, MessageBus } from "./bus.js";

/** Manual settlement of a delivery whose handler called {@link EnvelopeHandlerMeta.defer}. */
export interface DeliveryControl {
  ack(): Promise<void>;
  /** Redelivers the message, or dead-letters it once the attempts are exhausted. */
  nack(reason?: unknown): Promise<void>;
}

export interface EnvelopeHandlerMeta {
  readonly source: string;
  readonly deliveryId: string;
  readonly deliveryAttempt: number;
  /**
   * Takes over acknowledgement. The worker slot is released when the handler
   * resolves while the delivery keeps its credit until the control settles it.
   */
  defer(): DeliveryControl;
}

export type EnvelopeHandler = (envelope: Envelope, meta: EnvelopeHandlerMeta) => Promise<void> | void;

export interface SubscribeOptions {
  /** Consumer group; members of one group share the deliveries. */
  readonly group: string;
  /** Handlers running at once. */
  readonly concurrency?: number;
  /** Deliveries held before the bus stops handing out more. */
  readonly credits?: number;
  readonly maxDeliveryAttempts?: number;
  /** Receives the raw bytes of malformed and exhausted deliveries. */
  readonly deadLetterDestination?: string;
  /** Service identity exposed to the logger while the handler runs. */
  readonly serviceId?: string;
}

/** Counters of one subscription since it opened. */
export interface SubscriptionStats {
  readonly inFlight: number;
  readonly availableCredits: number;
  readonly processed: number;
  readonly deadLettered: number;
  readonly malformed: number;
  readonly redelivered: number;
}

export interface SubscriptionHandle {
  readonly source: string;
  readonly group: string;
  stats(): SubscriptionStats;
  close(): Promise<void>;
}

export interface TransportAdapterOptions {
  readonly bus: MessageBus;
  readonly logger: Logger;
  readonly codec?: EnvelopeCodec;
  readonly settings?: TransportSettingsOverrides;
}

interface SubscriptionState {
  readonly source: string;
  readonly group: string;
  readonly handler: EnvelopeHandler;
  readonly pool: WorkerPool;
  readonly credits: number;
  readonly maxDeliveryAttempts: number;
  readonly deadLetterDestination?: string;
  readonly serviceId?: string;
  inFlight: number;
  processed: number;
  deadLettered: number;
  malformed: number;
  redelivered: number;
  closed: boolean;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function envelopeAttributes(envelope: Envelope): MessageAttributes {
  return {
    type: envelope.type,
    correlation_id: envelope.correlation_id,
    ordering_number: String(envelope.ordering_number),
    sender_role: envelope.sender_role,
  };
}

/**
 * Bridges protocol envelopes and a {@link MessageBus}. Publishing encodes and
 * retries with exponential backoff; subscribing decodes, runs handlers on a
 * bounded pool and acknowledges only once a handler has finished with the
 * delivery. Malformed bytes never reach a handler and never stop the loop.
 */
export class TransportAdapter {
  readonly codec: EnvelopeCodec;
  readonly settings: TransportSettings;
  private readonly bus: MessageBus;
  private readonly logger: Logger;
  private readonly subscriptions = new Set<SubscriptionHandle>();

  constructor(options: TransportAdapterOptions) {
    this.bus = options.bus;
    this.logger = options.logger;
    this.codec = options.codec ?? new EnvelopeCodec();
    this.settings = resolveTransportSettings(options.settings);
  }

  /**
   * Encodes and publishes `envelope`. Encoding failures surface immediately;
   * bus failures are retried and reported as {@link TransportError} once the
   * attempts are exhausted.
   */
  async publish(destination: string, envelope: Envelope): Promise<string> {
    const bytes = this.codec.encode(envelope);
    const attributes = envelopeAttributes(envelope);
    const policy = this.settings.publish;
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= policy.attempts; attempt += 1) {
      try {
        const messageId = await this.bus.publish(destination, bytes, attributes);
        this.logger.debug("envelope_published", {
          destination,
          message_id: messageId,
          type: envelope.type,
          correlation_id: envelope.correlation_id,
          ordering_number: envelope.ordering_number,
          attempt,
        });
        return messageId;
      } catch (error) {
        lastError = error;
        if (attempt === policy.attempts) {
          break;
        }
        const delayMs = computeBackoffDelay(policy, attempt);
        this.logger.warn("publish_retry_scheduled", {
          destination,
          correlation_id: envelope.correlation_id,
          attempt,
          delay_ms: delayMs,
          reason: describeError(error),
        });
        await sleep(delayMs);
      }
    }

    this.logger.error("publish_failed", {
      destination,
      correlation_id: envelope.correlation_id,
      attempts: policy.attempts,
      reason: describeError(lastError),
    });
    throw new TransportError(destination, policy.attempts, lastError);
  }

  async subscribe(source: string, handler: EnvelopeHandler, options: SubscribeOptions): Promise<SubscriptionHandle> {
    const concurrency = options.concurrency ?? this.settings.concurrency;
    const state: SubscriptionState = {
      source,
      group: options.group,
      handler,
      pool: new WorkerPool(concurrency),
      credits: Math.max(1, Math.floor(options.credits ?? this.settings.credits)),
      maxDeliveryAttempts: Math.max(1, Math.floor(options.maxDeliveryAttempts ?? this.settings.maxDeliveryAttempts)),
      deadLetterDestination: options.deadLetterDestination,
      serviceId: options.serviceId,
      inFlight: 0,
      processed: 0,
      deadLettered: 0,
      malformed: 0,
      redelivered: 0,
      closed: false,
    };

    const subscription: BusSubscription = await this.bus.subscribe(
      source,
      { group: options.group, credits: state.credits },
      (delivery) => this.accept(state, delivery),
    );
    this.logger.info("subscription_opened", {
      source,
      group: options.group,
      concurrency,
      credits: state.credits,
    });

    const handle: SubscriptionHandle = {
      source,
      group: options.group,
      stats: () => ({
        inFlight: state.inFlight,
        availableCredits: Math.max(0, state.credits - state.inFlight),
        processed: state.processed,
        deadLettered: state.deadLettered,
        malformed: state.malformed,
        redelivered: state.redelivered,
      }),
      close: async () => {
        if (state.closed) {
          return;
        }
        state.closed = true;
        this.subscriptions.delete(handle);
        await state.pool.onIdle();
        await subscription.close();
        this.logger.info("subscription_closed", { source, group: options.group, processed: state.processed });
      },
    };
    this.subscriptions.add(handle);
    return handle;
  }

  /** Closes every open subscription. The bus itself is left to its owner. */
  async close(): Promise<void> {
    await Promise.all([...this.subscriptions].map((handle) => handle.close()));
  }

  private accept(state: SubscriptionState, delivery: BusDelivery): void {
    if (state.closed) {
      // Left unsettled: the bus hands it to another member once this one leaves.
      return;
    }
    state.inFlight += 1;
    void state.pool
      .run(() => this.process(state, delivery))
      .catch((error) => {
        this.logger.error("delivery_processing_crashed", {
          source: state.source,
          delivery_id: delivery.id,
          reason: describeError(error),
        });
      });
  }

  private async process(state: SubscriptionState, delivery: BusDelivery): Promise<void> {
    const settlement = this.createSettlement(state, delivery);

    let envelope: Envelope;
    try {
      envelope = this.codec.decode(delivery.data);
    } catch (error) {
      state.malformed += 1;
      this.logger.warn("envelope_malformed", {
        source: state.source,
        delivery_id: delivery.id,
        reason: describeError(error),
      });
      await settlement.deadLetter("malformed", error);
      return;
    }

    if (delivery.deliveryAttempt > 1) {
      state.redelivered += 1;
    }

    let deferred = false;
    const meta: EnvelopeHandlerMeta = {
      source: state.source,
      deliveryId: delivery.id,
      deliveryAttempt: delivery.deliveryAttempt,
      defer: () => {
        deferred = true;
        return { ack: settlement.ack, nack: settlement.nack };
      },
    };

    const context = {
      correlationId: envelope.correlation_id,
      envelopeType: envelope.type,
      serviceId: state.serviceId ?? null,
    };
    try {
      await runWithMessageContext(context, () => state.handler(envelope, meta));
    } catch (error) {
      await settlement.nack(error);
      return;
    }
    if (!deferred) {
      await settlement.ack();
    }
  }

  private createSettlement(state: SubscriptionState, delivery: BusDelivery) {
    let settled = false;
    const claim = (): boolean => {
      if (settled) {
        return false;
      }
      settled = true;
      state.inFlight -= 1;
      return true;
    };

    const settleWith = async (operation: "ack" | "nack"): Promise<void> => {
      try {
        await (operation === "ack" ? delivery.ack() : delivery.nack());
      } catch (error) {
        this.logger.error("delivery_settlement_failed", {
          source: state.source,
          delivery_id: delivery.id,
          operation,
          reason: describeError(error),
        });
      }
    };

    const deadLetter = async (reason: string, cause: unknown): Promise<void> => {
      if (!claim()) {
        return;
      }
      state.deadLettered += 1;
      this.logger.error("delivery_dead_lettered", {
        source: state.source,
        delivery_id: delivery.id,
        delivery_attempt: delivery.deliveryAttempt,
        reason,
        cause: describeError(cause),
      });
      if (state.deadLetterDestination) {
        try {
          await this.bus.publish(state.deadLetterDestination, delivery.data, {
            ...delivery.attributes,
            dead_letter_reason: reason,
            dead_letter_source: state.source,
            delivery_attempt: String(delivery.deliveryAttempt),
          });
        } catch (error) {
          this.logger.error("dead_letter_publish_failed", {
            destination: state.deadLetterDestination,
            delivery_id: delivery.id,
            reason: describeError(error),
          });
        }
      }
      await settleWith("ack");
    };

    const ack = async (): Promise<void> => {
      if (!claim()) {
        return;
      }
      state.processed += 1;
      await settleWith("ack");
    };

    const nack = async (reason?: unknown): Promise<void> => {
      if (settled) {
        return;
      }
      if (delivery.deliveryAttempt >= state.maxDeliveryAttempts) {
        await deadLetter("max_delivery_attempts", reason);
        return;
      }
      claim();
      this.logger.warn("delivery_nacked", {
        source: state.source,
        delivery_id: delivery.id,
        delivery_attempt: delivery.deliveryAttempt,
        reason: describeError(reason),
      });
      await settleWith("nack");
    };

    return { ack, nack, deadLetter };
  }
}
