import type { CodecLimits, InvokerSettingsOverrides, ResponderSettings, TransportSettingsOverrides } from "./config/protocol.js";
import { readOptionalString } from "./config/env.js";
import { resolveInvokerSettings, resolveNamespace } from "./config/protocol.js";
import type { Manifest } from "./content/model.js";
import type { BlobStore } from "./gateways/blobStore.js";
import { Child } from "./invoker/child.js";
import {
  ChildServiceProxy,
  type AskResult,
  type ChildDescriptor,
  type InvocationSession,
  type InvokerRegistry,
  type QuestionOptions,
} from "./invoker/invoker.js";
import { createLoggerFromEnv, type Logger } from "./logger.js";
import { EnvelopeCodec } from "./protocol/codec.js";
import { CorrelationRegistry } from "./registry/correlationRegistry.js";
import type { AnalysisFunction } from "./responder/analysis.js";
import { ParentServiceResponder } from "./responder/responder.js";
import { TransportAdapter, type SubscribeOptions } from "./transport/adapter.js";
import type { MessageBus } from "./transport/bus.js";
import { assertServiceId } from "./transport/destinations.js";
import { InMemoryBus } from "./transport/memoryBus.js";
import { createRedisStreamsBus } from "./transport/redisStreamsBus.js";
import type { SchemaValidator, ServiceSchema } from "./validation/schemas.js";

export interface RelayServiceOptions {
  readonly serviceId: string;
  readonly bus: MessageBus;
  readonly logger?: Logger;
  readonly namespace?: string;
  readonly codec?: Partial<CodecLimits>;
  readonly transport?: TransportSettingsOverrides;
  readonly invoker?: InvokerSettingsOverrides;
  readonly responder?: Partial<ResponderSettings>;
  readonly validator?: SchemaValidator;
  readonly blobStore?: BlobStore;
  readonly clock?: () => number;
  readonly idFactory?: () => string;
}

export interface ServeOptions {
  readonly schema?: ServiceSchema;
  readonly intake?: Omit<SubscribeOptions, "group" | "serviceId">;
}

/**
 * One service identity on the bus. Asking children and answering parents are
 * both optional: the invoker is created on the first question and the
 * responder by {@link serve}.
 */
export class RelayService {
  readonly serviceId: string;
  readonly namespace: string;
  readonly transport: TransportAdapter;
  readonly registry: InvokerRegistry;
  private readonly options: RelayServiceOptions;
  private readonly logger: Logger;
  private readonly retentionMs: number;
  private proxy: ChildServiceProxy | null = null;
  private responder: ParentServiceResponder | null = null;

  constructor(options: RelayServiceOptions) {
    this.options = options;
    this.serviceId = assertServiceId(options.serviceId);
    this.namespace = resolveNamespace(options.namespace);
    this.logger = options.logger ?? createLoggerFromEnv();
    this.transport = new TransportAdapter({
      bus: options.bus,
      logger: this.logger,
      codec: new EnvelopeCodec(options.codec),
      settings: options.transport,
    });
    this.retentionMs = resolveInvokerSettings(options.invoker).retentionMs;
    this.registry = new CorrelationRegistry<InvocationSession>({ retentionMs: this.retentionMs, clock: options.clock });
  }

  get invoker(): ChildServiceProxy {
    if (!this.proxy) {
      const { options } = this;
      this.proxy = new ChildServiceProxy({
        transport: this.transport,
        logger: this.logger,
        serviceId: this.serviceId,
        namespace: this.namespace,
        settings: options.invoker,
        registry: this.registry,
        validator: options.validator,
        blobStore: options.blobStore,
        clock: options.clock,
        idFactory: options.idFactory,
      });
    }
    return this.proxy;
  }

  /** Starts answering questions addressed to this service with `analysis`. */
  async serve(analysis: AnalysisFunction, options: ServeOptions = {}): Promise<void> {
    if (this.responder) {
      throw new Error(`service '${this.serviceId}' is already serving`);
    }
    const responder = new ParentServiceResponder({
      transport: this.transport,
      logger: this.logger,
      serviceId: this.serviceId,
      analysis,
      schema: options.schema,
      namespace: this.namespace,
      validator: this.options.validator,
      settings: this.options.responder,
      intake: options.intake,
      answeredRetentionMs: this.retentionMs,
      clock: this.options.clock,
    });
    this.responder = responder;
    await responder.start();
  }

  child(descriptor: ChildDescriptor, defaults: QuestionOptions = {}): Child {
    return new Child(this.invoker, descriptor, defaults);
  }

  ask(
    child: ChildDescriptor,
    inputValues: unknown,
    inputManifest: Manifest | null = null,
    options: QuestionOptions = {},
  ): Promise<AskResult> {
    return this.invoker.ask(child, inputValues, inputManifest, options);
  }

  /** Stops answering and asking. The bus stays open; it belongs to the caller. */
  async close(): Promise<void> {
    if (this.responder) {
      await this.responder.stop();
      this.responder = null;
    }
    if (this.proxy) {
      await this.proxy.stop();
    }
    await this.transport.close();
  }
}

/**
 * Picks the bus from the environment: Redis Streams when `RELAY_REDIS_URL` is
 * set, the in-process bus otherwise.
 */
export function createBusFromEnv(logger: Logger = createLoggerFromEnv()): MessageBus {
  const url = readOptionalString("RELAY_REDIS_URL");
  if (url) {
    logger.info("bus_selected", { backend: "redis-streams" });
    return createRedisStreamsBus(url, { logger });
  }
  logger.info("bus_selected", { backend: "in-memory" });
  return new InMemoryBus();
}
