import { Buffer } from "node:buffer";

import { runtimeSetTimeout } from "../runtime/timers.js";
import type { BusDelivery, BusSubscribeOptions, BusSubscription, MessageAttributes, MessageBus } from "./bus.js";

interface StoredMessage {
  readonly id: string;
  readonly data: Buffer;
  readonly attributes: MessageAttributes;
  attempts: number;
}

interface InFlightDelivery {
  settled: boolean;
  readonly message: StoredMessage;
}

interface ConsumerState {
  readonly consumer: (delivery: BusDelivery) => void;
  readonly credits: number;
  readonly unsettled: Set<InFlightDelivery>;
  closed: boolean;
}

interface GroupState {
  readonly queue: StoredMessage[];
  readonly consumers: ConsumerState[];
  cursor: number;
  scheduled: boolean;
}

interface DestinationState {
  readonly groups: Map<string, GroupState>;
  /** Messages published before any group subscribed; handed to the first group. */
  backlog: StoredMessage[];
}

export interface PublishedRecord {
  readonly destination: string;
  readonly id: string;
  readonly data: Buffer;
  readonly attributes: MessageAttributes;
}

export interface InMemoryBusOptions {
  /** Delivers every message twice, exercising at-least-once handling. */
  readonly duplicateDeliveries?: boolean;
  /** Inserts each message at a random queue position instead of the tail. */
  readonly shuffleDeliveries?: boolean;
  /** Delay before a nacked delivery becomes visible again. */
  readonly redeliveryDelayMs?: number;
}

/**
 * In-process bus with the delivery guarantees of the real backends: fan-out
 * per subscriber group, credit-bounded in-flight deliveries, redelivery of
 * nacked or abandoned deliveries. Faults can be injected to exercise the
 * retry and deduplication paths.
 */
export class InMemoryBus implements MessageBus {
  readonly published: PublishedRecord[] = [];
  private readonly destinations = new Map<string, DestinationState>();
  private readonly duplicateDeliveries: boolean;
  private readonly shuffleDeliveries: boolean;
  private readonly redeliveryDelayMs: number;
  private nextId = 1;
  private pendingFailures: Error[] = [];
  private closed = false;

  constructor(options: InMemoryBusOptions = {}) {
    this.duplicateDeliveries = options.duplicateDeliveries ?? false;
    this.shuffleDeliveries = options.shuffleDeliveries ?? false;
    this.redeliveryDelayMs = Math.max(0, options.redeliveryDelayMs ?? 0);
  }

  /** Makes the next `count` publish calls fail with a transient error. */
  failNextPublishes(count: number, error: Error = new Error("transient publish failure")): void {
    for (let index = 0; index < count; index += 1) {
      this.pendingFailures.push(error);
    }
  }

  async publish(destination: string, data: Buffer, attributes: MessageAttributes = {}): Promise<string> {
    if (this.closed) {
      throw new Error("bus is closed");
    }
    const failure = this.pendingFailures.shift();
    if (failure) {
      throw failure;
    }

    const id = String(this.nextId);
    this.nextId += 1;
    const copy = Buffer.from(data);
    this.published.push({ destination, id, data: copy, attributes: { ...attributes } });

    const state = this.ensureDestination(destination);
    const message = (): StoredMessage => ({ id, data: copy, attributes: { ...attributes }, attempts: 0 });
    if (state.groups.size === 0) {
      state.backlog.push(message());
      return id;
    }
    for (const group of state.groups.values()) {
      this.enqueue(group, message());
      if (this.duplicateDeliveries) {
        this.enqueue(group, message());
      }
      this.schedule(group);
    }
    return id;
  }

  async subscribe(
    source: string,
    options: BusSubscribeOptions,
    consumer: (delivery: BusDelivery) => void,
  ): Promise<BusSubscription> {
    if (this.closed) {
      throw new Error("bus is closed");
    }
    const state = this.ensureDestination(source);
    let group = state.groups.get(options.group);
    if (!group) {
      group = { queue: state.backlog, consumers: [], cursor: 0, scheduled: false };
      state.backlog = [];
      state.groups.set(options.group, group);
    }

    const consumerState: ConsumerState = {
      consumer,
      credits: Math.max(1, Math.floor(options.credits)),
      unsettled: new Set(),
      closed: false,
    };
    group.consumers.push(consumerState);
    const owner = group;
    this.schedule(owner);

    return {
      close: async () => {
        if (consumerState.closed) {
          return;
        }
        consumerState.closed = true;
        owner.consumers.splice(owner.consumers.indexOf(consumerState), 1);
        // A subscriber going away without settling is a crash from the bus'
        // point of view: its deliveries become visible again.
        for (const inFlight of consumerState.unsettled) {
          inFlight.settled = true;
          this.requeue(owner, inFlight.message);
        }
        consumerState.unsettled.clear();
      },
    };
  }

  /** Messages waiting for a consumer in the given group. */
  depth(destination: string, group: string): number {
    return this.destinations.get(destination)?.groups.get(group)?.queue.length ?? 0;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.destinations.clear();
  }

  private ensureDestination(destination: string): DestinationState {
    let state = this.destinations.get(destination);
    if (!state) {
      state = { groups: new Map(), backlog: [] };
      this.destinations.set(destination, state);
    }
    return state;
  }

  private enqueue(group: GroupState, message: StoredMessage): void {
    if (this.shuffleDeliveries && group.queue.length > 0) {
      const position = Math.floor(Math.random() * (group.queue.length + 1));
      group.queue.splice(position, 0, message);
      return;
    }
    group.queue.push(message);
  }

  private schedule(group: GroupState): void {
    if (group.scheduled) {
      return;
    }
    group.scheduled = true;
    queueMicrotask(() => {
      group.scheduled = false;
      this.pump(group);
    });
  }

  private pump(group: GroupState): void {
    while (group.queue.length > 0 && !this.closed) {
      const consumer = this.pickConsumer(group);
      if (!consumer) {
        return;
      }
      const message = group.queue.shift();
      if (!message) {
        return;
      }
      this.deliver(group, consumer, message);
    }
  }

  private deliver(group: GroupState, consumer: ConsumerState, message: StoredMessage): void {
    message.attempts += 1;
    const inFlight: InFlightDelivery = { settled: false, message };
    consumer.unsettled.add(inFlight);

    const settle = (): boolean => {
      if (inFlight.settled) {
        return false;
      }
      inFlight.settled = true;
      consumer.unsettled.delete(inFlight);
      this.schedule(group);
      return true;
    };

    const delivery: BusDelivery = {
      id: message.id,
      data: Buffer.from(message.data),
      attributes: message.attributes,
      deliveryAttempt: message.attempts,
      ack: async () => {
        settle();
      },
      nack: async () => {
        if (settle()) {
          this.requeue(group, message);
        }
      },
    };

    try {
      consumer.consumer(delivery);
    } catch {
      // A throwing consumer never took ownership of the delivery.
      if (settle()) {
        this.requeue(group, message);
      }
    }
  }

  private requeue(group: GroupState, message: StoredMessage): void {
    const release = () => {
      this.enqueue(group, message);
      this.schedule(group);
    };
    if (this.redeliveryDelayMs > 0) {
      runtimeSetTimeout(release, this.redeliveryDelayMs);
    } else {
      release();
    }
  }

  private pickConsumer(group: GroupState): ConsumerState | null {
    const count = group.consumers.length;
    for (let offset = 0; offset < count; offset += 1) {
      const index = (group.cursor + offset) % count;
      const candidate = group.consumers[index];
      if (!candidate.closed && candidate.unsettled.size < candidate.credits) {
        group.cursor = (index + 1) % count;
        return candidate;
      }
    }
    return null;
  }
}
