import type { Buffer } from "node:buffer";

/** String attributes travelling next to the message body. */
export type MessageAttributes = Readonly<Record<string, string>>;

/**
 * One delivery of a message to a subscriber group. A delivery stays
 * unacknowledged until {@link ack} or {@link nack} is called; unacknowledged
 * deliveries are redelivered by the bus.
 */
export interface BusDelivery {
  readonly id: string;
  readonly data: Buffer;
  readonly attributes: MessageAttributes;
  /** 1 for the first delivery, incremented on every redelivery. */
  readonly deliveryAttempt: number;
  ack(): Promise<void>;
  /** Releases the delivery for redelivery. */
  nack(): Promise<void>;
}

export interface BusSubscribeOptions {
  /**
   * Subscriber group. Every group receives every message published to the
   * source; members of one group share the deliveries.
   */
  readonly group: string;
  /** Maximum unacknowledged deliveries handed to this subscriber at once. */
  readonly credits: number;
}

export interface BusSubscription {
  close(): Promise<void>;
}

/**
 * Backend contract of a durable, at-least-once message bus. Delivery order
 * is not guaranteed and a message may be delivered more than once.
 */
export interface MessageBus {
  publish(destination: string, data: Buffer, attributes?: MessageAttributes): Promise<string>;
  subscribe(
    source: string,
    options: BusSubscribeOptions,
    consumer: (delivery: BusDelivery) => void,
  ): Promise<BusSubscription>;
  close(): Promise<void>;
}
