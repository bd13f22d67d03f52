import { Buffer } from "node:buffer";
import { randomUUID } from "node:crypto";

import { Redis } from "ioredis";
import { z } from "zod";

import type { Logger } from "../logger.js";
import {
  runtimeClearInterval,
  runtimeSetInterval,
  sleep,
  unrefTimer,
  type IntervalHandle,
} from "../runtime/timers.js";
import type { BusDelivery, BusSubscribeOptions, BusSubscription, MessageAttributes, MessageBus } from "./bus.js";

export type RedisArgument = string | Buffer | number;

/**
 * The subset of an ioredis connection used by the bus. Commands go through
 * `call` so replies are parsed from `unknown` rather than trusted.
 */
export interface RedisCommandClient {
  call(command: string, args: RedisArgument[]): Promise<unknown>;
  /** Opens a second connection for blocking reads. */
  duplicate(): RedisCommandClient;
  quit(): Promise<unknown>;
}

/** Adapts an ioredis connection; `duplicate` opens a sibling connection. */
export function fromIoredis(redis: Redis): RedisCommandClient {
  return {
    call: (command, args) => redis.call(command, args),
    duplicate: () => fromIoredis(redis.duplicate()),
    quit: () => redis.quit(),
  };
}

/**
 * Opens a connection to `url` and wraps it. Blocking reads need
 * `maxRetriesPerRequest: null`, otherwise ioredis fails them on reconnect.
 */
export function createRedisStreamsBus(url: string, options: RedisStreamsBusOptions): RedisStreamsBus {
  const redis = new Redis(url, { maxRetriesPerRequest: null, lazyConnect: false });
  return new RedisStreamsBus(fromIoredis(redis), options);
}

export interface RedisStreamsBusOptions {
  readonly logger: Logger;
  /** Prefix of every stream key. */
  readonly keyPrefix?: string;
  /** Consumer name inside the groups; defaults to a random id per process. */
  readonly consumerName?: string;
  readonly blockMs?: number;
  /** Pending entries idle for longer than this are claimed from crashed consumers. */
  readonly claimIdleMs?: number;
  /**
   * Period of the pending-list upkeep: entries held here have their idle time
   * reset, then stale entries are claimed. Capped at half of `claimIdleMs`.
   */
  readonly claimIntervalMs?: number;
  /** Approximate cap applied to each stream with `MAXLEN ~`. */
  readonly maxStreamLength?: number;
  /** Pause after a failed read before trying again. */
  readonly errorBackoffMs?: number;
}

interface StreamEntry {
  readonly id: string;
  readonly data: Buffer;
  readonly attributes: MessageAttributes;
}

interface SubscriptionLoop {
  readonly key: string;
  readonly group: string;
  readonly credits: number;
  readonly reader: RedisCommandClient;
  readonly consumer: (delivery: BusDelivery) => void;
  /** Entry ids handed to the consumer and not yet settled. */
  readonly local: Set<string>;
  claimTimer: IntervalHandle | null;
  creditWaiter: (() => void) | null;
  closed: boolean;
}

const AttributesSchema = z.record(z.string());

function isBusyGroupError(error: unknown): boolean {
  return error instanceof Error && error.message.startsWith("BUSYGROUP");
}

function toText(value: unknown): string | null {
  if (typeof value === "string") {
    return value;
  }
  if (Buffer.isBuffer(value)) {
    return value.toString("utf8");
  }
  return null;
}

function parseAttributes(text: string): MessageAttributes {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return {};
  }
  const parsed = AttributesSchema.safeParse(raw);
  return parsed.success ? parsed.data : {};
}

/** Parses `[id, [field, value, ...]]`; returns null for deleted entries. */
export function parseStreamEntry(raw: unknown): StreamEntry | null {
  if (!Array.isArray(raw) || raw.length < 2) {
    return null;
  }
  const id = toText(raw[0]);
  const fields: unknown = raw[1];
  if (id === null || !Array.isArray(fields)) {
    return null;
  }
  let data: string | null = null;
  let attributes: MessageAttributes = {};
  for (let index = 0; index + 1 < fields.length; index += 2) {
    const name = toText(fields[index]);
    const value = toText(fields[index + 1]);
    if (name === "data") {
      data = value;
    } else if (name === "attributes" && value !== null) {
      attributes = parseAttributes(value);
    }
  }
  if (data === null) {
    return null;
  }
  return { id, data: Buffer.from(data, "utf8"), attributes };
}

/** Parses an `XREADGROUP` reply: `[[key, [entry, ...]], ...]` or null on timeout. */
export function parseReadReply(reply: unknown): StreamEntry[] {
  if (!Array.isArray(reply)) {
    return [];
  }
  const entries: StreamEntry[] = [];
  for (const stream of reply) {
    if (!Array.isArray(stream) || !Array.isArray(stream[1])) {
      continue;
    }
    for (const raw of stream[1]) {
      const entry = parseStreamEntry(raw);
      if (entry) {
        entries.push(entry);
      }
    }
  }
  return entries;
}

/** Parses an `XAUTOCLAIM` reply: `[nextCursor, [entry, ...], deletedIds?]`. */
export function parseClaimReply(reply: unknown): { cursor: string; entries: StreamEntry[] } {
  if (!Array.isArray(reply) || reply.length < 2) {
    return { cursor: "0-0", entries: [] };
  }
  const cursor = toText(reply[0]) ?? "0-0";
  const rawEntries: unknown = reply[1];
  const entries: StreamEntry[] = [];
  if (Array.isArray(rawEntries)) {
    for (const raw of rawEntries) {
      const entry = parseStreamEntry(raw);
      if (entry) {
        entries.push(entry);
      }
    }
  }
  return { cursor, entries };
}

/** Reads the delivery counter from an `XPENDING key group id id 1` reply. */
export function parsePendingDeliveryCount(reply: unknown): number | null {
  if (!Array.isArray(reply) || !Array.isArray(reply[0])) {
    return null;
  }
  const count: unknown = reply[0][3];
  return typeof count === "number" && Number.isInteger(count) ? count : null;
}

/**
 * Redis Streams backend. Every destination is one stream; subscriber groups
 * are consumer groups, so each group sees every entry and its members share
 * them. Unacknowledged entries stay in the group's pending list: a nack
 * redelivers locally and entries left behind by a crashed member are taken
 * over with `XAUTOCLAIM`. Entries still being handled here are re-claimed
 * with `XCLAIM ... JUSTID` on every upkeep pass, so a long-running handler
 * never looks idle to the other members.
 */
export class RedisStreamsBus implements MessageBus {
  private readonly client: RedisCommandClient;
  private readonly logger: Logger;
  private readonly keyPrefix: string;
  private readonly consumerName: string;
  private readonly blockMs: number;
  private readonly claimIdleMs: number;
  private readonly claimIntervalMs: number;
  private readonly maxStreamLength: number | null;
  private readonly errorBackoffMs: number;
  private readonly loops = new Set<SubscriptionLoop>();
  private closed = false;

  constructor(client: RedisCommandClient, options: RedisStreamsBusOptions) {
    this.client = client;
    this.logger = options.logger;
    this.keyPrefix = options.keyPrefix ?? "relay:";
    this.consumerName = options.consumerName ?? `consumer-${randomUUID()}`;
    this.blockMs = Math.max(1, options.blockMs ?? 1_000);
    this.claimIdleMs = Math.max(1, options.claimIdleMs ?? 30_000);
    this.claimIntervalMs = Math.max(1, Math.min(options.claimIntervalMs ?? 5_000, Math.floor(this.claimIdleMs / 2)));
    this.maxStreamLength = options.maxStreamLength ?? null;
    this.errorBackoffMs = Math.max(0, options.errorBackoffMs ?? 1_000);
  }

  streamKey(destination: string): string {
    return `${this.keyPrefix}${destination}`;
  }

  async publish(destination: string, data: Buffer, attributes: MessageAttributes = {}): Promise<string> {
    if (this.closed) {
      throw new Error("bus is closed");
    }
    const args: RedisArgument[] = [this.streamKey(destination)];
    if (this.maxStreamLength !== null) {
      args.push("MAXLEN", "~", this.maxStreamLength);
    }
    args.push("*", "data", data.toString("utf8"), "attributes", JSON.stringify(attributes));
    const reply = await this.client.call("XADD", args);
    const id = toText(reply);
    if (id === null) {
      throw new Error(`XADD returned an unexpected reply for '${destination}'`);
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
    const key = this.streamKey(source);
    await this.ensureGroup(key, options.group);

    const loop: SubscriptionLoop = {
      key,
      group: options.group,
      credits: Math.max(1, Math.floor(options.credits)),
      reader: this.client.duplicate(),
      consumer,
      local: new Set(),
      claimTimer: null,
      creditWaiter: null,
      closed: false,
    };
    this.loops.add(loop);

    loop.claimTimer = runtimeSetInterval(() => {
      void this.maintainPending(loop).catch((error) => {
        this.logger.warn("redis_claim_failed", { stream: key, group: loop.group, reason: describeError(error) });
      });
    }, this.claimIntervalMs);
    unrefTimer(loop.claimTimer);

    void this.readLoop(loop).catch((error) => {
      this.logger.error("redis_read_loop_crashed", { stream: key, group: loop.group, reason: describeError(error) });
    });

    return { close: () => this.closeLoop(loop) };
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await Promise.all([...this.loops].map((loop) => this.closeLoop(loop)));
    await this.client.quit();
  }

  private async ensureGroup(key: string, group: string): Promise<void> {
    try {
      await this.client.call("XGROUP", ["CREATE", key, group, "0", "MKSTREAM"]);
    } catch (error) {
      if (!isBusyGroupError(error)) {
        throw error;
      }
    }
  }

  private async readLoop(loop: SubscriptionLoop): Promise<void> {
    while (!loop.closed) {
      const available = loop.credits - loop.local.size;
      if (available <= 0) {
        await new Promise<void>((resolve) => {
          loop.creditWaiter = resolve;
        });
        continue;
      }

      let reply: unknown;
      try {
        reply = await loop.reader.call("XREADGROUP", [
          "GROUP",
          loop.group,
          this.consumerName,
          "COUNT",
          available,
          "BLOCK",
          this.blockMs,
          "STREAMS",
          loop.key,
          ">",
        ]);
      } catch (error) {
        if (loop.closed) {
          return;
        }
        this.logger.warn("redis_read_failed", { stream: loop.key, group: loop.group, reason: describeError(error) });
        await sleep(this.errorBackoffMs);
        continue;
      }

      for (const entry of parseReadReply(reply)) {
        this.dispatch(loop, entry, 1);
      }
    }
  }

  private async maintainPending(loop: SubscriptionLoop): Promise<void> {
    await this.refreshHeld(loop);
    await this.claimStale(loop);
  }

  /** Resets the idle time of the entries this member is still handling. */
  private async refreshHeld(loop: SubscriptionLoop): Promise<void> {
    if (loop.closed || loop.local.size === 0) {
      return;
    }
    await this.client.call("XCLAIM", [loop.key, loop.group, this.consumerName, 0, ...loop.local, "JUSTID"]);
  }

  private async claimStale(loop: SubscriptionLoop): Promise<void> {
    if (loop.closed || loop.local.size >= loop.credits) {
      return;
    }
    const reply = await this.client.call("XAUTOCLAIM", [
      loop.key,
      loop.group,
      this.consumerName,
      this.claimIdleMs,
      "0-0",
      "COUNT",
      loop.credits - loop.local.size,
    ]);
    for (const entry of parseClaimReply(reply).entries) {
      if (loop.local.has(entry.id)) {
        continue;
      }
      const pending = await this.client.call("XPENDING", [loop.key, loop.group, entry.id, entry.id, 1]);
      const attempt = parsePendingDeliveryCount(pending) ?? 2;
      this.logger.info("redis_entry_claimed", { stream: loop.key, group: loop.group, id: entry.id, attempt });
      this.dispatch(loop, entry, attempt);
    }
  }

  private dispatch(loop: SubscriptionLoop, entry: StreamEntry, attempt: number): void {
    loop.local.add(entry.id);
    let settled = false;
    const settle = (): boolean => {
      if (settled) {
        return false;
      }
      settled = true;
      loop.local.delete(entry.id);
      const waiter = loop.creditWaiter;
      loop.creditWaiter = null;
      waiter?.();
      return true;
    };

    const delivery: BusDelivery = {
      id: entry.id,
      data: entry.data,
      attributes: entry.attributes,
      deliveryAttempt: attempt,
      ack: async () => {
        if (settle()) {
          await this.client.call("XACK", [loop.key, loop.group, entry.id]);
        }
      },
      nack: async () => {
        if (settle() && !loop.closed) {
          // The entry stays in the pending list; hand it out again locally.
          queueMicrotask(() => {
            if (!loop.closed) {
              this.dispatch(loop, entry, attempt + 1);
            }
          });
        }
      },
    };

    try {
      loop.consumer(delivery);
    } catch (error) {
      this.logger.warn("redis_consumer_threw", { stream: loop.key, id: entry.id, reason: describeError(error) });
      void delivery.nack();
    }
  }

  private async closeLoop(loop: SubscriptionLoop): Promise<void> {
    if (loop.closed) {
      return;
    }
    loop.closed = true;
    this.loops.delete(loop);
    if (loop.claimTimer !== null) {
      runtimeClearInterval(loop.claimTimer);
      loop.claimTimer = null;
    }
    const waiter = loop.creditWaiter;
    loop.creditWaiter = null;
    waiter?.();
    // Quitting the reader releases a pending blocking read.
    await loop.reader.quit();
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
