import { StreamReassembler, type StreamMessage } from "../protocol/codec.js";
import type { EnvelopeOf, StreamEnvelope } from "../protocol/envelope.js";

/** Envelopes that occupy a slot in the child's ordering sequence before the terminal one. */
export type SequencedEnvelope = StreamEnvelope | EnvelopeOf<"heartbeat">;

export type ReorderEvent =
  | { readonly kind: "message"; readonly message: StreamMessage }
  /** Ordering numbers `from..to` (inclusive) never arrived and were skipped. */
  | { readonly kind: "gap"; readonly from: number; readonly to: number }
  /** A fragmented message lost its tail or head to a gap and was dropped. */
  | { readonly kind: "partial_discarded" }
  | { readonly kind: "invalid"; readonly orderingNumber: number; readonly reason: string };

/**
 * Releases the stream of one invocation in ordering order. Envelopes arriving
 * ahead of a missing number wait until the number shows up or the reorder
 * timeout elapses, in which case a gap is reported and delivery resumes after
 * it. Heartbeats fill their slot without producing a message.
 *
 * The terminal envelope closes the sequence at its ordering number. Lower
 * numbers still missing at that point are awaited under the same timeout, so
 * a log overtaken by the result on the bus is still delivered.
 */
export class ReorderBuffer {
  private readonly reorderTimeoutMs: number;
  private readonly pending = new Map<number, SequencedEnvelope>();
  private readonly reassembler = new StreamReassembler();
  private nextExpected = 0;
  private waitingSince: number | null = null;
  /** Ordering number of the terminal envelope, once it arrived. */
  private limit: number | null = null;

  constructor(reorderTimeoutMs: number) {
    this.reorderTimeoutMs = Math.max(0, reorderTimeoutMs);
  }

  /** Lowest ordering number not yet released. */
  get expected(): number {
    return this.nextExpected;
  }

  get buffered(): number {
    return this.pending.size;
  }

  /** The terminal envelope arrived but some lower numbers are still awaited. */
  get draining(): boolean {
    return this.limit !== null && this.nextExpected < this.limit;
  }

  /** The terminal envelope arrived and every slot below it is settled. */
  get settled(): boolean {
    return this.limit !== null && this.nextExpected > this.limit;
  }

  /** Whether `orderingNumber` was already released or is waiting in the buffer. */
  has(orderingNumber: number): boolean {
    return orderingNumber < this.nextExpected || this.pending.has(orderingNumber);
  }

  /**
   * Accepts one envelope. Returns the events it unblocked, or `null` when the
   * ordering number was seen before.
   */
  push(envelope: SequencedEnvelope, now: number): ReorderEvent[] | null {
    const orderingNumber = envelope.ordering_number;
    if (this.has(orderingNumber) || orderingNumber === this.limit) {
      return null;
    }
    if (this.limit !== null && orderingNumber > this.limit) {
      return [{ kind: "invalid", orderingNumber, reason: "ordering number follows the terminal envelope" }];
    }
    this.pending.set(orderingNumber, envelope);
    const before = this.nextExpected;
    const events = this.drain();
    events.push(...this.closeIfComplete());
    if (!this.waiting()) {
      this.waitingSince = null;
    } else if (this.waitingSince === null || this.nextExpected !== before) {
      this.waitingSince = now;
    }
    return events;
  }

  /**
   * Closes the sequence at the terminal envelope's ordering number. Returns
   * the events this releases; when lower numbers are missing, the reorder
   * timeout keeps running for them.
   */
  close(limit: number, now: number): ReorderEvent[] {
    if (this.limit !== null) {
      return [];
    }
    this.limit = limit;
    const events: ReorderEvent[] = [];
    for (const orderingNumber of [...this.pending.keys()]) {
      if (orderingNumber > limit) {
        this.pending.delete(orderingNumber);
        events.push({ kind: "invalid", orderingNumber, reason: "ordering number follows the terminal envelope" });
      }
    }
    events.push(...this.closeIfComplete());
    if (!this.waiting()) {
      this.waitingSince = null;
    } else if (this.waitingSince === null) {
      this.waitingSince = now;
    }
    return events;
  }

  /** Absolute time at which the current gap is given up, if one is open. */
  deadline(): number | null {
    return this.waitingSince === null ? null : this.waitingSince + this.reorderTimeoutMs;
  }

  /** Skips the open gap once the reorder timeout has elapsed. */
  expire(now: number): ReorderEvent[] {
    const deadline = this.deadline();
    if (deadline === null || now < deadline) {
      return [];
    }
    const events = this.pending.size > 0 ? this.skipToLowestPending() : this.skipToLimit();
    events.push(...this.closeIfComplete());
    this.waitingSince = this.waiting() ? now : null;
    return events;
  }

  private waiting(): boolean {
    return this.pending.size > 0 || this.draining;
  }

  /** Consumes the terminal slot once everything below it is settled. */
  private closeIfComplete(): ReorderEvent[] {
    if (this.limit === null || this.nextExpected !== this.limit) {
      return [];
    }
    this.nextExpected = this.limit + 1;
    return this.reassembler.reset() ? [{ kind: "partial_discarded" }] : [];
  }

  /** Gives up on every number between the released ones and the terminal envelope. */
  private skipToLimit(): ReorderEvent[] {
    if (this.limit === null || this.nextExpected >= this.limit) {
      return [];
    }
    const events: ReorderEvent[] = [{ kind: "gap", from: this.nextExpected, to: this.limit - 1 }];
    if (this.reassembler.reset()) {
      events.push({ kind: "partial_discarded" });
    }
    this.nextExpected = this.limit;
    return events;
  }

  private lowestPending(): number | null {
    let lowest: number | null = null;
    for (const orderingNumber of this.pending.keys()) {
      if (lowest === null || orderingNumber < lowest) {
        lowest = orderingNumber;
      }
    }
    return lowest;
  }

  private skipToLowestPending(): ReorderEvent[] {
    const lowest = this.lowestPending();
    if (lowest === null) {
      return [];
    }
    const events: ReorderEvent[] = [];
    if (lowest > this.nextExpected) {
      events.push({ kind: "gap", from: this.nextExpected, to: lowest - 1 });
      if (this.reassembler.reset()) {
        events.push({ kind: "partial_discarded" });
      }
      this.nextExpected = lowest;
    }
    events.push(...this.drain());
    return events;
  }

  private drain(): ReorderEvent[] {
    const events: ReorderEvent[] = [];
    let envelope = this.pending.get(this.nextExpected);
    while (envelope) {
      this.pending.delete(this.nextExpected);
      this.nextExpected += 1;
      if (envelope.type !== "heartbeat") {
        try {
          const message = this.reassembler.push(envelope);
          if (message) {
            events.push({ kind: "message", message });
          }
        } catch (error) {
          events.push({
            kind: "invalid",
            orderingNumber: envelope.ordering_number,
            reason: error instanceof Error ? error.message : String(error),
          });
        }
      }
      envelope = this.pending.get(this.nextExpected);
    }
    return events;
  }
}
