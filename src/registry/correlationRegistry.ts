import type { Manifest } from "../content/model.js";
import { DuplicateCorrelationError, UnknownInvocationError, type RelayError, type RemoteFailure } from "../errors.js";
import { KeyedMutex } from "../infra/keyedMutex.js";

/**
 * Lifecycle of one invocation. `PENDING` until the child speaks, `RUNNING`
 * afterwards; the remaining states are terminal and absorb every later event.
 */
export type InvocationState = "PENDING" | "RUNNING" | "COMPLETED" | "FAILED" | "TIMED_OUT" | "CANCELLED";

export const TERMINAL_STATES: ReadonlySet<InvocationState> = new Set([
  "COMPLETED",
  "FAILED",
  "TIMED_OUT",
  "CANCELLED",
]);

export function isTerminalState(state: InvocationState): boolean {
  return TERMINAL_STATES.has(state);
}

/** Terminal outcome of an invocation (or of a logical call). */
export type Outcome =
  | {
      readonly status: "COMPLETED";
      readonly correlationId: string;
      readonly outputValues: unknown;
      readonly outputManifest: Manifest | null;
    }
  | {
      readonly status: "FAILED";
      readonly correlationId: string;
      /** Failure as reported by the child, or derived from a local error. */
      readonly failure: RemoteFailure;
      readonly error: RelayError;
    }
  | {
      readonly status: "TIMED_OUT";
      readonly correlationId: string;
      readonly error: RelayError;
    }
  | {
      readonly status: "CANCELLED";
      readonly correlationId: string;
      readonly reason: string;
    };

/**
 * Book-keeping for a single question. `session` carries whatever per-invocation
 * state the owner attaches (the invoker stores its ordering buffer there).
 */
export interface Invocation<TSession> {
  readonly correlationId: string;
  /** Identifier shared by every attempt of one logical call. */
  readonly logicalCallId: string;
  readonly childId: string;
  /** 1-based attempt number within the logical call. */
  readonly attempt: number;
  readonly createdAt: number;
  readonly session: TSession;
  state: InvocationState;
  /** Absolute epoch ms after which the sweeper times the invocation out. */
  deadline: number;
  retriesRemaining: number;
  outcome: Outcome | null;
  resolvedAt: number | null;
}

export interface CreateInvocationOptions<TSession> {
  readonly session: TSession;
  readonly logicalCallId?: string;
  readonly attempt?: number;
  readonly retriesRemaining?: number;
}

export interface CorrelationRegistryOptions {
  /** Time a resolved invocation is kept for late lookups and deduplication. */
  retentionMs: number;
  /** Optional clock used for testing (defaults to {@link Date.now}). */
  clock?: () => number;
}

interface Entry<TSession> {
  readonly invocation: Invocation<TSession>;
  readonly settled: Promise<Outcome>;
  readonly notify: (outcome: Outcome) => void;
}

/**
 * Maps correlation ids to live invocations. One registry belongs to one
 * service and is passed explicitly to the components that need it. Resolution
 * is idempotent: the first outcome wins and the per-invocation signal fires
 * exactly once.
 */
export class CorrelationRegistry<TSession> {
  private readonly entries = new Map<string, Entry<TSession>>();
  private readonly mutex = new KeyedMutex();
  private readonly clock: () => number;
  private readonly retentionMs: number;

  constructor(options: CorrelationRegistryOptions) {
    this.clock = options.clock ?? (() => Date.now());
    this.retentionMs = Math.max(0, options.retentionMs);
  }

  create(
    correlationId: string,
    childId: string,
    deadline: number,
    options: CreateInvocationOptions<TSession>,
  ): Invocation<TSession> {
    if (this.entries.has(correlationId)) {
      throw new DuplicateCorrelationError(correlationId);
    }
    const invocation: Invocation<TSession> = {
      correlationId,
      logicalCallId: options.logicalCallId ?? correlationId,
      childId,
      attempt: options.attempt ?? 1,
      createdAt: this.clock(),
      session: options.session,
      state: "PENDING",
      deadline,
      retriesRemaining: options.retriesRemaining ?? 0,
      outcome: null,
      resolvedAt: null,
    };
    let notify!: (outcome: Outcome) => void;
    const settled = new Promise<Outcome>((resolve) => {
      notify = resolve;
    });
    this.entries.set(correlationId, { invocation, settled, notify });
    return invocation;
  }

  get(correlationId: string): Invocation<TSession> | undefined {
    return this.entries.get(correlationId)?.invocation;
  }

  /** Same as {@link get} but raises {@link UnknownInvocationError} on a miss. */
  require(correlationId: string): Invocation<TSession> {
    const invocation = this.get(correlationId);
    if (!invocation) {
      throw new UnknownInvocationError(correlationId);
    }
    return invocation;
  }

  /**
   * Moves a live invocation to a non-terminal state. Returns false when the
   * invocation already reached a terminal state; terminal states are only
   * entered through {@link resolve}.
   */
  transition(correlationId: string, state: "PENDING" | "RUNNING"): boolean {
    const invocation = this.require(correlationId);
    if (isTerminalState(invocation.state)) {
      return false;
    }
    invocation.state = state;
    return true;
  }

  /** Pushes the deadline of a live invocation (heartbeat or any child traffic). */
  touch(correlationId: string, deadline: number): boolean {
    const invocation = this.require(correlationId);
    if (isTerminalState(invocation.state)) {
      return false;
    }
    invocation.deadline = deadline;
    return true;
  }

  /** Records the outcome. Returns false when another outcome got there first. */
  resolve(correlationId: string, outcome: Outcome): boolean {
    const entry = this.entries.get(correlationId);
    if (!entry) {
      throw new UnknownInvocationError(correlationId);
    }
    const { invocation } = entry;
    if (invocation.outcome !== null) {
      return false;
    }
    invocation.outcome = outcome;
    invocation.state = outcome.status;
    invocation.resolvedAt = this.clock();
    entry.notify(outcome);
    return true;
  }

  /** Live invocations whose deadline is at or before `now`. Nothing is resolved here. */
  sweepExpired(now: number = this.clock()): Array<Invocation<TSession>> {
    const expired: Array<Invocation<TSession>> = [];
    for (const { invocation } of this.entries.values()) {
      if (!isTerminalState(invocation.state) && invocation.deadline <= now) {
        expired.push(invocation);
      }
    }
    return expired;
  }

  /**
   * Forgets an invocation. A live invocation is resolved `CANCELLED` first so
   * its waiters are released.
   */
  evict(correlationId: string): boolean {
    const entry = this.entries.get(correlationId);
    if (!entry) {
      return false;
    }
    if (entry.invocation.outcome === null) {
      this.resolve(correlationId, { status: "CANCELLED", correlationId, reason: "evicted" });
    }
    this.entries.delete(correlationId);
    return true;
  }

  /** Drops resolved invocations older than the retention window. Returns how many went. */
  evictResolved(now: number = this.clock()): number {
    let evicted = 0;
    for (const [correlationId, { invocation }] of this.entries) {
      if (invocation.resolvedAt !== null && invocation.resolvedAt + this.retentionMs <= now) {
        this.entries.delete(correlationId);
        evicted += 1;
      }
    }
    return evicted;
  }

  /** Resolves with the outcome once the invocation settles. */
  async waitFor(correlationId: string): Promise<Outcome> {
    const entry = this.entries.get(correlationId);
    if (!entry) {
      throw new UnknownInvocationError(correlationId);
    }
    return entry.settled;
  }

  /** Serialises mutations of one invocation; other ids proceed concurrently. */
  runExclusive<T>(correlationId: string, operation: () => Promise<T> | T): Promise<T> {
    return this.mutex.runExclusive(correlationId, operation);
  }

  size(): number {
    return this.entries.size;
  }

  /** Snapshot of every tracked invocation, live or retained. */
  list(): Array<Invocation<TSession>> {
    return [...this.entries.values()].map((entry) => entry.invocation);
  }
}
