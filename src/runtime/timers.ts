import {
  clearInterval as nodeClearInterval,
  clearTimeout as nodeClearTimeout,
  setInterval as nodeSetInterval,
  setTimeout as nodeSetTimeout,
} from "node:timers";

import type { BackoffPolicy } from "../config/protocol.js";

/**
 * Handle returned by {@link runtimeSetTimeout}. The type mirrors the Node.js
 * timer handle so call-sites keep access to `.unref()`; fake timers replace the
 * implementation at runtime but retain the nominal shape.
 */
export type TimeoutHandle = ReturnType<typeof nodeSetTimeout>;

/** Handle returned by {@link runtimeSetInterval}. */
export type IntervalHandle = ReturnType<typeof nodeSetInterval>;

const fallbackTimers = {
  setTimeout: nodeSetTimeout,
  clearTimeout: nodeClearTimeout,
  setInterval: nodeSetInterval,
  clearInterval: nodeClearInterval,
} as const;

/**
 * Returns the timer function currently exposed on {@link globalThis}. Sinon
 * installs its fake timers there, so the sweeper, the reorder buffer and the
 * retry backoff all follow the deterministic clock used by the tests.
 */
function resolveTimer<K extends keyof typeof fallbackTimers>(key: K): (typeof fallbackTimers)[K] {
  const candidate = (globalThis as Record<string, unknown>)[key];
  if (typeof candidate === "function") {
    return candidate as (typeof fallbackTimers)[K];
  }
  return fallbackTimers[key];
}

export function runtimeSetTimeout(...args: Parameters<typeof nodeSetTimeout>): TimeoutHandle {
  const candidate = resolveTimer("setTimeout");
  if (candidate === fallbackTimers.setTimeout) {
    return candidate(...args);
  }
  return candidate.apply(globalThis, args);
}

export function runtimeClearTimeout(handle: TimeoutHandle): void {
  const candidate = resolveTimer("clearTimeout");
  if (candidate === fallbackTimers.clearTimeout) {
    candidate(handle);
    return;
  }
  candidate.apply(globalThis, [handle]);
}

export function runtimeSetInterval(...args: Parameters<typeof nodeSetInterval>): IntervalHandle {
  const candidate = resolveTimer("setInterval");
  if (candidate === fallbackTimers.setInterval) {
    return candidate(...args);
  }
  return candidate.apply(globalThis, args);
}

export function runtimeClearInterval(handle: IntervalHandle): void {
  const candidate = resolveTimer("clearInterval");
  if (candidate === fallbackTimers.clearInterval) {
    candidate(handle);
    return;
  }
  candidate.apply(globalThis, [handle]);
}

/**
 * Detaches a background timer from the event loop so a forgotten sweeper or
 * heartbeat never keeps the process alive. Fake timer handles may not expose
 * `unref`, hence the guard.
 */
export function unrefTimer(handle: TimeoutHandle | IntervalHandle): void {
  if (typeof handle === "object" && handle !== null && typeof handle.unref === "function") {
    handle.unref();
  }
}

/** Resolves after `delayMs`, scheduled through the runtime-aware timers. */
export async function sleep(delayMs: number): Promise<void> {
  if (delayMs <= 0) {
    return;
  }
  await new Promise<void>((resolve) => {
    runtimeSetTimeout(resolve, delayMs);
  });
}

/**
 * Delay applied before the `attempt`-th retry (1-based):
 * `initialDelayMs * backoffFactor^(attempt - 1)`, capped at `maxDelayMs`.
 */
export function computeBackoffDelay(policy: BackoffPolicy, attempt: number): number {
  if (policy.maxDelayMs === 0 || policy.initialDelayMs === 0) {
    return 0;
  }
  const exponent = Math.max(0, Math.trunc(attempt) - 1);
  const raw = policy.initialDelayMs * policy.backoffFactor ** exponent;
  return Math.min(policy.maxDelayMs, Math.round(raw));
}

export const runtimeTimers = {
  setTimeout: runtimeSetTimeout,
  clearTimeout: runtimeClearTimeout,
  setInterval: runtimeSetInterval,
  clearInterval: runtimeClearInterval,
} as const;
