import { AsyncLocalStorage } from "node:async_hooks";

/**
 * Correlation details attached to the asynchronous work spawned while a
 * delivery is handled. The logger reads them so every line emitted by a
 * handler, an analysis or a nested invocation carries the identifiers of the
 * message that triggered it.
 */
export interface MessageContext {
  readonly correlationId: string;
  readonly serviceId?: string | null;
  readonly envelopeType?: string | null;
}

const storage = new AsyncLocalStorage<MessageContext>();

/** Runs `callback` with `context` exposed to everything it awaits. */
export function runWithMessageContext<T>(context: MessageContext | undefined, callback: () => T): T {
  if (!context) {
    return callback();
  }
  return storage.run(context, callback);
}

export function getMessageContext(): MessageContext | undefined {
  return storage.getStore();
}
