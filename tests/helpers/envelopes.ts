import { createEnvelope, type EnvelopeOf, type StreamEnvelope } from "../../src/protocol/envelope.js";

const child = (correlationId: string, orderingNumber: number) => ({
  correlation_id: correlationId,
  ordering_number: orderingNumber,
  sender_role: "child" as const,
});

export function logEnvelope(orderingNumber: number, message: string, continuation = false, correlationId = "c-1"): StreamEnvelope {
  const envelope = createEnvelope("log_record", child(correlationId, orderingNumber), {
    level: "info",
    message,
    timestamp: 1,
    continuation,
  });
  if (envelope.type !== "log_record") {
    throw new Error("expected a log_record envelope");
  }
  return envelope;
}

export function heartbeatEnvelope(orderingNumber: number, correlationId = "c-1"): EnvelopeOf<"heartbeat"> {
  const envelope = createEnvelope("heartbeat", child(correlationId, orderingNumber), { timestamp: 1 });
  if (envelope.type !== "heartbeat") {
    throw new Error("expected a heartbeat envelope");
  }
  return envelope;
}

/** Log message as the reassembler releases it for a single-fragment record. */
export function logMessage(orderingNumber: number, message: string) {
  return {
    type: "log_record" as const,
    level: "info" as const,
    message,
    timestamp: 1,
    orderingRange: [orderingNumber, orderingNumber],
  };
}
