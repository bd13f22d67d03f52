import { z } from "zod";

import { MalformedMessageError } from "../errors.js";

/**
 * Version stamped on every envelope. Receivers accept any minor revision of
 * the same major version.
 */
export const PROTOCOL_VERSION = "1.0";
export const SUPPORTED_PROTOCOL_MAJOR = 1;

/** Every envelope type, in the order they usually appear in an exchange. */
export const ENVELOPE_TYPES = [
  "question",
  "log_record",
  "monitor_message",
  "result",
  "exception",
  "heartbeat",
] as const;

export type EnvelopeType = (typeof ENVELOPE_TYPES)[number];

export const SenderRoleSchema = z.enum(["parent", "child"]);
export type SenderRole = z.infer<typeof SenderRoleSchema>;

/** Manifests travel in their serialised form and are validated by the receiver. */
const WireManifestSchema = z.record(z.unknown()).nullable();

/** Sent by the parent to open an invocation. */
export const QuestionPayloadSchema = z
  .object({
    input_values: z.unknown(),
    input_manifest: WireManifestSchema,
    child_identities_allowed: z.array(z.string().min(1)),
  })
  .strict();

/**
 * One line of the child's log. `continuation` marks a chunk that the next
 * envelope of the same stream continues.
 */
export const LogRecordPayloadSchema = z
  .object({
    level: z.enum(["debug", "info", "warn", "error"]),
    message: z.string(),
    timestamp: z.number().nonnegative(),
    continuation: z.boolean(),
  })
  .strict();

export const MonitorMessagePayloadSchema = z
  .object({
    data: z.unknown(),
    continuation: z.boolean(),
  })
  .strict();

export const ResultPayloadSchema = z
  .object({
    output_values: z.unknown(),
    output_manifest: WireManifestSchema,
  })
  .strict();

/** Terminal failure reported by a child; `kind` names the error class. */
export const ExceptionPayloadSchema = z
  .object({
    kind: z.string().min(1),
    message: z.string(),
    detail: z.record(z.unknown()),
  })
  .strict();

/** Liveness signal; it extends the deadline but carries no ordering weight. */
export const HeartbeatPayloadSchema = z
  .object({
    timestamp: z.number().nonnegative(),
  })
  .strict();

const envelopeFields = {
  correlation_id: z.string().min(1).max(256),
  ordering_number: z.number().int().nonnegative(),
  sender_role: SenderRoleSchema,
  protocol_version: z.string().regex(/^\d+\.\d+$/, "protocol_version must look like '<major>.<minor>'"),
};

export const EnvelopeSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("question"), ...envelopeFields, payload: QuestionPayloadSchema }).strict(),
  z.object({ type: z.literal("log_record"), ...envelopeFields, payload: LogRecordPayloadSchema }).strict(),
  z.object({ type: z.literal("monitor_message"), ...envelopeFields, payload: MonitorMessagePayloadSchema }).strict(),
  z.object({ type: z.literal("result"), ...envelopeFields, payload: ResultPayloadSchema }).strict(),
  z.object({ type: z.literal("exception"), ...envelopeFields, payload: ExceptionPayloadSchema }).strict(),
  z.object({ type: z.literal("heartbeat"), ...envelopeFields, payload: HeartbeatPayloadSchema }).strict(),
]);

export type Envelope = z.infer<typeof EnvelopeSchema>;
export type QuestionPayload = z.infer<typeof QuestionPayloadSchema>;
export type LogRecordPayload = z.infer<typeof LogRecordPayloadSchema>;
export type MonitorMessagePayload = z.infer<typeof MonitorMessagePayloadSchema>;
export type ResultPayload = z.infer<typeof ResultPayloadSchema>;
export type ExceptionPayload = z.infer<typeof ExceptionPayloadSchema>;
export type HeartbeatPayload = z.infer<typeof HeartbeatPayloadSchema>;

export type EnvelopeOf<T extends EnvelopeType> = Extract<Envelope, { type: T }>;
export type QuestionEnvelope = EnvelopeOf<"question">;
export type StreamEnvelope = EnvelopeOf<"log_record"> | EnvelopeOf<"monitor_message">;
export type TerminalEnvelope = EnvelopeOf<"result"> | EnvelopeOf<"exception">;
export type StreamPayload = LogRecordPayload | MonitorMessagePayload;

export function isStreamEnvelope(envelope: Envelope): envelope is StreamEnvelope {
  return envelope.type === "log_record" || envelope.type === "monitor_message";
}

export function isTerminalEnvelope(envelope: Envelope): envelope is TerminalEnvelope {
  return envelope.type === "result" || envelope.type === "exception";
}

/** Fields shared by every envelope a sender produces for one correlation id. */
export interface EnvelopeHeader {
  correlation_id: string;
  ordering_number: number;
  sender_role: SenderRole;
}

type PayloadOf<T extends EnvelopeType> = EnvelopeOf<T>["payload"];

/** Stamps the protocol version onto a freshly built envelope. */
export function createEnvelope<T extends EnvelopeType>(type: T, header: EnvelopeHeader, payload: PayloadOf<T>): Envelope {
  const parsed = EnvelopeSchema.safeParse({ type, ...header, protocol_version: PROTOCOL_VERSION, payload });
  if (!parsed.success) {
    throw new MalformedMessageError(`cannot build ${type} envelope`, { issues: describeIssues(parsed.error) });
  }
  return parsed.data;
}

/** Compact `path: message` rendering of zod issues for logs and error details. */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message));
}
