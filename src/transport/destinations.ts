import { ValidationError } from "../errors.js";

/**
 * Destination names. A service `svc` under namespace `ns` takes questions on
 * `ns.svc` and answers on `ns.svc.answers`; deliveries that exhaust their
 * attempts on either move to the matching `.dead-letter` destination.
 */

const SERVICE_ID_PATTERN = /^[A-Za-z0-9._-]+$/;

/** Rejects identities that would produce ambiguous destination names. */
export function assertServiceId(serviceId: string): string {
  const trimmed = serviceId.trim();
  if (trimmed.length === 0 || !SERVICE_ID_PATTERN.test(trimmed)) {
    throw new ValidationError(`service id '${serviceId}' must match ${SERVICE_ID_PATTERN.source}`);
  }
  return trimmed;
}

/** Destination receiving the questions addressed to `serviceId`. */
export function questionDestination(namespace: string, serviceId: string): string {
  return `${namespace}.${assertServiceId(serviceId)}`;
}

/**
 * Destination where `serviceId` publishes everything it sends back. Every
 * parent subscribes with its own group and keeps the correlation ids it owns.
 */
export function answerDestination(namespace: string, serviceId: string): string {
  return `${questionDestination(namespace, serviceId)}.answers`;
}

/** Destination receiving the deliveries of `source` that could not be processed. */
export function deadLetterDestination(source: string): string {
  return `${source}.dead-letter`;
}
