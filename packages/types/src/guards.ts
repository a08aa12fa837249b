/**
 * Runtime Type Guards
 *
 * Narrowing functions for custody domain types.
 * Used at system boundaries (configuration, deserialized snapshots,
 * caller-supplied identities).
 */

import type { Party } from "./financial.js";
import { ZERO_PARTY } from "./financial.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// =============================================================================
// Financial guards
// =============================================================================

/**
 * A party is valid when it is a non-empty string other than the zero identity.
 */
export function isParty(value: unknown): value is Party {
  return (
    typeof value === "string" &&
    value.trim().length > 0 &&
    value.toLowerCase() !== ZERO_PARTY
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["vault", "registry", "host", "adversary"]);

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    isEventSource(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}
