/**
 * @custody/types — Shared domain types for the custody stack.
 *
 * These types are used across all custody packages:
 * - Parties and unsigned amounts
 * - Integer-width bounds
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Financial types
export type { Party, Amount } from "./financial.js";
export { ZERO_PARTY, UINT256_BITS, UINT256_MAX, maxUint } from "./financial.js";

// Event types
export type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// Runtime type guards
export {
  isParty,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
