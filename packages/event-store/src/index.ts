/**
 * @custody/event-store — Append-only notification streams.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore with synchronous subscribers
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  AppendResult,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";
