/**
 * @custody/event-store — Append-only, hash-chained notification log.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore with synchronous subscriptions
 * - Hash chain computation and verification
 * - Custody domain event definitions
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  HashableEvent,
  AppendResult,
  ReadDirection,
  ReadOptions,
  EventHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementation
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

// Custody domain events
export {
  CUSTODY_EVENTS,
  createCustodyEvent,
  accountStreamId,
  isDepositedEvent,
  isWithdrawnEvent,
} from "./custody-events.js";
export type {
  CustodyEventType,
  DepositedPayload,
  WithdrawnPayload,
  CreateEventOptions,
} from "./custody-events.js";
