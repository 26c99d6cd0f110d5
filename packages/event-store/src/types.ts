/**
 * @custody/event-store — Core types.
 *
 * Interfaces for the append-only notification log.
 *
 * Design principles:
 * - Events are immutable after creation
 * - Streams are append-only (no UPDATE, no DELETE)
 * - Every event has a contiguous version within its stream and a
 *   contiguous position across all streams
 * - Every event is hash-linked to its global predecessor
 */

import type { DomainEvent, EventMetadata } from "@custody/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * An event as persisted in the store.
 */
export interface StoredEvent<TPayload = Readonly<Record<string, unknown>>> {
  readonly event: Readonly<{
    readonly type: string;
    readonly metadata: EventMetadata;
    readonly payload: TPayload;
  }>;

  readonly streamId: string;

  /** Position within this stream (1-based, contiguous) */
  readonly version: number;

  /** Position across all streams (1-based, contiguous) */
  readonly globalPosition: number;

  /** When this event was persisted (store-level, not domain-level) */
  readonly appendedAt: string;

  /** SHA-256 over the canonical event content and previousHash */
  readonly hash: string;

  /** Hash of the event at globalPosition − 1, or GENESIS_HASH */
  readonly previousHash: string;
}

/**
 * Fields covered by the hash (everything except the hashes themselves).
 */
export type HashableEvent = Omit<StoredEvent, "hash" | "previousHash">;

// =============================================================================
// Append / Read
// =============================================================================

export interface AppendResult {
  readonly streamId: string;

  /** Version of the first event appended */
  readonly fromVersion: number;

  /** Version of the last event appended (current stream head) */
  readonly toVersion: number;

  readonly count: number;
}

export type ReadDirection = "forward" | "backward";

export interface ReadOptions {
  /**
   * Start from this version (stream reads) or position (readAll),
   * inclusive and 1-based. Backward reads start at the head by default.
   */
  readonly from?: number;

  /** Maximum number of events to return. Default: unlimited */
  readonly maxCount?: number;

  /** Default: "forward" */
  readonly direction?: ReadDirection;
}

// =============================================================================
// Subscription
// =============================================================================

export type EventHandler = (event: StoredEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only event store.
 *
 * Invariants:
 * - Events are immutable once appended
 * - Stream versions and global positions have no gaps
 * - Subscribers see events in append order
 */
export interface EventStore {
  /**
   * Append one or more events to a stream, in order.
   * @throws EventStoreError on an empty batch or invalid stream ID
   */
  append(streamId: string, events: readonly DomainEvent[]): AppendResult;

  /** Events of one stream (empty if the stream does not exist). */
  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];

  /** Events of every stream in global order. */
  readAll(options?: ReadOptions): readonly StoredEvent[];

  subscribe(streamId: string, handler: EventHandler): Subscription;

  subscribeAll(handler: EventHandler): Subscription;

  /** Current version of a stream, or 0 if it doesn't exist. */
  streamVersion(streamId: string): number;

  /** Position of the last event, or 0 if the store is empty. */
  globalPosition(): number;

  /** Recompute and check the hash chain over every stored event. */
  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_POSITION"
  | "SUBSCRIBER_FAILED";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "EventStoreError";
  }
}
