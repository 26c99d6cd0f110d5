/**
 * @custody/event-store — In-memory EventStore implementation.
 *
 * Holds every event in process memory; all state is lost on exit.
 * Used as the custody notification log and in tests.
 *
 * Subscriptions are dispatched synchronously on append, after the
 * events are stored. A throwing subscriber never un-appends an event.
 */

import type { DomainEvent } from "@custody/types";
import type {
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ReadOptions,
  StoredEvent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /**
   * Receives errors thrown by subscribers. Without it, the first
   * subscriber error is rethrown (wrapped) once every handler has run.
   */
  readonly onSubscriberError?: ((error: unknown, event: StoredEvent) => void) | undefined;

  /** Clock for `appendedAt`. Default: wall clock */
  readonly now?: (() => Date) | undefined;
}

export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _log: StoredEvent[] = [];
  private readonly _streamHandlers = new Map<string, Set<EventHandler>>();
  private readonly _globalHandlers = new Set<EventHandler>();
  private readonly _onSubscriberError: InMemoryEventStoreOptions["onSubscriberError"];
  private readonly _now: () => Date;

  constructor(options: InMemoryEventStoreOptions = {}) {
    this._onSubscriberError = options.onSubscriberError;
    this._now = options.now ?? (() => new Date());
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(streamId: string, events: readonly DomainEvent[]): AppendResult {
    assertStreamId(streamId);
    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    let stream = this._streams.get(streamId);
    if (stream === undefined) {
      stream = [];
      this._streams.set(streamId, stream);
    }

    const fromVersion = stream.length + 1;
    const appendedAt = this._now().toISOString();
    const stored: StoredEvent[] = [];

    for (const event of events) {
      const previousHash = this._log.at(-1)?.hash ?? GENESIS_HASH;
      const body = {
        event: { type: event.type, metadata: event.metadata, payload: event.payload },
        streamId,
        version: stream.length + 1,
        globalPosition: this._log.length + 1,
        appendedAt,
      };
      const record: StoredEvent = {
        ...body,
        hash: computeEventHash(body, previousHash),
        previousHash,
      };

      stream.push(record);
      this._log.push(record);
      stored.push(record);
    }

    this._dispatch(streamId, stored);

    return {
      streamId,
      fromVersion,
      toVersion: stream.length,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    assertStreamId(streamId);
    const stream = this._streams.get(streamId) ?? [];
    return select(stream, (e) => e.version, options, streamId);
  }

  readAll(options?: ReadOptions): readonly StoredEvent[] {
    return select(this._log, (e) => e.globalPosition, options);
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(streamId: string, handler: EventHandler): Subscription {
    assertStreamId(streamId);
    let handlers = this._streamHandlers.get(streamId);
    if (handlers === undefined) {
      handlers = new Set();
      this._streamHandlers.set(streamId, handlers);
    }
    const set = handlers;
    set.add(handler);

    return {
      unsubscribe: () => {
        set.delete(handler);
        if (set.size === 0) {
          this._streamHandlers.delete(streamId);
        }
      },
    };
  }

  subscribeAll(handler: EventHandler): Subscription {
    this._globalHandlers.add(handler);
    return {
      unsubscribe: () => {
        this._globalHandlers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._log.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._log);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _dispatch(streamId: string, events: readonly StoredEvent[]): void {
    const handlers = [
      ...(this._streamHandlers.get(streamId) ?? []),
      ...this._globalHandlers,
    ];
    let firstFailure: { error: unknown; event: StoredEvent } | undefined;

    for (const event of events) {
      for (const handler of handlers) {
        try {
          handler(event);
        } catch (error) {
          if (this._onSubscriberError !== undefined) {
            this._onSubscriberError(error, event);
          } else {
            firstFailure ??= { error, event };
          }
        }
      }
    }

    if (firstFailure !== undefined) {
      throw new EventStoreError(
        "SUBSCRIBER_FAILED",
        `Subscriber failed on event at position ${firstFailure.event.globalPosition}`,
        streamId,
        { cause: firstFailure.error },
      );
    }
  }
}

function assertStreamId(streamId: string): void {
  if (streamId.length === 0) {
    throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
  }
}

/**
 * Apply from/direction/maxCount to an ordered event list.
 */
function select(
  events: readonly StoredEvent[],
  positionOf: (e: StoredEvent) => number,
  options: ReadOptions | undefined,
  streamId?: string,
): StoredEvent[] {
  const direction = options?.direction ?? "forward";
  const from = options?.from;

  if (from !== undefined && (!Number.isInteger(from) || from < 1)) {
    throw new EventStoreError(
      "INVALID_POSITION",
      `Read position must be an integer >= 1, got ${from}`,
      streamId,
    );
  }

  let result = direction === "forward"
    ? events.filter((e) => positionOf(e) >= (from ?? 1))
    : events.filter((e) => from === undefined || positionOf(e) <= from).reverse();

  const maxCount = options?.maxCount;
  if (maxCount !== undefined && maxCount >= 0) {
    result = result.slice(0, maxCount);
  }
  return result;
}
