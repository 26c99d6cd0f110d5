/**
 * Idempotency middleware.
 *
 * Caches POST mutation responses by Idempotency-Key header, scoped to
 * the calling principal: two principals may use the same key without
 * seeing each other's responses. A repeated key within the TTL returns
 * the cached response instead of re-executing the handler.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

// =============================================================================
// Idempotency Store Interface
// =============================================================================

export interface CachedResponse {
  readonly status: number;
  readonly body: string;
  readonly headers: Record<string, string>;
  readonly cachedAt: number;
}

export interface IdempotencyStore {
  get(key: string): CachedResponse | undefined;
  /** Stores the response, stamped with the store's own clock. */
  set(key: string, response: Omit<CachedResponse, "cachedAt">): void;
}

// =============================================================================
// In-Memory Store
// =============================================================================

export class InMemoryIdempotencyStore implements IdempotencyStore {
  private readonly _cache = new Map<string, CachedResponse>();
  private readonly _ttlMs: number;
  private readonly _now: () => number;

  constructor(ttlMs: number = 86400000, now: () => number = Date.now) {
    this._ttlMs = ttlMs;
    this._now = now;
  }

  get(key: string): CachedResponse | undefined {
    const entry = this._cache.get(key);
    if (entry === undefined) {
      return undefined;
    }

    if (this._now() - entry.cachedAt > this._ttlMs) {
      this._cache.delete(key);
      return undefined;
    }

    return entry;
  }

  set(key: string, response: Omit<CachedResponse, "cachedAt">): void {
    const now = this._now();
    for (const [cachedKey, entry] of this._cache) {
      if (now - entry.cachedAt > this._ttlMs) {
        this._cache.delete(cachedKey);
      }
    }
    this._cache.set(key, { ...response, cachedAt: now });
  }

  get size(): number {
    return this._cache.size;
  }

  clear(): void {
    this._cache.clear();
  }
}

// =============================================================================
// Middleware
// =============================================================================

export const IDEMPOTENCY_HEADER = "Idempotency-Key";
export const REPLAY_HEADER = "X-Idempotent-Replay";

/**
 * Must run AFTER the auth middleware.
 *
 * A request whose key is still being handled waits for it to finish,
 * then replays its response (or runs, if the first one was rejected).
 */
export function idempotencyMiddleware(
  store: IdempotencyStore,
): MiddlewareHandler<AppEnv> {
  const inFlight = new Map<string, Promise<void>>();

  return async (c, next) => {
    if (c.req.method !== "POST") {
      return next();
    }

    const idempotencyKey = c.req.header(IDEMPOTENCY_HEADER);
    if (idempotencyKey === undefined) {
      return next();
    }

    const scopedKey = `${c.get("auth").principal}\u0000${idempotencyKey}`;

    let pending = inFlight.get(scopedKey);
    while (pending !== undefined) {
      await pending;
      pending = inFlight.get(scopedKey);
    }

    const cached = store.get(scopedKey);
    if (cached !== undefined) {
      return new Response(cached.body, {
        status: cached.status,
        headers: { ...cached.headers, [REPLAY_HEADER]: "true" },
      });
    }

    let settle: () => void = () => undefined;
    inFlight.set(
      scopedKey,
      new Promise<void>((resolve) => {
        settle = resolve;
      }),
    );

    try {
      await next();

      if (c.res.status < 400) {
        const clonedRes = c.res.clone();
        const body = await clonedRes.text();
        const headers: Record<string, string> = {};
        clonedRes.headers.forEach((value, key) => {
          headers[key] = value;
        });

        store.set(scopedKey, {
          status: clonedRes.status,
          body,
          headers,
        });
      }
    } finally {
      inFlight.delete(scopedKey);
      settle();
    }
  };
}
