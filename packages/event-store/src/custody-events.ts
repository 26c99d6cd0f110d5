/**
 * @custody/event-store — Custody domain event definitions.
 *
 * Naming convention: `custody.<past-tense action>`.
 * Payload amounts and balances are strings, so events survive JSON
 * and canonical hashing unchanged.
 */

import { randomUUID } from "node:crypto";
import type { AmountString, DomainEvent, EventSource, Principal } from "@custody/types";
import type { StoredEvent } from "./types.js";

export const CUSTODY_EVENTS = {
  DEPOSITED: "custody.deposited",
  WITHDRAWN: "custody.withdrawn",
} as const;

export type CustodyEventType = (typeof CUSTODY_EVENTS)[keyof typeof CUSTODY_EVENTS];

export type DepositedPayload = {
  readonly principal: Principal;
  readonly amount: AmountString;
  readonly balance: AmountString;
  /** "deposit" for explicit calls, "receive" for unsolicited inbound value */
  readonly via: "deposit" | "receive";
  readonly sequence: number;
};

export type WithdrawnPayload = {
  readonly principal: Principal;
  readonly amount: AmountString;
  readonly balance: AmountString;
  readonly sequence: number;
};

interface PayloadByType {
  "custody.deposited": DepositedPayload;
  "custody.withdrawn": WithdrawnPayload;
}

export interface CreateEventOptions {
  readonly actor: string;
  readonly source?: EventSource | undefined;
  readonly correlationId?: string | undefined;
  readonly causationId?: string | undefined;
  readonly timestamp?: string | undefined;
}

/**
 * Build a custody DomainEvent with fresh metadata.
 */
export function createCustodyEvent<T extends CustodyEventType>(
  type: T,
  payload: PayloadByType[T],
  options: CreateEventOptions,
): DomainEvent {
  const eventId = randomUUID();
  return {
    type,
    metadata: {
      eventId,
      timestamp: options.timestamp ?? new Date().toISOString(),
      actor: options.actor,
      correlationId: options.correlationId ?? eventId,
      source: options.source ?? "vault",
      ...(options.causationId !== undefined ? { causationId: options.causationId } : {}),
    },
    payload: { ...payload },
  };
}

/**
 * Stream that holds one principal's notifications.
 */
export function accountStreamId(principal: Principal): string {
  return `account:${principal}`;
}

export function isDepositedEvent(
  stored: StoredEvent,
): stored is StoredEvent<DepositedPayload> {
  const p = stored.event.payload;
  return (
    stored.event.type === CUSTODY_EVENTS.DEPOSITED &&
    typeof p.principal === "string" &&
    typeof p.amount === "string" &&
    typeof p.balance === "string" &&
    (p.via === "deposit" || p.via === "receive")
  );
}

export function isWithdrawnEvent(
  stored: StoredEvent,
): stored is StoredEvent<WithdrawnPayload> {
  const p = stored.event.payload;
  return (
    stored.event.type === CUSTODY_EVENTS.WITHDRAWN &&
    typeof p.principal === "string" &&
    typeof p.amount === "string" &&
    typeof p.balance === "string"
  );
}
