/**
 * Vault Types
 *
 * Domain types for the guarded custody executor.
 *
 * Rules:
 * - All types are readonly (immutability by default)
 * - Amounts are bigint in memory, strings on the wire
 * - At most one custody operation is in flight per vault
 */

import type { Amount, DomainEvent, Principal } from "@custody/types";
import type { Ledger, OperationReceipt } from "@custody/ledger";
import type { EventStore } from "@custody/event-store";

// =============================================================================
// Outbound transfer
// =============================================================================

/**
 * Sends `amount` of value to `to` outside the ledger.
 *
 * Invoked only after the ledger debit is complete. Throwing (or
 * rejecting) marks the transfer as failed and the withdrawal is undone.
 */
export type TransferFn = (to: Principal, amount: Amount) => void | Promise<void>;

// =============================================================================
// Operation lifecycle
// =============================================================================

/**
 * Where the single in-flight operation currently is.
 *
 *   idle → validating → idle                      (rejected)
 *                     → mutating → idle           (deposit / receive)
 *                                → transferring → idle     (withdraw)
 *                                               → faulted → idle
 */
export type OperationPhase =
  | "idle"
  | "validating"
  | "mutating"
  | "transferring"
  | "faulted";

/** How value entered the vault. */
export type CreditSource = "deposit" | "receive";

/**
 * Correlation data carried into emitted events.
 */
export interface OperationContext {
  /** Who caused the operation. Default: the principal itself */
  readonly actor?: string | undefined;
  readonly correlationId?: string | undefined;
  readonly causationId?: string | undefined;
}

/**
 * The most recent failed outbound transfer.
 */
export interface TransferFault {
  readonly principal: Principal;
  readonly amount: Amount;
  readonly error: unknown;
  readonly occurredAt: string;
}

/**
 * A completed deposit, receive or withdrawal.
 */
export interface VaultReceipt extends OperationReceipt {
  readonly via?: CreditSource | undefined;
  /** ID of the notification event, when an event store is configured */
  readonly eventId?: string | undefined;
}

// =============================================================================
// Configuration
// =============================================================================

export interface CustodyVaultOptions {
  readonly ledger: Ledger;
  readonly transfer: TransferFn;
  /** Where completion notifications go. Omit to emit nothing */
  readonly eventStore?: EventStore | undefined;
  /** Clock for event timestamps and faults. Default: wall clock */
  readonly now?: (() => Date) | undefined;
  /**
   * Receives errors from appending a completion event. The operation
   * has already committed when this runs, so it still resolves.
   */
  readonly onNotifyError?: ((error: unknown, event: DomainEvent) => void) | undefined;
}
