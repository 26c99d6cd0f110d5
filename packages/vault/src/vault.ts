/**
 * CustodyVault — guarded custody executor.
 *
 * Every mutating call follows the same sequence:
 *
 *   guard → validate → apply (ledger) → transfer (withdraw only) → notify
 *
 * State is fully updated before any outbound transfer is attempted.
 * A failed transfer restores the ledger checkpoint taken just before
 * the debit, so a withdrawal either completes or leaves no trace.
 */

import type {
  AccountHistory,
  Amount,
  DomainEvent,
  GlobalStats,
  Principal,
} from "@custody/types";
import { CustodyError, assertAmount, assertPrincipal, formatAmount } from "@custody/ledger";
import type { Ledger, OperationReceipt } from "@custody/ledger";
import {
  accountStreamId,
  createCustodyEvent,
  CUSTODY_EVENTS,
} from "@custody/event-store";
import { EventStoreError } from "@custody/event-store";
import type { CreateEventOptions, EventStore } from "@custody/event-store";
import { ReentrancyGuard } from "./guard.js";
import type {
  CreditSource,
  CustodyVaultOptions,
  OperationContext,
  OperationPhase,
  TransferFault,
  TransferFn,
  VaultReceipt,
} from "./types.js";

// =============================================================================
// CustodyVault
// =============================================================================

export class CustodyVault {
  private readonly _ledger: Ledger;
  private readonly _transfer: TransferFn;
  private readonly _eventStore: EventStore | undefined;
  private readonly _now: () => Date;
  private readonly _onNotifyError: CustodyVaultOptions["onNotifyError"];
  private readonly _guard = new ReentrancyGuard();
  private _lastFault: TransferFault | undefined;
  private _lastNotifyError: unknown;

  constructor(options: CustodyVaultOptions) {
    this._ledger = options.ledger;
    this._transfer = options.transfer;
    this._eventStore = options.eventStore;
    this._now = options.now ?? (() => new Date());
    this._onNotifyError = options.onNotifyError;
  }

  get ledger(): Ledger {
    return this._ledger;
  }

  get phase(): OperationPhase {
    return this._guard.phase;
  }

  get lastFault(): TransferFault | undefined {
    return this._lastFault;
  }

  /** The most recent completion-event append failure, if any. */
  get lastNotifyError(): unknown {
    return this._lastNotifyError;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Mutations
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Credit `amount` to `principal`.
   *
   * @throws CustodyError ZERO_AMOUNT, CAPACITY_EXCEEDED or REENTRANCY_REJECTED
   */
  deposit(principal: Principal, amount: Amount, context?: OperationContext): Promise<VaultReceipt> {
    return this._credit(principal, amount, "deposit", context);
  }

  /**
   * Accept unsolicited inbound value. Same rules as `deposit`.
   */
  receive(principal: Principal, amount: Amount, context?: OperationContext): Promise<VaultReceipt> {
    return this._credit(principal, amount, "receive", context);
  }

  /**
   * Debit `amount` from `principal`, then send it to them.
   *
   * @throws CustodyError ZERO_AMOUNT, WITHDRAW_LIMIT_EXCEEDED,
   *   INSUFFICIENT_BALANCE, TRANSFER_FAILED or REENTRANCY_REJECTED
   */
  async withdraw(principal: Principal, amount: Amount, context?: OperationContext): Promise<VaultReceipt> {
    assertPrincipal(principal);
    assertAmount(amount);

    return this._guard.run(async (advance) => {
      const verdict = this._ledger.validateWithdraw(principal, amount);
      if (!verdict.ok) {
        throw new CustodyError(verdict.rejection);
      }

      advance("mutating");
      const checkpoint = this._ledger.captureCheckpoint(principal);
      const receipt = this._ledger.applyWithdraw(principal, amount);

      advance("transferring");
      try {
        await this._transfer(principal, amount);
      } catch (error) {
        advance("faulted");
        this._ledger.restoreCheckpoint(checkpoint);
        this._lastFault = {
          principal,
          amount,
          error,
          occurredAt: this._now().toISOString(),
        };
        throw new CustodyError(
          { code: "TRANSFER_FAILED", to: principal, amount },
          { cause: error },
        );
      }

      const eventId = this._notify(
        principal,
        createCustodyEvent(
          CUSTODY_EVENTS.WITHDRAWN,
          {
            principal,
            amount: formatAmount(amount),
            balance: formatAmount(receipt.balance),
            sequence: receipt.sequence,
          },
          this._eventOptions(principal, context),
        ),
      );

      return { ...receipt, eventId };
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  balanceOf(principal: Principal): Amount {
    return this._ledger.balanceOf(principal);
  }

  remainingCapacity(): Amount {
    return this._ledger.remainingCapacity();
  }

  globalStats(): GlobalStats {
    return this._ledger.globalStats();
  }

  historyOf(caller: Principal, account: Principal): AccountHistory {
    return this._ledger.historyOf(caller, account);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private async _credit(
    principal: Principal,
    amount: Amount,
    via: CreditSource,
    context: OperationContext | undefined,
  ): Promise<VaultReceipt> {
    assertPrincipal(principal);
    assertAmount(amount);

    return this._guard.run((advance) => {
      const verdict = this._ledger.validateDeposit(amount);
      if (!verdict.ok) {
        throw new CustodyError(verdict.rejection);
      }

      advance("mutating");
      const receipt: OperationReceipt = this._ledger.applyDeposit(principal, amount);

      const eventId = this._notify(
        principal,
        createCustodyEvent(
          CUSTODY_EVENTS.DEPOSITED,
          {
            principal,
            amount: formatAmount(amount),
            balance: formatAmount(receipt.balance),
            via,
            sequence: receipt.sequence,
          },
          this._eventOptions(principal, context),
        ),
      );

      return { ...receipt, via, eventId };
    });
  }

  private _eventOptions(
    principal: Principal,
    context: OperationContext | undefined,
  ): CreateEventOptions {
    return {
      actor: context?.actor ?? principal,
      correlationId: context?.correlationId,
      causationId: context?.causationId,
      timestamp: this._now().toISOString(),
    };
  }

  /**
   * Append a completion event; returns its ID, or undefined when there
   * is no store or the event was not stored.
   *
   * Runs after the ledger change (and any transfer) has committed, so an
   * append failure is reported through `onNotifyError` and never thrown.
   */
  private _notify(principal: Principal, event: DomainEvent): string | undefined {
    if (this._eventStore === undefined) {
      return undefined;
    }
    try {
      this._eventStore.append(accountStreamId(principal), [event]);
    } catch (error) {
      this._lastNotifyError = error;
      this._onNotifyError?.(error, event);
      // A failing subscriber runs after the event is stored
      const stored = error instanceof EventStoreError && error.code === "SUBSCRIBER_FAILED";
      return stored ? event.metadata.eventId : undefined;
    }
    return event.metadata.eventId;
  }
}
