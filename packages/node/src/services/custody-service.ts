/**
 * CustodyService — composition root for the custody packages.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. It owns one ledger, one notification log and one
 * guarded vault, and feeds every mutation through an OperationQueue.
 */

import pino from "pino";
import type { Logger } from "pino";
import type {
  AccountHistory,
  AccountState,
  Amount,
  CapacityBasis,
  GlobalStats,
  Principal,
} from "@custody/types";
import { CustodyError, Ledger } from "@custody/ledger";
import type { InvariantReport, LedgerConfig } from "@custody/ledger";
import { InMemoryEventStore, accountStreamId } from "@custody/event-store";
import type {
  EventStoreIntegrityResult,
  ReadOptions,
  StoredEvent,
} from "@custody/event-store";
import { CustodyVault } from "@custody/vault";
import type { OperationContext, TransferFn, VaultReceipt } from "@custody/vault";
import { OperationQueue } from "./operation-queue.js";
import { InMemoryTransferGateway, toTransferFn } from "./transfer-gateway.js";
import type { TransferGateway } from "./transfer-gateway.js";

// =============================================================================
// Configuration
// =============================================================================

export interface CustodyServiceConfig {
  readonly ledger: LedgerConfig;
  /** Outbound channel for withdrawals. Default: InMemoryTransferGateway */
  readonly gateway?: TransferGateway | undefined;
  readonly logger?: Logger | undefined;
  readonly now?: (() => Date) | undefined;
}

export interface CapacityView {
  readonly capacityLimit: Amount;
  readonly remainingCapacity: Amount;
  readonly perOperationWithdrawLimit: Amount;
  readonly capacityBasis: CapacityBasis;
  readonly heldBalance: Amount;
  readonly totalDeposited: Amount;
}

export interface ReadinessReport {
  readonly ready: boolean;
  readonly invariants: InvariantReport;
  readonly integrity: EventStoreIntegrityResult;
}

// =============================================================================
// Service
// =============================================================================

export class CustodyService {
  readonly ledger: Ledger;
  readonly eventStore: InMemoryEventStore;
  readonly vault: CustodyVault;
  readonly gateway: TransferGateway;

  private readonly _queue = new OperationQueue();
  private readonly _logger: Logger;

  constructor(config: CustodyServiceConfig) {
    const now = config.now ?? (() => new Date());
    this._logger = config.logger ?? pino({ level: "silent" });
    this.ledger = new Ledger(config.ledger);
    this.gateway = config.gateway ?? new InMemoryTransferGateway(now);
    this.eventStore = new InMemoryEventStore({
      now,
      onSubscriberError: (error, event) => {
        this._logger.error(
          { err: error, eventType: event.event.type, position: event.globalPosition },
          "Event subscriber failed",
        );
      },
    });

    const transfer: TransferFn = toTransferFn(this.gateway);
    this.vault = new CustodyVault({
      ledger: this.ledger,
      eventStore: this.eventStore,
      transfer,
      now,
      onNotifyError: (error, event) => {
        this._logger.error(
          { err: error, eventType: event.type, eventId: event.metadata.eventId },
          "Completion event not recorded",
        );
      },
    });
  }

  // ─── Mutations ─────────────────────────────────────────────────────

  deposit(principal: Principal, amount: Amount, context?: OperationContext): Promise<VaultReceipt> {
    return this._queue.run(() => this.vault.deposit(principal, amount, context));
  }

  receive(principal: Principal, amount: Amount, context?: OperationContext): Promise<VaultReceipt> {
    return this._queue.run(() => this.vault.receive(principal, amount, context));
  }

  async withdraw(principal: Principal, amount: Amount, context?: OperationContext): Promise<VaultReceipt> {
    try {
      return await this._queue.run(() => this.vault.withdraw(principal, amount, context));
    } catch (error) {
      if (error instanceof CustodyError && error.code === "TRANSFER_FAILED") {
        this._logger.error(
          { principal, amount: amount.toString(), err: error.cause },
          "Withdrawal transfer failed; ledger rolled back",
        );
      }
      throw error;
    }
  }

  /** Mutations queued or running. */
  get pendingOperations(): number {
    return this._queue.pending;
  }

  // ─── Queries ───────────────────────────────────────────────────────

  getAccount(principal: Principal): AccountState {
    return this.ledger.getAccount(principal);
  }

  historyOf(caller: Principal, account: Principal): AccountHistory {
    return this.vault.historyOf(caller, account);
  }

  capacity(): CapacityView {
    const { capacityLimit, perOperationWithdrawLimit, capacityBasis } = this.ledger.config;
    return {
      capacityLimit,
      perOperationWithdrawLimit,
      capacityBasis,
      remainingCapacity: this.vault.remainingCapacity(),
      heldBalance: this.ledger.heldBalance(),
      totalDeposited: this.ledger.totals().totalDeposited,
    };
  }

  globalStats(): GlobalStats {
    return this.vault.globalStats();
  }

  /** Every notification, in global order. */
  readAllEvents(options?: ReadOptions): readonly StoredEvent[] {
    return this.eventStore.readAll(options);
  }

  /** Notifications about one principal's account. */
  readAccountEvents(principal: Principal): readonly StoredEvent[] {
    return this.eventStore.read(accountStreamId(principal));
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────

  /**
   * Deep health: ledger invariants hold and the event chain verifies.
   */
  checkReadiness(): ReadinessReport {
    const invariants = this.ledger.checkInvariants();
    const integrity = this.eventStore.verifyIntegrity();
    return { ready: invariants.valid && integrity.valid, invariants, integrity };
  }

  /** Wait for queued mutations to finish. */
  async stop(): Promise<void> {
    await this._queue.drain();
  }
}
