/**
 * @custody/ledger — Internal types for the ledger core.
 *
 * These extend the shared @custody/types with ledger-specific
 * structures used by the ledger and its callers.
 *
 * Rules:
 * - All returned types are readonly
 * - Fail-closed: invalid input throws, never silently succeeds
 * - Domain refusals are Rejections; structural faults are LedgerErrors
 */

import type {
  Amount,
  AmountString,
  CapacityBasis,
  Principal,
  Rejection,
  RejectionCode,
} from "@custody/types";
import { describeRejection } from "@custody/types";

// ─── Configuration ───────────────────────────────────────────────────────

/**
 * Immutable limits fixed when a ledger is constructed.
 */
export interface LedgerConfig {
  /** Maximum value the ledger may hold (or ever accept, under "lifetime"). */
  readonly capacityLimit: Amount;

  /** Maximum value removable by a single withdrawal. */
  readonly perOperationWithdrawLimit: Amount;

  /**
   * Require perOperationWithdrawLimit < capacityLimit.
   * Default: true
   */
  readonly strictWithdrawLimit?: boolean | undefined;

  /** Which quantity the capacity limit bounds. Default: "held" */
  readonly capacityBasis?: CapacityBasis | undefined;

  /** Principal holding the privileged history-read capability. */
  readonly owner?: Principal | undefined;
}

/**
 * LedgerConfig with every default applied.
 */
export interface ResolvedLedgerConfig {
  readonly capacityLimit: Amount;
  readonly perOperationWithdrawLimit: Amount;
  readonly strictWithdrawLimit: boolean;
  readonly capacityBasis: CapacityBasis;
  readonly owner?: Principal | undefined;
}

// ─── Operations ──────────────────────────────────────────────────────────

export type OperationKind = "deposit" | "withdraw";

/**
 * One successfully applied operation, in global order.
 */
export interface LedgerOperation {
  /** 1-based position across the whole ledger */
  readonly sequence: number;
  readonly kind: OperationKind;
  readonly principal: Principal;
  readonly amount: Amount;
}

/**
 * Result of a successful apply step.
 */
export interface OperationReceipt extends LedgerOperation {
  /** Principal's balance after the operation */
  readonly balance: Amount;
}

/**
 * Aggregate counters and totals.
 */
export interface LedgerTotals {
  readonly totalDeposited: Amount;
  readonly totalWithdrawn: Amount;
  readonly totalDepositOperations: number;
  readonly totalWithdrawOperations: number;
}

/**
 * State needed to undo everything applied after it was taken.
 * Produced by captureCheckpoint(), consumed by restoreCheckpoint().
 */
export interface LedgerCheckpoint {
  readonly principal: Principal;
  readonly journalLength: number;
  readonly totals: LedgerTotals;
  readonly account?: {
    readonly balance: Amount;
    readonly depositCount: number;
    readonly withdrawCount: number;
    readonly depositHistoryLength: number;
    readonly withdrawHistoryLength: number;
  } | undefined;
}

// ─── Invariant Audit ─────────────────────────────────────────────────────

export interface InvariantViolation {
  readonly invariant:
    | "NON_NEGATIVE"
    | "CONSERVATION"
    | "CAPACITY"
    | "WITHDRAW_LIMIT"
    | "COUNTERS";
  readonly detail: string;
}

export interface InvariantReport {
  readonly valid: boolean;
  readonly heldBalance: Amount;
  readonly violations: readonly InvariantViolation[];
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Serializable snapshot of the ledger: its limits and every applied
 * operation in order. Amounts are strings so the snapshot survives JSON.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly config: {
    readonly capacityLimit: AmountString;
    readonly perOperationWithdrawLimit: AmountString;
    readonly strictWithdrawLimit: boolean;
    readonly capacityBasis: CapacityBasis;
    readonly owner?: Principal | undefined;
  };
  readonly operations: readonly {
    readonly kind: OperationKind;
    readonly principal: Principal;
    readonly amount: AmountString;
  }[];
  readonly createdAt: string;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for structural ledger faults. */
export type LedgerErrorCode =
  | "INVALID_CONFIG"
  | "INVALID_AMOUNT"
  | "INVALID_PRINCIPAL"
  | "ARITHMETIC_UNDERFLOW"
  | "INVARIANT_VIOLATION"
  | "PRECONDITION_FAILED"
  | "INVALID_SNAPSHOT";

/**
 * Structured error from the ledger core.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

/**
 * A refused custody operation. Carries the Rejection unchanged.
 */
export class CustodyError extends Error {
  public readonly code: RejectionCode;
  public readonly rejection: Rejection;

  constructor(rejection: Rejection, options?: { cause?: unknown }) {
    super(describeRejection(rejection), options);
    this.name = "CustodyError";
    this.code = rejection.code;
    this.rejection = rejection;
  }
}
