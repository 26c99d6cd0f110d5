/**
 * Financial Types
 *
 * Primitives for single-asset custody accounting.
 *
 * Rules:
 * - Amounts are bigint counts of the smallest indivisible unit
 * - Amounts cross every serialization boundary as base-10 integer strings
 * - There is exactly one value unit, so no currency field exists
 */

/**
 * Opaque identifier of an account holder (an address-like string).
 */
export type Principal = string;

/**
 * A non-negative count of the smallest indivisible value unit.
 */
export type Amount = bigint;

/**
 * An amount as it appears in JSON, events and snapshots ("600", "0").
 */
export type AmountString = string;

/**
 * Per-account state held by the ledger.
 */
export interface AccountState {
  readonly principal: Principal;
  readonly balance: Amount;
  readonly depositCount: number;
  readonly withdrawCount: number;
}

/**
 * Which quantity the capacity limit bounds.
 *
 * - "held": the live sum of balances (falls when funds are withdrawn)
 * - "lifetime": cumulative deposits (never falls)
 */
export type CapacityBasis = "held" | "lifetime";

/**
 * Aggregate counters reported by `globalStats()`.
 */
export interface GlobalStats {
  readonly totalDepositOperations: number;
  readonly totalWithdrawOperations: number;
  readonly currentHeldBalance: Amount;
}

/**
 * Ordered amounts a principal has deposited and withdrawn.
 */
export interface AccountHistory {
  readonly principal: Principal;
  readonly deposits: readonly Amount[];
  readonly withdrawals: readonly Amount[];
}
