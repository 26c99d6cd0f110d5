/**
 * @custody/ledger — Account book.
 *
 * Holds per-principal balances, counters and histories.
 * Accounts come into existence on first credit and are never removed.
 *
 * Rules:
 * - Unknown principals read as a zero balance with zero counters
 * - Histories are append-only in normal operation
 * - Only the ledger mutates records; callers get readonly copies
 */

import type { AccountHistory, AccountState, Amount, Principal } from "@custody/types";
import { isPrincipal } from "@custody/types";
import { LedgerError } from "./types.js";

/**
 * Mutable record owned by the book. Never handed out directly.
 */
export interface AccountRecord {
  balance: Amount;
  depositCount: number;
  withdrawCount: number;
  readonly deposits: Amount[];
  readonly withdrawals: Amount[];
}

export class AccountBook {
  private readonly _accounts: Map<Principal, AccountRecord> = new Map();

  /**
   * Get the record for a principal, creating it on first use.
   */
  open(principal: Principal): AccountRecord {
    assertPrincipal(principal);
    let record = this._accounts.get(principal);
    if (record === undefined) {
      record = {
        balance: 0n,
        depositCount: 0,
        withdrawCount: 0,
        deposits: [],
        withdrawals: [],
      };
      this._accounts.set(principal, record);
    }
    return record;
  }

  /**
   * Get the record for a principal without creating it.
   */
  peek(principal: Principal): AccountRecord | undefined {
    return this._accounts.get(principal);
  }

  /**
   * Drop a record entirely. Used only to undo the operation that created it.
   */
  forget(principal: Principal): void {
    this._accounts.delete(principal);
  }

  /**
   * Readonly view of one account.
   */
  state(principal: Principal): AccountState {
    const record = this._accounts.get(principal);
    return {
      principal,
      balance: record?.balance ?? 0n,
      depositCount: record?.depositCount ?? 0,
      withdrawCount: record?.withdrawCount ?? 0,
    };
  }

  history(principal: Principal): AccountHistory {
    const record = this._accounts.get(principal);
    return {
      principal,
      deposits: record !== undefined ? [...record.deposits] : [],
      withdrawals: record !== undefined ? [...record.withdrawals] : [],
    };
  }

  principals(): readonly Principal[] {
    return [...this._accounts.keys()];
  }

  /**
   * Iterate over every record (for invariant audits).
   */
  entries(): IterableIterator<[Principal, AccountRecord]> {
    return this._accounts.entries();
  }

  get count(): number {
    return this._accounts.size;
  }
}

export function assertPrincipal(principal: Principal): void {
  if (!isPrincipal(principal)) {
    throw new LedgerError(
      "INVALID_PRINCIPAL",
      `Invalid principal: "${String(principal)}"`,
    );
  }
}
