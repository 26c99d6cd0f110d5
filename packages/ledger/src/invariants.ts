/**
 * @custody/ledger — Invariant audit.
 *
 * Recomputes the ledger's guarantees from first principles
 * (per-account records and the operation journal) and reports
 * every violation found. Never throws for a violation.
 */

import type { Amount } from "@custody/types";
import type { AccountBook } from "./accounts.js";
import { sumAmounts } from "./amount-math.js";
import type {
  InvariantReport,
  InvariantViolation,
  LedgerOperation,
  LedgerTotals,
  ResolvedLedgerConfig,
} from "./types.js";

export interface AuditInput {
  readonly config: ResolvedLedgerConfig;
  readonly book: AccountBook;
  readonly totals: LedgerTotals;
  readonly journal: readonly LedgerOperation[];
}

/**
 * Audit a ledger's state.
 *
 * Checks:
 * - No negative balance or total
 * - totalDeposited − totalWithdrawn equals the sum of balances
 * - Held value within capacity (and lifetime deposits, under "lifetime")
 * - No recorded withdrawal above the per-operation limit
 * - Counters equal the number of journaled operations of their kind
 */
export function auditInvariants(input: AuditInput): InvariantReport {
  const { config, book, totals, journal } = input;
  const violations: InvariantViolation[] = [];

  if (totals.totalDeposited < 0n || totals.totalWithdrawn < 0n) {
    violations.push({
      invariant: "NON_NEGATIVE",
      detail: `Negative totals: deposited=${totals.totalDeposited.toString()}, withdrawn=${totals.totalWithdrawn.toString()}`,
    });
  }

  let held: Amount = 0n;
  let depositCount = 0;
  let withdrawCount = 0;

  for (const [principal, record] of book.entries()) {
    if (record.balance < 0n) {
      violations.push({
        invariant: "NON_NEGATIVE",
        detail: `Account "${principal}" has negative balance ${record.balance.toString()}`,
      });
    }

    const credited = sumAmounts(record.deposits);
    const debited = sumAmounts(record.withdrawals);
    if (credited - debited !== record.balance) {
      violations.push({
        invariant: "CONSERVATION",
        detail: `Account "${principal}" history nets ${(credited - debited).toString()} but balance is ${record.balance.toString()}`,
      });
    }

    if (
      record.deposits.length !== record.depositCount ||
      record.withdrawals.length !== record.withdrawCount
    ) {
      violations.push({
        invariant: "COUNTERS",
        detail: `Account "${principal}" counters (${record.depositCount}/${record.withdrawCount}) disagree with history (${record.deposits.length}/${record.withdrawals.length})`,
      });
    }

    held += record.balance;
    depositCount += record.depositCount;
    withdrawCount += record.withdrawCount;
  }

  if (totals.totalDeposited - totals.totalWithdrawn !== held) {
    violations.push({
      invariant: "CONSERVATION",
      detail: `deposited − withdrawn = ${(totals.totalDeposited - totals.totalWithdrawn).toString()} but balances sum to ${held.toString()}`,
    });
  }

  if (held > config.capacityLimit) {
    violations.push({
      invariant: "CAPACITY",
      detail: `Held balance ${held.toString()} exceeds capacity ${config.capacityLimit.toString()}`,
    });
  }

  if (config.capacityBasis === "lifetime" && totals.totalDeposited > config.capacityLimit) {
    violations.push({
      invariant: "CAPACITY",
      detail: `Lifetime deposits ${totals.totalDeposited.toString()} exceed capacity ${config.capacityLimit.toString()}`,
    });
  }

  const journalDeposits = journal.filter((op) => op.kind === "deposit").length;
  const journalWithdrawals = journal.length - journalDeposits;

  for (const op of journal) {
    if (op.kind === "withdraw" && op.amount > config.perOperationWithdrawLimit) {
      violations.push({
        invariant: "WITHDRAW_LIMIT",
        detail: `Withdrawal #${op.sequence} of ${op.amount.toString()} exceeds limit ${config.perOperationWithdrawLimit.toString()}`,
      });
    }
  }

  if (
    totals.totalDepositOperations !== journalDeposits ||
    totals.totalWithdrawOperations !== journalWithdrawals ||
    depositCount !== journalDeposits ||
    withdrawCount !== journalWithdrawals
  ) {
    violations.push({
      invariant: "COUNTERS",
      detail: `Global counters (${totals.totalDepositOperations}/${totals.totalWithdrawOperations}) and account counters (${depositCount}/${withdrawCount}) disagree with journal (${journalDeposits}/${journalWithdrawals})`,
    });
  }

  return {
    valid: violations.length === 0,
    heldBalance: held,
    violations,
  };
}
