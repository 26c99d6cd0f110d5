/**
 * @custody/ledger — Bounded custody ledger core.
 *
 * A pure TypeScript ledger with zero runtime dependencies.
 * Enforces the custody invariants:
 * - No negative balance, ever (arithmetic fails closed)
 * - deposited − withdrawn equals the sum of balances
 * - Held value never exceeds the capacity limit
 * - No single withdrawal exceeds the per-operation limit
 * - Counters move by exactly one per successful operation
 */

// Core engine
export { Ledger, resolveConfig } from "./ledger.js";

// Account book
export { AccountBook, assertPrincipal } from "./accounts.js";
export type { AccountRecord } from "./accounts.js";

// Invariant audit
export { auditInvariants } from "./invariants.js";
export type { AuditInput } from "./invariants.js";

// Amount arithmetic
export {
  parseAmount,
  formatAmount,
  assertAmount,
  checkedAdd,
  checkedSub,
  sumAmounts,
} from "./amount-math.js";

// Types
export type {
  LedgerConfig,
  ResolvedLedgerConfig,
  OperationKind,
  LedgerOperation,
  OperationReceipt,
  LedgerTotals,
  LedgerCheckpoint,
  InvariantViolation,
  InvariantReport,
  LedgerSnapshot,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError, CustodyError } from "./types.js";
