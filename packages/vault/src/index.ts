/**
 * @custody/vault — Guarded custody executor.
 *
 * Wraps a @custody/ledger Ledger with:
 * - A reentrancy guard (one operation in flight, re-entry refused)
 * - Checks-effects-interactions ordering for withdrawals
 * - All-or-nothing rollback when the outbound transfer fails
 * - Completion events on a @custody/event-store EventStore
 */

export { CustodyVault } from "./vault.js";
export { ReentrancyGuard, GuardError } from "./guard.js";
export type { Advance, GuardErrorCode } from "./guard.js";

export type {
  TransferFn,
  OperationPhase,
  CreditSource,
  OperationContext,
  TransferFault,
  VaultReceipt,
  CustodyVaultOptions,
} from "./types.js";
