/**
 * Rejection Types
 *
 * Every refused custody operation is described by a Rejection.
 * Each variant carries enough detail to reconstruct the decision
 * (attempted amount vs. the limit or balance it ran into).
 */

import type { Amount, Principal } from "./financial.js";

export type RejectionCode =
  | "ZERO_AMOUNT"
  | "CAPACITY_EXCEEDED"
  | "INSUFFICIENT_BALANCE"
  | "WITHDRAW_LIMIT_EXCEEDED"
  | "TRANSFER_FAILED"
  | "REENTRANCY_REJECTED"
  | "NOT_AUTHORIZED";

export type Rejection =
  | { readonly code: "ZERO_AMOUNT" }
  | {
      readonly code: "CAPACITY_EXCEEDED";
      readonly attempted: Amount;
      readonly remainingCapacity: Amount;
    }
  | {
      readonly code: "INSUFFICIENT_BALANCE";
      readonly available: Amount;
      readonly requested: Amount;
    }
  | {
      readonly code: "WITHDRAW_LIMIT_EXCEEDED";
      readonly requested: Amount;
      readonly limit: Amount;
    }
  | {
      readonly code: "TRANSFER_FAILED";
      readonly to: Principal;
      readonly amount: Amount;
    }
  | { readonly code: "REENTRANCY_REJECTED" }
  | {
      readonly code: "NOT_AUTHORIZED";
      readonly caller: Principal;
      readonly account: Principal;
    };

/**
 * Outcome of a pure admissibility check.
 */
export type ValidationResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly rejection: Rejection };

/**
 * Human-readable summary of a rejection.
 */
export function describeRejection(rejection: Rejection): string {
  switch (rejection.code) {
    case "ZERO_AMOUNT":
      return "Amount must be greater than zero";
    case "CAPACITY_EXCEEDED":
      return `Deposit of ${rejection.attempted.toString()} exceeds remaining capacity of ${rejection.remainingCapacity.toString()}`;
    case "INSUFFICIENT_BALANCE":
      return `Withdrawal of ${rejection.requested.toString()} exceeds available balance of ${rejection.available.toString()}`;
    case "WITHDRAW_LIMIT_EXCEEDED":
      return `Withdrawal of ${rejection.requested.toString()} exceeds per-operation limit of ${rejection.limit.toString()}`;
    case "TRANSFER_FAILED":
      return `Transfer of ${rejection.amount.toString()} to '${rejection.to}' failed`;
    case "REENTRANCY_REJECTED":
      return "Operation rejected: another custody operation is in progress";
    case "NOT_AUTHORIZED":
      return `'${rejection.caller}' is not authorized to read history of '${rejection.account}'`;
  }
}

/**
 * JSON-safe view of a rejection's detail fields (bigints as strings).
 */
export function rejectionDetails(
  rejection: Rejection,
): Record<string, string> {
  const details: Record<string, string> = {};
  for (const [key, value] of Object.entries(rejection)) {
    if (key === "code") continue;
    details[key] = typeof value === "bigint" ? value.toString() : String(value);
  }
  return details;
}
