/**
 * @custody/ledger — Checked amount arithmetic.
 *
 * Amounts are non-negative bigints. Every operation that could
 * produce a negative value throws instead.
 *
 * Rules:
 * - No floating-point operations
 * - Amount strings are base-10 integers without sign or leading zeros
 * - Zero runtime dependencies
 */

import type { Amount, AmountString } from "@custody/types";
import { isAmountString } from "@custody/types";
import { LedgerError } from "./types.js";

/**
 * Parse an amount string into a bigint.
 *
 * "600" → 600n, "0" → 0n; "-1", "1.5", "007" and "" throw.
 */
export function parseAmount(amount: string): Amount {
  if (!isAmountString(amount)) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Invalid amount: "${String(amount)}". Expected a non-negative integer string`,
    );
  }
  return BigInt(amount);
}

/**
 * Render an amount as its canonical string form.
 */
export function formatAmount(amount: Amount): AmountString {
  assertAmount(amount);
  return amount.toString();
}

/**
 * Throw unless `amount` is a non-negative bigint.
 */
export function assertAmount(amount: Amount, label = "amount"): void {
  if (typeof amount !== "bigint") {
    throw new LedgerError("INVALID_AMOUNT", `${label} must be a bigint, got ${typeof amount}`);
  }
  if (amount < 0n) {
    throw new LedgerError("INVALID_AMOUNT", `${label} must be non-negative, got ${amount.toString()}`);
  }
}

export function checkedAdd(a: Amount, b: Amount): Amount {
  assertAmount(a, "left operand");
  assertAmount(b, "right operand");
  return a + b;
}

/**
 * Subtract b from a. Throws ARITHMETIC_UNDERFLOW rather than go negative.
 */
export function checkedSub(a: Amount, b: Amount): Amount {
  assertAmount(a, "left operand");
  assertAmount(b, "right operand");
  if (b > a) {
    throw new LedgerError(
      "ARITHMETIC_UNDERFLOW",
      `Cannot subtract ${b.toString()} from ${a.toString()}`,
    );
  }
  return a - b;
}

export function sumAmounts(amounts: Iterable<Amount>): Amount {
  let total = 0n;
  for (const amount of amounts) {
    total = checkedAdd(total, amount);
  }
  return total;
}
