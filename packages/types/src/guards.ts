/**
 * Runtime Type Guards
 *
 * Narrowing functions for custody values arriving from outside the
 * type system (parsed strings, ledger configuration).
 */

import type { CapacityBasis } from "./financial.js";

const AMOUNT_PATTERN = /^(0|[1-9]\d*)$/;

export function isPrincipal(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0 && value.length <= 256;
}

/** Non-negative base-10 integer string without leading zeros. */
export function isAmountString(value: unknown): value is string {
  return typeof value === "string" && AMOUNT_PATTERN.test(value);
}

export function isCapacityBasis(value: unknown): value is CapacityBasis {
  return value === "held" || value === "lifetime";
}
