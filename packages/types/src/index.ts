/**
 * @custody/types — Shared domain types for the custody stack.
 *
 * Used across all custody packages:
 * - Financial primitives (Principal, Amount, account state)
 * - Rejections (why an operation was refused)
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Financial types
export type {
  Principal,
  Amount,
  AmountString,
  AccountState,
  CapacityBasis,
  GlobalStats,
  AccountHistory,
} from "./financial.js";

// Rejections
export type {
  Rejection,
  RejectionCode,
  ValidationResult,
} from "./rejection.js";
export { describeRejection, rejectionDetails } from "./rejection.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Runtime type guards
export {
  isPrincipal,
  isAmountString,
  isCapacityBasis,
} from "./guards.js";
