/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Amounts travel as base-10 integer strings: JSON numbers cannot carry
 * values above 2^53 exactly.
 */

import { z } from "zod";
import type {
  AccountState,
  AmountString,
  GlobalStats,
  Principal,
} from "@custody/types";
import type { VaultReceipt } from "@custody/vault";
import type { CapacityView } from "../services/custody-service.js";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AmountSchema = z
  .string()
  .max(78)
  .regex(/^(0|[1-9]\d*)$/, "Amount must be a non-negative integer string");

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Operation DTOs
// =============================================================================

export const AmountRequestSchema = z.object({
  amount: AmountSchema,
});

export type AmountRequestDto = z.infer<typeof AmountRequestSchema>;

export interface OperationResponse {
  readonly sequence: number;
  readonly kind: "deposit" | "withdraw";
  readonly principal: Principal;
  readonly amount: AmountString;
  readonly balance: AmountString;
  readonly via?: string | undefined;
  readonly eventId?: string | undefined;
}

export function toOperationResponse(receipt: VaultReceipt): OperationResponse {
  return {
    sequence: receipt.sequence,
    kind: receipt.kind,
    principal: receipt.principal,
    amount: receipt.amount.toString(),
    balance: receipt.balance.toString(),
    via: receipt.via,
    eventId: receipt.eventId,
  };
}

// =============================================================================
// Query DTOs
// =============================================================================

export interface AccountResponse {
  readonly principal: Principal;
  readonly balance: AmountString;
  readonly depositCount: number;
  readonly withdrawCount: number;
}

export function toAccountResponse(account: AccountState): AccountResponse {
  return {
    principal: account.principal,
    balance: account.balance.toString(),
    depositCount: account.depositCount,
    withdrawCount: account.withdrawCount,
  };
}

export interface StatsResponse {
  readonly totalDepositOperations: number;
  readonly totalWithdrawOperations: number;
  readonly currentHeldBalance: AmountString;
}

export function toStatsResponse(stats: GlobalStats): StatsResponse {
  return {
    totalDepositOperations: stats.totalDepositOperations,
    totalWithdrawOperations: stats.totalWithdrawOperations,
    currentHeldBalance: stats.currentHeldBalance.toString(),
  };
}

export interface CapacityResponse {
  readonly capacityLimit: AmountString;
  readonly remainingCapacity: AmountString;
  readonly perOperationWithdrawLimit: AmountString;
  readonly capacityBasis: string;
  readonly heldBalance: AmountString;
  readonly totalDeposited: AmountString;
}

export function toCapacityResponse(view: CapacityView): CapacityResponse {
  return {
    capacityLimit: view.capacityLimit.toString(),
    remainingCapacity: view.remainingCapacity.toString(),
    perOperationWithdrawLimit: view.perOperationWithdrawLimit.toString(),
    capacityBasis: view.capacityBasis,
    heldBalance: view.heldBalance.toString(),
    totalDeposited: view.totalDeposited.toString(),
  };
}

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;
