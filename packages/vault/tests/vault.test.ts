/**
 * Tests for CustodyVault — the guarded custody executor.
 *
 * Verifies:
 * - Deposits, receives and withdrawals update the ledger and emit events
 * - Rejections surface unchanged and touch nothing
 * - Withdrawals debit before the transfer runs
 * - Transfer failure rolls the withdrawal back completely
 * - Re-entry from inside a transfer is refused
 * - A failing notification never fails a committed operation
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import type { Mock } from "vitest";
import { Ledger, CustodyError } from "@custody/ledger";
import {
  EventStoreError,
  InMemoryEventStore,
  isDepositedEvent,
  isWithdrawnEvent,
} from "@custody/event-store";
import { CustodyVault } from "../src/vault.js";
import type { TransferFn } from "../src/types.js";

// =============================================================================
// Helpers
// =============================================================================

const FIXED = new Date("2025-03-01T10:00:00.000Z");

function makeLedger(): Ledger {
  return new Ledger({
    capacityLimit: 1000n,
    perOperationWithdrawLimit: 100n,
    owner: "owner",
  });
}

async function failureOf(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => undefined,
    (error: unknown) => error,
  );
}

// =============================================================================
// Tests
// =============================================================================

describe("CustodyVault", () => {
  let ledger: Ledger;
  let store: InMemoryEventStore;
  let transfer: Mock<TransferFn>;
  let vault: CustodyVault;

  beforeEach(() => {
    ledger = makeLedger();
    store = new InMemoryEventStore({ now: () => FIXED });
    transfer = vi.fn<TransferFn>();
    vault = new CustodyVault({ ledger, eventStore: store, transfer, now: () => FIXED });
  });

  // ─── Deposit ──────────────────────────────────────────────────────────

  describe("deposit", () => {
    it("credits the principal and returns a receipt", async () => {
      const receipt = await vault.deposit("alice", 600n);

      expect(receipt.kind).toBe("deposit");
      expect(receipt.principal).toBe("alice");
      expect(receipt.amount).toBe(600n);
      expect(receipt.balance).toBe(600n);
      expect(receipt.via).toBe("deposit");
      expect(vault.balanceOf("alice")).toBe(600n);
      expect(vault.remainingCapacity()).toBe(400n);
    });

    it("emits custody.deposited on the principal's stream", async () => {
      const receipt = await vault.deposit("alice", 600n, { correlationId: "req-1" });

      const events = store.read("account:alice");
      expect(events).toHaveLength(1);
      const stored = events[0]!;
      expect(isDepositedEvent(stored)).toBe(true);
      expect(stored.event.payload).toEqual({
        principal: "alice",
        amount: "600",
        balance: "600",
        via: "deposit",
        sequence: 1,
      });
      expect(stored.event.metadata.actor).toBe("alice");
      expect(stored.event.metadata.correlationId).toBe("req-1");
      expect(stored.event.metadata.timestamp).toBe("2025-03-01T10:00:00.000Z");
      expect(receipt.eventId).toBe(stored.event.metadata.eventId);
    });

    it("rejects a zero amount without touching state", async () => {
      const error = await failureOf(vault.deposit("alice", 0n));

      expect(error).toBeInstanceOf(CustodyError);
      if (error instanceof CustodyError) {
        expect(error.rejection).toEqual({ code: "ZERO_AMOUNT" });
      }
      expect(vault.globalStats()).toEqual({
        totalDepositOperations: 0,
        totalWithdrawOperations: 0,
        currentHeldBalance: 0n,
      });
      expect(store.globalPosition()).toBe(0);
      expect(vault.phase).toBe("idle");
    });

    it("rejects a deposit over remaining capacity with its detail", async () => {
      await vault.deposit("alice", 600n);
      const error = await failureOf(vault.deposit("bob", 500n));

      expect(error).toBeInstanceOf(CustodyError);
      if (error instanceof CustodyError) {
        expect(error.rejection).toEqual({
          code: "CAPACITY_EXCEEDED",
          attempted: 500n,
          remainingCapacity: 400n,
        });
        expect(error.message).toBe("Deposit of 500 exceeds remaining capacity of 400");
      }
      expect(vault.balanceOf("bob")).toBe(0n);
    });

    it("never calls the transfer", async () => {
      await vault.deposit("alice", 10n);
      expect(transfer).not.toHaveBeenCalled();
    });
  });

  // ─── Receive ──────────────────────────────────────────────────────────

  describe("receive", () => {
    it("follows the deposit rules and tags the event", async () => {
      const receipt = await vault.receive("alice", 25n);

      expect(receipt.via).toBe("receive");
      expect(vault.balanceOf("alice")).toBe(25n);
      expect(ledger.getAccount("alice").depositCount).toBe(1);
      expect(store.read("account:alice")[0]!.event.payload["via"]).toBe("receive");
    });

    it("is bounded by capacity", async () => {
      await vault.deposit("alice", 1000n);
      await expect(vault.receive("bob", 1n)).rejects.toMatchObject({
        code: "CAPACITY_EXCEEDED",
      });
    });
  });

  // ─── Withdraw ─────────────────────────────────────────────────────────

  describe("withdraw", () => {
    beforeEach(async () => {
      await vault.deposit("alice", 600n);
    });

    it("debits and transfers to the principal", async () => {
      const receipt = await vault.withdraw("alice", 100n);

      expect(receipt.balance).toBe(500n);
      expect(transfer).toHaveBeenCalledTimes(1);
      expect(transfer).toHaveBeenCalledWith("alice", 100n);
      expect(ledger.totals().totalWithdrawn).toBe(100n);
    });

    it("completes the debit before the transfer runs", async () => {
      const seen: { balance: bigint; phase: string }[] = [];
      transfer.mockImplementation(() => {
        seen.push({ balance: vault.balanceOf("alice"), phase: vault.phase });
      });

      await vault.withdraw("alice", 100n);

      expect(seen).toEqual([{ balance: 500n, phase: "transferring" }]);
      expect(vault.phase).toBe("idle");
    });

    it("emits custody.withdrawn after the transfer succeeds", async () => {
      await vault.withdraw("alice", 100n);

      const events = store.read("account:alice");
      expect(events).toHaveLength(2);
      const stored = events[1]!;
      expect(isWithdrawnEvent(stored)).toBe(true);
      expect(stored.event.payload).toEqual({
        principal: "alice",
        amount: "100",
        balance: "500",
        sequence: 2,
      });
    });

    it("rejects a withdrawal above the per-operation limit", async () => {
      await expect(vault.withdraw("alice", 150n)).rejects.toMatchObject({
        code: "WITHDRAW_LIMIT_EXCEEDED",
        rejection: { code: "WITHDRAW_LIMIT_EXCEEDED", requested: 150n, limit: 100n },
      });
      expect(transfer).not.toHaveBeenCalled();
      expect(vault.balanceOf("alice")).toBe(600n);
    });

    it("rejects an overdraft", async () => {
      await expect(vault.withdraw("bob", 1n)).rejects.toMatchObject({
        rejection: { code: "INSUFFICIENT_BALANCE", available: 0n, requested: 1n },
      });
    });
  });

  // ─── Transfer failure ─────────────────────────────────────────────────

  describe("transfer failure", () => {
    beforeEach(async () => {
      await vault.deposit("alice", 600n);
    });

    it("rolls the withdrawal back and reports TRANSFER_FAILED", async () => {
      const transportError = new Error("payee unreachable");
      transfer.mockImplementation(() => {
        throw transportError;
      });
      const before = ledger.totals();

      const error = await failureOf(vault.withdraw("alice", 100n));

      expect(error).toBeInstanceOf(CustodyError);
      if (error instanceof CustodyError) {
        expect(error.rejection).toEqual({ code: "TRANSFER_FAILED", to: "alice", amount: 100n });
        expect(error.cause).toBe(transportError);
        expect(error.message).toBe("Transfer of 100 to 'alice' failed");
      }
      expect(ledger.totals()).toEqual(before);
      expect(vault.balanceOf("alice")).toBe(600n);
      expect(ledger.getAccount("alice").withdrawCount).toBe(0);
      expect(vault.historyOf("alice", "alice").withdrawals).toEqual([]);
      expect(ledger.checkInvariants().valid).toBe(true);
    });

    it("handles an asynchronous rejection the same way", async () => {
      transfer.mockRejectedValue(new Error("timeout"));

      await expect(vault.withdraw("alice", 50n)).rejects.toMatchObject({
        code: "TRANSFER_FAILED",
      });
      expect(vault.balanceOf("alice")).toBe(600n);
    });

    it("records the fault and emits no withdrawal event", async () => {
      const transportError = new Error("payee unreachable");
      transfer.mockImplementation(() => {
        throw transportError;
      });

      await failureOf(vault.withdraw("alice", 100n));

      expect(vault.lastFault).toEqual({
        principal: "alice",
        amount: 100n,
        error: transportError,
        occurredAt: "2025-03-01T10:00:00.000Z",
      });
      expect(store.read("account:alice")).toHaveLength(1);
      expect(vault.phase).toBe("idle");
    });

    it("accepts new operations after a fault", async () => {
      transfer.mockImplementationOnce(() => {
        throw new Error("once");
      });
      await failureOf(vault.withdraw("alice", 100n));

      const receipt = await vault.withdraw("alice", 100n);
      expect(receipt.balance).toBe(500n);
    });
  });

  // ─── Reentrancy ───────────────────────────────────────────────────────

  describe("reentrancy", () => {
    beforeEach(async () => {
      await vault.deposit("alice", 600n);
    });

    it("refuses a withdrawal re-entered from inside the transfer", async () => {
      let inner: unknown;
      transfer.mockImplementation(async () => {
        inner = await failureOf(vault.withdraw("alice", 100n));
      });

      await vault.withdraw("alice", 100n);

      expect(inner).toBeInstanceOf(CustodyError);
      if (inner instanceof CustodyError) {
        expect(inner.rejection).toEqual({ code: "REENTRANCY_REJECTED" });
      }
      expect(vault.balanceOf("alice")).toBe(500n);
      expect(ledger.getAccount("alice").withdrawCount).toBe(1);
      expect(transfer).toHaveBeenCalledTimes(1);
    });

    it("refuses a deposit re-entered from inside the transfer", async () => {
      let inner: unknown;
      transfer.mockImplementation(async () => {
        inner = await failureOf(vault.deposit("alice", 1n));
      });

      await vault.withdraw("alice", 100n);

      expect(inner).toMatchObject({ code: "REENTRANCY_REJECTED" });
      expect(ledger.getAccount("alice").depositCount).toBe(1);
    });

    it("rolls back when the transfer propagates the re-entry failure", async () => {
      transfer.mockImplementation(async () => {
        await vault.withdraw("alice", 100n);
      });

      const error = await failureOf(vault.withdraw("alice", 100n));

      expect(error).toBeInstanceOf(CustodyError);
      if (error instanceof CustodyError) {
        expect(error.code).toBe("TRANSFER_FAILED");
        expect(error.cause).toMatchObject({ code: "REENTRANCY_REJECTED" });
      }
      expect(vault.balanceOf("alice")).toBe(600n);
    });

    it("refuses a second caller while a transfer is pending", async () => {
      let release: () => void = () => undefined;
      transfer.mockImplementation(
        () => new Promise<void>((resolve) => {
          release = resolve;
        }),
      );

      const first = vault.withdraw("alice", 100n);
      const second = vault.deposit("bob", 10n);

      await expect(second).rejects.toMatchObject({ code: "REENTRANCY_REJECTED" });
      release();
      await expect(first).resolves.toMatchObject({ balance: 500n });
      expect(vault.balanceOf("bob")).toBe(0n);
    });
  });

  // ─── Notification failures ────────────────────────────────────────────

  describe("notification failures", () => {
    it("refuses a subscriber's re-entry and still resolves when it throws", async () => {
      let inner: Promise<unknown> | undefined;
      store.subscribeAll(() => {
        inner = failureOf(vault.deposit("bob", 1n));
        throw new Error("subscriber down");
      });

      const receipt = await vault.deposit("alice", 50n);

      expect(receipt.balance).toBe(50n);
      expect(receipt.eventId).toBe(store.readAll()[0]?.event.metadata.eventId);
      expect(await inner).toMatchObject({ code: "REENTRANCY_REJECTED" });
      expect(vault.balanceOf("bob")).toBe(0n);
      expect(vault.lastNotifyError).toBeInstanceOf(EventStoreError);
      expect(vault.lastNotifyError).toMatchObject({ code: "SUBSCRIBER_FAILED" });
      expect(vault.phase).toBe("idle");
    });

    it("resolves a withdrawal whose transfer went out", async () => {
      await vault.deposit("alice", 300n);
      store.subscribeAll(() => {
        throw new Error("subscriber down");
      });

      const receipt = await vault.withdraw("alice", 100n);

      expect(receipt.balance).toBe(200n);
      expect(transfer).toHaveBeenCalledWith("alice", 100n);
      expect(ledger.totals().totalWithdrawn).toBe(100n);
    });

    it("passes append failures to onNotifyError", async () => {
      const onNotifyError = vi.fn();
      vi.spyOn(store, "append").mockImplementation(() => {
        throw new EventStoreError("INVALID_STREAM_ID", "store offline");
      });
      const failing = new CustodyVault({
        ledger: makeLedger(),
        transfer,
        eventStore: store,
        onNotifyError,
      });

      const receipt = await failing.deposit("alice", 5n);

      expect(receipt.balance).toBe(5n);
      expect(receipt.eventId).toBeUndefined();
      expect(onNotifyError).toHaveBeenCalledTimes(1);
      expect(onNotifyError.mock.calls[0]?.[0]).toMatchObject({ message: "store offline" });
      expect(onNotifyError.mock.calls[0]?.[1]).toMatchObject({ type: "custody.deposited" });
    });
  });

  // ─── Queries ──────────────────────────────────────────────────────────

  describe("queries", () => {
    it("lets a principal read its own history", async () => {
      await vault.deposit("alice", 30n);
      await vault.withdraw("alice", 10n);

      expect(vault.historyOf("alice", "alice")).toEqual({
        principal: "alice",
        deposits: [30n],
        withdrawals: [10n],
      });
    });

    it("lets the owner read any history", async () => {
      await vault.deposit("alice", 30n);
      expect(vault.historyOf("owner", "alice").deposits).toEqual([30n]);
    });

    it("refuses other callers", () => {
      expect(() => vault.historyOf("bob", "alice")).toThrow(CustodyError);
    });

    it("works without an event store", async () => {
      const bare = new CustodyVault({ ledger: makeLedger(), transfer: () => undefined });
      const receipt = await bare.deposit("alice", 5n);
      expect(receipt.eventId).toBeUndefined();
      expect(bare.globalStats().currentHeldBalance).toBe(5n);
    });
  });
});
