/**
 * Tests for CustodyService — the composition root behind the routes.
 */

import { describe, it, expect, vi } from "vitest";
import pino from "pino";
import { CustodyError } from "@custody/ledger";
import { CustodyService } from "../src/services/custody-service.js";
import { InMemoryTransferGateway } from "../src/services/transfer-gateway.js";

const LEDGER = { capacityLimit: 1000n, perOperationWithdrawLimit: 100n, owner: "owner" };

describe("CustodyService", () => {
  it("routes withdrawals to the gateway", async () => {
    const gateway = new InMemoryTransferGateway(() => new Date("2025-01-01T00:00:00.000Z"));
    const service = new CustodyService({ ledger: LEDGER, gateway });

    await service.deposit("alice", 200n);
    await service.withdraw("alice", 70n);

    expect(gateway.payouts()).toEqual([
      { to: "alice", amount: 70n, sentAt: "2025-01-01T00:00:00.000Z" },
    ]);
  });

  it("logs a failed transfer at error level and rethrows", async () => {
    const logger = pino({ level: "silent" });
    const errorSpy = vi.spyOn(logger, "error");
    const transportError = new Error("down");
    const service = new CustodyService({
      ledger: LEDGER,
      logger,
      gateway: {
        send: async () => {
          throw transportError;
        },
      },
    });

    await service.deposit("alice", 200n);
    await expect(service.withdraw("alice", 70n)).rejects.toBeInstanceOf(CustodyError);

    expect(errorSpy).toHaveBeenCalledWith(
      { principal: "alice", amount: "70", err: transportError },
      "Withdrawal transfer failed; ledger rolled back",
    );
    expect(service.getAccount("alice").balance).toBe(200n);
  });

  it("reports capacity under the configured basis", async () => {
    const service = new CustodyService({ ledger: LEDGER });
    await service.deposit("alice", 400n);
    await service.withdraw("alice", 100n);

    expect(service.capacity()).toEqual({
      capacityLimit: 1000n,
      perOperationWithdrawLimit: 100n,
      capacityBasis: "held",
      remainingCapacity: 700n,
      heldBalance: 300n,
      totalDeposited: 400n,
    });
  });

  it("is ready when invariants and the chain hold", async () => {
    const service = new CustodyService({ ledger: LEDGER });
    await service.receive("bob", 5n);

    const report = service.checkReadiness();
    expect(report.ready).toBe(true);
    expect(report.invariants.heldBalance).toBe(5n);
    expect(report.integrity.lastVerifiedPosition).toBe(1);
  });

  it("logs subscriber failures instead of failing the operation", async () => {
    const logger = pino({ level: "silent" });
    const errorSpy = vi.spyOn(logger, "error");
    const service = new CustodyService({ ledger: LEDGER, logger });
    service.eventStore.subscribeAll(() => {
      throw new Error("consumer down");
    });

    const receipt = await service.deposit("alice", 5n);

    expect(receipt.balance).toBe(5n);
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it("logs an unrecorded completion event and still returns the receipt", async () => {
    const logger = pino({ level: "silent" });
    const errorSpy = vi.spyOn(logger, "error");
    const service = new CustodyService({ ledger: LEDGER, logger });
    const storeError = new Error("store offline");
    vi.spyOn(service.eventStore, "append").mockImplementation(() => {
      throw storeError;
    });

    const receipt = await service.deposit("alice", 5n);

    expect(receipt.balance).toBe(5n);
    expect(errorSpy).toHaveBeenCalledWith(
      { err: storeError, eventType: "custody.deposited", eventId: expect.any(String) },
      "Completion event not recorded",
    );
  });

  it("queues concurrent callers instead of rejecting them", async () => {
    const service = new CustodyService({ ledger: LEDGER });
    const results = await Promise.allSettled([
      service.deposit("alice", 1n),
      service.deposit("bob", 1n),
    ]);
    expect(results.map((r) => r.status)).toEqual(["fulfilled", "fulfilled"]);
    expect(service.pendingOperations).toBe(0);
  });
});
