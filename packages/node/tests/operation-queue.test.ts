import { describe, it, expect } from "vitest";
import { OperationQueue } from "../src/services/operation-queue.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("OperationQueue", () => {
  it("runs tasks one at a time in arrival order", async () => {
    const queue = new OperationQueue();
    const log: string[] = [];
    const gate = deferred();

    const first = queue.run(async () => {
      log.push("first:start");
      await gate.promise;
      log.push("first:end");
      return 1;
    });
    const second = queue.run(async () => {
      log.push("second");
      return 2;
    });

    expect(queue.pending).toBe(2);
    gate.resolve();

    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(log).toEqual(["first:start", "first:end", "second"]);
    expect(queue.pending).toBe(0);
  });

  it("keeps going after a failed task", async () => {
    const queue = new OperationQueue();

    const failed = queue.run(async () => {
      throw new Error("nope");
    });
    const next = queue.run(async () => "ok");

    await expect(failed).rejects.toThrow("nope");
    await expect(next).resolves.toBe("ok");
  });

  it("drain waits for queued work", async () => {
    const queue = new OperationQueue();
    const gate = deferred();
    let done = false;

    const task = queue.run(async () => {
      await gate.promise;
      done = true;
    });

    const drained = queue.drain();
    gate.resolve();
    await drained;

    expect(done).toBe(true);
    await task;
  });
});
