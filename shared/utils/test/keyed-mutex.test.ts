import { describe, it, expect } from "vitest";
import { KeyedMutex } from "../src/keyed-mutex";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyedMutex", () => {
  it("should serialize sections sharing a key", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive("account-1", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = mutex.runExclusive("account-1", async () => {
      order.push("second:start");
    });

    await Promise.resolve();
    expect(order).toEqual(["first:start"]);

    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(["first:start", "first:end", "second:start"]);
  });

  it("should let different keys run concurrently", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const started: string[] = [];

    const first = mutex.runExclusive("a", async () => {
      started.push("a");
      await gate.promise;
    });
    const second = mutex.runExclusive("b", async () => {
      started.push("b");
    });

    await second;
    expect(started).toEqual(["a", "b"]);

    gate.resolve();
    await first;
  });

  it("should release the key when the section throws", async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive("a", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(mutex.isLocked("a")).toBe(false);
    await expect(mutex.runExclusive("a", async () => 42)).resolves.toBe(42);
  });

  it("should hold every key for runExclusiveAll", async () => {
    const mutex = new KeyedMutex();
    let observed: boolean[] = [];

    await mutex.runExclusiveAll(["b", "a", "a"], async () => {
      observed = [mutex.isLocked("a"), mutex.isLocked("b")];
    });

    expect(observed).toEqual([true, true]);
    expect(mutex.isLocked("a")).toBe(false);
    expect(mutex.isLocked("b")).toBe(false);
  });
});
