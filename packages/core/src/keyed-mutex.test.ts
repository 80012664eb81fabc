import { describe, it, expect } from "vitest";
import { KeyedMutex } from "./keyed-mutex.js";

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyedMutex", () => {
  it("runs work for one key in call order", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const order: string[] = [];

    const first = mutex.run("t1", async () => {
      await gate.promise;
      order.push("first");
    });
    const second = mutex.run("t1", async () => {
      order.push("second");
    });

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(["first", "second"]);
  });

  it("does not block other keys", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const order: string[] = [];

    const slow = mutex.run("t1", async () => {
      await gate.promise;
      order.push("t1");
    });
    await mutex.run("t2", async () => {
      order.push("t2");
    });
    gate.resolve();
    await slow;

    expect(order).toEqual(["t2", "t1"]);
  });

  it("releases the key after a failure", async () => {
    const mutex = new KeyedMutex();
    await expect(mutex.run("t1", () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    await expect(mutex.run("t1", async () => 42)).resolves.toBe(42);
    expect(mutex.isLocked("t1")).toBe(false);
  });
});
