import { describe, expect, it } from "vitest";
import { KeyedLock, settleInChunks, TimeoutError, withTimeout } from "./tooling";

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

describe("tooling", () => {
  it("returns the result inside the budget", async () => {
    await expect(withTimeout("quick", 100, async () => 42)).resolves.toBe(42);
  });

  it("rejects with TimeoutError and aborts the signal", async () => {
    const box: { signal?: AbortSignal } = {};
    const slow = withTimeout("slow", 10, (signal) => {
      box.signal = signal;
      return new Promise<never>(() => {});
    });
    await expect(slow).rejects.toBeInstanceOf(TimeoutError);
    await expect(slow).rejects.toThrow("slow timed out after 10ms");
    expect(box.signal?.aborted).toBe(true);
  });

  it("runs chunks with bounded concurrency and keeps order", async () => {
    let active = 0;
    let peak = 0;
    const results = await settleInChunks([1, 2, 3, 4, 5], 2, async (n) => {
      active += 1;
      peak = Math.max(peak, active);
      await sleep(5);
      active -= 1;
      if (n === 3) throw new Error("three");
      return n * 10;
    });
    expect(peak).toBe(2);
    expect(results.map((r) => r.status)).toEqual([
      "fulfilled",
      "fulfilled",
      "rejected",
      "fulfilled",
      "fulfilled",
    ]);
    expect(results.flatMap((r) => (r.status === "fulfilled" ? [r.value] : []))).toEqual([
      10, 20, 40, 50,
    ]);
  });

  it("stops between chunks when asked", async () => {
    let calls = 0;
    const results = await settleInChunks(
      [1, 2, 3, 4],
      2,
      async () => {
        calls += 1;
      },
      () => calls >= 2
    );
    expect(calls).toBe(2);
    expect(results).toHaveLength(2);
  });

  it("serialises work on the same key", async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    await Promise.all([
      lock.run("k", async () => {
        order.push("a:start");
        await sleep(10);
        order.push("a:end");
      }),
      lock.run("k", async () => {
        order.push("b");
      }),
    ]);
    expect(order).toEqual(["a:start", "a:end", "b"]);
    expect(lock.size).toBe(0);
  });

  it("lets different keys run side by side", async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    await Promise.all([
      lock.run("x", async () => {
        await sleep(10);
        order.push("x");
      }),
      lock.run("y", async () => {
        order.push("y");
      }),
    ]);
    expect(order).toEqual(["y", "x"]);
  });

  it("releases the key when the work throws", async () => {
    const lock = new KeyedLock();
    await expect(
      lock.run("k", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    await expect(lock.run("k", async () => 1)).resolves.toBe(1);
  });
});
