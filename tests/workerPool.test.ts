import { describe, it, expect } from "vitest";

import { WorkerPool } from "../src/execution/local/workerPool.js";

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("WorkerPool", () => {
  it("never runs more than size tasks at once and starts them in order", async () => {
    const pool = new WorkerPool(2);
    const gates = [deferred(), deferred(), deferred(), deferred()];
    const started: number[] = [];
    let peak = 0;

    const results = gates.map((gate, i) =>
      pool.run(async () => {
        started.push(i);
        peak = Math.max(peak, pool.running);
        await gate.promise;
        return i * 10;
      })
    );

    expect(started).toEqual([0, 1]);
    expect(pool.running).toBe(2);
    expect(pool.pending).toBe(2);

    gates[1]?.resolve();
    await results[1];
    await new Promise<void>((r) => setImmediate(r));
    expect(started).toEqual([0, 1, 2]);

    for (const gate of gates) gate.resolve();
    expect(await Promise.all(results)).toEqual([0, 10, 20, 30]);
    expect(peak).toBe(2);
    expect(pool.running).toBe(0);
    expect(pool.pending).toBe(0);
  });

  it("releases the slot when a task rejects", async () => {
    const pool = new WorkerPool(1);
    await expect(pool.run(async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    expect(await pool.run(async () => "next")).toBe("next");
  });

  it("rejects a size below one", () => {
    expect(() => new WorkerPool(0)).toThrow("worker pool size must be an integer >= 1, got 0");
  });
});
