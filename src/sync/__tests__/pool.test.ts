import { describe, expect, it } from "vitest";
import { runWithConcurrency } from "../pool";

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 1));

describe("runWithConcurrency", () => {
  it("returns results in input order", async () => {
    const results = await runWithConcurrency([3, 1, 2], 2, async (n) => {
      await tick();
      return n * 10;
    });
    expect(results).toEqual([30, 10, 20]);
  });

  it("never exceeds the limit and handles each item once", async () => {
    let inFlight = 0;
    let peak = 0;
    const seen: number[] = [];
    await runWithConcurrency(
      Array.from({ length: 20 }, (_, i) => i),
      4,
      async (n) => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await tick();
        seen.push(n);
        inFlight--;
      },
    );
    expect(peak).toBe(4);
    expect([...seen].sort((a, b) => a - b)).toEqual(Array.from({ length: 20 }, (_, i) => i));
  });

  it("passes stable worker ids below the limit", async () => {
    const workers = new Set<number>();
    await runWithConcurrency([1, 2, 3, 4, 5, 6], 3, async (_n, _i, workerId) => {
      workers.add(workerId);
      await tick();
    });
    expect([...workers].sort()).toEqual([0, 1, 2]);
  });

  it("stops taking items once stopped", async () => {
    let handled = 0;
    const results = await runWithConcurrency(
      [1, 2, 3, 4, 5],
      1,
      async (n) => {
        handled++;
        return n;
      },
      { isStopped: () => handled >= 2 },
    );
    expect(handled).toBe(2);
    expect(results).toEqual([1, 2, undefined, undefined, undefined]);
  });

  it("treats a non-positive limit as one", async () => {
    expect(await runWithConcurrency([1, 2], 0, async (n) => n)).toEqual([1, 2]);
  });

  it("handles an empty list", async () => {
    expect(await runWithConcurrency([], 4, async () => 1)).toEqual([]);
  });
});
