import { describe, it, expect } from "vitest";
import { runPool } from "./pool";

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("runPool", () => {
  it("never runs more than the limit at once", async () => {
    let active = 0;
    let peak = 0;
    const seen: number[] = [];

    await runPool([1, 2, 3, 4, 5, 6, 7], 3, async (item) => {
      active++;
      peak = Math.max(peak, active);
      await delay(5);
      seen.push(item);
      active--;
    });

    expect(peak).toBe(3);
    expect(seen.sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6, 7]);
  });

  it("hands each item to exactly one worker with its index", async () => {
    const calls: string[] = [];
    await runPool(["a", "b", "c"], 8, async (item, index) => {
      calls.push(`${index}:${item}`);
    });
    expect(calls.sort()).toEqual(["0:a", "1:b", "2:c"]);
  });

  it("resolves for an empty queue", async () => {
    let called = false;
    await runPool([], 4, async () => {
      called = true;
    });
    expect(called).toBe(false);
  });

  it("rejects with the first error", async () => {
    await expect(
      runPool([1, 2, 3], 2, async (item) => {
        if (item === 2) throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
  });
});
