import { describe, it, expect } from "vitest";

import { runPool } from "../../../src/ingest/worker-pool.js";

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

describe("ingest/worker-pool", () => {
  it("should keep results in input order", async () => {
    const results = await runPool([30, 10, 20], 3, async (ms, index) => {
      await delay(ms);
      return `${String(index)}:${String(ms)}`;
    });

    expect(results).toEqual(["0:30", "1:10", "2:20"]);
  });

  it("should never run more than the concurrency limit", async () => {
    let active = 0;
    let peak = 0;

    await runPool([1, 2, 3, 4, 5, 6], 2, async () => {
      active++;
      peak = Math.max(peak, active);
      await delay(5);
      active--;
    });

    expect(peak).toBe(2);
  });

  it("should run every item once", async () => {
    const seen: number[] = [];

    await runPool([1, 2, 3, 4, 5], 10, async (item) => {
      seen.push(item);
      await delay(1);
    });

    expect([...seen].sort()).toEqual([1, 2, 3, 4, 5]);
  });

  it("should return an empty list for no items", async () => {
    await expect(runPool([], 3, async () => 1)).resolves.toEqual([]);
  });

  it("should reject when a task fails", async () => {
    await expect(
      runPool([1, 2], 2, async (item) => {
        if (item === 2) {
          throw new Error("task 2 failed");
        }
        return item;
      })
    ).rejects.toThrow("task 2 failed");
  });
});
