import { describe, expect, it } from "vitest";
import { mapWithConcurrency } from "../../core/concurrency";

describe("mapWithConcurrency", () => {
  it("returns results by input position", async () => {
    const delays = [20, 0, 10, 5];

    const results = await mapWithConcurrency(delays, 2, async (delay, index) => {
      await new Promise((resolve) => setTimeout(resolve, delay));
      return `item-${index}`;
    });

    expect(results).toEqual(["item-0", "item-1", "item-2", "item-3"]);
  });

  it("handles an empty list", async () => {
    await expect(mapWithConcurrency([], 5, async () => 1)).resolves.toEqual([]);
  });

  it("rounds a fractional concurrency down", async () => {
    let active = 0;
    let peak = 0;

    const results = await mapWithConcurrency([1, 2, 3, 4], 2.5, async (item) => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active -= 1;
      return item * 10;
    });

    expect(results).toEqual([10, 20, 30, 40]);
    expect(peak).toBe(2);
  });

  it("treats a concurrency below one as one", async () => {
    let active = 0;
    let peak = 0;

    await mapWithConcurrency([1, 2, 3], 0, async () => {
      active += 1;
      peak = Math.max(peak, active);
      await Promise.resolve();
      active -= 1;
    });

    expect(peak).toBe(1);
  });
});
