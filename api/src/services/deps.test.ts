import { describe, it, expect } from "vitest";
import { mapInBatches } from "./deps.js";

describe("mapInBatches", () => {
  it("keeps input order", async () => {
    const result = await mapInBatches([3, 1, 2], async (n) => n * 10, 2);
    expect(result).toEqual([30, 10, 20]);
  });

  it("never runs more than one batch at a time", async () => {
    let inFlight = 0;
    let peak = 0;
    const ids = Array.from({ length: 10 }, (_, i) => `r${i}`);

    await mapInBatches(
      ids,
      async (id) => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 1));
        inFlight--;
        return id;
      },
      4,
    );

    expect(peak).toBe(4);
  });

  it("handles an empty list", async () => {
    expect(await mapInBatches([], async (n: number) => n)).toEqual([]);
  });
});
