import { describe, expect, it } from "vitest";
import { Filter } from "../../src/cache/filter.js";
import { InFlightRegistry } from "../../src/engine/in-flight.js";

const IDENTITY = "balance:0x00000000000000000000000000000000000000aa@1";

describe("InFlightRegistry", () => {
  it("reports overlapping fetches with comparable filters", () => {
    const registry = new InFlightRegistry();
    registry.claim(IDENTITY, Filter.EMPTY, { start: 0, end: 100 });

    expect(registry.conflicts(IDENTITY, Filter.from({ from: "0xa0" }), { start: 50, end: 150 })).toHaveLength(1);
    expect(registry.conflicts(IDENTITY, Filter.EMPTY, { start: 101, end: 150 })).toEqual([]);
    expect(registry.conflicts("other", Filter.EMPTY, { start: 0, end: 100 })).toEqual([]);
  });

  it("ignores fetches with incomparable filters", () => {
    const registry = new InFlightRegistry();
    registry.claim(IDENTITY, Filter.from({ from: "0xa0" }), { start: 0, end: 100 });

    expect(registry.conflicts(IDENTITY, Filter.from({ from: "0xa1" }), { start: 0, end: 100 })).toEqual([]);
  });

  it("settles waiters and forgets the fetch on release", async () => {
    const registry = new InFlightRegistry();
    const claim = registry.claim(IDENTITY, Filter.EMPTY, { start: 0, end: 100 });
    expect(registry.size).toBe(1);

    claim.release();
    claim.release();

    await expect(claim.fetch.settled).resolves.toBeUndefined();
    expect(registry.size).toBe(0);
    expect(registry.conflicts(IDENTITY, Filter.EMPTY, { start: 0, end: 100 })).toEqual([]);
  });
});
