import { beforeEach, describe, expect, it } from "vitest";
import { Filter } from "../../src/cache/filter.js";
import { MemoryCacheStore } from "../../src/cache/memory-store.js";
import { RangeFilterCache } from "../../src/cache/range-filter-cache.js";
import type { FetchedRow } from "../../src/types/index.js";
import { InconsistentRangeError, InvalidRangeError } from "../../src/utils/errors.js";

const IDENTITY = "logs:0x00000000000000000000000000000000000000aa:0xddf252ad";

function row(blockNumber: number, from: string, to: string, logIndex = 0): FetchedRow {
  return {
    blockNumber,
    transactionIndex: 0,
    logIndex,
    transactionHash: null,
    fields: { from, to },
  };
}

describe("RangeFilterCache", () => {
  let store: MemoryCacheStore;
  let cache: RangeFilterCache;

  beforeEach(() => {
    store = new MemoryCacheStore();
    cache = new RangeFilterCache(store);
  });

  it("reports the whole range as a gap when nothing is cached", async () => {
    expect(await cache.coverageGaps(IDENTITY, {}, { start: 0, end: 99 })).toEqual([
      { start: 0, end: 99 },
    ]);
  });

  it("rejects invalid ranges", async () => {
    await expect(cache.coverageGaps(IDENTITY, {}, { start: 5, end: 4 })).rejects.toThrow(
      InvalidRangeError,
    );
  });

  it("serves a narrower filter from an unfiltered entry", async () => {
    await cache.commit(IDENTITY, {}, { start: 0, end: 100 }, [
      row(10, "0xa0", "0xb0"),
      row(20, "0xa1", "0xb0"),
      row(30, "0xa0", "0xb1"),
    ]);

    const filter = { from: "0xA0" };
    expect(await cache.coverageGaps(IDENTITY, filter, { start: 0, end: 100 })).toEqual([]);
    const rows = await cache.read(IDENTITY, filter, { start: 0, end: 100 });
    expect(rows.map((r) => r.blockNumber)).toEqual([10, 30]);
  });

  it("does not let a narrower entry cover a broader query", async () => {
    await cache.commit(IDENTITY, { from: "0xa0" }, { start: 0, end: 100 }, [row(10, "0xa0", "0xb0")]);

    expect(await cache.coverageGaps(IDENTITY, {}, { start: 0, end: 100 })).toEqual([
      { start: 0, end: 100 },
    ]);
    expect(await cache.coverageGaps(IDENTITY, { from: "0xa1" }, { start: 0, end: 100 })).toEqual([
      { start: 0, end: 100 },
    ]);
  });

  it("computes gaps against the union of subsuming entries", async () => {
    await cache.commit(IDENTITY, {}, { start: 100, end: 199 }, []);
    await cache.commit(IDENTITY, { from: "0xa0" }, { start: 300, end: 399 }, []);
    await cache.commit(IDENTITY, { from: "0xa1" }, { start: 0, end: 499 }, []);

    expect(await cache.coverageGaps(IDENTITY, { from: "0xa0" }, { start: 0, end: 499 })).toEqual([
      { start: 0, end: 99 },
      { start: 200, end: 299 },
      { start: 400, end: 499 },
    ]);
  });

  it("coalesces adjacent same-filter commits into one entry", async () => {
    await cache.commit(IDENTITY, {}, { start: 1000, end: 2000 }, [row(1500, "0xa0", "0xb0")]);
    await cache.commit(IDENTITY, {}, { start: 2001, end: 3000 }, [row(2500, "0xa0", "0xb0")]);

    const entries = await cache.entries(IDENTITY);
    expect(entries).toHaveLength(1);
    expect(entries[0]?.range).toEqual({ start: 1000, end: 3000 });
    expect(entries[0]?.filter.isEmpty).toBe(true);
  });

  it("keeps separate entries across a gap and for different filters", async () => {
    await cache.commit(IDENTITY, {}, { start: 0, end: 10 }, []);
    await cache.commit(IDENTITY, {}, { start: 12, end: 20 }, []);
    await cache.commit(IDENTITY, { from: "0xa0" }, { start: 11, end: 11 }, []);

    const entries = await cache.entries(IDENTITY);
    expect(entries.map((e) => [e.filter.signature, e.range.start, e.range.end])).toEqual([
      ["{\"from\":\"0xa0\"}", 11, 11],
      ["{}", 0, 10],
      ["{}", 12, 20],
    ]);
  });

  it("does not duplicate rows when overlapping commits store the same row", async () => {
    await cache.commit(IDENTITY, {}, { start: 0, end: 100 }, [row(50, "0xa0", "0xb0")]);
    await cache.commit(IDENTITY, {}, { start: 40, end: 200 }, [
      row(50, "0xa0", "0xb0"),
      row(150, "0xa0", "0xb0"),
    ]);

    const rows = await cache.read(IDENTITY, {}, { start: 0, end: 200 });
    expect(rows.map((r) => r.blockNumber)).toEqual([50, 150]);
    expect(await cache.entries(IDENTITY)).toHaveLength(1);
  });

  it("prefers the most specific covering entry and re-filters by the residual", async () => {
    await cache.commit(IDENTITY, {}, { start: 0, end: 100 }, [
      row(10, "0xa0", "0xb0"),
      row(10, "0xa0", "0xb1", 1),
    ]);
    await cache.commit(IDENTITY, { from: "0xa0", to: "0xb0" }, { start: 0, end: 50 }, [
      row(10, "0xa0", "0xb0"),
    ]);

    const rows = await cache.read(IDENTITY, { from: "0xa0", to: "0xb0" }, { start: 0, end: 100 });
    expect(rows).toEqual([row(10, "0xa0", "0xb0")]);
  });

  it("returns rows ordered by block, transaction and log index", async () => {
    await cache.commit(IDENTITY, {}, { start: 0, end: 100 }, [
      row(20, "0xa0", "0xb0", 1),
      row(5, "0xa0", "0xb0"),
      row(20, "0xa0", "0xb0", 0),
    ]);

    const rows = await cache.read(IDENTITY, {}, { start: 0, end: 100 });
    expect(rows.map((r) => [r.blockNumber, r.logIndex])).toEqual([
      [5, 0],
      [20, 0],
      [20, 1],
    ]);
  });

  it("rejects rows outside the committed range and stores nothing", async () => {
    await expect(
      cache.commit(IDENTITY, {}, { start: 0, end: 10 }, [row(11, "0xa0", "0xb0")]),
    ).rejects.toThrow(InconsistentRangeError);
    expect(await cache.entries(IDENTITY)).toEqual([]);
  });

  it("clears one identity or everything", async () => {
    const other = "balance:0x00000000000000000000000000000000000000bb@1";
    await cache.commit(IDENTITY, {}, { start: 0, end: 10 }, []);
    await cache.commit(other, {}, { start: 0, end: 10 }, []);

    await cache.clear(IDENTITY);
    expect(await cache.entries(IDENTITY)).toEqual([]);
    expect(await cache.entries(other)).toHaveLength(1);

    await cache.clear();
    expect(await cache.entries(other)).toEqual([]);
  });

  it("accepts a prebuilt filter", async () => {
    const filter = Filter.from({ to: "0xb0" });
    await cache.commit(IDENTITY, filter, { start: 0, end: 10 }, [row(3, "0xa0", "0xb0")]);
    expect(await cache.read(IDENTITY, { to: "0xB0" }, { start: 0, end: 10 })).toHaveLength(1);
  });
});
