import { beforeEach, describe, expect, it } from "vitest";
import { BlockGrid } from "../../src/blocks/grid.js";
import { MemoryCacheStore } from "../../src/cache/memory-store.js";
import { InvalidRangeError } from "../../src/utils/errors.js";
import { FakeChain } from "../helpers/fake-chain.js";

const GENESIS = 1_600_000_000;

describe("BlockGrid", () => {
  let chain: FakeChain;
  let store: MemoryCacheStore;
  let grid: BlockGrid;

  beforeEach(() => {
    chain = new FakeChain({ tip: 10_500, genesisTimestamp: GENESIS, blockTime: 12 });
    store = new MemoryCacheStore();
    grid = new BlockGrid({ client: chain, store, step: 1000 });
  });

  it("rejects a non-positive step", () => {
    expect(() => new BlockGrid({ client: chain, store, step: 0 })).toThrow(InvalidRangeError);
  });

  it("returns exact timestamps on grid blocks", async () => {
    expect(await grid.timestampOf(3000)).toBe(GENESIS + 36_000);
    expect(chain.requests.getBlockHeader).toEqual([3000]);
  });

  it("interpolates between the surrounding grid nodes", async () => {
    const irregular = new FakeChain({
      tip: 10_500,
      timestampOf: (n) => (n === 1000 ? 10_000 : n === 2000 ? 30_000 : 99_999),
    });
    const irregularGrid = new BlockGrid({ client: irregular, store, step: 1000 });

    expect(await irregularGrid.timestampOf(1250)).toBe(15_000);
    expect([...irregular.requests.getBlockHeader].sort((a, b) => a - b)).toEqual([1000, 2000]);
  });

  it("reuses persisted grid nodes across grids sharing a store", async () => {
    await grid.timestampOf(1500);
    const requestsBefore = chain.requests.getBlockHeader.length;

    const second = new BlockGrid({ client: chain, store, step: 1000 });
    expect(await second.timestampOf(1700)).toBe(GENESIS + 1700 * 12);
    expect(chain.requests.getBlockHeader).toHaveLength(requestsBefore);
  });

  it("fetches a grid node once for concurrent lookups in the same cell", async () => {
    await Promise.all([grid.timestampOf(1500), grid.timestampOf(1600)]);
    expect(chain.requests.getBlockHeader).toHaveLength(2);
  });

  it("uses the block's own header in the unfinished cell below the tip", async () => {
    expect(await grid.timestampOf(10_200)).toBe(GENESIS + 10_200 * 12);
    expect(chain.requests.getBlockHeader).toEqual([10_200]);
  });

  it("rejects blocks past the chain tip after refreshing it", async () => {
    await expect(grid.timestampOf(20_000)).rejects.toThrow(InvalidRangeError);
    expect(chain.requests.getChainTip).toBe(2);
  });

  it("sees a tip that moved on", async () => {
    await grid.chainTip();
    chain.tip = 12_000;
    expect(await grid.ensureWithinTip(11_000)).toBe(12_000);
  });

  describe("blockAt", () => {
    it("finds the first block at or after a timestamp", async () => {
      expect(await grid.blockAt(GENESIS + 4321 * 12)).toBe(4321);
      expect(await grid.blockAt(GENESIS + 4321 * 12 - 5)).toBe(4321);
    });

    it("interpolates inside the last cell up to the tip", async () => {
      expect(await grid.blockAt(GENESIS + 10_250 * 12)).toBe(10_250);
    });

    it("returns the genesis block for early timestamps", async () => {
      expect(await grid.blockAt(GENESIS - 100)).toBe(0);
    });

    it("returns null for timestamps the chain has not reached", async () => {
      expect(await grid.blockAt(GENESIS + 10_501 * 12)).toBeNull();
    });
  });
});
