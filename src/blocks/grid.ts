/**
 * Block grid
 *
 * Keeps block timestamps only for blocks that are multiples of `step` and
 * interpolates everything in between, so timestamping N records inside one
 * grid cell costs two header fetches instead of N.
 *
 * For block c between grid nodes b (below) and a (above):
 *
 *   w   = (c_n - b_n) / (a_n - b_n)
 *   c_t = b_t * (1 - w) + a_t * w
 *
 * The error is bounded by the block-time variance inside one cell; `step = 1`
 * gives exact timestamps.
 *
 * Mixing different steps for data that is compared across streams can break
 * happens-before between interpolated points. Callers are expected to keep
 * one step per store; it is not enforced here.
 */

import { assertValidBlock } from "../cache/range.js";
import type { CacheStore } from "../cache/store.js";
import type { ChainClient } from "../rpc/client.js";
import type { BlockHeader, GridNode } from "../types/index.js";
import { InvalidRangeError } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";
import { type RetryOptions, withRetry } from "../utils/retry.js";

const logger = createLogger("grid");

// float slack when inverting the interpolation
const EPSILON = 1e-9;

export interface BlockGridOptions {
  client: ChainClient;
  store: CacheStore;
  step: number;
  retry?: Omit<RetryOptions, "logger" | "context">;
}

export class BlockGrid {
  readonly step: number;
  private readonly client: ChainClient;
  private readonly store: CacheStore;
  private readonly retry: Omit<RetryOptions, "logger" | "context">;
  private tip: number | undefined;
  private readonly pendingNodes = new Map<number, Promise<GridNode>>();

  constructor(options: BlockGridOptions) {
    if (!Number.isSafeInteger(options.step) || options.step < 1) {
      throw new InvalidRangeError(`Block grid step must be a positive integer, got ${options.step}`);
    }
    this.step = options.step;
    this.client = options.client;
    this.store = options.store;
    this.retry = options.retry ?? { maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0 };
  }

  private chainCall<T>(operation: () => Promise<T>, context: Record<string, unknown>): Promise<T> {
    return withRetry(operation, { ...this.retry, logger, context });
  }

  /**
   * Latest block number, cached until a request goes past it
   */
  async chainTip(refresh = false): Promise<number> {
    if (this.tip === undefined || refresh) {
      this.tip = await this.chainCall(() => this.client.getChainTip(), { op: "getChainTip" });
    }
    return this.tip;
  }

  /**
   * Resolves to the chain tip; rejects with `InvalidRangeError` for negative
   * blocks or blocks past the tip.
   */
  async ensureWithinTip(blockNumber: number): Promise<number> {
    assertValidBlock(blockNumber);
    let tip = await this.chainTip();
    if (blockNumber > tip) {
      tip = await this.chainTip(true);
    }
    if (blockNumber > tip) {
      throw new InvalidRangeError(`Block ${blockNumber} is beyond the chain tip ${tip}`);
    }
    return tip;
  }

  gridBlockBelow(blockNumber: number): number {
    return Math.floor(blockNumber / this.step) * this.step;
  }

  /**
   * Grid node at or below `blockNumber`, fetched and persisted on first use
   */
  async nodeFor(blockNumber: number): Promise<GridNode> {
    await this.ensureWithinTip(blockNumber);
    return this.loadNode(this.gridBlockBelow(blockNumber));
  }

  private loadNode(gridBlock: number): Promise<GridNode> {
    const pending = this.pendingNodes.get(gridBlock);
    if (pending) return pending;

    const load = (async () => {
      const stored = await this.store.getGridNode(gridBlock);
      if (stored) return stored;

      const header = await this.fetchHeader(gridBlock);
      const node: GridNode = { blockNumber: gridBlock, timestamp: header.timestamp };
      await this.store.saveGridNode(node);
      logger.debug({ blockNumber: gridBlock, timestamp: node.timestamp }, "Stored grid node");
      return node;
    })().finally(() => {
      this.pendingNodes.delete(gridBlock);
    });

    this.pendingNodes.set(gridBlock, load);
    return load;
  }

  private fetchHeader(blockNumber: number): Promise<BlockHeader> {
    return this.chainCall(() => this.client.getBlockHeader(blockNumber), {
      op: "getBlockHeader",
      blockNumber,
    });
  }

  /**
   * Timestamp of `blockNumber` (unix seconds): exact on grid blocks, interpolated
   * between the surrounding grid nodes elsewhere. In the last, unfinished cell
   * below the chain tip the block's own header is fetched instead of extrapolating.
   */
  async timestampOf(blockNumber: number): Promise<number> {
    const tip = await this.ensureWithinTip(blockNumber);
    const below = this.gridBlockBelow(blockNumber);
    if (below === blockNumber) {
      return (await this.loadNode(blockNumber)).timestamp;
    }

    const above = below + this.step;
    if (above > tip) {
      return (await this.fetchHeader(blockNumber)).timestamp;
    }

    const [b, a] = await Promise.all([this.loadNode(below), this.loadNode(above)]);
    const w = (blockNumber - b.blockNumber) / (a.blockNumber - b.blockNumber);
    return Math.round(b.timestamp * (1 - w) + a.timestamp * w);
  }

  /**
   * Approximate first block whose timestamp is at or after `timestamp`,
   * found by binary search over grid nodes and interpolation inside the final cell.
   * `null` when the chain has not reached `timestamp` yet.
   */
  async blockAt(timestamp: number): Promise<number | null> {
    const tip = await this.chainTip(true);
    const genesis = await this.loadNode(0);
    if (timestamp <= genesis.timestamp) return 0;

    const tipHeader = await this.fetchHeader(tip);
    if (timestamp > tipHeader.timestamp) return null;

    const lastGrid = this.gridBlockBelow(tip);
    const lastNode = await this.loadNode(lastGrid);

    // invariant: low.timestamp < timestamp <= high.timestamp
    let low: GridNode = genesis;
    let high: GridNode;
    if (lastNode.timestamp < timestamp) {
      low = lastNode;
      high = { blockNumber: tip, timestamp: tipHeader.timestamp };
    } else {
      high = lastNode;
      let lowIndex = 0;
      let highIndex = lastGrid / this.step;
      while (highIndex - lowIndex > 1) {
        const mid = Math.floor((lowIndex + highIndex) / 2);
        const node = await this.loadNode(mid * this.step);
        if (node.timestamp >= timestamp) {
          highIndex = mid;
          high = node;
        } else {
          lowIndex = mid;
          low = node;
        }
      }
    }

    if (high.blockNumber - low.blockNumber <= 1) return high.blockNumber;
    const w = (timestamp - low.timestamp) / (high.timestamp - low.timestamp);
    const estimate = Math.ceil(low.blockNumber + w * (high.blockNumber - low.blockNumber) - EPSILON);
    return Math.min(Math.max(estimate, low.blockNumber + 1), high.blockNumber);
  }
}
