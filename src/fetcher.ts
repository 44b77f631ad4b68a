/**
 * ChainDataFetcher
 *
 * Wires the chain client, cache store, block grid, range cache and
 * orchestrator from a `Config`, and exposes the everyday queries on top.
 */

import type { AbiEvent, AbiFunction, Address } from "viem";
import { BlockGrid } from "./blocks/grid.js";
import { Filter, type FilterInput } from "./cache/filter.js";
import { MemoryCacheStore } from "./cache/memory-store.js";
import { assertValidBlock } from "./cache/range.js";
import { RangeFilterCache } from "./cache/range-filter-cache.js";
import type { CacheStore } from "./cache/store.js";
import type { Config } from "./config/index.js";
import { createPool, initDb } from "./db/index.js";
import { PostgresCacheStore } from "./db/postgres-store.js";
import { type FetchOptions, FetchOrchestrator } from "./engine/orchestrator.js";
import { type ChainClient, createChainClient } from "./rpc/client.js";
import { TokenMetadataService } from "./services/token-metadata.js";
import {
  type StreamIdentity,
  balanceStream,
  callStream,
  logStream,
} from "./streams/identity.js";
import type { BlockRange, FetchedRow, FieldValue, TimedRow, TokenMetadata } from "./types/index.js";
import { ConfigError } from "./utils/errors.js";
import { createLogger } from "./utils/logger.js";

const logger = createLogger("fetcher");

export interface CallSample {
  blockNumber: number;
  timestamp: number;
  value: FieldValue;
}

export interface BalanceSample {
  address: Address;
  blockNumber: number;
  timestamp: number;
  balance: bigint;
}

/**
 * Pre-built parts that replace the ones `openFetcher` would create
 */
export interface FetcherOverrides {
  client?: ChainClient;
  store?: CacheStore;
}

interface FetcherParts {
  chainId: number;
  client: ChainClient;
  store: CacheStore;
  config: Config;
}

export class ChainDataFetcher {
  readonly chainId: number;
  readonly client: ChainClient;
  readonly store: CacheStore;
  readonly grid: BlockGrid;
  readonly cache: RangeFilterCache;
  readonly orchestrator: FetchOrchestrator;
  readonly tokens: TokenMetadataService;
  private closed = false;

  constructor({ chainId, client, store, config }: FetcherParts) {
    const retry = {
      maxAttempts: config.fetch.maxAttempts,
      baseDelayMs: config.fetch.backoffBaseMs,
      maxDelayMs: config.fetch.backoffMaxMs,
      timeoutMs: config.chain.timeoutMs,
    };
    this.chainId = chainId;
    this.client = client;
    this.store = store;
    this.grid = new BlockGrid({ client, store, step: config.grid.step, retry });
    this.cache = new RangeFilterCache(store);
    this.orchestrator = new FetchOrchestrator({
      client,
      cache: this.cache,
      grid: this.grid,
      maxAttempts: config.fetch.maxAttempts,
      backoffBaseMs: config.fetch.backoffBaseMs,
      backoffMaxMs: config.fetch.backoffMaxMs,
      callTimeoutMs: config.chain.timeoutMs,
      maxGapBridge: config.fetch.maxGapBridge,
      callConcurrency: config.fetch.callConcurrency,
    });
    this.tokens = new TokenMetadataService({ client, store, chainId, retry });
  }

  fetch(
    identity: StreamIdentity,
    filter: FilterInput | Filter,
    range: BlockRange,
    options?: FetchOptions,
  ): Promise<FetchedRow[]> {
    return this.orchestrator.fetch(identity, filter, range, options);
  }

  fetchTimed(
    identity: StreamIdentity,
    filter: FilterInput | Filter,
    range: BlockRange,
    options?: FetchOptions,
  ): Promise<TimedRow[]> {
    return this.orchestrator.fetchTimed(identity, filter, range, options);
  }

  /**
   * Timestamped logs of `event` emitted by `address`, optionally narrowed by argument values
   */
  getEvents(
    address: Address,
    event: AbiEvent,
    range: BlockRange,
    filter: FilterInput | Filter = Filter.EMPTY,
    options?: FetchOptions,
  ): Promise<TimedRow[]> {
    return this.orchestrator.fetchTimed(logStream(address, event), filter, range, options);
  }

  /**
   * Result of `fn(...args)` on `address` at each of `blocks`, in the order given
   */
  async getCalls(
    address: Address,
    fn: AbiFunction,
    args: readonly unknown[],
    blocks: readonly number[],
  ): Promise<CallSample[]> {
    const identity = callStream(address, fn, args);
    return Promise.all(
      blocks.map(async (blockNumber) => {
        const value = await this.pointRead(identity, blockNumber, "value");
        return { blockNumber, timestamp: await this.grid.timestampOf(blockNumber), value };
      }),
    );
  }

  /**
   * Native balance of every address at every block, address-major
   */
  async getBalances(
    addresses: readonly Address[],
    blocks: readonly number[],
  ): Promise<BalanceSample[]> {
    const samples: BalanceSample[] = [];
    for (const address of addresses) {
      const identity = balanceStream(address);
      const perBlock = await Promise.all(
        blocks.map(async (blockNumber) => {
          const balance = await this.pointRead(identity, blockNumber, "balance");
          return {
            address,
            blockNumber,
            timestamp: await this.grid.timestampOf(blockNumber),
            balance: BigInt(typeof balance === "string" ? balance : 0),
          };
        }),
      );
      samples.push(...perBlock);
    }
    return samples;
  }

  timestampOf(blockNumber: number): Promise<number> {
    return this.grid.timestampOf(blockNumber);
  }

  blockAt(timestamp: number): Promise<number | null> {
    return this.grid.blockAt(timestamp);
  }

  tokenMetadata(token: string): Promise<TokenMetadata> {
    return this.tokens.get(token);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.store.close();
    logger.info({ chainId: this.chainId }, "Fetcher closed");
  }

  private async pointRead(
    identity: StreamIdentity,
    blockNumber: number,
    field: string,
  ): Promise<FieldValue> {
    assertValidBlock(blockNumber);
    const [row] = await this.orchestrator.fetch(identity, Filter.EMPTY, {
      start: blockNumber,
      end: blockNumber,
    });
    return row ? (row.fields[field] ?? null) : null;
  }
}

async function openStore(config: Config): Promise<CacheStore> {
  if (!config.database.url) {
    logger.info("No DATABASE_URL configured, using the in-memory cache store");
    return new MemoryCacheStore();
  }
  const pool = createPool(config.database.url);
  try {
    await initDb(pool);
  } catch (error: unknown) {
    await pool.end();
    throw error;
  }
  return new PostgresCacheStore(pool, config.chain.id);
}

/**
 * Builds a fetcher from `config`. The caller owns the handle and must `close()` it.
 */
export async function openFetcher(
  config: Config,
  overrides: FetcherOverrides = {},
): Promise<ChainDataFetcher> {
  let client = overrides.client;
  if (!client) {
    if (config.chain.rpcUrls.length === 0) {
      throw new ConfigError("RPC_URL is required to reach the chain", {
        RPC_URL: ["Required"],
      });
    }
    client = createChainClient(config.chain);
  }
  const store = overrides.store ?? (await openStore(config));

  logger.info(
    {
      chainId: config.chain.id,
      store: store instanceof MemoryCacheStore ? "memory" : "postgres",
      gridStep: config.grid.step,
      maxBlockSpan: client.maxBlockSpan,
    },
    "Fetcher ready",
  );
  return new ChainDataFetcher({ chainId: config.chain.id, client, store, config });
}

/**
 * Runs `work` with a fresh fetcher and closes it afterwards, whether `work` succeeds or not
 */
export async function withFetcher<T>(
  config: Config,
  work: (fetcher: ChainDataFetcher) => Promise<T>,
  overrides: FetcherOverrides = {},
): Promise<T> {
  const fetcher = await openFetcher(config, overrides);
  try {
    return await work(fetcher);
  } finally {
    await fetcher.close();
  }
}
