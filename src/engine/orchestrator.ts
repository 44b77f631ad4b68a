/**
 * FetchOrchestrator
 *
 * Turns coverage gaps into chain calls and commits each gap once it is complete.
 * Gaps are resolved one at a time in block order; a failing gap stops the call
 * and leaves the gaps before it committed and the gaps after it untouched.
 */

import type { BlockGrid } from "../blocks/grid.js";
import { Filter, type FilterInput } from "../cache/filter.js";
import { assertValidRange, formatRange, rangeLength, splitRange } from "../cache/range.js";
import type { RangeFilterCache } from "../cache/range-filter-cache.js";
import type { ChainClient } from "../rpc/client.js";
import {
  type BalanceStream,
  type CallStream,
  type LogStream,
  type StreamIdentity,
  identityKey,
  sampleBlocks,
} from "../streams/identity.js";
import type { BlockRange, FetchedRow, FieldValue, TimedRow } from "../types/index.js";
import { ResponseTooLargeError, getErrorMessage } from "../utils/errors.js";
import { type Logger, createLogger } from "../utils/logger.js";
import { type RetryOptions, withRetry } from "../utils/retry.js";
import { InFlightRegistry } from "./in-flight.js";

const logger = createLogger("orchestrator");
const logsLogger = logger.child({ name: "logs" });

export interface FetchOrchestratorOptions {
  client: ChainClient;
  cache: RangeFilterCache;
  grid: BlockGrid;
  /** Attempts per chain call for retryable failures */
  maxAttempts?: number;
  backoffBaseMs?: number;
  backoffMaxMs?: number;
  /**
   * Per chain call timeout; 0 disables it. Only the wait is cut short here: the
   * HTTP request itself is aborted by the viem transport, which `createChainClient`
   * builds with the same timeout. A client without its own timeout keeps the
   * timed out request running while the retry goes out.
   */
  callTimeoutMs?: number;
  /** Gaps separated by at most this many covered blocks are fetched together */
  maxGapBridge?: number;
  /** Parallel point reads (contract calls, balances) inside one gap */
  callConcurrency?: number;
}

export interface FetchOptions {
  /**
   * Abandons the call. Chain requests already issued for a gap are allowed to
   * finish and commit, since other callers may be waiting on them.
   */
  signal?: AbortSignal;
}

/**
 * Folds gaps into chain-call batches: neighbours merge when the covered stretch
 * between them is at most `maxBridge` blocks and the result stays within `maxSpan`.
 */
export function planBatches(
  gaps: readonly BlockRange[],
  maxSpan: number,
  maxBridge: number,
): BlockRange[] {
  const batches: BlockRange[] = [];
  for (const gap of gaps) {
    const last = batches[batches.length - 1];
    if (last && gap.start - last.end - 1 <= maxBridge && gap.end - last.start + 1 <= maxSpan) {
      last.end = gap.end;
      continue;
    }
    batches.push({ ...gap });
  }
  return batches;
}

function sameRanges(a: readonly BlockRange[], b: readonly BlockRange[]): boolean {
  return (
    a.length === b.length &&
    a.every((range, index) => range.start === b[index]?.start && range.end === b[index]?.end)
  );
}

function waitFor(settled: Promise<void>, signal?: AbortSignal): Promise<void> {
  if (!signal) return settled;
  signal.throwIfAborted();
  return new Promise<void>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    void settled.then(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    });
  });
}

export class FetchOrchestrator {
  private readonly client: ChainClient;
  private readonly cache: RangeFilterCache;
  private readonly grid: BlockGrid;
  private readonly retry: Omit<RetryOptions, "logger" | "context">;
  private readonly maxGapBridge: number;
  private readonly callConcurrency: number;
  private readonly inFlight = new InFlightRegistry();

  constructor(options: FetchOrchestratorOptions) {
    this.client = options.client;
    this.cache = options.cache;
    this.grid = options.grid;
    this.retry = {
      maxAttempts: options.maxAttempts ?? 5,
      baseDelayMs: options.backoffBaseMs ?? 250,
      maxDelayMs: options.backoffMaxMs ?? 10000,
      timeoutMs: options.callTimeoutMs || undefined,
    };
    this.maxGapBridge = options.maxGapBridge ?? 0;
    this.callConcurrency = Math.max(1, options.callConcurrency ?? 8);
  }

  /**
   * Rows of `identity` matching `filter` over `range`, in chain order.
   * Only the parts of `range` not already covered by a subsuming cache entry
   * reach the chain.
   */
  async fetch(
    identity: StreamIdentity,
    filter: FilterInput | Filter,
    range: BlockRange,
    options: FetchOptions = {},
  ): Promise<FetchedRow[]> {
    assertValidRange(range);
    const key = identityKey(identity);
    const canonical = Filter.from(filter);

    await this.resolveGaps(identity, key, canonical, range, options.signal);
    return this.cache.read(key, canonical, range);
  }

  /**
   * `fetch`, with every row stamped by the block grid
   */
  async fetchTimed(
    identity: StreamIdentity,
    filter: FilterInput | Filter,
    range: BlockRange,
    options: FetchOptions = {},
  ): Promise<TimedRow[]> {
    const rows = await this.fetch(identity, filter, range, options);
    const timestamps = new Map<number, number>();
    for (const row of rows) {
      if (!timestamps.has(row.blockNumber)) {
        timestamps.set(row.blockNumber, await this.grid.timestampOf(row.blockNumber));
      }
    }
    return rows.map((row) => ({ ...row, timestamp: timestamps.get(row.blockNumber) ?? 0 }));
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  private async resolveGaps(
    identity: StreamIdentity,
    key: string,
    filter: Filter,
    range: BlockRange,
    signal?: AbortSignal,
  ): Promise<void> {
    let tipChecked = false;

    for (;;) {
      signal?.throwIfAborted();
      const gaps = await this.cache.coverageGaps(key, filter, range);
      if (gaps.length === 0) return;

      if (!tipChecked) {
        await this.grid.ensureWithinTip(range.end);
        tipChecked = true;
      }

      const [batch] = planBatches(gaps, this.maxSpanFor(identity), this.maxGapBridge);
      const conflicts = this.inFlight.conflicts(key, filter, batch);
      if (conflicts.length > 0) {
        logger.debug(
          { identity: key, filter: filter.signature, batch: formatRange(batch) },
          "Waiting for in-flight fetch",
        );
        await waitFor(Promise.all(conflicts.map((c) => c.settled)).then(() => undefined), signal);
        continue;
      }

      const claim = this.inFlight.claim(key, filter, batch);
      try {
        // another caller may have committed and released while the scan above was pending
        const planned = gaps.filter((gap) => gap.start >= batch.start && gap.end <= batch.end);
        const pending = await this.cache.coverageGaps(key, filter, batch);
        if (!sameRanges(pending, planned)) {
          logger.debug(
            { identity: key, filter: filter.signature, batch: formatRange(batch) },
            "Coverage changed before fetch, replanning",
          );
          continue;
        }
        logger.debug(
          { identity: key, filter: filter.signature, batch: formatRange(batch), gaps: gaps.length },
          "Fetching gap",
        );
        const rows = await this.fetchBatch(identity, filter, batch);
        await this.cache.commit(key, filter, batch, rows);
      } catch (error: unknown) {
        logger.error(
          {
            identity: key,
            filter: filter.signature,
            batch: formatRange(batch),
            error: getErrorMessage(error),
          },
          "Gap fetch failed",
        );
        throw error;
      } finally {
        claim.release();
      }
    }
  }

  private maxSpanFor(identity: StreamIdentity): number {
    return identity.kind === "logs" ? this.client.maxBlockSpan : Number.POSITIVE_INFINITY;
  }

  private async fetchBatch(
    identity: StreamIdentity,
    filter: Filter,
    batch: BlockRange,
  ): Promise<FetchedRow[]> {
    const rows = await this.fetchFromChain(identity, filter, batch);
    // the node only narrows by indexed topics; the rest is applied here
    return rows.filter((row) => filter.matches(row.fields));
  }

  private fetchFromChain(
    identity: StreamIdentity,
    filter: Filter,
    batch: BlockRange,
  ): Promise<FetchedRow[]> {
    switch (identity.kind) {
      case "logs":
        return this.fetchLogs(identity, filter, batch);
      case "call":
        return this.fetchCalls(identity, batch);
      case "balance":
        return this.fetchBalances(identity, batch);
    }
  }

  private async fetchLogs(
    identity: LogStream,
    filter: Filter,
    batch: BlockRange,
  ): Promise<FetchedRow[]> {
    const rows: FetchedRow[] = [];
    for (const chunk of splitRange(batch, this.client.maxBlockSpan)) {
      rows.push(...(await this.fetchLogSpan(identity, filter, chunk)));
    }
    return rows;
  }

  /**
   * One `getLogs` call for `span`; halves the span while the provider
   * rejects it as too large.
   */
  private async fetchLogSpan(
    identity: LogStream,
    filter: Filter,
    span: BlockRange,
  ): Promise<FetchedRow[]> {
    try {
      return await this.chainCall(
        () =>
          this.client.getLogs({
            address: identity.address,
            event: identity.event,
            filter,
            fromBlock: span.start,
            toBlock: span.end,
          }),
        { op: "getLogs", event: identity.event.name, span: formatRange(span) },
        logsLogger,
      );
    } catch (error: unknown) {
      if (!(error instanceof ResponseTooLargeError) || rangeLength(span) === 1) {
        throw error;
      }
      const middle = Math.floor((span.start + span.end) / 2);
      logsLogger.debug(
        { event: identity.event.name, span: formatRange(span), middle },
        "Log response too large, halving span",
      );
      const left = await this.fetchLogSpan(identity, filter, { start: span.start, end: middle });
      const right = await this.fetchLogSpan(identity, filter, { start: middle + 1, end: span.end });
      return [...left, ...right];
    }
  }

  private fetchCalls(identity: CallStream, batch: BlockRange): Promise<FetchedRow[]> {
    return this.samplePoints(batch, identity.every, async (blockNumber) => {
      const value = await this.chainCall(
        () =>
          this.client.call({
            address: identity.address,
            fn: identity.fn,
            args: identity.args,
            blockNumber,
          }),
        { op: "call", fn: identity.fn.name, blockNumber },
      );
      return { value };
    });
  }

  private fetchBalances(identity: BalanceStream, batch: BlockRange): Promise<FetchedRow[]> {
    return this.samplePoints(batch, identity.every, async (blockNumber) => {
      const balance = await this.chainCall(
        () => this.client.getBalance(identity.address, blockNumber),
        { op: "getBalance", blockNumber },
      );
      return { balance: balance.toString(10) };
    });
  }

  private async samplePoints(
    batch: BlockRange,
    every: number,
    read: (blockNumber: number) => Promise<Record<string, FieldValue>>,
  ): Promise<FetchedRow[]> {
    const blocks = sampleBlocks(batch, every);
    const rows: FetchedRow[] = [];
    for (let i = 0; i < blocks.length; i += this.callConcurrency) {
      const slice = blocks.slice(i, i + this.callConcurrency);
      const fields = await Promise.all(slice.map(read));
      slice.forEach((blockNumber, index) => {
        rows.push({
          blockNumber,
          transactionIndex: 0,
          logIndex: 0,
          transactionHash: null,
          fields: fields[index],
        });
      });
    }
    return rows;
  }

  private chainCall<T>(
    operation: () => Promise<T>,
    context: Record<string, unknown>,
    log: Logger = logger,
  ): Promise<T> {
    return withRetry(operation, { ...this.retry, logger: log, context });
  }
}
