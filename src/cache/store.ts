/**
 * Persistence contract for the range cache
 *
 * Coverage records say "rows for (identity, filter) over this range are complete";
 * rows are keyed by (identity, filter signature, block, transaction index, log index),
 * so re-inserting a row already stored is a no-op.
 */

import type { BlockRange, FetchedRow, GridNode, TokenMetadata } from "../types/index.js";
import type { Filter } from "./filter.js";

export interface CoverageRecord {
  id: string;
  identity: string;
  filter: Filter;
  range: BlockRange;
}

export interface CacheStoreReader {
  /** Every coverage record of `identity`, whatever its filter */
  listCoverage(identity: string): Promise<CoverageRecord[]>;
  /** Rows stored under (identity, filterSignature) inside `range`, block-ordered */
  readRows(identity: string, filterSignature: string, range: BlockRange): Promise<FetchedRow[]>;
}

export interface CacheStoreTransaction {
  /** Serializes writers of the same (identity, filter) until the transaction ends */
  lock(identity: string, filterSignature: string): Promise<void>;
  listCoverageForFilter(identity: string, filterSignature: string): Promise<CoverageRecord[]>;
  insertRows(identity: string, filterSignature: string, rows: readonly FetchedRow[]): Promise<void>;
  /** Deletes `supersededIds` and inserts one record for `range` */
  replaceCoverage(
    identity: string,
    filter: Filter,
    supersededIds: readonly string[],
    range: BlockRange,
  ): Promise<CoverageRecord>;
}

export interface CacheStore extends CacheStoreReader {
  /**
   * Runs `work` atomically: either every write it made becomes visible or none does.
   */
  transaction<T>(work: (tx: CacheStoreTransaction) => Promise<T>): Promise<T>;

  getGridNode(blockNumber: number): Promise<GridNode | null>;
  /** Write-once: an existing node for the block is kept */
  saveGridNode(node: GridNode): Promise<void>;

  getTokenMetadata(address: string): Promise<TokenMetadata | null>;
  saveTokenMetadata(meta: TokenMetadata): Promise<void>;

  /** Drops coverage and rows for one identity, or for all identities */
  purge(identity?: string): Promise<void>;

  close(): Promise<void>;
}
