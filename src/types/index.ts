/**
 * Shared data model
 */

/**
 * Inclusive block range, `start <= end`, both non-negative
 */
export interface BlockRange {
  start: number;
  end: number;
}

/**
 * Canonical scalar: hex strings lower-cased, integers as decimal strings
 */
export type Scalar = string | boolean;

/**
 * Values accepted before canonicalization
 */
export type ScalarInput = string | number | bigint | boolean;

export type FieldValue = Scalar | null;

/**
 * A decoded chain record. `transactionIndex`/`logIndex` order rows inside a block;
 * point reads (contract calls, balances) use 0 for both.
 */
export interface FetchedRow {
  blockNumber: number;
  transactionIndex: number;
  logIndex: number;
  transactionHash: string | null;
  fields: Record<string, FieldValue>;
}

export interface TimedRow extends FetchedRow {
  timestamp: number;
}

/**
 * Block number to timestamp (unix seconds) pair on the block grid
 */
export interface GridNode {
  blockNumber: number;
  timestamp: number;
}

export interface BlockHeader {
  number: number;
  timestamp: number;
}

export interface TokenMetadata {
  chainId: number;
  address: string;
  name: string;
  symbol: string;
  decimals: number;
}
