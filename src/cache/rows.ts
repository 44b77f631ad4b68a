import type { FetchedRow } from "../types/index.js";

/**
 * Chain order: block, then transaction index, then log index
 */
export function compareRows(a: FetchedRow, b: FetchedRow): number {
  return (
    a.blockNumber - b.blockNumber ||
    a.transactionIndex - b.transactionIndex ||
    a.logIndex - b.logIndex
  );
}

export const rowKey = (row: FetchedRow) =>
  `${row.blockNumber}:${row.transactionIndex}:${row.logIndex}`;
