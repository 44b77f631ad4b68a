/**
 * RangeFilterCache
 *
 * Per stream identity, tracks which block ranges were fetched under which filter
 * and answers reads for any filter that an existing entry subsumes. Rows cached
 * under a broader filter serve narrower queries by re-applying the missing
 * constraints locally.
 */

import type { BlockRange, FetchedRow } from "../types/index.js";
import { InconsistentRangeError } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";
import { Filter, type FilterInput } from "./filter.js";
import {
  assertValidRange,
  formatRange,
  intersectRanges,
  rangeLength,
  subtractRanges,
  touches,
} from "./range.js";
import { compareRows } from "./rows.js";
import type { CacheStore, CoverageRecord } from "./store.js";

const logger = createLogger("cache");

interface Assignment {
  entry: CoverageRecord;
  range: BlockRange;
}

/**
 * Most specific first: more constrained keys, then the narrower range.
 * The remaining keys only make the order deterministic.
 */
function bySpecificity(a: CoverageRecord, b: CoverageRecord): number {
  return (
    b.filter.size - a.filter.size ||
    rangeLength(a.range) - rangeLength(b.range) ||
    a.range.start - b.range.start ||
    (a.filter.signature < b.filter.signature ? -1 : a.filter.signature > b.filter.signature ? 1 : 0)
  );
}

export class RangeFilterCache {
  constructor(private readonly store: CacheStore) {}

  /**
   * Entries of `identity` whose filter subsumes `filter` and whose range meets `range`
   */
  private async coveringEntries(
    identity: string,
    filter: Filter,
    range: BlockRange,
  ): Promise<CoverageRecord[]> {
    const records = await this.store.listCoverage(identity);
    return records.filter(
      (record) => record.filter.subsumes(filter) && intersectRanges(record.range, range) !== null,
    );
  }

  /**
   * Ordered, non-overlapping sub-ranges of `range` that no subsuming entry covers
   */
  async coverageGaps(
    identity: string,
    filter: FilterInput | Filter,
    range: BlockRange,
  ): Promise<BlockRange[]> {
    assertValidRange(range);
    const canonical = Filter.from(filter);
    const covering = await this.coveringEntries(identity, canonical, range);
    const gaps = subtractRanges(
      range,
      covering.map((entry) => entry.range),
    );
    logger.debug(
      {
        identity,
        filter: canonical.signature,
        range: formatRange(range),
        covering: covering.length,
        gaps: gaps.length,
      },
      "Computed coverage gaps",
    );
    return gaps;
  }

  /**
   * Cached rows matching `filter` inside `range`, ordered by block, transaction and log index.
   * Blocks that fall in a gap contribute nothing.
   */
  async read(
    identity: string,
    filter: FilterInput | Filter,
    range: BlockRange,
  ): Promise<FetchedRow[]> {
    assertValidRange(range);
    const canonical = Filter.from(filter);
    const covering = (await this.coveringEntries(identity, canonical, range)).sort(bySpecificity);

    const assignments: Assignment[] = [];
    let pending: BlockRange[] = [range];
    for (const entry of covering) {
      if (pending.length === 0) break;
      const next: BlockRange[] = [];
      for (const piece of pending) {
        const overlap = intersectRanges(piece, entry.range);
        if (!overlap) {
          next.push(piece);
          continue;
        }
        assignments.push({ entry, range: overlap });
        next.push(...subtractRanges(piece, [overlap]));
      }
      pending = next;
    }

    const rows: FetchedRow[] = [];
    for (const { entry, range: piece } of assignments) {
      const residual = canonical.residual(entry.filter);
      const stored = await this.store.readRows(identity, entry.filter.signature, piece);
      for (const row of stored) {
        if (residual.matches(row.fields)) rows.push(row);
      }
    }
    return rows.sort(compareRows);
  }

  /**
   * Records `rows` as the complete match set of `filter` over `range`.
   *
   * Same-filter entries that overlap or touch `range` are folded into a single
   * entry spanning the union. Rows and coverage land in one transaction.
   */
  async commit(
    identity: string,
    filter: FilterInput | Filter,
    range: BlockRange,
    rows: readonly FetchedRow[],
  ): Promise<CoverageRecord> {
    assertValidRange(range);
    const canonical = Filter.from(filter);
    for (const row of rows) {
      if (row.blockNumber < range.start || row.blockNumber > range.end) {
        throw new InconsistentRangeError(
          `Row at block ${row.blockNumber} lies outside committed range ${formatRange(range)}`,
          row.blockNumber,
        );
      }
    }

    const record = await this.store.transaction(async (tx) => {
      await tx.lock(identity, canonical.signature);
      const existing = await tx.listCoverageForFilter(identity, canonical.signature);
      const absorbed = existing.filter((entry) => touches(entry.range, range));
      const merged = absorbed.reduce<BlockRange>(
        (acc, entry) => ({
          start: Math.min(acc.start, entry.range.start),
          end: Math.max(acc.end, entry.range.end),
        }),
        range,
      );
      await tx.insertRows(identity, canonical.signature, rows);
      return tx.replaceCoverage(
        identity,
        canonical,
        absorbed.map((entry) => entry.id),
        merged,
      );
    });

    logger.info(
      {
        identity,
        filter: canonical.signature,
        range: formatRange(range),
        coverage: formatRange(record.range),
        rows: rows.length,
      },
      "Committed cache entry",
    );
    return record;
  }

  /**
   * Coverage records of `identity`, ordered by filter signature then range start
   */
  async entries(identity: string): Promise<CoverageRecord[]> {
    const records = await this.store.listCoverage(identity);
    return records.sort(
      (a, b) =>
        (a.filter.signature < b.filter.signature
          ? -1
          : a.filter.signature > b.filter.signature
            ? 1
            : 0) || a.range.start - b.range.start,
    );
  }

  async clear(identity?: string): Promise<void> {
    await this.store.purge(identity);
    logger.info({ identity: identity ?? "*" }, "Cleared cache");
  }
}
