import type { BlockRange } from "../types/index.js";
import { InvalidRangeError } from "../utils/errors.js";

export function assertValidRange(range: BlockRange): void {
  const { start, end } = range;
  if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end)) {
    throw new InvalidRangeError(`Block range bounds must be integers, got [${start}, ${end}]`);
  }
  if (start < 0 || end < 0) {
    throw new InvalidRangeError(`Block range bounds must be non-negative, got [${start}, ${end}]`);
  }
  if (start > end) {
    throw new InvalidRangeError(`Block range start exceeds end: [${start}, ${end}]`);
  }
}

export function assertValidBlock(blockNumber: number): void {
  if (!Number.isSafeInteger(blockNumber) || blockNumber < 0) {
    throw new InvalidRangeError(`Block number must be a non-negative integer, got ${blockNumber}`);
  }
}

export function rangeLength(range: BlockRange): number {
  return range.end - range.start + 1;
}

export function formatRange(range: BlockRange): string {
  return `[${range.start}, ${range.end}]`;
}

export function containsBlock(range: BlockRange, blockNumber: number): boolean {
  return range.start <= blockNumber && blockNumber <= range.end;
}

export function intersectRanges(a: BlockRange, b: BlockRange): BlockRange | null {
  const start = Math.max(a.start, b.start);
  const end = Math.min(a.end, b.end);
  return start <= end ? { start, end } : null;
}

/**
 * True when the ranges overlap or sit next to each other with no block in between
 */
export function touches(a: BlockRange, b: BlockRange): boolean {
  return a.start <= b.end + 1 && b.start <= a.end + 1;
}

/**
 * Sorted union of `ranges`, with overlapping and adjacent ranges coalesced
 */
export function mergeRanges(ranges: readonly BlockRange[]): BlockRange[] {
  const sorted = [...ranges].sort((a, b) => a.start - b.start || a.end - b.end);
  const merged: BlockRange[] = [];
  for (const range of sorted) {
    const last = merged[merged.length - 1];
    if (last && range.start <= last.end + 1) {
      last.end = Math.max(last.end, range.end);
    } else {
      merged.push({ ...range });
    }
  }
  return merged;
}

/**
 * `range` minus the union of `covered`, as ordered non-overlapping sub-ranges
 */
export function subtractRanges(range: BlockRange, covered: readonly BlockRange[]): BlockRange[] {
  const gaps: BlockRange[] = [];
  let cursor = range.start;
  for (const piece of mergeRanges(covered)) {
    if (piece.end < cursor) continue;
    if (piece.start > range.end) break;
    if (piece.start > cursor) {
      gaps.push({ start: cursor, end: piece.start - 1 });
    }
    cursor = piece.end + 1;
    if (cursor > range.end) return gaps;
  }
  gaps.push({ start: cursor, end: range.end });
  return gaps;
}

/**
 * Consecutive chunks of at most `maxSpan` blocks covering `range`
 */
export function splitRange(range: BlockRange, maxSpan: number): BlockRange[] {
  if (maxSpan < 1) {
    throw new InvalidRangeError(`Maximum span must be positive, got ${maxSpan}`);
  }
  const chunks: BlockRange[] = [];
  for (let start = range.start; start <= range.end; start += maxSpan) {
    chunks.push({ start, end: Math.min(start + maxSpan - 1, range.end) });
  }
  return chunks;
}
