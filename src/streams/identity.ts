/**
 * Stream identities
 *
 * An identity names a filter-independent data stream; its `key` is what the
 * cache stores. `kind` is the only per-stream dimension: filters stay generic.
 */

import { type AbiEvent, type AbiFunction, type Address, toEventSelector, toFunctionSelector } from "viem";
import { InvalidRangeError } from "../utils/errors.js";
import type { BlockRange } from "../types/index.js";

export interface LogStream {
  kind: "logs";
  address: Address;
  event: AbiEvent;
}

/**
 * Contract call sampled at every block that is a multiple of `every`
 */
export interface CallStream {
  kind: "call";
  address: Address;
  fn: AbiFunction;
  args: readonly unknown[];
  every: number;
}

/**
 * Native balance sampled at every block that is a multiple of `every`
 */
export interface BalanceStream {
  kind: "balance";
  address: Address;
  every: number;
}

export type StreamIdentity = LogStream | CallStream | BalanceStream;

function assertSampling(every: number): void {
  if (!Number.isSafeInteger(every) || every < 1) {
    throw new InvalidRangeError(`Sampling interval must be a positive integer, got ${every}`);
  }
}

export function logStream(address: Address, event: AbiEvent): LogStream {
  return { kind: "logs", address, event };
}

export function callStream(
  address: Address,
  fn: AbiFunction,
  args: readonly unknown[] = [],
  every = 1,
): CallStream {
  assertSampling(every);
  return { kind: "call", address, fn, args, every };
}

export function balanceStream(address: Address, every = 1): BalanceStream {
  assertSampling(every);
  return { kind: "balance", address, every };
}

/**
 * JSON with bigints as decimal strings and hex strings lower-cased
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(value, (_key, item: unknown) => {
    if (typeof item === "bigint") return item.toString(10);
    if (typeof item === "string" && item.startsWith("0x")) return item.toLowerCase();
    return item;
  });
}

export function identityKey(identity: StreamIdentity): string {
  const address = identity.address.toLowerCase();
  switch (identity.kind) {
    case "logs":
      return `logs:${address}:${toEventSelector(identity.event)}`;
    case "call":
      return `call:${address}:${toFunctionSelector(identity.fn)}:${stableStringify(identity.args)}@${identity.every}`;
    case "balance":
      return `balance:${address}@${identity.every}`;
  }
}

/**
 * Blocks of `range` that are multiples of `every`
 */
export function sampleBlocks(range: BlockRange, every: number): number[] {
  const blocks: number[] = [];
  const first = Math.ceil(range.start / every) * every;
  for (let block = first; block <= range.end; block += every) {
    blocks.push(block);
  }
  return blocks;
}
