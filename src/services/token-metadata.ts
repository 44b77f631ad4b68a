/**
 * ERC-20 metadata resolution: bundled list, then the cache store, then the chain.
 */

import { readFileSync } from "node:fs";
import { type Address, isAddress } from "viem";
import { z } from "zod";
import type { CacheStore } from "../cache/store.js";
import { erc20Functions } from "../rpc/abi.js";
import { CallRevertedError, type ChainClient } from "../rpc/client.js";
import type { FieldValue, TokenMetadata } from "../types/index.js";
import { InvalidTokenError } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";
import { type RetryOptions, withRetry } from "../utils/retry.js";

const logger = createLogger("tokens");

const knownTokenSchema = z.object({
  address: z.string().regex(/^0x[0-9a-fA-F]{40}$/),
  name: z.string(),
  symbol: z.string(),
  decimals: z.number().int().min(0).max(255),
});

const knownTokensSchema = z.record(z.string(), z.array(knownTokenSchema));

export type KnownTokens = z.infer<typeof knownTokensSchema>;

/**
 * Reads and validates the bundled token list shipped next to this module
 */
export function loadKnownTokens(
  url: URL = new URL("./known-tokens.json", import.meta.url),
): KnownTokens {
  return knownTokensSchema.parse(JSON.parse(readFileSync(url, "utf8")));
}

export interface TokenMetadataServiceOptions {
  client: ChainClient;
  store: CacheStore;
  chainId: number;
  knownTokens?: KnownTokens;
  retry?: Omit<RetryOptions, "logger" | "context">;
}

const DEFAULT_RETRY = { maxAttempts: 5, baseDelayMs: 250, maxDelayMs: 10000 };

export class TokenMetadataService {
  private readonly client: ChainClient;
  private readonly store: CacheStore;
  private readonly chainId: number;
  private readonly retry: Omit<RetryOptions, "logger" | "context">;
  /** Lower-cased address and lower-cased symbol both map to the same entry */
  private readonly known = new Map<string, TokenMetadata>();

  constructor(options: TokenMetadataServiceOptions) {
    this.client = options.client;
    this.store = options.store;
    this.chainId = options.chainId;
    this.retry = options.retry ?? DEFAULT_RETRY;

    const tokens = (options.knownTokens ?? loadKnownTokens())[String(this.chainId)] ?? [];
    for (const token of tokens) {
      const meta: TokenMetadata = { ...token, chainId: this.chainId, address: token.address.toLowerCase() };
      this.known.set(meta.address, meta);
      this.known.set(meta.symbol.toLowerCase(), meta);
    }
  }

  /**
   * Metadata for a token given by address or by a bundled symbol
   */
  async get(token: string): Promise<TokenMetadata> {
    const key = token.toLowerCase();
    const known = this.known.get(key);
    if (known) return { ...known };

    if (!isAddress(token, { strict: false })) {
      throw new InvalidTokenError(token);
    }

    const stored = await this.store.getTokenMetadata(key);
    if (stored) return stored;

    const meta = await this.resolveOnChain(token, key);
    await this.store.saveTokenMetadata(meta);
    logger.info({ address: meta.address, symbol: meta.symbol }, "Resolved token metadata");
    return meta;
  }

  private async resolveOnChain(address: Address, key: string): Promise<TokenMetadata> {
    const tip = await this.chainCall(() => this.client.getChainTip(), "getChainTip");
    const read = (fn: (typeof erc20Functions)["name" | "symbol" | "decimals"]) =>
      this.chainCall(
        () => this.client.call({ address, fn, args: [], blockNumber: tip }),
        fn.name,
      );

    let values: FieldValue[];
    try {
      values = await Promise.all([
        read(erc20Functions.name),
        read(erc20Functions.symbol),
        read(erc20Functions.decimals),
      ]);
    } catch (error: unknown) {
      if (error instanceof CallRevertedError) {
        logger.warn({ address: key, error: error.message }, "Token metadata call reverted");
        throw new InvalidTokenError(address);
      }
      throw error;
    }

    const [name, symbol, decimals] = values;
    const parsedDecimals = typeof decimals === "string" ? Number.parseInt(decimals, 10) : Number.NaN;
    if (typeof name !== "string" || typeof symbol !== "string" || !Number.isInteger(parsedDecimals)) {
      throw new InvalidTokenError(address);
    }
    return { chainId: this.chainId, address: key, name, symbol, decimals: parsedDecimals };
  }

  private chainCall<T>(operation: () => Promise<T>, op: string): Promise<T> {
    return withRetry(operation, { ...this.retry, logger, context: { op } });
  }
}
