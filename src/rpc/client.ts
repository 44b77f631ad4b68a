/**
 * Chain client
 *
 * The engine talks to the node only through `ChainClient`. `ViemChainClient`
 * implements it over a viem public client and maps transport failures onto the
 * fetcher error taxonomy.
 */

import {
  type AbiEvent,
  type AbiFunction,
  type Address,
  BaseError,
  type Chain,
  HttpRequestError,
  LimitExceededRpcError,
  type PublicClient,
  concat,
  createPublicClient,
  decodeAbiParameters,
  decodeEventLog,
  encodeAbiParameters,
  fallback,
  hexToNumber,
  http,
  numberToHex,
  toFunctionSelector,
} from "viem";
import { arbitrum, base, mainnet, optimism, polygon, sepolia } from "viem/chains";
import type { Filter } from "../cache/filter.js";
import type { BlockHeader, FetchedRow, FieldValue } from "../types/index.js";
import {
  ChainUnavailableError,
  FetcherError,
  RateLimitedError,
  ResponseTooLargeError,
  getErrorMessage,
} from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";
import { toFieldValue, toFields } from "./decode.js";
import { buildTopics } from "./topics.js";

const logger = createLogger("rpc-client");

export interface LogQuery {
  address: Address;
  event: AbiEvent;
  filter: Filter;
  fromBlock: number;
  toBlock: number;
}

export interface ContractCallQuery {
  address: Address;
  fn: AbiFunction;
  args: readonly unknown[];
  blockNumber: number;
}

export interface ChainClient {
  /** Widest block span a single `getLogs` call may cover */
  readonly maxBlockSpan: number;
  /**
   * Logs of `event` emitted by `address` in `[fromBlock, toBlock]`. Filter keys the
   * node cannot match may be ignored; callers re-apply the filter to the rows.
   */
  getLogs(query: LogQuery): Promise<FetchedRow[]>;
  call(query: ContractCallQuery): Promise<FieldValue>;
  getBalance(address: Address, blockNumber: number): Promise<bigint>;
  getBlockHeader(blockNumber: number): Promise<BlockHeader>;
  getChainTip(): Promise<number>;
}

/**
 * A contract call reverted; retrying at the same block cannot change that.
 */
export class CallRevertedError extends FetcherError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CallRevertedError";
  }
}

const CHAIN_MAP: Record<number, Chain> = {
  1: mainnet,
  10: optimism,
  137: polygon,
  8453: base,
  42161: arbitrum,
  11155111: sepolia,
};

const TOO_LARGE_PATTERN =
  /query returned more than|more than \d+ results|too many (results|logs|blocks)|block range (is )?(too large|too wide|exceeds)|range (is )?too (large|wide)|response size (is )?(exceeded|too large)|log response size exceeded/i;
const REVERT_PATTERN = /execution reverted|reverted with/i;

function retryAfterMs(error: HttpRequestError): number | undefined {
  const header = error.headers?.get("retry-after");
  if (!header) return undefined;
  const seconds = Number.parseFloat(header);
  return Number.isFinite(seconds) && seconds >= 0 ? Math.round(seconds * 1000) : undefined;
}

/**
 * Maps a viem (or any) failure onto the fetcher error taxonomy
 */
export function classifyRpcError(error: unknown, context: string): FetcherError {
  if (error instanceof FetcherError) return error;
  const message = getErrorMessage(error);

  if (TOO_LARGE_PATTERN.test(message)) {
    return new ResponseTooLargeError(`${context}: ${message}`, undefined, undefined, {
      cause: error,
    });
  }
  if (error instanceof BaseError) {
    const httpError = error.walk((cause) => cause instanceof HttpRequestError);
    if (httpError instanceof HttpRequestError && httpError.status === 429) {
      return new RateLimitedError(`${context}: rate limited`, retryAfterMs(httpError), {
        cause: error,
      });
    }
    if (error.walk((cause) => cause instanceof LimitExceededRpcError)) {
      return new RateLimitedError(`${context}: ${message}`, undefined, { cause: error });
    }
  }
  if (REVERT_PATTERN.test(message)) {
    return new CallRevertedError(`${context}: ${message}`, { cause: error });
  }
  return new ChainUnavailableError(`${context}: ${message}`, { cause: error });
}

export interface ViemChainClientOptions {
  publicClient: PublicClient;
  maxBlockSpan: number;
}

export class ViemChainClient implements ChainClient {
  private readonly client: PublicClient;
  readonly maxBlockSpan: number;

  constructor(options: ViemChainClientOptions) {
    this.client = options.publicClient;
    this.maxBlockSpan = options.maxBlockSpan;
  }

  async getLogs(query: LogQuery): Promise<FetchedRow[]> {
    const { address, event, filter, fromBlock, toBlock } = query;
    const context = `getLogs ${event.name}@${address} [${fromBlock}, ${toBlock}]`;

    logger.debug({ address, event: event.name, fromBlock, toBlock }, "Requesting logs");
    const logs = await this.requestLogs(query).catch((error: unknown): never => {
      const classified = classifyRpcError(error, context);
      if (classified instanceof ResponseTooLargeError) {
        throw new ResponseTooLargeError(classified.message, fromBlock, toBlock, { cause: error });
      }
      throw classified;
    });

    const rows: FetchedRow[] = [];
    for (const log of logs) {
      if (log.blockNumber === null || log.logIndex === null || log.transactionIndex === null) {
        // pending logs carry no position; finalized ranges never return them
        continue;
      }
      let args: unknown;
      try {
        args = decodeEventLog({ abi: [event], data: log.data, topics: log.topics }).args;
      } catch (error: unknown) {
        throw new FetcherError(`${context}: cannot decode log: ${getErrorMessage(error)}`, {
          cause: error,
        });
      }
      rows.push({
        blockNumber: hexToNumber(log.blockNumber),
        transactionIndex: hexToNumber(log.transactionIndex),
        logIndex: hexToNumber(log.logIndex),
        transactionHash: log.transactionHash?.toLowerCase() ?? null,
        fields: toFields(args, event.inputs),
      });
    }
    return rows;
  }

  private requestLogs(query: LogQuery) {
    return this.client.request({
      method: "eth_getLogs",
      params: [
        {
          address: query.address,
          topics: buildTopics(query.event, query.filter),
          fromBlock: numberToHex(query.fromBlock),
          toBlock: numberToHex(query.toBlock),
        },
      ],
    });
  }

  async call(query: ContractCallQuery): Promise<FieldValue> {
    const { address, fn, args, blockNumber } = query;
    const context = `call ${fn.name}@${address} block ${blockNumber}`;
    try {
      const data = concat([toFunctionSelector(fn), encodeAbiParameters(fn.inputs, args)]);
      const result = await this.client.call({
        to: address,
        data,
        blockNumber: BigInt(blockNumber),
      });
      const decoded = decodeAbiParameters(fn.outputs, result.data ?? "0x");
      return toFieldValue(decoded.length === 1 ? decoded[0] : decoded);
    } catch (error: unknown) {
      throw classifyRpcError(error, context);
    }
  }

  async getBalance(address: Address, blockNumber: number): Promise<bigint> {
    try {
      return await this.client.getBalance({ address, blockNumber: BigInt(blockNumber) });
    } catch (error: unknown) {
      throw classifyRpcError(error, `getBalance ${address} block ${blockNumber}`);
    }
  }

  async getBlockHeader(blockNumber: number): Promise<BlockHeader> {
    try {
      const block = await this.client.getBlock({ blockNumber: BigInt(blockNumber) });
      return { number: blockNumber, timestamp: Number(block.timestamp) };
    } catch (error: unknown) {
      throw classifyRpcError(error, `getBlock ${blockNumber}`);
    }
  }

  async getChainTip(): Promise<number> {
    try {
      return Number(await this.client.getBlockNumber({ cacheTime: 0 }));
    } catch (error: unknown) {
      throw classifyRpcError(error, "getBlockNumber");
    }
  }
}

export interface ChainClientConfig {
  id: number;
  rpcUrls: string[];
  timeoutMs: number;
  transportRetryCount: number;
  maxBlockSpan: number;
}

/**
 * Builds a viem-backed chain client. Several RPC urls become a fallback transport.
 */
export function createChainClient(chainConfig: ChainClientConfig): ViemChainClient {
  const transportOptions = {
    retryCount: chainConfig.transportRetryCount,
    timeout: chainConfig.timeoutMs,
  };
  const { rpcUrls } = chainConfig;
  const transport =
    rpcUrls.length === 0
      ? http(undefined, transportOptions)
      : rpcUrls.length === 1
        ? http(rpcUrls[0], transportOptions)
        : fallback(rpcUrls.map((url) => http(url, transportOptions)));

  const publicClient = createPublicClient({
    chain: CHAIN_MAP[chainConfig.id],
    transport,
  });

  return new ViemChainClient({ publicClient, maxBlockSpan: chainConfig.maxBlockSpan });
}
