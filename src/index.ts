export {
  ChainDataFetcher,
  openFetcher,
  withFetcher,
  type BalanceSample,
  type CallSample,
  type FetcherOverrides,
} from "./fetcher.js";
export { loadConfig, type Config } from "./config/index.js";

export { BlockGrid, type BlockGridOptions } from "./blocks/grid.js";
export {
  Filter,
  canonicalScalar,
  type Constraint,
  type FilterInput,
  type FilterJson,
} from "./cache/filter.js";
export { MemoryCacheStore } from "./cache/memory-store.js";
export { RangeFilterCache } from "./cache/range-filter-cache.js";
export {
  assertValidRange,
  formatRange,
  mergeRanges,
  splitRange,
  subtractRanges,
} from "./cache/range.js";
export type {
  CacheStore,
  CacheStoreReader,
  CacheStoreTransaction,
  CoverageRecord,
} from "./cache/store.js";
export { PostgresCacheStore, closeDb, createPool, initDb, schema } from "./db/index.js";
export {
  FetchOrchestrator,
  InFlightRegistry,
  planBatches,
  type FetchOptions,
  type FetchOrchestratorOptions,
} from "./engine/index.js";
export {
  CallRevertedError,
  ViemChainClient,
  classifyRpcError,
  createChainClient,
  erc20Events,
  erc20Functions,
  type ChainClient,
  type ChainClientConfig,
  type ContractCallQuery,
  type LogQuery,
} from "./rpc/index.js";
export { TokenMetadataService, loadKnownTokens } from "./services/token-metadata.js";
export {
  balanceStream,
  callStream,
  identityKey,
  logStream,
  type BalanceStream,
  type CallStream,
  type LogStream,
  type StreamIdentity,
} from "./streams/identity.js";
export type {
  BlockHeader,
  BlockRange,
  FetchedRow,
  FieldValue,
  GridNode,
  Scalar,
  ScalarInput,
  TimedRow,
  TokenMetadata,
} from "./types/index.js";
export {
  ChainUnavailableError,
  ConfigError,
  FetcherError,
  InconsistentRangeError,
  InvalidRangeError,
  InvalidTokenError,
  RateLimitedError,
  ResponseTooLargeError,
  StoreUnavailableError,
  isRetryable,
} from "./utils/errors.js";
