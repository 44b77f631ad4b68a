/**
 * RPC module: the chain client boundary
 */

export {
  type ChainClient,
  type ChainClientConfig,
  type ContractCallQuery,
  type LogQuery,
  CallRevertedError,
  ViemChainClient,
  classifyRpcError,
  createChainClient,
} from "./client.js";
export { erc20Events, erc20Functions } from "./abi.js";
export { buildTopics, encodeTopicValue } from "./topics.js";
