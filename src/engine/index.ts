/**
 * Fetch engine: gap resolution, batching, retries and single-flight coordination
 */

export {
  FetchOrchestrator,
  type FetchOptions,
  type FetchOrchestratorOptions,
  planBatches,
} from "./orchestrator.js";
export { InFlightRegistry, type Claim, type InFlightFetch } from "./in-flight.js";
