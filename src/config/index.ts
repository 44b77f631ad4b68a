/**
 * Fetcher configuration
 *
 * Parsed once from the environment (and `.env`, when present). Components take
 * the values they need through their constructors; nothing below reads `config`
 * implicitly except the `openFetcher` wiring.
 */

import "dotenv/config";
import { z } from "zod";
import { ConfigError } from "../utils/errors.js";

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().min(0).default(fallback);

const envSchema = z.object({
  // Chain
  RPC_URL: z
    .string()
    .optional()
    .transform((value) =>
      (value ?? "")
        .split(",")
        .map((url) => url.trim())
        .filter(Boolean),
    )
    .pipe(z.array(z.string().url())),
  CHAIN_ID: positiveInt(1),

  // Cache store
  DATABASE_URL: z
    .string()
    .optional()
    .transform((value) => (value?.trim() ? value.trim() : undefined)),

  // Fetching
  BLOCK_GRID_STEP: positiveInt(1000),
  RPC_MAX_BLOCK_SPAN: positiveInt(2000),
  RPC_TIMEOUT_MS: positiveInt(15000),
  RPC_RETRY_COUNT: nonNegativeInt(0),
  FETCH_MAX_ATTEMPTS: positiveInt(5),
  FETCH_BACKOFF_BASE_MS: nonNegativeInt(250),
  FETCH_BACKOFF_MAX_MS: nonNegativeInt(10000),
  FETCH_MAX_GAP_BRIDGE: nonNegativeInt(0),
  FETCH_CALL_CONCURRENCY: positiveInt(8),

  // Logging
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
});

export type Env = z.infer<typeof envSchema>;

export interface Config {
  chain: {
    id: number;
    rpcUrls: string[];
    timeoutMs: number;
    transportRetryCount: number;
    maxBlockSpan: number;
  };
  database: {
    url?: string;
  };
  grid: {
    step: number;
  };
  fetch: {
    maxAttempts: number;
    backoffBaseMs: number;
    backoffMaxMs: number;
    maxGapBridge: number;
    callConcurrency: number;
  };
  log: {
    level: Env["LOG_LEVEL"];
  };
  isProduction: boolean;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const fieldErrors = result.error.flatten().fieldErrors;
    throw new ConfigError(
      `Invalid environment variables: ${Object.keys(fieldErrors).join(", ")}`,
      fieldErrors,
    );
  }

  const env = result.data;
  return {
    chain: {
      id: env.CHAIN_ID,
      rpcUrls: env.RPC_URL,
      timeoutMs: env.RPC_TIMEOUT_MS,
      transportRetryCount: env.RPC_RETRY_COUNT,
      maxBlockSpan: env.RPC_MAX_BLOCK_SPAN,
    },
    database: {
      url: env.DATABASE_URL,
    },
    grid: {
      step: env.BLOCK_GRID_STEP,
    },
    fetch: {
      maxAttempts: env.FETCH_MAX_ATTEMPTS,
      backoffBaseMs: env.FETCH_BACKOFF_BASE_MS,
      backoffMaxMs: env.FETCH_BACKOFF_MAX_MS,
      maxGapBridge: env.FETCH_MAX_GAP_BRIDGE,
      callConcurrency: env.FETCH_CALL_CONCURRENCY,
    },
    log: {
      level: env.LOG_LEVEL,
    },
    isProduction: env.NODE_ENV === "production",
  };
}

export const config = loadConfig();
