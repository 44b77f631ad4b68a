/**
 * Cache Database Schema
 *
 * Tables:
 * - grid_nodes: write-once block timestamps at grid multiples
 * - coverage: (identity, filter, range) entries asserting complete rows
 * - cached_rows: rows fetched under each (identity, filter signature)
 * - token_metadata: resolved ERC-20 name/symbol/decimals
 *
 * Every table is keyed by chain_id so one database can serve several chains.
 */

export const schema = `
-- ============================================================================
-- GRID_NODES TABLE
-- ============================================================================
CREATE TABLE IF NOT EXISTS grid_nodes (
  chain_id INT NOT NULL,
  block_number BIGINT NOT NULL,
  block_timestamp BIGINT NOT NULL,
  resolved_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  PRIMARY KEY (chain_id, block_number)
);

-- ============================================================================
-- COVERAGE TABLE
-- ============================================================================
CREATE TABLE IF NOT EXISTS coverage (
  id BIGSERIAL PRIMARY KEY,
  chain_id INT NOT NULL,
  identity TEXT NOT NULL,
  filter_signature TEXT NOT NULL,
  start_block BIGINT NOT NULL,
  end_block BIGINT NOT NULL,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  CONSTRAINT coverage_range_valid CHECK (start_block >= 0 AND start_block <= end_block)
);

CREATE INDEX IF NOT EXISTS idx_coverage_identity ON coverage(chain_id, identity);
CREATE INDEX IF NOT EXISTS idx_coverage_filter ON coverage(chain_id, identity, filter_signature, start_block);

-- ============================================================================
-- CACHED_ROWS TABLE
-- ============================================================================
CREATE TABLE IF NOT EXISTS cached_rows (
  chain_id INT NOT NULL,
  identity TEXT NOT NULL,
  filter_signature TEXT NOT NULL,
  block_number BIGINT NOT NULL,
  transaction_index INT NOT NULL,
  log_index INT NOT NULL,
  transaction_hash TEXT,
  fields JSONB NOT NULL,
  PRIMARY KEY (chain_id, identity, filter_signature, block_number, transaction_index, log_index)
);

-- ============================================================================
-- TOKEN_METADATA TABLE
-- ============================================================================
CREATE TABLE IF NOT EXISTS token_metadata (
  chain_id INT NOT NULL,
  address TEXT NOT NULL,
  name TEXT NOT NULL,
  symbol TEXT NOT NULL,
  decimals INT NOT NULL,
  resolved_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  PRIMARY KEY (chain_id, address),
  CONSTRAINT token_metadata_decimals_valid CHECK (decimals >= 0 AND decimals <= 255)
);
`;
