/**
 * PostgreSQL-backed cache store.
 *
 * Several processes may share one database: writers of the same
 * (identity, filter) serialize on a transaction-scoped advisory lock, and
 * row inserts ignore rows another writer stored first.
 */

import type { QueryResultRow } from "pg";
import { Filter } from "../cache/filter.js";
import type { CacheStore, CacheStoreTransaction, CoverageRecord } from "../cache/store.js";
import type {
  BlockRange,
  FetchedRow,
  FieldValue,
  GridNode,
  TokenMetadata,
} from "../types/index.js";
import { FetcherError, StoreUnavailableError, getErrorMessage } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("db");

/**
 * The slice of `pg.Pool` the store relies on
 */
export interface PgQueryable {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[],
  ): Promise<{ rows: R[]; rowCount: number | null }>;
}

export interface PgClientLike extends PgQueryable {
  release(): void;
}

export interface PgPoolLike extends PgQueryable {
  connect(): Promise<PgClientLike>;
  end(): Promise<void>;
}

// BIGINT columns arrive as strings
type CoverageRow = {
  id: string;
  identity: string;
  filter_signature: string;
  start_block: string;
  end_block: string;
};

type CachedRow = {
  block_number: string;
  transaction_index: number;
  log_index: number;
  transaction_hash: string | null;
  fields: Record<string, FieldValue>;
};

type GridNodeRow = {
  block_number: string;
  block_timestamp: string;
};

type TokenRow = {
  chain_id: number;
  address: string;
  name: string;
  symbol: string;
  decimals: number;
};

const toCoverage = (row: CoverageRow): CoverageRecord => ({
  id: row.id,
  identity: row.identity,
  filter: Filter.parse(row.filter_signature),
  range: { start: Number(row.start_block), end: Number(row.end_block) },
});

function toStoreError(error: unknown, operation: string): FetcherError {
  if (error instanceof FetcherError) return error;
  return new StoreUnavailableError(`Cache store ${operation} failed: ${getErrorMessage(error)}`, {
    cause: error,
  });
}

export class PostgresCacheStore implements CacheStore {
  constructor(
    private readonly pool: PgPoolLike,
    private readonly chainId: number,
  ) {}

  private async run<T>(operation: string, query: () => Promise<T>): Promise<T> {
    try {
      return await query();
    } catch (error: unknown) {
      throw toStoreError(error, operation);
    }
  }

  async listCoverage(identity: string): Promise<CoverageRecord[]> {
    const { rows } = await this.run("listCoverage", () =>
      this.pool.query<CoverageRow>(
        `SELECT id, identity, filter_signature, start_block, end_block
         FROM coverage
         WHERE chain_id = $1 AND identity = $2
         ORDER BY filter_signature, start_block`,
        [this.chainId, identity],
      ),
    );
    return rows.map(toCoverage);
  }

  async readRows(
    identity: string,
    filterSignature: string,
    range: BlockRange,
  ): Promise<FetchedRow[]> {
    const { rows } = await this.run("readRows", () =>
      this.pool.query<CachedRow>(
        `SELECT block_number, transaction_index, log_index, transaction_hash, fields
         FROM cached_rows
         WHERE chain_id = $1 AND identity = $2 AND filter_signature = $3
           AND block_number BETWEEN $4 AND $5
         ORDER BY block_number, transaction_index, log_index`,
        [this.chainId, identity, filterSignature, range.start, range.end],
      ),
    );
    return rows.map((row) => ({
      blockNumber: Number(row.block_number),
      transactionIndex: row.transaction_index,
      logIndex: row.log_index,
      transactionHash: row.transaction_hash,
      fields: row.fields,
    }));
  }

  transaction<T>(work: (tx: CacheStoreTransaction) => Promise<T>): Promise<T> {
    return this.inTransaction("transaction", (client) => work(this.transactionOn(client)));
  }

  /**
   * BEGIN/COMMIT around `work` on a dedicated client, ROLLBACK on any failure
   */
  private async inTransaction<T>(
    operation: string,
    work: (client: PgClientLike) => Promise<T>,
  ): Promise<T> {
    const client = await this.run("connect", () => this.pool.connect());
    try {
      await client.query("BEGIN");
      const result = await work(client);
      await client.query("COMMIT");
      return result;
    } catch (error: unknown) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackError: unknown) {
        logger.error({ error: getErrorMessage(rollbackError) }, "Transaction rollback failed");
      }
      throw toStoreError(error, operation);
    } finally {
      client.release();
    }
  }

  private transactionOn(client: PgClientLike): CacheStoreTransaction {
    const chainId = this.chainId;
    return {
      lock: async (identity, filterSignature) => {
        await client.query("SELECT pg_advisory_xact_lock(hashtext($1))", [
          `${chainId}:${identity}:${filterSignature}`,
        ]);
      },

      listCoverageForFilter: async (identity, filterSignature) => {
        const { rows } = await client.query<CoverageRow>(
          `SELECT id, identity, filter_signature, start_block, end_block
           FROM coverage
           WHERE chain_id = $1 AND identity = $2 AND filter_signature = $3
           ORDER BY start_block`,
          [chainId, identity, filterSignature],
        );
        return rows.map(toCoverage);
      },

      insertRows: async (identity, filterSignature, rows) => {
        if (rows.length === 0) return;
        await client.query(
          `INSERT INTO cached_rows
             (chain_id, identity, filter_signature, block_number, transaction_index, log_index, transaction_hash, fields)
           SELECT $1, $2, $3, r.block_number, r.transaction_index, r.log_index, r.transaction_hash, r.fields
           FROM unnest($4::bigint[], $5::int[], $6::int[], $7::text[], $8::jsonb[])
             AS r(block_number, transaction_index, log_index, transaction_hash, fields)
           ON CONFLICT DO NOTHING`,
          [
            chainId,
            identity,
            filterSignature,
            rows.map((row) => row.blockNumber),
            rows.map((row) => row.transactionIndex),
            rows.map((row) => row.logIndex),
            rows.map((row) => row.transactionHash),
            rows.map((row) => JSON.stringify(row.fields)),
          ],
        );
      },

      replaceCoverage: async (identity, filter, supersededIds, range) => {
        if (supersededIds.length > 0) {
          await client.query("DELETE FROM coverage WHERE chain_id = $1 AND id = ANY($2::bigint[])", [
            chainId,
            [...supersededIds],
          ]);
        }
        const { rows } = await client.query<{ id: string }>(
          `INSERT INTO coverage (chain_id, identity, filter_signature, start_block, end_block)
           VALUES ($1, $2, $3, $4, $5)
           RETURNING id`,
          [chainId, identity, filter.signature, range.start, range.end],
        );
        const [inserted] = rows;
        if (!inserted) {
          throw new StoreUnavailableError("Coverage insert returned no id");
        }
        return { id: String(inserted.id), identity, filter, range: { ...range } };
      },
    };
  }

  async getGridNode(blockNumber: number): Promise<GridNode | null> {
    const { rows } = await this.run("getGridNode", () =>
      this.pool.query<GridNodeRow>(
        "SELECT block_number, block_timestamp FROM grid_nodes WHERE chain_id = $1 AND block_number = $2",
        [this.chainId, blockNumber],
      ),
    );
    const [row] = rows;
    return row ? { blockNumber: Number(row.block_number), timestamp: Number(row.block_timestamp) } : null;
  }

  async saveGridNode(node: GridNode): Promise<void> {
    await this.run("saveGridNode", () =>
      this.pool.query(
        `INSERT INTO grid_nodes (chain_id, block_number, block_timestamp)
         VALUES ($1, $2, $3)
         ON CONFLICT (chain_id, block_number) DO NOTHING`,
        [this.chainId, node.blockNumber, node.timestamp],
      ),
    );
  }

  async getTokenMetadata(address: string): Promise<TokenMetadata | null> {
    const { rows } = await this.run("getTokenMetadata", () =>
      this.pool.query<TokenRow>(
        `SELECT chain_id, address, name, symbol, decimals
         FROM token_metadata
         WHERE chain_id = $1 AND address = $2`,
        [this.chainId, address.toLowerCase()],
      ),
    );
    const [row] = rows;
    return row
      ? {
          chainId: row.chain_id,
          address: row.address,
          name: row.name,
          symbol: row.symbol,
          decimals: row.decimals,
        }
      : null;
  }

  async saveTokenMetadata(meta: TokenMetadata): Promise<void> {
    await this.run("saveTokenMetadata", () =>
      this.pool.query(
        `INSERT INTO token_metadata (chain_id, address, name, symbol, decimals)
         VALUES ($1, $2, $3, $4, $5)
         ON CONFLICT (chain_id, address) DO NOTHING`,
        [this.chainId, meta.address.toLowerCase(), meta.name, meta.symbol, meta.decimals],
      ),
    );
  }

  async purge(identity?: string): Promise<void> {
    const scope = identity === undefined ? "" : " AND identity = $2";
    const values: unknown[] = identity === undefined ? [this.chainId] : [this.chainId, identity];
    await this.inTransaction("purge", async (client) => {
      await client.query(`DELETE FROM cached_rows WHERE chain_id = $1${scope}`, values);
      await client.query(`DELETE FROM coverage WHERE chain_id = $1${scope}`, values);
    });
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
