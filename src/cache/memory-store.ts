import type { BlockRange, FetchedRow, GridNode, TokenMetadata } from "../types/index.js";
import type { Filter } from "./filter.js";
import { containsBlock } from "./range.js";
import { compareRows, rowKey } from "./rows.js";
import type { CacheStore, CacheStoreTransaction, CoverageRecord } from "./store.js";

const rowsKey = (identity: string, filterSignature: string) => `${identity}\u0000${filterSignature}`;

const cloneRecord = (record: CoverageRecord): CoverageRecord => ({
  ...record,
  range: { ...record.range },
});

/**
 * Process-local cache store.
 *
 * Shared by every component holding the same instance; transactions are
 * serialized and their writes applied only once `work` resolves.
 */
export class MemoryCacheStore implements CacheStore {
  private readonly coverage = new Map<string, CoverageRecord[]>();
  private readonly rows = new Map<string, Map<string, FetchedRow>>();
  private readonly gridNodes = new Map<number, GridNode>();
  private readonly tokens = new Map<string, TokenMetadata>();
  private nextId = 1;
  private queue: Promise<unknown> = Promise.resolve();

  async listCoverage(identity: string): Promise<CoverageRecord[]> {
    return (this.coverage.get(identity) ?? []).map(cloneRecord);
  }

  async readRows(
    identity: string,
    filterSignature: string,
    range: BlockRange,
  ): Promise<FetchedRow[]> {
    const stored = this.rows.get(rowsKey(identity, filterSignature));
    if (!stored) return [];
    return [...stored.values()]
      .filter((row) => containsBlock(range, row.blockNumber))
      .sort(compareRows)
      .map((row) => structuredClone(row));
  }

  transaction<T>(work: (tx: CacheStoreTransaction) => Promise<T>): Promise<T> {
    const run = this.queue.then(() => this.runTransaction(work));
    // the caller observes failures through `run`; the queue only needs ordering
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async runTransaction<T>(work: (tx: CacheStoreTransaction) => Promise<T>): Promise<T> {
    const stagedRows: Array<{ key: string; rows: FetchedRow[] }> = [];
    const removed = new Set<string>();
    const added: CoverageRecord[] = [];

    const tx: CacheStoreTransaction = {
      lock: async () => {},
      listCoverageForFilter: async (identity, filterSignature) => {
        const committed = (this.coverage.get(identity) ?? []).filter(
          (record) => record.filter.signature === filterSignature && !removed.has(record.id),
        );
        const staged = added.filter(
          (record) =>
            record.identity === identity &&
            record.filter.signature === filterSignature &&
            !removed.has(record.id),
        );
        return [...committed, ...staged].map(cloneRecord);
      },
      insertRows: async (identity, filterSignature, rows) => {
        stagedRows.push({
          key: rowsKey(identity, filterSignature),
          rows: rows.map((row) => structuredClone(row)),
        });
      },
      replaceCoverage: async (identity, filter: Filter, supersededIds, range) => {
        for (const id of supersededIds) removed.add(id);
        const record: CoverageRecord = {
          id: String(this.nextId++),
          identity,
          filter,
          range: { ...range },
        };
        added.push(record);
        return cloneRecord(record);
      },
    };

    const result = await work(tx);

    for (const { key, rows } of stagedRows) {
      let stored = this.rows.get(key);
      if (!stored) {
        stored = new Map();
        this.rows.set(key, stored);
      }
      for (const row of rows) {
        const id = rowKey(row);
        if (!stored.has(id)) stored.set(id, row);
      }
    }
    for (const [identity, records] of this.coverage) {
      this.coverage.set(
        identity,
        records.filter((record) => !removed.has(record.id)),
      );
    }
    for (const record of added) {
      if (removed.has(record.id)) continue;
      const records = this.coverage.get(record.identity) ?? [];
      records.push(record);
      this.coverage.set(record.identity, records);
    }

    return result;
  }

  async getGridNode(blockNumber: number): Promise<GridNode | null> {
    const node = this.gridNodes.get(blockNumber);
    return node ? { ...node } : null;
  }

  async saveGridNode(node: GridNode): Promise<void> {
    if (!this.gridNodes.has(node.blockNumber)) {
      this.gridNodes.set(node.blockNumber, { ...node });
    }
  }

  async getTokenMetadata(address: string): Promise<TokenMetadata | null> {
    const meta = this.tokens.get(address.toLowerCase());
    return meta ? { ...meta } : null;
  }

  async saveTokenMetadata(meta: TokenMetadata): Promise<void> {
    const address = meta.address.toLowerCase();
    if (!this.tokens.has(address)) {
      this.tokens.set(address, { ...meta, address });
    }
  }

  async purge(identity?: string): Promise<void> {
    if (identity === undefined) {
      this.coverage.clear();
      this.rows.clear();
      return;
    }
    this.coverage.delete(identity);
    for (const key of [...this.rows.keys()]) {
      if (key.startsWith(`${identity}\u0000`)) this.rows.delete(key);
    }
  }

  async close(): Promise<void> {}
}
