import type { QueryResultRow } from "pg";
import { describe, expect, it } from "vitest";
import { Filter } from "../../src/cache/filter.js";
import { RangeFilterCache } from "../../src/cache/range-filter-cache.js";
import { type PgClientLike, type PgPoolLike, PostgresCacheStore } from "../../src/db/postgres-store.js";
import { StoreUnavailableError } from "../../src/utils/errors.js";

const IDENTITY = "logs:0x00000000000000000000000000000000000000aa:0xddf252ad";

type Responder = (sql: string, values: unknown[]) => QueryResultRow[] | Error;

/**
 * Records every statement with collapsed whitespace; the responder decides the rows.
 */
class FakePool implements PgPoolLike {
  readonly statements: Array<{ sql: string; values: unknown[] }> = [];
  released = 0;
  ended = false;

  constructor(private readonly respond: Responder = () => []) {}

  async query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values: unknown[] = [],
  ): Promise<{ rows: R[]; rowCount: number | null }> {
    const sql = text.replace(/\s+/g, " ").trim();
    this.statements.push({ sql, values });
    const result = this.respond(sql, values);
    if (result instanceof Error) throw result;
    return { rows: result as R[], rowCount: result.length };
  }

  async connect(): Promise<PgClientLike> {
    return {
      query: this.query.bind(this),
      release: () => {
        this.released += 1;
      },
    };
  }

  async end(): Promise<void> {
    this.ended = true;
  }

  verbs(): string[] {
    return this.statements.map(({ sql }) => sql.split(" ").slice(0, 3).join(" "));
  }
}

describe("PostgresCacheStore", () => {
  it("maps coverage rows and parses BIGINT strings", async () => {
    const pool = new FakePool(() => [
      {
        id: "7",
        identity: IDENTITY,
        filter_signature: '{"from":"0xa0"}',
        start_block: "100",
        end_block: "200",
      },
    ]);
    const store = new PostgresCacheStore(pool, 1);

    const [record] = await store.listCoverage(IDENTITY);
    expect(record?.id).toBe("7");
    expect(record?.range).toEqual({ start: 100, end: 200 });
    expect(record?.filter.equals(Filter.from({ from: "0xa0" }))).toBe(true);
    expect(pool.statements[0]?.values).toEqual([1, IDENTITY]);
  });

  it("maps cached rows", async () => {
    const pool = new FakePool(() => [
      {
        block_number: "15",
        transaction_index: 2,
        log_index: 3,
        transaction_hash: "0xabc",
        fields: { from: "0xa0" },
      },
    ]);
    const store = new PostgresCacheStore(pool, 1);

    expect(await store.readRows(IDENTITY, "{}", { start: 10, end: 20 })).toEqual([
      {
        blockNumber: 15,
        transactionIndex: 2,
        logIndex: 3,
        transactionHash: "0xabc",
        fields: { from: "0xa0" },
      },
    ]);
    expect(pool.statements[0]?.values).toEqual([1, IDENTITY, "{}", 10, 20]);
  });

  it("commits rows and merged coverage in one transaction", async () => {
    const pool = new FakePool((sql) => {
      if (sql.startsWith("SELECT id, identity")) {
        return [
          { id: "3", identity: IDENTITY, filter_signature: "{}", start_block: "0", end_block: "99" },
        ];
      }
      if (sql.startsWith("INSERT INTO coverage")) return [{ id: "4" }];
      return [];
    });
    const cache = new RangeFilterCache(new PostgresCacheStore(pool, 1));

    const record = await cache.commit(IDENTITY, {}, { start: 100, end: 199 }, [
      { blockNumber: 150, transactionIndex: 0, logIndex: 1, transactionHash: null, fields: { v: "1" } },
    ]);

    expect(record).toMatchObject({ id: "4", range: { start: 0, end: 199 } });
    expect(pool.verbs()).toEqual([
      "BEGIN",
      "SELECT pg_advisory_xact_lock(hashtext($1))",
      "SELECT id, identity,",
      "INSERT INTO cached_rows",
      "DELETE FROM coverage",
      "INSERT INTO coverage",
      "COMMIT",
    ]);
    expect(pool.statements[1]?.values).toEqual([`1:${IDENTITY}:{}`]);
    expect(pool.statements[3]?.values).toEqual([
      1,
      IDENTITY,
      "{}",
      [150],
      [0],
      [1],
      [null],
      ['{"v":"1"}'],
    ]);
    expect(pool.statements[4]?.values).toEqual([1, ["3"]]);
    expect(pool.statements[5]?.values).toEqual([1, IDENTITY, "{}", 0, 199]);
    expect(pool.released).toBe(1);
  });

  it("rolls back and reports the store as unavailable when a statement fails", async () => {
    const pool = new FakePool((sql) =>
      sql.startsWith("INSERT INTO cached_rows") ? new Error("connection reset") : [],
    );
    const cache = new RangeFilterCache(new PostgresCacheStore(pool, 1));

    await expect(
      cache.commit(IDENTITY, {}, { start: 0, end: 10 }, [
        { blockNumber: 5, transactionIndex: 0, logIndex: 0, transactionHash: null, fields: {} },
      ]),
    ).rejects.toThrow(StoreUnavailableError);
    expect(pool.verbs().slice(-2)).toEqual(["INSERT INTO cached_rows", "ROLLBACK"]);
    expect(pool.released).toBe(1);
  });

  it("wraps failed reads", async () => {
    const store = new PostgresCacheStore(new FakePool(() => new Error("too many clients")), 1);
    await expect(store.listCoverage(IDENTITY)).rejects.toThrow(
      "Cache store listCoverage failed: too many clients",
    );
  });

  it("skips the row insert for an empty commit", async () => {
    const pool = new FakePool((sql) => (sql.startsWith("INSERT INTO coverage") ? [{ id: "1" }] : []));
    const cache = new RangeFilterCache(new PostgresCacheStore(pool, 1));

    await cache.commit(IDENTITY, {}, { start: 0, end: 10 }, []);
    expect(pool.verbs()).not.toContain("INSERT INTO cached_rows");
  });

  it("writes grid nodes and token metadata write-once", async () => {
    const pool = new FakePool();
    const store = new PostgresCacheStore(pool, 10);

    await store.saveGridNode({ blockNumber: 1000, timestamp: 1_600_012_000 });
    await store.saveTokenMetadata({
      chainId: 10,
      address: "0x00000000000000000000000000000000000000AB",
      name: "Test Token",
      symbol: "TST",
      decimals: 9,
    });

    expect(pool.statements.map(({ sql }) => sql.endsWith("DO NOTHING"))).toEqual([true, true]);
    expect(pool.statements[0]?.values).toEqual([10, 1000, 1_600_012_000]);
    expect(pool.statements[1]?.values).toEqual([
      10,
      "0x00000000000000000000000000000000000000ab",
      "Test Token",
      "TST",
      9,
    ]);
  });

  it("reads a grid node back as numbers", async () => {
    const store = new PostgresCacheStore(
      new FakePool(() => [{ block_number: "2000", block_timestamp: "1600024000" }]),
      1,
    );
    expect(await store.getGridNode(2000)).toEqual({ blockNumber: 2000, timestamp: 1_600_024_000 });
  });

  it("purges one identity inside a transaction", async () => {
    const pool = new FakePool();
    await new PostgresCacheStore(pool, 1).purge(IDENTITY);

    expect(pool.statements.map(({ sql }) => sql)).toEqual([
      "BEGIN",
      "DELETE FROM cached_rows WHERE chain_id = $1 AND identity = $2",
      "DELETE FROM coverage WHERE chain_id = $1 AND identity = $2",
      "COMMIT",
    ]);
    expect(pool.statements[1]?.values).toEqual([1, IDENTITY]);
  });

  it("ends the pool on close", async () => {
    const pool = new FakePool();
    await new PostgresCacheStore(pool, 1).close();
    expect(pool.ended).toBe(true);
  });
});
