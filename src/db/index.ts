import pg from "pg";
import { getErrorMessage } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";
import { schema } from "./schema.js";

const logger = createLogger("db");
const { Pool } = pg;

export function createPool(connectionString: string): pg.Pool {
  const pool = new Pool({ connectionString });
  pool.on("error", (error: Error) => {
    logger.error({ error: error.message }, "Idle database client error");
  });
  return pool;
}

export async function initDb(pool: pg.Pool) {
  try {
    await pool.query(schema);
    logger.info("Database initialized successfully");
  } catch (error: unknown) {
    logger.error({ error: getErrorMessage(error) }, "Database initialization failed");
    throw error;
  }
}

export async function closeDb(pool: pg.Pool) {
  await pool.end();
  logger.info("Database connection closed");
}

export { PostgresCacheStore, type PgPoolLike, type PgClientLike } from "./postgres-store.js";
export { schema } from "./schema.js";
