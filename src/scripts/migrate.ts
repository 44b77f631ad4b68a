import { config } from "../config/index.js";
import { closeDb, createPool, initDb } from "../db/index.js";
import { getErrorMessage } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("db:migrate");

async function main() {
  const databaseUrl = config.database.url;
  if (!databaseUrl) {
    throw new Error("DATABASE_URL is not set");
  }

  logger.info({ chainId: config.chain.id }, "Running database migrations");
  const pool = createPool(databaseUrl);
  try {
    await initDb(pool);
    logger.info("Database migrations applied");
  } finally {
    await closeDb(pool);
  }
}

main().catch((error: unknown) => {
  logger.error({ error: getErrorMessage(error) }, "Database migration failed");
  process.exit(1);
});
