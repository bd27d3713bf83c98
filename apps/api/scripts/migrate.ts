import "dotenv/config";
import { join } from "path";
import { Client } from "pg";
import { createLogger } from "../../../packages/shared/src";
import { applyMigrations } from "../src/migrations";

const migrationsDir = join(__dirname, "..", "migrations");

const logger = createLogger("migrate");

async function main() {
  const url = process.env.DATABASE_URL;
  if (!url) {
    logger.warn("DATABASE_URL not set, skipping migrations (in-memory mode)");
    return;
  }

  const client = new Client({ connectionString: url });
  await client.connect();
  try {
    const applied = await applyMigrations(client, migrationsDir, logger);
    logger.info({ applied }, "done");
  } finally {
    await client.end();
  }
}

main().catch((err) => {
  logger.error({ err }, "migration failed");
  process.exit(1);
});
