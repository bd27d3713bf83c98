import { readdirSync, readFileSync } from "fs";
import { join } from "path";
import type { ClientBase } from "pg";
import type { Logger } from "../../../packages/shared/src";

export type MigrationClient = Pick<ClientBase, "query">;

async function ensureSchemaTable(client: MigrationClient) {
  const existing = await client.query(
    "SELECT table_name FROM information_schema.tables WHERE table_schema = 'public' AND table_name = 'schema_migrations'"
  );
  if (existing.rows.length > 0) return;
  await client.query(`
    CREATE TABLE schema_migrations(
      version TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
    );
  `);
}

/** Applies every `.sql` file in `dir` not yet listed in schema_migrations, in name order. */
export async function applyMigrations(client: MigrationClient, dir: string, logger: Logger): Promise<string[]> {
  await ensureSchemaTable(client);

  const files = readdirSync(dir)
    .filter((f) => f.endsWith(".sql"))
    .sort();

  const appliedRes = await client.query<{ version: string }>("SELECT version FROM schema_migrations");
  const applied = new Set(appliedRes.rows.map((r) => r.version));
  const newlyApplied: string[] = [];

  for (const file of files) {
    const version = file.replace(".sql", "");
    if (applied.has(version)) {
      logger.debug({ version }, "migration already applied");
      continue;
    }
    const sql = readFileSync(join(dir, file), "utf-8");
    logger.info({ file }, "applying migration");
    await client.query("BEGIN");
    try {
      await client.query(sql);
      await client.query("INSERT INTO schema_migrations(version) VALUES($1)", [version]);
      await client.query("COMMIT");
    } catch (err) {
      await client.query("ROLLBACK");
      throw err;
    }
    newlyApplied.push(version);
  }
  return newlyApplied;
}
