import { readdir, readFile } from "node:fs/promises";
import path from "node:path";

import { fileURLToPath } from "node:url";

import { loadDirectoryConfig } from "../config/index.js";
import { closePool, getPool } from "./pool.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Same relative location from src/db and dist/db.
export const MIGRATIONS_DIR = path.resolve(__dirname, "../../migrations");

export async function listMigrationFiles(migrationsDir = MIGRATIONS_DIR): Promise<string[]> {
  return (await readdir(migrationsDir))
    .filter((name) => name.endsWith(".sql"))
    .sort((a, b) => a.localeCompare(b));
}

export async function migrateDatabase(connectionString: string, options?: { closePool?: boolean }) {
  const shouldClosePool = options?.closePool ?? true;
  const pool = getPool(connectionString);
  const client = await pool.connect();

  await client.query("select pg_advisory_lock(hashtext('tlt_schema_migrations'))");
  try {
    await client.query(
      `create table if not exists schema_migrations (
         id bigserial primary key,
         filename text not null unique,
         applied_at timestamptz not null default now()
       )`,
    );

    for (const filename of await listMigrationFiles()) {
      const alreadyApplied = await client.query("select 1 from schema_migrations where filename = $1", [filename]);
      if ((alreadyApplied.rowCount ?? 0) > 0) {
        continue;
      }

      const sql = await readFile(path.join(MIGRATIONS_DIR, filename), "utf-8");

      await client.query("begin");
      try {
        await client.query(sql);
        await client.query("insert into schema_migrations (filename) values ($1)", [filename]);
        await client.query("commit");
      } catch (error) {
        await client.query("rollback");
        throw error;
      }
    }
  } finally {
    await client.query("select pg_advisory_unlock(hashtext('tlt_schema_migrations'))");
    client.release();
  }

  if (shouldClosePool) {
    await closePool();
  }
}

const isEntrypoint = process.argv[1] && path.resolve(process.argv[1]) === __filename;

if (isEntrypoint) {
  const { DATABASE_URL } = loadDirectoryConfig();
  if (!DATABASE_URL) {
    console.error("DATABASE_URL is required to run migrations");
    process.exit(1);
  }
  migrateDatabase(DATABASE_URL).catch((error) => {
    console.error(error);
    process.exit(1);
  });
}
