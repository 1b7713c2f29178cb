import { readdir, readFile } from "fs-extra";
import path from "node:path";
import type { SQLiteClient } from "./sqlite";

export interface Migration {
  name: string;
  sql: string;
}

export interface ApplyMigrationsResult {
  applied: string[];
  skipped: string[];
}

// Resolves from both src/database and dist/database.
export const DEFAULT_MIGRATIONS_DIR = path.resolve(__dirname, "..", "..", "sql", "migrations");

/** `NNN_name.sql` files in name order. */
export async function loadMigrations(directory: string): Promise<Migration[]> {
  const files = (await readdir(directory)).filter((file) => file.endsWith(".sql")).sort();

  return Promise.all(
    files.map(async (name) => ({ name, sql: await readFile(path.join(directory, name), "utf-8") })),
  );
}

/**
 * Runs every migration not yet recorded in `schema_migrations`, each in its
 * own transaction together with its bookkeeping row.
 */
export async function applyMigrations(
  client: SQLiteClient,
  directory: string = DEFAULT_MIGRATIONS_DIR,
): Promise<ApplyMigrationsResult> {
  const migrations = await loadMigrations(directory);

  client.exec(
    `CREATE TABLE IF NOT EXISTS schema_migrations (
      name TEXT PRIMARY KEY,
      applied_at INTEGER NOT NULL
    );`,
  );
  const done = new Set(
    client.all<{ name: string }>("SELECT name FROM schema_migrations;").map((row) => row.name),
  );

  const result: ApplyMigrationsResult = { applied: [], skipped: [] };
  for (const migration of migrations) {
    if (done.has(migration.name)) {
      result.skipped.push(migration.name);
      continue;
    }

    client.transaction((trx) => {
      trx.exec(migration.sql);
      trx.run("INSERT INTO schema_migrations (name, applied_at) VALUES (?, ?);", [migration.name, Date.now()]);
    });
    result.applied.push(migration.name);
  }

  return result;
}
