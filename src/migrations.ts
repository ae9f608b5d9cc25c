import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import type { Pool } from "pg";
import type { Logger } from "pino";

export const DEFAULT_MIGRATIONS_DIR = path.resolve(__dirname, "..", "migrations");

/**
 * Applies every `*.sql` file in `dir` that is not yet recorded in
 * `schema_migrations`, in file-name order, each in its own transaction.
 */
export const runMigrations = async (pool: Pool, log: Logger, dir = DEFAULT_MIGRATIONS_DIR) => {
  await pool.query(
    `CREATE TABLE IF NOT EXISTS schema_migrations (
       name       TEXT        PRIMARY KEY,
       applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
     )`
  );

  const applied = await pool.query<{ name: string }>("SELECT name FROM schema_migrations");
  const done = new Set(applied.rows.map((row) => row.name));

  const files = (await readdir(dir)).filter((file) => file.endsWith(".sql")).sort();

  for (const file of files) {
    if (done.has(file)) continue;

    const sql = await readFile(path.join(dir, file), "utf8");
    const client = await pool.connect();
    try {
      await client.query("BEGIN");
      await client.query(sql);
      await client.query("INSERT INTO schema_migrations (name) VALUES ($1)", [file]);
      await client.query("COMMIT");
      log.info({ migration: file }, "Applied migration");
    } catch (err) {
      await client.query("ROLLBACK");
      throw err;
    } finally {
      client.release();
    }
  }
};
