import fs from "node:fs/promises";
import path from "node:path";
import { getPgPool, withQueryTimeout } from "./postgres";
import { readEnv } from "../config/env";
import { noopLogger, type Logger } from "../config/logger";

export async function runMigrations(
  migrationsDir = path.join(process.cwd(), "migrations"),
  logger: Logger = noopLogger
): Promise<{ applied: string[] }> {
  const env = readEnv();
  const pool = getPgPool(env);
  const timeoutMs = Math.max(500, env.STATION_DESK_PG_QUERY_TIMEOUT_MS);
  const applied: string[] = [];

  const client = await pool.connect();
  try {
    await withQueryTimeout(timeoutMs, "migration bootstrap", () =>
      client.query(`
        CREATE TABLE IF NOT EXISTS station_desk_migrations (
          id text PRIMARY KEY,
          applied_at timestamptz NOT NULL DEFAULT now()
        )
      `)
    );

    const files = (await fs.readdir(migrationsDir))
      .filter((f) => f.endsWith(".sql"))
      .sort((a, b) => a.localeCompare(b));

    for (const file of files) {
      const exists = await withQueryTimeout(timeoutMs, "migration check", () =>
        client.query("SELECT 1 FROM station_desk_migrations WHERE id = $1", [file])
      );
      if (exists.rowCount && exists.rowCount > 0) continue;

      const sql = await fs.readFile(path.join(migrationsDir, file), "utf8");
      await client.query("BEGIN");
      try {
        await withQueryTimeout(timeoutMs, "migration", () => client.query(sql));
        await client.query("INSERT INTO station_desk_migrations (id) VALUES ($1)", [file]);
        await client.query("COMMIT");
        applied.push(file);
        logger.info("station_desk_migration_applied", { file });
      } catch (error) {
        await client.query("ROLLBACK");
        throw error;
      }
    }
  } finally {
    client.release();
  }
  return { applied };
}
