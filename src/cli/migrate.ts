#!/usr/bin/env node
import { readEnv, redactEnvForLogs } from "../config/env";
import { createLogger } from "../config/logger";
import { runMigrations } from "../db/migrate";
import { checkPgConnection, closePgPool } from "../db/postgres";
import { arg } from "./args";

async function main(): Promise<void> {
  const env = readEnv();
  const logger = createLogger(env.STATION_DESK_LOG_LEVEL, { sink: (line) => process.stderr.write(line) });
  logger.info("station_desk_migrate_start", { env: redactEnvForLogs(env) });

  try {
    const connection = await checkPgConnection(logger);
    if (!connection.ok) {
      throw new Error(`Postgres is not reachable: ${connection.error ?? "unknown error"}`);
    }
    const result = await runMigrations(arg("dir"), logger);
    process.stdout.write(JSON.stringify({ ok: true, applied: result.applied }, null, 2) + "\n");
  } finally {
    await closePgPool();
  }
}

void main().catch((error) => {
  process.stderr.write(`migrate fatal: ${error instanceof Error ? error.stack : String(error)}\n`);
  process.exit(1);
});
