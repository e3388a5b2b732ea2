import { Pool } from "pg";
import { readEnv, type DeskEnv } from "../config/env";
import { withRetry } from "../connectivity/retry";
import { noopLogger, type Logger } from "../config/logger";

export type QueryRow = Record<string, unknown>;

export type QueryOutcome = {
  rows: QueryRow[];
  rowCount: number | null;
};

/** The slice of a pg Pool the stores use; tests substitute an in-process fake. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<QueryOutcome>;
}

let pool: Pool | null = null;
let queryable: Queryable | null = null;

export function withQueryTimeout<T>(timeoutMs: number, label: string, task: () => Promise<T>): Promise<T> {
  let timer: NodeJS.Timeout | null = null;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`postgres ${label} query timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  return Promise.race([task(), deadline]).finally(() => {
    if (timer) {
      clearTimeout(timer);
    }
  });
}

function statementLabel(text: string): string {
  return text.trim().split(/\s+/)[0]?.toLowerCase() || "statement";
}

function buildPool(env: DeskEnv): Pool {
  return new Pool({
    host: env.PGHOST,
    port: env.PGPORT,
    database: env.PGDATABASE,
    user: env.PGUSER,
    password: env.PGPASSWORD,
    ssl: env.PGSSLMODE === "require" ? { rejectUnauthorized: false } : false,
    max: env.STATION_DESK_PG_POOL_MAX,
    idleTimeoutMillis: env.STATION_DESK_PG_IDLE_TIMEOUT_MS,
    connectionTimeoutMillis: env.STATION_DESK_PG_CONNECTION_TIMEOUT_MS,
  });
}

export function getPgPool(env: DeskEnv = readEnv()): Pool {
  if (pool) return pool;
  pool = buildPool(env);
  return pool;
}

export function createQueryable(target: Pool, timeoutMs: number): Queryable {
  const boundedTimeout = Math.max(500, timeoutMs);
  return {
    query: async (text, values) => {
      const result = await withQueryTimeout(boundedTimeout, statementLabel(text), () => target.query(text, values));
      return { rows: result.rows, rowCount: result.rowCount };
    },
  };
}

export function getQueryable(env: DeskEnv = readEnv()): Queryable {
  if (queryable) return queryable;
  queryable = createQueryable(getPgPool(env), env.STATION_DESK_PG_QUERY_TIMEOUT_MS);
  return queryable;
}

export type PgCheckResult = {
  ok: boolean;
  latencyMs: number;
  error?: string;
  details?: Record<string, unknown>;
};

export async function checkPgConnection(logger: Logger = noopLogger): Promise<PgCheckResult> {
  const startedAt = Date.now();
  try {
    const db = getQueryable();
    const version = await withRetry(
      "postgres_healthcheck",
      async () => {
        const result = await db.query("SELECT current_setting('server_version') AS version");
        const value = result.rows[0]?.version;
        if (typeof value !== "string") {
          throw new Error("invalid postgres result");
        }
        return value;
      },
      logger,
      { attempts: 3, baseDelayMs: 100 }
    );
    return {
      ok: true,
      details: { status: "connected", version },
      latencyMs: Date.now() - startedAt,
    };
  } catch (error) {
    return {
      ok: false,
      latencyMs: Date.now() - startedAt,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

export async function closePgPool(): Promise<void> {
  if (!pool) return;
  await pool.end();
  pool = null;
  queryable = null;
}
