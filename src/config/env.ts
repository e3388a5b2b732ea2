import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const BoolFromString = z
  .union([z.enum(["true", "false", "1", "0"]), z.boolean()])
  .transform((value) => value === true || value === "true" || value === "1");

const requiredString = (field: string) =>
  z
    .string()
    .trim()
    .min(1, { message: `${field} must not be empty` });

const BuildingListFromString = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((entry) => entry.trim())
      .filter(Boolean)
      .map((entry) => Number(entry))
  )
  .pipe(z.array(z.number().int().min(1).max(99)).min(1, { message: "at least one building is required" }));

const EnvSchema = z.object({
  STATION_DESK_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  STATION_DESK_STORE: z.enum(["memory", "postgres"]).default("postgres"),
  STATION_DESK_BUILDINGS: BuildingListFromString.default("2,3,4"),
  STATION_DESK_DEFAULT_BUILDING: z.coerce.number().int().min(1).max(99).default(3),
  STATION_DESK_PRESERVE_USAGE_ON_EDIT: BoolFromString.default(true),
  STATION_DESK_QUICK_ACCESS_LIMIT: z.coerce.number().int().min(1).max(200).default(20),
  STATION_DESK_DELIVERY_RETENTION_DAYS: z.coerce.number().int().min(1).max(3650).default(30),
  STATION_DESK_STORE_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  STATION_DESK_STORE_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(20).max(10_000).default(100),

  PGHOST: requiredString("PGHOST").default("127.0.0.1"),
  PGPORT: z.coerce.number().int().min(1).max(65535).default(5432),
  PGDATABASE: requiredString("PGDATABASE").default("station_desk"),
  PGUSER: requiredString("PGUSER").default("postgres"),
  PGPASSWORD: requiredString("PGPASSWORD").default("postgres"),
  PGSSLMODE: z.enum(["disable", "prefer", "require"]).default("disable"),
  STATION_DESK_PG_POOL_MAX: z.coerce.number().int().min(1).max(50).default(4),
  STATION_DESK_PG_IDLE_TIMEOUT_MS: z.coerce.number().int().min(1_000).max(300_000).default(30_000),
  STATION_DESK_PG_CONNECTION_TIMEOUT_MS: z.coerce.number().int().min(1_000).max(120_000).default(10_000),
  STATION_DESK_PG_QUERY_TIMEOUT_MS: z.coerce.number().int().min(500).max(120_000).default(5_000),
});

export type DeskEnv = z.infer<typeof EnvSchema>;

function validateBuildingConfig(env: DeskEnv): string[] {
  const errors: string[] = [];
  if (!env.STATION_DESK_BUILDINGS.includes(env.STATION_DESK_DEFAULT_BUILDING)) {
    errors.push(
      `STATION_DESK_DEFAULT_BUILDING (${env.STATION_DESK_DEFAULT_BUILDING}) must be one of STATION_DESK_BUILDINGS (${env.STATION_DESK_BUILDINGS.join(",")})`
    );
  }
  if (new Set(env.STATION_DESK_BUILDINGS).size !== env.STATION_DESK_BUILDINGS.length) {
    errors.push("STATION_DESK_BUILDINGS must not repeat a building");
  }
  return errors;
}

export function readEnv(source: NodeJS.ProcessEnv = process.env): DeskEnv {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid station-desk env: ${message}`);
  }
  const env = parsed.data;
  const buildingIssues = validateBuildingConfig(env);
  if (buildingIssues.length > 0) {
    throw new Error(`Invalid station-desk env buildings: ${buildingIssues.join("; ")}`);
  }
  return env;
}

export function redactEnvForLogs(env: DeskEnv): Record<string, string | number | boolean | null> {
  return {
    STATION_DESK_LOG_LEVEL: env.STATION_DESK_LOG_LEVEL,
    STATION_DESK_STORE: env.STATION_DESK_STORE,
    STATION_DESK_BUILDINGS: env.STATION_DESK_BUILDINGS.join(","),
    STATION_DESK_DEFAULT_BUILDING: env.STATION_DESK_DEFAULT_BUILDING,
    STATION_DESK_PRESERVE_USAGE_ON_EDIT: env.STATION_DESK_PRESERVE_USAGE_ON_EDIT,
    STATION_DESK_QUICK_ACCESS_LIMIT: env.STATION_DESK_QUICK_ACCESS_LIMIT,
    STATION_DESK_DELIVERY_RETENTION_DAYS: env.STATION_DESK_DELIVERY_RETENTION_DAYS,
    STATION_DESK_STORE_RETRY_ATTEMPTS: env.STATION_DESK_STORE_RETRY_ATTEMPTS,
    STATION_DESK_STORE_RETRY_BASE_DELAY_MS: env.STATION_DESK_STORE_RETRY_BASE_DELAY_MS,
    PGHOST: env.PGHOST,
    PGPORT: env.PGPORT,
    PGDATABASE: env.PGDATABASE,
    PGUSER: env.PGUSER,
    PGPASSWORD: "[redacted]",
    PGSSLMODE: env.PGSSLMODE,
    STATION_DESK_PG_POOL_MAX: env.STATION_DESK_PG_POOL_MAX,
    STATION_DESK_PG_IDLE_TIMEOUT_MS: env.STATION_DESK_PG_IDLE_TIMEOUT_MS,
    STATION_DESK_PG_CONNECTION_TIMEOUT_MS: env.STATION_DESK_PG_CONNECTION_TIMEOUT_MS,
    STATION_DESK_PG_QUERY_TIMEOUT_MS: env.STATION_DESK_PG_QUERY_TIMEOUT_MS,
  };
}
