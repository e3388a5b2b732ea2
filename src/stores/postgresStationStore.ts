import { getQueryable, type Queryable, type QueryRow } from "../db/postgres";
import type { BuildingId, StationRecord, StationWrite } from "../stations/model";
import type { StationStore, UpsertOptions } from "./interfaces";

const COLUMNS = "building_id, station_key, check_digit, description, usage_count, last_updated";
const ORDER_BY_USAGE = "ORDER BY usage_count DESC, station_key ASC";

function toIso(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "string") return value;
  return new Date().toISOString();
}

export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (match) => `\\${match}`);
}

export function rowToStation(row: QueryRow): StationRecord {
  return {
    buildingId: Number(row.building_id ?? 0),
    key: String(row.station_key ?? ""),
    checkDigit: String(row.check_digit ?? ""),
    description: row.description ? String(row.description) : "",
    usageCount: Number(row.usage_count ?? 0),
    lastUpdated: toIso(row.last_updated),
  };
}

export class PostgresStationStore implements StationStore {
  constructor(private readonly connect: () => Queryable = getQueryable) {}

  async resolve(buildingId: BuildingId, key: string): Promise<string | null> {
    const result = await this.connect().query(
      "SELECT check_digit FROM station_check_digits WHERE building_id = $1 AND station_key = $2",
      [buildingId, key]
    );
    if (!result.rowCount) return null;
    const value = result.rows[0]?.check_digit;
    return value === undefined || value === null ? null : String(value);
  }

  async get(buildingId: BuildingId, key: string): Promise<StationRecord | null> {
    const result = await this.connect().query(
      `SELECT ${COLUMNS} FROM station_check_digits WHERE building_id = $1 AND station_key = $2`,
      [buildingId, key]
    );
    const row = result.rows[0];
    return row ? rowToStation(row) : null;
  }

  async recordUsage(buildingId: BuildingId, key: string): Promise<boolean> {
    const result = await this.connect().query(
      "UPDATE station_check_digits SET usage_count = usage_count + 1 WHERE building_id = $1 AND station_key = $2",
      [buildingId, key]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async upsert(record: StationWrite, options: UpsertOptions): Promise<StationRecord> {
    const result = await this.connect().query(
      `INSERT INTO station_check_digits (${COLUMNS})
       VALUES ($1, $2, $3, $4, 0, $5::timestamptz)
       ON CONFLICT (building_id, station_key) DO UPDATE SET
         check_digit = EXCLUDED.check_digit,
         description = EXCLUDED.description,
         last_updated = EXCLUDED.last_updated,
         usage_count = CASE WHEN $6::boolean THEN station_check_digits.usage_count ELSE 0 END
       RETURNING ${COLUMNS}`,
      [
        record.buildingId,
        record.key,
        record.checkDigit,
        record.description ?? "",
        (options.at ?? new Date()).toISOString(),
        options.usage === "preserve",
      ]
    );
    const row = result.rows[0];
    if (!row) {
      throw new Error(`upsert of ${record.buildingId}/${record.key} returned no row`);
    }
    return rowToStation(row);
  }

  async delete(buildingId: BuildingId, key: string): Promise<boolean> {
    const result = await this.connect().query(
      "DELETE FROM station_check_digits WHERE building_id = $1 AND station_key = $2",
      [buildingId, key]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async deleteAll(buildingId: BuildingId): Promise<number> {
    const result = await this.connect().query("DELETE FROM station_check_digits WHERE building_id = $1", [buildingId]);
    return result.rowCount ?? 0;
  }

  async wipe(): Promise<number> {
    const result = await this.connect().query("DELETE FROM station_check_digits");
    return result.rowCount ?? 0;
  }

  async search(buildingId: BuildingId, term: string): Promise<StationRecord[]> {
    const pattern = `%${escapeLike(term.trim())}%`;
    const result = await this.connect().query(
      `SELECT ${COLUMNS} FROM station_check_digits
       WHERE building_id = $1
         AND (station_key ILIKE $2 OR description ILIKE $2 OR check_digit ILIKE $2)
       ${ORDER_BY_USAGE}`,
      [buildingId, pattern]
    );
    return result.rows.map(rowToStation);
  }

  async byAisle(buildingId: BuildingId, aisle: string): Promise<StationRecord[]> {
    const result = await this.connect().query(
      `SELECT ${COLUMNS} FROM station_check_digits
       WHERE building_id = $1 AND station_key LIKE $2
       ORDER BY station_key ASC`,
      [buildingId, `${escapeLike(aisle)}-%`]
    );
    return result.rows.map(rowToStation);
  }

  async mostUsed(buildingId: BuildingId, limit: number): Promise<StationRecord[]> {
    const bounded = Math.max(1, Math.min(limit, 500));
    const result = await this.connect().query(
      `SELECT ${COLUMNS} FROM station_check_digits
       WHERE building_id = $1 AND usage_count > 0
       ${ORDER_BY_USAGE}
       LIMIT $2`,
      [buildingId, bounded]
    );
    return result.rows.map(rowToStation);
  }

  async list(buildingId: BuildingId): Promise<StationRecord[]> {
    const result = await this.connect().query(
      `SELECT ${COLUMNS} FROM station_check_digits WHERE building_id = $1 ${ORDER_BY_USAGE}`,
      [buildingId]
    );
    return result.rows.map(rowToStation);
  }

  async count(buildingId: BuildingId): Promise<number> {
    const result = await this.connect().query(
      "SELECT COUNT(*)::int AS total FROM station_check_digits WHERE building_id = $1",
      [buildingId]
    );
    return Number(result.rows[0]?.total ?? 0);
  }

  async countAll(): Promise<number> {
    const result = await this.connect().query("SELECT COUNT(*)::int AS total FROM station_check_digits");
    return Number(result.rows[0]?.total ?? 0);
  }

  async exists(buildingId: BuildingId, key: string): Promise<boolean> {
    const result = await this.connect().query(
      "SELECT EXISTS(SELECT 1 FROM station_check_digits WHERE building_id = $1 AND station_key = $2) AS found",
      [buildingId, key]
    );
    return Boolean(result.rows[0]?.found);
  }
}
