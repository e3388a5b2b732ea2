import crypto from "node:crypto";
import { getQueryable, type Queryable, type QueryRow } from "../db/postgres";
import type { AssignmentStore, NewPalletAssignment, PalletAssignment } from "../stores/interfaces";

const COLUMNS =
  "id, building_id, product_name, destination, check_digit, notes, created_at, delivered, delivered_at";

function toIso(value: unknown): string | null {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "string") return value;
  return null;
}

export function rowToAssignment(row: QueryRow): PalletAssignment {
  return {
    id: String(row.id ?? ""),
    buildingId: Number(row.building_id ?? 0),
    productName: row.product_name ? String(row.product_name) : "",
    destination: String(row.destination ?? ""),
    checkDigit: String(row.check_digit ?? ""),
    notes: row.notes ? String(row.notes) : "",
    createdAt: toIso(row.created_at) ?? new Date(0).toISOString(),
    delivered: row.delivered === true,
    deliveredAt: toIso(row.delivered_at),
  };
}

export class PostgresAssignmentStore implements AssignmentStore {
  constructor(private readonly connect: () => Queryable = getQueryable) {}

  async add(assignment: NewPalletAssignment): Promise<PalletAssignment> {
    const result = await this.connect().query(
      `INSERT INTO pallet_assignments (id, building_id, product_name, destination, check_digit, notes)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING ${COLUMNS}`,
      [
        crypto.randomUUID(),
        assignment.buildingId,
        assignment.productName,
        assignment.destination,
        assignment.checkDigit,
        assignment.notes,
      ]
    );
    const row = result.rows[0];
    if (!row) throw new Error("insert into pallet_assignments returned no row");
    return rowToAssignment(row);
  }

  async get(id: string): Promise<PalletAssignment | null> {
    const result = await this.connect().query(`SELECT ${COLUMNS} FROM pallet_assignments WHERE id = $1`, [id]);
    const row = result.rows[0];
    return row ? rowToAssignment(row) : null;
  }

  async listActive(): Promise<PalletAssignment[]> {
    const result = await this.connect().query(
      `SELECT ${COLUMNS} FROM pallet_assignments WHERE delivered = false ORDER BY created_at ASC`
    );
    return result.rows.map(rowToAssignment);
  }

  async markDelivered(id: string, at: Date): Promise<boolean> {
    const result = await this.connect().query(
      "UPDATE pallet_assignments SET delivered = true, delivered_at = $2::timestamptz WHERE id = $1 AND delivered = false",
      [id, at.toISOString()]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.connect().query("DELETE FROM pallet_assignments WHERE id = $1", [id]);
    return (result.rowCount ?? 0) > 0;
  }

  async history(limit: number): Promise<PalletAssignment[]> {
    const bounded = Math.max(1, Math.min(Math.trunc(limit), 500));
    const result = await this.connect().query(
      `SELECT ${COLUMNS} FROM pallet_assignments WHERE delivered = true ORDER BY delivered_at DESC LIMIT $1`,
      [bounded]
    );
    return result.rows.map(rowToAssignment);
  }

  async countActive(): Promise<number> {
    const result = await this.connect().query(
      "SELECT COUNT(*)::int AS total FROM pallet_assignments WHERE delivered = false"
    );
    return Number(result.rows[0]?.total ?? 0);
  }

  async cleanupDelivered(before: Date): Promise<number> {
    const result = await this.connect().query(
      "DELETE FROM pallet_assignments WHERE delivered = true AND delivered_at < $1::timestamptz",
      [before.toISOString()]
    );
    return result.rowCount ?? 0;
  }
}
