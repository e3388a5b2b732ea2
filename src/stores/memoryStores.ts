import crypto from "node:crypto";
import type { BuildingId, StationRecord, StationWrite } from "../stations/model";
import {
  compareByUsageThenKey,
  type AssignmentStore,
  type NewPalletAssignment,
  type PalletAssignment,
  type StationStore,
  type UpsertOptions,
} from "./interfaces";

function rowId(buildingId: BuildingId, key: string): string {
  return `${buildingId}:${key}`;
}

export class MemoryStationStore implements StationStore {
  private rows = new Map<string, StationRecord>();

  private inBuilding(buildingId: BuildingId): StationRecord[] {
    return [...this.rows.values()].filter((row) => row.buildingId === buildingId);
  }

  async resolve(buildingId: BuildingId, key: string): Promise<string | null> {
    return this.rows.get(rowId(buildingId, key))?.checkDigit ?? null;
  }

  async get(buildingId: BuildingId, key: string): Promise<StationRecord | null> {
    const row = this.rows.get(rowId(buildingId, key));
    return row ? { ...row } : null;
  }

  async recordUsage(buildingId: BuildingId, key: string): Promise<boolean> {
    const id = rowId(buildingId, key);
    const current = this.rows.get(id);
    if (!current) return false;
    this.rows.set(id, { ...current, usageCount: current.usageCount + 1 });
    return true;
  }

  async upsert(record: StationWrite, options: UpsertOptions): Promise<StationRecord> {
    const id = rowId(record.buildingId, record.key);
    const existing = this.rows.get(id);
    const next: StationRecord = {
      buildingId: record.buildingId,
      key: record.key,
      checkDigit: record.checkDigit,
      description: record.description ?? "",
      usageCount: options.usage === "preserve" ? existing?.usageCount ?? 0 : 0,
      lastUpdated: (options.at ?? new Date()).toISOString(),
    };
    this.rows.set(id, next);
    return { ...next };
  }

  async delete(buildingId: BuildingId, key: string): Promise<boolean> {
    return this.rows.delete(rowId(buildingId, key));
  }

  async deleteAll(buildingId: BuildingId): Promise<number> {
    const doomed = this.inBuilding(buildingId);
    for (const row of doomed) {
      this.rows.delete(rowId(row.buildingId, row.key));
    }
    return doomed.length;
  }

  async wipe(): Promise<number> {
    const removed = this.rows.size;
    this.rows.clear();
    return removed;
  }

  async search(buildingId: BuildingId, term: string): Promise<StationRecord[]> {
    const needle = term.trim().toLowerCase();
    return this.inBuilding(buildingId)
      .filter(
        (row) =>
          row.key.toLowerCase().includes(needle) ||
          row.description.toLowerCase().includes(needle) ||
          row.checkDigit.includes(needle)
      )
      .sort(compareByUsageThenKey)
      .map((row) => ({ ...row }));
  }

  async byAisle(buildingId: BuildingId, aisle: string): Promise<StationRecord[]> {
    const prefix = `${aisle}-`;
    return this.inBuilding(buildingId)
      .filter((row) => row.key.startsWith(prefix))
      .sort((a, b) => a.key.localeCompare(b.key))
      .map((row) => ({ ...row }));
  }

  async mostUsed(buildingId: BuildingId, limit: number): Promise<StationRecord[]> {
    return this.inBuilding(buildingId)
      .filter((row) => row.usageCount > 0)
      .sort(compareByUsageThenKey)
      .slice(0, Math.max(1, limit))
      .map((row) => ({ ...row }));
  }

  async list(buildingId: BuildingId): Promise<StationRecord[]> {
    return this.inBuilding(buildingId)
      .sort(compareByUsageThenKey)
      .map((row) => ({ ...row }));
  }

  async count(buildingId: BuildingId): Promise<number> {
    return this.inBuilding(buildingId).length;
  }

  async countAll(): Promise<number> {
    return this.rows.size;
  }

  async exists(buildingId: BuildingId, key: string): Promise<boolean> {
    return this.rows.has(rowId(buildingId, key));
  }
}

export class MemoryAssignmentStore implements AssignmentStore {
  private assignments = new Map<string, PalletAssignment>();

  async add(assignment: NewPalletAssignment): Promise<PalletAssignment> {
    const created: PalletAssignment = {
      ...assignment,
      id: crypto.randomUUID(),
      createdAt: new Date().toISOString(),
      delivered: false,
      deliveredAt: null,
    };
    this.assignments.set(created.id, created);
    return { ...created };
  }

  async get(id: string): Promise<PalletAssignment | null> {
    const found = this.assignments.get(id);
    return found ? { ...found } : null;
  }

  async listActive(): Promise<PalletAssignment[]> {
    // Map iteration order is insertion order, which breaks createdAt ties.
    return [...this.assignments.values()]
      .filter((entry) => !entry.delivered)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt))
      .map((entry) => ({ ...entry }));
  }

  async markDelivered(id: string, at: Date): Promise<boolean> {
    const current = this.assignments.get(id);
    if (!current || current.delivered) return false;
    this.assignments.set(id, { ...current, delivered: true, deliveredAt: at.toISOString() });
    return true;
  }

  async delete(id: string): Promise<boolean> {
    return this.assignments.delete(id);
  }

  async history(limit: number): Promise<PalletAssignment[]> {
    return [...this.assignments.values()]
      .filter((entry) => entry.delivered)
      .sort((a, b) => (b.deliveredAt ?? "").localeCompare(a.deliveredAt ?? ""))
      .slice(0, Math.max(1, limit))
      .map((entry) => ({ ...entry }));
  }

  async countActive(): Promise<number> {
    return [...this.assignments.values()].filter((entry) => !entry.delivered).length;
  }

  async cleanupDelivered(before: Date): Promise<number> {
    const cutoff = before.toISOString();
    let removed = 0;
    for (const [id, entry] of this.assignments) {
      if (entry.delivered && entry.deliveredAt !== null && entry.deliveredAt < cutoff) {
        this.assignments.delete(id);
        removed += 1;
      }
    }
    return removed;
  }
}
