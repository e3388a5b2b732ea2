import type { IsoDateString } from "../types/core";
import type { BuildingId, StationRecord, StationWrite, UsagePolicy } from "../stations/model";

export type UpsertOptions = {
  usage: UsagePolicy;
  at?: Date;
};

/**
 * Per-building station table. Keys are canonical `AA-PP` text; interpreting
 * operator input is the normalizer's job, not the store's.
 */
export interface StationStore {
  resolve(buildingId: BuildingId, key: string): Promise<string | null>;
  get(buildingId: BuildingId, key: string): Promise<StationRecord | null>;
  /** Adds one to the usage count. Returns false, and creates nothing, when the row is absent. */
  recordUsage(buildingId: BuildingId, key: string): Promise<boolean>;
  upsert(record: StationWrite, options: UpsertOptions): Promise<StationRecord>;
  delete(buildingId: BuildingId, key: string): Promise<boolean>;
  deleteAll(buildingId: BuildingId): Promise<number>;
  wipe(): Promise<number>;
  search(buildingId: BuildingId, term: string): Promise<StationRecord[]>;
  byAisle(buildingId: BuildingId, aisle: string): Promise<StationRecord[]>;
  mostUsed(buildingId: BuildingId, limit: number): Promise<StationRecord[]>;
  /** Read model: usage count descending, then key ascending. */
  list(buildingId: BuildingId): Promise<StationRecord[]>;
  count(buildingId: BuildingId): Promise<number>;
  countAll(): Promise<number>;
  exists(buildingId: BuildingId, key: string): Promise<boolean>;
}

export type PalletAssignment = {
  id: string;
  buildingId: BuildingId;
  productName: string;
  destination: string;
  checkDigit: string;
  notes: string;
  createdAt: IsoDateString;
  delivered: boolean;
  deliveredAt: IsoDateString | null;
};

export type NewPalletAssignment = Omit<PalletAssignment, "id" | "createdAt" | "delivered" | "deliveredAt">;

export interface AssignmentStore {
  add(assignment: NewPalletAssignment): Promise<PalletAssignment>;
  get(id: string): Promise<PalletAssignment | null>;
  /** Undelivered assignments, oldest first. */
  listActive(): Promise<PalletAssignment[]>;
  markDelivered(id: string, at: Date): Promise<boolean>;
  delete(id: string): Promise<boolean>;
  /** Delivered assignments, most recent delivery first. */
  history(limit: number): Promise<PalletAssignment[]>;
  countActive(): Promise<number>;
  cleanupDelivered(before: Date): Promise<number>;
}

export function compareByUsageThenKey(a: StationRecord, b: StationRecord): number {
  if (b.usageCount !== a.usageCount) return b.usageCount - a.usageCount;
  return a.key.localeCompare(b.key);
}
