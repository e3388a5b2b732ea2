import type { StationRecord } from "./model";
import { compareByUsageThenKey } from "../stores/interfaces";

export type QuickAccessThresholds = {
  recentLimit: number;
  frequentLimit: number;
  frequentMinUsage: number;
};

export type QuickAccess = {
  recent: StationRecord[];
  frequent: StationRecord[];
};

export const DEFAULT_QUICK_ACCESS: QuickAccessThresholds = {
  recentLimit: 10,
  frequentLimit: 12,
  frequentMinUsage: 3,
};

export function rankQuickAccess(
  records: readonly StationRecord[],
  thresholds: QuickAccessThresholds = DEFAULT_QUICK_ACCESS
): QuickAccess {
  const used = records.filter((record) => record.usageCount > 0).sort(compareByUsageThenKey);
  return {
    recent: used.slice(0, thresholds.recentLimit),
    frequent: used
      .filter((record) => record.usageCount >= thresholds.frequentMinUsage)
      .slice(0, thresholds.frequentLimit),
  };
}
