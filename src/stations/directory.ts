import { z } from "zod";
import { noopLogger, type LogMeta, type Logger } from "../config/logger";
import type { StationStore } from "../stores/interfaces";
import {
  StationStoreError,
  attemptStoreCall,
  failed,
  invalidInput,
  succeeded,
  type StoreCallRetry,
  type StoreOutcome,
} from "./errors";
import { DEFAULT_BUILDING_ID, type BuildingId, type StationRecord, type Validation } from "./model";
import { classify, isCheckDigit, normalize, padAisle, parseStationKey } from "./normalizer";
import { rankQuickAccess, type QuickAccess } from "./quickAccess";

export type DirectoryOptions = {
  store: StationStore;
  logger?: Logger;
  buildings?: readonly BuildingId[];
  preserveUsageOnEdit?: boolean;
  mostUsedLimit?: number;
  retry?: StoreCallRetry;
  clock?: () => Date;
};

export type LookupResult =
  | { status: "incomplete"; input: string; validation: Validation }
  | { status: "not_found"; input: string; validation: Validation; key: string }
  | {
      status: "found";
      input: string;
      validation: Validation;
      key: string;
      checkDigit: string;
      usageRecorded: boolean;
    };

export type LookupOptions = {
  recordUsage?: boolean;
  /** An aborted lookup still resolves, but no longer counts as usage. */
  signal?: AbortSignal;
};

export type StationInput = {
  station: string;
  checkDigit: string;
  description?: string;
};

/** One import row: station text, check digit, optional description. */
export type ImportRow = readonly string[];

export type ImportFailure = {
  row: number;
  input: string;
  reason: string;
};

export type ImportProgress = {
  processed: number;
  total: number;
  inserted: number;
  skipped: number;
  failed: number;
};

export type ImportReport = {
  buildingId: BuildingId;
  total: number;
  inserted: number;
  skipped: number;
  failed: number;
  skippedRows: number[];
  failures: ImportFailure[];
};

export type BulkImportOptions = {
  onProgress?: (progress: ImportProgress) => void;
  /** Clears the building first; the only import path that resets usage counts. */
  replaceExisting?: boolean;
};

const StationInputSchema = z.object({
  station: z
    .string()
    .transform((value) => normalize(value))
    .refine((key) => parseStationKey(key) !== null, {
      message: "station must look like 58-01, 5801 or 3-58-01-1",
    }),
  checkDigit: z
    .string()
    .trim()
    .refine((value) => isCheckDigit(value), { message: "check digit must be 1 to 3 digits" }),
  description: z.string().trim().max(200).default(""),
});

export class StationDirectory {
  private readonly store: StationStore;
  private readonly logger: Logger;
  private readonly buildings: ReadonlySet<BuildingId>;
  private readonly preserveUsageOnEdit: boolean;
  private readonly mostUsedLimit: number;
  private readonly retry: StoreCallRetry;
  private readonly clock: () => Date;

  constructor(options: DirectoryOptions) {
    this.store = options.store;
    this.logger = (options.logger ?? noopLogger).child({ component: "station_directory" });
    this.buildings = new Set(options.buildings ?? [2, DEFAULT_BUILDING_ID, 4]);
    this.preserveUsageOnEdit = options.preserveUsageOnEdit ?? true;
    this.mostUsedLimit = options.mostUsedLimit ?? 20;
    this.retry = options.retry ?? {};
    this.clock = options.clock ?? (() => new Date());
  }

  knownBuildings(): BuildingId[] {
    return [...this.buildings].sort((a, b) => a - b);
  }

  private checkBuilding(operation: string, buildingId: BuildingId): StationStoreError | null {
    if (this.buildings.has(buildingId)) return null;
    return invalidInput(operation, `unknown building ${buildingId}; expected one of ${this.knownBuildings().join(", ")}`);
  }

  private run<T>(operation: string, meta: LogMeta, task: () => Promise<T>): Promise<StoreOutcome<T>> {
    return attemptStoreCall(operation, meta, task, this.logger, this.retry);
  }

  private scoped<T>(
    operation: string,
    buildingId: BuildingId,
    meta: LogMeta,
    task: () => Promise<T>
  ): Promise<StoreOutcome<T>> {
    const rejected = this.checkBuilding(operation, buildingId);
    if (rejected) return Promise.resolve(failed(rejected));
    return this.run(operation, { buildingId, ...meta }, task);
  }

  async lookup(buildingId: BuildingId, raw: string, options: LookupOptions = {}): Promise<StoreOutcome<LookupResult>> {
    const rejected = this.checkBuilding("lookup", buildingId);
    if (rejected) return failed(rejected);

    const input = raw.trim();
    const validation = classify(input);
    if (!validation.resolvable) {
      return succeeded<LookupResult>({ status: "incomplete", input, validation });
    }

    const key = normalize(input);
    const resolved = await this.scoped("resolve", buildingId, { key }, () => this.store.resolve(buildingId, key));
    if (!resolved.ok) return resolved;

    const checkDigit = resolved.value;
    if (checkDigit === null) {
      this.logger.info("station_lookup_miss", { buildingId, input, key });
      return succeeded<LookupResult>({ status: "not_found", input, validation, key });
    }

    let usageRecorded = false;
    if ((options.recordUsage ?? true) && !options.signal?.aborted) {
      const usage = await this.run("recordUsage", { buildingId, key }, () => this.store.recordUsage(buildingId, key));
      usageRecorded = usage.ok && usage.value;
    }
    this.logger.debug("station_lookup_hit", { buildingId, key, usageRecorded });
    return succeeded<LookupResult>({ status: "found", input, validation, key, checkDigit, usageRecorded });
  }

  resolve(buildingId: BuildingId, raw: string): Promise<StoreOutcome<string | null>> {
    const key = normalize(raw);
    return this.scoped("resolve", buildingId, { key }, () => this.store.resolve(buildingId, key));
  }

  get(buildingId: BuildingId, raw: string): Promise<StoreOutcome<StationRecord | null>> {
    const key = normalize(raw);
    return this.scoped("get", buildingId, { key }, () => this.store.get(buildingId, key));
  }

  recordUsage(buildingId: BuildingId, raw: string): Promise<StoreOutcome<boolean>> {
    const key = normalize(raw);
    return this.scoped("recordUsage", buildingId, { key }, () => this.store.recordUsage(buildingId, key));
  }

  saveStation(buildingId: BuildingId, input: StationInput): Promise<StoreOutcome<StationRecord>> {
    const parsed = StationInputSchema.safeParse(input);
    if (!parsed.success) {
      const message = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
      return Promise.resolve(failed(invalidInput("saveStation", message)));
    }
    const { station, checkDigit, description } = parsed.data;
    return this.scoped("saveStation", buildingId, { key: station }, () =>
      this.store.upsert(
        { buildingId, key: station, checkDigit, description },
        { usage: this.preserveUsageOnEdit ? "preserve" : "reset", at: this.clock() }
      )
    );
  }

  deleteStation(buildingId: BuildingId, raw: string): Promise<StoreOutcome<boolean>> {
    const key = normalize(raw);
    return this.scoped("deleteStation", buildingId, { key }, () => this.store.delete(buildingId, key));
  }

  deleteAll(buildingId: BuildingId): Promise<StoreOutcome<number>> {
    return this.scoped("deleteAll", buildingId, {}, () => this.store.deleteAll(buildingId));
  }

  wipe(): Promise<StoreOutcome<number>> {
    return this.run("wipe", {}, () => this.store.wipe());
  }

  search(buildingId: BuildingId, term: string): Promise<StoreOutcome<StationRecord[]>> {
    return this.scoped("search", buildingId, { term }, () => this.store.search(buildingId, term));
  }

  byAisle(buildingId: BuildingId, aisle: string): Promise<StoreOutcome<StationRecord[]>> {
    const padded = padAisle(aisle);
    if (padded === null) {
      return Promise.resolve(failed(invalidInput("byAisle", `aisle must be one or two digits, got "${aisle}"`)));
    }
    return this.scoped("byAisle", buildingId, { aisle: padded }, () => this.store.byAisle(buildingId, padded));
  }

  mostUsed(buildingId: BuildingId, limit: number = this.mostUsedLimit): Promise<StoreOutcome<StationRecord[]>> {
    return this.scoped("mostUsed", buildingId, { limit }, () => this.store.mostUsed(buildingId, limit));
  }

  list(buildingId: BuildingId): Promise<StoreOutcome<StationRecord[]>> {
    return this.scoped("list", buildingId, {}, () => this.store.list(buildingId));
  }

  count(buildingId: BuildingId): Promise<StoreOutcome<number>> {
    return this.scoped("count", buildingId, {}, () => this.store.count(buildingId));
  }

  exists(buildingId: BuildingId, raw: string): Promise<StoreOutcome<boolean>> {
    const key = normalize(raw);
    return this.scoped("exists", buildingId, { key }, () => this.store.exists(buildingId, key));
  }

  async quickAccess(buildingId: BuildingId): Promise<StoreOutcome<QuickAccess>> {
    const listed = await this.list(buildingId);
    if (!listed.ok) return listed;
    return succeeded(rankQuickAccess(listed.value));
  }

  async bulkImport(
    buildingId: BuildingId,
    rows: readonly ImportRow[],
    options: BulkImportOptions = {}
  ): Promise<StoreOutcome<ImportReport>> {
    const rejected = this.checkBuilding("bulkImport", buildingId);
    if (rejected) return failed(rejected);

    if (rows.length === 0) {
      return failed(
        new StationStoreError({
          kind: "empty_batch",
          operation: "bulkImport",
          retryable: false,
          userMessage: "No station rows found to import.",
          debugMessage: `empty import batch for building ${buildingId}`,
        })
      );
    }

    if (options.replaceExisting) {
      const cleared = await this.deleteAll(buildingId);
      if (!cleared.ok) return cleared;
      this.logger.info("station_import_cleared", { buildingId, removed: cleared.value });
    }

    const report: ImportReport = {
      buildingId,
      total: rows.length,
      inserted: 0,
      skipped: 0,
      failed: 0,
      skippedRows: [],
      failures: [],
    };
    const at = this.clock();

    for (const [index, fields] of rows.entries()) {
      const row = index + 1;
      const rawKey = fields[0]?.trim() ?? "";
      const rawCheckDigit = fields[1]?.trim() ?? "";

      if (!rawKey || !rawCheckDigit) {
        report.skipped += 1;
        report.skippedRows.push(row);
        this.logger.warn("station_import_row_skipped", { buildingId, row, fields: fields.length });
      } else {
        const reason = await this.importRow(buildingId, rawKey, rawCheckDigit, fields[2]?.trim() ?? "", at);
        if (reason === null) {
          report.inserted += 1;
        } else {
          report.failed += 1;
          report.failures.push({ row, input: rawKey, reason });
          this.logger.warn("station_import_row_failed", { buildingId, row, input: rawKey, reason });
        }
      }

      options.onProgress?.({
        processed: row,
        total: report.total,
        inserted: report.inserted,
        skipped: report.skipped,
        failed: report.failed,
      });
    }

    this.logger.info("station_import_complete", {
      buildingId,
      total: report.total,
      inserted: report.inserted,
      skipped: report.skipped,
      failed: report.failed,
    });
    return succeeded(report);
  }

  /** Null on success, otherwise the reason the row was rejected. */
  private async importRow(
    buildingId: BuildingId,
    rawKey: string,
    rawCheckDigit: string,
    description: string,
    at: Date
  ): Promise<string | null> {
    const key = normalize(rawKey);
    if (parseStationKey(key) === null) return `unrecognised station "${rawKey}"`;
    if (!isCheckDigit(rawCheckDigit)) return `invalid check digit "${rawCheckDigit}"`;

    const written = await this.run("importRow", { buildingId, key }, () =>
      this.store.upsert({ buildingId, key, checkDigit: rawCheckDigit, description }, { usage: "preserve", at })
    );
    return written.ok ? null : written.error.debugMessage;
  }
}
