import { z } from "zod";
import { noopLogger, type LogMeta, type Logger } from "../config/logger";
import type { StationDirectory } from "../stations/directory";
import {
  attemptStoreCall,
  failed,
  invalidInput,
  type StoreCallRetry,
  type StoreOutcome,
} from "../stations/errors";
import type { BuildingId } from "../stations/model";
import { isCheckDigit, normalize, parseStationKey } from "../stations/normalizer";
import type { AssignmentStore, PalletAssignment } from "../stores/interfaces";

const DAY_MS = 24 * 60 * 60 * 1000;

export type LedgerOptions = {
  store: AssignmentStore;
  directory: StationDirectory;
  logger?: Logger;
  retentionDays?: number;
  retry?: StoreCallRetry;
  clock?: () => Date;
};

export type AssignmentInput = {
  destination: string;
  productName?: string;
  /** Looked up from the station table when omitted. */
  checkDigit?: string;
  notes?: string;
};

const AssignmentInputSchema = z.object({
  destination: z
    .string()
    .transform((value) => normalize(value))
    .refine((key) => parseStationKey(key) !== null, {
      message: "destination must look like 58-01, 5801 or 3-58-01-1",
    }),
  productName: z.string().trim().max(200).default(""),
  checkDigit: z
    .string()
    .trim()
    .refine((value) => value === "" || isCheckDigit(value), { message: "check digit must be 1 to 3 digits" })
    .default(""),
  notes: z.string().trim().max(500).default(""),
});

/** Pending pallets and their delivery history. */
export class AssignmentLedger {
  private readonly store: AssignmentStore;
  private readonly directory: StationDirectory;
  private readonly logger: Logger;
  private readonly retentionDays: number;
  private readonly retry: StoreCallRetry;
  private readonly clock: () => Date;

  constructor(options: LedgerOptions) {
    this.store = options.store;
    this.directory = options.directory;
    this.logger = (options.logger ?? noopLogger).child({ component: "assignment_ledger" });
    this.retentionDays = Math.max(1, options.retentionDays ?? 30);
    this.retry = options.retry ?? {};
    this.clock = options.clock ?? (() => new Date());
  }

  private run<T>(operation: string, meta: LogMeta, task: () => Promise<T>): Promise<StoreOutcome<T>> {
    return attemptStoreCall(operation, meta, task, this.logger, this.retry);
  }

  async addAssignment(buildingId: BuildingId, input: AssignmentInput): Promise<StoreOutcome<PalletAssignment>> {
    const parsed = AssignmentInputSchema.safeParse(input);
    if (!parsed.success) {
      const message = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
      return failed(invalidInput("addAssignment", message));
    }
    const { destination, productName, notes } = parsed.data;

    let checkDigit = parsed.data.checkDigit;
    if (checkDigit === "") {
      const resolved = await this.directory.resolve(buildingId, destination);
      if (!resolved.ok) return resolved;
      if (resolved.value === null) {
        return failed(invalidInput("addAssignment", `no check digit stored for ${destination} in building ${buildingId}`));
      }
      checkDigit = resolved.value;
    } else if (!this.directory.knownBuildings().includes(buildingId)) {
      return failed(invalidInput("addAssignment", `unknown building ${buildingId}`));
    }

    const added = await this.run("addAssignment", { buildingId, destination }, () =>
      this.store.add({ buildingId, productName, destination, checkDigit, notes })
    );
    if (!added.ok) return added;

    const usage = await this.directory.recordUsage(buildingId, destination);
    if (!usage.ok || !usage.value) {
      this.logger.warn("assignment_usage_not_recorded", { buildingId, destination, id: added.value.id });
    }
    this.logger.info("assignment_added", { buildingId, destination, id: added.value.id });
    return added;
  }

  get(id: string): Promise<StoreOutcome<PalletAssignment | null>> {
    return this.run("getAssignment", { id }, () => this.store.get(id));
  }

  listActive(): Promise<StoreOutcome<PalletAssignment[]>> {
    return this.run("listActive", {}, () => this.store.listActive());
  }

  countActive(): Promise<StoreOutcome<number>> {
    return this.run("countActive", {}, () => this.store.countActive());
  }

  async markDelivered(id: string): Promise<StoreOutcome<boolean>> {
    const marked = await this.run("markDelivered", { id }, () => this.store.markDelivered(id, this.clock()));
    if (marked.ok && marked.value) this.logger.info("assignment_delivered", { id });
    return marked;
  }

  deleteAssignment(id: string): Promise<StoreOutcome<boolean>> {
    return this.run("deleteAssignment", { id }, () => this.store.delete(id));
  }

  history(limit = 50): Promise<StoreOutcome<PalletAssignment[]>> {
    return this.run("history", { limit }, () => this.store.history(limit));
  }

  /** Drops deliveries older than the retention window. */
  async cleanupOldDeliveries(now: Date = this.clock()): Promise<StoreOutcome<number>> {
    const cutoff = new Date(now.getTime() - this.retentionDays * DAY_MS);
    const removed = await this.run("cleanupOldDeliveries", { cutoff: cutoff.toISOString() }, () =>
      this.store.cleanupDelivered(cutoff)
    );
    if (removed.ok) {
      this.logger.info("assignment_cleanup", { removed: removed.value, retentionDays: this.retentionDays });
    }
    return removed;
  }
}
