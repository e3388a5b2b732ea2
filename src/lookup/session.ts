import { noopLogger, type Logger } from "../config/logger";
import type { StationDirectory } from "../stations/directory";
import type { BuildingId } from "../stations/model";
import { initialLookupState, reduceLookup, type LookupEvent, type LookupState } from "./state";

export type LookupListener = (state: LookupState) => void;

export type LookupSessionOptions = {
  directory: StationDirectory;
  buildingId?: BuildingId;
  recordUsage?: boolean;
  logger?: Logger;
};

/**
 * As-you-type lookup driver. Each lookup is tagged with a request id and its
 * own AbortController; only the newest one may change the visible result, and
 * usage is counted only for a result that was displayed.
 */
export class LookupSession {
  private readonly directory: StationDirectory;
  private readonly recordUsage: boolean;
  private readonly logger: Logger;
  private readonly listeners = new Set<LookupListener>();
  private state: LookupState;
  private nextRequestId = 0;
  private inFlight: AbortController | null = null;

  constructor(options: LookupSessionOptions) {
    this.directory = options.directory;
    this.recordUsage = options.recordUsage ?? true;
    this.logger = (options.logger ?? noopLogger).child({ component: "lookup_session" });
    this.state = initialLookupState(options.buildingId);
  }

  getState(): LookupState {
    return this.state;
  }

  subscribe(listener: LookupListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  setInput(input: string): Promise<void> {
    return this.transition({ type: "input_changed", input });
  }

  selectStation(key: string): Promise<void> {
    return this.transition({ type: "station_selected", key });
  }

  selectBuilding(buildingId: BuildingId): Promise<void> {
    return this.transition({ type: "building_selected", buildingId });
  }

  clear(): void {
    this.cancel();
    this.dispatch({ type: "cleared" });
  }

  /** Aborts the outstanding lookup, if any. */
  cancel(): void {
    if (!this.inFlight) return;
    this.inFlight.abort();
    this.inFlight = null;
  }

  private dispatch(event: LookupEvent): boolean {
    const next = reduceLookup(this.state, event);
    if (next === this.state) return false;
    this.state = next;
    for (const listener of this.listeners) {
      listener(next);
    }
    return true;
  }

  private async transition(event: LookupEvent): Promise<void> {
    if (!this.dispatch(event)) return;
    this.cancel();
    await this.lookupCurrent();
  }

  private async lookupCurrent(): Promise<void> {
    const { buildingId, input, normalizedKey } = this.state;
    if (normalizedKey === null) return;

    const requestId = ++this.nextRequestId;
    const controller = new AbortController();
    this.inFlight = controller;
    this.dispatch({ type: "lookup_started", requestId });

    const outcome = await this.directory.lookup(buildingId, input, {
      recordUsage: false,
      signal: controller.signal,
    });

    if (controller.signal.aborted || this.state.pendingRequestId !== requestId) {
      this.logger.debug("lookup_result_discarded", { requestId, buildingId, key: normalizedKey });
      return;
    }
    this.inFlight = null;

    if (!outcome.ok) {
      this.dispatch({ type: "lookup_failed", requestId, message: outcome.error.userMessage });
      return;
    }
    this.dispatch({ type: "lookup_settled", requestId, result: outcome.value });
    if (this.recordUsage && outcome.value.status === "found") {
      await this.countUsage(buildingId, outcome.value.key);
    }
  }

  /** Counts a station only after its check digit has been shown. */
  private async countUsage(buildingId: BuildingId, key: string): Promise<void> {
    const usage = await this.directory.recordUsage(buildingId, key);
    if (usage.ok && usage.value) {
      this.dispatch({ type: "usage_recorded", buildingId, key });
    } else {
      this.logger.warn("lookup_usage_not_recorded", { buildingId, key });
    }
  }
}
