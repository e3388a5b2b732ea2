import type { DeskEnv } from "./config/env";
import { noopLogger, type Logger } from "./config/logger";
import { AssignmentLedger } from "./assignments/ledger";
import { StationDirectory } from "./stations/directory";
import { createStores, type StoreBundle } from "./stores/factory";

export type Desk = {
  env: DeskEnv;
  stores: StoreBundle;
  directory: StationDirectory;
  ledger: AssignmentLedger;
};

/** Wires the station directory and assignment ledger from validated env. */
export function createDesk(env: DeskEnv, logger: Logger = noopLogger, stores: StoreBundle = createStores(env)): Desk {
  const retry = {
    attempts: env.STATION_DESK_STORE_RETRY_ATTEMPTS,
    baseDelayMs: env.STATION_DESK_STORE_RETRY_BASE_DELAY_MS,
  };
  const directory = new StationDirectory({
    store: stores.stations,
    logger,
    buildings: env.STATION_DESK_BUILDINGS,
    preserveUsageOnEdit: env.STATION_DESK_PRESERVE_USAGE_ON_EDIT,
    mostUsedLimit: env.STATION_DESK_QUICK_ACCESS_LIMIT,
    retry,
  });
  const ledger = new AssignmentLedger({
    store: stores.assignments,
    directory,
    logger,
    retentionDays: env.STATION_DESK_DELIVERY_RETENTION_DAYS,
    retry,
  });
  return { env, stores, directory, ledger };
}
