import type { DeskEnv } from "../config/env";
import { closePgPool } from "../db/postgres";
import { PostgresAssignmentStore } from "../assignments/postgresAssignmentStore";
import type { AssignmentStore, StationStore } from "./interfaces";
import { MemoryAssignmentStore, MemoryStationStore } from "./memoryStores";
import { PostgresStationStore } from "./postgresStationStore";

export type StoreBundle = {
  kind: DeskEnv["STATION_DESK_STORE"];
  stations: StationStore;
  assignments: AssignmentStore;
  close: () => Promise<void>;
};

export function createStores(env: DeskEnv): StoreBundle {
  if (env.STATION_DESK_STORE === "memory") {
    return {
      kind: "memory",
      stations: new MemoryStationStore(),
      assignments: new MemoryAssignmentStore(),
      close: async () => {},
    };
  }
  return {
    kind: "postgres",
    stations: new PostgresStationStore(),
    assignments: new PostgresAssignmentStore(),
    close: closePgPool,
  };
}
