export { readEnv, redactEnvForLogs } from "./config/env";
export type { DeskEnv } from "./config/env";
export { createLogger, noopLogger } from "./config/logger";
export type { LogLevel, LogMeta, LogSink, Logger } from "./config/logger";
export { withRetry } from "./connectivity/retry";
export type { RetryOptions } from "./connectivity/retry";

export { DEFAULT_BUILDING_ID, VALIDATION_CLASSES } from "./stations/model";
export type {
  BuildingId,
  StationKey,
  StationRecord,
  StationWrite,
  UsagePolicy,
  Validation,
  ValidationKind,
} from "./stations/model";
export {
  aisleOf,
  classify,
  formatForDisplay,
  formatStationKey,
  formatVerbose,
  isCheckDigit,
  normalize,
  padAisle,
  parseStationKey,
  suggest,
} from "./stations/normalizer";
export { StationStoreError, toStationStoreError } from "./stations/errors";
export type { StoreErrorKind, StoreOutcome } from "./stations/errors";
export { StationDirectory } from "./stations/directory";
export type {
  BulkImportOptions,
  DirectoryOptions,
  ImportFailure,
  ImportProgress,
  ImportReport,
  ImportRow,
  LookupOptions,
  LookupResult,
  StationInput,
} from "./stations/directory";
export { DEFAULT_QUICK_ACCESS, rankQuickAccess } from "./stations/quickAccess";
export type { QuickAccess, QuickAccessThresholds } from "./stations/quickAccess";

export type { AssignmentStore, NewPalletAssignment, PalletAssignment, StationStore } from "./stores/interfaces";
export { MemoryAssignmentStore, MemoryStationStore } from "./stores/memoryStores";
export { PostgresStationStore } from "./stores/postgresStationStore";
export { PostgresAssignmentStore } from "./assignments/postgresAssignmentStore";
export { createStores } from "./stores/factory";
export type { StoreBundle } from "./stores/factory";
export { AssignmentLedger } from "./assignments/ledger";
export type { AssignmentInput, LedgerOptions } from "./assignments/ledger";

export { importStationCsv, parseStationCsv } from "./importer/stationCsv";
export type { CsvImportOptions, CsvImportReport, ParsedStationCsv } from "./importer/stationCsv";
export { initialLookupState, reduceLookup } from "./lookup/state";
export type { LookupEvent, LookupState } from "./lookup/state";
export { LookupSession } from "./lookup/session";
export type { LookupListener, LookupSessionOptions } from "./lookup/session";

export { runMigrations } from "./db/migrate";
export { checkPgConnection, closePgPool } from "./db/postgres";
export { createDesk } from "./desk";
export type { Desk } from "./desk";
