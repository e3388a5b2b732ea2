import type { IsoDateString } from "../types/core";

export type BuildingId = number;

export const DEFAULT_BUILDING_ID: BuildingId = 3;

/** Aisle and position, each exactly two ASCII digits. Canonical text is `"{aisle}-{position}"`. */
export type StationKey = {
  readonly aisle: string;
  readonly position: string;
};

export type StationRecord = {
  buildingId: BuildingId;
  key: string;
  checkDigit: string;
  description: string;
  usageCount: number;
  lastUpdated: IsoDateString;
};

export type StationWrite = {
  buildingId: BuildingId;
  key: string;
  checkDigit: string;
  description?: string;
};

/**
 * `preserve` keeps the stored usage count when a record is replaced,
 * `reset` starts it again from zero.
 */
export type UsagePolicy = "preserve" | "reset";

export type ValidationKind =
  | "Empty"
  | "TooShort"
  | "PartialFormat"
  | "CompleteCanonical"
  | "CompleteCompact"
  | "CompleteFull"
  | "PartialFull"
  | "InvalidCharacters"
  | "InvalidFormat";

export type Validation = {
  kind: ValidationKind;
  resolvable: boolean;
  message: string;
};

export const VALIDATION_CLASSES: Record<ValidationKind, Validation> = {
  Empty: { kind: "Empty", resolvable: false, message: "Enter station number" },
  TooShort: { kind: "TooShort", resolvable: false, message: "Keep typing..." },
  PartialFormat: { kind: "PartialFormat", resolvable: false, message: "Keep typing..." },
  CompleteCanonical: { kind: "CompleteCanonical", resolvable: true, message: "Valid station format" },
  CompleteCompact: { kind: "CompleteCompact", resolvable: true, message: "Compact format detected" },
  CompleteFull: { kind: "CompleteFull", resolvable: true, message: "Full format detected" },
  PartialFull: { kind: "PartialFull", resolvable: false, message: "Add the trailing level digit" },
  InvalidCharacters: { kind: "InvalidCharacters", resolvable: false, message: "Use only numbers and dashes" },
  InvalidFormat: { kind: "InvalidFormat", resolvable: false, message: "Try format: 58-01 or 5801" },
};
