import { DEFAULT_BUILDING_ID, VALIDATION_CLASSES } from "./model";
import type { BuildingId, StationKey, Validation } from "./model";

const CANONICAL = /^(\d{2})-(\d{2})$/;
const COMPACT = /^(\d{2})(\d{2})$/;
const FULL = /^\d{1,2}-\d{2}-\d{2}-\d{1,2}$/;
const PARTIAL_FULL = /^\d{1,2}-\d{2}-\d{2}$/;
const VERBOSE = /^\d{1,2}-(\d{2})-(\d{2})(?:-\d{1,2})?$/;
const PARTIAL_SHAPES = [/^\d{2}-\d$/, /^\d{1,2}-$/, /^\d{3}$/];
const FOREIGN_CHARACTER = /[^\d-]/;
const CHECK_DIGIT = /^\d{1,3}$/;

/**
 * Classifies operator input so callers know whether a lookup may run yet.
 * Longer, fully-qualified shapes are tested before the partial ones.
 */
export function classify(raw: string): Validation {
  const input = raw.trim();

  if (input === "") return VALIDATION_CLASSES.Empty;
  if (CANONICAL.test(input)) return VALIDATION_CLASSES.CompleteCanonical;
  if (COMPACT.test(input)) return VALIDATION_CLASSES.CompleteCompact;
  if (FULL.test(input)) return VALIDATION_CLASSES.CompleteFull;
  if (PARTIAL_FULL.test(input)) return VALIDATION_CLASSES.PartialFull;
  if (input.length < 3) return VALIDATION_CLASSES.TooShort;
  if (PARTIAL_SHAPES.some((shape) => shape.test(input))) return VALIDATION_CLASSES.PartialFormat;
  if (FOREIGN_CHARACTER.test(input)) return VALIDATION_CLASSES.InvalidCharacters;
  return VALIDATION_CLASSES.InvalidFormat;
}

/**
 * Canonical `AA-PP` key for any supported notation. Unrecognised input comes
 * back cleaned but otherwise unchanged, so it simply never matches a record.
 */
export function normalize(raw: string): string {
  const cleaned = raw.replace(/[^\d-]/g, "");

  if (CANONICAL.test(cleaned)) return cleaned;

  const compact = COMPACT.exec(cleaned);
  if (compact) return `${compact[1]}-${compact[2]}`;

  // Building prefix and level suffix are context, not part of the key.
  const verbose = VERBOSE.exec(cleaned);
  if (verbose) return `${verbose[1]}-${verbose[2]}`;

  return cleaned;
}

export function suggest(raw: string, buildingId: BuildingId = DEFAULT_BUILDING_ID): string[] {
  const input = raw.trim();
  const suggestions: string[] = [];

  if (input === "") {
    suggestions.push(`${buildingId}-40-15-1`, "4015", "40-15");
  } else if (/^\d$/.test(input)) {
    suggestions.push(`${input}-40-15-1`);
  } else if (/^\d{2}$/.test(input)) {
    suggestions.push(`${buildingId}-${input}-15-1`, `${input}15`, `${input}-15`);
  } else if (/^\d{3}$/.test(input)) {
    suggestions.push(`${input}1`);
  } else if (/^\d{2}-$/.test(input)) {
    suggestions.push(`${input}01`);
  } else if (/^\d{2}-\d$/.test(input)) {
    const [aisle, digit] = input.split("-");
    suggestions.push(`${aisle}-0${digit}`, `${aisle}-${digit}0`);
  } else if (/^\d-\d{1,2}$/.test(input)) {
    const [prefix, aisle = ""] = input.split("-");
    suggestions.push(`${prefix}-${aisle.padStart(2, "0")}-15-1`);
  } else if (PARTIAL_FULL.test(input)) {
    suggestions.push(`${input}-1`);
  }

  return suggestions.slice(0, 3);
}

export function parseStationKey(text: string): StationKey | null {
  const match = CANONICAL.exec(text);
  if (!match) return null;
  return { aisle: match[1], position: match[2] };
}

export function formatStationKey(key: StationKey): string {
  return `${key.aisle}-${key.position}`;
}

/** `"58-01"` becomes `"58-1"`, the way the terminal prints it. */
export function formatForDisplay(text: string): string {
  const key = parseStationKey(text);
  if (!key) return text;
  return `${Number(key.aisle)}-${Number(key.position)}`;
}

export function formatVerbose(buildingId: BuildingId, text: string): string {
  const key = parseStationKey(text);
  if (!key) return text;
  return `${buildingId}-${key.aisle}-${key.position}-1`;
}

export function isCheckDigit(text: string): boolean {
  return CHECK_DIGIT.test(text.trim());
}

/** Two-digit aisle for `"5"` or `"05"`, null for anything else. */
export function padAisle(aisle: string): string | null {
  const trimmed = aisle.trim();
  if (!/^\d{1,2}$/.test(trimmed)) return null;
  return trimmed.padStart(2, "0");
}

export function aisleOf(text: string): string | null {
  return parseStationKey(text)?.aisle ?? null;
}
