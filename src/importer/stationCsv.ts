import { StationStoreError, failed, succeeded, type StoreOutcome } from "../stations/errors";
import type { ImportProgress, ImportRow, StationDirectory } from "../stations/directory";
import { DEFAULT_BUILDING_ID, type BuildingId } from "../stations/model";

export type CsvBatch = {
  buildingId: BuildingId;
  rows: ImportRow[];
  /** 1-based source line of each entry in `rows`. */
  lines: number[];
};

export type ParsedStationCsv = {
  hasBuildingColumn: boolean;
  dataRows: number;
  batches: CsvBatch[];
};

export type CsvImportFailure = {
  line: number;
  input: string;
  reason: string;
};

export type CsvImportReport = {
  buildings: BuildingId[];
  total: number;
  inserted: number;
  skipped: number;
  failed: number;
  skippedLines: number[];
  failures: CsvImportFailure[];
};

export type CsvImportOptions = {
  defaultBuildingId?: BuildingId;
  replaceExisting?: boolean;
  onProgress?: (progress: ImportProgress) => void;
};

/** `building`, `bldg_id`, `Building #`, `building_number` and similar. */
const BUILDING_HEADER = /^(building|bldg)([ _]?(id|number|no\.?|#))?$/i;

/**
 * Comma- or tab-separated rows with double-quote escaping. Cells come back
 * with runs of whitespace collapsed and the ends trimmed.
 */
function splitStationRows(text: string): string[][] {
  const source = text.replace(/^\uFEFF/, "");
  const rows: string[][] = [];
  let cells: string[] = [];
  let cell = "";
  let quoted = false;

  const endCell = () => {
    cells.push(cell.replace(/\s+/g, " ").trim());
    cell = "";
  };
  const endRow = () => {
    endCell();
    rows.push(cells);
    cells = [];
  };

  for (let i = 0; i < source.length; i += 1) {
    const char = source.charAt(i);
    if (quoted) {
      if (char !== '"') {
        cell += char;
      } else if (source.charAt(i + 1) === '"') {
        cell += '"';
        i += 1;
      } else {
        quoted = false;
      }
    } else if (char === '"') {
      quoted = true;
    } else if (char === "," || char === "\t") {
      endCell();
    } else if (char === "\n" || char === "\r") {
      if (char === "\r" && source.charAt(i + 1) === "\n") i += 1;
      endRow();
    } else {
      cell += char;
    }
  }
  endRow();
  return rows;
}

function parseBuilding(value: string, fallback: BuildingId): BuildingId {
  if (!/^\d{1,2}$/.test(value)) return fallback;
  const parsed = Number(value);
  return parsed >= 1 ? parsed : fallback;
}

/**
 * Splits a station export into per-building batches. The first line is a
 * header; when its first cell names a building column, every row leads with
 * the building id, otherwise rows are `station, check digit[, description]`.
 */
export function parseStationCsv(
  text: string,
  options: { defaultBuildingId?: BuildingId } = {}
): ParsedStationCsv {
  const fallback = options.defaultBuildingId ?? DEFAULT_BUILDING_ID;
  const rows = splitStationRows(text);
  const hasBuildingColumn = BUILDING_HEADER.test(rows[0]?.[0] ?? "");

  const byBuilding = new Map<BuildingId, CsvBatch>();
  let dataRows = 0;

  for (let index = 1; index < rows.length; index += 1) {
    const row = rows[index];
    if (!row || row.every((cell) => cell === "")) continue;
    dataRows += 1;

    const buildingId = hasBuildingColumn ? parseBuilding(row[0] ?? "", fallback) : fallback;
    const fields = hasBuildingColumn ? row.slice(1) : row;

    let batch = byBuilding.get(buildingId);
    if (!batch) {
      batch = { buildingId, rows: [], lines: [] };
      byBuilding.set(buildingId, batch);
    }
    batch.rows.push(fields);
    batch.lines.push(index + 1);
  }

  return {
    hasBuildingColumn,
    dataRows,
    batches: [...byBuilding.values()].sort((a, b) => a.buildingId - b.buildingId),
  };
}

export async function importStationCsv(
  directory: StationDirectory,
  text: string,
  options: CsvImportOptions = {}
): Promise<StoreOutcome<CsvImportReport>> {
  const parsed = parseStationCsv(text, { defaultBuildingId: options.defaultBuildingId });
  if (parsed.dataRows === 0) {
    return failed(
      new StationStoreError({
        kind: "empty_batch",
        operation: "importStationCsv",
        retryable: false,
        userMessage: "No station rows found to import.",
        debugMessage: "station file has no data rows",
      })
    );
  }

  const report: CsvImportReport = {
    buildings: parsed.batches.map((batch) => batch.buildingId),
    total: parsed.dataRows,
    inserted: 0,
    skipped: 0,
    failed: 0,
    skippedLines: [],
    failures: [],
  };
  let processedBefore = 0;

  for (const batch of parsed.batches) {
    const lineOf = (row: number) => batch.lines[row - 1] ?? 0;
    const offset = processedBefore;
    const outcome = await directory.bulkImport(batch.buildingId, batch.rows, {
      replaceExisting: options.replaceExisting,
      onProgress: (progress) =>
        options.onProgress?.({
          processed: offset + progress.processed,
          total: report.total,
          inserted: report.inserted + progress.inserted,
          skipped: report.skipped + progress.skipped,
          failed: report.failed + progress.failed,
        }),
    });
    processedBefore += batch.rows.length;

    if (!outcome.ok) {
      // The whole building was refused, so every one of its rows failed.
      report.failed += batch.rows.length;
      batch.rows.forEach((fields, index) => {
        report.failures.push({
          line: batch.lines[index] ?? 0,
          input: fields[0] ?? "",
          reason: outcome.error.userMessage,
        });
      });
      options.onProgress?.({
        processed: processedBefore,
        total: report.total,
        inserted: report.inserted,
        skipped: report.skipped,
        failed: report.failed,
      });
      continue;
    }

    report.inserted += outcome.value.inserted;
    report.skipped += outcome.value.skipped;
    report.failed += outcome.value.failed;
    report.skippedLines.push(...outcome.value.skippedRows.map(lineOf));
    report.failures.push(
      ...outcome.value.failures.map((failure) => ({
        line: lineOf(failure.row),
        input: failure.input,
        reason: failure.reason,
      }))
    );
  }

  report.skippedLines.sort((a, b) => a - b);
  report.failures.sort((a, b) => a.line - b.line);
  return succeeded(report);
}
