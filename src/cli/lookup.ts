#!/usr/bin/env node
import { readEnv } from "../config/env";
import { createLogger } from "../config/logger";
import { createDesk } from "../desk";
import type { LookupResult } from "../stations/directory";
import { formatForDisplay, formatVerbose, suggest } from "../stations/normalizer";
import type { StationRecord } from "../stations/model";
import { arg, boolArg, buildingArg } from "./args";

function describeResult(buildingId: number, result: LookupResult): string {
  switch (result.status) {
    case "incomplete": {
      const hints = suggest(result.input, buildingId);
      return hints.length > 0
        ? `${result.validation.message} (try: ${hints.join(", ")})`
        : result.validation.message;
    }
    case "not_found":
      return `${result.key} not found in building ${buildingId}`;
    case "found":
      return `${formatVerbose(buildingId, result.key)}  check digit ${result.checkDigit}`;
  }
}

function describeStations(title: string, rows: StationRecord[]): string[] {
  if (rows.length === 0) return [`${title}: none`];
  return [
    `${title}:`,
    ...rows.map((row) => `  ${formatForDisplay(row.key).padEnd(6)} ${row.checkDigit.padStart(3)}  x${row.usageCount}`),
  ];
}

async function main(): Promise<void> {
  const env = readEnv();
  const logger = createLogger(env.STATION_DESK_LOG_LEVEL, { sink: (line) => process.stderr.write(line) });
  const buildingId = buildingArg(env.STATION_DESK_DEFAULT_BUILDING);
  const station = arg("station");
  const output = arg("output", "text") ?? "text";
  if (output !== "text" && output !== "json") {
    throw new Error("Invalid --output. Use text or json.");
  }

  const desk = createDesk(env, logger);
  try {
    if (station === undefined) {
      const quick = await desk.directory.quickAccess(buildingId);
      if (!quick.ok) throw quick.error;
      if (output === "json") {
        process.stdout.write(JSON.stringify({ ok: true, buildingId, ...quick.value }, null, 2) + "\n");
      } else {
        const lines = [
          ...describeStations("Recent", quick.value.recent),
          ...describeStations("Frequent", quick.value.frequent),
        ];
        process.stdout.write(lines.join("\n") + "\n");
      }
      return;
    }

    const outcome = await desk.directory.lookup(buildingId, station, {
      recordUsage: boolArg("record-usage", true),
    });
    if (!outcome.ok) throw outcome.error;

    if (output === "json") {
      process.stdout.write(JSON.stringify({ ok: true, buildingId, ...outcome.value }, null, 2) + "\n");
    } else {
      process.stdout.write(describeResult(buildingId, outcome.value) + "\n");
    }
    if (outcome.value.status !== "found") {
      process.exitCode = outcome.value.status === "incomplete" ? 2 : 1;
    }
  } finally {
    await desk.stores.close();
  }
}

void main().catch((error) => {
  process.stderr.write(`lookup fatal: ${error instanceof Error ? error.stack : String(error)}\n`);
  process.exit(1);
});
