#!/usr/bin/env node
import fs from "node:fs/promises";
import { readEnv } from "../config/env";
import { createLogger } from "../config/logger";
import { createDesk } from "../desk";
import { importStationCsv } from "../importer/stationCsv";
import { arg, boolArg, buildingArg } from "./args";

async function main(): Promise<void> {
  const env = readEnv();
  const logger = createLogger(env.STATION_DESK_LOG_LEVEL, { sink: (line) => process.stderr.write(line) });
  const file = arg("file");
  if (!file || file.trim().length === 0) {
    throw new Error("Missing --file=<path>. Provide a CSV of station, check digit[, description] rows.");
  }
  const defaultBuildingId = buildingArg(env.STATION_DESK_DEFAULT_BUILDING);
  const replaceExisting = boolArg("replace", false);

  const text = await fs.readFile(file, "utf8");
  const desk = createDesk(env, logger);
  try {
    const outcome = await importStationCsv(desk.directory, text, {
      defaultBuildingId,
      replaceExisting,
      onProgress: (progress) => {
        process.stderr.write(`\rimported ${progress.processed}/${progress.total}`);
        if (progress.processed === progress.total) process.stderr.write("\n");
      },
    });
    if (!outcome.ok) throw outcome.error;

    process.stdout.write(JSON.stringify({ ok: outcome.value.failed === 0, file, ...outcome.value }, null, 2) + "\n");
    if (outcome.value.failed > 0) process.exitCode = 1;
  } finally {
    await desk.stores.close();
  }
}

void main().catch((error) => {
  process.stderr.write(`import-stations fatal: ${error instanceof Error ? error.stack : String(error)}\n`);
  process.exit(1);
});
