import test from "node:test";
import assert from "node:assert/strict";
import { importStationCsv, parseStationCsv } from "./stationCsv";
import { StationDirectory, type ImportProgress } from "../stations/directory";
import { MemoryStationStore } from "../stores/memoryStores";

function freshDirectory() {
  return new StationDirectory({ store: new MemoryStationStore(), buildings: [2, 3, 4] });
}

test("rows without a building column go to the default building", () => {
  const parsed = parseStationCsv(
    ["station,check_digit,description", "58-15,69,Dog food", '"57-30",45,"Aisle, end"', ""].join("\n"),
    { defaultBuildingId: 4 }
  );
  assert.equal(parsed.hasBuildingColumn, false);
  assert.equal(parsed.dataRows, 2);
  assert.deepEqual(parsed.batches, [
    {
      buildingId: 4,
      rows: [
        ["58-15", "69", "Dog food"],
        ["57-30", "45", "Aisle, end"],
      ],
      lines: [2, 3],
    },
  ]);
});

test("a building column splits rows per building and falls back on blanks", () => {
  const parsed = parseStationCsv(
    ["Building\tStation\tCheck", "2\t40-01\t11", "\t57-30\t45", "x\t58-16\t90", "3\t58-15\t69"].join("\r\n")
  );
  assert.equal(parsed.hasBuildingColumn, true);
  assert.deepEqual(
    parsed.batches.map((batch) => [batch.buildingId, batch.lines]),
    [
      [2, [2]],
      [3, [3, 4, 5]],
    ]
  );
  assert.deepEqual(parsed.batches[1]?.rows[0], ["57-30", "45"]);
});

test("blank lines are ignored but keep line numbers aligned", () => {
  const parsed = parseStationCsv("station,check\n\n58-15,69\n   \n58-16,90\n");
  assert.equal(parsed.dataRows, 2);
  assert.deepEqual(parsed.batches[0]?.lines, [3, 5]);
});

test("importing a file reports skipped lines by source line", async () => {
  const directory = freshDirectory();
  const outcome = await importStationCsv(
    directory,
    ["station,check_digit", "58-15,69", "5816,90", "57-30,45", "58-17"].join("\n")
  );
  assert.ok(outcome.ok);
  assert.equal(outcome.value.inserted, 3);
  assert.equal(outcome.value.skipped, 1);
  assert.deepEqual(outcome.value.skippedLines, [5]);
  assert.deepEqual(await directory.resolve(3, "58-16"), { ok: true, value: "90" });
});

test("rows for an unknown building fail without stopping the others", async () => {
  const directory = freshDirectory();
  const progress: number[] = [];
  const outcome = await importStationCsv(
    directory,
    ["building,station,check_digit", "3,58-15,69", "2,40-01,11", "4,40-01,22", "9,10-10,1"].join("\n"),
    { onProgress: (step) => progress.push(step.processed) }
  );
  assert.ok(outcome.ok);
  assert.deepEqual(outcome.value.buildings, [2, 3, 4, 9]);
  assert.equal(outcome.value.inserted, 3);
  assert.equal(outcome.value.failed, 1);
  assert.deepEqual(outcome.value.failures, [
    { line: 5, input: "10-10", reason: "unknown building 9; expected one of 2, 3, 4" },
  ]);
  assert.deepEqual(progress, [1, 2, 3, 4]);
  assert.deepEqual(await directory.resolve(2, "40-01"), { ok: true, value: "11" });
  assert.deepEqual(await directory.resolve(4, "40-01"), { ok: true, value: "22" });
});

test("progress reaches the total when a whole building is refused", async () => {
  const events: ImportProgress[] = [];
  const outcome = await importStationCsv(
    freshDirectory(),
    ["building,station,check_digit", "3,58-15,69", "9,10-10,1"].join("\n"),
    { onProgress: (step) => events.push(step) }
  );
  assert.ok(outcome.ok);
  assert.equal(outcome.value.failed, 1);
  assert.deepEqual(events, [
    { processed: 1, total: 2, inserted: 1, skipped: 0, failed: 0 },
    { processed: 2, total: 2, inserted: 1, skipped: 0, failed: 1 },
  ]);
});

test("building columns are recognised under their common header names", () => {
  for (const header of ["building_number", "Building #", "bldg_id", "Building No.", "BLDG"]) {
    const parsed = parseStationCsv(`${header},station,check\n4,58-15,69`);
    assert.equal(parsed.hasBuildingColumn, true, header);
    assert.deepEqual(parsed.batches, [{ buildingId: 4, rows: [["58-15", "69"]], lines: [2] }]);
  }
  assert.equal(parseStationCsv("buildings,station\n4,58-15").hasBuildingColumn, false);
});

test("quoted cells keep separators and escaped quotes, whitespace is collapsed", () => {
  const parsed = parseStationCsv(
    '\uFEFFstation,check,description\r\n" 58-15 ",69,"Dog  ""large""\n bags"\r58-16,90,plain'
  );
  assert.deepEqual(parsed.batches[0]?.rows, [
    ["58-15", "69", 'Dog "large" bags'],
    ["58-16", "90", "plain"],
  ]);
  assert.deepEqual(parsed.batches[0]?.lines, [2, 3]);
});

test("a file without data rows is an empty batch", async () => {
  const outcome = await importStationCsv(freshDirectory(), "station,check_digit\n\n");
  assert.equal(outcome.ok, false);
  assert.equal(!outcome.ok && outcome.error.kind, "empty_batch");
});
