import test from "node:test";
import assert from "node:assert/strict";
import { StationDirectory } from "./directory";
import { MemoryStationStore } from "../stores/memoryStores";
import type { BuildingId } from "./model";

const noSleep = async () => {};

function directoryWith(store = new MemoryStationStore()) {
  return {
    store,
    directory: new StationDirectory({
      store,
      buildings: [2, 3, 4],
      retry: { attempts: 2, sleep: noSleep },
      clock: () => new Date("2026-03-01T12:00:00.000Z"),
    }),
  };
}

class FlakyStationStore extends MemoryStationStore {
  resolveCalls = 0;

  constructor(private readonly failures: Error[]) {
    super();
  }

  async resolve(buildingId: BuildingId, key: string): Promise<string | null> {
    this.resolveCalls += 1;
    const next = this.failures.shift();
    if (next) throw next;
    return super.resolve(buildingId, key);
  }
}

test("imported station resolves from verbose and compact input, only in its building", async () => {
  const { directory } = directoryWith();
  const imported = await directory.bulkImport(3, [["58-15", "69", "Dog food"]]);
  assert.equal(imported.ok, true);

  const verbose = await directory.lookup(3, "3-58-15-1");
  assert.deepEqual(verbose.ok && verbose.value.status === "found" && verbose.value.checkDigit, "69");

  const compact = await directory.lookup(3, "5815");
  assert.ok(compact.ok);
  assert.equal(compact.value.status, "found");

  const otherBuilding = await directory.lookup(2, "58-15");
  assert.ok(otherBuilding.ok);
  assert.equal(otherBuilding.value.status, "not_found");
});

test("lookup records usage once per successful resolution", async () => {
  const { directory, store } = directoryWith();
  await directory.saveStation(3, { station: "58-15", checkDigit: "69" });

  const first = await directory.lookup(3, "5815");
  assert.ok(first.ok && first.value.status === "found");
  assert.equal(first.value.usageRecorded, true);
  await directory.lookup(3, "58-15", { recordUsage: false });

  const controller = new AbortController();
  controller.abort();
  await directory.lookup(3, "58-15", { signal: controller.signal });

  assert.equal((await store.get(3, "58-15"))?.usageCount, 1);
});

test("incomplete input never reaches the store", async () => {
  const store = new FlakyStationStore([]);
  const { directory } = directoryWith(store);
  const result = await directory.lookup(3, "58-");
  assert.ok(result.ok);
  assert.equal(result.value.status, "incomplete");
  assert.equal(result.value.validation.kind, "PartialFormat");
  assert.equal(store.resolveCalls, 0);
});

test("bulk import counts inserted and skipped rows", async () => {
  const { directory } = directoryWith();
  const progress: number[] = [];
  const imported = await directory.bulkImport(
    3,
    [["58-15", "69"], ["58-16", "90"], ["57-30", "45"], ["4001", "11"], ["3-40-02-1", "22"], ["58-17", ""]],
    { onProgress: (step) => progress.push(step.processed) }
  );
  assert.ok(imported.ok);
  assert.equal(imported.value.inserted, 5);
  assert.equal(imported.value.skipped, 1);
  assert.equal(imported.value.failed, 0);
  assert.deepEqual(imported.value.skippedRows, [6]);
  assert.deepEqual(progress, [1, 2, 3, 4, 5, 6]);

  const count = await directory.count(3);
  assert.deepEqual(count, { ok: true, value: 5 });
});

test("bulk import reports rows with bad keys or check digits as failures", async () => {
  const { directory } = directoryWith();
  const imported = await directory.bulkImport(3, [["58-15", "69"], ["5", "10"], ["58-16", "abc"]]);
  assert.ok(imported.ok);
  assert.equal(imported.value.inserted, 1);
  assert.deepEqual(imported.value.failures, [
    { row: 2, input: "5", reason: 'unrecognised station "5"' },
    { row: 3, input: "58-16", reason: 'invalid check digit "abc"' },
  ]);
});

test("an empty batch is a failure", async () => {
  const { directory } = directoryWith();
  const imported = await directory.bulkImport(3, []);
  assert.equal(imported.ok, false);
  assert.equal(!imported.ok && imported.error.kind, "empty_batch");
});

test("replacing a building resets its usage counts", async () => {
  const { directory, store } = directoryWith();
  await directory.bulkImport(3, [["58-15", "69"]]);
  await directory.lookup(3, "58-15");
  await directory.bulkImport(3, [["58-15", "69"]]);
  assert.equal((await store.get(3, "58-15"))?.usageCount, 1);

  await directory.bulkImport(3, [["58-15", "70"]], { replaceExisting: true });
  const row = await store.get(3, "58-15");
  assert.equal(row?.checkDigit, "70");
  assert.equal(row?.usageCount, 0);
});

test("a storage failure comes back as a failed outcome after retries", async () => {
  const store = new FlakyStationStore([new Error("connect ECONNREFUSED 127.0.0.1:5432"), new Error("connect ECONNREFUSED")]);
  const { directory } = directoryWith(store);
  const result = await directory.lookup(3, "58-15");
  assert.equal(result.ok, false);
  assert.equal(!result.ok && result.error.kind, "unavailable");
  assert.equal(store.resolveCalls, 2);
});

test("a transient failure is retried away", async () => {
  const store = new FlakyStationStore([new Error("query timed out")]);
  await store.upsert({ buildingId: 3, key: "58-15", checkDigit: "69" }, { usage: "reset" });
  const { directory } = directoryWith(store);
  const result = await directory.resolve(3, "5815");
  assert.deepEqual(result, { ok: true, value: "69" });
  assert.equal(store.resolveCalls, 2);
});

test("non-retryable failures are not retried", async () => {
  const store = new FlakyStationStore([new Error("relation does not exist")]);
  const { directory } = directoryWith(store);
  const result = await directory.resolve(3, "58-15");
  assert.equal(!result.ok && result.error.kind, "unknown");
  assert.equal(store.resolveCalls, 1);
});

test("saveStation validates and normalizes input", async () => {
  const { directory } = directoryWith();
  const saved = await directory.saveStation(3, { station: "5801", checkDigit: " 7 ", description: " Bay door " });
  assert.ok(saved.ok);
  assert.equal(saved.value.key, "58-01");
  assert.equal(saved.value.checkDigit, "7");
  assert.equal(saved.value.description, "Bay door");

  const rejected = await directory.saveStation(3, { station: "58", checkDigit: "1234" });
  assert.equal(rejected.ok, false);
  assert.equal(!rejected.ok && rejected.error.kind, "invalid_input");
});

test("editing a station keeps its usage count", async () => {
  const { directory, store } = directoryWith();
  await directory.saveStation(3, { station: "58-01", checkDigit: "12" });
  await directory.recordUsage(3, "5801");
  await directory.recordUsage(3, "5801");
  await directory.saveStation(3, { station: "58-01", checkDigit: "13" });
  assert.equal((await store.get(3, "58-01"))?.usageCount, 2);
});

test("unknown buildings are rejected", async () => {
  const { directory } = directoryWith();
  const result = await directory.lookup(9, "58-15");
  assert.equal(!result.ok && result.error.kind, "invalid_input");
  assert.deepEqual(directory.knownBuildings(), [2, 3, 4]);
});

test("an unknown building is rejected before the input is classified", async () => {
  const { directory } = directoryWith();
  const partial = await directory.lookup(9, "58-");
  assert.equal(!partial.ok && partial.error.kind, "invalid_input");
  assert.equal(!partial.ok && partial.error.operation, "lookup");

  const known = await directory.lookup(3, "58-");
  assert.equal(known.ok && known.value.status, "incomplete");
});

test("byAisle pads single-digit aisles", async () => {
  const { directory } = directoryWith();
  await directory.bulkImport(3, [["05-01", "1"], ["05-02", "2"], ["50-01", "3"]]);
  const aisle = await directory.byAisle(3, "5");
  assert.ok(aisle.ok);
  assert.deepEqual(aisle.value.map((row) => row.key), ["05-01", "05-02"]);

  const bad = await directory.byAisle(3, "abc");
  assert.equal(!bad.ok && bad.error.kind, "invalid_input");
});

test("quickAccess ranks by usage", async () => {
  const { directory } = directoryWith();
  await directory.bulkImport(3, [["58-15", "69"], ["58-16", "90"], ["57-30", "45"]]);
  for (let i = 0; i < 3; i += 1) await directory.recordUsage(3, "58-16");
  await directory.recordUsage(3, "57-30");

  const quick = await directory.quickAccess(3);
  assert.ok(quick.ok);
  assert.deepEqual(quick.value.recent.map((row) => row.key), ["58-16", "57-30"]);
  assert.deepEqual(quick.value.frequent.map((row) => row.key), ["58-16"]);
});
