import test from "node:test";
import assert from "node:assert/strict";
import { LookupSession } from "./session";
import type { LookupState } from "./state";
import { StationDirectory } from "../stations/directory";
import type { BuildingId } from "../stations/model";
import { MemoryStationStore } from "../stores/memoryStores";

/** Holds every resolve until the test releases it, so completion order is scripted. */
class GatedStationStore extends MemoryStationStore {
  readonly usageCalls: string[] = [];
  private gates = new Map<string, () => void>();
  private usageGates = new Map<string, () => void>();
  private usageWaiters = new Map<string, () => void>();

  constructor(private readonly holdUsage = false) {
    super();
  }

  async resolve(buildingId: BuildingId, key: string): Promise<string | null> {
    await new Promise<void>((release) => this.gates.set(`${buildingId}:${key}`, release));
    return super.resolve(buildingId, key);
  }

  async recordUsage(buildingId: BuildingId, key: string): Promise<boolean> {
    const id = `${buildingId}:${key}`;
    this.usageCalls.push(id);
    if (this.holdUsage) {
      await new Promise<void>((release) => {
        this.usageGates.set(id, release);
        this.usageWaiters.get(id)?.();
      });
    }
    return super.recordUsage(buildingId, key);
  }

  release(buildingId: BuildingId, key: string): void {
    const gate = this.gates.get(`${buildingId}:${key}`);
    if (!gate) throw new Error(`no pending resolve for ${buildingId}:${key}`);
    this.gates.delete(`${buildingId}:${key}`);
    gate();
  }

  releaseUsage(buildingId: BuildingId, key: string): void {
    const gate = this.usageGates.get(`${buildingId}:${key}`);
    if (!gate) throw new Error(`no pending usage write for ${buildingId}:${key}`);
    this.usageGates.delete(`${buildingId}:${key}`);
    gate();
  }

  /** Resolves once a usage write for the station is held at its gate. */
  usageHeld(buildingId: BuildingId, key: string): Promise<void> {
    const id = `${buildingId}:${key}`;
    if (this.usageGates.has(id)) return Promise.resolve();
    return new Promise((resolve) => this.usageWaiters.set(id, resolve));
  }
}

async function seededSession(holdUsage = false) {
  const store = new GatedStationStore(holdUsage);
  await store.upsert({ buildingId: 3, key: "58-01", checkDigit: "12" }, { usage: "reset" });
  await store.upsert({ buildingId: 3, key: "58-02", checkDigit: "34" }, { usage: "reset" });
  const directory = new StationDirectory({ store, buildings: [2, 3, 4] });
  return { store, session: new LookupSession({ directory }) };
}

function foundKeys(states: LookupState[]): string[] {
  const keys = states.flatMap((state) => (state.result?.status === "found" ? [state.result.key] : []));
  return [...new Set(keys)];
}

test("a superseded lookup never overwrites the newer result", async () => {
  const { store, session } = await seededSession();
  const states: LookupState[] = [];
  session.subscribe((state) => states.push(state));

  const first = session.setInput("58-01");
  const second = session.setInput("58-02");

  store.release(3, "58-02");
  await second;
  store.release(3, "58-01");
  await first;

  const result = session.getState().result;
  assert.equal(result?.status, "found");
  assert.equal(result?.status === "found" && result.checkDigit, "34");
  assert.deepEqual(foundKeys(states), ["58-02"]);
  assert.equal((await store.get(3, "58-01"))?.usageCount, 0);
  assert.equal((await store.get(3, "58-02"))?.usageCount, 1);
});

test("a late answer for the older input is discarded even when it lands first", async () => {
  const { store, session } = await seededSession();
  const first = session.setInput("58-01");
  const second = session.setInput("58-02");

  store.release(3, "58-01");
  await first;
  assert.equal(session.getState().result, null);
  assert.notEqual(session.getState().pendingRequestId, null);

  store.release(3, "58-02");
  await second;
  const result = session.getState().result;
  assert.equal(result?.status === "found" && result.key, "58-02");
});

test("a superseded lookup never writes usage for its station", async () => {
  const { store, session } = await seededSession();
  const first = session.setInput("58-01");
  store.release(3, "58-01");
  const second = session.setInput("58-02");
  store.release(3, "58-02");
  await Promise.all([first, second]);

  assert.deepEqual(store.usageCalls, ["3:58-02"]);
  assert.equal((await store.get(3, "58-01"))?.usageCount, 0);
});

test("usage is written only after the check digit is on screen", async () => {
  const { store, session } = await seededSession(true);
  const first = session.setInput("58-01");
  store.release(3, "58-01");
  await store.usageHeld(3, "58-01");

  const shown = session.getState().result;
  assert.equal(shown?.status === "found" && shown.checkDigit, "12");
  assert.equal(shown?.status === "found" && shown.usageRecorded, false);

  const second = session.setInput("58-02");
  store.release(3, "58-02");
  await store.usageHeld(3, "58-02");
  store.releaseUsage(3, "58-02");
  await second;
  store.releaseUsage(3, "58-01");
  await first;

  const result = session.getState().result;
  assert.equal(result?.status === "found" && result.key, "58-02");
  assert.equal(result?.status === "found" && result.usageRecorded, true);
  assert.deepEqual(store.usageCalls, ["3:58-01", "3:58-02"]);
  assert.equal((await store.get(3, "58-02"))?.usageCount, 1);
});

test("switching building cancels the lookup for the previous building", async () => {
  const { store, session } = await seededSession();
  const first = session.setInput("58-01");
  const moved = session.selectBuilding(2);

  store.release(3, "58-01");
  await first;
  store.release(2, "58-01");
  await moved;

  const state = session.getState();
  assert.equal(state.buildingId, 2);
  assert.equal(state.result?.status, "not_found");
  assert.equal((await store.get(3, "58-01"))?.usageCount, 0);
});

test("clearing the input cancels the outstanding lookup", async () => {
  const { store, session } = await seededSession();
  const pending = session.setInput("5801");
  session.clear();

  store.release(3, "58-01");
  await pending;

  const state = session.getState();
  assert.equal(state.input, "");
  assert.equal(state.result, null);
  assert.equal((await store.get(3, "58-01"))?.usageCount, 0);
});

test("incomplete input does not start a lookup", async () => {
  const { session } = await seededSession();
  await session.setInput("58-");
  assert.equal(session.getState().pendingRequestId, null);
  assert.equal(session.getState().validation.kind, "PartialFormat");
});

test("store failures surface as the session error", async () => {
  class BrokenStore extends MemoryStationStore {
    async resolve(): Promise<string | null> {
      throw new Error("relation station_check_digits does not exist");
    }
  }
  const directory = new StationDirectory({ store: new BrokenStore(), buildings: [3] });
  const session = new LookupSession({ directory });
  await session.setInput("58-01");
  assert.equal(session.getState().error, "Something went wrong reading the station table.");
  assert.equal(session.getState().pendingRequestId, null);
});

test("unsubscribed listeners stop hearing changes", async () => {
  const { session } = await seededSession();
  let calls = 0;
  const unsubscribe = session.subscribe(() => {
    calls += 1;
  });
  await session.setInput("5");
  unsubscribe();
  await session.setInput("58");
  assert.equal(calls, 1);
});
