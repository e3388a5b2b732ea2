import type { LookupResult } from "../stations/directory";
import { DEFAULT_BUILDING_ID, type BuildingId, type Validation } from "../stations/model";
import { classify, normalize, suggest } from "../stations/normalizer";

export type LookupState = {
  readonly buildingId: BuildingId;
  readonly input: string;
  readonly validation: Validation;
  readonly suggestions: readonly string[];
  /** Set only while the input is resolvable. */
  readonly normalizedKey: string | null;
  readonly pendingRequestId: number | null;
  readonly result: LookupResult | null;
  readonly error: string | null;
};

export type LookupEvent =
  | { type: "input_changed"; input: string }
  | { type: "lookup_started"; requestId: number }
  | { type: "lookup_settled"; requestId: number; result: LookupResult }
  | { type: "lookup_failed"; requestId: number; message: string }
  | { type: "usage_recorded"; buildingId: BuildingId; key: string }
  | { type: "building_selected"; buildingId: BuildingId }
  | { type: "cleared" }
  | { type: "station_selected"; key: string };

function withInput(buildingId: BuildingId, input: string): LookupState {
  const validation = classify(input);
  return {
    buildingId,
    input,
    validation,
    suggestions: suggest(input, buildingId),
    normalizedKey: validation.resolvable ? normalize(input) : null,
    pendingRequestId: null,
    result: null,
    error: null,
  };
}

export function initialLookupState(buildingId: BuildingId = DEFAULT_BUILDING_ID): LookupState {
  return withInput(buildingId, "");
}

/**
 * Pure transition function. Any input or building change drops the pending
 * request, so a late `lookup_settled` for it no longer matches and is ignored.
 */
export function reduceLookup(state: LookupState, event: LookupEvent): LookupState {
  switch (event.type) {
    case "input_changed":
      if (event.input === state.input) return state;
      return withInput(state.buildingId, event.input);
    case "station_selected":
      return withInput(state.buildingId, event.key);
    case "building_selected":
      if (event.buildingId === state.buildingId) return state;
      return withInput(event.buildingId, state.input);
    case "cleared":
      return initialLookupState(state.buildingId);
    case "lookup_started":
      if (state.normalizedKey === null) return state;
      return { ...state, pendingRequestId: event.requestId, error: null };
    case "lookup_settled":
      if (event.requestId !== state.pendingRequestId) return state;
      return { ...state, pendingRequestId: null, result: event.result, error: null };
    case "lookup_failed":
      if (event.requestId !== state.pendingRequestId) return state;
      return { ...state, pendingRequestId: null, result: null, error: event.message };
    case "usage_recorded":
      if (state.buildingId !== event.buildingId || state.result?.status !== "found") return state;
      if (state.result.key !== event.key || state.result.usageRecorded) return state;
      return { ...state, result: { ...state.result, usageRecorded: true } };
  }
}
