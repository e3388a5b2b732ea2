import test from "node:test";
import assert from "node:assert/strict";
import { arg, boolArg, buildingArg } from "./args";

const argv = ["node", "lookup.ts", "--station=58-15", "--record-usage=false", "--building=2", "--empty="];

test("arg reads --name=value pairs", () => {
  assert.equal(arg("station", undefined, argv), "58-15");
  assert.equal(arg("empty", "x", argv), "");
  assert.equal(arg("missing", "fallback", argv), "fallback");
});

test("boolArg accepts true/false and 1/0", () => {
  assert.equal(boolArg("record-usage", true, argv), false);
  assert.equal(boolArg("missing", true, argv), true);
  assert.equal(boolArg("flag", false, ["--flag=1"]), true);
  assert.throws(() => boolArg("station", true, argv), /Invalid --station=58-15/);
});

test("buildingArg validates the building number", () => {
  assert.equal(buildingArg(3, argv), 2);
  assert.equal(buildingArg(3, []), 3);
  assert.throws(() => buildingArg(3, ["--building=three"]), /Invalid --building=three/);
});
