import test from "node:test";
import assert from "node:assert/strict";
import { isPlayable, sameMusic } from "../src/music";
import { music } from "./fakes";

test("sameMusic treats two absent tracks as the same", () => {
  assert.equal(sameMusic(null, null), true);
});

test("sameMusic is false when only one side is present", () => {
  assert.equal(sameMusic(null, music(1, "L1")), false);
  assert.equal(sameMusic(music(1, "L1"), null), false);
});

test("sameMusic compares id and trimmed link", () => {
  assert.equal(sameMusic(music(1, "L1"), music(1, "  L1 ")), true);
  assert.equal(sameMusic(music(1, "L1"), music(1, "L2")), false);
  assert.equal(sameMusic(music(1, "L1"), music(2, "L1")), false);
});

test("sameMusic ignores name and duration", () => {
  const a = { id: 4, name: "one", link: "L", durationSec: 10 };
  const b = { id: 4, name: "two", link: "L", durationSec: null };
  assert.equal(sameMusic(a, b), true);
});

test("isPlayable needs a positive id and a non-blank link", () => {
  assert.equal(isPlayable(music(1, "L1")), true);
  assert.equal(isPlayable(music(0, "L1")), false);
  assert.equal(isPlayable(music(1, "   ")), false);
  assert.equal(isPlayable(null), false);
});
