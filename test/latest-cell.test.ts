import test from "node:test";
import assert from "node:assert/strict";
import { LatestValueCell } from "../src/latest-cell";

test("empty cell has no value and no change", () => {
  const cell = new LatestValueCell<string>();
  assert.equal(cell.get(), null);
  assert.equal(cell.hasChange(), false);
  assert.equal(cell.consumeChange(), null);
});

test("consumeChange takes the newest value once", () => {
  const cell = new LatestValueCell<string>();
  cell.set("a");
  cell.set("b");
  assert.equal(cell.consumeChange(), "b");
  assert.equal(cell.consumeChange(), null);
  assert.equal(cell.get(), "b");
});

test("seed stores a value without raising the change flag", () => {
  const cell = new LatestValueCell<string>();
  cell.seed("net");
  assert.equal(cell.get(), "net");
  assert.equal(cell.hasChange(), false);
  cell.set("off");
  assert.equal(cell.hasChange(), true);
  assert.equal(cell.consumeChange(), "off");
});
