import test from "node:test";
import assert from "node:assert/strict";
import { systemClock } from "../src/clock";
import { LatestValueCell } from "../src/latest-cell";
import { MusicWatcher, StatusWatcher } from "../src/watchers";
import type { MusicItem } from "../src/types";
import { FakeClock, FakeDb, music } from "./fakes";

test("music watcher publishes the first link and every change", async () => {
  const db = new FakeDb();
  const desired = new LatestValueCell<MusicItem>();
  const watcher = new MusicWatcher(db, 1, desired, 1, new FakeClock());

  db.musicRows = [music(1, " https://example.test/one ")];
  await watcher.pollOnce();
  assert.equal(desired.consumeChange()?.link, " https://example.test/one ");

  await watcher.pollOnce();
  assert.equal(desired.hasChange(), false);

  db.musicRows = [music(1, "https://example.test/two")];
  await watcher.pollOnce();
  assert.equal(desired.consumeChange()?.link, "https://example.test/two");
});

test("music watcher ignores missing rows, empty links and read errors", async () => {
  const db = new FakeDb();
  const desired = new LatestValueCell<MusicItem>();
  const watcher = new MusicWatcher(db, 1, desired, 1, new FakeClock());

  await watcher.pollOnce();
  db.musicRows = [music(1, "   ")];
  await watcher.pollOnce();
  db.failReads = true;
  await watcher.pollOnce();
  await watcher.pollOnce();

  assert.equal(desired.hasChange(), false);
  assert.equal(desired.get(), null);
});

test("status watcher seeds its first reading without raising a change", async () => {
  const db = new FakeDb();
  db.status = " Net ";
  const cell = new LatestValueCell<string>();
  const seen: string[] = [];
  const watcher = new StatusWatcher(db, cell, { intervalSec: 1, onStatus: (s) => seen.push(s) }, new FakeClock());

  await watcher.pollOnce();
  assert.equal(cell.get(), "net");
  assert.equal(cell.hasChange(), false);

  await watcher.pollOnce();
  assert.deepEqual(seen, ["net"]);
});

test("status watcher cascades a turn to disabled exactly once", async () => {
  const db = new FakeDb();
  const cell = new LatestValueCell<string>();
  let disabled = 0;
  const seen: string[] = [];
  const watcher = new StatusWatcher(
    db,
    cell,
    { intervalSec: 1, onStatus: (s) => seen.push(s), onDisabled: () => (disabled += 1) },
    new FakeClock()
  );

  await watcher.pollOnce();
  db.status = "off";
  await watcher.pollOnce();
  await watcher.pollOnce();

  assert.equal(disabled, 1);
  assert.equal(cell.consumeChange(), "off");
  assert.deepEqual(seen, ["net", "off"]);

  db.status = "both";
  await watcher.pollOnce();
  assert.equal(disabled, 1);
  assert.equal(cell.consumeChange(), "both");
});

test("status watcher treats a read error as an empty status", async () => {
  const db = new FakeDb();
  const cell = new LatestValueCell<string>();
  let disabled = 0;
  const watcher = new StatusWatcher(db, cell, { intervalSec: 1, onDisabled: () => (disabled += 1) }, new FakeClock());

  await watcher.pollOnce();
  db.failReads = true;
  await watcher.pollOnce();

  assert.equal(cell.consumeChange(), "");
  assert.equal(disabled, 1);
});

test("a throwing disable callback does not escape the poll", async () => {
  const db = new FakeDb();
  const cell = new LatestValueCell<string>();
  const watcher = new StatusWatcher(
    db,
    cell,
    {
      intervalSec: 1,
      onDisabled: () => {
        throw new Error("player already gone");
      }
    },
    new FakeClock()
  );

  await watcher.pollOnce();
  db.status = "radio";
  await watcher.pollOnce();
  assert.equal(cell.get(), "radio");
});

test("a started watcher polls until stopped and joins", async () => {
  const db = new FakeDb();
  db.musicRows = [music(1, "https://example.test/one")];
  const desired = new LatestValueCell<MusicItem>();
  const watcher = new MusicWatcher(db, 1, desired, 0.2, systemClock);

  watcher.start();
  assert.equal(watcher.running, true);
  await systemClock.sleep(50);
  assert.equal(desired.get()?.id, 1);

  const joined = await watcher.stop(2000);
  assert.equal(joined, true);
  assert.equal(watcher.running, false);
  assert.equal(await watcher.stop(), true);
});

function loggedEvents(lines: string[]): string[] {
  return lines.flatMap((line) => {
    const parsed: unknown = JSON.parse(line);
    return typeof parsed === "object" && parsed !== null && "event" in parsed && typeof parsed.event === "string"
      ? [parsed.event]
      : [];
  });
}

test("status watcher emits a heartbeat once the status has been quiet for the interval", async (t) => {
  const lines: string[] = [];
  t.mock.method(console, "log", (line: unknown) => {
    lines.push(String(line));
  });
  const clock = new FakeClock();
  const watcher = new StatusWatcher(new FakeDb(), new LatestValueCell<string>(), { intervalSec: 1, heartbeatSec: 30 }, clock);
  const heartbeats = () => loggedEvents(lines).filter((event) => event === "status.heartbeat").length;

  await watcher.pollOnce();
  await clock.sleep(30_000);
  await watcher.pollOnce();
  assert.equal(heartbeats(), 0);

  await clock.sleep(1);
  await watcher.pollOnce();
  await watcher.pollOnce();
  assert.equal(heartbeats(), 1);

  await clock.sleep(30_001);
  await watcher.pollOnce();
  assert.equal(heartbeats(), 2);
  assert.deepEqual(loggedEvents(lines), ["status.observed", "status.heartbeat", "status.heartbeat"]);
});
