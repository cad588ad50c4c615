import test from "node:test";
import assert from "node:assert/strict";
import { RuntimeState } from "../src/runtime-state";
import type { ClientEvent } from "../src/types";

test("runtime state tracks a track from start to finish", () => {
  const runtime = new RuntimeState();

  runtime.trackStarted({ id: 3, name: "Morning", link: "https://example.test/3", durationSec: 120 }, 120, 100);
  let snap = runtime.snapshot();
  assert.equal(snap.nowPlaying?.id, 3);
  assert.equal(snap.nowPlaying?.volume, 100);
  assert.equal(snap.stats.tracksStarted, 1);

  runtime.volumeChanged(10);
  assert.equal(runtime.snapshot().nowPlaying?.volume, 10);

  runtime.trackEnded("finished");
  snap = runtime.snapshot();
  assert.equal(snap.nowPlaying, null);
  assert.equal(snap.stats.tracksFinished, 1);
  assert.deepEqual(
    snap.recentEvents.map((e) => e.event),
    ["track.ended", "track.volume", "track.started"]
  );
});

test("runtime state counts alert outcomes and records failures", () => {
  const runtime = new RuntimeState();
  runtime.alertHandled({ kind: "ai", id: 2, message: "News", severity: "low" }, "spoken");
  runtime.alertHandled({ kind: "user", id: 4, message: "Hi", severity: "" }, "speech_failure");

  const snap = runtime.snapshot();
  assert.equal(snap.stats.alertsSpoken, 1);
  assert.equal(snap.stats.alertFailures, 1);
  assert.equal(snap.lastAlert?.id, 4);
  assert.equal(snap.lastAlert?.outcome, "speech_failure");
  assert.equal(snap.recentErrors[0]?.source, "alert.user");
  assert.equal(snap.recentErrors[0]?.message, "alert 4: speech_failure");
});

test("runtime state only emits real state changes", () => {
  const runtime = new RuntimeState();
  const seen: ClientEvent[] = [];
  const unsubscribe = runtime.subscribe((event) => seen.push(event));

  runtime.setState("IDLE");
  runtime.setState("PLAYING");
  runtime.setServerStatus("net", true);
  runtime.setServerStatus("net", true);
  unsubscribe();
  runtime.setState("STOPPED");

  assert.deepEqual(
    seen.map((e) => e.event),
    ["state.changed", "status.updated"]
  );
  assert.equal(seen[0]?.snapshot?.state, "PLAYING");
  assert.deepEqual(seen[0]?.payload, { from: "IDLE", to: "PLAYING" });
});

test("runtime state snapshots are copies", () => {
  const runtime = new RuntimeState();
  const snap = runtime.snapshot();
  snap.watermarks.lastMusicId = 99;
  assert.equal(runtime.snapshot().watermarks.lastMusicId, 0);
});

test("runtime state event history is bounded", () => {
  const runtime = new RuntimeState();

  for (let i = 0; i < 250; i += 1) {
    runtime.setWatermarks({ lastMusicId: i, lastMusicLink: "", lastAiAlertId: 0, lastUserAlertId: 0 });
  }

  const snap = runtime.snapshot();
  assert.equal(snap.recentEvents.length, 200);
  assert.equal(snap.watermarks.lastMusicId, 249);
});
