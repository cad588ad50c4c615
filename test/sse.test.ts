import test from "node:test";
import assert from "node:assert/strict";
import { formatSseEvent, heartbeatSseEvent } from "../src/sse";

function field(raw: string, name: string): string | undefined {
  const line = raw.split("\n").find((l) => l.startsWith(`${name}: `));
  return line?.slice(name.length + 2);
}

test("formatSseEvent returns a message frame with the event as JSON", () => {
  const event = {
    ts: "2026-02-14T00:00:00.000Z",
    event: "track.started",
    payload: { id: 3 }
  };
  const raw = formatSseEvent(event);

  assert.equal(field(raw, "event"), "message");
  assert.equal(field(raw, "retry"), "2000");
  assert.deepEqual(JSON.parse(field(raw, "data") ?? ""), event);
  assert.ok(raw.endsWith("\n\n"));
});

test("heartbeat frames carry the timestamp and a fresh id", () => {
  const first = formatSseEvent({ ts: "2026-02-14T00:00:00.000Z", event: "state.changed", payload: {} });
  const raw = heartbeatSseEvent(new Date("2026-02-14T00:00:05.000Z"));

  assert.equal(field(raw, "event"), "heartbeat");
  assert.equal(field(raw, "data"), '{"ts":"2026-02-14T00:00:05.000Z"}');
  assert.equal(Number(field(raw, "id")), Number(field(first, "id")) + 1);
});
