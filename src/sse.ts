import type { ClientEvent } from "./types";

const RETRY_MS = 2000;

let lastFrameId = 0;

function frame(kind: "message" | "heartbeat", data: unknown): string {
  lastFrameId += 1;
  const lines = [`id: ${lastFrameId}`, `retry: ${RETRY_MS}`, `event: ${kind}`, `data: ${JSON.stringify(data)}`];
  return `${lines.join("\n")}\n\n`;
}

export function formatSseEvent(event: ClientEvent): string {
  return frame("message", event);
}

/** Keeps idle proxies from closing the stream. */
export function heartbeatSseEvent(now: Date = new Date()): string {
  return frame("heartbeat", { ts: now.toISOString() });
}
