import express, { type Express } from "express";
import { createServer, type Server } from "node:http";
import { log, logError } from "./log";
import type { RuntimeState } from "./runtime-state";
import { formatSseEvent, heartbeatSseEvent } from "./sse";
import type { ClientEvent } from "./types";

export function createStatusApp(runtime: RuntimeState): Express {
  const app = express();

  app.get("/healthz", (_req, res) => {
    res.json({ ok: true, service: "fm-alert-client" });
  });

  app.get("/status", (_req, res) => {
    res.json(runtime.snapshot());
  });

  app.get("/events", (req, res) => {
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.flushHeaders?.();

    const snapshotEvent: ClientEvent = {
      ts: new Date().toISOString(),
      event: "snapshot",
      payload: {},
      snapshot: runtime.snapshot()
    };
    res.write(formatSseEvent(snapshotEvent));

    const unsubscribe = runtime.subscribe((event) => {
      res.write(formatSseEvent(event));
    });

    const heartbeat = setInterval(() => {
      res.write(heartbeatSseEvent());
    }, 15000);

    req.on("close", () => {
      clearInterval(heartbeat);
      unsubscribe();
      res.end();
    });
  });

  return app;
}

export function startStatusServer(runtime: RuntimeState, port: number): Promise<Server> {
  const server = createServer(createStatusApp(runtime));
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => {
      server.off("error", reject);
      server.on("error", (error) => logError("server.error", error));
      log("server.listen", { port });
      resolve(server);
    });
  });
}

export function closeStatusServer(server: Server): Promise<void> {
  return new Promise((resolve) => {
    server.close((error) => {
      if (error) logError("server.close.failed", error);
      resolve();
    });
    server.closeAllConnections();
  });
}
