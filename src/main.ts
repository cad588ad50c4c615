#!/usr/bin/env node
import { RadioClient } from "./client";
import { loadConfig, loadEnvFiles } from "./config";
import { logError } from "./log";

async function main(): Promise<void> {
  loadEnvFiles();
  const client = new RadioClient(loadConfig());

  const onSignal = (signal: NodeJS.Signals) => {
    client
      .shutdown()
      .catch((error) => logError("client.shutdown.failed", error, { signal }))
      .finally(() => process.exit(0));
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  await client.start();
  await client.run();
}

main().catch((error) => {
  logError("client.fatal", error);
  process.exitCode = 1;
});
