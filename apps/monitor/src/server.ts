// seismolink/apps/monitor/src/server.ts
//
// HTTP view over a live receiver. Listens on MONITOR_HOST:MONITOR_PORT
// (default 0.0.0.0:3120); receiver settings come from the usual config layers.

import path from "node:path";
import { fileURLToPath } from "node:url";

import { loadReceiverConfig, SeismometerReceiver } from "@seismolink/receiver";

import { createMonitorApp } from "./app";
import { registerMonitorRoutes } from "./routes";
import { SampleTap } from "./sample_tap";

const config = loadReceiverConfig(path.resolve(path.dirname(fileURLToPath(import.meta.url)), ".."));

const app = createMonitorApp({ logger: { level: process.env.SEISMO_LOG_LEVEL ?? "info" } });

async function main(): Promise<void> {
  const receiver = await SeismometerReceiver.open(config, { logger: app.log });
  const tap = new SampleTap(receiver, app.log);
  registerMonitorRoutes(app, { tap, stats: () => receiver.stats() });

  tap.start().catch((err: unknown) => {
    app.log.error({ err }, "sample tap stopped");
    process.exitCode = 1;
  });

  const shutdown = (): void => {
    Promise.all([receiver.close(), app.close()]).catch((err: unknown) => {
      app.log.error({ err }, "shutdown failed");
      process.exitCode = 1;
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  const port = Number(process.env.MONITOR_PORT ?? 3120);
  const host = process.env.MONITOR_HOST ?? "0.0.0.0";
  await app.listen({ port, host });
}

main().catch((err) => {
  app.log.error(err);
  process.exit(1);
});
