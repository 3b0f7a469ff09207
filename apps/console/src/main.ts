// seismolink/apps/console/src/main.ts
//
// Usage:
//   tsx apps/console/src/main.ts [--bind <addr>] [--port <n>] [--ipv6] [--no-drop-on-backward] [--orientation]

import path from "node:path";
import { fileURLToPath } from "node:url";

import { createLogger, loadReceiverConfig, SeismometerReceiver } from "@seismolink/receiver";

import { CLEAR_LINE, printLoop } from "./print_loop";

async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  const log = createLogger("console");
  const config = loadReceiverConfig(path.resolve(path.dirname(fileURLToPath(import.meta.url)), ".."), argv);
  const receiver = await SeismometerReceiver.open(config, { logger: log });

  const shutdown = (): void => {
    receiver
      .close()
      .then(() => {
        process.stdout.write(`${CLEAR_LINE}Bye!\n`);
      })
      .catch((err: unknown) => {
        log.error({ err }, "close failed");
        process.exitCode = 1;
      });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await printLoop(receiver, {
    out: process.stdout,
    log,
    mode: argv.includes("--orientation") ? "orientation" : "samples",
  });
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
