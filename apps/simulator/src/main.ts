// seismolink/apps/simulator/src/main.ts
//
// Usage:
//   tsx apps/simulator/src/main.ts [--host 127.0.0.1] [--port 5612] [--count 100] [--rate 10]

import dgram from "node:dgram";
import { setTimeout as sleep } from "node:timers/promises";

import { DEFAULT_RECEIVER_PORT } from "@seismolink/contracts";
import { createLogger } from "@seismolink/receiver";
import { encodeMeasurementFrame } from "@seismolink/wire-codec";

import { synthPayloads } from "./synth";

type Args = {
  host: string;
  port: number;
  count: number;
  rate: number;
};

function parseArgs(argv: string[]): Args {
  const get = (k: string): string | undefined => {
    const idx = argv.indexOf(`--${k}`);
    if (idx === -1) return undefined;
    const v = argv[idx + 1];
    if (!v || v.startsWith("--")) return undefined;
    return v;
  };

  const host = get("host") ?? process.env.SEISMO_SIM_HOST ?? "127.0.0.1";
  const port = Number(get("port") ?? process.env.SEISMO_PORT ?? DEFAULT_RECEIVER_PORT);
  const count = Number(get("count") ?? 100);
  const rate = Number(get("rate") ?? 10);

  if (!Number.isInteger(port) || port < 1 || port > 65535) throw new Error(`invalid --port: ${port}`);
  if (!Number.isInteger(count) || count < 1) throw new Error(`invalid --count: ${count}`);
  if (!Number.isFinite(rate) || rate <= 0) throw new Error(`invalid --rate: ${rate}`);

  return { host, port, count, rate };
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const log = createLogger("simulator");
  const socket = dgram.createSocket(args.host.includes(":") ? "udp6" : "udp4");

  log.info(args, "sending synthetic measurements");
  try {
    let sent = 0;
    for (const payload of synthPayloads(args.count, { rate: args.rate })) {
      const frame = encodeMeasurementFrame(payload);
      await new Promise<void>((resolve, reject) => {
        socket.send(frame, args.port, args.host, (err) => (err ? reject(err) : resolve()));
      });
      sent++;
      await sleep(1000 / args.rate);
    }
    log.info({ sent }, "done");
  } finally {
    socket.close();
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
