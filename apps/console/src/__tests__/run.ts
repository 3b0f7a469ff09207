// Minimal test runner for @seismolink/console.

import assert from "node:assert";

import pino, { type Logger } from "pino";

import type { ReceiveOneSource, ReceiveResult } from "@seismolink/receiver";
import { Sample } from "@seismolink/sample";
import { FramingError } from "@seismolink/wire-codec";

import { describeOrientation, MedianWindow } from "../orientation";
import { CLEAR_LINE, printLoop } from "../print_loop";

function scripted(results: ReceiveResult[]): ReceiveOneSource {
  const queue = [...results];
  return {
    async receiveOne(): Promise<ReceiveResult> {
      return queue.shift() ?? { status: "closed" };
    },
  };
}

function capture(): { out: { write(chunk: string): boolean }; text(): string } {
  const chunks: string[] = [];
  return {
    out: {
      write(chunk: string): boolean {
        chunks.push(chunk);
        return true;
      },
    },
    text: () => chunks.join(""),
  };
}

function warnLog(): { log: Logger; lines: string[] } {
  const lines: string[] = [];
  const log = pino({ level: "warn", base: null, timestamp: false }, { write: (s: string) => void lines.push(s.trim()) });
  return { log, lines };
}

async function check(name: string, fn: () => Promise<void>): Promise<void> {
  await fn();
  console.log(`[OK] ${name}`);
}

const s1 = new Sample(0, 0.01, -0.02, 1);
const s2 = new Sample(1_500, 0, 0, -0.98);

async function main(): Promise<void> {
  await check("ansi output overwrites one line per sample", async () => {
    const c = capture();
    const { log } = warnLog();
    const n = await printLoop(
      scripted([
        { status: "accepted", sample: s1 },
        { status: "suppressed", timestamp: 0, lastAcceptedTs: 1 },
        { status: "accepted", sample: s2 },
      ]),
      { out: c.out, log, plain: false }
    );
    assert.equal(n, 2);
    assert.equal(
      c.text(),
      "Awaiting initial measurement..." +
        `${CLEAR_LINE}<Sample at 1970-01-01T00:00:00.000Z: (+0.010000, -0.020000, +1.000000)>` +
        `${CLEAR_LINE}<Sample at 1970-01-01T00:00:01.500Z: (+0.000000, +0.000000, -0.980000)>`
    );
  });

  await check("plain output is newline separated without the waiting banner", async () => {
    const c = capture();
    const { log } = warnLog();
    await printLoop(scripted([{ status: "accepted", sample: s2 }]), { out: c.out, log, plain: true });
    assert.equal(c.text(), "<Sample at 1970-01-01T00:00:01.500Z: (+0.000000, +0.000000, -0.980000)>\n");
  });

  await check("rejected datagrams are logged as warnings and the loop continues", async () => {
    const c = capture();
    const { log, lines } = warnLog();
    const err = new FramingError("TRUNCATED", 20, 28, new Uint8Array(0));
    const n = await printLoop(
      scripted([
        { status: "rejected", error: err },
        { status: "accepted", sample: s2 },
      ]),
      { out: c.out, log, plain: true }
    );
    assert.equal(n, 1);
    assert.equal(lines.length, 1);
    assert.deepStrictEqual(JSON.parse(lines[0]), { level: 40, code: "TRUNCATED", msg: "wanted 28 bytes, got 20" });
  });

  await check("orientation mode prints the pose of the running median", async () => {
    const c = capture();
    const { log } = warnLog();
    await printLoop(
      scripted([
        { status: "accepted", sample: new Sample(0, 0, 0, -1) },
        { status: "accepted", sample: new Sample(1, 0, -1, 0) },
        { status: "accepted", sample: new Sample(2, 0, -1, 0) },
      ]),
      { out: c.out, log, plain: true, mode: "orientation" }
    );
    // medians: (0,0,-1) -> (0,-0.5,-0.5) -> (0,-1,0)
    assert.equal(c.text(), "flat, display up, lying down\ntilted, display up\nstanding\n");
  });

  await check("describeOrientation covers each side", async () => {
    assert.equal(describeOrientation({ x: 0, y: 0, z: 1 }), "flat, display down, lying down");
    assert.equal(describeOrientation({ x: 0, y: 0.9, z: 0.5 }), "tilted, display down, standing upside down");
    assert.equal(describeOrientation({ x: -0.9, y: 0, z: 0 }), "lying on left side");
    assert.equal(describeOrientation({ x: 0.9, y: 0.1, z: 0 }), "lying on right side");
    assert.equal(describeOrientation({ x: 0.5, y: 0.5, z: 0 }), "");
  });

  await check("median window keeps only the backlog", async () => {
    const w = new MedianWindow(3);
    w.push({ x: 10, y: 0, z: 0 });
    w.push({ x: 1, y: 0, z: 0 });
    w.push({ x: 2, y: 0, z: 0 });
    assert.deepStrictEqual(w.push({ x: 3, y: 0, z: 0 }), { x: 2, y: 0, z: 0 });
    assert.equal(w.size, 3);
    assert.throws(() => new MedianWindow(0), RangeError);
  });

  console.log("console tests ok");
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
