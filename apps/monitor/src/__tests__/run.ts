// Minimal test runner for @seismolink/monitor.
//
// The tap reads a MeasurementStream fed from an in-process queue of
// receive results; HTTP goes through app.inject.

import assert from "node:assert";

import pino from "pino";

import type { ReceiverStatsV1 } from "@seismolink/contracts";
import { DatagramQueue, MeasurementStream, type ReceiveResult } from "@seismolink/receiver";
import { Sample } from "@seismolink/sample";
import { UnsupportedMessageError } from "@seismolink/wire-codec";

import { createMonitorApp } from "../app";
import { registerMonitorRoutes } from "../routes";
import { SampleTap } from "../sample_tap";

const silent = pino({ level: "silent" });

const STATS: ReceiverStatsV1 = {
  received: 3,
  accepted: 2,
  suppressed: 0,
  rejected: { TRUNCATED: 0, TRAILING_DATA: 0, UNSUPPORTED: 1, INVALID_TIME: 0 },
  overflowed: 0,
  anchor: { wall_ts: 1_000, sensor_time: 2 },
  last_accepted_ts: 2_000,
};

function feed(): { queue: DatagramQueue<ReceiveResult>; stream: MeasurementStream } {
  const queue = new DatagramQueue<ReceiveResult>(64);
  const stream = new MeasurementStream({
    receiveOne: async () => (await queue.next()) ?? { status: "closed" },
  });
  return { queue, stream };
}

// Lets every pending promise continuation run.
const settle = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

function sampleAt(ts: number, x = 0): Sample {
  return new Sample(ts, x, 0, -1, { address: "192.0.2.10", port: 40000, family: "IPv4" });
}

async function check(name: string, fn: () => Promise<void>): Promise<void> {
  await fn();
  console.log(`[OK] ${name}`);
}

async function main(): Promise<void> {
  await check("tap keeps latest and bounded history and survives rejected datagrams", async () => {
    const { queue, stream } = feed();
    const tap = new SampleTap({ measurements: () => stream }, silent, 2);
    const done = tap.start();

    queue.push({ status: "accepted", sample: sampleAt(1_000, 1) });
    queue.push({ status: "rejected", error: new UnsupportedMessageError(1) });
    queue.push({ status: "suppressed", timestamp: 500, lastAcceptedTs: 1_000 });
    queue.push({ status: "accepted", sample: sampleAt(2_000, 2) });
    queue.push({ status: "accepted", sample: sampleAt(3_000, 3) });
    await settle();

    assert.equal(tap.latestSample?.timestamp, 3_000);
    assert.equal(tap.size, 2);
    assert.equal(tap.rejected, 1);
    assert.deepStrictEqual(tap.recent(10).map((s) => s.x), [2, 3]);
    assert.deepStrictEqual(tap.recent(1).map((s) => s.x), [3]);

    queue.close();
    await done;
    assert.strictEqual(tap.start(), done);
  });

  await check("routes report health, latest, recent and stats", async () => {
    const { queue, stream } = feed();
    const tap = new SampleTap({ measurements: () => stream }, silent);
    const app = createMonitorApp({ logger: false });
    registerMonitorRoutes(app, { tap, stats: () => STATS });
    const done = tap.start();

    const health = await app.inject({ method: "GET", url: "/api/health" });
    assert.equal(health.statusCode, 200);
    assert.deepStrictEqual(health.json(), { ok: true, samples: 0 });
    assert.equal(health.headers["access-control-allow-origin"], "*");

    const none = await app.inject({ method: "GET", url: "/api/samples/latest" });
    assert.equal(none.statusCode, 404);
    assert.deepStrictEqual(none.json(), { ok: false, error: "no sample received yet" });

    for (let i = 1; i <= 60; i++) queue.push({ status: "accepted", sample: sampleAt(i * 1_000, i) });
    await settle();

    const latest = await app.inject({ method: "GET", url: "/api/samples/latest" });
    assert.equal(latest.statusCode, 200);
    assert.deepStrictEqual(latest.json(), {
      ok: true,
      sample: {
        ts: 60_000,
        iso: "1970-01-01T00:01:00.000Z",
        x: 60,
        y: 0,
        z: -1,
        source: { address: "192.0.2.10", port: 40000, family: "IPv4" },
      },
    });

    const byDefault = await app.inject({ method: "GET", url: "/api/samples/recent" });
    const defaultXs = byDefault.json().samples.map((s: { x: number }) => s.x);
    assert.equal(defaultXs.length, 50);
    assert.equal(defaultXs[0], 11);
    assert.equal(defaultXs[49], 60);

    const three = await app.inject({ method: "GET", url: "/api/samples/recent?limit=3" });
    assert.deepStrictEqual(three.json().samples.map((s: { x: number }) => s.x), [58, 59, 60]);

    const clamped = await app.inject({ method: "GET", url: "/api/samples/recent?limit=0" });
    assert.equal(clamped.json().samples.length, 1);

    const bad = await app.inject({ method: "GET", url: "/api/samples/recent?limit=abc" });
    assert.equal(bad.statusCode, 400);
    assert.deepStrictEqual(bad.json(), { ok: false, error: "invalid limit" });

    const stats = await app.inject({ method: "GET", url: "/api/receiver/stats" });
    assert.deepStrictEqual(stats.json(), { ok: true, stats: STATS, tap_rejected: 0 });

    const preflight = await app.inject({ method: "OPTIONS", url: "/api/health" });
    assert.equal(preflight.statusCode, 204);

    queue.close();
    await done;
    await app.close();
  });

  await check("tap rethrows errors that are not datagram errors", async () => {
    const boom = new Error("stream broke");
    const tap = new SampleTap(
      {
        measurements: () => ({
          next: async () => {
            throw boom;
          },
        }),
      },
      silent
    );
    await assert.rejects(tap.start(), (err) => err === boom);
  });

  console.log("monitor tests ok");
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
