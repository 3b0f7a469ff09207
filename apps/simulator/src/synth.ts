// Synthetic measurement payloads: gravity (1 g) slowly rotating in the Y/Z
// plane, plus a small deterministic wobble on X.

import type { MeasurementPayloadV1 } from "@seismolink/wire-codec";

export type SynthOptions = {
  /** Samples per second. */
  rate: number;
  /** Sensor-relative time of the first sample, seconds. */
  startTime?: number;
  /** Seconds for one full rotation of the gravity vector. */
  period?: number;
};

export function synthPayload(index: number, opts: SynthOptions): MeasurementPayloadV1 {
  const relativeTime = (opts.startTime ?? 0) + index / opts.rate;
  const phase = (2 * Math.PI * relativeTime) / (opts.period ?? 60);
  return {
    relativeTime,
    x: 0.01 * Math.sin(7 * phase),
    y: Math.sin(phase),
    z: -Math.cos(phase),
  };
}

export function* synthPayloads(count: number, opts: SynthOptions): Generator<MeasurementPayloadV1> {
  for (let i = 0; i < count; i++) yield synthPayload(i, opts);
}
