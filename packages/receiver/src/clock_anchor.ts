import type { ClockAnchorV1 } from "@seismolink/contracts";
import { InvalidTimeError } from "@seismolink/wire-codec";

/** Largest |unix ms| a Date can hold. */
export const MAX_DATE_MS = 8.64e15;

/**
 * Maps sensor-relative time (seconds, arbitrary epoch) onto the local wall
 * clock (unix ms).
 *
 * The anchor is taken once, from the first sample converted. Every later
 * sample is offset from it: abs = wall_0 + (t - t_0). Offsets are rounded to
 * whole microseconds. A sensor clock that wraps or restarts is not corrected.
 *
 * A time that is not finite, or lands outside the Date range, throws
 * InvalidTimeError and leaves the anchor as it was.
 */
export class ClockAnchor {
  private anchor: ClockAnchorV1 | null = null;

  constructor(private readonly now: () => number = Date.now) {}

  get isSet(): boolean {
    return this.anchor !== null;
  }

  toAbsolute(sensorTime: number): number {
    if (!Number.isFinite(sensorTime)) throw new InvalidTimeError(sensorTime);
    const anchor = this.anchor ?? { wall_ts: this.now(), sensor_time: sensorTime };
    const offsetMs = Math.round((sensorTime - anchor.sensor_time) * 1e6) / 1000;
    const abs = anchor.wall_ts + offsetMs;
    if (!(Math.abs(abs) <= MAX_DATE_MS)) throw new InvalidTimeError(sensorTime);
    this.anchor = anchor;
    return abs;
  }

  snapshot(): ClockAnchorV1 | null {
    return this.anchor ? { ...this.anchor } : null;
  }
}
