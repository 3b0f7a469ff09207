// Rough device pose from a gravity reading, smoothed with a running median.

import type { AxisTriple } from "@seismolink/sample";

export const DEFAULT_BACKLOG = 20;

function median(values: number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

/** Per-axis median over the last `backlog` readings. */
export class MedianWindow {
  private readonly recent: AxisTriple[] = [];

  constructor(private readonly backlog: number = DEFAULT_BACKLOG) {
    if (!Number.isInteger(backlog) || backlog < 1) throw new RangeError(`backlog must be a positive integer (got ${backlog})`);
  }

  get size(): number {
    return this.recent.length;
  }

  push(t: AxisTriple): AxisTriple {
    this.recent.push({ x: t.x, y: t.y, z: t.z });
    while (this.recent.length > this.backlog) this.recent.shift();
    return {
      x: median(this.recent.map((r) => r.x)),
      y: median(this.recent.map((r) => r.y)),
      z: median(this.recent.map((r) => r.z)),
    };
  }
}

/**
 * Z decides which way the display faces, X and Y which side is down.
 * Thresholds are in g.
 */
export function describeOrientation(t: AxisTriple): string {
  const parts: string[] = [];

  if (t.z > 0.8) parts.push("flat, display down");
  else if (t.z > 0.3) parts.push("tilted, display down");
  else if (t.z < -0.8) parts.push("flat, display up");
  else if (t.z < -0.3) parts.push("tilted, display up");

  const xyTilt = (Math.abs(t.x) + Math.abs(t.y)) / 2;
  if (xyTilt <= 0.2) parts.push("lying down");
  else if (t.y < -0.8) parts.push("standing");
  else if (t.y > 0.8) parts.push("standing upside down");
  else if (t.x < -0.8) parts.push("lying on left side");
  else if (t.x > 0.8) parts.push("lying on right side");

  return parts.join(", ");
}
