// seismolink/packages/sample/src/sample.ts
//
// One decoded accelerometer reading. Instances are frozen; every operation
// returns a new Sample carrying the timestamp and source of the left operand.

import type { SampleV1 } from "@seismolink/contracts";
import { isAxisTriple, type AxisTriple, type AxisValues } from "./axis_triple";

/** Sending peer of a datagram (shape of dgram's RemoteInfo without `size`). */
export type SampleSource = {
  readonly address: string;
  readonly port: number;
  readonly family: string;
};

function signed6(v: number): string {
  return `${v >= 0 ? "+" : ""}${v.toFixed(6)}`;
}

export class Sample implements AxisTriple {
  readonly source: SampleSource | null;

  /**
   * @param timestamp - absolute time, unix ms (fractional part allowed)
   * @param x - axis readings, nominally in g
   */
  constructor(
    readonly timestamp: number,
    readonly x: number,
    readonly y: number,
    readonly z: number,
    source: SampleSource | null = null
  ) {
    this.source = source ? Object.freeze({ address: source.address, port: source.port, family: source.family }) : null;
    Object.freeze(this);
  }

  get values(): AxisValues {
    return [this.x, this.y, this.z];
  }

  get date(): Date {
    return new Date(this.timestamp);
  }

  /** Copy with new axes; timestamp and source are kept. */
  withAxes(x: number, y: number, z: number): Sample {
    return new Sample(this.timestamp, x, y, z, this.source);
  }

  add(o: AxisTriple): Sample {
    return this.withAxes(this.x + o.x, this.y + o.y, this.z + o.z);
  }

  sub(o: AxisTriple): Sample {
    return this.withAxes(this.x - o.x, this.y - o.y, this.z - o.z);
  }

  /** Like add(), for operands of unknown shape; null when the operand lacks x/y/z. */
  tryAdd(o: unknown): Sample | null {
    return isAxisTriple(o) ? this.add(o) : null;
  }

  trySub(o: unknown): Sample | null {
    return isAxisTriple(o) ? this.sub(o) : null;
  }

  mul(n: number): Sample {
    return this.withAxes(this.x * n, this.y * n, this.z * n);
  }

  div(n: number): Sample {
    return this.withAxes(this.x / n, this.y / n, this.z / n);
  }

  neg(): Sample {
    return this.withAxes(-this.x, -this.y, -this.z);
  }

  plus(): Sample {
    return this.withAxes(+this.x, +this.y, +this.z);
  }

  abs(): Sample {
    return this.withAxes(Math.abs(this.x), Math.abs(this.y), Math.abs(this.z));
  }

  // 32-bit integer complement; fractional parts are discarded first.
  invert(): Sample {
    return this.withAxes(~this.x, ~this.y, ~this.z);
  }

  toString(): string {
    let r = `<Sample at ${this.date.toISOString()}`;
    if (this.source) r += ` from ${this.source.address}:${this.source.port}`;
    return `${r}: (${signed6(this.x)}, ${signed6(this.y)}, ${signed6(this.z)})>`;
  }

  toJSON(): SampleV1 {
    return {
      ts: this.timestamp,
      iso: this.date.toISOString(),
      x: this.x,
      y: this.y,
      z: this.z,
      source: this.source ? { ...this.source } : null,
    };
  }
}
