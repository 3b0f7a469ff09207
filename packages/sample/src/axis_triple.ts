/**
 * Anything exposing three numeric axes can take part in componentwise arithmetic.
 */
export interface AxisTriple {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

export type AxisValues = readonly [x: number, y: number, z: number];

function isObj(x: unknown): x is Record<string, unknown> {
  return !!x && typeof x === "object";
}

/** Runtime capability check for values whose shape is not known statically. */
export function isAxisTriple(v: unknown): v is AxisTriple {
  return isObj(v) && typeof v.x === "number" && typeof v.y === "number" && typeof v.z === "number";
}
