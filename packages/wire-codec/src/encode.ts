import {
  HEADER_BYTES,
  MAX_DECLARED_SIZE,
  MEASUREMENT_BODY_BYTES,
  MESSAGE_TYPES_V1,
  viewOf,
  type MeasurementPayloadV1,
} from "./frame_v1";

function assertU16(v: number, name: string): void {
  if (!Number.isInteger(v) || v < 0 || v > MAX_DECLARED_SIZE) {
    throw new RangeError(`${name} must be an integer in [0, ${MAX_DECLARED_SIZE}] (got ${v})`);
  }
}

export function encodeHeader(messageType: number, declaredSize: number): Uint8Array {
  assertU16(messageType, "messageType");
  assertU16(declaredSize, "declaredSize");
  const out = new Uint8Array(HEADER_BYTES);
  const view = viewOf(out);
  view.setUint16(0, messageType, false);
  view.setUint16(2, declaredSize, false);
  return out;
}

/** relativeTime is narrowed to float32 on the wire. */
export function encodeMeasurement(m: MeasurementPayloadV1): Uint8Array {
  const out = new Uint8Array(MEASUREMENT_BODY_BYTES);
  const view = viewOf(out);
  view.setFloat32(0, m.relativeTime, false);
  view.setFloat64(4, m.x, false);
  view.setFloat64(12, m.y, false);
  view.setFloat64(20, m.z, false);
  return out;
}

export function encodeFrame(messageType: number, body: Uint8Array): Uint8Array {
  const header = encodeHeader(messageType, body.byteLength);
  const out = new Uint8Array(HEADER_BYTES + body.byteLength);
  out.set(header, 0);
  out.set(body, HEADER_BYTES);
  return out;
}

export function encodeMeasurementFrame(m: MeasurementPayloadV1): Uint8Array {
  return encodeFrame(MESSAGE_TYPES_V1.MEASUREMENT, encodeMeasurement(m));
}
