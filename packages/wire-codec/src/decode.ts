import {
  HEADER_BYTES,
  MEASUREMENT_BODY_BYTES,
  MESSAGE_TYPES_V1,
  viewOf,
  type DecodedFrameV1,
  type FrameHeaderV1,
  type MeasurementPayloadV1,
} from "./frame_v1";
import { FramingError, InvalidTimeError, UnsupportedMessageError } from "./errors";

/**
 * Split the outer header from the body.
 *
 * Throws FramingError(TRUNCATED) when fewer than HEADER_BYTES are present, or
 * when the body length disagrees with declared_size in either direction.
 */
export function decodeHeader(bytes: Uint8Array): FrameHeaderV1 {
  if (bytes.byteLength < HEADER_BYTES) {
    throw new FramingError("TRUNCATED", bytes.byteLength, HEADER_BYTES, bytes);
  }
  const view = viewOf(bytes);
  const messageType = view.getUint16(0, false);
  const declaredSize = view.getUint16(2, false);
  const body = bytes.subarray(HEADER_BYTES);
  if (body.byteLength !== declaredSize) {
    throw new FramingError("TRUNCATED", body.byteLength, declaredSize, bytes);
  }
  return { messageType, declaredSize, body };
}

/** Throws InvalidTimeError for a NaN or infinite relative time. */
export function decodeMeasurement(body: Uint8Array): MeasurementPayloadV1 {
  if (body.byteLength < MEASUREMENT_BODY_BYTES) {
    throw new FramingError("TRUNCATED", body.byteLength, MEASUREMENT_BODY_BYTES, body);
  }
  if (body.byteLength > MEASUREMENT_BODY_BYTES) {
    // The format has no extension mechanism; surplus means version skew or corruption.
    throw new FramingError("TRAILING_DATA", body.byteLength, MEASUREMENT_BODY_BYTES, body.subarray(MEASUREMENT_BODY_BYTES));
  }
  const view = viewOf(body);
  const relativeTime = view.getFloat32(0, false);
  if (!Number.isFinite(relativeTime)) throw new InvalidTimeError(relativeTime);
  return {
    relativeTime,
    x: view.getFloat64(4, false),
    y: view.getFloat64(12, false),
    z: view.getFloat64(20, false),
  };
}

/**
 * Decode one whole datagram. Only measurements produce a value; announce and
 * unknown types throw UnsupportedMessageError.
 */
export function decodeFrame(bytes: Uint8Array): DecodedFrameV1 {
  const { messageType, body } = decodeHeader(bytes);
  if (messageType === MESSAGE_TYPES_V1.MEASUREMENT) {
    return { kind: "measurement", messageType: MESSAGE_TYPES_V1.MEASUREMENT, measurement: decodeMeasurement(body) };
  }
  throw new UnsupportedMessageError(messageType);
}
