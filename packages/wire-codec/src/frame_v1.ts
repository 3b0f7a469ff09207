// seismolink/packages/wire-codec/src/frame_v1.ts
//
// Datagram layout (network byte order, no padding):
//
//   outer frame  : message_type u16 | declared_size u16 | body[declared_size]
//   measurement  : relative_time f32 | x f64 | y f64 | z f64   (28 bytes)

/**
 * Message types are bit-flag style values; a datagram carries exactly one.
 */
export const MESSAGE_TYPES_V1 = Object.freeze({
  // Reserved. Payload is undefined and decoding is intentionally not implemented.
  ANNOUNCE: 1 << 0,
  MEASUREMENT: 1 << 1,
} as const);

export type MessageTypeV1 = (typeof MESSAGE_TYPES_V1)[keyof typeof MESSAGE_TYPES_V1];

export const HEADER_BYTES = 4;

export const MEASUREMENT_BODY_BYTES = 4 + 8 + 8 + 8;

/** Largest body a u16 size field can declare. */
export const MAX_DECLARED_SIZE = 0xffff;

export type FrameHeaderV1 = {
  messageType: number;
  declaredSize: number;
  body: Uint8Array;
};

/** Decoded measurement payload. `relativeTime` is in sensor seconds, arbitrary epoch. */
export type MeasurementPayloadV1 = {
  relativeTime: number;
  x: number;
  y: number;
  z: number;
};

export type DecodedFrameV1 = {
  kind: "measurement";
  messageType: typeof MESSAGE_TYPES_V1.MEASUREMENT;
  measurement: MeasurementPayloadV1;
};

export function messageTypeName(messageType: number): string {
  if (messageType === MESSAGE_TYPES_V1.ANNOUNCE) return "announce";
  if (messageType === MESSAGE_TYPES_V1.MEASUREMENT) return "measurement";
  return `unknown(${messageType})`;
}

// DataView over exactly the bytes of `bytes`, honouring Buffer pool offsets.
export function viewOf(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}
