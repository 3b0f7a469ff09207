import { messageTypeName } from "./frame_v1";

export type DatagramErrorCode = "TRUNCATED" | "TRAILING_DATA" | "UNSUPPORTED" | "INVALID_TIME";

/**
 * Base class for failures that concern a single datagram.
 * The receiver stays usable after any of these.
 */
export abstract class DatagramError extends Error {
  abstract readonly code: DatagramErrorCode;
}

export type FramingErrorKind = "TRUNCATED" | "TRAILING_DATA";

/**
 * The byte count on the wire disagrees with what the format requires.
 *
 * - TRUNCATED: `numGot` bytes present where `numWant` were declared or required.
 *   `data` is the offending bytes.
 * - TRAILING_DATA: the fixed-width fields consumed `numWant` bytes but `numGot`
 *   were present. `data` is the surplus.
 */
export class FramingError extends DatagramError {
  readonly code: FramingErrorKind;

  constructor(
    kind: FramingErrorKind,
    readonly numGot: number,
    readonly numWant: number,
    readonly data: Uint8Array
  ) {
    super(
      kind === "TRUNCATED"
        ? `wanted ${numWant} bytes, got ${numGot}`
        : `got ${numGot - numWant} bytes of excess data after ${numWant} bytes`
    );
    this.name = "FramingError";
    this.code = kind;
  }
}

export class UnsupportedMessageError extends DatagramError {
  readonly code = "UNSUPPORTED" as const;

  constructor(readonly messageType: number) {
    super(`unsupported message type ${messageTypeName(messageType)}`);
    this.name = "UnsupportedMessageError";
  }
}

/**
 * The sensor time cannot be placed on the wall clock: it is NaN or infinite,
 * or its offset from the clock anchor leaves the range of a Date.
 */
export class InvalidTimeError extends DatagramError {
  readonly code = "INVALID_TIME" as const;

  constructor(readonly relativeTime: number) {
    super(`sensor time ${relativeTime} cannot be mapped to a wall-clock time`);
    this.name = "InvalidTimeError";
  }
}

export function isDatagramError(err: unknown): err is DatagramError {
  return err instanceof DatagramError;
}
