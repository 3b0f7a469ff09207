/**
 * The datagram socket could not be bound. Fatal: the receiver is unusable.
 */
export class BindError extends Error {
  /** OS-level code of the cause, e.g. EADDRINUSE or EACCES. */
  readonly osCode: string | undefined;

  constructor(
    readonly address: string,
    readonly port: number,
    readonly cause: Error
  ) {
    super(`cannot bind datagram socket to ${address}:${port}: ${cause.message}`);
    this.name = "BindError";
    this.osCode = "code" in cause && typeof cause.code === "string" ? cause.code : undefined;
  }
}

/** A pending receive was cancelled through its AbortSignal. No datagram was consumed. */
export class ReceiveAbortedError extends Error {
  constructor() {
    super("receive aborted");
    this.name = "ReceiveAbortedError";
  }
}

export class StreamAlreadyTakenError extends Error {
  constructor() {
    super("measurements() can be taken once per receiver");
    this.name = "StreamAlreadyTakenError";
  }
}
