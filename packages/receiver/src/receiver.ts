// seismolink/packages/receiver/src/receiver.ts
//
// Datagram -> decode -> clock anchor -> backward-drop filter -> Sample.
//
// One receiver owns one socket, one clock anchor and one ordering state.
// Callers sharing a receiver must serialize their receiveOne() calls.

import type { AddressInfo } from "node:net";

import {
  parseReceiverConfigV1,
  type ReceiverConfigV1,
  type ReceiverConfigV1Input,
  type ReceiverStatsV1,
  type RejectCountsV1,
} from "@seismolink/contracts";
import { Sample, type SampleSource } from "@seismolink/sample";
import { decodeFrame, isDatagramError, type DatagramError, type MeasurementPayloadV1 } from "@seismolink/wire-codec";

import { ClockAnchor } from "./clock_anchor";
import { DatagramQueue } from "./datagram_queue";
import { createUdpSocket, type CreateSocket, type DatagramSocket, type RemoteInfo } from "./datagram_socket";
import { BindError, StreamAlreadyTakenError } from "./errors";
import { createLogger, type ReceiverLogger } from "./logger";
import { MeasurementStream } from "./measurement_stream";
import { OrderingFilter } from "./ordering_filter";

export type ReceiveResult =
  | { status: "accepted"; sample: Sample }
  | { status: "suppressed"; timestamp: number; lastAcceptedTs: number }
  | { status: "rejected"; error: DatagramError }
  | { status: "closed" };

export type ReceiveOptions = {
  signal?: AbortSignal;
};

export type ReceiverDeps = {
  createSocket?: CreateSocket;
  /** Wall clock, unix ms. */
  now?: () => number;
  logger?: ReceiverLogger;
};

type Datagram = {
  bytes: Uint8Array;
  peer: SampleSource;
};

export class SeismometerReceiver {
  private readonly queue: DatagramQueue<Datagram>;
  private readonly anchor: ClockAnchor;
  private readonly ordering: OrderingFilter;
  private readonly log: ReceiverLogger;

  private received = 0;
  private accepted = 0;
  private suppressed = 0;
  private readonly rejected: RejectCountsV1 = { TRUNCATED: 0, TRAILING_DATA: 0, UNSUPPORTED: 0, INVALID_TIME: 0 };
  private streamTaken = false;
  private socketClosed = false;
  private closing: Promise<void> | null = null;

  private constructor(
    readonly config: ReceiverConfigV1,
    private readonly socket: DatagramSocket,
    deps: ReceiverDeps
  ) {
    this.queue = new DatagramQueue<Datagram>(config.max_pending);
    this.anchor = new ClockAnchor(deps.now);
    this.ordering = new OrderingFilter(config.drop_on_backward);
    this.log = deps.logger ?? createLogger("receiver");

    socket.on("message", (msg, rinfo) => this.enqueue(msg, rinfo));
    socket.on("close", () => {
      this.socketClosed = true;
      this.queue.close();
    });
  }

  /**
   * Create the socket and bind it. Resolves once the socket is listening;
   * rejects with BindError when the OS refuses the address.
   */
  static async open(input: ReceiverConfigV1Input = {}, deps: ReceiverDeps = {}): Promise<SeismometerReceiver> {
    const config = parseReceiverConfigV1(input);
    const socket = (deps.createSocket ?? createUdpSocket)(config.ipv6 ? "udp6" : "udp4");
    const receiver = new SeismometerReceiver(config, socket, deps);
    try {
      await receiver.bind();
    } catch (err) {
      await receiver.close();
      throw err;
    }
    return receiver;
  }

  private bind(): Promise<void> {
    const { bind: address, port } = this.config;
    return new Promise<void>((resolve, reject) => {
      const onBindError = (err: Error): void => {
        reject(new BindError(address, port, err));
      };
      this.socket.once("error", onBindError);
      this.socket.once("listening", () => {
        this.socket.removeListener("error", onBindError);
        this.socket.on("error", (err) => this.onSocketError(err));
        const bound = this.socket.address();
        this.log.info({ address: bound.address, port: bound.port, family: bound.family }, "receiver listening");
        resolve();
      });
      this.socket.bind(port, address);
    });
  }

  private onSocketError(err: Error): void {
    this.log.error({ err }, "datagram socket failed; closing receiver");
    this.close().catch((closeErr: unknown) => {
      this.log.error({ err: closeErr }, "closing receiver after socket error failed");
    });
  }

  private enqueue(msg: Uint8Array, rinfo: RemoteInfo): void {
    // A fixed-size read cuts longer datagrams; the framing check then rejects them.
    const limit = this.config.recv_buffer_bytes;
    const bytes = msg.byteLength > limit ? msg.subarray(0, limit) : msg;
    const peer: SampleSource = { address: rinfo.address, port: rinfo.port, family: rinfo.family };
    if (!this.queue.push({ bytes, peer }) && !this.queue.isClosed) {
      this.log.debug({ peer, overflowed: this.queue.overflowed }, "receive queue full; datagram dropped");
    }
  }

  /**
   * Wait for one datagram and run it through the pipeline.
   *
   * Resolves `closed` once the receiver is closed. Rejects with
   * ReceiveAbortedError when `signal` fires first.
   */
  async receiveOne(opts: ReceiveOptions = {}): Promise<ReceiveResult> {
    const datagram = await this.queue.next(opts.signal);
    if (!datagram) return { status: "closed" };
    return this.handleDatagram(datagram.bytes, datagram.peer);
  }

  /**
   * Decode, anchor and filter one datagram.
   *
   * Framing, unsupported-type and invalid-time errors come back as
   * `rejected` and touch neither the clock anchor nor the ordering state.
   */
  handleDatagram(bytes: Uint8Array, peer: SampleSource | null = null): ReceiveResult {
    this.received++;

    let measurement: MeasurementPayloadV1;
    let timestamp: number;
    try {
      measurement = decodeFrame(bytes).measurement;
      timestamp = this.anchor.toAbsolute(measurement.relativeTime);
    } catch (err) {
      if (!isDatagramError(err)) throw err;
      this.rejected[err.code]++;
      this.log.debug({ code: err.code, peer, reason: err.message }, "datagram rejected");
      return { status: "rejected", error: err };
    }

    const { x, y, z } = measurement;
    const admit = this.ordering.admit(timestamp);
    if (!admit.admitted) {
      this.suppressed++;
      return { status: "suppressed", timestamp, lastAcceptedTs: admit.lastAcceptedTs };
    }

    this.accepted++;
    return { status: "accepted", sample: new Sample(timestamp, x, y, z, peer) };
  }

  /** The stream of accepted samples. Available once per receiver. */
  measurements(): MeasurementStream {
    if (this.streamTaken) throw new StreamAlreadyTakenError();
    this.streamTaken = true;
    return new MeasurementStream(this);
  }

  stats(): ReceiverStatsV1 {
    return {
      received: this.received,
      accepted: this.accepted,
      suppressed: this.suppressed,
      rejected: { ...this.rejected },
      overflowed: this.queue.overflowed,
      anchor: this.anchor.snapshot(),
      last_accepted_ts: this.ordering.lastAcceptedTs,
    };
  }

  address(): AddressInfo {
    return this.socket.address();
  }

  get isClosed(): boolean {
    return this.queue.isClosed;
  }

  /** Close the socket. Pending and later receives resolve `closed`. */
  close(): Promise<void> {
    if (this.closing) return this.closing;
    this.queue.close();
    this.closing = this.socketClosed
      ? Promise.resolve()
      : new Promise<void>((resolve) => {
          this.socket.close(() => resolve());
        });
    return this.closing;
  }
}
