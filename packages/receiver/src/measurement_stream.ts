import type { Sample } from "@seismolink/sample";
import type { ReceiveResult } from "./receiver";

export interface ReceiveOneSource {
  receiveOne(): Promise<ReceiveResult>;
}

/**
 * Unbounded, consumable-once sequence of accepted samples.
 *
 * - suppressed datagrams are skipped silently
 * - a rejected datagram makes next() reject with its DatagramError; the stream
 *   is still live and the following next() keeps reading
 * - done once the receiver is closed or return() was called; a next() already
 *   waiting when return() is called resolves done as well
 *
 * `for await` stops at the first rejection, so consumers that want to keep
 * going after bad datagrams call next() themselves.
 */
export class MeasurementStream implements AsyncIterableIterator<Sample> {
  private finished = false;

  constructor(private readonly source: ReceiveOneSource) {}

  get isDone(): boolean {
    return this.finished;
  }

  async next(): Promise<IteratorResult<Sample, undefined>> {
    while (!this.finished) {
      const r = await this.source.receiveOne();
      if (this.finished) break;
      switch (r.status) {
        case "accepted":
          return { done: false, value: r.sample };
        case "suppressed":
          continue;
        case "rejected":
          throw r.error;
        case "closed":
          this.finished = true;
          break;
      }
    }
    return { done: true, value: undefined };
  }

  async return(): Promise<IteratorResult<Sample, undefined>> {
    this.finished = true;
    return { done: true, value: undefined };
  }

  [Symbol.asyncIterator](): this {
    return this;
  }
}
