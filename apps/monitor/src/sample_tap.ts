// Background consumer that keeps the latest sample and a bounded history.

import type { ReceiverLogger } from "@seismolink/receiver";
import type { Sample } from "@seismolink/sample";
import { isDatagramError } from "@seismolink/wire-codec";

export const DEFAULT_HISTORY = 500;

/** What the tap needs from a receiver. */
export interface TapSource {
  measurements(): AsyncIterator<Sample, undefined>;
}

export class SampleTap {
  private readonly history: Sample[] = [];
  private latest: Sample | null = null;
  private rejectedSeen = 0;
  private running: Promise<void> | null = null;

  constructor(
    private readonly source: TapSource,
    private readonly log: ReceiverLogger,
    readonly capacity: number = DEFAULT_HISTORY
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) throw new RangeError(`capacity must be a positive integer (got ${capacity})`);
  }

  /** Start pumping. The promise settles when the stream ends or fails. */
  start(): Promise<void> {
    if (!this.running) this.running = this.pump();
    return this.running;
  }

  private async pump(): Promise<void> {
    const stream = this.source.measurements();
    for (;;) {
      let r: IteratorResult<Sample, undefined>;
      try {
        r = await stream.next();
      } catch (err) {
        if (!isDatagramError(err)) throw err;
        this.rejectedSeen++;
        this.log.warn({ code: err.code }, err.message);
        continue;
      }
      if (r.done) {
        this.log.info({ samples: this.history.length }, "measurement stream ended");
        return;
      }
      this.record(r.value);
    }
  }

  private record(s: Sample): void {
    this.latest = s;
    this.history.push(s);
    if (this.history.length > this.capacity) this.history.shift();
  }

  get latestSample(): Sample | null {
    return this.latest;
  }

  get rejected(): number {
    return this.rejectedSeen;
  }

  get size(): number {
    return this.history.length;
  }

  /** Up to `limit` most recent samples, oldest first. */
  recent(limit: number): Sample[] {
    return this.history.slice(Math.max(0, this.history.length - limit));
  }
}
