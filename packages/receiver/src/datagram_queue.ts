import { ReceiveAbortedError } from "./errors";

type Waiter<T> = (item: T | null) => void;

/**
 * Bridges dgram's push-style 'message' events to pull-style reads.
 *
 * next() resolves with the oldest queued item, or waits for the next push.
 * It resolves null once the queue is closed. Items pushed while `maxPending`
 * are already queued are dropped and counted in `overflowed`.
 */
export class DatagramQueue<T extends object> {
  private items: T[] = [];
  private waiters: Waiter<T>[] = [];
  private closed = false;
  overflowed = 0;

  constructor(private readonly maxPending: number) {}

  get pending(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  push(item: T): boolean {
    if (this.closed) return false;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return true;
    }
    if (this.items.length >= this.maxPending) {
      this.overflowed++;
      return false;
    }
    this.items.push(item);
    return true;
  }

  next(signal?: AbortSignal): Promise<T | null> {
    if (signal?.aborted) return Promise.reject(new ReceiveAbortedError());
    const head = this.items.shift();
    if (head !== undefined) return Promise.resolve(head);
    if (this.closed) return Promise.resolve(null);

    return new Promise<T | null>((resolve, reject) => {
      const onAbort = (): void => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        reject(new ReceiveAbortedError());
      };
      const waiter: Waiter<T> = (item) => {
        signal?.removeEventListener("abort", onAbort);
        resolve(item);
      };
      this.waiters.push(waiter);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.items = [];
    const waiters = this.waiters;
    this.waiters = [];
    for (const w of waiters) w(null);
  }
}
