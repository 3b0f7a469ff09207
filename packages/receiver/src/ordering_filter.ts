export type AdmitResult = { admitted: true } | { admitted: false; lastAcceptedTs: number };

/**
 * Backward-drop policy over absolute timestamps.
 *
 * With dropOnBackward, a timestamp strictly earlier than the last accepted one
 * is refused and leaves the state untouched. Equal timestamps are admitted.
 */
export class OrderingFilter {
  private last: number | null = null;

  constructor(readonly dropOnBackward: boolean) {}

  get lastAcceptedTs(): number | null {
    return this.last;
  }

  admit(ts: number): AdmitResult {
    if (this.dropOnBackward && this.last !== null && ts < this.last) {
      return { admitted: false, lastAcceptedTs: this.last };
    }
    this.last = ts;
    return { admitted: true };
  }
}
