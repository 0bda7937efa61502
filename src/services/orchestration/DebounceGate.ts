/**
 * Debounce Gate: coalesces bursts of edits into one fire per quiet period.
 *
 * Holds a single pending timer. schedule() resets it and replaces the pending
 * item; the replaced item never fires. fireNow() skips the wait for explicit
 * intent such as a mode switch.
 */
export class DebounceGate<T> {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private pendingItem: T | null = null;

  constructor(
    private readonly quietMs: number,
    private readonly onFire: (item: T) => void
  ) {}

  get pending(): T | null {
    return this.pendingItem;
  }

  schedule(item: T): void {
    this.clearTimer();
    this.pendingItem = item;
    this.timer = setTimeout(() => {
      this.timer = null;
      const fired = this.pendingItem;
      this.pendingItem = null;
      if (fired !== null) {
        this.onFire(fired);
      }
    }, this.quietMs);
  }

  fireNow(item: T): void {
    this.cancel();
    this.onFire(item);
  }

  cancel(): void {
    this.clearTimer();
    this.pendingItem = null;
  }

  private clearTimer(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
