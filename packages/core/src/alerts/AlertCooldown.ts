/**
 * Suppresses repeats of the same alert key inside a time window.
 * A window of 0 lets everything through.
 */
export class AlertCooldown {
  private windowMs: number;
  private now: () => number;
  private lastSent = new Map<string, number>();

  constructor(windowMs: number, now: () => number = Date.now) {
    this.windowMs = windowMs;
    this.now = now;
  }

  /**
   * Whether an alert for `key` may go out now. Records the send when it may.
   */
  tryAcquire(key: string): boolean {
    if (this.windowMs <= 0) return true;

    const now = this.now();
    const last = this.lastSent.get(key);
    if (last !== undefined && now - last < this.windowMs) {
      return false;
    }

    this.lastSent.set(key, now);
    return true;
  }

  /**
   * Forget `key` once its condition has cleared, so the next incident alerts immediately.
   */
  reset(key: string): void {
    this.lastSent.delete(key);
  }
}
