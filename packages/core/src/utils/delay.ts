/**
 * A sleep that can be cut short, so loops blocked on a delay stop promptly on shutdown.
 */
export class InterruptibleDelay {
  private pending: { timer: NodeJS.Timeout; resolve: () => void } | null = null;

  wait(ms: number): Promise<void> {
    this.interrupt();
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.pending = null;
        resolve();
      }, ms);
      this.pending = { timer, resolve };
    });
  }

  interrupt(): void {
    if (this.pending) {
      clearTimeout(this.pending.timer);
      const { resolve } = this.pending;
      this.pending = null;
      resolve();
    }
  }

  isWaiting(): boolean {
    return this.pending !== null;
  }
}
