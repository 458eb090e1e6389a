/**
 * FIFO throttler for data-source calls in batch analysis.
 * Tasks start in submission order with at least `minIntervalMs` between starts;
 * a started task does not hold back the next one beyond that interval.
 */
export class RequestThrottler {
  private lastStart = Number.NEGATIVE_INFINITY;
  private startGate: Promise<void> = Promise.resolve();
  private scheduled = 0;

  constructor(private readonly minIntervalMs: number = 0) {}

  schedule<T>(task: () => Promise<T>): Promise<T> {
    this.scheduled++;
    const started = this.startGate.then(async () => {
      const waitMs = this.minIntervalMs - (Date.now() - this.lastStart);
      if (waitMs > 0) {
        await sleep(waitMs);
      }
      this.lastStart = Date.now();
    });
    this.startGate = started;
    return started.then(task);
  }

  getScheduledCount(): number {
    return this.scheduled;
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
