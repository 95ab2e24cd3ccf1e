export interface Throttle {
  /** Waits out the inter-request delay. Resolves early once `signal` aborts. */
  pause(): Promise<void>;
}

export class DelayThrottle implements Throttle {
  private readonly delayMs: number;
  private readonly signal?: AbortSignal;

  constructor(delayMs: number, signal?: AbortSignal) {
    this.delayMs = Math.max(0, delayMs);
    this.signal = signal;
  }

  pause(): Promise<void> {
    const signal = this.signal;
    if (this.delayMs === 0 || signal?.aborted) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      const onAbort = (): void => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, this.delayMs);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}
