export type WakeReason = 'notified' | 'timeout';

interface Waiter {
  resolve: (reason: WakeReason) => void;
  timeoutHandle: NodeJS.Timeout | undefined;
}

/**
 * Promise-based wake-up shared between a producer and one consuming loop.
 * A notify with no waiter is latched and consumed by the next wait.
 */
export class WakeSignal {
  private waiters: Waiter[] = [];
  private latched = false;

  public wait(timeoutMs?: number): Promise<WakeReason> {
    if (this.latched) {
      this.latched = false;
      return Promise.resolve('notified');
    }

    return new Promise<WakeReason>((resolve) => {
      const waiter: Waiter = { resolve, timeoutHandle: undefined };

      if (timeoutMs !== undefined && timeoutMs > 0) {
        waiter.timeoutHandle = setTimeout(() => {
          this.waiters = this.waiters.filter((entry) => entry !== waiter);
          resolve('timeout');
        }, timeoutMs);
      }

      this.waiters.push(waiter);
    });
  }

  public notify(): void {
    if (this.waiters.length === 0) {
      this.latched = true;
      return;
    }

    const waiters = this.waiters;
    this.waiters = [];

    for (const waiter of waiters) {
      if (waiter.timeoutHandle) {
        clearTimeout(waiter.timeoutHandle);
      }

      waiter.resolve('notified');
    }
  }

  public reset(): void {
    this.latched = false;
  }
}
