/**
 * Cooperative cancellation for the worker loop.
 *
 * A single flag, set by a signal or by requestShutdown(). The loop checks it
 * at the top of every cycle and between sleep slices; a pending sleep wakes
 * as soon as the flag is set.
 */

/**
 * Longest single sleep slice between cancellation checks.
 */
export const MAX_SLEEP_SLICE_MS = 1000;

export const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

export class ShutdownController {
  private requested = false;
  private wake: (() => void) | null = null;

  get isRequested(): boolean {
    return this.requested;
  }

  request(): void {
    this.requested = true;
    if (this.wake) {
      this.wake();
    }
  }

  /**
   * Sleeps up to `ms`, in slices of at most MAX_SLEEP_SLICE_MS, returning early
   * once shutdown is requested.
   */
  async sleep(ms: number): Promise<void> {
    const deadline = Date.now() + ms;
    while (!this.requested) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        return;
      }
      await this.sleepSlice(Math.min(MAX_SLEEP_SLICE_MS, remaining));
    }
  }

  private sleepSlice(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const done = (): void => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
      const timer = setTimeout(done, ms);
      this.wake = done;
    });
  }

  /**
   * Routes SIGINT/SIGTERM to request(). Returns a function that removes the
   * handlers again.
   */
  installSignalHandlers(onSignal: (signal: NodeJS.Signals) => void): () => void {
    const handler = (signal: NodeJS.Signals): void => {
      onSignal(signal);
      this.request();
    };
    for (const signal of SHUTDOWN_SIGNALS) {
      process.on(signal, handler);
    }
    return () => {
      for (const signal of SHUTDOWN_SIGNALS) {
        process.removeListener(signal, handler);
      }
    };
  }
}
