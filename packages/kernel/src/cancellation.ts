/**
 * Write-once stop flag shared between the controller and whoever drives it
 * (a signal handler, a UI). The controller reads it at step and game
 * boundaries; pacing delays listen to its signal.
 */
export class CancellationToken {
  private controller = new AbortController();
  private cancelReason: string | undefined;

  cancel(reason = "cancelled"): void {
    if (this.controller.signal.aborted) return;
    this.cancelReason = reason;
    this.controller.abort(reason);
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  get reason(): string | undefined {
    return this.cancelReason;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Resolves after `ms`, or as soon as the signal aborts. Never rejects. */
export const sleep: SleepFn = (ms, signal) => {
  if (ms <= 0 || signal?.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
};
