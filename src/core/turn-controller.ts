/**
 * Cancellation scope for one orchestrator turn. A fresh controller is created
 * per turn so that a cancel never leaks into the next one.
 */
export class TurnController {
  private readonly abortController = new AbortController();

  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  get isCancelled(): boolean {
    return this.abortController.signal.aborted;
  }

  cancel(reason = 'cancelled by user'): void {
    if (this.isCancelled) return;
    this.abortController.abort(reason);
  }
}

/**
 * Rejects as soon as `signal` aborts, even when `promise` ignores the signal.
 * The abort reason is passed through unchanged.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) onAbort();
    else signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (v) => {
        signal.removeEventListener('abort', onAbort);
        resolve(v);
      },
      (e: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(e);
      }
    );
  });
}
