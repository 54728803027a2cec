/**
 * Cooperative cancellation for one script run.
 *
 * The token is cancelled when the timeout elapses. Tool proxies and the
 * parallel combinator check it when the script suspends; loop checkpoints
 * also compare against the deadline, since a spinning loop starves the timer.
 */

import { ScriptTimeoutError } from "../errors";

export class CancellationToken {
  private readonly controller = new AbortController();
  readonly deadline: number;

  constructor(readonly timeoutMs: number, now: number = Date.now()) {
    this.deadline = now + timeoutMs;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isCancelled(): boolean {
    return this.controller.signal.aborted;
  }

  cancel(reason: Error = new ScriptTimeoutError(this.timeoutMs)): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort(reason);
    }
  }

  throwIfCancelled(): void {
    if (!this.isCancelled && Date.now() >= this.deadline) {
      this.cancel();
    }
    if (this.isCancelled) {
      throw this.reason();
    }
  }

  /**
   * Settle with `promise`, or reject as soon as the token is cancelled.
   * The underlying work is not stopped; its late settlement is dropped.
   */
  race<T>(promise: Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const onAbort = () => reject(this.reason());
      if (this.isCancelled) {
        onAbort();
      } else {
        this.signal.addEventListener("abort", onAbort, { once: true });
      }
      // Handlers stay attached after an abort so a late rejection is observed
      promise.then(
        (value) => {
          this.signal.removeEventListener("abort", onAbort);
          resolve(value);
        },
        (error: unknown) => {
          this.signal.removeEventListener("abort", onAbort);
          reject(error);
        }
      );
    });
  }

  private reason(): Error {
    const reason: unknown = this.signal.reason;
    return reason instanceof Error ? reason : new ScriptTimeoutError(this.timeoutMs);
  }
}
