/**
 * Timeout + cancellation for LLM calls. A deadline aborts the underlying request and
 * turns the abort into a ProviderError ("timeout" or "cancelled").
 */

import { ProviderError } from "../../errors";

type AbortReason = "timeout" | "cancelled";

export class CallDeadline {
  private readonly controller = new AbortController();
  private readonly timer: ReturnType<typeof setTimeout> | undefined;
  private reason: AbortReason | undefined;
  private readonly onParentAbort = (): void => this.abort("cancelled");

  constructor(
    private readonly provider: string,
    private readonly timeoutMs: number,
    private readonly parent?: AbortSignal
  ) {
    if (parent?.aborted) {
      this.abort("cancelled");
    } else {
      parent?.addEventListener("abort", this.onParentAbort, { once: true });
    }
    if (timeoutMs > 0 && !this.reason) {
      this.timer = setTimeout(() => this.abort("timeout"), timeoutMs);
      this.timer.unref?.();
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** The error to surface if the deadline fired; undefined while the call is still allowed to run. */
  abortError(): ProviderError | undefined {
    if (this.reason === "timeout") {
      return new ProviderError("timeout", `${this.provider} call timed out after ${this.timeoutMs}ms`, this.provider);
    }
    if (this.reason === "cancelled") {
      return new ProviderError("cancelled", `${this.provider} call cancelled`, this.provider);
    }
    return undefined;
  }

  /** Rejects once the deadline fires. Only create it when something races against it. */
  whenAborted(): Promise<never> {
    return new Promise<never>((_resolve, reject) => {
      const fire = (): void => {
        const err = this.abortError();
        if (err) reject(err);
      };
      if (this.controller.signal.aborted) {
        fire();
        return;
      }
      this.controller.signal.addEventListener("abort", fire, { once: true });
    });
  }

  dispose(): void {
    if (this.timer) clearTimeout(this.timer);
    this.parent?.removeEventListener("abort", this.onParentAbort);
  }

  private abort(reason: AbortReason): void {
    if (this.reason) return;
    this.reason = reason;
    this.controller.abort();
  }
}

/**
 * Run one LLM call under a deadline. Providers that ignore the signal are still cut off
 * because the call is raced against the deadline.
 */
export async function withDeadline<T>(
  provider: string,
  timeoutMs: number,
  signal: AbortSignal | undefined,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const deadline = new CallDeadline(provider, timeoutMs, signal);
  try {
    return await Promise.race([fn(deadline.signal), deadline.whenAborted()]);
  } catch (err) {
    throw deadline.abortError() ?? err;
  } finally {
    deadline.dispose();
  }
}
