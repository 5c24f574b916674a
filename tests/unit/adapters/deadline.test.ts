/**
 * Unit tests for LLM call deadlines.
 */

import { CallDeadline, withDeadline } from "../../../src/adapters/llm/deadline";
import { ProviderError } from "../../../src/errors";

const never = (): Promise<string> => new Promise<string>(() => undefined);

describe("withDeadline", () => {
  it("returns the call result", async () => {
    await expect(withDeadline("stub", 1_000, undefined, async () => "ok")).resolves.toBe("ok");
  });

  it("passes call errors through", async () => {
    await expect(withDeadline("stub", 0, undefined, async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
  });

  it("rejects with a timeout error and aborts the call", async () => {
    let seen: AbortSignal | undefined;
    const result = withDeadline("openai", 20, undefined, (signal) => {
      seen = signal;
      return never();
    });
    await expect(result).rejects.toMatchObject({ kind: "timeout", message: "openai call timed out after 20ms" });
    expect(seen?.aborted).toBe(true);
  });

  it("rejects with a cancelled error when the caller aborts", async () => {
    const controller = new AbortController();
    const result = withDeadline("openai", 0, controller.signal, never);
    controller.abort();
    await expect(result).rejects.toBeInstanceOf(ProviderError);
    await expect(result).rejects.toMatchObject({ kind: "cancelled" });
  });

  it("cancels immediately when the caller already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(withDeadline("openai", 0, controller.signal, never)).rejects.toMatchObject({ kind: "cancelled" });
  });
});

describe("CallDeadline", () => {
  it("has no error until it fires", () => {
    const deadline = new CallDeadline("stub", 0);
    expect(deadline.abortError()).toBeUndefined();
    expect(deadline.signal.aborted).toBe(false);
    deadline.dispose();
  });
});
