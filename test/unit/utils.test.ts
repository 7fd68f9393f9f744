import { describe, it, expect, vi } from "vitest";
import { withTimeout } from "../../src/utils/timeout.js";
import { withRetry, httpStatusOf, isTransientHttpError } from "../../src/utils/retry.js";

describe("withTimeout", () => {
  it("resolves with the work's result", async () => {
    await expect(withTimeout(async () => 42, 1000, () => new Error("late"))).resolves.toBe(42);
  });

  it("passes synchronous throws through as rejections", async () => {
    await expect(
      withTimeout(
        () => {
          throw new Error("sync");
        },
        1000,
        () => new Error("late")
      )
    ).rejects.toThrow("sync");
  });

  it("aborts the signal and rejects with the timeout error", async () => {
    let signal: AbortSignal | undefined;
    const pending = withTimeout(
      (s) => {
        signal = s;
        return new Promise<never>(() => {});
      },
      10,
      () => new Error("late")
    );

    await expect(pending).rejects.toThrow("late");
    expect(signal?.aborted).toBe(true);
  });
});

describe("withRetry", () => {
  it("retries until the call succeeds", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValueOnce(new Error("flaky")).mockResolvedValueOnce("ok");

    await expect(withRetry(fn, { baseDelayMs: 1 })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("gives up after maxAttempts", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("down"));

    await expect(withRetry(fn, { maxAttempts: 3, baseDelayMs: 1 })).rejects.toThrow("down");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("does not retry once the signal is aborted", async () => {
    const controller = new AbortController();
    const fn = vi.fn<() => Promise<string>>().mockImplementation(async () => {
      controller.abort();
      throw new Error("cancelled");
    });

    await expect(withRetry(fn, { signal: controller.signal, baseDelayMs: 1 })).rejects.toThrow("cancelled");
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe("http status helpers", () => {
  it("reads numeric status fields only", () => {
    expect(httpStatusOf({ status: 503 })).toBe(503);
    expect(httpStatusOf({ status: "503" })).toBeUndefined();
    expect(httpStatusOf(new Error("x"))).toBeUndefined();
  });

  it("treats 429 and 5xx as transient", () => {
    expect([429, 500, 529, 404, 401].map((status) => isTransientHttpError({ status }))).toEqual([
      true,
      true,
      true,
      false,
      false,
    ]);
  });
});
