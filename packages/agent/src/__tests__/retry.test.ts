import { describe, it, expect, vi } from "vitest";
import { backoffDelay, withRetry, withTimeout } from "../retry.js";
import { InvalidSignalError, TimeoutError, TransientIOError } from "../errors.js";

vi.mock("../logger.js", () => ({
  log: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

describe("backoffDelay", () => {
  it("doubles per attempt up to the cap", () => {
    expect(backoffDelay(0, 500, 10_000)).toBe(500);
    expect(backoffDelay(3, 500, 10_000)).toBe(4000);
    expect(backoffDelay(10, 500, 10_000)).toBe(10_000);
  });
});

describe("withRetry", () => {
  it("retries transient failures until one succeeds", async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new TransientIOError("503"))
      .mockRejectedValueOnce(new Error("socket hang up"))
      .mockResolvedValue("ok");

    await expect(withRetry(fn, { label: "test", retries: 3, delayMs: 1 })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("gives up after the configured retries", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new TransientIOError("503"));
    await expect(withRetry(fn, { label: "test", retries: 2, delayMs: 1 })).rejects.toThrow("503");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("does not retry non-retryable errors", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new InvalidSignalError("bad"));
    await expect(withRetry(fn, { label: "test", retries: 5, delayMs: 1 })).rejects.toThrow(InvalidSignalError);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe("withTimeout", () => {
  it("rejects with a TimeoutError when the call hangs", async () => {
    const never = new Promise<string>(() => {});
    await expect(withTimeout(never, 10, "slow call")).rejects.toThrow(TimeoutError);
  });

  it("passes results through", async () => {
    await expect(withTimeout(Promise.resolve(7), 1000, "fast call")).resolves.toBe(7);
  });
});
