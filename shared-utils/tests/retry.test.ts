import { describe, expect, it, vi } from "vitest";
import { Logger } from "../src/logger";
import {
  backoffDelayMs,
  retryWithBackoff,
  RetryExhaustedError,
} from "../src/broker/retry";

function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("retryWithBackoff", () => {
  it("doubles the delay with each attempt", () => {
    expect(backoffDelayMs(1, 1000)).toBe(2000);
    expect(backoffDelayMs(2, 1000)).toBe(4000);
    expect(backoffDelayMs(3, 1000)).toBe(8000);
  });

  it("returns the first successful result", async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    const operation = vi
      .fn()
      .mockRejectedValueOnce(new Error("refused"))
      .mockResolvedValueOnce("connected");

    const result = await retryWithBackoff(operation, {
      maxAttempts: 5,
      baseDelayMs: 1000,
      label: "Dial",
      logger: silentLogger(),
      sleep,
    });

    expect(result).toBe("connected");
    expect(operation).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(2000);
  });

  it("gives up after maxAttempts without waiting after the last one", async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    const cause = new Error("refused");
    const logger = silentLogger();

    const attempt = retryWithBackoff(() => Promise.reject(cause), {
      maxAttempts: 3,
      baseDelayMs: 1000,
      label: "Dial",
      logger,
      sleep,
    });

    await expect(attempt).rejects.toBeInstanceOf(RetryExhaustedError);
    await expect(attempt).rejects.toMatchObject({ attempts: 3, cause });
    expect(sleep.mock.calls).toEqual([[2000], [4000]]);
    expect(logger.warn).toHaveBeenCalledWith(
      "Dial failed (attempt 1/3). Retrying in 2 seconds...",
      "refused"
    );
  });
});
