import { describe, expect, it, vi } from "vitest";
import { computeRetryDelayMs, retryWithBackoff } from "../retry";

describe("computeRetryDelayMs", () => {
  it("doubles the base delay per retry and caps it", () => {
    expect(computeRetryDelayMs(0, 100)).toBe(100);
    expect(computeRetryDelayMs(3, 100)).toBe(800);
    expect(computeRetryDelayMs(10, 100, 1000)).toBe(1000);
  });
});

describe("retryWithBackoff", () => {
  it("returns the first successful attempt", async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error("flaky"))
      .mockRejectedValueOnce(new Error("flaky"))
      .mockResolvedValue("ok");
    const onRetry = vi.fn();

    const result = await retryWithBackoff(fn, { attempts: 3, baseDelayMs: 0, onRetry });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(fn.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
    expect(onRetry.mock.calls.map(([, attempt]) => attempt)).toEqual([1, 2]);
  });

  it("stops when shouldRetry rejects the error", async () => {
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(new Error("fatal"));

    await expect(
      retryWithBackoff(fn, { attempts: 5, baseDelayMs: 0, shouldRetry: () => false })
    ).rejects.toThrow("fatal");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("rethrows the last error once attempts are exhausted", async () => {
    let calls = 0;
    const fn = async () => {
      calls += 1;
      throw new Error(`failure ${calls}`);
    };

    await expect(retryWithBackoff(fn, { attempts: 2, baseDelayMs: 0 })).rejects.toThrow("failure 2");
    expect(calls).toBe(2);
  });
});
