import { describe, expect, it, vi } from "vitest";
import { backoffDelay, retry } from "@/lib/retry";

describe("backoffDelay", () => {
  it("doubles from the initial delay up to the cap", () => {
    expect([1, 2, 3, 4].map((attempt) => backoffDelay(attempt, 1000))).toEqual([1000, 2000, 4000, 8000]);
    expect(backoffDelay(5, 1000)).toBe(10_000);
    expect(backoffDelay(3, 10, 25)).toBe(25);
  });
});

describe("retry", () => {
  it("returns the first successful result", async () => {
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("busy"))
      .mockResolvedValueOnce("ok");
    const onRetry = vi.fn();

    await expect(retry(operation, { attempts: 3, initialDelayMs: 1, retryable: () => true, onRetry })).resolves.toBe(
      "ok"
    );
    expect(operation).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0][1]).toBe(1);
  });

  it("rethrows the last error once the attempts run out", async () => {
    const operation = vi.fn<() => Promise<never>>(async () => {
      throw new Error("still busy");
    });

    await expect(retry(operation, { attempts: 3, initialDelayMs: 1, retryable: () => true })).rejects.toThrow(
      "still busy"
    );
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it("stops at the first error the policy will not retry", async () => {
    const operation = vi.fn<() => Promise<never>>(async () => {
      throw new Error("forbidden");
    });
    const onRetry = vi.fn();

    await expect(retry(operation, { attempts: 3, initialDelayMs: 1, retryable: () => false, onRetry })).rejects.toThrow(
      "forbidden"
    );
    expect(operation).toHaveBeenCalledTimes(1);
    expect(onRetry).not.toHaveBeenCalled();
  });
});
