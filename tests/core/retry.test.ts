import { describe, it, expect, vi } from "vitest";
import { withRetry } from "../../src/core/retry.js";
import { GenerationError } from "../../src/errors.js";

describe("withRetry", () => {
  it("should succeed on first attempt", async () => {
    const fn = vi.fn<[], Promise<string>>().mockResolvedValue("success");
    const result = await withRetry(fn);
    expect(result).toBe("success");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("should retry on failure and eventually succeed", async () => {
    let attempts = 0;
    const fn = vi.fn(async () => {
      attempts++;
      if (attempts < 3) throw new Error("fail");
      return "success";
    });

    const result = await withRetry(fn, { maxAttempts: 3, baseMs: 0 });
    expect(result).toBe("success");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("should fail after max attempts", async () => {
    const fn = vi.fn<[], Promise<string>>().mockRejectedValue(new Error("fail"));

    await expect(withRetry(fn, { maxAttempts: 2, baseMs: 0 })).rejects.toThrow("fail");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("should not retry non-retryable generation errors", async () => {
    const fn = vi.fn<[], Promise<string>>().mockRejectedValue(new GenerationError("bad payload", false));

    await expect(withRetry(fn, { maxAttempts: 3, baseMs: 0 })).rejects.toThrow("bad payload");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("should respect a custom retry predicate", async () => {
    const fn = vi.fn<[], Promise<string>>().mockRejectedValue(new Error("fatal"));

    await expect(withRetry(fn, { maxAttempts: 3, shouldRetry: () => false })).rejects.toThrow("fatal");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("should respect global timeout", async () => {
    const fn = vi.fn<[], Promise<string>>().mockRejectedValue(new Error("fail"));

    await expect(withRetry(fn, { maxAttempts: 10, maxTotalMs: 10, baseMs: 20, jitter: "none" })).rejects.toThrow();

    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("should call onRetry with the exact wait when jitter is off", async () => {
    const onRetry = vi.fn();
    let attempts = 0;
    const fn = vi.fn(async () => {
      attempts++;
      if (attempts < 3) throw new Error("fail");
      return "success";
    });

    await withRetry(fn, { maxAttempts: 3, baseMs: 1, jitter: "none", onRetry });

    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenNthCalledWith(1, { attempt: 1, waitMs: 1, error: expect.any(Error) });
    expect(onRetry).toHaveBeenNthCalledWith(2, { attempt: 2, waitMs: 2, error: expect.any(Error) });
  });

  it("should abort on signal", async () => {
    const controller = new AbortController();
    const fn = vi.fn<[], Promise<string>>().mockRejectedValue(new Error("fail"));

    setTimeout(() => controller.abort(), 10);

    await expect(withRetry(fn, { maxAttempts: 10, signal: controller.signal, baseMs: 50 })).rejects.toMatchObject({
      name: "AbortError",
    });
  });
});
