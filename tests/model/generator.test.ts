import { describe, expect, it, vi } from "vitest";
import { GenerationError, StepTimeoutError } from "../../src/errors.js";
import { createGenerator, isTextGenerator, toGenerationError } from "../../src/model/generator.js";
import type { GenerateOptions, Message } from "../../src/types.js";

describe("createGenerator", () => {
  it("merges sampling defaults under per-call options", async () => {
    const fn = vi.fn<[string, readonly Message[], GenerateOptions | undefined], Promise<string>>(async () => "ok");
    const generator = createGenerator(fn, { sampling: { temperature: 0.2, maxTokens: 64 } });

    await generator.generate("hi", [], { maxTokens: 5, metadata: { step: "THINK" } });

    const options = fn.mock.calls[0]?.[2];
    expect(options).toMatchObject({ temperature: 0.2, maxTokens: 5, metadata: { step: "THINK" } });
    expect(options?.signal).toBeInstanceOf(AbortSignal);
  });

  it("accepts generator objects", async () => {
    const generator = createGenerator({ generate: async (prompt) => `re: ${prompt}` });
    await expect(generator.generate("hi", [])).resolves.toBe("re: hi");
  });

  it("wraps failures as generation errors", async () => {
    const generator = createGenerator(async () => {
      throw new Error("socket hang up");
    });

    await expect(generator.generate("hi", [])).rejects.toMatchObject({
      name: "GenerationError",
      code: "GENERATION_FAILED",
      message: "Model call failed: socket hang up",
    });
  });

  it("retries transient failures when configured", async () => {
    const fn = vi
      .fn<[string, readonly Message[], GenerateOptions | undefined], Promise<string>>()
      .mockRejectedValueOnce(new Error("busy"))
      .mockRejectedValueOnce(new Error("busy"))
      .mockResolvedValue("finally");
    const generator = createGenerator(fn, { retry: { maxAttempts: 3, baseMs: 0, jitter: "none" } });

    await expect(generator.generate("hi", [])).resolves.toBe("finally");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("makes a single attempt by default", async () => {
    const fn = vi.fn<[string, readonly Message[], GenerateOptions | undefined], Promise<string>>().mockRejectedValue(
      new Error("busy")
    );

    await expect(createGenerator(fn).generate("hi", [])).rejects.toThrow("Model call failed: busy");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("bounds each call by the timeout", async () => {
    const generator = createGenerator(() => new Promise<string>(() => {}), { timeoutMs: 10 });

    await expect(generator.generate("hi", [])).rejects.toMatchObject({
      name: "GenerationError",
      message: "Model call timed out after 10ms",
      retryable: true,
    });
  });
});

describe("toGenerationError", () => {
  it("classifies causes", () => {
    const original = new GenerationError("already", false);
    expect(toGenerationError(original)).toBe(original);
    expect(toGenerationError(new StepTimeoutError(5, "Model call")).message).toBe("Model call timed out after 5ms");
    const abort = new Error("stop");
    abort.name = "AbortError";
    expect(toGenerationError(abort)).toMatchObject({ message: "Model call aborted: stop", retryable: false });
    expect(toGenerationError("plain").message).toBe("Model call failed: plain");
  });

  it("recognises generator objects", () => {
    expect(isTextGenerator({ generate: () => "x" })).toBe(true);
    expect(isTextGenerator(() => "x")).toBe(false);
  });
});
