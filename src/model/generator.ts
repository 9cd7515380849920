import { runWithDeadline, isAbortError } from "../core/abort.js";
import { withRetry } from "../core/retry.js";
import { GenerationError, StepTimeoutError, describeError } from "../errors.js";
import type {
  GenerateFn,
  GenerateOptions,
  Message,
  RetryOpts,
  SamplingOptions,
  TextGenerator,
} from "../types.js";

export interface CreateGeneratorOptions {
  /** Per-attempt deadline for a single model call. */
  timeoutMs?: number;
  retry?: Omit<RetryOpts, "signal">;
  /** Sampling defaults merged under per-call options. */
  sampling?: SamplingOptions;
}

export function isTextGenerator(value: unknown): value is TextGenerator {
  return (
    typeof value === "object" &&
    value !== null &&
    "generate" in value &&
    typeof value.generate === "function"
  );
}

/**
 * Wraps a model function or generator so every failure surfaces as a
 * `GenerationError`, each attempt is bounded by `timeoutMs`, and transient
 * failures are retried with backoff.
 */
export function createGenerator(
  source: GenerateFn | TextGenerator,
  options: CreateGeneratorOptions = {}
): TextGenerator {
  const call: GenerateFn = isTextGenerator(source)
    ? (prompt, context, callOptions) => source.generate(prompt, context, callOptions)
    : source;
  const retry = options.retry ?? { maxAttempts: 1 };

  return {
    async generate(prompt: string, context: readonly Message[], callOptions: GenerateOptions = {}): Promise<string> {
      const merged: GenerateOptions = { ...options.sampling, ...callOptions };
      try {
        return await withRetry(
          () =>
            runWithDeadline(
              async (signal) => {
                const text = await call(prompt, context, { ...merged, signal });
                if (typeof text !== "string") {
                  throw new GenerationError("Model returned a non-text payload", false);
                }
                return text;
              },
              { timeoutMs: options.timeoutMs, signal: callOptions.signal, label: "Model call" }
            ),
          { ...retry, signal: callOptions.signal }
        );
      } catch (error) {
        throw toGenerationError(error);
      }
    },
  };
}

export function toGenerationError(error: unknown): GenerationError {
  if (error instanceof GenerationError) {
    return error;
  }
  if (error instanceof StepTimeoutError) {
    return new GenerationError(error.message, true, { cause: error });
  }
  if (isAbortError(error)) {
    return new GenerationError(`Model call aborted: ${describeError(error)}`, false, { cause: error });
  }
  return new GenerationError(`Model call failed: ${describeError(error)}`, true, { cause: error });
}
