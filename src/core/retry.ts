import type { RetryOpts } from "../types.js";
import { GenerationError } from "../errors.js";
import { createAbortError, isAbortError } from "./abort.js";

const defaultShouldRetry = (error: unknown): boolean => {
  if (isAbortError(error)) return false;
  if (error instanceof GenerationError) return error.retryable;
  return true;
};

export async function withRetry<T>(
  fn: () => Promise<T>,
  opts: RetryOpts = {}
): Promise<T> {
  const maxAttempts = opts.maxAttempts ?? 3;
  const base = opts.baseMs ?? 250;
  const cap = opts.maxMs ?? 3000;
  const jitter = opts.jitter ?? "full";
  const shouldRetry = opts.shouldRetry ?? defaultShouldRetry;
  const start = Date.now();

  let attempt = 0;
  while (true) {
    if (opts.signal?.aborted) throw createAbortError(opts.signal.reason);

    try {
      return await fn();
    } catch (error) {
      attempt++;
      if (attempt >= maxAttempts) throw error;
      if (!shouldRetry(error)) throw error;

      const wait = Math.min(cap, base * 2 ** (attempt - 1));
      const waitMs = jitter === "full" ? wait * (0.5 + Math.random()) : wait;
      if (opts.maxTotalMs && Date.now() + waitMs - start > opts.maxTotalMs) throw error;

      opts.onRetry?.({ attempt, waitMs, error });
      await delay(waitMs, opts.signal);
    }
  }
}

function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(createAbortError(signal.reason));
      return;
    }

    const onAbort = () => {
      clearTimeout(timeoutId);
      reject(createAbortError(signal?.reason));
    };

    const timeoutId = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
