import { StepTimeoutError } from "../errors.js";

/**
 * Creates a standardised AbortError instance. The optional reason is preserved
 * when provided by upstream signals.
 */
export function createAbortError(reason?: unknown): Error {
  if (reason instanceof Error && reason.name === "AbortError") {
    return reason;
  }
  const message = reason instanceof Error ? reason.message : typeof reason === "string" ? reason : "Aborted";
  const error = new Error(message, reason instanceof Error ? { cause: reason } : undefined);
  error.name = "AbortError";
  return error;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

/**
 * Forwards abort events from the source signal to the target controller. A
 * cleanup function is returned so callers can remove the listener once the
 * operation completes.
 */
export function forwardAbortSignal(
  source: AbortSignal | undefined,
  target: AbortController
): () => void {
  if (!source) {
    return () => {};
  }

  if (source.aborted) {
    target.abort(source.reason);
    return () => {};
  }

  const abortListener = () => {
    if (!target.signal.aborted) {
      target.abort(source.reason);
    }
  };

  source.addEventListener("abort", abortListener, { once: true });
  return () => {
    source.removeEventListener("abort", abortListener);
  };
}

export interface DeadlineOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Used in the timeout message, e.g. `Tool "calculator"`. */
  label?: string;
}

/**
 * Runs one suspension point (a model call or a tool call) under an optional
 * timeout and the caller's abort signal. The operation receives a signal that
 * fires on either; the returned promise rejects with `StepTimeoutError` or an
 * AbortError without waiting for the operation to notice.
 */
export async function runWithDeadline<T>(
  operation: (signal: AbortSignal) => Promise<T> | T,
  options: DeadlineOptions = {}
): Promise<T> {
  const controller = new AbortController();
  const unforward = forwardAbortSignal(options.signal, controller);
  if (controller.signal.aborted) {
    unforward();
    throw createAbortError(controller.signal.reason);
  }

  let timer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;

  const interrupted = new Promise<never>((_resolve, reject) => {
    onAbort = () => reject(toInterruptError(controller.signal.reason));
    controller.signal.addEventListener("abort", onAbort, { once: true });
    if (options.timeoutMs !== undefined && options.timeoutMs > 0) {
      const timeoutMs = options.timeoutMs;
      timer = setTimeout(() => {
        controller.abort(new StepTimeoutError(timeoutMs, options.label ?? "Operation"));
      }, timeoutMs);
    }
  });

  try {
    return await Promise.race([Promise.resolve().then(() => operation(controller.signal)), interrupted]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
    if (onAbort) {
      controller.signal.removeEventListener("abort", onAbort);
    }
    unforward();
  }
}

function toInterruptError(reason: unknown): Error {
  if (reason instanceof StepTimeoutError) {
    return reason;
  }
  return createAbortError(reason);
}
