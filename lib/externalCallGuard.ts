// lib/externalCallGuard.ts
import { FetchAbortedError } from "@/lib/httpFetch";

/** Bounded retry policy injected into every backend and storage client. */
export type RetryPolicy = {
  /** Total calls allowed per invocation, first attempt included. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
};

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number; exhausted: boolean };

export type RetryHooks = {
  signal?: AbortSignal;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
  random?: () => number;
};

export function computeDelay(attempt: number, policy: RetryPolicy, random: () => number = Math.random) {
  const exp = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** Math.max(0, attempt - 1));
  const jitter = policy.jitterMs > 0 ? Math.floor(random() * policy.jitterMs) : 0;
  return exp + jitter;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new FetchAbortedError("Retry wait aborted"));
      return;
    }
    const t = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(t);
      reject(new FetchAbortedError("Retry wait aborted"));
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Runs `fn` until it succeeds, the error is not retryable, or the policy's
 * attempt budget is spent. Never throws: the caller maps the outcome.
 */
export async function withRetries<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  isRetryable: (err: unknown) => boolean,
  hooks: RetryHooks = {},
): Promise<RetryOutcome<T>> {
  const maxAttempts = Math.max(1, policy.maxAttempts);
  let attempt = 0;

  while (true) {
    attempt++;
    try {
      const value = await fn(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (err) {
      const retryable = isRetryable(err) && !hooks.signal?.aborted;
      if (!retryable || attempt >= maxAttempts) {
        return { ok: false, error: err, attempts: attempt, exhausted: retryable };
      }
      const delayMs = computeDelay(attempt, policy, hooks.random);
      hooks.onRetry?.({ attempt, delayMs, error: err });
      try {
        await sleep(delayMs, hooks.signal);
      } catch (abortErr) {
        return { ok: false, error: abortErr, attempts: attempt, exhausted: false };
      }
    }
  }
}
