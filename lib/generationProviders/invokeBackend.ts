import { withRetries, type RetryPolicy } from "@/lib/externalCallGuard";
import { ExternalServiceError } from "@/lib/externalServiceError";
import { logError, logWarn } from "@/lib/observability";
import { toExternalError } from "./serviceHttp";
import type { BackendId, StageFailure, StageResult } from "./types";

export type AttemptResult<P> = {
  payload: P;
  httpStatus?: number;
};

export type InvokeBackendArgs<P> = {
  provider: BackendId;
  policy: RetryPolicy;
  signal?: AbortSignal;
  requestId?: string;
  /** Returns a message when the input must be rejected before any call. */
  validate: () => string | null;
  attempt: (attempt: number) => Promise<AttemptResult<P>>;
};

function failure(
  kind: StageFailure["kind"],
  message: string,
  retryable: boolean,
  attempts: number,
  startedAt: number,
  httpStatus?: number,
): StageFailure {
  return {
    ok: false,
    kind,
    message,
    retryable,
    metadata: { attempts, durationMs: Date.now() - startedAt, httpStatus },
  };
}

/**
 * Shared invoke path for every backend client: local validation, bounded
 * retries on transient errors, and mapping of the last error onto a typed
 * stage failure. Never throws.
 */
export async function invokeBackend<P>(args: InvokeBackendArgs<P>): Promise<StageResult<P>> {
  const startedAt = Date.now();
  const { provider, signal, requestId } = args;

  const invalid = args.validate();
  if (invalid) {
    return failure("Validation", invalid, false, 0, startedAt);
  }
  if (signal?.aborted) {
    return failure("Cancelled", `${provider} call cancelled before dispatch`, false, 0, startedAt);
  }

  const outcome = await withRetries(
    async (attempt) => {
      try {
        return await args.attempt(attempt);
      } catch (e) {
        throw toExternalError(e, provider);
      }
    },
    args.policy,
    (err) => err instanceof ExternalServiceError && err.retryable,
    {
      signal,
      onRetry: ({ attempt, delayMs, error }) =>
        logWarn("backend.retry", {
          provider,
          requestId,
          attempt,
          delayMs,
          error: error instanceof Error ? error.message : String(error),
        }),
    },
  );

  if (outcome.ok) {
    return {
      ok: true,
      payload: outcome.value.payload,
      metadata: {
        attempts: outcome.attempts,
        durationMs: Date.now() - startedAt,
        httpStatus: outcome.value.httpStatus,
      },
    };
  }

  const err = toExternalError(outcome.error, provider);

  if (err.kind === "Cancelled" || signal?.aborted) {
    return failure("Cancelled", `${provider} call cancelled`, false, outcome.attempts, startedAt, err.status);
  }

  if (outcome.exhausted) {
    // Already retried here; the orchestrator must not retry again.
    return failure(
      "Unavailable",
      `${provider} service unavailable after ${outcome.attempts} attempt(s): ${err.message}`,
      false,
      outcome.attempts,
      startedAt,
      err.status,
    );
  }

  if (err.kind === "Unexpected") {
    logError("backend.unexpected_response", err, {
      provider,
      requestId,
      status: err.status,
      rawSnippet: err.rawSnippet,
    });
  }

  return failure(err.kind, err.message, false, outcome.attempts, startedAt, err.status);
}
