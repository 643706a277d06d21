export type FetchTimeoutOptions = {
  timeoutMs: number;
  signal?: AbortSignal;
};

export class FetchTimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FetchTimeoutError";
  }
}

/** The caller's signal fired; distinct from our own timeout. */
export class FetchAbortedError extends Error {
  constructor(message = "Fetch aborted by caller") {
    super(message);
    this.name = "FetchAbortedError";
  }
}

function isAbortError(e: unknown): boolean {
  if (typeof e !== "object" || e === null || !("name" in e)) return false;
  return e.name === "AbortError" || e.name === "TimeoutError";
}

/**
 * fetch() bounded by a timeout and linked to an optional caller signal.
 * The timer covers the body read done by `read`, so a stalled download
 * cannot outlive the budget either.
 */
export async function fetchWithTimeout<T>(
  input: string | URL,
  init: RequestInit | undefined,
  opts: FetchTimeoutOptions,
  read: (res: Response) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, opts.timeoutMs);

  const callerSignal = opts.signal;
  if (callerSignal?.aborted) controller.abort();
  const onAbort = () => controller.abort();
  callerSignal?.addEventListener("abort", onAbort, { once: true });

  try {
    if (callerSignal?.aborted) throw new FetchAbortedError();
    const res = await fetch(input, {
      ...init,
      signal: controller.signal,
    });
    return await read(res);
  } catch (e) {
    if (e instanceof FetchAbortedError) throw e;
    if (isAbortError(e) || controller.signal.aborted) {
      if (timedOut) throw new FetchTimeoutError(`Fetch timed out after ${opts.timeoutMs}ms`);
      if (callerSignal?.aborted) throw new FetchAbortedError();
    }
    throw e;
  } finally {
    clearTimeout(timeout);
    callerSignal?.removeEventListener("abort", onAbort);
  }
}
