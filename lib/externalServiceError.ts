export type ExternalProvider = "llm" | "image" | "threed" | "storage";

/**
 * Failure taxonomy shared by the backend clients, the storage client and the
 * orchestrator. `Cancelled` and `Timeout` are produced at run level.
 */
export type FailureKind =
  | "Validation"
  | "Unavailable"
  | "Unauthorized"
  | "Unexpected"
  | "Transient"
  | "Conflict"
  | "NotFound"
  | "Cancelled"
  | "Timeout";

export class ExternalServiceError extends Error {
  provider: ExternalProvider;
  kind: FailureKind;
  status?: number;
  retryable: boolean;
  rawSnippet?: string;

  constructor(opts: {
    provider: ExternalProvider;
    kind: FailureKind;
    message: string;
    status?: number;
    retryable: boolean;
    rawSnippet?: string;
  }) {
    super(opts.message);
    this.name = "ExternalServiceError";
    this.provider = opts.provider;
    this.kind = opts.kind;
    this.status = opts.status;
    this.retryable = opts.retryable;
    this.rawSnippet = opts.rawSnippet;

    // Ensure fields survive structured cloning/logging in some runtimes
    Object.defineProperty(this, "provider", { enumerable: true, value: this.provider });
    Object.defineProperty(this, "kind", { enumerable: true, value: this.kind });
    Object.defineProperty(this, "status", { enumerable: true, value: this.status });
    Object.defineProperty(this, "retryable", { enumerable: true, value: this.retryable });
    Object.defineProperty(this, "rawSnippet", { enumerable: true, value: this.rawSnippet });
  }
}

/** HTTP status → failure kind for a backend response that was not ok. */
export function kindForStatus(status: number): { kind: FailureKind; retryable: boolean } {
  if (status === 401 || status === 403) return { kind: "Unauthorized", retryable: false };
  if (status === 408 || status === 429) return { kind: "Transient", retryable: true };
  if (status >= 500) return { kind: "Transient", retryable: true };
  if (status >= 400) return { kind: "Validation", retryable: false };
  return { kind: "Unexpected", retryable: false };
}

const TRANSIENT_NETWORK_MARKERS = [
  "econnrefused",
  "econnreset",
  "etimedout",
  "enotfound",
  "eai_again",
  "epipe",
  "socket hang up",
  "fetch failed",
  "network",
  "und_err",
];

/** Connection-level errors thrown by fetch before any response arrives. */
export function isTransientNetworkError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const parts = [err.name, err.message];
  const cause: unknown = err.cause;
  if (cause instanceof Error) {
    parts.push(cause.name, cause.message);
    if ("code" in cause && typeof cause.code === "string") parts.push(cause.code);
  }
  if ("code" in err && typeof err.code === "string") parts.push(err.code);
  const haystack = parts.join(" ").toLowerCase();
  return TRANSIENT_NETWORK_MARKERS.some((m) => haystack.includes(m));
}
