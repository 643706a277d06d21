import crypto from "crypto";
import {
  ExternalServiceError,
  isTransientNetworkError,
  kindForStatus,
  type ExternalProvider,
} from "@/lib/externalServiceError";
import { FetchAbortedError, FetchTimeoutError, fetchWithTimeout } from "@/lib/httpFetch";
import { redact } from "@/lib/observability";
import { truncate } from "@/lib/utils/debugSnippet";

type HttpMethod = "GET" | "POST";

export type ServiceHttpConfig = {
  provider: ExternalProvider;
  baseUrl: string; // e.g. http://llm_service:8000
  apiKey: string | null;
  timeoutMs: number;
};

export type ServiceResponse = {
  status: number;
  contentType: string;
  body: Uint8Array;
};

export type RequestOptions = {
  signal?: AbortSignal;
  requestId?: string;
  accept?: string;
};

const textDecoder = new TextDecoder();

export function bodyText(res: ServiceResponse): string {
  return textDecoder.decode(res.body);
}

export function safeJsonParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

export function isJsonContentType(contentType: string): boolean {
  return /[/+]json\b/i.test(contentType);
}

/** FastAPI errors look like {"detail": "..."}; fall back to the raw text. */
function errorDetail(text: string): string {
  const json = safeJsonParse(text);
  if (json && typeof json === "object" && "detail" in json) {
    const { detail } = json;
    return typeof detail === "string" ? detail : JSON.stringify(detail);
  }
  return truncate(text.trim(), 300);
}

/**
 * Maps anything thrown while talking to a backend onto the shared error type.
 * Timeouts and connection failures are transient; caller aborts are not.
 */
export function toExternalError(err: unknown, provider: ExternalProvider): ExternalServiceError {
  if (err instanceof ExternalServiceError) return err;
  if (err instanceof FetchAbortedError) {
    return new ExternalServiceError({ provider, kind: "Cancelled", message: err.message, retryable: false });
  }
  if (err instanceof FetchTimeoutError) {
    return new ExternalServiceError({ provider, kind: "Transient", message: err.message, retryable: true });
  }
  if (isTransientNetworkError(err)) {
    const message = err instanceof Error ? redact(err.message) : "network error";
    return new ExternalServiceError({
      provider,
      kind: "Transient",
      message: `${provider} service unreachable: ${message}`,
      retryable: true,
    });
  }
  const message = err instanceof Error ? redact(err.message) : String(err);
  return new ExternalServiceError({ provider, kind: "Unexpected", message, retryable: false });
}

async function readResponse(res: Response): Promise<ServiceResponse> {
  const body = new Uint8Array(await res.arrayBuffer());
  return {
    status: res.status,
    contentType: (res.headers.get("content-type") ?? "").toLowerCase(),
    body,
  };
}

function assertOk(provider: ExternalProvider, label: string, res: ServiceResponse): ServiceResponse {
  const ok = res.status >= 200 && res.status < 300;
  const text = !ok || res.contentType.includes("html") ? bodyText(res) : "";

  // A misconfigured base URL usually answers with an HTML page.
  if (text.trimStart().toLowerCase().startsWith("<!doctype html")) {
    throw new ExternalServiceError({
      provider,
      kind: "Unexpected",
      status: res.status,
      retryable: false,
      message: `${provider} service returned HTML for ${label} (check the service base URL)`,
      rawSnippet: truncate(text, 500),
    });
  }

  if (!ok) {
    const { kind, retryable } = kindForStatus(res.status);
    throw new ExternalServiceError({
      provider,
      kind,
      status: res.status,
      retryable,
      message: `${provider} request failed: ${label} => ${res.status}${text ? ` - ${errorDetail(text)}` : ""}`,
      rawSnippet: truncate(text, 2000),
    });
  }
  return res;
}

/** One HTTP attempt against a backend service. Throws ExternalServiceError. */
export async function serviceRequest(
  config: ServiceHttpConfig,
  method: HttpMethod,
  path: string,
  body: unknown,
  opts: RequestOptions = {},
): Promise<ServiceResponse> {
  const url = `${config.baseUrl}${path.startsWith("/") ? "" : "/"}${path}`;
  const label = `${method} ${path}`;

  const headers: Record<string, string> = {
    Accept: opts.accept ?? "application/json",
    "X-Request-Id": opts.requestId ?? crypto.randomUUID(),
  };
  if (body !== undefined) headers["Content-Type"] = "application/json";
  if (config.apiKey) headers.Authorization = `Bearer ${config.apiKey}`;

  try {
    const res = await fetchWithTimeout(
      url,
      {
        method,
        headers,
        body: body !== undefined ? JSON.stringify(body) : undefined,
      },
      { timeoutMs: config.timeoutMs, signal: opts.signal },
      readResponse,
    );
    return assertOk(config.provider, label, res);
  } catch (e) {
    throw toExternalError(e, config.provider);
  }
}

/** Fetches a result file the backend only referenced by URL. */
export async function downloadResult(
  provider: ExternalProvider,
  url: string,
  opts: { timeoutMs: number; signal?: AbortSignal },
): Promise<ServiceResponse> {
  try {
    const res = await fetchWithTimeout(
      url,
      { method: "GET", redirect: "follow" },
      { timeoutMs: opts.timeoutMs, signal: opts.signal },
      readResponse,
    );
    return assertOk(provider, `GET ${new URL(url).pathname}`, res);
  } catch (e) {
    throw toExternalError(e, provider);
  }
}
