import type { BackendEndpointConfig } from "@/lib/config/env";
import type { RetryPolicy } from "@/lib/externalCallGuard";
import { ExternalServiceError } from "@/lib/externalServiceError";
import { truncate } from "@/lib/utils/debugSnippet";
import { ExpandedSpecSchema, type ExpandedSpec } from "@/src/pipeline/contracts/expandedSpec";
import { invokeBackend } from "./invokeBackend";
import { bodyText, safeJsonParse, serviceRequest, type ServiceHttpConfig } from "./serviceHttp";
import type { InvokeOptions, LlmClient, LlmInput, StageResult } from "./types";

export const LLM_PROMPT_MAX_CHARS = 2_000;
export const EXPAND_PROMPT_PATH = "/expand-prompt/";

/** Folds the optional style/shape hints into the seed text sent to the LLM. */
export function composeLlmPrompt(input: LlmInput): string {
  const parts = [input.prompt.trim()];
  const style = input.style?.trim();
  const shape = input.shape?.trim();
  if (style) parts.push(`Style: ${style}`);
  if (shape) parts.push(`Shape: ${shape}`);
  return parts.join(". ");
}

export class HttpLlmClient implements LlmClient {
  readonly id = "llm" as const;
  readonly timeoutMs: number;
  private http: ServiceHttpConfig;
  private policy: RetryPolicy;

  constructor(args: { endpoint: BackendEndpointConfig; retry: RetryPolicy }) {
    this.http = {
      provider: "llm",
      baseUrl: args.endpoint.baseUrl,
      apiKey: args.endpoint.apiKey,
      timeoutMs: args.endpoint.timeoutMs,
    };
    this.timeoutMs = args.endpoint.timeoutMs;
    this.policy = args.retry;
  }

  invoke(input: LlmInput, opts: InvokeOptions = {}): Promise<StageResult<ExpandedSpec>> {
    const prompt = composeLlmPrompt(input);

    return invokeBackend({
      provider: "llm",
      policy: this.policy,
      signal: opts.signal,
      requestId: opts.requestId,
      validate: () => {
        if (!input.prompt.trim()) return "Prompt must not be empty";
        if (prompt.length > LLM_PROMPT_MAX_CHARS) {
          return `Prompt is ${prompt.length} characters; the limit is ${LLM_PROMPT_MAX_CHARS}`;
        }
        return null;
      },
      attempt: async () => {
        const res = await serviceRequest(this.http, "POST", EXPAND_PROMPT_PATH, { prompt }, opts);
        const text = bodyText(res);
        const parsed = ExpandedSpecSchema.safeParse(safeJsonParse(text));
        if (!parsed.success) {
          throw new ExternalServiceError({
            provider: "llm",
            kind: "Unexpected",
            status: res.status,
            retryable: false,
            message: `LLM response did not match the expanded spec contract: ${parsed.error.issues
              .map((i) => `${i.path.join(".") || "body"} ${i.message}`)
              .join("; ")}`,
            rawSnippet: truncate(text, 800),
          });
        }
        return { payload: parsed.data, httpStatus: res.status };
      },
    });
  }
}
