import type { BackendEndpointConfig } from "@/lib/config/env";
import type { RetryPolicy } from "@/lib/externalCallGuard";
import { ExternalServiceError } from "@/lib/externalServiceError";
import { detectImageType } from "./contentTypes";
import { invokeBackend } from "./invokeBackend";
import { serviceRequest, type ServiceHttpConfig } from "./serviceHttp";
import type { Artifact, ImageClient, ImageInput, InvokeOptions, StageResult } from "./types";

export const IMAGE_PROMPT_MAX_CHARS = 1_000;
export const GENERATE_IMAGE_PATH = "/generate-image/";

type ImageEndpointConfig = BackendEndpointConfig & {
  inferenceSteps: number;
  guidanceScale: number;
};

export class HttpImageClient implements ImageClient {
  readonly id = "image" as const;
  readonly timeoutMs: number;
  private http: ServiceHttpConfig;
  private policy: RetryPolicy;
  private inferenceSteps: number;
  private guidanceScale: number;

  constructor(args: { endpoint: ImageEndpointConfig; retry: RetryPolicy }) {
    this.http = {
      provider: "image",
      baseUrl: args.endpoint.baseUrl,
      apiKey: args.endpoint.apiKey,
      timeoutMs: args.endpoint.timeoutMs,
    };
    this.timeoutMs = args.endpoint.timeoutMs;
    this.policy = args.retry;
    this.inferenceSteps = args.endpoint.inferenceSteps;
    this.guidanceScale = args.endpoint.guidanceScale;
  }

  invoke(input: ImageInput, opts: InvokeOptions = {}): Promise<StageResult<Artifact>> {
    const prompt = input.prompt.trim();

    return invokeBackend({
      provider: "image",
      policy: this.policy,
      signal: opts.signal,
      requestId: opts.requestId,
      validate: () => {
        if (!prompt) return "Image prompt must not be empty";
        if (prompt.length > IMAGE_PROMPT_MAX_CHARS) {
          return `Image prompt is ${prompt.length} characters; the limit is ${IMAGE_PROMPT_MAX_CHARS}`;
        }
        return null;
      },
      attempt: async () => {
        const res = await serviceRequest(
          this.http,
          "POST",
          GENERATE_IMAGE_PATH,
          {
            prompt,
            num_inference_steps: this.inferenceSteps,
            guidance_scale: this.guidanceScale,
          },
          { ...opts, accept: "image/png, image/*" },
        );

        const detected = res.body.byteLength > 0 ? detectImageType(res.contentType, res.body) : null;
        if (!detected) {
          throw new ExternalServiceError({
            provider: "image",
            kind: "Unexpected",
            status: res.status,
            retryable: false,
            message:
              res.body.byteLength === 0
                ? "Image service returned an empty body"
                : `Image service returned unsupported content type "${res.contentType || "none"}"`,
          });
        }

        return {
          payload: {
            kind: "image",
            bytes: res.body,
            contentType: detected.contentType,
            extension: detected.extension,
          },
          httpStatus: res.status,
        };
      },
    });
  }
}
