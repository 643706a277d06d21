import type { BackendEndpointConfig } from "@/lib/config/env";
import type { RetryPolicy } from "@/lib/externalCallGuard";
import { ExternalServiceError } from "@/lib/externalServiceError";
import { truncate } from "@/lib/utils/debugSnippet";
import { ModelOutputSchema, SUCCEEDED_STATUSES } from "@/src/pipeline/contracts/modelOutput";
import { detectModelType } from "./contentTypes";
import { invokeBackend } from "./invokeBackend";
import {
  bodyText,
  downloadResult,
  isJsonContentType,
  safeJsonParse,
  serviceRequest,
  type ServiceHttpConfig,
  type ServiceResponse,
} from "./serviceHttp";
import type { Artifact, InvokeOptions, StageResult, ThreeDClient, ThreeDInput } from "./types";

export const THREED_PROMPT_MAX_CHARS = 1_000;
export const THREED_IMAGE_MAX_BYTES = 20 * 1024 * 1024;
export const GENERATE_3D_PATH = "/generate-3d/";

type ThreeDEndpointConfig = BackendEndpointConfig & { modelId: string };

export function toDataUri(artifact: Artifact): string {
  return `data:${artifact.contentType};base64,${Buffer.from(artifact.bytes).toString("base64")}`;
}

function unexpected(message: string, status?: number, raw?: string): ExternalServiceError {
  return new ExternalServiceError({
    provider: "threed",
    kind: "Unexpected",
    status,
    retryable: false,
    message,
    rawSnippet: raw ? truncate(raw, 800) : undefined,
  });
}

function toModelArtifact(res: ServiceResponse, sourceUrl?: string): Artifact {
  if (res.body.byteLength === 0) throw unexpected("3D service returned an empty model", res.status);
  const detected = detectModelType(res.contentType, res.body, sourceUrl);
  if (!detected) {
    throw unexpected(`3D service returned unsupported content type "${res.contentType}"`, res.status);
  }
  return {
    kind: "model",
    bytes: res.body,
    contentType: detected.contentType,
    extension: detected.extension,
  };
}

export class HttpThreeDClient implements ThreeDClient {
  readonly id = "threed" as const;
  readonly timeoutMs: number;
  private http: ServiceHttpConfig;
  private policy: RetryPolicy;
  private modelId: string;

  constructor(args: { endpoint: ThreeDEndpointConfig; retry: RetryPolicy }) {
    this.http = {
      provider: "threed",
      baseUrl: args.endpoint.baseUrl,
      apiKey: args.endpoint.apiKey,
      timeoutMs: args.endpoint.timeoutMs,
    };
    this.timeoutMs = args.endpoint.timeoutMs;
    this.policy = args.retry;
    this.modelId = args.endpoint.modelId;
  }

  invoke(input: ThreeDInput, opts: InvokeOptions = {}): Promise<StageResult<Artifact>> {
    const prompt = input.prompt.trim();
    const image = input.image;

    return invokeBackend({
      provider: "threed",
      policy: this.policy,
      signal: opts.signal,
      requestId: opts.requestId,
      validate: () => {
        if (!prompt) return "3D prompt must not be empty";
        if (prompt.length > THREED_PROMPT_MAX_CHARS) {
          return `3D prompt is ${prompt.length} characters; the limit is ${THREED_PROMPT_MAX_CHARS}`;
        }
        if (image && image.kind !== "image") return "3D input artifact must be an image";
        if (image && image.bytes.byteLength === 0) return "3D input image is empty";
        if (image && image.bytes.byteLength > THREED_IMAGE_MAX_BYTES) {
          return `3D input image is ${image.bytes.byteLength} bytes; the limit is ${THREED_IMAGE_MAX_BYTES}`;
        }
        return null;
      },
      attempt: async () => {
        const res = await serviceRequest(
          this.http,
          "POST",
          GENERATE_3D_PATH,
          {
            prompt,
            model_id: this.modelId,
            // Inline data URI; services that only read image_s3_key ignore it and go prompt-only.
            image: image ? toDataUri(image) : undefined,
          },
          { ...opts, accept: "model/gltf-binary, application/octet-stream, application/json" },
        );

        if (!isJsonContentType(res.contentType)) {
          return { payload: toModelArtifact(res), httpStatus: res.status };
        }

        const text = bodyText(res);
        const parsed = ModelOutputSchema.safeParse(safeJsonParse(text));
        if (!parsed.success) {
          throw unexpected("3D service JSON response did not match the model output contract", res.status, text);
        }
        const { status, model_url: modelUrl, message } = parsed.data;
        if (!SUCCEEDED_STATUSES.has(status.toLowerCase())) {
          throw unexpected(`3D generation reported status "${status}"${message ? `: ${message}` : ""}`, res.status, text);
        }
        if (!modelUrl) {
          throw unexpected("3D service succeeded but returned no model_url", res.status, text);
        }

        const download = await downloadResult("threed", modelUrl, {
          timeoutMs: this.timeoutMs,
          signal: opts.signal,
        });
        return { payload: toModelArtifact(download, modelUrl), httpStatus: res.status };
      },
    });
  }
}
