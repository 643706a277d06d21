import { z } from "zod";
import { cfg, type EnvSource } from "@/lib/config";
import type { RetryPolicy } from "@/lib/externalCallGuard";

/** Thrown when the environment cannot produce a usable configuration. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export const OPTIONAL_STAGE_NAMES = ["image", "threed"] as const;
export type OptionalStageName = (typeof OPTIONAL_STAGE_NAMES)[number];

const serviceUrl = z
  .string()
  .url()
  .transform((u) => u.replace(/\/+$/, ""));

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().min(0);

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((v) => v === "true" || v === "1");

export const EnvSchema = z.object({
  LLM_SERVICE_URL: serviceUrl.default("http://localhost:8000"),
  TEXT_TO_IMAGE_SERVICE_URL: serviceUrl.default("http://localhost:8001"),
  THREED_GENERATION_SERVICE_URL: serviceUrl.default("http://localhost:8002"),
  LLM_API_KEY: z.string().optional(),
  IMAGE_API_KEY: z.string().optional(),
  THREED_API_KEY: z.string().optional(),

  LLM_TIMEOUT_MS: positiveInt.default(30_000),
  IMAGE_TIMEOUT_MS: positiveInt.default(180_000),
  THREED_TIMEOUT_MS: positiveInt.default(600_000),
  STORAGE_TIMEOUT_MS: positiveInt.default(60_000),
  RUN_TIMEOUT_MARGIN_MS: nonNegativeInt.default(30_000),

  RETRY_MAX_ATTEMPTS: positiveInt.max(10).default(3),
  RETRY_BASE_DELAY_MS: nonNegativeInt.default(500),
  RETRY_MAX_DELAY_MS: nonNegativeInt.default(8_000),
  RETRY_JITTER_MS: nonNegativeInt.default(250),

  IMAGE_INFERENCE_STEPS: positiveInt.default(2),
  IMAGE_GUIDANCE_SCALE: z.coerce.number().positive().default(7),
  THREED_MODEL_ID: z.string().default("tencent/hunyuan3d-2"),
  THREED_PROMPT_ONLY_FALLBACK: booleanFlag,

  OPTIONAL_STAGES: z
    .string()
    .default("")
    .transform((raw, ctx) => {
      const names = raw
        .split(",")
        .map((s) => s.trim().toLowerCase())
        .filter(Boolean);
      const stages: OptionalStageName[] = [];
      for (const name of names) {
        const match = OPTIONAL_STAGE_NAMES.find((s) => s === name);
        if (!match) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `"${name}" cannot be optional (allowed: ${OPTIONAL_STAGE_NAMES.join(", ")})`,
          });
          return z.NEVER;
        }
        if (!stages.includes(match)) stages.push(match);
      }
      return stages;
    }),

  S3_BUCKET_NAME: z.string().optional(),
  AWS_DEFAULT_REGION: z.string().default("us-east-1"),
  AWS_ACCESS_KEY_ID: z.string().optional(),
  AWS_SECRET_ACCESS_KEY: z.string().optional(),
  S3_ENDPOINT: serviceUrl.optional(),
  S3_PUBLIC_BASE_URL: serviceUrl.optional(),
  S3_FORCE_PATH_STYLE: booleanFlag,
  S3_PRESIGN_EXPIRES_SECONDS: positiveInt.default(3_600),

  MAX_CONCURRENT_RUNS: positiveInt.default(4),
  RUN_RETENTION_MS: positiveInt.default(15 * 60_000),
});

export type BackendEndpointConfig = {
  baseUrl: string;
  apiKey: string | null;
  timeoutMs: number;
};

export type StorageConfig = {
  bucket: string | null;
  region: string;
  endpoint: string | null;
  publicBaseUrl: string | null;
  forcePathStyle: boolean;
  credentials: { accessKeyId: string; secretAccessKey: string } | null;
  timeoutMs: number;
  presignExpiresSeconds: number;
};

export type PipelineConfig = {
  readonly llm: Readonly<BackendEndpointConfig>;
  readonly image: Readonly<BackendEndpointConfig & { inferenceSteps: number; guidanceScale: number }>;
  readonly threed: Readonly<BackendEndpointConfig & { modelId: string; promptOnlyFallback: boolean }>;
  readonly storage: Readonly<StorageConfig>;
  readonly retry: Readonly<RetryPolicy>;
  readonly optionalStages: readonly OptionalStageName[];
  readonly runTimeoutMarginMs: number;
  readonly maxConcurrentRuns: number;
  readonly runRetentionMs: number;
};

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object") {
    for (const inner of Object.values(value)) deepFreeze(inner);
    Object.freeze(value);
  }
  return value;
}

/**
 * Parses deployment configuration from the environment. The returned object
 * is deeply frozen and is meant to be built once per process and handed to
 * client constructors.
 */
export function loadPipelineConfig(source: EnvSource = process.env): PipelineConfig {
  const input: Record<string, string | undefined> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    input[key] = cfg.raw(key, source);
  }

  const parsed = EnvSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid pipeline configuration: ${details}`);
  }
  const env = parsed.data;

  if (env.RETRY_MAX_DELAY_MS < env.RETRY_BASE_DELAY_MS) {
    throw new ConfigError(
      "Invalid pipeline configuration: RETRY_MAX_DELAY_MS must be >= RETRY_BASE_DELAY_MS",
    );
  }

  const accessKeyId = env.AWS_ACCESS_KEY_ID;
  const secretAccessKey = env.AWS_SECRET_ACCESS_KEY;

  return deepFreeze<PipelineConfig>({
    llm: {
      baseUrl: env.LLM_SERVICE_URL,
      apiKey: env.LLM_API_KEY ?? null,
      timeoutMs: env.LLM_TIMEOUT_MS,
    },
    image: {
      baseUrl: env.TEXT_TO_IMAGE_SERVICE_URL,
      apiKey: env.IMAGE_API_KEY ?? null,
      timeoutMs: env.IMAGE_TIMEOUT_MS,
      inferenceSteps: env.IMAGE_INFERENCE_STEPS,
      guidanceScale: env.IMAGE_GUIDANCE_SCALE,
    },
    threed: {
      baseUrl: env.THREED_GENERATION_SERVICE_URL,
      apiKey: env.THREED_API_KEY ?? null,
      timeoutMs: env.THREED_TIMEOUT_MS,
      modelId: env.THREED_MODEL_ID,
      promptOnlyFallback: env.THREED_PROMPT_ONLY_FALLBACK,
    },
    storage: {
      bucket: env.S3_BUCKET_NAME ?? null,
      region: env.AWS_DEFAULT_REGION,
      endpoint: env.S3_ENDPOINT ?? null,
      publicBaseUrl: env.S3_PUBLIC_BASE_URL ?? null,
      forcePathStyle: env.S3_FORCE_PATH_STYLE,
      credentials:
        accessKeyId && secretAccessKey ? { accessKeyId, secretAccessKey } : null,
      timeoutMs: env.STORAGE_TIMEOUT_MS,
      presignExpiresSeconds: env.S3_PRESIGN_EXPIRES_SECONDS,
    },
    retry: {
      maxAttempts: env.RETRY_MAX_ATTEMPTS,
      baseDelayMs: env.RETRY_BASE_DELAY_MS,
      maxDelayMs: env.RETRY_MAX_DELAY_MS,
      jitterMs: env.RETRY_JITTER_MS,
    },
    optionalStages: env.OPTIONAL_STAGES,
    runTimeoutMarginMs: env.RUN_TIMEOUT_MARGIN_MS,
    maxConcurrentRuns: env.MAX_CONCURRENT_RUNS,
    runRetentionMs: env.RUN_RETENTION_MS,
  });
}
