import { z } from "zod";
import type { FailureKind } from "@/lib/externalServiceError";
import type { ArtifactReference } from "@/lib/mediaStorage";
import type { RunState } from "@/lib/runStateMachine";
import type { ExpandedSpec } from "./contracts/expandedSpec";

export type { RunState };

export const OUTPUT_KINDS = ["image", "model"] as const;
export type OutputKind = (typeof OUTPUT_KINDS)[number];

export const GenerationRequestSchema = z.object({
  prompt: z
    .string()
    .trim()
    .min(1, "prompt is required")
    .max(2_000, "prompt too long"),
  style: z.string().trim().max(200, "style too long").optional(),
  shape: z.string().trim().max(200, "shape too long").optional(),
  output: z.enum(OUTPUT_KINDS).default("model"),
});

export type GenerationRequest = {
  readonly prompt: string;
  readonly style?: string;
  readonly shape?: string;
  /** Defaults to "model", the full LLM → image → 3D chain. */
  readonly output?: OutputKind;
};

export type StageName = "llm" | "image" | "threed";

export type RunStatus = "Completed" | "PartiallyCompleted" | "Failed" | "Aborted";

export type StageOutcome = "succeeded" | "failed" | "skipped";

export type SkipReason = "upstream_failed" | "not_requested";

export type ErrorDescriptor = {
  stage: StageName | "persisting" | "run";
  kind: FailureKind;
  message: string;
  retryable: boolean;
};

export type StageRecord = {
  stage: StageName;
  outcome: StageOutcome;
  attempts: number;
  durationMs: number;
  httpStatus?: number;
  skipReason?: SkipReason;
  /** Set when the 3D stage ran without an image. */
  promptOnly?: boolean;
  error?: ErrorDescriptor;
};

export type RunReferences = {
  image?: ArtifactReference;
  model?: ArtifactReference;
  metadata?: ArtifactReference;
};

export type PipelineRun = {
  runId: string;
  request: GenerationRequest;
  state: RunState;
  status: RunStatus | null;
  stages: StageRecord[];
  expanded: ExpandedSpec | null;
  references: RunReferences;
  errors: ErrorDescriptor[];
  startedAt: string;
  finishedAt: string | null;
};

/** JSON document stored under `metadata/<runId>.json`. */
export type RunMetadata = {
  run_id: string;
  user_prompt: string;
  request: GenerationRequest;
  expanded_spec: ExpandedSpec | null;
  intermediate_image_s3_key: string | null;
  model_s3_key: string | null;
  status: RunStatus;
  stages: StageRecord[];
  errors: ErrorDescriptor[];
  created_at: string;
};

export const RunMetadataSchema = z
  .object({
    run_id: z.string(),
    user_prompt: z.string(),
    intermediate_image_s3_key: z.string().nullable().optional(),
    model_s3_key: z.string().nullable().optional(),
    status: z.string().optional(),
    created_at: z.string().optional(),
  })
  .passthrough();
