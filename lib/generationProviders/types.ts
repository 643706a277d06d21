import type { FailureKind } from "@/lib/externalServiceError";
import type { ExpandedSpec } from "@/src/pipeline/contracts/expandedSpec";

export type BackendId = "llm" | "image" | "threed";

export type ArtifactKind = "image" | "model";

/** Generated bytes held by a run until they are persisted or discarded. */
export type Artifact = {
  kind: ArtifactKind;
  bytes: Uint8Array;
  contentType: string;
  /** Suggested extension without the dot, e.g. "png" or "glb". */
  extension: string;
};

export type StageMetadata = {
  attempts: number;
  durationMs: number;
  httpStatus?: number;
};

export type StageSuccess<P> = {
  ok: true;
  payload: P;
  metadata: StageMetadata;
};

export type StageFailure = {
  ok: false;
  kind: FailureKind;
  message: string;
  retryable: boolean;
  metadata: StageMetadata;
};

export type StageResult<P> = StageSuccess<P> | StageFailure;

export type InvokeOptions = {
  signal?: AbortSignal;
  /** Correlates backend logs with a run. */
  requestId?: string;
};

export type LlmInput = {
  prompt: string;
  style?: string;
  shape?: string;
};

export type ImageInput = {
  prompt: string;
};

export type ThreeDInput = {
  prompt: string;
  /** Absent only when the prompt-only fallback is in effect. */
  image?: Artifact;
};

export interface BackendClient<I, P> {
  id: BackendId;
  /** Per-attempt timeout budget; the orchestrator sums these for the run limit. */
  timeoutMs: number;
  invoke(input: I, opts?: InvokeOptions): Promise<StageResult<P>>;
}

export type LlmClient = BackendClient<LlmInput, ExpandedSpec>;
export type ImageClient = BackendClient<ImageInput, Artifact>;
export type ThreeDClient = BackendClient<ThreeDInput, Artifact>;

export type BackendClients = {
  llm: LlmClient;
  image: ImageClient;
  threed: ThreeDClient;
};
