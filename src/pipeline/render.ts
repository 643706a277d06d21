import type { ArtifactReference, ArtifactStore } from "@/lib/mediaStorage";
import { logWarn } from "@/lib/observability";
import type { ExpandedSpec } from "./contracts/expandedSpec";
import type { ErrorDescriptor, PipelineRun, RunState, RunStatus, StageRecord } from "./types";

export type RenderedRun = {
  runId: string;
  state: RunState;
  status: RunStatus | null;
  text: string | null;
  expanded: ExpandedSpec | null;
  image_url: string | null;
  model_url: string | null;
  image_key: string | null;
  model_key: string | null;
  metadata_url: string | null;
  stages: StageRecord[];
  errors: ErrorDescriptor[];
  startedAt: string;
  finishedAt: string | null;
};

/** Wire shape of a run for HTTP and CLI callers. Never carries bytes. */
export function renderRun(run: PipelineRun): RenderedRun {
  return {
    runId: run.runId,
    state: run.state,
    status: run.status,
    text: run.expanded?.expanded_prompt ?? null,
    expanded: run.expanded,
    image_url: run.references.image?.url ?? null,
    model_url: run.references.model?.url ?? null,
    image_key: run.references.image?.key ?? null,
    model_key: run.references.model?.key ?? null,
    metadata_url: run.references.metadata?.url ?? null,
    stages: run.stages,
    errors: run.errors,
    startedAt: run.startedAt,
    finishedAt: run.finishedAt,
  };
}

/**
 * Resolves a fetchable URL for a stored key, presigned when the bucket is
 * private. Falls back to the stored URL when signing fails.
 */
export async function linkFor(store: ArtifactStore, key: string, fallback: string): Promise<string> {
  const link = await store.linkFor(key);
  if (link.ok) return link.value;
  logWarn("render.link_failed", { key, kind: link.kind, message: link.message });
  return fallback;
}

async function linkOrNull(store: ArtifactStore, ref: ArtifactReference | undefined): Promise<string | null> {
  return ref ? linkFor(store, ref.key, ref.url) : null;
}

/** `renderRun` with artifact URLs a browser can open. */
export async function renderRunWithLinks(run: PipelineRun, store: ArtifactStore): Promise<RenderedRun> {
  const [image_url, model_url, metadata_url] = await Promise.all([
    linkOrNull(store, run.references.image),
    linkOrNull(store, run.references.model),
    linkOrNull(store, run.references.metadata),
  ]);
  return { ...renderRun(run), image_url, model_url, metadata_url };
}
