import { randomUUID } from "node:crypto";
import type { PipelineConfig } from "@/lib/config/env";
import type {
  Artifact,
  BackendClients,
  StageFailure,
  StageResult,
} from "@/lib/generationProviders/types";
import {
  artifactKey,
  metadataKey,
  type ArtifactReference,
  type ArtifactStore,
  type StorageFailure,
  type StorageResult,
} from "@/lib/mediaStorage";
import { logError, logInfo, logWarn } from "@/lib/observability";
import { assertValidTransition, type RunState } from "@/lib/runStateMachine";
import { promptPreview } from "@/lib/utils/debugSnippet";
import type { ExpandedSpec } from "./contracts/expandedSpec";
import type {
  ErrorDescriptor,
  GenerationRequest,
  OutputKind,
  PipelineRun,
  RunMetadata,
  RunStatus,
  StageName,
  StageRecord,
} from "./types";

export type PipelineDeps = {
  clients: BackendClients;
  store: ArtifactStore;
  config: PipelineConfig;
};

export type RunOptions = {
  runId?: string;
  /** Aborting cancels the run; the in-flight call is aborted with it. */
  signal?: AbortSignal;
  onStateChange?: (run: PipelineRun) => void;
};

/**
 * Upper bound on a run's wall time: every planned stage may spend its whole
 * retry budget, each persisted object may spend the storage budget, plus the
 * configured margin. A 3D attempt is a POST plus the model download, and a
 * storage attempt may be a PUT plus a HEAD, so both count two timeouts.
 */
export function runTimeoutMs(config: PipelineConfig, output: OutputKind): number {
  const { maxAttempts, maxDelayMs, jitterMs } = config.retry;
  const stageBudget = (timeoutMs: number, callsPerAttempt: number) =>
    timeoutMs * callsPerAttempt * maxAttempts + (maxAttempts - 1) * (maxDelayMs + jitterMs);

  const stages = [stageBudget(config.llm.timeoutMs, 1), stageBudget(config.image.timeoutMs, 1)];
  if (output === "model") stages.push(stageBudget(config.threed.timeoutMs, 2));
  const puts = stages.length; // artifacts plus the metadata record
  const total = stages.reduce((sum, b) => sum + b, 0) + puts * stageBudget(config.storage.timeoutMs, 2);
  return total + config.runTimeoutMarginMs;
}

function snapshot(run: PipelineRun): PipelineRun {
  return {
    ...run,
    stages: run.stages.map((s) => ({ ...s })),
    references: { ...run.references },
    errors: [...run.errors],
  };
}

function describeStageFailure(stage: StageName, failure: StageFailure): ErrorDescriptor {
  return { stage, kind: failure.kind, message: failure.message, retryable: failure.retryable };
}

function describeStorageFailure(failure: StorageFailure): ErrorDescriptor {
  return { stage: "persisting", kind: failure.kind, message: failure.message, retryable: failure.retryable };
}

async function settle<P>(stage: StageName, call: () => Promise<StageResult<P>>): Promise<StageResult<P>> {
  const startedAt = Date.now();
  try {
    return await call();
  } catch (err) {
    // A throwing client is a bug; report it as Unexpected.
    logError("pipeline.stage_threw", err, { stage });
    return {
      ok: false,
      kind: "Unexpected",
      message: err instanceof Error ? err.message : String(err),
      retryable: false,
      metadata: { attempts: 0, durationMs: Date.now() - startedAt },
    };
  }
}

/**
 * Runs one request through LLM → image → 3D and persists what was produced.
 * Stages run strictly in sequence; a failed required stage ends the run,
 * a failed optional stage degrades it to PartiallyCompleted. Never throws
 * for backend or storage failures.
 */
export async function runPipeline(
  input: GenerationRequest,
  deps: PipelineDeps,
  options: RunOptions = {},
): Promise<PipelineRun> {
  const { clients, store, config } = deps;
  const runId = options.runId ?? randomUUID();
  const request: GenerationRequest = Object.freeze({ ...input, output: input.output ?? "model" });
  const output: OutputKind = request.output ?? "model";
  const optional = new Set<StageName>(config.optionalStages);

  const run: PipelineRun = {
    runId,
    request,
    state: "pending",
    status: null,
    stages: [],
    expanded: null,
    references: {},
    errors: [],
    startedAt: new Date().toISOString(),
    finishedAt: null,
  };

  const controller = new AbortController();
  const signal = controller.signal;
  let timedOut = false;
  const limitMs = runTimeoutMs(config, output);
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, limitMs);
  const onCallerAbort = () => controller.abort();
  if (options.signal?.aborted) controller.abort();
  options.signal?.addEventListener("abort", onCallerAbort, { once: true });

  const transition = (to: RunState) => {
    assertValidTransition(run.state, to);
    run.state = to;
    options.onStateChange?.(snapshot(run));
  };

  const finish = (state: "completed" | "aborted", status: RunStatus): PipelineRun => {
    run.status = status;
    run.finishedAt = new Date().toISOString();
    transition(state);
    logInfo("pipeline.run_finished", {
      runId,
      status,
      stages: run.stages.map((s) => `${s.stage}:${s.outcome}`),
      errors: run.errors.length,
    });
    return snapshot(run);
  };

  const cancelled = (): PipelineRun => {
    const kind = timedOut ? "Timeout" : "Cancelled";
    run.errors.push({
      stage: "run",
      kind,
      message: timedOut ? `Run exceeded its ${limitMs}ms time limit` : "Run cancelled",
      retryable: false,
    });
    logWarn("pipeline.run_aborted", { runId, kind, state: run.state });
    return finish("aborted", "Aborted");
  };

  const record = <P>(stage: StageName, result: StageResult<P>, extra: Partial<StageRecord> = {}) => {
    const entry: StageRecord = {
      stage,
      outcome: result.ok ? "succeeded" : "failed",
      attempts: result.metadata.attempts,
      durationMs: result.metadata.durationMs,
      httpStatus: result.metadata.httpStatus,
      ...extra,
    };
    if (!result.ok) {
      entry.error = describeStageFailure(stage, result);
      run.errors.push(entry.error);
    }
    run.stages.push(entry);
  };

  const skip = (stage: StageName, reason: StageRecord["skipReason"]) => {
    run.stages.push({ stage, outcome: "skipped", attempts: 0, durationMs: 0, skipReason: reason });
  };

  logInfo("pipeline.run_started", { runId, output, prompt: promptPreview(request.prompt) });

  try {
    if (signal.aborted) return cancelled();
    const invokeOpts = (stage: StageName) => ({ signal, requestId: `${runId}:${stage}` });
    let degraded = false;

    // LLM: every later stage depends on it, so it is always required.
    transition("llm");
    const llm = await settle("llm", () =>
      clients.llm.invoke({ prompt: request.prompt, style: request.style, shape: request.shape }, invokeOpts("llm")),
    );
    record("llm", llm);
    if (signal.aborted) return cancelled();
    if (!llm.ok) return finish("aborted", "Failed");
    const expanded: ExpandedSpec = llm.payload;
    run.expanded = expanded;

    transition("image");
    const image = await settle("image", () =>
      clients.image.invoke({ prompt: expanded.expanded_prompt }, invokeOpts("image")),
    );
    record("image", image);
    if (signal.aborted) return cancelled();
    let imageArtifact: Artifact | null = null;
    if (image.ok) {
      imageArtifact = image.payload;
    } else if (optional.has("image")) {
      degraded = true;
    } else {
      return finish("aborted", "Failed");
    }

    let modelArtifact: Artifact | null = null;
    if (output === "image") {
      skip("threed", "not_requested");
    } else if (!imageArtifact && !config.threed.promptOnlyFallback) {
      skip("threed", "upstream_failed");
    } else {
      transition("threed");
      const threedInput = imageArtifact
        ? { prompt: expanded.expanded_prompt, image: imageArtifact }
        : { prompt: expanded.expanded_prompt };
      const threed = await settle("threed", () => clients.threed.invoke(threedInput, invokeOpts("threed")));
      record("threed", threed, imageArtifact ? {} : { promptOnly: true });
      if (signal.aborted) return cancelled();
      if (threed.ok) {
        modelArtifact = threed.payload;
      } else if (optional.has("threed")) {
        degraded = true;
      } else {
        return finish("aborted", "Failed");
      }
    }

    transition("persisting");
    const pending: Artifact[] = [];
    if (imageArtifact) pending.push(imageArtifact);
    if (modelArtifact) pending.push(modelArtifact);

    for (const artifact of pending) {
      if (signal.aborted) return cancelled();
      const put = await store.put(
        {
          key: artifactKey(runId, artifact.kind, artifact.extension),
          bytes: artifact.bytes,
          contentType: artifact.contentType,
        },
        { signal },
      );
      if (signal.aborted) return cancelled();
      if (!put.ok) {
        run.errors.push(describeStorageFailure(put));
        return finish("aborted", "Failed");
      }
      run.references[artifact.kind] = put.value;
    }

    const status: RunStatus = degraded ? "PartiallyCompleted" : "Completed";
    if (signal.aborted) return cancelled();
    const metadata = await persistMetadata(store, run, status, signal);
    if (signal.aborted) return cancelled();
    if (!metadata.ok) {
      run.errors.push(describeStorageFailure(metadata));
      return finish("aborted", "Failed");
    }
    run.references.metadata = metadata.value;

    return finish("completed", status);
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener("abort", onCallerAbort);
  }
}

export function buildRunMetadata(run: PipelineRun, status: RunStatus): RunMetadata {
  return {
    run_id: run.runId,
    user_prompt: run.request.prompt,
    request: run.request,
    expanded_spec: run.expanded,
    intermediate_image_s3_key: run.references.image?.key ?? null,
    model_s3_key: run.references.model?.key ?? null,
    status,
    stages: run.stages,
    errors: run.errors,
    created_at: run.startedAt,
  };
}

async function persistMetadata(
  store: ArtifactStore,
  run: PipelineRun,
  status: RunStatus,
  signal: AbortSignal,
): Promise<StorageResult<ArtifactReference>> {
  const body = JSON.stringify(buildRunMetadata(run, status), null, 2);
  return store.put(
    {
      key: metadataKey(run.runId),
      bytes: new TextEncoder().encode(body),
      contentType: "application/json",
    },
    { signal },
  );
}
