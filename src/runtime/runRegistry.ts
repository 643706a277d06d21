import { randomUUID } from "node:crypto";
import pLimit from "p-limit";
import { errorMessage, logError, logInfo } from "@/lib/observability";
import { isTerminalState } from "@/lib/runStateMachine";
import { runPipeline, type PipelineDeps } from "@/src/pipeline/executor";
import type { GenerationRequest, PipelineRun } from "@/src/pipeline/types";

type RunEntry = {
  run: PipelineRun;
  controller: AbortController;
  done: Promise<PipelineRun>;
  resolve: (run: PipelineRun) => void;
  /** False while the run waits for a concurrency slot. */
  started: boolean;
  finishedAt: number | null;
};

export type CancelResult = "cancelling" | "not_found" | "finished";

export type RunRegistryOptions = {
  deps: PipelineDeps;
  maxConcurrent: number;
  retentionMs: number;
  now?: () => number;
  newRunId?: () => string;
};

function pendingRun(runId: string, request: GenerationRequest): PipelineRun {
  return {
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
}

/**
 * In-process handles for submitted runs. Runs beyond `maxConcurrent` wait
 * in `pending`; finished runs stay pollable for `retentionMs`.
 */
export class RunRegistry {
  private entries = new Map<string, RunEntry>();
  private limit: ReturnType<typeof pLimit>;
  private deps: PipelineDeps;
  private retentionMs: number;
  private now: () => number;
  private newRunId: () => string;

  constructor(opts: RunRegistryOptions) {
    this.deps = opts.deps;
    this.limit = pLimit(opts.maxConcurrent);
    this.retentionMs = opts.retentionMs;
    this.now = opts.now ?? Date.now;
    this.newRunId = opts.newRunId ?? randomUUID;
  }

  submit(request: GenerationRequest): PipelineRun {
    this.prune();
    const runId = this.newRunId();
    const accepted = pendingRun(runId, request);
    let resolve: (run: PipelineRun) => void = () => {};
    const done = new Promise<PipelineRun>((r) => {
      resolve = r;
    });
    const entry: RunEntry = {
      run: accepted,
      controller: new AbortController(),
      done,
      resolve,
      started: false,
      finishedAt: null,
    };
    this.entries.set(runId, entry);

    this.limit(() => this.execute(entry, request)).catch((err: unknown) => {
      logError("runs.pipeline_crashed", err, { runId });
      this.settle(entry, {
        ...entry.run,
        state: "aborted",
        status: "Failed",
        errors: [
          ...entry.run.errors,
          { stage: "run", kind: "Unexpected", message: errorMessage(err), retryable: false },
        ],
        finishedAt: new Date().toISOString(),
      });
    });

    logInfo("runs.submitted", { runId, pending: this.limit.pendingCount, active: this.limit.activeCount });
    return accepted;
  }

  get(runId: string): PipelineRun | null {
    this.prune();
    return this.entries.get(runId)?.run ?? null;
  }

  /** Resolves with the final run; null when the id is unknown. */
  wait(runId: string): Promise<PipelineRun> | null {
    return this.entries.get(runId)?.done ?? null;
  }

  cancel(runId: string): CancelResult {
    this.prune();
    const entry = this.entries.get(runId);
    if (!entry) return "not_found";
    if (entry.finishedAt !== null || isTerminalState(entry.run.state)) return "finished";
    entry.controller.abort();
    logInfo("runs.cancel_requested", { runId, state: entry.run.state, queued: !entry.started });
    if (!entry.started) {
      this.settle(entry, {
        ...entry.run,
        state: "aborted",
        status: "Aborted",
        errors: [{ stage: "run", kind: "Cancelled", message: "Run cancelled", retryable: false }],
        finishedAt: new Date().toISOString(),
      });
    }
    return "cancelling";
  }

  /** Drops finished runs older than the retention window. */
  prune() {
    const cutoff = this.now() - this.retentionMs;
    for (const [runId, entry] of this.entries) {
      if (entry.finishedAt !== null && entry.finishedAt <= cutoff) this.entries.delete(runId);
    }
  }

  private async execute(entry: RunEntry, request: GenerationRequest): Promise<void> {
    // Cancelled while queued: already settled by cancel().
    if (entry.controller.signal.aborted) return;
    entry.started = true;
    const run = await runPipeline(request, this.deps, {
      runId: entry.run.runId,
      signal: entry.controller.signal,
      onStateChange: (snapshot) => {
        entry.run = snapshot;
      },
    });
    this.settle(entry, run);
  }

  private settle(entry: RunEntry, run: PipelineRun) {
    if (entry.finishedAt !== null) return;
    entry.run = run;
    entry.finishedAt = this.now();
    entry.resolve(run);
  }
}
