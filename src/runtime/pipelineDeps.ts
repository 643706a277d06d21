import { loadPipelineConfig } from "@/lib/config/env";
import { validateEnvOnce } from "@/lib/config/validateEnv";
import { createBackendClients } from "@/lib/generationProviders/registry";
import { S3ArtifactStore } from "@/lib/s3Service";
import type { PipelineDeps } from "@/src/pipeline/executor";
import { RunRegistry } from "./runRegistry";

let deps: PipelineDeps | null = null;
let registry: RunRegistry | null = null;

/** Process-wide config, clients and store, built on first use. */
export function getPipelineDeps(): PipelineDeps {
  if (!deps) {
    validateEnvOnce();
    const config = loadPipelineConfig();
    deps = {
      config,
      clients: createBackendClients(config),
      store: new S3ArtifactStore({ config: config.storage, retry: config.retry }),
    };
  }
  return deps;
}

export function getRunRegistry(): RunRegistry {
  if (!registry) {
    const current = getPipelineDeps();
    registry = new RunRegistry({
      deps: current,
      maxConcurrent: current.config.maxConcurrentRuns,
      retentionMs: current.config.runRetentionMs,
    });
  }
  return registry;
}
