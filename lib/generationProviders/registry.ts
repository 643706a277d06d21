import type { PipelineConfig } from "@/lib/config/env";
import { HttpImageClient } from "./imageClient";
import { HttpLlmClient } from "./llmClient";
import { HttpThreeDClient } from "./threeDClient";
import type { BackendClients } from "./types";

export function createBackendClients(config: PipelineConfig): BackendClients {
  return {
    llm: new HttpLlmClient({ endpoint: config.llm, retry: config.retry }),
    image: new HttpImageClient({ endpoint: config.image, retry: config.retry }),
    threed: new HttpThreeDClient({ endpoint: config.threed, retry: config.retry }),
  };
}
