import type { FailureKind } from "@/lib/externalServiceError";
import type {
  Artifact,
  BackendClient,
  BackendId,
  InvokeOptions,
  StageFailure,
  StageResult,
} from "@/lib/generationProviders/types";
import type { ExpandedSpec } from "@/src/pipeline/contracts/expandedSpec";
import { glbBytes, pngBytes } from "./fakeFetch";

export function stubClient<I, P>(
  id: BackendId,
  impl: (input: I, opts?: InvokeOptions) => Promise<StageResult<P>>,
) {
  const invoke = jest.fn(impl);
  const client: BackendClient<I, P> = { id, timeoutMs: 1_000, invoke };
  return { client, invoke };
}

export function succeed<P>(payload: P, attempts = 1): StageResult<P> {
  return { ok: true, payload, metadata: { attempts, durationMs: 5, httpStatus: 200 } };
}

export function failWith(kind: FailureKind, message = `${kind} failure`): StageFailure {
  return { ok: false, kind, message, retryable: false, metadata: { attempts: 1, durationMs: 5 } };
}

export const EXPANDED: ExpandedSpec = {
  original_prompt: "a red cube",
  expanded_prompt: "A glossy red cube with bevelled edges on a white background",
  style_keywords: ["glossy"],
  primary_colors: ["red"],
  materials: ["plastic"],
  key_features: ["bevelled edges"],
};

export function imageArtifact(): Artifact {
  return { kind: "image", bytes: pngBytes(), contentType: "image/png", extension: "png" };
}

export function modelArtifact(): Artifact {
  return { kind: "model", bytes: glbBytes(), contentType: "model/gltf-binary", extension: "glb" };
}

/** Deferred promise for steering a stub from the test body. */
export function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
