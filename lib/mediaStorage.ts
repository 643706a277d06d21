// lib/mediaStorage.ts
import type { FailureKind } from "@/lib/externalServiceError";
import type { ArtifactKind } from "@/lib/generationProviders/types";

export const MEDIA_PREFIXES = {
  image: "images/",
  model: "models/",
  metadata: "metadata/",
} as const;

/** Durable handle returned by the store once bytes are persisted. */
export type ArtifactReference = {
  key: string;
  url: string;
  contentType: string;
  bytes: number;
  sha256: string;
};

export type PutObjectInput = {
  key: string;
  bytes: Uint8Array;
  contentType: string;
};

export type StoredObject = {
  key: string;
  bytes: Uint8Array;
  contentType: string;
  sha256: string | null;
};

export type ListedObject = {
  key: string;
  size: number;
  lastModified: string | null;
};

export type StorageFailureKind = Extract<
  FailureKind,
  "Unauthorized" | "Transient" | "Conflict" | "NotFound" | "Unexpected" | "Cancelled"
>;

export type StorageFailure = {
  ok: false;
  kind: StorageFailureKind;
  message: string;
  retryable: boolean;
};

export type StorageResult<T> = { ok: true; value: T; attempts: number } | (StorageFailure & { attempts: number });

export type StorageCallOptions = {
  signal?: AbortSignal;
};

/**
 * Object storage used by the pipeline. Implementations are shared across
 * concurrent runs and never throw for expected failures.
 */
export interface ArtifactStore {
  put(object: PutObjectInput, opts?: StorageCallOptions): Promise<StorageResult<ArtifactReference>>;
  get(key: string, opts?: StorageCallOptions): Promise<StorageResult<StoredObject>>;
  getJson(key: string, opts?: StorageCallOptions): Promise<StorageResult<unknown>>;
  presign(key: string, expiresInSeconds?: number): Promise<StorageResult<string>>;
  listKeys(prefix: string, opts?: StorageCallOptions): Promise<StorageResult<ListedObject[]>>;
  publicUrl(key: string): string;
  /** A URL callers can fetch: public when the bucket is served publicly, presigned otherwise. */
  linkFor(key: string): Promise<StorageResult<string>>;
}

export function artifactKey(runId: string, kind: ArtifactKind, extension: string): string {
  return `${MEDIA_PREFIXES[kind]}${runId}.${extension.replace(/^\./, "")}`;
}

export function metadataKey(runId: string): string {
  return `${MEDIA_PREFIXES.metadata}${runId}.json`;
}

/** Extracts the run id from a `metadata/<runId>.json` key. */
export function runIdFromMetadataKey(key: string): string | null {
  if (!key.startsWith(MEDIA_PREFIXES.metadata) || !key.endsWith(".json")) return null;
  const id = key.slice(MEDIA_PREFIXES.metadata.length, -".json".length);
  return id && !id.includes("/") ? id : null;
}
