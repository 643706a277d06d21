import { createHash } from "node:crypto";
import {
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
} from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import type { StorageConfig } from "@/lib/config/env";
import { withRetries, type RetryPolicy } from "@/lib/externalCallGuard";
import { ExternalServiceError, isTransientNetworkError } from "@/lib/externalServiceError";
import { FetchAbortedError } from "@/lib/httpFetch";
import { logWarn, redact } from "@/lib/observability";
import type {
  ArtifactReference,
  ArtifactStore,
  ListedObject,
  PutObjectInput,
  StorageCallOptions,
  StorageFailureKind,
  StorageResult,
  StoredObject,
} from "@/lib/mediaStorage";

export const SHA256_METADATA_KEY = "sha256";

const UNAUTHORIZED_CODES = new Set([
  "AccessDenied",
  "InvalidAccessKeyId",
  "SignatureDoesNotMatch",
  "ExpiredToken",
  "InvalidToken",
  "CredentialsProviderError",
  "AllAccessDisabled",
]);

const NOT_FOUND_CODES = new Set(["NotFound", "NoSuchKey"]);

const TRANSIENT_CODES = new Set([
  "SlowDown",
  "Throttling",
  "ThrottlingException",
  "RequestTimeout",
  "RequestTimeTooSkewed",
  "InternalError",
  "ServiceUnavailable",
  "TimeoutError",
  "ConditionalRequestConflict",
]);

export function sha256Hex(bytes: Uint8Array): string {
  return createHash("sha256").update(bytes).digest("hex");
}

function httpStatusOf(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("$metadata" in err)) return undefined;
  const meta = err.$metadata;
  if (typeof meta !== "object" || meta === null || !("httpStatusCode" in meta)) return undefined;
  return typeof meta.httpStatusCode === "number" ? meta.httpStatusCode : undefined;
}

function errorName(err: unknown): string {
  if (typeof err !== "object" || err === null) return "";
  if ("Code" in err && typeof err.Code === "string") return err.Code;
  if ("name" in err && typeof err.name === "string") return err.name;
  return "";
}

function isPreconditionFailed(err: unknown): boolean {
  return errorName(err) === "PreconditionFailed" || httpStatusOf(err) === 412;
}

/** Maps an SDK error onto the storage failure taxonomy. */
export function classifyStorageError(err: unknown): { kind: StorageFailureKind; retryable: boolean } {
  if (err instanceof ExternalServiceError) {
    const kind: StorageFailureKind =
      err.kind === "Unauthorized" ||
      err.kind === "Transient" ||
      err.kind === "Conflict" ||
      err.kind === "NotFound" ||
      err.kind === "Cancelled"
        ? err.kind
        : "Unexpected";
    return { kind, retryable: err.retryable };
  }
  if (err instanceof FetchAbortedError) return { kind: "Cancelled", retryable: false };

  const name = errorName(err);
  const status = httpStatusOf(err);

  if (UNAUTHORIZED_CODES.has(name) || status === 401 || status === 403) {
    return { kind: "Unauthorized", retryable: false };
  }
  if (NOT_FOUND_CODES.has(name) || status === 404) return { kind: "NotFound", retryable: false };
  if (TRANSIENT_CODES.has(name) || status === 429 || (status !== undefined && status >= 500)) {
    return { kind: "Transient", retryable: true };
  }
  if (isTransientNetworkError(err)) return { kind: "Transient", retryable: true };
  return { kind: "Unexpected", retryable: false };
}

function describe(err: unknown): string {
  if (err instanceof Error) return redact(err.message || err.name);
  return redact(String(err));
}

type SendOptions = { signal?: AbortSignal; timeoutMs: number };

export class S3ArtifactStore implements ArtifactStore {
  private client: S3Client;
  private config: StorageConfig;
  private policy: RetryPolicy;

  constructor(args: { config: StorageConfig; retry: RetryPolicy; client?: S3Client }) {
    this.config = args.config;
    this.policy = args.retry;
    this.client =
      args.client ??
      new S3Client({
        region: args.config.region,
        endpoint: args.config.endpoint ?? undefined,
        forcePathStyle: args.config.forcePathStyle,
        // Retries are owned by the injected policy, not the SDK.
        maxAttempts: 1,
        credentials: args.config.credentials ?? undefined,
      });
  }

  publicUrl(key: string): string {
    const { bucket, region, endpoint, publicBaseUrl } = this.config;
    const normalizedKey = key.replace(/^\/+/, "");

    if (publicBaseUrl) {
      return `${publicBaseUrl.replace(/\/+$/, "")}/${normalizedKey}`;
    }
    if (endpoint) {
      return `${endpoint.replace(/\/+$/, "")}/${bucket ?? ""}/${normalizedKey}`;
    }
    return `https://${bucket ?? ""}.s3.${region}.amazonaws.com/${normalizedKey}`;
  }

  /**
   * Idempotent upload. The write is conditional on the key being absent; when
   * it already exists, the same digest is reused and a different one is a
   * Conflict.
   */
  async put(object: PutObjectInput, opts: StorageCallOptions = {}): Promise<StorageResult<ArtifactReference>> {
    const sha256 = sha256Hex(object.bytes);
    const reference: ArtifactReference = {
      key: object.key,
      url: this.publicUrl(object.key),
      contentType: object.contentType,
      bytes: object.bytes.byteLength,
      sha256,
    };

    return this.run("put", object.key, opts, async (bucket) => {
      const command = new PutObjectCommand({
        Bucket: bucket,
        Key: object.key,
        Body: object.bytes,
        ContentType: object.contentType,
        ContentLength: object.bytes.byteLength,
        Metadata: { [SHA256_METADATA_KEY]: sha256 },
        IfNoneMatch: "*",
      });
      try {
        await this.send(this.sendOptions(opts), (abortSignal) => this.client.send(command, { abortSignal }));
        return reference;
      } catch (e) {
        if (!isPreconditionFailed(e)) throw e;
      }

      const existing = await this.head(bucket, object.key, opts);
      if (existing === sha256) return reference;
      if (existing === null) {
        // Deleted between the conditional write and the head.
        throw new ExternalServiceError({
          provider: "storage",
          kind: "Transient",
          retryable: true,
          message: `Object ${object.key} changed during upload`,
        });
      }
      throw new ExternalServiceError({
        provider: "storage",
        kind: "Conflict",
        retryable: false,
        message: `Object ${object.key} already exists with different content`,
      });
    });
  }

  async get(key: string, opts: StorageCallOptions = {}): Promise<StorageResult<StoredObject>> {
    return this.run("get", key, opts, async (bucket) => {
      const command = new GetObjectCommand({ Bucket: bucket, Key: key });
      const out = await this.send(this.sendOptions(opts), async (abortSignal) => {
        const res = await this.client.send(command, { abortSignal });
        return {
          contentType: res.ContentType,
          metadata: res.Metadata,
          bytes: res.Body ? await res.Body.transformToByteArray() : null,
        };
      });
      if (!out.bytes) {
        throw new ExternalServiceError({
          provider: "storage",
          kind: "Unexpected",
          retryable: false,
          message: `Object ${key} has no body`,
        });
      }
      return {
        key,
        bytes: out.bytes,
        contentType: out.contentType ?? "application/octet-stream",
        sha256: out.metadata?.[SHA256_METADATA_KEY] ?? null,
      };
    });
  }

  async getJson(key: string, opts: StorageCallOptions = {}): Promise<StorageResult<unknown>> {
    const res = await this.get(key, opts);
    if (!res.ok) return res;
    try {
      return { ok: true, value: JSON.parse(new TextDecoder().decode(res.value.bytes)), attempts: res.attempts };
    } catch (e) {
      return {
        ok: false,
        kind: "Unexpected",
        message: `Object ${key} is not valid JSON: ${describe(e)}`,
        retryable: false,
        attempts: res.attempts,
      };
    }
  }

  async presign(key: string, expiresInSeconds?: number): Promise<StorageResult<string>> {
    const bucket = this.config.bucket;
    if (!bucket) return this.notConfigured();
    try {
      const url = await getSignedUrl(this.client, new GetObjectCommand({ Bucket: bucket, Key: key }), {
        expiresIn: expiresInSeconds ?? this.config.presignExpiresSeconds,
      });
      return { ok: true, value: url, attempts: 1 };
    } catch (e) {
      const { kind, retryable } = classifyStorageError(e);
      return { ok: false, kind, retryable, message: `presign ${key} failed: ${describe(e)}`, attempts: 1 };
    }
  }

  async linkFor(key: string): Promise<StorageResult<string>> {
    if (this.config.publicBaseUrl) return { ok: true, value: this.publicUrl(key), attempts: 0 };
    return this.presign(key);
  }

  /** Lists every key under a prefix, newest first. */
  async listKeys(prefix: string, opts: StorageCallOptions = {}): Promise<StorageResult<ListedObject[]>> {
    return this.run("list", prefix, opts, async (bucket) => {
      const objects: ListedObject[] = [];
      let continuationToken: string | undefined;
      do {
        const command = new ListObjectsV2Command({
          Bucket: bucket,
          Prefix: prefix,
          ContinuationToken: continuationToken,
        });
        const page = await this.send(this.sendOptions(opts), (abortSignal) =>
          this.client.send(command, { abortSignal }),
        );
        for (const item of page.Contents ?? []) {
          if (!item.Key) continue;
          objects.push({
            key: item.Key,
            size: item.Size ?? 0,
            lastModified: item.LastModified ? item.LastModified.toISOString() : null,
          });
        }
        continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
      } while (continuationToken);

      return objects.sort((a, b) => (b.lastModified ?? "").localeCompare(a.lastModified ?? ""));
    });
  }

  /** Returns the stored digest, or null when the key does not exist. */
  private async head(bucket: string, key: string, opts: StorageCallOptions): Promise<string | null> {
    try {
      const command = new HeadObjectCommand({ Bucket: bucket, Key: key });
      const out = await this.send(this.sendOptions(opts), (abortSignal) =>
        this.client.send(command, { abortSignal }),
      );
      return out.Metadata?.[SHA256_METADATA_KEY] ?? "";
    } catch (e) {
      if (classifyStorageError(e).kind === "NotFound") return null;
      throw e;
    }
  }

  /** Bounds one SDK call by the storage timeout and the caller's signal. */
  private async send<T>(opts: SendOptions, call: (abortSignal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, opts.timeoutMs);
    const onAbort = () => controller.abort();
    if (opts.signal?.aborted) controller.abort();
    opts.signal?.addEventListener("abort", onAbort, { once: true });

    try {
      if (opts.signal?.aborted) throw new FetchAbortedError("Storage call aborted by caller");
      return await call(controller.signal);
    } catch (e) {
      if (timedOut) {
        throw new ExternalServiceError({
          provider: "storage",
          kind: "Transient",
          retryable: true,
          message: `Storage call timed out after ${opts.timeoutMs}ms`,
        });
      }
      if (opts.signal?.aborted) throw new FetchAbortedError("Storage call aborted by caller");
      throw e;
    } finally {
      clearTimeout(timer);
      opts.signal?.removeEventListener("abort", onAbort);
    }
  }

  private sendOptions(opts: StorageCallOptions): SendOptions {
    return { signal: opts.signal, timeoutMs: this.config.timeoutMs };
  }

  private notConfigured<T>(): StorageResult<T> {
    return {
      ok: false,
      kind: "Unauthorized",
      retryable: false,
      message: "S3 bucket is not configured (set S3_BUCKET_NAME)",
      attempts: 0,
    };
  }

  private async run<T>(
    op: string,
    key: string,
    opts: StorageCallOptions,
    fn: (bucket: string) => Promise<T>,
  ): Promise<StorageResult<T>> {
    const bucket = this.config.bucket;
    if (!bucket) return this.notConfigured();

    const outcome = await withRetries(
      () => fn(bucket),
      this.policy,
      (err) => classifyStorageError(err).retryable,
      {
        signal: opts.signal,
        onRetry: ({ attempt, delayMs, error }) =>
          logWarn("storage.retry", { op, key, attempt, delayMs, error: describe(error) }),
      },
    );

    if (outcome.ok) return { ok: true, value: outcome.value, attempts: outcome.attempts };

    const { kind, retryable } = opts.signal?.aborted
      ? { kind: "Cancelled" as const, retryable: false }
      : classifyStorageError(outcome.error);
    return {
      ok: false,
      kind,
      retryable,
      message: `${op} ${key} failed after ${outcome.attempts} attempt(s): ${describe(outcome.error)}`,
      attempts: outcome.attempts,
    };
  }
}
