import { NextResponse } from "next/server";
import { MEDIA_PREFIXES, runIdFromMetadataKey } from "@/lib/mediaStorage";
import { getRequestId, logError, logWarn } from "@/lib/observability";
import { parseJson } from "@/lib/validation/requests";
import { linkFor } from "@/src/pipeline/render";
import { GenerationRequestSchema, RunMetadataSchema } from "@/src/pipeline/types";
import { getPipelineDeps, getRunRegistry } from "@/src/runtime/pipelineDeps";

const DEFAULT_LIST_LIMIT = 20;
const MAX_LIST_LIMIT = 100;

export async function POST(req: Request) {
  const parsed = await parseJson(req, GenerationRequestSchema);
  if (!parsed.success) {
    return NextResponse.json(
      { error: parsed.error, details: parsed.details },
      { status: 400 },
    );
  }

  try {
    const run = getRunRegistry().submit(parsed.data);
    return NextResponse.json(
      { runId: run.runId, state: run.state },
      { status: 202 },
    );
  } catch (error) {
    logError("runs.submit_failed", error, { requestId: getRequestId(req) });
    return NextResponse.json(
      { error: "Failed to submit run" },
      { status: 500 },
    );
  }
}

function listLimit(req: Request): number {
  const raw = new URL(req.url).searchParams.get("limit");
  const n = raw === null ? NaN : Number(raw);
  if (!Number.isInteger(n) || n <= 0) return DEFAULT_LIST_LIMIT;
  return Math.min(n, MAX_LIST_LIMIT);
}

/** Past runs, newest first, read back from their metadata records. */
export async function GET(req: Request) {
  const { store } = getPipelineDeps();
  const listed = await store.listKeys(MEDIA_PREFIXES.metadata, { signal: req.signal });
  if (!listed.ok) {
    logWarn("runs.list_failed", { kind: listed.kind, message: listed.message });
    return NextResponse.json(
      { error: "Failed to list runs", kind: listed.kind },
      { status: 502 },
    );
  }

  const keys = listed.value
    .filter((o) => runIdFromMetadataKey(o.key) !== null)
    .slice(0, listLimit(req));

  const runs = [];
  for (const object of keys) {
    const doc = await store.getJson(object.key, { signal: req.signal });
    if (!doc.ok) {
      logWarn("runs.metadata_unreadable", { key: object.key, kind: doc.kind });
      continue;
    }
    const meta = RunMetadataSchema.safeParse(doc.value);
    if (!meta.success) {
      logWarn("runs.metadata_invalid", { key: object.key });
      continue;
    }
    const imageKey = meta.data.intermediate_image_s3_key ?? null;
    const modelKey = meta.data.model_s3_key ?? null;
    runs.push({
      runId: meta.data.run_id,
      prompt: meta.data.user_prompt,
      status: meta.data.status ?? null,
      created_at: meta.data.created_at ?? object.lastModified,
      image_key: imageKey,
      model_key: modelKey,
      image_url: imageKey ? await linkFor(store, imageKey, store.publicUrl(imageKey)) : null,
      model_url: modelKey ? await linkFor(store, modelKey, store.publicUrl(modelKey)) : null,
    });
  }

  return NextResponse.json({ runs }, { status: 200 });
}
