import { NextResponse } from "next/server";
import { getRequestId, logError } from "@/lib/observability";
import { parseJson } from "@/lib/validation/requests";
import { renderRunWithLinks } from "@/src/pipeline/render";
import { GenerationRequestSchema } from "@/src/pipeline/types";
import { getPipelineDeps, getRunRegistry } from "@/src/runtime/pipelineDeps";

/**
 * Blocking generation. Any finished run answers 200 with its status in the
 * body; the client disconnecting cancels the run.
 */
export async function POST(req: Request) {
  const parsed = await parseJson(req, GenerationRequestSchema);
  if (!parsed.success) {
    return NextResponse.json(
      { error: parsed.error, details: parsed.details },
      { status: 400 },
    );
  }

  try {
    const registry = getRunRegistry();
    const { runId } = registry.submit(parsed.data);
    const cancel = () => registry.cancel(runId);
    req.signal.addEventListener("abort", cancel, { once: true });

    try {
      const run = await registry.wait(runId);
      if (!run) throw new Error(`Run ${runId} is no longer tracked`);
      return NextResponse.json(await renderRunWithLinks(run, getPipelineDeps().store), { status: 200 });
    } finally {
      req.signal.removeEventListener("abort", cancel);
    }
  } catch (error) {
    logError("generate.failed", error, { requestId: getRequestId(req) });
    return NextResponse.json(
      { error: "Failed to run generation pipeline" },
      { status: 500 },
    );
  }
}
