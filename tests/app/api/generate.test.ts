import { POST } from "@/app/api/generate/route";
import type { StageResult } from "@/lib/generationProviders/types";
import type { ExpandedSpec } from "@/src/pipeline/contracts/expandedSpec";
import { EXPANDED, deferred, failWith, succeed } from "../../helpers/stubClients";
import { jsonRequest, routeDeps, silenceLogs, type RouteDeps } from "../../helpers/routeDeps";
import { TEST_BUCKET_URL } from "../../helpers/testConfig";

const mockState: { current: RouteDeps | null } = { current: null };

function current(): RouteDeps {
  if (!mockState.current) throw new Error("deps not set");
  return mockState.current;
}

jest.mock("@/src/runtime/pipelineDeps", () => ({
  getPipelineDeps: () => current().deps,
  getRunRegistry: () => current().registry,
}));

const API_URL = "http://localhost/api/generate";

describe("POST /api/generate", () => {
  beforeEach(() => {
    silenceLogs();
    mockState.current = routeDeps();
  });

  afterEach(() => {
    jest.restoreAllMocks();
    mockState.current = null;
  });

  it("rejects a blank prompt without calling any backend", async () => {
    const res = await POST(jsonRequest(API_URL, { prompt: "   " }));
    const body = await res.json();

    expect(res.status).toBe(400);
    expect(body.error).toBe("Invalid request body");
    expect(body.details.fieldErrors.prompt).toEqual(["prompt is required"]);
    expect(mockState.current?.llm.invoke).not.toHaveBeenCalled();
  });

  it("rejects a body that is not JSON", async () => {
    const res = await POST(jsonRequest(API_URL, "{not json"));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid JSON payload" });
  });

  it("runs the pipeline and answers with signed links to the artifacts", async () => {
    const res = await POST(jsonRequest(API_URL, { prompt: "  a red cube ", style: "glossy" }));
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.runId).toBe("run-1");
    expect(body.status).toBe("Completed");
    expect(body.state).toBe("completed");
    expect(body.text).toBe("A glossy red cube with bevelled edges on a white background");
    expect(body.image_url).toBe(`${TEST_BUCKET_URL}/images/run-1.png?signed=1`);
    expect(body.model_url).toBe(`${TEST_BUCKET_URL}/models/run-1.glb?signed=1`);
    expect(body.metadata_url).toBe(`${TEST_BUCKET_URL}/metadata/run-1.json?signed=1`);
    expect(body.image_key).toBe("images/run-1.png");
    expect(body.errors).toEqual([]);
    expect(mockState.current?.llm.invoke).toHaveBeenCalledWith(
      { prompt: "a red cube", style: "glossy", shape: undefined },
      expect.objectContaining({ requestId: "run-1:llm" }),
    );
  });

  it("cancels the run when the client disconnects", async () => {
    const { llm, store } = current();
    const started = deferred<void>();
    const release = deferred<StageResult<ExpandedSpec>>();
    llm.invoke.mockImplementationOnce(() => {
      started.resolve();
      return release.promise;
    });
    const controller = new AbortController();

    const pending = POST(
      new Request(API_URL, {
        method: "POST",
        body: JSON.stringify({ prompt: "a red cube" }),
        headers: { "content-type": "application/json" },
        signal: controller.signal,
      }),
    );
    await started.promise;
    controller.abort();
    release.resolve(succeed(EXPANDED));
    const body = await (await pending).json();

    expect(body.status).toBe("Aborted");
    expect(body.errors).toEqual([
      { stage: "run", kind: "Cancelled", message: "Run cancelled", retryable: false },
    ]);
    expect(store.puts).toEqual([]);
  });

  it("answers 200 with a Failed status when a required stage fails", async () => {
    mockState.current?.llm.invoke.mockResolvedValue(failWith("Unavailable", "llm down"));

    const res = await POST(jsonRequest(API_URL, { prompt: "a red cube" }));
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.status).toBe("Failed");
    expect(body.image_url).toBeNull();
    expect(body.errors).toEqual([
      { stage: "llm", kind: "Unavailable", message: "llm down", retryable: false },
    ]);
    expect(mockState.current?.store.puts).toEqual([]);
  });

  it("stops after the image when only an image is requested", async () => {
    const res = await POST(jsonRequest(API_URL, { prompt: "a red cube", output: "image" }));
    const body = await res.json();

    expect(body.status).toBe("Completed");
    expect(body.model_url).toBeNull();
    expect(mockState.current?.threed.invoke).not.toHaveBeenCalled();
    expect(mockState.current?.store.puts).toEqual(["images/run-1.png", "metadata/run-1.json"]);
  });
});
