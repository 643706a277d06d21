import { GET, POST } from "@/app/api/runs/route";
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

const API_URL = "http://localhost/api/runs";

describe("/api/runs", () => {
  beforeEach(() => {
    silenceLogs();
    mockState.current = routeDeps();
  });

  afterEach(() => {
    jest.restoreAllMocks();
    mockState.current = null;
  });

  describe("POST", () => {
    it("accepts a run and returns its id while it is pending", async () => {
      const res = await POST(jsonRequest(API_URL, { prompt: "a red cube" }));

      expect(res.status).toBe(202);
      expect(await res.json()).toEqual({ runId: "run-1", state: "pending" });

      const final = await current().registry.wait("run-1");
      expect(final?.status).toBe("Completed");
    });

    it("rejects an invalid body", async () => {
      const res = await POST(jsonRequest(API_URL, { prompt: "a red cube", output: "video" }));
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body.error).toBe("Invalid request body");
      expect(current().registry.get("run-1")).toBeNull();
    });
  });

  describe("GET", () => {
    function seedHistory() {
      const { store } = current();
      store.seedJson("metadata/a.json", {
        run_id: "a",
        user_prompt: "a red cube",
        intermediate_image_s3_key: "images/a.png",
        model_s3_key: "models/a.glb",
        status: "Completed",
        created_at: "2024-01-01T00:00:00.000Z",
      });
      store.seedJson("metadata/nested/b.json", { run_id: "b", user_prompt: "ignored" });
      store.seedJson("metadata/broken.json", "{not json");
      store.seedJson("metadata/c.json", {
        run_id: "c",
        user_prompt: "a blue sphere",
        intermediate_image_s3_key: "images/c.png",
        model_s3_key: null,
        status: "PartiallyCompleted",
      });
      store.seedJson("images/a.png", "not metadata");
    }

    it("lists past runs newest first and skips unreadable records", async () => {
      seedHistory();

      const res = await GET(new Request(API_URL));
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.runs).toEqual([
        {
          runId: "c",
          prompt: "a blue sphere",
          status: "PartiallyCompleted",
          created_at: null,
          image_key: "images/c.png",
          model_key: null,
          image_url: `${TEST_BUCKET_URL}/images/c.png?signed=1`,
          model_url: null,
        },
        {
          runId: "a",
          prompt: "a red cube",
          status: "Completed",
          created_at: "2024-01-01T00:00:00.000Z",
          image_key: "images/a.png",
          model_key: "models/a.glb",
          image_url: `${TEST_BUCKET_URL}/images/a.png?signed=1`,
          model_url: `${TEST_BUCKET_URL}/models/a.glb?signed=1`,
        },
      ]);
    });

    it("honours the limit parameter", async () => {
      seedHistory();

      const res = await GET(new Request(`${API_URL}?limit=1`));
      const body = await res.json();

      expect(body.runs.map((r: { runId: string }) => r.runId)).toEqual(["c"]);
    });

    it("falls back to the plain URL when a link cannot be signed", async () => {
      seedHistory();
      jest.spyOn(current().store, "linkFor").mockResolvedValue({
        ok: false,
        kind: "Unauthorized",
        message: "no signing credentials",
        retryable: false,
        attempts: 1,
      });

      const body = await (await GET(new Request(`${API_URL}?limit=1`))).json();

      expect(body.runs[0].image_url).toBe(`${TEST_BUCKET_URL}/images/c.png`);
    });

    it("answers 502 when the store cannot be listed", async () => {
      jest.spyOn(current().store, "listKeys").mockResolvedValue({
        ok: false,
        kind: "Transient",
        message: "listing failed",
        retryable: true,
        attempts: 3,
      });

      const res = await GET(new Request(API_URL));

      expect(res.status).toBe(502);
      expect(await res.json()).toEqual({ error: "Failed to list runs", kind: "Transient" });
    });
  });
});
