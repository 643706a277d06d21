import { FetchAbortedError, FetchTimeoutError, fetchWithTimeout } from "@/lib/httpFetch";
import { hangUntilAborted, jsonResponse, mockFetch } from "../helpers/fakeFetch";

describe("fetchWithTimeout", () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("hands the response to the reader", async () => {
    mockFetch(() => jsonResponse({ hello: "world" }));
    const body = await fetchWithTimeout("http://svc.test/x", undefined, { timeoutMs: 1_000 }, (res) => res.json());
    expect(body).toEqual({ hello: "world" });
  });

  it("raises FetchTimeoutError when the budget runs out", async () => {
    mockFetch((_call, signal) => hangUntilAborted(signal));
    await expect(
      fetchWithTimeout("http://svc.test/slow", undefined, { timeoutMs: 10 }, (res) => res.text()),
    ).rejects.toBeInstanceOf(FetchTimeoutError);
  });

  it("raises FetchAbortedError when the caller aborts", async () => {
    const controller = new AbortController();
    mockFetch((_call, signal) => {
      setTimeout(() => controller.abort(), 5);
      return hangUntilAborted(signal);
    });
    await expect(
      fetchWithTimeout(
        "http://svc.test/slow",
        undefined,
        { timeoutMs: 10_000, signal: controller.signal },
        (res) => res.text(),
      ),
    ).rejects.toBeInstanceOf(FetchAbortedError);
  });

  it("does not call fetch when the caller already aborted", async () => {
    const { calls } = mockFetch(() => jsonResponse({}));
    const controller = new AbortController();
    controller.abort();
    await expect(
      fetchWithTimeout("http://svc.test/x", undefined, { timeoutMs: 1_000, signal: controller.signal }, (res) =>
        res.text(),
      ),
    ).rejects.toBeInstanceOf(FetchAbortedError);
    expect(calls).toHaveLength(0);
  });
});
