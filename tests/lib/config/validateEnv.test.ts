import { checkEnv } from "@/lib/config/validateEnv";

describe("checkEnv", () => {
  it("requires service URLs and the bucket in production", () => {
    expect(checkEnv({ NODE_ENV: "production" })).toEqual({
      ok: false,
      missing: ["LLM_SERVICE_URL", "TEXT_TO_IMAGE_SERVICE_URL", "THREED_GENERATION_SERVICE_URL", "S3_BUCKET_NAME"],
    });
  });

  it("accepts an empty environment outside production", () => {
    expect(checkEnv({ NODE_ENV: "development" })).toEqual({ ok: true, missing: [] });
  });

  it("flags half of an access key pair", () => {
    expect(checkEnv({ NODE_ENV: "development", AWS_ACCESS_KEY_ID: "test-access-key" })).toEqual({
      ok: false,
      missing: ["AWS_SECRET_ACCESS_KEY"],
    });
  });
});

describe("validateEnvOnce", () => {
  beforeEach(() => {
    jest.resetModules();
  });

  it("throws in production when required variables are missing", () => {
    const { validateEnvOnce }: typeof import("@/lib/config/validateEnv") = require("@/lib/config/validateEnv");
    expect(() => validateEnvOnce({ NODE_ENV: "production" })).toThrow(
      "Missing required environment variables: LLM_SERVICE_URL",
    );
  });

  it("only warns outside production", () => {
    const warn = jest.spyOn(console, "warn").mockImplementation(() => {});
    const { validateEnvOnce }: typeof import("@/lib/config/validateEnv") = require("@/lib/config/validateEnv");
    const report = validateEnvOnce({ NODE_ENV: "development", AWS_SECRET_ACCESS_KEY: "test-secret" });

    expect(report.missing).toEqual(["AWS_ACCESS_KEY_ID"]);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(warn.mock.calls[0][0]))).toMatchObject({
      level: "warn",
      event: "config.env_incomplete",
      missing: ["AWS_ACCESS_KEY_ID"],
    });
    warn.mockRestore();
  });
});
