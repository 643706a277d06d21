import { NextResponse } from "next/server";
import { cfg } from "@/lib/config";
import { checkEnv } from "@/lib/config/validateEnv";

const SERVICES = {
  llm: "LLM_SERVICE_URL",
  image: "TEXT_TO_IMAGE_SERVICE_URL",
  threed: "THREED_GENERATION_SERVICE_URL",
  storage: "S3_BUCKET_NAME",
} as const;

export async function GET() {
  const report = checkEnv();
  const configured = Object.fromEntries(
    Object.entries(SERVICES).map(([name, envName]) => [name, cfg.raw(envName) !== undefined]),
  );
  return NextResponse.json(
    { status: report.ok ? "ok" : "degraded", missing: report.missing, configured },
    { status: 200 },
  );
}
