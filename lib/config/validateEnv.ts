// lib/config/validateEnv.ts
import { cfg, type EnvSource } from "@/lib/config";
import { logWarn } from "@/lib/observability";

export type EnvCheck = {
  name: string;
  requiredInProd?: boolean;
  requiredIf?: (source: EnvSource) => boolean; // optional conditional requirement
};

function has(source: EnvSource, name: string) {
  return cfg.raw(name, source) !== undefined;
}

const checks: EnvCheck[] = [
  { name: "LLM_SERVICE_URL", requiredInProd: true },
  { name: "TEXT_TO_IMAGE_SERVICE_URL", requiredInProd: true },
  { name: "THREED_GENERATION_SERVICE_URL", requiredInProd: true },
  { name: "S3_BUCKET_NAME", requiredInProd: true },

  // Static credentials are optional when the runtime provides a role, but a
  // half-configured key pair is always a mistake.
  {
    name: "AWS_SECRET_ACCESS_KEY",
    requiredIf: (source) => has(source, "AWS_ACCESS_KEY_ID"),
  },
  {
    name: "AWS_ACCESS_KEY_ID",
    requiredIf: (source) => has(source, "AWS_SECRET_ACCESS_KEY"),
  },
];

export type EnvReport = {
  ok: boolean;
  missing: string[];
};

export function checkEnv(source: EnvSource = process.env): EnvReport {
  const prod = cfg.isProd(source);
  const missing: string[] = [];

  for (const c of checks) {
    const needed = (c.requiredInProd && prod) || (c.requiredIf ? c.requiredIf(source) : false);
    if (needed && !has(source, c.name)) missing.push(c.name);
  }

  return { ok: missing.length === 0, missing };
}

let validated = false;

export function validateEnvOnce(source: EnvSource = process.env): EnvReport {
  const report = checkEnv(source);
  if (validated) return report;
  validated = true;

  if (!report.ok) {
    const msg = `Missing required environment variables: ${report.missing.join(", ")}`;
    // Fail hard in production
    if (cfg.isProd(source)) {
      throw new Error(msg);
    }
    logWarn("config.env_incomplete", { missing: report.missing });
  }
  return report;
}
