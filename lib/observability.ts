export type LogContext = Record<string, unknown>;

export function getRequestId(req: Request): string {
  return req.headers.get("x-request-id") || "unknown";
}

const SECRET_PATTERNS: RegExp[] = [
  /(Bearer\s+)[A-Za-z0-9._~+/=-]+/gi,
  /(X-Amz-Signature=)[A-Fa-f0-9]+/g,
  /(X-Amz-Credential=)[^&\s]+/g,
];

export function redact(s: string): string {
  let out = s;
  for (const pattern of SECRET_PATTERNS) out = out.replace(pattern, "$1[REDACTED]");
  return out;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return redact(err.message);
  return redact(String(err));
}

function write(level: "info" | "warn" | "error", event: string, ctx: LogContext) {
  const line = JSON.stringify({ level, event, ts: new Date().toISOString(), ...ctx });
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
}

export function logInfo(event: string, ctx: LogContext = {}) {
  write("info", event, ctx);
}

export function logWarn(event: string, ctx: LogContext = {}) {
  write("warn", event, ctx);
}

export function logError(event: string, err: unknown, ctx: LogContext = {}) {
  write("error", event, { error: errorMessage(err), ...ctx });
}
