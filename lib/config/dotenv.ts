/* eslint-disable no-restricted-properties */
import fs from "node:fs";
import path from "node:path";
import type { EnvSource } from "@/lib/config";

export type DotenvLoadOptions = {
  /**
   * If false (default), existing keys in the target are preserved.
   * If true, values in the file overwrite them.
   */
  overwrite?: boolean;
  cwd?: string;
  target?: EnvSource;
};

export function parseDotEnv(raw: string): Array<[string, string]> {
  const entries: Array<[string, string]> = [];
  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const eq = trimmed.indexOf("=");
    if (eq === -1) continue;

    let key = trimmed.slice(0, eq).trim();
    let value = trimmed.slice(eq + 1).trim();

    if (key.startsWith("export ")) key = key.slice("export ".length).trim();
    if (!key) continue;

    if (
      (value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'"))
    ) {
      value = value.slice(1, -1);
    }
    entries.push([key, value]);
  }
  return entries;
}

/** Returns the keys that were written into the target. */
export function loadDotEnvFileIfPresent(filename: string, opts: DotenvLoadOptions = {}): string[] {
  const filePath = path.join(opts.cwd ?? process.cwd(), filename);
  if (!fs.existsSync(filePath)) return [];

  const target = opts.target ?? process.env;
  const written: string[] = [];
  for (const [key, value] of parseDotEnv(fs.readFileSync(filePath, "utf8"))) {
    if (target[key] !== undefined && !opts.overwrite) continue;
    target[key] = value;
    written.push(key);
  }
  return written;
}
