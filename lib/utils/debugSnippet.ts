// lib/utils/debugSnippet.ts
export function truncate(input: string, max = 800): string {
  const s = String(input ?? "");
  if (s.length <= max) return s;
  return s.slice(0, max - 1) + "…";
}

/** Prompt preview for log lines; collapses whitespace. */
export function promptPreview(prompt: string, max = 50): string {
  return truncate(prompt.replace(/\s+/g, " ").trim(), max);
}
