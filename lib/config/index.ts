/* eslint-disable no-restricted-properties */
export type EnvSource = Record<string, string | undefined>;

export const cfg = {
  raw(name: string, source: EnvSource = process.env): string | undefined {
    const v = source[name];
    if (v === undefined) return undefined;
    const trimmed = v.trim();
    return trimmed ? trimmed : undefined;
  },

  isProd(source: EnvSource = process.env): boolean {
    return source.NODE_ENV === "production";
  },
};
