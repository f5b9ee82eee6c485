export type Env = Record<string, string | undefined>;

export function envString(env: Env, name: string, defaultValue: string): string {
  const v = env[name];
  if (v == null) return defaultValue;
  const s = v.trim();
  return s === "" ? defaultValue : s;
}

export function envInt(env: Env, name: string, defaultValue: number): number {
  const v = env[name];
  if (v == null) return defaultValue;
  const n = Number(v);
  return Number.isInteger(n) ? n : defaultValue;
}

export function envFlag(env: Env, name: string, defaultValue = false): boolean {
  const v = env[name];
  if (v == null) return defaultValue;
  const s = String(v).trim().toLowerCase();
  return s === "1" || s === "true" || s === "yes" || s === "on";
}
