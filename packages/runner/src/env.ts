import { isObj } from "./match.js";

export type Env = Record<string, string | undefined>;

const ENV_RE = /\$\{([A-Z0-9_]+)\}/g;

/** Replaces `${NAME}` in strings with env.NAME, recursing through arrays and objects. Unset names become "". */
export function interpolate(input: unknown, env: Env = process.env): unknown {
  if (typeof input === "string") {
    return input.replace(ENV_RE, (_, name: string) => env[name] ?? "");
  }
  if (Array.isArray(input)) return input.map((item) => interpolate(item, env));
  if (isObj(input)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(input)) out[k] = interpolate(v, env);
    return out;
  }
  return input;
}
