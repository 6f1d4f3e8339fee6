import { logErr } from "./util.js";

// --flag=value overrides the matching environment variable
const FLAG_ENV: Record<string, string> = {
  backend: "ASSISTANT_MEMORY_BACKEND",
  "memory-file": "ASSISTANT_MEMORY_FILE",
  "vector-db": "ASSISTANT_VECTOR_DB",
  model: "ASSISTANT_CHAT_MODEL",
  "embed-model": "ASSISTANT_EMBED_MODEL",
  summarize: "ASSISTANT_SUMMARIZE",
  topk: "ASSISTANT_TOPK",
  timezone: "ASSISTANT_TIMEZONE",
  "token-file": "GOOGLE_TOKEN_FILE",
};

/** Maps `--name=value` arguments to env keys. A bare `--name` means "true". */
export function parseFlags(argv: readonly string[]): Record<string, string> {
  const overrides: Record<string, string> = {};
  for (const a of argv) {
    if (!a.startsWith("--")) continue;
    const body = a.slice(2);
    const eq = body.indexOf("=");
    const name = eq < 0 ? body : body.slice(0, eq);
    const envKey = Object.hasOwn(FLAG_ENV, name) ? FLAG_ENV[name] : undefined;
    if (!envKey) {
      logErr("warn: unknown flag", a);
      continue;
    }
    overrides[envKey] = eq < 0 ? "true" : body.slice(eq + 1);
  }
  return overrides;
}
