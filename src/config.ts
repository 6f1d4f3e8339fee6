import { z } from "zod";
import { DEFAULT_EMBED_MODEL } from "./embeddings.js";
import { ConfigurationError } from "./errors.js";
import { DEFAULT_CHAT_MODEL } from "./generation.js";

const flag = z
  .enum(["1", "0", "true", "false", "yes", "no", "on", "off"])
  .transform((v) => ["1", "true", "yes", "on"].includes(v));

const optionalText = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const envSchema = z.object({
  OPENAI_API_KEY: optionalText,
  OPENAI_BASE_URL: optionalText,
  ASSISTANT_MEMORY_BACKEND: z.enum(["exact", "semantic"]).default("exact"),
  ASSISTANT_MEMORY_FILE: z.string().min(1).default("./memories.json"),
  ASSISTANT_VECTOR_DB: z.string().min(1).default("./memory-vectors.db"),
  ASSISTANT_CHAT_MODEL: z.string().min(1).default(DEFAULT_CHAT_MODEL),
  ASSISTANT_EMBED_MODEL: z.string().min(1).default(DEFAULT_EMBED_MODEL),
  ASSISTANT_SUMMARIZE: flag.default("false"),
  ASSISTANT_TOPK: z.coerce.number().int().min(1).max(50).default(6),
  ASSISTANT_TIMEZONE: z
    .string()
    .default("UTC")
    .refine((tz) => {
      try {
        new Intl.DateTimeFormat("en-US", { timeZone: tz });
        return true;
      } catch {
        return false;
      }
    }, "is not a valid IANA time zone"),
  GOOGLE_CLIENT_ID: optionalText,
  GOOGLE_CLIENT_SECRET: optionalText,
  GOOGLE_TOKEN_FILE: z.string().min(1).default("./google-token.json"),
});

export type AssistantConfig = {
  /** Absent means simple mode: rule-based replies over the exact store. */
  openaiApiKey?: string;
  openaiBaseUrl?: string;
  memoryBackend: "exact" | "semantic";
  memoryFile: string;
  vectorDbPath: string;
  chatModel: string;
  embedModel: string;
  summarizeMemories: boolean;
  topK: number;
  timeZone: string;
  google?: { clientId: string; clientSecret: string; tokenFile: string };
};

export type EnvSource = Record<string, string | undefined>;

/**
 * Validates everything up front. Without OPENAI_API_KEY only the exact
 * backend is allowed. Google settings are all-or-nothing: one of
 * id/secret without the other is an error, neither means no calendar.
 */
export function loadConfig(env: EnvSource = process.env): AssistantConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map((i) => String(i.path[0])))];
    const detail = parsed.error.issues.map((i) => `${String(i.path[0])} ${i.message}`).join("; ");
    throw new ConfigurationError(`Invalid configuration: ${detail}`, keys);
  }
  const e = parsed.data;

  if (!e.OPENAI_API_KEY && e.ASSISTANT_MEMORY_BACKEND === "semantic") {
    throw new ConfigurationError("Invalid configuration: OPENAI_API_KEY is required for the semantic memory backend", [
      "OPENAI_API_KEY",
    ]);
  }

  const { GOOGLE_CLIENT_ID: clientId, GOOGLE_CLIENT_SECRET: clientSecret } = e;
  if (Boolean(clientId) !== Boolean(clientSecret)) {
    const missing = clientId ? "GOOGLE_CLIENT_SECRET" : "GOOGLE_CLIENT_ID";
    throw new ConfigurationError(`Invalid configuration: ${missing} is required when the other Google credential is set`, [missing]);
  }

  return {
    openaiApiKey: e.OPENAI_API_KEY,
    openaiBaseUrl: e.OPENAI_BASE_URL,
    memoryBackend: e.ASSISTANT_MEMORY_BACKEND,
    memoryFile: e.ASSISTANT_MEMORY_FILE,
    vectorDbPath: e.ASSISTANT_VECTOR_DB,
    chatModel: e.ASSISTANT_CHAT_MODEL,
    embedModel: e.ASSISTANT_EMBED_MODEL,
    summarizeMemories: e.ASSISTANT_SUMMARIZE,
    topK: e.ASSISTANT_TOPK,
    timeZone: e.ASSISTANT_TIMEZONE,
    google: clientId && clientSecret ? { clientId, clientSecret, tokenFile: e.GOOGLE_TOKEN_FILE } : undefined,
  };
}
