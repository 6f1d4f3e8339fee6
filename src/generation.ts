import OpenAI from "openai";
import { ConfigurationError, GenerationError } from "./errors.js";
import type { ConversationTurn } from "./types.js";

export type ChatMessage = {
  role: "system" | "user" | "assistant";
  content: string;
};

/** Who the completion is for. Model-backed generators ignore it. */
export type GenerationRequest = {
  owner: string;
};

/**
 * Maps a system instruction plus ordered turns to one completion. The last
 * turn is always the user's current message.
 */
export interface TextGenerator {
  generate(system: string, turns: readonly ConversationTurn[], request: GenerationRequest): Promise<string>;
}

export type OpenAiGeneratorOptions = {
  apiKey?: string;
  model?: string;
  baseURL?: string;
  temperature?: number;
  maxTokens?: number;
};

export const DEFAULT_CHAT_MODEL = "gpt-3.5-turbo";

export function createOpenAiGenerator(opts: OpenAiGeneratorOptions = {}): TextGenerator {
  if (!opts.apiKey) throw new ConfigurationError("Missing OpenAI API key. Set OPENAI_API_KEY.", ["OPENAI_API_KEY"]);
  const client = new OpenAI({ apiKey: opts.apiKey, baseURL: opts.baseURL });
  const model = opts.model || DEFAULT_CHAT_MODEL;

  return {
    async generate(system, turns) {
      const messages: ChatMessage[] = [{ role: "system", content: system }, ...turns];
      let text: string | null | undefined;
      try {
        const res = await client.chat.completions.create({
          model,
          messages,
          temperature: opts.temperature ?? 0.7,
          max_tokens: opts.maxTokens ?? 500,
        });
        text = res.choices[0]?.message?.content;
      } catch (err) {
        throw new GenerationError(err instanceof Error ? err.message : String(err), { cause: err });
      }
      if (!text || !text.trim()) throw new GenerationError("completion returned no text");
      return text.trim();
    },
  };
}
