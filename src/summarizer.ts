import OpenAI from "openai";
import { ConfigurationError } from "./errors.js";

/** Compresses free text into a short, storable fact before it is embedded. */
export interface Summarizer {
  condense(text: string): Promise<string>;
}

export type OpenAiSummarizerOptions = {
  apiKey?: string;
  model?: string;
  baseURL?: string;
};

const CONDENSE_INSTRUCTION =
  "Rewrite the student's message as one short factual sentence about the student, in the third person. " +
  "Keep preferences, courses, deadlines and needs. Reply with the sentence only.";

export function createOpenAiSummarizer(opts: OpenAiSummarizerOptions = {}): Summarizer {
  if (!opts.apiKey) throw new ConfigurationError("Missing summarizer API key. Set OPENAI_API_KEY.", ["OPENAI_API_KEY"]);
  const client = new OpenAI({ apiKey: opts.apiKey, baseURL: opts.baseURL });
  const model = opts.model || "gpt-3.5-turbo";

  return {
    async condense(text: string) {
      const res = await client.chat.completions.create({
        model,
        messages: [
          { role: "system", content: CONDENSE_INSTRUCTION },
          { role: "user", content: text },
        ],
        temperature: 0.2,
        max_tokens: 200,
      });
      const out = res.choices[0]?.message?.content?.trim();
      if (!out) throw new Error("summarizer returned no text");
      return out;
    },
  };
}
