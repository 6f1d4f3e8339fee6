import OpenAI from "openai";
import { BackendError, ConfigurationError } from "./errors.js";

/** Documents and queries may be embedded differently; both must share one vector space. */
export interface EmbeddingProvider {
  embedDocument(text: string): Promise<number[]>;
  embedQuery(text: string): Promise<number[]>;
}

/** The slice of the OpenAI embeddings API this provider calls. */
export type EmbeddingsApi = {
  create(body: { model: string; input: string }): Promise<{ data: Array<{ embedding: number[] }> }>;
};

export type OpenAiEmbeddingOptions = {
  apiKey?: string;
  model?: string;
  baseURL?: string;
  /** Pre-built client, mainly for tests. */
  client?: { embeddings: EmbeddingsApi };
};

export const DEFAULT_EMBED_MODEL = "text-embedding-3-small";

// well under the model's token limit for ordinary prose
const MAX_INPUT_CHARS = 8000;

const BACKEND = "embeddings";

function prepareInput(text: string): string {
  const collapsed = text.replace(/\s+/g, " ").trim();
  if (!collapsed) throw new BackendError(BACKEND, "cannot embed empty text");
  return collapsed.slice(0, MAX_INPUT_CHARS);
}

export function createOpenAiEmbeddingProvider(opts: OpenAiEmbeddingOptions = {}): EmbeddingProvider {
  let embeddings: EmbeddingsApi;
  if (opts.client) {
    embeddings = opts.client.embeddings;
  } else {
    if (!opts.apiKey) throw new ConfigurationError("Missing embedding API key. Set OPENAI_API_KEY.", ["OPENAI_API_KEY"]);
    embeddings = new OpenAI({ apiKey: opts.apiKey, baseURL: opts.baseURL }).embeddings;
  }
  const model = opts.model || DEFAULT_EMBED_MODEL;
  let dimensions: number | undefined;

  const embed = async (text: string, kind: "document" | "query"): Promise<number[]> => {
    const input = prepareInput(text);
    let vector: number[] | undefined;
    try {
      const res = await embeddings.create({ model, input });
      vector = res.data[0]?.embedding;
    } catch (e) {
      throw BackendError.from(BACKEND, e);
    }
    if (!vector || vector.length === 0) throw new BackendError(BACKEND, `no embedding returned for ${kind}`);
    // a model swap mid-run would make stored and query vectors incomparable
    dimensions ??= vector.length;
    if (vector.length !== dimensions) {
      throw new BackendError(BACKEND, `expected ${dimensions} dimensions, got ${vector.length}`);
    }
    return vector;
  };

  return {
    embedDocument: (text) => embed(text, "document"),
    embedQuery: (text) => embed(text, "query"),
  };
}
