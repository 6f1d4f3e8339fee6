import { randomUUID } from "node:crypto";
import type { EmbeddingProvider } from "./embeddings.js";
import { BackendError } from "./errors.js";
import { err, ok, type Result } from "./result.js";
import { formatMemoriesForContext, type MemoryStore } from "./store.js";
import type { Summarizer } from "./summarizer.js";
import type { MemoryRecord } from "./types.js";
import { errorMessage, logErr, nowIso } from "./util.js";
import type { VectorEntry, VectorIndex } from "./vector-index.js";

export type SemanticMemoryStoreOptions = {
  index: VectorIndex;
  embeddings: EmbeddingProvider;
  summarizer?: Summarizer;
  topK?: number;
};

const BACKEND = "semantic-store";

async function tryCondense(summarizer: Summarizer | undefined, text: string): Promise<string> {
  if (!summarizer) return text;
  try {
    const condensed = await summarizer.condense(text);
    return condensed.trim() || text;
  } catch (e) {
    logErr("warn: summarizing memory failed, storing raw text:", errorMessage(e));
    return text;
  }
}

function toRecord(entry: VectorEntry): MemoryRecord {
  return {
    id: entry.id,
    owner: entry.owner,
    text: entry.text,
    createdAt: entry.createdAt,
    metadata: { ...entry.metadata },
  };
}

/**
 * Thin adapter over an embedding provider and a vector index. It adds no
 * ranking of its own.
 */
export class SemanticMemoryStore implements MemoryStore {
  readonly kind = "semantic" as const;
  private readonly index: VectorIndex;
  private readonly embeddings: EmbeddingProvider;
  private readonly summarizer?: Summarizer;
  private readonly topK: number;

  constructor(opts: SemanticMemoryStoreOptions) {
    this.index = opts.index;
    this.embeddings = opts.embeddings;
    this.summarizer = opts.summarizer;
    this.topK = opts.topK ?? 6;
  }

  async add(owner: string, text: string, metadata: Record<string, string> = {}): Promise<Result<MemoryRecord, BackendError>> {
    if (!owner) return err(new BackendError(BACKEND, "owner must not be empty"));
    const stored = await tryCondense(this.summarizer, text);
    const entry: VectorEntry = {
      id: randomUUID(),
      owner,
      text: stored,
      createdAt: nowIso(),
      metadata: stored === text ? { ...metadata } : { ...metadata, source: text },
    };
    try {
      entry.embedding = await this.embeddings.embedDocument(stored);
      await this.index.upsert(entry);
    } catch (e) {
      logErr("warn: memory not saved for", owner, "-", errorMessage(e));
      return err(BackendError.from(BACKEND, e));
    }
    logErr("info: memory added for", owner);
    return ok(toRecord(entry));
  }

  async search(owner: string, queryText: string): Promise<MemoryRecord[]> {
    const query = queryText.trim();
    if (!query) return [];
    try {
      const vector = await this.embeddings.embedQuery(query);
      const hits = await this.index.nearest(owner, vector, this.topK);
      return hits.map(toRecord);
    } catch (e) {
      logErr("warn: memory search failed for", owner, "-", errorMessage(e));
      return [];
    }
  }

  async getAll(owner: string): Promise<MemoryRecord[]> {
    try {
      const entries = await this.index.list(owner);
      return entries.map(toRecord);
    } catch (e) {
      logErr("warn: listing memories failed for", owner, "-", errorMessage(e));
      return [];
    }
  }

  async update(owner: string, id: string, text: string): Promise<Result<MemoryRecord, BackendError>> {
    try {
      const current = await this.index.get(owner, id);
      if (!current) return err(new BackendError(BACKEND, `no memory ${id} for ${owner}`));
      const embedding = await this.embeddings.embedDocument(text);
      // an explicit edit replaces whatever the summarizer derived the text from
      const { source: _source, ...metadata } = current.metadata;
      const next: VectorEntry = { ...current, text, metadata, embedding };
      await this.index.upsert(next);
      return ok(toRecord(next));
    } catch (e) {
      return err(BackendError.from(BACKEND, e));
    }
  }

  async delete(owner: string, id: string): Promise<Result<boolean, BackendError>> {
    try {
      return ok(await this.index.remove(owner, id));
    } catch (e) {
      return err(BackendError.from(BACKEND, e));
    }
  }

  async deleteAll(owner: string): Promise<Result<void, BackendError>> {
    try {
      const removed = await this.index.removeAll(owner);
      logErr("info: deleted", String(removed), "memories for", owner);
      return ok(undefined);
    } catch (e) {
      return err(BackendError.from(BACKEND, e));
    }
  }

  formatForContext(records: readonly MemoryRecord[]): string {
    return formatMemoriesForContext(records);
  }
}
