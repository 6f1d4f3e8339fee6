import fs from "node:fs";
import { z } from "zod";
import { BackendError } from "./errors.js";
import { err, ok, type Result } from "./result.js";
import { formatMemoriesForContext, type MemoryStore } from "./store.js";
import type { MemoryRecord } from "./types.js";
import { errorMessage, logErr } from "./util.js";

const storedRecordSchema = z.object({
  id: z.string().min(1),
  text: z.string(),
  timestamp: z.string(),
  metadata: z.record(z.string()).default({}),
});

const ownerRecordsSchema = z.array(storedRecordSchema);

type StoredRecord = z.infer<typeof storedRecordSchema>;
// a Map, not an object: owner ids are opaque and may collide with Object.prototype keys
type MemoryDocument = Map<string, StoredRecord[]>;

function parseDocument(raw: unknown): MemoryDocument {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new Error("memory file must hold a JSON object");
  }
  const doc: MemoryDocument = new Map();
  for (const [owner, records] of Object.entries(raw)) {
    const parsed = ownerRecordsSchema.safeParse(records);
    if (!parsed.success) throw new Error(`records of ${JSON.stringify(owner)}: ${parsed.error.message}`);
    doc.set(owner, parsed.data);
  }
  return doc;
}

export type ExactMemoryStoreOptions = {
  filePath: string;
  now?: () => Date;
};

const BACKEND = "exact-store";

/**
 * Local store backed by one JSON document mapping owner to records. The
 * document is rewritten in full, synchronously, after every mutation; a
 * failed write rolls the in-memory change back.
 */
export class ExactMemoryStore implements MemoryStore {
  readonly kind = "exact" as const;
  private readonly filePath: string;
  private readonly now: () => Date;
  private doc: MemoryDocument;

  constructor(opts: ExactMemoryStoreOptions) {
    this.filePath = opts.filePath;
    this.now = opts.now ?? (() => new Date());
    this.doc = this.load();
  }

  private load(): MemoryDocument {
    if (!fs.existsSync(this.filePath)) return new Map();
    const raw = fs.readFileSync(this.filePath, "utf8");
    try {
      return parseDocument(JSON.parse(raw));
    } catch (e) {
      const aside = `${this.filePath}.corrupt-${Date.now()}`;
      fs.renameSync(this.filePath, aside);
      logErr("warn: unreadable memory file moved to", aside, "-", errorMessage(e));
      return new Map();
    }
  }

  private flush(next: MemoryDocument): Result<void, BackendError> {
    const tmp = `${this.filePath}.tmp`;
    try {
      fs.writeFileSync(tmp, JSON.stringify(Object.fromEntries(next), null, 2), "utf8");
      fs.renameSync(tmp, this.filePath);
      this.doc = next;
      return ok(undefined);
    } catch (e) {
      return err(BackendError.from(BACKEND, e));
    }
  }

  private recordsOf(owner: string): StoredRecord[] {
    return this.doc.get(owner) ?? [];
  }

  private withOwner(owner: string, records: StoredRecord[]): MemoryDocument {
    return new Map(this.doc).set(owner, records);
  }

  private toRecord(owner: string, r: StoredRecord): MemoryRecord {
    return { id: r.id, owner, text: r.text, createdAt: r.timestamp, metadata: { ...r.metadata } };
  }

  private nextId(existing: readonly StoredRecord[]): string {
    const taken = new Set(existing.map((r) => r.id));
    const stamp = this.now().getTime();
    let seq = existing.length;
    while (taken.has(`mem_${seq}_${stamp}`)) seq++;
    return `mem_${seq}_${stamp}`;
  }

  async add(owner: string, text: string, metadata: Record<string, string> = {}): Promise<Result<MemoryRecord, BackendError>> {
    if (!owner) return err(new BackendError(BACKEND, "owner must not be empty"));
    const existing = this.recordsOf(owner);
    const stored: StoredRecord = {
      id: this.nextId(existing),
      text,
      timestamp: this.now().toISOString(),
      metadata: { ...metadata },
    };
    const flushed = this.flush(this.withOwner(owner, [...existing, stored]));
    if (!flushed.ok) {
      logErr("warn: memory not saved for", owner, "-", flushed.error.message);
      return flushed;
    }
    logErr("info: memory added for", owner);
    return ok(this.toRecord(owner, stored));
  }

  async search(owner: string, queryText: string): Promise<MemoryRecord[]> {
    const needle = queryText.trim().toLowerCase();
    if (!needle) return [];
    return this.recordsOf(owner)
      .filter((r) => r.text.toLowerCase().includes(needle))
      .map((r) => this.toRecord(owner, r));
  }

  async getAll(owner: string): Promise<MemoryRecord[]> {
    return this.recordsOf(owner).map((r) => this.toRecord(owner, r));
  }

  async update(owner: string, id: string, text: string): Promise<Result<MemoryRecord, BackendError>> {
    const existing = this.recordsOf(owner);
    const idx = existing.findIndex((r) => r.id === id);
    if (idx < 0) return err(new BackendError(BACKEND, `no memory ${id} for ${owner}`));
    const changed: StoredRecord = { ...existing[idx], text };
    const records = existing.map((r, i) => (i === idx ? changed : r));
    const flushed = this.flush(this.withOwner(owner, records));
    if (!flushed.ok) return flushed;
    return ok(this.toRecord(owner, changed));
  }

  async delete(owner: string, id: string): Promise<Result<boolean, BackendError>> {
    const existing = this.recordsOf(owner);
    const records = existing.filter((r) => r.id !== id);
    if (records.length === existing.length) return ok(false);
    const flushed = this.flush(this.withOwner(owner, records));
    return flushed.ok ? ok(true) : flushed;
  }

  async deleteAll(owner: string): Promise<Result<void, BackendError>> {
    if (!this.doc.has(owner)) return ok(undefined);
    const rest = new Map(this.doc);
    rest.delete(owner);
    const flushed = this.flush(rest);
    if (flushed.ok) logErr("info: all memories deleted for", owner);
    return flushed;
  }

  formatForContext(records: readonly MemoryRecord[]): string {
    return formatMemoriesForContext(records);
  }
}
