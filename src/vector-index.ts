import sqlite3 from "sqlite3";
import { z } from "zod";
import { cosineSimilarity, logErr } from "./util.js";

export interface VectorEntry {
  id: string;
  owner: string;
  text: string;
  createdAt: string;
  metadata: Record<string, string>;
  embedding?: number[];
}

/**
 * Nearest-neighbour index partitioned by owner. Ranking and top-k policy
 * live here, not in the store that uses it.
 */
export interface VectorIndex {
  upsert(entry: VectorEntry): Promise<void>;
  nearest(owner: string, embedding: number[], k: number): Promise<VectorEntry[]>;
  list(owner: string): Promise<VectorEntry[]>;
  get(owner: string, id: string): Promise<VectorEntry | undefined>;
  remove(owner: string, id: string): Promise<boolean>;
  removeAll(owner: string): Promise<number>;
}

const MAX_EMBEDDING_SIZE = 4096;

const rowSchema = z.object({
  id: z.string(),
  owner: z.string(),
  text: z.string(),
  created_at: z.string(),
  metadata: z.string().nullable(),
  embedding: z.string().nullable(),
});

const metadataSchema = z.record(z.string());
const embeddingSchema = z.array(z.unknown());

type Row = z.infer<typeof rowSchema>;

export class SqliteVectorIndex implements VectorIndex {
  private db: sqlite3.Database;
  private ready: Promise<void>;

  constructor(filePath: string) {
    const sqlite = sqlite3.verbose();
    this.db = new sqlite.Database(filePath);
    this.ready = new Promise((resolve, reject) => {
      this.db.serialize(() => {
        this.db.exec(
          `create table if not exists memories (
            id text primary key,
            owner text not null,
            text text not null,
            created_at text not null,
            metadata text,
            embedding text
          );
          create index if not exists memories_owner on memories(owner, created_at);`,
          (err) => (err ? reject(err) : resolve())
        );
      });
    });
    this.ready.catch((err: unknown) => logErr("fatal: vector index migration:", String(err)));
  }

  private normalizeEmbedding(vec?: readonly unknown[]): number[] | undefined {
    if (!Array.isArray(vec)) return undefined;
    const cleaned: number[] = [];
    for (const value of vec) {
      if (typeof value !== "number" || !Number.isFinite(value)) continue;
      cleaned.push(value);
      if (cleaned.length >= MAX_EMBEDDING_SIZE) break;
    }
    return cleaned.length > 0 ? cleaned : undefined;
  }

  private parseEmbedding(raw: string | null): number[] | undefined {
    if (raw === null) return undefined;
    try {
      const parsed = embeddingSchema.safeParse(JSON.parse(raw));
      return parsed.success ? this.normalizeEmbedding(parsed.data) : undefined;
    } catch {
      return undefined;
    }
  }

  private parseMetadata(raw: string | null): Record<string, string> {
    if (raw === null) return {};
    try {
      const parsed = metadataSchema.safeParse(JSON.parse(raw));
      return parsed.success ? parsed.data : {};
    } catch {
      return {};
    }
  }

  private run(sql: string, params: unknown[] = []): Promise<sqlite3.RunResult> {
    return new Promise((resolve, reject) => {
      this.db.run(sql, params, function (this: sqlite3.RunResult, err: Error | null) {
        if (err) return reject(err);
        resolve(this);
      });
    });
  }

  private all(sql: string, params: unknown[] = []): Promise<Row[]> {
    return new Promise((resolve, reject) => {
      this.db.all(sql, params, (err: Error | null, rows: unknown[]) => {
        if (err) return reject(err);
        try {
          resolve(rows.map((r) => rowSchema.parse(r)));
        } catch (parseErr) {
          reject(parseErr);
        }
      });
    });
  }

  async upsert(entry: VectorEntry): Promise<void> {
    await this.ready;
    const embedding = this.normalizeEmbedding(entry.embedding);
    await this.run(
      `insert into memories (id, owner, text, created_at, metadata, embedding)
       values (?, ?, ?, ?, ?, ?)
       on conflict(id) do update set text = excluded.text, metadata = excluded.metadata, embedding = excluded.embedding`,
      [
        entry.id,
        entry.owner,
        entry.text,
        entry.createdAt,
        JSON.stringify(entry.metadata),
        embedding ? JSON.stringify(embedding) : null,
      ]
    );
  }

  async nearest(owner: string, embedding: number[], k: number): Promise<VectorEntry[]> {
    await this.ready;
    const query = this.normalizeEmbedding(embedding);
    if (!query || k <= 0) return [];
    const rows = await this.all(
      "select * from memories where owner = ? and embedding is not null order by created_at asc",
      [owner]
    );
    return rows
      .map((r) => this.rowToEntry(r))
      .map((entry) => ({ entry, sim: cosineSimilarity(query, entry.embedding) }))
      .sort((a, b) => b.sim - a.sim)
      .slice(0, k)
      .map(({ entry }) => entry);
  }

  async list(owner: string): Promise<VectorEntry[]> {
    await this.ready;
    const rows = await this.all("select * from memories where owner = ? order by created_at asc, rowid asc", [owner]);
    return rows.map((r) => this.rowToEntry(r));
  }

  async get(owner: string, id: string): Promise<VectorEntry | undefined> {
    await this.ready;
    const rows = await this.all("select * from memories where owner = ? and id = ? limit 1", [owner, id]);
    return rows.length > 0 ? this.rowToEntry(rows[0]) : undefined;
  }

  async remove(owner: string, id: string): Promise<boolean> {
    await this.ready;
    const res = await this.run("delete from memories where owner = ? and id = ?", [owner, id]);
    return res.changes > 0;
  }

  async removeAll(owner: string): Promise<number> {
    await this.ready;
    const res = await this.run("delete from memories where owner = ?", [owner]);
    return res.changes;
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private rowToEntry(row: Row): VectorEntry {
    return {
      id: row.id,
      owner: row.owner,
      text: row.text,
      createdAt: row.created_at,
      metadata: this.parseMetadata(row.metadata),
      embedding: this.parseEmbedding(row.embedding),
    };
  }
}
