import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SqliteVectorIndex, type VectorEntry } from "./vector-index.js";

const entry = (id: string, owner: string, embedding: number[] | undefined, createdAt: string): VectorEntry => ({
  id,
  owner,
  text: `text ${id}`,
  createdAt,
  metadata: { tag: id },
  embedding,
});

describe("SqliteVectorIndex", () => {
  let index: SqliteVectorIndex;

  beforeEach(() => {
    index = new SqliteVectorIndex(":memory:");
  });

  afterEach(async () => {
    await index.close();
  });

  it("ranks by cosine similarity and cuts at k", async () => {
    await index.upsert(entry("a", "s1", [1, 0], "2024-03-01T00:00:00.000Z"));
    await index.upsert(entry("b", "s1", [0, 1], "2024-03-02T00:00:00.000Z"));
    await index.upsert(entry("c", "s1", [1, 1], "2024-03-03T00:00:00.000Z"));

    const hits = await index.nearest("s1", [1, 0], 2);
    expect(hits.map((h) => h.id)).toEqual(["a", "c"]);
    expect(hits[0].metadata).toEqual({ tag: "a" });
    expect(await index.nearest("s1", [1, 0], 0)).toEqual([]);
  });

  it("skips entries stored without an embedding when ranking", async () => {
    await index.upsert(entry("a", "s1", undefined, "2024-03-01T00:00:00.000Z"));
    expect(await index.nearest("s1", [1, 0], 5)).toEqual([]);
    expect((await index.list("s1")).map((e) => e.id)).toEqual(["a"]);
  });

  it("lists oldest first and keeps owners apart", async () => {
    await index.upsert(entry("late", "s1", [1], "2024-03-05T00:00:00.000Z"));
    await index.upsert(entry("early", "s1", [1], "2024-03-01T00:00:00.000Z"));
    await index.upsert(entry("other", "s2", [1], "2024-03-02T00:00:00.000Z"));

    expect((await index.list("s1")).map((e) => e.id)).toEqual(["early", "late"]);
    expect(await index.get("s2", "late")).toBeUndefined();
  });

  it("replaces text on upsert of an existing id", async () => {
    await index.upsert(entry("a", "s1", [1, 0], "2024-03-01T00:00:00.000Z"));
    await index.upsert({ ...entry("a", "s1", [0, 1], "2024-03-01T00:00:00.000Z"), text: "edited" });

    const got = await index.get("s1", "a");
    expect(got?.text).toBe("edited");
    expect(got?.embedding).toEqual([0, 1]);
  });

  it("removes one entry or all of an owner's entries", async () => {
    await index.upsert(entry("a", "s1", [1], "2024-03-01T00:00:00.000Z"));
    await index.upsert(entry("b", "s1", [1], "2024-03-02T00:00:00.000Z"));
    await index.upsert(entry("c", "s2", [1], "2024-03-02T00:00:00.000Z"));

    expect(await index.remove("s1", "a")).toBe(true);
    expect(await index.remove("s1", "a")).toBe(false);
    expect(await index.removeAll("s1")).toBe(1);
    expect(await index.removeAll("s1")).toBe(0);
    expect((await index.list("s2")).map((e) => e.id)).toEqual(["c"]);
  });
});
