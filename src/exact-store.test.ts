import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ExactMemoryStore } from "./exact-store.js";
import { NO_MEMORIES } from "./store.js";

const FIXED = new Date("2024-03-05T15:00:00Z");

describe("ExactMemoryStore", () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "exact-store-"));
    file = path.join(dir, "memories.json");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const open = () => new ExactMemoryStore({ filePath: file, now: () => FIXED });

  describe("add", () => {
    it("makes the record visible exactly once", async () => {
      const store = open();
      const res = await store.add("s1", "I prefer morning study sessions");
      expect(res.ok).toBe(true);

      const all = await store.getAll("s1");
      expect(all).toHaveLength(1);
      expect(all[0].text).toBe("I prefer morning study sessions");
      expect(all[0].owner).toBe("s1");
    });

    it("derives ids from the owner's sequence and the creation time", async () => {
      const store = open();
      const first = await store.add("s1", "a");
      const second = await store.add("s1", "b");
      const other = await store.add("s2", "c");

      expect(first.ok && first.value.id).toBe("mem_0_1709650800000");
      expect(second.ok && second.value.id).toBe("mem_1_1709650800000");
      expect(other.ok && other.value.id).toBe("mem_0_1709650800000");
    });

    it("skips ids still in use after a delete", async () => {
      const store = open();
      await store.add("s1", "a");
      await store.add("s1", "b");
      await store.delete("s1", "mem_0_1709650800000");

      const res = await store.add("s1", "c");
      expect(res.ok && res.value.id).toBe("mem_2_1709650800000");
    });

    it("rejects an empty owner", async () => {
      const store = open();
      const res = await store.add("", "text");
      expect(res.ok).toBe(false);
      expect(fs.existsSync(file)).toBe(false);
    });

    it("reports a failed flush and keeps nothing in memory", async () => {
      const store = new ExactMemoryStore({ filePath: path.join(dir, "missing", "memories.json") });
      const res = await store.add("s1", "lost?");

      expect(res.ok).toBe(false);
      if (!res.ok) expect(res.error.code).toBe("BACKEND_ERROR");
      expect(await store.getAll("s1")).toEqual([]);
    });
  });

  describe("persistence", () => {
    it("writes the whole document after every mutation", async () => {
      const store = open();
      await store.add("s1", "Note that I take CS101", { timestamp: "2024-03-05T15:00:00.000Z" });

      const doc = JSON.parse(fs.readFileSync(file, "utf8"));
      expect(doc).toEqual({
        s1: [
          {
            id: "mem_0_1709650800000",
            text: "Note that I take CS101",
            timestamp: "2024-03-05T15:00:00.000Z",
            metadata: { timestamp: "2024-03-05T15:00:00.000Z" },
          },
        ],
      });
      expect(fs.existsSync(`${file}.tmp`)).toBe(false);
    });

    it("reloads records in insertion order", async () => {
      const store = open();
      await store.add("s1", "first");
      await store.add("s1", "second");

      const reopened = open();
      const texts = (await reopened.getAll("s1")).map((r) => r.text);
      expect(texts).toEqual(["first", "second"]);
    });

    it("keeps owners whose ids match Object.prototype keys across reloads", async () => {
      const store = open();
      await store.add("__proto__", "I prefer morning study sessions");
      await store.add("constructor", "Note that I take CS101");

      const reopened = open();
      expect((await reopened.getAll("__proto__")).map((r) => r.text)).toEqual(["I prefer morning study sessions"]);
      expect((await reopened.getAll("constructor")).map((r) => r.text)).toEqual(["Note that I take CS101"]);

      await reopened.add("s1", "unrelated");
      const again = open();
      expect(await again.getAll("__proto__")).toHaveLength(1);
      expect(await open().getAll("toString")).toEqual([]);
    });

    it("moves an unreadable document aside and starts empty", async () => {
      fs.writeFileSync(file, "{ not json");
      const store = open();

      expect(await store.getAll("s1")).toEqual([]);
      const names = fs.readdirSync(dir);
      expect(names.some((n) => n.startsWith("memories.json.corrupt-"))).toBe(true);
      expect(names).not.toContain("memories.json");
    });
  });

  describe("search", () => {
    it("matches a case-insensitive substring", async () => {
      const store = open();
      await store.add("s1", "I prefer morning study sessions");
      await store.add("s1", "I need extra help with calculus");

      const hits = await store.search("s1", "MORNING");
      expect(hits.map((r) => r.text)).toEqual(["I prefer morning study sessions"]);
    });

    it("returns nothing for a blank query", async () => {
      const store = open();
      await store.add("s1", "anything");
      expect(await store.search("s1", "   ")).toEqual([]);
    });

    it("never crosses owners", async () => {
      const store = open();
      await store.add("s1", "I prefer morning study sessions");

      expect(await store.search("s2", "morning")).toEqual([]);
      expect(await store.getAll("s2")).toEqual([]);
    });
  });

  describe("update and delete", () => {
    it("replaces text but keeps id and creation time", async () => {
      const store = open();
      const added = await store.add("s1", "I prefer mornings");
      if (!added.ok) throw added.error;

      const updated = await store.update("s1", added.value.id, "I prefer evenings");
      expect(updated.ok && updated.value).toEqual({ ...added.value, text: "I prefer evenings" });
    });

    it("fails to update an unknown id", async () => {
      const store = open();
      const res = await store.update("s1", "mem_9_1", "x");
      expect(res.ok).toBe(false);
    });

    it("reports whether delete removed anything", async () => {
      const store = open();
      await store.add("s1", "a");

      const missing = await store.delete("s1", "nope");
      const removed = await store.delete("s1", "mem_0_1709650800000");
      expect(missing.ok && missing.value).toBe(false);
      expect(removed.ok && removed.value).toBe(true);
      expect(await store.getAll("s1")).toEqual([]);
    });

    it("deleteAll removes only that owner's records", async () => {
      const store = open();
      await store.add("s1", "a");
      await store.add("s2", "b");

      const res = await store.deleteAll("s1");
      expect(res.ok).toBe(true);
      expect(await store.getAll("s1")).toEqual([]);
      expect((await store.getAll("s2")).map((r) => r.text)).toEqual(["b"]);
    });

    it("deleteAll on an unknown owner is a no-op", async () => {
      const store = open();
      const res = await store.deleteAll("nobody");
      expect(res.ok).toBe(true);
      expect(fs.existsSync(file)).toBe(false);
    });
  });

  it("formats an empty list as the sentinel", () => {
    expect(open().formatForContext([])).toBe(NO_MEMORIES);
  });
});
