import type { BackendError } from "./errors.js";
import type { Result } from "./result.js";
import type { MemoryQuery, MemoryRecord } from "./types.js";

export const NO_MEMORIES = "No previous memories found.";
export const MEMORIES_HEADER = "Previous memories about the user:";

/**
 * Contract shared by the exact and semantic stores. The orchestrator only
 * ever sees this interface.
 */
export interface MemoryStore {
  readonly kind: "exact" | "semantic";
  add(owner: string, text: string, metadata?: Record<string, string>): Promise<Result<MemoryRecord, BackendError>>;
  /** Never rejects: backend failures yield an empty list. */
  search(owner: string, queryText: string): Promise<MemoryRecord[]>;
  getAll(owner: string): Promise<MemoryRecord[]>;
  update(owner: string, id: string, text: string): Promise<Result<MemoryRecord, BackendError>>;
  /** Resolves `false` when the record does not exist. */
  delete(owner: string, id: string): Promise<Result<boolean, BackendError>>;
  deleteAll(owner: string): Promise<Result<void, BackendError>>;
  formatForContext(records: readonly MemoryRecord[]): string;
}

export function formatMemoriesForContext(records: readonly MemoryRecord[]): string {
  if (records.length === 0) return NO_MEMORIES;
  const lines = records.map((r, i) => `${i + 1}. ${r.text}`);
  return [MEMORIES_HEADER, ...lines].join("\n");
}

export function queryMemories(store: Pick<MemoryStore, "search" | "getAll">, q: MemoryQuery): Promise<MemoryRecord[]> {
  const text = q.text?.trim() ?? "";
  return text.length > 0 ? store.search(q.owner, text) : store.getAll(q.owner);
}
