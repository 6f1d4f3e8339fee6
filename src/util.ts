export const nowIso = () => new Date().toISOString();

export function logErr(...args: unknown[]) {
  try { process.stderr.write(args.map(String).join(" ") + "\n"); } catch { /* stderr closed */ }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function cosineSimilarity(a?: number[], b?: number[]): number {
  if (!Array.isArray(a) || !Array.isArray(b)) return 0;
  const len = Math.min(a.length, b.length);
  if (len === 0) return 0;

  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < len; i++) {
    const ai = a[i];
    const bi = b[i];
    if (!Number.isFinite(ai) || !Number.isFinite(bi)) continue;
    dot += ai * bi;
    normA += ai * ai;
    normB += bi * bi;
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / Math.sqrt(normA * normB);
}

export function truncate(text: string, max: number, marker = "..."): string {
  if (text.length <= max) return text;
  return text.slice(0, max) + marker;
}
