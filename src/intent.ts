import type { Intent } from "./types.js";

export const CALENDAR_KEYWORDS = [
  "meeting",
  "schedule",
  "calendar",
  "event",
  "appointment",
  "today",
  "tomorrow",
  "this week",
  "next week",
  "what do i have",
] as const;

export const MEMORY_WRITE_KEYWORDS = [
  "remember",
  "i prefer",
  "my preference",
  "note that",
  "keep in mind",
  "don't forget",
] as const;

function normalize(message: string): string {
  return message.toLowerCase().replace(/[‘’]/g, "'");
}

function mentionsAny(text: string, keywords: readonly string[]): boolean {
  return keywords.some((k) => text.includes(k));
}

/**
 * Keyword heuristic. The flags are independent gates: one message may ask
 * for a calendar lookup and a memory write at once.
 */
export function classify(message: string): Intent {
  const text = normalize(message);
  return {
    wantsCalendar: mentionsAny(text, CALENDAR_KEYWORDS),
    wantsMemoryWrite: mentionsAny(text, MEMORY_WRITE_KEYWORDS),
    wantsConversation: true,
  };
}
