import { NO_MEMORIES, type MemoryStore } from "./store.js";
import type { ContextBundle, ConversationTurn, Intent, MemoryRecord } from "./types.js";

/** Five exchanges. Older turns are dropped, never summarized. */
export const HISTORY_WINDOW = 10;

export function trimHistory(history: readonly ConversationTurn[], limit = HISTORY_WINDOW): ConversationTurn[] {
  if (limit <= 0) return [];
  return history.slice(-limit);
}

export type AssembleInput = {
  store: Pick<MemoryStore, "formatForContext">;
  memories: readonly MemoryRecord[];
  intent: Intent;
  calendarText?: string;
  history: readonly ConversationTurn[];
};

export function assembleContext({ store, memories, intent, calendarText, history }: AssembleInput): ContextBundle {
  return {
    memorySection: store.formatForContext(memories),
    calendarSection: intent.wantsCalendar && calendarText ? calendarText : "",
    historyWindow: trimHistory(history),
  };
}

const PREAMBLE = [
  "You are a helpful academic assistant chatbot for students.",
  "You have access to the user's memories and calendar information.",
].join("\n");

/**
 * `notes` carries what the assistant already did this turn (e.g. saved a
 * memory) so the reply can acknowledge it instead of repeating it.
 */
export function buildSystemPrompt(bundle: ContextBundle, notes: readonly string[] = []): string {
  const hasMemories = bundle.memorySection !== NO_MEMORIES;
  const sections = [PREAMBLE, bundle.memorySection];
  if (bundle.calendarSection) sections.push(bundle.calendarSection);
  if (notes.length > 0) sections.push(notes.join("\n"));

  const guidance = ["Be friendly, concise, and helpful."];
  if (hasMemories) guidance.push("Use the memory context to personalize your responses.");
  if (bundle.calendarSection || notes.length > 0) {
    guidance.push("If you've already provided calendar or specific information, acknowledge it briefly.");
  }
  sections.push(guidance.join(" "));
  return sections.join("\n\n");
}

export function buildMessages(bundle: ContextBundle, userMessage: string): ConversationTurn[] {
  return [...bundle.historyWindow, { role: "user", content: userMessage }];
}
