import { describe, expect, it } from "vitest";
import { assembleContext, buildMessages, buildSystemPrompt, HISTORY_WINDOW, trimHistory } from "./context.js";
import { formatMemoriesForContext, NO_MEMORIES } from "./store.js";
import type { ConversationTurn, Intent, MemoryRecord } from "./types.js";

const store = { formatForContext: formatMemoriesForContext };

const turns = (n: number): ConversationTurn[] =>
  Array.from({ length: n }, (_, i): ConversationTurn => ({ role: i % 2 === 0 ? "user" : "assistant", content: `turn ${i}` }));

const calendarIntent: Intent = { wantsCalendar: true, wantsMemoryWrite: false, wantsConversation: true };
const chatIntent: Intent = { wantsCalendar: false, wantsMemoryWrite: false, wantsConversation: true };

const memory: MemoryRecord = {
  id: "mem_0_1",
  owner: "s1",
  text: "I prefer morning study sessions",
  createdAt: "2024-03-05T15:00:00.000Z",
  metadata: {},
};

describe("trimHistory", () => {
  it("keeps the ten most recent turns in order", () => {
    const history = turns(13);
    const window = trimHistory(history);
    expect(window).toHaveLength(HISTORY_WINDOW);
    expect(window).toEqual(history.slice(3));
    expect(window[0].content).toBe("turn 3");
  });

  it("passes short histories through", () => {
    expect(trimHistory(turns(4))).toEqual(turns(4));
  });

  it("does not mutate the source", () => {
    const history = turns(12);
    trimHistory(history);
    expect(history).toHaveLength(12);
  });
});

describe("assembleContext", () => {
  it("uses the store's formatting for the memory section", () => {
    const bundle = assembleContext({ store, memories: [memory], intent: chatIntent, history: [] });
    expect(bundle.memorySection).toBe("Previous memories about the user:\n1. I prefer morning study sessions");
  });

  it("passes calendar text through only for calendar intent", () => {
    const withIntent = assembleContext({ store, memories: [], intent: calendarIntent, calendarText: "Here are your events", history: [] });
    const without = assembleContext({ store, memories: [], intent: chatIntent, calendarText: "Here are your events", history: [] });
    expect(withIntent.calendarSection).toBe("Here are your events");
    expect(without.calendarSection).toBe("");
  });

  it("bounds the history window", () => {
    const bundle = assembleContext({ store, memories: [], intent: chatIntent, history: turns(20) });
    expect(bundle.historyWindow).toEqual(turns(20).slice(10));
  });
});

describe("buildSystemPrompt", () => {
  it("includes memories and asks for personalization", () => {
    const bundle = assembleContext({ store, memories: [memory], intent: chatIntent, history: [] });
    const prompt = buildSystemPrompt(bundle);
    expect(prompt).toContain("1. I prefer morning study sessions");
    expect(prompt.endsWith("Be friendly, concise, and helpful. Use the memory context to personalize your responses.")).toBe(true);
  });

  it("keeps the sentinel and skips personalization without memories", () => {
    const bundle = assembleContext({ store, memories: [], intent: chatIntent, history: [] });
    const prompt = buildSystemPrompt(bundle);
    expect(prompt).toContain(NO_MEMORIES);
    expect(prompt).not.toContain("personalize");
  });

  it("adds calendar text and notes", () => {
    const bundle = assembleContext({ store, memories: [], intent: calendarIntent, calendarText: "Here are your events for today:", history: [] });
    const prompt = buildSystemPrompt(bundle, ["✓ saved"]);
    const sections = prompt.split("\n\n");
    expect(sections[2]).toBe("Here are your events for today:");
    expect(sections[3]).toBe("✓ saved");
    expect(sections[4]).toContain("acknowledge it briefly");
  });
});

describe("buildMessages", () => {
  it("appends the current message after the history window", () => {
    const bundle = assembleContext({ store, memories: [], intent: chatIntent, history: turns(2) });
    expect(buildMessages(bundle, "next?")).toEqual([...turns(2), { role: "user", content: "next?" }]);
  });
});
