import { CALENDAR_AUTH_BACKEND, windowFor, type CalendarGateway } from "./calendar.js";
import { assembleContext, buildMessages, buildSystemPrompt } from "./context.js";
import type { BackendError } from "./errors.js";
import type { TextGenerator } from "./generation.js";
import { classify } from "./intent.js";
import type { Result } from "./result.js";
import type { MemoryStore } from "./store.js";
import type { ContextBundle, ConversationTurn, Intent, MemoryRecord } from "./types.js";
import { errorMessage, logErr } from "./util.js";

export const APOLOGY = "I apologize, but I encountered an error generating a response. Please try again.";
export const MEMORY_SAVED = "✓ I've noted that information and will remember it for future conversations.";
export const MEMORY_NOT_SAVED = "⚠ There was an issue saving that information.";
export const CALENDAR_UNAUTHENTICATED = "❌ Unable to access calendar. Please check authentication.";
export const CALENDAR_NOT_CONNECTED = "❌ No calendar is connected, so I can't look up your schedule.";

export type QueryPhase =
  | "idle"
  | "classifying"
  | "fetching-calendar"
  | "writing-memory"
  | "retrieving-memory"
  | "generating";

/** Per-user conversation state. One per active conversation, owned by the caller. */
export interface ChatSession {
  readonly owner: string;
  history: ConversationTurn[];
}

export function createSession(owner: string): ChatSession {
  if (!owner.trim()) throw new Error("session owner must not be empty");
  return { owner, history: [] };
}

export type QueryOutcome = {
  reply: string;
  intent: Intent;
  /** Phases entered, in order, ending with "idle". */
  phases: QueryPhase[];
  /** Absent only when the query failed before context assembly. */
  context?: ContextBundle;
};

export type OrchestratorOptions = {
  memory: MemoryStore;
  generator: TextGenerator;
  calendar?: CalendarGateway;
  now?: () => Date;
  onPhase?: (phase: QueryPhase, owner: string) => void;
};

function calendarUnavailable(label: string): string {
  return `⚠ I couldn't reach your calendar to check ${label}, so I can't say what is scheduled.`;
}

/**
 * Drives one message through classify → calendar → memory write → memory
 * search → generation, then appends the user and assistant turns. No
 * capability failure escapes as an exception.
 */
export class QueryOrchestrator {
  private readonly memory: MemoryStore;
  private readonly generator: TextGenerator;
  private readonly calendar?: CalendarGateway;
  private readonly now: () => Date;
  private readonly onPhase?: (phase: QueryPhase, owner: string) => void;

  constructor(opts: OrchestratorOptions) {
    this.memory = opts.memory;
    this.generator = opts.generator;
    this.calendar = opts.calendar;
    this.now = opts.now ?? (() => new Date());
    this.onPhase = opts.onPhase;
  }

  async handle(session: ChatSession, message: string): Promise<QueryOutcome> {
    const phases: QueryPhase[] = [];
    const enter = (phase: QueryPhase) => {
      phases.push(phase);
      this.onPhase?.(phase, session.owner);
    };

    enter("classifying");
    const intent = classify(message);
    const notes: string[] = [];
    let context: ContextBundle;

    try {
      let calendarText: string | undefined;
      if (intent.wantsCalendar) {
        enter("fetching-calendar");
        calendarText = await this.calendarSection(message);
      }
      if (intent.wantsMemoryWrite) {
        enter("writing-memory");
        notes.push(await this.writeMemory(session.owner, message));
      }
      enter("retrieving-memory");
      const memories = await this.memory.search(session.owner, message);
      context = assembleContext({ store: this.memory, memories, intent, calendarText, history: session.history });
    } catch (e) {
      // history stays untouched when nothing was generated
      logErr("warn: query for", session.owner, "failed before generation:", errorMessage(e));
      enter("idle");
      return { reply: APOLOGY, intent, phases };
    }

    let generated = "";
    if (intent.wantsConversation) {
      enter("generating");
      try {
        generated = await this.generator.generate(buildSystemPrompt(context, notes), buildMessages(context, message), {
          owner: session.owner,
        });
      } catch (e) {
        logErr("warn: generation failed for", session.owner, "-", errorMessage(e));
        generated = APOLOGY;
      }
    }

    const reply = [context.calendarSection, ...notes, generated].filter((part) => part.length > 0).join("\n\n");
    session.history.push({ role: "user", content: message }, { role: "assistant", content: reply });
    enter("idle");
    return { reply, intent, phases, context };
  }

  private async calendarSection(message: string): Promise<string> {
    if (!this.calendar) return CALENDAR_NOT_CONNECTED;
    const window = windowFor(message, this.now());
    const res = await this.calendar.fetch(window);
    if (!res.ok) {
      return res.error.backend === CALENDAR_AUTH_BACKEND ? CALENDAR_UNAUTHENTICATED : calendarUnavailable(window.label);
    }
    return `Here are your events for ${window.label}:\n\n${this.calendar.formatList(res.value)}`;
  }

  private async writeMemory(owner: string, message: string): Promise<string> {
    const res = await this.memory.add(owner, message, { timestamp: this.now().toISOString() });
    return res.ok ? MEMORY_SAVED : MEMORY_NOT_SAVED;
  }

  getAllMemories(session: ChatSession): Promise<MemoryRecord[]> {
    return this.memory.getAll(session.owner);
  }

  clearHistory(session: ChatSession): void {
    session.history = [];
  }

  /** Deletes the owner's memories and clears the conversation. */
  async resetAll(session: ChatSession): Promise<Result<void, BackendError>> {
    const res = await this.memory.deleteAll(session.owner);
    this.clearHistory(session);
    return res;
  }
}
