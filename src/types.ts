export interface MemoryRecord {
  id: string;
  owner: string;
  text: string;
  createdAt: string;
  metadata: Record<string, string>;
}

/** `text` absent means "all records for owner". */
export interface MemoryQuery {
  owner: string;
  text?: string;
}

export type EventTime =
  | { kind: "instant"; at: Date }
  | { kind: "date"; date: string };

export interface EventRecord {
  summary: string;
  start: EventTime;
  end: EventTime;
  location?: string;
  description?: string;
}

export interface Intent {
  wantsCalendar: boolean;
  wantsMemoryWrite: boolean;
  wantsConversation: boolean;
}

export type TurnRole = "user" | "assistant";

export interface ConversationTurn {
  role: TurnRole;
  content: string;
}

export interface ContextBundle {
  memorySection: string;
  calendarSection: string;
  historyWindow: ConversationTurn[];
}
