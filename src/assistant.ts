import { CalendarGateway } from "./calendar.js";
import type { AssistantConfig } from "./config.js";
import { createOpenAiEmbeddingProvider } from "./embeddings.js";
import { ExactMemoryStore } from "./exact-store.js";
import { createOpenAiGenerator } from "./generation.js";
import { GoogleCalendarSource } from "./google-calendar.js";
import { QueryOrchestrator } from "./orchestrator.js";
import { RuleBasedGenerator } from "./rule-generator.js";
import { SemanticMemoryStore } from "./semantic-store.js";
import type { MemoryStore } from "./store.js";
import { createOpenAiSummarizer } from "./summarizer.js";
import { SqliteVectorIndex } from "./vector-index.js";

export type Assistant = {
  orchestrator: QueryOrchestrator;
  memory: MemoryStore;
  calendar?: CalendarGateway;
  /** Consent URL to show when no Google token is stored yet. */
  calendarAuthUrl?: string;
  /** "rules" when no OpenAI key is configured. */
  replies: "model" | "rules";
  close(): Promise<void>;
};

/**
 * Wires the configured backends together. The backend is chosen here, once.
 * Without an OpenAI key replies come from the rule-based generator.
 */
export function createAssistant(config: AssistantConfig): Assistant {
  const openai = { apiKey: config.openaiApiKey, baseURL: config.openaiBaseUrl };
  let memory: MemoryStore;
  let close = async () => {};

  if (config.memoryBackend === "semantic") {
    const index = new SqliteVectorIndex(config.vectorDbPath);
    memory = new SemanticMemoryStore({
      index,
      embeddings: createOpenAiEmbeddingProvider({ ...openai, model: config.embedModel }),
      summarizer: config.summarizeMemories ? createOpenAiSummarizer({ ...openai, model: config.chatModel }) : undefined,
      topK: config.topK,
    });
    close = () => index.close();
  } else {
    memory = new ExactMemoryStore({ filePath: config.memoryFile });
  }

  let calendar: CalendarGateway | undefined;
  let calendarAuthUrl: string | undefined;
  if (config.google) {
    const source = new GoogleCalendarSource(config.google);
    calendar = new CalendarGateway(source, { timeZone: config.timeZone });
    calendarAuthUrl = source.authorizationUrl();
  }

  const generator = config.openaiApiKey
    ? createOpenAiGenerator({ ...openai, model: config.chatModel })
    : new RuleBasedGenerator(memory);
  const orchestrator = new QueryOrchestrator({ memory, calendar, generator });

  return {
    orchestrator,
    memory,
    calendar,
    calendarAuthUrl,
    replies: config.openaiApiKey ? "model" : "rules",
    close,
  };
}
