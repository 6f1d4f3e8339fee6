export * from "./types.js";
export * from "./errors.js";
export * from "./result.js";
export * from "./store.js";
export { ExactMemoryStore } from "./exact-store.js";
export type { ExactMemoryStoreOptions } from "./exact-store.js";
export { SemanticMemoryStore } from "./semantic-store.js";
export type { SemanticMemoryStoreOptions } from "./semantic-store.js";
export { SqliteVectorIndex } from "./vector-index.js";
export type { VectorEntry, VectorIndex } from "./vector-index.js";
export * from "./calendar.js";
export { GoogleCalendarSource, toEventRecord } from "./google-calendar.js";
export type { GoogleCalendarOptions } from "./google-calendar.js";
export * from "./intent.js";
export * from "./context.js";
export * from "./orchestrator.js";
export { loadConfig } from "./config.js";
export type { AssistantConfig, EnvSource } from "./config.js";
export { createAssistant } from "./assistant.js";
export type { Assistant } from "./assistant.js";
export { createAssistantMcpServer, runStdioServer } from "./server.js";
export type { ServerOptions } from "./server.js";
export { createOpenAiEmbeddingProvider } from "./embeddings.js";
export type { EmbeddingProvider, EmbeddingsApi, OpenAiEmbeddingOptions } from "./embeddings.js";
export { createOpenAiSummarizer } from "./summarizer.js";
export type { Summarizer, OpenAiSummarizerOptions } from "./summarizer.js";
export { createOpenAiGenerator } from "./generation.js";
export { RuleBasedGenerator, helpSubjects } from "./rule-generator.js";
export { OwnerQueue } from "./owner-queue.js";
export type { TextGenerator, ChatMessage, GenerationRequest, OpenAiGeneratorOptions } from "./generation.js";
