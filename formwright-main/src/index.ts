export * from "./schema/index.js";
export * from "./extraction/index.js";
export * from "./interpreter/index.js";
export * from "./shared/index.js";
export type { LlmProvider, LlmProviderConfig, LlmProviderName, LlmMessage, LlmTurnInput, LlmTurnOutput } from "./core/index.js";
export { loadProvider } from "./core/index.js";
export { loadLlmConfig } from "./config/llm.js";
export { startSession, DEFAULT_SCHEMA_PATH } from "./app/main.js";
export type { Session, SessionOptions } from "./app/main.js";
