export type { LlmProvider, LlmProviderConfig, LlmProviderName } from "./contracts/provider.js";
export type { LlmMessage, LlmTurnInput, LlmTurnOutput } from "./contracts/llm-protocol.js";
export { loadProvider } from "./runtime/provider-loader.js";
export type { CreateProvider, ProviderFactory } from "./runtime/provider-loader.js";
