import type { LlmTurnInput, LlmTurnOutput } from "./llm-protocol.js";

export type LlmProviderName = "openai" | "anthropic";

export interface LlmProviderConfig {
  provider: LlmProviderName;
  apiKey: string;
  model: string;
  timeoutMs: number;
  maxRetries: number;
}

export interface LlmProvider {
  name: string;
  version: string;
  start(): void | Promise<void>;
  stop(): void | Promise<void>;
  generateTurn(input: LlmTurnInput): Promise<LlmTurnOutput>;
}
