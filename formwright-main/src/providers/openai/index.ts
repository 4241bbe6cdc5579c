import OpenAI from "openai";
import type { LlmProvider, LlmProviderConfig } from "../../core/contracts/provider.js";
import type { LlmMessage, LlmTurnInput, LlmTurnOutput } from "../../core/contracts/llm-protocol.js";
import { ConfigError } from "../../shared/errors.js";

const MAX_COMPLETION_TOKENS = 256;

function toOpenAiMessages(messages: LlmMessage[]): OpenAI.Chat.Completions.ChatCompletionMessageParam[] {
  const out: OpenAI.Chat.Completions.ChatCompletionMessageParam[] = [];

  for (const msg of messages) {
    switch (msg.role) {
      case "system":
        out.push({ role: "system", content: msg.content });
        break;
      case "user":
        out.push({ role: "user", content: msg.content });
        break;
      case "assistant":
        out.push({ role: "assistant", content: msg.content });
        break;
    }
  }

  return out;
}

export function createOpenAiProvider(config: LlmProviderConfig): LlmProvider {
  let client: OpenAI | null = null;

  return {
    name: "openai",
    version: "1.0.0",

    start() {
      if (!config.apiKey) {
        throw new ConfigError("Missing OPENAI_API_KEY environment variable.");
      }
      client = new OpenAI({
        apiKey: config.apiKey,
        timeout: config.timeoutMs,
        maxRetries: config.maxRetries,
      });
    },

    stop() {
      client = null;
    },

    async generateTurn(input: LlmTurnInput): Promise<LlmTurnOutput> {
      if (!client) {
        throw new Error("OpenAI provider not started.");
      }

      const response = await client.chat.completions.create({
        model: config.model,
        messages: toOpenAiMessages(input.messages),
        temperature: 0,
        max_tokens: MAX_COMPLETION_TOKENS,
      });

      const reply = response.choices[0]?.message?.content;
      if (!reply) {
        throw new Error("Empty response from OpenAI.");
      }

      return {
        type: "assistant",
        content: reply,
      };
    },
  };
}

export default createOpenAiProvider;
