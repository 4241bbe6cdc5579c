import Anthropic from "@anthropic-ai/sdk";
import type { LlmProvider, LlmProviderConfig } from "../../core/contracts/provider.js";
import type { LlmMessage, LlmTurnInput, LlmTurnOutput } from "../../core/contracts/llm-protocol.js";
import { ConfigError } from "../../shared/errors.js";

const MAX_COMPLETION_TOKENS = 256;

interface AnthropicMessageBuild {
  system?: string;
  messages: Array<{
    role: "user" | "assistant";
    content: string;
  }>;
}

function toAnthropicPayload(messages: LlmMessage[]): AnthropicMessageBuild {
  const out: AnthropicMessageBuild = {
    messages: [],
  };

  for (const msg of messages) {
    switch (msg.role) {
      case "system":
        out.system = out.system ? `${out.system}\n\n${msg.content}` : msg.content;
        break;
      case "user":
      case "assistant":
        out.messages.push({
          role: msg.role,
          content: msg.content,
        });
        break;
    }
  }

  return out;
}

export function createAnthropicProvider(config: LlmProviderConfig): LlmProvider {
  let client: Anthropic | null = null;

  return {
    name: "anthropic",
    version: "1.0.0",

    start() {
      if (!config.apiKey) {
        throw new ConfigError("Missing ANTHROPIC_API_KEY environment variable.");
      }
      client = new Anthropic({
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
        throw new Error("Anthropic provider not started.");
      }

      const payload = toAnthropicPayload(input.messages);

      const response = await client.messages.create({
        model: config.model,
        max_tokens: MAX_COMPLETION_TOKENS,
        temperature: 0,
        ...(payload.system ? { system: payload.system } : {}),
        messages: payload.messages,
      });

      const textParts: string[] = [];
      for (const block of response.content) {
        if (block.type === "text") {
          textParts.push(block.text);
        }
      }

      const reply = textParts.join("\n").trim();
      if (!reply) {
        throw new Error("Empty response from Anthropic.");
      }

      return {
        type: "assistant",
        content: reply,
      };
    },
  };
}

export default createAnthropicProvider;
