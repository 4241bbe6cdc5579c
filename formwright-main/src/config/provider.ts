import type { LlmProviderName, ProviderFactory } from "../core/index.js";

const providerFactories: Record<LlmProviderName, ProviderFactory> = {
  openai: () => import("../providers/openai/index.js"),
  anthropic: () => import("../providers/anthropic/index.js"),
};

export default providerFactories;
