import type { LlmProvider, LlmProviderConfig } from "../contracts/provider.js";

export type CreateProvider = (config: LlmProviderConfig) => LlmProvider;

export type ProviderFactory = () => Promise<{ default: CreateProvider }>;

export async function loadProvider(
  factory: ProviderFactory,
  config: LlmProviderConfig,
): Promise<LlmProvider> {
  const loaded = await factory();
  if (!loaded?.default) {
    throw new Error("Invalid provider module: expected a default export.");
  }
  const provider = loaded.default(config);
  await provider.start();
  return provider;
}
