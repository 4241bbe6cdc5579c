import type { LlmProviderConfig, LlmProviderName } from "../core/index.js";
import { ConfigError } from "../shared/errors.js";

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_RETRIES = 2;

const PROVIDER_DEFAULTS: Record<LlmProviderName, { keyVar: string; modelVar: string; model: string }> = {
  openai: { keyVar: "OPENAI_API_KEY", modelVar: "OPENAI_MODEL", model: "gpt-4o-mini" },
  anthropic: { keyVar: "ANTHROPIC_API_KEY", modelVar: "ANTHROPIC_MODEL", model: "claude-3-5-haiku-latest" },
};

type Env = Record<string, string | undefined>;

function readProviderName(env: Env): LlmProviderName {
  const raw = env["FORMWRIGHT_PROVIDER"]?.trim().toLowerCase();
  if (!raw) return "openai";
  if (raw === "openai" || raw === "anthropic") return raw;
  throw new ConfigError(`Unsupported FORMWRIGHT_PROVIDER "${raw}". Expected "openai" or "anthropic".`);
}

function readNonNegativeIntEnv(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (!raw) return undefined;
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed < 0) return undefined;
  return parsed;
}

/**
 * Resolves the model collaborator's configuration once, at startup.
 * A missing API key is a hard failure here rather than on the first turn.
 */
export function loadLlmConfig(env: Env = process.env): LlmProviderConfig {
  const provider = readProviderName(env);
  const defaults = PROVIDER_DEFAULTS[provider];

  const apiKey = env[defaults.keyVar]?.trim();
  if (!apiKey) {
    throw new ConfigError(`Missing ${defaults.keyVar} environment variable.`);
  }

  const timeoutMs = readNonNegativeIntEnv(env, "FORMWRIGHT_LLM_TIMEOUT_MS");

  return {
    provider,
    apiKey,
    model: env[defaults.modelVar]?.trim() || defaults.model,
    timeoutMs: timeoutMs && timeoutMs > 0 ? timeoutMs : DEFAULT_TIMEOUT_MS,
    maxRetries: readNonNegativeIntEnv(env, "FORMWRIGHT_LLM_MAX_RETRIES") ?? DEFAULT_MAX_RETRIES,
  };
}
