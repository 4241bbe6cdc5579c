import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import providerFactories from "../config/provider.js";
import { loadLlmConfig } from "../config/llm.js";
import { loadProvider } from "../core/index.js";
import type { LlmProvider } from "../core/index.js";
import { Automaton } from "../interpreter/automaton.js";
import { Interpreter } from "../interpreter/interpreter.js";
import { LlmOptionSelector } from "../interpreter/option-selector.js";
import { loadSchemaFile } from "../schema/document.js";
import { devLog } from "../shared/index.js";

const thisDir = dirname(fileURLToPath(import.meta.url));
const packageRoot = resolve(thisDir, "..", "..");

export const DEFAULT_SCHEMA_PATH = resolve(packageRoot, "schemas", "sample-form.json");

export interface SessionOptions {
  schemaPath?: string;
  env?: Record<string, string | undefined>;
  /** Use an already-started provider instead of resolving one from configuration. */
  provider?: LlmProvider;
}

export interface Session {
  automaton: Automaton;
  interpreter: Interpreter;
  shutdown(): Promise<void>;
}

/**
 * Wires one interpreter session. Configuration is validated here, before
 * the first turn: a missing API key fails with a ConfigError.
 */
export async function startSession(options: SessionOptions = {}): Promise<Session> {
  const schemaPath = options.schemaPath ?? DEFAULT_SCHEMA_PATH;

  let provider = options.provider;
  if (!provider) {
    const config = loadLlmConfig(options.env ?? process.env);
    provider = await loadProvider(providerFactories[config.provider], config);
    devLog(`Provider ready: ${provider.name} (${config.model})`);
  }

  const schema = await loadSchemaFile(schemaPath);
  const automaton = new Automaton(schema);
  const interpreter = new Interpreter(automaton, new LlmOptionSelector(provider));
  devLog(`Session started for schema "${schema.id}" from ${schemaPath}`);

  const activeProvider = provider;
  return {
    automaton,
    interpreter,
    shutdown: async () => {
      await activeProvider.stop();
    },
  };
}
