import type { LlmProvider } from "../core/contracts/provider.js";
import type { LlmTurnOutput } from "../core/contracts/llm-protocol.js";
import { parseExtraction } from "../extraction/parser.js";
import { JsonEncoder } from "../extraction/encoders/json-encoder.js";
import { NodeValidator } from "../extraction/validators/node-validator.js";
import type { Encoder } from "../extraction/types.js";
import type { SchemaNode } from "../schema/nodes.js";
import { ModelCallError } from "../shared/errors.js";
import { logModelAnswer, logPrompt, logSelection } from "../shared/session-logger.js";

export type Selection = Record<string, string>;

/**
 * Turns a prompt into the value chosen for an element; `{}` when nothing
 * matched. A failed model call rejects with `ModelCallError`.
 */
export interface OptionSelector {
  select(prompt: string, allowedOptions: readonly string[], element: SchemaNode): Promise<Selection>;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Reads the model's answer for `element`: first through the extraction
 * parser with a schema-aware validator, then by finding exactly one
 * allowed option id mentioned as a whole word in the raw text.
 */
export function resolveSelection(
  raw: string,
  element: SchemaNode,
  allowedOptions: readonly string[],
  encoder: Encoder,
): Selection {
  const extraction = parseExtraction(raw, element, {
    encoder,
    validator: new NodeValidator(element),
  });
  const value = extraction.validatedData[element.id];
  if (typeof value === "string" || typeof value === "boolean") {
    logSelection(element.id, String(value), "extraction");
    return { [element.id]: String(value) };
  }

  const mentioned = allowedOptions.filter((id) =>
    new RegExp(`(^|[^\\w-])${escapeRegExp(id)}($|[^\\w-])`, "i").test(raw),
  );
  if (mentioned.length === 1 && mentioned[0] !== undefined) {
    logSelection(element.id, mentioned[0], "mention");
    return { [element.id]: mentioned[0] };
  }

  logSelection(element.id, null, mentioned.length > 1 ? "ambiguous" : "none");
  return {};
}

export class LlmOptionSelector implements OptionSelector {
  private readonly encoder: Encoder;

  constructor(
    private readonly provider: LlmProvider,
    options: { encoder?: Encoder } = {},
  ) {
    this.encoder = options.encoder ?? new JsonEncoder();
  }

  async select(prompt: string, allowedOptions: readonly string[], element: SchemaNode): Promise<Selection> {
    logPrompt(element.id, prompt, [...allowedOptions]);
    let turn: LlmTurnOutput;
    try {
      turn = await this.provider.generateTurn({
        messages: [{ role: "user", content: prompt }],
      });
    } catch (err) {
      throw new ModelCallError(element.id, err);
    }
    logModelAnswer(element.id, turn.content);
    return resolveSelection(turn.content, element, allowedOptions, this.encoder);
  }
}
