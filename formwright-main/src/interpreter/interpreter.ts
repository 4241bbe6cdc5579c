import { JsonEncoder } from "../extraction/encoders/json-encoder.js";
import type { Encoder } from "../extraction/types.js";
import { allowedTransitions } from "../schema/nodes.js";
import type { FormNode, OptionNode, SchemaNode, SelectionNode } from "../schema/nodes.js";
import { devError } from "../shared/debug-log.js";
import { InterpreterBusyError, ModelCallError, SchemaError } from "../shared/errors.js";
import { logModelFailure } from "../shared/session-logger.js";
import type { Automaton } from "./automaton.js";
import { NO_OP_INTENT, updateIntent } from "./intents.js";
import type { Intent, Message } from "./intents.js";
import type { OptionSelector } from "./option-selector.js";
import { buildPrompt } from "./prompt.js";

export const MODEL_FAILURE_MESSAGE =
  "Sorry, I couldn't reach the language model just now. Please try again.";

export interface InterpreterOptions {
  /** Format the model is asked to answer in. Defaults to tagged JSON. */
  encoder?: Encoder;
}

function describeSelection(element: SelectionNode): string {
  const validOptions = allowedTransitions(element).sort().join(", ");
  return (
    `You're currently updating element with ID: ${element.id}.\n` +
    `Description: ${element.description}\n` +
    `Valid options: ${validOptions}\n`
  );
}

function describeField(element: OptionNode): string {
  return (
    `You're currently filling in element with ID: ${element.id}.\n` +
    `Description: ${element.description}\n`
  );
}

function listOrNone(ids: string[]): string {
  return ids.length > 0 ? ids.join(", ") : "(none)";
}

/**
 * Drives one session: each turn prompts the model about the active
 * element, turns the answer into an intent and applies it. Turns must not
 * overlap; a second `interact` while one is in flight is rejected. Only a
 * failed model call is answered with `MODEL_FAILURE_MESSAGE`; any other
 * error propagates.
 */
export class Interpreter {
  private readonly encoder: Encoder;
  private busy = false;

  constructor(
    private readonly automaton: Automaton,
    private readonly selector: OptionSelector,
    options: InterpreterOptions = {},
  ) {
    this.encoder = options.encoder ?? new JsonEncoder();
  }

  generateStateMessage(): Message {
    const summary = this.summarize(this.automaton.currentElement());
    return { success: true, content: `Hello! ${summary}` };
  }

  async interact(userInput: string): Promise<Message> {
    if (this.busy) {
      throw new InterpreterBusyError();
    }
    this.busy = true;

    try {
      const element = this.automaton.activeElement();
      const prompt = buildPrompt(userInput, element, this.encoder);
      const allowed = this.automaton.allowedTransitions(element.id);

      let selected: string | undefined;
      try {
        const selection = await this.selector.select(prompt, allowed, element);
        selected = selection[element.id];
      } catch (err) {
        if (!(err instanceof ModelCallError)) {
          throw err;
        }
        logModelFailure(element.id, err.message);
        devError(`Model call failed for ${element.id}:`, err.message);
        return { content: MODEL_FAILURE_MESSAGE, success: false };
      }

      const intent: Intent = selected
        ? updateIntent(element.id, { [element.id]: selected })
        : NO_OP_INTENT;
      return this.automaton.update(intent).message;
    } finally {
      this.busy = false;
    }
  }

  private summarize(element: SchemaNode): string {
    switch (element.kind) {
      case "selection":
        return describeSelection(element);
      case "form":
        return this.describeForm(element);
      case "option":
        if (this.automaton.inputTree.root.kind !== "form") {
          throw new SchemaError(
            `Element "${element.id}" is an option and cannot be a session location on its own.`,
            "UNSUPPORTED_NODE",
          );
        }
        return describeField(element);
    }
  }

  private describeForm(element: FormNode): string {
    const pending = this.automaton.pendingFieldIds();
    const completed = Object.keys(this.automaton.state.information);
    let summary =
      `You're filling in the form with ID: ${element.id}.\n` +
      `Description: ${element.description}\n` +
      `Completed: ${listOrNone(completed)}\n` +
      `Remaining: ${listOrNone(pending)}\n`;

    if (pending.length === 0) {
      return `${summary}All fields are complete.\n`;
    }

    const active: SchemaNode = this.automaton.activeElement();
    if (active.kind === "selection") {
      summary += describeSelection(active);
    } else if (active.kind === "option") {
      summary += describeField(active);
    }
    return summary;
  }
}
