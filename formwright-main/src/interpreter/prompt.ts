import type { Encoder } from "../extraction/types.js";
import type { SchemaNode, SelectionNode } from "../schema/nodes.js";

function quoteList(values: readonly string[]): string {
  return values.map((value) => `"${value}"`).join(", ");
}

function renderSelection(node: SelectionNode): string[] {
  const lines = ["Options:"];
  for (const opt of node.options) {
    const examples = opt.examples.length > 0 ? ` (e.g. ${quoteList(opt.examples)})` : "";
    lines.push(`- ${opt.id}: ${opt.description}${examples}`);
  }
  return lines;
}

function renderExamples(node: SchemaNode, encoder: Encoder): string[] {
  const pairs: Array<{ input: string; output: string }> = [];

  if (node.kind === "selection") {
    for (const opt of node.options) {
      for (const example of opt.examples) {
        pairs.push({ input: example, output: encoder.encode({ [node.id]: opt.id }) });
      }
    }
  }

  if (pairs.length === 0) return [];

  const lines = ["Examples:"];
  for (const pair of pairs) {
    lines.push(`Input: ${pair.input}`, `Output: ${pair.output}`, "");
  }
  return lines;
}

/**
 * Renders the extraction prompt for one element. Selections list their
 * options and turn option examples into few-shot pairs; other elements
 * ask for a free-form value under the element id.
 */
export function buildPrompt(userInput: string, element: SchemaNode, encoder: Encoder): string {
  const lines = [
    "Your goal is to extract structured information from the user's input.",
    "Only use ids that appear below, and answer in exactly the format shown.",
    "",
    `Element: ${element.id}`,
    `Description: ${element.description}`,
  ];

  if (element.kind === "selection") {
    lines.push(...renderSelection(element));
    lines.push(`Answer with the id of the single best matching option under the key "${element.id}".`);
  } else {
    lines.push(`Answer with the value the user gave under the key "${element.id}".`);
  }

  if (element.examples.length > 0) {
    lines.push(`Sample phrasings: ${quoteList(element.examples)}`);
  }

  lines.push(`If nothing matches, answer with ${encoder.encode({})}.`, "");
  lines.push(...renderExamples(element, encoder));
  lines.push(`Input: ${userInput}`, "Output:");

  return lines.join("\n");
}
