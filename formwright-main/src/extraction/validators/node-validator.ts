import { SchemaError, ValidationError } from "../../shared/errors.js";
import { allowedTransitions, describeKind } from "../../schema/nodes.js";
import type { FormNode, OptionNode, SchemaNode, SelectionNode } from "../../schema/nodes.js";
import { hasOwnKey, isRecord } from "../types.js";
import type { ExtractedData, ValidationOutcome, Validator } from "../types.js";

const SUPPORTED_KINDS: ReadonlySet<string> = new Set(["option", "selection", "form"]);

type FieldCheck = { ok: true; value: unknown } | { ok: false };

function joinPath(parent: string, id: string): string {
  return parent.length > 0 ? `${parent}.${id}` : id;
}

function checkSelection(
  node: SelectionNode,
  value: unknown,
  path: string,
  errors: ValidationError[],
): FieldCheck {
  const options = allowedTransitions(node);
  if (typeof value !== "string") {
    errors.push(new ValidationError(path, `Expected one of: ${options.join(", ")}.`));
    return { ok: false };
  }
  const wanted = value.trim().toLowerCase();
  const match = options.find((id) => id.toLowerCase() === wanted);
  if (!match) {
    errors.push(new ValidationError(path, `"${value}" is not one of: ${options.join(", ")}.`));
    return { ok: false };
  }
  return { ok: true, value: match };
}

function checkOption(
  _node: OptionNode,
  value: unknown,
  path: string,
  errors: ValidationError[],
): FieldCheck {
  if (typeof value === "boolean") return { ok: true, value };
  if (typeof value === "string" && value.trim().length > 0) {
    return { ok: true, value: value.trim() };
  }
  errors.push(new ValidationError(path, "Expected a non-empty string or a boolean."));
  return { ok: false };
}

/** Keeps the children that pass; absent children are neither kept nor reported. */
function cleanForm(
  node: FormNode,
  value: unknown,
  path: string,
  errors: ValidationError[],
): ExtractedData | null {
  if (!isRecord(value)) {
    errors.push(new ValidationError(path || node.id, "Expected an object."));
    return null;
  }

  const cleaned: ExtractedData = {};
  for (const element of node.elements) {
    if (!hasOwnKey(value, element.id)) continue;
    const result = checkNode(element, value[element.id], joinPath(path, element.id), errors);
    if (result.ok) {
      cleaned[element.id] = result.value;
    }
  }
  return cleaned;
}

function checkNode(
  node: SchemaNode,
  value: unknown,
  path: string,
  errors: ValidationError[],
): FieldCheck {
  switch (node.kind) {
    case "option":
      return checkOption(node, value, path, errors);
    case "selection":
      return checkSelection(node, value, path, errors);
    case "form": {
      const cleaned = cleanForm(node, value, path, errors);
      return cleaned ? { ok: true, value: cleaned } : { ok: false };
    }
  }
}

/**
 * Schema-aware cleaner for a single node.
 *
 * Selections accept an option id (case-insensitive, normalised to the
 * declared id) and yield `{ [selectionId]: optionId }`. Forms yield one
 * entry per child that passed, with dotted field paths in errors for
 * nested forms.
 */
export class NodeValidator implements Validator {
  constructor(private readonly node: SchemaNode) {
    if (!SUPPORTED_KINDS.has(describeKind(node))) {
      throw new SchemaError(`Cannot validate node kind "${describeKind(node)}".`, "UNSUPPORTED_NODE");
    }
  }

  clean(value: unknown): ValidationOutcome {
    const errors: ValidationError[] = [];

    if (this.node.kind === "form") {
      const cleaned = cleanForm(this.node, value, "", errors);
      return { validatedData: cleaned ?? {}, errors };
    }

    const result = checkNode(this.node, value, this.node.id, errors);
    return {
      validatedData: result.ok ? { [this.node.id]: result.value } : {},
      errors,
    };
  }
}
