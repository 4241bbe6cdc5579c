export interface OptionNode {
  readonly kind: "option";
  readonly id: string;
  readonly description: string;
  readonly examples: readonly string[];
}

export interface SelectionNode {
  readonly kind: "selection";
  readonly id: string;
  readonly description: string;
  readonly examples: readonly string[];
  readonly options: readonly OptionNode[];
}

export interface FormNode {
  readonly kind: "form";
  readonly id: string;
  readonly description: string;
  readonly examples: readonly string[];
  readonly elements: readonly SchemaNode[];
}

export type SchemaNode = OptionNode | SelectionNode | FormNode;

export type SchemaNodeKind = SchemaNode["kind"];

type NodeInit<T extends SchemaNode> = Omit<T, "kind" | "examples"> & {
  examples?: readonly string[];
};

export function option(init: NodeInit<OptionNode>): OptionNode {
  return Object.freeze({
    kind: "option",
    id: init.id,
    description: init.description,
    examples: Object.freeze([...(init.examples ?? [])]),
  });
}

export function selection(init: NodeInit<SelectionNode>): SelectionNode {
  return Object.freeze({
    kind: "selection",
    id: init.id,
    description: init.description,
    examples: Object.freeze([...(init.examples ?? [])]),
    options: Object.freeze([...init.options]),
  });
}

export function form(init: NodeInit<FormNode>): FormNode {
  return Object.freeze({
    kind: "form",
    id: init.id,
    description: init.description,
    examples: Object.freeze([...(init.examples ?? [])]),
    elements: Object.freeze([...init.elements]),
  });
}

export function describeKind(value: unknown): string {
  if (typeof value === "object" && value !== null && "kind" in value) {
    return String(value.kind);
  }
  return typeof value;
}

export function childrenOf(node: SchemaNode): readonly SchemaNode[] {
  switch (node.kind) {
    case "option":
      return [];
    case "selection":
      return node.options;
    case "form":
      return node.elements;
  }
}

/** Option ids a selection accepts, in declaration order. */
export function allowedTransitions(node: SelectionNode): string[] {
  return node.options.map((opt) => opt.id);
}

/**
 * Ids a form session must collect: every non-form descendant in
 * declaration order, descending into nested forms. A non-form node is
 * its own single field.
 */
export function fieldIdsOf(node: SchemaNode): string[] {
  if (node.kind !== "form") return [node.id];

  const ids: string[] = [];
  for (const element of node.elements) {
    ids.push(...fieldIdsOf(element));
  }
  return ids;
}
