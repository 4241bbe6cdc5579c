import { DuplicateIdError, SchemaError } from "../shared/errors.js";
import { childrenOf, describeKind } from "./nodes.js";
import type { SchemaNode } from "./nodes.js";

const SUPPORTED_KINDS: ReadonlySet<string> = new Set(["option", "selection", "form"]);

export class InputTree {
  readonly root: SchemaNode;
  private readonly byId: ReadonlyMap<string, SchemaNode>;

  constructor(root: SchemaNode, byId: ReadonlyMap<string, SchemaNode>) {
    this.root = root;
    this.byId = byId;
  }

  get size(): number {
    return this.byId.size;
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  resolve(id: string): SchemaNode {
    const node = this.byId.get(id);
    if (!node) {
      throw new SchemaError(`Unknown schema id "${id}".`, "UNKNOWN_ID");
    }
    return node;
  }

  /** Ids in breadth-first order. */
  ids(): string[] {
    return [...this.byId.keys()];
  }
}

/**
 * Flattens a schema tree into an id index with a breadth-first walk.
 * A repeated id (including one reached through a cycle) is rejected.
 */
export function createInputTree(root: SchemaNode): InputTree {
  const byId = new Map<string, SchemaNode>();
  const queue: SchemaNode[] = [root];

  while (queue.length > 0) {
    const node = queue.shift();
    if (!node) break;

    if (!SUPPORTED_KINDS.has(describeKind(node))) {
      throw new SchemaError(`Node kind "${describeKind(node)}" is not supported.`, "UNSUPPORTED_NODE");
    }
    if (byId.has(node.id)) {
      throw new DuplicateIdError(node.id);
    }

    byId.set(node.id, node);
    queue.push(...childrenOf(node));
  }

  return new InputTree(root, byId);
}
