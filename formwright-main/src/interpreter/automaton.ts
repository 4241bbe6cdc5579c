import { IntentError } from "../shared/errors.js";
import { logIntent, logSessionComplete, logStateCommit } from "../shared/session-logger.js";
import { InputTree, createInputTree } from "../schema/input-tree.js";
import { allowedTransitions, fieldIdsOf } from "../schema/nodes.js";
import type { SchemaNode } from "../schema/nodes.js";
import { unreachableIntent } from "./intents.js";
import type { Intent, Message, UpdateIntent } from "./intents.js";
import { hasOwnKey } from "../extraction/types.js";
import { createState, moveTo, updateState } from "./state.js";
import type { Information, SessionState } from "./state.js";

export interface UpdateResult {
  state: SessionState;
  message: Message;
}

export const NOT_UNDERSTOOD_MESSAGE = "Sorry I didn't catch that.";
export const COMPLETE_SUFFIX = "All fields are complete.";

/**
 * Owns one session's state over a schema's input tree.
 *
 * Location advances automatically for form roots: after each update the
 * session moves to the first field (declaration order, depth-first through
 * nested forms) that has no entry yet, and returns to the root once every
 * field is filled. Not safe to share between sessions; the input tree is.
 */
export class Automaton {
  readonly inputTree: InputTree;
  private current: SessionState;
  private readonly past: SessionState[] = [];
  private readonly fieldIds: readonly string[];

  constructor(source: SchemaNode | InputTree) {
    this.inputTree = source instanceof InputTree ? source : createInputTree(source);
    this.current = createState(this.inputTree.root.id);
    this.fieldIds = fieldIdsOf(this.inputTree.root);
  }

  get state(): SessionState {
    return this.current;
  }

  /** Prior states, oldest first. Grows by one per successful update and is never pruned. */
  get history(): readonly SessionState[] {
    return Object.freeze([...this.past]);
  }

  currentElement(): SchemaNode {
    return this.inputTree.resolve(this.current.locationId);
  }

  /**
   * The element the next turn should ask about: the current element, or
   * its first pending field when the current element is a form.
   */
  activeElement(): SchemaNode {
    const element = this.currentElement();
    if (element.kind !== "form") return element;

    const next = fieldIdsOf(element).find((id) => !this.isFilled(id, this.current.information));
    return next ? this.inputTree.resolve(next) : element;
  }

  /** Sorted option ids when the element is a selection, otherwise empty (free-form). */
  allowedTransitions(id: string = this.current.locationId): string[] {
    const element = this.inputTree.resolve(id);
    if (element.kind !== "selection") return [];
    return allowedTransitions(element).sort();
  }

  pendingFieldIds(): string[] {
    return this.fieldIds.filter((id) => !this.isFilled(id, this.current.information));
  }

  isComplete(): boolean {
    return this.pendingFieldIds().length === 0;
  }

  update(intent: Intent): UpdateResult {
    switch (intent.kind) {
      case "update":
        return this.applyUpdate(intent);
      case "noop":
        logIntent("noop", this.current.locationId);
        return {
          state: this.current,
          message: { content: NOT_UNDERSTOOD_MESSAGE, success: false },
        };
      default:
        return unreachableIntent(intent);
    }
  }

  private applyUpdate(intent: UpdateIntent): UpdateResult {
    if (!this.inputTree.has(intent.locationId)) {
      throw new IntentError(`Intent targets unknown location "${intent.locationId}".`);
    }
    logIntent("update", intent.locationId);

    const merged = updateState(this.current, intent.information);
    const next = moveTo(merged, this.nextLocation(merged.information, intent.locationId));

    this.past.push(this.current);
    this.current = next;
    logStateCommit(next.locationId, this.past.length, Object.keys(next.information).length);

    let content = `OK! Updated. The new state is: ${JSON.stringify(next.information)}.`;
    if (this.isComplete()) {
      logSessionComplete(this.inputTree.root.id);
      content = `${content} ${COMPLETE_SUFFIX}`;
    }

    return { state: next, message: { content, success: true } };
  }

  private nextLocation(information: Information, requested: string): string {
    const root = this.inputTree.root;
    if (root.kind !== "form") return requested;
    return this.fieldIds.find((id) => !this.isFilled(id, information)) ?? root.id;
  }

  private isFilled(id: string, information: Information): boolean {
    return hasOwnKey(information, id);
  }
}
