import { IntentError } from "../shared/errors.js";
import { describeKind } from "../schema/nodes.js";
import type { Information } from "./state.js";

export interface UpdateIntent {
  readonly kind: "update";
  readonly locationId: string;
  readonly information: Information;
}

export interface NoOpIntent {
  readonly kind: "noop";
}

export type Intent = UpdateIntent | NoOpIntent;

export interface Message {
  readonly content: string;
  readonly success: boolean;
}

export function updateIntent(locationId: string, information: Information): UpdateIntent {
  return Object.freeze({ kind: "update", locationId, information: Object.freeze({ ...information }) });
}

export const NO_OP_INTENT: NoOpIntent = Object.freeze({ kind: "noop" });

export function unreachableIntent(intent: never): never {
  throw new IntentError(`Unsupported intent kind "${describeKind(intent)}".`);
}
