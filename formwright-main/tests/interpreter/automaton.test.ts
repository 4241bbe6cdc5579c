import { describe, it, expect } from "vitest";
import { Automaton, COMPLETE_SUFFIX, NOT_UNDERSTOOD_MESSAGE } from "../../src/interpreter/automaton.js";
import { NO_OP_INTENT, updateIntent } from "../../src/interpreter/intents.js";
import type { Intent } from "../../src/interpreter/intents.js";
import { createInputTree } from "../../src/schema/input-tree.js";
import { IntentError } from "../../src/shared/errors.js";
import { doSelection, threeSelectionForm } from "../helpers/schemas.js";

describe("Automaton", () => {
  it("starts at the root with no information and no history", () => {
    const automaton = new Automaton(threeSelectionForm());

    expect(automaton.state).toEqual({ locationId: "plans", information: {} });
    expect(automaton.history).toEqual([]);
    expect(automaton.currentElement().id).toBe("plans");
  });

  it("exposes sorted option ids for a selection and none for a form", () => {
    expect(new Automaton(doSelection()).allowedTransitions()).toEqual(["drink", "eat", "sleep"]);

    const formAutomaton = new Automaton(threeSelectionForm());
    expect(formAutomaton.allowedTransitions()).toEqual([]);
    expect(formAutomaton.allowedTransitions("watch")).toEqual(["alien", "spy", "truck"]);
  });

  it("leaves state and history alone for any number of no-op intents", () => {
    const automaton = new Automaton(doSelection());
    const initial = automaton.state;

    for (let i = 0; i < 3; i++) {
      const result = automaton.update(NO_OP_INTENT);
      expect(result.state).toBe(initial);
      expect(result.message).toEqual({ content: NOT_UNDERSTOOD_MESSAGE, success: false });
    }

    expect(automaton.state).toBe(initial);
    expect(automaton.history).toHaveLength(0);
  });

  it("merges an update and records the previous state", () => {
    const automaton = new Automaton(doSelection());
    const initial = automaton.state;

    const { state, message } = automaton.update(updateIntent("do", { do: "eat" }));

    expect(state).toEqual({ locationId: "do", information: { do: "eat" } });
    expect(automaton.state).toBe(state);
    expect(automaton.history).toEqual([initial]);
    expect(initial.information).toEqual({});
    expect(message).toEqual({
      content: `OK! Updated. The new state is: {"do":"eat"}. ${COMPLETE_SUFFIX}`,
      success: true,
    });
  });

  it("walks a form's fields in declaration order until complete", () => {
    const automaton = new Automaton(threeSelectionForm());
    expect(automaton.activeElement().id).toBe("do");
    expect(automaton.isComplete()).toBe(false);

    const first = automaton.update(updateIntent("do", { do: "eat" }));
    expect(first.state.locationId).toBe("watch");
    expect(first.message.content).toBe('OK! Updated. The new state is: {"do":"eat"}.');
    expect(automaton.pendingFieldIds()).toEqual(["watch", "seat"]);

    automaton.update(updateIntent("watch", { watch: "spy" }));
    expect(automaton.state.locationId).toBe("seat");
    expect(automaton.activeElement().id).toBe("seat");

    const last = automaton.update(updateIntent("seat", { seat: "aisle" }));
    expect(last.state.locationId).toBe("plans");
    expect(last.message.content.endsWith(COMPLETE_SUFFIX)).toBe(true);
    expect(automaton.isComplete()).toBe(true);
    expect(automaton.pendingFieldIds()).toEqual([]);
    expect(automaton.state.information).toEqual({ do: "eat", watch: "spy", seat: "aisle" });
    expect(automaton.history).toHaveLength(3);
  });

  it("returns to the first pending field after an out-of-order update", () => {
    const automaton = new Automaton(threeSelectionForm());

    automaton.update(updateIntent("seat", { seat: "window" }));

    expect(automaton.state.locationId).toBe("do");
    expect(automaton.pendingFieldIds()).toEqual(["do", "watch"]);
  });

  it("rejects intents for unknown locations", () => {
    const automaton = new Automaton(doSelection());

    expect(() => automaton.update(updateIntent("nap", { nap: "yes" }))).toThrow(IntentError);
    expect(automaton.history).toHaveLength(0);
  });

  it("rejects intent kinds outside the closed set", () => {
    const automaton = new Automaton(doSelection());
    const bogus = JSON.parse('{"kind":"jump"}') as Intent;

    expect(() => automaton.update(bogus)).toThrow('Unsupported intent kind "jump".');
  });

  it("only ever appends to history", () => {
    const automaton = new Automaton(threeSelectionForm());
    const initial = automaton.state;
    automaton.update(updateIntent("do", { do: "eat" }));
    const afterDo = automaton.state;
    automaton.update(NO_OP_INTENT);
    automaton.update(updateIntent("watch", { watch: "truck" }));

    expect(automaton.history).toEqual([initial, afterDo]);
    expect(automaton.history[0]).toBe(initial);
    expect(automaton.history[1]).toBe(afterDo);
  });

  it("exposes history as a frozen copy", () => {
    const automaton = new Automaton(doSelection());
    automaton.update(updateIntent("do", { do: "drink" }));

    const history = automaton.history;
    expect(Object.isFrozen(history)).toBe(true);
    expect(history).not.toBe(automaton.history);
  });

  it("shares one input tree between automata without sharing state", () => {
    const tree = createInputTree(doSelection());
    const first = new Automaton(tree);
    const second = new Automaton(tree);

    first.update(updateIntent("do", { do: "sleep" }));

    expect(first.inputTree).toBe(second.inputTree);
    expect(second.state.information).toEqual({});
  });
});
