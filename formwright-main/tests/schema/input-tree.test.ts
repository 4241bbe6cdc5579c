import { describe, it, expect } from "vitest";
import { createInputTree } from "../../src/schema/input-tree.js";
import { fieldIdsOf, form, option, selection } from "../../src/schema/nodes.js";
import type { SchemaNode } from "../../src/schema/nodes.js";
import { DuplicateIdError, SchemaError } from "../../src/shared/errors.js";
import { doSelection, threeSelectionForm } from "../helpers/schemas.js";

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe("createInputTree", () => {
  it("indexes a selection and its options", () => {
    const tree = createInputTree(doSelection());

    expect(tree.ids()).toEqual(["do", "eat", "drink", "sleep"]);
    expect(tree.size).toBe(4);
    expect(tree.resolve("drink").kind).toBe("option");
  });

  it("visits a form breadth-first", () => {
    const tree = createInputTree(threeSelectionForm());

    expect(tree.ids()).toEqual([
      "plans",
      "do",
      "watch",
      "seat",
      "eat",
      "drink",
      "sleep",
      "spy",
      "truck",
      "alien",
      "aisle",
      "window",
      "middle",
    ]);
  });

  it("lists every id exactly once", () => {
    const ids = createInputTree(threeSelectionForm()).ids();
    expect(new Set(ids).size).toBe(ids.length);
  });

  it("indexes a lone option", () => {
    const tree = createInputTree(option({ id: "agree", description: "agree to the terms" }));
    expect(tree.ids()).toEqual(["agree"]);
    expect(tree.root.id).toBe("agree");
  });

  it("rejects duplicate ids", () => {
    const root = form({
      id: "outer",
      description: "",
      elements: [
        selection({ id: "pick", description: "", options: [option({ id: "a", description: "" })] }),
        option({ id: "a", description: "" }),
      ],
    });

    expect(() => createInputTree(root)).toThrow(DuplicateIdError);
    expect(() => createInputTree(root)).toThrow('Duplicate schema id "a".');
  });

  it("rejects an unsupported root kind", () => {
    const bogus = JSON.parse('{"kind":"table","id":"t","description":"","examples":[]}') as SchemaNode;

    expect(() => createInputTree(bogus)).toThrow(SchemaError);
    expect(captureError(() => createInputTree(bogus))).toMatchObject({ code: "UNSUPPORTED_NODE" });
  });

  it("throws on resolving an unknown id", () => {
    const tree = createInputTree(doSelection());
    expect(tree.has("nap")).toBe(false);
    expect(() => tree.resolve("nap")).toThrow('Unknown schema id "nap".');
  });
});

describe("fieldIdsOf", () => {
  it("lists form fields in declaration order through nested forms", () => {
    const root = form({
      id: "trip",
      description: "",
      elements: [
        doSelection(),
        form({
          id: "extras",
          description: "",
          elements: [option({ id: "notes", description: "" }), option({ id: "wifi", description: "" })],
        }),
        option({ id: "confirm", description: "" }),
      ],
    });

    expect(fieldIdsOf(root)).toEqual(["do", "notes", "wifi", "confirm"]);
  });

  it("treats a non-form node as its own field", () => {
    expect(fieldIdsOf(doSelection())).toEqual(["do"]);
  });
});
