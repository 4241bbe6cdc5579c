import { describe, it, expect } from "vitest";
import { NodeValidator } from "../../src/extraction/validators/node-validator.js";
import { form, option } from "../../src/schema/nodes.js";
import type { SchemaNode } from "../../src/schema/nodes.js";
import { SchemaError, ValidationError } from "../../src/shared/errors.js";
import { doSelection, threeSelectionForm } from "../helpers/schemas.js";

describe("NodeValidator", () => {
  describe("selection", () => {
    const validator = new NodeValidator(doSelection());

    it("accepts an option id", () => {
      expect(validator.clean("eat")).toEqual({ validatedData: { do: "eat" }, errors: [] });
    });

    it("normalises case and whitespace to the declared id", () => {
      expect(validator.clean(" Sleep ").validatedData).toEqual({ do: "sleep" });
    });

    it("reports values outside the options", () => {
      const { validatedData, errors } = validator.clean("nap");

      expect(validatedData).toEqual({});
      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(ValidationError);
      expect(errors[0]?.field).toBe("do");
      expect(errors[0]?.message).toBe('"nap" is not one of: eat, drink, sleep.');
    });

    it("reports non-string values", () => {
      expect(validator.clean(42).errors[0]?.message).toBe("Expected one of: eat, drink, sleep.");
    });
  });

  describe("form", () => {
    const validator = new NodeValidator(threeSelectionForm());

    it("keeps passing fields and reports failing ones", () => {
      const { validatedData, errors } = validator.clean({ do: "EAT", watch: "popcorn", extra: "x" });

      expect(validatedData).toEqual({ do: "eat" });
      expect(errors.map((error) => [error.field, error.message])).toEqual([
        ["watch", '"popcorn" is not one of: spy, truck, alien.'],
      ]);
    });

    it("rejects a non-object value", () => {
      const { validatedData, errors } = validator.clean("eat");

      expect(validatedData).toEqual({});
      expect(errors[0]?.field).toBe("plans");
      expect(errors[0]?.message).toBe("Expected an object.");
    });

    it("uses dotted paths for nested forms", () => {
      const nested = new NodeValidator(
        form({
          id: "trip",
          description: "",
          elements: [
            doSelection(),
            form({ id: "extras", description: "", elements: [option({ id: "notes", description: "" })] }),
          ],
        }),
      );

      expect(nested.clean({ do: "sleep", extras: { notes: "  quiet room " } })).toEqual({
        validatedData: { do: "sleep", extras: { notes: "quiet room" } },
        errors: [],
      });

      const failed = nested.clean({ extras: { notes: "" } });
      expect(failed.validatedData).toEqual({ extras: {} });
      expect(failed.errors.map((error) => error.field)).toEqual(["extras.notes"]);
    });
  });

  it("does not treat inherited object keys as present children", () => {
    const validator = new NodeValidator(
      form({
        id: "labels",
        description: "label settings",
        elements: [
          option({ id: "toString", description: "how to print it" }),
          option({ id: "valueOf", description: "what it is worth" }),
        ],
      }),
    );

    expect(validator.clean({})).toEqual({ validatedData: {}, errors: [] });
    expect(validator.clean({ valueOf: "ten" })).toEqual({ validatedData: { valueOf: "ten" }, errors: [] });
  });

  it("accepts booleans for a lone option", () => {
    const validator = new NodeValidator(option({ id: "agree", description: "agree to the terms" }));
    expect(validator.clean(true).validatedData).toEqual({ agree: true });
  });

  it("throws at construction for an unsupported node", () => {
    const bogus = JSON.parse('{"kind":"table","id":"t"}') as SchemaNode;
    expect(() => new NodeValidator(bogus)).toThrow(SchemaError);
  });
});
