import { z } from "zod";
import { ValidationError } from "../../shared/errors.js";
import { hasOwnKey, isRecord } from "../types.js";
import type { ExtractedData, ValidationOutcome, Validator } from "../types.js";

/**
 * Field-by-field validation against a zod object schema. Each field is
 * parsed on its own so one bad field never drops the others.
 */
export class ZodValidator implements Validator {
  private readonly shape: Record<string, z.ZodTypeAny>;

  constructor(schema: z.ZodTypeAny) {
    if (!(schema instanceof z.ZodObject)) {
      throw new TypeError("ZodValidator requires a zod object schema.");
    }
    this.shape = schema.shape;
  }

  clean(value: unknown): ValidationOutcome {
    if (!isRecord(value)) {
      return { validatedData: {}, errors: [new ValidationError("$", "Expected an object.")] };
    }

    const validatedData: ExtractedData = {};
    const errors: ValidationError[] = [];

    for (const [field, fieldSchema] of Object.entries(this.shape)) {
      const result = fieldSchema.safeParse(hasOwnKey(value, field) ? value[field] : undefined);
      if (result.success) {
        if (result.data !== undefined) {
          validatedData[field] = result.data;
        }
        continue;
      }
      const message = result.error.issues.map((issue) => issue.message).join("; ");
      errors.push(new ValidationError(field, message));
    }

    return { validatedData, errors };
  }
}
