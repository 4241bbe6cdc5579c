import { ParseError } from "../shared/errors.js";
import type { SchemaNode } from "../schema/nodes.js";
import { hasOwnKey } from "./types.js";
import type { Encoder, ExtractionError, ExtractionResult, ExtractedData, Validator } from "./types.js";

export const SCHEMA_MISMATCH_MESSAGE =
  "The model returned structured data which does not match the expected schema. " +
  "Providing additional examples may help improve the parse.";

export interface ExtractionOptions {
  encoder: Encoder;
  validator?: Validator;
}

function emptyResult(raw: string, errors: ExtractionError[]): ExtractionResult {
  return { data: {}, raw, errors, validatedData: {} };
}

/**
 * Decodes model text and extracts the value stored under `node.id`.
 * Never throws: decode failures and schema mismatches come back as
 * entries in `errors`, and `raw` always holds the input verbatim.
 */
export function parseExtraction(
  text: string,
  node: SchemaNode,
  options: ExtractionOptions,
): ExtractionResult {
  let data: ExtractedData;
  try {
    data = options.encoder.decode(text);
  } catch (err) {
    const error = err instanceof ParseError
      ? err
      : new ParseError(err instanceof Error ? err.message : String(err));
    return emptyResult(text, [error]);
  }

  if (!hasOwnKey(data, node.id)) {
    if (Object.keys(data).length > 0) {
      return emptyResult(text, [new ParseError(SCHEMA_MISMATCH_MESSAGE)]);
    }
    return emptyResult(text, []);
  }

  if (!options.validator) {
    return { data, raw: text, errors: [], validatedData: {} };
  }

  const { validatedData, errors } = options.validator.clean(data[node.id]);
  return { data, raw: text, errors, validatedData };
}

export class ExtractionParser {
  constructor(
    private readonly node: SchemaNode,
    private readonly options: ExtractionOptions,
  ) {}

  parse(text: string): ExtractionResult {
    return parseExtraction(text, this.node, this.options);
  }
}
