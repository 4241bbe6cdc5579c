import type { ParseError, ValidationError } from "../shared/errors.js";

export type ExtractedData = Record<string, unknown>;

export interface Encoder {
  /** Renders data the way the model is expected to answer; used for few-shot examples. */
  encode(data: ExtractedData): string;
  /** Throws ParseError on malformed input; blank or well-formed-but-empty input yields {}. */
  decode(text: string): ExtractedData;
}

export interface ValidationOutcome {
  validatedData: ExtractedData;
  errors: ValidationError[];
}

export interface Validator {
  clean(value: unknown): ValidationOutcome;
}

export type ExtractionError = ParseError | ValidationError;

export interface ExtractionResult {
  data: ExtractedData;
  raw: string;
  errors: ExtractionError[];
  validatedData: ExtractedData;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Own-key lookup; inherited names such as `constructor` never count. */
export function hasOwnKey(record: Record<string, unknown>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key);
}
