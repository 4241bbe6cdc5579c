export { parseExtraction, ExtractionParser, SCHEMA_MISMATCH_MESSAGE } from "./parser.js";
export type { ExtractionOptions } from "./parser.js";
export { JsonEncoder } from "./encoders/json-encoder.js";
export type { JsonEncoderOptions } from "./encoders/json-encoder.js";
export { XmlEncoder } from "./encoders/xml-encoder.js";
export { NodeValidator } from "./validators/node-validator.js";
export { ZodValidator } from "./validators/zod-validator.js";
export type {
  Encoder,
  Validator,
  ValidationOutcome,
  ExtractedData,
  ExtractionError,
  ExtractionResult,
} from "./types.js";
