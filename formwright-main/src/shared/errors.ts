export class FormwrightError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FormwrightError";
  }
}

/** Model text could not be decoded in the encoder's format. Recovered into extraction results. */
export class ParseError extends FormwrightError {
  constructor(message: string) {
    super(message);
    this.name = "ParseError";
  }
}

export type SchemaErrorCode =
  | "UNSUPPORTED_NODE"
  | "DUPLICATE_ID"
  | "UNKNOWN_ID"
  | "INVALID_DOCUMENT";

export class SchemaError extends FormwrightError {
  constructor(
    message: string,
    public code: SchemaErrorCode,
  ) {
    super(message);
    this.name = "SchemaError";
  }
}

export class DuplicateIdError extends SchemaError {
  constructor(public id: string) {
    super(`Duplicate schema id "${id}".`, "DUPLICATE_ID");
    this.name = "DuplicateIdError";
  }
}

/** One field failed its semantic check. Collected, never thrown by validators. */
export class ValidationError extends FormwrightError {
  constructor(
    public field: string,
    message: string,
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

export class IntentError extends FormwrightError {
  constructor(message: string) {
    super(message);
    this.name = "IntentError";
  }
}

export class ConfigError extends FormwrightError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** The model collaborator failed to answer (network, timeout, empty reply). Carries the original error as `cause`. */
export class ModelCallError extends FormwrightError {
  constructor(
    public elementId: string,
    cause: unknown,
  ) {
    super(cause instanceof Error ? cause.message : String(cause));
    this.name = "ModelCallError";
    this.cause = cause;
  }
}

export class InterpreterBusyError extends FormwrightError {
  constructor() {
    super("A turn is already in progress.");
    this.name = "InterpreterBusyError";
  }
}
