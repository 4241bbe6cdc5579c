export { devLog, devWarn, devError, isDebugEnabled } from "./debug-log.js";
export {
  FormwrightError,
  ParseError,
  SchemaError,
  DuplicateIdError,
  ValidationError,
  IntentError,
  ConfigError,
  InterpreterBusyError,
  ModelCallError,
} from "./errors.js";
export type { SchemaErrorCode } from "./errors.js";
