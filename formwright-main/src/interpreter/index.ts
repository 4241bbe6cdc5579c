export { Automaton, NOT_UNDERSTOOD_MESSAGE, COMPLETE_SUFFIX } from "./automaton.js";
export type { UpdateResult } from "./automaton.js";
export { Interpreter, MODEL_FAILURE_MESSAGE } from "./interpreter.js";
export type { InterpreterOptions } from "./interpreter.js";
export { LlmOptionSelector, resolveSelection } from "./option-selector.js";
export type { OptionSelector, Selection } from "./option-selector.js";
export { buildPrompt } from "./prompt.js";
export { updateIntent, NO_OP_INTENT } from "./intents.js";
export type { Intent, UpdateIntent, NoOpIntent, Message } from "./intents.js";
export { createState, updateState, moveTo } from "./state.js";
export type { SessionState, Information } from "./state.js";
