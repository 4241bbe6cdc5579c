export interface LlmMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface LlmTurnInput {
  messages: LlmMessage[];
}

export interface LlmTurnOutput {
  type: "assistant";
  content: string;
}
