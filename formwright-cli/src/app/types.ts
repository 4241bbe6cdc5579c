import type { Automaton, Interpreter } from "@formwright/main";

export type ChatMessage = {
  id: string;
  role: "user" | "assistant";
  content: string;
  success?: boolean;
  timestamp: number;
};

/** The slice of a running session the terminal loop needs. */
export interface LoopSession {
  interpreter: Pick<Interpreter, "interact" | "generateStateMessage">;
  automaton: Pick<Automaton, "isComplete" | "pendingFieldIds">;
}

export type LineOutcome =
  | { type: "exit"; replies: string[]; exitCode: 0 }
  | { type: "reply"; replies: string[]; success: boolean }
  | { type: "skip" };
