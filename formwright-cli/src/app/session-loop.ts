import type { LineOutcome, LoopSession } from "./types.js";

export const QUIT_COMMAND = "q";
export const FAREWELL = "OK! Goodbye!";

/**
 * One line of the read loop. Exactly `q` ends the session; a padded `q`
 * is an ordinary turn. Blank lines are ignored. After a successful turn
 * that leaves fields pending, the next prompt is appended.
 */
export async function handleLine(line: string, session: LoopSession): Promise<LineOutcome> {
  if (line === QUIT_COMMAND) {
    return { type: "exit", replies: [FAREWELL], exitCode: 0 };
  }
  const trimmed = line.trim();
  if (trimmed.length === 0) {
    return { type: "skip" };
  }

  const message = await session.interpreter.interact(trimmed);
  const replies = [message.content];
  if (message.success && !session.automaton.isComplete()) {
    replies.push(session.interpreter.generateStateMessage().content);
  }

  return { type: "reply", replies, success: message.success };
}
