import type { ChatMessage } from "./types.js";

export const BODY_INDENT = 2;

// Label row, wrapped body rows, one blank row after.
export function rowsOf(message: ChatMessage, width: number): number {
  const bodyWidth = Math.max(1, width - BODY_INDENT);
  let body = 0;
  for (const line of message.content.split(/\r?\n/)) {
    body += Math.max(1, Math.ceil(line.length / bodyWidth));
  }
  return body + 2;
}

/**
 * The newest messages that fit in `height` rows, oldest first. The latest
 * message is always kept, even when it alone overflows.
 */
export function visibleTail(messages: ChatMessage[], height: number, width: number): ChatMessage[] {
  const visible: ChatMessage[] = [];
  let used = 0;

  for (let index = messages.length - 1; index >= 0; index--) {
    const message = messages[index];
    if (!message) continue;
    const rows = rowsOf(message, width);
    if (visible.length > 0 && used + rows > height) break;
    visible.unshift(message);
    used += rows;
  }

  return visible;
}
