import React from "react";
import { Box, Text } from "ink";
import { BODY_INDENT, visibleTail } from "../message-layout.js";
import type { ChatMessage } from "../types.js";

type Props = {
  readonly messages: ChatMessage[];
  readonly height: number;
  readonly width: number;
};

type Tone = "green" | "cyan" | "yellow";

function toneOf(message: ChatMessage): Tone {
  if (message.role === "user") return "green";
  return message.success === false ? "yellow" : "cyan";
}

export function MessageList({ messages, height, width }: Props): React.JSX.Element {
  const visible = visibleTail(messages, Math.max(1, height), width);

  return (
    <Box
      flexDirection="column"
      justifyContent="flex-end"
      overflow="hidden"
      paddingX={1}
      height={height}
    >
      {visible.map((message) => (
        <Box key={message.id} flexDirection="column" marginBottom={1}>
          <Text bold color={toneOf(message)}>
            {message.role === "user" ? "You" : "Formwright"}
          </Text>
          <Box paddingLeft={BODY_INDENT}>
            <Text wrap="wrap">{message.content}</Text>
          </Box>
        </Box>
      ))}
    </Box>
  );
}
