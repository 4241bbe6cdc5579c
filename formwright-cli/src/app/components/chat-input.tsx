import React from "react";
import { Box, Text } from "ink";
import TextInput from "ink-text-input";

type Props = {
  readonly value: string;
  readonly disabled: boolean;
  readonly onChange: (value: string) => void;
  readonly onSubmit: (value: string) => void;
};

export function ChatInput({ value, disabled, onChange, onSubmit }: Props): React.JSX.Element {
  return (
    <Box borderStyle="round" borderColor={disabled ? "gray" : "green"} paddingX={1}>
      <Text color={disabled ? "gray" : "green"}>{"? "}</Text>
      <TextInput
        value={value}
        onChange={onChange}
        onSubmit={onSubmit}
        placeholder="answer in your own words"
        focus={!disabled}
      />
    </Box>
  );
}
