import React from "react";
import { Box, Text } from "ink";

type Props = {
  readonly formId: string;
};

export function Header({ formId }: Props): React.JSX.Element {
  return (
    <Box borderStyle="round" borderColor="cyan" paddingX={1} justifyContent="space-between">
      <Text bold color="cyan">
        Formwright
      </Text>
      <Text dimColor>filling: {formId}</Text>
    </Box>
  );
}
