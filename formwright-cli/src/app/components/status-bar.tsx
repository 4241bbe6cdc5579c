import React from "react";
import { Box, Text } from "ink";
import Spinner from "ink-spinner";

type Props = {
  readonly isLoading: boolean;
  readonly remainingFields: number;
};

export function StatusBar({ isLoading, remainingFields }: Props): React.JSX.Element {
  if (isLoading) {
    return (
      <Box paddingX={1} height={1}>
        <Text color="yellow">
          <Spinner type="dots" /> Asking the model...
        </Text>
      </Box>
    );
  }

  return (
    <Box paddingX={1} height={1} justifyContent="space-between">
      <Text dimColor>Enter to answer, q to quit</Text>
      {remainingFields > 0 ? (
        <Text color="cyan">{remainingFields} left</Text>
      ) : (
        <Text color="green">complete</Text>
      )}
    </Box>
  );
}
