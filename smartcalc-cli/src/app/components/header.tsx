import React from "react";
import { Box, Text } from "ink";

type Props = {
  readonly url: string;
};

export function Header({ url }: Props): React.JSX.Element {
  return (
    <Box
      borderStyle="single"
      borderColor="cyan"
      paddingX={1}
      justifyContent="space-between"
    >
      <Text bold color="cyan">
        SmartCalc
      </Text>
      <Text dimColor>{url}</Text>
    </Box>
  );
}
