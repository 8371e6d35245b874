import React from "react";
import { Box, Text } from "ink";
import Spinner from "ink-spinner";

type Props = {
  readonly isBusy: boolean;
  readonly connected: boolean;
};

export function StatusBar({ isBusy, connected }: Props): React.JSX.Element {
  if (!connected) {
    return (
      <Box paddingX={1} height={1}>
        <Text color="red">[disconnected] start the server with npm start -w smartcalc-main</Text>
      </Box>
    );
  }

  return (
    <Box paddingX={1} height={1}>
      {isBusy ? (
        <Text color="yellow">
          <Spinner type="dots" /> Calculating...
        </Text>
      ) : (
        <Text dimColor>Enter: evaluate | /help /exit | Up/Down/PgUp/PgDn: scroll | Ctrl+C: quit</Text>
      )}
    </Box>
  );
}
