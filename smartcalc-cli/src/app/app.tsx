import React, { useState, useCallback, useEffect, useReducer } from "react";
import { Box, useApp } from "ink";
import { Header } from "./components/header.js";
import { TranscriptView } from "./components/transcript-view.js";
import { LineInput } from "./components/line-input.js";
import { StatusBar } from "./components/status-bar.js";
import { useWebSocket } from "./hooks/use-websocket.js";
import { appReducer, initialAppState } from "./state.js";
import type { ServerMessage } from "./types.js";

const HEADER_HEIGHT = 3;
const STATUS_HEIGHT = 1;
const INPUT_HEIGHT = 3;
const RESERVED_ROWS = HEADER_HEIGHT + STATUS_HEIGHT + INPUT_HEIGHT;
const MIN_TERMINAL_ROWS = 10;
const MIN_TRANSCRIPT_ROWS = 3;
const MIN_TERMINAL_COLUMNS = 20;

type Props = {
  readonly url: string;
};

export function App({ url }: Props): React.JSX.Element {
  const { exit } = useApp();
  const [state, dispatch] = useReducer(appReducer, initialAppState);
  const [inputValue, setInputValue] = useState("");
  const [terminalRows, setTerminalRows] = useState(
    Math.max(process.stdout.rows ?? 24, MIN_TERMINAL_ROWS),
  );
  const [terminalColumns, setTerminalColumns] = useState(
    Math.max(process.stdout.columns ?? 80, MIN_TERMINAL_COLUMNS),
  );

  useEffect(() => {
    const handleResize = (): void => {
      setTerminalRows(Math.max(process.stdout.rows ?? 24, MIN_TERMINAL_ROWS));
      setTerminalColumns(
        Math.max(process.stdout.columns ?? 80, MIN_TERMINAL_COLUMNS),
      );
    };

    process.stdout.on("resize", handleResize);

    return () => {
      process.stdout.off("resize", handleResize);
    };
  }, []);

  const onMessage = useCallback(
    (message: ServerMessage) => {
      dispatch({ type: "reply", message });
      if (message.type === "exit") exit();
    },
    [exit],
  );

  const { send, connected } = useWebSocket({ url, onMessage });

  useEffect(() => {
    if (!connected) dispatch({ type: "disconnected" });
  }, [connected]);

  const { entries, isBusy } = state;

  const handleSubmit = useCallback(
    (value: string) => {
      const trimmed = value.trim();
      if (!trimmed || isBusy) return;
      setInputValue("");

      // Handled locally; everything else goes to the server session.
      if (trimmed === "/clear") {
        dispatch({ type: "clear" });
        return;
      }

      const sent = send({ type: "line", content: trimmed });
      dispatch({ type: "submitted", content: trimmed, sent });
    },
    [isBusy, send],
  );

  const transcriptHeight = Math.max(
    MIN_TRANSCRIPT_ROWS,
    terminalRows - RESERVED_ROWS,
  );

  return (
    <Box flexDirection="column" height={terminalRows}>
      <Header url={url} />
      <TranscriptView
        entries={entries}
        height={transcriptHeight}
        width={terminalColumns - 4}
      />
      <StatusBar isBusy={isBusy} connected={connected} />
      <LineInput
        value={inputValue}
        onChange={setInputValue}
        onSubmit={handleSubmit}
        isBusy={isBusy}
      />
    </Box>
  );
}
