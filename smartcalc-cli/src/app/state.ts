import type { ServerMessage, TranscriptEntry } from "./types.js";

export type AppState = {
  readonly entries: readonly TranscriptEntry[];
  /** A line was sent and its reply has not arrived yet. */
  readonly isBusy: boolean;
  readonly nextId: number;
};

export type AppAction =
  | { type: "submitted"; content: string; sent: boolean }
  | { type: "reply"; message: ServerMessage }
  | { type: "disconnected" }
  | { type: "clear" };

export const initialAppState: AppState = { entries: [], isBusy: false, nextId: 1 };

function append(
  state: AppState,
  kind: TranscriptEntry["kind"],
  content: string,
): AppState {
  const entry: TranscriptEntry = {
    id: String(state.nextId),
    kind,
    content,
    timestamp: Date.now(),
  };
  return { ...state, entries: [...state.entries, entry], nextId: state.nextId + 1 };
}

export function appReducer(state: AppState, action: AppAction): AppState {
  switch (action.type) {
    case "submitted": {
      const next = append(state, "input", action.content);
      if (action.sent) return { ...next, isBusy: true };
      return append(next, "error", "Not connected to the calculator server.");
    }
    case "reply": {
      const { message } = action;
      const idle = { ...state, isBusy: false };
      switch (message.type) {
        case "ack":
          return idle;
        case "exit":
          return append(idle, "info", message.content);
        default:
          return append(idle, message.type, message.content);
      }
    }
    case "disconnected":
      if (!state.isBusy) return state;
      return append({ ...state, isBusy: false }, "error", "Connection lost before a reply arrived.");
    case "clear":
      return { ...state, entries: [] };
  }
}
