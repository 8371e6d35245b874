export type TranscriptEntry = {
  id: string;
  kind: "input" | "result" | "error" | "info";
  content: string;
  timestamp: number;
};

export interface LineRequestMessage {
  type: "line";
  content: string;
}

export interface AckMessage {
  type: "ack";
}

export interface ResultMessage {
  type: "result";
  content: string;
}

export interface ErrorMessage {
  type: "error";
  content: string;
  code?: string;
}

export interface InfoMessage {
  type: "info";
  content: string;
}

export interface ExitMessage {
  type: "exit";
  content: string;
}

export type ServerMessage = AckMessage | ResultMessage | ErrorMessage | InfoMessage | ExitMessage;
