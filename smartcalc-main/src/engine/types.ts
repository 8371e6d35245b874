import type { CalcErrorCode } from "../calculator/index.js";

export interface LineRequestMessage {
  type: "line";
  content: string;
}

export type ServerMessage =
  | { type: "ack" }
  | { type: "result"; content: string }
  | { type: "error"; content: string; code?: CalcErrorCode }
  | { type: "info"; content: string }
  | { type: "exit"; content: string };
