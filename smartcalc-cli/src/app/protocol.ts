import type { ServerMessage } from "./types.js";

export const DEFAULT_URL = "ws://localhost:8080";

export function resolveServerUrl(env: NodeJS.ProcessEnv = process.env): string {
  const url = env["SMARTCALC_URL"]?.trim();
  return url ? url : DEFAULT_URL;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/** Returns null for frames that are not JSON or not a known server message. */
export function parseServerMessage(raw: string): ServerMessage | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(data)) return null;

  const content = data["content"];
  const code = data["code"];
  const type = data["type"];
  if (type === "ack") {
    return { type: "ack" };
  }
  if (typeof content !== "string") return null;

  switch (type) {
    case "result":
      return { type: "result", content };
    case "info":
      return { type: "info", content };
    case "exit":
      return { type: "exit", content };
    case "error":
      return typeof code === "string" ? { type: "error", content, code } : { type: "error", content };
    default:
      return null;
  }
}
