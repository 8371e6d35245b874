import { CalcSession, type SessionReply } from "../session/index.js";
import { devLog, devWarn, devError } from "../shared/index.js";
import type { LineRequestMessage, ServerMessage } from "./types.js";

export type { LineRequestMessage, ServerMessage } from "./types.js";

export interface CalcEngineOptions {
  onReply?: (clientId: string, data: ServerMessage) => void;
  createSession?: () => CalcSession;
}

function isLineRequest(data: unknown): data is LineRequestMessage {
  if (!data || typeof data !== "object") return false;
  return "type" in data && data.type === "line" && "content" in data && typeof data.content === "string";
}

function toServerMessage(reply: SessionReply): ServerMessage {
  return reply.type === "silent" ? { type: "ack" } : reply;
}

/**
 * Routes input lines from connected clients to a per-client CalcSession,
 * so every client evaluates against its own variables.
 */
export class CalcEngine {
  private readonly onReply?: (clientId: string, data: ServerMessage) => void;
  private readonly createSession: () => CalcSession;
  private readonly sessions = new Map<string, CalcSession>();

  constructor(options?: CalcEngineOptions) {
    this.onReply = options?.onReply;
    this.createSession = options?.createSession ?? (() => new CalcSession());
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  async start(): Promise<void> {
    devLog("CalcEngine started");
  }

  async stop(): Promise<void> {
    this.sessions.clear();
    devLog("CalcEngine stopped");
  }

  handleMessage(clientId: string, data: unknown): void {
    devLog(`Message from ${clientId}:`, JSON.stringify(data));

    if (!isLineRequest(data)) {
      devWarn(`Unsupported message from ${clientId}`);
      this.onReply?.(clientId, { type: "error", content: "Unsupported message" });
      return;
    }

    const session = this.getSession(clientId);
    try {
      this.onReply?.(clientId, toServerMessage(session.handleLine(data.content)));
    } catch (err) {
      devError("Evaluation failed:", err);
      this.onReply?.(clientId, { type: "error", content: "Internal error" });
    }
  }

  dropClient(clientId: string): void {
    if (this.sessions.delete(clientId)) {
      devLog(`Session closed: ${clientId}`);
    }
  }

  private getSession(clientId: string): CalcSession {
    let session = this.sessions.get(clientId);
    if (!session) {
      session = this.createSession();
      this.sessions.set(clientId, session);
      devLog(`Session opened: ${clientId}`);
    }
    return session;
  }
}
