import { randomUUID } from "node:crypto";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import { DEFAULT_PORT } from "../config/server.js";
import { devLog, devWarn, devError } from "../shared/index.js";

export interface WsServerOptions {
  /** 0 binds an ephemeral port; read it back from `port` after `start()`. */
  port?: number;
  onMessage: (clientId: string, data: unknown) => void;
  onDisconnect?: (clientId: string) => void;
}

/**
 * JSON-over-WebSocket transport. Each connection gets a fresh client id that
 * the callbacks and `send()` use to address it.
 */
export class WsServer {
  private readonly requestedPort: number;
  private readonly onMessage: (clientId: string, data: unknown) => void;
  private readonly onDisconnect?: (clientId: string) => void;
  private wss: WebSocketServer | null = null;
  private readonly clients = new Map<string, WebSocket>();

  constructor(options: WsServerOptions) {
    this.requestedPort = options.port ?? DEFAULT_PORT;
    this.onMessage = options.onMessage;
    this.onDisconnect = options.onDisconnect;
  }

  /** The bound port while listening, otherwise the requested one. */
  get port(): number {
    const address = this.wss?.address();
    if (address && typeof address === "object") {
      return address.port;
    }
    return this.requestedPort;
  }

  get clientCount(): number {
    return this.clients.size;
  }

  /** Binds once. A failed bind leaves nothing listening and rejects. */
  start(): Promise<void> {
    if (this.wss) {
      return Promise.reject(new Error("WebSocket server already started"));
    }

    return new Promise<void>((resolve, reject) => {
      const wss = new WebSocketServer({ port: this.requestedPort });
      this.wss = wss;

      const onBindError = (err: Error): void => {
        devError(`WebSocket server failed to bind port ${this.requestedPort}: ${err.message}`);
        this.wss = null;
        wss.close();
        reject(err);
      };

      wss.once("error", onBindError);

      wss.once("listening", () => {
        wss.off("error", onBindError);
        wss.on("error", (err) => devError(`WebSocket server error: ${err.message}`));
        devLog(`WebSocket server listening on port ${this.port}`);
        resolve();
      });

      wss.on("connection", (ws) => this.accept(ws));
    });
  }

  private accept(ws: WebSocket): void {
    const clientId = randomUUID();
    this.clients.set(clientId, ws);
    devLog(`Client connected: ${clientId}`);

    ws.on("message", (raw) => this.receive(clientId, ws, raw));

    ws.on("close", () => {
      this.clients.delete(clientId);
      devLog(`Client disconnected: ${clientId}`);
      this.onDisconnect?.(clientId);
    });

    ws.on("error", (err) => {
      devError(`Client error (${clientId}):`, err.message);
    });
  }

  private receive(clientId: string, ws: WebSocket, raw: RawData): void {
    const text = raw.toString();
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      devWarn(`Invalid JSON from ${clientId}: ${text}`);
      ws.send(JSON.stringify({ error: "Invalid JSON" }));
      return;
    }
    this.onMessage(clientId, parsed);
  }

  send(clientId: string, data: unknown): void {
    const ws = this.clients.get(clientId);
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      devWarn(`send(): unknown client ${clientId}`);
      return;
    }
    ws.send(JSON.stringify(data));
  }

  async stop(): Promise<void> {
    for (const client of this.clients.values()) {
      client.close(1001, "Server shutting down");
    }
    this.clients.clear();

    const wss = this.wss;
    if (!wss) return;
    this.wss = null;

    return new Promise<void>((resolve) => {
      wss.close(() => {
        devLog("WebSocket server stopped");
        resolve();
      });
    });
  }
}
