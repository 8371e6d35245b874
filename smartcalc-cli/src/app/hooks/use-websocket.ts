import { useState, useEffect, useRef, useCallback } from "react";
import WebSocket from "ws";
import { parseServerMessage } from "../protocol.js";
import type { LineRequestMessage, ServerMessage } from "../types.js";

type UseWebSocketOptions = {
  url: string;
  onMessage: (data: ServerMessage) => void;
};

type UseWebSocketReturn = {
  send: (data: LineRequestMessage) => boolean;
  connected: boolean;
};

export function useWebSocket({
  url,
  onMessage,
}: UseWebSocketOptions): UseWebSocketReturn {
  const [connected, setConnected] = useState(false);
  const wsRef = useRef<WebSocket | null>(null);
  const onMessageRef = useRef(onMessage);
  onMessageRef.current = onMessage;

  useEffect(() => {
    const ws = new WebSocket(url);
    wsRef.current = ws;

    ws.on("open", () => setConnected(true));

    ws.on("message", (raw) => {
      const parsed = parseServerMessage(raw.toString());
      if (parsed) {
        onMessageRef.current(parsed);
      }
    });

    ws.on("close", () => setConnected(false));
    ws.on("error", () => {
      // error fires before close; close handler updates state
    });

    return () => {
      ws.close();
      wsRef.current = null;
    };
  }, [url]);

  const send = useCallback((data: LineRequestMessage): boolean => {
    const ws = wsRef.current;
    if (!ws || ws.readyState !== WebSocket.OPEN) return false;
    ws.send(JSON.stringify(data));
    return true;
  }, []);

  return { send, connected };
}
