// WebSocket server: accepts connections on /ws and gives each its own handler

import type { Server as HttpServer, IncomingMessage } from "node:http";
import type { Duplex } from "node:stream";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import type { AppContext } from "./context.js";
import type { Transport } from "./connection-handler.js";
import { checkAuth } from "./auth.js";
import { ConnectionHandler } from "./connection-handler.js";
import { errorMessage } from "./errors.js";
import { PING_INTERVAL_MS } from "./types.js";

export type WebSocketServerHandle = {
  wss: WebSocketServer;
  /** Live handlers, one per open socket. */
  connections(): number;
  close(): Promise<void>;
};

export type WebSocketServerOptions = {
  pingIntervalMs?: number;
  highWaterMark?: number;
};

export function setupWebSocketServer(
  server: HttpServer,
  ctx: AppContext,
  options: WebSocketServerOptions = {},
): WebSocketServerHandle {
  const { config, log } = ctx;
  // Frames between the configured cap and twice it still reach the handler,
  // which answers with an error frame; only larger ones close the socket (1009).
  const wss = new WebSocketServer({ noServer: true, maxPayload: 2 * config.maxPayloadBytes });
  const handlers = new Set<ConnectionHandler>();

  const onUpgrade = (req: IncomingMessage, socket: Duplex, head: Buffer): void => {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    if (url.pathname !== "/ws") {
      socket.destroy();
      return;
    }

    if (!checkAuth(req, config)) {
      log?.warn(`webchat: WS upgrade rejected, bad token (${req.socket.remoteAddress ?? "?"})`);
      socket.write("HTTP/1.1 401 Unauthorized\r\n\r\n");
      socket.destroy();
      return;
    }

    wss.handleUpgrade(req, socket, head, (ws) => {
      wss.emit("connection", ws, req);
    });
  };
  server.on("upgrade", onUpgrade);

  wss.on("connection", (ws: WebSocket) => {
    const handler = new ConnectionHandler(socketTransport(ws), ctx, {
      highWaterMark: options.highWaterMark,
      maxMessageBytes: config.maxPayloadBytes,
    });
    handlers.add(handler);
    handler.open();

    ws.on("message", (raw: RawData, isBinary: boolean) => {
      void handler.receive(isBinary ? "" : rawToString(raw));
    });

    ws.on("close", () => {
      handlers.delete(handler);
      handler.close();
    });

    ws.on("error", (err) => {
      log?.error(`webchat: WS error (connectionId=${handler.connectionId}): ${errorMessage(err)}`);
      handlers.delete(handler);
      handler.close();
    });
  });

  // Ping every 30s
  const pingInterval = setInterval(() => {
    for (const ws of wss.clients) {
      if (ws.readyState === WebSocket.OPEN) ws.ping();
    }
  }, options.pingIntervalMs ?? PING_INTERVAL_MS);
  pingInterval.unref();

  wss.on("close", () => clearInterval(pingInterval));

  return {
    wss,
    connections: () => handlers.size,
    close: () =>
      new Promise<void>((resolve) => {
        server.off("upgrade", onUpgrade);
        for (const ws of wss.clients) ws.terminate();
        wss.close(() => resolve());
      }),
  };
}

function socketTransport(ws: WebSocket): Transport {
  return {
    send: (data) => ws.send(data),
    isOpen: () => ws.readyState === WebSocket.OPEN,
    bufferedAmount: () => ws.bufferedAmount,
  };
}

function rawToString(raw: RawData): string {
  if (Array.isArray(raw)) return Buffer.concat(raw).toString("utf8");
  if (raw instanceof ArrayBuffer) return Buffer.from(raw).toString("utf8");
  return raw.toString("utf8");
}
