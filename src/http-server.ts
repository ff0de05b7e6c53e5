// HTTP server: REST endpoints + WebSocket upgrade

import * as http from "node:http";
import { z } from "zod";
import type { AppContext } from "./context.js";
import { checkAuth } from "./auth.js";
import { SessionNotFoundError, errorMessage } from "./errors.js";
import { SessionIdSchema, formatIssues } from "./protocol.js";
import { PushSubscriptionSchema } from "./push.js";
import { setupWebSocketServer, type WebSocketServerHandle } from "./ws-server.js";

const MAX_JSON_BODY_BYTES = 64 * 1024;

export type HttpServerOptions = {
  /** Overrides the configured port, e.g. 0 in tests. */
  port?: number;
  abortSignal?: AbortSignal;
};

export type RunningServer = {
  server: http.Server;
  ws: WebSocketServerHandle;
  port: number;
  close(): Promise<void>;
};

class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
  }
}

function jsonResponse(res: http.ServerResponse, status: number, data: unknown): void {
  const body = JSON.stringify(data);
  res.writeHead(status, {
    "Content-Type": "application/json",
    "Access-Control-Allow-Origin": "*",
  });
  res.end(body);
}

async function readJsonBody<T extends z.ZodTypeAny>(req: http.IncomingMessage, schema: T): Promise<z.infer<T>> {
  const chunks: Buffer[] = [];
  let size = 0;
  // Drain the whole body even past the limit so the 413 reaches the client.
  for await (const chunk of req) {
    const bytes = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += bytes.length;
    if (size <= MAX_JSON_BODY_BYTES) chunks.push(bytes);
  }
  if (size > MAX_JSON_BODY_BYTES) throw new HttpError(413, "Body too large");
  let json: unknown;
  try {
    json = JSON.parse(Buffer.concat(chunks).toString("utf8"));
  } catch {
    throw new HttpError(400, "Invalid body");
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) throw new HttpError(400, `Invalid body: ${formatIssues(parsed.error)}`);
  return parsed.data;
}

const DeleteSessionBody = z.object({ sessionId: SessionIdSchema });
const SubscribeBody = z.object({ subscription: PushSubscriptionSchema });
const UnsubscribeBody = z.object({ endpoint: z.string().min(1) });

function createRequestHandler(ctx: AppContext): http.RequestListener {
  const { config, registry, bridge, backend, push, log } = ctx;

  const route = async (req: http.IncomingMessage, res: http.ServerResponse): Promise<void> => {
    if (req.method === "OPTIONS") {
      res.writeHead(204, {
        "Access-Control-Allow-Origin": "*",
        "Access-Control-Allow-Headers": "Content-Type, Authorization, X-Auth-Token",
        "Access-Control-Allow-Methods": "GET, POST, DELETE, OPTIONS",
      });
      res.end();
      return;
    }

    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const guarded = url.pathname === "/models" || url.pathname.startsWith("/api/");
    if (guarded && !checkAuth(req, config)) {
      jsonResponse(res, 401, { error: "Unauthorized" });
      return;
    }

    if (url.pathname === "/models" && req.method === "GET") {
      try {
        const models = await backend.listModels();
        jsonResponse(res, 200, { models, selected: backend.selectedModel() });
      } catch (err) {
        log?.error(`webchat: model listing failed: ${errorMessage(err)}`);
        jsonResponse(res, 502, { error: errorMessage(err) });
      }
      return;
    }

    if (url.pathname === "/api/status" && req.method === "GET") {
      jsonResponse(res, 200, {
        ok: true,
        sessions: registry.size,
        activeGenerations: bridge.activeCount,
      });
      return;
    }

    // Session management
    if (url.pathname === "/api/sessions" && req.method === "GET") {
      const sessions = registry.list().map(({ id }) => {
        const session = registry.get(id);
        return {
          id,
          title: session.title,
          createdAt: session.createdAt,
          messageCount: session.messages.length,
        };
      });
      jsonResponse(res, 200, { sessions });
      return;
    }

    if (url.pathname === "/api/sessions" && req.method === "DELETE") {
      const { sessionId } = await readJsonBody(req, DeleteSessionBody);
      try {
        await registry.delete(sessionId);
      } catch (err) {
        if (err instanceof SessionNotFoundError) {
          jsonResponse(res, 404, { error: err.message });
          return;
        }
        throw err;
      }
      ctx.hub.broadcast(sessionId, { type: "chat_deleted", sessionId });
      ctx.hub.dropSession(sessionId);
      jsonResponse(res, 200, { ok: true });
      return;
    }

    // Push notification endpoints
    if (url.pathname.startsWith("/api/push/")) {
      if (!push) {
        jsonResponse(res, 404, { error: "Push notifications are disabled" });
        return;
      }

      if (url.pathname === "/api/push/vapid-public-key" && req.method === "GET") {
        jsonResponse(res, 200, { publicKey: push.getVapidPublicKey() });
        return;
      }

      if (url.pathname === "/api/push/subscribe" && req.method === "POST") {
        const { subscription } = await readJsonBody(req, SubscribeBody);
        push.addSubscription(subscription);
        log?.info(`webchat: push subscription added (${subscription.endpoint.slice(-20)})`);
        jsonResponse(res, 200, { ok: true });
        return;
      }

      if (url.pathname === "/api/push/unsubscribe" && req.method === "POST") {
        const { endpoint } = await readJsonBody(req, UnsubscribeBody);
        jsonResponse(res, 200, { ok: push.removeSubscription(endpoint) });
        return;
      }
    }

    jsonResponse(res, 404, { error: "Not Found" });
  };

  return (req, res) => {
    route(req, res).catch((err: unknown) => {
      if (err instanceof HttpError) {
        if (!res.headersSent) jsonResponse(res, err.status, { error: err.message });
        return;
      }
      log?.error(`webchat: request error: ${errorMessage(err)}`);
      if (!res.headersSent) jsonResponse(res, 500, { error: "Internal Server Error" });
    });
  };
}

export async function startHttpServer(
  ctx: AppContext,
  options: HttpServerOptions = {},
): Promise<RunningServer> {
  const { config, log } = ctx;
  const server = http.createServer(createRequestHandler(ctx));

  // Setup WebSocket on same server
  const ws = setupWebSocketServer(server, ctx);

  await new Promise<void>((resolve, reject) => {
    const onError = (err: Error): void => {
      log?.error(`webchat: server error: ${errorMessage(err)}`);
      reject(err);
    };
    server.once("error", onError);
    server.listen(options.port ?? config.port, config.host, () => {
      server.off("error", onError);
      resolve();
    });
  });

  const address = server.address();
  const port = typeof address === "object" && address ? address.port : (options.port ?? config.port);
  log?.info(`webchat: server listening on http://${config.host}:${port}`);

  let closing: Promise<void> | null = null;
  const close = (): Promise<void> => {
    if (!closing) {
      closing = (async () => {
        await ws.close();
        await new Promise<void>((resolve) => server.close(() => resolve()));
        log?.info("webchat: server stopped");
      })();
    }
    return closing;
  };

  options.abortSignal?.addEventListener("abort", () => {
    void close();
  });

  return { server, ws, port, close };
}
