// Lv.3 Connection handler: one per WebSocket. Decodes commands, runs them one
// at a time and keeps the Idle / Streaming state of the connection.

import { randomUUID } from "node:crypto";
import { setTimeout as delay } from "node:timers/promises";
import type { AttachmentEncoder } from "./attachment-encoder.js";
import type { InferenceBackend } from "./backend.js";
import type { ChatService } from "./chat-service.js";
import type { LogSink } from "./logger.js";
import type { WsClientMessage } from "./protocol.js";
import type { Subscriber, SessionHub } from "./session-hub.js";
import type { SessionRegistry } from "./session-registry.js";
import type { WsServerMessage } from "./types.js";
import { GenerationBusyError, SessionNotFoundError, ValidationError, toChatError } from "./errors.js";
import { parseClientMessage, toWireMessage } from "./protocol.js";

/** The socket as the handler sees it. */
export interface Transport {
  send(data: string): void;
  isOpen(): boolean;
  bufferedAmount(): number;
}

export type ConnectionState = { kind: "idle" } | { kind: "streaming"; sessionId: string };

export type ConnectionDeps = {
  registry: SessionRegistry;
  chat: ChatService;
  hub: SessionHub;
  encoder: AttachmentEncoder;
  backend: InferenceBackend;
  log?: LogSink;
};

export type ConnectionHandlerOptions = {
  /** Outbound bytes above which the connection counts as congested. */
  highWaterMark?: number;
  drainPollMs?: number;
  /** Inbound frames larger than this are answered with a ValidationError. */
  maxMessageBytes?: number;
};

const DEFAULT_HIGH_WATER_MARK = 1024 * 1024;
const DEFAULT_DRAIN_POLL_MS = 10;

export class ConnectionHandler implements Subscriber {
  readonly connectionId = randomUUID();
  private state: ConnectionState = { kind: "idle" };
  private viewing: string | null = null;
  private queue: Promise<void> = Promise.resolve();
  private closed = false;
  private readonly highWaterMark: number;
  private readonly drainPollMs: number;
  private readonly maxMessageBytes: number | undefined;

  constructor(
    private readonly transport: Transport,
    private readonly deps: ConnectionDeps,
    options: ConnectionHandlerOptions = {},
  ) {
    this.highWaterMark = options.highWaterMark ?? DEFAULT_HIGH_WATER_MARK;
    this.drainPollMs = options.drainPollMs ?? DEFAULT_DRAIN_POLL_MS;
    this.maxMessageBytes = options.maxMessageBytes;
  }

  get currentState(): ConnectionState {
    return this.state;
  }

  get viewedSession(): string | null {
    return this.viewing;
  }

  open(): void {
    this.deps.log?.info(`webchat: WS connected (connectionId=${this.connectionId})`);
    this.send({ type: "hello", connectionId: this.connectionId });
  }

  send(msg: WsServerMessage): void {
    if (this.closed || !this.transport.isOpen()) return;
    this.transport.send(JSON.stringify(msg));
  }

  async waitForDrain(): Promise<void> {
    while (
      !this.closed &&
      this.transport.isOpen() &&
      this.transport.bufferedAmount() > this.highWaterMark
    ) {
      await delay(this.drainPollMs);
    }
  }

  /** Queues one inbound frame. The returned promise settles when it has been handled; it never rejects. */
  receive(raw: string): Promise<void> {
    const next = this.queue.then(() => this.handle(raw));
    this.queue = next;
    return next;
  }

  /** Drops the connection's subscriptions. A running generation is left alone. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.deps.hub.unsubscribeAll(this);
    this.viewing = null;
    this.deps.log?.info(`webchat: WS disconnected (connectionId=${this.connectionId})`);
  }

  private async handle(raw: string): Promise<void> {
    let msg: WsClientMessage | undefined;
    try {
      this.checkSize(raw);
      msg = parseClientMessage(raw);
      if (msg.type !== "ping") {
        this.deps.log?.info(`webchat: ${msg.type} (connectionId=${this.connectionId})`);
      }
      await this.dispatch(msg);
    } catch (err) {
      this.fail(err, msg);
    }
  }

  private checkSize(raw: string): void {
    if (this.maxMessageBytes === undefined) return;
    const size = Buffer.byteLength(raw);
    if (size > this.maxMessageBytes) {
      throw new ValidationError(
        `size exceeded: message is ${size} bytes, limit is ${this.maxMessageBytes}`,
        "size_exceeded",
      );
    }
  }

  private async dispatch(msg: WsClientMessage): Promise<void> {
    const { registry, chat, hub, encoder, backend } = this.deps;

    switch (msg.type) {
      case "ping":
        this.send({ type: "pong" });
        return;

      case "new_chat": {
        const sessionId = registry.create();
        this.view(sessionId);
        this.send({ type: "chat_created", sessionId, title: registry.get(sessionId).title });
        return;
      }

      case "list_chats":
        this.send({ type: "chat_list", sessions: registry.list() });
        return;

      case "load_chat": {
        const session = registry.get(msg.sessionId);
        this.view(session.id);
        const streaming = chat.streamingText(session.id);
        this.send({
          type: "chat_loaded",
          sessionId: session.id,
          title: session.title,
          messages: session.messages.map(toWireMessage),
          ...(streaming !== undefined && { streaming }),
        });
        return;
      }

      case "rename": {
        const title = await registry.rename(msg.sessionId, msg.title);
        const renamed: WsServerMessage = { type: "chat_renamed", sessionId: msg.sessionId, title };
        this.send(renamed);
        hub.broadcast(msg.sessionId, renamed, this);
        return;
      }

      case "clear": {
        if (!registry.has(msg.sessionId)) throw new SessionNotFoundError(msg.sessionId);
        if (chat.isBusy(msg.sessionId)) {
          throw new GenerationBusyError(msg.sessionId, "cannot clear a chat while a reply is streaming");
        }
        await registry.clear(msg.sessionId);
        const cleared: WsServerMessage = { type: "chat_cleared", sessionId: msg.sessionId };
        this.send(cleared);
        hub.broadcast(msg.sessionId, cleared, this);
        return;
      }

      case "delete": {
        await registry.delete(msg.sessionId);
        const deleted: WsServerMessage = { type: "chat_deleted", sessionId: msg.sessionId };
        this.send(deleted);
        hub.broadcast(msg.sessionId, deleted, this);
        hub.dropSession(msg.sessionId);
        if (this.viewing === msg.sessionId) this.viewing = null;
        return;
      }

      case "stop":
        if (!registry.has(msg.sessionId)) throw new SessionNotFoundError(msg.sessionId);
        if (!chat.stop(msg.sessionId)) {
          this.deps.log?.info(`webchat: stop ignored, nothing running (session=${msg.sessionId})`);
        }
        return;

      case "select_model":
        await backend.selectModel(msg.modelId);
        this.send({ type: "model_selected", modelId: backend.selectedModel() });
        return;

      case "user_message": {
        const { sessionId } = msg;
        if (this.state.kind === "streaming") {
          throw new GenerationBusyError(sessionId, "this connection is already waiting on a reply");
        }
        if (!registry.has(sessionId)) throw new SessionNotFoundError(sessionId);
        const content = encoder.encodeContent(msg.content);
        this.view(sessionId);
        const turn = await chat.startTurn(sessionId, content, msg.params);
        this.state = { kind: "streaming", sessionId };
        void turn.completion.then(() => {
          if (this.state.kind === "streaming" && this.state.sessionId === sessionId) {
            this.state = { kind: "idle" };
          }
        });
        return;
      }
    }
  }

  private view(sessionId: string): void {
    if (this.closed || this.viewing === sessionId) return;
    if (this.viewing) this.deps.hub.unsubscribe(this.viewing, this);
    this.deps.hub.subscribe(sessionId, this);
    this.viewing = sessionId;
  }

  private fail(err: unknown, msg: WsClientMessage | undefined): void {
    const error = toChatError(err);
    const sessionId = error.sessionId ?? (msg && "sessionId" in msg ? msg.sessionId : undefined);
    const log = this.deps.log;
    const line = `webchat: ${msg?.type ?? "frame"} rejected (connectionId=${this.connectionId}): ${error.kind}: ${error.message}`;
    if (error.kind === "InternalError") log?.error(line);
    else log?.warn(line);
    this.send({
      type: "error",
      ...(sessionId !== undefined && { sessionId }),
      message: error.message,
      kind: error.kind,
    });
  }
}
