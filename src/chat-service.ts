// Lv.3 Chat service: runs one conversational turn per session. A turn belongs
// to the session, not to the connection that asked for it, so the reply is
// stored even when every viewer has gone away.

import type { Generation, GenerationBridge } from "./generation-bridge.js";
import type { LogSink } from "./logger.js";
import type { SessionHub } from "./session-hub.js";
import type { SessionRegistry } from "./session-registry.js";
import type { ContentBlock, GenerationParams, Message, TerminalEvent } from "./types.js";
import {
  GenerationBusyError,
  GenerationError,
  SessionNotFoundError,
  ValidationError,
  errorMessage,
} from "./errors.js";
import { toWireMessage } from "./protocol.js";
import { createMessage, messageText } from "./session-registry.js";
import { PUSH_PREVIEW_CHARS } from "./types.js";

export type NotificationPayload = { title: string; body: string; tag?: string };

export interface ReplyNotifier {
  notify(payload: NotificationPayload): Promise<void>;
}

export type Turn = {
  userMessage: Message;
  /** Settles after the reply (if any) is stored and the terminal event is fanned out. Never rejects. */
  completion: Promise<TerminalEvent>;
};

export type ChatServiceDeps = {
  registry: SessionRegistry;
  bridge: GenerationBridge;
  hub: SessionHub;
  notifier?: ReplyNotifier;
  log?: LogSink;
};

export class ChatService {
  private readonly turns = new Map<string, Promise<TerminalEvent>>();
  // Stops that arrived before the turn's generation was registered.
  private readonly pendingStops = new Set<string>();
  // Text already fanned out to viewers, per session with a turn in flight.
  private readonly streamed = new Map<string, string>();

  constructor(private readonly deps: ChatServiceDeps) {}

  isBusy(sessionId: string): boolean {
    return this.turns.has(sessionId) || this.deps.bridge.isActive(sessionId);
  }

  async startTurn(
    sessionId: string,
    content: readonly ContentBlock[],
    params: GenerationParams,
  ): Promise<Turn> {
    const { registry, bridge, hub } = this.deps;
    if (!registry.has(sessionId)) throw new SessionNotFoundError(sessionId);
    if (this.isBusy(sessionId)) throw new GenerationBusyError(sessionId);
    if (content.length === 0) {
      throw new ValidationError("message has no content", "malformed_command", { sessionId });
    }

    let settle: (event: TerminalEvent) => void = () => undefined;
    const completion = new Promise<TerminalEvent>((resolve) => {
      settle = resolve;
    });
    this.turns.set(sessionId, completion);

    let userMessage: Message;
    let generation: Generation;
    try {
      const prior = registry.history(sessionId);
      userMessage = await registry.appendMessage(sessionId, createMessage("user", content));
      hub.broadcast(sessionId, { type: "message", sessionId, message: toWireMessage(userMessage) });
      generation = bridge.start(sessionId, prior, userMessage, params);
    } catch (err) {
      this.turns.delete(sessionId);
      this.pendingStops.delete(sessionId);
      throw err;
    }
    if (this.pendingStops.delete(sessionId)) bridge.stop(sessionId);
    this.streamed.set(sessionId, "");

    void this.consume(sessionId, generation).then((terminal) => {
      this.turns.delete(sessionId);
      this.pendingStops.delete(sessionId);
      this.streamed.delete(sessionId);
      settle(terminal);
    });

    return { userMessage, completion };
  }

  /** Signals the session's generation. Returns false when there was nothing to stop. */
  stop(sessionId: string): boolean {
    if (this.deps.bridge.stop(sessionId)) return true;
    if (!this.turns.has(sessionId)) return false;
    this.pendingStops.add(sessionId);
    return true;
  }

  async stopAndSettle(sessionId: string): Promise<void> {
    const turn = this.turns.get(sessionId);
    this.stop(sessionId);
    if (turn) await turn;
  }

  /**
   * Reply text broadcast so far, for viewers that join mid-stream. Every later
   * delta reaches them through the hub, so snapshot plus deltas is the whole reply.
   */
  streamingText(sessionId: string): string | undefined {
    return this.streamed.get(sessionId);
  }

  private async consume(sessionId: string, generation: Generation): Promise<TerminalEvent> {
    const { hub } = this.deps;
    try {
      for await (const event of generation) {
        if (event.type === "delta") {
          this.streamed.set(sessionId, (this.streamed.get(sessionId) ?? "") + event.text);
          hub.broadcast(sessionId, { type: "delta", sessionId, text: event.text });
          await hub.waitForDrain(sessionId);
          continue;
        }
        await this.finish(sessionId, event);
        return event;
      }
      throw new GenerationError("generation ended without a terminal event", { sessionId });
    } catch (err) {
      const cause =
        err instanceof GenerationError
          ? err
          : new GenerationError(errorMessage(err), { cause: err, sessionId });
      this.deps.log?.error(`webchat: turn failed (session=${sessionId}): ${cause.message}`);
      const terminal: TerminalEvent = { type: "error", cause };
      await this.finish(sessionId, terminal);
      return terminal;
    }
  }

  private async finish(sessionId: string, terminal: TerminalEvent): Promise<void> {
    const { hub } = this.deps;
    let reply: Message | undefined;
    // From here on the reply is delivered whole, by `message`.
    this.streamed.delete(sessionId);

    switch (terminal.type) {
      case "done":
        reply = await this.appendReply(sessionId, terminal.finalText, false);
        hub.broadcast(sessionId, { type: "done", sessionId, finalText: terminal.finalText });
        break;
      case "cancelled":
        // Nothing was streamed: there is no partial reply worth keeping.
        if (terminal.partialText) {
          reply = await this.appendReply(sessionId, terminal.partialText, true);
        }
        hub.broadcast(sessionId, {
          type: "cancelled",
          sessionId,
          partialText: terminal.partialText,
        });
        break;
      case "error":
        hub.broadcast(sessionId, {
          type: "error",
          sessionId,
          message: terminal.cause.message,
          kind: terminal.cause.kind,
        });
        return;
    }

    if (reply) {
      hub.broadcast(sessionId, { type: "message", sessionId, message: toWireMessage(reply) });
      this.notifyIfUnwatched(sessionId, reply);
    }
  }

  private async appendReply(
    sessionId: string,
    text: string,
    truncated: boolean,
  ): Promise<Message | undefined> {
    try {
      return await this.deps.registry.appendMessage(
        sessionId,
        createMessage("assistant", [{ type: "text", text }], truncated),
      );
    } catch (err) {
      if (!(err instanceof SessionNotFoundError)) throw err;
      this.deps.log?.warn(`webchat: reply dropped, session was deleted (session=${sessionId})`);
      return undefined;
    }
  }

  private notifyIfUnwatched(sessionId: string, reply: Message): void {
    const { notifier, hub, registry, log } = this.deps;
    if (!notifier || hub.viewerCount(sessionId) > 0 || !registry.has(sessionId)) return;

    const text = messageText(reply);
    const preview = text.length > PUSH_PREVIEW_CHARS ? text.slice(0, PUSH_PREVIEW_CHARS) + "…" : text;
    void notifier
      .notify({ title: registry.get(sessionId).title, body: preview, tag: "webchat-reply" })
      .catch((err: unknown) => {
        log?.error(`webchat: push notification failed: ${errorMessage(err)}`);
      });
  }
}
