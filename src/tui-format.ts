// Input parsing and transcript rendering for the terminal client

import type { WsClientInput } from "./protocol.js";
import type { WireContentBlock, WireMessage, WsServerMessage } from "./types.js";

export type TuiCommand =
  | { kind: "send"; message: WsClientInput }
  | { kind: "help" }
  | { kind: "quit" }
  | { kind: "error"; message: string };

export const HELP_TEXT = [
  "/new               start a chat",
  "/list              list chats",
  "/use <id>          switch to a chat",
  "/rename <title>    rename the current chat",
  "/clear             clear the current chat",
  "/delete            delete the current chat",
  "/stop              stop the streaming reply",
  "/model <id>        select a model",
  "/quit              exit",
].join("\n");

const NO_CHAT = "no chat selected: use /new or /use <id>";

/** Maps one input line to a protocol command. Blank lines yield null. */
export function parseInputLine(line: string, currentSession: string | null): TuiCommand | null {
  const text = line.trim();
  if (!text) return null;
  if (!text.startsWith("/")) {
    if (!currentSession) return { kind: "error", message: NO_CHAT };
    return {
      kind: "send",
      message: { type: "user_message", sessionId: currentSession, content: [{ type: "text", text }] },
    };
  }

  const space = text.indexOf(" ");
  const name = space === -1 ? text : text.slice(0, space);
  const arg = space === -1 ? "" : text.slice(space + 1).trim();

  const inSession = (build: (sessionId: string) => WsClientInput): TuiCommand =>
    currentSession ? { kind: "send", message: build(currentSession) } : { kind: "error", message: NO_CHAT };

  switch (name) {
    case "/quit":
    case "/exit":
      return { kind: "quit" };
    case "/help":
      return { kind: "help" };
    case "/new":
      return { kind: "send", message: { type: "new_chat" } };
    case "/list":
      return { kind: "send", message: { type: "list_chats" } };
    case "/use":
      if (!arg) return { kind: "error", message: "usage: /use <id>" };
      return { kind: "send", message: { type: "load_chat", sessionId: arg } };
    case "/rename":
      if (!arg) return { kind: "error", message: "usage: /rename <title>" };
      return inSession((sessionId) => ({ type: "rename", sessionId, title: arg }));
    case "/clear":
      return inSession((sessionId) => ({ type: "clear", sessionId }));
    case "/delete":
      return inSession((sessionId) => ({ type: "delete", sessionId }));
    case "/stop":
      return inSession((sessionId) => ({ type: "stop", sessionId }));
    case "/model":
      if (!arg) return { kind: "error", message: "usage: /model <id>" };
      return { kind: "send", message: { type: "select_model", modelId: arg } };
    default:
      return { kind: "error", message: `unknown command: ${name} (try /help)` };
  }
}

/** The chat the client is on after `msg`. */
export function nextSession(current: string | null, msg: WsServerMessage): string | null {
  switch (msg.type) {
    case "chat_created":
    case "chat_loaded":
      return msg.sessionId;
    case "chat_deleted":
      return msg.sessionId === current ? null : current;
    default:
      return current;
  }
}

function blockText(block: WireContentBlock): string {
  switch (block.type) {
    case "text":
      return block.text;
    case "image":
      return `[image ${block.mimeType}]`;
    case "audio":
      return `[audio ${block.mimeType}]`;
    case "file_text":
      return `[file ${block.name}]`;
  }
}

export function formatMessage(m: WireMessage): string {
  const who = m.role === "user" ? "you" : "bot";
  const text = m.content.map(blockText).join(" ");
  return `${who}> ${text}${m.truncated ? " [stopped]" : ""}`;
}

/**
 * Turns server events into terminal output. Deltas are written inline, so the
 * renderer remembers which session is mid-reply.
 */
export class TranscriptRenderer {
  private streamingSession: string | null = null;

  constructor(private readonly color = false) {}

  render(msg: WsServerMessage): string | null {
    switch (msg.type) {
      case "pong":
      case "message":
        // Own input is echoed by the terminal, replies arrive as deltas.
        return null;
      case "hello":
        return this.paint("32", `● connected (${msg.connectionId})`) + "\n";
      case "chat_created":
        return this.paint("90", `created ${msg.title} [${msg.sessionId}]`) + "\n";
      case "chat_list":
        if (msg.sessions.length === 0) return this.paint("90", "no chats") + "\n";
        return msg.sessions.map((s) => `  ${s.id}  ${s.title}\n`).join("");
      case "chat_loaded": {
        let out = this.paint("90", `--- ${msg.title} [${msg.sessionId}] ---`) + "\n";
        for (const m of msg.messages) out += formatMessage(m) + "\n";
        if (msg.streaming !== undefined) {
          this.streamingSession = msg.sessionId;
          out += `bot> ${msg.streaming}`;
        }
        return out;
      }
      case "chat_renamed":
        return this.paint("90", `renamed [${msg.sessionId}] to ${msg.title}`) + "\n";
      case "chat_cleared":
        return this.paint("90", `cleared [${msg.sessionId}]`) + "\n";
      case "chat_deleted":
        return this.paint("90", `deleted [${msg.sessionId}]`) + "\n";
      case "model_selected":
        return this.paint("90", `model: ${msg.modelId}`) + "\n";
      case "delta":
        if (this.streamingSession === msg.sessionId) return msg.text;
        this.streamingSession = msg.sessionId;
        return `bot> ${msg.text}`;
      case "done":
        if (this.endStream(msg.sessionId)) return "\n";
        return `bot> ${msg.finalText}\n`;
      case "cancelled":
        return (this.endStream(msg.sessionId) ? "\n" : "") + this.paint("33", "[stopped]") + "\n";
      case "error": {
        const lead = msg.sessionId !== undefined && this.endStream(msg.sessionId) ? "\n" : "";
        return lead + this.paint("31", `error (${msg.kind}): ${msg.message}`) + "\n";
      }
    }
  }

  private endStream(sessionId: string): boolean {
    if (this.streamingSession !== sessionId) return false;
    this.streamingSession = null;
    return true;
  }

  private paint(code: string, text: string): string {
    return this.color ? `\x1b[${code}m${text}\x1b[0m` : text;
  }
}
