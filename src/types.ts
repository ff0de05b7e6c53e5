// Lv.0 Primitives

import type { ErrorKind, GenerationError } from "./errors.js";

export type Role = "user" | "assistant" | "system";

export type ContentBlock =
  | { type: "text"; text: string }
  | { type: "image"; data: Buffer; mimeType: string }
  | { type: "audio"; data: Buffer; mimeType: string }
  | { type: "file_text"; name: string; text: string };

export type Message = {
  id: string;
  role: Role;
  content: readonly ContentBlock[];
  timestamp: number;
  /** Set when a stop request ended the reply early. */
  truncated: boolean;
};

export type ChatSession = {
  id: string;
  title: string;
  messages: readonly Message[];
  createdAt: number;
};

export type SessionSummary = { id: string; title: string };

export type SearchContextSize = "low" | "medium" | "high";

export type SearchOptions = {
  enabled: boolean;
  contextSize: SearchContextSize;
};

export type SamplingParams = {
  temperature?: number;
  topP?: number;
  maxTokens?: number;
  frequencyPenalty?: number;
  presencePenalty?: number;
  stop?: string[];
  seed?: number;
};

export type GenerationParams = SamplingParams & { search: SearchOptions };

export type GenerationRequest = {
  sessionId: string;
  /** Every message to replay, ending with the new user message. */
  history: readonly Message[];
  params: GenerationParams;
};

export type GenerationEvent =
  | { type: "delta"; text: string }
  | { type: "done"; finalText: string }
  | { type: "error"; cause: GenerationError }
  | { type: "cancelled"; partialText: string };

export type TerminalEvent = Exclude<GenerationEvent, { type: "delta" }>;

// ===== Wire shapes =====

export type WireContentBlock =
  | { type: "text"; text: string }
  | { type: "image"; data: string; mimeType: string }
  | { type: "audio"; data: string; mimeType: string }
  | { type: "file_text"; name: string; text: string };

export type WireMessage = Omit<Message, "content"> & { content: WireContentBlock[] };

export type WsServerMessage =
  | { type: "hello"; connectionId: string }
  | { type: "pong" }
  | { type: "chat_created"; sessionId: string; title: string }
  | { type: "chat_list"; sessions: SessionSummary[] }
  | {
      type: "chat_loaded";
      sessionId: string;
      title: string;
      messages: WireMessage[];
      streaming?: string;
    }
  | { type: "chat_renamed"; sessionId: string; title: string }
  | { type: "chat_cleared"; sessionId: string }
  | { type: "chat_deleted"; sessionId: string }
  | { type: "message"; sessionId: string; message: WireMessage }
  | { type: "delta"; sessionId: string; text: string }
  | { type: "done"; sessionId: string; finalText: string }
  | { type: "cancelled"; sessionId: string; partialText: string }
  | { type: "error"; sessionId?: string; message: string; kind: ErrorKind }
  | { type: "model_selected"; modelId: string };

export const DEFAULT_TITLE = "New Chat";
export const DEFAULT_SEARCH: SearchOptions = { enabled: false, contextSize: "medium" };
export const DEFAULT_CHANNEL_CAPACITY = 64;
export const DEFAULT_CANCEL_CHECK_INTERVAL = 1;
export const PING_INTERVAL_MS = 30_000;
export const PUSH_PREVIEW_CHARS = 100;
