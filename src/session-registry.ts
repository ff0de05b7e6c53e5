// Lv.2 In-memory chat session registry

import { randomUUID } from "node:crypto";
import type { LogSink } from "./logger.js";
import type { ChatSession, ContentBlock, Message, Role, SessionSummary } from "./types.js";
import { SessionNotFoundError, ValidationError } from "./errors.js";
import { KeyedLock } from "./keyed-lock.js";
import { DEFAULT_TITLE } from "./types.js";

export const MAX_TITLE_LENGTH = 200;

type SessionRecord = {
  readonly id: string;
  readonly createdAt: number;
  title: string;
  messages: readonly Message[];
};

export type SessionRegistryOptions = {
  defaultTitle?: string;
  /** Stops and settles a session's in-flight generation; awaited before deletion. */
  cancelGeneration?: (sessionId: string) => Promise<void>;
  log?: LogSink;
};

/**
 * Owns every chat session. Mutations are serialized per session id through a
 * {@link KeyedLock}; reads hand out frozen snapshots, so a caller never sees a
 * half-applied change.
 */
export class SessionRegistry {
  // Map iteration order is insertion order, which is what list() reports.
  private readonly sessions = new Map<string, SessionRecord>();
  private readonly lock = new KeyedLock();
  private readonly defaultTitle: string;
  private readonly cancelGeneration?: (sessionId: string) => Promise<void>;
  private readonly log?: LogSink;

  constructor(options: SessionRegistryOptions = {}) {
    this.defaultTitle = options.defaultTitle ?? DEFAULT_TITLE;
    this.cancelGeneration = options.cancelGeneration;
    this.log = options.log;
  }

  create(): string {
    const id = randomUUID();
    this.sessions.set(id, {
      id,
      createdAt: Date.now(),
      title: this.defaultTitle,
      messages: Object.freeze([]),
    });
    this.log?.info(`webchat: session created (id=${id})`);
    return id;
  }

  list(): SessionSummary[] {
    return [...this.sessions.values()].map(({ id, title }) => ({ id, title }));
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }

  get(sessionId: string): ChatSession {
    const record = this.require(sessionId);
    return {
      id: record.id,
      title: record.title,
      messages: snapshot(record.messages),
      createdAt: record.createdAt,
    };
  }

  history(sessionId: string): readonly Message[] {
    return snapshot(this.require(sessionId).messages);
  }

  async rename(sessionId: string, title: string): Promise<string> {
    this.require(sessionId);
    const trimmed = title.trim();
    if (!trimmed) throw new ValidationError("title must not be empty", "malformed_command", { sessionId });
    if (trimmed.length > MAX_TITLE_LENGTH) {
      throw new ValidationError(`title exceeds ${MAX_TITLE_LENGTH} characters`, "malformed_command", {
        sessionId,
      });
    }
    return this.lock.run(sessionId, () => {
      this.require(sessionId).title = trimmed;
      return trimmed;
    });
  }

  async clear(sessionId: string): Promise<void> {
    await this.lock.run(sessionId, () => {
      this.require(sessionId).messages = Object.freeze([]);
    });
  }

  async appendMessage(sessionId: string, message: Message): Promise<Message> {
    return this.lock.run(sessionId, () => {
      const record = this.require(sessionId);
      const frozen = freezeMessage(message);
      record.messages = Object.freeze([...record.messages, frozen]);
      return freezeMessage(frozen);
    });
  }

  async delete(sessionId: string): Promise<void> {
    this.require(sessionId);
    if (this.cancelGeneration) await this.cancelGeneration(sessionId);
    await this.lock.run(sessionId, () => {
      this.require(sessionId);
      this.sessions.delete(sessionId);
    });
    this.log?.info(`webchat: session deleted (id=${sessionId})`);
  }

  private require(sessionId: string): SessionRecord {
    const record = this.sessions.get(sessionId);
    if (!record) throw new SessionNotFoundError(sessionId);
    return record;
  }
}

export function createMessage(
  role: Role,
  content: readonly ContentBlock[],
  truncated = false,
): Message {
  return {
    id: nextMessageId(role === "user" ? "in" : "out"),
    role,
    content,
    timestamp: Date.now(),
    truncated,
  };
}

export function nextMessageId(prefix: string): string {
  const ts = Date.now().toString(36);
  const rand = Math.random().toString(36).slice(2, 6);
  return `${prefix}-${ts}-${rand}`;
}

export function messageText(message: Message): string {
  return message.content
    .map((block) => (block.type === "text" ? block.text : ""))
    .join("");
}

// Buffers cannot be frozen, so attachment bytes are copied on the way in and out.
function copyBlock(block: ContentBlock): ContentBlock {
  switch (block.type) {
    case "image":
    case "audio":
      return Object.freeze({ ...block, data: Buffer.from(block.data) });
    case "text":
    case "file_text":
      return Object.freeze({ ...block });
  }
}

function freezeMessage(message: Message): Message {
  const content = Object.freeze(message.content.map(copyBlock));
  return Object.freeze({ ...message, content });
}

function snapshot(messages: readonly Message[]): readonly Message[] {
  const hasBytes = messages.some((m) => m.content.some((b) => b.type === "image" || b.type === "audio"));
  return hasBytes ? Object.freeze(messages.map(freezeMessage)) : messages;
}
