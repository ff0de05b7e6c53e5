// 테스트 공용 도구: 가짜 추론 백엔드, 설정, WebSocket 클라이언트

import WebSocket from "ws";
import type { AppConfig } from "../src/config.js";
import type { InferenceBackend, ModelInfo } from "../src/backend.js";
import type { LogSink } from "../src/logger.js";
import type { WsClientInput } from "../src/protocol.js";
import type { GenerationRequest, WsServerMessage } from "../src/types.js";
import { ModelError } from "../src/errors.js";

export type StreamScript = (request: GenerationRequest, signal: AbortSignal) => AsyncIterable<string>;

/** Yields the given units in order. */
export function chunks(parts: string[]): StreamScript {
  return async function* () {
    for (const part of parts) yield part;
  };
}

export function failing(after: string[], error: Error): StreamScript {
  return async function* () {
    for (const part of after) yield part;
    throw error;
  };
}

/** A backend stream driven by the test, one unit at a time. */
export class ManualStream {
  returned = false;
  private readonly queue: string[] = [];
  private waiter: (() => void) | null = null;
  private ended = false;
  private failure: Error | null = null;

  readonly script: StreamScript = (_request, signal) => this.iterate(signal);

  push(...parts: string[]): void {
    this.queue.push(...parts);
    this.wake();
  }

  end(): void {
    this.ended = true;
    this.wake();
  }

  fail(err: Error): void {
    this.failure = err;
    this.wake();
  }

  private wake(): void {
    const w = this.waiter;
    this.waiter = null;
    w?.();
  }

  private async *iterate(signal: AbortSignal): AsyncGenerator<string> {
    const onAbort = (): void => this.wake();
    signal.addEventListener("abort", onAbort);
    try {
      for (;;) {
        if (signal.aborted) throw new Error("request aborted");
        const next = this.queue.shift();
        if (next !== undefined) {
          yield next;
          continue;
        }
        if (this.failure) throw this.failure;
        if (this.ended) return;
        await new Promise<void>((resolve) => {
          this.waiter = resolve;
        });
      }
    } finally {
      this.returned = true;
      signal.removeEventListener("abort", onAbort);
    }
  }
}

export class FakeBackend implements InferenceBackend {
  readonly requests: GenerationRequest[] = [];
  models: ModelInfo[] = [{ id: "default" }, { id: "qwen-vl" }];
  listError: Error | null = null;
  private model = "default";

  constructor(public script: StreamScript = chunks(["Hel", "lo", "!"])) {}

  streamChat(request: GenerationRequest, signal: AbortSignal): AsyncIterable<string> {
    this.requests.push(request);
    return this.script(request, signal);
  }

  async listModels(): Promise<ModelInfo[]> {
    if (this.listError) throw this.listError;
    return this.models;
  }

  async selectModel(modelId: string): Promise<void> {
    if (!this.models.some((m) => m.id === modelId)) throw new ModelError(`unknown model: ${modelId}`);
    this.model = modelId;
  }

  selectedModel(): string {
    return this.model;
  }
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    host: "127.0.0.1",
    port: 0,
    trustLoopback: false,
    backend: { baseURL: "http://127.0.0.1:9/v1", apiKey: "test-key", model: "default" },
    attachments: {
      accepted: ["image", "audio", "text"],
      maxBytes: { image: 1024, audio: 1024, text: 1024 },
    },
    channelCapacity: 4,
    cancelCheckInterval: 1,
    maxPayloadBytes: 1024 * 1024,
    defaultTitle: "New Chat",
    push: { enabled: false, storeDir: "/nonexistent", subject: "mailto:test@example.com" },
    ...overrides,
  };
}

export type RecordingLog = LogSink & { lines: string[] };

export function recordingLog(): RecordingLog {
  const lines: string[] = [];
  return {
    lines,
    info: (msg) => lines.push(`info ${msg}`),
    warn: (msg) => lines.push(`warn ${msg}`),
    error: (msg) => lines.push(`error ${msg}`),
  };
}

/** 1x1 PNG header bytes; enough for signature sniffing. */
export const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0, 0, 0, 0x0d]);

/** WebSocket client that records every server message. */
export class TestClient {
  readonly received: WsServerMessage[] = [];
  private readonly ws: WebSocket;

  private constructor(ws: WebSocket) {
    this.ws = ws;
    ws.on("message", (data) => {
      this.received.push(JSON.parse(data.toString()) as WsServerMessage);
    });
  }

  static async connect(port: number, headers: Record<string, string> = {}): Promise<TestClient> {
    const ws = new WebSocket(`ws://127.0.0.1:${port}/ws`, { headers });
    const client = new TestClient(ws);
    await new Promise<void>((resolve, reject) => {
      ws.once("open", () => resolve());
      ws.once("error", reject);
    });
    await client.next("hello");
    return client;
  }

  send(msg: WsClientInput | string): void {
    this.ws.send(typeof msg === "string" ? msg : JSON.stringify(msg));
  }

  /** Waits for the first message of `type` received after `from` (an index into `received`). */
  async next<T extends WsServerMessage["type"]>(
    type: T,
    from = 0,
    timeoutMs = 2000,
  ): Promise<Extract<WsServerMessage, { type: T }>> {
    const deadline = Date.now() + timeoutMs;
    for (;;) {
      const found = this.received.slice(from).find((m): m is Extract<WsServerMessage, { type: T }> => m.type === type);
      if (found) return found;
      if (Date.now() > deadline) throw new Error(`timed out waiting for ${type}`);
      await new Promise((r) => setTimeout(r, 5));
    }
  }

  /** Sends a command and waits for the reply of `type` that follows it. */
  async request<T extends WsServerMessage["type"]>(
    msg: WsClientInput | string,
    type: T,
  ): Promise<Extract<WsServerMessage, { type: T }>> {
    const from = this.received.length;
    this.send(msg);
    return this.next(type, from);
  }

  ofType<T extends WsServerMessage["type"]>(type: T): Array<Extract<WsServerMessage, { type: T }>> {
    return this.received.filter((m): m is Extract<WsServerMessage, { type: T }> => m.type === type);
  }

  async close(): Promise<void> {
    if (this.ws.readyState === WebSocket.CLOSED) return;
    await new Promise<void>((resolve) => {
      this.ws.once("close", () => resolve());
      this.ws.close();
    });
  }
}
