import { describe, it, expect, vi } from "vitest";
import type { Transport } from "./connection-handler.js";
import type { WsClientInput } from "./protocol.js";
import type { WsServerMessage } from "./types.js";
import { FakeBackend, ManualStream, PNG_BYTES, recordingLog, testConfig } from "../__tests__/helpers.js";
import { ConnectionHandler } from "./connection-handler.js";
import { createAppContext } from "./context.js";

class FakeTransport implements Transport {
  open = true;
  buffered = 0;
  readonly frames: string[] = [];

  send(data: string): void {
    this.frames.push(data);
  }
  isOpen(): boolean {
    return this.open;
  }
  bufferedAmount(): number {
    return this.buffered;
  }
  get messages(): WsServerMessage[] {
    return this.frames.map((f) => JSON.parse(f) as WsServerMessage);
  }
  last(): WsServerMessage | undefined {
    return this.messages[this.messages.length - 1];
  }
}

function setup(backend = new FakeBackend(), config = testConfig()) {
  const ctx = createAppContext(config, { backend, log: recordingLog() });
  const connect = () => {
    const transport = new FakeTransport();
    const handler = new ConnectionHandler(transport, ctx, { drainPollMs: 1 });
    const send = (msg: WsClientInput) => handler.receive(JSON.stringify(msg));
    return { transport, handler, send };
  };
  return { ctx, backend, connect };
}

async function newChat(send: (msg: WsClientInput) => Promise<void>, transport: FakeTransport): Promise<string> {
  await send({ type: "new_chat" });
  const created = transport.last();
  if (created?.type !== "chat_created") throw new Error("expected chat_created");
  return created.sessionId;
}

describe("connection-handler.ts — 연결별 상태 기계", () => {
  it("open하면 hello 전송", () => {
    const { connect } = setup();
    const { transport, handler } = connect();
    handler.open();
    expect(transport.messages).toEqual([{ type: "hello", connectionId: handler.connectionId }]);
  });

  it("new_chat은 새 id와 기본 제목, list_chats에 생성 순서대로 포함", async () => {
    const { connect } = setup();
    const { transport, handler, send } = connect();
    const a = await newChat(send, transport);
    const b = await newChat(send, transport);

    expect(handler.viewedSession).toBe(b);
    await send({ type: "list_chats" });
    expect(transport.last()).toEqual({
      type: "chat_list",
      sessions: [
        { id: a, title: "New Chat" },
        { id: b, title: "New Chat" },
      ],
    });
  });

  it("ping에는 pong", async () => {
    const { connect } = setup();
    const { transport, send } = connect();
    await send({ type: "ping" });
    expect(transport.messages).toEqual([{ type: "pong" }]);
  });

  it("잘못된 프레임은 ValidationError 응답 후 계속 동작", async () => {
    const { connect } = setup();
    const { transport, handler, send } = connect();
    await handler.receive("not json");
    expect(transport.last()).toEqual({ type: "error", message: "malformed JSON", kind: "ValidationError" });
    await send({ type: "ping" });
    expect(transport.last()).toEqual({ type: "pong" });
  });

  describe("user_message", () => {
    it("Idle → Streaming → Idle, 응답은 delta와 done으로 도착", async () => {
      const stream = new ManualStream();
      const { ctx, connect } = setup(new FakeBackend(stream.script));
      const { transport, handler, send } = connect();
      const sessionId = await newChat(send, transport);

      await send({ type: "user_message", sessionId, content: [{ type: "text", text: "Hello" }] });
      expect(handler.currentState).toEqual({ kind: "streaming", sessionId });

      stream.push("Hel", "lo", "!");
      stream.end();
      await vi.waitFor(() => expect(handler.currentState).toEqual({ kind: "idle" }));
      const types = transport.messages.map((m) => m.type);
      expect(types).toEqual(["chat_created", "message", "delta", "delta", "delta", "done", "message"]);
      expect(ctx.registry.history(sessionId)).toHaveLength(2);
    });

    it("Streaming 중 두 번째 user_message는 GenerationBusy", async () => {
      const stream = new ManualStream();
      const { ctx, connect } = setup(new FakeBackend(stream.script));
      const { transport, send } = connect();
      const s1 = await newChat(send, transport);
      const s2 = ctx.registry.create();

      await send({ type: "user_message", sessionId: s1, content: [{ type: "text", text: "a" }] });
      await send({ type: "user_message", sessionId: s2, content: [{ type: "text", text: "b" }] });

      expect(transport.last()).toEqual({
        type: "error",
        sessionId: s2,
        message: "this connection is already waiting on a reply",
        kind: "GenerationBusy",
      });
      expect(ctx.registry.history(s2)).toEqual([]);
      stream.end();
    });

    it("없는 세션은 SessionNotFound", async () => {
      const { connect } = setup();
      const { transport, send } = connect();
      await send({ type: "user_message", sessionId: "ghost", content: [{ type: "text", text: "a" }] });
      expect(transport.last()).toEqual({
        type: "error",
        sessionId: "ghost",
        message: "session not found: ghost",
        kind: "SessionNotFound",
      });
    });

    it("제한을 넘는 이미지는 delta 없이 ValidationError, 히스토리 그대로", async () => {
      const config = testConfig();
      const { ctx, connect } = setup(new FakeBackend(), {
        ...config,
        attachments: { ...config.attachments, maxBytes: { ...config.attachments.maxBytes, image: 10 } },
      });
      const { transport, handler, send } = connect();
      const sessionId = await newChat(send, transport);

      await send({
        type: "user_message",
        sessionId,
        content: [
          { type: "text", text: "what is this" },
          { type: "image", data: PNG_BYTES.toString("base64"), mimeType: "image/png" },
        ],
      });

      expect(transport.last()).toEqual({
        type: "error",
        sessionId,
        message: "size exceeded: image attachment is 12 bytes, limit is 10",
        kind: "ValidationError",
      });
      expect(handler.currentState).toEqual({ kind: "idle" });
      expect(transport.messages.some((m) => m.type === "delta")).toBe(false);
      expect(ctx.registry.history(sessionId)).toEqual([]);
    });

    it("첨부마다 제한 이내여도 프레임 전체가 크면 ValidationError, 연결은 계속 사용", async () => {
      const ctx = createAppContext(testConfig(), { backend: new FakeBackend(), log: recordingLog() });
      const transport = new FakeTransport();
      const handler = new ConnectionHandler(transport, ctx, { drainPollMs: 1, maxMessageBytes: 1200 });
      await handler.receive(JSON.stringify({ type: "new_chat" }));
      const created = transport.last();
      if (created?.type !== "chat_created") throw new Error("expected chat_created");
      const sessionId = created.sessionId;

      // 600바이트 WAV 두 개: 각각 오디오 제한(1024) 이내, base64로는 합쳐서 1600바이트
      const wav = Buffer.alloc(600, 1).toString("base64");
      const frame = JSON.stringify({
        type: "user_message",
        sessionId,
        content: [
          { type: "audio", data: wav, mimeType: "audio/wav" },
          { type: "audio", data: wav, mimeType: "audio/wav" },
        ],
      });
      await handler.receive(frame);

      expect(transport.last()).toEqual({
        type: "error",
        message: `size exceeded: message is ${Buffer.byteLength(frame)} bytes, limit is 1200`,
        kind: "ValidationError",
      });
      expect(handler.currentState).toEqual({ kind: "idle" });
      expect(ctx.registry.history(sessionId)).toEqual([]);

      await handler.receive(JSON.stringify({ type: "ping" }));
      expect(transport.last()).toEqual({ type: "pong" });
    });
  });

  describe("stop", () => {
    it("중간 stop 후 cancelled 뒤에는 delta가 없음", async () => {
      const stream = new ManualStream();
      const { ctx, connect } = setup(new FakeBackend(stream.script));
      const { transport, handler, send } = connect();
      const sessionId = await newChat(send, transport);

      await send({ type: "user_message", sessionId, content: [{ type: "text", text: "go" }] });
      stream.push("Once upon");
      await vi.waitFor(() => expect(transport.messages.some((m) => m.type === "delta")).toBe(true));
      await send({ type: "stop", sessionId });
      stream.push(" a time");

      await vi.waitFor(() => expect(handler.currentState).toEqual({ kind: "idle" }));
      const types = transport.messages.map((m) => m.type);
      const cancelledAt = types.indexOf("cancelled");
      expect(cancelledAt).toBeGreaterThan(0);
      expect(types.slice(cancelledAt).includes("delta")).toBe(false);

      const reply = ctx.registry.history(sessionId)[1];
      expect(reply.truncated).toBe(true);
      expect(reply.content).toEqual([{ type: "text", text: "Once upon" }]);
    });

    it("진행 중인 생성이 없으면 조용히 무시", async () => {
      const { connect } = setup();
      const { transport, send } = connect();
      const sessionId = await newChat(send, transport);
      const before = transport.frames.length;
      await send({ type: "stop", sessionId });
      expect(transport.frames.length).toBe(before);
    });

    it("없는 세션 stop은 SessionNotFound", async () => {
      const { connect } = setup();
      const { transport, send } = connect();
      await send({ type: "stop", sessionId: "ghost" });
      expect(transport.last()).toEqual({
        type: "error",
        sessionId: "ghost",
        message: "session not found: ghost",
        kind: "SessionNotFound",
      });
    });
  });

  describe("세션 관리", () => {
    it("rename은 자신과 다른 시청자에게 알림", async () => {
      const { connect } = setup();
      const me = connect();
      const other = connect();
      const sessionId = await newChat(me.send, me.transport);
      await other.send({ type: "load_chat", sessionId });

      await me.send({ type: "rename", sessionId, title: "Trip planning" });

      const renamed = { type: "chat_renamed", sessionId, title: "Trip planning" };
      expect(me.transport.last()).toEqual(renamed);
      expect(other.transport.last()).toEqual(renamed);
    });

    it("생성 중 clear는 GenerationBusy, 끝나면 clear 가능", async () => {
      const stream = new ManualStream();
      const { ctx, connect } = setup(new FakeBackend(stream.script));
      const { transport, handler, send } = connect();
      const sessionId = await newChat(send, transport);
      await send({ type: "user_message", sessionId, content: [{ type: "text", text: "go" }] });

      await send({ type: "clear", sessionId });
      expect(transport.last()).toEqual({
        type: "error",
        sessionId,
        message: "cannot clear a chat while a reply is streaming",
        kind: "GenerationBusy",
      });

      stream.end();
      await vi.waitFor(() => expect(handler.currentState).toEqual({ kind: "idle" }));
      await send({ type: "clear", sessionId });
      expect(transport.last()).toEqual({ type: "chat_cleared", sessionId });
      expect(ctx.registry.history(sessionId)).toEqual([]);
    });

    it("delete는 시청자 모두에게 chat_deleted", async () => {
      const { ctx, connect } = setup();
      const me = connect();
      const other = connect();
      const sessionId = await newChat(me.send, me.transport);
      await other.send({ type: "load_chat", sessionId });

      await me.send({ type: "delete", sessionId });

      expect(me.transport.last()).toEqual({ type: "chat_deleted", sessionId });
      expect(other.transport.last()).toEqual({ type: "chat_deleted", sessionId });
      expect(me.handler.viewedSession).toBeNull();
      expect(ctx.registry.has(sessionId)).toBe(false);
      expect(ctx.hub.viewerCount(sessionId)).toBe(0);
    });

    it("load_chat은 히스토리를 돌려줌", async () => {
      const { ctx, connect } = setup();
      const { transport, send } = connect();
      const sessionId = ctx.registry.create();
      await ctx.registry.rename(sessionId, "Notes");

      await send({ type: "load_chat", sessionId });
      expect(transport.last()).toEqual({ type: "chat_loaded", sessionId, title: "Notes", messages: [] });
    });

    it("스트리밍 중 load_chat은 지금까지의 텍스트를 함께 줌", async () => {
      const stream = new ManualStream();
      const { connect } = setup(new FakeBackend(stream.script));
      const writer = connect();
      const sessionId = await newChat(writer.send, writer.transport);
      await writer.send({ type: "user_message", sessionId, content: [{ type: "text", text: "go" }] });
      stream.push("par");
      await vi.waitFor(() => expect(writer.transport.messages.some((m) => m.type === "delta")).toBe(true));

      const reader = connect();
      await reader.send({ type: "load_chat", sessionId });
      const loaded = reader.transport.last();
      expect(loaded?.type === "chat_loaded" && loaded.streaming).toBe("par");

      stream.push("tial");
      stream.end();
      await vi.waitFor(() => expect(reader.transport.messages.some((m) => m.type === "done")).toBe(true));
      const deltas = reader.transport.messages.flatMap((m) => (m.type === "delta" ? [m.text] : []));
      expect(deltas).toEqual(["tial"]);
    });
  });

  describe("select_model", () => {
    it("알려진 모델이면 model_selected", async () => {
      const { backend, connect } = setup();
      const { transport, send } = connect();
      await send({ type: "select_model", modelId: "qwen-vl" });
      expect(transport.last()).toEqual({ type: "model_selected", modelId: "qwen-vl" });
      expect(backend.selectedModel()).toBe("qwen-vl");
    });

    it("모르는 모델은 ModelError", async () => {
      const { connect } = setup();
      const { transport, send } = connect();
      await send({ type: "select_model", modelId: "nope" });
      expect(transport.last()).toEqual({ type: "error", message: "unknown model: nope", kind: "ModelError" });
    });

    it("예상하지 못한 예외는 InternalError", async () => {
      const { backend, connect } = setup();
      vi.spyOn(backend, "selectModel").mockRejectedValue(new Error("disk on fire"));
      const { transport, send } = connect();
      await send({ type: "select_model", modelId: "qwen-vl" });
      expect(transport.last()).toEqual({ type: "error", message: "disk on fire", kind: "InternalError" });
    });
  });

  describe("연결 종료", () => {
    it("연결이 끊겨도 생성은 계속되고 응답은 저장됨", async () => {
      const stream = new ManualStream();
      const { ctx, connect } = setup(new FakeBackend(stream.script));
      const { transport, handler, send } = connect();
      const sessionId = await newChat(send, transport);
      await send({ type: "user_message", sessionId, content: [{ type: "text", text: "go" }] });

      transport.open = false;
      handler.close();
      expect(ctx.hub.viewerCount(sessionId)).toBe(0);

      stream.push("still here");
      stream.end();
      await vi.waitFor(() => expect(ctx.registry.history(sessionId)).toHaveLength(2));
      expect(ctx.registry.history(sessionId)[1].content).toEqual([{ type: "text", text: "still here" }]);
    });

    it("waitForDrain은 버퍼가 비워질 때까지 기다림", async () => {
      const { connect } = setup();
      const { transport, handler } = connect();
      transport.buffered = 2 * 1024 * 1024;

      let drained = false;
      const waiting = handler.waitForDrain().then(() => {
        drained = true;
      });
      await new Promise((r) => setTimeout(r, 10));
      expect(drained).toBe(false);

      transport.buffered = 0;
      await waiting;
      expect(drained).toBe(true);
    });
  });
});
