// Lv.1 Wire protocol: inbound command schemas and outbound encoding

import { z } from "zod";
import type { ContentBlock, Message, WireContentBlock, WireMessage } from "./types.js";
import { ValidationError } from "./errors.js";

const DATA_URL_PREFIX = /^data:[^;,]*(;[^;,]*)*;base64,/;
const BASE64_BODY = /^[A-Za-z0-9+/]*={0,2}$/;

export const SessionIdSchema = z.string().min(1).max(128);

/** Inline attachment payload; a data URL prefix is accepted and dropped. */
export const Base64Schema = z
  .string()
  .transform((value) => value.replace(DATA_URL_PREFIX, ""))
  .pipe(
    z
      .string()
      .regex(BASE64_BODY, "invalid base64")
      .refine((value) => value.length % 4 === 0, "invalid base64 length"),
  );

const MimeTypeSchema = z.string().min(1).max(128);

export const ContentInputSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("text"), text: z.string() }),
  z.object({ type: z.literal("image"), data: Base64Schema, mimeType: MimeTypeSchema }),
  z.object({ type: z.literal("audio"), data: Base64Schema, mimeType: MimeTypeSchema }),
  z.object({
    type: z.literal("file"),
    name: z.string().min(1).max(255),
    data: Base64Schema,
    mimeType: MimeTypeSchema.optional(),
  }),
]);

export const SearchOptionsSchema = z
  .object({
    enabled: z.boolean().default(false),
    contextSize: z.enum(["low", "medium", "high"]).default("medium"),
  })
  .default({});

export const GenerationParamsSchema = z
  .object({
    temperature: z.number().min(0).max(2).optional(),
    topP: z.number().gt(0).max(1).optional(),
    maxTokens: z.number().int().positive().optional(),
    frequencyPenalty: z.number().min(-2).max(2).optional(),
    presencePenalty: z.number().min(-2).max(2).optional(),
    stop: z.array(z.string().min(1)).max(4).optional(),
    seed: z.number().int().optional(),
    search: SearchOptionsSchema,
  })
  .default({});

export const ClientMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("new_chat") }),
  z.object({
    type: z.literal("user_message"),
    sessionId: SessionIdSchema,
    content: z.array(ContentInputSchema).min(1).max(32),
    params: GenerationParamsSchema,
  }),
  z.object({ type: z.literal("stop"), sessionId: SessionIdSchema }),
  z.object({ type: z.literal("rename"), sessionId: SessionIdSchema, title: z.string() }),
  z.object({ type: z.literal("delete"), sessionId: SessionIdSchema }),
  z.object({ type: z.literal("clear"), sessionId: SessionIdSchema }),
  z.object({ type: z.literal("list_chats") }),
  z.object({ type: z.literal("load_chat"), sessionId: SessionIdSchema }),
  z.object({ type: z.literal("select_model"), modelId: z.string().min(1).max(256) }),
  z.object({ type: z.literal("ping") }),
]);

export type WsClientMessage = z.infer<typeof ClientMessageSchema>;
/** What a client may put on the wire, before defaults are applied. */
export type WsClientInput = z.input<typeof ClientMessageSchema>;
export type ContentInput = z.infer<typeof ContentInputSchema>;

export function parseClientMessage(raw: string): WsClientMessage {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ValidationError("malformed JSON");
  }

  const parsed = ClientMessageSchema.safeParse(json);
  if (!parsed.success) {
    throw new ValidationError(formatIssues(parsed.error), "malformed_command", {
      sessionId: sessionIdOf(json),
    });
  }
  return parsed.data;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

function sessionIdOf(json: unknown): string | undefined {
  if (typeof json !== "object" || json === null || !("sessionId" in json)) return undefined;
  return typeof json.sessionId === "string" ? json.sessionId : undefined;
}

/** Decoded size of a validated base64 body, computed without decoding it. */
export function base64DecodedLength(data: string): number {
  if (data.length === 0) return 0;
  const padding = data.endsWith("==") ? 2 : data.endsWith("=") ? 1 : 0;
  return (data.length / 4) * 3 - padding;
}

export function toWireBlock(block: ContentBlock): WireContentBlock {
  switch (block.type) {
    case "text":
      return { type: "text", text: block.text };
    case "image":
      return { type: "image", data: block.data.toString("base64"), mimeType: block.mimeType };
    case "audio":
      return { type: "audio", data: block.data.toString("base64"), mimeType: block.mimeType };
    case "file_text":
      return { type: "file_text", name: block.name, text: block.text };
  }
}

export function toWireMessage(message: Message): WireMessage {
  return { ...message, content: message.content.map(toWireBlock) };
}
