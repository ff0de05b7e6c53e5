// Runtime configuration, read from WEBCHAT_* environment variables

import * as os from "node:os";
import * as path from "node:path";
import { z } from "zod";
import type { AttachmentCategory, AttachmentLimits } from "./attachment-encoder.js";
import { ATTACHMENT_CATEGORIES } from "./attachment-encoder.js";
import { formatIssues } from "./protocol.js";
import { DEFAULT_CANCEL_CHECK_INTERVAL, DEFAULT_CHANNEL_CAPACITY, DEFAULT_TITLE } from "./types.js";

const MiB = 1024 * 1024;

export type AppConfig = {
  host: string;
  port: number;
  /** Unset leaves the server open. */
  authToken?: string;
  /** Loopback peers skip the token check. */
  trustLoopback: boolean;
  backend: { baseURL: string; apiKey: string; model: string };
  attachments: AttachmentLimits;
  channelCapacity: number;
  cancelCheckInterval: number;
  maxPayloadBytes: number;
  defaultTitle: string;
  push: { enabled: boolean; storeDir: string; subject: string };
};

// Empty strings count as unset so `FOO= cmd` falls back to the default.
const optional = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((v) => (v === "" ? undefined : v), schema);

const flag = (fallback: boolean) =>
  optional(z.enum(["true", "false", "1", "0"]).optional()).transform((v) =>
    v === undefined ? fallback : v === "true" || v === "1",
  );

const positiveInt = (fallback: number) => optional(z.coerce.number().int().positive().default(fallback));

const categoryList = optional(z.string().default(ATTACHMENT_CATEGORIES.join(","))).transform(
  (value, ctx): AttachmentCategory[] => {
    const accepted: AttachmentCategory[] = [];
    for (const item of value.split(",").map((s) => s.trim().toLowerCase())) {
      if (!item) continue;
      const parsed = z.enum(ATTACHMENT_CATEGORIES).safeParse(item);
      if (!parsed.success) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown attachment category '${item}'` });
        return z.NEVER;
      }
      if (!accepted.includes(parsed.data)) accepted.push(parsed.data);
    }
    return accepted;
  },
);

const EnvSchema = z.object({
  WEBCHAT_HOST: optional(z.string().default("127.0.0.1")),
  WEBCHAT_PORT: optional(z.coerce.number().int().min(0).max(65535).default(19999)),
  WEBCHAT_AUTH_TOKEN: optional(z.string().optional()),
  WEBCHAT_TRUST_LOOPBACK: flag(true),
  WEBCHAT_BACKEND_URL: optional(z.string().url().default("http://127.0.0.1:1234/v1")),
  WEBCHAT_BACKEND_API_KEY: optional(z.string().default("not-needed")),
  WEBCHAT_MODEL: optional(z.string().default("default")),
  WEBCHAT_MAX_IMAGE_BYTES: positiveInt(10 * MiB),
  WEBCHAT_MAX_AUDIO_BYTES: positiveInt(50 * MiB),
  WEBCHAT_MAX_TEXT_BYTES: positiveInt(10 * MiB),
  WEBCHAT_ACCEPTED_ATTACHMENTS: categoryList,
  WEBCHAT_CHANNEL_CAPACITY: positiveInt(DEFAULT_CHANNEL_CAPACITY),
  WEBCHAT_CANCEL_CHECK_INTERVAL: positiveInt(DEFAULT_CANCEL_CHECK_INTERVAL),
  WEBCHAT_MAX_PAYLOAD_BYTES: positiveInt(100 * MiB),
  WEBCHAT_PUSH_ENABLED: flag(false),
  WEBCHAT_PUSH_SUBJECT: optional(z.string().default("mailto:webchat@localhost")),
  WEBCHAT_DATA_DIR: optional(z.string().optional()),
  WEBCHAT_DEFAULT_TITLE: optional(z.string().trim().min(1).default(DEFAULT_TITLE)),
});

/** Room left in a frame for the JSON envelope around an attachment. */
export const FRAME_OVERHEAD_BYTES = 4 * 1024;

/** Size of the frame that carries one attachment of `rawBytes`, base64-encoded. */
export function attachmentFrameBytes(rawBytes: number): number {
  return Math.ceil(rawBytes / 3) * 4 + FRAME_OVERHEAD_BYTES;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function resolveConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`invalid configuration: ${formatIssues(parsed.error)}`);
  }
  const e = parsed.data;
  const maxBytes = {
    image: e.WEBCHAT_MAX_IMAGE_BYTES,
    audio: e.WEBCHAT_MAX_AUDIO_BYTES,
    text: e.WEBCHAT_MAX_TEXT_BYTES,
  };
  for (const category of e.WEBCHAT_ACCEPTED_ATTACHMENTS) {
    const frame = attachmentFrameBytes(maxBytes[category]);
    if (frame > e.WEBCHAT_MAX_PAYLOAD_BYTES) {
      throw new ConfigError(
        `invalid configuration: WEBCHAT_MAX_${category.toUpperCase()}_BYTES needs frames of ${frame} bytes, ` +
          `above WEBCHAT_MAX_PAYLOAD_BYTES (${e.WEBCHAT_MAX_PAYLOAD_BYTES})`,
      );
    }
  }
  const dataDir = e.WEBCHAT_DATA_DIR ?? path.join(os.homedir(), ".webchat-bridge");

  return {
    host: e.WEBCHAT_HOST,
    port: e.WEBCHAT_PORT,
    ...(e.WEBCHAT_AUTH_TOKEN !== undefined && { authToken: e.WEBCHAT_AUTH_TOKEN }),
    trustLoopback: e.WEBCHAT_TRUST_LOOPBACK,
    backend: {
      baseURL: e.WEBCHAT_BACKEND_URL,
      apiKey: e.WEBCHAT_BACKEND_API_KEY,
      model: e.WEBCHAT_MODEL,
    },
    attachments: {
      accepted: e.WEBCHAT_ACCEPTED_ATTACHMENTS,
      maxBytes,
    },
    channelCapacity: e.WEBCHAT_CHANNEL_CAPACITY,
    cancelCheckInterval: e.WEBCHAT_CANCEL_CHECK_INTERVAL,
    maxPayloadBytes: e.WEBCHAT_MAX_PAYLOAD_BYTES,
    defaultTitle: e.WEBCHAT_DEFAULT_TITLE,
    push: {
      enabled: e.WEBCHAT_PUSH_ENABLED,
      storeDir: path.join(dataDir, "push"),
      subject: e.WEBCHAT_PUSH_SUBJECT,
    },
  };
}
