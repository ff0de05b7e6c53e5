// Lv.1 Attachment encoder: validates uploads and normalizes them into content blocks

import * as fs from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { ContentInput } from "./protocol.js";
import type { ContentBlock } from "./types.js";
import { ValidationError } from "./errors.js";
import { base64DecodedLength } from "./protocol.js";

export const ATTACHMENT_CATEGORIES = ["image", "audio", "text"] as const;
export type AttachmentCategory = (typeof ATTACHMENT_CATEGORIES)[number];

export type AttachmentLimits = {
  accepted: readonly AttachmentCategory[];
  maxBytes: Record<AttachmentCategory, number>;
};

export type UploadKind = "image" | "audio" | "file";

export type RawUpload = {
  kind: UploadKind;
  bytes: Buffer;
  mimeType?: string;
  name?: string;
};

type Signature = (bytes: Buffer) => boolean;

function startsWithBytes(bytes: Buffer, ...signature: number[]): boolean {
  return bytes.length >= signature.length && signature.every((b, i) => bytes[i] === b);
}

function asciiAt(bytes: Buffer, offset: number, text: string): boolean {
  return bytes.subarray(offset, offset + text.length).toString("latin1") === text;
}

const isWav: Signature = (b) => asciiAt(b, 0, "RIFF") && asciiAt(b, 8, "WAVE");
const isMp3: Signature = (b) =>
  asciiAt(b, 0, "ID3") || (b.length >= 2 && b[0] === 0xff && (b[1] & 0xe0) === 0xe0);

const IMAGE_SIGNATURES = new Map<string, Signature>([
  ["image/png", (b) => startsWithBytes(b, 0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a)],
  ["image/jpeg", (b) => startsWithBytes(b, 0xff, 0xd8, 0xff)],
  ["image/gif", (b) => asciiAt(b, 0, "GIF87a") || asciiAt(b, 0, "GIF89a")],
  ["image/webp", (b) => asciiAt(b, 0, "RIFF") && asciiAt(b, 8, "WEBP")],
  ["image/bmp", (b) => asciiAt(b, 0, "BM")],
]);

// Only formats the chat-completions audio input accepts.
const AUDIO_SIGNATURES = new Map<string, Signature>([
  ["audio/wav", isWav],
  ["audio/mpeg", isMp3],
]);

const MIME_ALIASES: Record<string, string> = {
  "image/jpg": "image/jpeg",
  "audio/x-wav": "audio/wav",
  "audio/wave": "audio/wav",
  "audio/vnd.wave": "audio/wav",
  "audio/mp3": "audio/mpeg",
};

const TEXT_MIME_TYPES = new Set([
  "application/json",
  "application/xml",
  "application/yaml",
  "application/x-yaml",
  "application/toml",
  "application/javascript",
  "application/typescript",
  "application/x-sh",
  "application/sql",
]);

const TextExtensionsSchema = z.record(z.string());

/**
 * Reads the extension table from `data/text-extensions.json`. Called once when
 * an encoder is built, never while encoding.
 */
export function loadTextExtensions(): Set<string> {
  // Sources sit one level below the package root; compiled output two.
  const candidates = ["../data/text-extensions.json", "../../data/text-extensions.json"].map(
    (rel) => fileURLToPath(new URL(rel, import.meta.url)),
  );
  const found = candidates.find((p) => fs.existsSync(p));
  if (!found) throw new Error(`text-extensions.json not found (looked in ${candidates.join(", ")})`);
  const table = TextExtensionsSchema.parse(JSON.parse(fs.readFileSync(found, "utf8")));
  return new Set(Object.keys(table));
}

export function normalizeMimeType(mimeType: string | undefined): string {
  if (!mimeType) return "";
  const base = mimeType.split(";")[0].trim().toLowerCase();
  return MIME_ALIASES[base] ?? base;
}

export function fileExtension(name: string): string {
  const base = name.split(/[\\/]/).pop() ?? name;
  return (base.split(".").pop() ?? "").toLowerCase();
}

export function isTextLike(name: string, mimeType: string, extensions: ReadonlySet<string>): boolean {
  if (mimeType.startsWith("text/") || TEXT_MIME_TYPES.has(mimeType)) return true;
  return extensions.has(fileExtension(name));
}

export function categoryOf(kind: UploadKind): AttachmentCategory {
  return kind === "file" ? "text" : kind;
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

export class AttachmentEncoder {
  constructor(
    private readonly limits: AttachmentLimits,
    private readonly textExtensions: ReadonlySet<string> = loadTextExtensions(),
  ) {}

  /** Turns protocol content into blocks; attachments are size-checked before base64 decoding. */
  encodeContent(inputs: readonly ContentInput[]): ContentBlock[] {
    return inputs.map((input): ContentBlock => {
      if (input.type === "text") return { type: "text", text: input.text };

      const name = input.type === "file" ? input.name : "";
      const mimeType = normalizeMimeType(input.mimeType);
      this.checkType(input.type, mimeType, name);
      this.checkSize(categoryOf(input.type), base64DecodedLength(input.data));
      return this.encode({
        kind: input.type,
        bytes: Buffer.from(input.data, "base64"),
        mimeType,
        name,
      });
    });
  }

  encode(upload: RawUpload): ContentBlock {
    const mimeType = normalizeMimeType(upload.mimeType);
    const name = upload.name ?? "";
    const category = categoryOf(upload.kind);
    this.checkType(upload.kind, mimeType, name);
    this.checkSize(category, upload.bytes.length);

    switch (upload.kind) {
      case "image":
        this.checkSignature(IMAGE_SIGNATURES, mimeType, upload.bytes);
        return { type: "image", data: upload.bytes, mimeType };
      case "audio":
        this.checkSignature(AUDIO_SIGNATURES, mimeType, upload.bytes);
        return { type: "audio", data: upload.bytes, mimeType };
      case "file":
        return { type: "file_text", name: name || "untitled.txt", text: decodeText(upload.bytes) };
    }
  }

  private checkType(kind: UploadKind, mimeType: string, name: string): void {
    const category = categoryOf(kind);
    if (!this.limits.accepted.includes(category)) {
      throw new ValidationError(
        `unsupported type: ${category} attachments are not accepted`,
        "unsupported_type",
      );
    }
    const supported =
      kind === "image"
        ? IMAGE_SIGNATURES.has(mimeType)
        : kind === "audio"
          ? AUDIO_SIGNATURES.has(mimeType)
          : isTextLike(name, mimeType, this.textExtensions);
    if (!supported) {
      const label = mimeType || (name ? `.${fileExtension(name)}` : "unknown");
      throw new ValidationError(
        `unsupported type: ${label} is not an accepted ${category} format`,
        "unsupported_type",
      );
    }
  }

  private checkSize(category: AttachmentCategory, size: number): void {
    const limit = this.limits.maxBytes[category];
    if (size > limit) {
      throw new ValidationError(
        `size exceeded: ${category} attachment is ${size} bytes, limit is ${limit}`,
        "size_exceeded",
      );
    }
  }

  private checkSignature(table: Map<string, Signature>, mimeType: string, bytes: Buffer): void {
    const matches = table.get(mimeType);
    if (!matches || !matches(bytes)) {
      throw new ValidationError(
        `undecodable content: data is not a valid ${mimeType} payload`,
        "undecodable_content",
      );
    }
  }
}

function decodeText(bytes: Buffer): string {
  if (bytes.includes(0)) {
    throw new ValidationError("undecodable content: file contains binary data", "undecodable_content");
  }
  try {
    return utf8.decode(bytes);
  } catch {
    throw new ValidationError("undecodable content: file is not valid UTF-8", "undecodable_content");
  }
}
