/**
 * MAX attachment model.
 *
 * Raw Bot API attachments are loosely typed (`{ type, payload, ... }`); they
 * are parsed once into a closed union so the resolver can match exhaustively.
 */

import { z } from "zod";
import type { MaxAttachment } from "./api.js";

export type AttachmentRef =
  | { type: "photo"; url: string | null }
  | { type: "video"; videoId: string }
  | { type: "audio"; url: string | null }
  | { type: "file"; fileId: string; name: string | null; size: number | null }
  | { type: "sticker"; code: string | null }
  | { type: "control"; rawType: string }
  | { type: "unknown"; rawType: string };

export type MediaKind = "photo" | "video" | "audio" | "file";

// ── Payload schemas ──

const UrlPayload = z.object({ url: z.string().url().nullish() }).passthrough();

const TokenPayload = z.object({ token: z.string().min(1) }).passthrough();

const FileAttachment = z
  .object({
    payload: TokenPayload,
    filename: z.string().nullish(),
    size: z.number().nullish(),
  })
  .passthrough();

const StickerPayload = z.object({ code: z.string().nullish() }).passthrough();

/** Non-media markers: keyboards and service attachments. */
const CONTROL_TYPES = new Set(["inline_keyboard", "reply_keyboard", "control"]);

function unknownRef(rawType: string): AttachmentRef {
  return { type: "unknown", rawType };
}

export function parseAttachment(raw: MaxAttachment): AttachmentRef {
  const rawType = typeof raw.type === "string" ? raw.type : "unknown";

  switch (rawType) {
    case "image": {
      const payload = UrlPayload.safeParse(raw.payload ?? {});
      return payload.success ? { type: "photo", url: payload.data.url ?? null } : unknownRef(rawType);
    }
    case "audio": {
      const payload = UrlPayload.safeParse(raw.payload ?? {});
      return payload.success ? { type: "audio", url: payload.data.url ?? null } : unknownRef(rawType);
    }
    case "video": {
      const payload = TokenPayload.safeParse(raw.payload);
      return payload.success ? { type: "video", videoId: payload.data.token } : unknownRef(rawType);
    }
    case "file": {
      const file = FileAttachment.safeParse(raw);
      if (!file.success) return unknownRef(rawType);
      return {
        type: "file",
        fileId: file.data.payload.token,
        name: file.data.filename?.trim() || null,
        size: file.data.size ?? null,
      };
    }
    case "sticker": {
      const payload = StickerPayload.safeParse(raw.payload ?? {});
      return { type: "sticker", code: payload.success ? (payload.data.code ?? null) : null };
    }
    default:
      return CONTROL_TYPES.has(rawType) ? { type: "control", rawType } : unknownRef(rawType);
  }
}

export function parseAttachments(raw: MaxAttachment[] | null | undefined): AttachmentRef[] {
  return (raw ?? []).map(parseAttachment);
}

// ── Filenames ──

const EXTENSIONS: Record<Exclude<MediaKind, "file">, string> = {
  photo: "jpg",
  video: "mp4",
  audio: "ogg",
};

/**
 * Deterministic download name: `photo_{id}.jpg`, `video_{id}.mp4`,
 * `audio_{id}.ogg`; files keep their declared name or fall back to
 * `file_{id}.bin`.
 */
export function mediaFilename(kind: MediaKind, messageId: string, declaredName?: string | null): string {
  if (kind === "file") {
    return declaredName?.trim() || `file_${messageId}.bin`;
  }
  return `${kind}_${messageId}.${EXTENSIONS[kind]}`;
}
