/**
 * Turns an {@link AttachmentRef} into a downloadable URL and filename, or a skip.
 */

import type { Logger } from "pino";
import { mediaFilename, type AttachmentRef, type MediaKind } from "./attachments.js";
import { logger as rootLogger } from "./logger.js";
import type { MaxSourceClient } from "./source.js";

export interface ResolvedMedia {
  kind: MediaKind;
  url: string;
  filename: string;
}

export type ResolveOutcome =
  | { status: "resolved"; media: ResolvedMedia }
  | { status: "skipped"; reason: string };

const skip = (reason: string): ResolveOutcome => ({ status: "skipped", reason });

const resolved = (kind: MediaKind, url: string, filename: string): ResolveOutcome => ({
  status: "resolved",
  media: { kind, url, filename },
});

export class AttachmentResolver {
  private readonly log: Logger;

  constructor(
    private readonly source: MaxSourceClient,
    logger?: Logger,
  ) {
    this.log = (logger ?? rootLogger).child({ component: "resolver" });
  }

  /**
   * Never rejects: a failure on one attachment becomes a skip so the rest of
   * the message still goes out.
   */
  async resolve(chatId: number, messageId: string, attachment: AttachmentRef): Promise<ResolveOutcome> {
    try {
      const outcome = await this.resolveRef(chatId, messageId, attachment);
      if (outcome.status === "skipped") {
        this.log.debug({ messageId, type: attachment.type, reason: outcome.reason }, "Attachment skipped");
      }
      return outcome;
    } catch (err) {
      this.log.error({ err, messageId, type: attachment.type }, "Attachment resolution failed");
      return skip("resolution failed");
    }
  }

  private async resolveRef(
    chatId: number,
    messageId: string,
    attachment: AttachmentRef,
  ): Promise<ResolveOutcome> {
    switch (attachment.type) {
      case "photo":
        return attachment.url
          ? resolved("photo", attachment.url, mediaFilename("photo", messageId))
          : skip("photo without url");

      case "audio":
        return attachment.url
          ? resolved("audio", attachment.url, mediaFilename("audio", messageId))
          : skip("audio without url");

      case "video": {
        const url = await this.source.getVideoUrl(chatId, messageId, attachment.videoId);
        if (!url) {
          this.log.warn({ messageId, videoId: attachment.videoId }, "Video lookup returned no url");
          return skip("video without url");
        }
        return resolved("video", url, mediaFilename("video", messageId));
      }

      case "file": {
        const info = await this.source.getFileInfo(chatId, messageId, attachment.fileId);
        if (info.unsafe) {
          this.log.warn({ messageId, fileId: attachment.fileId }, "File flagged unsafe by MAX");
          return skip("file flagged unsafe");
        }
        if (!info.url) {
          this.log.warn({ messageId, fileId: attachment.fileId }, "File lookup returned no url");
          return skip("file without url");
        }
        return resolved("file", info.url, mediaFilename("file", messageId, attachment.name));
      }

      case "sticker":
        return skip("sticker");

      case "control":
        return skip(`control (${attachment.rawType})`);

      case "unknown":
        return skip(`unsupported type ${attachment.rawType}`);

      default: {
        const unreachable: never = attachment;
        return unreachable;
      }
    }
  }
}
