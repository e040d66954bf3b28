/**
 * Takes one MAX message and fans it out to every active Telegram chat.
 */

import type { Logger } from "pino";
import type { MediaKind } from "./attachments.js";
import type { MediaFetcher } from "./fetcher.js";
import { formatCaption, formatForwardedText, formatSenderName } from "./format.js";
import { logger as rootLogger } from "./logger.js";
import type { DestinationRegistry } from "./registry.js";
import type { AttachmentResolver, ResolvedMedia } from "./resolver.js";
import type { InboundMessage, MaxSourceClient } from "./source.js";
import type { DestinationPayload, DestinationSender } from "./telegram.js";

export interface DownloadedMedia {
  kind: MediaKind;
  data: Buffer;
  filename: string;
}

export interface ForwardingDispatcherOptions {
  source: MaxSourceClient;
  resolver: AttachmentResolver;
  fetcher: Pick<MediaFetcher, "fetch">;
  registry: DestinationRegistry;
  destination: DestinationSender;
  /** Forward every attachment instead of only the first one. */
  forwardAllAttachments?: boolean;
  logger?: Logger;
}

export interface FanOutResult {
  delivered: string[];
  failed: string[];
}

export class ForwardingDispatcher {
  private readonly source: MaxSourceClient;
  private readonly resolver: AttachmentResolver;
  private readonly fetcher: Pick<MediaFetcher, "fetch">;
  private readonly registry: DestinationRegistry;
  private readonly destination: DestinationSender;
  private readonly forwardAllAttachments: boolean;
  private readonly log: Logger;

  constructor(opts: ForwardingDispatcherOptions) {
    this.source = opts.source;
    this.resolver = opts.resolver;
    this.fetcher = opts.fetcher;
    this.registry = opts.registry;
    this.destination = opts.destination;
    this.forwardAllAttachments = opts.forwardAllAttachments ?? false;
    this.log = (opts.logger ?? rootLogger).child({ component: "dispatcher" });
  }

  /**
   * Once `signal` aborts, in-flight downloads are cancelled and nothing more
   * is sent for this message.
   */
  async handle(message: InboundMessage, signal?: AbortSignal): Promise<void> {
    if (message.removed) {
      this.log.debug({ messageId: message.id }, "Skipping removed MAX message");
      return;
    }

    const text = message.text?.trim() ? message.text : null;
    if (!text && message.attachments.length === 0) {
      this.log.debug({ messageId: message.id }, "Skipping MAX message without text or attachments");
      return;
    }

    const senderName = await this.resolveSenderName(message.senderId);
    this.log.info(
      {
        messageId: message.id,
        sender: senderName,
        preview: text?.slice(0, 50),
        attachments: message.attachments.length,
      },
      "New MAX message",
    );

    const refs = this.forwardAllAttachments ? message.attachments : message.attachments.slice(0, 1);
    let captionSent = false;

    for (const ref of refs) {
      const outcome = await this.resolver.resolve(message.chatId, message.id, ref);
      if (outcome.status === "skipped") continue;

      const media = await this.download(message.id, outcome.media, signal);
      if (signal?.aborted) {
        this.log.info({ messageId: message.id }, "Stopping before fan-out, shutdown in progress");
        return;
      }
      if (!media) continue;

      await this.fanOut({
        kind: media.kind,
        data: media.data,
        filename: media.filename,
        caption: captionSent ? undefined : formatCaption(senderName, text),
      });
      captionSent = true;
    }

    // Nothing carried the text (no media, or every media item was dropped)
    if (!captionSent && text && !signal?.aborted) {
      await this.fanOut({ kind: "text", text: formatForwardedText(senderName, text) });
    }
  }

  /**
   * Send `payload` to a snapshot of the registry. One destination failing
   * never blocks the others.
   */
  async fanOut(payload: DestinationPayload): Promise<FanOutResult> {
    const result: FanOutResult = { delivered: [], failed: [] };
    const targets = this.registry.snapshot();
    if (targets.size === 0) {
      this.log.debug("No active Telegram chats to forward to");
      return result;
    }

    for (const chatId of targets) {
      const ok = await this.sendTo(chatId, payload);
      (ok ? result.delivered : result.failed).push(chatId);
    }
    return result;
  }

  private async sendTo(chatId: string, payload: DestinationPayload, retryOnMigrate = true): Promise<boolean> {
    try {
      await this.destination.send(chatId, payload);
      this.log.debug({ chatId, kind: payload.kind }, "Forwarded to Telegram");
      return true;
    } catch (err) {
      const failure = this.destination.classifyFailure(err);
      switch (failure.kind) {
        case "gone":
          this.log.warn({ chatId, reason: failure.reason }, "Telegram chat is gone, deactivating");
          await this.registry.remove(chatId);
          return false;

        case "migrated":
          this.log.info({ chatId, newChatId: failure.newChatId }, "Telegram chat migrated to supergroup");
          await this.registry.remove(chatId);
          await this.registry.add(failure.newChatId);
          return retryOnMigrate ? this.sendTo(failure.newChatId, payload, false) : false;

        case "failed":
          this.log.error({ err, chatId, kind: payload.kind }, "Failed to forward to Telegram");
          return false;
      }
    }
  }

  private async download(
    messageId: string,
    media: ResolvedMedia,
    signal?: AbortSignal,
  ): Promise<DownloadedMedia | null> {
    try {
      const data = await this.fetcher.fetch(media.url, media.filename, signal);
      return { kind: media.kind, data, filename: media.filename };
    } catch (err) {
      if (signal?.aborted) return null;
      this.log.warn({ err, messageId, filename: media.filename }, "Dropping media that could not be downloaded");
      return null;
    }
  }

  private async resolveSenderName(senderId: number | null): Promise<string> {
    if (senderId == null) return "Unknown";
    try {
      const user = await this.source.getUser(senderId);
      if (!user) {
        this.log.warn({ senderId }, "MAX user lookup returned nothing");
        return `ID_${senderId}`;
      }
      return formatSenderName(user);
    } catch (err) {
      this.log.error({ err, senderId }, "MAX user lookup failed");
      return `ID_${senderId}`;
    }
  }
}
