/**
 * Long-polls the MAX Bot API for one chat and answers the lookups the
 * forwarding pipeline needs: users, video URLs and file URLs.
 */

import type { Logger } from "pino";
import type {
  MaxApi,
  MaxMessage,
  MaxUpdate,
  MaxUpdatesResponse,
  MaxUser,
  MaxVideoUrls,
} from "./api.js";
import { parseAttachments, type AttachmentRef } from "./attachments.js";
import { logger as rootLogger } from "./logger.js";
import { sleep } from "./retry.js";

export interface InboundMessage {
  id: string;
  chatId: number;
  senderId: number | null;
  text: string | null;
  attachments: AttachmentRef[];
  /** Set when a removal for this message was already seen. */
  removed: boolean;
  timestamp: number;
}

export interface MessageDeletion {
  messageId: string;
  chatId: number;
}

export interface FileInfo {
  url: string | null;
  unsafe: boolean;
}

/**
 * Source-platform calls consumed by the pipeline.
 */
export interface MaxSourceClient {
  getUser(userId: number): Promise<MaxUser | null>;
  getVideoUrl(chatId: number, messageId: string, videoId: string): Promise<string | null>;
  getFileInfo(chatId: number, messageId: string, fileId: string): Promise<FileInfo>;
}

export interface MaxSourceHandlers {
  onMessage: (message: InboundMessage, signal?: AbortSignal) => Promise<void>;
  onDelete?: (deletion: MessageDeletion) => Promise<void> | void;
}

export type MaxSourceApi = Pick<
  MaxApi,
  "getMe" | "getUpdates" | "getChatMembers" | "getVideo" | "getMessage"
>;

export interface MaxBotSourceOptions {
  api: MaxSourceApi;
  chatId: number;
  logger?: Logger;
  pollTimeoutSec?: number;
  errorBackoffMs?: number;
  /** How long a looked-up user is trusted before asking MAX again. */
  userCacheTtlMs?: number;
  now?: () => number;
}

/** Progressive MP4 renditions, best first. HLS is a playlist, not a file. */
const VIDEO_QUALITY_ORDER: (keyof MaxVideoUrls)[] = [
  "mp4_1080",
  "mp4_720",
  "mp4_480",
  "mp4_360",
  "mp4_240",
  "mp4_144",
];

export function pickVideoUrl(urls: MaxVideoUrls | null | undefined): string | null {
  if (!urls) return null;
  for (const key of VIDEO_QUALITY_ORDER) {
    const url = urls[key];
    if (url) return url;
  }
  return null;
}

export function toInboundMessage(message: MaxMessage, removed = false): InboundMessage | null {
  const chatId = message.recipient?.chat_id;
  if (chatId == null || !message.body?.mid) return null;
  return {
    id: message.body.mid,
    chatId,
    senderId: message.sender?.user_id ?? null,
    text: message.body.text ?? null,
    attachments: parseAttachments(message.body.attachments),
    removed,
    timestamp: message.timestamp,
  };
}

export class MaxBotSource implements MaxSourceClient {
  private readonly api: MaxSourceApi;
  private readonly chatId: number;
  private readonly log: Logger;
  private readonly pollTimeoutSec: number;
  private readonly errorBackoffMs: number;
  private readonly userCacheTtlMs: number;
  private readonly now: () => number;
  private readonly knownUsers = new Map<number, { user: MaxUser; cachedAt: number }>();
  private botUserId: number | null = null;

  constructor(opts: MaxBotSourceOptions) {
    this.api = opts.api;
    this.chatId = opts.chatId;
    this.log = (opts.logger ?? rootLogger).child({ component: "max", chatId: opts.chatId });
    this.pollTimeoutSec = opts.pollTimeoutSec ?? 30;
    this.errorBackoffMs = opts.errorBackoffMs ?? 3000;
    this.userCacheTtlMs = opts.userCacheTtlMs ?? 10 * 60_000;
    this.now = opts.now ?? Date.now;
  }

  /** Identify the bot so its own messages are not echoed back. */
  async connect(): Promise<MaxUser> {
    const me = await this.api.getMe();
    this.botUserId = me.user_id;
    this.log.info({ botUserId: me.user_id, username: me.username }, "MAX bot connected");
    return me;
  }

  /**
   * Long-poll until `signal` aborts. Each message is fully handled before the
   * next one is looked at.
   */
  async run(handlers: MaxSourceHandlers, signal: AbortSignal): Promise<void> {
    let marker: number | null = null;

    this.log.info("MAX long-polling started");

    while (!signal.aborted) {
      try {
        const resp: MaxUpdatesResponse = await this.api.getUpdates(
          {
            timeout: this.pollTimeoutSec,
            marker,
            types: ["message_created", "message_removed"],
          },
          signal,
        );

        if (resp.marker != null) {
          marker = resp.marker;
        }

        await this.dispatchBatch(resp.updates, handlers, signal);
      } catch (err) {
        if (signal.aborted) break;
        this.log.error({ err }, "MAX polling error");
        await sleep(this.errorBackoffMs, signal);
      }
    }

    this.log.info("MAX long-polling stopped");
  }

  async dispatchBatch(
    updates: MaxUpdate[],
    handlers: MaxSourceHandlers,
    signal?: AbortSignal,
  ): Promise<void> {
    // A removal in the same batch marks the created message as already removed
    const removedInBatch = new Set(
      updates.flatMap((u) => (u.update_type === "message_removed" && u.message_id ? [u.message_id] : [])),
    );

    for (const update of updates) {
      if (signal?.aborted) break;
      try {
        await this.dispatchUpdate(update, handlers, removedInBatch, signal);
      } catch (err) {
        this.log.error({ err, updateType: update.update_type }, "Error dispatching MAX update");
      }
    }
  }

  private async dispatchUpdate(
    update: MaxUpdate,
    handlers: MaxSourceHandlers,
    removedInBatch: Set<string>,
    signal?: AbortSignal,
  ): Promise<void> {
    switch (update.update_type) {
      case "message_created": {
        const message = update.message;
        if (!message || message.recipient?.chat_id !== this.chatId) break;
        if (message.sender) {
          this.rememberUser(message.sender);
          // Skip messages from the bot itself
          if (this.botUserId != null && message.sender.user_id === this.botUserId) break;
        }
        const inbound = toInboundMessage(message, removedInBatch.has(message.body?.mid ?? ""));
        if (inbound) {
          await handlers.onMessage(inbound, signal);
        }
        break;
      }

      case "message_removed": {
        if (update.chat_id !== this.chatId || !update.message_id) break;
        this.log.info({ messageId: update.message_id }, "MAX message removal received and ignored");
        await handlers.onDelete?.({ messageId: update.message_id, chatId: this.chatId });
        break;
      }

      default:
        this.log.debug({ updateType: update.update_type }, "Unhandled MAX update type");
    }
  }

  // ── Lookups ──

  // Every message refreshes its sender, so names follow renames.
  private rememberUser(user: MaxUser): void {
    this.knownUsers.set(user.user_id, { user, cachedAt: this.now() });
  }

  async getUser(userId: number): Promise<MaxUser | null> {
    const cached = this.knownUsers.get(userId);
    if (cached && this.now() - cached.cachedAt < this.userCacheTtlMs) {
      return cached.user;
    }

    const { members } = await this.api.getChatMembers(this.chatId, [userId]);
    const member = members.find((m) => m.user_id === userId) ?? null;
    if (member) {
      this.rememberUser(member);
    }
    // A stale entry still beats no name at all
    return member ?? cached?.user ?? null;
  }

  async getVideoUrl(_chatId: number, _messageId: string, videoId: string): Promise<string | null> {
    const video = await this.api.getVideo(videoId);
    return pickVideoUrl(video.urls);
  }

  /**
   * Re-read the message to get a fresh download URL for a file attachment.
   * The Bot API carries no safety verdict, so `unsafe` is always false here.
   */
  async getFileInfo(_chatId: number, messageId: string, fileId: string): Promise<FileInfo> {
    const message = await this.api.getMessage(messageId);
    const file = (message.body?.attachments ?? []).find(
      (att) => att.type === "file" && att.payload?.token === fileId,
    );
    const url = file?.payload?.url;
    return { url: typeof url === "string" && url ? url : null, unsafe: false };
  }
}
