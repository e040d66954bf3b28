/**
 * MAX → Telegram bridge.
 *
 * Library entry point; the `max-tg-bridge` binary lives in `cli.ts`.
 */

export { MaxApi, MaxApiError } from "./api.js";
export type { MaxAttachment, MaxMessage, MaxUpdate, MaxUser } from "./api.js";
export { parseAttachment, parseAttachments, mediaFilename } from "./attachments.js";
export type { AttachmentRef, MediaKind } from "./attachments.js";
export { runBridge } from "./bridge.js";
export { formatChatList, listChats } from "./chats.js";
export type { ChatEntity } from "./chats.js";
export { startForwarding, stopForwarding } from "./commands.js";
export {
  BridgeConfigSchema,
  ConfigError,
  loadBridgeConfig,
  loadMaxAccountConfig,
  parseBridgeConfig,
} from "./config.js";
export type { BridgeConfig } from "./config.js";
export { ForwardingDispatcher } from "./dispatcher.js";
export { FetchError, MediaFetcher, MediaTimeoutError } from "./fetcher.js";
export { DestinationRegistry } from "./registry.js";
export { AttachmentResolver } from "./resolver.js";
export type { ResolveOutcome, ResolvedMedia } from "./resolver.js";
export { exponentialBackoff, withRetry } from "./retry.js";
export type { RetryPolicy } from "./retry.js";
export { MaxBotSource } from "./source.js";
export type { InboundMessage, MaxSourceClient } from "./source.js";
export { classifyTelegramFailure, TelegramBridgeBot, TelegramSender } from "./telegram.js";
export type { DestinationPayload, DestinationSender, SendFailure } from "./telegram.js";
