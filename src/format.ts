/**
 * Telegram-side rendering of forwarded MAX messages (HTML parse mode).
 */

import type { MaxUser } from "./api.js";

export const TELEGRAM_MAX_MESSAGE_LENGTH = 4096;
export const TELEGRAM_MAX_CAPTION_LENGTH = 1024;

const ELLIPSIS = "…";

export function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Cut escaped HTML text to `limit` UTF-16 units, never inside an entity such
 * as `&amp;` or a surrogate pair.
 */
export function truncateHtml(html: string, limit: number): string {
  if (html.length <= limit) return html;
  let cut = html.slice(0, Math.max(0, limit - ELLIPSIS.length));
  if (isHighSurrogate(cut.charCodeAt(cut.length - 1))) {
    cut = cut.slice(0, -1);
  }
  const amp = cut.lastIndexOf("&");
  if (amp !== -1 && !cut.slice(amp).includes(";")) {
    cut = cut.slice(0, amp);
  }
  return cut + ELLIPSIS;
}

export function formatSenderName(user?: MaxUser | null): string {
  if (!user) return "Unknown";
  const parts = [user.first_name, user.last_name].filter((p): p is string => Boolean(p?.trim()));
  return parts.join(" ") || user.name?.trim() || user.username?.trim() || "Unknown";
}

/**
 * `📩 MAX` header, sender line, then the original text when present.
 */
export function formatForwardedText(
  senderName: string,
  text: string | null | undefined,
  limit: number = TELEGRAM_MAX_MESSAGE_LENGTH,
): string {
  const header = `📩 <b>MAX</b>\n<b>From:</b> ${escapeHtml(senderName)}`;
  const body = text?.trim() ? `\n${escapeHtml(text)}` : "";
  return truncateHtml(header + body, limit);
}

export function formatCaption(senderName: string, text: string | null | undefined): string {
  return formatForwardedText(senderName, text, TELEGRAM_MAX_CAPTION_LENGTH);
}
