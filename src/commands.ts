/** `/start` subscribes the invoking Telegram chat, `/stop` unsubscribes it. */

import type { Bot } from "grammy";
import type { BotCommand } from "grammy/types";
import type { Logger } from "pino";
import type { DestinationRegistry } from "./registry.js";

export const BRIDGE_COMMANDS: BotCommand[] = [
  { command: "start", description: "Forward MAX messages to this chat" },
  { command: "stop", description: "Stop forwarding MAX messages to this chat" },
];

export const REPLIES = {
  activated: (sourceChatId: number) => `🚀 Forwarding from MAX (ID: ${sourceChatId}) is on.`,
  alreadyActive: "✅ Already active.",
  deactivated: "🛑 Forwarding stopped.",
  notActive: "❌ Forwarding was not active.",
} as const;

export async function startForwarding(
  registry: DestinationRegistry,
  chatId: string,
  sourceChatId: number,
): Promise<string> {
  const result = await registry.add(chatId);
  return result === "added" ? REPLIES.activated(sourceChatId) : REPLIES.alreadyActive;
}

export async function stopForwarding(registry: DestinationRegistry, chatId: string): Promise<string> {
  const result = await registry.remove(chatId);
  return result === "removed" ? REPLIES.deactivated : REPLIES.notActive;
}

export interface BridgeCommandDeps {
  registry: DestinationRegistry;
  sourceChatId: number;
  logger: Logger;
}

export function registerBridgeCommands(bot: Bot, deps: BridgeCommandDeps): void {
  const { registry, sourceChatId, logger } = deps;

  bot.command("start", async (ctx) => {
    const chatId = String(ctx.chat.id);
    const reply = await startForwarding(registry, chatId, sourceChatId);
    logger.info({ chatId, active: registry.size }, "/start handled");
    await ctx.reply(reply);
  });

  bot.command("stop", async (ctx) => {
    const chatId = String(ctx.chat.id);
    const reply = await stopForwarding(registry, chatId);
    logger.info({ chatId, active: registry.size }, "/stop handled");
    await ctx.reply(reply);
  });
}
