import { run, type RunnerHandle } from "@grammyjs/runner";
import { Bot, GrammyError, InputFile, type Api } from "grammy";
import type { Logger } from "pino";
import type { MediaKind } from "./attachments.js";
import { BRIDGE_COMMANDS, registerBridgeCommands } from "./commands.js";
import { logger as rootLogger } from "./logger.js";
import { formatError } from "./network-errors.js";
import type { DestinationRegistry } from "./registry.js";

export type DestinationPayload =
  | { kind: "text"; text: string }
  | { kind: MediaKind; data: Buffer; filename: string; caption?: string };

/**
 * Telegram reports no "chat gone" code of its own: 400/403 plus the
 * description text is all there is, so matching on it stays a known weak spot.
 */
export type SendFailure =
  | { kind: "gone"; reason: string }
  | { kind: "migrated"; newChatId: string }
  | { kind: "failed"; reason: string };

export interface DestinationSender {
  send(chatId: string, payload: DestinationPayload): Promise<void>;
  classifyFailure(err: unknown): SendFailure;
}

const GONE_FORBIDDEN_PATTERNS = [
  "bot was kicked",
  "bot was blocked",
  "user is deactivated",
  "chat was deleted",
  "bot is not a member",
];

export function classifyTelegramFailure(err: unknown): SendFailure {
  if (err instanceof GrammyError) {
    const migrateTo = err.parameters?.migrate_to_chat_id;
    if (migrateTo != null) {
      return { kind: "migrated", newChatId: String(migrateTo) };
    }
    const description = err.description.toLowerCase();
    if (err.error_code === 400 && description.includes("not found")) {
      return { kind: "gone", reason: err.description };
    }
    if (err.error_code === 403 && GONE_FORBIDDEN_PATTERNS.some((p) => description.includes(p))) {
      return { kind: "gone", reason: err.description };
    }
    return { kind: "failed", reason: err.description };
  }
  return { kind: "failed", reason: formatError(err) };
}

export type TelegramSendApi = Pick<
  Api,
  "sendMessage" | "sendPhoto" | "sendVideo" | "sendAudio" | "sendDocument"
>;

export class TelegramSender implements DestinationSender {
  constructor(private readonly api: TelegramSendApi) {}

  async send(chatId: string, payload: DestinationPayload): Promise<void> {
    if (payload.kind === "text") {
      await this.api.sendMessage(chatId, payload.text, { parse_mode: "HTML" });
      return;
    }

    const file = new InputFile(payload.data, payload.filename);
    const other = { caption: payload.caption, parse_mode: "HTML" as const };
    switch (payload.kind) {
      case "photo":
        await this.api.sendPhoto(chatId, file, other);
        break;
      case "video":
        await this.api.sendVideo(chatId, file, other);
        break;
      case "audio":
        await this.api.sendAudio(chatId, file, other);
        break;
      case "file":
        await this.api.sendDocument(chatId, file, other);
        break;
    }
  }

  classifyFailure(err: unknown): SendFailure {
    return classifyTelegramFailure(err);
  }
}

export interface TelegramBridgeBotOptions {
  token: string;
  registry: DestinationRegistry;
  sourceChatId: number;
  logger?: Logger;
}

/**
 * Owns the grammy bot: command polling through @grammyjs/runner and the
 * sender used for forwarding.
 */
export class TelegramBridgeBot {
  readonly bot: Bot;
  readonly sender: TelegramSender;
  private runner: RunnerHandle | null = null;
  private readonly log: Logger;

  constructor(opts: TelegramBridgeBotOptions) {
    this.log = (opts.logger ?? rootLogger).child({ component: "telegram" });
    this.bot = new Bot(opts.token);
    this.sender = new TelegramSender(this.bot.api);

    registerBridgeCommands(this.bot, {
      registry: opts.registry,
      sourceChatId: opts.sourceChatId,
      logger: this.log,
    });

    this.bot.catch((err) => {
      this.log.error({ err: err.error, updateId: err.ctx.update.update_id }, "Telegram bot error");
    });
  }

  async start(): Promise<void> {
    await this.bot.init();
    await this.registerCommands();
    this.runner = run(this.bot);
    this.log.info({ username: this.bot.botInfo.username }, "Telegram polling started");
  }

  async stop(): Promise<void> {
    if (this.runner?.isRunning()) {
      await this.runner.stop();
    }
    this.runner = null;
    this.log.info("Telegram polling stopped");
  }

  private async registerCommands(): Promise<void> {
    try {
      await this.bot.api.setMyCommands(BRIDGE_COMMANDS);
      this.log.info({ commandCount: BRIDGE_COMMANDS.length }, "Telegram bot commands registered");
    } catch (err) {
      this.log.warn({ err }, "Failed to register Telegram bot commands");
    }
  }
}
