import type { Logger } from "pino";
import { MaxApi } from "./api.js";
import type { BridgeConfig } from "./config.js";
import { ForwardingDispatcher } from "./dispatcher.js";
import { MediaFetcher } from "./fetcher.js";
import { logger as rootLogger } from "./logger.js";
import { DestinationRegistry } from "./registry.js";
import { AttachmentResolver } from "./resolver.js";
import { MaxBotSource } from "./source.js";
import { TelegramBridgeBot } from "./telegram.js";

export interface RunBridgeOptions {
  signal: AbortSignal;
  logger?: Logger;
}

/** Resolves when `signal` aborts; `dispose` drops the listener if it never does. */
function waitForAbort(signal: AbortSignal): { aborted: Promise<void>; dispose: () => void } {
  let onAbort = () => {};
  const aborted = new Promise<void>((resolve) => {
    onAbort = () => resolve();
    if (signal.aborted) resolve();
    else signal.addEventListener("abort", onAbort, { once: true });
  });
  return { aborted, dispose: () => signal.removeEventListener("abort", onAbort) };
}

export async function runBridge(config: BridgeConfig, opts: RunBridgeOptions): Promise<void> {
  const log = (opts.logger ?? rootLogger).child({ account: config.maxAccount.phone });
  log.info({ sourceChatId: config.MAX_CHAT_ID, tokenSource: config.maxAccount.tokenSource }, "Starting MAX → Telegram bridge");

  const registry = new DestinationRegistry(config.STATE_FILE, log);
  await registry.load();

  const telegram = new TelegramBridgeBot({
    token: config.TELEGRAM_BOT_TOKEN,
    registry,
    sourceChatId: config.MAX_CHAT_ID,
    logger: log,
  });

  const api = new MaxApi({ token: config.maxAccount.token, baseUrl: config.maxAccount.baseUrl });
  const source = new MaxBotSource({ api, chatId: config.MAX_CHAT_ID, logger: log });

  const dispatcher = new ForwardingDispatcher({
    source,
    resolver: new AttachmentResolver(source, log),
    fetcher: new MediaFetcher({
      maxAttempts: config.DOWNLOAD_MAX_ATTEMPTS,
      maxBytes: Math.floor(config.MEDIA_MAX_MB * 1024 * 1024),
      logger: log,
    }),
    registry,
    destination: telegram.sender,
    forwardAllAttachments: config.FORWARD_ALL_ATTACHMENTS,
    logger: log,
  });

  await telegram.start();

  // The source gets its own controller so Telegram can be stopped first.
  const sourceController = new AbortController();
  let polling: Promise<void> = Promise.resolve();
  try {
    await source.connect();
    polling = source.run(
      {
        onMessage: (message, signal) => dispatcher.handle(message, signal),
      },
      sourceController.signal,
    );
    const stop = waitForAbort(opts.signal);
    try {
      await Promise.race([stop.aborted, polling]);
    } finally {
      stop.dispose();
    }
    log.info(opts.signal.aborted ? "Stop signal received" : "MAX polling ended");
  } finally {
    await telegram.stop();
    sourceController.abort();
    await polling;
    await registry.flushed();
    log.info("Bridge stopped");
  }
}
