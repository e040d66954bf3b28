#!/usr/bin/env node
import { Command } from "commander";
import { MaxApi } from "./api.js";
import { runBridge } from "./bridge.js";
import { formatChatList, listChats } from "./chats.js";
import { DEFAULT_CONFIG_FILE, loadBridgeConfig, loadMaxAccountConfig } from "./config.js";
import { configureLogger, logger } from "./logger.js";

const program = new Command()
  .name("max-tg-bridge")
  .description("Forward messages from a MAX chat to Telegram chats")
  .option("-c, --config <path>", "Config file path", DEFAULT_CONFIG_FILE);

function configPath(): string {
  const opts = program.opts<{ config: string }>();
  return opts.config;
}

function abortOnSignals(): AbortController {
  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "Shutting down");
    controller.abort();
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);
  return controller;
}

program
  .command("run", { isDefault: true })
  .description("Run the bridge until interrupted")
  .action(async () => {
    const config = await loadBridgeConfig(configPath());
    configureLogger(config.LOG_LEVEL);
    logger.info({ path: configPath() }, "Config loaded");
    const controller = abortOnSignals();
    await runBridge(config, { signal: controller.signal });
  });

program
  .command("chats")
  .description("List MAX dialogs, channels and chats with their ids")
  .action(async () => {
    const config = await loadMaxAccountConfig(configPath());
    configureLogger(config.LOG_LEVEL);
    const api = new MaxApi({ token: config.maxAccount.token, baseUrl: config.maxAccount.baseUrl });
    const entities = await listChats(api);
    process.stdout.write(formatChatList(entities));
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  logger.fatal({ err }, "Unexpected error");
  process.exitCode = 1;
});
