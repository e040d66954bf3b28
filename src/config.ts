/**
 * Zod schemas and the JSON loader for `config.json`.
 *
 * Keys keep the upper-case names of the config file format so existing
 * `config.json` files carry over unchanged.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";

export const DEFAULT_CONFIG_FILE = "config.json";
export const DEFAULT_STATE_FILE = "bot_state.json";

const ChatIdSchema = z.union([
  z.number().int(),
  z
    .string()
    .trim()
    .regex(/^-?\d+$/, "must be a numeric chat id")
    .transform(Number),
]);

/**
 * Keys needed by anything that talks to MAX (bridge and chat listing).
 */
export const MaxAccountConfigSchema = z
  .object({
    MAX_PHONE: z.string().trim().min(1),
    MAX_BOT_TOKEN: z.string().trim().min(1).optional(),
    MAX_API_BASE_URL: z.string().url().optional(),
    LOG_LEVEL: z.string().optional(),
  })
  .strict();

export const BridgeConfigSchema = MaxAccountConfigSchema.extend({
  MAX_CHAT_ID: ChatIdSchema,
  TELEGRAM_BOT_TOKEN: z.string().trim().min(1),
  STATE_FILE: z.string().trim().min(1).optional().default(DEFAULT_STATE_FILE),
  FORWARD_ALL_ATTACHMENTS: z.boolean().optional().default(false),
  MEDIA_MAX_MB: z.number().positive().optional().default(50),
  DOWNLOAD_MAX_ATTEMPTS: z.number().int().min(1).max(10).optional().default(3),
}).strict();

export interface ResolvedMaxAccount {
  phone: string;
  token: string;
  tokenSource: "config" | "env";
  baseUrl?: string;
}

export type ResolvedConfig<T> = T & { maxAccount: ResolvedMaxAccount };
export type MaxAccountConfig = ResolvedConfig<z.output<typeof MaxAccountConfigSchema>>;
export type BridgeConfig = ResolvedConfig<z.output<typeof BridgeConfigSchema>>;

export type ConfigErrorReason = "missing" | "malformed" | "invalid";

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly reason: ConfigErrorReason,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ConfigError";
  }
}

/**
 * Resolve the MAX credential: config value first, then `MAX_BOT_TOKEN` env.
 */
export function resolveMaxAccount(
  cfg: z.output<typeof MaxAccountConfigSchema>,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedMaxAccount | null {
  const base = { phone: cfg.MAX_PHONE, baseUrl: cfg.MAX_API_BASE_URL };
  if (cfg.MAX_BOT_TOKEN) {
    return { ...base, token: cfg.MAX_BOT_TOKEN, tokenSource: "config" };
  }
  const fromEnv = env.MAX_BOT_TOKEN?.trim();
  if (fromEnv) {
    return { ...base, token: fromEnv, tokenSource: "env" };
  }
  return null;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");
}

async function readJsonFile(path: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (err) {
    throw new ConfigError(`Config file ${path} not found or unreadable`, path, "missing", {
      cause: err,
    });
  }
  try {
    return JSON.parse(raw) as unknown;
  } catch (err) {
    throw new ConfigError(`Config file ${path} is not valid JSON`, path, "malformed", {
      cause: err,
    });
  }
}

function validate<I, O>(result: z.SafeParseReturnType<I, O>, path: string): O {
  if (!result.success) {
    throw new ConfigError(
      `Invalid config in ${path}: ${formatIssues(result.error)}`,
      path,
      "invalid",
      { cause: result.error },
    );
  }
  return result.data;
}

function withMaxAccount<T extends z.output<typeof MaxAccountConfigSchema>>(
  data: T,
  path: string,
  env: NodeJS.ProcessEnv,
): ResolvedConfig<T> {
  const maxAccount = resolveMaxAccount(data, env);
  if (!maxAccount) {
    throw new ConfigError(
      `MAX_BOT_TOKEN is missing in ${path} and in the environment`,
      path,
      "invalid",
    );
  }
  return { ...data, maxAccount };
}

// Chat listing shares the bridge's config file, so bridge keys are allowed there.
const ListChatsConfigSchema = BridgeConfigSchema.partial().merge(MaxAccountConfigSchema).strict();

export function parseBridgeConfig(
  data: unknown,
  path = DEFAULT_CONFIG_FILE,
  env: NodeJS.ProcessEnv = process.env,
): BridgeConfig {
  return withMaxAccount(validate(BridgeConfigSchema.safeParse(data), path), path, env);
}

export function parseMaxAccountConfig(
  data: unknown,
  path = DEFAULT_CONFIG_FILE,
  env: NodeJS.ProcessEnv = process.env,
): MaxAccountConfig {
  const parsed = validate(ListChatsConfigSchema.safeParse(data), path);
  return withMaxAccount(
    {
      MAX_PHONE: parsed.MAX_PHONE,
      MAX_BOT_TOKEN: parsed.MAX_BOT_TOKEN,
      MAX_API_BASE_URL: parsed.MAX_API_BASE_URL,
      LOG_LEVEL: parsed.LOG_LEVEL,
    },
    path,
    env,
  );
}

export async function loadBridgeConfig(
  path = DEFAULT_CONFIG_FILE,
  env: NodeJS.ProcessEnv = process.env,
): Promise<BridgeConfig> {
  return parseBridgeConfig(await readJsonFile(path), path, env);
}

export async function loadMaxAccountConfig(
  path = DEFAULT_CONFIG_FILE,
  env: NodeJS.ProcessEnv = process.env,
): Promise<MaxAccountConfig> {
  return parseMaxAccountConfig(await readJsonFile(path), path, env);
}
