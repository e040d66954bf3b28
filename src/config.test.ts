import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  ConfigError,
  loadBridgeConfig,
  parseBridgeConfig,
  parseMaxAccountConfig,
  resolveMaxAccount,
} from "./config.js";

const BASE = {
  MAX_PHONE: "+70000000000",
  MAX_CHAT_ID: "-123",
  TELEGRAM_BOT_TOKEN: "test-secret",
};

function captureConfigError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error("expected ConfigError");
}

describe("parseBridgeConfig", () => {
  it("applies defaults and coerces a numeric-string chat id", () => {
    const cfg = parseBridgeConfig({ ...BASE, MAX_BOT_TOKEN: "test-max-token" }, "cfg.json", {});

    expect(cfg.MAX_CHAT_ID).toBe(-123);
    expect(cfg.STATE_FILE).toBe("bot_state.json");
    expect(cfg.FORWARD_ALL_ATTACHMENTS).toBe(false);
    expect(cfg.MEDIA_MAX_MB).toBe(50);
    expect(cfg.DOWNLOAD_MAX_ATTEMPTS).toBe(3);
    expect(cfg.maxAccount).toEqual({
      phone: "+70000000000",
      token: "test-max-token",
      tokenSource: "config",
    });
  });

  it("accepts a numeric chat id as-is", () => {
    const cfg = parseBridgeConfig({ ...BASE, MAX_CHAT_ID: 42, MAX_BOT_TOKEN: "t" }, "cfg.json", {});
    expect(cfg.MAX_CHAT_ID).toBe(42);
  });

  it("falls back to the MAX_BOT_TOKEN environment variable", () => {
    const cfg = parseBridgeConfig(BASE, "cfg.json", { MAX_BOT_TOKEN: " env-token " });
    expect(cfg.maxAccount.token).toBe("env-token");
    expect(cfg.maxAccount.tokenSource).toBe("env");
  });

  it("rejects a config with no MAX credential anywhere", () => {
    const err = captureConfigError(() => parseBridgeConfig(BASE, "cfg.json", {}));
    expect(err.reason).toBe("invalid");
    expect(err.message).toBe("MAX_BOT_TOKEN is missing in cfg.json and in the environment");
  });

  it("rejects missing required keys", () => {
    const { TELEGRAM_BOT_TOKEN: _omit, ...rest } = BASE;
    const err = captureConfigError(() => parseBridgeConfig(rest, "cfg.json", { MAX_BOT_TOKEN: "t" }));
    expect(err.reason).toBe("invalid");
    expect(err.message).toContain("TELEGRAM_BOT_TOKEN");
  });

  it("rejects a non-numeric chat id", () => {
    const err = captureConfigError(() =>
      parseBridgeConfig({ ...BASE, MAX_CHAT_ID: "general" }, "cfg.json", { MAX_BOT_TOKEN: "t" }),
    );
    expect(err.message).toContain("MAX_CHAT_ID");
  });

  it("rejects unknown keys", () => {
    const err = captureConfigError(() =>
      parseBridgeConfig({ ...BASE, MAX_PASSWORD: "x" }, "cfg.json", { MAX_BOT_TOKEN: "t" }),
    );
    expect(err.message).toMatch(/Unrecognized key/);
  });
});

describe("parseMaxAccountConfig", () => {
  it("accepts the bridge config file and keeps only account keys", () => {
    const cfg = parseMaxAccountConfig({ ...BASE, LOG_LEVEL: "debug" }, "cfg.json", {
      MAX_BOT_TOKEN: "test-max-token",
    });

    expect(cfg.MAX_PHONE).toBe("+70000000000");
    expect(cfg.LOG_LEVEL).toBe("debug");
    expect(cfg).not.toHaveProperty("TELEGRAM_BOT_TOKEN");
    expect(cfg.maxAccount.tokenSource).toBe("env");
  });

  it("does not require Telegram keys", () => {
    const cfg = parseMaxAccountConfig({ MAX_PHONE: "+7", MAX_BOT_TOKEN: "t" }, "cfg.json", {});
    expect(cfg.maxAccount.phone).toBe("+7");
  });
});

describe("resolveMaxAccount", () => {
  it("prefers the config value over the environment", () => {
    const account = resolveMaxAccount(
      { MAX_PHONE: "+7", MAX_BOT_TOKEN: "from-config" },
      { MAX_BOT_TOKEN: "from-env" },
    );
    expect(account?.token).toBe("from-config");
  });

  it("treats a blank environment value as absent", () => {
    expect(resolveMaxAccount({ MAX_PHONE: "+7" }, { MAX_BOT_TOKEN: "  " })).toBeNull();
  });
});

describe("loadBridgeConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "bridge-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads and validates a JSON file", async () => {
    const path = join(dir, "config.json");
    await writeFile(path, JSON.stringify({ ...BASE, MAX_BOT_TOKEN: "t", FORWARD_ALL_ATTACHMENTS: true }));

    const cfg = await loadBridgeConfig(path, {});

    expect(cfg.FORWARD_ALL_ATTACHMENTS).toBe(true);
    expect(cfg.TELEGRAM_BOT_TOKEN).toBe("test-secret");
  });

  it("reports a missing file", async () => {
    const path = join(dir, "absent.json");
    await expect(loadBridgeConfig(path, {})).rejects.toMatchObject({ reason: "missing", path });
  });

  it("reports malformed JSON", async () => {
    const path = join(dir, "config.json");
    await writeFile(path, "{ not json");
    await expect(loadBridgeConfig(path, {})).rejects.toMatchObject({ reason: "malformed" });
  });
});
