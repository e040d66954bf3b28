import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { pino } from "pino";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { REPLIES, startForwarding, stopForwarding } from "./commands.js";
import { DestinationRegistry } from "./registry.js";

describe("bridge commands", () => {
  let dir: string;
  let registry: DestinationRegistry;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "bridge-commands-"));
    registry = new DestinationRegistry(join(dir, "bot_state.json"), pino({ level: "silent" }));
    await registry.load();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("activates forwarding for a new chat", async () => {
    expect(await startForwarding(registry, "42", -100555)).toBe("🚀 Forwarding from MAX (ID: -100555) is on.");
    expect(registry.has("42")).toBe(true);
  });

  it("acknowledges a repeated /start", async () => {
    await startForwarding(registry, "42", -100555);
    expect(await startForwarding(registry, "42", -100555)).toBe(REPLIES.alreadyActive);
    expect(registry.size).toBe(1);
  });

  it("deactivates an active chat", async () => {
    await startForwarding(registry, "42", -100555);
    expect(await stopForwarding(registry, "42")).toBe(REPLIES.deactivated);
    expect(registry.has("42")).toBe(false);
  });

  it("reports /stop in an inactive chat", async () => {
    expect(await stopForwarding(registry, "42")).toBe("❌ Forwarding was not active.");
  });
});
