import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { pino } from "pino";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DestinationRegistry } from "./registry.js";

const silent = pino({ level: "silent" });

describe("DestinationRegistry", () => {
  let dir: string;
  let statePath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "bridge-registry-"));
    statePath = join(dir, "bot_state.json");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("starts empty when the state file does not exist", async () => {
    const registry = new DestinationRegistry(statePath, silent);
    const loaded = await registry.load();
    expect(loaded.size).toBe(0);
  });

  it("persists additions and removals", async () => {
    const registry = new DestinationRegistry(statePath, silent);
    await registry.load();

    expect(await registry.add("111")).toBe("added");
    expect(await registry.add("222")).toBe("added");
    expect(await registry.remove("111")).toBe("removed");

    expect(JSON.parse(await readFile(statePath, "utf8"))).toEqual({ active_chats: ["222"] });
  });

  it("reports duplicate adds and absent removes without writing", async () => {
    const registry = new DestinationRegistry(statePath, silent);
    await registry.load();

    await registry.add("111");
    await writeFile(statePath, "sentinel");

    expect(await registry.add("111")).toBe("already-present");
    expect(await registry.remove("999")).toBe("not-present");
    expect(await readFile(statePath, "utf8")).toBe("sentinel");
  });

  it("round-trips through a fresh instance", async () => {
    const first = new DestinationRegistry(statePath, silent);
    await first.load();
    await first.add("111");
    await first.add("-100222");

    const second = new DestinationRegistry(statePath, silent);
    const loaded = await second.load();

    expect([...loaded]).toEqual(["111", "-100222"]);
    expect(second.has("-100222")).toBe(true);
  });

  it("normalises numeric ids from older state files", async () => {
    await writeFile(statePath, JSON.stringify({ active_chats: [111, "222"] }));
    const registry = new DestinationRegistry(statePath, silent);

    const loaded = await registry.load();

    expect([...loaded]).toEqual(["111", "222"]);
  });

  it("treats a malformed file as empty", async () => {
    await writeFile(statePath, "{ broken");
    const registry = new DestinationRegistry(statePath, silent);

    const loaded = await registry.load();

    expect(loaded.size).toBe(0);
  });

  it("treats a file with the wrong shape as empty", async () => {
    await writeFile(statePath, JSON.stringify({ active_chats: "111" }));
    const registry = new DestinationRegistry(statePath, silent);

    expect((await registry.load()).size).toBe(0);
  });

  it("returns a snapshot that does not follow later changes", async () => {
    const registry = new DestinationRegistry(statePath, silent);
    await registry.load();
    await registry.add("111");

    const snapshot = registry.snapshot();
    await registry.add("222");

    expect([...snapshot]).toEqual(["111"]);
    expect(registry.size).toBe(2);
  });

  it("serialises concurrent writes so the last state wins", async () => {
    const registry = new DestinationRegistry(statePath, silent);
    await registry.load();

    await Promise.all([registry.add("1"), registry.add("2"), registry.add("3"), registry.remove("2")]);
    await registry.flushed();

    expect(JSON.parse(await readFile(statePath, "utf8"))).toEqual({ active_chats: ["1", "3"] });
  });

  it("keeps the in-memory change when the write fails", async () => {
    const registry = new DestinationRegistry(join(dir, "missing-dir", "state.json"), silent);
    await registry.load();

    expect(await registry.add("111")).toBe("added");
    expect(registry.has("111")).toBe(true);
  });
});
