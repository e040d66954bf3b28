/**
 * Telegram chats that receive forwarded content, persisted as
 * `{"active_chats": [...]}`.
 *
 * Memory is the source of truth for the running process; every mutation
 * rewrites the whole file through a single writer chain.
 */

import { readFile, writeFile } from "node:fs/promises";
import type { Logger } from "pino";
import { z } from "zod";
import { logger as rootLogger } from "./logger.js";

export type AddResult = "added" | "already-present";
export type RemoveResult = "removed" | "not-present";

const StateFileSchema = z.object({
  active_chats: z.array(z.union([z.string(), z.number()])).default([]),
});

export interface StateFile {
  active_chats: string[];
}

export class DestinationRegistry {
  private chats = new Set<string>();
  private writes: Promise<void> = Promise.resolve();
  private readonly log: Logger;

  constructor(
    private readonly statePath: string,
    logger?: Logger,
  ) {
    this.log = (logger ?? rootLogger).child({ component: "registry" });
  }

  /**
   * Replace the in-memory set with the file's contents. A missing file is an
   * empty registry; an unreadable or malformed one is logged and also empty.
   */
  async load(): Promise<Set<string>> {
    this.chats = await this.readState();
    this.log.info({ chats: [...this.chats] }, "Destination registry loaded");
    return this.snapshot();
  }

  has(chatId: string): boolean {
    return this.chats.has(chatId);
  }

  get size(): number {
    return this.chats.size;
  }

  /** Copy, safe to iterate while the registry changes. */
  snapshot(): Set<string> {
    return new Set(this.chats);
  }

  async add(chatId: string): Promise<AddResult> {
    if (this.chats.has(chatId)) return "already-present";
    this.chats.add(chatId);
    this.log.info({ chatId }, "Destination added");
    await this.flush();
    return "added";
  }

  async remove(chatId: string): Promise<RemoveResult> {
    if (!this.chats.delete(chatId)) return "not-present";
    this.log.info({ chatId }, "Destination removed");
    await this.flush();
    return "removed";
  }

  /** Resolves once every write queued so far has finished. */
  async flushed(): Promise<void> {
    await this.writes;
  }

  private flush(): Promise<void> {
    // Each write serializes the state as of when it runs, so the last one wins.
    this.writes = this.writes.then(() => this.writeState());
    return this.writes;
  }

  private async writeState(): Promise<void> {
    const state: StateFile = { active_chats: [...this.chats] };
    try {
      await writeFile(this.statePath, JSON.stringify(state), "utf8");
    } catch (err) {
      this.log.error({ err, path: this.statePath }, "Failed to save destination registry");
    }
  }

  private async readState(): Promise<Set<string>> {
    let raw: string;
    try {
      raw = await readFile(this.statePath, "utf8");
    } catch (err) {
      if (isNotFound(err)) return new Set();
      this.log.error({ err, path: this.statePath }, "Failed to read destination registry");
      return new Set();
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      this.log.error({ err, path: this.statePath }, "Destination registry file is not valid JSON");
      return new Set();
    }

    const parsed = StateFileSchema.safeParse(data);
    if (!parsed.success) {
      this.log.error(
        { path: this.statePath, issues: parsed.error.issues },
        "Destination registry file has an unexpected shape",
      );
      return new Set();
    }
    return new Set(parsed.data.active_chats.map(String));
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
