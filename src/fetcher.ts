/**
 * Media download with connect / read / total timeouts and bounded retries.
 */

import type { Logger } from "pino";
import { logger as rootLogger } from "./logger.js";
import { formatError, isTransientNetworkError, TRANSIENT_HTTP_STATUS } from "./network-errors.js";
import { exponentialBackoff, withRetry, type RetryPolicy } from "./retry.js";

export type TimeoutPhase = "connect" | "read" | "total";

export class MediaTimeoutError extends Error {
  constructor(
    public readonly phase: TimeoutPhase,
    public readonly timeoutMs: number,
  ) {
    super(`Media download ${phase} timeout after ${timeoutMs}ms`);
    this.name = "MediaTimeoutError";
  }
}

export class MediaHttpError extends Error {
  constructor(public readonly status: number) {
    super(`Media download failed with HTTP ${status}`);
    this.name = "MediaHttpError";
  }
}

export class MediaTooLargeError extends Error {
  constructor(public readonly maxBytes: number) {
    super(`Media exceeds ${maxBytes} bytes`);
    this.name = "MediaTooLargeError";
  }
}

export class FetchError extends Error {
  constructor(
    public readonly url: string,
    public readonly attempts: number,
    cause: unknown,
  ) {
    super(`Failed to download ${url} after ${attempts} attempt(s): ${formatError(cause)}`, {
      cause,
    });
    this.name = "FetchError";
  }
}

/** Only transient network conditions are worth another attempt. */
export function isRetryableFetchError(err: unknown): boolean {
  if (err instanceof MediaTimeoutError) return true;
  if (err instanceof MediaHttpError) return TRANSIENT_HTTP_STATUS.has(err.status);
  if (err instanceof MediaTooLargeError) return false;
  return isTransientNetworkError(err);
}

export interface MediaFetcherOptions {
  connectTimeoutMs?: number;
  readTimeoutMs?: number;
  totalTimeoutMs?: number;
  maxAttempts?: number;
  maxBytes?: number;
  backoffMs?: (attempt: number) => number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export class MediaFetcher {
  private readonly connectTimeoutMs: number;
  private readonly readTimeoutMs: number;
  private readonly totalTimeoutMs: number;
  private readonly maxBytes: number;
  private readonly policy: RetryPolicy;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly log: Logger;

  constructor(opts: MediaFetcherOptions = {}) {
    this.connectTimeoutMs = opts.connectTimeoutMs ?? 10_000;
    this.readTimeoutMs = opts.readTimeoutMs ?? 30_000;
    this.totalTimeoutMs = opts.totalTimeoutMs ?? 60_000;
    this.maxBytes = opts.maxBytes ?? 50 * 1024 * 1024;
    this.policy = {
      maxAttempts: opts.maxAttempts ?? 3,
      backoffMs: opts.backoffMs ?? exponentialBackoff(),
      isRetryable: isRetryableFetchError,
    };
    this.sleep = opts.sleep;
    this.log = (opts.logger ?? rootLogger).child({ component: "fetcher" });
  }

  /**
   * Download `url` into memory. Rejects with {@link FetchError} carrying the
   * last underlying failure. Aborting `signal` cancels the current attempt
   * and any further ones.
   */
  async fetch(url: string, filename: string, signal?: AbortSignal): Promise<Buffer> {
    let attempts = 0;
    try {
      const data = await withRetry(
        (attempt) => {
          attempts = attempt;
          return this.fetchOnce(url, signal);
        },
        this.policy,
        {
          signal,
          sleep: this.sleep,
          onRetry: ({ attempt, delayMs, error }) => {
            this.log.warn(
              { filename, attempt, maxAttempts: this.policy.maxAttempts, delayMs, err: error },
              "Media download failed, retrying",
            );
          },
        },
      );
      this.log.debug({ filename, bytes: data.length, attempts }, "Media downloaded");
      return data;
    } catch (err) {
      throw new FetchError(url, attempts, err);
    }
  }

  private async fetchOnce(url: string, signal?: AbortSignal): Promise<Buffer> {
    signal?.throwIfAborted();
    const controller = new AbortController();
    const abortWith = (phase: TimeoutPhase, ms: number) =>
      setTimeout(() => controller.abort(new MediaTimeoutError(phase, ms)), ms);
    const onAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener("abort", onAbort, { once: true });

    const totalTimer = abortWith("total", this.totalTimeoutMs);
    const connectTimer = abortWith("connect", this.connectTimeoutMs);
    let readTimer: ReturnType<typeof setTimeout> | undefined;

    try {
      const res = await fetch(url, { signal: controller.signal });
      clearTimeout(connectTimer);

      if (!res.ok) {
        await res.body?.cancel().catch(() => undefined);
        throw new MediaHttpError(res.status);
      }

      const declared = Number(res.headers.get("content-length"));
      if (Number.isFinite(declared) && declared > this.maxBytes) {
        await res.body?.cancel().catch(() => undefined);
        throw new MediaTooLargeError(this.maxBytes);
      }

      if (!res.body) {
        return Buffer.alloc(0);
      }

      const chunks: Buffer[] = [];
      let received = 0;
      const reader = res.body.getReader();
      for (;;) {
        readTimer = abortWith("read", this.readTimeoutMs);
        const { done, value } = await reader.read();
        clearTimeout(readTimer);
        if (done) break;
        received += value.byteLength;
        if (received > this.maxBytes) {
          await reader.cancel().catch(() => undefined);
          throw new MediaTooLargeError(this.maxBytes);
        }
        chunks.push(Buffer.from(value));
      }
      return Buffer.concat(chunks, received);
    } catch (err) {
      // An abort surfaces as a generic AbortError; report the timeout that fired instead.
      const reason: unknown = controller.signal.reason;
      if (controller.signal.aborted && reason instanceof MediaTimeoutError) {
        throw reason;
      }
      throw err;
    } finally {
      clearTimeout(totalTimer);
      clearTimeout(connectTimer);
      clearTimeout(readTimer);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}
