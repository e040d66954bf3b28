/**
 * Error-shape helpers shared by the media fetcher and the Telegram sender.
 */

const TRANSIENT_ERROR_CODES = new Set([
  "ENOTFOUND",
  "EAI_AGAIN",
  "ETIMEDOUT",
  "ECONNRESET",
  "ECONNREFUSED",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EPIPE",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
  "UND_ERR_SOCKET",
]);

export const TRANSIENT_HTTP_STATUS = new Set([408, 425, 429, 500, 502, 503, 504]);

type UnknownRecord = Record<string, unknown>;

export function asRecord(value: unknown): UnknownRecord | null {
  if (!value || typeof value !== "object") {
    return null;
  }
  return value as UnknownRecord;
}

export function readString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value : undefined;
}

function normalizeCode(code: unknown): string | undefined {
  const raw = readString(code);
  return raw ? raw.toUpperCase() : undefined;
}

/**
 * Walk `cause` / `error` links breadth-first. undici wraps socket failures as
 * `TypeError("fetch failed")` with the real code on `cause`.
 */
export function collectErrorLikeChain(err: unknown): UnknownRecord[] {
  const chain: UnknownRecord[] = [];
  const queue: unknown[] = [err];
  const seen = new Set<unknown>();

  while (queue.length > 0) {
    const item = queue.shift();
    if (!item || seen.has(item)) {
      continue;
    }
    seen.add(item);

    const record = asRecord(item);
    if (!record) {
      continue;
    }
    chain.push(record);

    for (const value of [record.cause, record.error, record.err]) {
      if (value && typeof value === "object") {
        queue.push(value);
      }
    }
  }

  return chain;
}

export function isTransientNetworkError(err: unknown): boolean {
  for (const record of collectErrorLikeChain(err)) {
    const code = normalizeCode(record.code) ?? normalizeCode(record.errno);
    if (code && TRANSIENT_ERROR_CODES.has(code)) {
      return true;
    }
    if (record instanceof TypeError && record.message === "fetch failed") {
      return true;
    }
  }
  return false;
}

export function formatError(err: unknown): string {
  const redact = (value: string) => value.replace(/bot\d+:[A-Za-z0-9_-]+/g, "bot<redacted>");

  if (err instanceof Error) {
    return redact(err.message);
  }
  if (typeof err === "string") {
    return redact(err);
  }
  try {
    return redact(JSON.stringify(err));
  } catch {
    return redact(String(err));
  }
}
