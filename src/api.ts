/**
 * MAX Bot API client — thin wrapper around platform-api.max.ru
 *
 * API docs: https://dev.max.ru/docs-api
 * Auth: Authorization header with bot token
 * Rate limit: 30 rps
 */

const BASE_URL = "https://platform-api.max.ru";

// ────────────────────── Types ──────────────────────

export interface MaxUser {
  user_id: number;
  first_name: string;
  last_name?: string | null;
  username?: string | null;
  is_bot: boolean;
  last_activity_time?: number;
  name?: string | null;
  description?: string | null;
  avatar_url?: string;
}

export interface MaxChatMember extends MaxUser {
  last_access_time?: number;
  is_owner?: boolean;
  is_admin?: boolean;
  join_time?: number;
}

export interface MaxChat {
  chat_id: number;
  type: "dialog" | "chat" | "channel";
  status: string;
  title?: string | null;
  last_event_time?: number;
  participants_count?: number;
  owner_id?: number;
  is_public?: boolean;
  link?: string;
  description?: string | null;
  dialog_with_user?: MaxUser;
}

export interface MaxRecipient {
  chat_id?: number;
  chat_type?: string;
  user_id?: number;
}

export interface MaxMessageBody {
  mid: string;
  seq?: number;
  text?: string | null;
  attachments?: MaxAttachment[];
  markup?: unknown;
}

export interface MaxAttachment {
  type: string;
  payload?: Record<string, unknown>;
  [key: string]: unknown;
}

export interface MaxMessage {
  sender?: MaxUser;
  recipient: MaxRecipient;
  timestamp: number;
  body: MaxMessageBody;
  url?: string | null;
}

export type MaxUpdateType =
  | "message_created"
  | "message_callback"
  | "message_edited"
  | "message_removed"
  | "bot_added"
  | "bot_removed"
  | "bot_started"
  | "user_added"
  | "user_removed"
  | "chat_title_changed";

export interface MaxUpdate {
  update_type: MaxUpdateType;
  timestamp: number;
  message?: MaxMessage;
  /** Present on `message_removed`. */
  message_id?: string;
  chat_id?: number;
  user_id?: number;
  user?: MaxUser;
  user_locale?: string | null;
  [key: string]: unknown;
}

export interface MaxUpdatesResponse {
  updates: MaxUpdate[];
  marker: number | null;
}

export interface MaxChatsResponse {
  chats: MaxChat[];
  marker: number | null;
}

export interface MaxChatMembersResponse {
  members: MaxChatMember[];
  marker?: number | null;
}

export interface MaxVideoUrls {
  mp4_1080?: string;
  mp4_720?: string;
  mp4_480?: string;
  mp4_360?: string;
  mp4_240?: string;
  mp4_144?: string;
  hls?: string;
}

export interface MaxVideoDetails {
  token: string;
  urls?: MaxVideoUrls | null;
  width?: number;
  height?: number;
  duration?: number;
}

// ────────────────────── API Client ──────────────────────

export interface MaxApiOptions {
  token: string;
  baseUrl?: string;
  timeoutMs?: number;
}

type QueryParams = Record<string, string | number | boolean | undefined | null>;

export class MaxApiError extends Error {
  constructor(
    message: string,
    public status: number,
    public body?: unknown,
  ) {
    super(message);
    this.name = "MaxApiError";
  }
}

export class MaxApi {
  private token: string;
  private baseUrl: string;
  private timeoutMs: number;

  constructor(opts: MaxApiOptions) {
    this.token = opts.token;
    this.baseUrl = opts.baseUrl ?? BASE_URL;
    this.timeoutMs = opts.timeoutMs ?? 10_000;
  }

  // ── HTTP helpers ──

  private async request<T>(
    method: string,
    path: string,
    params?: QueryParams,
    opts: { timeoutMs?: number; signal?: AbortSignal } = {},
  ): Promise<T> {
    const url = new URL(path, this.baseUrl);
    if (params) {
      for (const [k, v] of Object.entries(params)) {
        if (v != null) url.searchParams.set(k, String(v));
      }
    }

    const controller = new AbortController();
    const timeout = setTimeout(
      () => controller.abort(),
      opts.timeoutMs ?? this.timeoutMs,
    );
    // Caller cancellation (shutdown) aborts the in-flight request too
    const onAbort = () => controller.abort();
    if (opts.signal?.aborted) controller.abort();
    opts.signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const res = await fetch(url.toString(), {
        method,
        headers: { Authorization: this.token },
        signal: controller.signal,
      });

      const json: unknown = await res.json().catch(() => null);

      if (!res.ok) {
        throw new MaxApiError(
          `MAX API ${method} ${path} → ${res.status}`,
          res.status,
          json,
        );
      }

      return json as T;
    } finally {
      clearTimeout(timeout);
      opts.signal?.removeEventListener("abort", onAbort);
    }
  }

  // ── Bot info ──

  async getMe(): Promise<MaxUser> {
    return this.request<MaxUser>("GET", "/me");
  }

  // ── Messages ──

  async getMessage(messageId: string): Promise<MaxMessage> {
    return this.request<MaxMessage>("GET", `/messages/${encodeURIComponent(messageId)}`);
  }

  // ── Chats ──

  async getChats(params?: { count?: number; marker?: number | null }): Promise<MaxChatsResponse> {
    return this.request("GET", "/chats", { count: params?.count, marker: params?.marker });
  }

  async getChatMembers(chatId: number, userIds: number[]): Promise<MaxChatMembersResponse> {
    return this.request("GET", `/chats/${chatId}/members`, { user_ids: userIds.join(",") });
  }

  // ── Media ──

  async getVideo(videoToken: string): Promise<MaxVideoDetails> {
    return this.request("GET", `/videos/${encodeURIComponent(videoToken)}`);
  }

  // ── Updates (long polling) ──

  async getUpdates(
    params?: {
      limit?: number;
      timeout?: number;
      marker?: number | null;
      types?: MaxUpdateType[];
    },
    signal?: AbortSignal,
  ): Promise<MaxUpdatesResponse> {
    const qp: QueryParams = {};
    if (params?.limit) qp.limit = params.limit;
    if (params?.timeout != null) qp.timeout = params.timeout;
    if (params?.marker != null) qp.marker = params.marker;
    if (params?.types?.length) qp.types = params.types.join(",");

    // Long polling needs a longer timeout
    const pollTimeout = ((params?.timeout ?? 30) + 5) * 1000;
    return this.request("GET", "/updates", qp, { timeoutMs: pollTimeout, signal });
  }
}
