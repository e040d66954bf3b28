// Lists the dialogs and chats the MAX bot can see, for picking `MAX_CHAT_ID`.

import type { Logger } from "pino";
import type { MaxApi, MaxChat, MaxChatsResponse } from "./api.js";
import { formatSenderName } from "./format.js";
import { logger as rootLogger } from "./logger.js";

export type ChatEntityType = "dialog" | "channel" | "chat";

export interface ChatEntity {
  id: number;
  name: string;
  type: ChatEntityType;
  /** The other party of a dialog. */
  peerId: number | null;
}

const TYPE_LABELS: Record<ChatEntityType, string> = {
  dialog: "Dialog (private)",
  channel: "Channel",
  chat: "Chat (group)",
};

const TYPE_ORDER: ChatEntityType[] = ["dialog", "channel", "chat"];

export function toChatEntity(chat: MaxChat): ChatEntity {
  if (chat.type === "dialog") {
    const peer = chat.dialog_with_user;
    const peerId = peer?.user_id ?? chat.owner_id ?? null;
    return {
      id: chat.chat_id,
      name: peer ? formatSenderName(peer) : `ID_${peerId ?? chat.chat_id}`,
      type: "dialog",
      peerId,
    };
  }
  return {
    id: chat.chat_id,
    name: chat.title?.trim() || "Untitled",
    type: chat.type,
    peerId: null,
  };
}

export async function listChats(
  api: Pick<MaxApi, "getChats">,
  opts: { pageSize?: number; logger?: Logger } = {},
): Promise<ChatEntity[]> {
  const log = (opts.logger ?? rootLogger).child({ component: "chats" });
  const entities: ChatEntity[] = [];
  let marker: number | null = null;

  do {
    const page: MaxChatsResponse = await api.getChats({ count: opts.pageSize ?? 100, marker });
    entities.push(...page.chats.map(toChatEntity));
    marker = page.marker;
  } while (marker != null);

  for (const type of TYPE_ORDER) {
    const count = entities.filter((e) => e.type === type).length;
    log.info({ type, count }, count ? `Found ${count} ${TYPE_LABELS[type]} entries` : `No ${TYPE_LABELS[type]} entries`);
  }

  // Grouped by kind, listing order kept within each group
  return TYPE_ORDER.flatMap((type) => entities.filter((e) => e.type === type));
}

export function formatChatList(entities: ChatEntity[]): string {
  if (entities.length === 0) {
    return "No dialogs, chats or channels found.\n";
  }
  const lines = ["", "--- MAX dialogs, channels and chats ---"];
  for (const entity of entities) {
    lines.push(`ID: ${entity.id}, Name: ${entity.name}, Type: ${TYPE_LABELS[entity.type]}`);
    if (entity.type === "dialog" && entity.peerId != null) {
      lines.push(`     (peer ID: ${entity.peerId})`);
    }
  }
  lines.push("---------------------------------------", "");
  return lines.join("\n");
}
