import type { HistoryStore } from "../../storage/types";

export interface PersistPolicy {
  alert: string;
  /** Messages from this user id are never stored. */
  botUserId?: string;
}

export interface PersistableMessage {
  user: string;
  channelName: string;
  text: string;
  ts?: string;
}

/** Stores a channel message unless it is the bot's own output or a command. */
export function persistMessage(
  store: HistoryStore,
  message: PersistableMessage,
  policy: PersistPolicy,
): boolean {
  const { user, channelName, text, ts } = message;
  if (!ts || !text || user === policy.botUserId || text.startsWith(policy.alert)) {
    return false;
  }
  store.save({ userId: user, channelName, text, timestamp: ts });
  return true;
}
