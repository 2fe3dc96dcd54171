import { setTimeout as sleep } from "node:timers/promises";
import type { HistoryPage, SlackApi } from "../api/types";
import type { IdentityMap } from "../ids";
import { logger } from "../../logger";
import { readMessage, type MessageEvent } from "../events";

export const DEFAULT_PACING_MS = 1000;

export interface PaginationOptions {
  /** Delay before every page request. */
  pacingMs?: number;
  signal?: AbortSignal;
}

export type TimestampedMessage = MessageEvent & { ts: string };

/**
 * Walks a channel's history backwards. The cursor is the smallest timestamp
 * seen so far on any entry, including ones that are not collected. Messages
 * are de-duplicated by timestamp because the API's
 * `inclusive=false` is not reliable.
 */
export async function fetchChannelHistory(
  api: SlackApi,
  channelId: string,
  options: PaginationOptions = {},
): Promise<TimestampedMessage[]> {
  const pacingMs = options.pacingMs ?? DEFAULT_PACING_MS;
  const seen = new Set<string>();
  const messages: TimestampedMessage[] = [];
  let latest: string | undefined;
  let hasMore = true;
  let found = 0;

  while (hasMore) {
    await sleep(pacingMs, undefined, { signal: options.signal });
    let page: HistoryPage;
    try {
      page = await api.history(channelId, latest);
    } catch (err) {
      logger.error({ err, channel: channelId, latest }, "History pagination aborted");
      throw err;
    }

    const cursor = latest;
    for (const raw of page.messages) {
      const ts = typeof raw.ts === "string" ? raw.ts : undefined;
      if (ts !== undefined && (latest === undefined || Number(ts) < Number(latest))) {
        latest = ts;
      }
      const message = readMessage(raw, { requireChannel: false });
      if (!message?.ts || seen.has(message.ts)) {
        continue;
      }
      seen.add(message.ts);
      messages.push({ ...message, channel: channelId, ts: message.ts });
    }
    found += page.messages.length;
    logger.info({ channel: channelId, found }, "History page fetched");

    hasMore = page.hasMore;
    if (hasMore && latest === cursor) {
      logger.warn({ channel: channelId, latest }, "History cursor did not advance; stopping");
      hasMore = false;
    }
  }

  return messages;
}

export interface FetchAllOptions extends PaginationOptions {
  includeDms?: boolean;
}

/** History for every known channel, and optionally every DM session, keyed by channel id. */
export async function fetchAllHistory(
  api: SlackApi,
  ids: IdentityMap,
  options: FetchAllOptions = {},
): Promise<Map<string, TimestampedMessage[]>> {
  const channels = [...ids.channelIds(), ...(options.includeDms ? ids.dmIds() : [])];
  const history = new Map<string, TimestampedMessage[]>();
  for (const channelId of channels) {
    const label = ids.channelName(channelId) ?? ids.dmUser(channelId) ?? channelId;
    logger.info({ channel: channelId, name: label }, "Getting history for channel");
    history.set(channelId, await fetchChannelHistory(api, channelId, options));
  }
  return history;
}
