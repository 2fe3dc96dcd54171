import type { HistoryStore } from "../../storage/types";
import type { SlackApi } from "../api/types";
import type { IdentityMap } from "../ids";
import { logger } from "../../logger";
import { fetchAllHistory, type PaginationOptions } from "./paginate";
import { persistMessage, type PersistPolicy } from "./persist";

export interface BackfillParams extends PaginationOptions {
  api: SlackApi;
  ids: IdentityMap;
  store: HistoryStore;
  policy: PersistPolicy;
}

/** Replaces the stored history with the channel archive. Returns the number of stored messages. */
export async function backfillHistory(params: BackfillParams): Promise<number> {
  const { api, ids, store, policy } = params;
  store.clear();
  logger.info("History cleared");

  const history = await fetchAllHistory(api, ids, {
    includeDms: false,
    pacingMs: params.pacingMs,
    signal: params.signal,
  });

  let stored = 0;
  for (const [channelId, messages] of history) {
    const channelName = ids.channelName(channelId) ?? channelId;
    for (const message of messages) {
      if (persistMessage(store, { ...message, channelName }, policy)) {
        stored += 1;
      }
    }
  }
  logger.info({ stored }, "History backfill finished");
  return stored;
}
