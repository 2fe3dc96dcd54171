import { setTimeout as sleep } from "node:timers/promises";
import type { CommandGrammar } from "../../grammar/grammar";
import type { SlackApi } from "../api/types";
import type { IdentityMap } from "../ids";
import { logger } from "../../logger";
import { isDirectMessageChannel } from "../ids";
import { DEFAULT_PACING_MS, fetchAllHistory, type TimestampedMessage } from "./paginate";

export const DEFAULT_PROGRESS_EVERY = 100;

export type DeletionKind = "bot" | "command" | "skip";

/**
 * Bot output can be deleted with the bot's own token; a user's command in a
 * channel needs the admin token. Everything else stays.
 */
export function classifyForDeletion(
  message: Pick<TimestampedMessage, "user" | "text">,
  channelId: string,
  params: { botUserId?: string; grammar: CommandGrammar },
): DeletionKind {
  if (params.botUserId !== undefined && message.user === params.botUserId) {
    return "bot";
  }
  if (!isDirectMessageChannel(channelId) && params.grammar.match(message.text, false).matched) {
    return "command";
  }
  return "skip";
}

export interface ClearCommandsParams {
  api: SlackApi;
  ids: IdentityMap;
  grammar: CommandGrammar;
  botUserId?: string;
  includeDms?: boolean;
  pacingMs?: number;
  progressEvery?: number;
  signal?: AbortSignal;
}

export interface PlannedDeletion {
  channel: string;
  ts: string;
  admin: boolean;
}

/** Deletes old bot output and user commands. Returns the number of delete requests made. */
export async function clearCommands(params: ClearCommandsParams): Promise<number> {
  const pacingMs = params.pacingMs ?? DEFAULT_PACING_MS;
  const progressEvery = params.progressEvery ?? DEFAULT_PROGRESS_EVERY;
  const history = await fetchAllHistory(params.api, params.ids, {
    includeDms: params.includeDms ?? true,
    pacingMs,
    signal: params.signal,
  });

  const planned: PlannedDeletion[] = [];
  for (const [channelId, messages] of history) {
    for (const message of messages) {
      const kind = classifyForDeletion(message, channelId, params);
      if (kind === "skip") {
        continue;
      }
      planned.push({ channel: channelId, ts: message.ts, admin: kind === "command" });
    }
  }

  logger.info({ count: planned.length }, "Found messages to delete");
  let requested = 0;
  for (const deletion of planned) {
    await sleep(pacingMs, undefined, { signal: params.signal });
    await params.api.deleteMessage(deletion.channel, deletion.ts, { admin: deletion.admin });
    requested += 1;
    if (progressEvery > 0 && requested % progressEvery === 0) {
      logger.info({ deleted: requested }, "Deleted messages so far");
    }
  }
  return requested;
}
