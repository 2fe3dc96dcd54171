import type { SlackApi } from "../runtime/api/types";
import type { IdentityMap } from "../runtime/ids";
import type { HistoryStore } from "../storage/types";

/**
 * Something a handler asks the runtime to do. Executing an action may yield
 * further actions, which are executed in turn.
 */
export interface Action {
  execute(ctx: ActionContext): Promise<ActionTree>;
}

export type ActionTree = Action | readonly ActionTree[] | null | undefined | void;

/** Runs once the remote service confirms a sent message was delivered. */
export type DeliveryCallback = () => ActionTree | Promise<ActionTree>;

export interface MessageSender {
  send(text: string, channelId: string, onDelivered?: DeliveryCallback): Promise<void>;
}

/** The message an action is responding to. */
export interface EventContext {
  channel: string;
  user?: string;
  ts?: string;
}

export interface ActionContext {
  api: SlackApi;
  outbound: MessageSender;
  ids: IdentityMap;
  history: HistoryStore;
  event?: EventContext;
}

export function isAction(value: unknown): value is Action {
  return (
    typeof value === "object" &&
    value !== null &&
    "execute" in value &&
    typeof value.execute === "function"
  );
}
