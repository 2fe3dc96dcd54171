import { UnknownTargetError } from "../errors";
import { isDirectMessageChannel } from "../runtime/ids";
import type { Action, ActionContext, ActionTree, DeliveryCallback } from "./types";

export interface MessageActionOptions {
  /** Channel name to post in. */
  channel?: string | null;
  /** User id whose direct message session receives the text when no channel is given. */
  user?: string | null;
  text: string;
  onDelivered?: DeliveryCallback;
}

/**
 * Names resolve through the identity map. A target the map does not know is
 * still reachable when it is the triggering event's own channel, or the peer
 * of the direct message session the event came from.
 */
export function resolveMessageTarget(
  ctx: ActionContext,
  target: { channel?: string | null; user?: string | null },
): string {
  const { event } = ctx;
  if (target.channel) {
    const channelId = ctx.ids.channelId(target.channel);
    if (channelId) {
      return channelId;
    }
    if (event && event.channel === target.channel) {
      return event.channel;
    }
    throw new UnknownTargetError("channel", target.channel);
  }
  if (target.user) {
    const dmId = ctx.ids.dmId(target.user);
    if (dmId) {
      return dmId;
    }
    if (event && event.user === target.user && isDirectMessageChannel(event.channel)) {
      return event.channel;
    }
    throw new UnknownTargetError("user", target.user);
  }
  if (event) {
    return event.channel;
  }
  throw new Error("Message has no channel, user or triggering event to reply to");
}

export class MessageAction implements Action {
  readonly channel: string | null;
  readonly user: string | null;
  readonly text: string;
  readonly onDelivered?: DeliveryCallback;

  constructor(options: MessageActionOptions) {
    this.channel = options.channel ?? null;
    this.user = options.user ?? null;
    this.text = options.text;
    this.onDelivered = options.onDelivered;
  }

  async execute(ctx: ActionContext): Promise<ActionTree> {
    const channelId = resolveMessageTarget(ctx, this);
    await ctx.outbound.send(this.text, channelId, this.onDelivered);
    return null;
  }
}
