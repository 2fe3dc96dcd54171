import type { SlackApi } from "./api/types";
import type { CommandGrammar } from "../grammar/grammar";
import type { HandlerRegistry } from "../handlers/registry";
import type { HistoryStore } from "../storage/types";
import type { IdentityMap } from "./ids";
import type { OutboundSender } from "./outbound";
import { executeActions } from "../actions/executor";
import { MessageAction } from "../actions/message";
import type { ActionContext, ActionTree, EventContext } from "../actions/types";
import { acceptsChannel } from "../handlers/registry";
import { logger } from "../logger";
import { classifyEvent, type MessageEvent, type RtmEvent } from "./events";
import { persistMessage } from "./history/persist";
import { isDirectMessageChannel } from "./ids";

export const ADMIN_ONLY_REPLY = "That command is admin only.";

export interface DispatcherDeps {
  grammar: CommandGrammar;
  registry: HandlerRegistry;
  ids: IdentityMap;
  api: SlackApi;
  outbound: OutboundSender;
  history: HistoryStore;
  /** Admin user ids. */
  admins: ReadonlySet<string>;
  alert: string;
  /** The bot's own user id; its messages are never persisted. */
  botUserId?: string;
}

export type DispatchOutcome =
  | "command"
  | "admin_denied"
  | "help"
  | "unfiltered"
  | "response"
  | "response_dropped"
  | "identity"
  | "ignored";

/** Routes one inbound RTM event to the handlers it concerns. */
export class EventDispatcher {
  constructor(private readonly deps: DispatcherDeps) {}

  async dispatch(event: RtmEvent): Promise<DispatchOutcome> {
    if (event.subtype !== "message_deleted") {
      logger.debug({ event }, "Got event");
    }

    const classified = classifyEvent(event);
    switch (classified.kind) {
      case "message":
        return this.handleMessage(classified.message);
      case "response":
        return this.handleResponse(classified.replyTo);
      case "group_join":
      case "channel_join":
        this.deps.ids.addChannel(classified.channel.name, classified.channel.id);
        logger.info({ channel: classified.channel }, "Joined channel");
        return "identity";
      case "team_join":
        this.deps.ids.addUser(classified.user.name, classified.user.id);
        logger.info({ user: classified.user }, "User joined team");
        return "identity";
      case "other":
        return "ignored";
    }
  }

  /** Executes an action tree against this connection. */
  async execute(root: ActionTree, event?: EventContext): Promise<number> {
    return executeActions(root, this.actionContext(event));
  }

  private actionContext(event?: EventContext): ActionContext {
    return {
      api: this.deps.api,
      outbound: this.deps.outbound,
      ids: this.deps.ids,
      history: this.deps.history,
      event,
    };
  }

  private async handleMessage(message: MessageEvent): Promise<DispatchOutcome> {
    const { grammar, registry, admins, alert } = this.deps;
    const { user, channel, text, ts } = message;
    const isDirect = isDirectMessageChannel(channel);
    const channelName = isDirect ? null : this.resolveChannelName(channel);
    const eventContext: EventContext = { channel, user, ts };

    if (isDirect || text.startsWith(alert)) {
      const result = grammar.match(text, isDirect);
      const handler = result.matched ? registry.lookupFiltered(result.name) : undefined;

      if (result.matched && handler) {
        if (!isDirect && !acceptsChannel(handler, channelName)) {
          logger.debug({ command: handler.name, channel: channelName }, "Command not allowed here");
          return "ignored";
        }
        if (handler.adminOnly && !admins.has(user)) {
          await this.execute(new MessageAction({ text: ADMIN_ONLY_REPLY }), eventContext);
          return "admin_denied";
        }
        const produced = await handler.callback({
          user,
          channel: channelName,
          args: result.args,
          ...(handler.wantsTimestamp && ts !== undefined ? { timestamp: ts } : {}),
        });
        await this.execute(produced, eventContext);
        return "command";
      }

      if (isDirect) {
        const help = registry.helpText(admins.has(user));
        await this.execute(new MessageAction({ text: help }), eventContext);
        return "help";
      }
    }

    if (isDirect || channelName === null) {
      return "ignored";
    }

    for (const handler of registry.unfilteredHandlers()) {
      if (!acceptsChannel(handler, channelName)) {
        continue;
      }
      const produced = await handler.callback({
        user,
        channel: channelName,
        text,
        ...(handler.wantsTimestamp && ts !== undefined ? { timestamp: ts } : {}),
      });
      await this.execute(produced, eventContext);
    }

    persistMessage(
      this.deps.history,
      { user, channelName, text, ts },
      { alert, botUserId: this.deps.botUserId },
    );
    return "unfiltered";
  }

  private async handleResponse(replyTo: number): Promise<DispatchOutcome> {
    const entry = this.deps.outbound.pending.take(replyTo);
    if (!entry) {
      return "response_dropped";
    }
    const produced = await entry.callback();
    await this.execute(produced, { channel: entry.channel });
    return "response";
  }

  private resolveChannelName(channelId: string): string {
    const name = this.deps.ids.channelName(channelId);
    if (name === undefined) {
      logger.warn({ channel: channelId }, "Message from unknown channel; using its id as name");
      return channelId;
    }
    return name;
  }
}
