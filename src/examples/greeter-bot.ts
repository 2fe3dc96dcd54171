import type { ActionTree } from "../actions/types";
import type { Bot } from "../handlers/bot";
import type { CommandInvocation, HandlerSpec, ListenerInvocation } from "../handlers/types";
import { HistoryAction } from "../actions/history";
import { MessageAction } from "../actions/message";
import { ReactAction } from "../actions/react";
import {
  capture,
  end,
  literal,
  mention,
  optional,
  rest,
  seq,
  userName,
  type Captures,
} from "../grammar/patterns";
import { userIdToMention } from "../utils/mention";

const THANKS_PATTERN = /\bthank(s| you)\b/i;

function captured(args: Captures, key: string): string | undefined {
  const value = args[key];
  return typeof value === "string" ? value : undefined;
}

/** Replies where the command came from: the channel, or the sender's DM. */
function reply(invocation: CommandInvocation, text: string): MessageAction {
  return new MessageAction({ channel: invocation.channel, user: invocation.user, text });
}

export class GreeterBot implements Bot {
  handlers(): HandlerSpec[] {
    return [
      {
        kind: "command",
        name: "greet",
        doc: "greet <name>: say hello to someone",
        pattern: seq(literal("greet"), capture("name", userName), end()),
        handle: (invocation) => this.greet(invocation),
      },
      {
        kind: "command",
        name: "shout",
        doc: "shout <text>: repeat the text loudly",
        pattern: seq(literal("shout"), rest("text")),
        adminOnly: true,
        handle: (invocation) => this.shout(invocation),
      },
      {
        kind: "command",
        name: "count",
        doc: "count [@user]: how many stored messages someone has here",
        pattern: seq(literal("count"), optional(mention("target")), end()),
        handle: (invocation) => this.count(invocation),
      },
      {
        kind: "listener",
        name: "thanks",
        handle: (invocation) => this.thanks(invocation),
      },
    ];
  }

  private greet(invocation: CommandInvocation): ActionTree {
    const name = captured(invocation.args, "name") ?? "there";
    return reply(invocation, `Hello, ${name}!`);
  }

  private shout(invocation: CommandInvocation): ActionTree {
    return reply(invocation, (captured(invocation.args, "text") ?? "").toUpperCase());
  }

  private count(invocation: CommandInvocation): ActionTree {
    const target = captured(invocation.args, "target") ?? invocation.user;
    return new HistoryAction({
      channel: invocation.channel ?? undefined,
      user: target,
      callback: (records) => {
        const where = invocation.channel ? ` in #${invocation.channel}` : "";
        return reply(
          invocation,
          `${userIdToMention(target)} has ${records.length} stored messages${where}.`,
        );
      },
    });
  }

  private thanks(invocation: ListenerInvocation): ActionTree {
    return THANKS_PATTERN.test(invocation.text) ? new ReactAction("+1") : null;
  }
}
