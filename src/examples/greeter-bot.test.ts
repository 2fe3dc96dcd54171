import { describe, expect, it } from "vitest";
import { HistoryAction } from "../actions/history";
import { MessageAction } from "../actions/message";
import { ReactAction } from "../actions/react";
import type { ActionTree } from "../actions/types";
import { CommandGrammar } from "../grammar/grammar";
import type { CommandSpec, HandlerSpec, ListenerSpec } from "../handlers/types";
import { GreeterBot } from "./greeter-bot";

function specs(): HandlerSpec[] {
  return new GreeterBot().handlers();
}

function command(name: string): CommandSpec {
  const spec = specs().find((candidate) => candidate.name === name);
  if (spec?.kind !== "command") {
    throw new Error(`no command ${name}`);
  }
  return spec;
}

function listener(name: string): ListenerSpec {
  const spec = specs().find((candidate) => candidate.name === name);
  if (spec?.kind !== "listener") {
    throw new Error(`no listener ${name}`);
  }
  return spec;
}

async function resolve(tree: ActionTree | Promise<ActionTree>): Promise<ActionTree> {
  return tree;
}

describe("GreeterBot", () => {
  it("parses its commands", () => {
    const grammar = new CommandGrammar("!");
    for (const spec of specs()) {
      if (spec.kind === "command") {
        grammar.add(spec.pattern, spec.name, spec.priority);
      }
    }

    expect(grammar.match("!greet ada")).toEqual({
      matched: true,
      name: "greet",
      args: { name: "ada" },
    });
    expect(grammar.match("!shout make some noise")).toEqual({
      matched: true,
      name: "shout",
      args: { text: "make some noise" },
    });
    expect(grammar.match("count <@U00000001>", true)).toEqual({
      matched: true,
      name: "count",
      args: { target: "U00000001" },
    });
    expect(grammar.match("!count")).toEqual({ matched: true, name: "count", args: {} });
    expect(grammar.match("!greet")).toEqual({ matched: false });
  });

  it("greets by name where it was asked", async () => {
    const result = await resolve(
      command("greet").handle({ user: "U00000001", channel: "general", args: { name: "bob" } }),
    );

    expect(result).toBeInstanceOf(MessageAction);
    if (result instanceof MessageAction) {
      expect([result.channel, result.user, result.text]).toEqual([
        "general",
        "U00000001",
        "Hello, bob!",
      ]);
    }
  });

  it("shouts for admins only", async () => {
    const spec = command("shout");
    const result = await resolve(
      spec.handle({ user: "U00000001", channel: null, args: { text: "quiet please" } }),
    );

    expect(spec.adminOnly).toBe(true);
    expect(result instanceof MessageAction ? result.text : undefined).toBe("QUIET PLEASE");
  });

  it("counts stored messages through history", async () => {
    const result = await resolve(
      command("count").handle({ user: "U00000001", channel: "general", args: {} }),
    );

    expect(result).toBeInstanceOf(HistoryAction);
  });

  it("reacts to thanks", async () => {
    const handle = listener("thanks").handle;

    expect(
      await resolve(handle({ user: "U00000001", channel: "general", text: "Thanks a lot!" })),
    ).toBeInstanceOf(ReactAction);
    expect(
      await resolve(handle({ user: "U00000001", channel: "general", text: "thankless job" })),
    ).toBeNull();
  });
});
