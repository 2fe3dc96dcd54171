import { describe, expect, it } from "vitest";
import { literal } from "../grammar/patterns";
import { registerBot, type Bot } from "./bot";
import type { HandlerSpec } from "./types";

describe("registerBot", () => {
  it("registers every handler the bot declares, in order", () => {
    const bot: Bot = {
      handlers: () => [
        { kind: "command", name: "ping", pattern: literal("ping"), handle: () => null },
        { kind: "listener", name: "log", handle: () => null },
      ],
    };
    const registered: HandlerSpec[] = [];

    const count = registerBot({ registerHandler: (spec) => registered.push(spec) }, bot);

    expect(count).toBe(2);
    expect(registered.map((spec) => `${spec.kind}:${spec.name}`)).toEqual([
      "command:ping",
      "listener:log",
    ]);
  });
});
