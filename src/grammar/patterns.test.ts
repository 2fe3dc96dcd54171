import { describe, expect, it } from "vitest";
import {
  capture,
  channelName,
  commaList,
  emoji,
  end,
  flag,
  flagWithArg,
  integer,
  literal,
  mention,
  message,
  oneOf,
  oneOrMore,
  optional,
  rest,
  seq,
  word,
} from "./patterns";

function parseAll(pattern: ReturnType<typeof seq>, input: string) {
  return pattern.parse(input, 0);
}

describe("patterns", () => {
  it("matches literals case-insensitively on a word boundary", () => {
    const greet = literal("greet");
    expect(greet.parse("GREET", 0)).toEqual({ end: 5, captures: {} });
    expect(greet.parse("  greet", 0)).toEqual({ end: 7, captures: {} });
    expect(greet.parse("greeting", 0)).toBeNull();
  });

  it("captures trimmed text for a named sub-pattern", () => {
    const pattern = seq(literal("move"), capture("from", channelName), capture("to", channelName));
    expect(parseAll(pattern, "move general  off-topic")?.captures).toEqual({
      from: "general",
      to: "off-topic",
    });
  });

  it("treats optional parts as present or absent", () => {
    const pattern = seq(literal("hello"), optional(capture("who", word())), end());
    expect(pattern.parse("hello", 0)?.captures).toEqual({});
    expect(pattern.parse("hello bob", 0)?.captures).toEqual({ who: "bob" });
    expect(pattern.parse("hello bob alice", 0)).toBeNull();
  });

  it("collects repeated captures into arrays", () => {
    const pattern = seq(literal("add"), oneOrMore(capture("n", integer)));
    expect(pattern.parse("add 1 2 30", 0)?.captures).toEqual({ n: ["1", "2", "30"] });
  });

  it("takes the remainder of the input with rest", () => {
    const pattern = seq(literal("say"), rest("text"));
    expect(pattern.parse("say hello there, friend ", 0)?.captures).toEqual({
      text: "hello there, friend",
    });
    expect(pattern.parse("say   ", 0)).toBeNull();
  });

  it("recognises emoji, mentions and messages", () => {
    expect(capture("e", emoji).parse(":tada: now", 0)?.captures).toEqual({ e: ":tada:" });
    expect(mention("user").parse("<@U12345678>", 0)?.captures).toEqual({ user: "U12345678" });
    expect(mention("user").parse("<@someone>", 0)).toBeNull();
    expect(capture("m", message).parse("release #42 today", 0)?.captures).toEqual({
      m: "release #42 today",
    });
  });

  it("splits comma lists with quoted items", () => {
    const pattern = commaList("items");
    expect(pattern.parse('one, "two, three", ‘four’', 0)?.captures).toEqual({
      items: ["one", "two, three", "four"],
    });
  });

  it("parses flags with and without arguments", () => {
    const pattern = seq(
      literal("purge"),
      optional(flag("all")),
      optional(flagWithArg("n", integer)),
    );
    expect(pattern.parse("purge --all -n 5", 0)?.captures).toEqual({ all: "--all", n: "5" });
    expect(pattern.parse("purge -n 7", 0)?.captures).toEqual({ n: "7" });
  });

  it("returns the first matching alternative", () => {
    const pattern = oneOf(capture("num", integer), capture("word", word()));
    expect(pattern.parse("12", 0)?.captures).toEqual({ num: "12" });
    expect(pattern.parse("abc", 0)?.captures).toEqual({ word: "abc" });
  });
});
