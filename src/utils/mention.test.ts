import { describe, expect, it } from "vitest";
import { mentionToUserId, userIdToMention } from "./mention";

describe("mentions", () => {
  it("extracts the user id", () => {
    expect(mentionToUserId("<@U024BE7LH>")).toBe("U024BE7LH");
    expect(mentionToUserId(" <@U024BE7LH|ada> ")).toBe("U024BE7LH");
  });

  it("rejects anything that is not a mention", () => {
    expect(mentionToUserId("U024BE7LH")).toBeUndefined();
    expect(mentionToUserId("<#C024BE7LR>")).toBeUndefined();
  });

  it("formats a user id", () => {
    expect(userIdToMention("U024BE7LH")).toBe("<@U024BE7LH>");
  });
});
