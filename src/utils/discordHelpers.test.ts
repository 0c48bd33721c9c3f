import { describe, expect, test } from "vitest";
import { MessageFields, toChatEvent } from "./discordHelpers.js";

const base: MessageFields = {
  authorId: "111",
  authorName: "ann",
  guildId: null,
  content: "  hello  ",
};

describe("toChatEvent", () => {
  test("keys guild messages by guild and prefers the display name", () => {
    expect(toChatEvent({ ...base, guildId: "900", displayName: "Annie" }, false)).toEqual({
      chatId: "900",
      kind: "group",
      text: "hello",
      senderId: "111",
      senderName: "Annie",
    });
  });

  test("keys inbound direct messages by the author", () => {
    expect(toChatEvent(base, false)).toEqual({
      chatId: "111",
      kind: "private",
      text: "hello",
      senderId: "111",
      senderName: "ann",
    });
  });

  test("keys the bot's direct messages by the recipient", () => {
    const event = toChatEvent({ ...base, authorId: "42", authorName: "bot", dmRecipientId: "111" }, true);
    expect(event?.chatId).toBe("111");
    expect(event?.kind).toBe("private");
  });

  test("gives up on a bot direct message without a recipient", () => {
    expect(toChatEvent({ ...base, dmRecipientId: null }, true)).toBeNull();
  });

  test("falls back to the username for an empty display name", () => {
    expect(toChatEvent({ ...base, guildId: "900", displayName: "" }, false)?.senderName).toBe("ann");
  });
});
