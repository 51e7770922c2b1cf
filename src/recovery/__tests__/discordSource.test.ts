// src/recovery/__tests__/discordSource.test.ts

import { PageMessage, toRecoveredMessages } from "../discordSource";

const context = { channelId: "42", threadId: "t1" };
const at = new Date("2026-01-01T12:00:00.000Z");

function posted(id: string, authorId: string): PageMessage {
  return { id, createdAt: at, content: `text ${id}`, author: { id: authorId } };
}

describe("toRecoveredMessages", () => {
  it("should drop only the bot's own messages", () => {
    const page = [posted("1", "user-1"), posted("2", "self"), posted("3", "other-bot")];

    const recovered = toRecoveredMessages(page, "self", context);

    expect(recovered.map((message) => message.id)).toEqual(["1", "3"]);
    expect(recovered[1]).toEqual({
      id: "3",
      createdAt: at,
      authorId: "other-bot",
      content: "text 3",
      context,
    });
  });

  it("should keep everything before the bot user is known", () => {
    const recovered = toRecoveredMessages([posted("1", "self")], null, context);
    expect(recovered).toHaveLength(1);
  });
});
