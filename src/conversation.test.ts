import { describe, expect, it } from "vitest";
import { Conversation, createSessionId } from "./conversation.js";

describe("createSessionId", () => {
  it("formats local time", () => {
    expect(createSessionId(new Date(2024, 0, 5, 9, 3, 7))).toBe("session_20240105_090307");
  });
});

describe("Conversation", () => {
  const at = new Date(2024, 4, 1, 12, 0, 0);

  it("derives its session id from the creation time unless one is given", () => {
    expect(new Conversation({ model: "m", createdAt: at }).sessionId).toBe("session_20240501_120000");
    expect(new Conversation({ model: "m", sessionId: " saved ", createdAt: at }).sessionId).toBe("saved");
    expect(new Conversation({ model: "m", sessionId: "  ", createdAt: at }).sessionId).toBe("session_20240501_120000");
  });

  it("keeps messages in order and counts them", () => {
    const conversation = new Conversation({ model: "m", createdAt: at });
    expect(conversation.isEmpty).toBe(true);
    conversation.add("user", "Hello", at);
    conversation.add("assistant", "Hi there", at);
    conversation.add("user", "bye", at);

    expect(conversation.messages.map((message) => message.text)).toEqual(["Hello", "Hi there", "bye"]);
    expect(conversation.stats()).toEqual({ total: 3, user: 2, assistant: 1, characters: 16 });
  });

  it("removes one message by identity", () => {
    const conversation = new Conversation({ model: "m", createdAt: at });
    conversation.add("user", "same", at);
    const second = conversation.add("user", "same", at);
    conversation.remove(second);
    expect(conversation.messages).toHaveLength(1);
  });

  it("searches case-insensitively", () => {
    const conversation = new Conversation({ model: "m", createdAt: at });
    conversation.add("user", "Tell me about Rust", at);
    conversation.add("assistant", "rust is a language", at);

    expect(conversation.search("RUST")).toHaveLength(2);
    expect(conversation.search("about").map((message) => message.role)).toEqual(["user"]);
    expect(conversation.search("")).toEqual([]);
  });

  it("copies replaced messages and clears", () => {
    const conversation = new Conversation({ model: "m", createdAt: at });
    const source = [{ role: "user" as const, text: "a", createdAt: at.toISOString() }];
    conversation.replaceMessages(source);
    expect(conversation.messages[0]).toEqual(source[0]);
    expect(conversation.messages[0]).not.toBe(source[0]);

    conversation.clear();
    expect(conversation.isEmpty).toBe(true);
  });
});
