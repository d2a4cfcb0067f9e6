import type { ChatMessage, ChatRole } from "./chat-types.js";

export type ConversationStats = {
  total: number;
  user: number;
  assistant: number;
  characters: number;
};

export class Conversation {
  readonly sessionId: string;
  readonly createdAt: string;
  model: string;
  private entries: ChatMessage[] = [];

  constructor(params: { model: string; sessionId?: string; createdAt?: Date }) {
    const createdAt = params.createdAt ?? new Date();
    this.sessionId = params.sessionId?.trim() || createSessionId(createdAt);
    this.createdAt = createdAt.toISOString();
    this.model = params.model;
  }

  get messages(): readonly ChatMessage[] {
    return this.entries;
  }

  get isEmpty(): boolean {
    return this.entries.length === 0;
  }

  add(role: ChatRole, text: string, at: Date = new Date()): ChatMessage {
    const message: ChatMessage = { role, text, createdAt: at.toISOString() };
    this.entries.push(message);
    return message;
  }

  remove(message: ChatMessage): void {
    this.entries = this.entries.filter((entry) => entry !== message);
  }

  replaceMessages(messages: readonly ChatMessage[]): void {
    this.entries = messages.map((message) => ({ ...message }));
  }

  clear(): void {
    this.entries = [];
  }

  stats(): ConversationStats {
    let user = 0;
    let characters = 0;
    for (const message of this.entries) {
      if (message.role === "user") {
        user += 1;
      }
      characters += message.text.length;
    }
    return {
      total: this.entries.length,
      user,
      assistant: this.entries.length - user,
      characters,
    };
  }

  /** Case-insensitive substring match; an empty query matches nothing. */
  search(query: string): ChatMessage[] {
    if (!query) {
      return [];
    }
    const needle = query.toLowerCase();
    return this.entries.filter((message) => message.text.toLowerCase().includes(needle));
  }
}

/** `session_YYYYMMDD_HHMMSS` in local time. */
export function createSessionId(at: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  const date = `${at.getFullYear()}${pad(at.getMonth() + 1)}${pad(at.getDate())}`;
  const time = `${pad(at.getHours())}${pad(at.getMinutes())}${pad(at.getSeconds())}`;
  return `session_${date}_${time}`;
}
