export type ChatRole = "user" | "assistant";

export type ChatMessage = {
  role: ChatRole;
  text: string;
  createdAt: string;
};

export type TokenUsage = {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
};

export type ModelResult = {
  answer: string;
  reasoning: string | null;
  usage: TokenUsage | null;
  // Server-side tool calls (web search, code execution) behind the answer.
  toolsUsed: number;
};

export type StreamChunk = {
  answerText: string;
  reasoningText: string;
};
