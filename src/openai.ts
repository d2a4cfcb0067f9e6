import OpenAI, { APIConnectionError, APIError } from "openai";
import type {
  ChatCompletion,
  ChatCompletionChunk,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionCreateParamsStreaming,
  ChatCompletionMessageParam,
} from "openai/resources/chat/completions";
import { z } from "zod";
import type { ChatMessage, ModelResult, StreamChunk, TokenUsage } from "./chat-types.js";
import type { ReasoningEffort, TermchatConfig } from "./config.js";
import { assertNotAborted, createAbortError, isAbortError, summarizeError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { describeModel } from "./models.js";

export type ChatCompletionRequest = {
  model: string;
  messages: readonly ChatMessage[];
  systemInstruction?: string;
  signal?: AbortSignal;
};

export type ChatClientConfig = Pick<
  TermchatConfig,
  | "apiKey"
  | "baseUrl"
  | "systemInstruction"
  | "maxTokens"
  | "temperature"
  | "reasoningEffort"
  | "includeReasoning"
  | "retryAttempts"
  | "timeoutMs"
>;

// Request fields the Groq endpoint accepts on top of the OpenAI schema.
type GroqExtras = {
  reasoning_effort?: ReasoningEffort;
  include_reasoning?: boolean;
};

export type StreamingBody = ChatCompletionCreateParamsStreaming & GroqExtras;
export type NonStreamingBody = ChatCompletionCreateParamsNonStreaming & GroqExtras;

export type TransportOptions = {
  signal?: AbortSignal;
};

/** The two chat-completions calls the client makes; the default one goes through the `openai` SDK. */
export interface CompletionTransport {
  stream(body: StreamingBody, options: TransportOptions): Promise<AsyncIterable<ChatCompletionChunk>>;
  create(body: NonStreamingBody, options: TransportOptions): Promise<ChatCompletion>;
}

export interface ChatClient {
  runChatCompletionStream(request: ChatCompletionRequest, onChunk?: (chunk: StreamChunk) => void): Promise<ModelResult>;
}

export type ChatClientDeps = {
  transport?: CompletionTransport;
  retryBaseDelayMs?: number;
  logger?: Logger;
};

const RETRY_BASE_DELAY_MS = 1_000;
const RETRY_MAX_DELAY_MS = 20_000;

const usageSchema = z.object({
  prompt_tokens: z.number(),
  completion_tokens: z.number(),
  total_tokens: z.number(),
});
const groqChunkSchema = z.object({ x_groq: z.object({ usage: usageSchema }) });
const reasoningSchema = z.object({ reasoning: z.string() });
const executedToolsSchema = z.object({ executed_tools: z.array(z.unknown()) });

export function createOpenAiTransport(config: Pick<ChatClientConfig, "apiKey" | "baseUrl" | "timeoutMs">): CompletionTransport {
  let client: OpenAI | null = null;
  const getClient = (): OpenAI => {
    if (!client) {
      const apiKey = config.apiKey.trim();
      if (!apiKey) {
        throw new Error("Missing API key. Set GROQ_API_KEY or TERMCHAT_API_KEY, or add apiKey to config.json.");
      }
      // Retries are handled here, so the SDK's own retry loop stays off.
      client = new OpenAI({ apiKey, baseURL: config.baseUrl, timeout: config.timeoutMs, maxRetries: 0 });
    }
    return client;
  };

  return {
    stream: (body, options) => getClient().chat.completions.create(body, { signal: options.signal }),
    create: (body, options) => getClient().chat.completions.create(body, { signal: options.signal }),
  };
}

export function createChatClient(config: ChatClientConfig, deps: ChatClientDeps = {}): ChatClient {
  const transport = deps.transport ?? createOpenAiTransport(config);
  const retryBaseDelayMs = deps.retryBaseDelayMs ?? RETRY_BASE_DELAY_MS;
  const logger = deps.logger ?? createLogger("chat-client");

  return {
    async runChatCompletionStream(request, onChunk) {
      const model = describeModel(request.model);
      const messages = buildMessages(request, config.systemInstruction);
      const base = {
        model: model.id,
        messages,
        temperature: config.temperature,
        max_completion_tokens: Math.min(config.maxTokens, model.maxTokens),
        top_p: 1,
      };
      const extras: GroqExtras = model.supportsReasoning
        ? { reasoning_effort: config.reasoningEffort, include_reasoning: config.includeReasoning }
        : {};

      let attempt = 0;
      while (true) {
        assertNotAborted(request.signal);
        attempt += 1;
        let emitted = false;
        const forward = (chunk: StreamChunk) => {
          emitted = true;
          onChunk?.(chunk);
        };

        try {
          const startedAt = Date.now();
          const result = model.supportsStreaming
            ? await streamCompletion(transport, { ...base, ...extras, stream: true }, request.signal, forward)
            : await completeOnce(transport, { ...base, ...extras, stream: false }, request.signal, forward);
          logger.info(
            {
              model: model.id,
              attempt,
              durationMs: Date.now() - startedAt,
              answerLength: result.answer.length,
              usage: result.usage,
              toolsUsed: result.toolsUsed,
            },
            "completion finished",
          );
          return result;
        } catch (error) {
          if (request.signal?.aborted || isAbortError(error)) {
            throw createAbortError();
          }
          // Output already shown cannot be taken back, so only clean failures are retried.
          if (emitted || !isRetryableError(error) || attempt >= config.retryAttempts) {
            throw error;
          }

          const delayMs = computeRetryDelayMs(attempt, retryBaseDelayMs);
          logger.warn(
            { model: model.id, attempt, maxAttempts: config.retryAttempts, delayMs, error: summarizeError(error) },
            "retrying completion",
          );
          await sleep(delayMs, request.signal);
        }
      }
    },
  };
}

function buildMessages(request: ChatCompletionRequest, fallbackInstruction: string): ChatCompletionMessageParam[] {
  const systemInstruction = request.systemInstruction?.trim() || fallbackInstruction.trim();
  const messages: ChatCompletionMessageParam[] = [];
  if (systemInstruction) {
    messages.push({ role: "system", content: systemInstruction });
  }
  for (const message of request.messages) {
    messages.push({ role: message.role, content: message.text });
  }
  return messages;
}

async function streamCompletion(
  transport: CompletionTransport,
  body: StreamingBody,
  signal: AbortSignal | undefined,
  onChunk: (chunk: StreamChunk) => void,
): Promise<ModelResult> {
  const stream = await transport.stream(body, { signal });
  let answer = "";
  let reasoning = "";
  let usage: TokenUsage | null = null;

  for await (const chunk of stream) {
    assertNotAborted(signal);
    const delta = chunk.choices[0]?.delta;
    const answerText = delta?.content ?? "";
    const reasoningText = readReasoning(delta);
    if (answerText || reasoningText) {
      answer += answerText;
      reasoning += reasoningText;
      onChunk({ answerText, reasoningText });
    }
    usage = readUsage(chunk) ?? usage;
  }

  return { answer, reasoning: reasoning || null, usage, toolsUsed: 0 };
}

async function completeOnce(
  transport: CompletionTransport,
  body: NonStreamingBody,
  signal: AbortSignal | undefined,
  onChunk: (chunk: StreamChunk) => void,
): Promise<ModelResult> {
  const response = await transport.create(body, { signal });
  assertNotAborted(signal);
  const message = response.choices[0]?.message;
  const answer = message?.content ?? "";
  const reasoning = readReasoning(message);
  if (answer || reasoning) {
    onChunk({ answerText: answer, reasoningText: reasoning });
  }
  const tools = executedToolsSchema.safeParse(message);
  return {
    answer,
    reasoning: reasoning || null,
    usage: readUsage(response),
    toolsUsed: tools.success ? tools.data.executed_tools.length : 0,
  };
}

function readReasoning(value: unknown): string {
  const parsed = reasoningSchema.safeParse(value);
  return parsed.success ? parsed.data.reasoning : "";
}

function readUsage(value: ChatCompletionChunk | ChatCompletion): TokenUsage | null {
  const direct = usageSchema.safeParse(value.usage);
  const groq = groqChunkSchema.safeParse(value);
  const usage = direct.success ? direct.data : groq.success ? groq.data.x_groq.usage : null;
  if (!usage) {
    return null;
  }
  return {
    promptTokens: usage.prompt_tokens,
    completionTokens: usage.completion_tokens,
    totalTokens: usage.total_tokens,
  };
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof APIConnectionError) {
    return true;
  }
  if (error instanceof APIError && error.status === 429) {
    return true;
  }

  const text = summarizeError(error).toLowerCase();
  return (
    text.includes("too many requests") ||
    text.includes("rate limit") ||
    text.includes("\"status\":429") ||
    text.includes("econnreset") ||
    text.includes("socket hang up")
  );
}

export function computeRetryDelayMs(attempt: number, baseDelayMs = RETRY_BASE_DELAY_MS): number {
  const exponential = baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
  const capped = Math.min(RETRY_MAX_DELAY_MS, exponential);
  const jitter = Math.floor(Math.random() * (baseDelayMs / 2));
  return Math.floor(capped + jitter);
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  assertNotAborted(signal);
  return new Promise((resolve, reject) => {
    const handle = setTimeout(() => {
      cleanup();
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(handle);
      cleanup();
      reject(createAbortError());
    };
    const cleanup = () => {
      signal?.removeEventListener("abort", onAbort);
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
