export type TermchatErrorCode =
  | "not_a_terminal"
  | "output_write_failure"
  | "config_invalid"
  | "conversation_invalid";

export class TermchatError extends Error {
  readonly code: TermchatErrorCode;

  constructor(code: TermchatErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TermchatError";
    this.code = code;
  }
}

export class NotATerminalError extends TermchatError {
  constructor(message = "stdin is not an interactive terminal.") {
    super("not_a_terminal", message);
    this.name = "NotATerminalError";
  }
}

export class OutputWriteFailureError extends TermchatError {
  constructor(cause: unknown) {
    super("output_write_failure", `terminal output failed: ${summarizeError(cause)}`, { cause });
    this.name = "OutputWriteFailureError";
  }
}

export class ConfigError extends TermchatError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("config_invalid", message, options);
    this.name = "ConfigError";
  }
}

export class ConversationFormatError extends TermchatError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("conversation_invalid", message, options);
    this.name = "ConversationFormatError";
  }
}

export function createAbortError(message = "Request interrupted by user."): Error {
  const error = new Error(message);
  error.name = "AbortError";
  return error;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

export function assertNotAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw createAbortError();
  }
}

export function summarizeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === "string") {
    return error;
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}
