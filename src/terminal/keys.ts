import { StringDecoder } from "node:string_decoder";
import { createAbortError } from "../errors.js";
import type { Logger } from "../logger.js";

export type KeyEvent =
  | { kind: "char"; char: string }
  | { kind: "enter" }
  | { kind: "backspace" }
  | { kind: "arrow_up" }
  | { kind: "arrow_down" }
  | { kind: "arrow_left" }
  | { kind: "arrow_right" }
  | { kind: "ctrl_c" }
  | { kind: "ctrl_j" }
  | { kind: "ctrl_p" }
  | { kind: "escape" }
  | { kind: "slash" }
  | { kind: "other"; raw: string };

export type DecodedKey = {
  event: KeyEvent;
  length: number;
  malformed?: boolean;
};

const ESC = "\x1b";
// Longest CSI we wait for; anything longer is a stuck or garbage sequence.
const MAX_CSI_LENGTH = 32;

const ARROW_BY_FINAL: Record<string, KeyEvent> = {
  A: { kind: "arrow_up" },
  B: { kind: "arrow_down" },
  C: { kind: "arrow_right" },
  D: { kind: "arrow_left" },
};

const SINGLE_BYTE_KEYS: Record<string, KeyEvent> = {
  "\r": { kind: "enter" },
  "\n": { kind: "ctrl_j" },
  "\x7f": { kind: "backspace" },
  "\b": { kind: "backspace" },
  "\x03": { kind: "ctrl_c" },
  "\x10": { kind: "ctrl_p" },
  "/": { kind: "slash" },
};

/**
 * Decodes one key from the start of `input`.
 *
 * Returns null only when `input` is an unfinished escape sequence and more bytes may
 * still arrive; with `final` set, whatever is pending is resolved to a key.
 */
export function decodeKey(input: string, final: boolean): DecodedKey | null {
  if (!input) {
    return null;
  }

  const head = input.charAt(0);
  if (head === ESC) {
    return decodeEscape(input, final);
  }

  const single = SINGLE_BYTE_KEYS[head];
  if (single) {
    return { event: single, length: 1 };
  }

  const codePoint = input.codePointAt(0) ?? 0;
  if (codePoint < 0x20) {
    return { event: { kind: "other", raw: head }, length: 1 };
  }

  const char = String.fromCodePoint(codePoint);
  return { event: { kind: "char", char }, length: char.length };
}

function decodeEscape(input: string, final: boolean): DecodedKey | null {
  if (input.length === 1) {
    return final ? { event: { kind: "escape" }, length: 1 } : null;
  }

  const introducer = input.charAt(1);
  if (introducer === "[") {
    return decodeCsi(input, final);
  }

  if (introducer === "O") {
    if (input.length < 3) {
      return final ? malformed(input.slice(0, 2)) : null;
    }
    const arrow = ARROW_BY_FINAL[input.charAt(2)];
    return arrow ? { event: arrow, length: 3 } : { event: { kind: "other", raw: input.slice(0, 3) }, length: 3 };
  }

  // ESC followed by an ordinary byte: the escape key, then that byte on the next read.
  return { event: { kind: "escape" }, length: 1 };
}

function decodeCsi(input: string, final: boolean): DecodedKey | null {
  for (let index = 2; index < input.length; index += 1) {
    const code = input.charCodeAt(index);
    if (code >= 0x20 && code <= 0x3f) {
      if (index + 1 >= MAX_CSI_LENGTH) {
        return malformed(input.slice(0, index + 1));
      }
      continue;
    }
    if (code >= 0x40 && code <= 0x7e) {
      const sequence = input.slice(0, index + 1);
      const arrow = ARROW_BY_FINAL[input.charAt(index)];
      return arrow
        ? { event: arrow, length: sequence.length }
        : { event: { kind: "other", raw: sequence }, length: sequence.length };
    }
    return malformed(input.slice(0, index));
  }

  return final ? malformed(input) : null;
}

function malformed(raw: string): DecodedKey {
  return { event: { kind: "other", raw }, length: raw.length, malformed: true };
}

export interface KeyInputStream {
  on(event: "data", listener: (chunk: Buffer | string) => void): unknown;
  off(event: "data", listener: (chunk: Buffer | string) => void): unknown;
  resume(): unknown;
  pause(): unknown;
}

export type KeyDecoderOptions = {
  escapeTimeoutMs: number;
  logger?: Logger;
};

type Waiter = {
  wake: () => void;
  fail: (error: Error) => void;
};

export class KeyDecoder {
  private readonly input: KeyInputStream;
  private readonly options: KeyDecoderOptions;
  private readonly utf8 = new StringDecoder("utf8");
  private buffered = "";
  private pendingSince: number | null = null;
  private waiter: Waiter | null = null;
  private failure: Error | null = null;
  private reading = false;

  private readonly onData = (chunk: Buffer | string): void => {
    this.buffered += typeof chunk === "string" ? chunk : this.utf8.write(chunk);
    this.waiter?.wake();
  };

  constructor(input: KeyInputStream, options: KeyDecoderOptions) {
    this.input = input;
    this.options = options;
    input.on("data", this.onData);
    input.resume();
  }

  async next(signal?: AbortSignal): Promise<KeyEvent> {
    if (this.reading) {
      throw new Error("KeyDecoder.next called while another read is pending.");
    }
    this.reading = true;
    try {
      return await this.readEvent(signal);
    } finally {
      this.reading = false;
    }
  }

  fail(error: Error): void {
    if (!this.failure) {
      this.failure = error;
    }
    this.waiter?.fail(error);
  }

  dispose(): void {
    this.input.off("data", this.onData);
    this.input.pause();
    this.fail(createAbortError("Key decoder closed."));
  }

  private async readEvent(signal?: AbortSignal): Promise<KeyEvent> {
    while (true) {
      this.throwIfUnavailable(signal);

      if (!this.buffered) {
        await this.waitForInput(null, signal);
        continue;
      }

      const decoded = decodeKey(this.buffered, false);
      if (decoded) {
        return this.consume(decoded);
      }

      this.pendingSince ??= Date.now();
      const remaining = this.pendingSince + this.options.escapeTimeoutMs - Date.now();
      if (remaining > 0 && (await this.waitForInput(remaining, signal))) {
        continue;
      }

      const forced = decodeKey(this.buffered, true) ?? malformed(this.buffered);
      return this.consume(forced);
    }
  }

  private consume(decoded: DecodedKey): KeyEvent {
    const raw = this.buffered.slice(0, decoded.length);
    this.buffered = this.buffered.slice(decoded.length);
    this.pendingSince = null;
    if (decoded.malformed) {
      this.options.logger?.debug({ raw: JSON.stringify(raw) }, "malformed escape sequence");
    }
    return decoded.event;
  }

  private throwIfUnavailable(signal?: AbortSignal): void {
    if (this.failure) {
      throw this.failure;
    }
    if (signal?.aborted) {
      throw createAbortError("Key read cancelled.");
    }
  }

  // Resolves true when input arrives, false when the deadline passes first.
  private waitForInput(timeoutMs: number | null, signal?: AbortSignal): Promise<boolean> {
    return new Promise<boolean>((resolve, reject) => {
      let timer: NodeJS.Timeout | null = null;
      const cleanup = () => {
        if (timer) {
          clearTimeout(timer);
        }
        this.waiter = null;
        signal?.removeEventListener("abort", onAbort);
      };
      const onAbort = () => {
        cleanup();
        reject(createAbortError("Key read cancelled."));
      };

      this.waiter = {
        wake: () => {
          cleanup();
          resolve(true);
        },
        fail: (error) => {
          cleanup();
          reject(error);
        },
      };
      if (timeoutMs !== null) {
        timer = setTimeout(() => {
          cleanup();
          resolve(false);
        }, timeoutMs);
      }
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}
