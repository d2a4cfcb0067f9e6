import { NotATerminalError } from "../errors.js";

export interface RawModeInput {
  readonly isTTY?: boolean;
  readonly isRaw?: boolean;
  setRawMode?(mode: boolean): unknown;
}

export interface RawModeHandle {
  readonly active: boolean;
  release(): void;
}

/**
 * Switches `input` to raw mode. The returned handle puts back the raw flag that was
 * in effect before, and only the first `release()` call does anything.
 */
export function enterRawMode(input: RawModeInput): RawModeHandle {
  if (!input.isTTY || typeof input.setRawMode !== "function") {
    throw new NotATerminalError();
  }

  const previous = input.isRaw === true;
  input.setRawMode(true);

  let active = true;
  return {
    get active() {
      return active;
    },
    release() {
      if (!active) {
        return;
      }
      active = false;
      input.setRawMode?.(previous);
    },
  };
}

export async function withRawMode<T>(
  input: RawModeInput,
  body: (handle: RawModeHandle) => Promise<T>,
): Promise<T> {
  const handle = enterRawMode(input);
  try {
    return await body(handle);
  } finally {
    handle.release();
  }
}
