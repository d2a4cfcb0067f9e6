import { NONE, type Action } from "./actions.js";
import type { KeyEvent } from "./keys.js";
import { displayWidth, layoutText } from "./text.js";
import type { Theme } from "./theme.js";

export type EditorSnapshot = {
  readonly text: string;
  readonly cursor: number;
};

export type Frame = {
  lines: string[];
  cursorRow: number;
  cursorCol: number;
};

export const PROMPT = ">> ";
const PROMPT_WIDTH = displayWidth(PROMPT);
const WRAP_INDENT = " ".repeat(PROMPT_WIDTH);

export class LineEditor {
  private text = "";
  private cursor = 0;

  snapshot(): EditorSnapshot {
    return { text: this.text, cursor: this.cursor };
  }

  restore(snapshot: EditorSnapshot): void {
    this.text = snapshot.text;
    this.cursor = Math.min(Math.max(0, snapshot.cursor), snapshot.text.length);
  }

  handle(event: KeyEvent): Action {
    switch (event.kind) {
      case "char":
        this.insert(event.char);
        return NONE;
      case "slash":
        if (!this.text) {
          return { type: "enter_palette" };
        }
        this.insert("/");
        return NONE;
      case "ctrl_p":
        return { type: "enter_palette" };
      case "backspace":
        this.deleteBackward();
        return NONE;
      case "ctrl_j":
        this.insert("\n");
        return NONE;
      case "enter": {
        const text = this.text;
        this.clear();
        return text.trim() ? { type: "submit", text } : { type: "ignore" };
      }
      case "ctrl_c":
        this.clear();
        return { type: "cancel" };
      case "arrow_left":
        this.cursor -= previousCodePointLength(this.text, this.cursor);
        return NONE;
      case "arrow_right":
        this.cursor += nextCodePointLength(this.text, this.cursor);
        return NONE;
      case "arrow_up":
      case "arrow_down":
      case "escape":
      case "other":
        return NONE;
    }
  }

  view(width: number, theme: Theme): Frame {
    return renderPrompt(this.snapshot(), width, theme);
  }

  private insert(value: string): void {
    this.text = this.text.slice(0, this.cursor) + value + this.text.slice(this.cursor);
    this.cursor += value.length;
  }

  private deleteBackward(): void {
    const length = previousCodePointLength(this.text, this.cursor);
    if (length === 0) {
      return;
    }
    this.text = this.text.slice(0, this.cursor - length) + this.text.slice(this.cursor);
    this.cursor -= length;
  }

  private clear(): void {
    this.text = "";
    this.cursor = 0;
  }
}

/**
 * Lays out a prompt buffer as terminal rows: every logical line starts with the prompt,
 * rows wrapped at `width` continue under it with an indent.
 */
export function renderPrompt(snapshot: EditorSnapshot, width: number, theme: Theme): Frame {
  const contentWidth = Math.max(1, width - PROMPT_WIDTH);
  const lines: string[] = [];
  let cursorRow = 0;
  let cursorCol = PROMPT_WIDTH;
  let offset = 0;

  for (const line of snapshot.text.split("\n")) {
    const end = offset + line.length;
    const lineCursor = snapshot.cursor >= offset && snapshot.cursor <= end ? snapshot.cursor - offset : null;
    const laidOut = layoutText(line, contentWidth, lineCursor);
    if (laidOut.cursor) {
      cursorRow = lines.length + laidOut.cursor.row;
      cursorCol = PROMPT_WIDTH + laidOut.cursor.col;
    }
    laidOut.rows.forEach((row, index) => {
      lines.push(`${index === 0 ? theme.prompt(PROMPT) : WRAP_INDENT}${row}`);
    });
    offset = end + 1;
  }

  return { lines, cursorRow, cursorCol };
}

function previousCodePointLength(text: string, cursor: number): number {
  if (cursor <= 0) {
    return 0;
  }
  const low = text.charCodeAt(cursor - 1);
  const high = cursor >= 2 ? text.charCodeAt(cursor - 2) : 0;
  return isLowSurrogate(low) && isHighSurrogate(high) ? 2 : 1;
}

function nextCodePointLength(text: string, cursor: number): number {
  if (cursor >= text.length) {
    return 0;
  }
  const codePoint = text.codePointAt(cursor) ?? 0;
  return codePoint > 0xffff ? 2 : 1;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}
