import stringWidth from "string-width";

export type CursorPosition = {
  row: number;
  col: number;
};

export type LaidOutText = {
  rows: string[];
  cursor: CursorPosition | null;
};

export function displayWidth(text: string): number {
  return stringWidth(text);
}

/**
 * Hard-wraps one line of plain text at `width` columns. When `cursorOffset` is given
 * (a UTF-16 offset into `text`), the cursor's row and column are returned with it; a
 * cursor sitting after a full row starts a new, empty row.
 */
export function layoutText(text: string, width: number, cursorOffset: number | null = null): LaidOutText {
  const maxWidth = Math.max(1, width);
  const rows: string[] = [];
  let row = "";
  let rowWidth = 0;
  let offset = 0;
  let cursor: CursorPosition | null = null;

  for (const char of text) {
    const charWidth = stringWidth(char);
    if (rowWidth > 0 && rowWidth + charWidth > maxWidth) {
      rows.push(row);
      row = "";
      rowWidth = 0;
    }
    if (cursorOffset === offset) {
      cursor = { row: rows.length, col: rowWidth };
    }
    row += char;
    rowWidth += charWidth;
    offset += char.length;
  }

  if (cursorOffset !== null && cursor === null) {
    if (rowWidth >= maxWidth) {
      rows.push(row);
      row = "";
      rowWidth = 0;
    }
    cursor = { row: rows.length, col: rowWidth };
  }
  rows.push(row);

  return { rows, cursor };
}

export function truncateToWidth(text: string, width: number): string {
  if (stringWidth(text) <= width) {
    return text;
  }
  if (width <= 0) {
    return "";
  }

  let result = "";
  let used = 0;
  for (const char of text) {
    const charWidth = stringWidth(char);
    if (used + charWidth > width - 1) {
      break;
    }
    result += char;
    used += charWidth;
  }
  return `${result}…`;
}
