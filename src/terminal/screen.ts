import { OutputWriteFailureError } from "../errors.js";
import { displayWidth } from "./text.js";

export interface TerminalOutput {
  write(chunk: string): unknown;
  readonly columns?: number;
}

export type RenderState = {
  readonly lines: readonly string[];
  readonly allocatedRows: number;
  readonly cursorRow: number;
  readonly cursorCol: number;
};

const CSI = "\x1b[";
const ERASE_TO_END = `${CSI}K`;
const ERASE_LINE = `${CSI}2K`;
const DEFAULT_COLUMNS = 80;

/**
 * Draws a block of lines that starts on the row the cursor was on when the renderer
 * was created (or last committed). Rows are addressed relative to that top row, and
 * the cursor position is tracked from the sequences written here, so only rows that
 * changed are rewritten.
 */
export class ScreenRenderer {
  private readonly output: TerminalOutput;
  private lines: string[] = [];
  private allocatedRows = 1;
  private cursorRow = 0;
  private cursorCol = 0;

  constructor(output: TerminalOutput) {
    this.output = output;
  }

  get columns(): number {
    const columns = this.output.columns;
    return typeof columns === "number" && columns > 0 ? columns : DEFAULT_COLUMNS;
  }

  get state(): RenderState {
    return {
      lines: [...this.lines],
      allocatedRows: this.allocatedRows,
      cursorRow: this.cursorRow,
      cursorCol: this.cursorCol,
    };
  }

  redrawLine(content: string, cursorCol: number): void {
    this.redrawBlock([content], 0, cursorCol);
  }

  redrawBlock(lines: readonly string[], cursorRow: number, cursorCol: number): void {
    let out = "";
    const rowCount = Math.max(lines.length, this.lines.length);
    for (let row = 0; row < rowCount; row += 1) {
      const next = lines[row];
      if (next === this.lines[row]) {
        continue;
      }
      out += this.moveToRow(row);
      if (next === undefined) {
        out += `\r${ERASE_LINE}`;
        this.cursorCol = 0;
      } else {
        out += `\r${next}${ERASE_TO_END}`;
        this.cursorCol = displayWidth(next);
      }
    }

    const targetRow = Math.min(Math.max(0, cursorRow), Math.max(0, lines.length - 1));
    out += this.moveToRow(targetRow);
    out += this.moveToCol(Math.max(0, cursorCol));
    this.lines = [...lines];
    this.emit(out);
  }

  /** Erases the last `lineCount` drawn lines and forgets them. */
  clearBlock(lineCount: number): void {
    const count = Math.min(Math.max(0, lineCount), this.lines.length);
    if (count === 0) {
      return;
    }

    const keep = this.lines.length - count;
    const savedRow = this.cursorRow;
    const savedCol = this.cursorCol;
    let out = "";
    for (let row = keep; row < this.lines.length; row += 1) {
      out += this.moveToRow(row);
      out += `\r${ERASE_LINE}`;
      this.cursorCol = 0;
    }
    this.lines = this.lines.slice(0, keep);

    const targetRow = Math.min(savedRow, Math.max(0, keep - 1));
    out += this.moveToRow(targetRow);
    out += this.moveToCol(targetRow === savedRow ? savedCol : 0);
    this.emit(out);
  }

  /**
   * Leaves the block: the cursor moves to the start of the row below it and the
   * renderer starts a fresh block there, so other output can be printed in between.
   */
  commit(): void {
    this.emit(this.moveToRow(this.lines.length) + this.moveToCol(0));
    this.lines = [];
    this.allocatedRows = 1;
    this.cursorRow = 0;
    this.cursorCol = 0;
  }

  // Output printed between blocks; callers commit first.
  write(text: string): void {
    this.emit(text);
  }

  private moveToRow(row: number): string {
    let out = "";
    if (row >= this.allocatedRows) {
      const toLastRow = this.allocatedRows - 1 - this.cursorRow;
      if (toLastRow > 0) {
        out += `${CSI}${toLastRow}B`;
      }
      // Newlines scroll the screen when the block reaches the bottom; cursor-down does not.
      out += "\r\n".repeat(row - this.allocatedRows + 1);
      this.allocatedRows = row + 1;
      this.cursorRow = row;
      this.cursorCol = 0;
      return out;
    }

    if (row > this.cursorRow) {
      out += `${CSI}${row - this.cursorRow}B`;
    } else if (row < this.cursorRow) {
      out += `${CSI}${this.cursorRow - row}A`;
    }
    this.cursorRow = row;
    return out;
  }

  private moveToCol(col: number): string {
    if (col === this.cursorCol) {
      return "";
    }
    this.cursorCol = col;
    return `${CSI}${col + 1}G`;
  }

  private emit(out: string): void {
    if (!out) {
      return;
    }
    try {
      this.output.write(out);
    } catch (error) {
      throw new OutputWriteFailureError(error);
    }
  }
}
