import { NONE, type Action, type PaletteCommand } from "./actions.js";
import type { KeyEvent } from "./keys.js";
import type { EditorSnapshot } from "./line-editor.js";
import { displayWidth, truncateToWidth } from "./text.js";
import type { Theme } from "./theme.js";

export type PaletteState = {
  readonly commands: readonly PaletteCommand[];
  readonly filter: string;
  readonly matches: readonly PaletteCommand[];
  readonly selectedIndex: number;
  // Editor contents to put back when the palette closes.
  readonly restore: EditorSnapshot;
};

export type PaletteTransition = {
  // null once the palette has closed.
  state: PaletteState | null;
  action: Action;
};

export type PaletteView = {
  lines: string[];
  cursorCol: number;
};

const SELECTED_MARKER = "► ";
const UNSELECTED_MARKER = "  ";

/**
 * Case-insensitive substring match on command names. Names starting with the filter
 * come first; within each group the declared order is kept.
 */
export function filterCommands(commands: readonly PaletteCommand[], filter: string): PaletteCommand[] {
  const needle = filter.toLowerCase();
  if (!needle) {
    return [...commands];
  }

  const prefixed: PaletteCommand[] = [];
  const containing: PaletteCommand[] = [];
  for (const command of commands) {
    const name = command.name.toLowerCase();
    if (name.startsWith(needle)) {
      prefixed.push(command);
    } else if (name.includes(needle)) {
      containing.push(command);
    }
  }
  return [...prefixed, ...containing];
}

export function openPalette(commands: readonly PaletteCommand[], restore: EditorSnapshot): PaletteState {
  return {
    commands,
    filter: "",
    matches: filterCommands(commands, ""),
    selectedIndex: 0,
    restore,
  };
}

export function handlePaletteKey(state: PaletteState, event: KeyEvent): PaletteTransition {
  switch (event.kind) {
    case "char":
      return { state: withFilter(state, state.filter + event.char), action: NONE };
    case "slash":
      return { state: withFilter(state, `${state.filter}/`), action: NONE };
    case "backspace":
      if (!state.filter) {
        return { state: null, action: { type: "cancel_palette" } };
      }
      return { state: withFilter(state, dropLastCodePoint(state.filter)), action: NONE };
    case "arrow_up":
      return { state: moveSelection(state, -1), action: NONE };
    case "arrow_down":
      return { state: moveSelection(state, 1), action: NONE };
    case "enter": {
      const selected = state.matches[state.selectedIndex];
      if (!selected) {
        return { state, action: NONE };
      }
      return { state: null, action: { type: "run_command", command: selected } };
    }
    case "escape":
    case "ctrl_c":
      return { state: null, action: { type: "cancel_palette" } };
    case "arrow_left":
    case "arrow_right":
    case "ctrl_j":
    case "ctrl_p":
    case "other":
      return { state, action: NONE };
  }
}

export function paletteView(state: PaletteState, width: number, maxVisible: number, theme: Theme): PaletteView {
  const filterLine = truncateToWidth(`/${state.filter}`, width);
  const lines = [theme.accent("/") + filterLine.slice(1)];
  const cursorCol = Math.min(displayWidth(filterLine), Math.max(0, width - 1));

  if (state.matches.length === 0) {
    lines.push(theme.muted(truncateToWidth(`${UNSELECTED_MARKER}no matching commands`, width)));
    return { lines, cursorCol };
  }

  const visible = Math.max(1, maxVisible);
  const start = Math.min(
    Math.max(0, state.selectedIndex - Math.floor(visible / 2)),
    Math.max(0, state.matches.length - visible),
  );
  const shown = state.matches.slice(start, start + visible);
  const nameWidth = Math.max(...shown.map((command) => displayWidth(command.name)));

  shown.forEach((command, offset) => {
    const selected = start + offset === state.selectedIndex;
    lines.push(formatCommandRow(command, selected, nameWidth, width, theme));
  });

  if (state.matches.length > shown.length) {
    const range = `${UNSELECTED_MARKER}(${start + 1}-${start + shown.length} of ${state.matches.length})`;
    lines.push(theme.muted(truncateToWidth(range, width)));
  }

  return { lines, cursorCol };
}

function formatCommandRow(
  command: PaletteCommand,
  selected: boolean,
  nameWidth: number,
  width: number,
  theme: Theme,
): string {
  const marker = selected ? SELECTED_MARKER : UNSELECTED_MARKER;
  const padding = " ".repeat(Math.max(0, nameWidth - displayWidth(command.name)));
  const head = truncateToWidth(`${marker}${command.name}${padding}`, width);
  const remaining = width - displayWidth(head) - 2;
  const detail = remaining > 0 ? truncateToWidth(`${command.description} · ${command.category}`, remaining) : "";

  const styledHead = selected ? theme.selected(head) : head;
  return detail ? `${styledHead}  ${theme.muted(detail)}` : styledHead;
}

function withFilter(state: PaletteState, filter: string): PaletteState {
  return {
    ...state,
    filter,
    matches: filterCommands(state.commands, filter),
    selectedIndex: 0,
  };
}

function moveSelection(state: PaletteState, delta: number): PaletteState {
  const lastIndex = Math.max(0, state.matches.length - 1);
  const selectedIndex = Math.min(Math.max(0, state.selectedIndex + delta), lastIndex);
  return selectedIndex === state.selectedIndex ? state : { ...state, selectedIndex };
}

function dropLastCodePoint(text: string): string {
  const codePoints = Array.from(text);
  codePoints.pop();
  return codePoints.join("");
}
