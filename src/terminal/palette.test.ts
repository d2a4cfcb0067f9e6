import { describe, expect, it } from "vitest";
import type { PaletteCommand } from "./actions.js";
import type { KeyEvent } from "./keys.js";
import { filterCommands, handlePaletteKey, openPalette, paletteView, type PaletteState } from "./palette.js";
import { plainTheme } from "./theme.js";

function makeCommand(name: string): PaletteCommand {
  return { name, category: "Chat", description: `${name} desc`, actionId: name };
}

const commands = ["model", "new", "modex"].map(makeCommand);
const emptyEditor = { text: "", cursor: 0 };

function press(state: PaletteState, ...events: KeyEvent[]): PaletteState {
  let current = state;
  for (const event of events) {
    const next = handlePaletteKey(current, event).state;
    if (!next) {
      throw new Error(`palette closed on ${event.kind}`);
    }
    current = next;
  }
  return current;
}

function names(list: readonly PaletteCommand[]): string[] {
  return list.map((command) => command.name);
}

describe("filterCommands", () => {
  it("returns everything for an empty filter", () => {
    expect(names(filterCommands(commands, ""))).toEqual(["model", "new", "modex"]);
  });

  it("ranks prefix matches first and keeps declared order", () => {
    expect(names(filterCommands(commands, "mod"))).toEqual(["model", "modex"]);
    expect(names(filterCommands(commands, "od"))).toEqual(["model", "modex"]);
    expect(names(filterCommands(commands, "e"))).toEqual(["model", "new", "modex"]);
    expect(names(filterCommands(commands, "ew"))).toEqual(["new"]);
  });

  it("puts names starting with the filter ahead of names containing it", () => {
    const list = ["renew", "new", "news"].map(makeCommand);
    expect(names(filterCommands(list, "new"))).toEqual(["new", "news", "renew"]);
  });

  it("matches case-insensitively", () => {
    expect(names(filterCommands(commands, "MOD"))).toEqual(["model", "modex"]);
  });

  it("never gains matches when the filter grows", () => {
    const list = ["new", "clear", "history", "save", "load", "status", "about", "help", "exit"].map(makeCommand);
    for (const filter of ["", "e", "a", "s", "l", "st", "he"]) {
      const before = new Set(names(filterCommands(list, filter)));
      for (const extra of "aehilnorstuwx") {
        for (const name of names(filterCommands(list, filter + extra))) {
          expect(before.has(name)).toBe(true);
        }
      }
    }
  });
});

describe("handlePaletteKey", () => {
  it("filters as characters are typed and resets the selection", () => {
    const state = press(openPalette(commands, emptyEditor), { kind: "arrow_down" }, { kind: "char", char: "m" });
    expect(state.filter).toBe("m");
    expect(state.selectedIndex).toBe(0);
    expect(names(state.matches)).toEqual(["model", "modex"]);
  });

  it("adds slash to the filter", () => {
    const state = press(openPalette(commands, emptyEditor), { kind: "slash" });
    expect(state.filter).toBe("/");
    expect(state.matches).toEqual([]);
  });

  it("clamps the selection to the matches", () => {
    const opened = openPalette(commands, emptyEditor);
    expect(press(opened, { kind: "arrow_up" }).selectedIndex).toBe(0);
    const bottom = press(opened, { kind: "arrow_down" }, { kind: "arrow_down" }, { kind: "arrow_down" });
    expect(bottom.selectedIndex).toBe(2);
  });

  it("runs the selected command on enter", () => {
    const state = press(openPalette(commands, emptyEditor), { kind: "char", char: "n" });
    expect(handlePaletteKey(state, { kind: "enter" })).toEqual({
      state: null,
      action: { type: "run_command", command: makeCommand("new") },
    });
  });

  it("does nothing on enter without matches", () => {
    const state = press(openPalette(commands, emptyEditor), { kind: "char", char: "z" });
    expect(handlePaletteKey(state, { kind: "enter" })).toEqual({ state, action: { type: "none" } });
  });

  it("drops the last filter character on backspace", () => {
    const state = press(openPalette(commands, emptyEditor), { kind: "char", char: "n" }, { kind: "char", char: "e" });
    const after = press(state, { kind: "backspace" });
    expect(after.filter).toBe("n");
    expect(names(after.matches)).toEqual(["new"]);
  });

  it("closes with cancel_palette on backspace over an empty filter and keeps the snapshot", () => {
    const state = openPalette(commands, { text: "hello", cursor: 5 });
    expect(handlePaletteKey(state, { kind: "backspace" })).toEqual({
      state: null,
      action: { type: "cancel_palette" },
    });
    expect(state.restore).toEqual({ text: "hello", cursor: 5 });
  });

  it("closes on escape and ctrl_c", () => {
    const state = openPalette(commands, emptyEditor);
    expect(handlePaletteKey(state, { kind: "escape" }).action).toEqual({ type: "cancel_palette" });
    expect(handlePaletteKey(state, { kind: "ctrl_c" }).action).toEqual({ type: "cancel_palette" });
  });

  it("ignores keys it does not use", () => {
    const state = openPalette(commands, emptyEditor);
    for (const event of [{ kind: "ctrl_j" }, { kind: "arrow_left" }, { kind: "other", raw: "\x1b[3~" }] as const) {
      expect(handlePaletteKey(state, event)).toEqual({ state, action: { type: "none" } });
    }
  });
});

describe("paletteView", () => {
  it("draws the filter line, a window of entries and a range footer", () => {
    const view = paletteView(openPalette(commands, emptyEditor), 40, 2, plainTheme);
    expect(view).toEqual({
      lines: ["/", "► model  model desc · Chat", "  new    new desc · Chat", "  (1-2 of 3)"],
      cursorCol: 1,
    });
  });

  it("scrolls the window to keep the selection visible", () => {
    const state = press(openPalette(commands, emptyEditor), { kind: "arrow_down" }, { kind: "arrow_down" });
    expect(paletteView(state, 40, 2, plainTheme).lines).toEqual([
      "/",
      "  new    new desc · Chat",
      "► modex  modex desc · Chat",
      "  (2-3 of 3)",
    ]);
  });

  it("shows a placeholder when nothing matches", () => {
    const state = press(openPalette(commands, emptyEditor), { kind: "char", char: "z" }, { kind: "char", char: "z" });
    expect(paletteView(state, 40, 5, plainTheme)).toEqual({
      lines: ["/zz", "  no matching commands"],
      cursorCol: 3,
    });
  });
});
