export type {
  Action,
  ActionDispatcher,
  DispatchableAction,
  DispatchContext,
  DispatchOutcome,
  PaletteCommand,
} from "./actions.js";
export { NotATerminalError, OutputWriteFailureError } from "../errors.js";
export { decodeKey, KeyDecoder, type KeyEvent } from "./keys.js";
export { LineEditor, PROMPT } from "./line-editor.js";
export { filterCommands } from "./palette.js";
export { enterRawMode, withRawMode } from "./raw-mode.js";
export { ScreenRenderer } from "./screen.js";
export { EXIT_HINT, HELP_HINT, RESET_HINT, Session, type SessionInput, type SessionOptions, type SessionOutput } from "./session.js";
export { createTheme, plainTheme, type Theme } from "./theme.js";
