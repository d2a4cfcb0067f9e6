import { OutputWriteFailureError, isAbortError, summarizeError } from "../errors.js";
import { createLogger, type Logger } from "../logger.js";
import type {
  Action,
  ActionDispatcher,
  DispatchableAction,
  DispatchContext,
  DispatchOutcome,
  PaletteCommand,
} from "./actions.js";
import { KeyDecoder, type KeyEvent, type KeyInputStream } from "./keys.js";
import { LineEditor, renderPrompt, type EditorSnapshot } from "./line-editor.js";
import { handlePaletteKey, openPalette, paletteView, type PaletteState } from "./palette.js";
import { withRawMode, type RawModeInput } from "./raw-mode.js";
import { ScreenRenderer, type TerminalOutput } from "./screen.js";
import { truncateToWidth } from "./text.js";
import { plainTheme, type Theme } from "./theme.js";

export type SessionInput = RawModeInput & KeyInputStream;

export interface SessionOutput extends TerminalOutput {
  on?(event: "error", listener: (error: Error) => void): unknown;
  on?(event: "resize", listener: () => void): unknown;
  off?(event: "error", listener: (error: Error) => void): unknown;
  off?(event: "resize", listener: () => void): unknown;
}

export type SessionOptions = {
  input: SessionInput;
  output: SessionOutput;
  commands: readonly PaletteCommand[];
  dispatcher: ActionDispatcher;
  escapeTimeoutMs: number;
  paletteMaxVisible: number;
  theme?: Theme;
  logger?: Logger;
};

export type InputMode = { kind: "normal" } | { kind: "palette"; palette: PaletteState };

export type SessionStatus = "idle" | "editing" | "palette" | "dispatching" | "closed";

export type SessionSnapshot = {
  status: SessionStatus;
  buffer: EditorSnapshot;
  filter: string | null;
  pendingExit: boolean;
  pendingReset: boolean;
  drawn: readonly string[];
};

type SessionIO = {
  renderer: ScreenRenderer;
  decoder: KeyDecoder;
};

export const HELP_HINT = "(Enter = send, Ctrl+J = newline, Ctrl+C = quit, / = commands)";
export const EXIT_HINT = "Ctrl+C again to quit";
export const RESET_HINT = "Esc again to start over";

const NORMAL_MODE: InputMode = { kind: "normal" };

export class Session {
  private readonly options: SessionOptions;
  private readonly theme: Theme;
  private readonly logger: Logger;
  private readonly editor = new LineEditor();
  private mode: InputMode = NORMAL_MODE;
  private pendingExit = false;
  private pendingReset = false;
  private overlayRows = 0;
  private dispatching = false;
  private phase: "idle" | "running" | "closed" = "idle";
  private io: SessionIO | null = null;

  constructor(options: SessionOptions) {
    this.options = options;
    this.theme = options.theme ?? plainTheme;
    this.logger = options.logger ?? createLogger("session");
  }

  get status(): SessionStatus {
    if (this.phase !== "running") {
      return this.phase;
    }
    if (this.dispatching) {
      return "dispatching";
    }
    return this.mode.kind === "palette" ? "palette" : "editing";
  }

  /**
   * Read-only view of the session for diagnostics: what the editor holds and the
   * rows last drawn below the committed output. Nothing in here drives the loop.
   */
  inspect(): SessionSnapshot {
    return {
      status: this.status,
      buffer: this.editor.snapshot(),
      filter: this.mode.kind === "palette" ? this.mode.palette.filter : null,
      pendingExit: this.pendingExit,
      pendingReset: this.pendingReset,
      drawn: this.io ? this.io.renderer.state.lines : [],
    };
  }

  /**
   * Runs the interactive loop until the dispatcher asks to exit or Ctrl+C is pressed
   * twice. Raw mode is released before this promise settles, whichever way it does.
   */
  async run(): Promise<void> {
    if (this.phase !== "idle") {
      throw new Error("Session.run can only be called once.");
    }
    this.phase = "running";

    const { input, output } = this.options;
    try {
      await withRawMode(input, async () => {
        const decoder = new KeyDecoder(input, {
          escapeTimeoutMs: this.options.escapeTimeoutMs,
          logger: this.logger,
        });
        const onOutputError = (error: Error) => {
          decoder.fail(new OutputWriteFailureError(error));
        };
        const io: SessionIO = { renderer: new ScreenRenderer(output), decoder };
        // A dispatch repaints with the new width once it returns.
        const onResize = () => {
          const status = this.status;
          if (status !== "editing" && status !== "palette") {
            return;
          }
          try {
            this.paint(io);
          } catch (error) {
            decoder.fail(error instanceof Error ? error : new Error(summarizeError(error)));
          }
        };
        output.on?.("error", onOutputError);
        output.on?.("resize", onResize);

        this.io = io;
        try {
          await this.loop(io);
        } finally {
          output.off?.("error", onOutputError);
          output.off?.("resize", onResize);
          decoder.dispose();
        }
      });
    } finally {
      this.phase = "closed";
    }
  }

  private async loop(io: SessionIO): Promise<void> {
    this.paint(io);
    while (true) {
      const event = await io.decoder.next();
      const outcome = await this.handle(event, io);
      if (outcome === "exit") {
        this.logger.info("session exit");
        return;
      }
    }
  }

  private handle(event: KeyEvent, io: SessionIO): Promise<DispatchOutcome> {
    const mode = this.mode;
    switch (mode.kind) {
      case "normal":
        return this.handleNormal(event, io);
      case "palette":
        return this.handlePalette(mode.palette, event, io);
      default:
        return assertNever(mode);
    }
  }

  private async handleNormal(event: KeyEvent, io: SessionIO): Promise<DispatchOutcome> {
    if (event.kind === "ctrl_c" && this.pendingExit) {
      this.pendingExit = false;
      io.renderer.clearBlock(io.renderer.state.lines.length);
      return "exit";
    }

    if (event.kind === "escape") {
      this.pendingExit = false;
      if (this.pendingReset) {
        this.pendingReset = false;
        this.editor.restore({ text: "", cursor: 0 });
      } else {
        this.pendingReset = this.editor.snapshot().text.trim() !== "";
      }
      this.paint(io);
      return "continue";
    }
    this.pendingReset = false;

    const action = this.editor.handle(event);
    this.pendingExit = action.type === "cancel";
    return this.perform(action, io);
  }

  private async handlePalette(palette: PaletteState, event: KeyEvent, io: SessionIO): Promise<DispatchOutcome> {
    this.pendingExit = false;
    this.pendingReset = false;
    const transition = handlePaletteKey(palette, event);
    if (transition.state) {
      this.mode = { kind: "palette", palette: transition.state };
      this.paint(io);
      return "continue";
    }

    io.renderer.clearBlock(this.overlayRows);
    this.overlayRows = 0;
    this.editor.restore(palette.restore);
    this.mode = NORMAL_MODE;
    return this.perform(transition.action, io);
  }

  private async perform(action: Action, io: SessionIO): Promise<DispatchOutcome> {
    switch (action.type) {
      case "none":
        this.paint(io);
        return "continue";
      case "enter_palette":
        this.mode = { kind: "palette", palette: openPalette(this.options.commands, this.editor.snapshot()) };
        this.paint(io);
        return "continue";
      case "submit": {
        // Leave the submitted text on screen without the hint line.
        const frame = renderPrompt({ text: action.text, cursor: action.text.length }, this.frameWidth(io), this.theme);
        io.renderer.redrawBlock(frame.lines, frame.cursorRow, frame.cursorCol);
        io.renderer.commit();
        return this.dispatchWithInterrupt(action, io);
      }
      case "run_command": {
        const echo = this.theme.accent(truncateToWidth(`/${action.command.name}`, this.frameWidth(io)));
        io.renderer.redrawBlock([echo], 0, 0);
        io.renderer.commit();
        return this.dispatchWithInterrupt(action, io);
      }
      case "cancel":
      case "cancel_palette":
      case "ignore":
        return this.dispatchLocal(action, io);
      default:
        return assertNever(action);
    }
  }

  // Actions that only the dispatcher's logging sees; the frame stays open.
  private async dispatchLocal(action: DispatchableAction, io: SessionIO): Promise<DispatchOutcome> {
    const context: DispatchContext = {
      signal: new AbortController().signal,
      write: (text) => {
        this.logger.warn({ action: action.type, length: text.length }, "dropped output from local action");
      },
    };
    const outcome = await this.options.dispatcher.dispatch(action, context);
    if (outcome === "exit") {
      io.renderer.clearBlock(io.renderer.state.lines.length);
      return outcome;
    }
    this.paint(io);
    return outcome;
  }

  private async dispatchWithInterrupt(action: DispatchableAction, io: SessionIO): Promise<DispatchOutcome> {
    const interrupt = new AbortController();
    const stop = new AbortController();
    const watcher = this.watchForInterrupt(io.decoder, interrupt, stop.signal);
    const settle = async (): Promise<Error | null> => {
      stop.abort();
      const watchError = await watcher;
      this.dispatching = false;
      return watchError;
    };
    let lastChar = "\n";
    const pending: { prefill?: string } = {};
    let outcome: DispatchOutcome;

    this.dispatching = true;
    try {
      outcome = await this.options.dispatcher.dispatch(action, {
        signal: interrupt.signal,
        write: (text) => {
          if (!text) {
            return;
          }
          io.renderer.write(text);
          lastChar = text.slice(-1);
        },
        prefill: (text) => {
          pending.prefill = text;
        },
      });
    } catch (error) {
      // A failed key read is the root cause of whatever the dispatch threw.
      throw (await settle()) ?? error;
    }

    const watchError = await settle();
    if (watchError) {
      throw watchError;
    }

    if (lastChar !== "\n") {
      io.renderer.write("\r\n");
    }
    if (outcome === "continue") {
      if (pending.prefill !== undefined) {
        this.editor.restore({ text: pending.prefill, cursor: pending.prefill.length });
      }
      this.paint(io);
    }
    return outcome;
  }

  /**
   * Reads keys while a dispatch runs. Ctrl+C or Escape aborts the dispatch; every
   * other key is discarded. Resolves with the decoder's error if reading failed.
   */
  private async watchForInterrupt(
    decoder: KeyDecoder,
    interrupt: AbortController,
    stop: AbortSignal,
  ): Promise<Error | null> {
    while (!stop.aborted) {
      let event: KeyEvent;
      try {
        event = await decoder.next(stop);
      } catch (error) {
        if (stop.aborted && isAbortError(error)) {
          return null;
        }
        const failure = error instanceof Error ? error : new Error(summarizeError(error));
        interrupt.abort(failure);
        return failure;
      }

      if ((event.kind === "ctrl_c" || event.kind === "escape") && !interrupt.signal.aborted) {
        this.logger.info({ key: event.kind }, "dispatch interrupted");
        interrupt.abort();
      }
    }
    return null;
  }

  private paint(io: SessionIO): void {
    const width = this.frameWidth(io);
    const frame = this.editor.view(width, this.theme);
    const mode = this.mode;
    switch (mode.kind) {
      case "normal": {
        const hint = this.pendingExit
          ? this.theme.warning(truncateToWidth(EXIT_HINT, width))
          : this.pendingReset
            ? this.theme.warning(truncateToWidth(RESET_HINT, width))
            : this.theme.hint(truncateToWidth(HELP_HINT, width));
        io.renderer.redrawBlock([...frame.lines, hint], frame.cursorRow, frame.cursorCol);
        return;
      }
      case "palette": {
        const overlay = paletteView(mode.palette, width, this.options.paletteMaxVisible, this.theme);
        this.overlayRows = overlay.lines.length;
        io.renderer.redrawBlock([...frame.lines, ...overlay.lines], frame.lines.length, overlay.cursorCol);
        return;
      }
      default:
        assertNever(mode);
    }
  }

  private frameWidth(io: SessionIO): number {
    return Math.max(1, io.renderer.columns - 1);
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled value: ${JSON.stringify(value)}`);
}
