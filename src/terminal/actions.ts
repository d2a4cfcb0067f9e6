export type PaletteCommand = {
  name: string;
  category: string;
  description: string;
  // Opaque to the terminal layer; only the dispatcher interprets it.
  actionId: string;
};

export type Action =
  | { type: "submit"; text: string }
  | { type: "run_command"; command: PaletteCommand }
  | { type: "cancel" }
  | { type: "cancel_palette" }
  | { type: "enter_palette" }
  | { type: "ignore" }
  | { type: "none" };

export type DispatchableAction = Extract<
  Action,
  { type: "submit" | "run_command" | "cancel" | "cancel_palette" | "ignore" }
>;

export type DispatchOutcome = "continue" | "exit";

export interface DispatchContext {
  signal: AbortSignal;
  write(text: string): void;
  /** Replaces the prompt buffer once the dispatch returns; absent where there is no editor. */
  prefill?(text: string): void;
}

export interface ActionDispatcher {
  dispatch(action: DispatchableAction, context: DispatchContext): Promise<DispatchOutcome>;
}

export const NONE: Action = { type: "none" };
