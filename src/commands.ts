import { isExportFormat, type ExportFormat } from "./chat-history.js";
import { MODEL_OPTIONS, modelIdToSlug, type ModelOption } from "./models.js";
import type { PaletteCommand } from "./terminal/actions.js";

export type TypedCommand =
  | { kind: "new" }
  | { kind: "clear" }
  | { kind: "history" }
  | { kind: "help" }
  | { kind: "status" }
  | { kind: "about" }
  | { kind: "exit" }
  | { kind: "model"; modelId: string | null }
  | { kind: "save"; target: string | null }
  | { kind: "load"; target: string | null }
  | { kind: "load_doc"; target: string | null }
  | { kind: "search"; query: string }
  | { kind: "export"; format: ExportFormat; target: string | null };

type BareCommandKind = "new" | "clear" | "history" | "help" | "status" | "about" | "exit";

const BARE_COMMANDS = new Map<string, BareCommandKind>([
  ["new", "new"],
  ["clear", "clear"],
  ["history", "history"],
  ["help", "help"],
  ["status", "status"],
  ["about", "about"],
  ["exit", "exit"],
  ["quit", "exit"],
]);

const MODEL_ACTION_PREFIX = "model:";

export const COMMAND_USAGE: ReadonlyArray<readonly [string, string]> = [
  ["new", "start a new conversation"],
  ["clear", "clear conversation history"],
  ["history", "show conversation history"],
  ["model [id]", "switch model, or reset to the default"],
  ["save [file]", "save the conversation as JSON"],
  ["load [file]", "load a saved conversation, or list saved ones"],
  ["load doc <file>", "put a text file in the prompt to edit and send"],
  ["/search <text>", "find messages containing the text"],
  ["export <json|md|txt> [file]", "export the conversation"],
  ["status", "show session status"],
  ["help", "show keys and commands"],
  ["exit", "quit"],
];

export function buildPaletteCommands(models: readonly ModelOption[] = MODEL_OPTIONS): PaletteCommand[] {
  return [
    { name: "new", category: "Chat", description: "start a new conversation", actionId: "new" },
    { name: "clear", category: "Chat", description: "clear conversation history", actionId: "clear" },
    { name: "history", category: "Chat", description: "show conversation history", actionId: "history" },
    { name: "save", category: "Chat", description: "save the conversation as JSON", actionId: "save" },
    { name: "load", category: "Chat", description: "list saved conversations", actionId: "load" },
    ...models.map((model) => ({
      name: `${MODEL_ACTION_PREFIX}${modelIdToSlug(model.id)}`,
      category: "Models",
      description: `${model.label}, ${model.description}`,
      actionId: `${MODEL_ACTION_PREFIX}${model.id}`,
    })),
    { name: "status", category: "Quick Actions", description: "show session status", actionId: "status" },
    { name: "about", category: "Quick Actions", description: "about termchat", actionId: "about" },
    { name: "help", category: "Quick Actions", description: "show keys and commands", actionId: "help" },
    { name: "exit", category: "System", description: "quit termchat", actionId: "exit" },
  ];
}

/** Maps a palette entry's action id to the command it runs. */
export function commandForAction(actionId: string): TypedCommand | null {
  if (actionId.startsWith(MODEL_ACTION_PREFIX)) {
    const modelId = actionId.slice(MODEL_ACTION_PREFIX.length).trim();
    return modelId ? { kind: "model", modelId } : null;
  }
  switch (actionId) {
    case "save":
      return { kind: "save", target: null };
    case "load":
      return { kind: "load", target: null };
  }
  const bare = BARE_COMMANDS.get(actionId);
  return bare ? { kind: bare } : null;
}

/**
 * Recognizes a submitted line as a command. Only exact shapes count, so a message
 * that merely starts with a command word ("help me with...") is sent as chat.
 * Search takes free text, so it needs the leading slash.
 */
export function parseTypedCommand(text: string): TypedCommand | null {
  const trimmed = text.trim();
  const search = /^\/search(?:\s+([\s\S]*))?$/i.exec(trimmed);
  if (search) {
    return { kind: "search", query: search[1]?.trim() ?? "" };
  }

  const parts = trimmed.replace(/^\//, "").split(/\s+/).filter(Boolean);
  const [head, ...args] = parts;
  if (!head) {
    return null;
  }

  const word = head.toLowerCase();
  const bare = BARE_COMMANDS.get(word);
  if (bare) {
    return args.length === 0 ? { kind: bare } : null;
  }

  switch (word) {
    case "model":
      return args.length <= 1 ? { kind: "model", modelId: args[0] ?? null } : null;
    case "save":
      return args.length <= 1 ? { kind: "save", target: args[0] ?? null } : null;
    case "load":
      if (args[0]?.toLowerCase() === "doc") {
        return args.length <= 2 ? { kind: "load_doc", target: args[1] ?? null } : null;
      }
      return args.length <= 1 ? { kind: "load", target: args[0] ?? null } : null;
    case "export": {
      const format = args[0]?.toLowerCase();
      if (!format || !isExportFormat(format) || args.length > 2) {
        return null;
      }
      return { kind: "export", format, target: args[1] ?? null };
    }
    default:
      return null;
  }
}
