import fs from "node:fs";
import path from "node:path";
import {
  defaultSavePath,
  exportConversation,
  getConversationsDir,
  listSavedConversations,
  loadConversation,
  saveConversation,
  type LoadedConversation,
} from "./chat-history.js";
import type { ChatMessage } from "./chat-types.js";
import { COMMAND_USAGE, commandForAction, parseTypedCommand, type TypedCommand } from "./commands.js";
import type { TermchatConfig } from "./config.js";
import { Conversation } from "./conversation.js";
import { ConversationFormatError, OutputWriteFailureError, isAbortError, summarizeError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { describeModel, findModel, MODEL_OPTIONS } from "./models.js";
import type { ChatClient } from "./openai.js";
import type {
  ActionDispatcher,
  DispatchableAction,
  DispatchContext,
  DispatchOutcome,
} from "./terminal/actions.js";
import { truncateToWidth } from "./terminal/text.js";
import { plainTheme, type Theme } from "./terminal/theme.js";

export type ChatDispatcherOptions = {
  config: Pick<TermchatConfig, "defaultModel" | "dataDir" | "baseUrl" | "reasoningEffort" | "includeReasoning">;
  client: ChatClient;
  model?: string;
  theme?: Theme;
  logger?: Logger;
  cwd?: string;
  now?: () => Date;
  onModelChange?: (modelId: string) => void;
};

const HISTORY_PREVIEW_WIDTH = 96;
const SAVED_LIST_LIMIT = 10;

export const KEY_HELP: ReadonlyArray<readonly [string, string]> = [
  ["Enter", "send"],
  ["Ctrl+J", "newline"],
  ["/", "command palette (on an empty prompt)"],
  ["Ctrl+P", "command palette"],
  ["Esc / Ctrl+C", "close the palette, or stop a reply"],
  ["Esc twice", "clear the prompt"],
  ["Ctrl+C twice", "quit"],
];

export class ChatDispatcher implements ActionDispatcher {
  private readonly options: ChatDispatcherOptions;
  private readonly theme: Theme;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private current: Conversation;

  constructor(options: ChatDispatcherOptions) {
    this.options = options;
    this.theme = options.theme ?? plainTheme;
    this.logger = options.logger ?? createLogger("dispatcher");
    this.now = options.now ?? (() => new Date());
    this.current = new Conversation({
      model: options.model ?? options.config.defaultModel,
      createdAt: this.now(),
    });
  }

  get conversation(): Conversation {
    return this.current;
  }

  async dispatch(action: DispatchableAction, context: DispatchContext): Promise<DispatchOutcome> {
    switch (action.type) {
      case "submit": {
        const command = parseTypedCommand(action.text);
        if (command) {
          return this.execute(command, context);
        }
        await this.reply(action.text, context);
        return "continue";
      }
      case "run_command": {
        const command = commandForAction(action.command.actionId);
        if (!command) {
          this.logger.warn({ actionId: action.command.actionId }, "palette entry without a command");
          context.write(`${this.theme.error(`unknown command: ${action.command.name}`)}\n`);
          return "continue";
        }
        return this.execute(command, context);
      }
      case "cancel":
      case "cancel_palette":
      case "ignore":
        this.logger.debug({ action: action.type }, "local action");
        return "continue";
    }
  }

  async execute(command: TypedCommand, context: DispatchContext): Promise<DispatchOutcome> {
    this.logger.info({ command: command.kind }, "command");
    switch (command.kind) {
      case "new":
        this.current = new Conversation({ model: this.options.config.defaultModel, createdAt: this.now() });
        this.notify(context, `started new chat session ${this.current.sessionId}`);
        return "continue";
      case "clear":
        this.current.clear();
        this.notify(context, "conversation history cleared.");
        return "continue";
      case "history":
        this.showHistory(context);
        return "continue";
      case "model":
        this.switchModel(command.modelId, context);
        return "continue";
      case "save":
        this.save(command.target, context);
        return "continue";
      case "load":
        this.load(command.target, context);
        return "continue";
      case "load_doc":
        this.loadDocument(command.target, context);
        return "continue";
      case "search":
        this.search(command.query, context);
        return "continue";
      case "export":
        this.exportTo(command.format, command.target, context);
        return "continue";
      case "status":
        this.showStatus(context);
        return "continue";
      case "about":
        context.write(
          [
            this.theme.accent("termchat"),
            "a terminal chat client for OpenAI-compatible chat completion APIs.",
            this.theme.muted(`models: ${MODEL_OPTIONS.map((model) => model.id).join(", ")}`),
            "",
          ].join("\n"),
        );
        return "continue";
      case "help":
        this.showHelp(context);
        return "continue";
      case "exit":
        context.write(`${this.theme.muted("goodbye.")}\n`);
        return "exit";
    }
  }

  private async reply(text: string, context: DispatchContext): Promise<void> {
    const userMessage = this.current.add("user", text, this.now());
    const showReasoning = this.options.config.includeReasoning;
    let phase: "waiting" | "reasoning" | "answer" = "waiting";

    try {
      const result = await this.options.client.runChatCompletionStream(
        { model: this.current.model, messages: this.current.messages, signal: context.signal },
        (chunk) => {
          if (chunk.reasoningText && showReasoning && phase !== "answer") {
            if (phase === "waiting") {
              context.write(this.theme.muted("thinking: "));
              phase = "reasoning";
            }
            context.write(this.theme.muted(chunk.reasoningText));
          }
          if (chunk.answerText) {
            if (phase === "reasoning") {
              context.write("\n\n");
            }
            phase = "answer";
            context.write(chunk.answerText);
          }
        },
      );

      if (!result.answer) {
        context.write(this.theme.muted("(no response text returned)"));
      }
      context.write("\n");
      if (result.usage) {
        context.write(`${this.theme.muted(`${result.usage.totalTokens} tokens`)}\n`);
      }
      if (result.toolsUsed > 0) {
        const noun = result.toolsUsed === 1 ? "tool" : "tools";
        context.write(
          `${this.theme.muted(`used ${result.toolsUsed} server-side ${noun} (web search or code execution)`)}\n`,
        );
      }
      this.current.add("assistant", result.answer, this.now());
    } catch (error) {
      this.current.remove(userMessage);
      if (error instanceof OutputWriteFailureError) {
        throw error;
      }

      const lead = phase === "waiting" ? "" : "\n";
      if (isAbortError(error)) {
        this.logger.info({ model: this.current.model }, "reply cancelled");
        context.write(`${lead}${this.theme.warning("response cancelled.")}\n`);
        return;
      }
      this.logger.error({ model: this.current.model, error: summarizeError(error) }, "reply failed");
      context.write(`${lead}${this.theme.error(`error: ${summarizeError(error)}`)}\n`);
    }
  }

  private switchModel(modelId: string | null, context: DispatchContext): void {
    if (!modelId) {
      this.setModel(this.options.config.defaultModel);
      this.notify(context, `reset to default model: ${this.current.model}`);
      return;
    }

    const model = findModel(modelId);
    if (!model) {
      const known = MODEL_OPTIONS.map((option) => option.id).join(", ");
      context.write(`${this.theme.error(`unknown model: ${modelId}. known models: ${known}`)}\n`);
      return;
    }
    this.setModel(model.id);
    this.notify(context, `switched to model: ${model.id}${model.supportsTools ? " (server-side tools)" : ""}`);
  }

  private setModel(modelId: string): void {
    this.current.model = modelId;
    try {
      this.options.onModelChange?.(modelId);
    } catch (error) {
      this.logger.warn({ error: summarizeError(error) }, "failed to persist selected model");
    }
  }

  private save(target: string | null, context: DispatchContext): void {
    if (this.current.isEmpty) {
      context.write(`${this.theme.warning("nothing to save yet.")}\n`);
      return;
    }
    const filePath = this.resolveTarget(target, "json");
    if (!this.writeOrReport(context, filePath, () => saveConversation(this.current, filePath, this.now()))) {
      return;
    }
    this.logger.info({ filePath }, "conversation saved");
    this.notify(context, `saved ${this.current.messages.length} messages to ${filePath}`);
  }

  private load(target: string | null, context: DispatchContext): void {
    if (!target) {
      this.listSaved(context);
      return;
    }

    const cwd = this.options.cwd ?? process.cwd();
    const direct = path.resolve(cwd, target);
    const filePath = fs.existsSync(direct) ? direct : this.resolveTarget(target, "json");
    let loaded: LoadedConversation;
    try {
      loaded = loadConversation(filePath);
    } catch (error) {
      if (error instanceof ConversationFormatError) {
        context.write(`${this.theme.error(error.message)}\n`);
        return;
      }
      throw error;
    }

    const model = loaded.model ? findModel(loaded.model) : undefined;
    this.current = new Conversation({
      model: model?.id ?? this.current.model,
      sessionId: loaded.sessionId,
      createdAt: this.now(),
    });
    this.current.replaceMessages(loaded.messages);
    this.notify(context, `loaded ${loaded.messages.length} messages from ${filePath}`);
  }

  private loadDocument(target: string | null, context: DispatchContext): void {
    if (!target) {
      context.write(`${this.theme.warning("usage: load doc <file>")}\n`);
      return;
    }
    if (!context.prefill) {
      context.write(`${this.theme.error("load doc needs the interactive prompt")}\n`);
      return;
    }

    const filePath = path.resolve(this.options.cwd ?? process.cwd(), target);
    let text: string;
    try {
      text = fs.readFileSync(filePath, "utf8");
    } catch (error) {
      this.logger.warn({ filePath, error: summarizeError(error) }, "document read failed");
      context.write(`${this.theme.error(`cannot read ${filePath}: ${summarizeError(error)}`)}\n`);
      return;
    }

    context.prefill(text.replace(/\r\n/g, "\n").replace(/\n+$/, ""));
    this.notify(context, `loaded document ${filePath}; edit it and press Enter to send`);
  }

  private search(query: string, context: DispatchContext): void {
    if (!query) {
      context.write(`${this.theme.warning("usage: /search <text>")}\n`);
      return;
    }
    const matches = this.current.search(query);
    if (matches.length === 0) {
      context.write(`${this.theme.warning(`no messages match "${query}".`)}\n`);
      return;
    }
    const lines = matches.map((message) => this.previewLine(message, this.current.messages.indexOf(message)));
    context.write(`${lines.join("\n")}\n`);
  }

  private exportTo(format: "json" | "md" | "txt", target: string | null, context: DispatchContext): void {
    if (this.current.isEmpty) {
      context.write(`${this.theme.warning("nothing to export yet.")}\n`);
      return;
    }
    const filePath = this.resolveTarget(target, format);
    if (!this.writeOrReport(context, filePath, () => exportConversation(this.current, filePath, format, this.now()))) {
      return;
    }
    this.logger.info({ filePath, format }, "conversation exported");
    this.notify(context, `exported ${this.current.messages.length} messages to ${filePath}`);
  }

  // A bad target path is user input, not a reason to end the session.
  private writeOrReport(context: DispatchContext, filePath: string, write: () => void): boolean {
    try {
      write();
      return true;
    } catch (error) {
      this.logger.warn({ filePath, error: summarizeError(error) }, "conversation write failed");
      context.write(`${this.theme.error(`cannot write ${filePath}: ${summarizeError(error)}`)}\n`);
      return false;
    }
  }

  private resolveTarget(target: string | null, format: "json" | "md" | "txt"): string {
    return defaultSavePath({
      dataDir: this.options.config.dataDir,
      requested: target ?? undefined,
      sessionId: this.current.sessionId,
      format,
      cwd: this.options.cwd,
    });
  }

  private listSaved(context: DispatchContext): void {
    const saved = listSavedConversations(this.options.config.dataDir, SAVED_LIST_LIMIT);
    if (saved.length === 0) {
      context.write(
        `${this.theme.warning(`no saved conversations in ${getConversationsDir(this.options.config.dataDir)}`)}\n`,
      );
      return;
    }
    const lines = saved.map((entry) => `  ${entry.fileName}  ${this.theme.muted(entry.modifiedAt)}`);
    context.write(`${["saved conversations (load <file>):", ...lines].join("\n")}\n`);
  }

  private showHistory(context: DispatchContext): void {
    const messages = this.current.messages;
    if (messages.length === 0) {
      context.write(`${this.theme.warning("no conversation history.")}\n`);
      return;
    }
    const lines = messages.map((message, index) => this.previewLine(message, index));
    context.write(`${lines.join("\n")}\n`);
  }

  private previewLine(message: ChatMessage, index: number): string {
    const role = message.role === "user" ? "you" : "assistant";
    const preview = truncateToWidth(message.text.replace(/\s+/g, " ").trim(), HISTORY_PREVIEW_WIDTH);
    return `${String(index + 1).padStart(3)}. ${this.theme.key(role.padEnd(9))} ${preview}`;
  }

  private showStatus(context: DispatchContext): void {
    const model = describeModel(this.current.model);
    const stats = this.current.stats();
    const rows: Array<[string, string]> = [
      ["model", `${model.id} (${model.label})`],
      ["session", this.current.sessionId],
      ["messages", `${stats.total} (${stats.user} you, ${stats.assistant} assistant), ${stats.characters} characters`],
      ["endpoint", this.options.config.baseUrl],
      ["reasoning", model.supportsReasoning ? this.options.config.reasoningEffort : "not supported"],
    ];
    context.write(`${formatRows(rows, this.theme).join("\n")}\n`);
  }

  private showHelp(context: DispatchContext): void {
    const lines = [
      this.theme.accent("keys"),
      ...formatRows(KEY_HELP, this.theme),
      "",
      this.theme.accent("commands (type them or pick from the palette)"),
      ...formatRows(COMMAND_USAGE, this.theme),
    ];
    context.write(`${lines.join("\n")}\n`);
  }

  private notify(context: DispatchContext, message: string): void {
    context.write(`${this.theme.accent("✓")} ${message}\n`);
  }
}

function formatRows(rows: ReadonlyArray<readonly [string, string]>, theme: Theme): string[] {
  const width = Math.max(...rows.map(([label]) => label.length));
  return rows.map(([label, value]) => `  ${theme.key(label.padEnd(width))}  ${value}`);
}
