#!/usr/bin/env node
import path from "node:path";
import readline from "node:readline/promises";
import { Command } from "commander";
import { buildPaletteCommands } from "./commands.js";
import { loadTermchatConfig, type ConfigOverrides, type TermchatConfig } from "./config.js";
import { ChatDispatcher } from "./dispatcher.js";
import { NotATerminalError, summarizeError } from "./errors.js";
import { createLogger, initLogging, logPath } from "./logger.js";
import { describeModel } from "./models.js";
import { createChatClient } from "./openai.js";
import { loadPersistedState, savePersistedState } from "./persistence.js";
import { createTheme, HELP_HINT, Session, type Theme } from "./terminal/index.js";

type CliOptions = {
  model?: string;
  config?: string;
  logLevel?: string;
  escapeTimeout?: string;
};

const VERSION = "0.1.0";

async function main(argv: string[]): Promise<void> {
  const program = new Command()
    .name("termchat")
    .description("chat with OpenAI-compatible models from the terminal")
    .version(VERSION)
    .option("-m, --model <id>", "model to start with")
    .option("-c, --config <file>", "read configuration from this file only")
    .option("--log-level <level>", "debug, info, warn, error or silent")
    .option("--escape-timeout <ms>", "how long a lone Esc waits for the rest of a sequence")
    .parse(argv);

  const cli = program.opts<CliOptions>();
  const overrides: ConfigOverrides = {
    configFile: cli.config,
    model: cli.model,
    logLevel: cli.logLevel,
    escapeTimeoutMs: cli.escapeTimeout,
  };
  const config = loadTermchatConfig({ overrides });

  initLogging({
    dir: path.join(config.dataDir, "logs"),
    level: config.logging.level,
    retainFiles: config.logging.retainFiles,
  });
  const logger = createLogger("main");

  const persisted = loadPersistedState(config.dataDir);
  const startModel = (!cli.model && persisted?.selectedModel) || config.defaultModel;
  logger.info({ model: startModel, baseUrl: config.baseUrl }, "starting");

  const theme = createTheme(config.ui.color && process.stdout.isTTY === true);
  const dispatcher = new ChatDispatcher({
    config,
    client: createChatClient(config),
    model: startModel,
    theme,
    onModelChange: (modelId) => savePersistedState(config.dataDir, { selectedModel: modelId }),
  });

  const session = new Session({
    input: process.stdin,
    output: process.stdout,
    commands: buildPaletteCommands(),
    dispatcher,
    escapeTimeoutMs: config.ui.escapeTimeoutMs,
    paletteMaxVisible: config.ui.paletteMaxVisible,
    theme,
  });

  process.stdout.write(welcomeLines(config, startModel, theme).join("\n") + "\n");
  try {
    await session.run();
  } catch (error) {
    if (!(error instanceof NotATerminalError)) {
      throw error;
    }
    logger.info("stdin is not a terminal, reading lines instead");
    await runLinePrompt(dispatcher);
  }
  logger.info("stopped");
}

function welcomeLines(config: TermchatConfig, modelId: string, theme: Theme): string[] {
  const model = describeModel(modelId);
  const lines = [
    `${theme.accent("termchat")} ${theme.muted(`v${VERSION}`)}`,
    theme.muted(`model: ${model.id} (${model.label})`),
  ];
  if (!config.apiKey) {
    lines.push(theme.warning("no API key configured; set GROQ_API_KEY or TERMCHAT_API_KEY."));
  }
  const file = logPath();
  if (file) {
    lines.push(theme.muted(`logs: ${file}`));
  }
  lines.push(theme.hint(HELP_HINT), "");
  return lines;
}

/** Line-at-a-time prompt for piped input; each line is submitted as-is. */
async function runLinePrompt(dispatcher: ChatDispatcher): Promise<void> {
  const rl = readline.createInterface({ input: process.stdin, terminal: false });
  let current: AbortController | null = null;
  const onSigint = () => {
    if (current) {
      current.abort();
      return;
    }
    rl.close();
  };
  process.on("SIGINT", onSigint);

  try {
    for await (const line of rl) {
      const text = line.trim();
      if (!text) {
        continue;
      }
      current = new AbortController();
      const outcome = await dispatcher.dispatch(
        { type: "submit", text },
        { signal: current.signal, write: (chunk) => process.stdout.write(chunk) },
      );
      current = null;
      if (outcome === "exit") {
        break;
      }
    }
  } finally {
    process.off("SIGINT", onSigint);
    rl.close();
  }
}

main(process.argv).catch((error: unknown) => {
  createLogger("main").error({ error: summarizeError(error) }, "fatal");
  process.stderr.write(`termchat: ${summarizeError(error)}\n`);
  process.exitCode = 1;
});
