import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { getTermchatDataDir } from "./persistence.js";

export const REASONING_EFFORTS = ["low", "medium", "high"] as const;
export type ReasoningEffort = (typeof REASONING_EFFORTS)[number];

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const DEFAULT_BASE_URL = "https://api.groq.com/openai/v1";
const DEFAULT_MODEL = "openai/gpt-oss-20b";
const DEFAULT_SYSTEM_INSTRUCTION = [
  "you are a helpful assistant answering in a terminal.",
  "prefer concise answers; use markdown sparingly.",
].join("\n");

const fileConfigSchema = z
  .object({
    apiKey: z.string().optional(),
    baseUrl: z.string().url().optional(),
    defaultModel: z.string().min(1).optional(),
    systemInstruction: z.string().optional(),
    maxTokens: z.number().int().min(1).max(131072).optional(),
    temperature: z.number().min(0).max(2).optional(),
    reasoningEffort: z.enum(REASONING_EFFORTS).optional(),
    includeReasoning: z.boolean().optional(),
    retryAttempts: z.number().int().min(1).max(10).optional(),
    timeoutMs: z.number().int().min(1000).max(600000).optional(),
    ui: z
      .object({
        escapeTimeoutMs: z.number().int().min(1).max(1000).optional(),
        paletteMaxVisible: z.number().int().min(1).max(50).optional(),
        color: z.boolean().optional(),
      })
      .optional(),
    logging: z
      .object({
        level: z.enum(LOG_LEVELS).optional(),
        retainFiles: z.number().int().min(0).max(100).optional(),
      })
      .optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

export type TermchatConfig = {
  apiKey: string;
  baseUrl: string;
  defaultModel: string;
  systemInstruction: string;
  maxTokens: number;
  temperature: number;
  reasoningEffort: ReasoningEffort;
  includeReasoning: boolean;
  retryAttempts: number;
  timeoutMs: number;
  dataDir: string;
  ui: {
    escapeTimeoutMs: number;
    paletteMaxVisible: number;
    color: boolean;
  };
  logging: {
    level: LogLevel;
    retainFiles: number;
  };
};

export type ConfigOverrides = {
  configFile?: string;
  model?: string;
  logLevel?: string;
  escapeTimeoutMs?: string;
};

const defaults: Omit<TermchatConfig, "dataDir"> = {
  apiKey: "",
  baseUrl: DEFAULT_BASE_URL,
  defaultModel: DEFAULT_MODEL,
  systemInstruction: DEFAULT_SYSTEM_INSTRUCTION,
  maxTokens: 8192,
  temperature: 1,
  reasoningEffort: "medium",
  includeReasoning: true,
  retryAttempts: 3,
  timeoutMs: 30000,
  ui: {
    escapeTimeoutMs: 25,
    paletteMaxVisible: 8,
    color: true,
  },
  logging: {
    level: "info",
    retainFiles: 10,
  },
};

export function resolveConfigPaths(cwd: string, dataDir: string): string[] {
  return [path.join(dataDir, "config.json"), path.join(cwd, "termchat.json")];
}

export function loadTermchatConfig(params?: {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}): TermchatConfig {
  const cwd = params?.cwd ?? process.cwd();
  const env = params?.env ?? process.env;
  const overrides = params?.overrides ?? {};
  const dataDir = getTermchatDataDir(env);

  const filePaths = overrides.configFile
    ? [path.resolve(cwd, overrides.configFile)]
    : resolveConfigPaths(cwd, dataDir);
  if (overrides.configFile && !fs.existsSync(filePaths[0] ?? "")) {
    throw new ConfigError(`config file not found: ${overrides.configFile}`);
  }

  let merged: FileConfig = {};
  for (const filePath of filePaths) {
    const fileConfig = readConfigFile(filePath);
    if (fileConfig) {
      merged = mergeFileConfig(merged, fileConfig);
    }
  }
  merged = mergeFileConfig(merged, parseWithSource(readEnvConfig(env), "environment"));
  merged = mergeFileConfig(merged, parseWithSource(readOverrideConfig(overrides), "command line"));

  return {
    apiKey: merged.apiKey?.trim() ?? defaults.apiKey,
    baseUrl: merged.baseUrl ?? defaults.baseUrl,
    defaultModel: merged.defaultModel ?? defaults.defaultModel,
    systemInstruction: merged.systemInstruction?.trim() || defaults.systemInstruction,
    maxTokens: merged.maxTokens ?? defaults.maxTokens,
    temperature: merged.temperature ?? defaults.temperature,
    reasoningEffort: merged.reasoningEffort ?? defaults.reasoningEffort,
    includeReasoning: merged.includeReasoning ?? defaults.includeReasoning,
    retryAttempts: merged.retryAttempts ?? defaults.retryAttempts,
    timeoutMs: merged.timeoutMs ?? defaults.timeoutMs,
    dataDir,
    ui: {
      escapeTimeoutMs: merged.ui?.escapeTimeoutMs ?? defaults.ui.escapeTimeoutMs,
      paletteMaxVisible: merged.ui?.paletteMaxVisible ?? defaults.ui.paletteMaxVisible,
      color: merged.ui?.color ?? defaults.ui.color,
    },
    logging: {
      level: merged.logging?.level ?? defaults.logging.level,
      retainFiles: merged.logging?.retainFiles ?? defaults.logging.retainFiles,
    },
  };
}

function readConfigFile(filePath: string): FileConfig | null {
  if (!fs.existsSync(filePath)) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (error) {
    throw new ConfigError(`invalid JSON config: ${filePath}`, { cause: error });
  }
  return parseWithSource(raw, filePath);
}

function parseWithSource(raw: unknown, source: string): FileConfig {
  const result = fileConfigSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join(".") : "(root)";
    throw new ConfigError(`invalid config from ${source} at ${where}: ${issue?.message ?? "unknown issue"}`, {
      cause: result.error,
    });
  }
  return result.data;
}

function readEnvConfig(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const ui: Record<string, unknown> = {};
  const logging: Record<string, unknown> = {};
  const config: Record<string, unknown> = {};

  const apiKey = readEnv(env, "TERMCHAT_API_KEY") ?? readEnv(env, "GROQ_API_KEY");
  if (apiKey) config.apiKey = apiKey;
  const baseUrl = readEnv(env, "TERMCHAT_BASE_URL");
  if (baseUrl) config.baseUrl = baseUrl;
  const model = readEnv(env, "TERMCHAT_DEFAULT_MODEL");
  if (model) config.defaultModel = model;
  const maxTokens = readEnv(env, "TERMCHAT_MAX_TOKENS");
  if (maxTokens) config.maxTokens = toNumber(maxTokens);
  const temperature = readEnv(env, "TERMCHAT_TEMPERATURE");
  if (temperature) config.temperature = toNumber(temperature);
  const effort = readEnv(env, "TERMCHAT_REASONING_EFFORT");
  if (effort) config.reasoningEffort = effort.toLowerCase();
  const includeReasoning = readEnv(env, "TERMCHAT_INCLUDE_REASONING");
  if (includeReasoning) config.includeReasoning = includeReasoning.toLowerCase() === "true";
  const retries = readEnv(env, "TERMCHAT_RETRY_ATTEMPTS");
  if (retries) config.retryAttempts = toNumber(retries);
  const timeout = readEnv(env, "TERMCHAT_TIMEOUT_MS");
  if (timeout) config.timeoutMs = toNumber(timeout);
  const escapeTimeout = readEnv(env, "TERMCHAT_ESCAPE_TIMEOUT_MS");
  if (escapeTimeout) ui.escapeTimeoutMs = toNumber(escapeTimeout);
  if (readEnv(env, "NO_COLOR")) ui.color = false;
  const logLevel = readEnv(env, "TERMCHAT_LOG_LEVEL");
  if (logLevel) logging.level = logLevel.toLowerCase();

  if (Object.keys(ui).length > 0) config.ui = ui;
  if (Object.keys(logging).length > 0) config.logging = logging;
  return config;
}

function readOverrideConfig(overrides: ConfigOverrides): Record<string, unknown> {
  const config: Record<string, unknown> = {};
  if (overrides.model?.trim()) {
    config.defaultModel = overrides.model.trim();
  }
  if (overrides.escapeTimeoutMs?.trim()) {
    config.ui = { escapeTimeoutMs: toNumber(overrides.escapeTimeoutMs) };
  }
  if (overrides.logLevel?.trim()) {
    config.logging = { level: overrides.logLevel.trim().toLowerCase() };
  }
  return config;
}

function mergeFileConfig(base: FileConfig, next: FileConfig): FileConfig {
  return {
    ...base,
    ...next,
    ui: base.ui || next.ui ? { ...base.ui, ...next.ui } : undefined,
    logging: base.logging || next.logging ? { ...base.logging, ...next.logging } : undefined,
  };
}

function readEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

// Non-numeric strings become NaN and are rejected by the schema with the key's path.
function toNumber(value: string): number {
  return Number(value.trim());
}
