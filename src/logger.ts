import fs from "node:fs";
import path from "node:path";
import pino, { type Logger } from "pino";
import type { LogLevel } from "./config.js";

export type { Logger };

export interface LoggingOptions {
  dir: string;
  level?: LogLevel;
  retainFiles?: number;
  sync?: boolean;
}

const CURRENT_LOG_FILE_NAME = "current.log";
const ROTATED_LOG_PATTERN = /^\d{8}T\d{6}\.log$/;

const state: { root: Logger | null; file: string | null } = {
  root: null,
  file: null,
};

// The terminal belongs to the renderer, so logs only ever go to a file.
export function initLogging(options: LoggingOptions): Logger {
  const level = options.level ?? "info";
  const retainFiles = options.retainFiles ?? 10;
  fs.mkdirSync(options.dir, { recursive: true });

  const file = path.join(options.dir, CURRENT_LOG_FILE_NAME);
  rotateCurrentLog(file);
  pruneRotatedLogs(options.dir, retainFiles);

  const destination = pino.destination({
    dest: file,
    mkdir: true,
    sync: options.sync ?? false,
    append: true,
  });
  state.root = pino({ level, timestamp: pino.stdTimeFunctions.isoTime }, destination);
  state.file = file;
  return state.root;
}

export function createLogger(scope: string): Logger {
  return getRootLogger().child({ scope });
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}

export function logPath(): string | null {
  return state.file;
}

function getRootLogger(): Logger {
  if (!state.root) {
    state.root = createSilentLogger();
  }
  return state.root;
}

function timestampFileName(at: Date): string {
  const value = at
    .toISOString()
    .replace(/[-:]/g, "")
    .replace(/\..+$/, "");
  return `${value}.log`;
}

function rotateCurrentLog(currentPath: string): void {
  if (!fs.existsSync(currentPath)) {
    return;
  }
  const stat = fs.statSync(currentPath);
  if (stat.size === 0) {
    return;
  }
  fs.renameSync(currentPath, path.join(path.dirname(currentPath), timestampFileName(stat.mtime)));
}

function pruneRotatedLogs(dir: string, retainFiles: number): void {
  const rotated = fs
    .readdirSync(dir)
    .filter((name) => ROTATED_LOG_PATTERN.test(name))
    .map((name) => {
      const fullPath = path.join(dir, name);
      return { fullPath, mtime: fs.statSync(fullPath).mtimeMs };
    })
    .sort((left, right) => right.mtime - left.mtime);

  for (const entry of rotated.slice(retainFiles)) {
    fs.unlinkSync(entry.fullPath);
  }
}
