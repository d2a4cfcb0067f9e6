import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { ChatMessage } from "./chat-types.js";
import type { Conversation } from "./conversation.js";
import { ConversationFormatError } from "./errors.js";

export const EXPORT_FORMATS = ["json", "md", "txt"] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export type LoadedConversation = {
  sessionId?: string;
  model?: string;
  messages: ChatMessage[];
};

export type SavedConversationSummary = {
  filePath: string;
  fileName: string;
  modifiedAt: string;
};

const CONVERSATIONS_DIR_NAME = "conversations";
const ILLEGAL_FILE_NAME_CHARS = /[<>:"/\\|?*]/g;

const savedMessageSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
  timestamp: z.string().optional(),
});

// Accepts files written by saveConversation and the older snake_case layout.
const savedConversationSchema = z.object({
  version: z.literal(1).optional(),
  sessionId: z.string().optional(),
  session_id: z.string().optional(),
  model: z.string().optional(),
  createdAt: z.string().optional(),
  savedAt: z.string().optional(),
  messages: z.array(savedMessageSchema),
});

type SavedConversation = z.infer<typeof savedConversationSchema>;

export function getConversationsDir(dataDir: string): string {
  return path.join(dataDir, CONVERSATIONS_DIR_NAME);
}

/** Replaces characters that are illegal in file names, collapses underscores and trims `_`/`.` from the ends. */
export function sanitizeFileName(fileName: string): string {
  return fileName
    .replace(ILLEGAL_FILE_NAME_CHARS, "_")
    .replace(/_+/g, "_")
    .replace(/^[_.]+|[_.]+$/g, "");
}

/**
 * Resolves where a conversation is written. Bare names land in the conversations
 * directory; anything with a directory part is taken relative to `cwd`.
 */
export function defaultSavePath(params: {
  dataDir: string;
  requested?: string;
  sessionId: string;
  format: ExportFormat;
  cwd?: string;
}): string {
  const requested = params.requested?.trim() ?? "";
  const extension = `.${params.format}`;
  if (requested && (requested.includes("/") || requested.includes("\\"))) {
    const resolved = path.resolve(params.cwd ?? process.cwd(), requested);
    return path.extname(resolved) ? resolved : `${resolved}${extension}`;
  }

  const baseName = sanitizeFileName(requested) || params.sessionId;
  const fileName = path.extname(baseName) ? baseName : `${baseName}${extension}`;
  return path.join(getConversationsDir(params.dataDir), fileName);
}

export function saveConversation(conversation: Conversation, filePath: string, at: Date = new Date()): string {
  writeFileAtomic(filePath, `${JSON.stringify(toSavedConversation(conversation, at), null, 2)}\n`);
  return filePath;
}

export function loadConversation(filePath: string): LoadedConversation {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    throw new ConversationFormatError(`cannot read ${filePath}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConversationFormatError(`${filePath} is not valid JSON`, { cause: error });
  }

  const result = savedConversationSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join(".") : "(root)";
    throw new ConversationFormatError(
      `${filePath} is not a saved conversation (${where}: ${issue?.message ?? "unknown issue"})`,
      { cause: result.error },
    );
  }

  const data = result.data;
  const fallbackTime = data.savedAt ?? data.createdAt ?? new Date().toISOString();
  return {
    sessionId: data.sessionId ?? data.session_id,
    model: data.model,
    messages: data.messages.map((message) => ({
      role: message.role,
      text: message.content,
      createdAt: message.timestamp ?? fallbackTime,
    })),
  };
}

export function exportConversation(
  conversation: Conversation,
  filePath: string,
  format: ExportFormat,
  at: Date = new Date(),
): string {
  writeFileAtomic(filePath, renderConversation(conversation, format, at));
  return filePath;
}

export function renderConversation(conversation: Conversation, format: ExportFormat, at: Date = new Date()): string {
  switch (format) {
    case "json":
      return `${JSON.stringify(toSavedConversation(conversation, at), null, 2)}\n`;
    case "md":
      return renderMarkdown(conversation, at);
    case "txt":
      return renderPlainText(conversation, at);
  }
}

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

export function listSavedConversations(dataDir: string, limit?: number): SavedConversationSummary[] {
  const dir = getConversationsDir(dataDir);
  if (!fs.existsSync(dir)) {
    return [];
  }

  const saved = fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.endsWith(".json"))
    .map((entry) => {
      const filePath = path.join(dir, entry.name);
      return {
        filePath,
        fileName: entry.name,
        modifiedAt: fs.statSync(filePath).mtime.toISOString(),
      };
    })
    .sort((left, right) => right.modifiedAt.localeCompare(left.modifiedAt));

  if (typeof limit === "number" && Number.isFinite(limit) && limit > 0) {
    return saved.slice(0, Math.floor(limit));
  }
  return saved;
}

function toSavedConversation(conversation: Conversation, at: Date): SavedConversation {
  return {
    version: 1,
    sessionId: conversation.sessionId,
    model: conversation.model,
    createdAt: conversation.createdAt,
    savedAt: at.toISOString(),
    messages: conversation.messages.map((message) => ({
      role: message.role,
      content: message.text,
      timestamp: message.createdAt,
    })),
  };
}

function renderMarkdown(conversation: Conversation, at: Date): string {
  const lines = [
    `# Conversation ${conversation.sessionId}`,
    "",
    `- model: \`${conversation.model}\``,
    `- exported: ${at.toISOString()}`,
    `- messages: ${conversation.messages.length}`,
  ];
  for (const message of conversation.messages) {
    lines.push("", `## ${message.role === "user" ? "You" : "Assistant"}`, "", message.text);
  }
  return `${lines.join("\n")}\n`;
}

function renderPlainText(conversation: Conversation, at: Date): string {
  const lines = [
    `Conversation ${conversation.sessionId}`,
    `Model: ${conversation.model}`,
    `Exported: ${at.toISOString()}`,
  ];
  for (const message of conversation.messages) {
    lines.push("", `[${message.createdAt}] ${message.role === "user" ? "You" : "Assistant"}:`, message.text);
  }
  return `${lines.join("\n")}\n`;
}

function writeFileAtomic(filePath: string, payload: string): void {
  const tmpPath = `${filePath}.tmp`;
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  try {
    fs.writeFileSync(tmpPath, payload, "utf8");
    fs.renameSync(tmpPath, filePath);
  } catch (error) {
    fs.rmSync(tmpPath, { force: true });
    throw error;
  }
}
