import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { z } from "zod";

export type TermchatPersistedState = {
  version: 1;
  selectedModel?: string;
  updatedAt?: string;
};

const STATE_FILE_NAME = "state.json";

const persistedStateSchema = z.object({
  selectedModel: z.string().optional(),
  updatedAt: z.string().optional(),
});

export function getTermchatDataDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.TERMCHAT_HOME?.trim();
  if (override) {
    return path.resolve(override);
  }
  return path.join(os.homedir(), ".termchat");
}

export function getStateFilePath(dataDir: string): string {
  return path.join(dataDir, STATE_FILE_NAME);
}

export function loadPersistedState(dataDir: string): TermchatPersistedState | null {
  const stateFilePath = getStateFilePath(dataDir);
  try {
    if (!fs.existsSync(stateFilePath)) {
      return null;
    }

    const parsed: unknown = JSON.parse(fs.readFileSync(stateFilePath, "utf8"));
    const result = persistedStateSchema.safeParse(parsed);
    if (!result.success) {
      return null;
    }

    return {
      version: 1,
      selectedModel: result.data.selectedModel?.trim() || undefined,
      updatedAt: result.data.updatedAt,
    };
  } catch {
    // unreadable state is treated as absent; it is rewritten on the next save
    return null;
  }
}

export function savePersistedState(dataDir: string, next: { selectedModel: string }): void {
  const payload: TermchatPersistedState = {
    version: 1,
    selectedModel: next.selectedModel.trim() || undefined,
    updatedAt: new Date().toISOString(),
  };

  const stateFilePath = getStateFilePath(dataDir);
  fs.mkdirSync(path.dirname(stateFilePath), { recursive: true });
  fs.writeFileSync(stateFilePath, `${JSON.stringify(payload, null, 2)}\n`, "utf8");
}
