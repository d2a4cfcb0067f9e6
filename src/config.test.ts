import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadTermchatConfig } from "./config.js";
import { ConfigError } from "./errors.js";

let home = "";
let cwd = "";

beforeEach(() => {
  home = fs.mkdtempSync(path.join(os.tmpdir(), "termchat-home-"));
  cwd = fs.mkdtempSync(path.join(os.tmpdir(), "termchat-cwd-"));
});

afterEach(() => {
  fs.rmSync(home, { recursive: true, force: true });
  fs.rmSync(cwd, { recursive: true, force: true });
});

function writeJson(filePath: string, value: unknown): void {
  fs.writeFileSync(filePath, JSON.stringify(value));
}

describe("loadTermchatConfig", () => {
  it("falls back to defaults", () => {
    const config = loadTermchatConfig({ cwd, env: { TERMCHAT_HOME: home } });
    expect(config).toMatchObject({
      apiKey: "",
      baseUrl: "https://api.groq.com/openai/v1",
      defaultModel: "openai/gpt-oss-20b",
      maxTokens: 8192,
      reasoningEffort: "medium",
      includeReasoning: true,
      retryAttempts: 3,
      dataDir: path.resolve(home),
      ui: { escapeTimeoutMs: 25, paletteMaxVisible: 8, color: true },
      logging: { level: "info", retainFiles: 10 },
    });
  });

  it("layers files, environment and flags", () => {
    writeJson(path.join(home, "config.json"), {
      defaultModel: "compound-beta",
      maxTokens: 100,
      ui: { paletteMaxVisible: 4 },
    });
    writeJson(path.join(cwd, "termchat.json"), { maxTokens: 200, ui: { escapeTimeoutMs: 30 } });

    const config = loadTermchatConfig({
      cwd,
      env: { TERMCHAT_HOME: home, TERMCHAT_MAX_TOKENS: "300", GROQ_API_KEY: "test-secret" },
      overrides: { model: "openai/gpt-oss-120b", escapeTimeoutMs: "40", logLevel: "DEBUG" },
    });

    expect(config.defaultModel).toBe("openai/gpt-oss-120b");
    expect(config.maxTokens).toBe(300);
    expect(config.apiKey).toBe("test-secret");
    expect(config.ui).toEqual({ escapeTimeoutMs: 40, paletteMaxVisible: 4, color: true });
    expect(config.logging.level).toBe("debug");
  });

  it("prefers TERMCHAT_API_KEY and reads boolean switches", () => {
    const config = loadTermchatConfig({
      cwd,
      env: {
        TERMCHAT_HOME: home,
        TERMCHAT_API_KEY: "test-secret",
        GROQ_API_KEY: "other-secret",
        TERMCHAT_INCLUDE_REASONING: "false",
        NO_COLOR: "1",
      },
    });
    expect(config.apiKey).toBe("test-secret");
    expect(config.includeReasoning).toBe(false);
    expect(config.ui.color).toBe(false);
  });

  it("names the offending setting", () => {
    expect(() => loadTermchatConfig({ cwd, env: { TERMCHAT_HOME: home, TERMCHAT_MAX_TOKENS: "lots" } })).toThrow(
      "invalid config from environment at maxTokens",
    );
    expect(() =>
      loadTermchatConfig({ cwd, env: { TERMCHAT_HOME: home }, overrides: { escapeTimeoutMs: "0" } }),
    ).toThrow("invalid config from command line at ui.escapeTimeoutMs");
  });

  it("rejects broken and unknown file contents", () => {
    const file = path.join(cwd, "termchat.json");
    fs.writeFileSync(file, "{ nope");
    expect(() => loadTermchatConfig({ cwd, env: { TERMCHAT_HOME: home } })).toThrow(
      new ConfigError(`invalid JSON config: ${file}`),
    );

    writeJson(file, { colour: true });
    expect(() => loadTermchatConfig({ cwd, env: { TERMCHAT_HOME: home } })).toThrow(
      `invalid config from ${file} at (root)`,
    );
  });

  it("reads only the file named on the command line", () => {
    writeJson(path.join(home, "config.json"), { maxTokens: 100 });
    writeJson(path.join(cwd, "custom.json"), { temperature: 0.2 });

    const config = loadTermchatConfig({ cwd, env: { TERMCHAT_HOME: home }, overrides: { configFile: "custom.json" } });
    expect(config.maxTokens).toBe(8192);
    expect(config.temperature).toBe(0.2);

    expect(() =>
      loadTermchatConfig({ cwd, env: { TERMCHAT_HOME: home }, overrides: { configFile: "missing.json" } }),
    ).toThrow("config file not found: missing.json");
  });
});
