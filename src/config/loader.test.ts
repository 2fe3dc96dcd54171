import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { CONFIG_ENV_VAR, loadConfig, resolveConfigPath } from "./loader";

const ENV_KEY = "RTMBOT_LOADER_TEST_TOKEN";
const ORIGINAL_ENV = process.env[ENV_KEY];
const ORIGINAL_CONFIG_ENV = process.env[CONFIG_ENV_VAR];
const tempDirs: string[] = [];

function writeConfig(contents: string): { dir: string; configPath: string } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "rtmbot-loader-"));
  tempDirs.push(dir);
  const configPath = path.join(dir, "config.jsonc");
  fs.writeFileSync(configPath, contents, "utf-8");
  return { dir, configPath };
}

afterEach(() => {
  for (const [key, original] of [
    [ENV_KEY, ORIGINAL_ENV],
    [CONFIG_ENV_VAR, ORIGINAL_CONFIG_ENV],
  ] as const) {
    if (original === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = original;
    }
  }
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("resolveConfigPath", () => {
  it("prefers an explicit path over the environment", () => {
    process.env[CONFIG_ENV_VAR] = "/tmp/from-env.jsonc";
    expect(resolveConfigPath("/tmp/explicit.jsonc")).toBe("/tmp/explicit.jsonc");
    expect(resolveConfigPath()).toBe("/tmp/from-env.jsonc");
  });

  it("falls back to the home directory", () => {
    delete process.env[CONFIG_ENV_VAR];
    expect(resolveConfigPath()).toBe(path.join(os.homedir(), ".rtmbot", "config.jsonc"));
  });
});

describe("loadConfig", () => {
  it("parses JSONC and applies defaults", () => {
    const { configPath } = writeConfig(`{
      // bot credentials
      "slack": { "token": "test-secret", "botName": "helper", },
    }`);

    const result = loadConfig(configPath);

    expect(result.success).toBe(true);
    expect(result.config?.slack).toEqual({
      token: "test-secret",
      botName: "helper",
      alert: "!",
      admins: [],
    });
    expect(result.config?.history).toEqual({
      persist: false,
      loadOnConnect: false,
      clearCommands: false,
      includeDms: true,
      pacingMs: 1000,
      progressEvery: 100,
    });
    expect(result.config?.logging).toEqual({ level: "info" });
  });

  it("substitutes variables from the .env file beside the config", () => {
    delete process.env[ENV_KEY];
    const { dir, configPath } = writeConfig(
      JSON.stringify({ slack: { token: `\${${ENV_KEY}}`, botName: "helper" } }),
    );
    fs.writeFileSync(path.join(dir, ".env"), `${ENV_KEY}=test-secret-from-env\n`, "utf-8");

    const result = loadConfig(configPath);

    expect(result.success).toBe(true);
    expect(result.config?.slack.token).toBe("test-secret-from-env");
  });

  it("reports variables that are not set instead of keeping the placeholder", () => {
    delete process.env[ENV_KEY];
    const { configPath } = writeConfig(
      JSON.stringify({ slack: { token: `\${${ENV_KEY}}`, botName: "helper" } }),
    );

    const result = loadConfig(configPath);

    expect(result.success).toBe(false);
    expect(result.errors).toEqual([`slack.token: environment variable ${ENV_KEY} is not set`]);
  });

  it("resolves a relative database path against the config directory", () => {
    const { dir, configPath } = writeConfig(
      JSON.stringify({
        slack: { token: "test-secret", botName: "helper" },
        history: { persist: true, dbPath: "data/history.db" },
      }),
    );

    const result = loadConfig(configPath);

    expect(result.config?.history.dbPath).toBe(path.join(dir, "data", "history.db"));
  });

  it("reports schema errors with their paths", () => {
    const { configPath } = writeConfig(JSON.stringify({ slack: { token: "test-secret" } }));

    const result = loadConfig(configPath);

    expect(result.success).toBe(false);
    expect(result.errors).toEqual(["slack.botName: Required"]);
  });

  it("rejects unknown top-level keys", () => {
    const { configPath } = writeConfig(
      JSON.stringify({ slack: { token: "test-secret", botName: "helper" }, extra: true }),
    );

    const result = loadConfig(configPath);

    expect(result.success).toBe(false);
    expect(result.errors?.[0]).toContain("Unrecognized key");
  });

  it("reports a missing file", () => {
    const result = loadConfig("/nonexistent/rtmbot/config.jsonc");

    expect(result).toEqual({
      success: false,
      errors: ["Config file not found: /nonexistent/rtmbot/config.jsonc"],
      path: "/nonexistent/rtmbot/config.jsonc",
    });
  });
});
