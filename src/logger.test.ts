import { afterEach, describe, expect, it, vi } from "vitest";

async function loadLogger() {
  vi.stubEnv("RTMBOT_LOG_FORMAT", "json");
  return import("./logger");
}

afterEach(() => {
  vi.unstubAllEnvs();
  vi.resetModules();
});

describe("resolveLogLevel", () => {
  it("normalizes known levels", async () => {
    const { resolveLogLevel } = await loadLogger();

    expect(resolveLogLevel(" DEBUG ")).toBe("debug");
    expect(resolveLogLevel("fatal")).toBe("fatal");
  });

  it("falls back to info", async () => {
    const { resolveLogLevel } = await loadLogger();

    expect(resolveLogLevel("verbose")).toBe("info");
    expect(resolveLogLevel("")).toBe("info");
    expect(resolveLogLevel(undefined)).toBe("info");
  });
});

describe("configureLogger", () => {
  it("prefers the configured level over LOG_LEVEL", async () => {
    vi.stubEnv("LOG_LEVEL", "warn");
    const { configureLogger, logger } = await loadLogger();
    expect(logger.level).toBe("warn");

    configureLogger("debug");
    expect(logger.level).toBe("debug");

    configureLogger();
    expect(logger.level).toBe("warn");
  });
});
