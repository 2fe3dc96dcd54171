import pino from "pino";
import { LOG_LEVELS, type LogLevel } from "./config/schema/logging";

export { LOG_LEVELS, type LogLevel };
const DEFAULT_LOG_LEVEL: LogLevel = "info";

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** Unknown or empty values fall back to `info`. */
export function resolveLogLevel(raw: string | undefined): LogLevel {
  const normalized = raw?.trim().toLowerCase() ?? "";
  return isLogLevel(normalized) ? normalized : DEFAULT_LOG_LEVEL;
}

function shouldColorizeLogs(): boolean {
  if (process.env.NO_COLOR === "1" || process.env.NO_COLOR === "true") {
    return false;
  }
  return process.stdout.isTTY;
}

// RTMBOT_LOG_FORMAT=json writes plain pino lines, for log collectors.
const prettyOutput = process.env.RTMBOT_LOG_FORMAT !== "json";

export const logger = pino({
  name: "rtmbot",
  level: resolveLogLevel(process.env.LOG_LEVEL),
  ...(prettyOutput
    ? {
        transport: {
          target: "pino-pretty",
          options: { colorize: shouldColorizeLogs(), ignore: "pid,hostname" },
        },
      }
    : {}),
});

/** The configured level wins over `LOG_LEVEL`. */
export function configureLogger(level?: LogLevel): void {
  logger.level = level ?? resolveLogLevel(process.env.LOG_LEVEL);
}
