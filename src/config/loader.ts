import { config as loadDotEnv } from "dotenv";
import { parse as parseJsonc, printParseErrorCode, type ParseError } from "jsonc-parser";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { expandEnvReferences } from "./env";
import { RtmbotConfigSchema, type RtmbotConfig } from "./schema";

export const CONFIG_ENV_VAR = "RTMBOT_CONFIG";

export interface ConfigLoadResult {
  success: boolean;
  config?: RtmbotConfig;
  errors?: string[];
  path: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expandHomePath(raw: string): string {
  const trimmed = raw.trim();
  if (trimmed === "~") {
    return os.homedir();
  }
  if (trimmed.startsWith("~/")) {
    return path.join(os.homedir(), trimmed.slice(2));
  }
  return raw;
}

export function resolveConfigPath(customPath?: string): string {
  const envPath = process.env[CONFIG_ENV_VAR];
  if (customPath) {
    return path.resolve(customPath);
  }
  if (envPath) {
    return path.resolve(envPath);
  }
  return path.join(os.homedir(), ".rtmbot", "config.jsonc");
}

/** Resolves `~` and relative database paths against the config file's directory. */
export function applyConfigDefaults(raw: unknown, configPath: string): unknown {
  if (!isRecord(raw)) {
    return raw;
  }
  const obj = { ...raw };

  if (isRecord(obj.history) && typeof obj.history.dbPath === "string") {
    const expanded = expandHomePath(obj.history.dbPath);
    obj.history = {
      ...obj.history,
      dbPath: path.resolve(path.dirname(configPath), expanded),
    };
  }

  return obj;
}

function loadConfigLocalEnv(resolvedPath: string): void {
  const envPath = path.join(path.dirname(resolvedPath), ".env");
  if (!fs.existsSync(envPath)) {
    return;
  }
  const result = loadDotEnv({ path: envPath, override: false });
  if (result.error) {
    throw result.error;
  }
}

export function loadConfig(configPath?: string): ConfigLoadResult {
  const resolvedPath = resolveConfigPath(configPath);
  if (!fs.existsSync(resolvedPath)) {
    return {
      success: false,
      errors: [`Config file not found: ${resolvedPath}`],
      path: resolvedPath,
    };
  }

  try {
    loadConfigLocalEnv(resolvedPath);
    const raw = fs.readFileSync(resolvedPath, "utf-8");
    const parseErrors: ParseError[] = [];
    let config: unknown = parseJsonc(raw, parseErrors, { allowTrailingComma: true });
    if (parseErrors.length > 0) {
      return {
        success: false,
        errors: parseErrors.map(
          (error) => `offset ${error.offset}: ${printParseErrorCode(error.error)}`,
        ),
        path: resolvedPath,
      };
    }
    const expanded = expandEnvReferences(config);
    if (expanded.unresolved.length > 0) {
      return {
        success: false,
        errors: expanded.unresolved.map(
          (ref) => `${ref.path}: environment variable ${ref.variable} is not set`,
        ),
        path: resolvedPath,
      };
    }
    config = applyConfigDefaults(expanded.value, resolvedPath);

    const result = RtmbotConfigSchema.safeParse(config);
    if (!result.success) {
      const errors = result.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`,
      );
      return { success: false, errors, path: resolvedPath };
    }

    return { success: true, config: result.data, path: resolvedPath };
  } catch (error) {
    return {
      success: false,
      errors: [error instanceof Error ? error.message : String(error)],
      path: resolvedPath,
    };
  }
}
