import Database, { type Database as DatabaseType } from "better-sqlite3";
import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { logger } from "../logger";
import { runMigrations } from "./migrations";

export const DEFAULT_DB_PATH = "data/rtmbot.db";

function setupConnection(conn: DatabaseType): void {
  conn.pragma("journal_mode = WAL");
  conn.pragma("synchronous = NORMAL");
  conn.pragma("busy_timeout = 5000");
}

/** Opens (creating if needed) the history database and brings its schema up to date. */
export function openDatabase(path: string = DEFAULT_DB_PATH): DatabaseType {
  if (path !== ":memory:") {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }
  const conn = new Database(path);
  setupConnection(conn);
  runMigrations(conn);
  logger.info({ path }, "History database opened");
  return conn;
}
