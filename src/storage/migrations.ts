import type { Database as DatabaseType } from "better-sqlite3";
import { logger } from "../logger";

export function runMigrations(conn: DatabaseType): void {
  conn.exec(`
    CREATE TABLE IF NOT EXISTS history (
      timestamp TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      channel_name TEXT NOT NULL,
      text TEXT NOT NULL,
      created_at TEXT DEFAULT CURRENT_TIMESTAMP
    );
  `);

  conn.exec(`
    CREATE INDEX IF NOT EXISTS idx_history_channel ON history(channel_name);
  `);

  conn.exec(`
    CREATE INDEX IF NOT EXISTS idx_history_user ON history(user_id);
  `);

  logger.debug("History migrations applied");
}
