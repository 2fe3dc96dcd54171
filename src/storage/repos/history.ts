import type { Database as DatabaseType } from "better-sqlite3";
import type { HistoryQuery, HistoryRecord, HistoryStore } from "../types";

interface HistoryRow {
  timestamp: string;
  user_id: string;
  channel_name: string;
  text: string;
}

function toRecord(row: HistoryRow): HistoryRecord {
  return {
    userId: row.user_id,
    channelName: row.channel_name,
    text: row.text,
    timestamp: row.timestamp,
  };
}

export class SqliteHistoryStore implements HistoryStore {
  constructor(private readonly conn: DatabaseType) {}

  save(record: HistoryRecord): void {
    this.conn
      .prepare(
        `INSERT OR IGNORE INTO history (timestamp, user_id, channel_name, text) VALUES ($timestamp, $user_id, $channel_name, $text)`,
      )
      .run({
        timestamp: record.timestamp,
        user_id: record.userId,
        channel_name: record.channelName,
        text: record.text,
      });
  }

  query(filter: HistoryQuery = {}): HistoryRecord[] {
    const clauses: string[] = [];
    const values: string[] = [];
    if (filter.channel) {
      clauses.push("channel_name = ?");
      values.push(filter.channel);
    }
    if (filter.userId) {
      clauses.push("user_id = ?");
      values.push(filter.userId);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";
    const rows = this.conn
      .prepare<string[], HistoryRow>(
        `SELECT timestamp, user_id, channel_name, text FROM history ${where} ORDER BY CAST(timestamp AS REAL) ASC`,
      )
      .all(...values);
    return rows.map(toRecord);
  }

  clear(): void {
    this.conn.prepare("DELETE FROM history").run();
  }
}

/** In-process store for bots that run without persistence. */
export class MemoryHistoryStore implements HistoryStore {
  private readonly records = new Map<string, HistoryRecord>();

  save(record: HistoryRecord): void {
    if (!this.records.has(record.timestamp)) {
      this.records.set(record.timestamp, { ...record });
    }
  }

  query(filter: HistoryQuery = {}): HistoryRecord[] {
    return Array.from(this.records.values())
      .filter((record) => !filter.channel || record.channelName === filter.channel)
      .filter((record) => !filter.userId || record.userId === filter.userId)
      .sort((a, b) => Number(a.timestamp) - Number(b.timestamp));
  }

  clear(): void {
    this.records.clear();
  }
}
