export interface HistoryRecord {
  userId: string;
  channelName: string;
  text: string;
  /** Slack message timestamp; unique per record. */
  timestamp: string;
}

export interface HistoryQuery {
  channel?: string;
  userId?: string;
}

/** Long-term message history. Writes with a known timestamp are ignored. */
export interface HistoryStore {
  save(record: HistoryRecord): void;
  query(filter?: HistoryQuery): HistoryRecord[];
  clear(): void;
}
