import { literal, type Captures, type Pattern } from "./patterns";

export interface GrammarEntry {
  priority: number;
  name: string;
  pattern: Pattern;
}

export type MatchResult =
  | { matched: true; name: string; args: Captures }
  | { matched: false };

const NO_MATCH: MatchResult = { matched: false };

/**
 * Ordered alternation of every registered command pattern.
 *
 * Entries are kept sorted by descending priority. A new entry is inserted ahead
 * of the first entry whose priority is not higher than its own, so among equal
 * priorities the most recently added entry is tried first.
 */
export class CommandGrammar {
  private readonly commands: GrammarEntry[] = [];
  private readonly prefix: Pattern;

  constructor(readonly alert: string = "!") {
    this.prefix = literal(alert);
  }

  add(pattern: Pattern, name: string, priority = 0): void {
    const entry: GrammarEntry = { priority, name, pattern };
    const index = this.commands.findIndex((existing) => priority >= existing.priority);
    if (index === -1) {
      this.commands.push(entry);
      return;
    }
    this.commands.splice(index, 0, entry);
  }

  entries(): readonly GrammarEntry[] {
    return this.commands;
  }

  get size(): number {
    return this.commands.length;
  }

  /** In direct messages the alert prefix may be omitted; elsewhere it is required. */
  match(text: string, isDirect = false): MatchResult {
    let offset = 0;
    const head = this.prefix.parse(text, 0);
    if (head) {
      offset = head.end;
    } else if (!isDirect) {
      return NO_MATCH;
    }

    for (const entry of this.commands) {
      const result = entry.pattern.parse(text, offset);
      if (result) {
        return { matched: true, name: entry.name, args: result.captures };
      }
    }
    return NO_MATCH;
  }
}
