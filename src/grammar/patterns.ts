/**
 * Small pattern combinators used to describe command grammars.
 *
 * Every terminal pattern skips leading whitespace before it tries to match,
 * so `seq(literal("greet"), word())` accepts "greet   Ada".
 */

export type CaptureValue = string | string[];
export type Captures = Record<string, CaptureValue>;

export interface PatternMatch {
  end: number;
  captures: Captures;
}

export interface Pattern {
  parse(input: string, offset: number): PatternMatch | null;
}

const WORD_CHAR = /[A-Za-z0-9_]/;
const ALPHANUMS = "A-Za-z0-9";

function skipWhitespace(input: string, offset: number): number {
  let cursor = offset;
  while (cursor < input.length && /\s/.test(input[cursor])) {
    cursor += 1;
  }
  return cursor;
}

function escapeClass(chars: string): string {
  return chars.replace(/[\]\\^]/g, "\\$&");
}

function mergeCaptures(target: Captures, source: Captures): Captures {
  return { ...target, ...source };
}

/** Case-insensitive literal. Keyword-like literals must end on a word boundary. */
export function literal(text: string): Pattern {
  const expected = text.toLowerCase();
  const needsBoundary = WORD_CHAR.test(text[text.length - 1] ?? "");
  return {
    parse(input, offset) {
      const start = skipWhitespace(input, offset);
      const candidate = input.slice(start, start + expected.length);
      if (candidate.toLowerCase() !== expected) {
        return null;
      }
      const end = start + expected.length;
      if (needsBoundary && end < input.length && WORD_CHAR.test(input[end])) {
        return null;
      }
      return { end, captures: {} };
    },
  };
}

export function regex(re: RegExp): Pattern {
  const flags = re.flags.includes("y") ? re.flags : `${re.flags}y`;
  const sticky = new RegExp(re.source, flags);
  return {
    parse(input, offset) {
      const start = skipWhitespace(input, offset);
      sticky.lastIndex = start;
      const matched = sticky.exec(input);
      if (!matched || matched[0].length === 0) {
        return null;
      }
      return { end: start + matched[0].length, captures: {} };
    },
  };
}

/** One or more characters out of a character-class body such as `A-Za-z0-9-`. */
export function word(chars: string = ALPHANUMS): Pattern {
  return regex(new RegExp(`[${chars}]+`));
}

export function seq(...patterns: Pattern[]): Pattern {
  return {
    parse(input, offset) {
      let cursor = offset;
      let captures: Captures = {};
      for (const pattern of patterns) {
        const result = pattern.parse(input, cursor);
        if (!result) {
          return null;
        }
        cursor = result.end;
        captures = mergeCaptures(captures, result.captures);
      }
      return { end: cursor, captures };
    },
  };
}

export function optional(pattern: Pattern): Pattern {
  return {
    parse(input, offset) {
      return pattern.parse(input, offset) ?? { end: offset, captures: {} };
    },
  };
}

export function oneOf(...patterns: Pattern[]): Pattern {
  return {
    parse(input, offset) {
      for (const pattern of patterns) {
        const result = pattern.parse(input, offset);
        if (result) {
          return result;
        }
      }
      return null;
    },
  };
}

/**
 * Repeats `pattern` greedily, at least once. Captures of the repeated pattern
 * are collected into arrays under their names.
 */
export function oneOrMore(pattern: Pattern): Pattern {
  return {
    parse(input, offset) {
      let cursor = offset;
      let count = 0;
      const collected: Record<string, string[]> = {};
      for (;;) {
        const result = pattern.parse(input, cursor);
        if (!result || result.end === cursor) {
          break;
        }
        count += 1;
        cursor = result.end;
        for (const [name, value] of Object.entries(result.captures)) {
          const bucket = collected[name] ?? [];
          bucket.push(...(Array.isArray(value) ? value : [value]));
          collected[name] = bucket;
        }
      }
      if (count === 0) {
        return null;
      }
      return { end: cursor, captures: collected };
    },
  };
}

export function capture(name: string, pattern: Pattern): Pattern {
  return {
    parse(input, offset) {
      const result = pattern.parse(input, offset);
      if (!result) {
        return null;
      }
      const text = input.slice(offset, result.end).trim();
      return { end: result.end, captures: { ...result.captures, [name]: text } };
    },
  };
}

/** Whatever text remains, which must not be empty. */
export function rest(name: string): Pattern {
  return {
    parse(input, offset) {
      const start = skipWhitespace(input, offset);
      if (start >= input.length) {
        return null;
      }
      return { end: input.length, captures: { [name]: input.slice(start).trimEnd() } };
    },
  };
}

export function end(): Pattern {
  return {
    parse(input, offset) {
      const cursor = skipWhitespace(input, offset);
      return cursor === input.length ? { end: cursor, captures: {} } : null;
    },
  };
}

function quoted(open: string, close: string): Pattern {
  const body = `[^${escapeClass(close)}\\\\]*(?:\\\\.[^${escapeClass(close)}\\\\]*)*`;
  const re = new RegExp(`${open}(${body})${close}`, "y");
  return {
    parse(input, offset) {
      const start = skipWhitespace(input, offset);
      re.lastIndex = start;
      const matched = re.exec(input);
      if (!matched) {
        return null;
      }
      const value = matched[1].replace(/\\(.)/g, "$1");
      return { end: start + matched[0].length, captures: { item: value } };
    },
  };
}

const bareItem: Pattern = {
  parse(input, offset) {
    const start = skipWhitespace(input, offset);
    let cursor = start;
    while (cursor < input.length && input[cursor] !== ",") {
      cursor += 1;
    }
    const value = input.slice(start, cursor).trim();
    if (!value) {
      return null;
    }
    return { end: cursor, captures: { item: value } };
  },
};

export const emoji = regex(/:\S+?:/);
export const channelName = word("A-Za-z0-9-");
export const userName = word("A-Za-z0-9\\-_.");
export const link = regex(/\S+/);
export const integer = regex(/\d+/);
export const alphanumWord = word();
export const message = oneOrMore(word("A-Za-z0-9#"));

/** A Slack user mention such as `<@U01234567>`; the user id is captured. */
export function mention(name: string): Pattern {
  const re = /<@(U[0-9A-Z]{8,})>/y;
  return {
    parse(input, offset) {
      const start = skipWhitespace(input, offset);
      re.lastIndex = start;
      const matched = re.exec(input);
      if (!matched) {
        return null;
      }
      return { end: start + matched[0].length, captures: { [name]: matched[1] } };
    },
  };
}

/**
 * Comma separated items; each item is “curly”, ‘curly single’, "double" or
 * 'single' quoted, or bare text up to the next comma. Items land in `name`.
 */
export function commaList(name: string): Pattern {
  const item = oneOf(
    quoted("‘", "’"),
    quoted("“", "”"),
    quoted('"', '"'),
    quoted("'", "'"),
    bareItem,
  );
  const separated = seq(literal(","), item);
  return {
    parse(input, offset) {
      const first = item.parse(input, offset);
      if (!first) {
        return null;
      }
      const items = [String(first.captures.item)];
      let cursor = first.end;
      for (;;) {
        const next = separated.parse(input, cursor);
        if (!next) {
          break;
        }
        items.push(String(next.captures.item));
        cursor = next.end;
      }
      return { end: cursor, captures: { [name]: items } };
    },
  };
}

function flagToken(name: string): string {
  return `${name.length > 1 ? "--" : "-"}${name}`;
}

export function flag(name: string): Pattern {
  return capture(name, literal(flagToken(name)));
}

export function flagWithArg(name: string, argument: Pattern): Pattern {
  return seq(literal(flagToken(name)), capture(name, argument));
}
