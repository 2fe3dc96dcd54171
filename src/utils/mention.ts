const MENTION_PATTERN = /^<@([A-Z0-9]+)(?:\|[^>]*)?>$/;

/** `<@U123ABC>` or `<@U123ABC|name>` to `U123ABC`; anything else yields undefined. */
export function mentionToUserId(mention: string): string | undefined {
  const matched = MENTION_PATTERN.exec(mention.trim());
  return matched?.[1];
}

export function userIdToMention(userId: string): string {
  return `<@${userId}>`;
}
