/** Decoded RTM frame; fields are checked before use. */
export type RtmEvent = Record<string, unknown>;

export interface MessageEvent {
  user: string;
  channel: string;
  text: string;
  ts?: string;
}

export type ClassifiedEvent =
  | { kind: "message"; message: MessageEvent }
  | { kind: "response"; replyTo: number }
  | { kind: "group_join"; channel: { id: string; name: string } }
  | { kind: "channel_join"; channel: { id: string; name: string } }
  | { kind: "team_join"; user: { id: string; name: string } }
  | { kind: "other"; type?: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(value: unknown): string | undefined {
  return typeof value === "string" && value ? value : undefined;
}

function readNamedEntity(value: unknown): { id: string; name: string } | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const id = readString(value.id);
  const name = readString(value.name);
  return id && name ? { id, name } : undefined;
}

/**
 * A user-authored, non-empty message without subtype, bot marker or reply
 * tracking. History pages carry no channel field, so `requireChannel` is off
 * for them.
 */
export function readMessage(
  event: RtmEvent,
  options: { requireChannel?: boolean } = {},
): MessageEvent | undefined {
  const requireChannel = options.requireChannel ?? true;
  if (event.type !== "message") {
    return undefined;
  }
  if ("subtype" in event || "bot_id" in event || "reply_to" in event) {
    return undefined;
  }
  const text = readString(event.text);
  const user = readString(event.user);
  const channel = readString(event.channel);
  if (!text || !user || (requireChannel && !channel)) {
    return undefined;
  }
  return { user, channel: channel ?? "", text, ts: readString(event.ts) };
}

export function classifyEvent(event: RtmEvent): ClassifiedEvent {
  const message = readMessage(event);
  if (message) {
    return { kind: "message", message };
  }

  if ("reply_to" in event && event.ok === true && typeof event.reply_to === "number") {
    return { kind: "response", replyTo: event.reply_to };
  }

  if (event.type === "group_joined" || event.type === "channel_joined") {
    const channel = readNamedEntity(event.channel);
    if (channel) {
      return { kind: event.type === "group_joined" ? "group_join" : "channel_join", channel };
    }
  }

  if (event.type === "team_join") {
    const user = readNamedEntity(event.user);
    if (user) {
      return { kind: "team_join", user };
    }
  }

  return { kind: "other", type: readString(event.type) };
}
