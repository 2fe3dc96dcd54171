import type { ActionTree } from "../actions/types";
import type { Captures, Pattern } from "../grammar/patterns";

export type HandlerResult = ActionTree | Promise<ActionTree>;

export interface CommandInvocation {
  /** Sender's user id. */
  user: string;
  /** Channel name, or null inside a direct message. */
  channel: string | null;
  args: Captures;
  timestamp?: string;
}

export interface ListenerInvocation {
  user: string;
  channel: string;
  text: string;
  timestamp?: string;
}

export type CommandCallback = (invocation: CommandInvocation) => HandlerResult;
export type ListenerCallback = (invocation: ListenerInvocation) => HandlerResult;

interface HandlerRecordBase {
  name: string;
  doc: string;
  /** Allowed channel names; null means any channel. */
  channels: ReadonlySet<string> | null;
  adminOnly: boolean;
  wantsTimestamp: boolean;
}

export interface FilteredHandler extends HandlerRecordBase {
  callback: CommandCallback;
}

export interface UnfilteredHandler extends HandlerRecordBase {
  callback: ListenerCallback;
}

interface HandlerSpecBase {
  name: string;
  doc?: string;
  channels?: Iterable<string>;
  wantsTimestamp?: boolean;
}

export interface CommandSpec extends HandlerSpecBase {
  kind: "command";
  pattern: Pattern;
  priority?: number;
  adminOnly?: boolean;
  handle: CommandCallback;
}

export interface ListenerSpec extends HandlerSpecBase {
  kind: "listener";
  handle: ListenerCallback;
}

export type HandlerSpec = CommandSpec | ListenerSpec;
