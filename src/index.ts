export * from "./actions";
export * from "./config";
export { ConfigError, ProtocolError, SlackApiError, UnknownTargetError } from "./errors";
export { CommandGrammar, type GrammarEntry, type MatchResult } from "./grammar/grammar";
export * as patterns from "./grammar/patterns";
export type { Captures, Pattern, PatternMatch } from "./grammar/patterns";
export { registerBot, type Bot, type HandlerTarget } from "./handlers/bot";
export { acceptsChannel, HandlerRegistry } from "./handlers/registry";
export type {
  CommandInvocation,
  CommandSpec,
  HandlerSpec,
  ListenerInvocation,
  ListenerSpec,
} from "./handlers/types";
export { configureLogger, logger } from "./logger";
export { HttpSlackApi, type HttpSlackApiConfig } from "./runtime/api/http-client";
export type { SlackApi } from "./runtime/api/types";
export { ADMIN_ONLY_REPLY, EventDispatcher, type DispatchOutcome } from "./runtime/dispatcher";
export { backfillHistory } from "./runtime/history/backfill";
export { classifyForDeletion, clearCommands } from "./runtime/history/cleanup";
export { fetchAllHistory, fetchChannelHistory } from "./runtime/history/paginate";
export { IdentityMap } from "./runtime/ids";
export { OutboundSender, PendingResponses } from "./runtime/outbound";
export { SlackRuntime, type RuntimeStatus, type SlackRuntimeOptions } from "./runtime/runtime";
export { TaskScope } from "./runtime/scope";
export { WebSocketTransport } from "./runtime/transport/websocket";
export type { Transport, TransportFactory } from "./runtime/transport/types";
export { openDatabase } from "./storage/connection";
export { MemoryHistoryStore, SqliteHistoryStore } from "./storage/repos/history";
export type { HistoryRecord, HistoryStore } from "./storage/types";
export { mentionToUserId, userIdToMention } from "./utils/mention";
