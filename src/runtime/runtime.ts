import { EventEmitter } from "node:events";
import { setTimeout as sleep } from "node:timers/promises";
import type { ActionTree } from "../actions/types";
import type { HandlerSpec } from "../handlers/types";
import type { HistoryStore } from "../storage/types";
import type { SlackApi } from "./api/types";
import type { TransportFactory } from "./transport/types";
import { ConfigError } from "../errors";
import { CommandGrammar } from "../grammar/grammar";
import { registerBot, type Bot } from "../handlers/bot";
import { HandlerRegistry } from "../handlers/registry";
import { logger } from "../logger";
import { EventDispatcher } from "./dispatcher";
import { backfillHistory } from "./history/backfill";
import { clearCommands } from "./history/cleanup";
import { IdentityMap } from "./ids";
import { OutboundSender } from "./outbound";
import { TaskScope } from "./scope";

export type RuntimeStatus = "disconnected" | "connecting" | "connected";

export interface SlackRuntimeOptions {
  api: SlackApi;
  transportFactory: TransportFactory;
  history: HistoryStore;
  botName: string;
  alert?: string;
  /** Admin user names, resolved to ids on every connect. */
  admins?: string[];
  loadHistoryOnConnect?: boolean;
  clearCommandsOnConnect?: boolean;
  includeDms?: boolean;
  pacingMs?: number;
  progressEvery?: number;
  chunkLimit?: number;
  reconnectDelayMs?: number;
}

interface Session {
  url: string;
  ids: IdentityMap;
  admins: ReadonlySet<string>;
  botUserId?: string;
}

const DEFAULT_RECONNECT_DELAY_MS = 1000;

function linkSignals(...signals: Array<AbortSignal | undefined>): AbortSignal {
  const controller = new AbortController();
  for (const signal of signals) {
    if (!signal) {
      continue;
    }
    if (signal.aborted) {
      controller.abort(signal.reason);
      break;
    }
    signal.addEventListener("abort", () => controller.abort(signal.reason), { once: true });
  }
  return controller.signal;
}

/**
 * Owns the command grammar, the handler registry, the preloaded action queue
 * and the task scope, and keeps one RTM connection alive at a time.
 *
 * Events: 'status' - (status: RuntimeStatus) => void
 */
export class SlackRuntime extends EventEmitter {
  readonly grammar: CommandGrammar;
  readonly registry = new HandlerRegistry();
  private readonly preloaded: ActionTree[] = [];
  private scope = new TaskScope();
  private status: RuntimeStatus = "disconnected";
  private loadHistoryPending: boolean;
  private clearCommandsPending: boolean;

  constructor(private readonly options: SlackRuntimeOptions) {
    super();
    this.grammar = new CommandGrammar(options.alert ?? "!");
    this.loadHistoryPending = options.loadHistoryOnConnect ?? false;
    this.clearCommandsPending = options.clearCommandsOnConnect ?? false;
  }

  getStatus(): RuntimeStatus {
    return this.status;
  }

  registerHandler(spec: HandlerSpec): void {
    const base = {
      name: spec.name,
      doc: spec.doc ?? "",
      channels: spec.channels === undefined ? null : new Set(spec.channels),
      wantsTimestamp: spec.wantsTimestamp ?? false,
    };
    if (spec.kind === "command") {
      this.grammar.add(spec.pattern, spec.name, spec.priority ?? 0);
      this.registry.registerFiltered({
        ...base,
        adminOnly: spec.adminOnly ?? false,
        callback: spec.handle,
      });
    } else {
      this.registry.registerUnfiltered({ ...base, adminOnly: false, callback: spec.handle });
    }
    logger.debug({ handler: spec.name, kind: spec.kind }, "Handler registered");
  }

  addBot(bot: Bot): void {
    registerBot(this, bot);
  }

  /** Queues actions to run once the next connection is up. */
  preload(actions: ActionTree): void {
    this.preloaded.push(actions);
  }

  /** Performs the handshake and returns the websocket URL. */
  async connect(signal?: AbortSignal): Promise<string> {
    const session = await this.handshake(signal ?? this.scope.signal);
    return session.url;
  }

  /** One connection: handshake, open the socket, dispatch until it closes. */
  async runConnection(signal: AbortSignal): Promise<void> {
    this.setStatus("connecting");
    const session = await this.handshake(signal);
    const transport = await this.options.transportFactory(session.url);
    try {
      const outbound = new OutboundSender(transport, { chunkLimit: this.options.chunkLimit });
      const dispatcher = new EventDispatcher({
        grammar: this.grammar,
        registry: this.registry,
        ids: session.ids,
        api: this.options.api,
        outbound,
        history: this.options.history,
        admins: session.admins,
        alert: this.grammar.alert,
        botUserId: session.botUserId,
      });
      this.setStatus("connected");

      const queued = this.preloaded.splice(0);
      if (queued.length > 0) {
        await dispatcher.execute(queued);
      }

      for (;;) {
        const event = await transport.receive(signal);
        if (!event) {
          break;
        }
        await dispatcher.dispatch(event);
      }
    } finally {
      await transport.close();
    }
  }

  /**
   * Keeps reconnecting until `signal` aborts. A failing handler or background
   * task cancels everything and rejects.
   */
  async run(signal?: AbortSignal): Promise<void> {
    const scope = new TaskScope();
    this.scope = scope;
    try {
      await scope.run(async (scopeSignal) => {
        const stop = linkSignals(scopeSignal, signal);
        while (!stop.aborted) {
          try {
            await this.runConnection(stop);
          } catch (err) {
            if (stop.aborted) {
              break;
            }
            throw err;
          }
          if (stop.aborted) {
            break;
          }
          logger.warn("RTM connection closed; reconnecting");
          await this.pause(stop);
        }
      });
    } finally {
      this.setStatus("disconnected");
    }
  }

  private async pause(signal: AbortSignal): Promise<void> {
    try {
      await sleep(this.options.reconnectDelayMs ?? DEFAULT_RECONNECT_DELAY_MS, undefined, {
        signal,
      });
    } catch (err) {
      if (!signal.aborted) {
        throw err;
      }
    }
  }

  /** `signal` stops a backfill in progress; the cleanup task follows the scope. */
  private async handshake(signal: AbortSignal): Promise<Session> {
    const { api } = this.options;
    const snapshot = await api.rtmStart();
    const ids = await IdentityMap.build(api, snapshot);
    const admins = this.resolveAdmins(ids);
    const botUserId = snapshot.self?.id ?? ids.userId(this.options.botName);
    const policy = { alert: this.grammar.alert, botUserId };

    if (this.loadHistoryPending) {
      this.loadHistoryPending = false;
      await backfillHistory({
        api,
        ids,
        store: this.options.history,
        policy,
        pacingMs: this.options.pacingMs,
        signal,
      });
    }

    if (this.clearCommandsPending) {
      this.clearCommandsPending = false;
      this.scope.spawn("clear-commands", async (taskSignal) => {
        const deleted = await clearCommands({
          api,
          ids,
          grammar: this.grammar,
          botUserId,
          includeDms: this.options.includeDms,
          pacingMs: this.options.pacingMs,
          progressEvery: this.options.progressEvery,
          signal: taskSignal,
        });
        logger.info({ deleted }, "Finished clearing commands");
      });
    }

    logger.info({ botUserId, admins: admins.size }, "RTM handshake complete");
    return { url: snapshot.url, ids, admins, botUserId };
  }

  private resolveAdmins(ids: IdentityMap): Set<string> {
    const admins = new Set<string>();
    for (const name of this.options.admins ?? []) {
      const id = ids.userId(name);
      if (!id) {
        throw new ConfigError(`Unknown admin user: ${name}`);
      }
      admins.add(id);
    }
    return admins;
  }

  private setStatus(status: RuntimeStatus): void {
    if (this.status === status) {
      return;
    }
    this.status = status;
    this.emit("status", status);
  }
}
