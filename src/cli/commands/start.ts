import { loadConfig, type RtmbotConfig } from "../../config";
import { GreeterBot } from "../../examples/greeter-bot";
import { configureLogger, logger } from "../../logger";
import { HttpSlackApi } from "../../runtime/api/http-client";
import { registerProcessErrorHandlers } from "../../runtime/process-error-handlers";
import { SlackRuntime } from "../../runtime/runtime";
import { WebSocketTransport } from "../../runtime/transport/websocket";
import { openDatabase } from "../../storage/connection";
import { MemoryHistoryStore, SqliteHistoryStore } from "../../storage/repos/history";
import type { HistoryStore } from "../../storage/types";

function createHistoryStore(config: RtmbotConfig): { store: HistoryStore; close: () => void } {
  if (!config.history.persist) {
    return { store: new MemoryHistoryStore(), close: () => {} };
  }
  const conn = openDatabase(config.history.dbPath);
  return { store: new SqliteHistoryStore(conn), close: () => conn.close() };
}

export function createRuntime(config: RtmbotConfig, store: HistoryStore): SlackRuntime {
  const { slack, history } = config;
  const runtime = new SlackRuntime({
    api: new HttpSlackApi({
      token: slack.token,
      adminToken: slack.adminToken,
      botName: slack.botName,
    }),
    transportFactory: (url) => WebSocketTransport.connect(url),
    history: store,
    botName: slack.botName,
    alert: slack.alert,
    admins: slack.admins,
    loadHistoryOnConnect: history.loadOnConnect,
    clearCommandsOnConnect: history.clearCommands,
    includeDms: history.includeDms,
    pacingMs: history.pacingMs,
    progressEvery: history.progressEvery,
  });
  runtime.on("status", (status) => logger.info({ status }, "Runtime status changed"));
  return runtime;
}

export async function startRuntime(options: { config?: string } = {}): Promise<void> {
  registerProcessErrorHandlers();
  const result = loadConfig(options.config);
  if (!result.success || !result.config) {
    console.error("Error: failed to load configuration.");
    for (const error of result.errors ?? []) {
      console.error(`- ${error}`);
    }
    process.exitCode = 1;
    return;
  }
  const config = result.config;
  configureLogger(config.logging.level);
  logger.info({ path: result.path }, "Configuration loaded");

  const { store, close } = createHistoryStore(config);
  const runtime = createRuntime(config, store);
  runtime.addBot(new GreeterBot());

  const controller = new AbortController();
  const stop = () => {
    logger.info("Shutting down");
    controller.abort();
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  try {
    await runtime.run(controller.signal);
  } finally {
    process.off("SIGINT", stop);
    process.off("SIGTERM", stop);
    close();
  }
}
