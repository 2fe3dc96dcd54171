import { logger } from "../logger";

declare global {
  // eslint-disable-next-line no-var
  var __rtmbotProcessErrorHandlersRegistered: boolean | undefined;
}

export function registerProcessErrorHandlers(): void {
  if (globalThis.__rtmbotProcessErrorHandlersRegistered) {
    return;
  }
  globalThis.__rtmbotProcessErrorHandlersRegistered = true;

  process.on("unhandledRejection", (reason) => {
    logger.fatal({ err: reason }, "Unhandled rejection");
    process.exitCode = 1;
  });

  process.on("uncaughtException", (error) => {
    logger.fatal({ err: error }, "Uncaught exception");
    process.exitCode = 1;
  });
}
