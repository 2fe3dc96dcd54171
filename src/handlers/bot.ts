import type { HandlerSpec } from "./types";

/** A set of handlers registered together. */
export interface Bot {
  handlers(): HandlerSpec[];
}

export interface HandlerTarget {
  registerHandler(spec: HandlerSpec): void;
}

export function registerBot(target: HandlerTarget, bot: Bot): number {
  const specs = bot.handlers();
  for (const spec of specs) {
    target.registerHandler(spec);
  }
  return specs.length;
}
