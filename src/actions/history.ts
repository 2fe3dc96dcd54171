import type { HistoryRecord } from "../storage/types";
import type { Action, ActionContext, ActionTree } from "./types";

export type HistoryCallback = (records: HistoryRecord[]) => ActionTree | Promise<ActionTree>;

export interface HistoryActionOptions {
  callback: HistoryCallback;
  /** Channel name filter. */
  channel?: string;
  /** User id filter. */
  user?: string;
}

/**
 * Reads stored messages matching the filters and continues with whatever the
 * callback returns.
 */
export class HistoryAction implements Action {
  constructor(private readonly options: HistoryActionOptions) {}

  async execute(ctx: ActionContext): Promise<ActionTree> {
    const records = ctx.history.query({
      channel: this.options.channel,
      userId: this.options.user,
    });
    return this.options.callback(records);
  }
}
