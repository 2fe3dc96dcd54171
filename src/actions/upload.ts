import fs from "node:fs/promises";
import { logger } from "../logger";
import { resolveMessageTarget } from "./message";
import type { Action, ActionContext, ActionTree } from "./types";

export interface UploadActionOptions {
  file: string;
  /** Channel name or id to upload into. */
  channel?: string | null;
  /** User id whose direct message session receives the file when no channel is given. */
  user?: string | null;
  title?: string;
  /** Remove the local file once the upload finished. */
  deleteAfter?: boolean;
}

export class UploadAction implements Action {
  constructor(private readonly options: UploadActionOptions) {}

  async execute(ctx: ActionContext): Promise<ActionTree> {
    const { file, title, deleteAfter, user } = this.options;
    const named = this.options.channel;
    const channel = named
      ? (ctx.ids.channelId(named) ?? named)
      : resolveMessageTarget(ctx, { user });
    await ctx.api.uploadFile({ file, channel, title });
    if (deleteAfter) {
      await fs.rm(file, { force: true });
      logger.debug({ file }, "Uploaded file removed");
    }
    return null;
  }
}
