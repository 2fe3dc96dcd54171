import type { Action, ActionContext, ActionTree } from "./types";

/** Deletes the message that triggered the handler, using the admin token. */
export class DeleteAction implements Action {
  async execute(ctx: ActionContext): Promise<ActionTree> {
    const event = ctx.event;
    if (!event?.ts) {
      throw new Error("DeleteAction needs a triggering message");
    }
    await ctx.api.deleteMessage(event.channel, event.ts, { admin: true });
    return null;
  }
}
