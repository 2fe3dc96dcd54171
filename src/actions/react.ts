import type { Action, ActionContext, ActionTree } from "./types";

export class ReactAction implements Action {
  constructor(readonly emoji: string) {}

  async execute(ctx: ActionContext): Promise<ActionTree> {
    const event = ctx.event;
    if (!event?.ts) {
      throw new Error("ReactAction needs a triggering message");
    }
    await ctx.api.addReaction(this.emoji.replace(/^:|:$/g, ""), event.channel, event.ts);
    return null;
  }
}
