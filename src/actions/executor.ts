import { logger } from "../logger";
import { isAction, type ActionContext, type ActionTree } from "./types";

function isActionList(value: ActionTree): value is readonly ActionTree[] {
  return Array.isArray(value);
}

/**
 * Executes an action tree depth-first with an explicit work stack.
 *
 * A list pushes all of its elements, so its last element is popped and fully
 * expanded (including everything it yields) before the element ahead of it.
 * Errors are not caught here. Returns the number of actions executed.
 */
export async function executeActions(root: ActionTree, ctx: ActionContext): Promise<number> {
  const stack: ActionTree[] = [root];
  let executed = 0;

  while (stack.length > 0) {
    const unit = stack.pop();
    if (isActionList(unit)) {
      for (const child of unit) {
        stack.push(child);
      }
      continue;
    }
    if (!isAction(unit)) {
      continue;
    }
    const yielded = await unit.execute(ctx);
    executed += 1;
    stack.push(yielded);
  }

  if (executed > 0) {
    logger.debug({ executed, channel: ctx.event?.channel }, "Actions executed");
  }
  return executed;
}
