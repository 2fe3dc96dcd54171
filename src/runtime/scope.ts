import { logger } from "../logger";
import { toError } from "../errors";

export class ScopeClosedError extends Error {
  readonly code = "SCOPE_CLOSED";

  constructor() {
    super("Task scope closed");
    this.name = "ScopeClosedError";
  }
}

type Outcome<T> = { ok: true; value: T } | { ok: false; error: Error };

/**
 * Owns every task the runtime starts. The first task failure aborts the
 * scope's signal, and `run` rejects with that failure once all tasks settled.
 */
export class TaskScope {
  private readonly controller = new AbortController();
  private readonly tasks = new Set<Promise<void>>();
  private failure: Error | null = null;
  private notifyFailure: ((error: Error) => void) | null = null;
  private readonly failed: Promise<Error>;

  constructor() {
    this.failed = new Promise<Error>((resolve) => {
      this.notifyFailure = resolve;
    });
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get activeTasks(): number {
    return this.tasks.size;
  }

  spawn(name: string, task: (signal: AbortSignal) => Promise<void>): void {
    if (this.signal.aborted) {
      logger.warn({ task: name }, "Task scope already cancelled; task not started");
      return;
    }
    const running: Promise<void> = task(this.signal)
      .catch((err: unknown) => {
        if (this.signal.aborted) {
          logger.debug({ task: name, err }, "Task stopped after scope cancellation");
          return;
        }
        logger.error({ task: name, err }, "Task failed; cancelling all tasks");
        this.cancel(toError(err));
      })
      .finally(() => {
        this.tasks.delete(running);
      });
    this.tasks.add(running);
  }

  /** Aborts every task. The first reason given wins. */
  cancel(reason: Error): void {
    if (this.signal.aborted) {
      return;
    }
    this.failure = reason;
    this.controller.abort(reason);
    this.notifyFailure?.(reason);
  }

  /**
   * Runs `main` inside the scope. A failing main task or spawned task cancels
   * the others; leaving normally cancels whatever is still running.
   */
  async run<T>(main: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const mainTask = main(this.signal).then(
      (value): Outcome<T> => ({ ok: true, value }),
      (error: unknown): Outcome<T> => ({ ok: false, error: toError(error) }),
    );
    const outcome = await Promise.race([
      mainTask,
      this.failed.then((error): Outcome<T> => ({ ok: false, error })),
    ]);

    if (!outcome.ok) {
      // Spawned task failures were logged when they cancelled the scope.
      if (!this.signal.aborted) {
        logger.error({ err: outcome.error }, "Main task failed; cancelling all tasks");
      }
      this.cancel(outcome.error);
    } else if (!this.signal.aborted) {
      this.controller.abort(new ScopeClosedError());
    }
    await Promise.allSettled([mainTask, ...this.tasks]);

    if (this.failure) {
      throw this.failure;
    }
    if (!outcome.ok) {
      throw outcome.error;
    }
    return outcome.value;
  }
}
