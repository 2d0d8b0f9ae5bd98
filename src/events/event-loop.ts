import type { Logger } from '../logger.js';

/**
 * Runs tasks one at a time, each to completion (awaited prompts included)
 * before the next starts. A failing task is logged and the loop moves on.
 */
export class EventLoop {
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly log: Logger) {}

  schedule<T>(name: string, task: () => T | Promise<T>): Promise<T | undefined> {
    const run = this.tail.then(task).then(
      (value) => value,
      (err: unknown) => {
        this.log.error({ err, event: name }, 'event handler failed');
        return undefined;
      },
    );
    this.tail = run.then(() => undefined);
    return run;
  }

  /** Resolves once every task scheduled so far has finished. */
  idle(): Promise<void> {
    return this.tail;
  }
}
