import type { Logger } from './logger.js';
import type { EventLoop } from './events/event-loop.js';
import type { FeedConnection } from './feed/connection.js';
import type { SessionRepository } from './repositories/session.repo.js';
import type { SessionState } from './state/session-state.js';
import type { UntrackResult } from './state/tracked-symbols.js';
import { trackedEntries } from './metrics/metrics.js';

export type ControllerDeps = {
  session: SessionState;
  repo: SessionRepository;
  feed: FeedConnection;
  loop: EventLoop;
  log: Logger;
};

type Outcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

// User intents. Each one runs on the event loop so it never interleaves with a feed event.
export class SessionController {
  private pendingSymbol = '';

  constructor(private readonly deps: ControllerDeps) {
    trackedEntries.set(deps.session.tracked.size);
  }

  get pending(): string {
    return this.pendingSymbol;
  }

  updatePendingSymbol(text: string): void {
    this.pendingSymbol = text;
  }

  updateApiKey(key: string): Promise<void> {
    return this.run('updateApiKey', () => {
      this.deps.session.apiKey = key;
      this.persist();
    });
  }

  // Takes the pending text now; the loop may be held up behind an open prompt.
  trackSymbol(): Promise<void> {
    const symbol = this.pendingSymbol;
    if (!symbol) return Promise.resolve();
    this.pendingSymbol = '';

    return this.run('trackSymbol', () => {
      this.deps.session.addSymbol(symbol);
      this.deps.feed.request({ type: 'subscribe', symbol });
      this.persist();
      this.deps.log.info({ symbol }, 'symbol tracked');
    });
  }

  /** Rejects with RangeError for an index outside the tracked list. */
  async untrackAt(index: number): Promise<UntrackResult> {
    const outcome = await this.deps.loop.schedule('untrackAt', (): Outcome<UntrackResult> => {
      let result: UntrackResult;
      try {
        result = this.deps.session.untrackAt(index);
      } catch (error) {
        return { ok: false, error };
      }
      if (result.wasLastOccurrence) {
        this.deps.feed.request({ type: 'unsubscribe', symbol: result.removedSymbol });
      }
      this.persist();
      this.deps.log.info(result, 'symbol untracked');
      return { ok: true, value: result };
    });
    if (!outcome) throw new Error('untrackAt did not run');
    if (!outcome.ok) throw outcome.error;
    return outcome.value;
  }

  connect(): Promise<void> {
    return this.deps.feed.connect();
  }

  disconnect(): void {
    this.deps.feed.disconnect();
  }

  private persist(): void {
    trackedEntries.set(this.deps.session.tracked.size);
    this.deps.repo.persist(this.deps.session);
  }

  private run(name: string, task: () => void): Promise<void> {
    return this.deps.loop.schedule(name, task).then(() => undefined);
  }
}
