import type { Logger } from './logger.js';
import { SessionController } from './controller.js';
import { EventLoop } from './events/event-loop.js';
import { FeedConnection } from './feed/connection.js';
import { wsTransport, type TransportFactory } from './feed/transport.js';
import type { Prompter } from './prompt/prompter.js';
import { SessionRepository } from './repositories/session.repo.js';
import type { SessionState } from './state/session-state.js';
import type { KeyValueStore } from './storage/key-value-store.js';

export type TickerAppOptions = {
  endpoint: string;
  tokenParam?: string;
  storageKey?: string;
  /** null runs in memory only */
  store: KeyValueStore | null;
  prompter: Prompter;
  log: Logger;
  transport?: TransportFactory;
  now?: () => number;
};

export type TickerApp = {
  session: SessionState;
  repo: SessionRepository;
  loop: EventLoop;
  feed: FeedConnection;
  controller: SessionController;
};

/** Restores (or creates) the one session and wires it up. Opens nothing until `connect`. */
export function createTickerApp(opts: TickerAppOptions): TickerApp {
  const repo = new SessionRepository(opts.store, opts.storageKey ?? 'state', opts.log);
  const session = repo.restore();
  const loop = new EventLoop(opts.log);

  const feed = new FeedConnection({
    endpoint: opts.endpoint,
    tokenParam: opts.tokenParam ?? 'token',
    session,
    repo,
    prompter: opts.prompter,
    transport: opts.transport ?? wsTransport,
    loop,
    log: opts.log,
    now: opts.now,
  });

  const controller = new SessionController({ session, repo, feed, loop, log: opts.log });

  return { session, repo, loop, feed, controller };
}
