import type { Logger } from '../logger.js';
import type { FeedMessage, FeedRequest, TickerSymbol } from '../domain/types.js';
import type { EventLoop } from '../events/event-loop.js';
import type { Prompter } from '../prompt/prompter.js';
import type { SessionRepository } from '../repositories/session.repo.js';
import type { SessionState } from '../state/session-state.js';
import {
  connectAttempts,
  feedConnected,
  framesMalformed,
  framesReceived,
  requestsSent,
  retryDecisions,
  trackedEntries,
} from '../metrics/metrics.js';
import { decodeMessage, encodeRequest, isInvalidSymbolError, toTickerRecord } from './codec.js';
import type { FeedTransport, TransportFactory } from './transport.js';

export const RETRY_PROMPT =
  'The websocket connection failed.\n\n' +
  'This might be because the API key is wrong, but if you were previously connected, you might want to try reconnecting?';

export function invalidSymbolPrompt(symbol: TickerSymbol): string {
  return `Invalid symbol detected. Do you want to untrack the last added one: [${symbol}]`;
}

export type FeedState =
  | { status: 'disconnected' }
  | { status: 'connecting'; url: string }
  | { status: 'connected'; url: string; awaiting: 'untrack-invalid' | null }
  // transport already released; the user has not answered the retry question yet
  | { status: 'awaiting-retry'; cause: 'error' | 'close' };

export type FeedStatus = {
  state: FeedState;
  lastMessageAt: number | null;
  lastPingAt: number | null;
  reconnects: number;
};

export type FeedConnectionOptions = {
  endpoint: string;
  tokenParam: string;
  session: SessionState;
  repo: SessionRepository;
  prompter: Prompter;
  transport: TransportFactory;
  loop: EventLoop;
  log: Logger;
  now?: () => number;
};

type Listener = (status: FeedStatus) => void;

// Handle plus a generation number so events from a released socket are ignored.
type Slot = { transport: FeedTransport; generation: number };

/**
 * Websocket session state machine. The tracked symbols are the source of truth:
 * every fresh open re-sends one subscribe per tracked entry.
 */
export class FeedConnection {
  private readonly opts: FeedConnectionOptions;
  private readonly now: () => number;
  private readonly listeners = new Set<Listener>();

  private state: FeedState = { status: 'disconnected' };
  private slot: Slot | null = null;
  private generation = 0;
  private pendingPrompt: AbortController | null = null;
  // bumped by disconnect(); a queued connect from an older epoch does nothing
  private epoch = 0;

  private lastMessageAt: number | null = null;
  private lastPingAt: number | null = null;
  private reconnects = 0;

  constructor(opts: FeedConnectionOptions) {
    this.opts = opts;
    this.now = opts.now ?? Date.now;
  }

  status(): FeedStatus {
    return {
      state: this.state,
      lastMessageAt: this.lastMessageAt,
      lastPingAt: this.lastPingAt,
      reconnects: this.reconnects,
    };
  }

  isConnected(): boolean {
    return this.state.status === 'connected';
  }

  onChange(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => { this.listeners.delete(listener); };
  }

  /**
   * Replaces any live transport (replace-and-resubscribe).
   * Without `apiKey` the session's key is read when the connect event runs.
   */
  connect(apiKey?: string): Promise<void> {
    const epoch = this.epoch;
    return this.opts.loop
      .schedule('connect', () => {
        if (epoch !== this.epoch) return;
        return this.open(apiKey ?? this.opts.session.apiKey);
      })
      .then(() => undefined);
  }

  /** Drops the transport without asking. Cancels any open question and any connect still queued. */
  disconnect(): void {
    this.epoch++;
    this.pendingPrompt?.abort();
    const wasLive = this.slot !== null || this.state.status !== 'disconnected';
    this.release();
    this.setState({ status: 'disconnected' });
    if (wasLive) this.opts.log.info('feed disconnected by user');
  }

  /** Sends only while connected; otherwise the next open resubscribes. */
  request(req: FeedRequest): boolean {
    if (this.state.status !== 'connected' || !this.slot) return false;
    this.slot.transport.send(encodeRequest(req));
    requestsSent.inc({ type: req.type });
    this.opts.log.debug({ request: req }, 'feed request sent');
    return true;
  }

  // ---- transitions --------------------------------------------------------

  private async open(apiKey: string): Promise<void> {
    this.release();

    let url: string;
    let slot: Slot;
    try {
      url = this.feedUrl(apiKey);
      const generation = ++this.generation;
      const transport = this.opts.transport(url, {
        onOpen: () => this.dispatch(generation, 'open', () => this.handleOpen(generation)),
        onMessage: (text) => this.dispatch(generation, 'message', () => this.handleMessage(generation, text)),
        onError: (err) => this.dispatch(generation, 'error', () => this.handleDrop(generation, 'error', err)),
        onClose: (code, reason) =>
          this.dispatch(generation, 'close', () => this.handleDrop(generation, 'close', { code, reason })),
      });
      slot = { transport, generation };
    } catch (err) {
      connectAttempts.inc({ outcome: 'failed' });
      this.setState({ status: 'disconnected' });
      const message = err instanceof Error ? err.message : String(err);
      this.opts.log.error({ err, endpoint: this.opts.endpoint }, 'feed transport could not be created');
      await this.opts.prompter.alert(message);
      return;
    }

    this.slot = slot;
    this.setState({ status: 'connecting', url: redact(url, this.opts.tokenParam) });
    this.opts.log.info({ endpoint: this.opts.endpoint }, 'feed connecting');
  }

  private handleOpen(generation: number): void {
    if (!this.isCurrent(generation) || this.state.status !== 'connecting') return;
    const { url } = this.state;

    connectAttempts.inc({ outcome: 'opened' });
    feedConnected.set(1);
    this.setState({ status: 'connected', url, awaiting: null });

    const tracked = this.opts.session.tracked.entries();
    for (const symbol of tracked) this.request({ type: 'subscribe', symbol });
    this.opts.log.info({ subscriptions: tracked.length }, 'feed connected');
  }

  private async handleMessage(generation: number, text: string): Promise<void> {
    if (!this.isCurrent(generation)) return;
    this.lastMessageAt = this.now();

    const decoded = decodeMessage(text);
    if (!decoded.ok) {
      framesMalformed.inc();
      this.opts.log.error({ error: decoded.error, frame: text.slice(0, 256) }, 'undecodable feed frame dropped');
      return;
    }

    framesReceived.inc({ type: decoded.message.type });
    this.opts.log.debug({ type: decoded.message.type }, 'feed frame received');
    await this.applyMessage(generation, decoded.message);
  }

  private async applyMessage(generation: number, message: FeedMessage): Promise<void> {
    const { session, repo } = this.opts;
    switch (message.type) {
      case 'ping':
        this.lastPingAt = this.now();
        return;

      case 'trade':
        for (const tick of message.data) session.addHistory(toTickerRecord(tick));
        repo.persist(session);
        this.emit();
        return;

      case 'error': {
        if (!isInvalidSymbolError(message.msg)) {
          this.opts.log.warn({ msg: message.msg }, 'feed reported an error');
          return;
        }
        const suspect = session.tracked.lastAdded();
        if (suspect === undefined) {
          this.opts.log.warn({ msg: message.msg }, 'invalid symbol reported with nothing tracked');
          return;
        }
        await this.resolveInvalidSymbol(generation, suspect);
        return;
      }
    }
  }

  // The feed already rejected the symbol, so no unsubscribe goes out for it.
  private async resolveInvalidSymbol(generation: number, suspect: TickerSymbol): Promise<void> {
    if (this.state.status === 'connected') this.setState({ ...this.state, awaiting: 'untrack-invalid' });

    const remove = await this.ask(invalidSymbolPrompt(suspect));

    if (this.isCurrent(generation) && this.state.status === 'connected') {
      this.setState({ ...this.state, awaiting: null });
    }
    if (!remove) return;
    // the tail may have changed if the user tracked something meanwhile
    if (this.opts.session.tracked.lastAdded() !== suspect) return;

    this.opts.session.removeLastAdded();
    trackedEntries.set(this.opts.session.tracked.size);
    this.opts.repo.persist(this.opts.session);
    this.opts.log.info({ symbol: suspect }, 'untracked symbol rejected by feed');
    this.emit();
  }

  private async handleDrop(generation: number, cause: 'error' | 'close', detail: unknown): Promise<void> {
    if (!this.isCurrent(generation)) return;

    this.release();
    this.setState({ status: 'awaiting-retry', cause });
    this.opts.log.warn({ cause, detail }, 'feed connection lost');

    const retry = await this.ask(RETRY_PROMPT);
    retryDecisions.inc({ answer: retry ? 'yes' : 'no' });

    // a user disconnect or connect may have happened while the question was open
    if (this.state.status !== 'awaiting-retry') return;
    if (!retry) {
      this.setState({ status: 'disconnected' });
      return;
    }
    this.reconnects++;
    await this.open(this.opts.session.apiKey);
  }

  // ---- helpers ------------------------------------------------------------

  private dispatch(generation: number, name: string, handler: () => void | Promise<void>): void {
    if (!this.isCurrent(generation)) return;
    void this.opts.loop.schedule(`feed:${name}`, handler);
  }

  private isCurrent(generation: number): boolean {
    return this.slot !== null && this.slot.generation === generation;
  }

  private async ask(message: string): Promise<boolean> {
    const ac = new AbortController();
    this.pendingPrompt = ac;
    try {
      return await this.opts.prompter.confirm(message, ac.signal);
    } catch (err) {
      if (ac.signal.aborted) return false;
      throw err;
    } finally {
      if (this.pendingPrompt === ac) this.pendingPrompt = null;
    }
  }

  private release(): void {
    const slot = this.slot;
    this.slot = null;
    feedConnected.set(0);
    if (!slot) return;
    try {
      slot.transport.close();
    } catch (err) {
      this.opts.log.warn({ err }, 'closing feed transport failed');
    }
  }

  private feedUrl(apiKey: string): string {
    const url = new URL(this.opts.endpoint);
    url.searchParams.set(this.opts.tokenParam, apiKey);
    return url.toString();
  }

  private setState(next: FeedState): void {
    this.state = next;
    this.emit();
  }

  private emit(): void {
    const status = this.status();
    for (const l of this.listeners) {
      try {
        l(status);
      } catch (err) {
        this.opts.log.error({ err }, 'feed listener threw');
      }
    }
  }
}

function redact(url: string, tokenParam: string): string {
  try {
    const u = new URL(url);
    if (u.searchParams.has(tokenParam)) u.searchParams.set(tokenParam, '***');
    return u.toString();
  } catch {
    return url;
  }
}
